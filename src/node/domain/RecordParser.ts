/**
 * RecordParser - turns `git branch --format` output into branch records.
 *
 * Field contents are opaque: nothing is trimmed or validated beyond the
 * number of fields, so branch names containing spaces survive verbatim.
 */

import type { BranchRecord } from '../../shared/types'
import { FIELD_COUNT, FIELD_SEPARATOR } from '../shared/constants'
import { MalformedRecordError } from '../shared/errors'

export class RecordParser {
  // Prevent instantiation - use static methods
  private constructor() {}

  /**
   * Parses one line (without its line terminator) into a record.
   * Throws MalformedRecordError unless the line holds exactly seven fields.
   */
  public static parseLine(line: string, lineNumber = 1): BranchRecord {
    const fields = line.split(FIELD_SEPARATOR)
    if (fields.length !== FIELD_COUNT) {
      throw new MalformedRecordError(
        `Line ${lineNumber}: expected ${FIELD_COUNT} NUL-separated fields, found ${fields.length}`,
        lineNumber,
        fields.length
      )
    }

    const [
      isCurrent,
      shortHash,
      refName,
      displayName,
      upstreamRef,
      upstreamDisplayName,
      upstreamTrackInfo
    ] = fields

    return {
      isCurrent,
      shortHash,
      refName,
      displayName,
      upstreamRef,
      upstreamDisplayName,
      upstreamTrackInfo
    }
  }

  /**
   * Parses a whole input text, one record per line.
   * Only the empty segment after a final newline is skipped; any other empty
   * line is malformed.
   */
  public static parseText(text: string): BranchRecord[] {
    if (text === '') return []

    const lines = text.split('\n')
    if (lines[lines.length - 1] === '') {
      lines.pop()
    }

    return lines.map((line, index) =>
      RecordParser.parseLine(line.endsWith('\r') ? line.slice(0, -1) : line, index + 1)
    )
  }
}
