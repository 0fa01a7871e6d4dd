/**
 * Output layouts for a rendered branch tree.
 *
 * The transform keeps all seven fields, so each layout is a pure projection
 * of the same record sequence.
 */

import type { BranchRecord, BranchRecordField, OutputLayout } from '../../../shared/types'
import { BRANCH_RECORD_FIELDS } from '../../../shared/types'
import { ANSI, CURRENT_BRANCH_MARKER } from '../../shared/constants'

export type FormatOptions = {
  layout: OutputLayout
  /** Separator for the `fields` layout. Defaults to a tab. */
  delimiter?: string
  /** ANSI colors in the `table` layout. */
  color?: boolean
}

export type Align = 'left' | 'right'

const TABLE_ALIGN: Record<BranchRecordField, Align> = {
  isCurrent: 'right',
  shortHash: 'left',
  refName: 'left',
  displayName: 'left',
  upstreamRef: 'left',
  upstreamDisplayName: 'left',
  upstreamTrackInfo: 'right'
}

export function formatBranchTree(
  records: readonly BranchRecord[],
  options: FormatOptions
): string[] {
  switch (options.layout) {
    case 'names':
      return records.map((record) => record.displayName)
    case 'fields':
      return formatFields(records, options.delimiter ?? '\t')
    case 'table':
      return formatTable(records, options.color ?? false)
  }
}

export function formatFields(records: readonly BranchRecord[], delimiter: string): string[] {
  return records.map((record) =>
    BRANCH_RECORD_FIELDS.map((field) => record[field]).join(delimiter)
  )
}

/**
 * Width of a value in code points, so a character outside the BMP counts once.
 */
export function displayWidth(value: string): number {
  return [...value].length
}

export function padToWidth(value: string, width: number, align: Align): string {
  const fill = ' '.repeat(Math.max(0, width - displayWidth(value)))
  return align === 'right' ? fill + value : value + fill
}

/**
 * Pads every column to its widest value so the report lines up.
 */
export function alignColumns(records: readonly BranchRecord[]): BranchRecord[] {
  const widths = new Map<BranchRecordField, number>()
  for (const field of BRANCH_RECORD_FIELDS) {
    let width = 0
    for (const record of records) {
      width = Math.max(width, displayWidth(record[field]))
    }
    widths.set(field, width)
  }

  const pad = (field: BranchRecordField, value: string): string =>
    padToWidth(value, widths.get(field) ?? 0, TABLE_ALIGN[field])

  return records.map((record) => ({
    isCurrent: pad('isCurrent', record.isCurrent),
    shortHash: pad('shortHash', record.shortHash),
    refName: pad('refName', record.refName),
    displayName: pad('displayName', record.displayName),
    upstreamRef: pad('upstreamRef', record.upstreamRef),
    upstreamDisplayName: pad('upstreamDisplayName', record.upstreamDisplayName),
    upstreamTrackInfo: pad('upstreamTrackInfo', record.upstreamTrackInfo)
  }))
}

export function formatTable(records: readonly BranchRecord[], color: boolean): string[] {
  return alignColumns(records).map((row) => {
    const isCurrent = row.isCurrent.trim() === '*'
    const marker = isCurrent ? CURRENT_BRANCH_MARKER : ' '

    if (!color) {
      return [
        marker,
        row.shortHash,
        row.displayName,
        row.upstreamTrackInfo,
        row.upstreamDisplayName
      ]
        .join(' ')
        .trimEnd()
    }

    return (
      `${isCurrent ? ANSI.bold + marker : marker} ` +
      `${ANSI.yellow}${row.shortHash}${ANSI.resetColor} ` +
      `${row.displayName} ` +
      `${ANSI.cyan}${row.upstreamTrackInfo}${ANSI.resetColor} ` +
      `${ANSI.blue}${row.upstreamDisplayName}${ANSI.reset}`
    )
  })
}
