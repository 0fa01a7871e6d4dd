/**
 * UpstreamSanitizer - clears upstream refs that point outside the record set.
 *
 * A branch tracking a remote branch that is not listed (or a deleted local
 * branch) becomes a root instead of disappearing from the hierarchy.
 */

import type { BranchRecord } from '../../shared/types'
import { ReferenceIndex } from './ReferenceIndex'

export class UpstreamSanitizer {
  private constructor() {}

  /**
   * Returns the record unchanged when its upstream is empty or known,
   * otherwise a copy with an empty upstreamRef. Other fields are kept.
   */
  public static sanitize(record: BranchRecord, index: ReadonlySet<string>): BranchRecord {
    if (record.upstreamRef === '' || index.has(record.upstreamRef)) {
      return record
    }
    return { ...record, upstreamRef: '' }
  }

  /**
   * Indexes the records and sanitizes each one against that index.
   */
  public static sanitizeAll(records: readonly BranchRecord[]): BranchRecord[] {
    const index = ReferenceIndex.build(records)
    return records.map((record) => UpstreamSanitizer.sanitize(record, index))
  }
}
