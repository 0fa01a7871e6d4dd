import type { BranchRecord } from '../../shared/types'

/**
 * ReferenceIndex - the set of every ref name in an input, for membership tests.
 */
export class ReferenceIndex {
  private constructor() {}

  public static build(records: readonly BranchRecord[]): ReadonlySet<string> {
    return new Set(records.map((record) => record.refName))
  }
}
