/**
 * One row of `git branch --format` output.
 *
 * Field order matches the input columns, see BRANCH_RECORD_FIELDS.
 */
export type BranchRecord = {
  /** `*` for the checked-out branch, a single space otherwise. */
  isCurrent: string
  shortHash: string
  /** Fully qualified ref, e.g. refs/heads/feature/foo. Identity key. */
  refName: string
  /** Short ref shown to the user. The renderer prefixes it with indentation. */
  displayName: string
  /** Fully qualified upstream ref, or '' when the branch tracks nothing. */
  upstreamRef: string
  upstreamDisplayName: string
  /** Ahead/behind annotation such as `[ahead 1, behind 2]`. */
  upstreamTrackInfo: string
}

export type BranchRecordField = keyof BranchRecord

/**
 * Column order of a branch record line.
 */
export const BRANCH_RECORD_FIELDS = [
  'isCurrent',
  'shortHash',
  'refName',
  'displayName',
  'upstreamRef',
  'upstreamDisplayName',
  'upstreamTrackInfo'
] as const satisfies readonly BranchRecordField[]

export type BranchNode = {
  record: BranchRecord
  children: BranchNode[]
}

/**
 * Parent key of a record in the tracking hierarchy.
 * `null` is the implicit root shared by every branch without an upstream.
 */
export type ParentKey = string | null

export type OutputLayout = 'names' | 'fields' | 'table'

export const OUTPUT_LAYOUTS = ['names', 'fields', 'table'] as const satisfies readonly OutputLayout[]

export type ColorMode = 'auto' | 'always' | 'never'

export const COLOR_MODES = ['auto', 'always', 'never'] as const satisfies readonly ColorMode[]
