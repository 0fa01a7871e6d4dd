export { buildBranchTree } from './core/utils/build-branch-tree'
export {
  alignColumns,
  formatBranchTree,
  formatFields,
  formatTable,
  type FormatOptions
} from './core/utils/format-branch-tree'
export { DEFAULT_CONFIGURATION, loadConfiguration, resolveColor } from './core/config'
export {
  HierarchyBuilder,
  RecordParser,
  ReferenceIndex,
  TreeRenderer,
  UpstreamSanitizer
} from './domain'
export { BRANCH_FORMAT, FIELD_COUNT, FIELD_SEPARATOR, INDENT_STEP } from './shared/constants'
export { AppError, ConfigError, CyclicUpstreamError, MalformedRecordError } from './shared/errors'
export * from '../shared/types'
