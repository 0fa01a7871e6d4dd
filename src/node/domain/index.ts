/**
 * Domain Layer - Pure branch hierarchy logic with no I/O dependencies.
 *
 * Every class here is synchronous and side-effect free. Reading input and
 * writing the report belong to the CLI layer.
 */

export { HierarchyBuilder } from './HierarchyBuilder'
export { RecordParser } from './RecordParser'
export { ReferenceIndex } from './ReferenceIndex'
export { TreeRenderer } from './TreeRenderer'
export { UpstreamSanitizer } from './UpstreamSanitizer'
