import type { BranchRecord } from '../../../shared/types'
import { log } from '../../../shared/logger'
import { HierarchyBuilder, RecordParser, TreeRenderer, UpstreamSanitizer } from '../../domain'

/**
 * Runs the whole transform: parse, sanitize upstreams, build the tracking
 * forest and flatten it with indented display names.
 *
 * Throws before returning anything when a line is malformed or upstreams
 * form a cycle.
 */
export function buildBranchTree(text: string): BranchRecord[] {
  const records = RecordParser.parseText(text)
  log.debug(`Parsed ${records.length} branch records`)

  const sanitized = UpstreamSanitizer.sanitizeAll(records)
  const cleared = sanitized.filter((record, i) => record !== records[i]).length
  if (cleared > 0) {
    log.debug(`Cleared ${cleared} upstream(s) not present in the input`)
  }

  const forest = HierarchyBuilder.buildForest(sanitized)
  log.debug(`Built ${forest.length} root branch(es)`)

  return TreeRenderer.render(forest)
}
