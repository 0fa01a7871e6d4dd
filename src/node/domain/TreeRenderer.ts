/**
 * TreeRenderer - flattens the tracking forest into display order.
 */

import type { BranchNode, BranchRecord } from '../../shared/types'
import { INDENT_STEP } from '../shared/constants'

export class TreeRenderer {
  private constructor() {}

  /**
   * Walks the forest depth-first, parent before children, siblings in order.
   */
  public static walk(
    forest: readonly BranchNode[],
    visitor: (node: BranchNode, depth: number) => void
  ): void {
    const stack: Array<{ node: BranchNode; depth: number }> = []
    for (let i = forest.length - 1; i >= 0; i--) {
      stack.push({ node: forest[i], depth: 0 })
    }

    let entry = stack.pop()
    while (entry) {
      const { node, depth } = entry
      visitor(node, depth)
      for (let i = node.children.length - 1; i >= 0; i--) {
        stack.push({ node: node.children[i], depth: depth + 1 })
      }
      entry = stack.pop()
    }
  }

  /**
   * Returns a copy of the record with its display name indented for the given depth.
   */
  public static indent(record: BranchRecord, depth: number): BranchRecord {
    return { ...record, displayName: INDENT_STEP.repeat(depth) + record.displayName }
  }

  /**
   * Flattens the forest in pre-order, indenting each display name by depth.
   */
  public static render(forest: readonly BranchNode[]): BranchRecord[] {
    const result: BranchRecord[] = []
    TreeRenderer.walk(forest, (node, depth) => {
      result.push(TreeRenderer.indent(node.record, depth))
    })
    return result
  }
}
