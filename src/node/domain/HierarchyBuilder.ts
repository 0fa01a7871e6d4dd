/**
 * HierarchyBuilder - groups sanitized records into a forest by upstream tracking.
 *
 * Branches without an upstream hang off the implicit root (parent key `null`).
 * Siblings keep their input order; ordering is the producer's job
 * (e.g. `git branch --sort=-committerdate`).
 */

import type { BranchNode, BranchRecord, ParentKey } from '../../shared/types'
import { AppError, CyclicUpstreamError } from '../shared/errors'

export class HierarchyBuilder {
  private constructor() {}

  public static parentKeyOf(record: BranchRecord): ParentKey {
    return record.upstreamRef === '' ? null : record.upstreamRef
  }

  /**
   * Buckets records by parent key, preserving input order inside each bucket.
   */
  public static groupByParent(records: readonly BranchRecord[]): Map<ParentKey, BranchRecord[]> {
    const groups = new Map<ParentKey, BranchRecord[]>()
    for (const record of records) {
      const key = HierarchyBuilder.parentKeyOf(record)
      const siblings = groups.get(key) ?? []
      siblings.push(record)
      groups.set(key, siblings)
    }
    return groups
  }

  /**
   * Builds the ordered root nodes of the tracking forest.
   *
   * Expects sanitized records (every non-empty upstreamRef names a record).
   * Throws CyclicUpstreamError when tracking loops back on itself, since the
   * branches on a loop can never be reached from the root. The set of refs on
   * the current path catches a duplicate ref nested under its own name.
   */
  public static buildForest(records: readonly BranchRecord[]): BranchNode[] {
    const childrenByParent = HierarchyBuilder.groupByParent(records)
    const placed = new Set<BranchRecord>()

    const toNode = (record: BranchRecord): BranchNode => ({ record, children: [] })
    const forest = (childrenByParent.get(null) ?? []).map(toNode)

    // explicit stack keeps deep tracking chains off the call stack
    const path: string[] = []
    const onPath = new Set<string>()
    const stack: Array<{ node: BranchNode; leaving: boolean }> = forest
      .map((node) => ({ node, leaving: false }))
      .reverse()

    let frame = stack.pop()
    while (frame) {
      const { node, leaving } = frame
      const refName = node.record.refName

      if (leaving) {
        path.pop()
        onPath.delete(refName)
      } else {
        if (onPath.has(refName)) {
          throw HierarchyBuilder.cycleError(path.slice(path.indexOf(refName)))
        }
        placed.add(node.record)
        path.push(refName)
        onPath.add(refName)

        node.children = (childrenByParent.get(refName) ?? []).map(toNode)
        stack.push({ node, leaving: true })
        for (let i = node.children.length - 1; i >= 0; i--) {
          stack.push({ node: node.children[i], leaving: false })
        }
      }

      frame = stack.pop()
    }

    const unplaced = records.find((record) => !placed.has(record))
    if (unplaced) {
      const cycle = HierarchyBuilder.findCycle(unplaced, records)
      if (cycle) {
        throw HierarchyBuilder.cycleError(cycle)
      }
      throw new AppError(
        `Branch ${unplaced.refName} tracks unknown upstream ${unplaced.upstreamRef}; sanitize records before building the hierarchy`
      )
    }

    return forest
  }

  /**
   * Follows upstream links from a record until a ref repeats.
   * Returns the repeating part of the chain, or null when the chain ends.
   */
  public static findCycle(
    start: BranchRecord,
    records: readonly BranchRecord[]
  ): string[] | null {
    const byRef = new Map<string, BranchRecord>()
    for (const record of records) {
      if (!byRef.has(record.refName)) {
        byRef.set(record.refName, record)
      }
    }

    const chain: string[] = []
    const positions = new Map<string, number>()
    let current: BranchRecord | undefined = start
    while (current) {
      const seenAt = positions.get(current.refName)
      if (seenAt !== undefined) {
        return chain.slice(seenAt)
      }
      positions.set(current.refName, chain.length)
      chain.push(current.refName)
      current = current.upstreamRef === '' ? undefined : byRef.get(current.upstreamRef)
    }
    return null
  }

  private static cycleError(cycle: string[]): CyclicUpstreamError {
    const path = [...cycle, cycle[0]].join(' -> ')
    return new CyclicUpstreamError(`Upstream tracking forms a cycle: ${path}`, cycle)
  }
}
