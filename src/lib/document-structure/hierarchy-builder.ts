/**
 * @fileoverview Assembles flat, depth-tagged nodes into a tree.
 *
 * A node's parent is the deepest shallower node whose range contains the
 * node's whole range. `buildHierarchy` also accepts, when no node contains
 * the whole range, the deepest one containing the node's start, and then
 * widens parents bottom-up so every parent's end covers its children's ends.
 * Start offsets are never changed and ends are never narrowed.
 *
 * Nodes reference their parent by id only.
 *
 * @module lib/document-structure/hierarchy-builder
 */

import { ValidationError } from "@/lib/errors"
import type { RangedNode } from "./types"

/** A node placed in the tree, keyed by a generated id. */
export type HierarchyNode<T extends RangedNode> = T & {
  id: string
  parentId: string | null
}

/** Minimal shape for containment checks. */
export interface LinkedRange {
  id: string
  parentId: string | null
  title: string
  startOffset: number
  endOffset: number
}

function deepestLatest<T extends RangedNode>(
  candidates: readonly T[],
  node: RangedNode,
  accepts: (candidate: T) => boolean
): T | null {
  let best: T | null = null

  for (const candidate of candidates) {
    if (candidate.depth >= node.depth || !accepts(candidate)) continue
    if (
      best === null ||
      candidate.depth > best.depth ||
      (candidate.depth === best.depth && candidate.startOffset > best.startOffset)
    ) {
      best = candidate
    }
  }

  return best
}

/**
 * Pick the parent for `node` among `candidates`: the deepest shallower
 * candidate whose range contains `[node.startOffset, node.endOffset)`, the
 * latest starting on a tie.
 */
export function findDeepestContainer<T extends RangedNode>(
  candidates: readonly T[],
  node: RangedNode
): T | null {
  return deepestLatest(
    candidates,
    node,
    (candidate) => candidate.startOffset <= node.startOffset && node.endOffset <= candidate.endOffset
  )
}

function findStartContainer<T extends RangedNode>(candidates: readonly T[], node: RangedNode): T | null {
  return deepestLatest(
    candidates,
    node,
    (candidate) => candidate.startOffset <= node.startOffset && node.startOffset < candidate.endOffset
  )
}

/**
 * Assign parents and widen ancestors.
 *
 * @returns copies of the nodes sorted by depth then start offset, with
 *   `id` set to `node-<position>` and `parentId` to the parent's id
 *
 * @example
 * ```typescript
 * const tree = buildHierarchy([
 *   { title: "Chapter", depth: 0, startOffset: 0, endOffset: 50 },
 *   { title: "Section", depth: 1, startOffset: 40, endOffset: 80 },
 * ])
 * tree[1].parentId  // "node-0"
 * tree[0].endOffset // 80
 * ```
 */
export function buildHierarchy<T extends RangedNode>(nodes: readonly T[]): HierarchyNode<T>[] {
  const sorted = [...nodes].sort((a, b) => a.depth - b.depth || a.startOffset - b.startOffset)
  const placed: HierarchyNode<T>[] = []

  sorted.forEach((node, i) => {
    const parent = findDeepestContainer(placed, node) ?? findStartContainer(placed, node)
    placed.push({ ...node, id: `node-${i}`, parentId: parent ? parent.id : null })
  })

  const byId = new Map(placed.map((node) => [node.id, node]))
  for (let i = placed.length - 1; i >= 0; i--) {
    const child = placed[i]
    const parent = child.parentId === null ? undefined : byId.get(child.parentId)
    if (parent && child.endOffset > parent.endOffset) {
      parent.endOffset = child.endOffset
    }
  }

  return placed
}

/**
 * Every child must lie inside its parent.
 *
 * Nodes whose parent is not in `nodes` are skipped.
 *
 * @throws {ValidationError} naming the first child that escapes its parent
 */
export function validateContainment(nodes: readonly LinkedRange[]): void {
  const byId = new Map(nodes.map((node) => [node.id, node]))

  for (const node of nodes) {
    if (node.parentId === null) continue
    const parent = byId.get(node.parentId)
    if (!parent) continue

    if (node.startOffset < parent.startOffset || node.endOffset > parent.endOffset) {
      throw new ValidationError(
        `Child node "${node.title}" [${node.startOffset}, ${node.endOffset}) is not contained within parent "${parent.title}" [${parent.startOffset}, ${parent.endOffset})`
      )
    }
  }
}
