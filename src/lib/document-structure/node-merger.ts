/**
 * @fileoverview Merges per-chunk outlines into one document-wide outline.
 *
 * Chunk results carry offsets relative to their chunk. Merging shifts them
 * into document coordinates and fuses duplicates produced by chunk overlap:
 * two proposals with the same title, from different chunks, whose ranges
 * overlap or touch become one node spanning both. The fused node takes its
 * start anchor from the copy that starts first and its end anchor from the
 * copy that ends last, so re-resolving its anchors gives the same span.
 *
 * A proposal whose anchors could not be placed inside its chunk has no range.
 * It is dropped when a node with the same title and depth came from another
 * chunk, since that is the same section seen again across a boundary.
 *
 * @module lib/document-structure/node-merger
 */

import { logger } from "@/lib/logger"
import type { Chunk, NodeProposal } from "./types"

interface ChunkProposal {
  node: NodeProposal
  chunkIndex: number
}

/** A proposal shifted into document coordinates, tagged with its chunk. */
interface GlobalProposal extends ChunkProposal {
  startOffset: number
  endOffset: number
}

function repeatsAcrossChunks(a: ChunkProposal, b: ChunkProposal): boolean {
  return a.node.title === b.node.title && a.node.depth === b.node.depth && a.chunkIndex !== b.chunkIndex
}

function shift(offset: number | null | undefined, by: number): number | null {
  return typeof offset === "number" ? offset + by : null
}

function rangesMeet(a: GlobalProposal, b: GlobalProposal): boolean {
  return a.startOffset <= b.endOffset && b.startOffset <= a.endOffset
}

/**
 * Shift chunk-relative offsets to document coordinates and fuse duplicates.
 *
 * Proposals without both offsets are passed through (shifted where one
 * offset is present) unless another chunk already produced the same title at
 * the same depth.
 *
 * @param chunkResults - `chunkResults[i]` holds the proposals for `chunks[i]`
 * @returns proposals sorted by start offset, then depth
 */
export function mergeChunkResults(chunkResults: NodeProposal[][], chunks: Chunk[]): NodeProposal[] {
  const ranged: GlobalProposal[] = []
  const unranged: ChunkProposal[] = []

  chunkResults.forEach((nodes, i) => {
    const chunk = chunks[i]
    const base = chunk ? chunk.startOffset : 0
    const chunkIndex = chunk ? chunk.chunkIndex : i

    for (const node of nodes) {
      const startOffset = shift(node.startOffset, base)
      const endOffset = shift(node.endOffset, base)
      const shifted: NodeProposal = { ...node, startOffset, endOffset }

      if (startOffset === null || endOffset === null) {
        unranged.push({ node: shifted, chunkIndex })
      } else {
        ranged.push({ node: shifted, chunkIndex, startOffset, endOffset })
      }
    }
  })

  const merged: GlobalProposal[] = []
  let fused = 0

  for (const candidate of ranged) {
    const duplicate = merged.find(
      (existing) =>
        existing.node.title === candidate.node.title &&
        existing.chunkIndex !== candidate.chunkIndex &&
        rangesMeet(existing, candidate)
    )

    if (!duplicate) {
      merged.push(candidate)
      continue
    }

    const startOffset = Math.min(duplicate.startOffset, candidate.startOffset)
    const endOffset = Math.max(duplicate.endOffset, candidate.endOffset)
    const keep =
      (candidate.node.confidence ?? 0) > (duplicate.node.confidence ?? 0) ? candidate : duplicate
    const first = candidate.startOffset < duplicate.startOffset ? candidate : duplicate
    const last = candidate.endOffset > duplicate.endOffset ? candidate : duplicate

    duplicate.node = {
      ...keep.node,
      startAnchor: first.node.startAnchor,
      endAnchor: last.node.endAnchor,
      startOffset,
      endOffset,
    }
    duplicate.startOffset = startOffset
    duplicate.endOffset = endOffset
    fused++
  }

  const kept: ChunkProposal[] = []
  for (const candidate of unranged) {
    if ([...merged, ...kept].some((existing) => repeatsAcrossChunks(existing, candidate))) {
      fused++
      continue
    }
    kept.push(candidate)
  }

  if (fused > 0) {
    logger.debug("Fused duplicate nodes from chunk overlap", { fused })
  }

  const sorted = merged
    .map((entry) => entry.node)
    .sort((a, b) => (a.startOffset ?? 0) - (b.startOffset ?? 0) || a.depth - b.depth)

  return [...sorted, ...kept.map((entry) => entry.node)]
}
