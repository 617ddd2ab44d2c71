/**
 * @fileoverview Converts anchor-based node proposals into exact offsets.
 *
 * For each proposal:
 * 1. The start anchor is located anywhere in the document.
 * 2. The end anchor is located at or after the resolved start. Its match end
 *    becomes the node's end offset.
 * 3. When the end anchor cannot be found, the node runs to the next major
 *    section heading after its start, or to the end of the document.
 * 4. When the start anchor cannot be found, the model's own offsets are
 *    used if they describe a valid range.
 *
 * Resolution is pure: the same proposals and text give the same offsets.
 *
 * @module lib/document-structure/anchor-resolver
 */

import { logger } from "@/lib/logger"
import { AnchorNotFoundError, InvalidRangeError, ValidationError } from "@/lib/errors"
import { STRUCTURE_LIMITS } from "./config"
import { DocumentIndex, locateAnchor, type AnchorStrategy } from "./anchor-strategies"
import type { NodeProposal, ResolvedNode } from "./types"

// ============================================================================
// Section boundaries
// ============================================================================

/**
 * Finds where the next major section starts after `from`, or `null`.
 *
 * Returned offsets must be greater than `from`.
 */
export type SectionBoundaryFinder = (text: string, from: number) => number | null

const MAJOR_SECTION_PATTERN =
  /^[ \t]*(?:chapter|part|book|section|introduction|preface|epilogue|appendix|acknowledge?ments|about the authors?)\b/gim

/**
 * Default boundary finder: the next line that opens with a heading word such
 * as "Chapter", "Part" or "Introduction".
 */
export const findNextMajorSection: SectionBoundaryFinder = (text, from) => {
  const regex = new RegExp(MAJOR_SECTION_PATTERN.source, MAJOR_SECTION_PATTERN.flags)
  regex.lastIndex = from + 1
  const match = regex.exec(text)
  return match ? match.index : null
}

export interface AnchorResolverOptions {
  findSectionBoundary?: SectionBoundaryFinder
}

// ============================================================================
// Resolution
// ============================================================================

const DEFAULT_CONFIDENCE = 0.5

/** Clamp to [0, 1]; missing or non-numeric values become 0.5. */
export function clampConfidence(confidence: number | null | undefined): number {
  if (confidence === null || confidence === undefined || Number.isNaN(confidence)) {
    return DEFAULT_CONFIDENCE
  }
  return Math.min(1, Math.max(0, confidence))
}

function preview(anchor: string): string {
  return anchor.length > 60 ? `${anchor.slice(0, 60)}...` : anchor
}

function modelOffsets(
  node: NodeProposal,
  textLength: number
): { startOffset: number; endOffset: number } | null {
  const { startOffset, endOffset } = node
  if (
    typeof startOffset !== "number" ||
    typeof endOffset !== "number" ||
    !Number.isInteger(startOffset) ||
    !Number.isInteger(endOffset)
  ) {
    return null
  }
  if (startOffset < 0 || endOffset <= startOffset || endOffset > textLength) {
    return null
  }
  return { startOffset, endOffset }
}

interface NodeResolution {
  startOffset: number
  endOffset: number
  strategy: AnchorStrategy | "section-boundary" | "document-end" | "model-offsets"
}

function locateRange(
  node: NodeProposal,
  index: DocumentIndex,
  findSectionBoundary: SectionBoundaryFinder
): NodeResolution {
  const start = locateAnchor(index, node.startAnchor, 0)
  if (!start) {
    throw new AnchorNotFoundError(
      `Start anchor not found for node "${node.title}": "${preview(node.startAnchor)}"`
    )
  }

  const end = locateAnchor(index, node.endAnchor, start.start)
  if (end) {
    return { startOffset: start.start, endOffset: end.end, strategy: start.strategy }
  }

  const boundary = findSectionBoundary(index.text, start.start)
  if (boundary !== null && boundary > start.start) {
    logger.info("End anchor not found, using next section boundary", {
      title: node.title,
      startOffset: start.start,
      endOffset: boundary,
    })
    return { startOffset: start.start, endOffset: boundary, strategy: "section-boundary" }
  }

  logger.info("End anchor not found, extending to document end", {
    title: node.title,
    startOffset: start.start,
  })
  return { startOffset: start.start, endOffset: index.text.length, strategy: "document-end" }
}

/**
 * Resolve one proposal against a pre-built index.
 *
 * @throws {AnchorNotFoundError} blank anchor, or start anchor missing with no
 *   usable model offsets
 * @throws {InvalidRangeError} resolved end at or before resolved start
 */
export function resolveNode(
  node: NodeProposal,
  index: DocumentIndex,
  options: AnchorResolverOptions = {}
): ResolvedNode & { strategy: NodeResolution["strategy"] } {
  if (node.startAnchor.trim().length === 0) {
    throw new AnchorNotFoundError(`Start anchor is blank for node "${node.title}"`)
  }
  if (node.endAnchor.trim().length === 0) {
    throw new AnchorNotFoundError(`End anchor is blank for node "${node.title}"`)
  }

  for (const [label, anchor] of [
    ["start", node.startAnchor],
    ["end", node.endAnchor],
  ] as const) {
    if (anchor.length < STRUCTURE_LIMITS.SHORT_ANCHOR_CHARS) {
      logger.warn("Anchor is short and may match the wrong place", {
        title: node.title,
        boundary: label,
        length: anchor.length,
      })
    }
  }

  let resolution: NodeResolution
  try {
    resolution = locateRange(node, index, options.findSectionBoundary ?? findNextMajorSection)
  } catch (error) {
    const fallback = error instanceof AnchorNotFoundError ? modelOffsets(node, index.text.length) : null
    if (!fallback) {
      throw error
    }
    logger.warn("Anchor not found, using model-proposed offsets", {
      title: node.title,
      ...fallback,
    })
    resolution = { ...fallback, strategy: "model-offsets" }
  }

  const { startOffset, endOffset, strategy } = resolution
  if (endOffset <= startOffset || startOffset < 0 || endOffset > index.text.length) {
    throw new InvalidRangeError(
      `Anchor positions out of bounds for node "${node.title}": start=${startOffset}, end=${endOffset}`
    )
  }

  return {
    ...node,
    startOffset,
    endOffset,
    confidence: clampConfidence(node.confidence),
    strategy,
  }
}

/**
 * Resolve every proposal against `documentText`.
 *
 * @example
 * ```typescript
 * const text = "This is the beginning of chapter one. Here is some content for chapter one."
 * const [node] = resolveOffsets([{ ...proposal, startAnchor: "This is the beginning", endAnchor: "content for chapter one" }], text)
 * node.startOffset // 0
 * node.endOffset   // text.length - 1
 * ```
 */
export function resolveOffsets(
  nodes: NodeProposal[],
  documentText: string,
  options: AnchorResolverOptions = {}
): ResolvedNode[] {
  const index = new DocumentIndex(documentText)
  const strategies: Record<string, number> = {}

  const resolved = nodes.map((node) => {
    const { strategy, ...rest } = resolveNode(node, index, options)
    strategies[strategy] = (strategies[strategy] ?? 0) + 1
    return rest
  })

  logger.info("Anchors resolved", {
    nodeCount: resolved.length,
    textLength: documentText.length,
    ...strategies,
  })

  return resolved
}

// ============================================================================
// Validation
// ============================================================================

interface SiblingCandidate {
  title: string
  startOffset: number
  endOffset: number
  parentId?: string | null
}

/**
 * Siblings under the same parent must not overlap.
 *
 * @throws {ValidationError} naming the first overlapping pair
 */
export function validateSiblingNonOverlap(nodes: SiblingCandidate[]): void {
  const groups = new Map<string, SiblingCandidate[]>()
  for (const node of nodes) {
    const key = node.parentId ?? "ROOT"
    const group = groups.get(key)
    if (group) {
      group.push(node)
    } else {
      groups.set(key, [node])
    }
  }

  for (const [parent, siblings] of groups) {
    const sorted = [...siblings].sort((a, b) => a.startOffset - b.startOffset)
    for (let i = 1; i < sorted.length; i++) {
      const previous = sorted[i - 1]
      const current = sorted[i]
      if (current.startOffset < previous.endOffset) {
        throw new ValidationError(
          `Overlapping siblings under ${parent}: "${previous.title}" [${previous.startOffset}, ${previous.endOffset}) and "${current.title}" [${current.startOffset}, ${current.endOffset})`
        )
      }
    }
  }
}
