/**
 * @fileoverview Splits document text into overlapping windows for model calls.
 *
 * Each chunk is sized to stay under both the character budget and the token
 * budget left once the prompt overhead is reserved, converted to characters
 * by the token counter. Chunk ends prefer natural boundaries,
 * tried in this order and only past 70% of the window:
 *
 * 1. A chapter heading ("Chapter 12")
 * 2. An ALL-CAPS heading line
 * 3. A paragraph break (blank line)
 * 4. A sentence end
 * 5. A word boundary within the last 1000 characters
 *
 * Consecutive chunks share `overlapTokens` worth of characters, and every
 * chunk advances by at least 10% of the window, so coverage of
 * `[0, text.length)` is gapless and the loop always terminates.
 *
 * @module lib/document-structure/document-chunker
 */

import { logger } from "@/lib/logger"
import { DEFAULT_CHUNKING_CONFIG, STRUCTURE_LIMITS } from "./config"
import { tokenCounter as defaultTokenCounter } from "./token-counter"
import type { Chunk, ChunkingConfig, TokenCounter } from "./types"

// ============================================================================
// Constants
// ============================================================================

/** A break is only accepted in the last 30% of the window */
const MIN_BREAK_RATIO = 0.7

/** Each chunk must advance the cursor by at least this share of the window */
const MIN_ADVANCE_RATIO = 0.1

/** How far back from the window end to look for whitespace */
const WORD_BOUNDARY_LOOKBACK = 1000

interface BreakPattern {
  label: string
  pattern: RegExp
  /** Where, relative to the match, the chunk should end */
  breakAt: (match: RegExpExecArray) => number
}

const BREAK_PATTERNS: BreakPattern[] = [
  {
    label: "chapter",
    pattern: /\n[ \t]*chapter\s+\d+/gi,
    breakAt: (match) => match.index + 1,
  },
  {
    label: "section",
    pattern: /\n[ \t]*[A-Z][A-Z \t]+\n/g,
    breakAt: (match) => match.index + 1,
  },
  {
    label: "paragraph",
    pattern: /\n\s*\n/g,
    breakAt: (match) => match.index + match[0].length,
  },
  {
    label: "sentence",
    pattern: /[.!?]["')\]]?\s+/g,
    breakAt: (match) => match.index + match[0].length,
  },
]

// ============================================================================
// Budgets
// ============================================================================

/** Token limit in effect, lowered in aggressive mode. */
export function effectiveTokenLimit(config: ChunkingConfig): number {
  return config.aggressiveChunking
    ? Math.min(config.maxSingleChunkTokens, STRUCTURE_LIMITS.AGGRESSIVE_TOKEN_LIMIT)
    : config.maxSingleChunkTokens
}

/**
 * Largest chunk, in characters, allowed by both budgets. The token budget is
 * what remains after `promptOverheadTokens`, with the counter's safety margin.
 */
export function effectiveChunkChars(
  config: ChunkingConfig,
  counter: TokenCounter = defaultTokenCounter
): number {
  const tokenChars = counter.safeChunkSizeChars(
    effectiveTokenLimit(config),
    config.promptOverheadTokens
  )
  return Math.max(1, Math.min(config.maxSingleChunkChars, tokenChars))
}

// ============================================================================
// Chunking
// ============================================================================

/**
 * Split `text` into overlapping chunks.
 *
 * @param documentId - used for logging only
 * @param counter - token estimates for both the fit check and chunk sizes
 * @returns an empty array for empty text, a single whole-document chunk when
 *   the text fits both budgets, otherwise chunks indexed from 0
 *
 * @example
 * ```typescript
 * const chunks = chunkDocument(text, documentId, { maxSingleChunkChars: 100_000 })
 * chunks[1].startOffset < chunks[0].endOffset // true: chunks overlap
 * ```
 */
export function chunkDocument(
  text: string,
  documentId: string,
  options: Partial<ChunkingConfig> = {},
  counter: TokenCounter = defaultTokenCounter
): Chunk[] {
  const config: ChunkingConfig = { ...DEFAULT_CHUNKING_CONFIG, ...options }

  if (text.length === 0) {
    return []
  }

  if (
    text.length <= config.maxSingleChunkChars &&
    !counter.exceedsLimit(text, effectiveTokenLimit(config))
  ) {
    return [{ text, startOffset: 0, endOffset: text.length, chunkIndex: 0 }]
  }

  const maxChars = effectiveChunkChars(config, counter)
  const overlapChars = Math.min(counter.maxCharsForTokens(config.overlapTokens), maxChars - 1)
  const minAdvance = Math.max(1, Math.floor(maxChars * MIN_ADVANCE_RATIO))

  let chunks: Chunk[] = []
  let start = 0

  while (start < text.length) {
    let end = Math.min(start + maxChars, text.length)
    if (end < text.length) {
      end = findBreakPoint(text, start, end)
    }

    chunks.push({
      text: text.slice(start, end),
      startOffset: start,
      endOffset: end,
      chunkIndex: chunks.length,
    })

    if (end >= text.length) {
      break
    }

    start = Math.min(end, Math.max(start + minAdvance, end - overlapChars))
  }

  if (config.emergencyChunking) {
    chunks = chunks
      .flatMap((chunk) =>
        splitOversizedChunk(chunk, STRUCTURE_LIMITS.EMERGENCY_CHUNK_CHARS, overlapChars)
      )
      .map((chunk, chunkIndex) => ({ ...chunk, chunkIndex }))
  }

  logger.info("Document chunked", {
    documentId,
    chunkCount: chunks.length,
    maxChunkChars: maxChars,
    overlapChars,
    textLength: text.length,
  })

  return chunks
}

/**
 * Find the best place to end a chunk inside `[start, end)`.
 *
 * @returns an absolute offset in `(start, end]`
 */
export function findBreakPoint(text: string, start: number, end: number): number {
  const window = text.slice(start, end)
  const minBreak = Math.floor(window.length * MIN_BREAK_RATIO)

  for (const { pattern, breakAt } of BREAK_PATTERNS) {
    const position = lastBreakAtOrAfter(window, pattern, breakAt, minBreak)
    if (position !== null) {
      return start + position
    }
  }

  const lookbackFloor = Math.max(minBreak, window.length - WORD_BOUNDARY_LOOKBACK)
  for (let i = window.length - 1; i >= lookbackFloor; i--) {
    if (/\s/.test(window[i])) {
      return start + i + 1
    }
  }

  return end
}

function lastBreakAtOrAfter(
  window: string,
  pattern: RegExp,
  breakAt: (match: RegExpExecArray) => number,
  minBreak: number
): number | null {
  const regex = new RegExp(pattern.source, pattern.flags)
  let best: number | null = null
  let match: RegExpExecArray | null

  while ((match = regex.exec(window)) !== null) {
    const position = breakAt(match)
    if (position >= minBreak && position > 0 && position <= window.length) {
      best = position
    }
    if (match[0].length === 0) {
      regex.lastIndex++
    }
  }

  return best
}

// ============================================================================
// Emergency splitting
// ============================================================================

/**
 * Halve a chunk recursively until every piece is at most `ceilingChars`.
 *
 * Halves overlap by `overlapChars`, capped at a quarter of the piece so each
 * half is strictly smaller than its parent. Returned chunks keep the
 * parent's `chunkIndex`; callers re-index.
 */
export function splitOversizedChunk(
  chunk: Chunk,
  ceilingChars: number,
  overlapChars: number
): Chunk[] {
  const length = chunk.endOffset - chunk.startOffset
  if (length <= ceilingChars || length < 2) {
    return [chunk]
  }

  logger.warn("Emergency split of oversized chunk", {
    chunkIndex: chunk.chunkIndex,
    length,
    ceilingChars,
  })

  const half = Math.floor(length / 2)
  const overlap = Math.min(overlapChars, Math.floor(length / 4))
  const firstEnd = half
  const secondStart = half - overlap

  const first: Chunk = {
    text: chunk.text.slice(0, firstEnd),
    startOffset: chunk.startOffset,
    endOffset: chunk.startOffset + firstEnd,
    chunkIndex: chunk.chunkIndex,
  }
  const second: Chunk = {
    text: chunk.text.slice(secondStart),
    startOffset: chunk.startOffset + secondStart,
    endOffset: chunk.endOffset,
    chunkIndex: chunk.chunkIndex,
  }

  return [
    ...splitOversizedChunk(first, ceilingChars, overlapChars),
    ...splitOversizedChunk(second, ceilingChars, overlapChars),
  ]
}
