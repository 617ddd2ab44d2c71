/**
 * @fileoverview Token estimation for chunk sizing.
 *
 * Chunk sizing uses a fixed characters-per-token ratio
 * (`STRUCTURE_LIMITS.CHARS_PER_TOKEN`) so that token and character budgets
 * convert in both directions without loading a tokenizer. A 4:1 ratio
 * slightly overestimates for English prose, which is the safe direction for
 * staying inside a context window.
 *
 * `countTokens` gives an exact BPE count via `gpt-tokenizer` for the places
 * that report real prompt sizes (see `agents/structure-generator`).
 *
 * @module lib/document-structure/token-counter
 */

import { encode } from "gpt-tokenizer"
import { STRUCTURE_LIMITS } from "./config"
import type { TokenCounter } from "./types"

const { CHARS_PER_TOKEN, CHUNK_SAFETY_MARGIN } = STRUCTURE_LIMITS

/**
 * Estimate model tokens from character count.
 *
 * @returns 0 for empty or missing text
 *
 * @example
 * ```typescript
 * estimateTokens("x".repeat(100_000)) // 25_000
 * estimateTokens("abcde")             // 2
 * ```
 */
export function estimateTokens(text: string | null | undefined): number {
  if (!text) {
    return 0
  }
  return Math.ceil(text.length / CHARS_PER_TOKEN)
}

/** Whether the estimated token count of `text` is above `tokenLimit`. */
export function exceedsLimit(text: string | null | undefined, tokenLimit: number): boolean {
  return estimateTokens(text) > tokenLimit
}

/** Characters that fit in `tokenCount` tokens. */
export function maxCharsForTokens(tokenCount: number): number {
  return Math.max(0, Math.floor(tokenCount)) * CHARS_PER_TOKEN
}

/**
 * Characters of document text that can be sent in one call once the prompt
 * overhead is reserved, with a safety margin applied.
 *
 * @example
 * ```typescript
 * // (10_000 - 2_000) * 0.9 = 7_200 tokens → 28_800 chars
 * safeChunkSizeChars(10_000, 2_000) // 28_800
 * ```
 */
export function safeChunkSizeChars(modelMaxTokens: number, promptOverheadTokens: number): number {
  const usableTokens = modelMaxTokens - promptOverheadTokens
  if (usableTokens <= 0) {
    return 0
  }
  return maxCharsForTokens(Math.floor(usableTokens * CHUNK_SAFETY_MARGIN))
}

/**
 * Exact token count using the GPT BPE tokenizer.
 *
 * Slower than `estimateTokens`; use for reporting, not for chunk sizing.
 */
export function countTokens(text: string): number {
  return encode(text).length
}

/** Default ratio-based counter, injectable into the chunker and orchestrators. */
export const tokenCounter: TokenCounter = {
  estimateTokens,
  exceedsLimit,
  maxCharsForTokens,
  safeChunkSizeChars,
}
