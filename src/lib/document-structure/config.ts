/**
 * @fileoverview Limits and environment configuration for document structuring.
 *
 * Fixed limits live in `STRUCTURE_LIMITS`. Tunable budgets are read from the
 * environment by `loadChunkingConfig` and `loadLlmRetryConfig`, falling back
 * to the defaults below.
 *
 * @module lib/document-structure/config
 */

import { z } from "zod"
import { ValidationError } from "@/lib/errors"
import type { ChunkingConfig, LlmRetryConfig, StructureOptions } from "./types"
import { AGENT_MODELS } from "@/lib/ai/config"

/**
 * Fixed limits for the structuring pipeline.
 */
export const STRUCTURE_LIMITS = {
  /** Characters per model token used for all estimates */
  CHARS_PER_TOKEN: 4,

  /** Fraction of the usable token window actually filled by a chunk */
  CHUNK_SAFETY_MARGIN: 0.9,

  /** Documents above this length are always chunked */
  FORCE_CHUNKING_CHARS: 1_250_000,

  /** Token threshold used instead of the configured limit in aggressive mode */
  AGGRESSIVE_TOKEN_LIMIT: 30_000,

  /** Chunks above this length are re-split when emergency chunking is on */
  EMERGENCY_CHUNK_CHARS: 1_000_000,

  /** Previous nodes passed to the model as context for the next chunk */
  CONTEXT_NODE_LIMIT: 10,

  /** Anchors shorter than this are logged as unreliable */
  SHORT_ANCHOR_CHARS: 20,
} as const

export const DEFAULT_CHUNKING_CONFIG: ChunkingConfig = {
  maxSingleChunkTokens: 40_000,
  maxSingleChunkChars: 150_000,
  overlapTokens: 5_000,
  promptOverheadTokens: 2_000,
  aggressiveChunking: false,
  emergencyChunking: true,
}

export const DEFAULT_LLM_RETRY_CONFIG: LlmRetryConfig = {
  maxRetries: 3,
  baseDelayMs: 1_000,
  maxDelayMs: 30_000,
  jitterFactor: 0.25,
}

export const DEFAULT_STRUCTURE_OPTIONS: StructureOptions = {
  model: AGENT_MODELS.structurer,
  profile: "general",
  granularity: "auto",
}

// ============================================================================
// Environment parsing
// ============================================================================

const booleanFlag = z
  .enum(["true", "false", "1", "0"])
  .transform((value) => value === "true" || value === "1")

const chunkingEnvSchema = z.object({
  STRUCTURE_MAX_SINGLE_CHUNK_TOKENS: z.coerce.number().int().positive().optional(),
  STRUCTURE_MAX_SINGLE_CHUNK_CHARS: z.coerce.number().int().positive().optional(),
  STRUCTURE_OVERLAP_TOKENS: z.coerce.number().int().nonnegative().optional(),
  STRUCTURE_PROMPT_OVERHEAD_TOKENS: z.coerce.number().int().nonnegative().optional(),
  STRUCTURE_AGGRESSIVE_CHUNKING: booleanFlag.optional(),
  STRUCTURE_EMERGENCY_CHUNKING: booleanFlag.optional(),
})

const retryEnvSchema = z.object({
  STRUCTURE_LLM_MAX_RETRIES: z.coerce.number().int().positive().optional(),
  STRUCTURE_LLM_BASE_DELAY_MS: z.coerce.number().int().nonnegative().optional(),
  STRUCTURE_LLM_MAX_DELAY_MS: z.coerce.number().int().nonnegative().optional(),
  STRUCTURE_LLM_JITTER: z.coerce.number().min(0).max(1).optional(),
})

/** Treat empty strings as unset so `FOO=` in a .env file means "default". */
function withoutBlanks(env: NodeJS.ProcessEnv): Record<string, string> {
  const result: Record<string, string> = {}
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== "") {
      result[key] = value.trim()
    }
  }
  return result
}

/**
 * Read chunking limits from the environment.
 *
 * @throws ValidationError when a variable is present but malformed
 */
export function loadChunkingConfig(env: NodeJS.ProcessEnv = process.env): ChunkingConfig {
  const parsed = chunkingEnvSchema.safeParse(withoutBlanks(env))
  if (!parsed.success) {
    throw ValidationError.fromZodError(parsed.error)
  }
  const values = parsed.data

  const config: ChunkingConfig = {
    maxSingleChunkTokens:
      values.STRUCTURE_MAX_SINGLE_CHUNK_TOKENS ?? DEFAULT_CHUNKING_CONFIG.maxSingleChunkTokens,
    maxSingleChunkChars:
      values.STRUCTURE_MAX_SINGLE_CHUNK_CHARS ?? DEFAULT_CHUNKING_CONFIG.maxSingleChunkChars,
    overlapTokens: values.STRUCTURE_OVERLAP_TOKENS ?? DEFAULT_CHUNKING_CONFIG.overlapTokens,
    promptOverheadTokens:
      values.STRUCTURE_PROMPT_OVERHEAD_TOKENS ?? DEFAULT_CHUNKING_CONFIG.promptOverheadTokens,
    aggressiveChunking:
      values.STRUCTURE_AGGRESSIVE_CHUNKING ?? DEFAULT_CHUNKING_CONFIG.aggressiveChunking,
    emergencyChunking:
      values.STRUCTURE_EMERGENCY_CHUNKING ?? DEFAULT_CHUNKING_CONFIG.emergencyChunking,
  }

  if (config.overlapTokens >= config.maxSingleChunkTokens) {
    throw new ValidationError("Overlap must be smaller than the chunk token budget", [
      { field: "STRUCTURE_OVERLAP_TOKENS", message: "must be less than STRUCTURE_MAX_SINGLE_CHUNK_TOKENS" },
    ])
  }

  if (config.promptOverheadTokens >= config.maxSingleChunkTokens) {
    throw new ValidationError("Prompt overhead leaves no room for document text", [
      {
        field: "STRUCTURE_PROMPT_OVERHEAD_TOKENS",
        message: "must be less than STRUCTURE_MAX_SINGLE_CHUNK_TOKENS",
      },
    ])
  }

  return config
}

/**
 * Read model retry settings from the environment.
 *
 * @throws ValidationError when a variable is present but malformed
 */
export function loadLlmRetryConfig(env: NodeJS.ProcessEnv = process.env): LlmRetryConfig {
  const parsed = retryEnvSchema.safeParse(withoutBlanks(env))
  if (!parsed.success) {
    throw ValidationError.fromZodError(parsed.error)
  }
  const values = parsed.data

  return {
    maxRetries: values.STRUCTURE_LLM_MAX_RETRIES ?? DEFAULT_LLM_RETRY_CONFIG.maxRetries,
    baseDelayMs: values.STRUCTURE_LLM_BASE_DELAY_MS ?? DEFAULT_LLM_RETRY_CONFIG.baseDelayMs,
    maxDelayMs: values.STRUCTURE_LLM_MAX_DELAY_MS ?? DEFAULT_LLM_RETRY_CONFIG.maxDelayMs,
    jitterFactor: values.STRUCTURE_LLM_JITTER ?? DEFAULT_LLM_RETRY_CONFIG.jitterFactor,
  }
}
