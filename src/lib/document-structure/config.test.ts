import { describe, it, expect } from "vitest"
import {
  DEFAULT_CHUNKING_CONFIG,
  DEFAULT_LLM_RETRY_CONFIG,
  DEFAULT_STRUCTURE_OPTIONS,
  loadChunkingConfig,
  loadLlmRetryConfig,
} from "./config"
import { ValidationError } from "@/lib/errors"

describe("loadChunkingConfig", () => {
  it("returns defaults for an empty environment", () => {
    expect(loadChunkingConfig({})).toEqual(DEFAULT_CHUNKING_CONFIG)
  })

  it("reads numeric and boolean overrides", () => {
    const config = loadChunkingConfig({
      STRUCTURE_MAX_SINGLE_CHUNK_TOKENS: "20000",
      STRUCTURE_MAX_SINGLE_CHUNK_CHARS: "80000",
      STRUCTURE_OVERLAP_TOKENS: "1000",
      STRUCTURE_PROMPT_OVERHEAD_TOKENS: "1500",
      STRUCTURE_AGGRESSIVE_CHUNKING: "true",
      STRUCTURE_EMERGENCY_CHUNKING: "0",
    })

    expect(config).toEqual({
      maxSingleChunkTokens: 20000,
      maxSingleChunkChars: 80000,
      overlapTokens: 1000,
      promptOverheadTokens: 1500,
      aggressiveChunking: true,
      emergencyChunking: false,
    })
  })

  it("treats blank values as unset", () => {
    const config = loadChunkingConfig({ STRUCTURE_OVERLAP_TOKENS: "  " })
    expect(config.overlapTokens).toBe(5000)
  })

  it("rejects malformed numbers", () => {
    expect(() => loadChunkingConfig({ STRUCTURE_MAX_SINGLE_CHUNK_TOKENS: "lots" })).toThrow(
      ValidationError
    )
  })

  it("rejects malformed flags", () => {
    expect(() => loadChunkingConfig({ STRUCTURE_AGGRESSIVE_CHUNKING: "yes" })).toThrow(
      ValidationError
    )
  })

  it("rejects an overlap that swallows the whole chunk", () => {
    expect(() =>
      loadChunkingConfig({
        STRUCTURE_MAX_SINGLE_CHUNK_TOKENS: "1000",
        STRUCTURE_OVERLAP_TOKENS: "1000",
      })
    ).toThrow("Overlap must be smaller than the chunk token budget")
  })

  it("rejects a prompt overhead that leaves no room for text", () => {
    expect(() =>
      loadChunkingConfig({
        STRUCTURE_MAX_SINGLE_CHUNK_TOKENS: "3000",
        STRUCTURE_OVERLAP_TOKENS: "500",
        STRUCTURE_PROMPT_OVERHEAD_TOKENS: "3000",
      })
    ).toThrow("Prompt overhead leaves no room for document text")
  })
})

describe("loadLlmRetryConfig", () => {
  it("returns defaults for an empty environment", () => {
    expect(loadLlmRetryConfig({})).toEqual(DEFAULT_LLM_RETRY_CONFIG)
  })

  it("reads overrides", () => {
    expect(
      loadLlmRetryConfig({
        STRUCTURE_LLM_MAX_RETRIES: "5",
        STRUCTURE_LLM_BASE_DELAY_MS: "10",
        STRUCTURE_LLM_MAX_DELAY_MS: "100",
        STRUCTURE_LLM_JITTER: "0",
      })
    ).toEqual({ maxRetries: 5, baseDelayMs: 10, maxDelayMs: 100, jitterFactor: 0 })
  })

  it("rejects jitter outside [0, 1]", () => {
    expect(() => loadLlmRetryConfig({ STRUCTURE_LLM_JITTER: "1.5" })).toThrow(ValidationError)
  })
})

describe("DEFAULT_STRUCTURE_OPTIONS", () => {
  it("uses the structurer model with general profile", () => {
    expect(DEFAULT_STRUCTURE_OPTIONS).toEqual({
      model: "anthropic/claude-haiku-4.5",
      profile: "general",
      granularity: "auto",
    })
  })
})
