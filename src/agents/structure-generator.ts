/**
 * @fileoverview Structure Agent
 *
 * Asks the model for a document outline described by verbatim anchors.
 * Implements `StructureGenerator` for the structuring pipeline.
 *
 * Every call:
 * - builds the prompt (single or chunked template)
 * - requests structured output validated by `structureOutputSchema`
 * - retries failures with exponential backoff and jitter
 * - clamps depth to >= 0 and confidence to [0, 1]
 *
 * An empty outline raises `LlmFailedError("No nodes generated")` without
 * retrying; the chunked orchestrator turns that into a placeholder node.
 *
 * @module agents/structure-generator
 */

import { generateText, Output } from 'ai'
import { resolveModel, GENERATION_CONFIG } from '@/lib/ai/config'
import { LlmFailedError } from '@/lib/errors'
import { logger } from '@/lib/logger'
import { withRetry } from '@/lib/retry'
import { clampConfidence } from '@/lib/document-structure/anchor-resolver'
import { NO_NODES_GENERATED } from '@/lib/document-structure/chunked-structure'
import { DEFAULT_LLM_RETRY_CONFIG } from '@/lib/document-structure/config'
import { countTokens } from '@/lib/document-structure/token-counter'
import type {
  LlmRetryConfig,
  NodeProposal,
  StructureGenerator,
  StructureOptions,
} from '@/lib/document-structure/types'
import { buildStructurePrompt, STRUCTURE_SYSTEM_PROMPT } from './prompts/structure'
import { structureOutputSchema, type StructureNodeOutput } from './types'

// ============================================================================
// Types
// ============================================================================

export interface StructureGeneratorConfig {
  retry?: Partial<LlmRetryConfig>
  /** Overridable for tests */
  sleep?: (ms: number) => Promise<void>
}

// ============================================================================
// Helpers
// ============================================================================

/** Normalize one model node into a proposal. */
export function toProposal(node: StructureNodeOutput): NodeProposal {
  return {
    type: node.type,
    title: node.title.trim(),
    startAnchor: node.startAnchor,
    endAnchor: node.endAnchor,
    depth: Math.max(0, node.depth),
    confidence: clampConfidence(node.confidence),
    startOffset: node.startOffset ?? null,
    endOffset: node.endOffset ?? null,
    metadata: node.metadata ?? null,
  }
}

function isEmptyOutline(error: unknown): boolean {
  return error instanceof LlmFailedError && error.message === NO_NODES_GENERATED
}

// ============================================================================
// Generator
// ============================================================================

/**
 * Create the AI SDK backed generator.
 *
 * @example
 * ```typescript
 * const generator = createStructureGenerator({ retry: loadLlmRetryConfig() })
 * const nodes = await generator.generateStructure(text, DEFAULT_STRUCTURE_OPTIONS)
 * ```
 */
export function createStructureGenerator(config: StructureGeneratorConfig = {}): StructureGenerator {
  const retry: LlmRetryConfig = { ...DEFAULT_LLM_RETRY_CONFIG, ...config.retry }

  async function callModel(prompt: string, options: StructureOptions): Promise<NodeProposal[]> {
    const { output, usage } = await generateText({
      model: resolveModel(options.model),
      system: STRUCTURE_SYSTEM_PROMPT,
      prompt,
      output: Output.object({ schema: structureOutputSchema }),
      temperature: GENERATION_CONFIG.temperature,
      maxOutputTokens: GENERATION_CONFIG.maxOutputTokens,
    })

    logger.info('Structure generated', {
      model: options.model,
      nodeCount: output.nodes.length,
      inputTokens: usage?.inputTokens ?? 0,
      outputTokens: usage?.outputTokens ?? 0,
    })

    if (output.nodes.length === 0) {
      throw new LlmFailedError(NO_NODES_GENERATED)
    }

    return output.nodes.map(toProposal)
  }

  async function generate(prompt: string, options: StructureOptions): Promise<NodeProposal[]> {
    logger.debug('Structure prompt built', {
      model: options.model,
      promptChars: prompt.length,
      promptTokens: countTokens(prompt),
    })

    try {
      return await withRetry(() => callModel(prompt, options), {
        maxAttempts: retry.maxRetries,
        baseDelayMs: retry.baseDelayMs,
        maxDelayMs: retry.maxDelayMs,
        jitterFactor: retry.jitterFactor,
        sleep: config.sleep,
        shouldRetry: (error) => !isEmptyOutline(error),
        onRetry: (error, attempt, delayMs) => {
          logger.warn('Structure generation failed, retrying', {
            attempt,
            delayMs,
            error: error instanceof Error ? error.message : String(error),
          })
        },
      })
    } catch (error) {
      if (isEmptyOutline(error)) {
        throw error
      }
      throw new LlmFailedError(
        `Failed to generate structure after ${retry.maxRetries} attempts`,
        { cause: error }
      )
    }
  }

  return {
    generateStructure(text, options) {
      return generate(buildStructurePrompt(text, options), options)
    },

    generateStructureWithContext(text, options, previousNodes, chunkIndex, totalChunks) {
      return generate(
        buildStructurePrompt(text, options, previousNodes, chunkIndex, totalChunks),
        options
      )
    },
  }
}
