/**
 * @fileoverview Structure generation for documents too large for one call.
 *
 * Chunks are sent to the model one at a time, in order. Each call sees the
 * outline produced so far so the model can continue numbering and avoid
 * repeating sections that straddle a chunk boundary. Each chunk's proposals
 * are resolved against that chunk's text first, so copies of one section
 * from overlapping chunks carry ranges that `mergeChunkResults` can fuse.
 *
 * A chunk the model finds nothing in (for example a run of blank pages)
 * gets a placeholder node named after the chunk instead of failing the
 * whole document.
 *
 * @module lib/document-structure/chunked-structure
 */

import { logger } from "@/lib/logger"
import {
  AnchorNotFoundError,
  ChunkProcessingError,
  InvalidRangeError,
  errorChainIncludes,
} from "@/lib/errors"
import { resolveNode, type AnchorResolverOptions } from "./anchor-resolver"
import { DocumentIndex } from "./anchor-strategies"
import { DEFAULT_CHUNKING_CONFIG, STRUCTURE_LIMITS } from "./config"
import { filterContentNodes } from "./content-filter"
import { chunkDocument, effectiveChunkChars, effectiveTokenLimit } from "./document-chunker"
import { mergeChunkResults } from "./node-merger"
import { tokenCounter as defaultTokenCounter } from "./token-counter"
import type {
  Chunk,
  ChunkingConfig,
  NodeProposal,
  StructureGenerator,
  StructureOptions,
  TokenCounter,
} from "./types"

/** Message fragment the generator uses for an empty outline */
export const NO_NODES_GENERATED = "No nodes generated"

/** Anchor length for placeholder nodes */
const PLACEHOLDER_ANCHOR_CHARS = 100

export interface ChunkedStructureDeps {
  generator: StructureGenerator
  chunking?: Partial<ChunkingConfig>
  tokenCounter?: TokenCounter
  resolver?: AnchorResolverOptions
}

export interface ChunkedStructureOrchestrator {
  needsChunking(text: string | null | undefined): boolean
  estimateChunkCount(text: string | null | undefined): number
  processLargeDocument(
    text: string,
    options: StructureOptions,
    documentId: string
  ): Promise<NodeProposal[]>
}

/**
 * Placeholder for a chunk the model returned nothing for. Offsets are
 * chunk-relative and span the whole chunk.
 */
export function placeholderNode(chunk: Chunk): NodeProposal {
  const trimmed = chunk.text.trim()
  return {
    type: "SECTION",
    title: `Chunk ${chunk.chunkIndex + 1}`,
    startAnchor: trimmed.slice(0, PLACEHOLDER_ANCHOR_CHARS),
    endAnchor: trimmed.slice(-PLACEHOLDER_ANCHOR_CHARS),
    depth: 0,
    confidence: 0,
    startOffset: 0,
    endOffset: chunk.text.length,
    metadata: { placeholder: true },
  }
}

/**
 * Give each proposal offsets relative to `chunk`. Proposals whose anchors
 * cannot be placed inside the chunk keep whatever offsets they had.
 */
export function resolveWithinChunk(
  nodes: NodeProposal[],
  chunk: Chunk,
  options: AnchorResolverOptions = {}
): NodeProposal[] {
  const index = new DocumentIndex(chunk.text)

  return nodes.map((node) => {
    try {
      const { startOffset, endOffset } = resolveNode(node, index, options)
      return { ...node, startOffset, endOffset }
    } catch (error) {
      if (!(error instanceof AnchorNotFoundError || error instanceof InvalidRangeError)) {
        throw error
      }
      logger.debug("Proposal not placed within its chunk", {
        title: node.title,
        chunkIndex: chunk.chunkIndex,
        reason: error.message,
      })
      return node
    }
  })
}

export function createChunkedStructureOrchestrator(
  deps: ChunkedStructureDeps
): ChunkedStructureOrchestrator {
  const config: ChunkingConfig = { ...DEFAULT_CHUNKING_CONFIG, ...deps.chunking }
  const counter = deps.tokenCounter ?? defaultTokenCounter
  const { generator } = deps

  function needsChunking(text: string | null | undefined): boolean {
    if (!text) {
      return false
    }
    if (text.length > STRUCTURE_LIMITS.FORCE_CHUNKING_CHARS) {
      return true
    }
    return (
      counter.exceedsLimit(text, effectiveTokenLimit(config)) ||
      text.length > config.maxSingleChunkChars
    )
  }

  function estimateChunkCount(text: string | null | undefined): number {
    if (!text || !needsChunking(text)) {
      return 1
    }
    return Math.ceil(text.length / effectiveChunkChars(config, counter))
  }

  async function processChunk(
    chunk: Chunk,
    options: StructureOptions,
    previousNodes: NodeProposal[],
    totalChunks: number,
    documentId: string
  ): Promise<NodeProposal[]> {
    try {
      return await generator.generateStructureWithContext(
        chunk.text,
        options,
        previousNodes,
        chunk.chunkIndex,
        totalChunks
      )
    } catch (error) {
      if (errorChainIncludes(error, NO_NODES_GENERATED)) {
        logger.warn("Chunk produced no nodes, using placeholder", {
          documentId,
          chunkIndex: chunk.chunkIndex,
        })
        return [placeholderNode(chunk)]
      }

      logger.error("Chunk processing failed", {
        documentId,
        chunkIndex: chunk.chunkIndex,
        error: error instanceof Error ? error.message : String(error),
      })
      throw new ChunkProcessingError(
        `Failed to process chunk ${chunk.chunkIndex + 1} of ${totalChunks}`,
        chunk.chunkIndex,
        { cause: error }
      )
    }
  }

  async function processLargeDocument(
    text: string,
    options: StructureOptions,
    documentId: string
  ): Promise<NodeProposal[]> {
    const chunks = chunkDocument(text, documentId, config, counter)

    if (chunks.length <= 1) {
      logger.info("Document fits in a single chunk", { documentId, textLength: text.length })
      return filterContentNodes(await generator.generateStructure(text, options))
    }

    const chunkResults: NodeProposal[][] = []
    const previousNodes: NodeProposal[] = []

    for (const chunk of chunks) {
      logger.info("Processing chunk", {
        documentId,
        chunk: chunk.chunkIndex + 1,
        totalChunks: chunks.length,
        chars: chunk.text.length,
        contextNodes: Math.min(previousNodes.length, STRUCTURE_LIMITS.CONTEXT_NODE_LIMIT),
      })

      const nodes = await processChunk(chunk, options, [...previousNodes], chunks.length, documentId)
      chunkResults.push(resolveWithinChunk(nodes, chunk, deps.resolver))
      previousNodes.push(...filterContentNodes(nodes))
    }

    const merged = filterContentNodes(mergeChunkResults(chunkResults, chunks))

    logger.info("Large document processed", {
      documentId,
      chunkCount: chunks.length,
      nodeCount: merged.length,
    })

    return merged
  }

  return { needsChunking, estimateChunkCount, processLargeDocument }
}
