/**
 * @fileoverview End-to-end structuring of one document.
 *
 * ```
 * load document → clear old nodes → propose (direct or chunked)
 *   → resolve anchors → persist layer by layer → validate → STRUCTURED
 * ```
 *
 * Layers are written shallowest first so every parent already has an id
 * when its children are stored. A node's parent is the deepest stored node
 * that contains its whole range. Each layer is one batch; a failing layer
 * leaves the layers before it in place. Containment and sibling overlap are
 * checked once everything is stored, and only logged.
 *
 * @module lib/document-structure/structure-builder
 */

import { logger } from "@/lib/logger"
import {
  AnchorNotFoundError,
  InvalidRangeError,
  InvalidStateError,
  LlmFailedError,
  NotFoundError,
  PersistenceError,
  UnexpectedStructureError,
  ValidationError,
  isAppError,
} from "@/lib/errors"
import {
  resolveOffsets,
  validateSiblingNonOverlap,
  type AnchorResolverOptions,
} from "./anchor-resolver"
import { createChunkedStructureOrchestrator } from "./chunked-structure"
import { DEFAULT_STRUCTURE_OPTIONS } from "./config"
import { findDeepestContainer, validateContainment } from "./hierarchy-builder"
import {
  NODE_TYPES,
  type ChunkingConfig,
  type DocumentRepository,
  type NewDocumentNode,
  type NodeProposal,
  type NodeRepository,
  type PersistedNode,
  type ResolvedNode,
  type StructureBuildSummary,
  type StructureGenerator,
  type StructureOptions,
  type TokenCounter,
} from "./types"

// ============================================================================
// Types
// ============================================================================

export interface StructureBuilderDeps {
  documents: DocumentRepository
  nodes: NodeRepository
  generator: StructureGenerator
  chunking?: Partial<ChunkingConfig>
  tokenCounter?: TokenCounter
  resolver?: AnchorResolverOptions
}

export interface StructureBuilder {
  buildStructure(documentId: string, options?: Partial<StructureOptions>): Promise<StructureBuildSummary>
}

// ============================================================================
// Helpers
// ============================================================================

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

const NODE_TYPE_SET: ReadonlySet<string> = new Set(NODE_TYPES)

/**
 * @throws {InvalidRangeError} for a blank title or end anchor, an unknown
 * type, or a negative or fractional depth
 */
export function validateProposal(node: NodeProposal, position: number): void {
  const problems: string[] = []
  if (!node.title || node.title.trim() === "") problems.push("title is blank")
  if (!NODE_TYPE_SET.has(node.type)) problems.push(`unknown type "${node.type}"`)
  if (!node.endAnchor || node.endAnchor.trim() === "") problems.push("end anchor is blank")
  if (!Number.isInteger(node.depth) || node.depth < 0) problems.push(`invalid depth ${node.depth}`)

  if (problems.length > 0) {
    throw new InvalidRangeError(
      `Invalid node proposal at position ${position}: ${problems.join(", ")}`,
      problems.map((message) => ({ field: `nodes.${position}`, message }))
    )
  }
}

/** Group nodes by depth, shallowest first, each layer in document order. */
export function groupByDepth<T extends ResolvedNode>(nodes: readonly T[]): T[][] {
  const layers = new Map<number, T[]>()
  for (const node of nodes) {
    const layer = layers.get(node.depth)
    if (layer) {
      layer.push(node)
    } else {
      layers.set(node.depth, [node])
    }
  }

  return [...layers.entries()]
    .sort(([a], [b]) => a - b)
    .map(([, layer]) => [...layer].sort((a, b) => a.startOffset - b.startOffset || a.endOffset - b.endOffset))
}

// ============================================================================
// Builder
// ============================================================================

/**
 * @example
 * ```typescript
 * const builder = createStructureBuilder({
 *   documents: documentRepository,
 *   nodes: nodeRepository,
 *   generator: createStructureGenerator(),
 * })
 * const summary = await builder.buildStructure(documentId)
 * ```
 */
export function createStructureBuilder(deps: StructureBuilderDeps): StructureBuilder {
  const chunked = createChunkedStructureOrchestrator({
    generator: deps.generator,
    chunking: deps.chunking,
    tokenCounter: deps.tokenCounter,
    resolver: deps.resolver,
  })

  async function propose(
    text: string,
    options: StructureOptions,
    documentId: string,
    useChunks: boolean
  ): Promise<NodeProposal[]> {
    try {
      if (useChunks) {
        return await chunked.processLargeDocument(text, options, documentId)
      }
      return await deps.generator.generateStructure(text, options)
    } catch (error) {
      if (isAppError(error)) throw error
      throw new LlmFailedError(`Failed to generate structure: ${messageOf(error)}`, { cause: error })
    }
  }

  function resolve(proposals: NodeProposal[], text: string): ResolvedNode[] {
    proposals.forEach(validateProposal)
    try {
      return resolveOffsets(proposals, text, deps.resolver)
    } catch (error) {
      if (error instanceof AnchorNotFoundError) {
        throw new AnchorNotFoundError(`Failed to calculate offsets: ${error.message}`, { cause: error })
      }
      throw error
    }
  }

  async function persistLayers(documentId: string, nodes: ResolvedNode[]): Promise<PersistedNode[]> {
    const saved: PersistedNode[] = []
    const siblingCounts = new Map<string | null, number>()

    for (const layer of groupByDepth(nodes)) {
      const depth = layer[0].depth

      const ancestors =
        depth === 0 ? [] : await deps.nodes.findByDocumentAndDepthLessThan(documentId, depth)

      const batch: NewDocumentNode[] = []
      for (const node of layer) {
        const parent = depth === 0 ? null : findDeepestContainer(ancestors, node)
        const parentId = parent?.id ?? null
        const idx = (siblingCounts.get(parentId) ?? 0) + 1
        siblingCounts.set(parentId, idx)
        batch.push({ ...node, documentId, parentId, idx })
      }

      try {
        const stored = await deps.nodes.saveAll(batch)
        saved.push(...stored)
      } catch (error) {
        logger.error("Layer persistence failed", {
          documentId,
          depth,
          layerSize: batch.length,
          savedNodeCount: saved.length,
          error: messageOf(error),
        })
        throw new PersistenceError(
          `Failed to persist ${batch.length} nodes at depth ${depth} (${saved.length} nodes saved)`,
          depth,
          saved.length,
          { cause: error }
        )
      }

      logger.info("Layer persisted", { documentId, depth, nodeCount: batch.length })
    }

    return saved
  }

  async function validatePersisted(documentId: string): Promise<void> {
    const stored = await deps.nodes.findByDocumentOrderByStartOffset(documentId)
    try {
      validateContainment(stored)
      validateSiblingNonOverlap(stored)
    } catch (error) {
      if (!(error instanceof ValidationError)) throw error
      logger.warn("Persisted structure failed validation", { documentId, error: error.message })
    }
  }

  async function run(documentId: string, options: StructureOptions): Promise<StructureBuildSummary> {
    const document = await deps.documents.findById(documentId)
    if (!document) {
      throw new NotFoundError(`Document ${documentId} not found`)
    }
    if (document.status !== "NORMALIZED") {
      throw new InvalidStateError(
        `Document ${documentId} must be NORMALIZED to build structure (status: ${document.status})`
      )
    }
    if (!document.text) {
      throw new InvalidStateError(`Document ${documentId} has no text`)
    }
    const { text } = document

    const removed = await deps.nodes.deleteByDocument(documentId)
    if (removed > 0) {
      logger.info("Removed previous structure", { documentId, removed })
    }

    const useChunks = chunked.needsChunking(text)
    logger.info("Building structure", {
      documentId,
      textLength: text.length,
      chunked: useChunks,
      estimatedChunks: chunked.estimateChunkCount(text),
      model: options.model,
    })

    const proposals = await propose(text, options, documentId, useChunks)
    if (proposals.length === 0) {
      throw new NotFoundError(`No nodes generated for document ${documentId}`)
    }

    const resolved = resolve(proposals, text)
    const saved = await persistLayers(documentId, resolved)
    await validatePersisted(documentId)

    await deps.documents.updateStatus(documentId, "STRUCTURED")

    const summary: StructureBuildSummary = {
      documentId,
      nodeCount: saved.length,
      depthCount: new Set(saved.map((node) => node.depth)).size,
      chunked: useChunks,
    }
    logger.info("Structure built", { ...summary })
    return summary
  }

  return {
    async buildStructure(documentId, options = {}) {
      try {
        return await run(documentId, { ...DEFAULT_STRUCTURE_OPTIONS, ...options })
      } catch (error) {
        if (isAppError(error)) throw error
        logger.error("Unexpected structure failure", { documentId, error: messageOf(error) })
        throw new UnexpectedStructureError(undefined, { cause: error })
      }
    },
  }
}
