/**
 * Document structuring pipeline.
 *
 * @example
 * ```typescript
 * import { createStructureBuilder } from "@/lib/document-structure"
 *
 * const builder = createStructureBuilder({ documents, nodes, generator })
 * const summary = await builder.buildStructure(documentId)
 * ```
 */

export * from "./types"
export {
  STRUCTURE_LIMITS,
  DEFAULT_CHUNKING_CONFIG,
  DEFAULT_LLM_RETRY_CONFIG,
  DEFAULT_STRUCTURE_OPTIONS,
  loadChunkingConfig,
  loadLlmRetryConfig,
} from "./config"
export { tokenCounter, countTokens } from "./token-counter"
export { chunkDocument, effectiveChunkChars } from "./document-chunker"
export {
  resolveOffsets,
  findNextMajorSection,
  validateSiblingNonOverlap,
  type AnchorResolverOptions,
  type SectionBoundaryFinder,
} from "./anchor-resolver"
export { mergeChunkResults } from "./node-merger"
export {
  buildHierarchy,
  findDeepestContainer,
  validateContainment,
  type HierarchyNode,
} from "./hierarchy-builder"
export { filterContentNodes, isNonContentTitle } from "./content-filter"
export {
  createChunkedStructureOrchestrator,
  resolveWithinChunk,
  NO_NODES_GENERATED,
  type ChunkedStructureOrchestrator,
} from "./chunked-structure"
export {
  createStructureBuilder,
  type StructureBuilder,
  type StructureBuilderDeps,
} from "./structure-builder"
export {
  createStructureQueries,
  toTree,
  type StructureQueries,
  type StructureTreeNode,
} from "./structure-query"
