/**
 * @fileoverview Type definitions for the document structuring pipeline.
 *
 * A structuring pass moves a node through three shapes:
 *
 * ```
 * NodeProposal (model output, anchors only)
 *   → ResolvedNode (exact offsets into the document text)
 *     → PersistedNode (id, parent id, sibling index)
 * ```
 *
 * Parents are referenced by id only. Nothing in this module holds a live
 * object reference to another node.
 *
 * @module lib/document-structure/types
 */

// ============================================================================
// Node Types
// ============================================================================

/** Structural role of a node, as proposed by the model. */
export const NODE_TYPES = [
  "PART",
  "CHAPTER",
  "SECTION",
  "SUBSECTION",
  "PARAGRAPH",
  "UTTERANCE",
  "OTHER",
] as const

export type NodeType = (typeof NODE_TYPES)[number]

/** Opaque per-node metadata. Stored as-is; never interpreted. */
export type NodeMetadata = Record<string, unknown>

/**
 * A node as proposed by the model, before anchor resolution.
 *
 * `startOffset`/`endOffset` are optional model guesses. They are only used
 * when anchor lookup fails, and only if they describe a valid range.
 */
export interface NodeProposal {
  type: NodeType
  title: string
  startAnchor: string
  endAnchor: string
  /** Hierarchy depth, 0 for top-level nodes */
  depth: number
  /** Model confidence in [0, 1]. Missing values default to 0.5. */
  confidence?: number | null
  startOffset?: number | null
  endOffset?: number | null
  metadata?: NodeMetadata | null
}

/**
 * A proposal with exact character offsets.
 *
 * Invariant: `0 <= startOffset < endOffset <= documentLength`.
 */
export interface ResolvedNode extends NodeProposal {
  startOffset: number
  endOffset: number
  confidence: number
}

/** A resolved node ready to be written, without its generated id. */
export interface NewDocumentNode extends ResolvedNode {
  documentId: string
  parentId: string | null
  /** 1-based position among siblings sharing `parentId` */
  idx: number
}

/** A node as stored. */
export interface PersistedNode extends NewDocumentNode {
  id: string
}

/** Anything with a half-open character range and a depth. */
export interface RangedNode {
  startOffset: number
  endOffset: number
  depth: number
}

// ============================================================================
// Chunking
// ============================================================================

/** A contiguous, possibly overlapping slice of a document's text. */
export interface Chunk {
  text: string
  /** Inclusive start in document coordinates */
  startOffset: number
  /** Exclusive end in document coordinates */
  endOffset: number
  /** 0-based sequential index */
  chunkIndex: number
}

/**
 * Chunking limits. Read-only inputs owned by configuration.
 */
export interface ChunkingConfig {
  /**
   * Token budget for a single model call.
   * @default 40000
   */
  maxSingleChunkTokens: number

  /**
   * Character budget for a single chunk.
   * @default 150000
   */
  maxSingleChunkChars: number

  /**
   * Tokens shared between consecutive chunks.
   * @default 5000
   */
  overlapTokens: number

  /**
   * Tokens reserved for the prompt around each chunk's text.
   * @default 2000
   */
  promptOverheadTokens: number

  /**
   * Lowers the chunking threshold to `STRUCTURE_LIMITS.AGGRESSIVE_TOKEN_LIMIT`.
   * @default false
   */
  aggressiveChunking: boolean

  /**
   * Re-split chunks that are still above the emergency ceiling.
   * @default true
   */
  emergencyChunking: boolean
}

/** Backoff settings for model calls. */
export interface LlmRetryConfig {
  maxRetries: number
  baseDelayMs: number
  maxDelayMs: number
  /** Fraction of the delay applied as +/- random jitter */
  jitterFactor: number
}

// ============================================================================
// Collaborators
// ============================================================================

/** Model selection and prompt shaping for one structuring pass. */
export interface StructureOptions {
  model: string
  /** Free-form document profile, e.g. "general", "textbook" */
  profile: string
  /** Desired outline granularity, e.g. "auto", "coarse", "fine" */
  granularity: string
}

/** Token estimation used for chunk sizing. */
export interface TokenCounter {
  estimateTokens(text: string | null | undefined): number
  exceedsLimit(text: string | null | undefined, tokenLimit: number): boolean
  maxCharsForTokens(tokenCount: number): number
  safeChunkSizeChars(modelMaxTokens: number, promptOverheadTokens: number): number
}

/**
 * Generative model collaborator.
 *
 * Implementations throw `LlmFailedError` with "No nodes generated" in the
 * message (or a cause's message) when the model returns an empty outline.
 */
export interface StructureGenerator {
  generateStructure(text: string, options: StructureOptions): Promise<NodeProposal[]>
  generateStructureWithContext(
    text: string,
    options: StructureOptions,
    previousNodes: NodeProposal[],
    chunkIndex: number,
    totalChunks: number
  ): Promise<NodeProposal[]>
}

/** Persistence collaborator for nodes. */
export interface NodeRepository {
  saveAll(nodes: NewDocumentNode[]): Promise<PersistedNode[]>
  findByDocumentAndDepthLessThan(documentId: string, depth: number): Promise<PersistedNode[]>
  findByDocumentOrderByStartOffset(documentId: string): Promise<PersistedNode[]>
  countByDocument(documentId: string): Promise<number>
  deleteByDocument(documentId: string): Promise<number>
}

export type DocumentStatus = "NORMALIZED" | "STRUCTURED" | "FAILED"

/** The slice of a document the structuring pipeline reads. */
export interface StructurableDocument {
  id: string
  text: string | null
  charCount: number
  status: DocumentStatus
}

/** Persistence collaborator for documents. */
export interface DocumentRepository {
  findById(documentId: string): Promise<StructurableDocument | null>
  updateStatus(documentId: string, status: DocumentStatus, errorMessage?: string): Promise<void>
}

/** Outcome of a successful structuring pass. */
export interface StructureBuildSummary {
  documentId: string
  nodeCount: number
  depthCount: number
  chunked: boolean
}
