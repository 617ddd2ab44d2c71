/**
 * @fileoverview Inngest Event Type Definitions
 *
 * Event schemas for the structuring workflow. Events follow the naming
 * convention: `document/<domain>.<action>`
 *
 * Payloads are validated at runtime with Zod before processing.
 *
 * @module inngest/types
 */

import { z } from "zod"

/**
 * Structure request event - builds the outline of a NORMALIZED document.
 * Any option left out falls back to the defaults.
 */
export const structureRequestedPayload = z.object({
  /** Document to structure */
  documentId: z.string().uuid(),
  /** Model id override (AI Gateway format) */
  model: z.string().min(1).optional(),
  /** Document profile hint, e.g. "textbook" */
  profile: z.string().min(1).optional(),
  /** Outline granularity hint, e.g. "coarse" */
  granularity: z.string().min(1).optional(),
})

/**
 * Structure completion event - emitted after nodes are persisted and the
 * document is STRUCTURED.
 */
export const structureCompletedPayload = z.object({
  documentId: z.string().uuid(),
  nodeCount: z.number().int().nonnegative(),
  depthCount: z.number().int().nonnegative(),
  chunked: z.boolean(),
})

/**
 * All Inngest event types for the application.
 */
export type InngestEvents = {
  "document/structure.requested": {
    data: z.infer<typeof structureRequestedPayload>
  }
  "document/structure.completed": {
    data: z.infer<typeof structureCompletedPayload>
  }
}

export type StructureRequestedPayload = z.infer<typeof structureRequestedPayload>
export type StructureCompletedPayload = z.infer<typeof structureCompletedPayload>

/**
 * Map of event names to their Zod schemas for runtime validation.
 */
export const eventSchemas = {
  "document/structure.requested": structureRequestedPayload,
  "document/structure.completed": structureCompletedPayload,
} as const
