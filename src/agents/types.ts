import { z } from 'zod'
import { NODE_TYPES } from '@/lib/document-structure/types'

// ============================================================================
// Structure Output
// ============================================================================

export const nodeTypeSchema = z.enum(NODE_TYPES)

/** One outline node as returned by the model */
export const structureNodeSchema = z.object({
  type: nodeTypeSchema,
  title: z.string().describe('Heading or short descriptive title of the node'),
  startAnchor: z
    .string()
    .describe('First 30-80 characters of the node, copied verbatim from the text'),
  endAnchor: z
    .string()
    .describe('Last 30-80 characters of the node, copied verbatim from the text'),
  depth: z.number().int().describe('0 for top-level nodes'),
  confidence: z.number().optional(),
  startOffset: z.number().int().optional(),
  endOffset: z.number().int().optional(),
  metadata: z.record(z.string(), z.unknown()).optional(),
})

export type StructureNodeOutput = z.infer<typeof structureNodeSchema>

/** Top-level structured output for the structure agent */
export const structureOutputSchema = z.object({
  nodes: z.array(structureNodeSchema),
})

export type StructureOutput = z.infer<typeof structureOutputSchema>
