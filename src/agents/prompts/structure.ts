import { NODE_TYPES, type NodeProposal, type StructureOptions } from '@/lib/document-structure/types'
import { STRUCTURE_LIMITS } from '@/lib/document-structure/config'

/**
 * System prompt for the structure agent.
 *
 * Offsets are optional in the output because models count characters badly;
 * anchors are what the pipeline relies on.
 */
export const STRUCTURE_SYSTEM_PROMPT = `You are a document structure analyst. You read long-form text and produce a hierarchical outline of it: parts, chapters, sections and subsections.

## Output Rules

1. Every node must have a type, a title, a depth, a startAnchor and an endAnchor.
2. Allowed types: ${NODE_TYPES.join(', ')}.
3. depth 0 is the top level. A child's depth is exactly one more than its parent's.
4. startAnchor is the first 30-80 characters of the node's text, copied VERBATIM from the document.
5. endAnchor is the last 30-80 characters of the node's text, copied VERBATIM from the document.
6. Never paraphrase, summarise, correct or re-case anchor text. Keep punctuation and spacing.
7. Siblings must not overlap. List nodes in document order.
8. confidence is your certainty in [0, 1] that the node is a real structural unit.
9. startOffset and endOffset are optional character positions; omit them if unsure.
10. Skip front and back matter (copyright pages, tables of contents, indexes) unless they are the only content.`

const SINGLE_TEMPLATE = `Analyze the following document and return its outline.

Document Profile: {profile}
Granularity: {granularity}
Document Length: {charCount} characters

<document>
{content}
</document>

Return a JSON object with a "nodes" array.`

const CHUNKED_TEMPLATE = `Analyze the following document chunk and return the outline of the text it contains.

Document Profile: {profile}
Granularity: {granularity}
Chunk Length: {charCount} characters
Chunk Position: {chunkIndex} of {totalChunks}

Structure found in earlier chunks:
{previousStructure}

Continue the existing outline. Do not repeat a node from earlier chunks unless this chunk continues it, in which case reuse its exact title.

<chunk>
{content}
</chunk>

Return a JSON object with a "nodes" array.`

/**
 * Summarise earlier nodes for the model, newest last.
 *
 * Only the last `STRUCTURE_LIMITS.CONTEXT_NODE_LIMIT` nodes are listed; the
 * rest are counted.
 */
export function formatPreviousStructure(previousNodes: readonly NodeProposal[] | null | undefined): string {
  if (!previousNodes || previousNodes.length === 0) {
    return 'None (first chunk)'
  }

  const limit = STRUCTURE_LIMITS.CONTEXT_NODE_LIMIT
  const omitted = Math.max(0, previousNodes.length - limit)
  const lines = previousNodes
    .slice(-limit)
    .map((node) => `- ${'  '.repeat(Math.max(0, node.depth))}${node.title} (${node.type}, depth: ${node.depth})`)

  if (omitted > 0) {
    lines.unshift(`(${omitted} earlier nodes omitted)`)
  }

  return lines.join('\n')
}

function fill(template: string, values: Record<string, string | number>): string {
  return template.replace(/\{(\w+)\}/g, (placeholder, key: string) =>
    key in values ? String(values[key]) : placeholder
  )
}

/**
 * Build the user prompt for one model call.
 *
 * Uses the single-document template when `totalChunks` is 1 and there is no
 * earlier structure, otherwise the chunked template. `chunkIndex` is 0-based
 * and shown 1-based.
 *
 * @example
 * ```typescript
 * buildStructurePrompt(text, options, [], 0, 1)          // single template
 * buildStructurePrompt(chunk.text, options, nodes, 2, 5) // "Chunk Position: 3 of 5"
 * ```
 */
export function buildStructurePrompt(
  content: string,
  options: StructureOptions,
  previousNodes: readonly NodeProposal[] | null = null,
  chunkIndex = 0,
  totalChunks = 1
): string {
  const chunked = totalChunks > 1 || (previousNodes !== null && previousNodes.length > 0)

  // Inserted values are never re-expanded
  return fill(chunked ? CHUNKED_TEMPLATE : SINGLE_TEMPLATE, {
    content,
    profile: options.profile,
    granularity: options.granularity,
    charCount: content.length,
    chunkIndex: chunkIndex + 1,
    totalChunks,
    previousStructure: formatPreviousStructure(previousNodes),
  })
}
