import { describe, it, expect } from 'vitest'
import { buildStructurePrompt, formatPreviousStructure, STRUCTURE_SYSTEM_PROMPT } from './structure'
import { DEFAULT_STRUCTURE_OPTIONS } from '@/lib/document-structure/config'
import { mockProposal } from '../testing/mock-structure'

const nodes = (count: number) =>
  Array.from({ length: count }, (_, i) => mockProposal({ title: `Node ${i}`, depth: i % 2 }))

describe('formatPreviousStructure', () => {
  it('marks the first chunk', () => {
    expect(formatPreviousStructure([])).toBe('None (first chunk)')
    expect(formatPreviousStructure(null)).toBe('None (first chunk)')
  })

  it('lists every node when there are at most ten', () => {
    const result = formatPreviousStructure(nodes(10))

    expect(result.split('\n')).toHaveLength(10)
    expect(result).toContain('Node 0')
    expect(result).toContain('Node 9')
    expect(result).not.toContain('omitted')
  })

  it('shows only the last ten and counts the rest', () => {
    const result = formatPreviousStructure(nodes(15))
    const lines = result.split('\n')

    expect(lines[0]).toBe('(5 earlier nodes omitted)')
    expect(lines[1]).toBe('-   Node 5 (CHAPTER, depth: 1)')
    expect(lines[10]).toBe('- Node 14 (CHAPTER, depth: 0)')
    expect(result).not.toContain('Node 4 ')
  })
})

describe('buildStructurePrompt', () => {
  it('uses the single-document template for one chunk', () => {
    const prompt = buildStructurePrompt('My document content', DEFAULT_STRUCTURE_OPTIONS)

    expect(prompt).toContain('Analyze the following document and return its outline.')
    expect(prompt).toContain('Document Profile: general')
    expect(prompt).toContain('Granularity: auto')
    expect(prompt).toContain('Document Length: 19 characters')
    expect(prompt).toContain('<document>\nMy document content\n</document>')
    expect(prompt).not.toContain('Chunk Position')
  })

  it('uses the chunked template with a 1-based position', () => {
    const prompt = buildStructurePrompt('Chunk text', DEFAULT_STRUCTURE_OPTIONS, null, 2, 5)

    expect(prompt).toContain('Chunk Position: 3 of 5')
    expect(prompt).toContain('Chunk Length: 10 characters')
    expect(prompt).toContain('Structure found in earlier chunks:\nNone (first chunk)')
  })

  it('includes earlier structure', () => {
    const prompt = buildStructurePrompt('Chunk text', DEFAULT_STRUCTURE_OPTIONS, nodes(2), 1, 3)
    expect(prompt).toContain('- Node 0 (CHAPTER, depth: 0)\n-   Node 1 (CHAPTER, depth: 1)')
  })

  it('does not expand placeholders inside the content', () => {
    const prompt = buildStructurePrompt('Literal {profile} and $& here', DEFAULT_STRUCTURE_OPTIONS)
    expect(prompt).toContain('<document>\nLiteral {profile} and $& here\n</document>')
  })

  it('fills every placeholder', () => {
    const prompt = buildStructurePrompt('x', DEFAULT_STRUCTURE_OPTIONS, nodes(1), 0, 2)
    expect(prompt).not.toMatch(/\{\w+\}/)
  })
})

describe('STRUCTURE_SYSTEM_PROMPT', () => {
  it('lists the allowed node types', () => {
    expect(STRUCTURE_SYSTEM_PROMPT).toContain('PART, CHAPTER, SECTION, SUBSECTION, PARAGRAPH, UTTERANCE, OTHER')
  })
})
