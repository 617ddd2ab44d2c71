import { vi, type Mock } from 'vitest'
import type { generateText } from 'ai'
import type { NodeProposal, StructureGenerator } from '@/lib/document-structure/types'

/** Token usage reported by the stubbed model call */
interface UsageOptions {
  inputTokens?: number
  outputTokens?: number
}

/** Build a node proposal with sensible defaults */
export function mockProposal(overrides: Partial<NodeProposal> = {}): NodeProposal {
  return {
    type: 'CHAPTER',
    title: 'Chapter 1',
    startAnchor: 'Chapter 1 begins here',
    endAnchor: 'end of chapter one',
    depth: 0,
    confidence: 0.9,
    ...overrides,
  }
}

/** Mock generateText response carrying a structure outline */
export function mockStructureOutput(nodes: NodeProposal[], usage?: UsageOptions) {
  return {
    output: { nodes },
    usage: {
      inputTokens: usage?.inputTokens ?? 100,
      outputTokens: usage?.outputTokens ?? 50,
    },
    finishReason: 'stop',
  } as unknown as Awaited<ReturnType<typeof generateText>>
}

export interface MockStructureGenerator extends StructureGenerator {
  generateStructure: Mock<StructureGenerator['generateStructure']>
  generateStructureWithContext: Mock<StructureGenerator['generateStructureWithContext']>
}

/** In-memory generator returning `nodes` from both methods */
export function createMockGenerator(nodes: NodeProposal[] = []): MockStructureGenerator {
  return {
    generateStructure: vi.fn<StructureGenerator['generateStructure']>().mockResolvedValue(nodes),
    generateStructureWithContext: vi
      .fn<StructureGenerator['generateStructureWithContext']>()
      .mockResolvedValue(nodes),
  }
}
