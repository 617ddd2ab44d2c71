/**
 * @fileoverview Tests for the Structure Document function
 *
 * @module inngest/functions/__tests__/structure-document.test
 */

import { describe, it, expect, vi, beforeEach } from "vitest"
import { NonRetriableError } from "inngest"
import { createTestDocument } from "@/test/factories"
import { getDocumentById } from "@/db/queries/documents"
import { InvalidStateError, LlmFailedError } from "@/lib/errors"
import type { DocumentRepository, StructureBuildSummary } from "@/lib/document-structure/types"

const { mockBuild } = vi.hoisted(() => ({ mockBuild: vi.fn() }))

vi.mock("@/inngest/client", () => ({
  inngest: {
    createFunction: vi.fn((config: unknown, trigger: unknown, handler: unknown) => ({
      config,
      trigger,
      handler,
    })),
  },
}))

vi.mock("@/lib/document-structure/structure-builder", () => ({
  createStructureBuilder: vi.fn(() => ({ buildStructure: mockBuild })),
}))

import { runStructureJob, structureDocument } from "../structure-document"

interface FakeStep {
  run: ReturnType<typeof vi.fn>
  sendEvent: ReturnType<typeof vi.fn>
}

type Handler = (ctx: { event: { data: unknown }; step: FakeStep }) => Promise<StructureBuildSummary>

const { handler, config, trigger } = structureDocument as unknown as {
  handler: Handler
  config: { id: string; retries: number }
  trigger: { event: string }
}

function createStep(): FakeStep {
  return {
    run: vi.fn((_id: string, fn: () => Promise<unknown>) => fn()),
    sendEvent: vi.fn().mockResolvedValue({ ids: ["evt-1"] }),
  }
}

describe("structureDocument function", () => {
  beforeEach(() => {
    vi.clearAllMocks()
  })

  it("is registered for structure requests without retries", () => {
    expect(config).toMatchObject({ id: "structure-document", retries: 0 })
    expect(trigger).toEqual({ event: "document/structure.requested" })
  })

  it("builds in one step and emits the summary", async () => {
    const doc = await createTestDocument()
    const summary = { documentId: doc.id, nodeCount: 4, depthCount: 2, chunked: false }
    mockBuild.mockResolvedValue(summary)
    const step = createStep()

    const result = await handler({ event: { data: { documentId: doc.id, profile: "textbook" } }, step })

    expect(result).toEqual(summary)
    expect(step.run).toHaveBeenCalledWith("build-structure", expect.any(Function))
    expect(mockBuild).toHaveBeenCalledWith(doc.id, { profile: "textbook" })
    expect(step.sendEvent).toHaveBeenCalledWith("structure-completed", {
      name: "document/structure.completed",
      data: summary,
    })
  })

  it("marks the document FAILED when the build fails", async () => {
    const doc = await createTestDocument()
    mockBuild.mockRejectedValue(new LlmFailedError("Failed to generate structure after 3 attempts"))
    const step = createStep()

    await expect(handler({ event: { data: { documentId: doc.id } }, step })).rejects.toThrow(NonRetriableError)

    expect(await getDocumentById(doc.id)).toMatchObject({
      status: "FAILED",
      errorMessage: "Failed to generate structure after 3 attempts",
    })
    expect(step.sendEvent).not.toHaveBeenCalled()
  })

  it("rejects malformed payloads before building", async () => {
    const step = createStep()

    await expect(handler({ event: { data: { documentId: "nope" } }, step })).rejects.toThrow(
      /^Invalid structure request/
    )
    expect(step.run).not.toHaveBeenCalled()
  })
})

describe("runStructureJob", () => {
  const documentId = "550e8400-e29b-41d4-a716-446655440000"

  function createDeps() {
    const updateStatus = vi.fn<DocumentRepository["updateStatus"]>().mockResolvedValue(undefined)
    return {
      updateStatus,
      deps: {
        builder: { buildStructure: mockBuild },
        documents: { findById: vi.fn<DocumentRepository["findById"]>(), updateStatus },
      },
    }
  }

  beforeEach(() => {
    vi.clearAllMocks()
  })

  it("forwards only the options that were given", async () => {
    const { deps } = createDeps()
    mockBuild.mockResolvedValue({ documentId, nodeCount: 1, depthCount: 1, chunked: false })

    await runStructureJob({ documentId, model: "openai/gpt-5-mini", granularity: "fine" }, deps)

    expect(mockBuild).toHaveBeenCalledWith(documentId, { model: "openai/gpt-5-mini", granularity: "fine" })
  })

  it("leaves documents in the wrong state untouched", async () => {
    const { deps, updateStatus } = createDeps()
    mockBuild.mockRejectedValue(new InvalidStateError("Document has no text"))

    await expect(runStructureJob({ documentId }, deps)).rejects.toThrow("Document has no text")
    expect(updateStatus).not.toHaveBeenCalled()
  })

  it("keeps the original error as the cause", async () => {
    const { deps, updateStatus } = createDeps()
    const failure = new Error("connection reset")
    mockBuild.mockRejectedValue(failure)

    const error = await runStructureJob({ documentId }, deps).catch((e: unknown) => e)

    expect(error).toBeInstanceOf(NonRetriableError)
    expect(error).toMatchObject({ message: "connection reset", cause: failure })
    expect(updateStatus).toHaveBeenCalledWith(documentId, "FAILED", "connection reset")
  })
})
