// src/db/queries/document-nodes.test.ts
import { describe, it, expect } from "vitest"
import { createTestDocument, createTestNode } from "@/test/factories"
import { nodeRepository } from "./document-nodes"
import type { NewDocumentNode } from "@/lib/document-structure/types"

function newNode(documentId: string, overrides: Partial<NewDocumentNode> = {}): NewDocumentNode {
  return {
    documentId,
    parentId: null,
    idx: 1,
    type: "CHAPTER",
    title: "Chapter 1",
    startAnchor: "Chapter 1",
    endAnchor: "the end",
    startOffset: 0,
    endOffset: 100,
    depth: 0,
    confidence: 0.9,
    metadata: null,
    ...overrides,
  }
}

describe("nodeRepository", () => {
  describe("saveAll", () => {
    it("returns stored nodes with generated ids in input order", async () => {
      const doc = await createTestDocument()

      const saved = await nodeRepository.saveAll([
        newNode(doc.id, { title: "One", idx: 1, startOffset: 0, endOffset: 50 }),
        newNode(doc.id, { title: "Two", idx: 2, startOffset: 50, endOffset: 100, metadata: { n: 2 } }),
      ])

      expect(saved.map((n) => n.title)).toEqual(["One", "Two"])
      expect(saved[0].id).toMatch(/^[0-9a-f-]{36}$/)
      expect(saved[1].metadata).toEqual({ n: 2 })
    })

    it("does nothing for an empty list", async () => {
      expect(await nodeRepository.saveAll([])).toEqual([])
    })

    it("rejects duplicate sibling indexes at the root", async () => {
      const doc = await createTestDocument()

      await expect(
        nodeRepository.saveAll([
          newNode(doc.id, { idx: 1, startOffset: 0, endOffset: 10 }),
          newNode(doc.id, { idx: 1, startOffset: 10, endOffset: 20 }),
        ])
      ).rejects.toThrow()
      expect(await nodeRepository.countByDocument(doc.id)).toBe(0)
    })

    it("rejects a second node with the same range and depth", async () => {
      const doc = await createTestDocument()

      await expect(
        nodeRepository.saveAll([
          newNode(doc.id, { idx: 1 }),
          newNode(doc.id, { idx: 2 }),
        ])
      ).rejects.toThrow()
    })
  })

  describe("queries", () => {
    it("filters by depth and orders by depth then start", async () => {
      const doc = await createTestDocument()
      const [parent] = await nodeRepository.saveAll([newNode(doc.id, { title: "P", startOffset: 0, endOffset: 100 })])
      await nodeRepository.saveAll([
        newNode(doc.id, { title: "B", parentId: parent.id, idx: 2, depth: 1, startOffset: 50, endOffset: 100 }),
        newNode(doc.id, { title: "A", parentId: parent.id, idx: 1, depth: 1, startOffset: 0, endOffset: 50 }),
      ])
      await nodeRepository.saveAll([
        newNode(doc.id, { title: "Deep", parentId: parent.id, idx: 3, depth: 2, startOffset: 5, endOffset: 10 }),
      ])

      const shallow = await nodeRepository.findByDocumentAndDepthLessThan(doc.id, 2)
      expect(shallow.map((n) => n.title)).toEqual(["P", "A", "B"])

      const ordered = await nodeRepository.findByDocumentOrderByStartOffset(doc.id)
      expect(ordered.map((n) => n.title)).toEqual(["P", "A", "Deep", "B"])
    })

    it("scopes results to one document", async () => {
      const docA = await createTestDocument()
      const docB = await createTestDocument()
      await createTestNode(docA.id)
      await createTestNode(docB.id)
      await createTestNode(docB.id)

      expect(await nodeRepository.countByDocument(docA.id)).toBe(1)
      expect(await nodeRepository.countByDocument(docB.id)).toBe(2)
    })
  })

  describe("deleteByDocument", () => {
    it("removes every node and reports how many", async () => {
      const doc = await createTestDocument()
      const parent = await createTestNode(doc.id)
      await createTestNode(doc.id, { parentId: parent.id, depth: 1 })

      expect(await nodeRepository.deleteByDocument(doc.id)).toBe(2)
      expect(await nodeRepository.countByDocument(doc.id)).toBe(0)
    })
  })
})
