// src/db/queries/documents.test.ts
import { describe, it, expect } from "vitest"
import { createTestDocument } from "@/test/factories"
import {
  createDocument,
  getDocumentById,
  updateDocumentStatus,
  documentRepository,
} from "./documents"

describe("document queries", () => {
  describe("createDocument", () => {
    it("derives charCount and starts NORMALIZED", async () => {
      const doc = await createDocument({ originalName: "a.txt", text: "hello" })

      expect(doc.charCount).toBe(5)
      expect(doc.status).toBe("NORMALIZED")
      expect(doc.errorMessage).toBeNull()
    })

    it("accepts documents without text", async () => {
      const doc = await createDocument({ originalName: "empty.txt", text: null })

      expect(doc.charCount).toBe(0)
      expect(doc.text).toBeNull()
    })
  })

  describe("getDocumentById", () => {
    it("returns null for unknown ids", async () => {
      const doc = await getDocumentById("00000000-0000-0000-0000-000000000000")

      expect(doc).toBeNull()
    })
  })

  describe("updateDocumentStatus", () => {
    it("records and later clears the error message", async () => {
      const doc = await createTestDocument()

      const failed = await updateDocumentStatus(doc.id, "FAILED", "boom")
      expect(failed).toMatchObject({ status: "FAILED", errorMessage: "boom" })

      const structured = await updateDocumentStatus(doc.id, "STRUCTURED")
      expect(structured).toMatchObject({ status: "STRUCTURED", errorMessage: null })
    })
  })

  describe("documentRepository", () => {
    it("exposes the structurable slice of a document", async () => {
      const doc = await createTestDocument({ text: "abc" })

      const found = await documentRepository.findById(doc.id)

      expect(found).toEqual({ id: doc.id, text: "abc", charCount: 3, status: "NORMALIZED" })
    })

    it("updates status through the repository", async () => {
      const doc = await createTestDocument()

      await documentRepository.updateStatus(doc.id, "FAILED", "no text")

      const stored = await getDocumentById(doc.id)
      expect(stored).toMatchObject({ status: "FAILED", errorMessage: "no text" })
    })
  })
})
