/**
 * @fileoverview Document Data Access Layer
 *
 * Reads and status transitions for normalized documents. The structuring
 * pipeline only sees documents through `documentRepository`.
 *
 * ```
 * NORMALIZED → STRUCTURED
 *            ↘ FAILED
 * ```
 *
 * A FAILED document keeps the failure text in `errorMessage` until the next
 * status change clears it.
 *
 * @module db/queries/documents
 */

import { eq } from "drizzle-orm"
import { db } from "../client"
import { documents } from "../schema/documents"
import type {
  DocumentRepository,
  DocumentStatus,
  StructurableDocument,
} from "@/lib/document-structure/types"

export type Document = typeof documents.$inferSelect

/**
 * Insert a normalized document. `charCount` is derived from the text.
 *
 * @example
 * ```typescript
 * const doc = await createDocument({ originalName: "novel.txt", text })
 * ```
 */
export async function createDocument(data: { originalName: string; text: string | null }): Promise<Document> {
  const [doc] = await db
    .insert(documents)
    .values({
      originalName: data.originalName,
      text: data.text,
      charCount: data.text?.length ?? 0,
    })
    .returning()
  return doc
}

export async function getDocumentById(documentId: string): Promise<Document | null> {
  const [doc] = await db.select().from(documents).where(eq(documents.id, documentId)).limit(1)
  return doc ?? null
}

/**
 * Set a document's status. Passing no `errorMessage` clears any previous one.
 */
export async function updateDocumentStatus(
  documentId: string,
  status: DocumentStatus,
  errorMessage?: string
): Promise<Document | null> {
  const [updated] = await db
    .update(documents)
    .set({ status, errorMessage: errorMessage ?? null })
    .where(eq(documents.id, documentId))
    .returning()
  return updated ?? null
}

export const documentRepository: DocumentRepository = {
  async findById(documentId): Promise<StructurableDocument | null> {
    const doc = await getDocumentById(documentId)
    if (!doc) {
      return null
    }
    return { id: doc.id, text: doc.text, charCount: doc.charCount, status: doc.status }
  },

  async updateStatus(documentId, status, errorMessage) {
    await updateDocumentStatus(documentId, status, errorMessage)
  },
}
