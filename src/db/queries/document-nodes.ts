/**
 * @fileoverview Document node Data Access Layer
 *
 * Backs `NodeRepository`. Each `saveAll` call is one multi-row INSERT, so a
 * layer is stored completely or not at all.
 *
 * @module db/queries/document-nodes
 */

import { and, asc, count, eq, lt } from "drizzle-orm"
import { db } from "../client"
import { documentNodes } from "../schema/documents"
import type { NewDocumentNode, NodeRepository, PersistedNode } from "@/lib/document-structure/types"

type DocumentNodeRow = typeof documentNodes.$inferSelect

function toPersistedNode(row: DocumentNodeRow): PersistedNode {
  return {
    id: row.id,
    documentId: row.documentId,
    parentId: row.parentId,
    idx: row.idx,
    type: row.type,
    title: row.title,
    startAnchor: row.startAnchor,
    endAnchor: row.endAnchor,
    startOffset: row.startOffset,
    endOffset: row.endOffset,
    depth: row.depth,
    confidence: row.confidence,
    metadata: row.metadata,
  }
}

function toInsert(node: NewDocumentNode): typeof documentNodes.$inferInsert {
  return {
    documentId: node.documentId,
    parentId: node.parentId,
    idx: node.idx,
    type: node.type,
    title: node.title,
    startAnchor: node.startAnchor,
    endAnchor: node.endAnchor,
    startOffset: node.startOffset,
    endOffset: node.endOffset,
    depth: node.depth,
    confidence: node.confidence,
    metadata: node.metadata ?? null,
  }
}

export const nodeRepository: NodeRepository = {
  async saveAll(nodes) {
    if (nodes.length === 0) {
      return []
    }
    const rows = await db.insert(documentNodes).values(nodes.map(toInsert)).returning()
    return rows.map(toPersistedNode)
  },

  async findByDocumentAndDepthLessThan(documentId, depth) {
    const rows = await db
      .select()
      .from(documentNodes)
      .where(and(eq(documentNodes.documentId, documentId), lt(documentNodes.depth, depth)))
      .orderBy(asc(documentNodes.depth), asc(documentNodes.startOffset))
    return rows.map(toPersistedNode)
  },

  async findByDocumentOrderByStartOffset(documentId) {
    const rows = await db
      .select()
      .from(documentNodes)
      .where(eq(documentNodes.documentId, documentId))
      .orderBy(asc(documentNodes.startOffset), asc(documentNodes.depth))
    return rows.map(toPersistedNode)
  },

  async countByDocument(documentId) {
    const [result] = await db
      .select({ value: count() })
      .from(documentNodes)
      .where(eq(documentNodes.documentId, documentId))
    return result?.value ?? 0
  },

  async deleteByDocument(documentId) {
    const deleted = await db
      .delete(documentNodes)
      .where(eq(documentNodes.documentId, documentId))
      .returning({ id: documentNodes.id })
    return deleted.length
  },
}
