// src/db/schema/documents.ts
import {
  pgTable,
  text,
  uuid,
  integer,
  real,
  index,
  unique,
  jsonb,
  type AnyPgColumn,
} from "drizzle-orm/pg-core"
import { primaryId, timestamps } from "../_columns"
import { NODE_TYPES, type DocumentStatus, type NodeMetadata } from "../../lib/document-structure/types"

export const DOCUMENT_STATUSES = ["NORMALIZED", "STRUCTURED", "FAILED"] as const satisfies readonly DocumentStatus[]

/**
 * Normalized source documents.
 *
 * `text` is the normalized text every node offset points into; `charCount`
 * is its length.
 */
export const documents = pgTable(
  "documents",
  {
    ...primaryId,
    originalName: text("original_name").notNull(),
    text: text("text"),
    charCount: integer("char_count").notNull().default(0),
    status: text("status", { enum: DOCUMENT_STATUSES }).notNull().default("NORMALIZED"),
    errorMessage: text("error_message"),
    ...timestamps,
  },
  (table) => [index("idx_docs_status").on(table.status, table.createdAt)]
)

/**
 * Outline nodes over a document's text.
 *
 * `parentId` is a nullable self-reference. `idx` is the 1-based position
 * among siblings. Offsets are half-open `[startOffset, endOffset)`.
 */
export const documentNodes = pgTable(
  "document_nodes",
  {
    ...primaryId,
    documentId: uuid("document_id")
      .notNull()
      .references(() => documents.id, { onDelete: "cascade" }),
    parentId: uuid("parent_id").references((): AnyPgColumn => documentNodes.id, {
      onDelete: "cascade",
    }),
    idx: integer("idx").notNull(),
    type: text("type", { enum: NODE_TYPES }).notNull(),
    title: text("title").notNull(),
    startAnchor: text("start_anchor").notNull(),
    endAnchor: text("end_anchor").notNull(),
    startOffset: integer("start_offset").notNull(),
    endOffset: integer("end_offset").notNull(),
    depth: integer("depth").notNull(),
    confidence: real("confidence").notNull().default(0.5),
    metadata: jsonb("metadata").$type<NodeMetadata>(),
    ...timestamps,
  },
  (table) => [
    unique("node_sibling_idx").on(table.documentId, table.parentId, table.idx).nullsNotDistinct(),
    unique("node_range_depth").on(
      table.documentId,
      table.startOffset,
      table.endOffset,
      table.depth
    ),
    index("idx_nodes_document_depth").on(table.documentId, table.depth),
    index("idx_nodes_document_start").on(table.documentId, table.startOffset),
    index("idx_nodes_parent").on(table.parentId),
  ]
)
