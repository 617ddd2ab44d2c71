/**
 * @fileoverview Read access to a document's persisted structure.
 *
 * @module lib/document-structure/structure-query
 */

import { NotFoundError } from "@/lib/errors"
import type { DocumentRepository, NodeRepository, PersistedNode } from "./types"

/** A persisted node with its children, ordered by sibling index. */
export interface StructureTreeNode extends PersistedNode {
  children: StructureTreeNode[]
}

export interface StructureQueryDeps {
  documents: DocumentRepository
  nodes: NodeRepository
}

/**
 * Nest nodes under their parents. Nodes whose parent is missing from
 * `nodes` become roots.
 */
export function toTree(nodes: readonly PersistedNode[]): StructureTreeNode[] {
  const byId = new Map<string, StructureTreeNode>(
    nodes.map((node) => [node.id, { ...node, children: [] }])
  )
  const roots: StructureTreeNode[] = []

  for (const node of byId.values()) {
    const parent = node.parentId === null ? undefined : byId.get(node.parentId)
    if (parent) {
      parent.children.push(node)
    } else {
      roots.push(node)
    }
  }

  const order = (a: StructureTreeNode, b: StructureTreeNode) =>
    a.idx - b.idx || a.startOffset - b.startOffset
  const sortAll = (list: StructureTreeNode[]) => {
    list.sort(order)
    list.forEach((node) => sortAll(node.children))
  }
  sortAll(roots)

  return roots
}

export function createStructureQueries(deps: StructureQueryDeps) {
  /** All nodes of a document by start offset, parents before children. */
  async function getFlatStructure(documentId: string): Promise<PersistedNode[]> {
    return deps.nodes.findByDocumentOrderByStartOffset(documentId)
  }

  async function getTreeStructure(documentId: string): Promise<StructureTreeNode[]> {
    return toTree(await getFlatStructure(documentId))
  }

  /**
   * The slice of the document's text a node covers.
   *
   * @throws {NotFoundError} when the document has no text or the node is not
   * one of its nodes
   */
  async function extractNodeText(documentId: string, nodeId: string): Promise<string> {
    const document = await deps.documents.findById(documentId)
    if (!document || document.text === null) {
      throw new NotFoundError(`Document ${documentId} not found`)
    }

    const nodes = await getFlatStructure(documentId)
    const node = nodes.find((candidate) => candidate.id === nodeId)
    if (!node) {
      throw new NotFoundError(`Node ${nodeId} not found in document ${documentId}`)
    }

    return document.text.slice(node.startOffset, node.endOffset)
  }

  return { getFlatStructure, getTreeStructure, extractNodeText }
}

export type StructureQueries = ReturnType<typeof createStructureQueries>
