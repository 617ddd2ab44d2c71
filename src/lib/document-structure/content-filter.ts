/**
 * @fileoverview Drops front- and back-matter nodes (acknowledgments, indexes,
 * copyright pages) from generated outlines.
 *
 * A title is non-content when it contains any keyword from
 * `data/non-content-titles.json`, case-insensitively.
 *
 * @module lib/document-structure/content-filter
 */

import { logger } from "@/lib/logger"
import nonContentTitles from "./data/non-content-titles.json"

const KEYWORDS: readonly string[] = nonContentTitles.keywords.map((keyword) => keyword.toLowerCase())

export function isNonContentTitle(title: string, keywords: readonly string[] = KEYWORDS): boolean {
  const normalized = title.toLowerCase()
  return keywords.some((keyword) => normalized.includes(keyword))
}

export function filterContentNodes<T extends { title: string }>(
  nodes: readonly T[],
  keywords: readonly string[] = KEYWORDS
): T[] {
  const kept = nodes.filter((node) => !isNonContentTitle(node.title, keywords))

  if (kept.length < nodes.length) {
    logger.debug("Filtered non-content nodes", {
      removed: nodes.length - kept.length,
      kept: kept.length,
    })
  }

  return kept
}
