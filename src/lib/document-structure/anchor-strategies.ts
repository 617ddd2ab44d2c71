/**
 * @fileoverview Anchor matching strategies.
 *
 * Each strategy looks for an anchor in a `DocumentIndex` starting at an
 * original-text offset and returns the matched span in original-text
 * coordinates, or `null`. `locateAnchor` runs them as a cascade from strict
 * to lenient and stops at the first hit.
 *
 * Lenient strategies work on a whitespace-collapsed copy of the document
 * (every whitespace run becomes one space) and map positions back through a
 * per-character offset table. Strategies that match only part of the anchor
 * (prefixes, windows, leading words) require the part to occur exactly once
 * and extend the span by the unmatched remainder of the anchor.
 *
 * @module lib/document-structure/anchor-strategies
 */

// ============================================================================
// Types
// ============================================================================

export type AnchorStrategy =
  | "exact"
  | "whitespace"
  | "unescaped"
  | "case-insensitive"
  | "shortened"
  | "fuzzy"
  | "words"
  | "fuzzy-case-insensitive"

/** A located anchor, in original-text coordinates (`end` exclusive). */
export interface AnchorMatch {
  start: number
  end: number
  strategy: AnchorStrategy
}

/** Shortest prefix the shortening strategy will try */
const MIN_PREFIX_CHARS = 20

/** Prefix lengths tried after the half-length prefix */
const PREFIX_LENGTHS = [50, 40, 30, 25, 20]

const FUZZY_MAX_WINDOW = 80
const FUZZY_MIN_WINDOW = 15
const FUZZY_STEP = 5

/** Words used by the leading-words strategy */
const LEADING_WORD_COUNT = 3

// ============================================================================
// Text helpers
// ============================================================================

/** Collapse whitespace runs to single spaces and trim. */
export function collapseWhitespace(value: string): string {
  return value.replace(/\s+/g, " ").trim()
}

/**
 * Undo escaping the model sometimes leaves in anchors: `\"` becomes `"`,
 * and a literal backslash-n or backslash-t becomes a space.
 */
export function unescapeAnchor(value: string): string {
  return value.replace(/\\"/g, '"').replace(/\\[nrt]/g, " ")
}

/**
 * Lower-case without changing string length, so offsets computed on the
 * result stay valid for the input.
 */
export function lowerPreservingLength(value: string): string {
  let result = ""
  for (const ch of value) {
    const lower = ch.toLowerCase()
    result += lower.length === ch.length ? lower : ch
  }
  return result
}

// ============================================================================
// DocumentIndex
// ============================================================================

/**
 * Pre-computed views of a document used by the lenient strategies.
 *
 * Build once per document and reuse for every anchor.
 */
export class DocumentIndex {
  /** Whitespace-collapsed text (runs of whitespace → one space, not trimmed) */
  readonly collapsed: string

  /** `positions[i]` is the original offset of `collapsed[i]` */
  private readonly positions: number[]

  private loweredCache: string | null = null

  constructor(readonly text: string) {
    const chars: string[] = []
    const positions: number[] = []
    let inWhitespace = false

    for (let i = 0; i < text.length; i++) {
      const ch = text[i]
      if (/\s/.test(ch)) {
        if (!inWhitespace) {
          chars.push(" ")
          positions.push(i)
          inWhitespace = true
        }
      } else {
        chars.push(ch)
        positions.push(i)
        inWhitespace = false
      }
    }

    this.collapsed = chars.join("")
    this.positions = positions
  }

  /** Lower-cased `collapsed`, same length. */
  get lowered(): string {
    if (this.loweredCache === null) {
      this.loweredCache = lowerPreservingLength(this.collapsed)
    }
    return this.loweredCache
  }

  /**
   * First collapsed index whose original offset is at or after
   * `originalOffset`. Binary search over the position table.
   */
  toCollapsed(originalOffset: number): number {
    let low = 0
    let high = this.positions.length - 1
    let best = this.positions.length

    while (low <= high) {
      const mid = Math.floor((low + high) / 2)
      if (this.positions[mid] >= originalOffset) {
        best = mid
        high = mid - 1
      } else {
        low = mid + 1
      }
    }

    return best
  }

  /** Original offset of a collapsed start index. */
  toOriginalStart(collapsedIndex: number): number {
    if (collapsedIndex >= this.positions.length) {
      return this.text.length
    }
    return this.positions[Math.max(0, collapsedIndex)]
  }

  /** Original exclusive end for a collapsed exclusive end. */
  toOriginalEnd(collapsedEnd: number): number {
    if (collapsedEnd <= 0) {
      return 0
    }
    if (collapsedEnd >= this.positions.length) {
      return this.text.length
    }
    return this.positions[collapsedEnd - 1] + 1
  }
}

// ============================================================================
// Search primitives
// ============================================================================

interface Occurrence {
  /** First match position, -1 when absent */
  first: number
  /** 0, 1, or 2 meaning "two or more" */
  count: 0 | 1 | 2
}

function occurrences(haystack: string, needle: string, from: number): Occurrence {
  const first = haystack.indexOf(needle, from)
  if (first === -1) {
    return { first, count: 0 }
  }
  return { first, count: haystack.indexOf(needle, first + 1) === -1 ? 1 : 2 }
}

/**
 * Convert a match of `anchor.slice(lead, lead + matchLength)` found at
 * collapsed position `position` into an original-text span covering the
 * whole anchor.
 */
function spanFromPartial(
  index: DocumentIndex,
  fromCollapsed: number,
  position: number,
  lead: number,
  matchLength: number,
  anchorLength: number,
  strategy: AnchorStrategy
): AnchorMatch {
  const haystackLength = index.collapsed.length
  const startCollapsed = Math.max(fromCollapsed, position - lead)
  const endCollapsed = Math.min(
    haystackLength,
    Math.max(position + matchLength, position - lead + anchorLength)
  )

  return {
    start: index.toOriginalStart(startCollapsed),
    end: index.toOriginalEnd(endCollapsed),
    strategy,
  }
}

// ============================================================================
// Strategies
// ============================================================================

/** Literal substring search in the original text. */
export function findExact(
  index: DocumentIndex,
  anchor: string,
  from: number,
  strategy: AnchorStrategy = "exact"
): AnchorMatch | null {
  if (anchor.length === 0) {
    return null
  }
  const position = index.text.indexOf(anchor, from)
  return position === -1 ? null : { start: position, end: position + anchor.length, strategy }
}

/**
 * First occurrence of an already-collapsed anchor in the collapsed text.
 */
export function findCollapsed(
  index: DocumentIndex,
  collapsedAnchor: string,
  from: number,
  options: { caseInsensitive?: boolean; strategy?: AnchorStrategy } = {}
): AnchorMatch | null {
  if (collapsedAnchor.length === 0) {
    return null
  }
  const haystack = options.caseInsensitive ? index.lowered : index.collapsed
  const needle = options.caseInsensitive ? lowerPreservingLength(collapsedAnchor) : collapsedAnchor
  const fromCollapsed = index.toCollapsed(from)
  const position = haystack.indexOf(needle, fromCollapsed)
  if (position === -1) {
    return null
  }

  return spanFromPartial(
    index,
    fromCollapsed,
    position,
    0,
    needle.length,
    needle.length,
    options.strategy ?? "whitespace"
  )
}

/**
 * Try progressively shorter prefixes: half the anchor (at least 20 chars),
 * then 50, 40, 30, 25 and 20 characters. A prefix is accepted only when it
 * occurs exactly once; an ambiguous prefix ends the search because every
 * shorter prefix is at least as ambiguous.
 */
export function findByShortening(
  index: DocumentIndex,
  collapsedAnchor: string,
  from: number
): AnchorMatch | null {
  if (collapsedAnchor.length <= MIN_PREFIX_CHARS) {
    return null
  }

  const lengths = [
    Math.max(MIN_PREFIX_CHARS, Math.floor(collapsedAnchor.length / 2)),
    ...PREFIX_LENGTHS,
  ]
    .filter((length) => length >= MIN_PREFIX_CHARS && length < collapsedAnchor.length)
    .filter((length, i, all) => all.indexOf(length) === i)
    .sort((a, b) => b - a)

  const fromCollapsed = index.toCollapsed(from)

  for (const length of lengths) {
    const prefix = collapsedAnchor.slice(0, length).trimEnd()
    if (prefix.length < MIN_PREFIX_CHARS) {
      continue
    }
    const found = occurrences(index.collapsed, prefix, fromCollapsed)
    if (found.count === 2) {
      return null
    }
    if (found.count === 1) {
      return spanFromPartial(
        index,
        fromCollapsed,
        found.first,
        0,
        prefix.length,
        collapsedAnchor.length,
        "shortened"
      )
    }
  }

  return null
}

/**
 * Slide windows of 80 down to 15 characters across the anchor and accept the
 * first window that occurs exactly once.
 */
export function findByFuzzyWindows(
  index: DocumentIndex,
  collapsedAnchor: string,
  from: number,
  caseInsensitive: boolean
): AnchorMatch | null {
  const anchor = caseInsensitive ? lowerPreservingLength(collapsedAnchor) : collapsedAnchor
  const haystack = caseInsensitive ? index.lowered : index.collapsed
  const fromCollapsed = index.toCollapsed(from)
  const strategy: AnchorStrategy = caseInsensitive ? "fuzzy-case-insensitive" : "fuzzy"

  for (
    let windowLength = Math.min(anchor.length, FUZZY_MAX_WINDOW);
    windowLength >= FUZZY_MIN_WINDOW;
    windowLength -= FUZZY_STEP
  ) {
    for (let lead = 0; lead + windowLength <= anchor.length; lead += FUZZY_STEP) {
      const window = anchor.slice(lead, lead + windowLength)
      if (window.trim().length < FUZZY_MIN_WINDOW) {
        continue
      }
      const found = occurrences(haystack, window, fromCollapsed)
      if (found.count === 1) {
        return spanFromPartial(
          index,
          fromCollapsed,
          found.first,
          lead,
          windowLength,
          anchor.length,
          strategy
        )
      }
    }
  }

  return null
}

/**
 * Match the first three words of the anchor as a case-insensitive phrase.
 * Anchors with fewer than three words, and phrases that occur more than
 * once, yield no match.
 */
export function findByLeadingWords(
  index: DocumentIndex,
  collapsedAnchor: string,
  from: number
): AnchorMatch | null {
  const words = collapsedAnchor.split(" ").filter((word) => word.length > 0)
  if (words.length < LEADING_WORD_COUNT) {
    return null
  }

  const phrase = lowerPreservingLength(words.slice(0, LEADING_WORD_COUNT).join(" "))
  const fromCollapsed = index.toCollapsed(from)
  const found = occurrences(index.lowered, phrase, fromCollapsed)
  if (found.count !== 1) {
    return null
  }

  return spanFromPartial(
    index,
    fromCollapsed,
    found.first,
    0,
    phrase.length,
    collapsedAnchor.length,
    "words"
  )
}

// ============================================================================
// Cascade
// ============================================================================

/**
 * Locate `anchor` at or after `from`, trying strategies from strict to
 * lenient:
 *
 * 1. exact substring
 * 2. whitespace-collapsed
 * 3. un-escaped (`\"`, `\n`), exact then collapsed
 * 4. case-insensitive
 * 5. unique shortened prefix
 * 6. unique fuzzy window
 * 7. unique leading three words
 * 8. unique case-insensitive fuzzy window
 */
export function locateAnchor(
  index: DocumentIndex,
  anchor: string,
  from: number
): AnchorMatch | null {
  const exact = findExact(index, anchor, from)
  if (exact) {
    return exact
  }

  const collapsed = collapseWhitespace(anchor)
  if (collapsed.length === 0) {
    return null
  }

  const whitespace = findCollapsed(index, collapsed, from)
  if (whitespace) {
    return whitespace
  }

  const unescapedRaw = unescapeAnchor(anchor)
  const working = collapseWhitespace(unescapedRaw)
  if (unescapedRaw !== anchor) {
    const unescaped =
      findExact(index, unescapedRaw, from, "unescaped") ??
      findCollapsed(index, working, from, { strategy: "unescaped" })
    if (unescaped) {
      return unescaped
    }
  }

  return (
    findCollapsed(index, working, from, { caseInsensitive: true, strategy: "case-insensitive" }) ??
    findByShortening(index, working, from) ??
    findByFuzzyWindows(index, working, from, false) ??
    findByLeadingWords(index, working, from) ??
    findByFuzzyWindows(index, working, from, true)
  )
}
