import { describe, it, expect } from "vitest"
import {
  DocumentIndex,
  collapseWhitespace,
  findByLeadingWords,
  findByShortening,
  locateAnchor,
  lowerPreservingLength,
  unescapeAnchor,
} from "./anchor-strategies"

describe("text helpers", () => {
  it("collapses whitespace runs and trims", () => {
    expect(collapseWhitespace("  a \n\n b\tc  ")).toBe("a b c")
  })

  it("unescapes quotes and literal newlines", () => {
    expect(unescapeAnchor('say \\"hi\\"\\nthere')).toBe('say "hi" there')
  })

  it("lower-cases without changing length", () => {
    const value = "İstanbul ABC"
    const lowered = lowerPreservingLength(value)
    expect(lowered).toHaveLength(value.length)
    expect(lowered.endsWith("abc")).toBe(true)
  })
})

describe("DocumentIndex", () => {
  const index = new DocumentIndex("a  b\n\nc")

  it("collapses whitespace runs to one space", () => {
    expect(index.collapsed).toBe("a b c")
  })

  it("maps original offsets to collapsed positions", () => {
    expect(index.toCollapsed(0)).toBe(0)
    expect(index.toCollapsed(2)).toBe(2)
    expect(index.toCollapsed(6)).toBe(4)
    expect(index.toCollapsed(7)).toBe(5)
  })

  it("maps collapsed positions back to original offsets", () => {
    expect(index.toOriginalStart(2)).toBe(3)
    expect(index.toOriginalStart(5)).toBe(7)
    expect(index.toOriginalEnd(3)).toBe(4)
    expect(index.toOriginalEnd(5)).toBe(7)
    expect(index.toOriginalEnd(0)).toBe(0)
  })
})

describe("locateAnchor", () => {
  it("finds exact matches", () => {
    const index = new DocumentIndex("one two three two")
    expect(locateAnchor(index, "two", 0)).toEqual({ start: 4, end: 7, strategy: "exact" })
    expect(locateAnchor(index, "two", 5)).toEqual({ start: 14, end: 17, strategy: "exact" })
  })

  it("matches across extra whitespace in the document", () => {
    const text = "Preamble\n\nStart   of\nchapter   two begins here\n\nBody."
    const match = locateAnchor(new DocumentIndex(text), "Start of chapter two begins here", 0)

    expect(match?.strategy).toBe("whitespace")
    expect(match && text.slice(match.start, match.end)).toBe(
      "Start   of\nchapter   two begins here"
    )
  })

  it("matches escaped quotes", () => {
    const text = 'He said "hello there my friend" and left the room quietly.'
    expect(locateAnchor(new DocumentIndex(text), 'He said \\"hello there my friend\\"', 0)).toEqual({
      start: 0,
      end: 31,
      strategy: "unescaped",
    })
  })

  it("matches ignoring case", () => {
    const text = "CHAPTER ONE: THE BEGINNING\nbody"
    expect(locateAnchor(new DocumentIndex(text), "Chapter One: The Beginning", 0)).toEqual({
      start: 0,
      end: 26,
      strategy: "case-insensitive",
    })
  })

  it("accepts a unique prefix and extends by the unmatched remainder", () => {
    const text = "Minutes. The committee met on Tuesday to discuss the annual budget. Adjourned."
    const anchor = "The committee met on Tuesday to discuss the annual budget for next year"

    expect(locateAnchor(new DocumentIndex(text), anchor, 0)).toEqual({
      start: 9,
      end: 78,
      strategy: "shortened",
    })
  })

  it("rejects prefixes that occur more than once", () => {
    const sentence = "The committee met on Tuesday to discuss the annual budget. "
    const text = sentence + "Later. " + sentence
    const anchor = "The committee met on Tuesday to discuss the annual budget for next year"
    const index = new DocumentIndex(text)

    expect(findByShortening(index, anchor, 0)).toBeNull()
    expect(locateAnchor(index, anchor, 0)).toBeNull()
  })

  it("falls back to a unique fuzzy window", () => {
    const text = "Notes. Quarterly budget review follows."
    expect(locateAnchor(new DocumentIndex(text), "Quarterly budget XYZ", 0)).toEqual({
      start: 7,
      end: 27,
      strategy: "fuzzy",
    })
  })

  it("falls back to the first three words", () => {
    const text = "Then: the final verdict came late."
    const anchor = "The Final Verdict arrived much later than expected"

    expect(locateAnchor(new DocumentIndex(text), anchor, 0)).toEqual({
      start: 6,
      end: 34,
      strategy: "words",
    })
  })

  it("ignores leading words that are ambiguous", () => {
    const index = new DocumentIndex("the final verdict, and the final verdict again")
    expect(findByLeadingWords(index, "The Final Verdict arrived", 0)).toBeNull()
  })

  it("falls back to a case-insensitive fuzzy window", () => {
    const text = "Notes. Quarterly budget review follows."
    expect(locateAnchor(new DocumentIndex(text), "QUARTERLY BUDGET XYZ", 0)).toEqual({
      start: 7,
      end: 27,
      strategy: "fuzzy-case-insensitive",
    })
  })

  it("returns null for blank or absent anchors", () => {
    const index = new DocumentIndex("Some text.")
    expect(locateAnchor(index, "   ", 0)).toBeNull()
    expect(locateAnchor(index, "completely unrelated words here", 0)).toBeNull()
  })
})
