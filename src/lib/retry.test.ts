import { describe, it, expect, vi } from "vitest"
import { backoffDelay, NonRetriableError, withRetry } from "./retry"

const noSleep = () => Promise.resolve()

describe("withRetry", () => {
  it("returns result on first success", async () => {
    const fn = vi.fn().mockResolvedValue("success")

    const result = await withRetry(fn, { maxAttempts: 3, sleep: noSleep })

    expect(result).toBe("success")
    expect(fn).toHaveBeenCalledTimes(1)
  })

  it("retries on failure and succeeds", async () => {
    const fn = vi
      .fn()
      .mockRejectedValueOnce(new Error("fail 1"))
      .mockRejectedValueOnce(new Error("fail 2"))
      .mockResolvedValue("success")

    const result = await withRetry(fn, { maxAttempts: 3, sleep: noSleep })

    expect(result).toBe("success")
    expect(fn).toHaveBeenCalledTimes(3)
    expect(fn).toHaveBeenLastCalledWith(3)
  })

  it("throws the last error after max attempts", async () => {
    const fn = vi
      .fn()
      .mockRejectedValueOnce(new Error("first"))
      .mockRejectedValue(new Error("always fails"))

    await expect(withRetry(fn, { maxAttempts: 3, sleep: noSleep })).rejects.toThrow("always fails")
    expect(fn).toHaveBeenCalledTimes(3)
  })

  it("does not retry non-retriable errors", async () => {
    const fn = vi.fn().mockRejectedValue(new NonRetriableError("bad input"))

    await expect(withRetry(fn, { maxAttempts: 3, sleep: noSleep })).rejects.toThrow("bad input")
    expect(fn).toHaveBeenCalledTimes(1)
  })

  it("honours shouldRetry", async () => {
    const fn = vi.fn().mockRejectedValue(new Error("nope"))

    await expect(
      withRetry(fn, { maxAttempts: 3, sleep: noSleep, shouldRetry: () => false })
    ).rejects.toThrow("nope")
    expect(fn).toHaveBeenCalledTimes(1)
  })

  it("waits with exponential backoff between attempts", async () => {
    const sleep = vi.fn().mockResolvedValue(undefined)
    const onRetry = vi.fn()
    const fn = vi.fn().mockRejectedValue(new Error("fail"))

    await expect(
      withRetry(fn, { maxAttempts: 4, baseDelayMs: 100, maxDelayMs: 250, sleep, onRetry })
    ).rejects.toThrow("fail")

    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([100, 200, 250])
    expect(onRetry).toHaveBeenCalledTimes(3)
    expect(onRetry).toHaveBeenCalledWith(expect.any(Error), 1, 100)
  })
})

describe("backoffDelay", () => {
  it("doubles up to the maximum", () => {
    expect(backoffDelay(1, { baseDelayMs: 1_000, maxDelayMs: 30_000 })).toBe(1_000)
    expect(backoffDelay(3, { baseDelayMs: 1_000, maxDelayMs: 30_000 })).toBe(4_000)
    expect(backoffDelay(10, { baseDelayMs: 1_000, maxDelayMs: 30_000 })).toBe(30_000)
  })

  it("applies jitter in both directions", () => {
    const options = { baseDelayMs: 1_000, maxDelayMs: 30_000, jitterFactor: 0.25 }
    expect(backoffDelay(1, { ...options, random: () => 0 })).toBe(750)
    expect(backoffDelay(1, { ...options, random: () => 1 })).toBe(1_250)
    expect(backoffDelay(1, { ...options, random: () => 0.5 })).toBe(1_000)
  })
})
