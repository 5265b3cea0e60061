import { afterEach, describe, expect, it, vi } from "vitest"

import {
  calculateRetryDelay,
  DEFAULT_RETRY_CONFIG,
  type RetryConfig,
  sleep,
} from "../scheduler/retry.js"

describe("calculateRetryDelay", () => {
  it("returns base delay for attempt 0 (within jitter range)", () => {
    const delay = calculateRetryDelay(0)
    // Base delay is 1000ms, jitter is ±25%, so range is [750, 1250]
    expect(delay).toBeGreaterThanOrEqual(750)
    expect(delay).toBeLessThanOrEqual(1250)
  })

  it("applies exponential backoff", () => {
    const midpoint = () => 0.5

    expect(calculateRetryDelay(0, DEFAULT_RETRY_CONFIG, midpoint)).toBe(1_000)
    expect(calculateRetryDelay(1, DEFAULT_RETRY_CONFIG, midpoint)).toBe(2_000)
    expect(calculateRetryDelay(3, DEFAULT_RETRY_CONFIG, midpoint)).toBe(8_000)
  })

  it("spans ±25% across the jitter range", () => {
    expect(calculateRetryDelay(2, DEFAULT_RETRY_CONFIG, () => 0)).toBe(3_000)
    expect(calculateRetryDelay(2, DEFAULT_RETRY_CONFIG, () => 1)).toBe(5_000)
  })

  it("caps delay at maxDelayMs before jitter", () => {
    // attempt 20: 1000 * 2^20 → capped at 60,000ms, then at most +25%
    const samples = Array.from({ length: 100 }, () => calculateRetryDelay(20))
    for (const delay of samples) {
      expect(delay).toBeLessThanOrEqual(75_000)
    }
  })

  it("respects custom config", () => {
    const config: RetryConfig = {
      baseDelayMs: 5_000,
      maxDelayMs: 60_000,
      multiplier: 3,
    }

    // attempt 3: 5000 * 3^3 = 135,000ms → capped at 60,000ms
    expect(calculateRetryDelay(3, config, () => 0.5)).toBe(60_000)
  })

  it("returns integer milliseconds", () => {
    for (let attempt = 0; attempt < 10; attempt++) {
      const delay = calculateRetryDelay(attempt)
      expect(Number.isInteger(delay)).toBe(true)
    }
  })
})

describe("sleep", () => {
  afterEach(() => {
    vi.useRealTimers()
  })

  it("resolves after the delay", async () => {
    vi.useFakeTimers()
    let done = false
    const pending = sleep(1_000).then(() => {
      done = true
    })

    await vi.advanceTimersByTimeAsync(999)
    expect(done).toBe(false)
    await vi.advanceTimersByTimeAsync(1)
    await pending
    expect(done).toBe(true)
  })

  it("resolves early when the signal aborts", async () => {
    vi.useFakeTimers()
    const controller = new AbortController()
    const pending = sleep(60_000, controller.signal)

    controller.abort()
    await pending

    expect(vi.getTimerCount()).toBe(0)
  })

  it("resolves at once for an already aborted signal", async () => {
    const controller = new AbortController()
    controller.abort()

    await expect(sleep(60_000, controller.signal)).resolves.toBeUndefined()
  })
})

describe("DEFAULT_RETRY_CONFIG", () => {
  it("has expected defaults", () => {
    expect(DEFAULT_RETRY_CONFIG.baseDelayMs).toBe(1_000)
    expect(DEFAULT_RETRY_CONFIG.maxDelayMs).toBe(60_000)
    expect(DEFAULT_RETRY_CONFIG.multiplier).toBe(2)
  })
})
