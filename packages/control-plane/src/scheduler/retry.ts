/**
 * Backoff between executor retries.
 *
 * The scheduler retries failed executor calls immediately unless a
 * RetryConfig is supplied; with one, each retry waits an exponentially
 * growing delay with ±25% jitter.
 */

export interface RetryConfig {
  /** Base delay in milliseconds. */
  baseDelayMs: number
  /** Upper bound for a single delay. */
  maxDelayMs: number
  /** Multiplier applied per retry attempt. */
  multiplier: number
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  baseDelayMs: 1_000,
  maxDelayMs: 60_000,
  multiplier: 2,
}

/**
 * Delay before retry number `attempt` (0-based: first retry = 0).
 */
export function calculateRetryDelay(
  attempt: number,
  config: RetryConfig = DEFAULT_RETRY_CONFIG,
  random: () => number = Math.random,
): number {
  const exponentialDelay = config.baseDelayMs * Math.pow(config.multiplier, attempt)
  const cappedDelay = Math.min(exponentialDelay, config.maxDelayMs)

  const jitterFactor = 0.75 + random() * 0.5
  return Math.round(cappedDelay * jitterFactor)
}

/** Resolve after `ms`, or as soon as the signal aborts. */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve()
      return
    }
    const onAbort = (): void => {
      clearTimeout(timer)
      resolve()
    }
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort)
      resolve()
    }, ms)
    signal?.addEventListener("abort", onAbort, { once: true })
  })
}
