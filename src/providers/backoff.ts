import {setTimeout as delay} from 'node:timers/promises'
import {errorMessage} from './errors.js'

export type BackoffRetry = {
  /** 1-based number of the attempt that failed. */
  attempt: number
  delayMs: number
  error: string
}

export type BackoffOptions = {
  maxTries?: number
  /** Seconds for the first wait; each further wait doubles. */
  factor?: number
  maxDelayMs?: number
  sleep?: (ms: number) => Promise<void>
  random?: () => number
  onRetry?: (retry: BackoffRetry) => void
}

const DEFAULT_MAX_TRIES = 10
const DEFAULT_FACTOR = 1.5
const DEFAULT_MAX_DELAY_MS = 60_000

/** Exponential delay with full jitter: uniform in [0, min(maxDelayMs, factor * 2^retry s)]. */
export function backoffDelay(
  retry: number,
  factor = DEFAULT_FACTOR,
  maxDelayMs = DEFAULT_MAX_DELAY_MS,
  random: () => number = Math.random
): number {
  const ceiling = Math.min(maxDelayMs, factor * 1000 * 2 ** retry)
  return Math.round(random() * ceiling)
}

/**
 * Calls `createFn` until it resolves. Errors accepted by `isRetryable` are
 * retried after a backoff delay until `maxTries` attempts have been made;
 * any other error propagates at once.
 */
export async function backoffCreate<T>(
  createFn: () => Promise<T>,
  isRetryable: (error: unknown) => boolean,
  options: BackoffOptions = {}
): Promise<T> {
  const maxTries = options.maxTries ?? DEFAULT_MAX_TRIES
  const sleep = options.sleep ?? ((ms: number) => delay(ms))

  for (let attempt = 1; ; attempt += 1) {
    try {
      return await createFn()
    } catch (error) {
      if (!isRetryable(error) || attempt >= maxTries) throw error

      const delayMs = backoffDelay(attempt - 1, options.factor, options.maxDelayMs, options.random)
      options.onRetry?.({attempt, delayMs, error: errorMessage(error)})
      await sleep(delayMs)
    }
  }
}
