import { errorCode, errorMessage, statusCode } from './errors'
import * as log from './log'

export type RetryPolicy = {
  tries: number
  delayMs: number
  maxDelayMs: number

  /**
   * 'full' picks a random delay between zero and the exponential delay
   */
  jitter: 'none' | 'full'
}

export const RETRY_DEFAULTS: RetryPolicy = {
  tries: 10,
  delayMs: 3000,
  maxDelayMs: 60000,
  jitter: 'none'
}

export const RETRYABLE_CODES = new Set([
  'Throttling',
  'ThrottlingException',
  'ThrottledException',
  'RequestThrottledException',
  'TooManyRequestsException',
  'RequestLimitExceeded',
  'ServiceUnavailable',
  'InternalFailure',
  'InternalError'
])

export function isRetryable(err: unknown) {
  const code = errorCode(err)
  if (code && RETRYABLE_CODES.has(code)) {
    return true
  }

  const status = statusCode(err)
  return status === 429 || (status !== undefined && status >= 500 && status < 600)
}

export function delayFor(attempt: number, policy: RetryPolicy, random: () => number = Math.random) {
  const ceiling = Math.min(policy.maxDelayMs, policy.delayMs * 2 ** attempt)
  if (policy.jitter === 'full') {
    return Math.floor(random() * ceiling)
  }

  return ceiling
}

const sleep = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms))

export async function backoff<T>(fn: () => Promise<T>, policy: RetryPolicy, label = 'request'): Promise<T> {
  const tries = Math.max(1, policy.tries)

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn()
    } catch (ex) {
      if (attempt + 1 >= tries || !isRetryable(ex)) {
        throw ex
      }

      const delay = delayFor(attempt, policy)
      log.warn(`${label} failed (${errorMessage(ex)}), retrying in ${delay}ms`)
      await sleep(delay)
    }
  }
}
