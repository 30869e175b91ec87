import { describe, expect, it, vi } from 'vitest'
import { backoff, delayFor, isRetryable, type RetryPolicy } from './retry'
import { awsError, notFound } from '../test/fake-gateway'

const immediate: RetryPolicy = { tries: 3, delayMs: 0, maxDelayMs: 0, jitter: 'none' }

describe('isRetryable', () => {
  it('retries throttling codes', () => {
    expect(isRetryable(awsError('ThrottlingException', 400))).toBe(true)
    expect(isRetryable(awsError('TooManyRequestsException', 429))).toBe(true)
  })

  it('retries server errors by status', () => {
    expect(isRetryable({ statusCode: 503 })).toBe(true)
  })

  it('does not retry client errors', () => {
    expect(isRetryable(awsError('BadRequestException', 400))).toBe(false)
    expect(isRetryable(notFound())).toBe(false)
    expect(isRetryable(new Error('socket hang up'))).toBe(false)
  })
})

describe('delayFor', () => {
  const policy: RetryPolicy = { tries: 10, delayMs: 1000, maxDelayMs: 5000, jitter: 'none' }

  it('doubles with each attempt up to the ceiling', () => {
    expect([0, 1, 2, 3].map(attempt => delayFor(attempt, policy))).toEqual([1000, 2000, 4000, 5000])
  })

  it('picks a random delay below the ceiling with full jitter', () => {
    expect(delayFor(1, { ...policy, jitter: 'full' }, () => 0.5)).toBe(1000)
  })
})

describe('backoff', () => {
  it('returns once a retried call succeeds', async () => {
    const fn = vi.fn()
      .mockRejectedValueOnce(awsError('ThrottlingException', 400))
      .mockRejectedValueOnce(awsError('ThrottlingException', 400))
      .mockResolvedValue('done')

    await expect(backoff(fn, immediate)).resolves.toBe('done')
    expect(fn).toHaveBeenCalledTimes(3)
  })

  it('gives up after the last try', async () => {
    const fn = vi.fn().mockRejectedValue(awsError('ThrottlingException', 400, 'Rate exceeded'))

    await expect(backoff(fn, immediate)).rejects.toThrow('Rate exceeded')
    expect(fn).toHaveBeenCalledTimes(3)
  })

  it('fails at once on an error that is not retryable', async () => {
    const fn = vi.fn().mockRejectedValue(awsError('BadRequestException', 400, 'Invalid stage'))

    await expect(backoff(fn, immediate)).rejects.toThrow('Invalid stage')
    expect(fn).toHaveBeenCalledTimes(1)
  })
})
