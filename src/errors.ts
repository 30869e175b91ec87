/**
 * A task that cannot converge: missing input, an immutable field that differs,
 * or an AWS call that failed after retries.
 */
export class TaskError extends Error {
  readonly details?: Record<string, unknown>

  constructor(message: string, options: { cause?: unknown, details?: Record<string, unknown> } = {}) {
    super(message)
    this.cause = options.cause
    this.name = 'TaskError'
    this.details = options.details
  }
}

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'ConfigurationError'
  }
}

export class ValidationError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid task parameters: ${issues.join('; ')}`)
    this.name = 'ValidationError'
  }
}

/**
 * aws-sdk v2 errors carry the service error name in `code`
 */
export function errorCode(err: unknown): string | undefined {
  if (!err || typeof err !== 'object' || !('code' in err)) {
    return undefined
  }

  return typeof err.code === 'string' ? err.code : undefined
}

export function statusCode(err: unknown): number | undefined {
  if (!err || typeof err !== 'object' || !('statusCode' in err)) {
    return undefined
  }

  return typeof err.statusCode === 'number' ? err.statusCode : undefined
}

export function isNotFound(err: unknown) {
  return errorCode(err) === 'NotFoundException'
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) {
    return err.message || err.name
  }

  return String(err)
}

/**
 * Run a mutating call and wrap any failure with the task's own wording
 */
export async function attempt<T>(message: string, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn()
  } catch (ex) {
    if (ex instanceof TaskError) {
      throw ex
    }

    throw new TaskError(`${message}: ${errorMessage(ex)}`, { cause: ex })
  }
}

/**
 * Run a lookup; NotFoundException means "absent", anything else fails the task
 */
export async function lookup<T>(what: string, fn: () => Promise<T | undefined>): Promise<T | undefined> {
  try {
    return await fn()
  } catch (ex) {
    if (isNotFound(ex)) {
      return undefined
    }

    if (ex instanceof TaskError) {
      throw ex
    }

    throw new TaskError(`Error when getting ${what}: ${errorMessage(ex)}`, { cause: ex })
  }
}
