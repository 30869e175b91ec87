import { TaskError, ValidationError, errorMessage } from './errors'
import * as log from './log'

export type Output = (line: string) => void

export const stdout: Output = line => {
  process.stdout.write(`${line}\n`)
}

/**
 * Writes the settled result as JSON, or a `{ failed, msg }` document and rethrows
 */
export default async function print<T>(promise: Promise<T>, message?: string, write: Output = stdout): Promise<T> {
  if (message) {
    log.info(`>>>>>>>>> ${message}`)
  }

  let result: T
  try {
    result = await promise
  } catch (ex) {
    write(log.stringify(failure(ex)))
    throw ex
  }

  write(log.stringify(result))
  return result
}

export function failure(ex: unknown) {
  if (ex instanceof ValidationError) {
    return { failed: true, msg: ex.message, issues: ex.issues }
  }

  if (ex instanceof TaskError && ex.details) {
    return { failed: true, msg: ex.message, ...ex.details }
  }

  return { failed: true, msg: errorMessage(ex) }
}
