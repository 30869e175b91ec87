import type { PatchOperation } from './types'
import { TaskError } from './errors'

export function isBlank(value: unknown): value is undefined | null | '' {
  return value === undefined || value === null || value === ''
}

/**
 * `add` when AWS holds no value yet, `replace` when it holds a different one.
 * An unset desired value leaves the field alone.
 */
export function fieldPatch(path: string, desired: string | number | boolean | undefined, current: unknown): PatchOperation[] {
  if (isBlank(desired)) {
    return []
  }

  if (current === undefined || current === null) {
    return [{ op: 'add', path, value: String(desired) }]
  }

  if (current !== desired) {
    return [{ op: 'replace', path, value: String(desired) }]
  }

  return []
}

/**
 * Like fieldPatch, but never `add`: for fields AWS always reports
 */
export function replacePatch(path: string, desired: string | boolean | undefined, current: unknown): PatchOperation[] {
  if (isBlank(desired) || desired === current) {
    return []
  }

  return [{ op: 'replace', path, value: String(desired) }]
}

/**
 * JSON Pointer escaping for a value used as a path segment, e.g. 'image/png' -> 'image~1png'
 */
export function escapePointer(segment: string) {
  return segment
    .replace(/~/g, '~0')
    .replace(/\//g, '~1')
}

export function sameMembers(left: string[], right: string[]) {
  if (left.length !== right.length) {
    return false
  }

  const sorted = [...right].sort()
  return [...left].sort().every((item, index) => item === sorted[index])
}

/**
 * Every resource AWS hands back carries its id; a missing one means a malformed response
 */
export function idOf(resource: { id?: string }, kind: string): string {
  if (!resource.id) {
    throw new TaskError(`AWS returned ${kind} without an id`)
  }

  return resource.id
}
