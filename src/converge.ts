import { attempt, TaskError } from './errors'
import type { PatchOperation, State, TaskContext, TaskResult } from './types'
import * as log from './log'

/**
 * Everything the lookup, diff and patch cycle needs to know about one resource kind
 */
export interface ResourceAdapter<T> {
  /**
   * E.g. 'api key', used in log lines and error messages
   */
  kind: string

  /**
   * E.g. the resource name, used in log lines
   */
  label: string

  /**
   * The task identified the resource by id, so a miss is an error rather than a create
   */
  byId: boolean

  find(): Promise<T | undefined>
  create(): Promise<T>
  patches(existing: T): PatchOperation[]
  update(existing: T, patches: PatchOperation[]): Promise<T>
  remove(existing: T): Promise<void>

  /**
   * Reconciliation that is not expressed as patch operations, such as tags
   */
  sync?(existing: T): Promise<{ changed: boolean, resource: T }>

  /**
   * Post-conditions on the converged resource
   */
  verify?(resource: T): void
}

export async function converge<T>(state: State, adapter: ResourceAdapter<T>, ctx: TaskContext): Promise<TaskResult<T>> {
  return state === 'present'
    ? ensurePresent(adapter, ctx)
    : ensureAbsent(adapter, ctx)
}

export async function ensurePresent<T>(adapter: ResourceAdapter<T>, ctx: TaskContext): Promise<TaskResult<T>> {
  const { checkMode } = ctx.config
  const existing = await adapter.find()

  if (!existing) {
    if (adapter.byId) {
      throw new TaskError(`Couldn't find ${adapter.kind} for id`)
    }

    log.info(`Create ${adapter.kind} '${adapter.label}'${checkMode ? ' (check mode)' : ''}`)
    if (checkMode) {
      return { changed: true }
    }

    const created = await attempt(`Couldn't create ${adapter.kind}`, () => adapter.create())
    log.debug(log.stringify(created))
    if (adapter.verify) {
      adapter.verify(created)
    }
    return { changed: true, resource: created }
  }

  let changed = false
  let resource: T = existing

  if (adapter.sync) {
    const synced = await adapter.sync(resource)
    changed = synced.changed
    resource = synced.resource
  }

  const patches = adapter.patches(resource)
  if (patches.length > 0) {
    changed = true
    log.info(`Update ${adapter.kind} '${adapter.label}'${checkMode ? ' (check mode)' : ''}`)
    log.debug(log.stringify(patches))

    if (!checkMode) {
      const current = resource
      resource = await attempt(`Couldn't update ${adapter.kind}`, () => adapter.update(current, patches))
      log.debug(log.stringify(resource))
    }
  }

  if (adapter.verify) {
    adapter.verify(resource)
  }
  return { changed, resource }
}

export async function ensureAbsent<T>(adapter: ResourceAdapter<T>, ctx: TaskContext): Promise<TaskResult<T>> {
  const { checkMode } = ctx.config
  const existing = await adapter.find()

  if (!existing) {
    return { changed: false }
  }

  log.info(`Delete ${adapter.kind} '${adapter.label}'${checkMode ? ' (check mode)' : ''}`)
  if (!checkMode) {
    await attempt(`Couldn't delete ${adapter.kind}`, () => adapter.remove(existing))
  }

  return { changed: true, resource: existing }
}
