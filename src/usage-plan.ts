import type * as AWS from 'aws-sdk'
import { converge, ResourceAdapter } from './converge'
import { lookup, TaskError } from './errors'
import type { UsagePlanParams } from './params'
import type { PatchOperation, TaskContext, TaskResult } from './types'
import { fieldPatch, idOf } from './util'
import type { RetryPolicy } from './retry'

type UsagePlan = AWS.APIGateway.UsagePlan

// Stage changes propagate slowly and the service throttles updates hard
const UPDATE_POLICY: Partial<RetryPolicy> = { delayMs: 10000 }

export async function listUsagePlans(ctx: TaskContext): Promise<UsagePlan[]> {
  return ctx.client.collect<UsagePlan>('Get UsagePlans', (gateway, position, limit) => gateway.getUsagePlans({ position, limit }))
}

export async function findUsagePlan(ctx: TaskContext, ref: { id?: string, name?: string }): Promise<UsagePlan | undefined> {
  const { id, name } = ref

  return lookup('usage plans', async () => {
    if (id) {
      return ctx.client.send(`Get UsagePlan '${id}'`, gateway => gateway.getUsagePlan({ usagePlanId: id }))
    }

    const plans = await listUsagePlans(ctx)
    return plans.find(plan => plan.name === name)
  })
}

/**
 * API stages are addressed as '<restApiId>:<stage>' in patch operations
 */
export function stageKeys(stages: AWS.APIGateway.ApiStage[] | undefined): string[] {
  return (stages || []).map(stage => `${stage.apiId}:${stage.stage}`)
}

export function removeStagePatches(current: string[], keep: string[]): PatchOperation[] {
  return current
    .filter(stage => !keep.includes(stage))
    .map(stage => ({ op: 'remove', path: '/apiStages', value: stage }))
}

function hasThrottle(params: UsagePlanParams) {
  return params.throttleBurstLimit !== undefined || params.throttleRateLimit !== undefined
}

function hasQuota(params: UsagePlanParams) {
  return params.quotaLimit !== undefined || params.quotaOffset !== undefined || params.quotaPeriod !== undefined
}

export function usagePlanPatches(params: UsagePlanParams, plan: UsagePlan): PatchOperation[] {
  const patches: PatchOperation[] = []
  const current = stageKeys(plan.apiStages)
  const desired = params.apiStages.map(stage => `${stage.restApiId}:${stage.stage}`)

  // Stages go first: a stage may carry its own throttling
  if (params.purgeApiStages) {
    patches.push(...removeStagePatches(current, desired))
  }

  if (plan.throttle && params.purgeThrottle && !hasThrottle(params)) {
    patches.push({ op: 'remove', path: '/throttle' })
  }

  if (plan.quota && params.purgeQuota && !hasQuota(params)) {
    patches.push({ op: 'remove', path: '/quota' })
  }

  const quota: AWS.APIGateway.QuotaSettings = plan.quota || {}
  const throttle: AWS.APIGateway.ThrottleSettings = plan.throttle || {}
  patches.push(
    ...fieldPatch('/description', params.description, plan.description),
    ...fieldPatch('/quota/limit', params.quotaLimit, quota.limit),
    ...fieldPatch('/quota/period', params.quotaPeriod, quota.period),
    ...fieldPatch('/quota/offset', params.quotaOffset, quota.offset),
    ...fieldPatch('/throttle/burstLimit', params.throttleBurstLimit, throttle.burstLimit),
    ...fieldPatch('/throttle/rateLimit', params.throttleRateLimit, throttle.rateLimit)
  )

  for (const stage of desired) {
    if (!current.includes(stage)) {
      patches.push({ op: 'add', path: '/apiStages', value: stage })
    }
  }

  return patches
}

export function createUsagePlanRequest(params: UsagePlanParams): AWS.APIGateway.CreateUsagePlanRequest {
  const { name } = params
  if (!name) {
    throw new TaskError('Usage plan name is required to create a usage plan')
  }

  const request: AWS.APIGateway.CreateUsagePlanRequest = {
    name,
    apiStages: params.apiStages.map(stage => ({ apiId: stage.restApiId, stage: stage.stage }))
  }

  if (params.description) {
    request.description = params.description
  }

  if (hasThrottle(params)) {
    request.throttle = {
      burstLimit: params.throttleBurstLimit,
      rateLimit: params.throttleRateLimit
    }
  }

  if (hasQuota(params)) {
    request.quota = {
      limit: params.quotaLimit,
      offset: params.quotaOffset,
      period: params.quotaPeriod
    }
  }

  return request
}

export function usagePlanAdapter(params: UsagePlanParams, ctx: TaskContext): ResourceAdapter<UsagePlan> {
  const { client } = ctx

  const update = (plan: UsagePlan, patchOperations: PatchOperation[]) => client.send(
    `Update UsagePlan '${plan.id}'`,
    gateway => gateway.updateUsagePlan({ usagePlanId: idOf(plan, 'usage plan'), patchOperations }),
    UPDATE_POLICY
  )

  return {
    kind: 'usage plan',
    label: params.name || params.id || '',
    byId: !!params.id,
    find: () => findUsagePlan(ctx, params),
    create: async () => {
      const request = createUsagePlanRequest(params)
      return client.send(`Create UsagePlan '${request.name}'`, gateway => gateway.createUsagePlan(request))
    },
    patches: plan => usagePlanPatches(params, plan),
    update,
    remove: async plan => {
      // AWS refuses to delete a plan that still has api stages
      const patches = removeStagePatches(stageKeys(plan.apiStages), [])
      if (patches.length > 0) {
        await update(plan, patches)
      }

      await client.send(`Delete UsagePlan '${plan.id}'`, gateway => gateway.deleteUsagePlan({ usagePlanId: idOf(plan, 'usage plan') }))
    }
  }
}

export default function usagePlan(params: UsagePlanParams, ctx: TaskContext): Promise<TaskResult<UsagePlan>> {
  return converge(params.state, usagePlanAdapter(params, ctx), ctx)
}
