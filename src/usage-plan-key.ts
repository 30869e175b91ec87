import type * as AWS from 'aws-sdk'
import { findApiKey } from './api-key'
import { converge, ResourceAdapter } from './converge'
import { lookup, TaskError } from './errors'
import type { UsagePlanKeyParams } from './params'
import type { TaskContext, TaskResult } from './types'
import { findUsagePlan } from './usage-plan'

type UsagePlanKey = AWS.APIGateway.UsagePlanKey

export type UsagePlanKeyRef = {
  apiKeyId: string | undefined
  usagePlanId: string | undefined
}

/**
 * Names are resolved to ids; an id given directly is trusted as is
 */
export async function resolveUsagePlanKey(params: UsagePlanKeyParams, ctx: TaskContext): Promise<UsagePlanKeyRef> {
  let apiKeyId = params.apiKeyId
  if (!apiKeyId) {
    const apiKey = await findApiKey(ctx, { name: params.apiKey })
    apiKeyId = apiKey && apiKey.id
  }

  let usagePlanId = params.usagePlanId
  if (!usagePlanId) {
    const usagePlan = await findUsagePlan(ctx, { name: params.usagePlan })
    usagePlanId = usagePlan && usagePlan.id
  }

  return { apiKeyId, usagePlanId }
}

export function usagePlanKeyAdapter(params: UsagePlanKeyParams, ctx: TaskContext, keyId: string, usagePlanId: string): ResourceAdapter<UsagePlanKey> {
  const { client } = ctx

  return {
    kind: 'usage plan key',
    label: `${usagePlanId}/${keyId}`,
    byId: false,
    find: () => lookup('usage plan key', () => client.send(`Get UsagePlanKey '${usagePlanId}/${keyId}'`, gateway => gateway.getUsagePlanKey({
      keyId,
      usagePlanId
    }))),
    create: () => client.send(`Create UsagePlanKey '${usagePlanId}/${keyId}'`, gateway => gateway.createUsagePlanKey({
      keyId,
      usagePlanId,
      keyType: params.keyType
    })),

    // Membership only: there is nothing to update
    patches: () => [],
    update: async usagePlanKey => usagePlanKey,
    remove: async () => {
      await client.send(`Delete UsagePlanKey '${usagePlanId}/${keyId}'`, gateway => gateway.deleteUsagePlanKey({
        keyId,
        usagePlanId
      }))
    }
  }
}

export default async function usagePlanKey(params: UsagePlanKeyParams, ctx: TaskContext): Promise<TaskResult<UsagePlanKey>> {
  const { apiKeyId, usagePlanId } = await resolveUsagePlanKey(params, ctx)

  if (!apiKeyId || !usagePlanId) {
    // A key or plan that does not exist cannot be associated
    if (params.state === 'absent') {
      return { changed: false }
    }

    const missing = !apiKeyId
      ? `api key '${params.apiKey}'`
      : `usage plan '${params.usagePlan}'`
    throw new TaskError(`Couldn't find ${missing}`)
  }

  return converge(params.state, usagePlanKeyAdapter(params, ctx, apiKeyId, usagePlanId), ctx)
}
