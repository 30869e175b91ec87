import type * as AWS from 'aws-sdk'
import { converge, ResourceAdapter } from './converge'
import { lookup, TaskError } from './errors'
import type { ApiKeyParams } from './params'
import type { PatchOperation, TaskContext, TaskResult } from './types'
import { idOf, isBlank, replacePatch } from './util'

type ApiKey = AWS.APIGateway.ApiKey

export async function findApiKey(ctx: TaskContext, ref: { id?: string, name?: string }): Promise<ApiKey | undefined> {
  const { client } = ctx
  const { id, name } = ref

  return lookup('api keys', async () => {
    if (id) {
      return client.send(`Get ApiKey '${id}'`, gateway => gateway.getApiKey({
        apiKey: id,
        includeValue: true
      }))
    }

    // nameQuery is a prefix match
    const keys = await client.collect<ApiKey>('Get ApiKeys', (gateway, position, limit) => gateway.getApiKeys({
      nameQuery: name,
      includeValues: true,
      position,
      limit
    }))
    return keys.find(key => key.name === name)
  })
}

export function apiKeyPatches(params: ApiKeyParams, apiKey: ApiKey): PatchOperation[] {
  if (!isBlank(params.value) && params.value !== apiKey.value) {
    throw new TaskError('Cannot change value after creation')
  }

  return [
    ...replacePatch('/name', params.name, apiKey.name),
    ...replacePatch('/description', params.description, apiKey.description),
    ...replacePatch('/enabled', params.enabled, apiKey.enabled)
  ]
}

export function apiKeyAdapter(params: ApiKeyParams, ctx: TaskContext): ResourceAdapter<ApiKey> {
  const { client } = ctx

  return {
    kind: 'api key',
    label: params.name || params.id || '',
    byId: !!params.id,
    find: () => findApiKey(ctx, params),
    create: async () => {
      const { name } = params
      if (!name) {
        throw new TaskError('Api key name is required to create an api key')
      }

      const request: AWS.APIGateway.CreateApiKeyRequest = {
        name,
        enabled: params.enabled,
        generateDistinctId: params.generateDistinctId
      }
      if (!isBlank(params.description)) {
        request.description = params.description
      }
      if (!isBlank(params.value)) {
        request.value = params.value
      }

      return client.send(`Create ApiKey '${name}'`, gateway => gateway.createApiKey(request))
    },
    patches: apiKey => apiKeyPatches(params, apiKey),
    update: (apiKey, patchOperations) => client.send(`Update ApiKey '${apiKey.id}'`, gateway => gateway.updateApiKey({
      apiKey: idOf(apiKey, 'api key'),
      patchOperations
    })),
    remove: async apiKey => {
      await client.send(`Delete ApiKey '${apiKey.id}'`, gateway => gateway.deleteApiKey({ apiKey: idOf(apiKey, 'api key') }))
    }
  }
}

export default function apiKey(params: ApiKeyParams, ctx: TaskContext): Promise<TaskResult<ApiKey>> {
  return converge(params.state, apiKeyAdapter(params, ctx), ctx)
}
