import type * as AWS from 'aws-sdk'
import { converge, ResourceAdapter } from './converge'
import { lookup, TaskError } from './errors'
import type { RestApiParams } from './params'
import type { PatchOperation, TaskContext, TaskResult } from './types'
import { escapePointer, fieldPatch, idOf } from './util'

type RestApi = AWS.APIGateway.RestApi

export async function listRestApis(ctx: TaskContext): Promise<RestApi[]> {
  return ctx.client.collect<RestApi>('Get RestApis', (gateway, position, limit) => gateway.getRestApis({ position, limit }))
}

/**
 * Rest APIs cannot be fetched by name, so every API is listed and searched
 */
export async function findRestApi(ctx: TaskContext, ref: { id?: string, name?: string }): Promise<RestApi | undefined> {
  const { id, name } = ref

  return lookup('rest api', async () => {
    if (id) {
      return ctx.client.send(`Get RestApi '${id}'`, gateway => gateway.getRestApi({ restApiId: id }))
    }

    const apis = await listRestApis(ctx)
    return apis.find(api => api.name === name)
  })
}

/**
 * Matches on either name or id
 */
export async function resolveRestApi(ctx: TaskContext, nameOrId: string): Promise<RestApi | undefined> {
  return lookup('rest api', async () => {
    const apis = await listRestApis(ctx)
    return apis.find(api => api.name === nameOrId || api.id === nameOrId)
  })
}

export function restApiPatches(params: RestApiParams, restApi: RestApi): PatchOperation[] {
  const patches: PatchOperation[] = []

  const desiredType = params.endpointConfiguration ? params.endpointConfiguration.types[0] : undefined
  const currentTypes = (restApi.endpointConfiguration && restApi.endpointConfiguration.types) || []
  const currentType = currentTypes[0]
  if (desiredType && currentType && desiredType !== currentType) {
    patches.push({ op: 'replace', path: `/endpointConfiguration/types/${currentType}`, value: desiredType })
  }

  if (params.binaryMediaTypes) {
    const current = restApi.binaryMediaTypes || []
    for (const type of current) {
      if (!params.binaryMediaTypes.includes(type)) {
        patches.push({ op: 'remove', path: `/binaryMediaTypes/${escapePointer(type)}` })
      }
    }
    for (const type of params.binaryMediaTypes) {
      if (!current.includes(type)) {
        patches.push({ op: 'add', path: `/binaryMediaTypes/${escapePointer(type)}` })
      }
    }
  }

  patches.push(
    ...fieldPatch('/name', params.name, restApi.name),
    ...fieldPatch('/description', params.description, restApi.description),
    ...fieldPatch('/apiKeySource', params.apiKeySource, restApi.apiKeySource),
    ...fieldPatch('/minimumCompressionSize', params.minimumCompressionSize, restApi.minimumCompressionSize),
    ...fieldPatch('/policy', params.policy, restApi.policy),
    ...fieldPatch('/version', params.version, restApi.version)
  )

  return patches
}

export function restApiAdapter(params: RestApiParams, ctx: TaskContext): ResourceAdapter<RestApi> {
  const { client } = ctx

  return {
    kind: 'rest api',
    label: params.name || params.id || '',
    byId: !!params.id,
    find: () => findRestApi(ctx, params),
    create: async () => {
      const { name } = params
      if (!name) {
        throw new TaskError('Rest api name is required to create a rest api')
      }

      const request: AWS.APIGateway.CreateRestApiRequest = {
        name,
        description: params.description,
        apiKeySource: params.apiKeySource,
        binaryMediaTypes: params.binaryMediaTypes,
        endpointConfiguration: params.endpointConfiguration,
        minimumCompressionSize: params.minimumCompressionSize,
        policy: params.policy,
        version: params.version
      }

      if (params.cloneFrom) {
        const source = await resolveRestApi(ctx, params.cloneFrom)
        if (!source) {
          throw new TaskError('Could not find clone_from api', { details: { cloneFrom: params.cloneFrom } })
        }

        request.cloneFrom = source.id
      }

      return client.send(`Create RestApi '${name}'`, gateway => gateway.createRestApi(request))
    },
    patches: restApi => restApiPatches(params, restApi),
    update: (restApi, patchOperations) => client.send(`Update RestApi '${restApi.id}'`, gateway => gateway.updateRestApi({
      restApiId: idOf(restApi, 'rest api'),
      patchOperations
    })),
    remove: async restApi => {
      await client.send(`Delete RestApi '${restApi.id}'`, gateway => gateway.deleteRestApi({ restApiId: idOf(restApi, 'rest api') }))
    }
  }
}

export default function restApi(params: RestApiParams, ctx: TaskContext): Promise<TaskResult<RestApi>> {
  return converge(params.state, restApiAdapter(params, ctx), ctx)
}
