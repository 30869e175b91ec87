import type * as AWS from 'aws-sdk'
import { converge, ResourceAdapter } from './converge'
import { lookup, TaskError } from './errors'
import type { BasePathMappingParams } from './params'
import { findRestApi } from './rest-api'
import type { PatchOperation, TaskContext, TaskResult } from './types'
import { isBlank, replacePatch } from './util'

type BasePathMapping = AWS.APIGateway.BasePathMapping

export function basePathMappingPatches(params: BasePathMappingParams, restApiId: string | undefined, mapping: BasePathMapping): PatchOperation[] {
  return [
    // The service spells this path differently from the field it sets
    ...replacePatch('/restapiId', restApiId, mapping.restApiId),
    ...replacePatch('/stage', params.stage, mapping.stage)
  ]
}

export function basePathMappingAdapter(params: BasePathMappingParams, ctx: TaskContext, restApiId: string | undefined): ResourceAdapter<BasePathMapping> {
  const { client } = ctx
  const { name: domainName, basePath } = params
  const label = `${domainName}/${basePath}`

  return {
    kind: 'base path mapping',
    label,
    byId: false,
    find: () => lookup('base path mapping', () => client.send(`Get BasePathMapping '${label}'`, gateway => gateway.getBasePathMapping({
      domainName,
      basePath
    }))),
    create: async () => {
      if (!restApiId) {
        throw new TaskError('Rest api name or id is required to create a base path mapping')
      }

      const request: AWS.APIGateway.CreateBasePathMappingRequest = { domainName, restApiId, basePath }
      if (!isBlank(params.stage)) {
        request.stage = params.stage
      }

      return client.send(`Create BasePathMapping '${label}'`, gateway => gateway.createBasePathMapping(request))
    },
    patches: mapping => basePathMappingPatches(params, restApiId, mapping),
    update: (_mapping, patchOperations) => client.send(`Update BasePathMapping '${label}'`, gateway => gateway.updateBasePathMapping({
      domainName,
      basePath,
      patchOperations
    })),
    remove: async () => {
      await client.send(`Delete BasePathMapping '${label}'`, gateway => gateway.deleteBasePathMapping({ domainName, basePath }))
    }
  }
}

export default async function basePathMapping(params: BasePathMappingParams, ctx: TaskContext): Promise<TaskResult<BasePathMapping>> {
  let restApiId = params.restApiId

  if (params.state === 'present' && !restApiId && params.restApi) {
    const restApi = await findRestApi(ctx, { name: params.restApi })
    if (!restApi) {
      throw new TaskError(`Couldn't find rest api '${params.restApi}'`)
    }

    restApiId = restApi.id
  }

  return converge(params.state, basePathMappingAdapter(params, ctx, restApiId), ctx)
}
