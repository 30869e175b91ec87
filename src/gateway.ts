import * as AWS from 'aws-sdk'
import type { GatewayConfiguration } from './config'
import { backoff, RetryPolicy } from './retry'
import * as log from './log'

/**
 * What aws-sdk v2 hands back from every operation: a request that becomes a promise
 */
export type Pending<T> = { promise(): Promise<T> }

/**
 * The slice of AWS.APIGateway the tasks call.
 * AWS.APIGateway satisfies it; tests supply an in-memory fake.
 */
export interface Gateway {
  getApiKey(params: AWS.APIGateway.GetApiKeyRequest): Pending<AWS.APIGateway.ApiKey>
  getApiKeys(params: AWS.APIGateway.GetApiKeysRequest): Pending<AWS.APIGateway.ApiKeys>
  createApiKey(params: AWS.APIGateway.CreateApiKeyRequest): Pending<AWS.APIGateway.ApiKey>
  updateApiKey(params: AWS.APIGateway.UpdateApiKeyRequest): Pending<AWS.APIGateway.ApiKey>
  deleteApiKey(params: AWS.APIGateway.DeleteApiKeyRequest): Pending<unknown>

  getDomainName(params: AWS.APIGateway.GetDomainNameRequest): Pending<AWS.APIGateway.DomainName>
  createDomainName(params: AWS.APIGateway.CreateDomainNameRequest): Pending<AWS.APIGateway.DomainName>
  updateDomainName(params: AWS.APIGateway.UpdateDomainNameRequest): Pending<AWS.APIGateway.DomainName>
  deleteDomainName(params: AWS.APIGateway.DeleteDomainNameRequest): Pending<unknown>
  tagResource(params: AWS.APIGateway.TagResourceRequest): Pending<unknown>
  untagResource(params: AWS.APIGateway.UntagResourceRequest): Pending<unknown>

  getRestApi(params: AWS.APIGateway.GetRestApiRequest): Pending<AWS.APIGateway.RestApi>
  getRestApis(params: AWS.APIGateway.GetRestApisRequest): Pending<AWS.APIGateway.RestApis>
  createRestApi(params: AWS.APIGateway.CreateRestApiRequest): Pending<AWS.APIGateway.RestApi>
  updateRestApi(params: AWS.APIGateway.UpdateRestApiRequest): Pending<AWS.APIGateway.RestApi>
  deleteRestApi(params: AWS.APIGateway.DeleteRestApiRequest): Pending<unknown>

  getUsagePlan(params: AWS.APIGateway.GetUsagePlanRequest): Pending<AWS.APIGateway.UsagePlan>
  getUsagePlans(params: AWS.APIGateway.GetUsagePlansRequest): Pending<AWS.APIGateway.UsagePlans>
  createUsagePlan(params: AWS.APIGateway.CreateUsagePlanRequest): Pending<AWS.APIGateway.UsagePlan>
  updateUsagePlan(params: AWS.APIGateway.UpdateUsagePlanRequest): Pending<AWS.APIGateway.UsagePlan>
  deleteUsagePlan(params: AWS.APIGateway.DeleteUsagePlanRequest): Pending<unknown>

  getUsagePlanKey(params: AWS.APIGateway.GetUsagePlanKeyRequest): Pending<AWS.APIGateway.UsagePlanKey>
  createUsagePlanKey(params: AWS.APIGateway.CreateUsagePlanKeyRequest): Pending<AWS.APIGateway.UsagePlanKey>
  deleteUsagePlanKey(params: AWS.APIGateway.DeleteUsagePlanKeyRequest): Pending<unknown>

  getBasePathMapping(params: AWS.APIGateway.GetBasePathMappingRequest): Pending<AWS.APIGateway.BasePathMapping>
  createBasePathMapping(params: AWS.APIGateway.CreateBasePathMappingRequest): Pending<AWS.APIGateway.BasePathMapping>
  updateBasePathMapping(params: AWS.APIGateway.UpdateBasePathMappingRequest): Pending<AWS.APIGateway.BasePathMapping>
  deleteBasePathMapping(params: AWS.APIGateway.DeleteBasePathMappingRequest): Pending<unknown>

  getVpcLink(params: AWS.APIGateway.GetVpcLinkRequest): Pending<AWS.APIGateway.VpcLink>
  getVpcLinks(params: AWS.APIGateway.GetVpcLinksRequest): Pending<AWS.APIGateway.VpcLinks>
  createVpcLink(params: AWS.APIGateway.CreateVpcLinkRequest): Pending<AWS.APIGateway.VpcLink>
  updateVpcLink(params: AWS.APIGateway.UpdateVpcLinkRequest): Pending<AWS.APIGateway.VpcLink>
  deleteVpcLink(params: AWS.APIGateway.DeleteVpcLinkRequest): Pending<unknown>
}

export function createGateway(config: GatewayConfiguration): Gateway {
  const options: AWS.APIGateway.ClientConfiguration = {
    apiVersion: '2015-07-09',
    region: config.region
  }

  if (config.accessKeyId && config.secretAccessKey) {
    options.credentials = new AWS.Credentials({
      accessKeyId: config.accessKeyId,
      secretAccessKey: config.secretAccessKey,
      sessionToken: config.sessionToken
    })
  }

  return new AWS.APIGateway(options)
}

/**
 * One page of a list operation: `items` plus the `position` of the next page
 */
type Page<T> = { items?: T[], position?: string }

const PAGE_SIZE = 500

export class GatewayClient {
  constructor(readonly gateway: Gateway, readonly retry: RetryPolicy) { }

  async send<T>(label: string, call: (gateway: Gateway) => Pending<T>, policy: Partial<RetryPolicy> = {}): Promise<T> {
    log.debug(label)
    return backoff(() => call(this.gateway).promise(), { ...this.retry, ...policy }, label)
  }

  /**
   * List operations cannot filter by name, so every page is fetched and searched
   */
  async collect<T>(
    label: string,
    page: (gateway: Gateway, position: string | undefined, limit: number) => Pending<Page<T>>,
    policy: Partial<RetryPolicy> = {}
  ): Promise<T[]> {
    const items: T[] = []
    let position: string | undefined

    do {
      const current = await this.send(label, gateway => page(gateway, position, PAGE_SIZE), policy)
      if (current.items) {
        items.push(...current.items)
      }

      position = current.position
    } while (position)

    return items
  }
}
