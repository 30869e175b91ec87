import type * as AWS from 'aws-sdk'
import { converge, ResourceAdapter } from './converge'
import { attempt, lookup, TaskError } from './errors'
import type { DomainNameParams } from './params'
import type { PatchOperation, TaskContext, TaskResult } from './types'
import { isBlank, replacePatch } from './util'
import * as log from './log'

type DomainName = AWS.APIGateway.DomainName
type Tags = { [key: string]: string }

export function domainNameArn(region: string, name: string) {
  return `arn:aws:apigateway:${region}::/domainnames/${name}`
}

/**
 * Tags to set (new or changed values) and tag keys to remove (only when purging)
 */
export function compareTags(current: Tags, desired: Tags, purge: boolean) {
  const toTag: Tags = {}
  for (const [key, value] of Object.entries(desired)) {
    if (current[key] !== value) {
      toTag[key] = value
    }
  }

  const toUntag = purge
    ? Object.keys(current).filter(key => !(key in desired))
    : []

  return { toTag, toUntag }
}

export async function findDomainName(ctx: TaskContext, name: string): Promise<DomainName | undefined> {
  return lookup('domain name', () => ctx.client.send(`Get DomainName '${name}'`, gateway => gateway.getDomainName({
    domainName: name
  })))
}

export function domainNamePatches(params: DomainNameParams, domain: DomainName): PatchOperation[] {
  return [
    ...replacePatch('/certificateArn', params.certArn, domain.certificateArn),
    ...replacePatch('/certificateName', params.certName, domain.certificateName),
    ...replacePatch('/securityPolicy', params.securityPolicy, domain.securityPolicy)
  ]
}

export function domainNameAdapter(params: DomainNameParams, ctx: TaskContext): ResourceAdapter<DomainName> {
  const { client, config } = ctx
  const { name } = params

  return {
    kind: 'domain name',
    label: name,
    byId: false,
    find: () => findDomainName(ctx, name),
    create: async () => {
      const request: AWS.APIGateway.CreateDomainNameRequest = { domainName: name }
      if (!isBlank(params.certArn)) {
        request.certificateArn = params.certArn
      } else if (!isBlank(params.certName)) {
        request.certificateName = params.certName
      } else {
        throw new TaskError('Certificate ARN or name is required to create a domain name')
      }

      if (params.securityPolicy) {
        request.securityPolicy = params.securityPolicy
      }
      if (params.tags) {
        request.tags = params.tags
      }

      // Certificate validation makes creation slow to settle
      return client.send(`Create DomainName '${name}'`, gateway => gateway.createDomainName(request), {
        delayMs: 15000,
        maxDelayMs: 120000
      })
    },
    sync: async domain => {
      if (!params.tags) {
        return { changed: false, resource: domain }
      }

      const resourceArn = domainNameArn(config.region, name)
      const { toTag, toUntag } = compareTags(domain.tags || {}, params.tags, params.purgeTags)
      const changed = Object.keys(toTag).length > 0 || toUntag.length > 0
      if (!changed) {
        return { changed, resource: domain }
      }

      log.info(`Tag domain name '${name}'${config.checkMode ? ' (check mode)' : ''}`)
      if (config.checkMode) {
        return { changed, resource: domain }
      }

      await attempt(`Couldn't tag domain name`, async () => {
        if (Object.keys(toTag).length > 0) {
          await client.send(`Tag '${resourceArn}'`, gateway => gateway.tagResource({ resourceArn, tags: toTag }))
        }
        if (toUntag.length > 0) {
          await client.send(`Untag '${resourceArn}'`, gateway => gateway.untagResource({ resourceArn, tagKeys: toUntag }))
        }
      })

      const refreshed = await findDomainName(ctx, name)
      return { changed, resource: refreshed || domain }
    },
    patches: domain => domainNamePatches(params, domain),
    update: (_domain, patchOperations) => client.send(`Update DomainName '${name}'`, gateway => gateway.updateDomainName({
      domainName: name,
      patchOperations
    })),
    remove: async () => {
      await client.send(`Delete DomainName '${name}'`, gateway => gateway.deleteDomainName({ domainName: name }))
    }
  }
}

export default function domainName(params: DomainNameParams, ctx: TaskContext): Promise<TaskResult<DomainName>> {
  return converge(params.state, domainNameAdapter(params, ctx), ctx)
}
