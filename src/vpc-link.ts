import type * as AWS from 'aws-sdk'
import { converge, ResourceAdapter } from './converge'
import { lookup, TaskError } from './errors'
import type { VpcLinkParams } from './params'
import type { RetryPolicy } from './retry'
import type { PatchOperation, TaskContext, TaskResult } from './types'
import { idOf, replacePatch, sameMembers } from './util'
import * as log from './log'

type VpcLink = AWS.APIGateway.VpcLink

const BAD_STATES = ['DELETING', 'FAILED']

const LIST_POLICY: Partial<RetryPolicy> = { jitter: 'full' }

export async function listVpcLinks(ctx: TaskContext): Promise<VpcLink[]> {
  return ctx.client.collect<VpcLink>('Get VpcLinks', (gateway, position, limit) => gateway.getVpcLinks({ position, limit }), LIST_POLICY)
}

export async function findVpcLink(ctx: TaskContext, ref: { id?: string, name?: string }): Promise<VpcLink | undefined> {
  const { id, name } = ref

  return lookup('vpc links', async () => {
    if (id) {
      return ctx.client.send(`Get VpcLink '${id}'`, gateway => gateway.getVpcLink({ vpcLinkId: id }))
    }

    const links = await listVpcLinks(ctx)
    return links.find(link => link.name === name)
  })
}

export function vpcLinkPatches(params: VpcLinkParams, link: VpcLink): PatchOperation[] {
  if (params.targetArns && params.targetArns.length > 0 && !sameMembers(params.targetArns, link.targetArns || [])) {
    throw new TaskError('Cannot change target ARNs after creation')
  }

  return [
    ...replacePatch('/name', params.name, link.name),
    ...replacePatch('/description', params.description, link.description)
  ]
}

export function verifyVpcLink(link: VpcLink) {
  if (link.status && BAD_STATES.includes(link.status)) {
    log.error(`VPC link '${link.name}' is ${link.status}: ${link.statusMessage || 'no status message'}`)
    throw new TaskError('VPC link in bad state', { details: { vpcLink: link } })
  }
}

export function vpcLinkAdapter(params: VpcLinkParams, ctx: TaskContext): ResourceAdapter<VpcLink> {
  const { client } = ctx

  return {
    kind: 'vpc link',
    label: params.name || params.id || '',
    byId: !!params.id,
    find: () => findVpcLink(ctx, params),
    create: async () => {
      const { name, targetArns } = params
      if (!name) {
        throw new TaskError('VPC link name is required to create a vpc link')
      }
      if (!targetArns || targetArns.length === 0) {
        throw new TaskError('Target ARNs are required to create a vpc link')
      }

      return client.send(`Create VpcLink '${name}'`, gateway => gateway.createVpcLink({
        name,
        description: params.description,
        targetArns
      }))
    },
    patches: link => vpcLinkPatches(params, link),
    update: (link, patchOperations) => client.send(`Update VpcLink '${link.id}'`, gateway => gateway.updateVpcLink({
      vpcLinkId: idOf(link, 'vpc link'),
      patchOperations
    })),
    remove: async link => {
      await client.send(`Delete VpcLink '${link.id}'`, gateway => gateway.deleteVpcLink({ vpcLinkId: idOf(link, 'vpc link') }))
    },
    verify: verifyVpcLink
  }
}

export default function vpcLink(params: VpcLinkParams, ctx: TaskContext): Promise<TaskResult<VpcLink>> {
  return converge(params.state, vpcLinkAdapter(params, ctx), ctx)
}
