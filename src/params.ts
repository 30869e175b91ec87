import { z } from 'zod'
import { ValidationError } from './errors'

const state = z.enum(['present', 'absent']).default('present')
const identifier = z.string().min(1)

export const apiKeyParams = z.object({
  id: identifier.optional(),
  name: identifier.optional(),
  description: z.string().optional(),

  /**
   * Required for create; cannot change afterwards
   */
  value: z.string().optional(),
  enabled: z.boolean().default(false),
  generateDistinctId: z.boolean().default(false),
  state
}).strict()
  .refine(params => params.id || params.name, { message: 'Api key name or id is required', path: ['name'] })

export const domainNameParams = z.object({
  name: identifier,
  certArn: z.string().optional(),
  certName: z.string().optional(),
  securityPolicy: z.enum(['TLS_1_0', 'TLS_1_2']).optional(),
  tags: z.record(z.string()).optional(),
  purgeTags: z.boolean().default(false),
  state
}).strict()
  .refine(params => !(params.certArn && params.certName), { message: 'certArn and certName are mutually exclusive', path: ['certName'] })

const endpointType = z.enum(['REGIONAL', 'EDGE', 'PRIVATE'])

export const restApiParams = z.object({
  id: identifier.optional(),
  name: identifier.optional(),
  description: z.string().optional(),
  apiKeySource: z.enum(['HEADER', 'AUTHORIZER']).optional(),
  binaryMediaTypes: z.array(z.string().min(1)).optional(),

  /**
   * Name or id of an existing API to copy on create
   */
  cloneFrom: identifier.optional(),
  endpointConfiguration: z.object({
    types: z.array(endpointType).min(1)
  }).strict().optional(),
  minimumCompressionSize: z.number().int().min(0).max(10485760).optional(),
  policy: z.string().optional(),
  version: z.string().optional(),
  state
}).strict()
  .refine(params => params.id || params.name, { message: 'Rest api name or id is required', path: ['name'] })

const apiStage = z.object({
  restApiId: identifier,
  stage: identifier
}).strict()

export const usagePlanParams = z.object({
  id: identifier.optional(),
  name: identifier.optional(),
  description: z.string().optional(),
  apiStages: z.array(apiStage).default([]),
  purgeApiStages: z.boolean().default(true),
  throttleBurstLimit: z.number().int().min(0).optional(),
  throttleRateLimit: z.number().min(0).optional(),
  purgeThrottle: z.boolean().default(true),
  quotaLimit: z.number().int().min(0).optional(),
  quotaOffset: z.number().int().min(0).optional(),
  quotaPeriod: z.enum(['DAY', 'WEEK', 'MONTH']).optional(),
  purgeQuota: z.boolean().default(true),
  state
}).strict()
  .refine(params => params.id || params.name, { message: 'Usage plan name or id is required', path: ['name'] })

export const usagePlanKeyParams = z.object({
  apiKeyId: identifier.optional(),
  apiKey: identifier.optional(),
  usagePlanId: identifier.optional(),
  usagePlan: identifier.optional(),
  keyType: z.enum(['API_KEY']).default('API_KEY'),
  state
}).strict()
  .refine(params => !params.apiKeyId !== !params.apiKey, { message: 'Exactly one of apiKeyId or apiKey is required', path: ['apiKey'] })
  .refine(params => !params.usagePlanId !== !params.usagePlan, { message: 'Exactly one of usagePlanId or usagePlan is required', path: ['usagePlan'] })

export const basePathMappingParams = z.object({
  /**
   * The custom domain name the mapping belongs to
   */
  name: identifier,
  restApiId: identifier.optional(),
  restApi: identifier.optional(),
  basePath: identifier.default('(none)'),
  stage: z.string().optional(),
  state
}).strict()
  .refine(params => !(params.restApiId && params.restApi), { message: 'restApiId and restApi are mutually exclusive', path: ['restApi'] })

export const vpcLinkParams = z.object({
  id: identifier.optional(),
  name: identifier.optional(),
  description: z.string().optional(),
  targetArns: z.array(identifier).optional(),
  state
}).strict()
  .refine(params => params.id || params.name, { message: 'VPC link name or id is required', path: ['name'] })

export type ApiKeyParams = z.infer<typeof apiKeyParams>
export type DomainNameParams = z.infer<typeof domainNameParams>
export type RestApiParams = z.infer<typeof restApiParams>
export type UsagePlanParams = z.infer<typeof usagePlanParams>
export type UsagePlanKeyParams = z.infer<typeof usagePlanKeyParams>
export type BasePathMappingParams = z.infer<typeof basePathMappingParams>
export type VpcLinkParams = z.infer<typeof vpcLinkParams>

const description = z.string().optional()

export const task = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('apiKey'), description, params: apiKeyParams }),
  z.object({ kind: z.literal('domainName'), description, params: domainNameParams }),
  z.object({ kind: z.literal('restApi'), description, params: restApiParams }),
  z.object({ kind: z.literal('usagePlan'), description, params: usagePlanParams }),
  z.object({ kind: z.literal('usagePlanKey'), description, params: usagePlanKeyParams }),
  z.object({ kind: z.literal('basePathMapping'), description, params: basePathMappingParams }),
  z.object({ kind: z.literal('vpcLink'), description, params: vpcLinkParams })
])

export type Task = z.infer<typeof task>
export type TaskInput = z.input<typeof task>
export type TaskKind = Task['kind']

export function parseTask(input: unknown): Task {
  const parsed = task.safeParse(input)
  if (!parsed.success) {
    throw new ValidationError(issues(parsed.error))
  }

  return parsed.data
}

export function parseTasks(input: unknown): Task[] {
  const parsed = z.array(task).safeParse(input)
  if (!parsed.success) {
    throw new ValidationError(issues(parsed.error))
  }

  return parsed.data
}

function issues(error: z.ZodError) {
  return error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
}
