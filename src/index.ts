import type * as AWS from 'aws-sdk'
import { resolveConfig, GatewayConfiguration, GatewayOptions } from './config'
import { createGateway, GatewayClient, Gateway } from './gateway'
import { parseTask, parseTasks, Task, TaskInput } from './params'
import type { TaskContext, TaskResult } from './types'
import * as log from './log'

import apiKey from './api-key'
import basePathMapping from './base-path-mapping'
import domainName from './domain-name'
import restApi from './rest-api'
import usagePlan from './usage-plan'
import usagePlanKey from './usage-plan-key'
import vpcLink, { listVpcLinks } from './vpc-link'

export type { GatewayConfiguration, GatewayOptions } from './config'
export type { Gateway } from './gateway'
export type { Task, TaskInput, TaskKind } from './params'
export type { TaskResult } from './types'
export { ConfigurationError, TaskError, ValidationError } from './errors'
export { parseTask, parseTasks } from './params'

export type Resource =
  | AWS.APIGateway.ApiKey
  | AWS.APIGateway.DomainName
  | AWS.APIGateway.RestApi
  | AWS.APIGateway.UsagePlan
  | AWS.APIGateway.UsagePlanKey
  | AWS.APIGateway.BasePathMapping
  | AWS.APIGateway.VpcLink

export default class Converger {
  private running = false
  private gateway?: Gateway
  private options: GatewayOptions

  constructor(options: GatewayOptions = {}, gateway?: Gateway) {
    this.options = options
    this.gateway = gateway
  }

  async run(input: TaskInput | Task): Promise<TaskResult<Resource>> {
    const task = parseTask(input)
    return this.exclusive(ctx => execute(task, ctx))
  }

  /**
   * Runs tasks in order and stops at the first failure
   */
  async apply(input: Array<TaskInput | Task>): Promise<Array<TaskResult<Resource>>> {
    const tasks = parseTasks(input)
    return this.exclusive(async ctx => {
      const results: Array<TaskResult<Resource>> = []
      for (const task of tasks) {
        if (task.description) {
          log.info(`>>>>>>>>> ${task.description}`)
        }

        results.push(await execute(task, ctx))
      }

      return results
    })
  }

  async listVpcLinks(): Promise<TaskResult<AWS.APIGateway.VpcLink[]>> {
    return this.exclusive(async ctx => ({
      changed: false,
      resource: await listVpcLinks(ctx)
    }))
  }

  /**
   * Runs cannot happen concurrently on one instance of the Converger
   */
  private async exclusive<T>(fn: (ctx: TaskContext) => Promise<T>): Promise<T> {
    if (this.running) {
      throw new Error('Already running')
    }

    // This will throw if the configuration is not valid
    const config = resolveConfig(this.options)

    try {
      this.running = true
      return await fn(this.context(config))
    } finally {
      this.running = false
    }
  }

  private context(config: GatewayConfiguration): TaskContext {
    if (!this.gateway) {
      this.gateway = createGateway(config)
    }

    return {
      config,
      client: new GatewayClient(this.gateway, config.retry)
    }
  }
}

export function execute(task: Task, ctx: TaskContext): Promise<TaskResult<Resource>> {
  switch (task.kind) {
    case 'apiKey':
      return apiKey(task.params, ctx)
    case 'domainName':
      return domainName(task.params, ctx)
    case 'restApi':
      return restApi(task.params, ctx)
    case 'usagePlan':
      return usagePlan(task.params, ctx)
    case 'usagePlanKey':
      return usagePlanKey(task.params, ctx)
    case 'basePathMapping':
      return basePathMapping(task.params, ctx)
    case 'vpcLink':
      return vpcLink(task.params, ctx)
  }
}
