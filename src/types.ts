import type * as AWS from 'aws-sdk'
import type { GatewayConfiguration } from './config'
import type { GatewayClient } from './gateway'

export type State = 'present' | 'absent'

export type PatchOperation = AWS.APIGateway.PatchOperation

export interface TaskResult<T> {
  /**
   * Whether the task changed (or, in check mode, would change) anything
   */
  changed: boolean

  /**
   * The resource as AWS reports it after the task.
   * Absent when a check-mode run would have created it, or when nothing exists.
   */
  resource?: T
}

export type TaskContext = {
  client: GatewayClient
  config: GatewayConfiguration
}
