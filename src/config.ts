import { ConfigurationError } from './errors'
import { RETRY_DEFAULTS, RetryPolicy } from './retry'
import * as log from './log'

export interface GatewayConfiguration {
  /**
   * AWS Region
   */
  region: string

  /**
   * AWS Access Key ID
   * Left empty, the SDK's default credential chain applies
   */
  accessKeyId?: string

  /**
   * AWS Secret Access Key
   */
  secretAccessKey?: string

  /**
   * Session token for temporary credentials
   */
  sessionToken?: string

  /**
   * Report what would change without calling any mutating operation
   */
  checkMode: boolean

  retry: RetryPolicy
}

export type GatewayOptions = Partial<Omit<GatewayConfiguration, 'retry'>> & {
  retry?: Partial<RetryPolicy>
}

type Env = NodeJS.ProcessEnv

export function resolveConfig(config: GatewayOptions, env: Env = process.env): GatewayConfiguration {
  let error = false

  const region = config.region || env.AWS_REGION || env.AWS_DEFAULT_REGION || ''
  if (!region) {
    log.error(`Invalid configuration: No 'region' set (AWS_REGION)`)
    error = true
  }

  type Prop = {
    key: 'tries' | 'delayMs' | 'maxDelayMs'
    env: string
  }
  const props: Array<Prop> = [
    { key: 'tries', env: 'GATEWAY_RETRY_TRIES' },
    { key: 'delayMs', env: 'GATEWAY_RETRY_DELAY_MS' },
    { key: 'maxDelayMs', env: 'GATEWAY_RETRY_MAX_DELAY_MS' }
  ]

  const retry: RetryPolicy = { ...RETRY_DEFAULTS, ...config.retry }
  for (const prop of props) {
    const raw = env[prop.env]
    if ((config.retry && config.retry[prop.key] !== undefined) || raw === undefined || raw === '') {
      continue
    }

    const value = Number(raw)
    if (!Number.isInteger(value) || value < 0) {
      log.error(`Invalid configuration: '${prop.env}' must be a non-negative integer`)
      error = true
      continue
    }

    retry[prop.key] = value
  }

  if (error) {
    throw new ConfigurationError('Invalid configuration')
  }

  return {
    region,
    accessKeyId: config.accessKeyId || env.AWS_ACCESS_KEY_ID,
    secretAccessKey: config.secretAccessKey || env.AWS_SECRET_ACCESS_KEY,
    sessionToken: config.sessionToken || env.AWS_SESSION_TOKEN,
    checkMode: config.checkMode !== undefined ? config.checkMode : isTruthy(env.GATEWAY_CHECK_MODE),
    retry
  }
}

function isTruthy(value: string | undefined) {
  return ['1', 'true', 'yes', 'on'].includes((value || '').toLowerCase())
}
