import Converger from '../../src'
import print from '../../src/print'
import * as log from '../../src/log'
import { errorMessage } from '../../src/errors'
import * as dotenv from 'dotenv'
import * as path from 'path'

dotenv.config({
  path: path.resolve(__dirname, '..', '..', '.env')
})

const converger = new Converger()

async function main() {
  const api = await converger.run({
    kind: 'restApi',
    params: {
      name: 'PartnerQuotes',
      description: 'Quotes for partner integrations',
      endpointConfiguration: { types: ['REGIONAL'] }
    }
  })

  const restApiId = api.resource && 'id' in api.resource ? api.resource.id : undefined
  if (!restApiId) {
    // Check mode: nothing was created to attach a plan to
    return
  }

  await print(converger.apply([
    {
      kind: 'apiKey',
      description: 'Partner key',
      params: { name: 'partner-acme', enabled: true }
    },
    {
      kind: 'usagePlan',
      description: 'Partner plan',
      params: {
        name: 'partner',
        apiStages: [{ restApiId, stage: 'live' }],
        throttleBurstLimit: 20,
        throttleRateLimit: 10,
        quotaLimit: 10000,
        quotaPeriod: 'MONTH'
      }
    },
    {
      kind: 'usagePlanKey',
      description: 'Attach the partner key',
      params: { apiKey: 'partner-acme', usagePlan: 'partner' }
    }
  ]))
}

main().catch(err => {
  log.error(errorMessage(err))
  process.exitCode = 1
})
