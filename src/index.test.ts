import { beforeEach, describe, expect, it } from 'vitest'
import Converger, { ValidationError } from './index'
import { FakeGateway } from '../test/fake-gateway'

const options = { region: 'us-east-1', retry: { delayMs: 0, maxDelayMs: 0 } }

describe('Converger', () => {
  let gateway: FakeGateway

  beforeEach(() => {
    gateway = new FakeGateway()
  })

  it('runs a single task', async () => {
    const converger = new Converger(options, gateway)

    const result = await converger.run({ kind: 'apiKey', params: { name: 'partner', value: 'test-key-value', enabled: true } })

    expect(result).toEqual({
      changed: true,
      resource: { id: 'key1', name: 'partner', enabled: true, value: 'test-key-value', stageKeys: [] }
    })
  })

  it('applies tasks in order so later tasks see earlier resources', async () => {
    const converger = new Converger(options, gateway)

    const results = await converger.apply([
      { kind: 'apiKey', description: 'Partner key', params: { name: 'partner' } },
      { kind: 'usagePlan', params: { name: 'gold' } },
      { kind: 'usagePlanKey', params: { apiKey: 'partner', usagePlan: 'gold' } }
    ])

    expect(results.map(result => result.changed)).toEqual([true, true, true])
    expect(gateway.callsTo('createUsagePlanKey')).toEqual([{ keyId: 'key1', usagePlanId: 'plan2', keyType: 'API_KEY' }])
  })

  it('validates every task before running any', async () => {
    const converger = new Converger(options, gateway)

    await expect(converger.apply([
      { kind: 'apiKey', params: { name: 'partner' } },
      { kind: 'vpcLink', params: {} }
    ])).rejects.toBeInstanceOf(ValidationError)
    expect(gateway.calls).toEqual([])
  })

  it('changes nothing in check mode', async () => {
    const converger = new Converger({ ...options, checkMode: true }, gateway)

    expect(await converger.run({ kind: 'restApi', params: { name: 'orders' } })).toEqual({ changed: true })
    expect(gateway.mutations()).toEqual([])
  })

  it('refuses to run twice at once', async () => {
    const converger = new Converger(options, gateway)

    const first = converger.run({ kind: 'restApi', params: { name: 'orders' } })
    await expect(converger.run({ kind: 'restApi', params: { name: 'orders' } })).rejects.toThrow('Already running')
    await first
  })

  it('lists vpc links', async () => {
    gateway.vpcLinks.set('l1', { id: 'l1', name: 'backend', status: 'AVAILABLE' })
    const converger = new Converger(options, gateway)

    expect(await converger.listVpcLinks()).toEqual({
      changed: false,
      resource: [{ id: 'l1', name: 'backend', status: 'AVAILABLE' }]
    })
  })
})
