import { beforeEach, describe, expect, it } from 'vitest'
import apiKey, { apiKeyPatches } from './api-key'
import { TaskError } from './errors'
import { apiKeyParams } from './params'
import { FakeGateway, fakeContext } from '../test/fake-gateway'
import type { TaskContext } from './types'

const params = (input: object) => apiKeyParams.parse(input)

describe('api key', () => {
  let gateway: FakeGateway
  let ctx: TaskContext

  beforeEach(() => {
    ({ gateway, ctx } = fakeContext())
  })

  it('creates a key when none matches the name', async () => {
    const result = await apiKey(params({ name: 'partner', description: 'Partner access', enabled: true, value: 'test-secret-value-0000' }), ctx)

    expect(result.changed).toBe(true)
    expect(result.resource).toMatchObject({ id: 'key1', name: 'partner', enabled: true })
    expect(gateway.callsTo('createApiKey')).toEqual([{
      name: 'partner',
      description: 'Partner access',
      enabled: true,
      generateDistinctId: false,
      value: 'test-secret-value-0000'
    }])
  })

  it('leaves out unset optional fields on create', async () => {
    await apiKey(params({ name: 'bare' }), ctx)

    expect(gateway.callsTo('createApiKey')).toEqual([{ name: 'bare', enabled: false, generateDistinctId: false }])
  })

  it('matches names exactly rather than by prefix', async () => {
    gateway.apiKeys.set('k1', { id: 'k1', name: 'partner-staging', enabled: true })

    const result = await apiKey(params({ name: 'partner', enabled: true }), ctx)

    expect(result.changed).toBe(true)
    expect(gateway.mutations()).toEqual(['createApiKey'])
  })

  it('reports no change when the key already matches', async () => {
    gateway.apiKeys.set('k1', { id: 'k1', name: 'partner', description: 'Partner access', enabled: true, value: 'v' })

    const result = await apiKey(params({ name: 'partner', description: 'Partner access', enabled: true }), ctx)

    expect(result).toEqual({
      changed: false,
      resource: { id: 'k1', name: 'partner', description: 'Partner access', enabled: true, value: 'v' }
    })
    expect(gateway.mutations()).toEqual([])
  })

  it('patches description and enabled', async () => {
    gateway.apiKeys.set('k1', { id: 'k1', name: 'partner', description: 'old', enabled: true })

    const result = await apiKey(params({ name: 'partner', description: 'new' }), ctx)

    expect(result.changed).toBe(true)
    expect(gateway.callsTo('updateApiKey')).toEqual([{
      apiKey: 'k1',
      patchOperations: [
        { op: 'replace', path: '/description', value: 'new' },
        { op: 'replace', path: '/enabled', value: 'false' }
      ]
    }])
    expect(result.resource).toMatchObject({ description: 'new', enabled: false })
  })

  it('renames a key found by id', async () => {
    gateway.apiKeys.set('k1', { id: 'k1', name: 'old-name', enabled: false })

    await apiKey(params({ id: 'k1', name: 'new-name' }), ctx)

    expect(gateway.callsTo('getApiKey')).toEqual([{ apiKey: 'k1', includeValue: true }])
    expect(gateway.callsTo('updateApiKey')).toEqual([{
      apiKey: 'k1',
      patchOperations: [{ op: 'replace', path: '/name', value: 'new-name' }]
    }])
  })

  it('fails when an id does not exist', async () => {
    await expect(apiKey(params({ id: 'missing' }), ctx)).rejects.toThrow("Couldn't find api key for id")
    expect(gateway.mutations()).toEqual([])
  })

  it('refuses to change the key value', () => {
    const existing = { id: 'k1', name: 'partner', enabled: false, value: 'first' }

    expect(() => apiKeyPatches(params({ name: 'partner', value: 'second' }), existing)).toThrow(TaskError)
    expect(() => apiKeyPatches(params({ name: 'partner', value: 'second' }), existing)).toThrow('Cannot change value after creation')
  })

  it('deletes a key that exists', async () => {
    gateway.apiKeys.set('k1', { id: 'k1', name: 'partner' })

    const result = await apiKey(params({ name: 'partner', state: 'absent' }), ctx)

    expect(result.changed).toBe(true)
    expect(gateway.callsTo('deleteApiKey')).toEqual([{ apiKey: 'k1' }])
    expect(gateway.apiKeys.size).toBe(0)
  })

  it('reports no change when deleting a key that does not exist', async () => {
    const result = await apiKey(params({ name: 'partner', state: 'absent' }), ctx)

    expect(result).toEqual({ changed: false })
  })

  it('does not call mutating operations in check mode', async () => {
    const check = fakeContext({ checkMode: true })
    check.gateway.apiKeys.set('k1', { id: 'k1', name: 'partner', enabled: true })

    const updated = await apiKey(params({ name: 'partner', enabled: false }), check.ctx)
    const created = await apiKey(params({ name: 'other' }), check.ctx)

    expect(updated).toEqual({ changed: true, resource: { id: 'k1', name: 'partner', enabled: true } })
    expect(created).toEqual({ changed: true })
    expect(check.gateway.mutations()).toEqual([])
  })

  it('wraps lookup failures other than not found', async () => {
    gateway.failNext('getApiKeys', Object.assign(new Error('User is not authorized'), { code: 'AccessDeniedException', statusCode: 403 }))

    await expect(apiKey(params({ name: 'partner' }), ctx)).rejects.toThrow('Error when getting api keys: User is not authorized')
  })
})
