import { describe, expect, it, vi } from 'vitest'
import { converge, type ResourceAdapter } from './converge'
import { fakeContext } from '../test/fake-gateway'

type Widget = { id: string, colour: string }

function adapter(existing: Widget | undefined, overrides: Partial<ResourceAdapter<Widget>> = {}) {
  const widget: ResourceAdapter<Widget> = {
    kind: 'widget',
    label: 'w1',
    byId: false,
    find: vi.fn(async () => existing),
    create: vi.fn(async () => ({ id: 'w1', colour: 'blue' })),
    patches: vi.fn((current: Widget) => current.colour === 'blue' ? [] : [{ op: 'replace', path: '/colour', value: 'blue' }]),
    update: vi.fn(async (current: Widget) => ({ ...current, colour: 'blue' })),
    remove: vi.fn(async () => undefined),
    ...overrides
  }

  return widget
}

describe('converge', () => {
  it('creates a missing resource', async () => {
    const { ctx } = fakeContext()
    const widgets = adapter(undefined)

    expect(await converge('present', widgets, ctx)).toEqual({ changed: true, resource: { id: 'w1', colour: 'blue' } })
  })

  it('reports a create without calling it in check mode', async () => {
    const { ctx } = fakeContext({ checkMode: true })
    const widgets = adapter(undefined)

    expect(await converge('present', widgets, ctx)).toEqual({ changed: true })
    expect(widgets.create).not.toHaveBeenCalled()
  })

  it('fails instead of creating when looked up by id', async () => {
    const { ctx } = fakeContext()

    await expect(converge('present', adapter(undefined, { byId: true }), ctx)).rejects.toThrow("Couldn't find widget for id")
  })

  it('wraps a failed create', async () => {
    const { ctx } = fakeContext()
    const widgets = adapter(undefined, { create: async () => { throw new Error('LimitExceededException') } })

    await expect(converge('present', widgets, ctx)).rejects.toThrow("Couldn't create widget: LimitExceededException")
  })

  it('patches a resource that differs', async () => {
    const { ctx } = fakeContext()
    const widgets = adapter({ id: 'w1', colour: 'red' })

    expect(await converge('present', widgets, ctx)).toEqual({ changed: true, resource: { id: 'w1', colour: 'blue' } })
    expect(widgets.update).toHaveBeenCalledWith({ id: 'w1', colour: 'red' }, [{ op: 'replace', path: '/colour', value: 'blue' }])
  })

  it('leaves a matching resource alone', async () => {
    const { ctx } = fakeContext()
    const widgets = adapter({ id: 'w1', colour: 'blue' })

    expect(await converge('present', widgets, ctx)).toEqual({ changed: false, resource: { id: 'w1', colour: 'blue' } })
    expect(widgets.update).not.toHaveBeenCalled()
  })

  it('reports a patch without sending it in check mode', async () => {
    const { ctx } = fakeContext({ checkMode: true })
    const widgets = adapter({ id: 'w1', colour: 'red' })

    expect(await converge('present', widgets, ctx)).toEqual({ changed: true, resource: { id: 'w1', colour: 'red' } })
    expect(widgets.update).not.toHaveBeenCalled()
  })

  it('counts a sync as a change', async () => {
    const { ctx } = fakeContext()
    const widgets = adapter({ id: 'w1', colour: 'blue' }, {
      sync: async current => ({ changed: true, resource: current })
    })

    expect((await converge('present', widgets, ctx)).changed).toBe(true)
  })

  it('verifies the converged resource', async () => {
    const { ctx } = fakeContext()
    const widgets = adapter({ id: 'w1', colour: 'blue' }, {
      verify: () => { throw new Error('widget is broken') }
    })

    await expect(converge('present', widgets, ctx)).rejects.toThrow('widget is broken')
  })

  it('deletes an existing resource', async () => {
    const { ctx } = fakeContext()
    const widgets = adapter({ id: 'w1', colour: 'red' })

    expect(await converge('absent', widgets, ctx)).toEqual({ changed: true, resource: { id: 'w1', colour: 'red' } })
    expect(widgets.remove).toHaveBeenCalledWith({ id: 'w1', colour: 'red' })
  })

  it('has nothing to delete when the resource is missing', async () => {
    const { ctx } = fakeContext()
    const widgets = adapter(undefined)

    expect(await converge('absent', widgets, ctx)).toEqual({ changed: false })
    expect(widgets.remove).not.toHaveBeenCalled()
  })

  it('does not delete in check mode', async () => {
    const { ctx } = fakeContext({ checkMode: true })
    const widgets = adapter({ id: 'w1', colour: 'red' })

    expect((await converge('absent', widgets, ctx)).changed).toBe(true)
    expect(widgets.remove).not.toHaveBeenCalled()
  })
})
