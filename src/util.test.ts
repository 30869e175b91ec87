import { describe, expect, it } from 'vitest'
import { escapePointer, fieldPatch, idOf, replacePatch, sameMembers } from './util'

describe('fieldPatch', () => {
  it('adds a value AWS does not hold yet', () => {
    expect(fieldPatch('/description', 'Orders', undefined)).toEqual([{ op: 'add', path: '/description', value: 'Orders' }])
  })

  it('replaces a different value', () => {
    expect(fieldPatch('/quota/limit', 500, 100)).toEqual([{ op: 'replace', path: '/quota/limit', value: '500' }])
  })

  it('leaves a matching or unset value alone', () => {
    expect(fieldPatch('/quota/limit', 100, 100)).toEqual([])
    expect(fieldPatch('/description', undefined, 'Orders')).toEqual([])
    expect(fieldPatch('/description', '', 'Orders')).toEqual([])
  })
})

describe('replacePatch', () => {
  it('never adds', () => {
    expect(replacePatch('/enabled', true, undefined)).toEqual([{ op: 'replace', path: '/enabled', value: 'true' }])
    expect(replacePatch('/enabled', false, false)).toEqual([])
  })
})

it('escapes JSON pointer segments', () => {
  expect(escapePointer('application/vnd~v1')).toBe('application~1vnd~0v1')
})

it('compares members regardless of order', () => {
  expect(sameMembers(['a', 'b'], ['b', 'a'])).toBe(true)
  expect(sameMembers(['a', 'b'], ['a'])).toBe(false)
  expect(sameMembers(['a', 'a'], ['a', 'b'])).toBe(false)
})

it('requires an id', () => {
  expect(idOf({ id: 'k1' }, 'api key')).toBe('k1')
  expect(() => idOf({}, 'api key')).toThrow('AWS returned api key without an id')
})
