import { describe, expect, it } from 'vitest'
import { ReferenceIndex } from '../ReferenceIndex'
import { UpstreamSanitizer } from '../UpstreamSanitizer'
import { createRecord } from './test-utils'

describe('ReferenceIndex.build', () => {
  it('contains every ref name', () => {
    const index = ReferenceIndex.build([createRecord('main'), createRecord('feature')])

    expect(index.has('refs/heads/main')).toBe(true)
    expect(index.has('refs/heads/feature')).toBe(true)
    expect(index.has('refs/heads/other')).toBe(false)
    expect(index.size).toBe(2)
  })

  it('is empty for no records', () => {
    expect(ReferenceIndex.build([]).size).toBe(0)
  })
})

describe('UpstreamSanitizer', () => {
  const index = new Set(['refs/heads/main', 'refs/heads/feature'])

  it('keeps an upstream that names a known branch', () => {
    const record = createRecord('feature', { tracks: 'main' })

    expect(UpstreamSanitizer.sanitize(record, index)).toBe(record)
  })

  it('returns a record without upstream unchanged', () => {
    const record = createRecord('main')

    expect(UpstreamSanitizer.sanitize(record, index)).toBe(record)
  })

  it('clears an upstream missing from the index and keeps the other fields', () => {
    const record = createRecord('feature', {
      upstreamRef: 'refs/remotes/origin/feature',
      upstreamDisplayName: 'origin/feature',
      upstreamTrackInfo: '[behind 3]'
    })

    const sanitized = UpstreamSanitizer.sanitize(record, index)

    expect(sanitized).toEqual({ ...record, upstreamRef: '' })
    expect(sanitized.upstreamDisplayName).toBe('origin/feature')
    expect(sanitized.upstreamTrackInfo).toBe('[behind 3]')
    expect(record.upstreamRef).toBe('refs/remotes/origin/feature')
  })

  it('is idempotent', () => {
    const records = [
      createRecord('main'),
      createRecord('feature', { tracks: 'main' }),
      createRecord('orphan', { tracks: 'deleted' })
    ]

    const once = UpstreamSanitizer.sanitizeAll(records)
    const twice = UpstreamSanitizer.sanitizeAll(once)

    expect(twice).toEqual(once)
    expect(once.map((r) => r.upstreamRef)).toEqual(['', 'refs/heads/main', ''])
  })

  it('indexes the whole input before sanitizing', () => {
    // child listed before the branch it tracks
    const records = [createRecord('feature', { tracks: 'main' }), createRecord('main')]

    expect(UpstreamSanitizer.sanitizeAll(records)[0].upstreamRef).toBe('refs/heads/main')
  })
})
