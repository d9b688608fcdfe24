import { describe, it, expect } from 'vitest'
import { ZodError } from 'zod'
import { ScopePatternSchema, formatScope, parseScope } from './parse.js'

describe('parseScope', () => {
  it('parses module and subject', () => {
    expect(parseScope('tags.create')).toEqual({
      module: 'tags',
      subject: 'create',
      raw: 'tags.create',
    })
  })

  it('allows underscores in segments', () => {
    expect(parseScope('date_tags.retrieve').module).toBe('date_tags')
  })

  it('rejects a single segment', () => {
    expect(() => parseScope('tags')).toThrow(ZodError)
  })

  it('rejects three segments', () => {
    expect(() => parseScope('tags.create.all')).toThrow(ZodError)
  })

  it('rejects uppercase', () => {
    expect(() => parseScope('Tags.Create')).toThrow(ZodError)
  })

  it('rejects segment starting with digit', () => {
    expect(() => parseScope('1tags.create')).toThrow(ZodError)
  })
})

describe('ScopePatternSchema', () => {
  it('accepts concrete scopes and wildcards', () => {
    expect(ScopePatternSchema.safeParse('tags.create').success).toBe(true)
    expect(ScopePatternSchema.safeParse('tags.*').success).toBe(true)
    expect(ScopePatternSchema.safeParse('*').success).toBe(true)
  })

  it('rejects partial wildcards', () => {
    expect(ScopePatternSchema.safeParse('*.create').success).toBe(false)
    expect(ScopePatternSchema.safeParse('tags').success).toBe(false)
    expect(ScopePatternSchema.safeParse('tags.cre*').success).toBe(false)
  })
})

describe('formatScope', () => {
  it('joins module and subject', () => {
    expect(formatScope('api', 'ping')).toBe('api.ping')
  })
})
