import { describe, it, expect } from 'vitest'
import { anyScopeGranted, scopeCoveredByGrant, scopeMatchesPattern } from './match.js'

describe('scopeMatchesPattern', () => {
  it('matches exact scope', () => {
    expect(scopeMatchesPattern('tags.create', 'tags.create')).toBe(true)
  })

  it('matches module wildcard', () => {
    expect(scopeMatchesPattern('tags.create', 'tags.*')).toBe(true)
  })

  it('matches global wildcard', () => {
    expect(scopeMatchesPattern('tags.create', '*')).toBe(true)
  })

  it('rejects a different module wildcard', () => {
    expect(scopeMatchesPattern('tags.create', 'notes.*')).toBe(false)
  })

  it('does not treat a module prefix as a wildcard', () => {
    expect(scopeMatchesPattern('date_tags.create', 'date.*')).toBe(false)
  })

  it('rejects a different exact scope', () => {
    expect(scopeMatchesPattern('tags.create', 'tags.delete')).toBe(false)
  })
})

describe('scopeCoveredByGrant', () => {
  it('returns true when any pattern matches', () => {
    expect(scopeCoveredByGrant('tags.create', ['notes.*', 'tags.*'])).toBe(true)
  })

  it('returns false when no pattern matches', () => {
    expect(scopeCoveredByGrant('tags.create', ['notes.*', 'users.*'])).toBe(false)
  })

  it('returns false for empty grant scopes', () => {
    expect(scopeCoveredByGrant('tags.create', [])).toBe(false)
  })
})

describe('anyScopeGranted', () => {
  it('passes when nothing is required', () => {
    expect(anyScopeGranted(null, [])).toBe(true)
    expect(anyScopeGranted([], [])).toBe(true)
  })

  it('needs only one of the required scopes', () => {
    expect(anyScopeGranted(['tags.update', 'tags.create'], ['tags.create'])).toBe(true)
  })

  it('fails when none is granted', () => {
    expect(anyScopeGranted(['tags.create'], ['tags.retrieve'])).toBe(false)
  })
})
