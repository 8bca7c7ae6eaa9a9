import { describe, it, expect } from 'vitest'
import { isDuration, isTokenResponse } from '../src/guards'

describe('isDuration', () => {
  it('accepts finite non-negative numbers', () => {
    expect(isDuration(0)).toBe(true)
    expect(isDuration(3600)).toBe(true)
  })

  it('rejects infinite, negative and non-numeric values', () => {
    expect(isDuration(Number.POSITIVE_INFINITY)).toBe(false)
    expect(isDuration(-1)).toBe(false)
    expect(isDuration(Number.NaN)).toBe(false)
    expect(isDuration('3600')).toBe(false)
  })
})

describe('isTokenResponse', () => {
  it('accepts a minimal token response', () => {
    expect(isTokenResponse({ access_token: 'access-1', expires_in: 3600 })).toBe(true)
  })

  it('rejects lifetimes that cannot produce a usable expiry', () => {
    expect(isTokenResponse({ access_token: 'access-1', expires_in: Number.POSITIVE_INFINITY })).toBe(false)
    expect(isTokenResponse({ access_token: 'access-1', expires_in: -30 })).toBe(false)
  })
})
