import { describe, it, expect } from 'vitest'
import { codeChallenge, newCodeVerifier, newPkcePair, newState } from '../src/pkce'

describe('PKCE', () => {
  describe('newCodeVerifier', () => {
    it('is 64 characters long', () => {
      expect(newCodeVerifier()).toHaveLength(64)
    })

    it('only contains unreserved URI characters', () => {
      // RFC 7636: [A-Z] / [a-z] / [0-9] / "-" / "." / "_" / "~"
      expect(newCodeVerifier()).toMatch(/^[A-Za-z0-9\-._~]+$/)
    })

    it('generates unique verifiers', () => {
      expect(newCodeVerifier()).not.toBe(newCodeVerifier())
    })
  })

  describe('codeChallenge', () => {
    it('matches the RFC 7636 Appendix B vector', async () => {
      const challenge = await codeChallenge('dBjftJeZ4CVP-mJ92K9KGHnXZK6SCoY3gWNVpg6aDR4')
      expect(challenge).toBe('E9Melhoa2OwvFrEMTJguCHaoeK1t8URWbuS7ps-OK1k')
    })

    it('is deterministic', async () => {
      const verifier = newCodeVerifier()
      expect(await codeChallenge(verifier)).toBe(await codeChallenge(verifier))
    })

    it('is unpadded base64url of a SHA-256 digest', async () => {
      const challenge = await codeChallenge(newCodeVerifier())
      expect(challenge).toHaveLength(43)
      expect(challenge).not.toMatch(/[+/=]/)
    })
  })

  describe('newState', () => {
    it('is a random UUID', () => {
      expect(newState()).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/)
      expect(newState()).not.toBe(newState())
    })
  })

  describe('newPkcePair', () => {
    it('returns a challenge derived from its verifier', async () => {
      const { verifier, challenge } = await newPkcePair()
      expect(challenge).toBe(await codeChallenge(verifier))
    })
  })
})
