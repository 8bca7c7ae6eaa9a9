import { decodeProtectedHeader, importJWK, jwtVerify } from 'jose'
import { describe, it, expect, beforeAll } from 'vitest'
import { KeyNotFoundError } from '../src/errors'
import { AssertionSigner, DEFAULT_ASSERTION_TTL_SECONDS } from '../src/jwt/assertion'
import { inspectInitialAccessToken } from '../src/jwt/iat'
import { SoftwareKeyCustody } from '../src/keys/custody'
import { MemoryKeyVault } from '../src/keys/vault'
import { NOW, makeIat } from './helpers'

const TOKEN_ENDPOINT = 'https://auth.test/oauth2/token'

describe('AssertionSigner', () => {
  let custody: SoftwareKeyCustody
  let signer: AssertionSigner
  let keyId: string

  beforeAll(async () => {
    custody = new SoftwareKeyCustody(new MemoryKeyVault())
    signer = new AssertionSigner(custody)
    keyId = await custody.generateKeyPair()
  })

  async function verify(assertion: string) {
    const [jwk] = (await custody.exportPublicJwks(keyId)).keys
    if (!jwk) throw new Error('no public key')
    return jwtVerify(assertion, await importJWK(jwk, 'RS256'), {
      audience: TOKEN_ENDPOINT,
      issuer: 'client_abc',
      currentDate: new Date(NOW),
    })
  }

  it('builds an RS256 assertion that verifies against the exported JWKS', async () => {
    const assertion = await signer.buildClientAssertion({
      clientId: 'client_abc',
      tokenEndpoint: TOKEN_ENDPOINT,
      keyId,
      now: NOW,
    })

    const { payload, protectedHeader } = await verify(assertion)
    expect(protectedHeader).toEqual({ alg: 'RS256', typ: 'JWT', kid: keyId })
    expect(payload).toEqual({
      iss: 'client_abc',
      sub: 'client_abc',
      aud: TOKEN_ENDPOINT,
      iat: NOW / 1000,
      exp: NOW / 1000 + DEFAULT_ASSERTION_TTL_SECONDS,
      jti: expect.stringMatching(/^[0-9a-f-]{36}$/),
    })
  })

  it('floors iat to whole seconds', async () => {
    const assertion = await signer.buildClientAssertion({
      clientId: 'client_abc',
      tokenEndpoint: TOKEN_ENDPOINT,
      keyId,
      now: NOW + 999,
    })
    const { payload } = await verify(assertion)
    expect(payload.iat).toBe(NOW / 1000)
  })

  it('honours a custom lifetime', async () => {
    const assertion = await signer.buildClientAssertion({
      clientId: 'client_abc',
      tokenEndpoint: TOKEN_ENDPOINT,
      keyId,
      now: NOW,
      ttlSeconds: 300,
    })
    const { payload } = await verify(assertion)
    expect(payload.exp).toBe(NOW / 1000 + 300)
  })

  it('mints a fresh jti on every call', async () => {
    const options = { clientId: 'client_abc', tokenEndpoint: TOKEN_ENDPOINT, keyId, now: NOW }
    const first = await verify(await signer.buildClientAssertion(options))
    const second = await verify(await signer.buildClientAssertion(options))
    expect(first.payload.jti).not.toBe(second.payload.jti)
  })

  it('carries the key id in the header', async () => {
    const assertion = await signer.buildClientAssertion({
      clientId: 'client_abc',
      tokenEndpoint: TOKEN_ENDPOINT,
      keyId,
      now: NOW,
    })
    expect(decodeProtectedHeader(assertion).kid).toBe(keyId)
  })

  it('rejects unknown keys', async () => {
    await expect(
      signer.buildClientAssertion({
        clientId: 'client_abc',
        tokenEndpoint: TOKEN_ENDPOINT,
        keyId: '00000000-0000-4000-8000-000000000000',
        now: NOW,
      }),
    ).rejects.toBeInstanceOf(KeyNotFoundError)
  })
})

describe('inspectInitialAccessToken', () => {
  it('accepts a token that expires in the future', () => {
    const result = inspectInitialAccessToken(makeIat(NOW / 1000 + 600), NOW)
    expect(result).toMatchObject({ valid: true, expiresAtEpochMs: NOW + 600_000 })
  })

  it('rejects an expired token', () => {
    expect(inspectInitialAccessToken(makeIat(NOW / 1000 - 1), NOW)).toEqual({ valid: false, error: 'IAT has expired' })
  })

  it('treats exp equal to now as expired', () => {
    expect(inspectInitialAccessToken(makeIat(NOW / 1000), NOW)).toEqual({ valid: false, error: 'IAT has expired' })
  })

  it('rejects a token without exp', () => {
    const header = Buffer.from(JSON.stringify({ alg: 'none' })).toString('base64url')
    const payload = Buffer.from(JSON.stringify({ sub: 'enroll' })).toString('base64url')
    expect(inspectInitialAccessToken(`${header}.${payload}.`, NOW)).toEqual({
      valid: false,
      error: 'IAT has no exp claim',
    })
  })

  it('rejects something that is not a JWT', () => {
    expect(inspectInitialAccessToken('not-a-jwt', NOW)).toEqual({ valid: false, error: 'IAT is not a JWT' })
  })

  it('ignores surrounding whitespace', () => {
    expect(inspectInitialAccessToken(`  ${makeIat(NOW / 1000 + 60)}\n`, NOW).valid).toBe(true)
  })
})
