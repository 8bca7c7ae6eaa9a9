/**
 * Shared fixtures: IAT minting, a controllable clock, a recording transport,
 * a record backend with unreadable records and an in-process authorization
 * server built on Hono.
 */

import { Hono } from 'hono'
import { base64url, importJWK, jwtVerify } from 'jose'
import { vi } from 'vitest'
import type { DeviceInfo } from '../src/config'
import { success } from '../src/errors'
import { codeChallenge } from '../src/pkce'
import { MemoryRecordBackend } from '../src/storage/credentials'
import type { RecordName } from '../src/storage/credentials'
import type { FetchLike, TransportClient } from '../src/transport/client'
import type { ClientRegistrationRequest, JWKS } from '../src/types'

export const NOW = 1_700_000_000_000
export const SERVER_URL = 'https://auth.test'
export const REDIRECT_URI = 'http://127.0.0.1:8765/oauth/callback'

export const TEST_DEVICE: DeviceInfo = {
  deviceType: 'linux',
  deviceVersion: '20.11.0',
  deviceAttestation: 'node_20',
  deviceName: 'test-host',
}

/**
 * Records named here read back as garbage until they are written or removed,
 * like a record sealed under a master key that has since been replaced.
 */
export class TamperedRecordBackend extends MemoryRecordBackend {
  private readonly tampered: Set<RecordName>

  constructor(...names: RecordName[]) {
    super()
    this.tampered = new Set(names)
  }

  override async read(name: RecordName): Promise<unknown> {
    if (this.tampered.has(name)) return 'not a record'
    return super.read(name)
  }

  override async write(name: RecordName, value: object): Promise<void> {
    this.tampered.delete(name)
    await super.write(name, value)
  }

  override async remove(name: RecordName): Promise<void> {
    this.tampered.delete(name)
    await super.remove(name)
  }
}

/**
 * Unsigned JWT with the given `exp` (epoch seconds). Only its claims are
 * read on the device.
 */
export function makeIat(expEpochSeconds: number, claims: Record<string, unknown> = {}): string {
  const header = base64url.encode(JSON.stringify({ alg: 'RS256', typ: 'JWT' }))
  const payload = base64url.encode(JSON.stringify({ sub: 'enroll', ...claims, exp: expEpochSeconds }))
  return `${header}.${payload}.c2lnbmF0dXJl`
}

export function fakeClock(start = NOW) {
  let current = start
  return {
    now: () => current,
    advance(ms: number) {
      current += ms
    },
  }
}

export function createFakeTransport() {
  return {
    probeServer: vi.fn<TransportClient['probeServer']>(async () => success<true>(true)),
    registerClient: vi.fn<TransportClient['registerClient']>(async () => success({ client_id: 'client_abc' })),
    exchangeAuthorizationCode: vi.fn<TransportClient['exchangeAuthorizationCode']>(async () =>
      success({ access_token: 'access-1', refresh_token: 'refresh-1', expires_in: 3600, token_type: 'Bearer' }),
    ),
    refreshToken: vi.fn<TransportClient['refreshToken']>(async () =>
      success({ access_token: 'access-2', expires_in: 3600, token_type: 'Bearer' }),
    ),
    getUserInfo: vi.fn<TransportClient['getUserInfo']>(async () => success({ id: 'user-1', username: 'alice' })),
  } satisfies TransportClient
}

export type FakeTransport = ReturnType<typeof createFakeTransport>

// ── In-process authorization server ─────────────────────────────────────────

export interface FakeAuthServerOptions {
  initialAccessToken: string
  issuedCode?: string
}

/**
 * Accepts one IAT, registers clients with their inline JWKS and verifies
 * every client assertion and PKCE verifier it receives.
 */
export function createFakeAuthServer(options: FakeAuthServerOptions) {
  const issuedCode = options.issuedCode ?? 'code-1'
  const clients = new Map<string, JWKS>()
  const registrations: ClientRegistrationRequest[] = []
  const tokenRequests: Record<string, string>[] = []
  let expectedChallenge: string | null = null
  let iatUsed = false
  let issued = 0

  const app = new Hono()

  app.get('/api/system/info', (c) => c.json({ name: 'fake-auth' }))

  app.post('/connect/register', async (c) => {
    if (iatUsed || c.req.header('Authorization') !== `Bearer ${options.initialAccessToken}`) {
      return c.json({ error: 'invalid_token', error_description: 'Initial access token rejected' }, 401)
    }
    iatUsed = true
    const body = await c.req.json<ClientRegistrationRequest>()
    registrations.push(body)
    const clientId = `client_${registrations.length}`
    clients.set(clientId, body.jwks)
    return c.json({ client_id: clientId, client_name: body.client_name }, 201)
  })

  app.post('/oauth2/token', async (c) => {
    const form = await c.req.parseBody()
    const fields: Record<string, string> = {}
    for (const [key, value] of Object.entries(form)) {
      if (typeof value === 'string') fields[key] = value
    }
    tokenRequests.push(fields)

    const clientId = fields['client_id'] ?? ''
    const jwk = clients.get(clientId)?.keys[0]
    if (!jwk) return c.json({ error: 'invalid_client', error_description: 'Unknown client' }, 401)
    try {
      await jwtVerify(fields['client_assertion'] ?? '', await importJWK(jwk, 'RS256'), {
        issuer: clientId,
        subject: clientId,
        audience: `${SERVER_URL}/oauth2/token`,
      })
    } catch {
      return c.json({ error: 'invalid_client', error_description: 'Client assertion rejected' }, 401)
    }

    issued += 1
    if (fields['grant_type'] === 'authorization_code') {
      const challenge = await codeChallenge(fields['code_verifier'] ?? '')
      if (fields['code'] !== issuedCode || challenge !== expectedChallenge) {
        return c.json({ error: 'invalid_grant', error_description: 'Code or verifier rejected' }, 400)
      }
      return c.json({ access_token: `access-${issued}`, refresh_token: `refresh-${issued}`, expires_in: 3600, token_type: 'Bearer' })
    }
    if (fields['grant_type'] === 'refresh_token') {
      return c.json({ access_token: `access-${issued}`, expires_in: 3600, token_type: 'Bearer' })
    }
    return c.json({ error: 'unsupported_grant_type' }, 400)
  })

  app.get('/api/me', (c) => {
    const auth = c.req.header('Authorization') ?? ''
    if (!auth.startsWith('Bearer access-')) return c.json({ error: 'invalid_token' }, 401)
    return c.json({ id: 'user-1', username: 'alice', displayName: 'Alice' })
  })

  const fetch: FetchLike = async (input, init) => app.request(input, init)

  return {
    app,
    fetch,
    registrations,
    tokenRequests,
    /** Record the challenge the authorization endpoint would have seen */
    expectChallenge(challenge: string) {
      expectedChallenge = challenge
    },
  }
}
