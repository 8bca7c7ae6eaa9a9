/**
 * private_key_jwt client assertions (RFC 7523 Section 2.2)
 *
 * The assertion is assembled here and signed through key custody, so the
 * private key never leaves it. Every call mints a fresh `jti` and fresh
 * timestamps; assertions are never cached or reused.
 */

import { randomUUID } from 'node:crypto'
import { base64url } from 'jose'
import type { KeyCustody } from '../keys/custody'

export const CLIENT_ASSERTION_TYPE = 'urn:ietf:params:oauth:client-assertion-type:jwt-bearer'
export const DEFAULT_ASSERTION_TTL_SECONDS = 60

export interface ClientAssertionOptions {
  clientId: string
  /** Token endpoint URL, used as `aud` */
  tokenEndpoint: string
  keyId: string
  /** Epoch milliseconds */
  now: number
  ttlSeconds?: number
}

export interface ClientAssertionClaims {
  iss: string
  sub: string
  aud: string
  iat: number
  exp: number
  jti: string
}

export class AssertionSigner {
  constructor(private readonly custody: KeyCustody) {}

  /**
   * @throws KeyNotFoundError when the key id is unknown to custody
   */
  async buildClientAssertion(options: ClientAssertionOptions): Promise<string> {
    const { clientId, tokenEndpoint, keyId, now, ttlSeconds = DEFAULT_ASSERTION_TTL_SECONDS } = options
    const issuedAt = Math.floor(now / 1000)

    const header = { alg: 'RS256' as const, typ: 'JWT' as const, kid: keyId }
    const claims: ClientAssertionClaims = {
      iss: clientId,
      sub: clientId,
      aud: tokenEndpoint,
      iat: issuedAt,
      exp: issuedAt + ttlSeconds,
      jti: randomUUID(),
    }

    const headerB64 = base64url.encode(JSON.stringify(header))
    const payloadB64 = base64url.encode(JSON.stringify(claims))
    const signingInput = `${headerB64}.${payloadB64}`

    const signature = await this.custody.sign(keyId, new TextEncoder().encode(signingInput))
    return `${signingInput}.${base64url.encode(signature)}`
  }
}
