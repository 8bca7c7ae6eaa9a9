/**
 * PKCE (Proof Key for Code Exchange) utilities
 *
 * Only S256 is supported (plain is deprecated in OAuth 2.1).
 */

import { randomUUID, webcrypto } from 'node:crypto'
import { base64url } from 'jose'

/** 48 random bytes encode to exactly 64 base64url characters */
const VERIFIER_BYTES = 48

/**
 * Generate a cryptographically random code verifier
 *
 * Per RFC 7636 the verifier must be 43–128 characters of
 * [A-Z] / [a-z] / [0-9] / "-" / "." / "_" / "~". Base64url output without
 * padding stays inside that alphabet.
 */
export function newCodeVerifier(): string {
  const bytes = webcrypto.getRandomValues(new Uint8Array(VERIFIER_BYTES))
  return base64url.encode(bytes)
}

/**
 * S256: BASE64URL(SHA256(ASCII(code_verifier)))
 */
export async function codeChallenge(verifier: string): Promise<string> {
  const digest = await webcrypto.subtle.digest('SHA-256', new TextEncoder().encode(verifier))
  return base64url.encode(new Uint8Array(digest))
}

/**
 * Opaque CSRF nonce for the `state` parameter, one per flow invocation.
 */
export function newState(): string {
  return randomUUID()
}

export async function newPkcePair(): Promise<{ verifier: string; challenge: string }> {
  const verifier = newCodeVerifier()
  const challenge = await codeChallenge(verifier)
  return { verifier, challenge }
}
