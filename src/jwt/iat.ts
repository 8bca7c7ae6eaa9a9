/**
 * Local inspection of Initial Access Tokens
 *
 * The IAT is verified by the registration endpoint, not here: the device
 * has no key to check its signature with. Locally we only refuse tokens that
 * are unparsable or already expired, so no network call is spent on them.
 */

import { decodeJwt, type JWTPayload } from 'jose'

export type IatInspection =
  | { valid: true; payload: JWTPayload; expiresAtEpochMs: number }
  | { valid: false; error: string }

/**
 * @param now - epoch milliseconds
 */
export function inspectInitialAccessToken(iat: string, now: number): IatInspection {
  let payload: JWTPayload
  try {
    payload = decodeJwt(iat.trim())
  } catch {
    return { valid: false, error: 'IAT is not a JWT' }
  }

  if (typeof payload.exp !== 'number') {
    return { valid: false, error: 'IAT has no exp claim' }
  }

  const expiresAtEpochMs = payload.exp * 1000
  if (expiresAtEpochMs <= now) {
    return { valid: false, error: 'IAT has expired' }
  }

  return { valid: true, payload, expiresAtEpochMs }
}
