/**
 * Core data structures for device enrollment, registration and tokens.
 *
 * Wire shapes use the snake_case field names of RFC 7591 / RFC 6749;
 * persisted and in-process shapes use camelCase.
 */

// ============================================================================
// Persisted state
// ============================================================================

/**
 * Result of a successful Dynamic Client Registration.
 * `clientId` and `keyId` are always present together.
 */
export interface DeviceRegistration {
  serverUrl: string
  clientId: string
  /** `kid` of the signing key held by key custody */
  keyId: string
  registeredAtEpochMs: number
}

export interface TokenSet {
  accessToken: string
  refreshToken?: string
  expiresAtEpochMs: number
}

export type FlowKind = 'enrollment' | 'login'

/**
 * In-flight enrollment or login attempt. One per flow kind; consumed once.
 */
export interface PendingFlowState {
  /** CSRF nonce echoed back by the redirect */
  state: string
  /** PKCE verifier (login only) */
  codeVerifier?: string
  /** Server being enrolled with (enrollment only) */
  pendingServerUrl?: string
}

// ============================================================================
// Keys
// ============================================================================

export interface JWKSPublicKey {
  kty: 'RSA'
  kid: string
  use: 'sig'
  alg: 'RS256'
  n: string
  e: string
}

export interface JWKS {
  keys: JWKSPublicKey[]
}

/**
 * Opaque reference to a private key inside key custody.
 * Carries no key bytes and renders as a redacted marker when serialized.
 */
export interface PrivateKeyHandle {
  readonly keyId: string
  toJSON(): string
  toString(): string
}

export interface KeyMaterial {
  keyId: string
  publicKey: JWKSPublicKey
  privateKeyHandle: PrivateKeyHandle
  hardwareBacked: boolean
}

// ============================================================================
// Wire types
// ============================================================================

/**
 * Client metadata sent to `/connect/register` (RFC 7591 Section 2)
 */
export interface ClientRegistrationRequest {
  client_name: string
  redirect_uris: string[]
  grant_types: string[]
  response_types: string[]
  token_endpoint_auth_method: 'private_key_jwt'
  token_endpoint_auth_signing_alg: 'RS256'
  scope: string
  jwks_uri?: string
  jwks: JWKS
}

/**
 * Client information response (RFC 7591 Section 3.2.1)
 */
export interface ClientRegistrationResponse {
  client_id: string
  client_id_issued_at?: number
  client_name?: string
  redirect_uris?: string[]
  grant_types?: string[]
  response_types?: string[]
  token_endpoint_auth_method?: string
  scope?: string
}

/**
 * Token endpoint response (RFC 6749 Section 5.1)
 */
export interface TokenResponse {
  access_token: string
  token_type?: string
  expires_in: number
  refresh_token?: string
  scope?: string
}

/**
 * Authenticated user as returned by `/api/me`
 */
export interface UserInfo {
  id: string
  username: string
  displayName?: string
  email?: string
}

export interface AuthorizationCodeGrant {
  code: string
  redirectUri: string
  clientId: string
  clientAssertion: string
  codeVerifier: string
}

export interface RefreshTokenGrant {
  refreshToken: string
  clientId: string
  clientAssertion: string
}
