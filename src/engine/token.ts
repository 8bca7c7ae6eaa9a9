/**
 * Authorization-code login, token exchange and refresh
 *
 *   Registered → AuthorizationRequested → AwaitingCode → Exchanging → LoggedIn ⇄ Refreshing
 *   LoggedIn → LoggedOut
 *
 * Every token request authenticates with a fresh private_key_jwt assertion
 * signed by key custody. Tokens are replaced wholesale on each exchange or
 * refresh; the registration record is never modified here.
 */

import type { ApiResult } from '../errors'
import { ErrorCode, fromKeyCustodyError, fromStorage, success, validationError } from '../errors'
import { AssertionSigner } from '../jwt/assertion'
import type { KeyCustody } from '../keys/custody'
import type { CredentialStore } from '../storage/credentials'
import { Endpoints, endpointUrl } from '../transport/client'
import type { TransportClient } from '../transport/client'
import type { DeviceRegistration, TokenResponse, TokenSet, UserInfo } from '../types'
import { OAUTH_SCOPE } from './registration'
import { SingleFlight } from './single-flight'

export interface TokenEngineOptions {
  custody: KeyCustody
  store: CredentialStore
  transport: TransportClient
  redirectUri: string
  /** Lifetime of each client assertion in seconds */
  assertionTtlSeconds?: number
  now?: () => number
  debug?: boolean
}

export class TokenEngine {
  private readonly signer: AssertionSigner
  private readonly store: CredentialStore
  private readonly transport: TransportClient
  private readonly redirectUri: string
  private readonly assertionTtlSeconds: number | undefined
  private readonly now: () => number
  private readonly debug: boolean
  private readonly refreshes = new SingleFlight<ApiResult<TokenSet>>()

  constructor(options: TokenEngineOptions) {
    this.signer = new AssertionSigner(options.custody)
    this.store = options.store
    this.transport = options.transport
    this.redirectUri = options.redirectUri
    this.assertionTtlSeconds = options.assertionTtlSeconds
    this.now = options.now ?? Date.now
    this.debug = options.debug ?? false
  }

  buildAuthorizationUrl(serverUrl: string, clientId: string, state: string, codeChallenge: string): string {
    const params = new URLSearchParams({
      client_id: clientId,
      redirect_uri: this.redirectUri,
      response_type: 'code',
      scope: OAUTH_SCOPE,
      state,
      code_challenge: codeChallenge,
      code_challenge_method: 'S256',
    })
    return `${endpointUrl(serverUrl, Endpoints.authorize)}?${params.toString()}`
  }

  async exchangeCodeForToken(code: string, codeVerifier: string): Promise<ApiResult<TokenSet>> {
    const registered = await this.requireRegistration()
    if (registered.type !== 'success') return registered
    const registration = registered.data

    const assertion = await this.assertionFor(registration)
    if (assertion.type !== 'success') return assertion

    const response = await this.transport.exchangeAuthorizationCode(registration.serverUrl, {
      code,
      redirectUri: this.redirectUri,
      clientId: registration.clientId,
      clientAssertion: assertion.data,
      codeVerifier,
    })
    if (response.type !== 'success') {
      if (this.debug) {
        console.log('[Token] Code exchange failed:', response.type, response.message)
      }
      return response
    }

    const tokens = this.tokenSetFrom(response.data)
    const saved = await this.persist(tokens)
    if (saved.type === 'success' && this.debug) {
      console.log('[Token] Logged in:', { clientId: registration.clientId, hasRefreshToken: !!tokens.refreshToken })
    }
    return saved
  }

  /**
   * Exchange the stored refresh token for a new token set. Concurrent calls
   * share one request. A failed refresh leaves registration and the existing
   * tokens untouched.
   */
  async refreshAccessToken(): Promise<ApiResult<TokenSet>> {
    const registered = await this.requireRegistration()
    if (registered.type !== 'success') return registered
    const registration = registered.data
    return this.refreshes.run(registration.clientId, () => this.refresh(registration))
  }

  /**
   * Fetch the current user, refreshing first when the access token has
   * expired. Refresh failures are returned as they are.
   */
  async getUserInfo(): Promise<ApiResult<UserInfo>> {
    const token = await this.getAccessToken()
    if (token.type !== 'success') return token
    const registered = await this.requireRegistration()
    if (registered.type !== 'success') return registered
    return this.transport.getUserInfo(registered.data.serverUrl, token.data)
  }

  /**
   * Current access token, refreshed when expired.
   */
  async getAccessToken(): Promise<ApiResult<string>> {
    const stored = await this.getTokens()
    if (stored.type !== 'success') return stored
    const tokens = stored.data
    if (!tokens) {
      return validationError(ErrorCode.NotLoggedIn, 'Not logged in')
    }
    if (this.now() < tokens.expiresAtEpochMs) {
      return success(tokens.accessToken)
    }

    if (this.debug) {
      console.log('[Token] Access token expired, refreshing')
    }
    const refreshed = await this.refreshAccessToken()
    if (refreshed.type !== 'success') return refreshed
    return success(refreshed.data.accessToken)
  }

  /** Stored token set as it is, without refreshing. */
  getTokens(): Promise<ApiResult<TokenSet | null>> {
    return fromStorage('Token', 'Could not read tokens', () => this.store.getTokens())
  }

  async isLoggedIn(): Promise<boolean> {
    const tokens = await this.getTokens()
    return tokens.type === 'success' && tokens.data !== null && this.now() < tokens.data.expiresAtEpochMs
  }

  /** Clears tokens only; the device stays registered. */
  async logout(): Promise<ApiResult<true>> {
    const cleared = await fromStorage('Token', 'Could not clear tokens', () => this.store.clearTokens())
    if (cleared.type !== 'success') return cleared
    if (this.debug) {
      console.log('[Token] Logged out')
    }
    return success(true)
  }

  private async requireRegistration(): Promise<ApiResult<DeviceRegistration>> {
    const stored = await fromStorage('Token', 'Could not read registration', () => this.store.getRegistration())
    if (stored.type !== 'success') return stored
    if (!stored.data) {
      return validationError(ErrorCode.NotRegistered, 'Device is not registered')
    }
    return success(stored.data)
  }

  private async refresh(registration: DeviceRegistration): Promise<ApiResult<TokenSet>> {
    const stored = await this.getTokens()
    if (stored.type !== 'success') return stored
    const current = stored.data
    if (!current?.refreshToken) {
      return validationError(ErrorCode.NoRefreshToken, 'No refresh token stored')
    }

    const assertion = await this.assertionFor(registration)
    if (assertion.type !== 'success') return assertion

    const response = await this.transport.refreshToken(registration.serverUrl, {
      refreshToken: current.refreshToken,
      clientId: registration.clientId,
      clientAssertion: assertion.data,
    })
    if (response.type !== 'success') {
      if (this.debug) {
        console.log('[Token] Refresh failed:', response.type, response.message)
      }
      return response
    }

    const tokens = this.tokenSetFrom(response.data, current.refreshToken)
    const saved = await this.persist(tokens)
    if (saved.type === 'success' && this.debug) {
      console.log('[Token] Refreshed:', { rotated: tokens.refreshToken !== current.refreshToken })
    }
    return saved
  }

  private async assertionFor(registration: DeviceRegistration): Promise<ApiResult<string>> {
    try {
      const assertion = await this.signer.buildClientAssertion({
        clientId: registration.clientId,
        tokenEndpoint: endpointUrl(registration.serverUrl, Endpoints.token),
        keyId: registration.keyId,
        now: this.now(),
        ttlSeconds: this.assertionTtlSeconds,
      })
      return success(assertion)
    } catch (error) {
      console.error('[Token] Could not sign client assertion:', error)
      return fromKeyCustodyError(error)
    }
  }

  private tokenSetFrom(response: TokenResponse, previousRefreshToken?: string): TokenSet {
    const tokens: TokenSet = {
      accessToken: response.access_token,
      expiresAtEpochMs: this.now() + response.expires_in * 1000,
    }
    const refreshToken = response.refresh_token ?? previousRefreshToken
    if (refreshToken) tokens.refreshToken = refreshToken
    return tokens
  }

  private async persist(tokens: TokenSet): Promise<ApiResult<TokenSet>> {
    const saved = await fromStorage('Token', 'Could not persist tokens', () => this.store.saveTokens(tokens))
    if (saved.type !== 'success') return saved
    return success(tokens)
  }
}
