/**
 * Dynamic Client Registration (RFC 7591) for a device without a secret
 *
 *   Unregistered → EnrollmentRequested → AwaitingIat → Registering → Registered
 *
 * The user-agent leg (enrollment page, IAT redirect) is driven by the flow
 * coordinator; this engine owns the registration call itself:
 *
 *   1. Inspect the IAT locally (no request is made for a bad or expired one)
 *   2. Generate a fresh RS256 key pair in key custody
 *   3. Export its public JWKS
 *   4. POST the client metadata to /connect/register with `Bearer <iat>`
 *   5. Persist { serverUrl, clientId, keyId, registeredAt } in one write
 *   6. Delete the key of the registration it replaced, if any
 *
 * Any failure after step 2 deletes the new key before the error is returned.
 */

import type { ApiResult } from '../errors'
import { ErrorCode, fromKeyCustodyError, fromStorage, success, transportError, validationError } from '../errors'
import type { DeviceInfo } from '../config'
import { DEFAULT_CLIENT_NAME, DEFAULT_JWKS_URI, describeDevice, normalizeServerUrl } from '../config'
import { inspectInitialAccessToken } from '../jwt/iat'
import type { KeyCustody } from '../keys/custody'
import type { CredentialStore } from '../storage/credentials'
import { Endpoints, endpointUrl } from '../transport/client'
import type { TransportClient } from '../transport/client'
import type { ClientRegistrationRequest, DeviceRegistration, JWKS } from '../types'
import { SingleFlight } from './single-flight'

export const OAUTH_SCOPE = 'openid profile username'

export interface RegistrationEngineOptions {
  custody: KeyCustody
  store: CredentialStore
  transport: TransportClient
  redirectUri: string
  clientName?: string
  jwksUri?: string
  device?: DeviceInfo
  /** Clock in epoch milliseconds */
  now?: () => number
  debug?: boolean
}

export class RegistrationEngine {
  private readonly custody: KeyCustody
  private readonly store: CredentialStore
  private readonly transport: TransportClient
  private readonly redirectUri: string
  private readonly clientName: string
  private readonly jwksUri: string
  private readonly device: DeviceInfo
  private readonly now: () => number
  private readonly debug: boolean
  private readonly registrations = new SingleFlight<ApiResult<string>>()

  constructor(options: RegistrationEngineOptions) {
    this.custody = options.custody
    this.store = options.store
    this.transport = options.transport
    this.redirectUri = options.redirectUri
    this.clientName = options.clientName ?? DEFAULT_CLIENT_NAME
    this.jwksUri = options.jwksUri ?? DEFAULT_JWKS_URI
    this.device = options.device ?? describeDevice()
    this.now = options.now ?? Date.now
    this.debug = options.debug ?? false
  }

  /**
   * Enrollment page the user-agent opens to obtain an IAT. Pure.
   */
  buildEnrollmentUrl(serverUrl: string, state: string): string {
    const params = new URLSearchParams({
      deviceVersion: this.device.deviceVersion,
      deviceType: this.device.deviceType,
      deviceAttestation: this.device.deviceAttestation,
      redirectUri: this.redirectUri,
      state,
    })
    return `${endpointUrl(serverUrl, Endpoints.enrollDevice)}?${params.toString()}`
  }

  /**
   * Register this device as an OAuth client.
   *
   * Concurrent calls for the same server share one attempt; the IAT is
   * presented at most once and never retained.
   *
   * @returns the issued client_id
   */
  registerDevice(serverUrl: string, iat: string): Promise<ApiResult<string>> {
    const server = normalizeServerUrl(serverUrl)
    return this.registrations.run(server, () => this.register(server, iat))
  }

  /**
   * True only when a registration record exists and its key is still held by
   * key custody (a wiped key store leaves the record orphaned).
   */
  async isDeviceRegistered(): Promise<boolean> {
    const registration = await this.getRegistration()
    if (registration.type !== 'success' || !registration.data) return false
    return this.custody.hasKey(registration.data.keyId)
  }

  getRegistration(): Promise<ApiResult<DeviceRegistration | null>> {
    return fromStorage('DCR', 'Could not read registration', () => this.store.getRegistration())
  }

  /**
   * Delete every managed signing key, the registration, tokens and pending
   * flow state. Nothing stored is read first, so this also recovers from an
   * unreadable credential store. Safe to call when nothing is registered.
   */
  async resetRegistration(): Promise<ApiResult<true>> {
    let keysDeleted = true
    try {
      await this.custody.deleteAllManagedKeys()
    } catch (error) {
      console.error('[DCR] Could not delete signing keys during reset:', error)
      keysDeleted = false
    }

    const cleared = await fromStorage('DCR', 'Could not clear stored credentials', () => this.store.clearAll())
    if (cleared.type !== 'success') return cleared
    if (!keysDeleted) {
      return validationError(ErrorCode.KeyStoreUnavailable, 'Could not delete signing keys', true)
    }

    if (this.debug) {
      console.log('[DCR] Registration reset')
    }
    return success(true)
  }

  /**
   * Connectivity check against the server's system info endpoint.
   */
  probeServer(serverUrl: string): Promise<ApiResult<true>> {
    return this.transport.probeServer(normalizeServerUrl(serverUrl))
  }

  buildRegistrationRequest(jwks: JWKS): ClientRegistrationRequest {
    return {
      client_name: `${this.clientName} - ${this.device.deviceName}`,
      redirect_uris: [this.redirectUri],
      grant_types: ['authorization_code', 'refresh_token'],
      response_types: ['code'],
      token_endpoint_auth_method: 'private_key_jwt',
      token_endpoint_auth_signing_alg: 'RS256',
      scope: OAUTH_SCOPE,
      jwks_uri: this.jwksUri,
      jwks,
    }
  }

  private async register(serverUrl: string, iat: string): Promise<ApiResult<string>> {
    const inspection = inspectInitialAccessToken(iat, this.now())
    if (!inspection.valid) {
      if (this.debug) {
        console.log('[DCR] Rejected IAT before registration:', inspection.error)
      }
      return validationError(ErrorCode.InvalidIat, 'invalid or expired IAT')
    }

    let keyId: string
    try {
      keyId = await this.custody.generateKeyPair()
    } catch (error) {
      console.error('[DCR] Key generation failed:', error)
      return fromKeyCustodyError(error)
    }

    let result: ApiResult<string>
    try {
      result = await this.registerWithKey(serverUrl, iat, keyId)
    } catch (error) {
      result = transportError(error)
    }

    if (result.type !== 'success') {
      await this.discardKey(keyId)
    }
    return result
  }

  private async registerWithKey(serverUrl: string, iat: string, keyId: string): Promise<ApiResult<string>> {
    let jwks: JWKS
    try {
      jwks = await this.custody.exportPublicJwks(keyId)
    } catch (error) {
      return fromKeyCustodyError(error)
    }

    const response = await this.transport.registerClient(serverUrl, iat, this.buildRegistrationRequest(jwks))
    if (response.type !== 'success') {
      if (this.debug) {
        console.log('[DCR] Registration failed:', response.type, response.message)
      }
      return response
    }

    const clientId = response.data.client_id
    const previous = await this.previousKeyId()
    const saved = await fromStorage('DCR', 'Could not persist registration', () =>
      this.store.saveRegistration({
        serverUrl,
        clientId,
        keyId,
        registeredAtEpochMs: this.now(),
      }),
    )
    if (saved.type !== 'success') return saved

    if (previous && previous !== keyId) {
      await this.discardKey(previous, 'superseded registration')
    }
    if (this.debug) {
      console.log('[DCR] Device registered:', { serverUrl, clientId, keyId, replacedKey: !!previous })
    }
    return success(clientId)
  }

  /** Key of the registration about to be replaced. An unreadable record has none we can find. */
  private async previousKeyId(): Promise<string | null> {
    try {
      return await this.store.getKeyId()
    } catch (error) {
      console.error('[DCR] Could not read the previous registration:', error)
      return null
    }
  }

  private async discardKey(keyId: string, reason = 'failed registration'): Promise<void> {
    try {
      await this.custody.deleteKey(keyId)
    } catch (error) {
      console.error(`[DCR] Could not delete key after ${reason}:`, keyId, error)
    }
  }
}
