/**
 * Enrollment and login flows across the user-agent redirect
 *
 * Each flow stores a pending entry (CSRF `state`, plus the PKCE verifier for
 * login) before the browser is sent off, and consumes it exactly once when
 * the redirect comes back. A callback whose `state` does not match is
 * rejected without calling either engine; the user restarts the flow.
 */

import type { ApiResult, ValidationFailure } from '../errors'
import { ErrorCode, fromStorage, protocolError, success, validationError } from '../errors'
import { normalizeServerUrl } from '../config'
import { newPkcePair, newState } from '../pkce'
import type { CredentialStore } from '../storage/credentials'
import type { FlowKind, PendingFlowState, TokenSet } from '../types'
import { parseCallback } from './callback'
import type { RegistrationEngine } from './registration'
import type { TokenEngine } from './token'

export type CallbackOutcome =
  | { kind: 'registered'; clientId: string }
  | { kind: 'logged_in'; tokens: TokenSet }

export interface FlowStatus {
  enrollmentPending: boolean
  loginPending: boolean
}

export interface FlowCoordinatorOptions {
  registration: RegistrationEngine
  tokens: TokenEngine
  store: CredentialStore
  debug?: boolean
}

export class FlowCoordinator {
  private readonly registration: RegistrationEngine
  private readonly tokens: TokenEngine
  private readonly store: CredentialStore
  private readonly debug: boolean

  constructor(options: FlowCoordinatorOptions) {
    this.registration = options.registration
    this.tokens = options.tokens
    this.store = options.store
    this.debug = options.debug ?? false
  }

  /**
   * Start enrollment with a server. Replaces any enrollment already pending.
   *
   * @returns the enrollment page URL to open in the user-agent
   */
  async beginEnrollment(serverUrl: string): Promise<ApiResult<string>> {
    const server = normalizeServerUrl(serverUrl)
    const state = newState()
    const stored = await fromStorage('Flow', 'Could not record pending enrollment', () =>
      this.store.putPendingFlow('enrollment', { state, pendingServerUrl: server }),
    )
    if (stored.type !== 'success') return stored
    if (this.debug) {
      console.log('[Flow] Enrollment started:', server)
    }
    return success(this.registration.buildEnrollmentUrl(server, state))
  }

  /**
   * Start a PKCE login against the registered server.
   *
   * @returns the authorization URL to open in the user-agent
   */
  async beginLogin(): Promise<ApiResult<string>> {
    const stored = await this.registration.getRegistration()
    if (stored.type !== 'success') return stored
    const registration = stored.data
    if (!registration) {
      return validationError(ErrorCode.NotRegistered, 'Device is not registered')
    }

    const state = newState()
    const { verifier, challenge } = await newPkcePair()
    const recorded = await fromStorage('Flow', 'Could not record pending login', () =>
      this.store.putPendingFlow('login', { state, codeVerifier: verifier }),
    )
    if (recorded.type !== 'success') return recorded
    if (this.debug) {
      console.log('[Flow] Login started:', registration.serverUrl)
    }
    return success(this.tokens.buildAuthorizationUrl(registration.serverUrl, registration.clientId, state, challenge))
  }

  async handleCallback(url: string): Promise<ApiResult<CallbackOutcome>> {
    const callback = parseCallback(url)

    switch (callback.kind) {
      case 'enrollment': {
        const taken = await this.takePending('enrollment')
        if (taken.type !== 'success') return taken
        const pending = taken.data
        const rejected = this.checkState('enrollment', pending?.state, callback.state)
        if (rejected) return rejected
        if (!pending?.pendingServerUrl) {
          return validationError(ErrorCode.MissingPendingState, 'No server recorded for the pending enrollment')
        }

        const result = await this.registration.registerDevice(pending.pendingServerUrl, callback.iat)
        if (result.type !== 'success') return result
        return success({ kind: 'registered', clientId: result.data })
      }

      case 'login': {
        const taken = await this.takePending('login')
        if (taken.type !== 'success') return taken
        const pending = taken.data
        const rejected = this.checkState('login', pending?.state, callback.state)
        if (rejected) return rejected
        if (!pending?.codeVerifier) {
          return validationError(ErrorCode.MissingPendingState, 'No code verifier recorded for the pending login')
        }

        const result = await this.tokens.exchangeCodeForToken(callback.code, pending.codeVerifier)
        if (result.type !== 'success') return result
        return success({ kind: 'logged_in', tokens: result.data })
      }

      case 'error': {
        const cleared = await fromStorage('Flow', 'Could not clear pending flows', async () => {
          await this.store.clearPendingFlow('enrollment')
          await this.store.clearPendingFlow('login')
        })
        if (cleared.type !== 'success') return cleared
        if (this.debug) {
          console.log('[Flow] Authorization server returned an error:', callback.error)
        }
        return protocolError(callback.description ?? callback.error, undefined, callback.error)
      }

      case 'unknown':
        return validationError(ErrorCode.InvalidCallback, 'Callback carries no iat, code or error')
    }
  }

  /** Discard the pending entry of one flow. */
  async cancel(kind: FlowKind): Promise<ApiResult<true>> {
    const cleared = await fromStorage('Flow', `Could not cancel pending ${kind}`, () => this.store.clearPendingFlow(kind))
    if (cleared.type !== 'success') return cleared
    return success(true)
  }

  status(): Promise<ApiResult<FlowStatus>> {
    return fromStorage('Flow', 'Could not read pending flows', async () => {
      const [enrollment, login] = await Promise.all([
        this.store.getPendingFlow('enrollment'),
        this.store.getPendingFlow('login'),
      ])
      return { enrollmentPending: enrollment !== null, loginPending: login !== null }
    })
  }

  private takePending(kind: FlowKind): Promise<ApiResult<PendingFlowState | null>> {
    return fromStorage('Flow', `Could not read pending ${kind}`, () => this.store.takePendingFlow(kind))
  }

  private checkState(
    kind: FlowKind,
    expected: string | undefined,
    received: string | null,
  ): ValidationFailure | null {
    if (!expected) {
      return validationError(ErrorCode.MissingPendingState, `No ${kind} in progress`)
    }
    if (received !== expected) {
      if (this.debug) {
        console.log('[Flow] State mismatch, rejecting callback:', kind)
      }
      return validationError(ErrorCode.StateMismatch, 'State mismatch (possible CSRF)')
    }
    return null
  }
}
