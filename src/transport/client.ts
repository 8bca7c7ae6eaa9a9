/**
 * HTTP transport for the device OAuth endpoints
 *
 * Each call returns an {@link ApiResult}; nothing throws. Non-2xx responses
 * become protocol errors carrying the HTTP status and the server's OAuth
 * error text. Fetch rejections, timeouts and malformed success bodies become
 * transport errors.
 *
 * `fetch` is injectable so tests can route requests into an in-process app.
 */

import type { ApiResult } from '../errors'
import { protocolError, success, transportError } from '../errors'
import { CLIENT_ASSERTION_TYPE } from '../jwt/assertion'
import {
  assertValid,
  isClientRegistrationResponse,
  isErrorResponse,
  isTokenResponse,
  isUserInfo,
} from '../guards'
import { normalizeServerUrl } from '../config'
import type {
  AuthorizationCodeGrant,
  ClientRegistrationRequest,
  ClientRegistrationResponse,
  RefreshTokenGrant,
  TokenResponse,
  UserInfo,
} from '../types'

export const Endpoints = {
  systemInfo: '/api/system/info',
  enrollDevice: '/api/auth/enrollDevice',
  register: '/connect/register',
  authorize: '/oauth2/authorize',
  token: '/oauth2/token',
  me: '/api/me',
} as const

export function endpointUrl(serverUrl: string, path: string): string {
  return `${normalizeServerUrl(serverUrl)}${path}`
}

/**
 * The network calls the engines make. Implemented over fetch below; tests
 * may supply their own.
 */
export interface TransportClient {
  probeServer(serverUrl: string): Promise<ApiResult<true>>
  registerClient(
    serverUrl: string,
    initialAccessToken: string,
    request: ClientRegistrationRequest,
  ): Promise<ApiResult<ClientRegistrationResponse>>
  exchangeAuthorizationCode(serverUrl: string, grant: AuthorizationCodeGrant): Promise<ApiResult<TokenResponse>>
  refreshToken(serverUrl: string, grant: RefreshTokenGrant): Promise<ApiResult<TokenResponse>>
  getUserInfo(serverUrl: string, accessToken: string): Promise<ApiResult<UserInfo>>
}

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>

export interface HttpTransportOptions {
  fetch?: FetchLike
  /** Per-request timeout in milliseconds (default 30000) */
  timeoutMs?: number
  debug?: boolean
}

export class HttpTransportClient implements TransportClient {
  private readonly fetchFn: FetchLike
  private readonly timeoutMs: number
  private readonly debug: boolean

  constructor(options: HttpTransportOptions = {}) {
    this.fetchFn = options.fetch ?? ((input, init) => fetch(input, init))
    this.timeoutMs = options.timeoutMs ?? 30_000
    this.debug = options.debug ?? false
  }

  async probeServer(serverUrl: string): Promise<ApiResult<true>> {
    const result = await this.send(endpointUrl(serverUrl, Endpoints.systemInfo), { method: 'GET' })
    if (result.type !== 'success') return result
    return success(true)
  }

  async registerClient(
    serverUrl: string,
    initialAccessToken: string,
    request: ClientRegistrationRequest,
  ): Promise<ApiResult<ClientRegistrationResponse>> {
    const result = await this.send(endpointUrl(serverUrl, Endpoints.register), {
      method: 'POST',
      headers: {
        Authorization: `Bearer ${initialAccessToken}`,
        'Content-Type': 'application/json',
        Accept: 'application/json',
      },
      body: JSON.stringify(request),
    })
    if (result.type !== 'success') return result
    return parseBody(result.data, isClientRegistrationResponse, 'ClientRegistrationResponse')
  }

  async exchangeAuthorizationCode(serverUrl: string, grant: AuthorizationCodeGrant): Promise<ApiResult<TokenResponse>> {
    return this.postToken(
      serverUrl,
      new URLSearchParams({
        grant_type: 'authorization_code',
        code: grant.code,
        redirect_uri: grant.redirectUri,
        client_id: grant.clientId,
        client_assertion_type: CLIENT_ASSERTION_TYPE,
        client_assertion: grant.clientAssertion,
        code_verifier: grant.codeVerifier,
      }),
    )
  }

  async refreshToken(serverUrl: string, grant: RefreshTokenGrant): Promise<ApiResult<TokenResponse>> {
    return this.postToken(
      serverUrl,
      new URLSearchParams({
        grant_type: 'refresh_token',
        refresh_token: grant.refreshToken,
        client_id: grant.clientId,
        client_assertion_type: CLIENT_ASSERTION_TYPE,
        client_assertion: grant.clientAssertion,
      }),
    )
  }

  async getUserInfo(serverUrl: string, accessToken: string): Promise<ApiResult<UserInfo>> {
    const result = await this.send(endpointUrl(serverUrl, Endpoints.me), {
      method: 'GET',
      headers: {
        Authorization: `Bearer ${accessToken}`,
        Accept: 'application/json',
      },
    })
    if (result.type !== 'success') return result
    return parseBody(result.data, isUserInfo, 'UserInfo')
  }

  private async postToken(serverUrl: string, body: URLSearchParams): Promise<ApiResult<TokenResponse>> {
    const result = await this.send(endpointUrl(serverUrl, Endpoints.token), {
      method: 'POST',
      headers: {
        'Content-Type': 'application/x-www-form-urlencoded',
        Accept: 'application/json',
      },
      body: body.toString(),
    })
    if (result.type !== 'success') return result
    return parseBody(result.data, isTokenResponse, 'TokenResponse')
  }

  /**
   * Perform the request and return the raw body text of a 2xx response.
   */
  private async send(url: string, init: RequestInit): Promise<ApiResult<string>> {
    const method = init.method ?? 'GET'
    let response: Response
    let text: string
    try {
      response = await this.fetchFn(url, { ...init, signal: AbortSignal.timeout(this.timeoutMs) })
      text = await response.text()
    } catch (error) {
      if (this.debug) {
        console.error('[Transport] Request failed:', method, url, error)
      }
      return transportError(error)
    }

    if (this.debug) {
      console.log('[Transport]', method, url, '->', response.status)
    }

    if (!response.ok) {
      return errorFromResponse(response.status, text)
    }
    return success(text)
  }
}

function parseBody<T>(text: string, guard: (value: unknown) => value is T, typeName: string): ApiResult<T> {
  try {
    return success(assertValid(JSON.parse(text), guard, typeName))
  } catch (error) {
    return transportError(error)
  }
}

/**
 * Prefer the OAuth `error_description`, then `error`, then the raw body.
 */
export function errorFromResponse(status: number, text: string): ApiResult<never> {
  let body: unknown = null
  try {
    body = JSON.parse(text)
  } catch {
    body = null
  }

  if (isErrorResponse(body)) {
    return protocolError(body.error_description || body.error, status, body.error)
  }
  const message = text.trim() || `HTTP ${status}`
  return protocolError(message, status)
}
