/**
 * Error codes and result types for the device OAuth engine
 *
 * Every network-facing engine operation returns an {@link ApiResult}. Nothing
 * thrown inside a component crosses the engine boundary: key-store faults,
 * guard failures and fetch rejections are converted to one of the failure
 * variants below.
 *
 *   success           — the operation completed; `data` carries its value
 *   validation_error  — resolved locally (bad IAT, missing prerequisite state,
 *                       CSRF mismatch, key-store fault). Never retried.
 *   protocol_error    — the server answered with a non-2xx status
 *   transport_error   — connectivity, timeout or a malformed response body
 *
 * @example
 * ```ts
 * const result = await tokens.getUserInfo()
 * const message = matchResult(result, {
 *   success: (user) => `Hello ${user.username}`,
 *   validation_error: (e) => `Local error: ${e.message}`,
 *   protocol_error: (e) => `Server said ${e.status}: ${e.message}`,
 *   transport_error: (e) => `Network problem: ${e.message}`,
 * })
 * ```
 */

// ============================================================================
// Error Codes — Machine-readable, snake_case
// ============================================================================

export const ErrorCode = {
  // ── Local validation ──────────────────────────────────────────────────
  InvalidIat: 'invalid_iat',
  NotRegistered: 'not_registered',
  NotLoggedIn: 'not_logged_in',
  NoRefreshToken: 'no_refresh_token',
  StateMismatch: 'state_mismatch',
  MissingPendingState: 'missing_pending_state',
  InvalidCallback: 'invalid_callback',

  // ── Key custody (fatal: registration must be redone) ──────────────────
  KeyNotFound: 'key_not_found',
  KeyStoreUnavailable: 'key_store_unavailable',
  StorageUnavailable: 'storage_unavailable',

  // ── OAuth wire codes (RFC 6749 Section 5.2 / RFC 7591 Section 3.2.2) ──
  InvalidRequest: 'invalid_request',
  InvalidClient: 'invalid_client',
  InvalidGrant: 'invalid_grant',
  InvalidToken: 'invalid_token',
  InvalidClientMetadata: 'invalid_client_metadata',
  InvalidRedirectUri: 'invalid_redirect_uri',
  UnauthorizedClient: 'unauthorized_client',
  AccessDenied: 'access_denied',
  ServerError: 'server_error',
} as const

export type ErrorCodeValue = (typeof ErrorCode)[keyof typeof ErrorCode]

/**
 * OAuth 2.x error body as returned by token and registration endpoints.
 */
export interface ErrorResponse {
  error: string
  error_description?: string
  error_uri?: string
}

// ============================================================================
// Thrown errors (internal to components)
// ============================================================================

/**
 * Raised by key custody when the secure store cannot create or persist a key.
 */
export class KeyGenerationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'KeyGenerationError'
  }
}

/**
 * Raised by key custody when no key is stored under the requested id.
 */
export class KeyNotFoundError extends Error {
  constructor(public readonly keyId: string) {
    super(`Key not found: ${keyId}`)
    this.name = 'KeyNotFoundError'
  }
}

// ============================================================================
// ApiResult
// ============================================================================

export interface Success<T> {
  type: 'success'
  data: T
}

export interface ValidationFailure {
  type: 'validation_error'
  code: ErrorCodeValue
  message: string
  /** Key or credential store failures: no sound recovery without a reset */
  fatal: boolean
}

export interface ProtocolFailure {
  type: 'protocol_error'
  message: string
  status?: number
  /** OAuth `error` code from the response body, when the server sent one */
  error?: string
}

export interface TransportFailure {
  type: 'transport_error'
  message: string
  cause: unknown
}

export type Failure = ValidationFailure | ProtocolFailure | TransportFailure

export type ApiResult<T> = Success<T> | Failure

export function success<T>(data: T): Success<T> {
  return { type: 'success', data }
}

export function validationError(code: ErrorCodeValue, message: string, fatal = false): ValidationFailure {
  return { type: 'validation_error', code, message, fatal }
}

export function protocolError(message: string, status?: number, error?: string): ProtocolFailure {
  const failure: ProtocolFailure = { type: 'protocol_error', message }
  if (status !== undefined) failure.status = status
  if (error !== undefined) failure.error = error
  return failure
}

export function transportError(cause: unknown): TransportFailure {
  const message = cause instanceof Error ? cause.message : String(cause)
  return { type: 'transport_error', message, cause }
}

export function isSuccess<T>(result: ApiResult<T>): result is Success<T> {
  return result.type === 'success'
}

export type ResultHandlers<T, R> = {
  success: (data: T) => R
  validation_error: (failure: ValidationFailure) => R
  protocol_error: (failure: ProtocolFailure) => R
  transport_error: (failure: TransportFailure) => R
}

/**
 * Exhaustive match over an ApiResult. Adding a variant breaks every caller
 * at compile time until it is handled.
 */
export function matchResult<T, R>(result: ApiResult<T>, handlers: ResultHandlers<T, R>): R {
  switch (result.type) {
    case 'success':
      return handlers.success(result.data)
    case 'validation_error':
      return handlers.validation_error(result)
    case 'protocol_error':
      return handlers.protocol_error(result)
    case 'transport_error':
      return handlers.transport_error(result)
    default: {
      const unreachable: never = result
      throw new Error(`Unhandled result: ${JSON.stringify(unreachable)}`)
    }
  }
}

/**
 * Run a credential store operation. A store that cannot be read or written
 * (lost master key, tampered record, I/O failure) is reported as a fatal
 * storage_unavailable failure; only a reset recovers from it.
 */
export async function fromStorage<T>(
  component: string,
  message: string,
  operation: () => Promise<T>,
): Promise<ApiResult<T>> {
  try {
    return success(await operation())
  } catch (error) {
    console.error(`[${component}] ${message}:`, error)
    return validationError(ErrorCode.StorageUnavailable, message, true)
  }
}

/**
 * Convert an error thrown by key custody into a fatal validation failure.
 * Anything else is reported as a transport failure with its cause attached.
 */
export function fromKeyCustodyError(error: unknown): Failure {
  if (error instanceof KeyNotFoundError) {
    return validationError(ErrorCode.KeyNotFound, error.message, true)
  }
  if (error instanceof KeyGenerationError) {
    return validationError(ErrorCode.KeyStoreUnavailable, error.message, true)
  }
  return transportError(error)
}

/** Human-readable one-liner for a failure, used by the CLI. */
export function describeFailure(failure: Failure): string {
  switch (failure.type) {
    case 'validation_error':
      return `${failure.message} (${failure.code})`
    case 'protocol_error':
      return failure.status !== undefined ? `${failure.message} (HTTP ${failure.status})` : failure.message
    case 'transport_error':
      return `Network error: ${failure.message}`
  }
}
