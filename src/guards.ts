/**
 * Runtime type guards for JSON data validation
 *
 * These guards replace unsafe `as Type` assertions on data from
 * JSON.parse() and response bodies.
 *
 * @module guards
 */

import type { ErrorResponse } from './errors'
import type { ClientRegistrationResponse, TokenResponse, UserInfo } from './types'

// ═══════════════════════════════════════════════════════════════════════════
// Helpers
// ═══════════════════════════════════════════════════════════════════════════

export function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

export function isString(value: unknown): value is string {
  return typeof value === 'string'
}

export function isNumber(value: unknown): value is number {
  return typeof value === 'number' && !Number.isNaN(value)
}

/** Finite and not negative: durations such as expires_in */
export function isDuration(value: unknown): value is number {
  return isNumber(value) && Number.isFinite(value) && value >= 0
}

function isOptionalString(value: unknown): boolean {
  return value === undefined || isString(value)
}

// ═══════════════════════════════════════════════════════════════════════════
// Validation Error
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Error thrown when runtime JSON validation fails
 */
export class ValidationError extends Error {
  constructor(
    public readonly expectedType: string,
    public readonly details: string,
    public readonly data?: unknown,
  ) {
    super(`Invalid ${expectedType}: ${details}`)
    this.name = 'ValidationError'
  }
}

/**
 * Assert that data passes a type guard, throwing ValidationError if not
 */
export function assertValid<T>(data: unknown, guard: (value: unknown) => value is T, typeName: string): T {
  if (!guard(data)) {
    throw new ValidationError(typeName, 'failed runtime validation')
  }
  return data
}

// ═══════════════════════════════════════════════════════════════════════════
// Wire Types
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Required: client_id (non-empty string)
 */
export function isClientRegistrationResponse(data: unknown): data is ClientRegistrationResponse {
  if (!isObject(data)) return false
  if (!isString(data['client_id']) || data['client_id'].length === 0) return false
  if (data['client_id_issued_at'] !== undefined && !isNumber(data['client_id_issued_at'])) return false
  if (!isOptionalString(data['client_name'])) return false
  return true
}

/**
 * Required: access_token (string), expires_in (finite number >= 0)
 * token_type is required by RFC 6749 but tolerated when missing.
 */
export function isTokenResponse(data: unknown): data is TokenResponse {
  if (!isObject(data)) return false
  if (!isString(data['access_token']) || data['access_token'].length === 0) return false
  if (!isDuration(data['expires_in'])) return false
  if (!isOptionalString(data['token_type'])) return false
  if (!isOptionalString(data['refresh_token'])) return false
  if (!isOptionalString(data['scope'])) return false
  return true
}

/**
 * Required: id (string), username (string)
 */
export function isUserInfo(data: unknown): data is UserInfo {
  if (!isObject(data)) return false
  if (!isString(data['id'])) return false
  if (!isString(data['username'])) return false
  if (!isOptionalString(data['displayName'])) return false
  if (!isOptionalString(data['email'])) return false
  return true
}

/**
 * OAuth error body (RFC 6749 Section 5.2)
 */
export function isErrorResponse(data: unknown): data is ErrorResponse {
  if (!isObject(data)) return false
  if (!isString(data['error'])) return false
  if (!isOptionalString(data['error_description'])) return false
  return true
}
