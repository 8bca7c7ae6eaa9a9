/**
 * Runtime configuration
 *
 * Read from the environment with fallbacks, so the CLI and embedding
 * applications share one source of truth:
 *
 *   DEVICE_OAUTH_SERVER_URL     Default server for `enroll`/`probe`
 *   DEVICE_OAUTH_REDIRECT_URI   Redirect URI registered for the client
 *   DEVICE_OAUTH_STORAGE_DIR    Credential + key directory (default ~/.device-oauth)
 *   DEVICE_OAUTH_TIMEOUT_MS     HTTP timeout per request (default 30000)
 *   DEVICE_OAUTH_CLIENT_NAME    Prefix of the registered client_name
 *   DEVICE_OAUTH_JWKS_URI       jwks_uri sent alongside the inline JWKS
 *   DEBUG                       Enable debug logging
 */

import { homedir, hostname } from 'node:os'
import { join } from 'node:path'

export const DEFAULT_REDIRECT_URI = 'http://127.0.0.1:8765/oauth/callback'
export const DEFAULT_TIMEOUT_MS = 30_000
export const DEFAULT_CLIENT_NAME = 'Device OAuth Client'
/** Placeholder: servers read the inline `jwks` and ignore this value */
export const DEFAULT_JWKS_URI = 'https://localhost/.well-known/jwks.json'

export interface DeviceOAuthConfig {
  serverUrl?: string
  redirectUri: string
  storageDir: string
  timeoutMs: number
  clientName: string
  jwksUri: string
  debug: boolean
}

/**
 * Facts about the running device reported during enrollment and registration.
 */
export interface DeviceInfo {
  deviceType: string
  deviceVersion: string
  deviceAttestation: string
  deviceName: string
}

type Env = Record<string, string | undefined>

function parsePositiveInt(value: string | undefined, fallback: number): number {
  if (!value) return fallback
  const parsed = Number.parseInt(value, 10)
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback
}

function expandHome(path: string): string {
  return path.startsWith('~/') ? join(homedir(), path.slice(2)) : path
}

export function loadConfig(env: Env = process.env): DeviceOAuthConfig {
  return {
    serverUrl: env.DEVICE_OAUTH_SERVER_URL || undefined,
    redirectUri: env.DEVICE_OAUTH_REDIRECT_URI || DEFAULT_REDIRECT_URI,
    storageDir: expandHome(env.DEVICE_OAUTH_STORAGE_DIR || join(homedir(), '.device-oauth')),
    timeoutMs: parsePositiveInt(env.DEVICE_OAUTH_TIMEOUT_MS, DEFAULT_TIMEOUT_MS),
    clientName: env.DEVICE_OAUTH_CLIENT_NAME || DEFAULT_CLIENT_NAME,
    jwksUri: env.DEVICE_OAUTH_JWKS_URI || DEFAULT_JWKS_URI,
    debug: !!env.DEBUG,
  }
}

export function describeDevice(): DeviceInfo {
  const major = process.versions.node.split('.')[0] ?? '0'
  return {
    deviceType: process.platform,
    deviceVersion: process.versions.node,
    deviceAttestation: `node_${major}`,
    deviceName: hostname(),
  }
}

/**
 * Strip trailing slashes so endpoint paths can be appended directly.
 */
export function normalizeServerUrl(serverUrl: string): string {
  return serverUrl.trim().replace(/\/+$/, '')
}
