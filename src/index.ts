/**
 * device-oauth — OAuth2 client registration for devices without a secret
 *
 * A device enrolls with a server, receives a single-use Initial Access Token,
 * registers itself through Dynamic Client Registration (RFC 7591) and from
 * then on authenticates token requests with private_key_jwt assertions
 * (RFC 7523) signed by a key that never leaves key custody. Users log in
 * through a PKCE authorization-code flow (RFC 7636).
 *
 *   1. flows.beginEnrollment(serverUrl)  → open the enrollment URL
 *   2. flows.handleCallback(redirect)    → registers the device
 *   3. flows.beginLogin()                → open the authorization URL
 *   4. flows.handleCallback(redirect)    → exchanges the code for tokens
 *   5. tokens.getUserInfo()              → refreshes on expiry
 *
 * @example
 * ```typescript
 * import { createServices, loadConfig } from 'device-oauth'
 *
 * const { flows, tokens } = await createServices(loadConfig())
 * const enrollment = await flows.beginEnrollment('https://auth.example.com')
 * if (enrollment.type === 'success') console.log(enrollment.data)
 * ```
 */

// Results and error codes
export * from './errors'

// Data model
export type * from './types'

// Configuration
export { loadConfig, describeDevice, normalizeServerUrl, DEFAULT_REDIRECT_URI, DEFAULT_TIMEOUT_MS } from './config'
export type { DeviceOAuthConfig, DeviceInfo } from './config'

// PKCE
export { newCodeVerifier, codeChallenge, newState, newPkcePair } from './pkce'

// JWT
export { AssertionSigner, CLIENT_ASSERTION_TYPE, DEFAULT_ASSERTION_TTL_SECONDS } from './jwt/assertion'
export type { ClientAssertionOptions, ClientAssertionClaims } from './jwt/assertion'
export { inspectInitialAccessToken } from './jwt/iat'
export type { IatInspection } from './jwt/iat'

// Key custody
export { SoftwareKeyCustody, createPrivateKeyHandle } from './keys/custody'
export type { KeyCustody, SoftwareKeyCustodyOptions } from './keys/custody'
export { MemoryKeyVault, FileKeyVault } from './keys/vault'
export type { KeyVault, StoredKeyRecord } from './keys/vault'

// Storage
export {
  CredentialStore,
  MemoryRecordBackend,
  SealedFileRecordBackend,
  createMemoryCredentialStore,
  createFileCredentialStore,
} from './storage/credentials'
export type { RecordBackend, RecordName, CredentialRecord, FlowRecord } from './storage/credentials'
export { RecordSealer } from './storage/sealer'

// Transport
export { HttpTransportClient, Endpoints, endpointUrl } from './transport/client'
export type { TransportClient, FetchLike, HttpTransportOptions } from './transport/client'

// Engines
export { RegistrationEngine, OAUTH_SCOPE } from './engine/registration'
export type { RegistrationEngineOptions } from './engine/registration'
export { TokenEngine } from './engine/token'
export type { TokenEngineOptions } from './engine/token'
export { FlowCoordinator } from './engine/flows'
export type { CallbackOutcome, FlowCoordinatorOptions, FlowStatus } from './engine/flows'
export { parseCallback } from './engine/callback'
export type { CallbackParams } from './engine/callback'
export { SingleFlight } from './engine/single-flight'

// File-backed wiring
export { createServices } from './cli/services'
export type { DeviceOAuthServices } from './cli/services'
