/**
 * Credential store
 *
 * Durable persistence for registration and token state, plus the transient
 * flow state (CSRF nonces, PKCE verifier) of in-flight enrollment and login
 * attempts. Two records are kept and cleared independently:
 *
 *   credentials — serverUrl, clientId, keyId, accessToken, refreshToken,
 *                 tokenExpiresAt, isRegistered, registrationDate
 *   flow        — pendingState, pendingServerUrl, oauthState, oauthCodeVerifier
 *
 * Each mutation is a single read-modify-write of one record, serialized
 * within the process, so a registration or token set is stored as one unit.
 */

import { join } from 'node:path'
import { assertValid, isNumber, isObject, isString } from '../guards'
import type { DeviceRegistration, FlowKind, PendingFlowState, TokenSet } from '../types'
import { readOptionalFile, removeFile, writePrivateFile } from './files'
import { RecordSealer } from './sealer'

// ═══════════════════════════════════════════════════════════════════════════
// Persisted layout
// ═══════════════════════════════════════════════════════════════════════════

export interface CredentialRecord {
  serverUrl?: string
  clientId?: string
  keyId?: string
  accessToken?: string
  refreshToken?: string
  tokenExpiresAt?: number
  isRegistered?: boolean
  registrationDate?: number
}

export interface FlowRecord {
  pendingState?: string
  pendingServerUrl?: string
  oauthState?: string
  oauthCodeVerifier?: string
}

export type RecordName = 'credentials' | 'flow'

function hasOptional(data: Record<string, unknown>, key: string, check: (value: unknown) => boolean): boolean {
  return data[key] === undefined || check(data[key])
}

export function isCredentialRecord(data: unknown): data is CredentialRecord {
  if (!isObject(data)) return false
  for (const key of ['serverUrl', 'clientId', 'keyId', 'accessToken', 'refreshToken']) {
    if (!hasOptional(data, key, isString)) return false
  }
  if (!hasOptional(data, 'tokenExpiresAt', isNumber)) return false
  if (!hasOptional(data, 'registrationDate', isNumber)) return false
  if (!hasOptional(data, 'isRegistered', (v) => typeof v === 'boolean')) return false
  return true
}

export function isFlowRecord(data: unknown): data is FlowRecord {
  if (!isObject(data)) return false
  for (const key of ['pendingState', 'pendingServerUrl', 'oauthState', 'oauthCodeVerifier']) {
    if (!hasOptional(data, key, isString)) return false
  }
  return true
}

// ═══════════════════════════════════════════════════════════════════════════
// Backends
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Raw record persistence. `read` returns null for a missing record.
 */
export interface RecordBackend {
  read(name: RecordName): Promise<unknown>
  write(name: RecordName, value: object): Promise<void>
  remove(name: RecordName): Promise<void>
}

export class MemoryRecordBackend implements RecordBackend {
  private records = new Map<RecordName, string>()

  async read(name: RecordName): Promise<unknown> {
    const raw = this.records.get(name)
    return raw === undefined ? null : JSON.parse(raw)
  }

  async write(name: RecordName, value: object): Promise<void> {
    this.records.set(name, JSON.stringify(value))
  }

  async remove(name: RecordName): Promise<void> {
    this.records.delete(name)
  }
}

/**
 * Sealed (AES-256-GCM) records under the storage directory, mode 0600.
 */
export class SealedFileRecordBackend implements RecordBackend {
  constructor(
    private readonly dir: string,
    private readonly sealer: RecordSealer,
  ) {}

  async read(name: RecordName): Promise<unknown> {
    const content = await readOptionalFile(this.pathFor(name))
    if (!content) return null
    return this.sealer.open(content.toString('utf-8'))
  }

  async write(name: RecordName, value: object): Promise<void> {
    await writePrivateFile(this.pathFor(name), await this.sealer.seal(value))
  }

  async remove(name: RecordName): Promise<void> {
    await removeFile(this.pathFor(name))
  }

  private pathFor(name: RecordName): string {
    return join(this.dir, `${name}.sealed`)
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// CredentialStore
// ═══════════════════════════════════════════════════════════════════════════

export class CredentialStore {
  private queue: Promise<unknown> = Promise.resolve()

  constructor(private readonly backend: RecordBackend) {}

  // ── Registration ─────────────────────────────────────────────────────────

  /**
   * Registration is reported only when server, client id and key id are all
   * present; a partially written record reads back as unregistered.
   */
  async getRegistration(): Promise<DeviceRegistration | null> {
    const record = await this.readCredentials()
    if (!record.isRegistered || !record.serverUrl || !record.clientId || !record.keyId) return null
    return {
      serverUrl: record.serverUrl,
      clientId: record.clientId,
      keyId: record.keyId,
      registeredAtEpochMs: record.registrationDate ?? 0,
    }
  }

  /**
   * Replace the credentials record with a fresh registration. Tokens of any
   * previous client are dropped in the same write.
   */
  async saveRegistration(registration: DeviceRegistration): Promise<void> {
    await this.exclusive(async () => {
      const record: CredentialRecord = {
        serverUrl: registration.serverUrl,
        clientId: registration.clientId,
        keyId: registration.keyId,
        isRegistered: true,
        registrationDate: registration.registeredAtEpochMs,
      }
      await this.backend.write('credentials', record)
    })
  }

  /**
   * Key id of the stored record even when the rest of the registration is
   * incomplete, so a reset can still find the key to delete.
   */
  async getKeyId(): Promise<string | null> {
    return (await this.readCredentials()).keyId ?? null
  }

  /** Removes registration and tokens together. */
  async clearRegistration(): Promise<void> {
    await this.exclusive(() => this.backend.remove('credentials'))
  }

  // ── Tokens ───────────────────────────────────────────────────────────────

  async getTokens(): Promise<TokenSet | null> {
    const record = await this.readCredentials()
    if (!record.accessToken) return null
    const tokens: TokenSet = {
      accessToken: record.accessToken,
      expiresAtEpochMs: record.tokenExpiresAt ?? 0,
    }
    if (record.refreshToken) tokens.refreshToken = record.refreshToken
    return tokens
  }

  async saveTokens(tokens: TokenSet): Promise<void> {
    await this.exclusive(async () => {
      const { accessToken: _a, refreshToken: _r, tokenExpiresAt: _t, ...rest } = await this.readCredentials()
      const record: CredentialRecord = {
        ...rest,
        accessToken: tokens.accessToken,
        tokenExpiresAt: tokens.expiresAtEpochMs,
      }
      if (tokens.refreshToken) record.refreshToken = tokens.refreshToken
      await this.backend.write('credentials', record)
    })
  }

  /** Logout: registration fields are kept. */
  async clearTokens(): Promise<void> {
    await this.exclusive(async () => {
      const { accessToken: _a, refreshToken: _r, tokenExpiresAt: _t, ...rest } = await this.readCredentials()
      if (Object.keys(rest).length === 0) {
        await this.backend.remove('credentials')
      } else {
        await this.backend.write('credentials', rest)
      }
    })
  }

  // ── Pending flow state ───────────────────────────────────────────────────

  async getPendingFlow(kind: FlowKind): Promise<PendingFlowState | null> {
    return pendingFromRecord(kind, await this.readFlow())
  }

  /** Overwrites any pending state of the same kind (last request wins). */
  async putPendingFlow(kind: FlowKind, pending: PendingFlowState): Promise<void> {
    await this.exclusive(async () => {
      const record = withoutKind(kind, await this.readFlow())
      if (kind === 'enrollment') {
        record.pendingState = pending.state
        if (pending.pendingServerUrl) record.pendingServerUrl = pending.pendingServerUrl
      } else {
        record.oauthState = pending.state
        if (pending.codeVerifier) record.oauthCodeVerifier = pending.codeVerifier
      }
      await this.backend.write('flow', record)
    })
  }

  /**
   * Read and delete the pending state of one kind in a single step.
   * A second call returns null.
   */
  async takePendingFlow(kind: FlowKind): Promise<PendingFlowState | null> {
    return this.exclusive(async () => {
      const record = await this.readFlow()
      const pending = pendingFromRecord(kind, record)
      await this.writeFlow(withoutKind(kind, record))
      return pending
    })
  }

  async clearPendingFlow(kind: FlowKind): Promise<void> {
    await this.exclusive(async () => {
      await this.writeFlow(withoutKind(kind, await this.readFlow()))
    })
  }

  async clearAll(): Promise<void> {
    await this.exclusive(async () => {
      await this.backend.remove('credentials')
      await this.backend.remove('flow')
    })
  }

  // ── Internals ────────────────────────────────────────────────────────────

  private async readCredentials(): Promise<CredentialRecord> {
    const data = await this.backend.read('credentials')
    if (data === null) return {}
    return assertValid(data, isCredentialRecord, 'CredentialRecord')
  }

  private async readFlow(): Promise<FlowRecord> {
    const data = await this.backend.read('flow')
    if (data === null) return {}
    return assertValid(data, isFlowRecord, 'FlowRecord')
  }

  private async writeFlow(record: FlowRecord): Promise<void> {
    if (Object.keys(record).length === 0) {
      await this.backend.remove('flow')
    } else {
      await this.backend.write('flow', record)
    }
  }

  private exclusive<T>(fn: () => Promise<T>): Promise<T> {
    const run = this.queue.then(fn, fn)
    this.queue = run.catch(() => undefined)
    return run
  }
}

function pendingFromRecord(kind: FlowKind, record: FlowRecord): PendingFlowState | null {
  if (kind === 'enrollment') {
    if (!record.pendingState) return null
    const pending: PendingFlowState = { state: record.pendingState }
    if (record.pendingServerUrl) pending.pendingServerUrl = record.pendingServerUrl
    return pending
  }
  if (!record.oauthState) return null
  const pending: PendingFlowState = { state: record.oauthState }
  if (record.oauthCodeVerifier) pending.codeVerifier = record.oauthCodeVerifier
  return pending
}

function withoutKind(kind: FlowKind, record: FlowRecord): FlowRecord {
  if (kind === 'enrollment') {
    const { pendingState: _s, pendingServerUrl: _u, ...rest } = record
    return rest
  }
  const { oauthState: _s, oauthCodeVerifier: _v, ...rest } = record
  return rest
}

// ═══════════════════════════════════════════════════════════════════════════
// Factories
// ═══════════════════════════════════════════════════════════════════════════

export function createMemoryCredentialStore(): CredentialStore {
  return new CredentialStore(new MemoryRecordBackend())
}

export async function createFileCredentialStore(storageDir: string, sealer?: RecordSealer): Promise<CredentialStore> {
  const recordSealer = sealer ?? (await RecordSealer.forDirectory(storageDir))
  return new CredentialStore(new SealedFileRecordBackend(storageDir, recordSealer))
}
