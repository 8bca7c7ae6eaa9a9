/**
 * Key vault backends
 *
 * A vault persists signing key records on behalf of key custody. It is the
 * only place serialized private key material exists; custody never hands a
 * record to any other component.
 *
 *   MemoryKeyVault — process-local, for tests and ephemeral devices
 *   FileKeyVault   — one sealed 0600 file per key under `<dir>/keys/`
 */

import type { webcrypto } from 'node:crypto'
import { readdir } from 'node:fs/promises'
import { join } from 'node:path'
import { assertValid, isNumber, isObject, isString } from '../guards'
import type { RecordSealer } from '../storage/sealer'
import { isNotFound, readOptionalFile, removeFile, writePrivateFile } from '../storage/files'

export interface StoredKeyRecord {
  kid: string
  alg: 'RS256'
  privateKeyJwk: webcrypto.JsonWebKey
  publicKeyJwk: webcrypto.JsonWebKey
  createdAt: number
}

export interface KeyVault {
  get(keyId: string): Promise<StoredKeyRecord | null>
  put(record: StoredKeyRecord): Promise<void>
  /** No-op when the key is absent */
  delete(keyId: string): Promise<void>
  list(): Promise<string[]>
}

/**
 * Required: kid (string), alg ('RS256'), privateKeyJwk (object), publicKeyJwk (object), createdAt (number)
 */
export function isStoredKeyRecord(data: unknown): data is StoredKeyRecord {
  if (!isObject(data)) return false
  if (!isString(data['kid'])) return false
  if (data['alg'] !== 'RS256') return false
  if (!isObject(data['privateKeyJwk'])) return false
  if (!isObject(data['publicKeyJwk'])) return false
  if (!isNumber(data['createdAt'])) return false
  return true
}

// ═══════════════════════════════════════════════════════════════════════════
// Memory
// ═══════════════════════════════════════════════════════════════════════════

export class MemoryKeyVault implements KeyVault {
  private records = new Map<string, StoredKeyRecord>()

  async get(keyId: string): Promise<StoredKeyRecord | null> {
    return this.records.get(keyId) ?? null
  }

  async put(record: StoredKeyRecord): Promise<void> {
    this.records.set(record.kid, record)
  }

  async delete(keyId: string): Promise<void> {
    this.records.delete(keyId)
  }

  async list(): Promise<string[]> {
    return Array.from(this.records.keys())
  }

  get size(): number {
    return this.records.size
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// File
// ═══════════════════════════════════════════════════════════════════════════

const KEY_FILE_SUFFIX = '.key'
const KEY_ID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i

export class FileKeyVault implements KeyVault {
  private readonly keysDir: string

  constructor(
    storageDir: string,
    private readonly sealer: RecordSealer,
  ) {
    this.keysDir = join(storageDir, 'keys')
  }

  async get(keyId: string): Promise<StoredKeyRecord | null> {
    const path = this.pathFor(keyId)
    if (!path) return null
    const content = await readOptionalFile(path)
    if (!content) return null
    const record = await this.sealer.open(content.toString('utf-8'))
    return assertValid(record, isStoredKeyRecord, 'StoredKeyRecord')
  }

  async put(record: StoredKeyRecord): Promise<void> {
    const path = this.pathFor(record.kid)
    if (!path) throw new Error(`Refusing to store key with malformed id: ${record.kid}`)
    await writePrivateFile(path, await this.sealer.seal(record))
  }

  async delete(keyId: string): Promise<void> {
    const path = this.pathFor(keyId)
    if (path) await removeFile(path)
  }

  async list(): Promise<string[]> {
    let entries: string[]
    try {
      entries = await readdir(this.keysDir)
    } catch (error) {
      if (isNotFound(error)) return []
      throw error
    }
    return entries
      .filter((name) => name.endsWith(KEY_FILE_SUFFIX))
      .map((name) => name.slice(0, -KEY_FILE_SUFFIX.length))
      .filter((keyId) => KEY_ID_PATTERN.test(keyId))
  }

  /** Only UUID key ids map to a file under the keys dir */
  private pathFor(keyId: string): string | null {
    if (!KEY_ID_PATTERN.test(keyId)) return null
    return join(this.keysDir, `${keyId}${KEY_FILE_SUFFIX}`)
  }
}
