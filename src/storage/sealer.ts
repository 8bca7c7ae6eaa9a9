/**
 * Record sealing for data at rest
 *
 * AES-256-GCM via Web Crypto. A sealed record is
 *   base64url( iv[12] || ciphertext+tag )
 * and decrypts to the UTF-8 JSON of the original value.
 *
 * The 32-byte master key lives in its own 0600 file next to the records and
 * is created on first use.
 */

import { webcrypto } from 'node:crypto'
import { join } from 'node:path'
import { base64url } from 'jose'
import { readOptionalFile, writePrivateFile } from './files'

const IV_LENGTH = 12
const KEY_LENGTH = 32
export const MASTER_KEY_FILE = 'master.key'

export class RecordSealer {
  private constructor(private readonly key: webcrypto.CryptoKey) {}

  static async fromRawKey(raw: Uint8Array): Promise<RecordSealer> {
    if (raw.length !== KEY_LENGTH) {
      throw new Error(`Master key must be ${KEY_LENGTH} bytes, got ${raw.length}`)
    }
    const key = await webcrypto.subtle.importKey('raw', raw, { name: 'AES-GCM' }, false, ['encrypt', 'decrypt'])
    return new RecordSealer(key)
  }

  /**
   * Load `master.key` from the directory, creating it when absent.
   */
  static async forDirectory(dir: string): Promise<RecordSealer> {
    return RecordSealer.fromRawKey(await loadOrCreateMasterKey(join(dir, MASTER_KEY_FILE)))
  }

  async seal(value: unknown): Promise<string> {
    const iv = webcrypto.getRandomValues(new Uint8Array(IV_LENGTH))
    const plaintext = new TextEncoder().encode(JSON.stringify(value))
    const ciphertext = new Uint8Array(await webcrypto.subtle.encrypt({ name: 'AES-GCM', iv }, this.key, plaintext))

    const out = new Uint8Array(IV_LENGTH + ciphertext.length)
    out.set(iv, 0)
    out.set(ciphertext, IV_LENGTH)
    return base64url.encode(out)
  }

  /**
   * @throws when the record was tampered with or sealed under another key
   */
  async open(sealed: string): Promise<unknown> {
    const bytes = base64url.decode(sealed.trim())
    if (bytes.length <= IV_LENGTH) {
      throw new Error('Sealed record is truncated')
    }
    const iv = bytes.subarray(0, IV_LENGTH)
    const ciphertext = bytes.subarray(IV_LENGTH)
    const plaintext = await webcrypto.subtle.decrypt({ name: 'AES-GCM', iv }, this.key, ciphertext)
    return JSON.parse(new TextDecoder().decode(plaintext))
  }
}

export async function loadOrCreateMasterKey(path: string): Promise<Uint8Array> {
  const existing = await readOptionalFile(path)
  if (existing) {
    return base64url.decode(existing.toString('utf-8').trim())
  }
  const raw = webcrypto.getRandomValues(new Uint8Array(KEY_LENGTH))
  await writePrivateFile(path, base64url.encode(raw))
  return raw
}
