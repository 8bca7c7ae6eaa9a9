/**
 * Key custody for private_key_jwt client authentication
 *
 * Generates RSA-2048 signing keys, keeps them behind a {@link KeyVault}, and
 * exposes them only as a signing capability addressed by key id. Callers get
 * public JWKS material and signatures, never private key bytes.
 *
 * Once loaded, the private key lives in memory as a non-extractable
 * CryptoKey: Web Crypto itself refuses to export it.
 */

import { randomUUID, webcrypto } from 'node:crypto'
import { KeyGenerationError, KeyNotFoundError } from '../errors'
import type { JWKS, JWKSPublicKey, KeyMaterial, PrivateKeyHandle } from '../types'
import type { KeyVault, StoredKeyRecord } from './vault'

const RS256 = { name: 'RSASSA-PKCS1-v1_5', hash: 'SHA-256' } as const

/**
 * Signing-key capability. Implementations may be backed by a hardware
 * enclave; the software implementation below reports `hardwareBacked: false`.
 */
export interface KeyCustody {
  readonly hardwareBacked: boolean
  /** @returns the new key id, used as the JWT `kid` */
  generateKeyPair(): Promise<string>
  hasKey(keyId: string): Promise<boolean>
  deleteKey(keyId: string): Promise<void>
  deleteAllManagedKeys(): Promise<void>
  /** @throws KeyNotFoundError */
  exportPublicJwks(keyId: string): Promise<JWKS>
  /** RS256 signature over `signingInput`. @throws KeyNotFoundError */
  sign(keyId: string, signingInput: Uint8Array): Promise<Uint8Array>
  describeKey(keyId: string): Promise<KeyMaterial | null>
}

interface LoadedKey {
  privateKey: webcrypto.CryptoKey
  publicKey: JWKSPublicKey
}

export interface SoftwareKeyCustodyOptions {
  debug?: boolean
}

export class SoftwareKeyCustody implements KeyCustody {
  readonly hardwareBacked = false
  private loaded = new Map<string, LoadedKey>()
  private readonly debug: boolean

  constructor(
    private readonly vault: KeyVault,
    options: SoftwareKeyCustodyOptions = {},
  ) {
    this.debug = options.debug ?? false
  }

  async generateKeyPair(): Promise<string> {
    const keyId = randomUUID()

    let record: StoredKeyRecord
    try {
      const keyPair = await webcrypto.subtle.generateKey(
        {
          ...RS256,
          modulusLength: 2048,
          publicExponent: new Uint8Array([1, 0, 1]),
        },
        true,
        ['sign', 'verify'],
      )
      const [privateKeyJwk, publicKeyJwk] = await Promise.all([
        webcrypto.subtle.exportKey('jwk', keyPair.privateKey),
        webcrypto.subtle.exportKey('jwk', keyPair.publicKey),
      ])
      record = { kid: keyId, alg: 'RS256', privateKeyJwk, publicKeyJwk, createdAt: Date.now() }
    } catch (error) {
      throw new KeyGenerationError('RSA key generation failed', { cause: error })
    }

    try {
      await this.vault.put(record)
    } catch (error) {
      throw new KeyGenerationError('Secure key store unavailable', { cause: error })
    }

    if (this.debug) {
      console.log('[Keys] Generated signing key:', keyId)
    }
    return keyId
  }

  async hasKey(keyId: string): Promise<boolean> {
    if (this.loaded.has(keyId)) return true
    return (await this.vault.get(keyId)) !== null
  }

  async deleteKey(keyId: string): Promise<void> {
    this.loaded.delete(keyId)
    await this.vault.delete(keyId)
    if (this.debug) {
      console.log('[Keys] Deleted signing key:', keyId)
    }
  }

  async deleteAllManagedKeys(): Promise<void> {
    const keyIds = await this.vault.list()
    for (const keyId of keyIds) {
      await this.vault.delete(keyId)
    }
    this.loaded.clear()
  }

  async exportPublicJwks(keyId: string): Promise<JWKS> {
    const key = await this.load(keyId)
    return { keys: [{ ...key.publicKey }] }
  }

  async sign(keyId: string, signingInput: Uint8Array): Promise<Uint8Array> {
    const key = await this.load(keyId)
    const signature = await webcrypto.subtle.sign(RS256, key.privateKey, signingInput)
    return new Uint8Array(signature)
  }

  async describeKey(keyId: string): Promise<KeyMaterial | null> {
    if (!(await this.hasKey(keyId))) return null
    const key = await this.load(keyId)
    return {
      keyId,
      publicKey: { ...key.publicKey },
      privateKeyHandle: createPrivateKeyHandle(keyId),
      hardwareBacked: this.hardwareBacked,
    }
  }

  private async load(keyId: string): Promise<LoadedKey> {
    const cached = this.loaded.get(keyId)
    if (cached) return cached

    const record = await this.vault.get(keyId)
    if (!record) throw new KeyNotFoundError(keyId)

    const { n, e } = record.publicKeyJwk
    if (!n || !e) throw new KeyNotFoundError(keyId)

    const privateKey = await webcrypto.subtle.importKey('jwk', record.privateKeyJwk, RS256, false, ['sign'])
    const key: LoadedKey = {
      privateKey,
      publicKey: { kty: 'RSA', kid: keyId, use: 'sig', alg: 'RS256', n, e },
    }
    this.loaded.set(keyId, key)
    return key
  }
}

/**
 * A handle names a key without carrying it. Serializing it in any form
 * yields a redacted marker.
 */
export function createPrivateKeyHandle(keyId: string): PrivateKeyHandle {
  const redacted = `[PrivateKeyHandle ${keyId}]`
  return Object.freeze({
    keyId,
    toJSON: () => redacted,
    toString: () => redacted,
    [Symbol.for('nodejs.util.inspect.custom')]: () => redacted,
  })
}
