import { mkdtemp, readFile, rm, stat, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import {
  CredentialStore,
  MemoryRecordBackend,
  createFileCredentialStore,
  createMemoryCredentialStore,
} from '../src/storage/credentials'
import { RecordSealer } from '../src/storage/sealer'
import type { DeviceRegistration } from '../src/types'
import { NOW } from './helpers'

const REGISTRATION: DeviceRegistration = {
  serverUrl: 'https://auth.test',
  clientId: 'client_abc',
  keyId: '11111111-1111-4111-8111-111111111111',
  registeredAtEpochMs: NOW,
}

describe('CredentialStore', () => {
  let store: CredentialStore

  beforeEach(() => {
    store = createMemoryCredentialStore()
  })

  describe('registration', () => {
    it('is absent on a fresh store', async () => {
      expect(await store.getRegistration()).toBeNull()
      expect(await store.getKeyId()).toBeNull()
    })

    it('round-trips a registration', async () => {
      await store.saveRegistration(REGISTRATION)
      expect(await store.getRegistration()).toEqual(REGISTRATION)
      expect(await store.getKeyId()).toBe(REGISTRATION.keyId)
    })

    it('reads a partially written record as unregistered', async () => {
      const backend = new MemoryRecordBackend()
      await backend.write('credentials', { clientId: 'client_abc', isRegistered: true })
      const partial = new CredentialStore(backend)
      expect(await partial.getRegistration()).toBeNull()
    })

    it('still reports the key id of an incomplete record', async () => {
      const backend = new MemoryRecordBackend()
      await backend.write('credentials', { keyId: REGISTRATION.keyId })
      expect(await new CredentialStore(backend).getKeyId()).toBe(REGISTRATION.keyId)
    })

    it('drops tokens of the previous client when a new registration is saved', async () => {
      await store.saveRegistration(REGISTRATION)
      await store.saveTokens({ accessToken: 'access-1', refreshToken: 'refresh-1', expiresAtEpochMs: NOW })
      await store.saveRegistration({ ...REGISTRATION, clientId: 'client_def' })
      expect(await store.getTokens()).toBeNull()
    })

    it('clears registration and tokens together', async () => {
      await store.saveRegistration(REGISTRATION)
      await store.saveTokens({ accessToken: 'access-1', expiresAtEpochMs: NOW })
      await store.clearRegistration()
      expect(await store.getRegistration()).toBeNull()
      expect(await store.getTokens()).toBeNull()
    })

    it('rejects a corrupt record', async () => {
      const backend = new MemoryRecordBackend()
      await backend.write('credentials', { clientId: 42 })
      await expect(new CredentialStore(backend).getRegistration()).rejects.toThrow('Invalid CredentialRecord')
    })
  })

  describe('tokens', () => {
    beforeEach(async () => {
      await store.saveRegistration(REGISTRATION)
    })

    it('stores tokens without touching the registration', async () => {
      await store.saveTokens({ accessToken: 'access-1', refreshToken: 'refresh-1', expiresAtEpochMs: NOW + 1000 })
      expect(await store.getTokens()).toEqual({
        accessToken: 'access-1',
        refreshToken: 'refresh-1',
        expiresAtEpochMs: NOW + 1000,
      })
      expect(await store.getRegistration()).toEqual(REGISTRATION)
    })

    it('overwrites the whole token set', async () => {
      await store.saveTokens({ accessToken: 'access-1', refreshToken: 'refresh-1', expiresAtEpochMs: NOW })
      await store.saveTokens({ accessToken: 'access-2', expiresAtEpochMs: NOW + 5 })
      expect(await store.getTokens()).toEqual({ accessToken: 'access-2', expiresAtEpochMs: NOW + 5 })
    })

    it('clears tokens and keeps the registration', async () => {
      await store.saveTokens({ accessToken: 'access-1', expiresAtEpochMs: NOW })
      await store.clearTokens()
      expect(await store.getTokens()).toBeNull()
      expect(await store.getRegistration()).toEqual(REGISTRATION)
    })
  })

  describe('pending flow state', () => {
    it('keeps enrollment and login entries apart', async () => {
      await store.putPendingFlow('enrollment', { state: 'enroll-state', pendingServerUrl: 'https://auth.test' })
      await store.putPendingFlow('login', { state: 'login-state', codeVerifier: 'verifier' })

      expect(await store.getPendingFlow('enrollment')).toEqual({
        state: 'enroll-state',
        pendingServerUrl: 'https://auth.test',
      })
      expect(await store.getPendingFlow('login')).toEqual({ state: 'login-state', codeVerifier: 'verifier' })
    })

    it('lets the last request win', async () => {
      await store.putPendingFlow('login', { state: 'first', codeVerifier: 'v1' })
      await store.putPendingFlow('login', { state: 'second', codeVerifier: 'v2' })
      expect(await store.getPendingFlow('login')).toEqual({ state: 'second', codeVerifier: 'v2' })
    })

    it('hands out a pending entry exactly once', async () => {
      await store.putPendingFlow('login', { state: 'login-state', codeVerifier: 'verifier' })
      expect(await store.takePendingFlow('login')).toEqual({ state: 'login-state', codeVerifier: 'verifier' })
      expect(await store.takePendingFlow('login')).toBeNull()
    })

    it('clears one kind without touching the other', async () => {
      await store.putPendingFlow('enrollment', { state: 'enroll-state' })
      await store.putPendingFlow('login', { state: 'login-state' })
      await store.clearPendingFlow('enrollment')
      expect(await store.getPendingFlow('enrollment')).toBeNull()
      expect(await store.getPendingFlow('login')).toEqual({ state: 'login-state' })
    })

    it('survives token and registration changes', async () => {
      await store.putPendingFlow('login', { state: 'login-state' })
      await store.saveRegistration(REGISTRATION)
      await store.clearTokens()
      expect(await store.getPendingFlow('login')).toEqual({ state: 'login-state' })
    })
  })

  it('clearAll removes everything', async () => {
    await store.saveRegistration(REGISTRATION)
    await store.saveTokens({ accessToken: 'access-1', expiresAtEpochMs: NOW })
    await store.putPendingFlow('enrollment', { state: 'enroll-state' })

    await store.clearAll()

    expect(await store.getRegistration()).toBeNull()
    expect(await store.getTokens()).toBeNull()
    expect(await store.getPendingFlow('enrollment')).toBeNull()
  })
})

describe('file-backed CredentialStore', () => {
  let dir: string

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'device-oauth-store-'))
  })

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true })
  })

  it('persists across store instances', async () => {
    const first = await createFileCredentialStore(dir)
    await first.saveRegistration(REGISTRATION)
    await first.saveTokens({ accessToken: 'access-1', refreshToken: 'refresh-1', expiresAtEpochMs: NOW })

    const second = await createFileCredentialStore(dir)
    expect(await second.getRegistration()).toEqual(REGISTRATION)
    expect(await second.getTokens()).toEqual({ accessToken: 'access-1', refreshToken: 'refresh-1', expiresAtEpochMs: NOW })
  })

  it('seals records and restricts file permissions', async () => {
    const store = await createFileCredentialStore(dir)
    await store.saveRegistration(REGISTRATION)

    const path = join(dir, 'credentials.sealed')
    expect((await stat(path)).mode & 0o777).toBe(0o600)
    expect((await stat(join(dir, 'master.key'))).mode & 0o777).toBe(0o600)
    expect(await readFile(path, 'utf-8')).not.toContain('client_abc')
  })

  it('cannot read records sealed under another master key', async () => {
    const store = await createFileCredentialStore(dir)
    await store.saveRegistration(REGISTRATION)

    const otherKey = await RecordSealer.fromRawKey(new Uint8Array(32).fill(7))
    const foreign = await createFileCredentialStore(dir, otherKey)
    await expect(foreign.getRegistration()).rejects.toThrow()
  })

  it('removes the flow file once nothing is pending', async () => {
    const store = await createFileCredentialStore(dir)
    await store.putPendingFlow('login', { state: 'login-state' })
    await store.takePendingFlow('login')
    await expect(stat(join(dir, 'flow.sealed'))).rejects.toMatchObject({ code: 'ENOENT' })
  })

  it('rejects a tampered record', async () => {
    const store = await createFileCredentialStore(dir)
    await store.saveRegistration(REGISTRATION)
    await writeFile(join(dir, 'credentials.sealed'), 'AAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAA')
    await expect(store.getRegistration()).rejects.toThrow()
  })
})
