/**
 * Wire the engines to file-backed storage for one storage directory.
 */

import type { DeviceOAuthConfig } from '../config'
import { FlowCoordinator } from '../engine/flows'
import { RegistrationEngine } from '../engine/registration'
import { TokenEngine } from '../engine/token'
import { SoftwareKeyCustody } from '../keys/custody'
import type { KeyCustody } from '../keys/custody'
import { FileKeyVault } from '../keys/vault'
import { createFileCredentialStore } from '../storage/credentials'
import type { CredentialStore } from '../storage/credentials'
import { ensurePrivateDir } from '../storage/files'
import { RecordSealer } from '../storage/sealer'
import { HttpTransportClient } from '../transport/client'
import type { FetchLike, TransportClient } from '../transport/client'

export interface DeviceOAuthServices {
  config: DeviceOAuthConfig
  custody: KeyCustody
  store: CredentialStore
  transport: TransportClient
  registration: RegistrationEngine
  tokens: TokenEngine
  flows: FlowCoordinator
}

export async function createServices(
  config: DeviceOAuthConfig,
  options: { fetch?: FetchLike } = {},
): Promise<DeviceOAuthServices> {
  await ensurePrivateDir(config.storageDir)
  const sealer = await RecordSealer.forDirectory(config.storageDir)

  const custody = new SoftwareKeyCustody(new FileKeyVault(config.storageDir, sealer), { debug: config.debug })
  const store = await createFileCredentialStore(config.storageDir, sealer)
  const transport = new HttpTransportClient({ fetch: options.fetch, timeoutMs: config.timeoutMs, debug: config.debug })

  const registration = new RegistrationEngine({
    custody,
    store,
    transport,
    redirectUri: config.redirectUri,
    clientName: config.clientName,
    jwksUri: config.jwksUri,
    debug: config.debug,
  })
  const tokens = new TokenEngine({
    custody,
    store,
    transport,
    redirectUri: config.redirectUri,
    debug: config.debug,
  })
  const flows = new FlowCoordinator({ registration, tokens, store, debug: config.debug })

  return { config, custody, store, transport, registration, tokens, flows }
}
