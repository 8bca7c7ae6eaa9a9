#!/usr/bin/env node
/**
 * device-oauth CLI
 * Register this device as an OAuth client and log in with PKCE
 *
 * Usage:
 *   device-oauth probe <url>    - Check that a server is reachable
 *   device-oauth enroll <url>   - Enroll and register this device with a server
 *   device-oauth login          - Login through the browser
 *   device-oauth whoami         - Show current authenticated user
 *   device-oauth status         - Show registration and token status
 *   device-oauth logout         - Remove tokens, keep the registration
 *   device-oauth reset          - Delete the signing key and all stored state
 */

import { loadConfig } from '../config'
import type { CallbackOutcome } from '../engine/flows'
import type { ApiResult, Failure } from '../errors'
import { describeFailure, ErrorCode } from '../errors'
import { waitForCallback } from './callback-server'
import { createServices } from './services'
import type { DeviceOAuthServices } from './services'

const VERSION = '0.1.0'

const colors = {
  reset: '\x1b[0m',
  bright: '\x1b[1m',
  dim: '\x1b[2m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  red: '\x1b[31m',
  cyan: '\x1b[36m',
  gray: '\x1b[90m',
  blue: '\x1b[34m',
}

function printError(message: string, detail?: string) {
  console.error(`${colors.red}Error:${colors.reset} ${message}`)
  if (detail) console.error(detail)
}

function printFailure(message: string, failure: Failure) {
  printError(message, describeFailure(failure))
  if (failure.type === 'validation_error' && failure.fatal) {
    console.error(`\nRun ${colors.cyan}device-oauth reset${colors.reset} and enroll again`)
  }
  if (failure.type === 'transport_error' && failure.cause instanceof Error && failure.cause.stack && process.env.DEBUG) {
    console.error(`\n${colors.dim}Stack trace:${colors.reset}`)
    console.error(`${colors.dim}${failure.cause.stack}${colors.reset}`)
  }
}

function printSuccess(message: string) {
  console.log(`${colors.green}✓${colors.reset} ${message}`)
}

function printInfo(message: string) {
  console.log(`${colors.cyan}ℹ${colors.reset} ${message}`)
}

function printHelp() {
  console.log(`
${colors.bright}device-oauth CLI${colors.reset} — Dynamic Client Registration for devices

${colors.cyan}Usage:${colors.reset}
  device-oauth <command> [options]

${colors.cyan}Commands:${colors.reset}
  probe <url>    Check that a server is reachable
  enroll <url>   Enroll and register this device with a server
  login          Login through the browser (PKCE)
  whoami         Show current authenticated user
  status         Show registration and token status
  logout         Remove tokens, keep the registration
  reset          Delete the signing key and all stored state

${colors.cyan}Options:${colors.reset}
  --help, -h     Show this help message
  --version, -v  Show version
  --debug        Show debug information

${colors.cyan}Examples:${colors.reset}
  ${colors.gray}# Register this device${colors.reset}
  device-oauth enroll https://auth.example.com

  ${colors.gray}# Login and check who is logged in${colors.reset}
  device-oauth login
  device-oauth whoami

${colors.cyan}Environment Variables:${colors.reset}
  DEVICE_OAUTH_SERVER_URL     Default server for probe and enroll
  DEVICE_OAUTH_REDIRECT_URI   Redirect URI (default: http://127.0.0.1:8765/oauth/callback)
  DEVICE_OAUTH_STORAGE_DIR    Credential storage directory (default: ~/.device-oauth)
  DEVICE_OAUTH_TIMEOUT_MS     HTTP timeout in milliseconds (default: 30000)
  DEVICE_OAUTH_CLIENT_NAME    Prefix of the registered client name
  DEBUG                       Enable debug output
`)
}

async function openBrowser(url: string) {
  const open = await import('open').catch(() => null)
  if (open) {
    try {
      await open.default(url)
      printSuccess('Opened browser')
    } catch {
      printInfo('Could not open browser. Please visit the URL above manually.')
    }
  } else {
    printInfo('Could not open browser. Please visit the URL above manually.')
  }
}

async function runBrowserFlow(services: DeviceOAuthServices, url: string): Promise<ApiResult<CallbackOutcome>> {
  console.log(`\n  ${colors.dim}Open this URL to continue:${colors.reset}`)
  console.log(`  ${colors.blue}${url}${colors.reset}\n`)

  const result = await waitForCallback({
    redirectUri: services.config.redirectUri,
    handle: (callbackUrl) => services.flows.handleCallback(callbackUrl),
    onListening: async () => {
      await openBrowser(url)
      console.log(`\n${colors.dim}Waiting for the browser to return...${colors.reset}\n`)
    },
  })

  if (result.type !== 'success') {
    await services.flows.cancel('enrollment')
    await services.flows.cancel('login')
  }
  return result
}

function requireServerUrl(services: DeviceOAuthServices, arg: string | undefined): string {
  const serverUrl = arg ?? services.config.serverUrl
  if (!serverUrl) {
    printError('Server URL required', `Pass it as an argument or set DEVICE_OAUTH_SERVER_URL`)
    process.exit(1)
  }
  return serverUrl
}

async function probeCommand(services: DeviceOAuthServices, arg: string | undefined) {
  const serverUrl = requireServerUrl(services, arg)
  const result = await services.registration.probeServer(serverUrl)
  if (result.type !== 'success') {
    printFailure(`Server unreachable: ${serverUrl}`, result)
    process.exit(1)
  }
  printSuccess(`Server reachable: ${serverUrl}`)
}

async function enrollCommand(services: DeviceOAuthServices, arg: string | undefined) {
  const serverUrl = requireServerUrl(services, arg)

  const existing = await services.registration.getRegistration()
  if (existing.type === 'success' && existing.data && (await services.registration.isDeviceRegistered())) {
    printInfo(`Already registered with ${existing.data.serverUrl} (client ${existing.data.clientId})`)
    console.log(`\nRun ${colors.cyan}device-oauth reset${colors.reset} to register again`)
    return
  }

  console.log(`${colors.bright}Enrolling device with ${serverUrl}...${colors.reset}`)
  const begin = await services.flows.beginEnrollment(serverUrl)
  if (begin.type !== 'success') {
    printFailure('Registration failed', begin)
    process.exit(1)
  }
  const result = await runBrowserFlow(services, begin.data)
  if (result.type !== 'success') {
    printFailure('Registration failed', result)
    process.exit(1)
  }

  const registration = await services.registration.getRegistration()
  printSuccess('Device registered!')
  if (registration.type === 'success' && registration.data) {
    console.log(`  ${colors.green}Client:${colors.reset} ${registration.data.clientId}`)
    console.log(`  ${colors.green}Key:${colors.reset}    ${registration.data.keyId}`)
  }
  console.log(`\nRun ${colors.cyan}device-oauth login${colors.reset} to authenticate`)
}

async function loginCommand(services: DeviceOAuthServices) {
  const begin = await services.flows.beginLogin()
  if (begin.type !== 'success') {
    if (begin.type === 'validation_error' && begin.code === ErrorCode.NotRegistered) {
      console.log(`${colors.dim}Device is not registered${colors.reset}`)
      console.log(`\nRun ${colors.cyan}device-oauth enroll <url>${colors.reset} first`)
      process.exit(1)
    }
    printFailure('Login failed', begin)
    process.exit(1)
  }

  console.log(`${colors.bright}Starting login...${colors.reset}`)
  const result = await runBrowserFlow(services, begin.data)
  if (result.type !== 'success') {
    printFailure('Login failed', result)
    process.exit(1)
  }

  printSuccess('Login successful!')
  const user = await services.tokens.getUserInfo()
  if (user.type === 'success') {
    console.log(`\n${colors.dim}Logged in as:${colors.reset}`)
    console.log(`  ${colors.bright}${user.data.displayName ?? user.data.username}${colors.reset}`)
    if (user.data.email) console.log(`  ${colors.gray}${user.data.email}${colors.reset}`)
  }
  console.log(`\n${colors.dim}Credentials stored in: ${colors.green}${services.config.storageDir}${colors.reset}`)
}

async function whoamiCommand(services: DeviceOAuthServices) {
  const result = await services.tokens.getUserInfo()

  if (result.type === 'validation_error' && result.code === ErrorCode.NotLoggedIn) {
    console.log(`${colors.dim}Not logged in${colors.reset}`)
    console.log(`\nRun ${colors.cyan}device-oauth login${colors.reset} to authenticate`)
    return
  }
  if (result.type !== 'success') {
    printFailure('Failed to get user info', result)
    process.exit(1)
  }

  const user = result.data
  console.log(`${colors.bright}Authenticated as:${colors.reset}`)
  console.log(`  ${colors.green}Username:${colors.reset} ${user.username}`)
  if (user.displayName) console.log(`  ${colors.green}Name:${colors.reset} ${user.displayName}`)
  if (user.email) console.log(`  ${colors.green}Email:${colors.reset} ${user.email}`)
  console.log(`  ${colors.green}ID:${colors.reset} ${user.id}`)
}

async function statusCommand(services: DeviceOAuthServices) {
  console.log(`${colors.bright}device-oauth Status${colors.reset}\n`)

  console.log(`${colors.cyan}Storage:${colors.reset} ${colors.green}Sealed File${colors.reset}`)
  console.log(`  ${colors.dim}${services.config.storageDir} (0600 permissions)${colors.reset}`)

  const stored = await services.registration.getRegistration()
  if (stored.type !== 'success') {
    printFailure('Could not read stored credentials', stored)
    process.exit(1)
  }
  const registration = stored.data
  if (!registration) {
    console.log(`\n${colors.cyan}Device:${colors.reset} ${colors.dim}Not registered${colors.reset}`)
    console.log(`\nRun ${colors.cyan}device-oauth enroll <url>${colors.reset} to register`)
    return
  }

  const key = await services.custody.describeKey(registration.keyId)
  console.log(`\n${colors.cyan}Device:${colors.reset} ${colors.green}Registered${colors.reset}`)
  console.log(`  ${colors.dim}Server: ${registration.serverUrl}${colors.reset}`)
  console.log(`  ${colors.dim}Client: ${registration.clientId}${colors.reset}`)
  console.log(`  ${colors.dim}Since:  ${new Date(registration.registeredAtEpochMs).toISOString()}${colors.reset}`)
  if (key) {
    console.log(`  ${colors.dim}Key:    ${key.keyId} (${key.hardwareBacked ? 'hardware' : 'software'})${colors.reset}`)
  } else {
    console.log(`  ${colors.yellow}Signing key missing${colors.reset}, run ${colors.cyan}device-oauth reset${colors.reset}`)
  }

  const storedTokens = await services.tokens.getTokens()
  const tokens = storedTokens.type === 'success' ? storedTokens.data : null
  if (!tokens) {
    console.log(`\n${colors.cyan}Token:${colors.reset} ${colors.dim}Not logged in${colors.reset}`)
  } else {
    const remaining = tokens.expiresAtEpochMs - Date.now()
    if (remaining > 0) {
      const minutes = Math.floor(remaining / 60000)
      console.log(`\n${colors.cyan}Token:${colors.reset} ${colors.green}Valid${colors.reset} (expires in ${minutes} min)`)
    } else if (tokens.refreshToken) {
      console.log(`\n${colors.cyan}Token:${colors.reset} ${colors.yellow}Expired${colors.reset} (refreshable)`)
    } else {
      console.log(`\n${colors.cyan}Token:${colors.reset} ${colors.yellow}Expired${colors.reset}`)
    }
  }

  const status = await services.flows.status()
  const flows = status.type === 'success' ? status.data : { enrollmentPending: false, loginPending: false }
  if (flows.enrollmentPending || flows.loginPending) {
    const pending = [flows.enrollmentPending && 'enrollment', flows.loginPending && 'login'].filter(Boolean).join(', ')
    console.log(`\n${colors.cyan}Pending:${colors.reset} ${pending}`)
  }
}

async function logoutCommand(services: DeviceOAuthServices) {
  const tokens = await services.tokens.getTokens()
  if (tokens.type === 'success' && !tokens.data) {
    printInfo('Not logged in')
    return
  }
  const result = await services.tokens.logout()
  if (result.type !== 'success') {
    printFailure('Logout failed', result)
    process.exit(1)
  }
  printSuccess('Logged out successfully')
}

async function resetCommand(services: DeviceOAuthServices) {
  const registration = await services.registration.getRegistration()
  const result = await services.registration.resetRegistration()
  if (result.type !== 'success') {
    printFailure('Reset failed', result)
    process.exit(1)
  }
  if (registration.type === 'success' && registration.data) {
    printSuccess(`Removed registration with ${registration.data.serverUrl}`)
  } else {
    printSuccess('Local state cleared')
  }
}

async function main() {
  const args = process.argv.slice(2)

  if (args.includes('--help') || args.includes('-h')) {
    printHelp()
    process.exit(0)
  }

  if (args.includes('--version') || args.includes('-v')) {
    console.log(`device-oauth v${VERSION}`)
    process.exit(0)
  }

  if (args.includes('--debug')) {
    process.env.DEBUG = 'true'
  }

  const [command, arg] = args.filter((a) => !a.startsWith('-'))
  const services = await createServices(loadConfig())

  switch (command) {
    case 'probe':
      await probeCommand(services, arg)
      break
    case 'enroll':
      await enrollCommand(services, arg)
      break
    case 'login':
      await loginCommand(services)
      break
    case 'whoami':
      await whoamiCommand(services)
      break
    case undefined:
    case 'status':
      await statusCommand(services)
      break
    case 'logout':
      await logoutCommand(services)
      break
    case 'reset':
      await resetCommand(services)
      break
    default:
      printError(`Unknown command: ${command}`)
      console.log(`\nRun ${colors.cyan}device-oauth --help${colors.reset} for usage information`)
      process.exit(1)
  }
}

main().catch((error: unknown) => {
  printError('Unexpected error', error instanceof Error ? error.message : String(error))
  process.exit(1)
})

export { main }
