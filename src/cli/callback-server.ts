/**
 * Loopback redirect listener
 *
 * Serves the redirect URI's path on its host and port, hands the first
 * callback URL to the flow coordinator, answers the browser with a short
 * page and shuts down. Gives up after {@link CALLBACK_TIMEOUT_MS}.
 */

import type { Server } from 'node:net'
import { serve } from '@hono/node-server'
import { Hono } from 'hono'
import type { ApiResult } from '../errors'
import { describeFailure, transportError } from '../errors'
import type { CallbackOutcome } from '../engine/flows'

export const CALLBACK_TIMEOUT_MS = 5 * 60 * 1000

type CallbackHandler = (url: string) => Promise<ApiResult<CallbackOutcome>>

function escapeHtml(text: string): string {
  return text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;').replace(/"/g, '&quot;')
}

export function renderCallbackPage(result: ApiResult<CallbackOutcome>): string {
  const message =
    result.type === 'success'
      ? result.data.kind === 'registered'
        ? 'Device registered. You may close this tab.'
        : 'Login complete. You may close this tab.'
      : `Authentication failed: ${describeFailure(result)}`
  return `<!DOCTYPE html><html><head><meta charset="utf-8"><title>device-oauth</title></head><body><p>${escapeHtml(message)}</p></body></html>`
}

/**
 * Only the first request to `callbackPath` is handled; later ones get 409.
 */
export function createCallbackApp(
  callbackPath: string,
  handle: CallbackHandler,
  onResult: (result: ApiResult<CallbackOutcome>) => void,
): Hono {
  const app = new Hono()
  let handled = false

  app.get(callbackPath, async (c) => {
    if (handled) {
      return c.text('Callback already received', 409)
    }
    handled = true

    let result: ApiResult<CallbackOutcome>
    try {
      result = await handle(c.req.url)
    } catch (error) {
      result = transportError(error)
    }
    onResult(result)
    return c.html(renderCallbackPage(result), result.type === 'success' ? 200 : 400)
  })

  return app
}

export interface WaitForCallbackOptions {
  redirectUri: string
  handle: CallbackHandler
  /** Called once the listener is up, typically to open the browser */
  onListening?: () => Promise<void>
  timeoutMs?: number
}

/**
 * Port the loopback listener binds for a redirect URI. The listener speaks
 * plain HTTP, so only http: redirects can be served; null otherwise.
 */
export function callbackPort(redirect: URL): number | null {
  if (redirect.protocol !== 'http:') return null
  return redirect.port ? Number(redirect.port) : 80
}

export function waitForCallback(options: WaitForCallbackOptions): Promise<ApiResult<CallbackOutcome>> {
  const redirect = new URL(options.redirectUri)
  const port = callbackPort(redirect)
  const timeoutMs = options.timeoutMs ?? CALLBACK_TIMEOUT_MS

  if (port === null) {
    return Promise.resolve(
      transportError(new Error(`Cannot listen for ${redirect.protocol} redirects: ${options.redirectUri}`)),
    )
  }

  return new Promise((resolve) => {
    let settled = false
    let server: Server | undefined

    const finish = (result: ApiResult<CallbackOutcome>): void => {
      if (settled) return
      settled = true
      clearTimeout(timer)
      server?.close()
      resolve(result)
    }

    const timer = setTimeout(() => {
      finish(transportError(new Error(`No callback received within ${Math.round(timeoutMs / 1000)}s`)))
    }, timeoutMs)

    const app = createCallbackApp(redirect.pathname, options.handle, finish)
    const listener: Server = serve({ fetch: app.fetch, port, hostname: redirect.hostname }, () => {
      options.onListening?.().catch((error: unknown) => finish(transportError(error)))
    })
    listener.on('error', (error: Error) => finish(transportError(error)))
    server = listener
  })
}
