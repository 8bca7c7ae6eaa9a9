/**
 * Classify a redirect callback URL.
 *
 * Enrollment redirects carry `iat`, login redirects carry `code`, and either
 * may come back with an OAuth `error` instead. When several are present the
 * first match in that order wins.
 */

export type CallbackParams =
  | { kind: 'enrollment'; iat: string; state: string | null }
  | { kind: 'login'; code: string; state: string | null }
  | { kind: 'error'; error: string; description: string | null }
  | { kind: 'unknown' }

export function parseCallback(url: string): CallbackParams {
  let params: URLSearchParams
  try {
    params = new URL(url).searchParams
  } catch {
    return { kind: 'unknown' }
  }

  const iat = params.get('iat')
  if (iat) return { kind: 'enrollment', iat, state: params.get('state') }

  const code = params.get('code')
  if (code) return { kind: 'login', code, state: params.get('state') }

  const error = params.get('error')
  if (error) return { kind: 'error', error, description: params.get('error_description') }

  return { kind: 'unknown' }
}
