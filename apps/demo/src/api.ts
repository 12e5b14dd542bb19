import { Observable, of } from 'rxjs'
import { delay, map } from 'rxjs/operators'
import { decodeErrorDefs } from '@mvu-forms/forms'
import type { ErrorDef, JsonValue } from '@mvu-forms/forms'

export type KeyLabel = readonly [key: string, label: string]

export type SignUpResult = { ok: true } | { ok: false; errors: ErrorDef[] }

export interface SignUpApi {
  countries(): Observable<readonly KeyLabel[]>
  signUp(values: Record<string, JsonValue>): Observable<SignUpResult>
}

/** What the server sends back: a status and a JSON body. */
export interface ServerResponse {
  status: number
  body: string
}

/**
 * Turn a sign-up response into a result. 422 carries `[{ text, key }]`
 * validation errors; anything else but 2xx is an error.
 */
export function readSignUpResponse(response: ServerResponse): SignUpResult {
  if (response.status >= 200 && response.status < 300) return { ok: true }
  if (response.status === 422) return { ok: false, errors: decodeErrorDefs(response.body) }
  throw new Error(`Sign-up failed with status ${response.status}`)
}

// ---------------------------------------------------------------------------
// In-memory server
// ---------------------------------------------------------------------------

const COUNTRIES: readonly KeyLabel[] = [
  ['be', 'Belgium'],
  ['ca', 'Canada'],
  ['fr', 'France'],
  ['de', 'Germany'],
  ['jp', 'Japan'],
  ['nl', 'Netherlands'],
  ['es', 'Spain'],
  ['gb', 'United Kingdom'],
]

const TAKEN_USERNAMES = new Set(['admin', 'root'])

/** Server-side checks the form cannot make on its own. */
export function checkSignUp(values: Record<string, JsonValue>): ServerResponse {
  const errors: ErrorDef[] = []
  const username = values.username
  if (typeof username === 'string' && TAKEN_USERNAMES.has(username.trim().toLowerCase())) {
    errors.push({ key: 'username', text: 'This username is already taken' })
  }
  const email = values.email
  if (typeof email === 'string' && email.endsWith('@example.invalid')) {
    errors.push({ key: 'email', text: 'We cannot deliver mail to this domain' })
  }
  return errors.length > 0 ? { status: 422, body: JSON.stringify(errors) } : { status: 201, body: '{}' }
}

export interface FakeApiOptions {
  /** Milliseconds before each response. */
  latency?: number
}

export function createFakeApi(options: FakeApiOptions = {}): SignUpApi {
  const latency = options.latency ?? 600
  return {
    countries: () => of(COUNTRIES).pipe(delay(latency)),
    signUp: (values) => of(values).pipe(delay(latency), map(checkSignUp), map(readSignUpResponse)),
  }
}
