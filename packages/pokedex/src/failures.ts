import {
  HttpParseError,
  HttpStatusError,
  HttpTimeoutError,
  HttpTransportError,
} from '@dexnav/http'

// ---------------------------------------------------------------------------
// FetchFailure — every way a fetch can fail, as an inspectable value
// ---------------------------------------------------------------------------

export type FetchFailure =
  | { kind: 'malformed-payload'; reason: string }
  | { kind: 'not-found'; id: number }
  | { kind: 'unexpected-status'; status: number }
  | { kind: 'timed-out'; timeoutMs: number }
  | { kind: 'transport'; cause: Error }

/**
 * Whether asking again for the same id can succeed. Malformed payloads and
 * missing records stay that way until the id or the upstream changes.
 */
export function isRetryable(failure: FetchFailure): boolean {
  switch (failure.kind) {
    case 'malformed-payload':
    case 'not-found':
      return false
    case 'unexpected-status':
    case 'timed-out':
    case 'transport':
      return true
  }
}

/** The cause of a failure in plain words, without any UI prefix. */
export function failureMessage(failure: FetchFailure): string {
  switch (failure.kind) {
    case 'malformed-payload':
      return `Unexpected JSON shape for Pokémon (${failure.reason})`
    case 'not-found':
      return `No Pokémon with id=${failure.id}`
    case 'unexpected-status':
      return `Failed to load Pokémon (HTTP ${failure.status})`
    case 'timed-out':
      return 'Request timed out'
    case 'transport':
      return `Network request failed: ${failure.cause.message}`
  }
}

/** Carries a FetchFailure through an Observable's error channel. */
export class PokemonFetchError extends Error {
  name = 'PokemonFetchError'

  constructor(readonly failure: FetchFailure) {
    super(failureMessage(failure))
  }
}

export function malformedPayload(reason: string): PokemonFetchError {
  return new PokemonFetchError({ kind: 'malformed-payload', reason })
}

/**
 * toFetchFailure(err, id)
 *
 * Classifies anything thrown while fetching `id`. Errors that are not from
 * the HTTP layer count as transport failures.
 */
export function toFetchFailure(err: unknown, id: number): FetchFailure {
  if (err instanceof PokemonFetchError) return err.failure
  if (err instanceof HttpStatusError) {
    return err.status === 404
      ? { kind: 'not-found', id }
      : { kind: 'unexpected-status', status: err.status }
  }
  if (err instanceof HttpTimeoutError) return { kind: 'timed-out', timeoutMs: err.timeoutMs }
  if (err instanceof HttpParseError) {
    return { kind: 'malformed-payload', reason: 'body is not valid JSON' }
  }
  if (err instanceof HttpTransportError) return { kind: 'transport', cause: err.cause }
  return { kind: 'transport', cause: err instanceof Error ? err : new Error(String(err)) }
}
