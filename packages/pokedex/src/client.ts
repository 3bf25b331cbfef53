import { Observable, throwError } from 'rxjs'
import { catchError, map } from 'rxjs/operators'
import { createHttpClient } from '@dexnav/http'
import type { HttpInterceptor, HttpTransport } from '@dexnav/http'
import { decodePokemon } from './decode'
import { PokemonFetchError, toFetchFailure } from './failures'
import type { Pokemon } from './pokemon'

export const POKEAPI_BASE_URL = 'https://pokeapi.co/api/v2'
export const DEFAULT_TIMEOUT_MS = 10_000

export interface PokemonClientConfig {
  /** Defaults to PokeAPI v2. */
  baseUrl?: string
  /** Defaults to 10 seconds. */
  timeoutMs?: number
  /** Defaults to the fetch-based transport. */
  transport?: HttpTransport
  interceptors?: HttpInterceptor[]
}

export interface PokemonClient {
  /**
   * Cold Observable: one GET per subscription, one `Pokemon` or one
   * `PokemonFetchError`. The id goes into the URL as given.
   */
  fetch(id: number): Observable<Pokemon>
}

/**
 * createPokemonClient(config?)
 *
 * @example
 *   const client = createPokemonClient()
 *   client.fetch(25).subscribe({
 *     next: (p) => console.log(p.name),
 *     error: (e: PokemonFetchError) => console.error(e.failure.kind),
 *   })
 */
export function createPokemonClient(config?: PokemonClientConfig): PokemonClient {
  const http = createHttpClient({
    baseUrl: config?.baseUrl ?? POKEAPI_BASE_URL,
    timeoutMs: config?.timeoutMs ?? DEFAULT_TIMEOUT_MS,
    transport: config?.transport,
    interceptors: config?.interceptors,
    acceptStatus: (status) => status === 200,
  })

  return {
    fetch(id: number): Observable<Pokemon> {
      return http.get<unknown>(`/pokemon/${id}`).pipe(
        map(decodePokemon),
        catchError((err: unknown) =>
          throwError(() =>
            err instanceof PokemonFetchError ? err : new PokemonFetchError(toFetchFailure(err, id)),
          ),
        ),
      )
    },
  }
}
