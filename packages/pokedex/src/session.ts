import { Observable, Subscription, of } from 'rxjs'
import { catchError, distinctUntilChanged, filter, map, mergeMap } from 'rxjs/operators'
import { failure, loading, success } from '@dexnav/http'
import type { RemoteData } from '@dexnav/http'
import { createStore, runEffects } from '@dexnav/store'
import type { Effect, Reducer, Store } from '@dexnav/store'
import type { PokemonClient } from './client'
import { toFetchFailure } from './failures'
import type { FetchFailure } from './failures'
import { MAX_ID, MIN_ID, nextId, prevId, validateJumpTarget } from './navigator'
import type { JumpError } from './navigator'
import type { Pokemon } from './pokemon'

// ---------------------------------------------------------------------------
// State
// ---------------------------------------------------------------------------

export interface PokedexState {
  readonly currentId: number
  /** Bumped for every fetch started; results from older generations are dropped. */
  readonly generation: number
  readonly remote: RemoteData<Pokemon, FetchFailure>
  /** Why the last jump was rejected, until the next fetch starts. */
  readonly jumpError: JumpError | null
}

// ---------------------------------------------------------------------------
// Actions
// ---------------------------------------------------------------------------

export type PokedexAction =
  | { type: 'LOAD'; id?: number }
  | { type: 'NEXT' }
  | { type: 'PREV' }
  | { type: 'JUMP'; input: string }
  | { type: 'REFRESH' }
  | { type: 'FETCH_SUCCEEDED'; generation: number; pokemon: Pokemon }
  | { type: 'FETCH_FAILED'; generation: number; failure: FetchFailure }

export interface SessionOptions {
  /** First id loaded by `start()`. Defaults to 1. */
  initialId?: number
  /** Lower bound of the prev/next cycle. Defaults to 1. */
  minId?: number
  /** Upper bound of the prev/next cycle and of jumps. Defaults to 151. */
  maxId?: number
}

export const isBusy = (state: PokedexState): boolean => state.remote.status === 'loading'

export function initialPokedexState(initialId = MIN_ID): PokedexState {
  return { currentId: initialId, generation: 0, remote: { status: 'idle' }, jumpError: null }
}

// ---------------------------------------------------------------------------
// Reducer
// ---------------------------------------------------------------------------

function startFetch(state: PokedexState, id: number): PokedexState {
  return { currentId: id, generation: state.generation + 1, remote: loading(), jumpError: null }
}

export function createPokedexReducer(
  options?: Pick<SessionOptions, 'minId' | 'maxId'>,
): Reducer<PokedexState, PokedexAction> {
  const minId = options?.minId ?? MIN_ID
  const maxId = options?.maxId ?? MAX_ID

  return (state, action) => {
    switch (action.type) {
      case 'LOAD':
        return startFetch(state, action.id ?? state.currentId)
      case 'NEXT':
        return startFetch(state, nextId(state.currentId, minId, maxId))
      case 'PREV':
        return startFetch(state, prevId(state.currentId, minId, maxId))
      case 'REFRESH':
        return startFetch(state, state.currentId)
      case 'JUMP': {
        const result = validateJumpTarget(action.input, maxId)
        return result.ok ? startFetch(state, result.id) : { ...state, jumpError: result.error }
      }
      case 'FETCH_SUCCEEDED':
        if (action.generation !== state.generation) return state
        return { ...state, remote: success(action.pokemon) }
      case 'FETCH_FAILED':
        if (action.generation !== state.generation) return state
        return { ...state, remote: failure(action.failure) }
    }
  }
}

// ---------------------------------------------------------------------------
// Effects
// ---------------------------------------------------------------------------

/**
 * One fetch per generation. Every result is tagged with the generation that
 * asked for it; the reducer decides whether it is still wanted.
 */
export function fetchEffect(client: PokemonClient): Effect<PokedexState, PokedexAction> {
  return (_actions$, state$): Observable<PokedexAction> =>
    state$.pipe(
      filter(isBusy),
      distinctUntilChanged((a, b) => a.generation === b.generation),
      mergeMap(({ currentId, generation }) =>
        client.fetch(currentId).pipe(
          map((pokemon): PokedexAction => ({ type: 'FETCH_SUCCEEDED', generation, pokemon })),
          catchError((err: unknown) =>
            of<PokedexAction>({
              type: 'FETCH_FAILED',
              generation,
              failure: toFetchFailure(err, currentId),
            }),
          ),
        ),
      ),
    )
}

// ---------------------------------------------------------------------------
// Session
// ---------------------------------------------------------------------------

export interface PokedexSession {
  store: Store<PokedexState, PokedexAction>
  /** Starts the fetch effect and loads the initial id. */
  start(): Subscription
}

/**
 * createPokedexSession(client, options?)
 *
 * @example
 *   const session = createPokedexSession(createPokemonClient())
 *   session.store.state$.subscribe(render)
 *   const sub = session.start()
 *   session.store.dispatch({ type: 'NEXT' })
 */
export function createPokedexSession(
  client: PokemonClient,
  options?: SessionOptions,
): PokedexSession {
  const store = createStore(createPokedexReducer(options), initialPokedexState(options?.initialId))

  return {
    store,
    start() {
      const sub = runEffects(store, fetchEffect(client))
      store.dispatch({ type: 'LOAD' })
      return sub
    },
  }
}
