import {
  BehaviorSubject,
  Observable,
  Subject,
  Subscription,
  asapScheduler,
  merge,
} from 'rxjs'
import {
  distinctUntilChanged,
  map,
  observeOn,
  scan,
  shareReplay,
  startWith,
} from 'rxjs/operators'

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type Reducer<S, A> = (state: S, action: A) => S

export interface Store<S, A> {
  /** Multicasted state stream. Replays the latest value to late subscribers. */
  state$: Observable<S>
  /**
   * Stream of every action that was dispatched.
   * Use this (or `runEffects`) to implement side-effects without putting
   * them in the reducer.
   */
  actions$: Observable<A>
  /** Send an action through the reducer to update state. */
  dispatch(action: A): void
  /**
   * Derive a slice of state. Emits only when the selected value changes
   * (strict equality check).
   */
  select<T>(selector: (state: S) => T): Observable<T>
  /** Synchronous snapshot of the current state. */
  getState(): S
}

// ---------------------------------------------------------------------------
// createStore
// ---------------------------------------------------------------------------

/**
 * createStore<S, A>(reducer, initialState)
 *
 * MVU-style store built on RxJS:
 *
 *   Subject<A>  →  scan(reducer, initial)  →  startWith(initial)  →  shareReplay(1)
 *                        ↑                                                 ↓
 *                   dispatch(action)                               state$ / select()
 *
 * The store is the single writer of its state: every transition goes
 * through the reducer and replaces the previous value wholesale.
 *
 * @example
 *   type State = { currentId: number }
 *   type Action = { type: 'NEXT' } | { type: 'PREV' }
 *
 *   const store = createStore<State, Action>(
 *     (s, a) => {
 *       switch (a.type) {
 *         case 'NEXT': return { currentId: s.currentId + 1 }
 *         case 'PREV': return { currentId: s.currentId - 1 }
 *       }
 *     },
 *     { currentId: 1 },
 *   )
 *
 *   store.select(s => s.currentId).subscribe(id => console.log('id:', id))
 *   store.dispatch({ type: 'NEXT' })
 */
export function createStore<S, A>(reducer: Reducer<S, A>, initialState: S): Store<S, A> {
  const actionsSubject = new Subject<A>()
  // Synchronous snapshot — kept in sync by subscribing to state$
  const stateBs = new BehaviorSubject<S>(initialState)

  const actions$ = actionsSubject.asObservable()

  const state$ = actionsSubject.pipe(
    scan(reducer, initialState),
    startWith(initialState),
    shareReplay({ bufferSize: 1, refCount: false }),
  )

  state$.subscribe((s) => stateBs.next(s))

  return {
    state$,
    actions$,
    dispatch(action: A) {
      actionsSubject.next(action)
    },
    select<T>(selector: (state: S) => T): Observable<T> {
      return state$.pipe(map(selector), distinctUntilChanged())
    },
    getState(): S {
      return stateBs.value
    },
  }
}

// ---------------------------------------------------------------------------
// runEffects
// ---------------------------------------------------------------------------

/** Maps the store's streams to follow-up actions (HTTP, timers, …). */
export type Effect<S, A> = (actions$: Observable<A>, state$: Observable<S>) => Observable<A>

/**
 * runEffects(store, ...effects)
 *
 * Subscribes every effect and dispatches the actions it emits back into the
 * store. Follow-up actions are delivered on the asap scheduler, so an effect
 * that answers synchronously still lands after the dispatch that triggered it
 * has reached every subscriber.
 *
 * Unsubscribe the returned Subscription to stop all effects.
 *
 * @example
 *   const sub = runEffects(store, (_actions$, state$) =>
 *     state$.pipe(
 *       filter(s => s.remote.status === 'loading'),
 *       switchMap(s => client.fetch(s.currentId).pipe(map(pokemon => ({ type: 'LOADED' as const, pokemon })))),
 *     ),
 *   )
 */
export function runEffects<S, A>(store: Store<S, A>, ...effects: Effect<S, A>[]): Subscription {
  return merge(...effects.map((effect) => effect(store.actions$, store.state$)))
    .pipe(observeOn(asapScheduler))
    .subscribe((action) => store.dispatch(action))
}
