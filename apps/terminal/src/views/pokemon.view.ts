import { Observable, merge } from 'rxjs'
import { distinctUntilChanged, filter, map } from 'rxjs/operators'
import { isError, isLoading, isSuccess } from '@dexnav/http'
import { describeFailure, describeJumpError, displayName, isRetryable } from '@dexnav/pokedex'
import type { JumpError, PokedexState, Pokemon } from '@dexnav/pokedex'

export function renderPokemon(pokemon: Pokemon): string {
  const lines = [
    `#${pokemon.id} ${displayName(pokemon)}`,
    `height: ${pokemon.height} • weight: ${pokemon.weight}`,
  ]
  if (pokemon.spriteUrl !== undefined) lines.push(`sprite: ${pokemon.spriteUrl}`)
  return lines.join('\n')
}

/** Text for the record panel; empty before the first load. */
export function renderState(state: PokedexState): string {
  const { remote, currentId } = state
  if (isLoading(remote)) return `Loading #${currentId}…`
  if (isSuccess(remote)) return renderPokemon(remote.data)
  if (isError(remote)) {
    const lines = [`Failed to load id=${currentId}`, describeFailure(remote.error)]
    if (isRetryable(remote.error)) lines.push('[r] retry')
    return lines.join('\n')
  }
  return ''
}

export const renderJumpError = (error: JumpError): string => `! ${describeJumpError(error)}`

/**
 * Everything the terminal prints for a session: one block per fetch
 * transition, one line per rejected jump.
 */
export function pokemonView(state$: Observable<PokedexState>): Observable<string> {
  const panel$ = state$.pipe(
    distinctUntilChanged((a, b) => a.remote === b.remote),
    map(renderState),
    filter((text) => text !== ''),
  )

  const notices$ = state$.pipe(
    map((s) => s.jumpError),
    distinctUntilChanged(),
    filter((e): e is JumpError => e !== null),
    map(renderJumpError),
  )

  return merge(panel$, notices$)
}
