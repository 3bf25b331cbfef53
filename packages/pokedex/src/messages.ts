import type { FetchFailure } from './failures'
import { failureMessage } from './failures'
import type { JumpError } from './navigator'
import { MIN_ID } from './navigator'
import type { Pokemon } from './pokemon'

/** Text shown in place of a record that failed to load. */
export function describeFailure(failure: FetchFailure): string {
  const message = failureMessage(failure)
  return failure.kind === 'not-found' ? message : `Error: ${message}`
}

export function describeJumpError(error: JumpError): string {
  switch (error.kind) {
    case 'not-a-number':
      return 'Enter a valid number'
    case 'out-of-range':
      return `Pokémon IDs go up to ${error.max}. Try ${MIN_ID}–${error.max}.`
  }
}

/** Capitalised name, or "Unknown" for an empty one. */
export function displayName(pokemon: Pokemon): string {
  const { name } = pokemon
  return name === '' ? 'Unknown' : name[0].toUpperCase() + name.slice(1)
}
