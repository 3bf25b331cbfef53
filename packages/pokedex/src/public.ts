export type { Pokemon } from './pokemon'
export { decodePokemon } from './decode'
export {
  PokemonFetchError,
  failureMessage,
  isRetryable,
  malformedPayload,
  toFetchFailure,
} from './failures'
export type { FetchFailure } from './failures'
export { DEFAULT_TIMEOUT_MS, POKEAPI_BASE_URL, createPokemonClient } from './client'
export type { PokemonClient, PokemonClientConfig } from './client'
export { MAX_ID, MIN_ID, nextId, prevId, validateJumpTarget } from './navigator'
export type { JumpError, JumpResult } from './navigator'
export {
  createPokedexReducer,
  createPokedexSession,
  fetchEffect,
  initialPokedexState,
  isBusy,
} from './session'
export type { PokedexAction, PokedexSession, PokedexState, SessionOptions } from './session'
export { describeFailure, describeJumpError, displayName } from './messages'
