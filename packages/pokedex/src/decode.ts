import { malformedPayload } from './failures'
import type { Pokemon } from './pokemon'

type JsonObject = Record<string, unknown>

const isObject = (value: unknown): value is JsonObject =>
  typeof value === 'object' && value !== null && !Array.isArray(value)

const isInteger = (value: unknown): value is number =>
  typeof value === 'number' && Number.isInteger(value)

/**
 * decodePokemon(json)
 *
 * Validates a `GET /pokemon/{id}` body and maps it to a frozen `Pokemon`.
 * Requires `id`, `height` and `weight` as integers, `name` as a string and
 * `sprites` as an object; `sprites.front_default` becomes `spriteUrl` only
 * when it is a string. Anything else throws a `malformed-payload`
 * PokemonFetchError naming the first offending field.
 */
export function decodePokemon(json: unknown): Pokemon {
  if (!isObject(json)) throw malformedPayload('payload is not an object')

  const { id, name, height, weight, sprites } = json
  if (!isInteger(id)) throw malformedPayload('"id" must be an integer')
  if (typeof name !== 'string') throw malformedPayload('"name" must be a string')
  if (!isInteger(height)) throw malformedPayload('"height" must be an integer')
  if (!isInteger(weight)) throw malformedPayload('"weight" must be an integer')
  if (!isObject(sprites)) throw malformedPayload('"sprites" must be an object')

  const front = sprites.front_default
  return Object.freeze({
    id,
    name,
    height,
    weight,
    ...(typeof front === 'string' ? { spriteUrl: front } : {}),
  })
}
