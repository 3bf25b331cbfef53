import { describe, it, expect } from 'vitest'
import { decodePokemon } from './decode'
import { PokemonFetchError } from './failures'

const pikachu = {
  id: 25,
  name: 'pikachu',
  height: 4,
  weight: 60,
  sprites: { front_default: 'http://x/25.png', back_default: null },
  base_experience: 112,
}

function reasonFor(json: unknown): string | undefined {
  try {
    decodePokemon(json)
  } catch (err) {
    if (err instanceof PokemonFetchError && err.failure.kind === 'malformed-payload') {
      return err.failure.reason
    }
    throw err
  }
  return undefined
}

describe('decodePokemon', () => {
  it('maps the required fields and the front sprite', () => {
    expect(decodePokemon(pikachu)).toEqual({
      id: 25,
      name: 'pikachu',
      height: 4,
      weight: 60,
      spriteUrl: 'http://x/25.png',
    })
  })

  it('leaves spriteUrl out when front_default is null or missing', () => {
    const withNull = decodePokemon({ ...pikachu, sprites: { front_default: null } })
    const withoutKey = decodePokemon({ ...pikachu, sprites: {} })

    expect('spriteUrl' in withNull).toBe(false)
    expect(withoutKey.spriteUrl).toBeUndefined()
  })

  it('ignores a front_default that is not a string', () => {
    expect(decodePokemon({ ...pikachu, sprites: { front_default: 42 } }).spriteUrl).toBeUndefined()
  })

  it('accepts an empty name', () => {
    expect(decodePokemon({ ...pikachu, name: '' }).name).toBe('')
  })

  it('returns a frozen record', () => {
    expect(Object.isFrozen(decodePokemon(pikachu))).toBe(true)
  })

  it('is deterministic', () => {
    expect(decodePokemon(pikachu)).toEqual(decodePokemon(pikachu))
  })

  it.each(['id', 'name', 'height', 'weight', 'sprites'])('fails when "%s" is missing', (field) => {
    const json: Record<string, unknown> = { ...pikachu }
    delete json[field]

    expect(() => decodePokemon(json)).toThrow(PokemonFetchError)
  })

  it('names the first offending field', () => {
    expect(reasonFor({ ...pikachu, id: '25' })).toBe('"id" must be an integer')
    expect(reasonFor({ ...pikachu, id: 2.5 })).toBe('"id" must be an integer')
    expect(reasonFor({ ...pikachu, name: null })).toBe('"name" must be a string')
    expect(reasonFor({ ...pikachu, height: '4' })).toBe('"height" must be an integer')
    expect(reasonFor({ ...pikachu, weight: undefined })).toBe('"weight" must be an integer')
    expect(reasonFor({ ...pikachu, sprites: [] })).toBe('"sprites" must be an object')
    expect(reasonFor({ ...pikachu, sprites: null })).toBe('"sprites" must be an object')
  })

  it('rejects payloads that are not objects', () => {
    expect(reasonFor(null)).toBe('payload is not an object')
    expect(reasonFor([pikachu])).toBe('payload is not an object')
    expect(reasonFor('pikachu')).toBe('payload is not an object')
  })

  it('carries the reason in the error message', () => {
    expect(() => decodePokemon({})).toThrow('Unexpected JSON shape for Pokémon ("id" must be an integer)')
  })
})
