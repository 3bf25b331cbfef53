/**
 * A single Pokémon as shown to the user. Instances are frozen by
 * `decodePokemon`; a new fetch replaces the whole record.
 */
export interface Pokemon {
  readonly id: number
  readonly name: string
  /** Decimetres, as reported by the API. */
  readonly height: number
  /** Hectograms, as reported by the API. */
  readonly weight: number
  /** Front sprite; absent when the API has no image. */
  readonly spriteUrl?: string
}
