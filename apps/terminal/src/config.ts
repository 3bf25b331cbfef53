import { DEFAULT_TIMEOUT_MS, MIN_ID, POKEAPI_BASE_URL } from '@dexnav/pokedex'

export interface TerminalConfig {
  baseUrl: string
  timeoutMs: number
  initialId: number
  /** Log every request to stderr. */
  debug: boolean
}

type Env = Record<string, string | undefined>

function positiveInt(raw: string | undefined, fallback: number): number {
  if (raw === undefined || !/^\d+$/.test(raw.trim())) return fallback
  const value = Number(raw.trim())
  return Number.isSafeInteger(value) && value > 0 ? value : fallback
}

/**
 * loadConfig(env)
 *
 *   DEXNAV_API_URL     base URL of the API          (PokeAPI v2)
 *   DEXNAV_TIMEOUT_MS  per-request timeout          (10000)
 *   DEXNAV_START_ID    id shown on launch           (1)
 *   DEXNAV_DEBUG       "1" or "true" logs requests  (off)
 *
 * Values that do not parse fall back to the default.
 */
export function loadConfig(env: Env): TerminalConfig {
  const baseUrl = env.DEXNAV_API_URL?.trim()
  const debug = env.DEXNAV_DEBUG?.trim().toLowerCase()

  return {
    baseUrl: baseUrl ? baseUrl : POKEAPI_BASE_URL,
    timeoutMs: positiveInt(env.DEXNAV_TIMEOUT_MS, DEFAULT_TIMEOUT_MS),
    initialId: positiveInt(env.DEXNAV_START_ID, MIN_ID),
    debug: debug === '1' || debug === 'true',
  }
}
