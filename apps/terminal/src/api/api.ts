import { createPokemonClient } from '@dexnav/pokedex'
import type { PokemonClient } from '@dexnav/pokedex'
import type { HttpInterceptor } from '@dexnav/http'
import type { TerminalConfig } from '../config'

// stderr keeps the log out of the rendered view on stdout
export const loggingInterceptor: HttpInterceptor = {
  request: (req) => {
    console.error(`[http] ${req.method} ${req.url}`)
    return req
  },
}

export function createApi(config: TerminalConfig): PokemonClient {
  return createPokemonClient({
    baseUrl: config.baseUrl,
    timeoutMs: config.timeoutMs,
    interceptors: config.debug ? [loggingInterceptor] : [],
  })
}
