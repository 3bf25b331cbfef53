import { describe, it, expect, vi, afterEach } from 'vitest'
import { firstValueFrom, Subject } from 'rxjs'
import { createMockTransport } from '@dexnav/testing'
import type { HttpInterceptor, HttpResponse } from '@dexnav/http'
import { createPokemonClient } from './client'
import { PokemonFetchError } from './failures'
import type { FetchFailure } from './failures'

const URL_25 = 'https://pokeapi.co/api/v2/pokemon/25'

const pikachuBody = {
  id: 25,
  name: 'pikachu',
  height: 4,
  weight: 60,
  sprites: { front_default: 'http://x/25.png' },
}

async function failureOf(promise: Promise<unknown>): Promise<FetchFailure> {
  const err = await promise.then(
    () => undefined,
    (e: unknown) => e,
  )
  if (!(err instanceof PokemonFetchError)) throw new Error(`expected PokemonFetchError, got ${String(err)}`)
  return err.failure
}

describe('createPokemonClient', () => {
  afterEach(() => {
    vi.useRealTimers()
  })

  it('fetches and decodes a record', async () => {
    const mock = createMockTransport()
    mock.whenGet(URL_25).respond(200, pikachuBody)
    const client = createPokemonClient({ transport: mock.transport })

    const pokemon = await firstValueFrom(client.fetch(25))

    expect(pokemon).toEqual({
      id: 25,
      name: 'pikachu',
      height: 4,
      weight: 60,
      spriteUrl: 'http://x/25.png',
    })
    expect(mock.calls).toHaveLength(1)
    expect(mock.calls[0]).toMatchObject({ method: 'GET', url: URL_25 })
  })

  it('sends exactly one request per subscription', async () => {
    const mock = createMockTransport()
    mock.whenGet(URL_25).respond(200, pikachuBody)
    const client = createPokemonClient({ transport: mock.transport })

    const pokemon$ = client.fetch(25)
    expect(mock.calls).toHaveLength(0)

    await firstValueFrom(pokemon$)
    await firstValueFrom(pokemon$)
    expect(mock.calls).toHaveLength(2)
  })

  it('maps 404 to not-found with the requested id', async () => {
    const mock = createMockTransport()
    mock.whenGet('https://pokeapi.co/api/v2/pokemon/99999').respond(404, 'Not Found')
    const client = createPokemonClient({ transport: mock.transport })

    expect(await failureOf(firstValueFrom(client.fetch(99999)))).toEqual({ kind: 'not-found', id: 99999 })
  })

  it('maps any other status to unexpected-status', async () => {
    const mock = createMockTransport()
    mock.whenGet(URL_25).respond(500, 'oops')
    mock.whenGet('https://pokeapi.co/api/v2/pokemon/26').respond(201, pikachuBody)
    const client = createPokemonClient({ transport: mock.transport })

    expect(await failureOf(firstValueFrom(client.fetch(25)))).toEqual({
      kind: 'unexpected-status',
      status: 500,
    })
    expect(await failureOf(firstValueFrom(client.fetch(26)))).toEqual({
      kind: 'unexpected-status',
      status: 201,
    })
  })

  it('maps a payload of the wrong shape to malformed-payload', async () => {
    const mock = createMockTransport()
    mock.whenGet(URL_25).respond(200, { ...pikachuBody, sprites: undefined })
    const client = createPokemonClient({ transport: mock.transport })

    expect(await failureOf(firstValueFrom(client.fetch(25)))).toEqual({
      kind: 'malformed-payload',
      reason: '"sprites" must be an object',
    })
  })

  it('maps a body that is not JSON to malformed-payload', async () => {
    const mock = createMockTransport()
    mock.whenGet(URL_25).respond(200, '<!doctype html>')
    const client = createPokemonClient({ transport: mock.transport })

    expect(await failureOf(firstValueFrom(client.fetch(25)))).toEqual({
      kind: 'malformed-payload',
      reason: 'body is not valid JSON',
    })
  })

  it('maps transport errors to transport with the original cause', async () => {
    const mock = createMockTransport()
    const cause = new Error('connect ECONNREFUSED')
    mock.whenGet(URL_25).fail(cause)
    const client = createPokemonClient({ transport: mock.transport })

    expect(await failureOf(firstValueFrom(client.fetch(25)))).toEqual({ kind: 'transport', cause })
  })

  it('fails with timed-out when no response arrives within 10 seconds', async () => {
    vi.useFakeTimers()
    const mock = createMockTransport()
    mock.whenGet('https://pokeapi.co/api/v2/pokemon/1').hang()
    const client = createPokemonClient({ transport: mock.transport })

    const settled = failureOf(firstValueFrom(client.fetch(1)))
    await vi.advanceTimersByTimeAsync(9_999)
    await vi.advanceTimersByTimeAsync(1)

    expect(await settled).toEqual({ kind: 'timed-out', timeoutMs: 10_000 })
  })

  it('abandons the pending response once the timeout fires', async () => {
    vi.useFakeTimers()
    const pending = new Subject<HttpResponse>()
    const mock = createMockTransport()
    mock.whenGet(URL_25).respondWith(pending)
    const client = createPokemonClient({ transport: mock.transport, timeoutMs: 50 })

    const settled = failureOf(firstValueFrom(client.fetch(25)))
    await vi.advanceTimersByTimeAsync(50)

    expect(await settled).toEqual({ kind: 'timed-out', timeoutMs: 50 })
    expect(pending.observed).toBe(false)
  })

  it('passes the id through unchecked and honours baseUrl', async () => {
    const mock = createMockTransport()
    mock.whenGet('http://localhost:8080/v2/pokemon/-3').respond(404)
    const client = createPokemonClient({ transport: mock.transport, baseUrl: 'http://localhost:8080/v2/' })

    expect(await failureOf(firstValueFrom(client.fetch(-3)))).toEqual({ kind: 'not-found', id: -3 })
  })

  it('runs interceptors around the request', async () => {
    const seen: string[] = []
    const logger: HttpInterceptor = {
      request: (req) => {
        seen.push(`${req.method} ${req.url}`)
        return req
      },
    }
    const mock = createMockTransport()
    mock.whenGet(URL_25).respond(200, pikachuBody)
    const client = createPokemonClient({ transport: mock.transport, interceptors: [logger] })

    await firstValueFrom(client.fetch(25))

    expect(seen).toEqual([`GET ${URL_25}`])
  })
})
