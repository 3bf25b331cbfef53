import { Observable, defer, throwError } from 'rxjs'
import { fromFetch } from 'rxjs/fetch'
import { catchError, map, timeout } from 'rxjs/operators'

// ---------------------------------------------------------------------------
// RemoteData — discriminated union representing async request lifecycle
// ---------------------------------------------------------------------------

export type RemoteData<T, E = string> =
  | { status: 'idle' }
  | { status: 'loading' }
  | { status: 'success'; data: T }
  | { status: 'error'; error: E; statusCode?: number }

export const loading = (): RemoteData<never, never> => ({ status: 'loading' })
export const success = <T>(data: T): RemoteData<T, never> => ({ status: 'success', data })
export const failure = <E = string>(error: E, statusCode?: number): RemoteData<never, E> => ({
  status: 'error',
  error,
  statusCode,
})

export function isLoading<T, E>(rd: RemoteData<T, E>): rd is { status: 'loading' } {
  return rd.status === 'loading'
}
export function isSuccess<T, E>(rd: RemoteData<T, E>): rd is { status: 'success'; data: T } {
  return rd.status === 'success'
}
export function isError<T, E>(
  rd: RemoteData<T, E>,
): rd is { status: 'error'; error: E; statusCode?: number } {
  return rd.status === 'error'
}

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

/** The server answered with a status the client does not accept. */
export class HttpStatusError extends Error {
  name = 'HttpStatusError'

  constructor(
    readonly status: number,
    readonly url: string,
  ) {
    super(`HTTP ${status} for ${url}`)
  }
}

/** No response arrived within the configured timeout. */
export class HttpTimeoutError extends Error {
  name = 'HttpTimeoutError'

  constructor(
    readonly timeoutMs: number,
    readonly url: string,
  ) {
    super(`Request to ${url} timed out after ${timeoutMs}ms`)
  }
}

/** The transport failed before any response (DNS, refused connection, …). */
export class HttpTransportError extends Error {
  name = 'HttpTransportError'

  constructor(
    readonly url: string,
    readonly cause: Error,
  ) {
    super(`Request to ${url} failed: ${cause.message}`)
  }
}

/** The response body was not valid JSON. */
export class HttpParseError extends Error {
  name = 'HttpParseError'

  constructor(
    readonly url: string,
    readonly cause: Error,
  ) {
    super(`Invalid JSON from ${url}: ${cause.message}`)
  }
}

function toError(raw: unknown): Error {
  return raw instanceof Error ? raw : new Error(String(raw))
}

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface HttpRequest {
  method: 'GET'
  /** Absolute once the client has applied its base URL. */
  url: string
  headers: Record<string, string>
}

export interface HttpResponse {
  status: number
  /** Raw response text; decoding is the client's job. */
  body: string
}

/**
 * Sends one request per subscription and emits exactly one response.
 * Unsubscribing abandons the request.
 */
export type HttpTransport = (request: HttpRequest) => Observable<HttpResponse>

export interface HttpClient {
  get<T>(url: string): Observable<T>
}

// ---------------------------------------------------------------------------
// fetchTransport — default transport on the global fetch API
// ---------------------------------------------------------------------------

export const fetchTransport: HttpTransport = (request) =>
  fromFetch(request.url, {
    method: request.method,
    headers: request.headers,
    selector: async (res): Promise<HttpResponse> => ({
      status: res.status,
      body: await res.text(),
    }),
  })

// ---------------------------------------------------------------------------
// Interceptors
// ---------------------------------------------------------------------------

/**
 * An interceptor can modify the outgoing request and/or the incoming
 * response Observable.
 *
 * - `request(req)` — called before the transport runs, with the base URL
 *   already applied. Return a modified request.
 * - `response(source$)` — called after the response Observable is created.
 *   Return a transformed Observable (e.g. for retry, logging, error mapping).
 *
 * Both methods are optional.
 */
export interface HttpInterceptor {
  request?(request: HttpRequest): HttpRequest
  response?<T>(source$: Observable<T>): Observable<T>
}

export interface HttpClientConfig {
  /** Base URL prepended to all relative paths. */
  baseUrl?: string
  /** Interceptors applied in order: request phase left-to-right, response phase right-to-left. */
  interceptors?: HttpInterceptor[]
  /** Defaults to `fetchTransport`. */
  transport?: HttpTransport
  /** Upper bound for a response to arrive. No timeout when omitted. */
  timeoutMs?: number
  /** Statuses treated as success. Defaults to 2xx. */
  acceptStatus?: (status: number) => boolean
}

const isOk = (status: number): boolean => status >= 200 && status < 300

function parseJson<T>(res: HttpResponse, url: string): T {
  // Empty bodies decode to null
  const text = res.body.trim() === '' ? 'null' : res.body
  try {
    return JSON.parse(text)
  } catch (raw) {
    throw new HttpParseError(url, toError(raw))
  }
}

// ---------------------------------------------------------------------------
// createHttpClient
// ---------------------------------------------------------------------------

/**
 * createHttpClient(config?)
 *
 * Creates a GET client with optional base URL, transport, timeout and
 * interceptors. `get` returns a cold Observable of the decoded JSON body;
 * nothing is sent until you subscribe.
 *
 * Failures arrive on the error channel as one of:
 *   HttpTransportError — the transport itself failed
 *   HttpTimeoutError   — `timeoutMs` elapsed first
 *   HttpStatusError    — status rejected by `acceptStatus`
 *   HttpParseError     — body was not JSON
 *
 * Interceptor execution order:
 *   Request phase:  interceptor[0].request → interceptor[1].request → … → transport
 *   Response phase: … → interceptor[1].response → interceptor[0].response → subscriber
 *
 * @example
 *   const api = createHttpClient({
 *     baseUrl: 'https://pokeapi.co/api/v2',
 *     timeoutMs: 10_000,
 *     interceptors: [
 *       { request: (r) => { console.error(`[http] ${r.method} ${r.url}`); return r } },
 *     ],
 *   })
 *
 *   api.get<unknown>('/pokemon/25').subscribe(console.log)
 */
export function createHttpClient(config?: HttpClientConfig): HttpClient {
  const baseUrl = config?.baseUrl?.replace(/\/+$/, '') ?? ''
  const interceptors = config?.interceptors ?? []
  const transport = config?.transport ?? fetchTransport
  const timeoutMs = config?.timeoutMs
  const acceptStatus = config?.acceptStatus ?? isOk

  function send<T>(req: HttpRequest): Observable<T> {
    const url = req.url
    let response$ = defer(() => transport(req)).pipe(
      catchError((raw: unknown) => throwError(() => new HttpTransportError(url, toError(raw)))),
    )

    if (timeoutMs !== undefined) {
      response$ = response$.pipe(
        timeout({
          first: timeoutMs,
          with: () => throwError(() => new HttpTimeoutError(timeoutMs, url)),
        }),
      )
    }

    return response$.pipe(
      map((res) => {
        if (!acceptStatus(res.status)) throw new HttpStatusError(res.status, url)
        return parseJson<T>(res, url)
      }),
    )
  }

  function resolve(url: string): string {
    if (!baseUrl || url.startsWith('http://') || url.startsWith('https://')) return url
    return baseUrl + (url.startsWith('/') ? url : '/' + url)
  }

  function interceptedRequest<T>(url: string): Observable<T> {
    let req: HttpRequest = {
      method: 'GET',
      url: resolve(url),
      headers: { Accept: 'application/json' },
    }

    // Apply request interceptors left-to-right
    for (const i of interceptors) {
      if (i.request) req = i.request(req)
    }

    let result$: Observable<T> = send<T>(req)

    // Apply response interceptors right-to-left (reverse order)
    for (let idx = interceptors.length - 1; idx >= 0; idx--) {
      const i = interceptors[idx]
      if (i.response) result$ = i.response<T>(result$)
    }

    return result$
  }

  return {
    get<T>(url: string): Observable<T> {
      return interceptedRequest<T>(url)
    },
  }
}
