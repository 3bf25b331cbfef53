import { EMPTY, Observable, OperatorFunction, Subject, Subscription } from 'rxjs'
import { catchError } from 'rxjs/operators'

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface AppError {
  /**
   * Where the error originated:
   *   'observable'  — caught inside an RxJS pipeline via catchAndReport / safeSubscribe
   *   'global'      — uncaught exception (observed, the process still exits)
   *   'promise'     — unhandledRejection (uncaught Promise rejection)
   *   'manual'      — explicitly reported via handler.reportError(...)
   */
  source: 'observable' | 'global' | 'promise' | 'manual'
  /** The native Error object (always normalised). */
  error: Error
  /** Human-readable message (alias for error.message). */
  message: string
  /** Unix timestamp (Date.now()) when the error was captured. */
  timestamp: number
  /** Optional developer-supplied label identifying the pipeline or component. */
  context?: string
}

export interface ErrorHandlerConfig {
  /**
   * If true (default), listens for `unhandledRejection` and
   * `uncaughtExceptionMonitor` on `captureTarget`.
   * Set to false in tests or where another layer owns global capture.
   *
   * Listening for `unhandledRejection` on `process` replaces Node's default
   * of exiting on an unhandled rejection: the rejection is reported and the
   * process keeps running. Uncaught exceptions are only observed and still
   * end the process.
   */
  enableGlobalCapture?: boolean
  /** Emitter to listen on for global capture. Defaults to `process`. */
  captureTarget?: NodeJS.EventEmitter
  /**
   * Called synchronously whenever an error is reported.
   * Useful for console logging, crash reporting, etc.
   */
  onError?: (error: AppError) => void
}

export interface ErrorHandler {
  /** Hot Observable stream of all captured AppErrors. Does NOT replay. */
  errors$: Observable<AppError>
  /**
   * Report an error manually.
   *
   * @example
   *   try { render(state) } catch (e) { handler.reportError(e, 'manual', 'terminal/render') }
   */
  reportError(
    error: unknown,
    source?: AppError['source'],
    context?: string,
  ): void
}

// ---------------------------------------------------------------------------
// Internal: normalise any thrown value to an Error
// ---------------------------------------------------------------------------

function toError(raw: unknown): Error {
  if (raw instanceof Error) return raw
  if (typeof raw === 'string') return new Error(raw)
  try {
    return new Error(JSON.stringify(raw))
  } catch {
    return new Error(String(raw))
  }
}

/**
 * formatAppError(error, tag)
 *
 * One-line log form: `[tag][source] context: message`.
 */
export function formatAppError(error: AppError, tag: string): string {
  return `[${tag}][${error.source}]${error.context ? ` ${error.context}:` : ''} ${error.message}`
}

// ---------------------------------------------------------------------------
// createErrorHandler
// ---------------------------------------------------------------------------

/**
 * createErrorHandler(config?)
 *
 * Creates a centralized error handler. Returns an ErrorHandler object and
 * a Subscription that, when unsubscribed, removes any global listeners.
 *
 * @example
 *   const [handler, sub] = createErrorHandler({
 *     onError: (e) => console.error(formatAppError(e, 'dexnav')),
 *   })
 *   process.once('exit', () => sub.unsubscribe())
 */
export function createErrorHandler(
  config?: ErrorHandlerConfig,
): [ErrorHandler, Subscription] {
  const enableGlobal = config?.enableGlobalCapture ?? true
  const target = config?.captureTarget ?? process
  const onError = config?.onError

  const bus = new Subject<AppError>()
  const cleanupSub = new Subscription()

  function reportError(
    raw: unknown,
    source: AppError['source'] = 'manual',
    context?: string,
  ): void {
    const error = toError(raw)
    const appError: AppError = {
      source,
      error,
      message: error.message,
      timestamp: Date.now(),
      context,
    }
    onError?.(appError)
    bus.next(appError)
  }

  if (enableGlobal) {
    const onRejection = (reason: unknown) => reportError(reason, 'promise')
    const onException = (error: unknown) => reportError(error, 'global')

    target.on('unhandledRejection', onRejection)
    target.on('uncaughtExceptionMonitor', onException)

    cleanupSub.add(() => {
      target.off('unhandledRejection', onRejection)
      target.off('uncaughtExceptionMonitor', onException)
    })
  }

  const handler: ErrorHandler = {
    errors$: bus.asObservable(),
    reportError,
  }

  return [handler, cleanupSub]
}

// ---------------------------------------------------------------------------
// catchAndReport
// ---------------------------------------------------------------------------

export interface ReportOptions {
  /** Label passed to AppError.context. */
  context?: string
}

/**
 * catchAndReport(handler, options?)
 *
 * RxJS operator. Drop-in for `catchError` that reports to the handler and
 * completes the stream.
 *
 * @example
 *   lines$.pipe(
 *     map(parseCommand),
 *     catchAndReport(handler, { context: 'terminal/input' }),
 *   )
 */
export function catchAndReport<T>(
  handler: ErrorHandler,
  options?: ReportOptions,
): OperatorFunction<T, T> {
  return (source: Observable<T>): Observable<T> =>
    source.pipe(
      catchError((raw): Observable<T> => {
        handler.reportError(raw, 'observable', options?.context)
        return EMPTY
      }),
    )
}

// ---------------------------------------------------------------------------
// safeSubscribe
// ---------------------------------------------------------------------------

/**
 * safeSubscribe(source$, handler, next, options?)
 *
 * Subscribes with an automatically-wired error callback that reports to handler.
 * Prevents silent subscription deaths.
 *
 * @example
 *   safeSubscribe(store.state$, handler, (s) => output.write(renderState(s)))
 */
export function safeSubscribe<T>(
  source$: Observable<T>,
  handler: ErrorHandler,
  next: (value: T) => void,
  options?: ReportOptions,
): Subscription {
  return source$.subscribe({
    next: (value) => {
      try {
        next(value)
      } catch (raw) {
        handler.reportError(raw, 'observable', options?.context)
      }
    },
    error: (raw) => handler.reportError(raw, 'observable', options?.context),
  })
}
