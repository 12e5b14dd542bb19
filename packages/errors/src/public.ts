import { EMPTY, Observable, OperatorFunction, Subject, Subscription, fromEvent, of } from 'rxjs'
import { catchError } from 'rxjs/operators'
import { createProgram } from '@mvu-forms/store'
import type { Program, ProgramOptions } from '@mvu-forms/store'

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface AppError {
  /**
   * Where the error was caught:
   *   'observable': inside an RxJS pipeline (catchAndReport, template bindings)
   *   'program':    a program update or command (createSafeProgram)
   *   'global':     window `error` event
   *   'promise':    window `unhandledrejection` event
   *   'manual':     handler.reportError(...) without a source
   */
  source: 'observable' | 'program' | 'global' | 'promise' | 'manual'
  /** Always an Error; strings and other values are wrapped. */
  error: Error
  message: string
  /** Date.now() at capture time. */
  timestamp: number
  /** Label of the pipeline, field or component that failed. */
  context?: string
}

export interface ErrorHandlerConfig {
  /**
   * Listen to window `error` and `unhandledrejection` (default true).
   * Ignored where `window` does not exist.
   */
  enableGlobalCapture?: boolean
  /** Called synchronously for each error, before `errors$` emits. */
  onError?: (error: AppError) => void
}

export interface ErrorHandler {
  /** Hot stream of reported errors. No replay. */
  errors$: Observable<AppError>
  reportError(error: unknown, source?: AppError['source'], context?: string): void
}

function toError(raw: unknown): Error {
  if (raw instanceof Error) return raw
  if (typeof raw === 'string') return new Error(raw)
  try {
    return new Error(JSON.stringify(raw))
  } catch {
    return new Error(String(raw))
  }
}

// ---------------------------------------------------------------------------
// createErrorHandler
// ---------------------------------------------------------------------------

/**
 * createErrorHandler(config?)
 *
 * Central error sink. The returned Subscription removes the global listeners.
 *
 * @example
 *   const [errors, errorsSub] = createErrorHandler({
 *     onError: (e) => console.error(`[${e.source}] ${e.context ?? ''} ${e.message}`),
 *   })
 *   setFormErrorHandler((error, context) => errors.reportError(error, 'observable', context))
 */
export function createErrorHandler(config?: ErrorHandlerConfig): [ErrorHandler, Subscription] {
  const bus = new Subject<AppError>()
  const listeners = new Subscription()

  function reportError(raw: unknown, source: AppError['source'] = 'manual', context?: string): void {
    const error = toError(raw)
    const appError: AppError = { source, error, message: error.message, timestamp: Date.now(), context }
    config?.onError?.(appError)
    bus.next(appError)
  }

  if ((config?.enableGlobalCapture ?? true) && typeof window !== 'undefined') {
    listeners.add(
      fromEvent<ErrorEvent>(window, 'error').subscribe((e) => {
        reportError(e.error ?? new Error(e.message), 'global')
      }),
    )
    listeners.add(
      fromEvent<PromiseRejectionEvent>(window, 'unhandledrejection').subscribe((e) => {
        reportError(e.reason, 'promise')
      }),
    )
  }

  listeners.add(() => bus.complete())

  return [{ errors$: bus.asObservable(), reportError }, listeners]
}

// ---------------------------------------------------------------------------
// catchAndReport
// ---------------------------------------------------------------------------

export interface CatchAndReportOptions<T> {
  /** Emitted after reporting. The stream completes when omitted. */
  fallback?: T | Observable<T>
  context?: string
}

/**
 * catchAndReport(handler, options?)
 *
 * `catchError` that reports to the handler first.
 *
 * @example
 *   api.countries().pipe(
 *     catchAndReport(errors, { fallback: [], context: 'countries' }),
 *   )
 */
export function catchAndReport<T>(
  handler: ErrorHandler,
  options?: CatchAndReportOptions<T>,
): OperatorFunction<T, T> {
  return catchError<T, Observable<T>>((raw: unknown) => {
    handler.reportError(raw, 'observable', options?.context)
    const fallback = options?.fallback
    if (fallback === undefined) return EMPTY
    return fallback instanceof Observable ? fallback : of(fallback)
  })
}

// ---------------------------------------------------------------------------
// createSafeProgram
// ---------------------------------------------------------------------------

export interface SafeProgramOptions {
  /** Prefix for AppError.context; the failing phase is appended. */
  context?: string
}

/**
 * createSafeProgram(options, handler, safeOptions?)
 *
 * `createProgram` whose update and command failures go to `handler`
 * (source `'program'`, context `'<context>/update'` or `'<context>/command'`).
 */
export function createSafeProgram<S, M>(
  options: Omit<ProgramOptions<S, M>, 'onError'>,
  handler: ErrorHandler,
  safeOptions?: SafeProgramOptions,
): Program<S, M> {
  const prefix = safeOptions?.context
  return createProgram({
    ...options,
    onError: (error, phase) => handler.reportError(error, 'program', prefix ? `${prefix}/${phase}` : phase),
  })
}
