// ---------------------------------------------------------------------------
// Error reporting for template bindings and component hooks
// ---------------------------------------------------------------------------

/**
 * @param error    What an Observable emitted as error, or what a handler threw
 * @param context  Which binding failed (`'text'`, `'attribute:class'`,
 *                 `'event:change'`, `'onMount'`, ...)
 */
export type DomErrorHandler = (error: unknown, context: string) => void

const defaultHandler: DomErrorHandler = (error, context) => {
  console.warn(`[@mvu-forms/dom] Error in ${context}:`, error)
}

let handler: DomErrorHandler = defaultHandler

/**
 * Route binding errors somewhere other than `console.warn`, for example an
 * `ErrorHandler` from `@mvu-forms/errors`. Pass nothing to restore the default.
 *
 * @example
 *   setDomErrorHandler((error, context) => errors.reportError(error, 'observable', context))
 */
export function setDomErrorHandler(fn?: DomErrorHandler): void {
  handler = fn ?? defaultHandler
}

export function handleDomError(error: unknown, context: string): void {
  try {
    handler(error, context)
  } catch (failure) {
    console.error('[@mvu-forms/dom] Error handler threw:', failure)
  }
}
