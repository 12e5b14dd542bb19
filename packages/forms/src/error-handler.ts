/**
 * Receives failures that fields recover from on their own, such as a select
 * whose options request errored.
 */
export type FormErrorHandler = (error: unknown, context: string) => void

const defaultHandler: FormErrorHandler = (error, context) => {
  console.error(`[@mvu-forms/forms] Error in ${context}:`, error)
}

let handler: FormErrorHandler = defaultHandler

/** Pass nothing to restore the console handler. */
export function setFormErrorHandler(fn?: FormErrorHandler): void {
  handler = fn ?? defaultHandler
}

export function handleFormError(error: unknown, context: string): void {
  try {
    handler(error, context)
  } catch (failure) {
    console.error('[@mvu-forms/forms] Error handler threw:', failure)
  }
}
