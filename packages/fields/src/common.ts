import type { Observable } from 'rxjs'
import { distinctUntilChanged, map } from 'rxjs/operators'
import { Valid, invalid, isValidState, validationText } from '@mvu-forms/forms'
import type { ValidationState } from '@mvu-forms/forms'

// ---------------------------------------------------------------------------
// Validators
// ---------------------------------------------------------------------------

/** Returns `Valid` or `invalid(message)` for a field's whole state. */
export type Validator<S> = (state: S) => ValidationState

/** What every basic field keeps besides its value. */
export interface BaseFieldState<S> {
  readonly name: string
  readonly label: string
  /** Most recently added first; the first failure wins. */
  readonly validators: readonly Validator<S>[]
  readonly validationState: ValidationState
}

/** Reset to valid, then run the validators in list order until one fails. */
export function applyValidators<S extends BaseFieldState<S>>(state: S): S {
  const reset = { ...state, validationState: Valid }
  for (const validator of state.validators) {
    const result = validator(reset)
    if (!isValidState(result)) return { ...reset, validationState: result }
  }
  return reset
}

export function isFieldValid<S extends BaseFieldState<S>>(state: S): boolean {
  return isValidState(state.validationState)
}

export function withError<S extends BaseFieldState<S>>(state: S, message: string): S {
  return { ...state, validationState: invalid(message) }
}

export const DEFAULT_REQUIRED_MESSAGE = 'This field is required'

// ---------------------------------------------------------------------------
// Guards
// ---------------------------------------------------------------------------

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null
}

function isValidationState(value: unknown): boolean {
  if (!isRecord(value)) return false
  return value.type === 'valid' || (value.type === 'invalid' && typeof value.message === 'string')
}

/** Checks the BaseFieldState properties. */
export function hasBaseFieldShape(value: unknown): value is Record<string, unknown> {
  return (
    isRecord(value) &&
    typeof value.name === 'string' &&
    typeof value.label === 'string' &&
    Array.isArray(value.validators) &&
    isValidationState(value.validationState)
  )
}

export function isOptionalString(value: unknown): boolean {
  return value === undefined || typeof value === 'string'
}

/** `[key, label]` pairs. */
export type KeyLabel = readonly [key: string, label: string]

export function isKeyLabel(value: unknown): value is KeyLabel {
  return Array.isArray(value) && value.length === 2 && typeof value[0] === 'string' && typeof value[1] === 'string'
}

export function isKeyLabelList(value: unknown): value is readonly KeyLabel[] {
  return Array.isArray(value) && value.every((item: unknown) => isKeyLabel(item))
}

// ---------------------------------------------------------------------------
// View helpers
// ---------------------------------------------------------------------------

/** A distinct slice of a field's state. */
export function pick<S, T>(state$: Observable<S>, selector: (state: S) => T): Observable<T> {
  return state$.pipe(map(selector), distinctUntilChanged())
}

export function helpText<S extends BaseFieldState<S>>(state$: Observable<S>): Observable<string> {
  return pick(state$, (s) => validationText(s.validationState))
}

/** The value of the control an event came from. */
export function eventValue(event: Event): string {
  const target = event.target
  if (
    target instanceof HTMLInputElement ||
    target instanceof HTMLTextAreaElement ||
    target instanceof HTMLSelectElement
  ) {
    return target.value
  }
  return ''
}
