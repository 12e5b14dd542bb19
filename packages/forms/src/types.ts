import type { Observable } from 'rxjs'
import type { TemplateResult } from '@mvu-forms/dom'
import type { FieldCmd } from './field-cmd'

// ---------------------------------------------------------------------------
// Values
// ---------------------------------------------------------------------------

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue }

/** A validation error for one field, usually sent by a server. */
export interface ErrorDef {
  text: string
  /** Name of the field the error belongs to. */
  key: string
}

export type ValidationState =
  | { readonly type: 'valid' }
  | { readonly type: 'invalid'; readonly message: string }

export const Valid: ValidationState = { type: 'valid' }

export function invalid(message: string): ValidationState {
  return { type: 'invalid', message }
}

/** The message to display: empty when valid. */
export function validationText(state: ValidationState): string {
  return state.type === 'invalid' ? state.message : ''
}

export function isValidState(state: ValidationState): boolean {
  return state.type === 'valid'
}

// ---------------------------------------------------------------------------
// Fields
// ---------------------------------------------------------------------------

/** Identifies a kind of field in a FormConfig. Unique per kind. */
export type FieldType = string

/** Identifies a field inside one form. Unique per form. */
export type FieldName = string

/** Every field message carries a `type` tag, conventionally `'<kind>/<event>'`. */
export interface FieldMsg {
  readonly type: string
}

/** A field in the form state. `state` is only read by its own config. */
export interface Field {
  readonly type: FieldType
  readonly name: FieldName
  readonly state: unknown
}

export type FormMsg = { readonly type: 'form/field'; readonly field: FieldName; readonly msg: FieldMsg }

export interface FormState {
  readonly fields: readonly Field[]
  readonly isLoading: boolean
}

export type FieldView<S, M extends FieldMsg> = (
  state$: Observable<S>,
  dispatch: (msg: M) => void,
) => TemplateResult

/**
 * What a kind of field implements. `isState` and `isMsg` let the form check
 * the opaque values it routes before handing them back.
 */
export interface FieldConfig<S, M extends FieldMsg> {
  isState(value: unknown): value is S
  isMsg(msg: FieldMsg): msg is M
  init(state: S): readonly [S, FieldCmd]
  update(msg: M, state: S): readonly [S, FieldCmd]
  view: FieldView<S, M>
  /** Recompute the validation state. */
  validate(state: S): S
  isValid(state: S): boolean
  /** The JSON key and value this field contributes. */
  toJson(state: S): readonly [string, JsonValue]
  setError(state: S, message: string): S
}

/** A FieldConfig with its types erased, as stored in a FormConfig. */
export interface RegisteredFieldConfig {
  isState(value: unknown): boolean
  init(state: unknown): readonly [unknown, FieldCmd]
  update(msg: FieldMsg, state: unknown): readonly [unknown, FieldCmd]
  view(state$: Observable<unknown>, dispatch: (msg: FieldMsg) => void): TemplateResult
  validate(state: unknown): unknown
  isValid(state: unknown): boolean
  toJson(state: unknown): readonly [string, JsonValue]
  setError(state: unknown, message: string): unknown
}

/** Everything FormBuilder needs to register one field. */
export interface FieldBuilder {
  readonly type: FieldType
  readonly name: FieldName
  readonly state: unknown
  readonly config: RegisteredFieldConfig
}

export interface FormConfig<AppMsg> {
  /** Wraps form messages into the host application's messages. */
  readonly toMsg: (msg: FormMsg) => AppMsg
  readonly fields: ReadonlyMap<FieldType, RegisteredFieldConfig>
  /** Indentation used by Form.toJson. */
  readonly jsonIndent: number
}
