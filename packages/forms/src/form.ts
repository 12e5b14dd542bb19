import type { Observable } from 'rxjs'
import { distinctUntilChanged, map, take } from 'rxjs/operators'
import { Cmd } from '@mvu-forms/store'
import type { Dispatch } from '@mvu-forms/store'
import { appendStyle, html, list, when } from '@mvu-forms/dom'
import type { TemplateResult } from '@mvu-forms/dom'
import { UnknownFieldTypeError } from './errors'
import { fieldMsg } from './field-cmd'
import type { ErrorDef, FieldType, FormConfig, FormMsg, FormState, JsonValue, RegisteredFieldConfig } from './types'

// ---------------------------------------------------------------------------
// Loader styles
// ---------------------------------------------------------------------------

const LOADER_KEYFRAMES_ID = 'mvu-form-loader-keyframes'

const LOADER_KEYFRAMES = `@keyframes mvu-form-loader-rings {
  0% {
    transform: rotate(0deg);
  }
  100% {
    transform: rotate(360deg);
  }
}
`

function defaultLoader(isLoading$: Observable<boolean>): TemplateResult {
  return html`${when(isLoading$, () => {
    // Shipped inline so the form works without a stylesheet.
    appendStyle(LOADER_KEYFRAMES_ID, LOADER_KEYFRAMES)
    return html`
      <div class="loader-container" style="display: flex; position: absolute; justify-content: center; width: 100%; height: 100%; align-items: center; z-index: 10; opacity: 0.4; background-color: white">
        <div class="loader-rings" style="display: block; width: 46px; height: 46px; margin: 1px; border-radius: 50%; border: 5px solid #000; border-color: #000 transparent #000 transparent; animation: mvu-form-loader-rings 1.2s linear infinite"></div>
      </div>
    `
  })}`
}

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type LoaderContainer =
  | { kind: 'default' }
  | { kind: 'custom'; render: (isLoading$: Observable<boolean>) => TemplateResult }

export interface FormRenderProps<AppMsg> {
  config: FormConfig<AppMsg>
  /** Usually `program.select((model) => model.form)`. */
  state$: Observable<FormState>
  dispatch: Dispatch<AppMsg>
  /** Rendered below the fields, typically the buttons. */
  actionsArea?: TemplateResult
  /** Shown while the form is loading. Defaults to a spinner overlay. */
  loader?: LoaderContainer
}

// ---------------------------------------------------------------------------
// Operations
// ---------------------------------------------------------------------------

function configFor<AppMsg>(config: FormConfig<AppMsg>, type: FieldType): RegisteredFieldConfig {
  const fieldConfig = config.fields.get(type)
  if (!fieldConfig) throw new UnknownFieldTypeError(type)
  return fieldConfig
}

/** Run every field's init. Commands are batched in field order. */
function init<AppMsg>(config: FormConfig<AppMsg>, state: FormState): [FormState, Cmd<FormMsg>] {
  const cmds: Cmd<FormMsg>[] = []
  const fields = state.fields.map((field) => {
    const [next, cmd] = configFor(config, field.type).init(field.state)
    cmds.push(cmd(field.name))
    return { ...field, state: next }
  })
  return [{ ...state, fields }, Cmd.batch(cmds)]
}

/** Route a message to the field it names. Other fields are left as they are. */
function update<AppMsg>(config: FormConfig<AppMsg>, msg: FormMsg, state: FormState): [FormState, Cmd<FormMsg>] {
  const target = state.fields.find((field) => field.name === msg.field)
  if (!target) return [state, Cmd.none()]

  const [next, cmd] = configFor(config, target.type).update(msg.msg, target.state)
  const fields = state.fields.map((field) => (field === target ? { ...field, state: next } : field))
  return [{ ...state, fields }, cmd(target.name)]
}

/**
 * Render the form: loader, one view per field (keyed by name), then the
 * actions area.
 *
 * Throws `UnknownFieldTypeError` when the current state holds a field type
 * the config does not know. Unknown types in later states are reported
 * through the DOM error handler and their fields are skipped.
 */
function render<AppMsg>(props: FormRenderProps<AppMsg>): TemplateResult {
  const { config, dispatch } = props
  const current: FormState[] = []
  props.state$.pipe(take(1)).subscribe((state) => current.push(state))
  for (const state of current) {
    for (const field of state.fields) configFor(config, field.type)
  }

  const fields$ = props.state$.pipe(map((state) => state.fields))
  const isLoading$ = props.state$.pipe(map((state) => state.isLoading), distinctUntilChanged())
  const loader: LoaderContainer = props.loader ?? { kind: 'default' }

  return html`
    <div class="mvu-form" style="position: relative">
      ${loader.kind === 'custom' ? loader.render(isLoading$) : defaultLoader(isLoading$)}
      ${list(fields$, (field) => field.name, (field$, name) => {
        const fieldConfig = configFor(config, field$.snapshot().type)
        const state$ = field$.pipe(map((field) => field.state), distinctUntilChanged())
        return fieldConfig.view(state$, (msg) => dispatch(config.toMsg(fieldMsg(name, msg))))
      })}
      ${props.actionsArea ?? null}
    </div>
  `
}

/**
 * Validate every field (no short-circuit).
 * Returns the new state and whether all fields are valid.
 */
function validate<AppMsg>(config: FormConfig<AppMsg>, state: FormState): [FormState, boolean] {
  const fields = state.fields.map((field) => ({
    ...field,
    state: configFor(config, field.type).validate(field.state),
  }))
  const isValid = fields.every((field) => configFor(config, field.type).isValid(field.state))
  return [{ ...state, fields }, isValid]
}

/** The form's values as a JSON-ready object, one entry per field. */
function toValues<AppMsg>(config: FormConfig<AppMsg>, state: FormState): Record<string, JsonValue> {
  return Object.fromEntries(state.fields.map((field) => configFor(config, field.type).toJson(field.state)))
}

function toJson<AppMsg>(config: FormConfig<AppMsg>, state: FormState): string {
  return JSON.stringify(toValues(config, state), null, config.jsonIndent)
}

function setLoading(isLoading: boolean, state: FormState): FormState {
  return { ...state, isLoading }
}

function isLoading(state: FormState): boolean {
  return state.isLoading
}

/**
 * Apply errors (typically from a server) to the fields they name. Only the
 * first error per field is kept; errors naming no field are ignored.
 */
function setErrors<AppMsg>(config: FormConfig<AppMsg>, errors: readonly ErrorDef[], state: FormState): FormState {
  const firstByKey = new Map<string, ErrorDef>()
  for (const error of errors) {
    if (!firstByKey.has(error.key)) firstByKey.set(error.key, error)
  }

  const fields = state.fields.map((field) => {
    const error = firstByKey.get(field.name)
    if (!error) return field
    return { ...field, state: configFor(config, field.type).setError(field.state, error.text) }
  })
  return { ...state, fields }
}

export const Form = {
  init,
  update,
  render,
  validate,
  toValues,
  toJson,
  setLoading,
  isLoading,
  setErrors,
}
