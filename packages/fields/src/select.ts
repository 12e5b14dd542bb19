import type { Observable } from 'rxjs'
import { html, list } from '@mvu-forms/dom'
import { FieldCmd, Valid, customViews, fieldBuilder, handleFormError, invalid } from '@mvu-forms/forms'
import type { FieldBuilder, FieldConfig, FieldView } from '@mvu-forms/forms'
import {
  DEFAULT_REQUIRED_MESSAGE,
  applyValidators,
  eventValue,
  hasBaseFieldShape,
  helpText,
  isFieldValid,
  isKeyLabel,
  isKeyLabelList,
  isOptionalString,
  pick,
  withError,
} from './common'
import type { BaseFieldState, KeyLabel, Validator } from './common'

export const SELECT_TYPE = 'basic-select'

export const DEFAULT_PLACEHOLDER_KEY = '__placeholder__'

export interface SelectState extends BaseFieldState<SelectState> {
  readonly selectedKey?: string
  readonly values: readonly KeyLabel[]
  /** `[key, label]` of a disabled first option, selected until the user picks. */
  readonly placeholder?: KeyLabel
  readonly isLoading: boolean
  /** Fetched on init; replaces `values` when it emits. */
  readonly valuesFromServer?: Observable<readonly KeyLabel[]>
}

export type SelectMsg =
  | { readonly type: 'select/change'; readonly key: string }
  | { readonly type: 'select/received'; readonly values: readonly KeyLabel[] }
  | { readonly type: 'select/failed'; readonly error: unknown }

interface SelectOption {
  key: string
  label: string
  selected: boolean
}

function selectClass(state: SelectState): string {
  // Not red while waiting on the server.
  if (state.isLoading) return 'select is-fullwidth is-loading'
  return isFieldValid(state) ? 'select is-fullwidth' : 'select is-fullwidth is-danger'
}

const view: FieldView<SelectState, SelectMsg> = (state$, dispatch) => {
  const placeholder$ = pick(state$, (s): SelectOption[] =>
    s.placeholder ? [{ key: s.placeholder[0], label: s.placeholder[1], selected: s.selectedKey === undefined }] : [],
  )
  const options$ = pick(state$, (s) =>
    s.values.map(([key, label]): SelectOption => ({ key, label, selected: s.selectedKey === key })),
  )

  return html`
    <div class="field">
      <label class="label" for=${pick(state$, (s) => s.name)}>${pick(state$, (s) => s.label)}</label>
      <div class="control">
        <div class=${pick(state$, selectClass)}>
          <select
            id=${pick(state$, (s) => s.name)}
            @change=${(e: Event) => dispatch({ type: 'select/change', key: eventValue(e) })}
          >
            ${list(placeholder$, (o) => o.key, (option$, key) => html`
              <option value=${key} disabled .selected=${pick(option$, (o) => o.selected)}>${pick(option$, (o) => o.label)}</option>
            `)}
            ${list(options$, (o) => o.key, (option$, key) => html`
              <option value=${key} .selected=${pick(option$, (o) => o.selected)}>${pick(option$, (o) => o.label)}</option>
            `)}
          </select>
        </div>
      </div>
      <span class="help is-danger">${helpText(state$)}</span>
    </div>
  `
}

function isSelectMsg(msg: { readonly type: string }): msg is SelectMsg {
  switch (msg.type) {
    case 'select/change':
      return 'key' in msg && typeof msg.key === 'string'
    case 'select/received':
      return 'values' in msg && isKeyLabelList(msg.values)
    case 'select/failed':
      return 'error' in msg
    default:
      return false
  }
}

export const selectConfig: FieldConfig<SelectState, SelectMsg> = {
  isState: (value): value is SelectState =>
    hasBaseFieldShape(value) &&
    isOptionalString(value.selectedKey) &&
    isKeyLabelList(value.values) &&
    (value.placeholder === undefined || isKeyLabel(value.placeholder)) &&
    typeof value.isLoading === 'boolean',
  isMsg: isSelectMsg,
  init: (state) => {
    if (!state.valuesFromServer) return [state, FieldCmd.none]
    return [
      { ...state, isLoading: true },
      FieldCmd.ofObservable(
        state.valuesFromServer,
        (values): SelectMsg => ({ type: 'select/received', values }),
        (error): SelectMsg => ({ type: 'select/failed', error }),
      ),
    ]
  },
  update: (msg, state) => {
    switch (msg.type) {
      case 'select/change':
        return [applyValidators({ ...state, selectedKey: msg.key }), FieldCmd.none]
      case 'select/received':
        return [{ ...state, values: msg.values, isLoading: false }, FieldCmd.none]
      case 'select/failed':
        handleFormError(msg.error, `select:${state.name}`)
        return [{ ...state, isLoading: false }, FieldCmd.none]
    }
  },
  view,
  validate: applyValidators,
  isValid: (state) => !state.isLoading && isFieldValid(state),
  toJson: (state) => [state.name, state.selectedKey ?? null],
  setError: withError,
}

const withView = customViews(selectConfig)

export class BasicSelect {
  private constructor(private readonly state: SelectState) {}

  static create(name: string): BasicSelect {
    return new BasicSelect({
      name,
      label: '',
      values: [],
      isLoading: false,
      validators: [],
      validationState: Valid,
    })
  }

  private clone(patch: Partial<SelectState>): BasicSelect {
    return new BasicSelect({ ...this.state, ...patch })
  }

  withLabel(label: string): BasicSelect {
    return this.clone({ label })
  }

  withPlaceholder(label: string, key = DEFAULT_PLACEHOLDER_KEY): BasicSelect {
    return this.clone({ placeholder: [key, label] })
  }

  withSelectedKey(selectedKey: string): BasicSelect {
    return this.clone({ selectedKey })
  }

  withValues(values: readonly KeyLabel[]): BasicSelect {
    return this.clone({ values })
  }

  /** The options arrive on init; the field counts as invalid until then. */
  withValuesFromServer(valuesFromServer: Observable<readonly KeyLabel[]>): BasicSelect {
    return this.clone({ valuesFromServer, isLoading: true })
  }

  addValidator(validator: Validator<SelectState>): BasicSelect {
    return this.clone({ validators: [validator, ...this.state.validators] })
  }

  /** Requires a selected key. */
  isRequired(message = DEFAULT_REQUIRED_MESSAGE): BasicSelect {
    return this.addValidator((s) => (s.selectedKey === undefined ? invalid(message) : Valid))
  }

  withDefaultView(): FieldBuilder {
    return fieldBuilder(SELECT_TYPE, this.state, selectConfig)
  }

  withCustomView(view: FieldView<SelectState, SelectMsg>, type = `${SELECT_TYPE}:custom`): FieldBuilder {
    return fieldBuilder(type, this.state, withView(view))
  }
}
