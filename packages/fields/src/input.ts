import { html } from '@mvu-forms/dom'
import { FieldCmd, Valid, customViews, fieldBuilder, invalid } from '@mvu-forms/forms'
import type { FieldBuilder, FieldConfig, FieldView } from '@mvu-forms/forms'
import {
  DEFAULT_REQUIRED_MESSAGE,
  applyValidators,
  eventValue,
  hasBaseFieldShape,
  helpText,
  isFieldValid,
  isOptionalString,
  pick,
  withError,
} from './common'
import type { BaseFieldState, Validator } from './common'

export const INPUT_TYPE = 'basic-input'

export interface InputState extends BaseFieldState<InputState> {
  readonly value: string
  /** The `type` attribute: text, email, password, ... */
  readonly inputType: string
  readonly placeholder?: string
}

export type InputMsg = { readonly type: 'input/change'; readonly value: string }

const view: FieldView<InputState, InputMsg> = (state$, dispatch) => html`
  <div class="field">
    <label class="label" for=${pick(state$, (s) => s.name)}>${pick(state$, (s) => s.label)}</label>
    <div class="control">
      <input
        id=${pick(state$, (s) => s.name)}
        class=${pick(state$, (s) => (isFieldValid(s) ? 'input' : 'input is-danger'))}
        type=${pick(state$, (s) => s.inputType)}
        placeholder=${pick(state$, (s) => s.placeholder)}
        .value=${pick(state$, (s) => s.value)}
        @change=${(e: Event) => dispatch({ type: 'input/change', value: eventValue(e) })}
      />
    </div>
    <span class="help is-danger">${helpText(state$)}</span>
  </div>
`

export const inputConfig: FieldConfig<InputState, InputMsg> = {
  isState: (value): value is InputState =>
    hasBaseFieldShape(value) &&
    typeof value.value === 'string' &&
    typeof value.inputType === 'string' &&
    isOptionalString(value.placeholder),
  isMsg: (msg): msg is InputMsg => msg.type === 'input/change' && 'value' in msg && typeof msg.value === 'string',
  init: (state) => [state, FieldCmd.none],
  update: (msg, state) => [applyValidators({ ...state, value: msg.value }), FieldCmd.none],
  view,
  validate: applyValidators,
  isValid: isFieldValid,
  toJson: (state) => [state.name, state.value],
  setError: withError,
}

const withView = customViews(inputConfig)

export class BasicInput {
  private constructor(private readonly state: InputState) {}

  static create(name: string): BasicInput {
    return new BasicInput({
      name,
      label: '',
      value: '',
      inputType: 'text',
      validators: [],
      validationState: Valid,
    })
  }

  private clone(patch: Partial<InputState>): BasicInput {
    return new BasicInput({ ...this.state, ...patch })
  }

  withLabel(label: string): BasicInput {
    return this.clone({ label })
  }

  withValue(value: string): BasicInput {
    return this.clone({ value })
  }

  withType(inputType: string): BasicInput {
    return this.clone({ inputType })
  }

  withPlaceholder(placeholder: string): BasicInput {
    return this.clone({ placeholder })
  }

  addValidator(validator: Validator<InputState>): BasicInput {
    return this.clone({ validators: [validator, ...this.state.validators] })
  }

  /** Rejects an empty or whitespace-only value. */
  isRequired(message = DEFAULT_REQUIRED_MESSAGE): BasicInput {
    return this.addValidator((s) => (s.value.trim() === '' ? invalid(message) : Valid))
  }

  withDefaultView(): FieldBuilder {
    return fieldBuilder(INPUT_TYPE, this.state, inputConfig)
  }

  withCustomView(view: FieldView<InputState, InputMsg>, type = `${INPUT_TYPE}:custom`): FieldBuilder {
    return fieldBuilder(type, this.state, withView(view))
  }
}
