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

export const TEXTAREA_TYPE = 'basic-textarea'

export interface TextAreaState extends BaseFieldState<TextAreaState> {
  readonly value: string
  readonly placeholder?: string
}

export type TextAreaMsg = { readonly type: 'textarea/change'; readonly value: string }

const view: FieldView<TextAreaState, TextAreaMsg> = (state$, dispatch) => html`
  <div class="field">
    <label class="label" for=${pick(state$, (s) => s.name)}>${pick(state$, (s) => s.label)}</label>
    <div class="control">
      <textarea
        id=${pick(state$, (s) => s.name)}
        class=${pick(state$, (s) => (isFieldValid(s) ? 'textarea' : 'textarea is-danger'))}
        placeholder=${pick(state$, (s) => s.placeholder)}
        .value=${pick(state$, (s) => s.value)}
        @change=${(e: Event) => dispatch({ type: 'textarea/change', value: eventValue(e) })}
      ></textarea>
    </div>
    <span class="help is-danger">${helpText(state$)}</span>
  </div>
`

export const textAreaConfig: FieldConfig<TextAreaState, TextAreaMsg> = {
  isState: (value): value is TextAreaState =>
    hasBaseFieldShape(value) && typeof value.value === 'string' && isOptionalString(value.placeholder),
  isMsg: (msg): msg is TextAreaMsg => msg.type === 'textarea/change' && 'value' in msg && typeof msg.value === 'string',
  init: (state) => [state, FieldCmd.none],
  update: (msg, state) => [applyValidators({ ...state, value: msg.value }), FieldCmd.none],
  view,
  validate: applyValidators,
  isValid: isFieldValid,
  toJson: (state) => [state.name, state.value],
  setError: withError,
}

const withView = customViews(textAreaConfig)

export class BasicTextArea {
  private constructor(private readonly state: TextAreaState) {}

  static create(name: string): BasicTextArea {
    return new BasicTextArea({
      name,
      label: '',
      value: '',
      validators: [],
      validationState: Valid,
    })
  }

  private clone(patch: Partial<TextAreaState>): BasicTextArea {
    return new BasicTextArea({ ...this.state, ...patch })
  }

  withLabel(label: string): BasicTextArea {
    return this.clone({ label })
  }

  withValue(value: string): BasicTextArea {
    return this.clone({ value })
  }

  withPlaceholder(placeholder: string): BasicTextArea {
    return this.clone({ placeholder })
  }

  addValidator(validator: Validator<TextAreaState>): BasicTextArea {
    return this.clone({ validators: [validator, ...this.state.validators] })
  }

  isRequired(message = DEFAULT_REQUIRED_MESSAGE): BasicTextArea {
    return this.addValidator((s) => (s.value.trim() === '' ? invalid(message) : Valid))
  }

  withDefaultView(): FieldBuilder {
    return fieldBuilder(TEXTAREA_TYPE, this.state, textAreaConfig)
  }

  withCustomView(view: FieldView<TextAreaState, TextAreaMsg>, type = `${TEXTAREA_TYPE}:custom`): FieldBuilder {
    return fieldBuilder(type, this.state, withView(view))
  }
}
