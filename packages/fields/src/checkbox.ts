import { html } from '@mvu-forms/dom'
import { FieldCmd, Valid, customViews, fieldBuilder, invalid } from '@mvu-forms/forms'
import type { FieldBuilder, FieldConfig, FieldView } from '@mvu-forms/forms'
import {
  DEFAULT_REQUIRED_MESSAGE,
  applyValidators,
  hasBaseFieldShape,
  helpText,
  isFieldValid,
  pick,
  withError,
} from './common'
import type { BaseFieldState, Validator } from './common'

export const CHECKBOX_TYPE = 'basic-checkbox'

export interface CheckboxState extends BaseFieldState<CheckboxState> {
  readonly isChecked: boolean
}

export type CheckboxMsg = { readonly type: 'checkbox/toggle' }

const view: FieldView<CheckboxState, CheckboxMsg> = (state$, dispatch) => html`
  <div class="field">
    <div class="control">
      <label class="checkbox">
        <input
          type="checkbox"
          class="checkbox"
          .checked=${pick(state$, (s) => s.isChecked)}
          @change=${() => dispatch({ type: 'checkbox/toggle' })}
        />
        ${pick(state$, (s) => s.label)}
      </label>
    </div>
    <span class="help is-danger">${helpText(state$)}</span>
  </div>
`

export const checkboxConfig: FieldConfig<CheckboxState, CheckboxMsg> = {
  isState: (value): value is CheckboxState => hasBaseFieldShape(value) && typeof value.isChecked === 'boolean',
  isMsg: (msg): msg is CheckboxMsg => msg.type === 'checkbox/toggle',
  init: (state) => [state, FieldCmd.none],
  update: (_msg, state) => [applyValidators({ ...state, isChecked: !state.isChecked }), FieldCmd.none],
  view,
  validate: applyValidators,
  isValid: isFieldValid,
  toJson: (state) => [state.name, state.isChecked],
  setError: withError,
}

const withView = customViews(checkboxConfig)

export class BasicCheckbox {
  private constructor(private readonly state: CheckboxState) {}

  static create(name: string): BasicCheckbox {
    return new BasicCheckbox({
      name,
      label: '',
      isChecked: false,
      validators: [],
      validationState: Valid,
    })
  }

  private clone(patch: Partial<CheckboxState>): BasicCheckbox {
    return new BasicCheckbox({ ...this.state, ...patch })
  }

  withLabel(label: string): BasicCheckbox {
    return this.clone({ label })
  }

  withValue(isChecked: boolean): BasicCheckbox {
    return this.clone({ isChecked })
  }

  addValidator(validator: Validator<CheckboxState>): BasicCheckbox {
    return this.clone({ validators: [validator, ...this.state.validators] })
  }

  /** Requires the box to be checked. */
  isRequired(message = DEFAULT_REQUIRED_MESSAGE): BasicCheckbox {
    return this.addValidator((s) => (s.isChecked ? Valid : invalid(message)))
  }

  withDefaultView(): FieldBuilder {
    return fieldBuilder(CHECKBOX_TYPE, this.state, checkboxConfig)
  }

  /**
   * Register under `type` (default `basic-checkbox:custom`). Forms that mix
   * views of one field kind need a type per view.
   */
  withCustomView(view: FieldView<CheckboxState, CheckboxMsg>, type = `${CHECKBOX_TYPE}:custom`): FieldBuilder {
    return fieldBuilder(type, this.state, withView(view))
  }
}
