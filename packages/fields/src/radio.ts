import { html, list } from '@mvu-forms/dom'
import { FieldCmd, Valid, customViews, fieldBuilder, invalid } from '@mvu-forms/forms'
import type { FieldBuilder, FieldConfig, FieldView } from '@mvu-forms/forms'
import {
  DEFAULT_REQUIRED_MESSAGE,
  applyValidators,
  hasBaseFieldShape,
  helpText,
  isFieldValid,
  isKeyLabelList,
  isOptionalString,
  pick,
  withError,
} from './common'
import type { BaseFieldState, KeyLabel, Validator } from './common'

export const RADIO_TYPE = 'basic-radio-button'

export interface RadioState extends BaseFieldState<RadioState> {
  readonly selectedKey?: string
  readonly values: readonly KeyLabel[]
  /** Shared `name` of the radio inputs; also prefixes their ids. */
  readonly group: string
}

export type RadioMsg = { readonly type: 'radio/change'; readonly key: string }

let groupCount = 0

function nextGroup(): string {
  groupCount += 1
  return `radio-group-${groupCount}`
}

interface RadioOption {
  key: string
  label: string
  group: string
  checked: boolean
}

const view: FieldView<RadioState, RadioMsg> = (state$, dispatch) => {
  const options$ = pick(state$, (s) =>
    s.values.map(([key, label]): RadioOption => ({ key, label, group: s.group, checked: s.selectedKey === key })),
  )

  return html`
    <div class="field">
      <label class="label">${pick(state$, (s) => s.label)}</label>
      <div class="control">
        ${list(options$, (o) => o.key, (option$, key) => html`
          <label class="radio" for=${pick(option$, (o) => `${o.group}-${key}`)}>
            <input
              type="radio"
              class="radio"
              id=${pick(option$, (o) => `${o.group}-${key}`)}
              name=${pick(option$, (o) => o.group)}
              value=${key}
              .checked=${pick(option$, (o) => o.checked)}
              @change=${() => dispatch({ type: 'radio/change', key })}
            />
            ${pick(option$, (o) => o.label)}
          </label>
        `)}
      </div>
      <span class="help is-danger">${helpText(state$)}</span>
    </div>
  `
}

export const radioConfig: FieldConfig<RadioState, RadioMsg> = {
  isState: (value): value is RadioState =>
    hasBaseFieldShape(value) &&
    isOptionalString(value.selectedKey) &&
    isKeyLabelList(value.values) &&
    typeof value.group === 'string',
  isMsg: (msg): msg is RadioMsg => msg.type === 'radio/change' && 'key' in msg && typeof msg.key === 'string',
  init: (state) => [state, FieldCmd.none],
  update: (msg, state) => [applyValidators({ ...state, selectedKey: msg.key }), FieldCmd.none],
  view,
  validate: applyValidators,
  isValid: isFieldValid,
  toJson: (state) => [state.name, state.selectedKey ?? null],
  setError: withError,
}

const withView = customViews(radioConfig)

export class BasicRadio {
  private constructor(private readonly state: RadioState) {}

  /** Each radio gets a fresh group unless `withGroup` sets one. */
  static create(name: string): BasicRadio {
    return new BasicRadio({
      name,
      label: '',
      values: [],
      group: nextGroup(),
      validators: [],
      validationState: Valid,
    })
  }

  private clone(patch: Partial<RadioState>): BasicRadio {
    return new BasicRadio({ ...this.state, ...patch })
  }

  withLabel(label: string): BasicRadio {
    return this.clone({ label })
  }

  withValues(values: readonly KeyLabel[]): BasicRadio {
    return this.clone({ values })
  }

  withSelectedKey(selectedKey: string): BasicRadio {
    return this.clone({ selectedKey })
  }

  withGroup(group: string): BasicRadio {
    return this.clone({ group })
  }

  addValidator(validator: Validator<RadioState>): BasicRadio {
    return this.clone({ validators: [validator, ...this.state.validators] })
  }

  /** Requires a selected key. */
  isRequired(message = DEFAULT_REQUIRED_MESSAGE): BasicRadio {
    return this.addValidator((s) => (s.selectedKey === undefined ? invalid(message) : Valid))
  }

  withDefaultView(): FieldBuilder {
    return fieldBuilder(RADIO_TYPE, this.state, radioConfig)
  }

  withCustomView(view: FieldView<RadioState, RadioMsg>, type = `${RADIO_TYPE}:custom`): FieldBuilder {
    return fieldBuilder(type, this.state, withView(view))
  }
}
