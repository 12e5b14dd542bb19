export { applyValidators, DEFAULT_REQUIRED_MESSAGE } from './common'
export type { Validator, BaseFieldState, KeyLabel } from './common'
export { BasicCheckbox, checkboxConfig, CHECKBOX_TYPE } from './checkbox'
export type { CheckboxState, CheckboxMsg } from './checkbox'
export { BasicInput, inputConfig, INPUT_TYPE } from './input'
export type { InputState, InputMsg } from './input'
export { BasicTextArea, textAreaConfig, TEXTAREA_TYPE } from './textarea'
export type { TextAreaState, TextAreaMsg } from './textarea'
export { BasicRadio, radioConfig, RADIO_TYPE } from './radio'
export type { RadioState, RadioMsg } from './radio'
export { BasicSelect, selectConfig, SELECT_TYPE, DEFAULT_PLACEHOLDER_KEY } from './select'
export type { SelectState, SelectMsg } from './select'
