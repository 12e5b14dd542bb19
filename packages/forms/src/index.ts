export { Valid, invalid, validationText, isValidState } from './types'
export type {
  JsonValue,
  ErrorDef,
  ValidationState,
  FieldType,
  FieldName,
  FieldMsg,
  Field,
  FormMsg,
  FormState,
  FieldView,
  FieldConfig,
  RegisteredFieldConfig,
  FieldBuilder,
  FormConfig,
} from './types'
export { FieldCmd, fieldMsg } from './field-cmd'
export { registerFieldConfig, customViews, fieldBuilder } from './registry'
export { FormBuilder } from './builder'
export type { FormOptions } from './builder'
export { Form } from './form'
export type { FormRenderProps, LoaderContainer } from './form'
export { decodeErrorDefs, decodeErrorDef, encodeErrorDef } from './error-def'
export { FormBuildError, UnknownFieldTypeError, FieldShapeError, ErrorDefDecodeError } from './errors'
export { setFormErrorHandler, handleFormError } from './error-handler'
export type { FormErrorHandler } from './error-handler'
