import { FormBuildError } from './errors'
import type { Field, FieldBuilder, FieldType, FormConfig, FormMsg, FormState, RegisteredFieldConfig } from './types'

export interface FormOptions {
  /** Indentation for Form.toJson (default 0: compact). */
  jsonIndent?: number
}

/**
 * Immutable builder for a form's initial state and config.
 *
 * @example
 *   const [formState, formConfig] = FormBuilder.create((msg: FormMsg): Msg => ({ type: 'FORM', msg }))
 *     .addField(BasicInput.create('email').withLabel('Email').isRequired().withDefaultView())
 *     .addField(BasicCheckbox.create('terms').withLabel('I agree').isRequired().withDefaultView())
 *     .build()
 */
export class FormBuilder<AppMsg> {
  private constructor(
    private readonly toMsg: (msg: FormMsg) => AppMsg,
    private readonly builders: readonly FieldBuilder[],
    private readonly options: FormOptions,
  ) {}

  static create<AppMsg>(toMsg: (msg: FormMsg) => AppMsg, options: FormOptions = {}): FormBuilder<AppMsg> {
    return new FormBuilder(toMsg, [], options)
  }

  addField(builder: FieldBuilder): FormBuilder<AppMsg> {
    return new FormBuilder(this.toMsg, [...this.builders, builder], this.options)
  }

  addFields(builders: readonly FieldBuilder[]): FormBuilder<AppMsg> {
    return new FormBuilder(this.toMsg, [...this.builders, ...builders], this.options)
  }

  /**
   * Throws FormBuildError when two fields share a name, or when one field
   * type is registered with two different configs.
   */
  build(): [FormState, FormConfig<AppMsg>] {
    const duplicates = repeated(this.builders.map((b) => b.name))
    if (duplicates.length > 0) {
      throw new FormBuildError(
        'Each field needs to have a unique name. I found the following duplicate names:' +
          duplicates.map((name) => `\n-${name}`).join(''),
      )
    }

    const fields = new Map<FieldType, RegisteredFieldConfig>()
    const conflicts: FieldType[] = []
    for (const builder of this.builders) {
      const existing = fields.get(builder.type)
      if (existing === undefined) fields.set(builder.type, builder.config)
      else if (existing !== builder.config && !conflicts.includes(builder.type)) conflicts.push(builder.type)
    }
    if (conflicts.length > 0) {
      throw new FormBuildError(
        'Each field type needs a single config. Give custom views their own type. I found several configs for:' +
          conflicts.map((type) => `\n-${type}`).join(''),
      )
    }

    const state: FormState = {
      fields: this.builders.map((b): Field => ({ type: b.type, name: b.name, state: b.state })),
      isLoading: false,
    }

    return [state, { toMsg: this.toMsg, fields, jsonIndent: this.options.jsonIndent ?? 0 }]
  }
}

function repeated(names: readonly string[]): string[] {
  const counts = new Map<string, number>()
  for (const name of names) counts.set(name, (counts.get(name) ?? 0) + 1)
  return [...counts].filter(([, n]) => n > 1).map(([name]) => name)
}
