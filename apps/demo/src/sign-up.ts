import { map } from 'rxjs/operators'
import { Cmd } from '@mvu-forms/store'
import type { Program } from '@mvu-forms/store'
import { defineComponent, html, when } from '@mvu-forms/dom'
import { Form, FormBuilder, invalid, Valid } from '@mvu-forms/forms'
import type { FormConfig, FormMsg, FormState } from '@mvu-forms/forms'
import { BasicCheckbox, BasicInput, BasicRadio, BasicSelect, BasicTextArea } from '@mvu-forms/fields'
import type { InputState } from '@mvu-forms/fields'
import type { SignUpApi, SignUpResult } from './api'

// ---------------------------------------------------------------------------
// Model
// ---------------------------------------------------------------------------

export interface Model {
  form: FormState
  status: 'editing' | 'submitting' | 'done'
  /** Shown above the form when a submission fails outright. */
  notice: string | null
}

export type Msg =
  | { type: 'FORM'; msg: FormMsg }
  | { type: 'SUBMIT' }
  | { type: 'SUBMITTED'; result: SignUpResult }
  | { type: 'SUBMIT_FAILED'; error: unknown }
  | { type: 'RESET' }

export interface SignUpPage {
  config: FormConfig<Msg>
  init(): readonly [Model, Cmd<Msg>]
  update(msg: Msg, model: Model): readonly [Model, Cmd<Msg>]
}

// ---------------------------------------------------------------------------
// Form
// ---------------------------------------------------------------------------

const EMAIL = /^[^\s@]+@[^\s@]+\.[^\s@]+$/

const looksLikeEmail = (s: InputState) => (s.value === '' || EMAIL.test(s.value) ? Valid : invalid('Enter a valid email address'))

const minLength = (min: number) => (s: InputState) =>
  s.value === '' || s.value.length >= min ? Valid : invalid(`At least ${min} characters`)

export const PLANS = [
  ['free', 'Free'],
  ['pro', 'Pro'],
  ['team', 'Team'],
] as const

function buildForm(api: SignUpApi): [FormState, FormConfig<Msg>] {
  return FormBuilder.create((msg: FormMsg): Msg => ({ type: 'FORM', msg }), { jsonIndent: 2 })
    .addField(BasicInput.create('username').withLabel('Username').withPlaceholder('ada').isRequired().withDefaultView())
    .addField(
      BasicInput.create('email')
        .withLabel('Email')
        .withType('email')
        .withPlaceholder('you@example.com')
        .isRequired()
        .addValidator(looksLikeEmail)
        .withDefaultView(),
    )
    .addField(
      BasicInput.create('password')
        .withLabel('Password')
        .withType('password')
        .isRequired()
        .addValidator(minLength(8))
        .withDefaultView(),
    )
    .addField(
      BasicSelect.create('country')
        .withLabel('Country')
        .withPlaceholder('Select a country')
        .withValuesFromServer(api.countries())
        .isRequired()
        .withDefaultView(),
    )
    .addField(BasicRadio.create('plan').withLabel('Plan').withGroup('plan').withValues(PLANS).withSelectedKey('free').withDefaultView())
    .addField(BasicTextArea.create('bio').withLabel('About you').withPlaceholder('Optional').withDefaultView())
    .addField(BasicCheckbox.create('terms').withLabel('I accept the terms of use').isRequired('Please accept the terms').withDefaultView())
    .build()
}

// ---------------------------------------------------------------------------
// Init / update
// ---------------------------------------------------------------------------

export function createSignUpPage(api: SignUpApi): SignUpPage {
  const [initialForm, config] = buildForm(api)

  function init(): readonly [Model, Cmd<Msg>] {
    const [form, formCmd] = Form.init(config, initialForm)
    return [{ form, status: 'editing', notice: null }, Cmd.map(formCmd, config.toMsg)]
  }

  function update(msg: Msg, model: Model): readonly [Model, Cmd<Msg>] {
    switch (msg.type) {
      case 'FORM': {
        const [form, formCmd] = Form.update(config, msg.msg, model.form)
        return [{ ...model, form }, Cmd.map(formCmd, config.toMsg)]
      }

      case 'SUBMIT': {
        if (model.status === 'submitting') return [model, Cmd.none()]
        const [form, isValid] = Form.validate(config, model.form)
        if (!isValid) return [{ ...model, form }, Cmd.none()]
        return [
          { form: Form.setLoading(true, form), status: 'submitting', notice: null },
          Cmd.ofObservable(
            api.signUp(Form.toValues(config, form)),
            (result): Msg => ({ type: 'SUBMITTED', result }),
            (error): Msg => ({ type: 'SUBMIT_FAILED', error }),
          ),
        ]
      }

      case 'SUBMITTED': {
        const form = Form.setLoading(false, model.form)
        if (msg.result.ok) return [{ ...model, form, status: 'done' }, Cmd.none()]
        return [{ ...model, form: Form.setErrors(config, msg.result.errors, form), status: 'editing' }, Cmd.none()]
      }

      case 'SUBMIT_FAILED': {
        const reason = msg.error instanceof Error ? msg.error.message : String(msg.error)
        return [
          { form: Form.setLoading(false, model.form), status: 'editing', notice: `Could not sign up: ${reason}` },
          Cmd.none(),
        ]
      }

      case 'RESET':
        return init()
    }
  }

  return { config, init, update }
}

// ---------------------------------------------------------------------------
// View
// ---------------------------------------------------------------------------

interface SignUpViewProps {
  program: Program<Model, Msg>
  config: FormConfig<Msg>
}

export const SignUpView = defineComponent<SignUpViewProps>(({ program, config }, { onMount }) => {
  const { dispatch } = program
  const submitting$ = program.select((m) => m.status === 'submitting')

  onMount(() => {
    document.getElementById('username')?.focus()
  })

  const actions = html`
    <div class="field is-grouped">
      <button type="button" class="button is-primary" ?disabled=${submitting$} @click=${() => dispatch({ type: 'SUBMIT' })}>
        Sign up
      </button>
      <button type="button" class="button is-light" @click=${() => dispatch({ type: 'RESET' })}>Reset</button>
    </div>
  `

  return html`
    <section class="section">
      <h1 class="title">Create an account</h1>
      ${when(program.select((m) => m.status === 'done'), () => html`
        <div class="notification is-success">Welcome aboard! Check your inbox to confirm your email.</div>
      `)}
      ${when(program.select((m) => m.notice !== null), () => html`
        <div class="notification is-danger">${program.select((m) => m.notice ?? '')}</div>
      `)}
      ${Form.render({ config, state$: program.select((m) => m.form), dispatch, actionsArea: actions })}
      <pre class="json-preview">${program.select((m) => m.form).pipe(map((form) => Form.toJson(config, form)))}</pre>
    </section>
  `
})
