import { describe, it, expect, vi, afterEach } from 'vitest'
import { BehaviorSubject } from 'rxjs'
import { map } from 'rxjs/operators'
import { html, setDomErrorHandler } from '@mvu-forms/dom'
import { mountTemplate } from '@mvu-forms/testing'
import { FormBuilder } from './builder'
import { Form } from './form'
import { FieldCmd, fieldMsg } from './field-cmd'
import { customViews, fieldBuilder } from './registry'
import { FieldShapeError, FormBuildError, UnknownFieldTypeError } from './errors'
import { Valid, invalid, isValidState } from './types'
import type { FieldConfig, FieldMsg, FormMsg, FormState, ValidationState } from './types'
import type { LoaderContainer } from './form'

// ---------------------------------------------------------------------------
// A minimal field kind: a counter button
// ---------------------------------------------------------------------------

interface CounterState {
  name: string
  count: number
  validationState: ValidationState
}

type CounterMsg = { type: 'counter/inc' } | { type: 'counter/set'; count: number }

const counterConfig: FieldConfig<CounterState, CounterMsg> = {
  isState: (value): value is CounterState =>
    typeof value === 'object' &&
    value !== null &&
    'name' in value &&
    'count' in value &&
    typeof value.count === 'number' &&
    'validationState' in value,
  isMsg: (msg): msg is CounterMsg => msg.type === 'counter/inc' || msg.type === 'counter/set',
  init: (state) => [state, state.count < 0 ? FieldCmd.ofMsg({ type: 'counter/set', count: 0 }) : FieldCmd.none],
  update: (msg, state) => {
    switch (msg.type) {
      case 'counter/inc': return [{ ...state, count: state.count + 1 }, FieldCmd.none]
      case 'counter/set': return [{ ...state, count: msg.count }, FieldCmd.none]
    }
  },
  view: (state$, dispatch) => html`
    <button class="counter" @click=${() => dispatch({ type: 'counter/inc' })}>${state$.pipe(map((s) => String(s.count)))}</button>
  `,
  validate: (state) => ({ ...state, validationState: state.count > 0 ? Valid : invalid('Must be positive') }),
  isValid: (state) => isValidState(state.validationState),
  toJson: (state) => [state.name, state.count],
  setError: (state, message) => ({ ...state, validationState: invalid(message) }),
}

function counter(name: string, count = 0) {
  return fieldBuilder('counter', { name, count, validationState: Valid }, counterConfig)
}

type AppMsg = { type: 'FORM'; msg: FormMsg }
const toMsg = (msg: FormMsg): AppMsg => ({ type: 'FORM', msg })

function counterAt(state: FormState, index: number): unknown {
  return state.fields[index]?.state
}

function runCmd(cmd: ReadonlyArray<(dispatch: (msg: FormMsg) => void) => unknown>): FormMsg[] {
  const seen: FormMsg[] = []
  for (const effect of cmd) effect((msg) => seen.push(msg))
  return seen
}

// ---------------------------------------------------------------------------
// FormBuilder
// ---------------------------------------------------------------------------

describe('FormBuilder', () => {
  it('builds fields in order with loading off', () => {
    const [state, config] = FormBuilder.create(toMsg).addField(counter('a')).addField(counter('b', 2)).build()

    expect(state.isLoading).toBe(false)
    expect(state.fields.map((f) => f.name)).toEqual(['a', 'b'])
    expect(state.fields[1]).toEqual({ type: 'counter', name: 'b', state: { name: 'b', count: 2, validationState: Valid } })
    expect([...config.fields.keys()]).toEqual(['counter'])
    expect(config.jsonIndent).toBe(0)
    expect(config.toMsg(fieldMsg('a', { type: 'counter/inc' }))).toEqual({
      type: 'FORM',
      msg: { type: 'form/field', field: 'a', msg: { type: 'counter/inc' } },
    })
  })

  it('addFields appends after earlier fields', () => {
    const [state] = FormBuilder.create(toMsg)
      .addField(counter('first'))
      .addFields([counter('second'), counter('third')])
      .build()
    expect(state.fields.map((f) => f.name)).toEqual(['first', 'second', 'third'])
  })

  it('is immutable', () => {
    const base = FormBuilder.create(toMsg)
    base.addField(counter('a'))
    const [state] = base.build()
    expect(state.fields).toEqual([])
  })

  it('takes jsonIndent from the options', () => {
    const [, config] = FormBuilder.create(toMsg, { jsonIndent: 2 }).build()
    expect(config.jsonIndent).toBe(2)
  })

  it('rejects duplicate names, listing each once in first-seen order', () => {
    const builder = FormBuilder.create(toMsg).addFields([
      counter('b'),
      counter('a'),
      counter('b'),
      counter('a'),
      counter('b'),
      counter('c'),
    ])
    expect(() => builder.build()).toThrow(FormBuildError)
    expect(() => builder.build()).toThrow(
      'Each field needs to have a unique name. I found the following duplicate names:\n-b\n-a',
    )
  })

  it('rejects two configs under one field type', () => {
    const otherView = customViews(counterConfig)(() => html`<span>other</span>`)
    const builder = FormBuilder.create(toMsg)
      .addField(counter('a'))
      .addField(fieldBuilder('counter', { name: 'b', count: 0, validationState: Valid }, otherView))
    expect(() => builder.build()).toThrow(
      'Each field type needs a single config. Give custom views their own type. I found several configs for:\n-counter',
    )
  })

  it('accepts a custom view under its own type', () => {
    const otherView = customViews(counterConfig)(() => html`<span>other</span>`)
    const [, config] = FormBuilder.create(toMsg)
      .addField(counter('a'))
      .addField(fieldBuilder('counter:custom', { name: 'b', count: 0, validationState: Valid }, otherView))
      .build()
    expect([...config.fields.keys()]).toEqual(['counter', 'counter:custom'])
  })
})

// ---------------------------------------------------------------------------
// Form
// ---------------------------------------------------------------------------

describe('Form.init', () => {
  it('batches field commands in field order, bound to each name', () => {
    const [state, config] = FormBuilder.create(toMsg)
      .addFields([counter('a', -1), counter('b', 2), counter('c', -5)])
      .build()

    const [next, cmd] = Form.init(config, state)

    expect(next.fields.map((f) => f.name)).toEqual(['a', 'b', 'c'])
    expect(runCmd(cmd)).toEqual([
      { type: 'form/field', field: 'a', msg: { type: 'counter/set', count: 0 } },
      { type: 'form/field', field: 'c', msg: { type: 'counter/set', count: 0 } },
    ])
  })
})

describe('Form.update', () => {
  const [state, config] = FormBuilder.create(toMsg).addFields([counter('a', 1), counter('b', 2)]).build()

  it('updates only the named field', () => {
    const [next, cmd] = Form.update(config, fieldMsg('b', { type: 'counter/inc' }), state)
    expect(counterAt(next, 1)).toEqual({ name: 'b', count: 3, validationState: Valid })
    expect(next.fields[0]).toBe(state.fields[0])
    expect(cmd).toEqual([])
  })

  it('leaves the state alone for an unknown name', () => {
    const [next, cmd] = Form.update(config, fieldMsg('missing', { type: 'counter/inc' }), state)
    expect(next).toBe(state)
    expect(cmd).toEqual([])
  })

  it('throws FieldShapeError for a message the field does not handle', () => {
    const stray: FieldMsg = { type: 'input/change' }
    expect(() => Form.update(config, fieldMsg('a', stray), state)).toThrow(FieldShapeError)
  })

  it('throws UnknownFieldTypeError for an unregistered type', () => {
    const odd: FormState = { ...state, fields: [{ type: 'mystery', name: 'a', state: {} }] }
    expect(() => Form.update(config, fieldMsg('a', { type: 'counter/inc' }), odd)).toThrow(UnknownFieldTypeError)
    expect(() => Form.update(config, fieldMsg('a', { type: 'counter/inc' }), odd)).toThrow(
      'No config registered for field type "mystery"',
    )
  })
})

describe('Form.validate', () => {
  it('validates every field and reports the aggregate', () => {
    const [state, config] = FormBuilder.create(toMsg).addFields([counter('a', 0), counter('b', 2), counter('c', -1)]).build()

    const [next, isValid] = Form.validate(config, state)

    expect(isValid).toBe(false)
    expect(counterAt(next, 0)).toEqual({ name: 'a', count: 0, validationState: invalid('Must be positive') })
    expect(counterAt(next, 1)).toEqual({ name: 'b', count: 2, validationState: Valid })
    expect(counterAt(next, 2)).toEqual({ name: 'c', count: -1, validationState: invalid('Must be positive') })
  })

  it('is valid when every field is', () => {
    const [state, config] = FormBuilder.create(toMsg).addFields([counter('a', 1), counter('b', 2)]).build()
    expect(Form.validate(config, state)[1]).toBe(true)
  })

  it('is valid for an empty form', () => {
    const [state, config] = FormBuilder.create(toMsg).build()
    expect(Form.validate(config, state)).toEqual([state, true])
  })
})

describe('Form.toJson / Form.toValues', () => {
  it('serializes compactly by default', () => {
    const [state, config] = FormBuilder.create(toMsg).addFields([counter('a', 0), counter('b', 2)]).build()
    expect(Form.toValues(config, state)).toEqual({ a: 0, b: 2 })
    expect(Form.toJson(config, state)).toBe('{"a":0,"b":2}')
  })

  it('indents by config.jsonIndent', () => {
    const [state, config] = FormBuilder.create(toMsg, { jsonIndent: 2 }).addFields([counter('a', 0), counter('b', 2)]).build()
    expect(Form.toJson(config, state)).toBe('{\n  "a": 0,\n  "b": 2\n}')
  })
})

describe('Form.setLoading / Form.isLoading', () => {
  it('toggles the flag', () => {
    const [state] = FormBuilder.create(toMsg).build()
    expect(Form.isLoading(state)).toBe(false)
    expect(Form.isLoading(Form.setLoading(true, state))).toBe(true)
    expect(Form.isLoading(Form.setLoading(false, Form.setLoading(true, state)))).toBe(false)
  })
})

describe('Form.setErrors', () => {
  it('applies the first error per field and ignores unknown keys', () => {
    const [state, config] = FormBuilder.create(toMsg).addFields([counter('a', 1), counter('b', 2)]).build()

    const next = Form.setErrors(
      config,
      [
        { key: 'a', text: 'first' },
        { key: 'zzz', text: 'nobody' },
        { key: 'a', text: 'second' },
      ],
      state,
    )

    expect(counterAt(next, 0)).toEqual({ name: 'a', count: 1, validationState: invalid('first') })
    expect(next.fields[1]).toBe(state.fields[1])
  })
})

// ---------------------------------------------------------------------------
// Form.render
// ---------------------------------------------------------------------------

describe('Form.render', () => {
  afterEach(() => {
    document.getElementById('mvu-form-loader-keyframes')?.remove()
    setDomErrorHandler()
  })

  function setup(loader?: LoaderContainer) {
    const [initial, config] = FormBuilder.create(toMsg).addFields([counter('a', 0), counter('b', 2)]).build()
    const state$ = new BehaviorSubject<FormState>(initial)
    const dispatch = vi.fn<[AppMsg], void>()
    const mounted = mountTemplate(
      Form.render({
        config,
        state$,
        dispatch,
        actionsArea: html`<button type="submit">Send</button>`,
        loader,
      }),
    )
    return { config, state$, dispatch, ...mounted }
  }

  it('renders fields by name, then the actions area', () => {
    const { container, unmount } = setup()
    const form = container.querySelector('.mvu-form')

    expect(form?.getAttribute('style')).toBe('position: relative')
    expect(Array.from(container.querySelectorAll('.counter')).map((b) => b.textContent?.trim())).toEqual(['0', '2'])
    expect(form?.lastElementChild?.textContent).toBe('Send')
    unmount()
  })

  it('wraps field messages for the host', () => {
    const { container, dispatch, unmount } = setup()
    const second = container.querySelectorAll<HTMLButtonElement>('.counter')[1]

    second?.click()

    expect(dispatch).toHaveBeenCalledWith({
      type: 'FORM',
      msg: { type: 'form/field', field: 'b', msg: { type: 'counter/inc' } },
    })
    unmount()
  })

  it('keeps field elements across updates', () => {
    const { container, config, state$, unmount } = setup()
    const before = container.querySelectorAll('.counter')[1]

    const [next] = Form.update(config, fieldMsg('b', { type: 'counter/inc' }), state$.value)
    state$.next(next)

    const after = container.querySelectorAll('.counter')[1]
    expect(after).toBe(before)
    expect(after?.textContent?.trim()).toBe('3')
    unmount()
  })

  it('shows the default loader while loading', () => {
    const { container, state$, unmount } = setup()
    expect(container.querySelector('.loader-container')).toBeNull()

    state$.next(Form.setLoading(true, state$.value))
    expect(container.querySelector('.loader-container')).not.toBeNull()
    expect(container.querySelector('.loader-rings')).not.toBeNull()
    expect(document.getElementById('mvu-form-loader-keyframes')?.textContent).toContain('@keyframes mvu-form-loader-rings')

    state$.next(Form.setLoading(false, state$.value))
    expect(container.querySelector('.loader-container')).toBeNull()
    unmount()
  })

  it('throws UnknownFieldTypeError for an unregistered type in the current state', () => {
    const [initial, config] = FormBuilder.create(toMsg).addField(counter('a')).build()
    const odd: FormState = { ...initial, fields: [...initial.fields, { type: 'mystery', name: 'b', state: {} }] }

    expect(() => Form.render({ config, state$: new BehaviorSubject(odd), dispatch: () => undefined })).toThrow(
      'No config registered for field type "mystery"',
    )
    expect(() => Form.render({ config, state$: new BehaviorSubject(odd), dispatch: () => undefined })).toThrow(
      UnknownFieldTypeError,
    )
  })

  it('reports an unregistered type arriving later and keeps the other fields', () => {
    const contexts: string[] = []
    setDomErrorHandler((_, context) => contexts.push(context))
    const { container, state$, unmount } = setup()

    state$.next({ ...state$.value, fields: [...state$.value.fields, { type: 'mystery', name: 'c', state: {} }] })

    expect(contexts).toEqual(['list'])
    expect(Array.from(container.querySelectorAll('.counter')).map((b) => b.textContent?.trim())).toEqual(['0', '2'])
    unmount()
  })

  it('uses a custom loader', () => {
    const { container, state$, unmount } = setup({
      kind: 'custom',
      render: (isLoading$) => html`<p class="busy">${isLoading$.pipe(map((on) => (on ? 'busy' : 'idle')))}</p>`,
    })
    expect(container.querySelector('.busy')?.textContent).toBe('idle')

    state$.next(Form.setLoading(true, state$.value))
    expect(container.querySelector('.busy')?.textContent).toBe('busy')
    expect(container.querySelector('.loader-container')).toBeNull()
    unmount()
  })
})
