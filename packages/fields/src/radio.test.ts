import { describe, it, expect, vi } from 'vitest'
import { BehaviorSubject } from 'rxjs'
import { Valid, invalid } from '@mvu-forms/forms'
import type { FieldBuilder } from '@mvu-forms/forms'
import { click, mountTemplate } from '@mvu-forms/testing'
import { BasicRadio, radioConfig } from './radio'
import type { RadioMsg, RadioState } from './radio'

function stateOf(builder: FieldBuilder): RadioState {
  const state = builder.state
  if (!radioConfig.isState(state)) throw new Error('not a radio state')
  return state
}

const plans = [
  ['basic', 'Basic'],
  ['pro', 'Pro'],
] as const

describe('BasicRadio', () => {
  it('registers under basic-radio-button with a generated group', () => {
    const first = BasicRadio.create('plan').withDefaultView()
    const second = BasicRadio.create('plan').withDefaultView()

    expect(first.type).toBe('basic-radio-button')
    expect(stateOf(first).group).toMatch(/^radio-group-\d+$/)
    expect(stateOf(first).group).not.toBe(stateOf(second).group)
    expect(stateOf(first).selectedKey).toBeUndefined()
  })

  it('withGroup overrides the generated group', () => {
    expect(stateOf(BasicRadio.create('plan').withGroup('plans').withDefaultView()).group).toBe('plans')
  })

  it('isRequired wants a selected key', () => {
    const state = stateOf(BasicRadio.create('plan').withValues(plans).isRequired().withDefaultView())
    expect(radioConfig.validate(state).validationState).toEqual(invalid('This field is required'))
    expect(radioConfig.validate({ ...state, selectedKey: 'pro' }).validationState).toEqual(Valid)
  })
})

describe('radioConfig', () => {
  const state = stateOf(BasicRadio.create('plan').withLabel('Plan').withValues(plans).withGroup('plans').isRequired().withDefaultView())

  it('selects the key and re-validates', () => {
    const [next] = radioConfig.update({ type: 'radio/change', key: 'pro' }, radioConfig.validate(state))
    expect(next.selectedKey).toBe('pro')
    expect(next.validationState).toEqual(Valid)
  })

  it('serializes the selected key or null', () => {
    expect(radioConfig.toJson(state)).toEqual(['plan', null])
    expect(radioConfig.toJson({ ...state, selectedKey: 'basic' })).toEqual(['plan', 'basic'])
  })

  it('shows a server error from setError in the view', () => {
    const state$ = new BehaviorSubject<RadioState>({ ...state, selectedKey: 'pro' })
    const { container, unmount } = mountTemplate(radioConfig.view(state$, () => undefined))
    expect(container.querySelector('.help')?.textContent).toBe('')

    const failed = radioConfig.setError(state$.value, 'Pro is sold out')
    expect(radioConfig.isValid(failed)).toBe(false)
    expect(failed.validationState).toEqual(invalid('Pro is sold out'))

    state$.next(failed)
    expect(container.querySelector('.help')?.textContent).toBe('Pro is sold out')
    unmount()
  })

  it('renders one radio per value', () => {
    const state$ = new BehaviorSubject<RadioState>({ ...state, selectedKey: 'pro' })
    const dispatch = vi.fn<[RadioMsg], void>()
    const { container, unmount } = mountTemplate(radioConfig.view(state$, dispatch))
    const radios = Array.from(container.querySelectorAll<HTMLInputElement>('input[type="radio"]'))

    expect(container.querySelector('label.label')?.textContent).toBe('Plan')
    expect(radios.map((r) => r.id)).toEqual(['plans-basic', 'plans-pro'])
    expect(radios.map((r) => r.name)).toEqual(['plans', 'plans'])
    expect(radios.map((r) => r.checked)).toEqual([false, true])
    expect(Array.from(container.querySelectorAll('label.radio')).map((l) => l.textContent?.trim())).toEqual([
      'Basic',
      'Pro',
    ])

    const basic = radios[0]
    if (!basic) throw new Error('radio not rendered')
    click(basic)
    expect(dispatch).toHaveBeenCalledWith({ type: 'radio/change', key: 'basic' })

    state$.next({ ...state$.value, selectedKey: 'basic' })
    expect(radios.map((r) => r.checked)).toEqual([true, false])
    unmount()
  })
})
