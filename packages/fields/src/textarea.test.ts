import { describe, it, expect, vi } from 'vitest'
import { BehaviorSubject } from 'rxjs'
import { Valid, invalid } from '@mvu-forms/forms'
import type { FieldBuilder } from '@mvu-forms/forms'
import { mountTemplate, typeInto } from '@mvu-forms/testing'
import { BasicTextArea, textAreaConfig } from './textarea'
import type { TextAreaMsg, TextAreaState } from './textarea'

function stateOf(builder: FieldBuilder): TextAreaState {
  const state = builder.state
  if (!textAreaConfig.isState(state)) throw new Error('not a textarea state')
  return state
}

describe('BasicTextArea', () => {
  it('registers under basic-textarea', () => {
    const builder = BasicTextArea.create('bio').withLabel('Bio').withPlaceholder('About you').withDefaultView()
    expect(builder.type).toBe('basic-textarea')
    expect(stateOf(builder)).toEqual({
      name: 'bio',
      label: 'Bio',
      value: '',
      placeholder: 'About you',
      validators: [],
      validationState: Valid,
    })
  })

  it('updates the value and re-validates', () => {
    const state = stateOf(BasicTextArea.create('bio').withValue('hello').isRequired('Tell us something').withDefaultView())
    const [cleared] = textAreaConfig.update({ type: 'textarea/change', value: '\n' }, state)
    expect(cleared.validationState).toEqual(invalid('Tell us something'))
    expect(textAreaConfig.toJson(cleared)).toEqual(['bio', '\n'])
  })

  it('shows a server error from setError in the view', () => {
    const state$ = new BehaviorSubject(stateOf(BasicTextArea.create('bio').withValue('hello').withDefaultView()))
    const { container, unmount } = mountTemplate(textAreaConfig.view(state$, () => undefined))
    expect(container.querySelector('.help')?.textContent).toBe('')

    const failed = textAreaConfig.setError(state$.value, 'Bio contains a link')
    expect(textAreaConfig.isValid(failed)).toBe(false)

    state$.next(failed)
    expect(container.querySelector('textarea')?.className).toBe('textarea is-danger')
    expect(container.querySelector('.help')?.textContent).toBe('Bio contains a link')
    unmount()
  })

  it('renders the value and dispatches changes', () => {
    const state = stateOf(BasicTextArea.create('bio').withValue('hello').withDefaultView())
    const dispatch = vi.fn<[TextAreaMsg], void>()
    const { container, unmount } = mountTemplate(textAreaConfig.view(new BehaviorSubject(state), dispatch))
    const textarea = container.querySelector('textarea')
    if (!textarea) throw new Error('textarea not rendered')

    expect(textarea.value).toBe('hello')
    expect(textarea.className).toBe('textarea')

    typeInto(textarea, 'hello there', 'change')
    expect(dispatch).toHaveBeenCalledWith({ type: 'textarea/change', value: 'hello there' })
    unmount()
  })
})
