import { Subscription } from 'rxjs'
import type { TemplateResult } from './template'
import { handleDomError } from './error-handler'

export interface Lifecycle {
  /**
   * Run after the fragment has been inserted (next microtask). A returned
   * function runs on destroy.
   */
  onMount(fn: () => void | (() => void)): void
  /** Run when the component's subscription is unsubscribed. */
  onDestroy(fn: () => void): void
}

export type ComponentDef<P> = (props: P) => TemplateResult

/**
 * defineComponent(setup)
 *
 * Wraps a setup function into a component: `setup` runs once per instance,
 * and the returned `TemplateResult` embeds in `html` like any other.
 *
 * @example
 *   const Counter = defineComponent<{ count$: Observable<number> }>((props, { onMount }) => {
 *     onMount(() => appendStyle('counter-styles', css))
 *     return html`<output>${props.count$}</output>`
 *   })
 */
export function defineComponent<P>(
  setup: (props: P, lifecycle: Lifecycle) => TemplateResult,
): ComponentDef<P> {
  return (props) => {
    const onMount: Array<() => void | (() => void)> = []
    const onDestroy: Array<() => void> = []

    const result = setup(props, {
      onMount: (fn) => onMount.push(fn),
      onDestroy: (fn) => onDestroy.push(fn),
    })

    const sub = new Subscription()
    sub.add(result.sub)

    queueMicrotask(() => {
      if (sub.closed) return
      for (const fn of onMount) {
        try {
          const cleanup = fn()
          if (typeof cleanup === 'function') onDestroy.push(cleanup)
        } catch (err) {
          handleDomError(err, 'onMount')
        }
      }
    })

    sub.add(() => {
      for (const fn of onDestroy) {
        try {
          fn()
        } catch (err) {
          handleDomError(err, 'onDestroy')
        }
      }
    })

    return { fragment: result.fragment, sub }
  }
}
