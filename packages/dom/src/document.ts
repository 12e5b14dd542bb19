import { Subscription } from 'rxjs'
import type { TemplateResult } from './template'

/**
 * Append a `<style>` element with the given id to `document.head`, unless
 * one is already there. Lets a package ship the few rules it needs without
 * asking the host to load a stylesheet.
 */
export function appendStyle(id: string, css: string): HTMLStyleElement {
  const existing = document.getElementById(id)
  if (existing instanceof HTMLStyleElement) return existing

  const style = document.createElement('style')
  style.id = id
  style.textContent = css
  document.head.appendChild(style)
  return style
}

/**
 * Replace the children of `root` with a rendered template. The returned
 * subscription tears the bindings down and empties `root`.
 */
export function renderInto(root: Element, result: TemplateResult): Subscription {
  root.replaceChildren(result.fragment)
  const sub = new Subscription()
  sub.add(result.sub)
  sub.add(() => root.replaceChildren())
  return sub
}
