import { BehaviorSubject, isObservable, Observable, Subscription } from 'rxjs'
import { distinctUntilChanged } from 'rxjs/operators'
import { handleDomError } from './error-handler'

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/**
 * An Observable backed by a BehaviorSubject, with `snapshot()` for reading
 * the current value inside event handlers.
 *
 * Handed to `list()` item templates:
 *
 * ```ts
 * list(options$, ([key]) => key, (option$) => html`
 *   <button @click=${() => pick(option$.snapshot()[0])}>${option$.pipe(map(([, label]) => label))}</button>
 * `)
 * ```
 */
export interface LiveValue<T> extends Observable<T> {
  snapshot(): T
}

export function createLiveValue<T>(subject: BehaviorSubject<T>): LiveValue<T> {
  return Object.assign(subject.asObservable(), { snapshot: () => subject.value })
}

/** Result of an `html` call. Unsubscribe `sub` to tear every binding down. */
export interface TemplateResult {
  fragment: DocumentFragment
  sub: Subscription
}

/**
 * A structural binding placed in a text slot (`when`, `list`). It receives
 * the slot's comment anchor and owns whatever it inserts after it.
 */
export interface Directive {
  kind: 'directive'
  bind(anchor: Comment, sub: Subscription): void
}

// ---------------------------------------------------------------------------
// Guards
// ---------------------------------------------------------------------------

function isTemplateResult(v: unknown): v is TemplateResult {
  return (
    typeof v === 'object' &&
    v !== null &&
    'fragment' in v &&
    v.fragment instanceof DocumentFragment &&
    'sub' in v &&
    v.sub instanceof Subscription
  )
}

function isDirective(v: unknown): v is Directive {
  return (
    typeof v === 'object' &&
    v !== null &&
    'kind' in v &&
    v.kind === 'directive' &&
    'bind' in v &&
    typeof v.bind === 'function'
  )
}

// ---------------------------------------------------------------------------
// Template preparation
// ---------------------------------------------------------------------------

const MARKER = '__MVU_'
const EVENT_PREFIX = 'data-mvu-event-'
const PROP_PREFIX = 'data-mvu-prop-'
const BOOL_PREFIX = 'data-mvu-bool-'

type SlotKind = 'text' | 'attribute' | 'event' | 'property' | 'boolean'

interface Slot {
  kind: SlotKind
  /** Index into the template's values. */
  index: number
  /** Attribute, event or property name (empty for text slots). */
  name: string
  /** Child-index chain from the fragment root to the slot's node. */
  path: number[]
}

interface PreparedTemplate {
  element: HTMLTemplateElement
  slots: Slot[]
}

const cache = new WeakMap<TemplateStringsArray, PreparedTemplate>()

/**
 * True when the markup so far ends inside a tag, right where an attribute
 * value starts (`<a href=` or `<a href="`).
 */
function inAttributeValue(markup: string): boolean {
  const open = markup.lastIndexOf('<')
  if (open === -1) return false
  const tag = markup.slice(open)
  if (tag.includes('>')) return false
  return /=\s*["']?$/.test(tag)
}

function prepare(strings: TemplateStringsArray): PreparedTemplate {
  const hit = cache.get(strings)
  if (hit) return hit

  let markup = ''
  strings.forEach((chunk, i) => {
    markup += chunk
    if (i === strings.length - 1) return
    markup += inAttributeValue(markup) ? `${MARKER}${i}__` : `<!--${MARKER}${i}__-->`
  })

  // The HTML parser would drop or mangle `@`, `.` and `?` prefixes.
  const name = '[A-Za-z_][\\w:-]*'
  markup = markup
    .replace(new RegExp(`\\s@(${name})=`, 'g'), (_, n: string) => ` ${EVENT_PREFIX}${n}=`)
    .replace(new RegExp(`\\s\\.(${name})=`, 'g'), (_, n: string) => ` ${PROP_PREFIX}${n}=`)
    .replace(new RegExp(`\\s\\?(${name})=`, 'g'), (_, n: string) => ` ${BOOL_PREFIX}${n}=`)

  const element = document.createElement('template')
  element.innerHTML = markup

  const slots: Slot[] = []
  collectSlots(element.content, [], slots)

  const prepared = { element, slots }
  cache.set(strings, prepared)
  return prepared
}

function slotFromAttribute(attrName: string): { kind: SlotKind; name: string } {
  if (attrName.startsWith(EVENT_PREFIX)) return { kind: 'event', name: attrName.slice(EVENT_PREFIX.length) }
  if (attrName.startsWith(PROP_PREFIX)) return { kind: 'property', name: attrName.slice(PROP_PREFIX.length) }
  if (attrName.startsWith(BOOL_PREFIX)) return { kind: 'boolean', name: attrName.slice(BOOL_PREFIX.length) }
  return { kind: 'attribute', name: attrName }
}

function collectSlots(node: Node, path: number[], slots: Slot[]): void {
  if (node instanceof Comment) {
    const match = /^__MVU_(\d+)__$/.exec(node.data)
    if (match) slots.push({ kind: 'text', index: Number(match[1]), name: '', path })
    return
  }

  if (node instanceof Element) {
    const bound: string[] = []
    for (const attribute of Array.from(node.attributes)) {
      const match = /__MVU_(\d+)__/.exec(attribute.value)
      if (!match) continue
      slots.push({ ...slotFromAttribute(attribute.name), index: Number(match[1]), path })
      bound.push(attribute.name)
    }
    bound.forEach((n) => node.removeAttribute(n))
  }

  node.childNodes.forEach((child, i) => collectSlots(child, [...path, i], slots))
}

// ---------------------------------------------------------------------------
// Binding
// ---------------------------------------------------------------------------

function resolve(root: Node, path: number[]): Node | undefined {
  let node: Node | undefined = root
  for (const i of path) {
    node = node?.childNodes[i]
  }
  return node
}

interface Mounted {
  nodes: Node[]
  sub: Subscription
}

/** Insert `value` right after `anchor` and return what was inserted. */
function mountAfter(anchor: Node, value: unknown): Mounted {
  const parent = anchor.parentNode
  const sub = new Subscription()
  if (!parent) return { nodes: [], sub }

  const fragment = document.createDocumentFragment()
  const items = Array.isArray(value) ? value : [value]
  for (const item of items) {
    if (isTemplateResult(item)) {
      fragment.appendChild(item.fragment)
      sub.add(item.sub)
    } else {
      fragment.appendChild(document.createTextNode(String(item ?? '')))
    }
  }

  const nodes = Array.from(fragment.childNodes)
  parent.insertBefore(fragment, anchor.nextSibling)
  return { nodes, sub }
}

function unmount(mounted: Mounted | null): void {
  if (!mounted) return
  mounted.sub.unsubscribe()
  for (const node of mounted.nodes) node.parentNode?.removeChild(node)
}

function bindText(anchor: Comment, value: unknown, sub: Subscription): void {
  if (isDirective(value)) {
    value.bind(anchor, sub)
    return
  }

  if (isObservable(value)) {
    let current: Mounted | null = null
    sub.add(
      value.subscribe({
        next: (v) => {
          unmount(current)
          current = mountAfter(anchor, v)
        },
        error: (err: unknown) => handleDomError(err, 'text'),
      }),
    )
    sub.add(() => unmount(current))
    return
  }

  // Static content replaces its marker.
  const mounted = mountAfter(anchor, value)
  sub.add(mounted.sub)
  anchor.remove()
}

function subscribeOrApply(
  value: unknown,
  sub: Subscription,
  context: string,
  apply: (v: unknown) => void,
): void {
  if (isObservable(value)) {
    sub.add(value.subscribe({ next: apply, error: (err: unknown) => handleDomError(err, context) }))
  } else {
    apply(value)
  }
}

function bindAttribute(el: Element, name: string, value: unknown, sub: Subscription): void {
  subscribeOrApply(value, sub, `attribute:${name}`, (v) => {
    if (v === null || v === undefined) el.removeAttribute(name)
    else el.setAttribute(name, String(v))
  })
}

function bindEvent(el: Element, name: string, value: unknown, sub: Subscription): void {
  if (typeof value !== 'function') return
  const listener = (event: Event): void => {
    try {
      value(event)
    } catch (err) {
      handleDomError(err, `event:${name}`)
    }
  }
  el.addEventListener(name, listener)
  sub.add(() => el.removeEventListener(name, listener))
}

function bindProperty(el: Element, name: string, value: unknown, sub: Subscription): void {
  subscribeOrApply(value, sub, `property:${name}`, (v) => {
    Reflect.set(el, name, v)
  })
}

function bindBoolean(el: Element, name: string, value: unknown, sub: Subscription): void {
  subscribeOrApply(value, sub, `boolean:${name}`, (v) => {
    el.toggleAttribute(name, Boolean(v))
  })
}

function bindSlots(fragment: DocumentFragment, slots: Slot[], values: unknown[]): Subscription {
  const sub = new Subscription()
  // Resolve every node first: text slots change the child lists they live in.
  const targets = slots.map((slot) => ({ slot, node: resolve(fragment, slot.path) }))

  for (const { slot, node } of targets) {
    const value = values[slot.index]
    if (slot.kind === 'text') {
      if (node instanceof Comment) bindText(node, value, sub)
      continue
    }
    if (!(node instanceof Element)) {
      handleDomError(new Error(`No element for ${slot.kind} slot "${slot.name}"`), 'html')
      continue
    }
    switch (slot.kind) {
      case 'attribute':
        bindAttribute(node, slot.name, value, sub)
        break
      case 'event':
        bindEvent(node, slot.name, value, sub)
        break
      case 'property':
        bindProperty(node, slot.name, value, sub)
        break
      case 'boolean':
        bindBoolean(node, slot.name, value, sub)
        break
    }
  }

  return sub
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * html`...`
 *
 * Tagged template for reactive DOM. Values may be static or Observables.
 *
 * - text: `<p>${name$}</p>` (escaped; nested templates, arrays, `when`, `list`)
 * - attribute: `<label for=${id}>` (null or undefined removes it)
 * - event: `<input @change=${onChange} />`
 * - property: `<input .value=${value$} />`
 * - boolean attribute: `<option ?disabled=${true}>`
 *
 * Attribute-like slots must take the whole value.
 */
export function html(strings: TemplateStringsArray, ...values: unknown[]): TemplateResult {
  const prepared = prepare(strings)
  const fragment = document.importNode(prepared.element.content, true)
  const sub = bindSlots(fragment, prepared.slots, values)
  return { fragment, sub }
}

/**
 * when(condition$, thenFn, elseFn?)
 *
 * Mount `thenFn()` while the condition is true, `elseFn()` otherwise.
 * Branches are built lazily and torn down when the condition flips.
 */
export function when(
  condition$: Observable<boolean>,
  thenFn: () => TemplateResult,
  elseFn?: () => TemplateResult,
): Directive {
  return {
    kind: 'directive',
    bind(anchor, sub) {
      let current: Mounted | null = null
      sub.add(
        condition$.pipe(distinctUntilChanged()).subscribe({
          next: (show) => {
            unmount(current)
            const branch = show ? thenFn : elseFn
            current = branch ? mountAfter(anchor, branch()) : null
          },
          error: (err: unknown) => handleDomError(err, 'when'),
        }),
      )
      sub.add(() => unmount(current))
    },
  }
}

/**
 * list(items$, keyFn, templateFn)
 *
 * Keyed list. Each key's template is built once and fed through a
 * `LiveValue`; it is torn down when its key disappears. A template that
 * throws is reported as `'list'` and its item is left out. Items are inserted
 * between comment anchors without a wrapper element, so a list can render
 * `<option>`s inside a `<select>`.
 */
export function list<T>(
  items$: Observable<readonly T[]>,
  keyFn: (item: T, index: number) => string,
  templateFn: (item$: LiveValue<T>, key: string) => TemplateResult,
): Directive {
  interface ItemView {
    nodes: Node[]
    sub: Subscription
    input: BehaviorSubject<T>
  }

  function destroy(view: ItemView): void {
    view.sub.unsubscribe()
    view.input.complete()
    for (const node of view.nodes) node.parentNode?.removeChild(node)
  }

  return {
    kind: 'directive',
    bind(anchor, sub) {
      const end = document.createComment('/list')
      anchor.parentNode?.insertBefore(end, anchor.nextSibling)
      let views = new Map<string, ItemView>()

      sub.add(
        items$.subscribe({
          next: (items) => {
            const next = new Map<string, ItemView>()
            items.forEach((item, i) => {
              const key = keyFn(item, i)
              if (next.has(key)) return
              const existing = views.get(key)
              if (existing) {
                existing.input.next(item)
                next.set(key, existing)
                return
              }
              const input = new BehaviorSubject(item)
              try {
                const result = templateFn(createLiveValue(input), key)
                next.set(key, { nodes: Array.from(result.fragment.childNodes), sub: result.sub, input })
              } catch (err) {
                input.complete()
                handleDomError(err, 'list')
              }
            })

            for (const [key, view] of views) {
              if (!next.has(key)) destroy(view)
            }
            views = next

            const parent = end.parentNode
            if (!parent) return
            for (const view of views.values()) {
              for (const node of view.nodes) parent.insertBefore(node, end)
            }
          },
          error: (err: unknown) => handleDomError(err, 'list'),
        }),
      )

      sub.add(() => {
        views.forEach(destroy)
        views.clear()
        end.remove()
      })
    },
  }
}
