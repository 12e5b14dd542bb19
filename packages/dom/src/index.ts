export { html, when, list, createLiveValue } from './template'
export type { TemplateResult, LiveValue, Directive } from './template'
export { defineComponent } from './component'
export type { ComponentDef, Lifecycle } from './component'
export { appendStyle, renderInto } from './document'
export { setDomErrorHandler, handleDomError } from './error-handler'
export type { DomErrorHandler } from './error-handler'
