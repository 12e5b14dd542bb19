import './style.css'
import { renderInto, setDomErrorHandler } from '@mvu-forms/dom'
import { createErrorHandler, createSafeProgram } from '@mvu-forms/errors'
import { setFormErrorHandler } from '@mvu-forms/forms'
import { createFakeApi } from './api'
import { SignUpView, createSignUpPage } from './sign-up'

// ---------------------------------------------------------------------------
// Errors: one handler, shown as a toast
// ---------------------------------------------------------------------------

const [errorHandler, errorSub] = createErrorHandler({
  onError: (e) => console.error(`[demo] ${e.source}${e.context ? ` (${e.context})` : ''}: ${e.message}`),
})

setFormErrorHandler((error, context) => errorHandler.reportError(error, 'observable', context))
setDomErrorHandler((error, context) => errorHandler.reportError(error, 'observable', context))

const toastEl = document.createElement('div')
toastEl.className = 'error-toast hidden'
document.body.appendChild(toastEl)

let toastTimer: ReturnType<typeof setTimeout> | null = null

const errorToastSub = errorHandler.errors$.subscribe((e) => {
  toastEl.textContent = e.message
  toastEl.classList.remove('hidden')
  if (toastTimer) clearTimeout(toastTimer)
  toastTimer = setTimeout(() => toastEl.classList.add('hidden'), 4000)
})

// ---------------------------------------------------------------------------
// Program
// ---------------------------------------------------------------------------

const page = createSignUpPage(createFakeApi({ latency: 600 }))

const program = createSafeProgram({ init: page.init, update: page.update }, errorHandler, { context: 'sign-up' })

const root = document.querySelector('#app')
if (!root) throw new Error('#app not found')

const viewSub = renderInto(root, SignUpView({ program, config: page.config }))

// ---------------------------------------------------------------------------
// HMR cleanup
// ---------------------------------------------------------------------------

if (import.meta.hot) {
  import.meta.hot.dispose(() => {
    viewSub.unsubscribe()
    program.destroy()
    errorToastSub.unsubscribe()
    errorSub.unsubscribe()
    toastEl.remove()
    setFormErrorHandler()
    setDomErrorHandler()
  })
}
