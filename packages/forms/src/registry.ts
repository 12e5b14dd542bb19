import { map } from 'rxjs/operators'
import { FieldShapeError } from './errors'
import type { FieldBuilder, FieldConfig, FieldMsg, FieldType, FieldView, RegisteredFieldConfig } from './types'

const registered = new WeakMap<object, RegisteredFieldConfig>()

/**
 * Erase a typed FieldConfig so it can sit in a FormConfig next to other
 * kinds. Each call checks the opaque state (and message) against the
 * config's guards and throws FieldShapeError on a mismatch.
 *
 * The result is cached per config object: registering the same config twice
 * yields the same RegisteredFieldConfig.
 */
export function registerFieldConfig<S, M extends FieldMsg>(config: FieldConfig<S, M>): RegisteredFieldConfig {
  const hit = registered.get(config)
  if (hit) return hit

  const state = (value: unknown): S => {
    if (config.isState(value)) return value
    throw new FieldShapeError('state', value)
  }

  const erased: RegisteredFieldConfig = {
    isState: (value) => config.isState(value),
    init: (value) => config.init(state(value)),
    update: (msg, value) => {
      if (!config.isMsg(msg)) throw new FieldShapeError('message', msg)
      return config.update(msg, state(value))
    },
    view: (state$, dispatch) => config.view(state$.pipe(map(state)), dispatch),
    validate: (value) => config.validate(state(value)),
    isValid: (value) => config.isValid(state(value)),
    toJson: (value) => config.toJson(state(value)),
    setError: (value, message) => config.setError(state(value), message),
  }

  registered.set(config, erased)
  return erased
}

/**
 * Returns a function that swaps the view of `base`. The same view function
 * always yields the same config, so fields sharing a custom view share one
 * registration.
 */
export function customViews<S, M extends FieldMsg>(
  base: FieldConfig<S, M>,
): (view: FieldView<S, M>) => FieldConfig<S, M> {
  const cache = new WeakMap<FieldView<S, M>, FieldConfig<S, M>>()
  return (view) => {
    const hit = cache.get(view)
    if (hit) return hit
    const config: FieldConfig<S, M> = { ...base, view }
    cache.set(view, config)
    return config
  }
}

/** Package a field's initial state and config for FormBuilder.addField. */
export function fieldBuilder<S extends { readonly name: string }, M extends FieldMsg>(
  type: FieldType,
  state: S,
  config: FieldConfig<S, M>,
): FieldBuilder {
  return { type, name: state.name, state, config: registerFieldConfig(config) }
}
