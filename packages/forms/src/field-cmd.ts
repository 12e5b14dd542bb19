import type { Observable } from 'rxjs'
import { Cmd } from '@mvu-forms/store'
import type { FieldMsg, FieldName, FormMsg } from './types'

/** A field command, bound to the issuing field's name by the form. */
export type FieldCmd = (name: FieldName) => Cmd<FormMsg>

export function fieldMsg(field: FieldName, msg: FieldMsg): FormMsg {
  return { type: 'form/field', field, msg }
}

const none: FieldCmd = () => Cmd.none()

function ofMsg(msg: FieldMsg): FieldCmd {
  return (name) => Cmd.ofMsg(fieldMsg(name, msg))
}

/**
 * Subscribe to `source$` and send the outcome back to the issuing field.
 *
 * @example
 *   init: (state) => [
 *     { ...state, isLoading: true },
 *     FieldCmd.ofObservable(countries$, (values) => ({ type: 'select/received', values }), (error) => ({ type: 'select/failed', error })),
 *   ]
 */
function ofObservable<T>(
  source$: Observable<T>,
  onSuccess: (value: T) => FieldMsg,
  onError: (error: unknown) => FieldMsg,
): FieldCmd {
  return (name) =>
    Cmd.ofObservable(
      source$,
      (value) => fieldMsg(name, onSuccess(value)),
      (error) => fieldMsg(name, onError(error)),
    )
}

function ofPromise<T>(
  task: () => Promise<T>,
  onSuccess: (value: T) => FieldMsg,
  onError: (error: unknown) => FieldMsg,
): FieldCmd {
  return (name) =>
    Cmd.ofPromise(
      task,
      (value) => fieldMsg(name, onSuccess(value)),
      (error) => fieldMsg(name, onError(error)),
    )
}

export const FieldCmd = {
  none,
  ofMsg,
  ofObservable,
  ofPromise,
}
