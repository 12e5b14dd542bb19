import { Observable, Subscription, defer } from 'rxjs'

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type Dispatch<Msg> = (msg: Msg) => void

/**
 * A single side-effect. It receives `dispatch` and may return a teardown.
 * A returned Subscription is released as soon as it closes; a returned
 * function is kept until the owning program is destroyed, so long-lived
 * programs should prefer Subscriptions for effects they run often.
 */
export type Effect<Msg> = (dispatch: Dispatch<Msg>) => void | Subscription | (() => void)

/** A list of effects to run after an update. */
export type Cmd<Msg> = readonly Effect<Msg>[]

// ---------------------------------------------------------------------------
// Cmd
// ---------------------------------------------------------------------------

function none<Msg>(): Cmd<Msg> {
  return []
}

function ofMsg<Msg>(msg: Msg): Cmd<Msg> {
  return [(dispatch) => dispatch(msg)]
}

function ofEffect<Msg>(effect: Effect<Msg>): Cmd<Msg> {
  return [effect]
}

function batch<Msg>(cmds: ReadonlyArray<Cmd<Msg>>): Cmd<Msg> {
  return cmds.flat()
}

/**
 * Cmd.map(cmd, f)
 *
 * Lift a child command into the parent's message space.
 *
 * @example
 *   const [form, formCmd] = Form.init(config, state)
 *   return [{ form }, Cmd.map(formCmd, (msg) => ({ type: 'FORM', msg }))]
 */
function mapCmd<A, B>(cmd: Cmd<A>, f: (msg: A) => B): Cmd<B> {
  return cmd.map((effect): Effect<B> => (dispatch) => effect((msg) => dispatch(f(msg))))
}

/**
 * Cmd.ofObservable(source$, onSuccess, onError)
 *
 * Subscribes when the command runs. Every emission is dispatched through
 * `onSuccess`; an error is dispatched through `onError`.
 */
function ofObservable<T, Msg>(
  source$: Observable<T>,
  onSuccess: (value: T) => Msg,
  onError: (error: unknown) => Msg,
): Cmd<Msg> {
  return [
    (dispatch) =>
      source$.subscribe({
        next: (value) => dispatch(onSuccess(value)),
        error: (err: unknown) => dispatch(onError(err)),
      }),
  ]
}

/** Same as `ofObservable` for a promise-returning task. The task starts when the command runs. */
function ofPromise<T, Msg>(
  task: () => Promise<T>,
  onSuccess: (value: T) => Msg,
  onError: (error: unknown) => Msg,
): Cmd<Msg> {
  return ofObservable(defer(task), onSuccess, onError)
}

export const Cmd = {
  none,
  ofMsg,
  ofEffect,
  batch,
  map: mapCmd,
  ofObservable,
  ofPromise,
}
