import { BehaviorSubject, Observable, OperatorFunction, Subject, Subscription, queueScheduler } from 'rxjs'
import { distinctUntilChanged, filter, map, observeOn, scan } from 'rxjs/operators'
import { Cmd } from './cmd'
import type { Dispatch } from './cmd'

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type Init<S, M> = () => readonly [S, Cmd<M>]

export type Update<S, M> = (msg: M, state: S) => readonly [S, Cmd<M>]

/**
 * Receives errors thrown by `update` (context `'update'`) or by an effect
 * while it starts (context `'command'`).
 */
export type ProgramErrorHandler = (error: unknown, context: 'update' | 'command') => void

export interface ProgramOptions<S, M> {
  init: Init<S, M>
  update: Update<S, M>
  onError?: ProgramErrorHandler
}

export interface Program<S, M> {
  /** Current model. Replays the latest value to late subscribers. */
  state$: Observable<S>
  /** Every message, emitted after the model it produced has been published. */
  msgs$: Observable<M>
  dispatch: Dispatch<M>
  /** Derive a slice of the model. Emits only when the slice changes. */
  select<T>(selector: (state: S) => T): Observable<T>
  getState(): S
  /** Tear down running commands and complete every stream. */
  destroy(): void
}

interface Transition<S, M> {
  state: S
  cmd: Cmd<M>
  msg?: M
}

const defaultErrorHandler: ProgramErrorHandler = (error, context) => {
  console.error(`[@mvu-forms/store] Error in ${context}:`, error)
}

// ---------------------------------------------------------------------------
// createProgram
// ---------------------------------------------------------------------------

/**
 * createProgram({ init, update })
 *
 * Elm-style program loop on RxJS:
 *
 *   dispatch(msg) → Subject<M> → observeOn(queue) → scan(update) → state$
 *                                                          ↓
 *                                                  run Cmd effects ──→ dispatch
 *
 * Messages dispatched while an update or its commands are running are
 * queued and handled in order once the current one is done. If `update`
 * throws, the error is reported and the previous model is kept.
 *
 * @example
 *   type Msg = { type: 'INC' } | { type: 'LOADED'; n: number }
 *
 *   const program = createProgram<number, Msg>({
 *     init: () => [0, Cmd.ofObservable(api.count$, (n) => ({ type: 'LOADED', n }), () => ({ type: 'INC' }))],
 *     update: (msg, n) => {
 *       switch (msg.type) {
 *         case 'INC':    return [n + 1, Cmd.none()]
 *         case 'LOADED': return [msg.n, Cmd.none()]
 *       }
 *     },
 *   })
 */
export function createProgram<S, M>(options: ProgramOptions<S, M>): Program<S, M> {
  const { init, update } = options
  const onError = options.onError ?? defaultErrorHandler

  const [initialState, initialCmd] = init()

  const msgSubject = new Subject<M>()
  const processedSubject = new Subject<M>()
  const stateBs = new BehaviorSubject<S>(initialState)
  // Owns the update loop and every running command.
  const lifetime = new Subscription()

  function dispatch(msg: M): void {
    if (lifetime.closed) return
    msgSubject.next(msg)
  }

  function run(cmd: Cmd<M>): void {
    for (const effect of cmd) {
      try {
        const teardown = effect(dispatch)
        // A closed child Subscription removes itself from `lifetime`.
        if (teardown) lifetime.add(teardown)
      } catch (err) {
        onError(err, 'command')
      }
    }
  }

  const seed: Transition<S, M> = { state: initialState, cmd: Cmd.none() }

  lifetime.add(
    msgSubject
      .pipe(
        observeOn(queueScheduler),
        scan((previous: Transition<S, M>, msg: M): Transition<S, M> => {
          try {
            const [state, cmd] = update(msg, previous.state)
            return { state, cmd, msg }
          } catch (err) {
            onError(err, 'update')
            return { state: previous.state, cmd: Cmd.none(), msg }
          }
        }, seed),
      )
      .subscribe((transition) => {
        stateBs.next(transition.state)
        if (transition.msg !== undefined) processedSubject.next(transition.msg)
        run(transition.cmd)
      }),
  )

  run(initialCmd)

  const state$ = stateBs.asObservable()

  return {
    state$,
    msgs$: processedSubject.asObservable(),
    dispatch,
    select<T>(selector: (state: S) => T): Observable<T> {
      return state$.pipe(map(selector), distinctUntilChanged())
    },
    getState(): S {
      return stateBs.value
    },
    destroy(): void {
      lifetime.unsubscribe()
      msgSubject.complete()
      processedSubject.complete()
      stateBs.complete()
    },
  }
}

// ---------------------------------------------------------------------------
// ofType
// ---------------------------------------------------------------------------

/**
 * ofType(...types)
 *
 * Keep messages whose `type` is one of `types`, narrowing the union.
 *
 * @example
 *   program.msgs$.pipe(ofType('SUBMITTED')).subscribe(() => toast('Saved'))
 */
export function ofType<M extends { type: string }, K extends M['type']>(
  ...types: [K, ...K[]]
): OperatorFunction<M, Extract<M, { type: K }>> {
  const wanted = new Set<string>(types)
  return filter((msg: M): msg is Extract<M, { type: K }> => wanted.has(msg.type))
}
