export { Cmd } from './cmd'
export type { Dispatch, Effect } from './cmd'
export { createProgram, ofType } from './public'
export type { Init, Update, Program, ProgramOptions, ProgramErrorHandler } from './public'
