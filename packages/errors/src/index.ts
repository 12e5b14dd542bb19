export { createErrorHandler, catchAndReport, createSafeProgram } from './public'
export type {
  AppError,
  ErrorHandler,
  ErrorHandlerConfig,
  CatchAndReportOptions,
  SafeProgramOptions,
} from './public'
