export { NetworkError, PreconditionError } from './engine-errors';
export { describeError, reportErrors } from './report-errors';
export type { ErrorSink } from './report-errors';
