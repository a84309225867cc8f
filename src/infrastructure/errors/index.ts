export { CliError } from './cli-error.js';
export { ValidationError } from './validation-error.js';
export { PathUnavailableError, NoRepositoriesFoundError, NoMatchingRepositoriesError } from './scan-error.js';
export { handleError, extractErrorMessage } from './error-handler.js';
export type { ErrorOutput } from './error-handler.js';
