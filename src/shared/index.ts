export { McpError, MatchNotFoundError, invalidParams, notFound, malformedOutput, internalError } from './errors.js';
export type { ErrorCode } from './errors.js';
