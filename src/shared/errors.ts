export type ErrorCode =
  | 'INVALID_PARAMS'
  | 'NOT_FOUND'
  | 'MATCH_NOT_FOUND'
  | 'MALFORMED_OUTPUT'
  | 'INTERNAL_ERROR';

export class McpError extends Error {
  constructor(
    public code: ErrorCode,
    message: string,
    public data?: unknown
  ) {
    super(message);
    this.name = 'McpError';
  }

  toJSON() {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      data: this.data,
    };
  }
}

/**
 * An expected pattern is absent from a TeraChem output.
 *
 * Callers usually read this as "the file does not hold data of the requested
 * calculation type". `text` is the full searched string, which can be large;
 * the tool dispatcher redacts it before replying.
 */
export class MatchNotFoundError extends McpError {
  readonly pattern: string;
  readonly text: string;

  constructor(pattern: RegExp | string, text: string) {
    const source = typeof pattern === 'string' ? pattern : pattern.source;
    super('MATCH_NOT_FOUND', `No match found for pattern: ${source}`, { pattern: source, text });
    this.name = 'MatchNotFoundError';
    this.pattern = source;
    this.text = text;
  }
}

export function invalidParams(message: string, data?: unknown): McpError {
  return new McpError('INVALID_PARAMS', message, data);
}

export function notFound(message: string, data?: unknown): McpError {
  return new McpError('NOT_FOUND', message, data);
}

export function malformedOutput(message: string, data?: unknown): McpError {
  return new McpError('MALFORMED_OUTPUT', message, data);
}

export function internalError(message: string, data?: unknown): McpError {
  return new McpError('INTERNAL_ERROR', message, data);
}
