/**
 * Structured Error System
 *
 * Provides machine-readable errors with codes, spans, and suggestions for
 * diagnosing malformed Boxer output.
 */

/**
 * Error codes for decoding operations
 */
export type LogicErrorCode =
  | 'TOKENIZATION_ERROR'      // Malformed quoting or illegal character
  | 'UNEXPECTED_TOKEN'        // Grammar mismatch at an expected position
  | 'UNEXPECTED_CONDITION'    // Unknown condition keyword
  | 'MALFORMED_BATCH_LAYOUT'  // Fixed-offset output layout violated
  | 'INVALID_ARITY'           // Predicate arity <= 0
  | 'INVALID_OPTIONS';        // Option object rejected by its schema

/**
 * Source location span for error reporting
 */
export interface ErrorSpan {
  start: number;
  end: number;
  line?: number;
  col?: number;
}

/**
 * Structured error with code, message, span, and suggestions
 */
export interface LogicError {
  code: LogicErrorCode;
  message: string;
  span?: ErrorSpan;
  suggestion?: string;
  context?: string;          // The problematic term text
  details?: Record<string, unknown>;
}

/**
 * Exception class wrapping LogicError for throw/catch patterns
 */
export class LogicException extends Error {
  public readonly error: LogicError;

  constructor(error: LogicError) {
    super(error.message);
    this.name = 'LogicException';
    this.error = error;

    // Maintain proper stack trace in V8
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, LogicException);
    }
  }

  get code(): LogicErrorCode {
    return this.error.code;
  }

  toJSON(): LogicError {
    return this.error;
  }
}

export function isLogicException(value: unknown): value is LogicException {
  return value instanceof LogicException;
}

/**
 * Common malformations of Boxer terms and their suggestions
 */
const SYNTAX_SUGGESTIONS: Array<{
  pattern: RegExp;
  suggestion: string;
}> = [
    {
      pattern: /^[^']*('[^']*'[^']*)*'[^']*$/,
      suggestion: "Unbalanced quotes - an atom opened with ' is never closed"
    },
    {
      pattern: /\([^)]*$/,
      suggestion: "Unbalanced parentheses - missing closing ')'"
    },
    {
      pattern: /\[[^\]]*$/,
      suggestion: "Unbalanced brackets - missing closing ']'"
    },
    {
      pattern: /\][^:,\])]/,
      suggestion: "Index lists must be followed by ':' as in [1001]:x0"
    },
    {
      pattern: /,,/,
      suggestion: "Double comma in argument list - remove extra comma"
    },
    {
      pattern: /\)\.\s*$/,
      suggestion: "Strip the trailing ').' line terminator before parsing a term"
    },
  ];

/**
 * Get a suggestion for a syntax error based on the input
 */
export function getSuggestion(input: string): string | undefined {
  for (const { pattern, suggestion } of SYNTAX_SUGGESTIONS) {
    if (pattern.test(input)) {
      return suggestion;
    }
  }
  return undefined;
}

function createSpan(input: string, position: number): ErrorSpan {
  return {
    start: position,
    end: position + 1,
    line: getLineNumber(input, position),
    col: getColumnNumber(input, position),
  };
}

/**
 * Create a tokenization error at a character position
 */
export function createTokenizationError(
  message: string,
  input: string,
  position: number
): LogicException {
  return new LogicException({
    code: 'TOKENIZATION_ERROR',
    message,
    span: createSpan(input, position),
    suggestion: getSuggestion(input),
    context: input,
    details: { position },
  });
}

/**
 * Create an unexpected token error naming the expected and actual tokens
 */
export function createUnexpectedTokenError(
  expected: string,
  actual: string,
  input: string,
  position: number
): LogicException {
  const shown = actual === '' ? 'end of input' : `'${actual}'`;
  return new LogicException({
    code: 'UNEXPECTED_TOKEN',
    message: `Expected ${expected} but got ${shown} at position ${position}`,
    span: position >= 0 ? createSpan(input, position) : undefined,
    suggestion: getSuggestion(input),
    context: input,
    details: { token: actual, expected, actual, position },
  });
}

/**
 * Create an unknown condition keyword error
 */
export function createUnexpectedConditionError(
  keyword: string,
  input: string,
  position: number
): LogicException {
  return new LogicException({
    code: 'UNEXPECTED_CONDITION',
    message: `Unexpected condition '${keyword}' at position ${position}`,
    span: position >= 0 ? createSpan(input, position) : undefined,
    suggestion: 'Known conditions: drs, merge, smerge, not, or, imp, eq, prop, pred, named, rel, card, timex, whq',
    context: input,
    details: { token: keyword, position },
  });
}

/**
 * Create a batch layout error for a line of the raw output
 */
export function createMalformedBatchLayoutError(
  message: string,
  lineNumber: number,
  line?: string
): LogicException {
  return new LogicException({
    code: 'MALFORMED_BATCH_LAYOUT',
    message: `Malformed batch output at line ${lineNumber + 1}: ${message}`,
    suggestion: 'Check that Boxer ran with --format prolog --box false',
    context: line,
    details: { line: lineNumber },
  });
}

/**
 * Create an invalid arity error
 */
export function createInvalidArityError(
  arity: number,
  predicate?: string
): LogicException {
  return new LogicException({
    code: 'INVALID_ARITY',
    message: `Invalid arity ${arity}${predicate ? ` for predicate '${predicate}'` : ''}: arity must be a positive integer`,
    details: { arity, predicate },
  });
}

/**
 * Create an invalid options error from schema issues
 */
export function createInvalidOptionsError(
  issues: string[]
): LogicException {
  return new LogicException({
    code: 'INVALID_OPTIONS',
    message: `Invalid options: ${issues.join('; ')}`,
    details: { issues },
  });
}

/**
 * Get line number from position in string
 */
function getLineNumber(input: string, position: number): number {
  const lines = input.substring(0, position).split('\n');
  return lines.length;
}

/**
 * Get column number from position in string
 */
function getColumnNumber(input: string, position: number): number {
  const lastNewline = input.lastIndexOf('\n', position - 1);
  return position - lastNewline;
}

/**
 * Serialize a LogicError for JSON output
 */
export function serializeLogicError(error: LogicError): object {
  return {
    code: error.code,
    message: error.message,
    ...(error.span && { span: error.span }),
    ...(error.suggestion && { suggestion: error.suggestion }),
    ...(error.context && { context: error.context }),
    ...(error.details && { details: error.details }),
  };
}
