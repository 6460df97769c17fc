/**
 * Structured Error System
 *
 * Provides machine-readable errors with codes, spans, and suggestions.
 */

/**
 * Error codes for translation operations
 */
export type LogicErrorCode =
  | 'LEX_ERROR'             // Unrecognized character (recorded, never thrown)
  | 'GRAMMAR_ERROR'         // Malformed CLIF construct
  | 'SERIALIZATION_ERROR'   // Node outside the closed AST variant set
  | 'CONFIG_ERROR'          // Invalid configuration value
  | 'IO_ERROR';             // File could not be read

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
 * Structured error with code, message, span and suggestions
 */
export interface LogicError {
  code: LogicErrorCode;
  message: string;
  span?: ErrorSpan;
  suggestion?: string;
  context?: string;          // The reconstructed broken axiom
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

/**
 * Common grammar mistakes and their suggestions, matched against the
 * reconstructed axiom.
 */
const GRAMMAR_SUGGESTIONS: Array<{
  pattern: RegExp;
  suggestion: string;
}> = [
    {
      pattern: /^\(\s*(forall|exists)\s+[^(\s]/,
      suggestion: "Quantified variables must be wrapped in parentheses, e.g. (forall (x) ...)"
    },
    {
      pattern: /^\(\s*(if|iff)\s+\([^()]*\)\s*\)/,
      suggestion: "Conditionals take exactly two axioms"
    },
    {
      pattern: /^\(\s*not\s*\)/,
      suggestion: "Negation is missing its axiom"
    },
    {
      pattern: /^\(\s*(and|or)\s*\)/,
      suggestion: "Connectives need at least one axiom"
    },
    {
      pattern: /\(\s*[^\s()]+\s*\)/,
      suggestion: "Predicates and functions need at least one argument"
    },
  ];

/**
 * Get a suggestion for a grammar error based on the reconstructed axiom
 */
export function getSuggestion(context: string): string | undefined {
  for (const { pattern, suggestion } of GRAMMAR_SUGGESTIONS) {
    if (pattern.test(context)) {
      return suggestion;
    }
  }
  return undefined;
}

/**
 * Record an unrecognized character. Lexical errors are reported, not thrown.
 */
export function createLexError(
  character: string,
  position: number,
  line: number
): LogicError {
  return {
    code: 'LEX_ERROR',
    message: `Unknown character "${character}" at line ${line}`,
    span: { start: position, end: position + character.length, line },
    details: { character },
  };
}

/**
 * Create a grammar error for a malformed construct
 */
export function createGrammarError(
  message: string,
  token: { value: string; position: number; line: number },
  context: string
): LogicException {
  const shown = token.value === '' ? 'end of input' : `'${token.value}'`;
  return new LogicException({
    code: 'GRAMMAR_ERROR',
    message: `Error at line ${token.line}! Unexpected token ${shown}: ${message}`,
    span: {
      start: token.position,
      end: token.position + Math.max(token.value.length, 1),
      line: token.line,
    },
    suggestion: context ? getSuggestion(context) : undefined,
    context,
    details: { token: token.value },
  });
}

/**
 * Create a serialization error for a node outside the closed AST variants
 */
export function createSerializationError(
  format: string,
  nodeType: string
): LogicException {
  return new LogicException({
    code: 'SERIALIZATION_ERROR',
    message: `Not a valid type for ${format} output: ${nodeType}`,
    details: { format, nodeType },
  });
}

export function createConfigError(
  message: string,
  details?: Record<string, unknown>
): LogicException {
  return new LogicException({
    code: 'CONFIG_ERROR',
    message: `Invalid configuration: ${message}`,
    details,
  });
}

export function createIoError(
  message: string,
  path: string
): LogicException {
  return new LogicException({
    code: 'IO_ERROR',
    message,
    details: { path },
  });
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
