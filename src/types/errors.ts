/**
 * Structured Error System for ontograph
 *
 * Provides machine-readable errors with codes, suggestions and the
 * underlying cause when one component wraps another's failure.
 */

/**
 * Error codes for graph generation
 */
export type GraphErrorCode =
  | 'CONFIG_LOAD_ERROR'       // Custom relations / equivalence file unreadable or malformed
  | 'CONFIG_SAVE_ERROR'       // Custom relations could not be written
  | 'UNSUPPORTED_FORMAT'      // Output format outside OUTPUT_FORMATS
  | 'EXTRACTION_FAILURE'      // Document reading or entity recognition failed
  | 'SERIALIZATION_FAILURE'   // Graph assembly or writing failed
  | 'INVALID_RELATION'        // Relation record without a usable name
  | 'INVALID_ARGUMENT';       // Option outside its accepted range

/**
 * Structured error with code, message and suggestions
 */
export interface GraphError {
  code: GraphErrorCode;
  message: string;
  suggestion?: string;
  context?: string;          // The path, format or value involved
  details?: Record<string, unknown>;
  cause?: unknown;
}

/**
 * Exception class wrapping GraphError for throw/catch patterns
 */
export class GraphException extends Error {
  public readonly error: GraphError;

  constructor(error: GraphError) {
    super(error.message);
    this.name = 'GraphException';
    this.error = error;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, GraphException);
    }
  }

  get code(): GraphErrorCode {
    return this.error.code;
  }

  toJSON(): object {
    return serializeGraphError(this.error);
  }
}

export function isGraphException(value: unknown): value is GraphException {
  return value instanceof GraphException;
}

/**
 * Human-readable message of an unknown thrown value
 */
export function describeCause(cause: unknown): string {
  if (cause instanceof Error) return cause.message;
  return String(cause);
}

export function createConfigLoadError(path: string, cause: unknown): GraphException {
  return new GraphException({
    code: 'CONFIG_LOAD_ERROR',
    message: `Could not load configuration from ${path}: ${describeCause(cause)}`,
    suggestion: 'Check that the file exists and contains valid JSON',
    context: path,
    cause,
  });
}

export function createConfigSaveError(path: string, cause: unknown): GraphException {
  return new GraphException({
    code: 'CONFIG_SAVE_ERROR',
    message: `Could not save custom relations to ${path}: ${describeCause(cause)}`,
    context: path,
    cause,
  });
}

export function createUnsupportedFormatError(
  format: string,
  supported: readonly string[]
): GraphException {
  return new GraphException({
    code: 'UNSUPPORTED_FORMAT',
    message: `Unsupported output format: ${format}. Supported formats: ${supported.join(', ')}`,
    suggestion: `Use --output-format ${supported[0]}`,
    context: format,
    details: { supported: [...supported] },
  });
}

/**
 * Create an extraction failure wrapping the upstream cause
 */
export function createExtractionFailure(
  message: string,
  cause: unknown,
  context?: string
): GraphException {
  return new GraphException({
    code: 'EXTRACTION_FAILURE',
    message: `${message}: ${describeCause(cause)}`,
    context,
    cause,
  });
}

export function createSerializationFailure(cause: unknown): GraphException {
  return new GraphException({
    code: 'SERIALIZATION_FAILURE',
    message: `Graph assembly failed: ${describeCause(cause)}`,
    cause,
  });
}

export function createInvalidRelationError(
  message: string,
  details?: Record<string, unknown>
): GraphException {
  return new GraphException({
    code: 'INVALID_RELATION',
    message,
    suggestion: 'Provide a non-empty relation name',
    details,
  });
}

export function createInvalidArgumentError(
  name: string,
  value: unknown,
  expectation: string
): GraphException {
  return new GraphException({
    code: 'INVALID_ARGUMENT',
    message: `Invalid ${name}: ${String(value)} (expected ${expectation})`,
    context: name,
    details: { value },
  });
}

export function createInvalidOptionsError(
  issues: ReadonlyArray<{ path: ReadonlyArray<string | number>; message: string }>
): GraphException {
  const described = issues.map(issue => `${issue.path.join('.') || 'options'}: ${issue.message}`);
  return new GraphException({
    code: 'INVALID_ARGUMENT',
    message: `Invalid pipeline options (${described.join('; ')})`,
    details: { issues: described },
  });
}

/**
 * Serialize a GraphError for JSON output
 */
export function serializeGraphError(error: GraphError): object {
  return {
    code: error.code,
    message: error.message,
    ...(error.suggestion && { suggestion: error.suggestion }),
    ...(error.context && { context: error.context }),
    ...(error.details && { details: error.details }),
  };
}
