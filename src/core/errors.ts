// Domain-specific error types for infra-drift

/**
 * Base error class for all drift tool errors
 */
export abstract class DriftToolError extends Error {
  abstract readonly code: string;
  abstract readonly exitCode: number;

  constructor(message: string, public readonly context?: Record<string, unknown>) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON() {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context
    };
  }
}

/**
 * Validation errors for invalid input values
 */
export class ValidationError extends DriftToolError {
  readonly code = 'VALIDATION_ERROR';
  readonly exitCode = 2;

  constructor(message: string, public readonly field?: string, context?: Record<string, unknown>) {
    super(message, { ...context, field });
  }
}

/**
 * Invalid or incomplete run configuration, detected before any check starts
 */
export class ConfigurationError extends DriftToolError {
  readonly code = 'CONFIGURATION_ERROR';
  readonly exitCode = 2;
}

/**
 * Live source unreachable, or resource absent after retries
 */
export class FetchError extends DriftToolError {
  readonly code = 'FETCH_ERROR';
  readonly exitCode = 1;

  constructor(message: string, public readonly resourceId: string, public readonly cause?: unknown) {
    super(message, { resourceId });
  }
}

/**
 * Malformed declarative source (state snapshot or definition file)
 */
export class ParseError extends DriftToolError {
  readonly code = 'PARSE_ERROR';
  readonly exitCode = 1;

  constructor(
    message: string,
    public readonly file?: string,
    public readonly line?: number,
    public readonly column?: number
  ) {
    super(formatLocation(message, file, line, column), { file, line, column });
  }
}

/**
 * Resource identifier absent from the declarative source
 */
export class NotFoundError extends DriftToolError {
  readonly code = 'NOT_FOUND';
  readonly exitCode = 4;

  constructor(resourceType: string, id: string, source?: string) {
    super(
      source ? `${resourceType} not found in ${source}: ${id}` : `${resourceType} not found: ${id}`,
      { resourceType, id, source }
    );
  }
}

function formatLocation(message: string, file?: string, line?: number, column?: number): string {
  if (line === undefined) {
    return file ? `${file}: ${message}` : message;
  }
  const position = column !== undefined ? `${line}:${column}` : `${line}`;
  return file ? `${file}:${position}: ${message}` : `${message} at line ${position}`;
}

/**
 * Extracts a readable message from anything thrown
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
