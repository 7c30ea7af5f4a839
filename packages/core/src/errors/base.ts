/**
 * Base error classes for FlatTree
 *
 * Every error raised by the library carries the module it came from, the
 * operation in progress and a free-form context bag.
 */

/**
 * Base error class for all FlatTree errors
 */
export abstract class FlatTreeError extends Error {
  /**
   * Module where the error originated
   */
  public readonly module: string;

  /**
   * Operation being performed when error occurred
   */
  public readonly operation?: string | undefined;

  /**
   * Additional context information
   */
  public readonly context?: Record<string, unknown> | undefined;

  public readonly timestamp: Date;

  constructor(
    message: string,
    module: string,
    operation?: string,
    context?: Record<string, unknown>
  ) {
    super(message);
    this.name = this.constructor.name;
    this.module = module;
    this.operation = operation;
    this.context = context;
    this.timestamp = new Date();

    // Ensure proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }

  /**
   * Create a copy of this error with additional context merged in
   */
  withContext(additionalContext: Record<string, unknown>): FlatTreeError {
    return new ContextualError(this.message, this.module, this.operation, {
      ...this.context,
      ...additionalContext,
      originalName: this.name,
    });
  }

  /**
   * Convert error to a structured object for logging/serialization
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      module: this.module,
      operation: this.operation,
      context: this.context,
      timestamp: this.timestamp,
      stack: this.stack,
    };
  }
}

/**
 * Generic error for wrapping unknown errors
 */
class GenericError extends FlatTreeError {}

/**
 * Error produced by {@link FlatTreeError.withContext}
 */
class ContextualError extends FlatTreeError {}

/**
 * Helper function to wrap unknown errors with module context
 */
export function wrapError(
  error: unknown,
  module: string,
  operation: string,
  context?: Record<string, unknown>
): FlatTreeError {
  if (error instanceof FlatTreeError) {
    return context ? error.withContext(context) : error;
  }

  const message = error instanceof Error ? error.message : String(error);
  const cause = error instanceof Error ? error : undefined;

  return new GenericError(message, module, operation, { ...context, cause });
}

/**
 * Type guard to check if an error is a FlatTreeError
 */
export function isFlatTreeError(error: unknown): error is FlatTreeError {
  return error instanceof FlatTreeError;
}

/**
 * Extract error details for logging
 */
export function extractErrorDetails(error: unknown): {
  message: string;
  module?: string | undefined;
  operation?: string | undefined;
  context?: Record<string, unknown> | undefined;
  stack?: string | undefined;
} {
  if (error instanceof FlatTreeError) {
    return {
      message: error.message,
      module: error.module,
      operation: error.operation,
      context: error.context,
      stack: error.stack,
    };
  }

  if (error instanceof Error) {
    return {
      message: error.message,
      stack: error.stack,
    };
  }

  return {
    message: String(error),
  };
}
