// Domain-specific error types for toolbox

/**
 * Base error class for all toolbox errors
 */
export abstract class ToolkitError extends Error {
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
 * Validation errors for invalid input or configuration
 */
export class ValidationError extends ToolkitError {
  readonly code = 'VALIDATION_ERROR';
  readonly exitCode = 2;

  constructor(message: string, public readonly field?: string, context?: Record<string, unknown>) {
    super(message, { ...context, field });
  }
}

/**
 * Not found errors (missing tool, missing resource)
 */
export class NotFoundError extends ToolkitError {
  readonly code = 'NOT_FOUND';
  readonly exitCode = 4;

  constructor(resourceType: string, id: string) {
    super(`${resourceType} not found: ${id}`, { resourceType, id });
  }
}

/**
 * Git hook setup failures
 */
export class HookError extends ToolkitError {
  readonly code = 'HOOK_ERROR';
  readonly exitCode = 1;

  constructor(message: string, public readonly details?: string) {
    super(message, details ? { details } : undefined);
  }
}

/**
 * Raised by HttpResponse.raiseForStatus for 4xx and 5xx responses
 */
export class HttpStatusError extends ToolkitError {
  readonly code = 'HTTP_STATUS_ERROR';
  readonly exitCode = 1;

  constructor(public readonly statusCode: number, url: string, public readonly body?: string) {
    super(`${statusCode >= 500 ? 'Server' : 'Client'} error '${statusCode}' for url '${url}'`, {
      statusCode,
      url
    });
  }
}

/**
 * The fetched document could not be turned into a message
 */
export class DecodeError extends ToolkitError {
  readonly code = 'DECODE_ERROR';
  readonly exitCode = 1;
}
