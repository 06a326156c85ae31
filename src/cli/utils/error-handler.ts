// CLI error handling utilities

import { HookError, NotFoundError, ToolkitError, ValidationError } from '../../core/errors.js';

/**
 * Format an error for CLI output
 */
export function formatError(error: unknown): string {
  if (error instanceof ValidationError) {
    const field = error.field ? ` (field: ${error.field})` : '';
    return `Validation Error${field}: ${error.message}`;
  }

  if (error instanceof NotFoundError) {
    return `Not Found: ${error.message}`;
  }

  if (error instanceof HookError) {
    return error.details ? `Hook Error: ${error.message}\n  ${error.details}` : `Hook Error: ${error.message}`;
  }

  if (error instanceof ToolkitError) {
    return `Error [${error.code}]: ${error.message}`;
  }

  if (error instanceof Error) {
    return `Error: ${error.message}`;
  }

  return `Unknown error: ${String(error)}`;
}

/**
 * Exit code for an error: the toolkit error's own code, 1 otherwise
 */
export function exitCodeFor(error: unknown): number {
  return error instanceof ToolkitError ? error.exitCode : 1;
}

/**
 * Handle CLI errors with proper exit codes
 */
export function handleError(error: unknown): never {
  console.error(`\n❌ ${formatError(error)}\n`);
  process.exit(exitCodeFor(error));
}

/**
 * Wrap an async CLI action with error handling
 */
export function withErrorHandling<T extends unknown[]>(
  fn: (...args: T) => Promise<void>
): (...args: T) => Promise<void> {
  return async (...args: T) => {
    try {
      await fn(...args);
    } catch (error) {
      handleError(error);
    }
  };
}

/**
 * Print success message
 */
export function success(message: string): void {
  console.log(`✓ ${message}`);
}

/**
 * Print info message
 */
export function info(message: string): void {
  console.log(`ℹ ${message}`);
}

/**
 * Print warning message
 */
export function warn(message: string): void {
  console.warn(`⚠ ${message}`);
}
