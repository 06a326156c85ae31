// Tests for CLI error formatting and exit codes

import { describe, it, expect } from 'vitest';
import { exitCodeFor, formatError } from './error-handler.js';
import { DecodeError, HookError, NotFoundError, ValidationError } from '../../core/errors.js';

describe('formatError', () => {
  it('should name the field of a validation error', () => {
    expect(formatError(new ValidationError('bad value', 'hook-type'))).toBe(
      'Validation Error (field: hook-type): bad value'
    );
  });

  it('should print hook error details on a second line', () => {
    expect(formatError(new HookError('Not a git repository', 'Initialize git with "git init" first'))).toBe(
      'Hook Error: Not a git repository\n  Initialize git with "git init" first'
    );
  });

  it('should fall back to the error code for other toolkit errors', () => {
    expect(formatError(new DecodeError('No table found in the document.'))).toBe(
      'Error [DECODE_ERROR]: No table found in the document.'
    );
  });

  it('should handle plain errors and non-errors', () => {
    expect(formatError(new Error('boom'))).toBe('Error: boom');
    expect(formatError(42)).toBe('Unknown error: 42');
  });
});

describe('exitCodeFor', () => {
  it('should use the toolkit error exit code', () => {
    expect(exitCodeFor(new ValidationError('x'))).toBe(2);
    expect(exitCodeFor(new NotFoundError('Tool', 'pre-commit'))).toBe(4);
    expect(exitCodeFor(new HookError('x'))).toBe(1);
    expect(exitCodeFor(new Error('x'))).toBe(1);
  });
});
