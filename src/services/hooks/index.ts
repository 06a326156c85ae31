/**
 * Git Hooks Service Module
 *
 * Secrets-scanning pre-commit hooks through trufflehog and pre-commit.
 *
 * @module services/hooks
 */

export * from './command-runner.js';
export * from './hooks-service.js';
