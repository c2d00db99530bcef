/**
 * Errors Module
 *
 * Typed failures raised by the profile workflow. Every error carries a
 * machine-readable code so the orchestrator can turn it into a structured
 * FAILED outcome.
 *
 * - MissingRequiredFieldError: the selected row has no usable id or name (fatal)
 * - RetrievalError: one retrieval query failed (caught, degrades the run)
 * - SynthesisError: the model call failed (fatal)
 * - ConfigurationError: a required credential or setting is missing or invalid (fatal)
 * - ValidationError: the model output does not match the dossier schema
 *   (recoverable once, fatal on the second attempt)
 */

import type { ValidationIssue } from '../types/index.js';

export type ProfileErrorCode =
  | 'MISSING_REQUIRED_FIELD'
  | 'RETRIEVAL_ERROR'
  | 'SYNTHESIS_ERROR'
  | 'CONFIGURATION_ERROR'
  | 'VALIDATION_ERROR'
  | 'UNEXPECTED_ERROR';

export class ProfileError extends Error {
  constructor(
    public readonly code: ProfileErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'ProfileError';
  }
}

export class MissingRequiredFieldError extends ProfileError {
  constructor(public readonly fields: string[]) {
    super('MISSING_REQUIRED_FIELD', `Selected row is missing required field(s): ${fields.join(', ')}`);
    this.name = 'MissingRequiredFieldError';
  }
}

export class RetrievalError extends ProfileError {
  constructor(
    public readonly query: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super('RETRIEVAL_ERROR', message, options);
    this.name = 'RetrievalError';
  }
}

export class SynthesisError extends ProfileError {
  constructor(message: string, options?: { cause?: unknown; code?: ProfileErrorCode }) {
    super(options?.code ?? 'SYNTHESIS_ERROR', message, options);
    this.name = 'SynthesisError';
  }
}

/**
 * Raised for a missing model credential and for invalid environment
 * configuration. A missing credential surfaces through the synthesis path,
 * hence the subclassing.
 */
export class ConfigurationError extends SynthesisError {
  constructor(
    message: string,
    public readonly problems: string[] = []
  ) {
    super(message, { code: 'CONFIGURATION_ERROR' });
    this.name = 'ConfigurationError';
  }
}

export class ValidationError extends ProfileError {
  constructor(public readonly issues: ValidationIssue[]) {
    super('VALIDATION_ERROR', `Dossier failed validation with ${issues.length} problem(s)`);
    this.name = 'ValidationError';
  }

  /**
   * One line per issue, as fed back to the model on retry
   */
  formatIssues(): string[] {
    return this.issues.map((issue) => `${issue.path}: ${issue.problem}`);
  }
}

/**
 * Extract a readable message from anything thrown
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
