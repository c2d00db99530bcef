/**
 * Schema Validator Module
 *
 * Defines and checks the structural contract of a Dossier.
 *
 * Validation runs in two passes:
 * 1. Coercion: a string candidate is parsed as JSON (Markdown code fences
 *    stripped), year-like strings become integers, blank optional text
 *    becomes null, a missing history_summary becomes "" and confidence labels
 *    are normalized.
 * 2. Strict shape checking against the zod schema below.
 *
 * The validator never throws and never mutates its input. Failures come back
 * as a ValidationError listing every (path, problem) pair, which the
 * orchestrator feeds back to the model on retry.
 */

import { z } from 'zod';
import { ValidationError, describeError } from '../errors/index.js';
import type { Dossier, ValidationIssue } from '../types/index.js';

// ============================================================================
// Constants
// ============================================================================

export const MIN_YEAR = 1000;
export const MAX_YEAR = 2999;

const ROOT_PATH = '(root)';

// ============================================================================
// Coercion helpers
// ============================================================================

/**
 * Strip a surrounding Markdown code fence (```json ... ```) from model output
 */
export function stripCodeFences(text: string): string {
  let cleaned = text.trim();
  if (cleaned.startsWith('```json')) {
    cleaned = cleaned.slice(7);
  } else if (cleaned.startsWith('```')) {
    cleaned = cleaned.slice(3);
  }
  if (cleaned.endsWith('```')) {
    cleaned = cleaned.slice(0, -3);
  }
  return cleaned.trim();
}

function coerceOptionalText(value: unknown): unknown {
  if (value === undefined || value === null) {
    return null;
  }
  if (typeof value === 'string') {
    const trimmed = value.trim();
    return trimmed.length > 0 ? trimmed : null;
  }
  return value;
}

function coerceRequiredText(value: unknown): unknown {
  return typeof value === 'string' ? value.trim() : value;
}

function coerceSummary(value: unknown): unknown {
  if (value === undefined || value === null) {
    return '';
  }
  return coerceRequiredText(value);
}

/**
 * "1978" -> 1978, "c. 1978" -> 1978, "" -> null.
 * Anything else is passed through for the schema to reject.
 */
function coerceYear(value: unknown): unknown {
  if (value === undefined || value === null) {
    return null;
  }
  if (typeof value !== 'string') {
    return value;
  }

  const trimmed = value.trim();
  if (trimmed.length === 0) {
    return null;
  }
  if (/^-?\d+(\.0+)?$/.test(trimmed)) {
    return parseInt(trimmed, 10);
  }
  const embedded = trimmed.match(/\b(\d{4})\b/);
  if (embedded?.[1]) {
    return parseInt(embedded[1], 10);
  }
  return value;
}

function coerceLabel(value: unknown): unknown {
  return typeof value === 'string' ? value.trim().toLowerCase() : value;
}

function isHttpUrl(value: string): boolean {
  return /^https?:\/\//i.test(value);
}

// ============================================================================
// Schema
// ============================================================================

const optionalText = z.preprocess(coerceOptionalText, z.string().nullable());

const requiredText = z.preprocess(coerceRequiredText, z.string().min(1, 'must not be empty'));

const optionalYear = z.preprocess(
  coerceYear,
  z
    .number()
    .int('must be an integer year')
    .min(MIN_YEAR, `must be a year between ${MIN_YEAR} and ${MAX_YEAR}`)
    .max(MAX_YEAR, `must be a year between ${MIN_YEAR} and ${MAX_YEAR}`)
    .nullable()
);

const httpUrl = z.preprocess(
  coerceRequiredText,
  z.string().url('must be an absolute URL').refine(isHttpUrl, 'must use http or https')
);

const optionalHttpUrl = z.preprocess(
  coerceOptionalText,
  z.string().url('must be an absolute URL').refine(isHttpUrl, 'must use http or https').nullable()
);

const TimelineEventSchema = z.object({
  year: optionalYear,
  event: requiredText,
});

const PerceptionSchema = z.object({
  summary: requiredText,
  safety: optionalText,
  cleanliness: optionalText,
  typical_riders: optionalText,
  confidence: z.preprocess(
    coerceLabel,
    z.enum(['low', 'medium', 'high'], {
      errorMap: () => ({ message: 'must be one of low, medium, high' }),
    })
  ),
  notes: optionalText,
});

const CultureWorkSchema = z.object({
  work: requiredText,
  creator: optionalText,
  year: optionalYear,
  medium: optionalText,
  relevance: requiredText,
  source_url: optionalHttpUrl,
});

const SourceSchema = z.object({
  title: requiredText,
  url: httpUrl,
});

export const DossierSchema = z.object({
  identity: z.object({
    entity_id: requiredText,
    entity_name: requiredText,
  }),
  location: z.preprocess(
    (value) => value ?? {},
    z.object({
      city: optionalText,
      country: optionalText,
    })
  ),
  opened_year: optionalYear,
  history_summary: z.preprocess(coerceSummary, z.string()),
  timeline: z.array(TimelineEventSchema),
  ownership_and_operations: optionalText,
  scale_and_usage: optionalText,
  perception: PerceptionSchema,
  culture: z.array(CultureWorkSchema),
  sources: z.array(SourceSchema),
});

// ============================================================================
// Validation
// ============================================================================

export type DossierValidation =
  | { valid: true; dossier: Dossier }
  | { valid: false; error: ValidationError };

function formatPath(path: Array<string | number>): string {
  return path.length > 0 ? path.join('.') : ROOT_PATH;
}

function invalid(issues: ValidationIssue[]): DossierValidation {
  return { valid: false, error: new ValidationError(issues) };
}

/**
 * Validate (and coerce) a candidate dossier.
 *
 * A string candidate is treated as the model's raw reply and parsed as JSON
 * first; a reply that is not JSON fails validation rather than throwing.
 */
export function validateDossier(candidate: unknown): DossierValidation {
  let document: unknown = candidate;

  if (typeof candidate === 'string') {
    try {
      document = JSON.parse(stripCodeFences(candidate));
    } catch (error) {
      return invalid([{ path: ROOT_PATH, problem: `response is not valid JSON (${describeError(error)})` }]);
    }
  }

  if (document === null || typeof document !== 'object' || Array.isArray(document)) {
    return invalid([{ path: ROOT_PATH, problem: 'expected a JSON object' }]);
  }

  const result = DossierSchema.safeParse(document);
  if (!result.success) {
    return invalid(
      result.error.issues.map((issue) => ({
        path: formatPath(issue.path),
        problem: issue.message,
      }))
    );
  }

  const dossier: Dossier = result.data;
  return { valid: true, dossier };
}
