/**
 * Core type definitions for the Metro Profile Engine
 *
 * This module exports the shared types used across the system: the selection
 * context handed to every stage, the tagged retrieval outcome, the canonical
 * dossier shape, cache keys, and the observability interfaces.
 */

/**
 * Unique identifier for a profile run
 * Format: run_<16 hex chars>
 */
export type RunId = string;

/**
 * Stable identifier of an entity (subway system) within the dataset
 */
export type EntityId = string;

/**
 * SHA-256 hex digest of the dataset bytes the session is working against
 */
export type DatasetVersion = string;

/**
 * One selected dataset row, column name to raw cell value
 */
export type DatasetRow = Readonly<Record<string, unknown>>;

// ============================================================================
// Selection Context
// ============================================================================

/**
 * Numeric and date facts extracted from the selected row.
 * Anything that could not be parsed is null.
 */
export interface SelectionFacts {
  readonly openedYear: number | null;
  readonly numberOfLines: number | null;
  readonly totalMiles: number | null;
  readonly stations: number | null;
  readonly annualRidership: number | null;
  readonly cityPopulation: number | null;
  readonly lastMajorUpdate: number | null;
  readonly visited: boolean | null;
}

/**
 * Model-ready fact sheet for one entity. Derived once per run, never mutated.
 */
export interface SelectionContext {
  readonly entityId: EntityId;
  readonly entityName: string;
  readonly city: string | null;
  readonly country: string | null;
  readonly facts: SelectionFacts;
}

// ============================================================================
// Retrieval
// ============================================================================

export interface RetrievalSnippet {
  text: string;
  url: string;
  title: string | null;
  /** The query that produced this snippet */
  query: string;
}

export interface RetrievalResult {
  queries: string[];
  snippets: RetrievalSnippet[];
  /** One entry per query that failed and was skipped */
  warnings: string[];
}

/**
 * Provenance of the evidence handed to the synthesizer
 */
export type RetrievalOutcome =
  | { kind: 'retrieved'; result: RetrievalResult }
  | { kind: 'skipped'; reason: string };

/**
 * Web when at least one snippet backs the dossier, otherwise no_web
 */
export type RetrievalMode = 'web' | 'no_web';

// ============================================================================
// Canonical Dossier Schema
// ============================================================================

export type ConfidenceLevel = 'low' | 'medium' | 'high';

export interface DossierIdentity {
  entity_id: string;
  entity_name: string;
}

export interface DossierLocation {
  city: string | null;
  country: string | null;
}

export interface TimelineEvent {
  year: number | null;
  event: string;
}

/**
 * Qualitative impressions, kept apart from the factual sections
 */
export interface Perception {
  summary: string;
  safety: string | null;
  cleanliness: string | null;
  typical_riders: string | null;
  confidence: ConfidenceLevel;
  notes: string | null;
}

export interface CultureWork {
  work: string;
  creator: string | null;
  year: number | null;
  medium: string | null;
  relevance: string;
  source_url: string | null;
}

export interface DossierSource {
  title: string;
  url: string;
}

/**
 * Validated profile of one subway system
 */
export interface Dossier {
  identity: DossierIdentity;
  location: DossierLocation;
  opened_year: number | null;
  history_summary: string;
  timeline: TimelineEvent[];
  ownership_and_operations: string | null;
  scale_and_usage: string | null;
  perception: Perception;
  culture: CultureWork[];
  sources: DossierSource[];
}

// ============================================================================
// Cache
// ============================================================================

export interface CacheKey {
  readonly entityId: EntityId;
  readonly datasetVersion: DatasetVersion;
}

// ============================================================================
// Validation
// ============================================================================

export interface ValidationIssue {
  /** Dotted path with array indices, "(root)" for the whole document */
  path: string;
  problem: string;
}

// ============================================================================
// Observability
// ============================================================================

/**
 * Logger interface for dependency injection
 */
export interface Logger {
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
  debug(message: string, meta?: Record<string, unknown>): void;
}

/**
 * Metrics interface for observability
 */
export interface Metrics {
  increment(metric: string, tags?: Record<string, string>): void;
  gauge(metric: string, value: number, tags?: Record<string, string>): void;
  timing(metric: string, value: number, tags?: Record<string, string>): void;
}

/**
 * Metadata attached to every workflow outcome
 */
export interface RunMetadata {
  runId: RunId;
  module: string;
  timestamp: string;
  duration: number;
}
