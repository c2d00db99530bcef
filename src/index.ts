/**
 * Metro Profile Engine - Main Entry Point
 *
 * This module exports all public interfaces and implementations for
 * generating subway system dossiers.
 *
 * Architecture:
 * - A ProfileSession owns the cache and the current dataset version
 * - The ProfileWorkflow state machine sequences assembly, retrieval,
 *   synthesis and validation
 * - Components meet only through the interfaces exported here, so each can
 *   be replaced (a different model client, search provider or cache)
 */

// Core Types
export type * from './types/index.js';

// Errors
export {
  ProfileError,
  MissingRequiredFieldError,
  RetrievalError,
  SynthesisError,
  ConfigurationError,
  ValidationError,
  describeError,
  type ProfileErrorCode,
} from './errors/index.js';

// Observability
export { createConsoleLogger, noopMetrics } from './observability/index.js';

// Configuration
export { loadConfig, type ProfileConfig } from './config/index.js';

// Schema Validator
export {
  validateDossier,
  stripCodeFences,
  DossierSchema,
  MIN_YEAR,
  MAX_YEAR,
  type DossierValidation,
} from './validator/index.js';

// Context Assembler
export {
  assembleContext,
  normalizeColumnName,
  parseNumericValue,
  parseVisitedFlag,
  deriveEntityId,
  indexRow,
  isEmptyCell,
  COLUMN_ALIASES,
  type AssembleOptions,
  type CanonicalColumn,
  type NumericKind,
} from './context-assembler/index.js';

// Retrieval Gateway
export {
  RetrievalGateway,
  TavilyRetrievalProvider,
  NullRetrievalProvider,
  getRetrievalProvider,
  buildQueries,
  type RetrievalPort,
  type RetrievalProvider,
  type RetrievalProviderConfig,
  type RetrievalGatewayOptions,
  type ProviderHit,
  type TavilyProviderConfig,
} from './retrieval/index.js';

// Synthesizer
export {
  ClaudeSynthesizer,
  AnthropicCompletionClient,
  createCompletionClient,
  buildPrompt,
  parseModelReply,
  retrievalModeOf,
  DEFAULT_MODEL,
  type Synthesizer,
  type ClaudeConfig,
  type ClaudeSynthesizerOptions,
  type CompletionClient,
  type CompletionRequest,
  type CompletionResponse,
} from './synthesizer/index.js';

// Cache Manager
export {
  MemoryProfileCache,
  makeCacheKey,
  serializeCacheKey,
  computeDatasetVersion,
  type ProfileCache,
  type MemoryProfileCacheOptions,
} from './cache/index.js';

// Workflow Orchestrator
export {
  ProfileWorkflow,
  enforceProvenance,
  createRunId,
  MAX_SYNTHESIS_ATTEMPTS,
  type WorkflowState,
  type ProfileRequest,
  type ProfileOutcome,
  type ProfileDone,
  type ProfileFailed,
  type ProfileFailure,
  type ProfileWorkflowDeps,
  type ProvenanceReport,
} from './orchestrator/index.js';

// Session
export { ProfileSession, createProfileSession, type ProfileSessionDeps } from './session/index.js';

// Dataset Store
export {
  S3DatasetStore,
  MemoryDatasetStore,
  createDatasetStore,
  type DatasetStore,
  type DatasetStoreConfig,
  type DatasetSnapshotMetadata,
  type S3DatasetConfig,
} from './dataset-store/index.js';

// Renderers
export {
  renderDossierAsMarkdown,
  renderDossierAsPlainText,
  renderDossierAsJSON,
  renderFactSheet,
  type FactRow,
} from './renderers/index.js';
