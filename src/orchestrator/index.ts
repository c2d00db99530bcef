/**
 * Workflow Orchestrator Module
 *
 * The explicit state machine that turns a selection event into a dossier:
 *
 *   CHECK_CACHE -> ASSEMBLE_CONTEXT -> (RETRIEVE | SKIP_RETRIEVE) -> SYNTHESIZE
 *     -> VALIDATE -> (RETRY_SYNTHESIZE -> VALIDATE | FINALIZE) -> DONE
 *
 * plus FAILED, reachable from any state.
 *
 * Responsibilities:
 * - Return a cached dossier without touching any other component
 * - Choose RETRIEVE only when the gateway is available
 * - Allow at most MAX_SYNTHESIS_ATTEMPTS synthesis calls per run
 * - Apply the provenance guard, then write the cache, in FINALIZE
 * - Serialize overlapping runs for the same cache key
 * - Convert every fatal error into a structured FAILED outcome
 */

import { createHash } from 'crypto';
import { makeCacheKey, serializeCacheKey, type ProfileCache } from '../cache/index.js';
import { assembleContext, type AssembleOptions } from '../context-assembler/index.js';
import { ProfileError, describeError, type ProfileErrorCode, type ValidationError } from '../errors/index.js';
import { createConsoleLogger, noopMetrics } from '../observability/index.js';
import type { RetrievalPort } from '../retrieval/index.js';
import { retrievalModeOf, type Synthesizer } from '../synthesizer/index.js';
import type {
  DatasetRow,
  DatasetVersion,
  Dossier,
  EntityId,
  Logger,
  Metrics,
  RetrievalMode,
  RetrievalOutcome,
  RunId,
  RunMetadata,
  SelectionContext,
  ValidationIssue,
} from '../types/index.js';
import { validateDossier, type DossierValidation } from '../validator/index.js';

// ============================================================================
// Types
// ============================================================================

export type WorkflowState =
  | 'CHECK_CACHE'
  | 'ASSEMBLE_CONTEXT'
  | 'RETRIEVE'
  | 'SKIP_RETRIEVE'
  | 'SYNTHESIZE'
  | 'VALIDATE'
  | 'RETRY_SYNTHESIZE'
  | 'FINALIZE'
  | 'DONE'
  | 'FAILED';

export const MAX_SYNTHESIS_ATTEMPTS = 2;

export interface ProfileRequest {
  entityId: EntityId;
  datasetVersion: DatasetVersion;
  row: DatasetRow;
  forceRefresh?: boolean;
}

export interface ProfileDone {
  status: 'DONE';
  dossier: Dossier;
  fromCache: boolean;
  /** null when served from the cache */
  retrievalMode: RetrievalMode | null;
  synthesisAttempts: number;
  trace: WorkflowState[];
  metadata: RunMetadata;
}

export interface ProfileFailure {
  code: ProfileErrorCode;
  reason: string;
  /** One entry per rejected synthesis attempt */
  validationErrors: Array<{ attempt: number; issues: ValidationIssue[] }>;
}

export interface ProfileFailed {
  status: 'FAILED';
  error: ProfileFailure;
  synthesisAttempts: number;
  trace: WorkflowState[];
  metadata: RunMetadata;
}

export type ProfileOutcome = ProfileDone | ProfileFailed;

export interface ProfileWorkflowDeps {
  cache: ProfileCache;
  retrieval: RetrievalPort;
  synthesizer: Synthesizer;
  assemble?: (row: DatasetRow, options: AssembleOptions) => SelectionContext;
  validate?: (candidate: unknown) => DossierValidation;
  logger?: Logger;
  metrics?: Metrics;
}

// ============================================================================
// Provenance guard
// ============================================================================

export interface ProvenanceReport {
  dossier: Dossier;
  removedSources: string[];
  clearedCultureUrls: string[];
  confidenceCapped: boolean;
}

/**
 * Align a validated dossier with what this run can vouch for.
 *
 * - identity comes from the selection context
 * - null city, country and opened_year are filled from the dataset facts
 * - sources and culture URLs that retrieval did not return are removed
 * - without web evidence the confidence is capped at "medium"
 *
 * Returns a new dossier; the input is not modified.
 */
export function enforceProvenance(
  dossier: Dossier,
  context: SelectionContext,
  retrieval: RetrievalOutcome
): ProvenanceReport {
  const allowedUrls = new Set(
    retrieval.kind === 'retrieved' ? retrieval.result.snippets.map((snippet) => snippet.url) : []
  );
  const noWeb = retrievalModeOf(retrieval) === 'no_web';

  const removedSources: string[] = [];
  const seen = new Set<string>();
  const sources = dossier.sources.filter((source) => {
    if (!allowedUrls.has(source.url)) {
      removedSources.push(source.url);
      return false;
    }
    if (seen.has(source.url)) {
      return false;
    }
    seen.add(source.url);
    return true;
  });

  const clearedCultureUrls: string[] = [];
  const culture = dossier.culture.map((work) => {
    if (work.source_url !== null && !allowedUrls.has(work.source_url)) {
      clearedCultureUrls.push(work.source_url);
      return { ...work, source_url: null };
    }
    return { ...work };
  });

  const confidenceCapped = noWeb && dossier.perception.confidence === 'high';

  return {
    dossier: {
      ...dossier,
      identity: { entity_id: context.entityId, entity_name: context.entityName },
      location: {
        city: dossier.location.city ?? context.city,
        country: dossier.location.country ?? context.country,
      },
      opened_year: dossier.opened_year ?? context.facts.openedYear,
      timeline: dossier.timeline.map((event) => ({ ...event })),
      perception: {
        ...dossier.perception,
        confidence: confidenceCapped ? 'medium' : dossier.perception.confidence,
      },
      culture,
      sources,
    },
    removedSources,
    clearedCultureUrls,
    confidenceCapped,
  };
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * run_ + first 16 hex chars of a SHA-256 over the request, start time and
 * the workflow's run sequence number
 */
export function createRunId(
  entityId: EntityId,
  datasetVersion: DatasetVersion,
  startedAt: number,
  sequence: number
): RunId {
  const hash = createHash('sha256')
    .update([entityId, datasetVersion, String(startedAt), String(sequence)].join('|'))
    .digest('hex');
  return `run_${hash.substring(0, 16)}`;
}

function required<T>(value: T | null, what: string): T {
  if (value === null) {
    throw new Error(`Workflow reached a state without ${what}`);
  }
  return value;
}

// ============================================================================
// Workflow
// ============================================================================

export class ProfileWorkflow {
  private readonly cache: ProfileCache;
  private readonly retrieval: RetrievalPort;
  private readonly synthesizer: Synthesizer;
  private readonly assemble: (row: DatasetRow, options: AssembleOptions) => SelectionContext;
  private readonly validate: (candidate: unknown) => DossierValidation;
  private readonly logger: Logger;
  private readonly metrics: Metrics;
  private readonly inFlight = new Map<string, Promise<ProfileOutcome>>();
  private runSequence = 0;

  constructor(deps: ProfileWorkflowDeps) {
    this.cache = deps.cache;
    this.retrieval = deps.retrieval;
    this.synthesizer = deps.synthesizer;
    this.assemble = deps.assemble ?? assembleContext;
    this.validate = deps.validate ?? validateDossier;
    this.logger = deps.logger ?? createConsoleLogger('orchestrator');
    this.metrics = deps.metrics ?? noopMetrics;
  }

  runProfile(
    entityId: EntityId,
    datasetVersion: DatasetVersion,
    row: DatasetRow,
    forceRefresh = false
  ): Promise<ProfileOutcome> {
    return this.run({ entityId, datasetVersion, row, forceRefresh });
  }

  /**
   * Run the workflow. Calls for the same (entity, version) key queue behind
   * each other so the later one sees the earlier one's cache write.
   */
  async run(request: ProfileRequest): Promise<ProfileOutcome> {
    const lockKey = serializeCacheKey(makeCacheKey(request.entityId, request.datasetVersion));
    const previous: Promise<unknown> = this.inFlight.get(lockKey) ?? Promise.resolve();
    const current = previous.then(
      () => this.execute(request),
      () => this.execute(request)
    );
    this.inFlight.set(lockKey, current);

    try {
      return await current;
    } finally {
      if (this.inFlight.get(lockKey) === current) {
        this.inFlight.delete(lockKey);
      }
    }
  }

  private async execute(request: ProfileRequest): Promise<ProfileOutcome> {
    const startedAt = Date.now();
    const timestamp = new Date(startedAt).toISOString();
    this.runSequence += 1;
    const runId = createRunId(request.entityId, request.datasetVersion, startedAt, this.runSequence);
    const key = makeCacheKey(request.entityId, request.datasetVersion);
    const log = { runId, entityId: request.entityId, datasetVersion: request.datasetVersion };

    const trace: WorkflowState[] = [];
    let state: WorkflowState = 'CHECK_CACHE';
    let context: SelectionContext | null = null;
    let retrieval: RetrievalOutcome | null = null;
    let candidate: unknown = null;
    let dossier: Dossier | null = null;
    let fromCache = false;
    let attempts = 0;
    const validationErrors: ValidationError[] = [];
    let failure: ProfileFailure | null = null;

    const metadata = (): RunMetadata => ({
      runId,
      module: 'orchestrator',
      timestamp,
      duration: Date.now() - startedAt,
    });

    this.logger.info('Profile run started', { ...log, forceRefresh: request.forceRefresh ?? false });

    try {
      if (!request.datasetVersion) {
        throw new ProfileError('CONFIGURATION_ERROR', 'No dataset is loaded; a dataset version is required');
      }

      while (state !== 'DONE' && state !== 'FAILED') {
        trace.push(state);

        switch (state) {
          case 'CHECK_CACHE': {
            const cached = request.forceRefresh ? undefined : this.cache.get(key);
            if (cached) {
              this.metrics.increment('orchestrator.cache.hit');
              this.logger.info('Serving dossier from cache', log);
              dossier = cached;
              fromCache = true;
              state = 'DONE';
            } else {
              this.metrics.increment(request.forceRefresh ? 'orchestrator.cache.bypass' : 'orchestrator.cache.miss');
              state = 'ASSEMBLE_CONTEXT';
            }
            break;
          }

          case 'ASSEMBLE_CONTEXT': {
            context = this.assemble(request.row, { entityId: request.entityId });
            state = this.retrieval.available() ? 'RETRIEVE' : 'SKIP_RETRIEVE';
            break;
          }

          case 'RETRIEVE': {
            const selection = required(context, 'a selection context');
            try {
              const result = await this.retrieval.retrieve(selection);
              retrieval = { kind: 'retrieved', result };
              if (result.warnings.length > 0) {
                this.logger.warn('Retrieval degraded', { ...log, warnings: result.warnings });
              }
            } catch (error) {
              this.logger.warn('Retrieval failed, continuing without web evidence', {
                ...log,
                error: describeError(error),
              });
              retrieval = {
                kind: 'retrieved',
                result: { queries: [], snippets: [], warnings: [describeError(error)] },
              };
            }
            state = 'SYNTHESIZE';
            break;
          }

          case 'SKIP_RETRIEVE': {
            this.metrics.increment('orchestrator.retrieval.skipped');
            retrieval = { kind: 'skipped', reason: 'no retrieval provider is configured' };
            state = 'SYNTHESIZE';
            break;
          }

          case 'SYNTHESIZE':
          case 'RETRY_SYNTHESIZE': {
            attempts += 1;
            candidate = await this.synthesizer.synthesize(
              required(context, 'a selection context'),
              required(retrieval, 'a retrieval outcome'),
              [...validationErrors]
            );
            state = 'VALIDATE';
            break;
          }

          case 'VALIDATE': {
            const validation = this.validate(candidate);
            if (validation.valid) {
              dossier = validation.dossier;
              state = 'FINALIZE';
              break;
            }

            validationErrors.push(validation.error);
            this.metrics.increment('orchestrator.validation.failed');
            this.logger.warn('Dossier failed validation', {
              ...log,
              attempt: attempts,
              problems: validation.error.formatIssues(),
            });

            if (attempts < MAX_SYNTHESIS_ATTEMPTS) {
              state = 'RETRY_SYNTHESIZE';
            } else {
              failure = {
                code: 'VALIDATION_ERROR',
                reason: `Dossier failed validation after ${attempts} synthesis attempts`,
                validationErrors: [],
              };
              state = 'FAILED';
            }
            break;
          }

          case 'FINALIZE': {
            const guarded = enforceProvenance(
              required(dossier, 'a validated dossier'),
              required(context, 'a selection context'),
              required(retrieval, 'a retrieval outcome')
            );
            if (guarded.removedSources.length > 0 || guarded.clearedCultureUrls.length > 0) {
              this.logger.warn('Removed URLs not returned by retrieval', {
                ...log,
                removedSources: guarded.removedSources,
                clearedCultureUrls: guarded.clearedCultureUrls,
              });
            }
            if (guarded.confidenceCapped) {
              this.logger.info('Capped perception confidence for no-web dossier', log);
            }
            dossier = guarded.dossier;
            this.cache.put(key, dossier);
            state = 'DONE';
            break;
          }
        }
      }
    } catch (error) {
      failure = {
        code: error instanceof ProfileError ? error.code : 'UNEXPECTED_ERROR',
        reason: describeError(error),
        validationErrors: [],
      };
      state = 'FAILED';
    }

    trace.push(state);

    if (state === 'DONE' && dossier) {
      const outcome: ProfileDone = {
        status: 'DONE',
        dossier,
        fromCache,
        retrievalMode: retrieval ? retrievalModeOf(retrieval) : null,
        synthesisAttempts: attempts,
        trace,
        metadata: metadata(),
      };
      this.metrics.increment('orchestrator.completed', { fromCache: String(fromCache) });
      this.metrics.timing('orchestrator.duration', outcome.metadata.duration);
      this.logger.info('Profile run completed', {
        ...log,
        fromCache,
        retrievalMode: outcome.retrievalMode,
        synthesisAttempts: attempts,
        duration: outcome.metadata.duration,
      });
      return outcome;
    }

    const error: ProfileFailure = {
      ...(failure ?? { code: 'UNEXPECTED_ERROR', reason: 'Workflow ended without a dossier', validationErrors: [] }),
      validationErrors: validationErrors.map((validationError, index) => ({
        attempt: index + 1,
        issues: validationError.issues,
      })),
    };
    const outcome: ProfileFailed = {
      status: 'FAILED',
      error,
      synthesisAttempts: attempts,
      trace,
      metadata: metadata(),
    };
    this.metrics.increment('orchestrator.failed', { code: error.code });
    this.logger.error('Profile run failed', {
      ...log,
      code: error.code,
      reason: error.reason,
      synthesisAttempts: attempts,
    });
    return outcome;
  }
}
