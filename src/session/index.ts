/**
 * Profile Session Module
 *
 * Owns the per-user session state: the dossier cache, the version of the
 * dataset currently loaded, and the workflow wired to both. The UI layer
 * calls runProfile with a selected row; the session supplies the version.
 *
 * Usage:
 * const session = createProfileSession({ config: loadConfig() });
 * session.loadDataset(uploadedBytes);
 * const outcome = await session.runProfile('metro-7', selectedRow);
 */

import { randomUUID } from 'crypto';
import { MemoryProfileCache, computeDatasetVersion, type ProfileCache } from '../cache/index.js';
import { loadConfig, type ProfileConfig } from '../config/index.js';
import type { DatasetStore } from '../dataset-store/index.js';
import { createConsoleLogger, noopMetrics } from '../observability/index.js';
import { ProfileWorkflow, type ProfileOutcome } from '../orchestrator/index.js';
import { RetrievalGateway, getRetrievalProvider, type RetrievalPort } from '../retrieval/index.js';
import { ClaudeSynthesizer, type CompletionClient, type Synthesizer } from '../synthesizer/index.js';
import type { DatasetRow, DatasetVersion, EntityId, Logger, Metrics } from '../types/index.js';

export interface ProfileSessionDeps {
  config?: ProfileConfig;
  cache?: ProfileCache;
  retrieval?: RetrievalPort;
  synthesizer?: Synthesizer;
  /** Used by the default synthesizer instead of the Anthropic client */
  completionClient?: CompletionClient;
  logger?: Logger;
  metrics?: Metrics;
}

export class ProfileSession {
  readonly id: string = randomUUID();
  private datasetVersion: DatasetVersion | null = null;

  constructor(
    private readonly cache: ProfileCache,
    private readonly workflow: ProfileWorkflow,
    private readonly logger: Logger
  ) {}

  get currentVersion(): DatasetVersion | null {
    return this.datasetVersion;
  }

  /**
   * Hash the dataset bytes and make that version current.
   * Loading the same bytes again keeps the cache.
   */
  loadDataset(bytes: string | Uint8Array): DatasetVersion {
    const version = computeDatasetVersion(bytes);
    if (version !== this.datasetVersion) {
      const evicted = this.cache.setActiveVersion(version);
      this.logger.info('Dataset loaded', { sessionId: this.id, datasetVersion: version, evicted });
    }
    this.datasetVersion = version;
    return version;
  }

  async loadDatasetFromStore(store: DatasetStore): Promise<DatasetVersion> {
    this.logger.info('Loading dataset snapshot', { sessionId: this.id, location: store.describe() });
    const bytes = await store.load();
    return this.loadDataset(bytes);
  }

  runProfile(entityId: EntityId, row: DatasetRow, forceRefresh = false): Promise<ProfileOutcome> {
    return this.workflow.runProfile(entityId, this.datasetVersion ?? '', row, forceRefresh);
  }

  /**
   * Drop every cached dossier and forget the dataset
   */
  end(): void {
    this.cache.clear();
    this.datasetVersion = null;
    this.logger.info('Session ended', { sessionId: this.id });
  }
}

/**
 * Wire a session from configuration, with any component overridable
 */
export function createProfileSession(deps: ProfileSessionDeps = {}): ProfileSession {
  const config = deps.config ?? loadConfig();
  const logger = deps.logger ?? createConsoleLogger('session');
  const metrics = deps.metrics ?? noopMetrics;

  const cache =
    deps.cache ??
    new MemoryProfileCache({ evictOnVersionChange: config.cache.evictOnVersionChange, logger });
  const retrieval =
    deps.retrieval ?? new RetrievalGateway(getRetrievalProvider(config.retrieval, logger), { logger, metrics });
  const synthesizer =
    deps.synthesizer ??
    new ClaudeSynthesizer({ client: deps.completionClient, config: config.anthropic, logger, metrics });

  const workflow = new ProfileWorkflow({ cache, retrieval, synthesizer, logger, metrics });
  return new ProfileSession(cache, workflow, logger);
}
