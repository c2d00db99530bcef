/**
 * Retrieval Gateway Module
 *
 * Optional web retrieval that turns a SelectionContext into ordered snippets
 * with source URLs. When no provider is configured the gateway reports itself
 * unavailable and the workflow runs in no-web mode.
 *
 * Responsibilities:
 * - Build the four fixed queries (history, ownership, opening year, artworks)
 * - Issue them to the configured provider (Tavily over HTTP by default)
 * - Merge results in query order, de-duplicating URLs
 * - Degrade per query: a failed query yields a warning, never an exception
 *
 * Usage:
 * const gateway = new RetrievalGateway(getRetrievalProvider(config.retrieval));
 * if (gateway.available()) {
 *   const result = await gateway.retrieve(context);
 * }
 */

import axios, { type AxiosInstance } from 'axios';
import { z } from 'zod';
import { RetrievalError, describeError } from '../errors/index.js';
import { createConsoleLogger, noopMetrics } from '../observability/index.js';
import type {
  Logger,
  Metrics,
  RetrievalResult,
  RetrievalSnippet,
  SelectionContext,
} from '../types/index.js';

// ============================================================================
// Constants
// ============================================================================

export const DEFAULT_TAVILY_API_URL = 'https://api.tavily.com';
export const DEFAULT_RETRIEVAL_TIMEOUT = 20000;
export const DEFAULT_MAX_RESULTS = 3;
export const DEFAULT_MAX_SNIPPET_LENGTH = 800;

const QUERY_TOPICS = ['history', 'ownership operator', 'opening year', 'artworks about the subway'] as const;

// ============================================================================
// Provider interface
// ============================================================================

/**
 * One raw search hit as returned by a provider
 */
export interface ProviderHit {
  title: string | null;
  url: string;
  content: string;
}

export interface RetrievalProvider {
  readonly name: string;
  /** False when the provider has no credential and must not be called */
  readonly configured: boolean;
  search(query: string): Promise<ProviderHit[]>;
}

/**
 * Provider configuration union
 */
export type RetrievalProviderConfig =
  | { type: 'tavily'; apiKey?: string; apiUrl?: string; timeout?: number; maxResults?: number }
  | { type: 'null' };

// ============================================================================
// Providers
// ============================================================================

/**
 * Used when retrieval is not configured
 */
export class NullRetrievalProvider implements RetrievalProvider {
  readonly name = 'null';
  readonly configured = false;

  async search(): Promise<ProviderHit[]> {
    return [];
  }
}

const TavilySearchResponseSchema = z.object({
  results: z.array(
    z.object({
      title: z.string().nullish(),
      url: z.string(),
      content: z.string().nullish(),
    })
  ),
});

export interface TavilyProviderConfig {
  apiKey: string;
  apiUrl?: string;
  timeout?: number;
  maxResults?: number;
}

/**
 * Tavily search API provider
 *
 * POST {apiUrl}/search with a bearer credential. The axios instance can be
 * injected, which is how the tests run it in-process.
 */
export class TavilyRetrievalProvider implements RetrievalProvider {
  readonly name = 'tavily';
  readonly configured = true;
  private readonly client: AxiosInstance;
  private readonly maxResults: number;

  constructor(config: TavilyProviderConfig, client?: AxiosInstance) {
    this.maxResults = config.maxResults ?? DEFAULT_MAX_RESULTS;
    this.client =
      client ??
      axios.create({
        baseURL: config.apiUrl ?? DEFAULT_TAVILY_API_URL,
        timeout: config.timeout ?? DEFAULT_RETRIEVAL_TIMEOUT,
        headers: {
          'Content-Type': 'application/json',
          Authorization: `Bearer ${config.apiKey}`,
        },
      });
  }

  async search(query: string): Promise<ProviderHit[]> {
    const response = await this.client.post('/search', {
      query,
      max_results: this.maxResults,
      search_depth: 'basic',
      include_answer: false,
      include_raw_content: false,
    });

    const parsed = TavilySearchResponseSchema.safeParse(response.data);
    if (!parsed.success) {
      throw new Error(`Unexpected search response: ${parsed.error.issues.map((i) => i.message).join('; ')}`);
    }

    return parsed.data.results.map((hit) => ({
      title: hit.title ?? null,
      url: hit.url,
      content: hit.content ?? '',
    }));
  }
}

/**
 * Get the configured retrieval provider, falling back to the null provider
 * when the configuration is absent or has no credential.
 */
export function getRetrievalProvider(
  config?: RetrievalProviderConfig,
  logger: Logger = createConsoleLogger('retrieval')
): RetrievalProvider {
  if (!config || config.type === 'null') {
    logger.debug('No retrieval provider configured, using NullRetrievalProvider');
    return new NullRetrievalProvider();
  }

  if (!config.apiKey) {
    logger.warn('Tavily provider has no API key, retrieval disabled');
    return new NullRetrievalProvider();
  }

  return new TavilyRetrievalProvider({
    apiKey: config.apiKey,
    apiUrl: config.apiUrl,
    timeout: config.timeout,
    maxResults: config.maxResults,
  });
}

// ============================================================================
// Queries
// ============================================================================

/**
 * Four deterministic queries, always in the same order. The city is appended
 * to the name when known to disambiguate systems with common names.
 */
export function buildQueries(context: SelectionContext): string[] {
  const subject = context.city ? `${context.entityName} ${context.city}` : context.entityName;
  return QUERY_TOPICS.map((topic) => `${subject} ${topic}`);
}

function describeRetrievalFailure(error: unknown): string {
  if (axios.isAxiosError(error)) {
    if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
      return 'request timed out';
    }
    if (error.response) {
      return `provider responded with HTTP ${error.response.status}`;
    }
  }
  return describeError(error);
}

// ============================================================================
// Gateway
// ============================================================================

export interface RetrievalGatewayOptions {
  maxSnippetLength?: number;
  logger?: Logger;
  metrics?: Metrics;
}

/**
 * The orchestrator's view of retrieval
 */
export interface RetrievalPort {
  available(): boolean;
  retrieve(context: SelectionContext): Promise<RetrievalResult>;
}

export class RetrievalGateway implements RetrievalPort {
  private readonly maxSnippetLength: number;
  private readonly logger: Logger;
  private readonly metrics: Metrics;

  constructor(
    private readonly provider: RetrievalProvider,
    options: RetrievalGatewayOptions = {}
  ) {
    this.maxSnippetLength = options.maxSnippetLength ?? DEFAULT_MAX_SNIPPET_LENGTH;
    this.logger = options.logger ?? createConsoleLogger('retrieval');
    this.metrics = options.metrics ?? noopMetrics;
  }

  available(): boolean {
    return this.provider.configured;
  }

  /**
   * Run every query and merge the hits. Never rejects.
   */
  async retrieve(context: SelectionContext): Promise<RetrievalResult> {
    const queries = buildQueries(context);

    if (!this.available()) {
      return { queries, snippets: [], warnings: ['retrieval provider is not configured'] };
    }

    const startTime = Date.now();
    const settled = await Promise.all(queries.map((query) => this.runQuery(query)));

    const snippets: RetrievalSnippet[] = [];
    const warnings: string[] = [];
    const seenUrls = new Set<string>();

    settled.forEach((outcome, index) => {
      const query = queries[index] ?? '';
      if (outcome instanceof RetrievalError) {
        warnings.push(outcome.message);
        return;
      }
      for (const hit of outcome) {
        const url = hit.url.trim();
        const text = this.truncate(hit.content.trim());
        if (!url || !text || seenUrls.has(url)) {
          continue;
        }
        seenUrls.add(url);
        snippets.push({ text, url, title: hit.title?.trim() || null, query });
      }
    });

    this.metrics.timing('retrieval.duration', Date.now() - startTime, { provider: this.provider.name });
    this.metrics.gauge('retrieval.snippets', snippets.length, { provider: this.provider.name });
    this.logger.info('Retrieval completed', {
      entityId: context.entityId,
      provider: this.provider.name,
      snippetCount: snippets.length,
      failedQueries: warnings.length,
    });

    return { queries, snippets, warnings };
  }

  private async runQuery(query: string): Promise<ProviderHit[] | RetrievalError> {
    try {
      return await this.provider.search(query);
    } catch (error) {
      const failure = new RetrievalError(
        query,
        `Retrieval query "${query}" failed: ${describeRetrievalFailure(error)}`,
        { cause: error }
      );
      this.metrics.increment('retrieval.query.failed', { provider: this.provider.name });
      this.logger.warn('Retrieval query failed, continuing without it', { query, error: failure.message });
      return failure;
    }
  }

  private truncate(text: string): string {
    if (text.length <= this.maxSnippetLength) {
      return text;
    }
    return `${text.slice(0, this.maxSnippetLength - 3).trimEnd()}...`;
  }
}
