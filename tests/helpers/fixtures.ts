/**
 * Shared fixtures and fakes for unit and integration tests
 */

import { jest } from '@jest/globals';
import type { RetrievalPort } from '../../src/retrieval/index.js';
import type {
  CompletionClient,
  CompletionRequest,
  CompletionResponse,
  Synthesizer,
} from '../../src/synthesizer/index.js';
import type {
  DatasetRow,
  Dossier,
  Logger,
  Metrics,
  RetrievalResult,
  SelectionContext,
} from '../../src/types/index.js';

// ============================================================================
// Observability
// ============================================================================

export type LoggedCall = [string, Record<string, unknown> | undefined];

export const createMockLogger = (): Logger & { calls: Record<'info' | 'warn' | 'error' | 'debug', LoggedCall[]> } => {
  const calls: Record<'info' | 'warn' | 'error' | 'debug', LoggedCall[]> = {
    info: [],
    warn: [],
    error: [],
    debug: [],
  };

  return {
    calls,
    info: (msg, meta) => calls.info.push([msg, meta]),
    warn: (msg, meta) => calls.warn.push([msg, meta]),
    error: (msg, meta) => calls.error.push([msg, meta]),
    debug: (msg, meta) => calls.debug.push([msg, meta]),
  };
};

export const createMockMetrics = (): Metrics & { calls: Array<{ method: string; name: string; value?: number }> } => {
  const calls: Array<{ method: string; name: string; value?: number }> = [];
  return {
    calls,
    increment: (name) => calls.push({ method: 'increment', name }),
    gauge: (name, value) => calls.push({ method: 'gauge', name, value }),
    timing: (name, value) => calls.push({ method: 'timing', name, value }),
  };
};

export const countMetric = (metrics: ReturnType<typeof createMockMetrics>, name: string): number =>
  metrics.calls.filter((call) => call.method === 'increment' && call.name === name).length;

// ============================================================================
// Dataset fixtures
// ============================================================================

/**
 * A row the way it arrives from an uploaded spreadsheet
 */
export const greenlineRow: DatasetRow = {
  Name: 'Greenline',
  City: 'Rivertown',
  Country: 'Exampleland',
  'Opened Year': 1978,
  Lines: '4',
  Stations: '52',
  'System length   miles': '31.5 mi',
  'Annual Ridership': '120 million',
  'Ridden?': 'Yes',
};

export const createContext = (overrides: Partial<SelectionContext> = {}): SelectionContext => ({
  entityId: 'metro-7',
  entityName: 'Greenline',
  city: 'Rivertown',
  country: 'Exampleland',
  facts: {
    openedYear: 1978,
    numberOfLines: 4,
    totalMiles: 31.5,
    stations: 52,
    annualRidership: 120_000_000,
    cityPopulation: null,
    lastMajorUpdate: null,
    visited: true,
  },
  ...overrides,
});

export const createValidDossier = (overrides: Partial<Dossier> = {}): Dossier => ({
  identity: { entity_id: 'metro-7', entity_name: 'Greenline' },
  location: { city: 'Rivertown', country: 'Exampleland' },
  opened_year: 1978,
  history_summary: 'Greenline opened in 1978 as a single line along the river.',
  timeline: [
    { year: 1978, event: 'First line opens' },
    { year: 1995, event: 'Airport extension' },
  ],
  ownership_and_operations: 'Operated by the Rivertown transit authority.',
  scale_and_usage: 'Four lines serving 52 stations.',
  perception: {
    summary: 'Regarded as dependable by commuters.',
    safety: null,
    cleanliness: null,
    typical_riders: 'Commuters and students',
    confidence: 'medium',
    notes: null,
  },
  culture: [],
  sources: [],
  ...overrides,
});

export const createRetrievalResult = (overrides: Partial<RetrievalResult> = {}): RetrievalResult => ({
  queries: [
    'Greenline Rivertown history',
    'Greenline Rivertown ownership operator',
    'Greenline Rivertown opening year',
    'Greenline Rivertown artworks about the subway',
  ],
  snippets: [
    {
      text: 'Greenline opened in 1978.',
      url: 'https://transit.example.org/greenline',
      title: 'Greenline overview',
      query: 'Greenline Rivertown history',
    },
  ],
  warnings: [],
  ...overrides,
});

// ============================================================================
// Fakes
// ============================================================================

/**
 * Synthesizer that replays the given candidates in order
 */
export const createScriptedSynthesizer = (...candidates: unknown[]) => {
  const synthesize = jest.fn<Synthesizer['synthesize']>();
  for (const candidate of candidates) {
    synthesize.mockResolvedValueOnce(candidate);
  }
  const synthesizer: Synthesizer = { synthesize };
  return { synthesizer, synthesize };
};

export const createRetrievalPort = (available: boolean, result: RetrievalResult = createRetrievalResult()) => {
  const availableFn = jest.fn<RetrievalPort['available']>().mockReturnValue(available);
  const retrieve = jest.fn<RetrievalPort['retrieve']>().mockResolvedValue(result);
  const port: RetrievalPort = { available: availableFn, retrieve };
  return { port, available: availableFn, retrieve };
};

/**
 * Completion client that answers from a queue of reply texts
 */
export class FakeCompletionClient implements CompletionClient {
  readonly model = 'fake-model';
  readonly requests: CompletionRequest[] = [];
  private readonly replies: Array<string | Error>;

  constructor(...replies: Array<string | Error>) {
    this.replies = replies;
  }

  async complete(request: CompletionRequest): Promise<CompletionResponse> {
    this.requests.push(request);
    const reply = this.replies.shift();
    if (reply === undefined) {
      throw new Error('FakeCompletionClient has no reply left');
    }
    if (reply instanceof Error) {
      throw reply;
    }
    return {
      text: reply,
      model: this.model,
      inputTokens: request.prompt.length,
      outputTokens: reply.length,
      stopReason: 'end_turn',
    };
  }
}
