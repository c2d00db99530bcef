/**
 * Integration tests for the profile workflow
 *
 * Everything is real except the model (FakeCompletionClient) and the search
 * provider (an in-process table): session, cache, assembler, retrieval
 * gateway, synthesizer with the shipped prompt template, validator and
 * orchestrator.
 */

import { describe, test, expect } from '@jest/globals';
import { loadConfig } from '../../src/config/index.js';
import { renderDossierAsMarkdown } from '../../src/renderers/index.js';
import { RetrievalGateway, buildQueries, type ProviderHit, type RetrievalProvider } from '../../src/retrieval/index.js';
import { createProfileSession } from '../../src/session/index.js';
import type { ProfileOutcome } from '../../src/orchestrator/index.js';
import {
  FakeCompletionClient,
  createContext,
  createMockLogger,
  createValidDossier,
  greenlineRow,
} from '../helpers/fixtures.js';

const DATASET_V1 = 'Name,City,Country,Opened Year\nGreenline,Rivertown,Exampleland,1978\n';
const DATASET_V2 = 'Name,City,Country,Opened Year\nGreenline,Rivertown,Exampleland,1979\n';

const highConfidenceReply = (sources: Array<{ title: string; url: string }> = []) => {
  const base = createValidDossier();
  return JSON.stringify({ ...base, perception: { ...base.perception, confidence: 'high' }, sources });
};

class StaticProvider implements RetrievalProvider {
  readonly name = 'static';
  readonly configured = true;

  constructor(private readonly hits: Record<string, ProviderHit[]>) {}

  async search(query: string): Promise<ProviderHit[]> {
    return this.hits[query] ?? [];
  }
}

function createNoWebSession(client: FakeCompletionClient) {
  return createProfileSession({
    config: loadConfig({}),
    completionClient: client,
    logger: createMockLogger(),
  });
}

function done(outcome: ProfileOutcome) {
  if (outcome.status !== 'DONE') {
    throw new Error(`expected DONE, got FAILED: ${outcome.error.reason}`);
  }
  return outcome;
}

describe('Profile workflow integration', () => {
  describe('no-web mode', () => {
    test('should produce a cached dossier with capped confidence and no sources', async () => {
      const client = new FakeCompletionClient(
        highConfidenceReply([{ title: 'Made up', url: 'https://invented.example.org/greenline' }])
      );
      const session = createNoWebSession(client);
      session.loadDataset(DATASET_V1);

      const outcome = done(await session.runProfile('metro-7', greenlineRow));

      expect(outcome.retrievalMode).toBe('no_web');
      expect(outcome.trace).toContain('SKIP_RETRIEVE');
      expect(outcome.dossier.identity).toEqual({ entity_id: 'metro-7', entity_name: 'Greenline' });
      expect(outcome.dossier.perception.confidence).toBe('medium');
      expect(outcome.dossier.sources).toEqual([]);
      expect(client.requests).toHaveLength(1);
      expect(client.requests[0]!.prompt).toContain('- NO-WEB MODE: no web sources are available for this run.');
      expect(renderDossierAsMarkdown(outcome.dossier)).toContain('No web sources were used for this profile.');
    });

    test('should answer a re-selection from the cache with no new model call', async () => {
      const client = new FakeCompletionClient(highConfidenceReply());
      const session = createNoWebSession(client);
      session.loadDataset(DATASET_V1);

      const first = done(await session.runProfile('metro-7', greenlineRow));
      const second = done(await session.runProfile('metro-7', greenlineRow));

      expect(second.fromCache).toBe(true);
      expect(second.dossier).toBe(first.dossier);
      expect(client.requests).toHaveLength(1);
    });

    test('should generate again for a new dataset version', async () => {
      const client = new FakeCompletionClient(highConfidenceReply(), highConfidenceReply());
      const session = createNoWebSession(client);
      session.loadDataset(DATASET_V1);
      await session.runProfile('metro-7', greenlineRow);

      session.loadDataset(DATASET_V2);
      const outcome = done(await session.runProfile('metro-7', greenlineRow));

      expect(outcome.fromCache).toBe(false);
      expect(client.requests).toHaveLength(2);
    });

    test('should regenerate on force refresh', async () => {
      const client = new FakeCompletionClient(highConfidenceReply(), highConfidenceReply());
      const session = createNoWebSession(client);
      session.loadDataset(DATASET_V1);
      await session.runProfile('metro-7', greenlineRow);

      const outcome = done(await session.runProfile('metro-7', greenlineRow, true));

      expect(outcome.fromCache).toBe(false);
      expect(client.requests).toHaveLength(2);
    });

    test('should make one model call for overlapping selections of the same system', async () => {
      const client = new FakeCompletionClient(highConfidenceReply());
      const session = createNoWebSession(client);
      session.loadDataset(DATASET_V1);

      const outcomes = await Promise.all([
        session.runProfile('metro-7', greenlineRow),
        session.runProfile('metro-7', greenlineRow),
      ]);

      expect(outcomes.map((outcome) => outcome.status)).toEqual(['DONE', 'DONE']);
      expect(client.requests).toHaveLength(1);
    });
  });

  describe('validation retry', () => {
    test('should feed the rejection back to the model and succeed on the second attempt', async () => {
      const client = new FakeCompletionClient('Greenline is a subway system in Rivertown.', highConfidenceReply());
      const session = createNoWebSession(client);
      session.loadDataset(DATASET_V1);

      const outcome = done(await session.runProfile('metro-7', greenlineRow));

      expect(outcome.synthesisAttempts).toBe(2);
      expect(client.requests).toHaveLength(2);
      expect(client.requests[0]!.prompt).toContain('## Problems With Earlier Attempts\n\nNone.');
      expect(client.requests[1]!.prompt).toContain('Attempt 1 was rejected:\n- (root): response is not valid JSON');
    });

    test('should fail after two invalid replies and leave the cache empty', async () => {
      const client = new FakeCompletionClient('not json', '{"identity": {}}', highConfidenceReply());
      const session = createNoWebSession(client);
      session.loadDataset(DATASET_V1);

      const outcome = await session.runProfile('metro-7', greenlineRow);

      expect(outcome.status).toBe('FAILED');
      if (outcome.status === 'FAILED') {
        expect(outcome.error.code).toBe('VALIDATION_ERROR');
        expect(outcome.error.validationErrors).toHaveLength(2);
      }
      expect(client.requests).toHaveLength(2);

      const retry = done(await session.runProfile('metro-7', greenlineRow));
      expect(retry.fromCache).toBe(false);
    });
  });

  describe('web mode', () => {
    test('should cite only URLs the retrieval gateway returned', async () => {
      const [historyQuery] = buildQueries(createContext());
      const provider = new StaticProvider({
        [historyQuery!]: [
          { title: 'Greenline overview', url: 'https://transit.example.org/greenline', content: 'Opened in 1978.' },
        ],
      });
      const logger = createMockLogger();
      const client = new FakeCompletionClient(
        highConfidenceReply([
          { title: 'Greenline overview', url: 'https://transit.example.org/greenline' },
          { title: 'Made up', url: 'https://invented.example.org/greenline' },
        ])
      );
      const session = createProfileSession({
        config: loadConfig({}),
        retrieval: new RetrievalGateway(provider, { logger }),
        completionClient: client,
        logger,
      });
      session.loadDataset(DATASET_V1);

      const outcome = done(await session.runProfile('metro-7', greenlineRow));

      expect(outcome.retrievalMode).toBe('web');
      expect(outcome.dossier.perception.confidence).toBe('high');
      expect(outcome.dossier.sources).toEqual([
        { title: 'Greenline overview', url: 'https://transit.example.org/greenline' },
      ]);
      expect(client.requests[0]!.prompt).toContain('URL: https://transit.example.org/greenline');
    });
  });
});
