/**
 * Unit Tests for Synthesizer Module
 *
 * The model is replaced by FakeCompletionClient; the real prompt template
 * from prompts/ is used.
 */

import { describe, it, expect, afterEach } from '@jest/globals';
import Anthropic from '@anthropic-ai/sdk';
import { createServer, type Server } from 'http';
import {
  ClaudeSynthesizer,
  buildPrompt,
  createCompletionClient,
  parseModelReply,
  retrievalModeOf,
  AnthropicCompletionClient,
} from '../../src/synthesizer/index.js';
import { ConfigurationError, SynthesisError, ValidationError } from '../../src/errors/index.js';
import type { RetrievalOutcome } from '../../src/types/index.js';
import {
  FakeCompletionClient,
  createContext,
  createMockLogger,
  createMockMetrics,
  createRetrievalResult,
  createValidDossier,
  countMetric,
} from '../helpers/fixtures.js';

// ============================================================================
// Fixtures
// ============================================================================

const TEMPLATE = [
  '{{selection_context}}',
  '---{{retrieval_mode}}---',
  '{{retrieved_evidence}}',
  '---',
  '{{evidence_rules}}',
  '---',
  '{{prior_errors}}',
  '{{not_a_field}}',
].join('\n');

const skipped: RetrievalOutcome = { kind: 'skipped', reason: 'no retrieval provider is configured' };
const retrieved: RetrievalOutcome = { kind: 'retrieved', result: createRetrievalResult() };
const retrievedEmpty: RetrievalOutcome = { kind: 'retrieved', result: createRetrievalResult({ snippets: [] }) };

// ============================================================================
// Prompt building
// ============================================================================

describe('retrievalModeOf', () => {
  it('should be web only when snippets were retrieved', () => {
    expect(retrievalModeOf(retrieved)).toBe('web');
    expect(retrievalModeOf(retrievedEmpty)).toBe('no_web');
    expect(retrievalModeOf(skipped)).toBe('no_web');
  });
});

describe('buildPrompt', () => {
  it('should inject the selection context facts', () => {
    const prompt = buildPrompt(TEMPLATE, createContext(), skipped);

    expect(prompt).toContain('- entity_id: metro-7');
    expect(prompt).toContain('- entity_name: Greenline');
    expect(prompt).toContain('- opened_year: 1978');
    expect(prompt).toContain('- city_population: unknown');
    expect(prompt).toContain('- visited_by_user: yes');
  });

  it('should list snippets with their URL and originating query in web mode', () => {
    const prompt = buildPrompt(TEMPLATE, createContext(), retrieved);

    expect(prompt).toContain('---web---');
    expect(prompt).toContain(
      [
        '[1] Greenline overview',
        'URL: https://transit.example.org/greenline',
        'Query: Greenline Rivertown history',
        'Greenline opened in 1978.',
      ].join('\n')
    );
    expect(prompt).toContain('Every entry in "sources" MUST use a URL listed in the evidence above.');
  });

  it('should switch to no-web rules when retrieval was skipped', () => {
    const prompt = buildPrompt(TEMPLATE, createContext(), skipped);

    expect(prompt).toContain('---no_web---');
    expect(prompt).toContain('No web retrieval was performed (no retrieval provider is configured).');
    expect(prompt).toContain('- NO-WEB MODE: no web sources are available for this run.');
    expect(prompt).toContain('"perception.confidence" must be "low" or "medium", never "high".');
  });

  it('should switch to no-web rules when retrieval returned nothing', () => {
    const prompt = buildPrompt(TEMPLATE, createContext(), retrievedEmpty);

    expect(prompt).toContain('---no_web---');
    expect(prompt).toContain('Web retrieval returned no results.');
  });

  it('should include earlier validation problems on retry', () => {
    const first = new ValidationError([{ path: 'perception.confidence', problem: 'must be one of low, medium, high' }]);
    const prompt = buildPrompt(TEMPLATE, createContext(), skipped, [first]);

    expect(prompt).toContain('Attempt 1 was rejected:\n- perception.confidence: must be one of low, medium, high');
  });

  it('should say None when there are no earlier problems', () => {
    const prompt = buildPrompt(TEMPLATE, createContext(), skipped);
    expect(prompt).toContain('---\nNone.\n');
  });

  it('should insert values literally and leave unknown placeholders alone', () => {
    const prompt = buildPrompt(TEMPLATE, createContext({ entityName: 'Line $& Co' }), skipped);

    expect(prompt).toContain('- entity_name: Line $& Co');
    expect(prompt.endsWith('{{not_a_field}}')).toBe(true);
  });
});

describe('parseModelReply', () => {
  it('should parse fenced JSON', () => {
    expect(parseModelReply('```json\n{"opened_year": 1978}\n```')).toEqual({ opened_year: 1978 });
  });

  it('should return the text when the reply is not JSON', () => {
    expect(parseModelReply('I cannot answer that.')).toBe('I cannot answer that.');
  });
});

// ============================================================================
// Completion client
// ============================================================================

describe('createCompletionClient', () => {
  it('should fail with a configuration error when the API key is missing', () => {
    expect(() => createCompletionClient({})).toThrow(ConfigurationError);
  });

  it('should build the Anthropic client when a key is given', () => {
    const client = createCompletionClient({ apiKey: 'test-secret', model: 'claude-test' });
    expect(client).toBeInstanceOf(AnthropicCompletionClient);
    expect(client.model).toBe('claude-test');
  });
});

describe('AnthropicCompletionClient', () => {
  let server: Server | null = null;

  /**
   * Local stand-in for the Messages API; answers each request with the next
   * scripted status, or never answers when the script says 'hang'
   */
  const startProvider = async (script: Array<number | 'hang'>) => {
    const hits: string[] = [];
    const provider = createServer((req, res) => {
      hits.push(`${req.method} ${req.url}`);
      const step = script[Math.min(hits.length - 1, script.length - 1)];
      if (step === 'hang') {
        return;
      }
      res.writeHead(step ?? 500, { 'content-type': 'application/json' });
      if (step === 200) {
        res.end(
          JSON.stringify({
            id: 'msg_test',
            type: 'message',
            role: 'assistant',
            model: 'claude-test',
            content: [{ type: 'text', text: '{"opened_year": 1978}' }],
            stop_reason: 'end_turn',
            stop_sequence: null,
            usage: { input_tokens: 12, output_tokens: 6 },
          })
        );
      } else {
        res.end(JSON.stringify({ type: 'error', error: { type: 'api_error', message: 'provider unavailable' } }));
      }
    });
    server = provider;
    await new Promise<void>((resolve) => provider.listen(0, '127.0.0.1', resolve));
    const address = provider.address();
    const port = address !== null && typeof address === 'object' ? address.port : 0;
    return { hits, baseURL: `http://127.0.0.1:${port}` };
  };

  afterEach(async () => {
    const running = server;
    server = null;
    if (running) {
      running.closeAllConnections();
      await new Promise<void>((resolve) => running.close(() => resolve()));
    }
  });

  it('should call the provider once when it answers with a server error', async () => {
    const { hits, baseURL } = await startProvider([500]);
    const client = createCompletionClient({ apiKey: 'test-secret', baseURL, timeout: 5000 }, createMockLogger());
    const synthesizer = new ClaudeSynthesizer({ client, logger: createMockLogger() });

    await expect(synthesizer.synthesize(createContext(), skipped)).rejects.toThrow('Model provider error (HTTP 500)');
    expect(hits).toEqual(['POST /v1/messages']);
  });

  it('should call the provider once when the call times out', async () => {
    const { hits, baseURL } = await startProvider(['hang']);
    const client = createCompletionClient({ apiKey: 'test-secret', baseURL, timeout: 200 }, createMockLogger());
    const synthesizer = new ClaudeSynthesizer({ client, config: { timeout: 200 }, logger: createMockLogger() });

    await expect(synthesizer.synthesize(createContext(), skipped)).rejects.toThrow('Model call timed out after 200ms');
    expect(hits).toHaveLength(1);
  });

  it('should retry a rate-limited call and return the reply', async () => {
    const { hits, baseURL } = await startProvider([429, 200]);
    const logger = createMockLogger();
    const client = createCompletionClient(
      { apiKey: 'test-secret', baseURL, timeout: 5000, rateLimitDelaysMs: [10] },
      logger
    );

    const response = await client.complete({ system: 'system', prompt: 'prompt' });

    expect(response.text).toBe('{"opened_year": 1978}');
    expect(response.inputTokens).toBe(12);
    expect(hits).toHaveLength(2);
    expect(logger.calls.warn[0]![0]).toBe('Rate limited, retrying in 10ms');
  });

  it('should give up when rate limiting outlasts the configured delays', async () => {
    const { hits, baseURL } = await startProvider([429]);
    const client = createCompletionClient(
      { apiKey: 'test-secret', baseURL, timeout: 5000, rateLimitDelaysMs: [10] },
      createMockLogger()
    );

    await expect(client.complete({ system: 'system', prompt: 'prompt' })).rejects.toBeInstanceOf(
      Anthropic.RateLimitError
    );
    expect(hits).toHaveLength(2);
  });
});

// ============================================================================
// ClaudeSynthesizer
// ============================================================================

describe('ClaudeSynthesizer', () => {
  it('should call the model with the rendered template and return the parsed reply', async () => {
    const dossier = createValidDossier();
    const client = new FakeCompletionClient('```json\n' + JSON.stringify(dossier) + '\n```');
    const metrics = createMockMetrics();
    const synthesizer = new ClaudeSynthesizer({ client, logger: createMockLogger(), metrics });

    const candidate = await synthesizer.synthesize(createContext(), skipped);

    expect(candidate).toEqual(dossier);
    expect(client.requests).toHaveLength(1);
    expect(client.requests[0]!.system).toContain('You MUST output ONLY valid JSON');
    expect(client.requests[0]!.prompt).toContain('## Dataset Facts');
    expect(client.requests[0]!.prompt).toContain('- entity_name: Greenline');
    expect(client.requests[0]!.prompt).toContain('## Retrieved Evidence (mode: no_web)');
    expect(client.requests[0]!.prompt).not.toContain('{{');
    expect(countMetric(metrics, 'synthesizer.model.calls')).toBe(1);
  });

  it('should return unparseable replies as text for the validator', async () => {
    const client = new FakeCompletionClient('Greenline is a subway in Rivertown.');
    const synthesizer = new ClaudeSynthesizer({ client, logger: createMockLogger() });

    await expect(synthesizer.synthesize(createContext(), skipped)).resolves.toBe('Greenline is a subway in Rivertown.');
  });

  it('should raise a configuration error when no API key is configured', async () => {
    const synthesizer = new ClaudeSynthesizer({ config: {}, logger: createMockLogger() });

    await expect(synthesizer.synthesize(createContext(), skipped)).rejects.toMatchObject({
      name: 'ConfigurationError',
      code: 'CONFIGURATION_ERROR',
    });
  });

  it('should wrap provider failures in a SynthesisError', async () => {
    const client = new FakeCompletionClient(new Error('socket hang up'));
    const metrics = createMockMetrics();
    const synthesizer = new ClaudeSynthesizer({ client, logger: createMockLogger(), metrics });

    const failure = synthesizer.synthesize(createContext(), skipped);

    await expect(failure).rejects.toBeInstanceOf(SynthesisError);
    await expect(failure).rejects.toThrow('Model call failed: socket hang up');
    expect(countMetric(metrics, 'synthesizer.model.errors')).toBe(1);
  });

  it('should report timeouts with the configured limit', async () => {
    const client = new FakeCompletionClient(new Anthropic.APIConnectionTimeoutError());
    const synthesizer = new ClaudeSynthesizer({ client, config: { timeout: 5000 }, logger: createMockLogger() });

    await expect(synthesizer.synthesize(createContext(), skipped)).rejects.toThrow(
      'Model call timed out after 5000ms'
    );
  });

  it('should fail when the template cannot be read', async () => {
    const client = new FakeCompletionClient('{}');
    const synthesizer = new ClaudeSynthesizer({
      client,
      templatePath: '/nonexistent/synthesize-dossier.md',
      logger: createMockLogger(),
    });

    await expect(synthesizer.synthesize(createContext(), skipped)).rejects.toThrow(
      'Failed to load prompt template: /nonexistent/synthesize-dossier.md'
    );
    expect(client.requests).toHaveLength(0);
  });

  it('should pass the attempt number and earlier problems through on retry', async () => {
    const client = new FakeCompletionClient('{}');
    const logger = createMockLogger();
    const synthesizer = new ClaudeSynthesizer({ client, logger });
    const earlier = new ValidationError([{ path: 'timeline', problem: 'Required' }]);

    await synthesizer.synthesize(createContext(), skipped, [earlier]);

    expect(client.requests[0]!.prompt).toContain('- timeline: Required');
    expect(logger.calls.info[0]![1]).toMatchObject({ entityId: 'metro-7', attempt: 2 });
  });
});
