/**
 * Synthesizer Module
 *
 * Invokes the language model with the assembled SelectionContext and the
 * retrieval outcome to produce a draft dossier.
 *
 * Responsibilities:
 * - Load the prompt template (prompts/synthesize-dossier.md)
 * - Inject facts, snippets with their URLs, evidence rules and, on retry,
 *   the validation problems of earlier attempts
 * - Switch to no-web rules when retrieval was skipped or came back empty
 * - Call Claude through a CompletionClient and parse the JSON reply
 *
 * The synthesizer does not validate. An unparseable reply is returned as the
 * raw text so the validator can reject it and the workflow can retry.
 * Transport failures (missing credential, timeout, provider error) raise
 * SynthesisError and are not retried here.
 */

import Anthropic from '@anthropic-ai/sdk';
import type { ContentBlock } from '@anthropic-ai/sdk/resources/messages';
import { readFile } from 'fs/promises';
import { join } from 'path';
import {
  ConfigurationError,
  SynthesisError,
  describeError,
  type ValidationError,
} from '../errors/index.js';
import { createConsoleLogger, noopMetrics } from '../observability/index.js';
import { stripCodeFences } from '../validator/index.js';
import type {
  Logger,
  Metrics,
  RetrievalMode,
  RetrievalOutcome,
  SelectionContext,
} from '../types/index.js';

// ============================================================================
// Configuration
// ============================================================================

export const DEFAULT_MODEL = 'claude-sonnet-4-20250514';
export const DEFAULT_MAX_TOKENS = 4096;
export const DEFAULT_TEMPERATURE = 0.3;
export const DEFAULT_TIMEOUT = 120000;

/** Backoff before each retry of a rate-limited (HTTP 429) call */
export const RATE_LIMIT_DELAYS_MS = [1000, 2000, 4000];

const TEMPLATE_FILE = 'synthesize-dossier.md';

const SYSTEM_PROMPT =
  'You are a careful transit research analyst. You MUST output ONLY valid JSON that conforms exactly ' +
  'to the schema provided in the prompt. No markdown code fences, no explanatory text, just raw JSON.';

/**
 * Claude API configuration
 */
export interface ClaudeConfig {
  /** Anthropic API key (from ANTHROPIC_API_KEY env var) */
  apiKey?: string;
  model?: string;
  maxTokens?: number;
  temperature?: number;
  /** Call-level timeout in milliseconds */
  timeout?: number;
  /** Override of the API endpoint (ANTHROPIC_BASE_URL is read otherwise) */
  baseURL?: string;
  /** Delays before retrying a rate-limited call; nothing else is retried */
  rateLimitDelaysMs?: number[];
}

// ============================================================================
// Completion client
// ============================================================================

export interface CompletionRequest {
  system: string;
  prompt: string;
}

export interface CompletionResponse {
  text: string;
  model: string;
  inputTokens: number;
  outputTokens: number;
  stopReason: string | null;
}

/**
 * Narrow seam around the model provider
 */
export interface CompletionClient {
  readonly model: string;
  complete(request: CompletionRequest): Promise<CompletionResponse>;
}

/**
 * Anthropic Messages API client
 */
export class AnthropicCompletionClient implements CompletionClient {
  readonly model: string;
  private readonly client: Anthropic;
  private readonly maxTokens: number;
  private readonly temperature: number;
  private readonly rateLimitDelaysMs: number[];

  constructor(
    config: ClaudeConfig & { apiKey: string },
    private readonly logger: Logger = createConsoleLogger('synthesizer')
  ) {
    this.model = config.model ?? DEFAULT_MODEL;
    this.maxTokens = config.maxTokens ?? DEFAULT_MAX_TOKENS;
    this.temperature = config.temperature ?? DEFAULT_TEMPERATURE;
    this.rateLimitDelaysMs = config.rateLimitDelaysMs ?? RATE_LIMIT_DELAYS_MS;
    // Timeouts, connection failures and 5xx responses surface on the first
    // occurrence; only 429 is retried, below.
    this.client = new Anthropic({
      apiKey: config.apiKey,
      baseURL: config.baseURL,
      timeout: config.timeout ?? DEFAULT_TIMEOUT,
      maxRetries: 0,
    });
  }

  async complete(request: CompletionRequest): Promise<CompletionResponse> {
    for (let attempt = 0; ; attempt++) {
      try {
        return await this.send(request);
      } catch (error) {
        const delay = this.rateLimitDelaysMs[attempt];
        if (!(error instanceof Anthropic.RateLimitError) || delay === undefined) {
          throw error;
        }
        this.logger.warn(`Rate limited, retrying in ${delay}ms`, { attempt: attempt + 1, model: this.model });
        await sleep(delay);
      }
    }
  }

  private async send(request: CompletionRequest): Promise<CompletionResponse> {
    const response = await this.client.messages.create({
      model: this.model,
      max_tokens: this.maxTokens,
      temperature: this.temperature,
      system: request.system,
      messages: [
        {
          role: 'user',
          content: request.prompt,
        },
      ],
    });

    const textContent = response.content.find((block: ContentBlock) => block.type === 'text');
    if (!textContent || textContent.type !== 'text') {
      throw new Error('No text content in Claude response');
    }

    return {
      text: textContent.text,
      model: response.model,
      inputTokens: response.usage.input_tokens,
      outputTokens: response.usage.output_tokens,
      stopReason: response.stop_reason,
    };
  }
}

/**
 * Build the default client, failing when the credential is missing
 */
export function createCompletionClient(config: ClaudeConfig = {}, logger?: Logger): CompletionClient {
  const apiKey = config.apiKey;
  if (!apiKey) {
    throw new ConfigurationError('ANTHROPIC_API_KEY is not set; the model cannot be called', [
      'ANTHROPIC_API_KEY: missing',
    ]);
  }
  return new AnthropicCompletionClient({ ...config, apiKey }, logger);
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function describeModelFailure(error: unknown, timeout: number): string {
  if (error instanceof Anthropic.APIConnectionTimeoutError) {
    return `Model call timed out after ${timeout}ms`;
  }
  if (error instanceof Anthropic.APIError) {
    return `Model provider error${error.status ? ` (HTTP ${error.status})` : ''}: ${error.message}`;
  }
  return `Model call failed: ${describeError(error)}`;
}

// ============================================================================
// Prompt building
// ============================================================================

export function retrievalModeOf(retrieval: RetrievalOutcome): RetrievalMode {
  return retrieval.kind === 'retrieved' && retrieval.result.snippets.length > 0 ? 'web' : 'no_web';
}

function formatFact(value: number | boolean | string | null): string {
  if (value === null) {
    return 'unknown';
  }
  if (typeof value === 'boolean') {
    return value ? 'yes' : 'no';
  }
  return String(value);
}

function formatSelectionContext(context: SelectionContext): string {
  const { facts } = context;
  return [
    `- entity_id: ${context.entityId}`,
    `- entity_name: ${context.entityName}`,
    `- city: ${formatFact(context.city)}`,
    `- country: ${formatFact(context.country)}`,
    `- opened_year: ${formatFact(facts.openedYear)}`,
    `- number_of_lines: ${formatFact(facts.numberOfLines)}`,
    `- total_length_miles: ${formatFact(facts.totalMiles)}`,
    `- stations: ${formatFact(facts.stations)}`,
    `- annual_ridership: ${formatFact(facts.annualRidership)}`,
    `- city_population: ${formatFact(facts.cityPopulation)}`,
    `- last_major_expansion: ${formatFact(facts.lastMajorUpdate)}`,
    `- visited_by_user: ${formatFact(facts.visited)}`,
  ].join('\n');
}

function formatEvidence(retrieval: RetrievalOutcome): string {
  if (retrieval.kind === 'skipped') {
    return `No web retrieval was performed (${retrieval.reason}).`;
  }
  if (retrieval.result.snippets.length === 0) {
    return 'Web retrieval returned no results.';
  }
  return retrieval.result.snippets
    .map((snippet, index) =>
      [
        `[${index + 1}] ${snippet.title ?? 'Untitled'}`,
        `URL: ${snippet.url}`,
        `Query: ${snippet.query}`,
        snippet.text,
      ].join('\n')
    )
    .join('\n\n');
}

function formatEvidenceRules(mode: RetrievalMode): string {
  if (mode === 'web') {
    return [
      '- Base factual claims (dates, operators, figures) on the evidence above or the dataset facts.',
      '- Every entry in "sources" MUST use a URL listed in the evidence above. Never invent URLs.',
      '- "culture[].source_url" must be one of those URLs or null.',
      '- Keep qualitative impressions in "perception" and set "confidence" to reflect how well the evidence supports them.',
    ].join('\n');
  }
  return [
    '- NO-WEB MODE: no web sources are available for this run.',
    '- Use only the dataset facts and widely known general knowledge; avoid unverifiable specifics.',
    '- "sources" MUST be an empty array. Every "culture[].source_url" MUST be null. Never invent URLs.',
    '- "perception.confidence" must be "low" or "medium", never "high".',
  ].join('\n');
}

function formatPriorErrors(priorErrors: ValidationError[]): string {
  if (priorErrors.length === 0) {
    return 'None.';
  }
  return priorErrors
    .map((error, index) =>
      [`Attempt ${index + 1} was rejected:`, ...error.formatIssues().map((line) => `- ${line}`)].join('\n')
    )
    .join('\n\n');
}

/**
 * Fill the template placeholders
 */
export function buildPrompt(
  template: string,
  context: SelectionContext,
  retrieval: RetrievalOutcome,
  priorErrors: ValidationError[] = []
): string {
  const mode = retrievalModeOf(retrieval);
  const values: Record<string, string> = {
    selection_context: formatSelectionContext(context),
    retrieval_mode: mode,
    retrieved_evidence: formatEvidence(retrieval),
    evidence_rules: formatEvidenceRules(mode),
    prior_errors: formatPriorErrors(priorErrors),
  };

  return template.replace(/\{\{(\w+)\}\}/g, (placeholder, name: string) => values[name] ?? placeholder);
}

/**
 * Parse the model's reply. A reply that is not JSON is returned as text.
 */
export function parseModelReply(text: string): unknown {
  const cleaned = stripCodeFences(text);
  try {
    return JSON.parse(cleaned);
  } catch {
    return cleaned;
  }
}

// ============================================================================
// Synthesizer
// ============================================================================

/**
 * The orchestrator's view of synthesis
 */
export interface Synthesizer {
  synthesize(
    context: SelectionContext,
    retrieval: RetrievalOutcome,
    priorErrors?: ValidationError[]
  ): Promise<unknown>;
}

export interface ClaudeSynthesizerOptions {
  /** Injected client; built from config on first use otherwise */
  client?: CompletionClient;
  config?: ClaudeConfig;
  templatePath?: string;
  logger?: Logger;
  metrics?: Metrics;
}

export class ClaudeSynthesizer implements Synthesizer {
  private client: CompletionClient | null;
  private template: string | null = null;
  private readonly config: ClaudeConfig;
  private readonly templatePath: string;
  private readonly logger: Logger;
  private readonly metrics: Metrics;

  constructor(options: ClaudeSynthesizerOptions = {}) {
    this.client = options.client ?? null;
    this.config = options.config ?? {};
    this.templatePath = options.templatePath ?? join(__dirname, '..', '..', 'prompts', TEMPLATE_FILE);
    this.logger = options.logger ?? createConsoleLogger('synthesizer');
    this.metrics = options.metrics ?? noopMetrics;
  }

  async synthesize(
    context: SelectionContext,
    retrieval: RetrievalOutcome,
    priorErrors: ValidationError[] = []
  ): Promise<unknown> {
    const client = this.resolveClient();
    const template = await this.loadTemplate();
    const prompt = buildPrompt(template, context, retrieval, priorErrors);
    const mode = retrievalModeOf(retrieval);

    this.logger.info('Calling Claude API', {
      entityId: context.entityId,
      model: client.model,
      retrievalMode: mode,
      attempt: priorErrors.length + 1,
      promptLength: prompt.length,
    });
    this.metrics.increment('synthesizer.model.calls', { model: client.model, mode });

    const startTime = Date.now();
    let response: CompletionResponse;
    try {
      response = await client.complete({ system: SYSTEM_PROMPT, prompt });
    } catch (error) {
      const message = describeModelFailure(error, this.config.timeout ?? DEFAULT_TIMEOUT);
      this.logger.error('Claude API call failed', { entityId: context.entityId, error: message });
      this.metrics.increment('synthesizer.model.errors', { model: client.model });
      throw new SynthesisError(message, { cause: error });
    }

    this.logger.info('Claude API response received', {
      model: response.model,
      inputTokens: response.inputTokens,
      outputTokens: response.outputTokens,
      stopReason: response.stopReason,
    });
    this.metrics.timing('synthesizer.model.duration', Date.now() - startTime, { model: client.model });
    this.metrics.gauge('synthesizer.model.input_tokens', response.inputTokens, { model: client.model });
    this.metrics.gauge('synthesizer.model.output_tokens', response.outputTokens, { model: client.model });

    return parseModelReply(response.text);
  }

  private resolveClient(): CompletionClient {
    if (!this.client) {
      this.client = createCompletionClient(this.config, this.logger);
    }
    return this.client;
  }

  private async loadTemplate(): Promise<string> {
    if (this.template !== null) {
      return this.template;
    }
    try {
      this.template = await readFile(this.templatePath, 'utf-8');
      return this.template;
    } catch (error) {
      throw new SynthesisError(`Failed to load prompt template: ${this.templatePath}`, { cause: error });
    }
  }
}

