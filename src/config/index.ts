/**
 * Configuration Module
 *
 * Reads and validates environment configuration with zod. Empty variables are
 * treated as unset; invalid values raise one ConfigurationError that lists
 * every problem.
 *
 * Environment variables:
 * - ANTHROPIC_API_KEY, ANTHROPIC_MODEL, ANTHROPIC_MAX_TOKENS,
 *   ANTHROPIC_TIMEOUT_MS, ANTHROPIC_TEMPERATURE
 * - TAVILY_API_KEY, TAVILY_API_URL, RETRIEVAL_TIMEOUT_MS, RETRIEVAL_MAX_RESULTS
 * - PROFILE_CACHE_EVICT_ON_VERSION_CHANGE
 * - S3_BUCKET, S3_KEY, AWS_REGION, S3_ENDPOINT
 */

import { z } from 'zod';
import type { S3DatasetConfig } from '../dataset-store/index.js';
import { ConfigurationError } from '../errors/index.js';
import {
  DEFAULT_MAX_RESULTS,
  DEFAULT_RETRIEVAL_TIMEOUT,
  DEFAULT_TAVILY_API_URL,
  type RetrievalProviderConfig,
} from '../retrieval/index.js';
import {
  DEFAULT_MAX_TOKENS,
  DEFAULT_MODEL,
  DEFAULT_TEMPERATURE,
  DEFAULT_TIMEOUT,
  type ClaudeConfig,
} from '../synthesizer/index.js';

const booleanFlag = z.preprocess(
  (value) => (typeof value === 'string' ? value.trim().toLowerCase() : value),
  z
    .enum(['true', 'false', '1', '0', 'yes', 'no'])
    .default('true')
    .transform((value) => value === 'true' || value === '1' || value === 'yes')
);

const EnvSchema = z.object({
  ANTHROPIC_API_KEY: z.string().optional(),
  ANTHROPIC_MODEL: z.string().default(DEFAULT_MODEL),
  ANTHROPIC_MAX_TOKENS: z.coerce.number().int().positive().default(DEFAULT_MAX_TOKENS),
  ANTHROPIC_TIMEOUT_MS: z.coerce.number().int().positive().default(DEFAULT_TIMEOUT),
  ANTHROPIC_TEMPERATURE: z.coerce.number().min(0).max(1).default(DEFAULT_TEMPERATURE),
  TAVILY_API_KEY: z.string().optional(),
  TAVILY_API_URL: z.string().url().default(DEFAULT_TAVILY_API_URL),
  RETRIEVAL_TIMEOUT_MS: z.coerce.number().int().positive().default(DEFAULT_RETRIEVAL_TIMEOUT),
  RETRIEVAL_MAX_RESULTS: z.coerce.number().int().min(1).max(20).default(DEFAULT_MAX_RESULTS),
  PROFILE_CACHE_EVICT_ON_VERSION_CHANGE: booleanFlag,
  S3_BUCKET: z.string().optional(),
  S3_KEY: z.string().optional(),
  AWS_REGION: z.string().optional(),
  S3_ENDPOINT: z.string().url().optional(),
});

export interface ProfileConfig {
  anthropic: ClaudeConfig;
  retrieval: RetrievalProviderConfig;
  cache: {
    evictOnVersionChange: boolean;
  };
  /** null unless both S3_BUCKET and S3_KEY are set */
  datasetStore: S3DatasetConfig | null;
}

/**
 * Build the configuration from an environment map (process.env by default)
 *
 * @throws ConfigurationError listing every invalid variable
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): ProfileConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== '')
  );

  const parsed = EnvSchema.safeParse(present);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError(`Invalid configuration: ${problems.join('; ')}`, problems);
  }

  const vars = parsed.data;

  return {
    anthropic: {
      apiKey: vars.ANTHROPIC_API_KEY,
      model: vars.ANTHROPIC_MODEL,
      maxTokens: vars.ANTHROPIC_MAX_TOKENS,
      temperature: vars.ANTHROPIC_TEMPERATURE,
      timeout: vars.ANTHROPIC_TIMEOUT_MS,
    },
    retrieval: vars.TAVILY_API_KEY
      ? {
          type: 'tavily',
          apiKey: vars.TAVILY_API_KEY,
          apiUrl: vars.TAVILY_API_URL,
          timeout: vars.RETRIEVAL_TIMEOUT_MS,
          maxResults: vars.RETRIEVAL_MAX_RESULTS,
        }
      : { type: 'null' },
    cache: {
      evictOnVersionChange: vars.PROFILE_CACHE_EVICT_ON_VERSION_CHANGE,
    },
    datasetStore:
      vars.S3_BUCKET && vars.S3_KEY
        ? {
            bucket: vars.S3_BUCKET,
            key: vars.S3_KEY,
            region: vars.AWS_REGION,
            endpoint: vars.S3_ENDPOINT,
          }
        : null,
  };
}
