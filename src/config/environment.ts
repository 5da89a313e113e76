/**
 * Gemini environment overrides
 *
 * Combines GEMINI_* environment variables with project defaults into the
 * StreamConfig consumed by the streaming client. Durations in the
 * environment and the settings file are seconds.
 */

import { z } from 'zod';
import { createStreamConfig } from '../gemini-stream/config';
import type { StreamConfig } from '../gemini-stream/types';
import { loadProjectSettings } from './loader';
import { MAX_DURATION_SECONDS, type ProjectSettings } from './types';

const blankToUndefined = (value: unknown) =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

const optionalString = z.preprocess(blankToUndefined, z.string().trim().optional());
const optionalSeconds = z.preprocess(
  blankToUndefined,
  z.coerce.number().finite().nonnegative().max(MAX_DURATION_SECONDS).optional()
);

export const GeminiEnvironmentSchema = z.object({
  GEMINI_API_KEY: z.preprocess(blankToUndefined, z.string({ required_error: 'GEMINI_API_KEY is required' })),
  GEMINI_MODEL: optionalString,
  GEMINI_STREAM_ENDPOINT: optionalString,
  // Kept raw: an empty value clears the fallback list
  GEMINI_FALLBACK_ENDPOINTS: z.string().optional(),
  GEMINI_REQUEST_TIMEOUT: optionalSeconds,
  GEMINI_HEARTBEAT_INTERVAL: optionalSeconds,
  GEMINI_MAX_RETRIES: z.preprocess(blankToUndefined, z.coerce.number().int().nonnegative().optional()),
  GEMINI_BACKOFF_BASE: optionalSeconds,
  GEMINI_BACKOFF_MAX: optionalSeconds,
});

export interface GeminiEnvironment {
  apiKey: string;
  modelOverride?: string;
  endpointOverride?: string;
  fallbackOverride?: string[];
  requestTimeoutOverride?: number;
  heartbeatOverride?: number;
  maxRetriesOverride?: number;
  backoffBaseOverride?: number;
  backoffMaxOverride?: number;
}

/**
 * Split a comma-separated list, dropping blank entries
 */
export function splitCsv(value: string): string[] {
  return value
    .split(',')
    .map((segment) => segment.trim())
    .filter((segment) => segment.length > 0);
}

/**
 * Read GEMINI_* overrides from an environment
 *
 * @throws Error if GEMINI_API_KEY is missing or a numeric override is invalid
 */
export function parseGeminiEnvironment(env: NodeJS.ProcessEnv = process.env): GeminiEnvironment {
  const result = GeminiEnvironmentSchema.safeParse(env);

  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid Gemini environment: ${issues.join('; ')}`);
  }

  const vars = result.data;
  return {
    apiKey: vars.GEMINI_API_KEY,
    modelOverride: vars.GEMINI_MODEL,
    endpointOverride: vars.GEMINI_STREAM_ENDPOINT,
    fallbackOverride: vars.GEMINI_FALLBACK_ENDPOINTS !== undefined ? splitCsv(vars.GEMINI_FALLBACK_ENDPOINTS) : undefined,
    requestTimeoutOverride: vars.GEMINI_REQUEST_TIMEOUT,
    heartbeatOverride: vars.GEMINI_HEARTBEAT_INTERVAL,
    maxRetriesOverride: vars.GEMINI_MAX_RETRIES,
    backoffBaseOverride: vars.GEMINI_BACKOFF_BASE,
    backoffMaxOverride: vars.GEMINI_BACKOFF_MAX,
  };
}

const toMs = (seconds: number) => Math.round(seconds * 1000);

/**
 * Build a StreamConfig; environment overrides win over project defaults
 *
 * @param env - Environment to read overrides from
 * @param settings - Project settings (loaded from disk when omitted)
 */
export function buildStreamConfig(
  env: NodeJS.ProcessEnv = process.env,
  settings: ProjectSettings = loadProjectSettings(undefined, env)
): StreamConfig {
  const overrides = parseGeminiEnvironment(env);
  const defaults = settings.gemini;

  return createStreamConfig({
    apiKey: overrides.apiKey,
    model: overrides.modelOverride ?? defaults.model,
    endpoint: overrides.endpointOverride ?? defaults.primaryEndpoint,
    fallbackEndpoints: overrides.fallbackOverride ?? defaults.fallbackEndpoints,
    requestTimeoutMs: toMs(overrides.requestTimeoutOverride ?? defaults.requestTimeoutSeconds),
    heartbeatIntervalMs: toMs(overrides.heartbeatOverride ?? defaults.heartbeatIntervalSeconds),
    maxRetries: overrides.maxRetriesOverride ?? defaults.maxRetries,
    backoffBaseMs: toMs(overrides.backoffBaseOverride ?? defaults.backoff.factor),
    backoffMaxMs: toMs(overrides.backoffMaxOverride ?? defaults.backoff.maxDelaySeconds),
  });
}
