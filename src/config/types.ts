import { z } from 'zod';
import { MAX_TIMER_DELAY_MS } from '../gemini-stream/config';

/** Largest duration in seconds that still fits a Node timer */
export const MAX_DURATION_SECONDS = MAX_TIMER_DELAY_MS / 1000;

const durationSeconds = () => z.number().finite().nonnegative().max(MAX_DURATION_SECONDS);

/**
 * Backoff parameters for Gemini retry handling (seconds)
 */
export const BackoffSettingsSchema = z.object({
  factor: durationSeconds().positive().default(1.5),
  maxDelaySeconds: durationSeconds().positive().default(60),
});

/**
 * Gemini deployment defaults sourced from project settings
 */
export const GeminiSettingsSchema = z.object({
  /** Model identifier for Gemini streaming requests */
  model: z.string().min(1),
  /** Primary streaming endpoint */
  primaryEndpoint: z.string().min(1),
  /** Secondary endpoints used for fail-over */
  fallbackEndpoints: z.array(z.string().min(1)).default([]),
  requestTimeoutSeconds: durationSeconds().positive().default(45),
  heartbeatIntervalSeconds: durationSeconds().default(10),
  maxRetries: z.number().int().nonnegative().default(4),
  backoff: BackoffSettingsSchema.default({}),
});

export const RuntimeSettingsSchema = z.object({
  provider: z.string(),
  product: z.string(),
  region: z.string(),
});

export const DeploymentSettingsSchema = z.object({
  name: z.string(),
  slug: z.string(),
  environment: z.string(),
  description: z.string(),
  runtime: RuntimeSettingsSchema,
  features: z.array(z.string()).default([]),
  environmentVariables: z.record(z.string()).default({}),
});

/**
 * Structured representation of project-settings.json
 */
export const ProjectSettingsSchema = z.object({
  version: z.string(),
  updatedAt: z.string(),
  source: z.record(z.unknown()).default({}),
  deployment: DeploymentSettingsSchema,
  gemini: GeminiSettingsSchema,
  observability: z.record(z.unknown()).default({}),
});

export type BackoffSettings = z.infer<typeof BackoffSettingsSchema>;
export type GeminiSettings = z.infer<typeof GeminiSettingsSchema>;
export type RuntimeSettings = z.infer<typeof RuntimeSettingsSchema>;
export type DeploymentSettings = z.infer<typeof DeploymentSettingsSchema>;
export type ProjectSettings = z.infer<typeof ProjectSettingsSchema>;

/**
 * Parse a project settings payload. Throws with every failing path listed.
 */
export function parseProjectSettings(payload: unknown): ProjectSettings {
  const result = ProjectSettingsSchema.safeParse(payload);

  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new Error(`Project settings validation failed: ${issues.join('; ')}`);
  }

  return result.data;
}
