/**
 * Config module exports
 *
 * Project settings (packaged JSON or a file on disk) plus GEMINI_* environment
 * overrides, materialized into a StreamConfig.
 */

export type {
  BackoffSettings,
  GeminiSettings,
  RuntimeSettings,
  DeploymentSettings,
  ProjectSettings,
} from './types';

export {
  BackoffSettingsSchema,
  MAX_DURATION_SECONDS,
  GeminiSettingsSchema,
  DeploymentSettingsSchema,
  ProjectSettingsSchema,
  parseProjectSettings,
} from './types';

export { loadProjectSettings, readSettingsPayload, getDefaultSettingsPath, PROJECT_SETTINGS_ENV } from './loader';

export type { GeminiEnvironment } from './environment';
export { GeminiEnvironmentSchema, parseGeminiEnvironment, buildStreamConfig, splitCsv } from './environment';
