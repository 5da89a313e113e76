/**
 * Project settings loader
 *
 * Resolution order:
 * 1. Explicit path argument
 * 2. GEMINI_PROJECT_SETTINGS environment variable
 * 3. project-settings.json packaged beside this module
 */

import fs from 'node:fs';
import { fileURLToPath } from 'node:url';
import { parseProjectSettings, type ProjectSettings } from './types';

export const PROJECT_SETTINGS_ENV = 'GEMINI_PROJECT_SETTINGS';

/**
 * Path of the packaged default settings file
 */
export function getDefaultSettingsPath(): string {
  return fileURLToPath(new URL('./project-settings.json', import.meta.url));
}

/**
 * Read and parse a JSON payload from disk
 *
 * @throws Error if the file is missing or is not valid JSON
 */
export function readSettingsPayload(filePath: string): unknown {
  if (!fs.existsSync(filePath)) {
    throw new Error(`Project settings file not found: ${filePath}`);
  }

  const content = fs.readFileSync(filePath, 'utf-8');
  try {
    return JSON.parse(content);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Invalid JSON in project settings: ${filePath} (${message})`);
  }
}

/**
 * Load and validate project settings
 *
 * @param settingsPath - Optional explicit path
 * @param env - Environment used for the GEMINI_PROJECT_SETTINGS lookup
 */
export function loadProjectSettings(
  settingsPath?: string,
  env: NodeJS.ProcessEnv = process.env
): ProjectSettings {
  const envPath = env[PROJECT_SETTINGS_ENV]?.trim();
  const filePath = settingsPath ?? (envPath ? envPath : getDefaultSettingsPath());

  return parseProjectSettings(readSettingsPayload(filePath));
}
