/**
 * gemini-stream-relay
 *
 * Resilient token streaming from Gemini: retries with backoff, endpoint
 * fail-over and heartbeats behind one async iterator.
 *
 * @example
 * ```ts
 * const config = buildStreamConfig();
 * const accumulator = new TextAccumulator();
 * for await (const event of stream({ contents: [{ role: 'user', parts: [{ text: 'Hi' }] }] }, config)) {
 *   accumulator.push(event);
 * }
 * ```
 */

export * from './gemini-stream';
export * from './config';
export { logger, createLogger, createModuleLogger, REDACTED_PATHS } from './utils/logger';
export type { Logger, CreateLoggerOptions } from './utils/logger';
