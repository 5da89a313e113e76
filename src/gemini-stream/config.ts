import { z } from 'zod';
import type { StreamConfig, StreamConfigInput } from './types';

export const DEFAULT_ENDPOINT = 'https://generativelanguage.googleapis.com/v1beta';

/** Longest delay Node timers honour; larger values fire after ~1 ms */
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

const durationMs = () => z.number().finite().nonnegative().max(MAX_TIMER_DELAY_MS);

export const DEFAULT_STREAM_CONFIG = {
    endpoint: DEFAULT_ENDPOINT,
    fallbackEndpoints: [],
    requestTimeoutMs: 30_000,
    heartbeatIntervalMs: 20_000,
    maxRetries: 3,
    backoffBaseMs: 1_000,
    backoffMaxMs: 30_000,
} as const satisfies Omit<StreamConfig, 'apiKey' | 'model'>;

export const StreamConfigSchema = z.object({
    apiKey: z.string().min(1, 'apiKey is required'),
    model: z.string().min(1, 'model is required'),
    endpoint: z.string().min(1, 'endpoint must not be empty').default(DEFAULT_STREAM_CONFIG.endpoint),
    fallbackEndpoints: z.array(z.string().min(1)).default([]),
    requestTimeoutMs: durationMs().positive().default(DEFAULT_STREAM_CONFIG.requestTimeoutMs),
    heartbeatIntervalMs: durationMs().default(DEFAULT_STREAM_CONFIG.heartbeatIntervalMs),
    maxRetries: z.number().int().nonnegative().default(DEFAULT_STREAM_CONFIG.maxRetries),
    backoffBaseMs: durationMs().default(DEFAULT_STREAM_CONFIG.backoffBaseMs),
    backoffMaxMs: durationMs().default(DEFAULT_STREAM_CONFIG.backoffMaxMs),
    headers: z.record(z.string()).optional(),
});

/**
 * Fill defaults and validate. Throws when a field is missing or out of range.
 */
export function createStreamConfig(input: StreamConfigInput): StreamConfig {
    const result = StreamConfigSchema.safeParse({
        ...input,
        fallbackEndpoints: input.fallbackEndpoints ? [...input.fallbackEndpoints] : undefined,
    });

    if (!result.success) {
        const issues = result.error.issues.map((issue) => `${issue.path.join('.') || 'config'}: ${issue.message}`);
        throw new Error(`Invalid stream config: ${issues.join('; ')}`);
    }

    return Object.freeze(result.data);
}
