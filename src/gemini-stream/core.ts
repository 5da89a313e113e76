/**
 * Gemini Stream Core - Pure Functions
 *
 * Event constructors, endpoint selection and backoff arithmetic used by the
 * orchestrator and the transports.
 */

import type {
    ChunkEvent,
    CompleteEvent,
    EndOfAttemptEvent,
    ErrorEvent,
    HeartbeatEvent,
    StreamConfig,
    StreamEvent,
} from './types';

// ============================================================================
// Event Creation
// ============================================================================

export function chunkEvent(text: string, raw?: unknown): ChunkEvent {
    return { kind: 'chunk', text, raw, timestamp: Date.now() };
}

export function heartbeatEvent(): HeartbeatEvent {
    return { kind: 'heartbeat', timestamp: Date.now() };
}

export function completeEvent(): CompleteEvent {
    return { kind: 'complete', timestamp: Date.now() };
}

export function errorEvent(message: string, cause?: unknown): ErrorEvent {
    return cause === undefined
        ? { kind: 'error', message, timestamp: Date.now() }
        : { kind: 'error', message, cause, timestamp: Date.now() };
}

export function endOfAttemptEvent(): EndOfAttemptEvent {
    return { kind: 'end-of-attempt', timestamp: Date.now() };
}

/**
 * complete and error close an attempt; nothing caller-visible follows them.
 */
export function isTerminalEvent(event: StreamEvent): event is CompleteEvent | ErrorEvent {
    return event.kind === 'complete' || event.kind === 'error';
}

// ============================================================================
// Endpoint Selection
// ============================================================================

/**
 * Primary endpoint followed by the fallbacks, in order.
 */
export function listEndpoints(config: StreamConfig): string[] {
    return [config.endpoint, ...config.fallbackEndpoints];
}

/**
 * Endpoint for a 0-based attempt index. Walks the list forward and
 * saturates at the last entry.
 */
export function selectEndpoint(endpoints: readonly string[], attemptIndex: number): string {
    if (endpoints.length === 0) {
        throw new Error('At least one endpoint must be configured');
    }
    if (!Number.isInteger(attemptIndex) || attemptIndex < 0) {
        throw new Error(`Invalid attempt index: ${attemptIndex}`);
    }
    return endpoints[Math.min(attemptIndex, endpoints.length - 1)];
}

export function withEndpoint(config: StreamConfig, endpoint: string): StreamConfig {
    return { ...config, endpoint };
}

// ============================================================================
// Backoff
// ============================================================================

/**
 * Delay before the retry that follows the failed attempt `attemptIndex`.
 */
export function computeBackoffDelay(attemptIndex: number, baseMs: number, maxMs: number): number {
    return Math.min(baseMs * 2 ** attemptIndex, maxMs);
}

// ============================================================================
// Payload Helpers
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Text carried by a backend payload: its own `text` field, or the text parts
 * of every candidate joined together.
 */
export function extractChunkText(payload: unknown): string {
    if (!isRecord(payload)) return '';
    if (typeof payload.text === 'string' && payload.text) {
        return payload.text;
    }

    const candidates = Array.isArray(payload.candidates) ? payload.candidates : [];
    const texts: string[] = [];

    for (const candidate of candidates) {
        if (!isRecord(candidate) || !isRecord(candidate.content)) continue;
        const parts = candidate.content.parts;
        if (!Array.isArray(parts)) continue;
        for (const part of parts) {
            if (isRecord(part) && typeof part.text === 'string' && part.text) {
                texts.push(part.text);
            }
        }
    }

    return texts.join('');
}

export function describeError(error: unknown): string {
    if (error instanceof Error) {
        return error.message || error.name;
    }
    if (typeof error === 'string') {
        return error;
    }
    if (isRecord(error) && typeof error.message === 'string') {
        return error.message;
    }
    return String(error);
}
