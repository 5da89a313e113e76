/**
 * Gemini Stream Client - Retry / Fail-over Orchestrator
 *
 * Presents a sequence of backend attempts as one logical stream:
 * - one transport per attempt, selected endpoint walks the fallback list
 * - heartbeat task per attempt, merged into the same channel
 * - exponential backoff between attempts, capped
 * - StreamError once the retry budget is spent
 *
 * Attempts are strictly sequential. Chunks from a failed attempt stay
 * delivered; only its error event is withheld from the caller.
 */

import { createModuleLogger, type Logger } from '../utils/logger';
import { abortable, settleWithin, sleep } from '../utils/timers';
import { AsyncChannel } from './channel';
import {
    computeBackoffDelay,
    describeError,
    endOfAttemptEvent,
    errorEvent,
    heartbeatEvent,
    listEndpoints,
    selectEndpoint,
    withEndpoint,
} from './core';
import { StreamError } from './errors';
import { DEFAULT_JOIN_TIMEOUT_MS, GoogleGenerativeAITransport } from './transports/google';
import type {
    GenerateRequest,
    StreamConfig,
    StreamEvent,
    StreamingTransport,
    TransportFactory,
    VisibleStreamEvent,
} from './types';

// ============================================================================
// Types
// ============================================================================

export interface GeminiStreamClientOptions {
    /** Structured logger; defaults to the gemini-stream module logger */
    logger?: Logger;
    /** Upper bound on waiting for an attempt's tasks during teardown */
    joinTimeoutMs?: number;
}

export interface StreamOptions {
    /** Replaces the default Gemini transport */
    transportFactory?: TransportFactory;
    /** Cancels the whole call, including backoff waits */
    signal?: AbortSignal;
}

type AttemptOutcome = { status: 'succeeded' } | { status: 'failed'; message: string; cause?: unknown };

// ============================================================================
// Client
// ============================================================================

export class GeminiStreamClient {
    private readonly log: Logger;
    private readonly joinTimeoutMs: number;

    constructor(
        private readonly config: StreamConfig,
        options: GeminiStreamClientOptions = {}
    ) {
        this.log = options.logger ?? createModuleLogger('gemini-stream');
        this.joinTimeoutMs = options.joinTimeoutMs ?? DEFAULT_JOIN_TIMEOUT_MS;
    }

    /**
     * Stream events for `request`, retrying and failing over until an attempt
     * completes or the retry budget is exhausted.
     */
    async *stream(
        request: GenerateRequest,
        options: StreamOptions = {}
    ): AsyncGenerator<VisibleStreamEvent, void, undefined> {
        const factory = options.transportFactory ?? this.defaultTransportFactory;
        const { signal } = options;
        const endpoints = listEndpoints(this.config);
        const { maxRetries, backoffBaseMs, backoffMaxMs } = this.config;

        for (let attempt = 0; ; attempt++) {
            signal?.throwIfAborted();

            const endpoint = selectEndpoint(endpoints, attempt);
            this.log.debug({ attempt, endpoint }, 'Starting Gemini stream attempt');

            const outcome = yield* this.runAttempt(factory, withEndpoint(this.config, endpoint), request, signal);
            if (outcome.status === 'succeeded') {
                return;
            }

            if (attempt >= maxRetries) {
                this.log.error(
                    { attempts: attempt + 1, endpoint, error: outcome.message },
                    'Gemini stream retries exhausted'
                );
                throw new StreamError(outcome.message, attempt + 1, { cause: outcome.cause });
            }

            const delayMs = computeBackoffDelay(attempt, backoffBaseMs, backoffMaxMs);
            this.log.warn(
                {
                    attempt,
                    endpoint,
                    nextEndpoint: selectEndpoint(endpoints, attempt + 1),
                    delayMs,
                    error: outcome.message,
                },
                'Gemini stream attempt failed, retrying'
            );
            await sleep(delayMs, signal);
        }
    }

    private readonly defaultTransportFactory: TransportFactory = (config, request) =>
        new GoogleGenerativeAITransport(config, request, {
            logger: this.log,
            joinTimeoutMs: this.joinTimeoutMs,
        });

    /**
     * One attempt: pump + heartbeat writing into a fresh channel, read here
     * until the attempt ends. Both tasks are stopped and joined (bounded) on
     * every exit path, including the caller abandoning the generator.
     */
    private async *runAttempt(
        factory: TransportFactory,
        config: StreamConfig,
        request: GenerateRequest,
        signal: AbortSignal | undefined
    ): AsyncGenerator<VisibleStreamEvent, AttemptOutcome, undefined> {
        const channel = new AsyncChannel<StreamEvent>();
        const controller = new AbortController();
        const forwardAbort = () => controller.abort(signal?.reason);
        signal?.addEventListener('abort', forwardAbort, { once: true });

        const tasks: Promise<void>[] = [this.pumpEvents(factory, config, request, channel, controller.signal)];
        if (config.heartbeatIntervalMs > 0) {
            tasks.push(this.emitHeartbeats(channel, config.heartbeatIntervalMs, controller.signal));
        }

        try {
            while (true) {
                signal?.throwIfAborted();
                const event = await channel.next(signal);
                switch (event.kind) {
                    case 'end-of-attempt':
                        return { status: 'succeeded' };
                    case 'error':
                        return { status: 'failed', message: event.message, cause: event.cause };
                    case 'complete':
                        yield event;
                        return { status: 'succeeded' };
                    default:
                        yield event;
                }
            }
        } finally {
            signal?.removeEventListener('abort', forwardAbort);
            controller.abort();
            channel.close();

            const settled = await settleWithin(tasks, this.joinTimeoutMs);
            if (!settled) {
                this.log.warn(
                    { endpoint: config.endpoint, joinTimeoutMs: this.joinTimeoutMs },
                    'Abandoning attempt tasks that did not stop in time'
                );
            }
        }
    }

    /**
     * Runs the transport lifecycle and copies its events into the channel.
     * Never rejects: entry and production failures become an error event.
     */
    private async pumpEvents(
        factory: TransportFactory,
        config: StreamConfig,
        request: GenerateRequest,
        channel: AsyncChannel<StreamEvent>,
        signal: AbortSignal
    ): Promise<void> {
        let transport: StreamingTransport | undefined;

        try {
            transport = factory(config, request);
            await abortable(transport.enter(), signal);

            const iterator = transport.produce()[Symbol.asyncIterator]();
            while (true) {
                const result = await abortable(iterator.next(), signal);
                if (result.done || result.value.kind === 'end-of-attempt') break;
                channel.push(result.value);
            }
            await iterator.return?.();
        } catch (error) {
            if (!signal.aborted) {
                channel.push(errorEvent(describeError(error), error));
            }
        } finally {
            if (transport) {
                try {
                    await transport.exit();
                } catch (error) {
                    this.log.warn({ endpoint: config.endpoint, err: error }, 'Transport exit failed');
                }
            }
            channel.push(endOfAttemptEvent());
        }
    }

    private async emitHeartbeats(channel: AsyncChannel<StreamEvent>, intervalMs: number, signal: AbortSignal): Promise<void> {
        try {
            while (true) {
                await sleep(intervalMs, signal);
                channel.push(heartbeatEvent());
            }
        } catch (error) {
            if (!signal.aborted) {
                this.log.error({ err: error }, 'Heartbeat task failed');
            }
        }
    }
}

// ============================================================================
// Functional entry point
// ============================================================================

export interface StreamCallOptions extends GeminiStreamClientOptions {
    signal?: AbortSignal;
}

/**
 * stream(request, config, transportFactory?) without holding a client.
 */
export function stream(
    request: GenerateRequest,
    config: StreamConfig,
    transportFactory?: TransportFactory,
    options: StreamCallOptions = {}
): AsyncGenerator<VisibleStreamEvent, void, undefined> {
    const { signal, ...clientOptions } = options;
    return new GeminiStreamClient(config, clientOptions).stream(request, { transportFactory, signal });
}
