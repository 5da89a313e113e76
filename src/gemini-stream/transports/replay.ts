import { sleep } from '../../utils/timers';
import { endOfAttemptEvent } from '../core';
import type { StreamEvent, StreamingTransport } from '../types';

export interface ReplayTransportOptions {
    /** Pause before each event, in milliseconds */
    delayMs?: number;
}

/**
 * Deterministic transport that replays a fixed list of events.
 */
export class ReplayTransport implements StreamingTransport {
    readonly kind = 'replay';

    private readonly events: readonly StreamEvent[];
    private readonly delayMs: number;
    private readonly controller = new AbortController();

    constructor(events: readonly StreamEvent[], options: ReplayTransportOptions = {}) {
        this.events = [...events];
        this.delayMs = options.delayMs ?? 0;
    }

    async enter(): Promise<void> {}

    async *produce(): AsyncGenerator<StreamEvent, void, undefined> {
        for (const event of this.events) {
            if (this.delayMs > 0) {
                try {
                    await sleep(this.delayMs, this.controller.signal);
                } catch (error) {
                    if (this.controller.signal.aborted) break;
                    throw error;
                }
            }
            if (this.controller.signal.aborted) break;
            yield event;
        }
        yield endOfAttemptEvent();
    }

    async exit(): Promise<void> {
        this.controller.abort();
    }
}
