import { endOfAttemptEvent } from '../core';
import type { StreamEvent, StreamingTransport } from '../types';

/**
 * Transport whose enter() always rejects. Drives the retry path in tests.
 */
export class FailingTransport implements StreamingTransport {
    readonly kind = 'failing';

    constructor(private readonly message = 'Transport entry failed') {}

    async enter(): Promise<void> {
        throw new Error(this.message);
    }

    async *produce(): AsyncGenerator<StreamEvent, void, undefined> {
        yield endOfAttemptEvent();
    }

    async exit(): Promise<void> {}
}
