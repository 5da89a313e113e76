import type { StreamEvent } from './types';

/**
 * Stitches chunk events into the final text. Every other event kind is
 * ignored, so heartbeats and control events never change the output.
 */
export class TextAccumulator {
    private parts: string[] = [];

    push(event: StreamEvent): void {
        if (event.kind === 'chunk' && event.text) {
            this.parts.push(event.text);
        }
    }

    get text(): string {
        return this.parts.join('');
    }

    reset(): void {
        this.parts = [];
    }
}

/**
 * Drain an event sequence and return the accumulated text.
 */
export async function collectText(events: AsyncIterable<StreamEvent>): Promise<string> {
    const accumulator = new TextAccumulator();
    for await (const event of events) {
        accumulator.push(event);
    }
    return accumulator.text;
}
