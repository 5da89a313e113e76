/**
 * Async Channel - ordered, unbounded handoff between producer tasks and a
 * single cooperative reader.
 *
 * Producers never block: push() either hands the item to a suspended reader
 * or appends it to the buffer. Readers suspend in next() until an item
 * arrives, the channel closes, or their AbortSignal fires.
 */

export class ChannelClosedError extends Error {
    constructor() {
        super('Channel is closed');
        this.name = 'ChannelClosedError';
    }
}

interface Waiter<T> {
    resolve: (item: T) => void;
    reject: (reason: unknown) => void;
}

export class AsyncChannel<T> {
    private items: T[] = [];
    private waiters: Waiter<T>[] = [];
    private isClosed = false;

    get size(): number {
        return this.items.length;
    }

    get closed(): boolean {
        return this.isClosed;
    }

    /**
     * Enqueue an item. Returns false once the channel is closed.
     */
    push(item: T): boolean {
        if (this.isClosed) return false;

        const waiter = this.waiters.shift();
        if (waiter) {
            waiter.resolve(item);
        } else {
            this.items.push(item);
        }
        return true;
    }

    /**
     * Next item in FIFO order.
     */
    next(signal?: AbortSignal): Promise<T> {
        if (this.items.length > 0) {
            const item = this.items.shift();
            if (item !== undefined) return Promise.resolve(item);
        }
        if (this.isClosed) {
            return Promise.reject(new ChannelClosedError());
        }
        if (signal?.aborted) {
            return Promise.reject(signal.reason);
        }

        return new Promise<T>((resolve, reject) => {
            const onAbort = () => {
                this.waiters = this.waiters.filter((w) => w !== waiter);
                reject(signal?.reason);
            };
            const waiter: Waiter<T> = {
                resolve: (item) => {
                    signal?.removeEventListener('abort', onAbort);
                    resolve(item);
                },
                reject: (reason) => {
                    signal?.removeEventListener('abort', onAbort);
                    reject(reason);
                },
            };
            this.waiters.push(waiter);
            signal?.addEventListener('abort', onAbort, { once: true });
        });
    }

    /**
     * Stop accepting items. Buffered items stay readable; suspended readers
     * are released with ChannelClosedError.
     */
    close(): void {
        if (this.isClosed) return;
        this.isClosed = true;

        const waiters = this.waiters;
        this.waiters = [];
        for (const waiter of waiters) {
            waiter.reject(new ChannelClosedError());
        }
    }
}
