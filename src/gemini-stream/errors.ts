/**
 * Raised by stream() once the retry budget is exhausted. The only error the
 * public streaming operation raises apart from cancellation.
 */
export class StreamError extends Error {
    /** Attempts made, including the initial one */
    readonly attempts: number;
    /** Message of the last attempt's failure */
    readonly lastErrorMessage: string;

    constructor(lastErrorMessage: string, attempts: number, options?: { cause?: unknown }) {
        super(`Exceeded maximum Gemini streaming retries after ${attempts} attempts: ${lastErrorMessage}`, options);
        this.name = 'StreamError';
        this.attempts = attempts;
        this.lastErrorMessage = lastErrorMessage;
    }
}
