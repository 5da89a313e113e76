/**
 * Gemini Stream Types
 *
 * Contract between the stream orchestrator, the transports that run one
 * backend attempt each, and the callers consuming the merged event sequence.
 */

import type { JSONSchema7 } from 'json-schema';

// ============================================================================
// Configuration
// ============================================================================

/**
 * Immutable configuration shared by every attempt of a streaming call.
 * Durations are milliseconds.
 */
export interface StreamConfig {
    readonly apiKey: string;
    /** Model identifier (e.g. "gemini-1.5-flash") */
    readonly model: string;
    /** Primary endpoint (base URL for the backend SDK) */
    readonly endpoint: string;
    /** Walked in order on retries, after the primary */
    readonly fallbackEndpoints: readonly string[];
    readonly requestTimeoutMs: number;
    /** 0 disables heartbeats */
    readonly heartbeatIntervalMs: number;
    readonly maxRetries: number;
    readonly backoffBaseMs: number;
    readonly backoffMaxMs: number;
    /** Extra headers forwarded to the backend client */
    readonly headers?: Readonly<Record<string, string>>;
}

export type StreamConfigInput = Pick<StreamConfig, 'apiKey' | 'model'> &
    Partial<Omit<StreamConfig, 'apiKey' | 'model'>>;

// ============================================================================
// Request
// ============================================================================

export interface ContentPart {
    readonly text?: string;
}

export interface Content {
    readonly role: 'user' | 'model';
    readonly parts: readonly ContentPart[];
}

export interface FunctionDeclaration {
    readonly name: string;
    readonly description?: string;
    readonly parameters?: JSONSchema7;
}

export interface ToolDeclaration {
    readonly functionDeclarations: readonly FunctionDeclaration[];
}

export interface ToolConfig {
    readonly functionCallingConfig?: {
        readonly mode?: 'AUTO' | 'ANY' | 'NONE';
    };
}

export interface GenerationConfig {
    readonly temperature?: number;
    readonly topP?: number;
    readonly topK?: number;
    readonly maxOutputTokens?: number;
    readonly stopSequences?: readonly string[];
    readonly presencePenalty?: number;
    readonly frequencyPenalty?: number;
    readonly seed?: number;
}

export type HarmCategory =
    | 'HARM_CATEGORY_HATE_SPEECH'
    | 'HARM_CATEGORY_DANGEROUS_CONTENT'
    | 'HARM_CATEGORY_HARASSMENT'
    | 'HARM_CATEGORY_SEXUALLY_EXPLICIT'
    | 'HARM_CATEGORY_CIVIC_INTEGRITY';

export type HarmBlockThreshold =
    | 'HARM_BLOCK_THRESHOLD_UNSPECIFIED'
    | 'BLOCK_LOW_AND_ABOVE'
    | 'BLOCK_MEDIUM_AND_ABOVE'
    | 'BLOCK_ONLY_HIGH'
    | 'BLOCK_NONE'
    | 'OFF';

export interface SafetySetting {
    readonly category: HarmCategory;
    readonly threshold: HarmBlockThreshold;
}

/**
 * One generation request. Never mutated after construction.
 */
export interface GenerateRequest {
    readonly contents: readonly Content[];
    readonly systemInstruction?: string;
    readonly tools?: readonly ToolDeclaration[];
    readonly toolConfig?: ToolConfig;
    readonly generationConfig?: GenerationConfig;
    readonly safetySettings?: readonly SafetySetting[];
    /** Overrides StreamConfig.requestTimeoutMs for this request */
    readonly timeoutMs?: number;
}

// ============================================================================
// Events
// ============================================================================

export type StreamEventKind = 'chunk' | 'heartbeat' | 'complete' | 'error' | 'end-of-attempt';

interface EventBase {
    /** Unix timestamp in milliseconds */
    readonly timestamp: number;
}

export interface ChunkEvent extends EventBase {
    readonly kind: 'chunk';
    readonly text: string;
    /** Backend payload the text was taken from */
    readonly raw?: unknown;
}

export interface HeartbeatEvent extends EventBase {
    readonly kind: 'heartbeat';
}

export interface CompleteEvent extends EventBase {
    readonly kind: 'complete';
}

export interface ErrorEvent extends EventBase {
    readonly kind: 'error';
    readonly message: string;
    /** Underlying failure, when the event was raised from a thrown error */
    readonly cause?: unknown;
}

/** Closes one attempt's sequence. Never surfaced to callers. */
export interface EndOfAttemptEvent extends EventBase {
    readonly kind: 'end-of-attempt';
}

export type StreamEvent = ChunkEvent | HeartbeatEvent | CompleteEvent | ErrorEvent | EndOfAttemptEvent;

/** Events a caller of stream() can observe. */
export type VisibleStreamEvent = ChunkEvent | HeartbeatEvent | CompleteEvent;

// ============================================================================
// Transport
// ============================================================================

export type TransportKind = 'google' | 'replay' | 'failing';

/**
 * One backend attempt: enter -> produce -> exit.
 */
export interface StreamingTransport {
    readonly kind: TransportKind;
    /** Acquire the attempt's resources. May reject (e.g. endpoint rejected). */
    enter(): Promise<void>;
    /** Lazy, finite sequence terminated by an end-of-attempt event */
    produce(): AsyncIterable<StreamEvent>;
    /** Release resources. Safe after a partial or failed enter(). */
    exit(): Promise<void>;
}

export type TransportFactory = (config: StreamConfig, request: GenerateRequest) => StreamingTransport;
