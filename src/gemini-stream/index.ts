/**
 * Gemini Stream Module - Public API
 *
 * Resilient streaming over the Gemini backend:
 * - Retry with capped exponential backoff
 * - Fail-over across configured endpoints
 * - Heartbeats while an attempt is in flight
 */

// Types
export type {
    StreamConfig,
    StreamConfigInput,
    Content,
    ContentPart,
    FunctionDeclaration,
    ToolDeclaration,
    ToolConfig,
    GenerationConfig,
    SafetySetting,
    HarmCategory,
    HarmBlockThreshold,
    GenerateRequest,
    StreamEventKind,
    ChunkEvent,
    HeartbeatEvent,
    CompleteEvent,
    ErrorEvent,
    EndOfAttemptEvent,
    StreamEvent,
    VisibleStreamEvent,
    TransportKind,
    StreamingTransport,
    TransportFactory,
} from './types';

// Core (Pure Functions)
export {
    chunkEvent,
    heartbeatEvent,
    completeEvent,
    errorEvent,
    endOfAttemptEvent,
    isTerminalEvent,
    listEndpoints,
    selectEndpoint,
    withEndpoint,
    computeBackoffDelay,
    extractChunkText,
    describeError,
} from './core';

// Config
export {
    createStreamConfig,
    StreamConfigSchema,
    DEFAULT_STREAM_CONFIG,
    DEFAULT_ENDPOINT,
    MAX_TIMER_DELAY_MS,
} from './config';

// Accumulation
export { TextAccumulator, collectText } from './accumulator';

// Channel
export { AsyncChannel, ChannelClosedError } from './channel';

// Errors
export { StreamError } from './errors';

// Transports
export {
    GoogleGenerativeAITransport,
    ReplayTransport,
    FailingTransport,
    createGeminiModel,
    DEFAULT_JOIN_TIMEOUT_MS,
} from './transports';
export type { GoogleTransportOptions, ModelFactory, ReplayTransportOptions } from './transports';

// Orchestrator
export { GeminiStreamClient, stream } from './client';
export type { GeminiStreamClientOptions, StreamOptions, StreamCallOptions } from './client';
