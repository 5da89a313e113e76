export {
    GoogleGenerativeAITransport,
    createGeminiModel,
    DEFAULT_JOIN_TIMEOUT_MS,
} from './google';
export type { GoogleTransportOptions, ModelFactory } from './google';
export { ReplayTransport } from './replay';
export type { ReplayTransportOptions } from './replay';
export { FailingTransport } from './failing';
