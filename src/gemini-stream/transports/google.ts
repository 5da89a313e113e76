/**
 * Google Generative AI Transport
 *
 * Runs one backend attempt through the AI SDK (`streamText` over the Gemini
 * provider). enter() starts a dedicated producer task that owns the backend
 * call; the task hands every event to the consumer through an AsyncChannel
 * and always finishes with an end-of-attempt event. produce() only drains
 * that channel, so the consumer never touches the SDK stream directly.
 */

import { createGoogleGenerativeAI } from '@ai-sdk/google';
import type { LanguageModelV1 } from '@ai-sdk/provider';
import { jsonSchema, streamText, tool, type CoreMessage, type ToolSet } from 'ai';
import { createModuleLogger, type Logger } from '../../utils/logger';
import { settleWithin } from '../../utils/timers';
import { AsyncChannel, ChannelClosedError } from '../channel';
import { MAX_TIMER_DELAY_MS } from '../config';
import { chunkEvent, completeEvent, describeError, endOfAttemptEvent, errorEvent } from '../core';
import type {
    Content,
    GenerateRequest,
    StreamConfig,
    StreamEvent,
    StreamingTransport,
    ToolConfig,
    ToolDeclaration,
} from '../types';

export const DEFAULT_JOIN_TIMEOUT_MS = 100;

export type ModelFactory = (config: StreamConfig, request: GenerateRequest) => LanguageModelV1;

export interface GoogleTransportOptions {
    /** Builds the SDK model; defaults to the Gemini provider */
    modelFactory?: ModelFactory;
    /** How long exit() waits for the producer before abandoning it */
    joinTimeoutMs?: number;
    logger?: Logger;
}

export const createGeminiModel: ModelFactory = (config, request) => {
    const provider = createGoogleGenerativeAI({
        apiKey: config.apiKey,
        baseURL: config.endpoint,
        headers: config.headers ? { ...config.headers } : undefined,
    });
    return provider(config.model, {
        safetySettings: request.safetySettings ? [...request.safetySettings] : undefined,
    });
};

export class GoogleGenerativeAITransport implements StreamingTransport {
    readonly kind = 'google';

    private readonly modelFactory: ModelFactory;
    private readonly joinTimeoutMs: number;
    private readonly log: Logger;

    private channel?: AsyncChannel<StreamEvent>;
    private controller?: AbortController;
    private worker?: Promise<void>;
    private entered = false;
    private exited = false;

    constructor(
        private readonly config: StreamConfig,
        private readonly request: GenerateRequest,
        options: GoogleTransportOptions = {}
    ) {
        this.modelFactory = options.modelFactory ?? createGeminiModel;
        this.joinTimeoutMs = options.joinTimeoutMs ?? DEFAULT_JOIN_TIMEOUT_MS;
        this.log = (options.logger ?? createModuleLogger('gemini-transport')).child({
            endpoint: config.endpoint,
        });
    }

    async enter(): Promise<void> {
        if (this.entered) {
            throw new Error('Transport already entered');
        }
        this.entered = true;

        assertEndpointUrl(this.config.endpoint);
        const model = this.modelFactory(this.config, this.request);

        this.channel = new AsyncChannel<StreamEvent>();
        this.controller = new AbortController();
        this.worker = this.runStream(model, this.channel, this.controller.signal);
    }

    async *produce(): AsyncGenerator<StreamEvent, void, undefined> {
        const channel = this.channel;
        if (!channel) {
            throw new Error('Transport not entered');
        }

        while (true) {
            let event: StreamEvent;
            try {
                event = await channel.next();
            } catch (error) {
                if (error instanceof ChannelClosedError) {
                    yield endOfAttemptEvent();
                    return;
                }
                throw error;
            }

            yield event;
            if (event.kind === 'end-of-attempt') return;
        }
    }

    async exit(): Promise<void> {
        if (this.exited) return;
        this.exited = true;

        this.controller?.abort();

        const worker = this.worker;
        this.worker = undefined;
        if (worker) {
            const finished = await settleWithin([worker], this.joinTimeoutMs);
            if (!finished) {
                this.log.warn({ joinTimeoutMs: this.joinTimeoutMs }, 'Abandoning unresponsive backend call');
            }
        }

        this.channel?.close();
    }

    /**
     * Producer task. Never rejects: failures become an error event and the
     * end-of-attempt sentinel is pushed on every path.
     */
    private async runStream(model: LanguageModelV1, channel: AsyncChannel<StreamEvent>, signal: AbortSignal): Promise<void> {
        const timeoutMs = Math.min(this.request.timeoutMs ?? this.config.requestTimeoutMs, MAX_TIMER_DELAY_MS);
        const generation = this.request.generationConfig ?? {};

        try {
            const result = streamText({
                model,
                system: this.request.systemInstruction,
                messages: this.request.contents.map(toCoreMessage),
                tools: toToolSet(this.request.tools),
                toolChoice: toToolChoice(this.request.toolConfig),
                temperature: generation.temperature,
                topP: generation.topP,
                topK: generation.topK,
                maxTokens: generation.maxOutputTokens,
                stopSequences: generation.stopSequences ? [...generation.stopSequences] : undefined,
                presencePenalty: generation.presencePenalty,
                frequencyPenalty: generation.frequencyPenalty,
                seed: generation.seed,
                maxRetries: 0,
                abortSignal: AbortSignal.any([signal, AbortSignal.timeout(timeoutMs)]),
                onError: ({ error }) => {
                    this.log.debug({ error: describeError(error) }, 'Backend reported stream error');
                },
            });

            for await (const part of result.fullStream) {
                switch (part.type) {
                    case 'text-delta':
                        channel.push(chunkEvent(part.textDelta, part));
                        break;
                    case 'tool-call':
                        channel.push(chunkEvent('', part));
                        break;
                    case 'error':
                        throw part.error;
                    default:
                        break;
                }
            }

            channel.push(completeEvent());
        } catch (error) {
            const message = describeError(error);
            if (signal.aborted) {
                this.log.debug({ error: message }, 'Backend call aborted');
            } else {
                this.log.error({ err: error }, 'Gemini transport error');
            }
            channel.push(errorEvent(message, error));
        } finally {
            channel.push(endOfAttemptEvent());
        }
    }
}

function assertEndpointUrl(endpoint: string): void {
    if (!URL.canParse(endpoint)) {
        throw new Error(`Invalid Gemini endpoint: ${endpoint}`);
    }
}

function toCoreMessage(content: Content): CoreMessage {
    const text = content.parts.map((part) => part.text ?? '').join('');
    return content.role === 'model' ? { role: 'assistant', content: text } : { role: 'user', content: text };
}

function toToolSet(tools: readonly ToolDeclaration[] | undefined): ToolSet | undefined {
    if (!tools || tools.length === 0) return undefined;

    const toolSet: ToolSet = {};
    for (const declaration of tools.flatMap((t) => t.functionDeclarations)) {
        toolSet[declaration.name] = tool({
            description: declaration.description,
            parameters: jsonSchema(declaration.parameters ?? { type: 'object', properties: {} }),
        });
    }
    return toolSet;
}

function toToolChoice(toolConfig: ToolConfig | undefined): 'auto' | 'required' | 'none' | undefined {
    switch (toolConfig?.functionCallingConfig?.mode) {
        case 'AUTO':
            return 'auto';
        case 'ANY':
            return 'required';
        case 'NONE':
            return 'none';
        default:
            return undefined;
    }
}
