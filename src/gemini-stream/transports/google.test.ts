/**
 * Google Generative AI Transport Tests
 *
 * Runs the real AI SDK streamText path against an in-process fake model.
 */

import { describe, it, expect } from 'vitest';
import type { LanguageModelV1, LanguageModelV1CallOptions, LanguageModelV1StreamPart } from '@ai-sdk/provider';
import { createStreamConfig } from '../config';
import { GoogleGenerativeAITransport } from './google';
import type { GenerateRequest, StreamConfig, StreamEvent } from '../types';

const config: StreamConfig = createStreamConfig({
    apiKey: 'test-key',
    model: 'gemini-test',
    endpoint: 'https://gemini.test/v1beta',
});

const request: GenerateRequest = {
    contents: [
        { role: 'user', parts: [{ text: 'Hi' }] },
        { role: 'model', parts: [{ text: 'Hello!' }] },
        { role: 'user', parts: [{ text: 'Tell me more' }] },
    ],
    systemInstruction: 'Be brief',
    generationConfig: { temperature: 0.2, maxOutputTokens: 64 },
};

const finish: LanguageModelV1StreamPart = {
    type: 'finish',
    finishReason: 'stop',
    usage: { promptTokens: 3, completionTokens: 2 },
};

interface FakeModel {
    model: LanguageModelV1;
    calls: LanguageModelV1CallOptions[];
}

/**
 * Fake model whose stream emits `parts`. When `hang` is set the stream never
 * closes, or closes after `closeAfterMs`; `honourAbort` makes it fail once the
 * call's abort signal fires.
 */
function createFakeModel(
    parts: LanguageModelV1StreamPart[] | Error,
    behaviour: { hang?: boolean; honourAbort?: boolean; closeAfterMs?: number } = {}
): FakeModel {
    const calls: LanguageModelV1CallOptions[] = [];
    const model: LanguageModelV1 = {
        specificationVersion: 'v1',
        provider: 'fake',
        modelId: 'gemini-test',
        defaultObjectGenerationMode: undefined,
        doGenerate: async () => {
            throw new Error('doGenerate is not used by the transport');
        },
        doStream: async (options) => {
            calls.push(options);
            if (parts instanceof Error) {
                throw parts;
            }
            return {
                stream: new ReadableStream<LanguageModelV1StreamPart>({
                    start(controller) {
                        for (const part of parts) {
                            controller.enqueue(part);
                        }
                        if (!behaviour.hang) {
                            controller.close();
                            return;
                        }
                        if (behaviour.honourAbort) {
                            options.abortSignal?.addEventListener('abort', () => {
                                controller.error(new Error('backend call aborted'));
                            });
                        }
                        if (behaviour.closeAfterMs !== undefined) {
                            setTimeout(() => {
                                if (!options.abortSignal?.aborted) controller.close();
                            }, behaviour.closeAfterMs);
                        }
                    },
                }),
                rawCall: { rawPrompt: null, rawSettings: {} },
            };
        },
    };
    return { model, calls };
}

async function drain(transport: GoogleGenerativeAITransport): Promise<StreamEvent[]> {
    const events: StreamEvent[] = [];
    for await (const event of transport.produce()) {
        events.push(event);
    }
    return events;
}

describe('GoogleGenerativeAITransport', () => {
    it('should turn text deltas into chunks followed by complete and end-of-attempt', async () => {
        const fake = createFakeModel([
            { type: 'text-delta', textDelta: 'Hel' },
            { type: 'text-delta', textDelta: 'lo' },
            finish,
        ]);
        const transport = new GoogleGenerativeAITransport(config, request, { modelFactory: () => fake.model });

        await transport.enter();
        const events = await drain(transport);
        await transport.exit();

        expect(events.map((e) => e.kind)).toEqual(['chunk', 'chunk', 'complete', 'end-of-attempt']);
        expect(events.flatMap((e) => (e.kind === 'chunk' ? [e.text] : []))).toEqual(['Hel', 'lo']);
        expect(events[0]).toMatchObject({ raw: { type: 'text-delta', textDelta: 'Hel' } });
    });

    it('should pass the request through to the model call', async () => {
        const fake = createFakeModel([finish]);
        const transport = new GoogleGenerativeAITransport(config, request, { modelFactory: () => fake.model });

        await transport.enter();
        await drain(transport);
        await transport.exit();

        expect(fake.calls).toHaveLength(1);
        const [call] = fake.calls;
        expect(call.temperature).toBe(0.2);
        expect(call.maxTokens).toBe(64);
        expect(call.prompt).toMatchObject([
            { role: 'system', content: 'Be brief' },
            { role: 'user', content: [{ type: 'text', text: 'Hi' }] },
            { role: 'assistant', content: [{ type: 'text', text: 'Hello!' }] },
            { role: 'user', content: [{ type: 'text', text: 'Tell me more' }] },
        ]);
    });

    it('should hand the selected endpoint config to the model factory', async () => {
        const fake = createFakeModel([finish]);
        const seen: string[] = [];
        const transport = new GoogleGenerativeAITransport(config, request, {
            modelFactory: (modelConfig) => {
                seen.push(modelConfig.endpoint);
                return fake.model;
            },
        });

        await transport.enter();
        await drain(transport);
        await transport.exit();

        expect(seen).toEqual(['https://gemini.test/v1beta']);
    });

    it('should report a rejected backend call as an error event', async () => {
        const fake = createFakeModel(new Error('backend unavailable'));
        const transport = new GoogleGenerativeAITransport(config, request, { modelFactory: () => fake.model });

        await transport.enter();
        const events = await drain(transport);
        await transport.exit();

        expect(events.map((e) => e.kind)).toEqual(['error', 'end-of-attempt']);
        expect(events[0]).toMatchObject({ kind: 'error', message: 'backend unavailable' });
    });

    it('should stop at a streamed error, keeping earlier chunks', async () => {
        const fake = createFakeModel([
            { type: 'text-delta', textDelta: 'partial' },
            { type: 'error', error: new Error('quota exceeded') },
        ]);
        const transport = new GoogleGenerativeAITransport(config, request, { modelFactory: () => fake.model });

        await transport.enter();
        const events = await drain(transport);
        await transport.exit();

        expect(events.map((e) => e.kind)).toEqual(['chunk', 'error', 'end-of-attempt']);
        expect(events[1]).toMatchObject({ kind: 'error', message: 'quota exceeded' });
    });

    it('should fail the request once the per-request timeout elapses', async () => {
        const fake = createFakeModel([], { hang: true, honourAbort: true });
        const transport = new GoogleGenerativeAITransport(
            config,
            { ...request, timeoutMs: 20 },
            { modelFactory: () => fake.model }
        );

        await transport.enter();
        const events = await drain(transport);
        await transport.exit();

        expect(events.map((e) => e.kind)).toEqual(['error', 'end-of-attempt']);
    });

    it('should cap a per-request timeout at the Node timer limit', async () => {
        const fake = createFakeModel([{ type: 'text-delta', textDelta: 'slow' }, finish], {
            hang: true,
            honourAbort: true,
            closeAfterMs: 30,
        });
        const transport = new GoogleGenerativeAITransport(
            config,
            { ...request, timeoutMs: 3e9 },
            { modelFactory: () => fake.model }
        );

        await transport.enter();
        const events = await drain(transport);
        await transport.exit();

        expect(events.map((e) => e.kind)).toEqual(['chunk', 'complete', 'end-of-attempt']);
    });

    it('should reject entry for a malformed endpoint', async () => {
        const fake = createFakeModel([finish]);
        const transport = new GoogleGenerativeAITransport({ ...config, endpoint: 'not a url' }, request, {
            modelFactory: () => fake.model,
        });

        await expect(transport.enter()).rejects.toThrow('Invalid Gemini endpoint: not a url');
        await transport.exit();
        expect(fake.calls).toHaveLength(0);
    });

    it('should refuse to produce before enter and to enter twice', async () => {
        const fake = createFakeModel([finish]);
        const transport = new GoogleGenerativeAITransport(config, request, { modelFactory: () => fake.model });

        await expect(drain(transport)).rejects.toThrow('Transport not entered');

        await transport.enter();
        await expect(transport.enter()).rejects.toThrow('Transport already entered');
        await drain(transport);
        await transport.exit();
    });

    it('should abort an in-flight call on exit', async () => {
        const fake = createFakeModel([{ type: 'text-delta', textDelta: 'stuck' }], { hang: true, honourAbort: true });
        const transport = new GoogleGenerativeAITransport(config, request, { modelFactory: () => fake.model });

        await transport.enter();
        const first = await transport.produce()[Symbol.asyncIterator]().next();
        expect(first.value).toMatchObject({ kind: 'chunk', text: 'stuck' });

        await transport.exit();

        expect(fake.calls[0].abortSignal?.aborted).toBe(true);
    });

    it('should abandon a backend call that ignores abort after the join timeout', async () => {
        const fake = createFakeModel([], { hang: true });
        const transport = new GoogleGenerativeAITransport(config, request, {
            modelFactory: () => fake.model,
            joinTimeoutMs: 20,
        });

        await transport.enter();
        const startedAt = Date.now();
        await transport.exit();
        await transport.exit();

        expect(Date.now() - startedAt).toBeLessThan(1_000);
    });
});
