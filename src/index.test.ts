/**
 * Public entry point: end-to-end through the package exports
 */

import { describe, it, expect } from 'vitest';
import {
  GeminiStreamClient,
  ReplayTransport,
  StreamError,
  TextAccumulator,
  buildStreamConfig,
  chunkEvent,
  completeEvent,
  createStreamConfig,
  errorEvent,
  stream,
  type StreamingTransport,
} from './index';

const request = { contents: [{ role: 'user' as const, parts: [{ text: 'Hi' }] }] };

describe('package exports', () => {
  it('should stream replayed chunks into an accumulator', async () => {
    const config = createStreamConfig({ apiKey: 'test-key', model: 'gemini-test', heartbeatIntervalMs: 0 });
    const accumulator = new TextAccumulator();

    for await (const event of stream(request, config, () => new ReplayTransport([chunkEvent('Hello'), chunkEvent(' there'), completeEvent()]))) {
      accumulator.push(event);
    }

    expect(accumulator.text).toBe('Hello there');
  });

  it('should surface StreamError from the client once retries run out', async () => {
    const config = createStreamConfig({
      apiKey: 'test-key',
      model: 'gemini-test',
      heartbeatIntervalMs: 0,
      maxRetries: 1,
      backoffBaseMs: 0,
    });
    const client = new GeminiStreamClient(config);
    const factory = (): StreamingTransport => new ReplayTransport([errorEvent('down')]);

    const consume = async () => {
      for await (const _event of client.stream(request, { transportFactory: factory })) {
        // nothing is yielded for failed attempts
      }
    };

    await expect(consume()).rejects.toBeInstanceOf(StreamError);
  });

  it('should build a config from the environment and packaged settings', () => {
    const config = buildStreamConfig({ GEMINI_API_KEY: 'test-key' });

    expect(config.model).toBe('gemini-1.5-pro');
    expect(config.requestTimeoutMs).toBe(45_000);
  });
});
