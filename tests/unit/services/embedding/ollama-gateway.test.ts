/**
 * Unit tests for OllamaGateway against a stubbed fetch
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { OllamaGateway, collectChatFragments } from '../../../../src/services/embedding/ollama-gateway.js';
import {
  GENERAL_SYSTEM_PROMPT,
  GROUNDED_SYSTEM_PROMPT,
} from '../../../../src/services/embedding/gateway-interface.js';
import {
  EmptyResultError,
  UpstreamTimeoutError,
  UpstreamUnavailableError,
} from '../../../../src/lib/errors.js';
import type { GatewayConfig } from '../../../../src/lib/env-config.js';

const config: GatewayConfig = {
  baseUrl: 'http://ollama.test',
  embedModel: 'embed-model',
  chatModel: 'chat-model',
  embedTimeoutMs: 1000,
  generateTimeoutMs: 2000,
  healthTimeoutMs: 500,
  stream: false,
  retryAttempts: 1,
};

describe('OllamaGateway', () => {
  const fetchMock = vi.fn<typeof fetch>();

  function requestBody(call = 0): unknown {
    const init = fetchMock.mock.calls[call]?.[1];
    return JSON.parse(String(init?.body));
  }

  beforeEach(() => {
    fetchMock.mockReset();
    vi.stubGlobal('fetch', fetchMock);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  describe('embed', () => {
    it('should post the text and return the first vector', async () => {
      fetchMock.mockResolvedValue(new Response(JSON.stringify({ embeddings: [[0.1, 0.2, 0.3]] })));

      const result = await new OllamaGateway(config).embed('hello');

      expect(result._unsafeUnwrap()).toEqual([0.1, 0.2, 0.3]);
      expect(fetchMock.mock.calls[0]?.[0]).toBe('http://ollama.test/api/embed');
      expect(fetchMock.mock.calls[0]?.[1]?.method).toBe('POST');
      expect(requestBody()).toEqual({ model: 'embed-model', input: 'hello' });
    });

    it('should fail with EmptyResultError when no vector comes back', async () => {
      fetchMock.mockResolvedValueOnce(new Response(JSON.stringify({ embeddings: [] })));
      fetchMock.mockResolvedValueOnce(new Response(JSON.stringify({ embeddings: [[]] })));
      const gateway = new OllamaGateway(config);

      expect((await gateway.embed('a'))._unsafeUnwrapErr()).toBeInstanceOf(EmptyResultError);
      expect((await gateway.embed('b'))._unsafeUnwrapErr()).toBeInstanceOf(EmptyResultError);
    });

    it('should fail with UpstreamUnavailableError on a malformed body', async () => {
      fetchMock.mockResolvedValue(new Response('not json'));

      const error = (await new OllamaGateway(config).embed('hello'))._unsafeUnwrapErr();

      expect(error).toBeInstanceOf(UpstreamUnavailableError);
      expect(error.message).toBe('Malformed embedding response');
      expect(error.details).toBe('not json');
    });

    it('should carry the HTTP status and body of an error response', async () => {
      fetchMock.mockResolvedValue(new Response('model not found', { status: 404 }));

      const error = (await new OllamaGateway(config).embed('hello'))._unsafeUnwrapErr();

      expect(error).toBeInstanceOf(UpstreamUnavailableError);
      expect(error.message).toBe('Backend answered embed with HTTP 404');
      expect(error.details).toBe('model not found');
      expect(error instanceof UpstreamUnavailableError && error.httpStatus).toBe(404);
    });

    it('should classify an aborted request as a timeout', async () => {
      fetchMock.mockRejectedValue(new DOMException('The operation was aborted due to timeout', 'TimeoutError'));

      const error = (await new OllamaGateway(config).embed('hello'))._unsafeUnwrapErr();

      expect(error).toBeInstanceOf(UpstreamTimeoutError);
      expect(error.details).toBe('Request exceeded 1000ms');
      expect(error.status).toBe(504);
    });

    it('should classify a connection failure as unavailable', async () => {
      fetchMock.mockRejectedValue(new TypeError('fetch failed'));

      const error = (await new OllamaGateway(config).embed('hello'))._unsafeUnwrapErr();

      expect(error).toBeInstanceOf(UpstreamUnavailableError);
      expect(error.message).toBe('Backend unreachable at http://ollama.test');
      expect(error.details).toBe('fetch failed');
    });

    it('should retry a retryable failure when attempts allow', async () => {
      fetchMock.mockRejectedValueOnce(new TypeError('fetch failed'));
      fetchMock.mockResolvedValueOnce(new Response(JSON.stringify({ embeddings: [[1, 0]] })));

      const result = await new OllamaGateway({ ...config, retryAttempts: 2 }).embed('hello');

      expect(result._unsafeUnwrap()).toEqual([1, 0]);
      expect(fetchMock).toHaveBeenCalledTimes(2);
    });

    it('should not retry an empty result', async () => {
      fetchMock.mockResolvedValue(new Response(JSON.stringify({ embeddings: [] })));

      await new OllamaGateway({ ...config, retryAttempts: 3 }).embed('hello');

      expect(fetchMock).toHaveBeenCalledTimes(1);
    });
  });

  describe('generate', () => {
    it('should concatenate streamed fragments and skip malformed lines', async () => {
      const body = [
        JSON.stringify({ message: { role: 'assistant', content: 'Hel' }, done: false }),
        'not json',
        JSON.stringify({ message: { role: 'assistant', content: 'lo' }, done: true }),
        '',
      ].join('\n');
      fetchMock.mockResolvedValue(new Response(body));

      const result = await new OllamaGateway(config).generate('Say hello');

      expect(result._unsafeUnwrap()).toBe('Hello');
      expect(fetchMock.mock.calls[0]?.[0]).toBe('http://ollama.test/api/chat');
      expect(requestBody()).toEqual({
        model: 'chat-model',
        messages: [
          { role: 'system', content: GENERAL_SYSTEM_PROMPT },
          { role: 'user', content: 'Say hello' },
        ],
        stream: false,
      });
    });

    it('should put the context into the system prompt', async () => {
      fetchMock.mockResolvedValue(new Response(JSON.stringify({ message: { content: 'ok' } })));

      await new OllamaGateway(config).generate('Why?', 'Source: a\nSimilarity: 90.0%\nText: b');

      expect(requestBody()).toMatchObject({
        messages: [
          { role: 'system', content: `${GROUNDED_SYSTEM_PROMPT}Source: a\nSimilarity: 90.0%\nText: b` },
          { role: 'user', content: 'Why?' },
        ],
      });
    });

    it('should fail with EmptyResultError when no line parses', async () => {
      fetchMock.mockResolvedValue(new Response('garbage\n{"done":true}\n'));

      const error = (await new OllamaGateway(config).generate('Anything?'))._unsafeUnwrapErr();

      expect(error).toBeInstanceOf(EmptyResultError);
      expect(error.details).toBe('2 malformed line(s)');
    });
  });

  describe('isAvailable', () => {
    it('should probe the tags endpoint', async () => {
      fetchMock.mockResolvedValue(new Response('{"models":[]}'));

      expect(await new OllamaGateway(config).isAvailable()).toBe(true);
      expect(fetchMock.mock.calls[0]?.[0]).toBe('http://ollama.test/api/tags');
    });

    it('should resolve false when the backend is down', async () => {
      fetchMock.mockRejectedValue(new TypeError('fetch failed'));

      expect(await new OllamaGateway(config).isAvailable()).toBe(false);
    });

    it('should give up after the health timeout, not the embed timeout', async () => {
      fetchMock.mockImplementation(
        (_url, init) =>
          new Promise<Response>((_resolve, reject) => {
            const signal = init?.signal;
            signal?.addEventListener('abort', () => reject(signal.reason));
          })
      );
      const gateway = new OllamaGateway({ ...config, embedTimeoutMs: 60_000, healthTimeoutMs: 20 });

      const started = performance.now();
      const available = await gateway.isAvailable();

      expect(available).toBe(false);
      expect(performance.now() - started).toBeLessThan(5_000);
    });
  });
});

describe('collectChatFragments', () => {
  it('should count valid and skipped lines', () => {
    expect(collectChatFragments('{"message":{"content":"a"}}\n\n[1]\n{"message":{"content":"b"}}')).toEqual({
      content: 'ab',
      valid: 2,
      skipped: 1,
    });
  });
});
