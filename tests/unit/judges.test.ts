// tests/unit/judges.test.ts

import { describe, it, expect, beforeAll, afterAll, afterEach } from 'vitest';
import nock from 'nock';
import { GeminiJudge } from '../../src/core/judge/GeminiJudge';
import { AnthropicJudge } from '../../src/core/judge/AnthropicJudge';
import { ResilientJudge } from '../../src/core/judge/ResilientJudge';
import { createJudge } from '../../src/core/judge/createJudge';
import { HttpCore } from '../../src/core/http/HttpCore';
import {
  ApiClientError,
  ApiServerError,
  JudgeResponseError,
  JudgeTimeoutError,
} from '../../src/utils/errors';
import { disabledMetrics, fakeJudge, silentLogger, testCrawlerDeps } from '../helpers';

const GEMINI = 'https://generativelanguage.googleapis.com';
const ANTHROPIC = 'https://api.anthropic.com';

beforeAll(() => {
  nock.disableNetConnect();
});

afterEach(() => {
  nock.cleanAll();
});

afterAll(() => {
  nock.enableNetConnect();
});

describe('GeminiJudge', () => {
  it('should send the prompt and join the text parts', async () => {
    let sentBody: unknown;
    nock(GEMINI, { reqheaders: { 'x-goog-api-key': 'test-secret' } })
      .post('/v1beta/models/gemini-2.0-flash-lite:generateContent', (body) => {
        sentBody = body;
        return true;
      })
      .reply(200, {
        candidates: [{ content: { parts: [{ text: 'Hello ' }, { text: 'world' }] }, finishReason: 'STOP' }],
      });

    const judge = new GeminiJudge(testCrawlerDeps().http, { provider: 'gemini', apiKey: 'test-secret' });

    await expect(judge.invoke('Score these')).resolves.toBe('Hello world');
    expect(sentBody).toEqual({
      contents: [{ role: 'user', parts: [{ text: 'Score these' }] }],
      generationConfig: { temperature: 0.1, maxOutputTokens: 4096 },
    });
  });

  it('should use the configured model', async () => {
    nock(GEMINI)
      .post('/v1beta/models/gemini-custom:generateContent')
      .reply(200, { candidates: [{ content: { parts: [{ text: 'ok' }] } }] });

    const judge = new GeminiJudge(testCrawlerDeps().http, {
      provider: 'gemini',
      apiKey: 'test-secret',
      model: 'gemini-custom',
    });

    await expect(judge.invoke('p')).resolves.toBe('ok');
  });

  it('should throw when no text comes back', async () => {
    nock(GEMINI)
      .post('/v1beta/models/gemini-2.0-flash-lite:generateContent')
      .reply(200, { candidates: [{ finishReason: 'SAFETY' }] });

    const judge = new GeminiJudge(testCrawlerDeps().http, { provider: 'gemini', apiKey: 'test-secret' });

    await expect(judge.invoke('p')).rejects.toBeInstanceOf(JudgeResponseError);
  });

  it('should surface a rejected key as a client error', async () => {
    nock(GEMINI)
      .post('/v1beta/models/gemini-2.0-flash-lite:generateContent')
      .reply(403, { error: { message: 'API key not valid' } });

    const judge = new GeminiJudge(testCrawlerDeps().http, { provider: 'gemini', apiKey: 'test-secret' });

    await expect(judge.invoke('p')).rejects.toBeInstanceOf(ApiClientError);
  });

  it('should leave retries to the caller', async () => {
    nock(GEMINI)
      .post('/v1beta/models/gemini-2.0-flash-lite:generateContent')
      .reply(503)
      .post('/v1beta/models/gemini-2.0-flash-lite:generateContent')
      .reply(200, { candidates: [{ content: { parts: [{ text: 'ok' }] } }] });

    const http = new HttpCore(
      {},
      { maxRetries: 3, baseDelay: 1, maxDelay: 1, retryableStatusCodes: [503] },
      disabledMetrics(),
      silentLogger()
    );
    const judge = new GeminiJudge(http, { provider: 'gemini', apiKey: 'test-secret' });

    await expect(judge.invoke('p')).rejects.toBeInstanceOf(ApiServerError);
    expect(nock.pendingMocks()).toHaveLength(1);
  });
});

describe('AnthropicJudge', () => {
  it('should send a Messages request and return the text blocks', async () => {
    let sentBody: unknown;
    nock(ANTHROPIC, {
      reqheaders: { 'x-api-key': 'test-secret', 'anthropic-version': '2023-06-01' },
    })
      .post('/v1/messages', (body) => {
        sentBody = body;
        return true;
      })
      .reply(200, {
        content: [
          { type: 'text', text: '[{"index": 0, ' },
          { type: 'text', text: '"score": 7}]' },
        ],
        stop_reason: 'end_turn',
      });

    const judge = new AnthropicJudge(testCrawlerDeps().http, {
      provider: 'anthropic',
      apiKey: 'test-secret',
      maxOutputTokens: 1024,
    });

    await expect(judge.invoke('Score these')).resolves.toBe('[{"index": 0, "score": 7}]');
    expect(sentBody).toEqual({
      model: 'claude-3-5-sonnet-20241022',
      max_tokens: 1024,
      temperature: 0.1,
      messages: [{ role: 'user', content: 'Score these' }],
    });
  });

  it('should throw on an unexpected response shape', async () => {
    nock(ANTHROPIC).post('/v1/messages').reply(200, { completion: 'old api' });

    const judge = new AnthropicJudge(testCrawlerDeps().http, { provider: 'anthropic', apiKey: 'test-secret' });

    await expect(judge.invoke('p')).rejects.toBeInstanceOf(JudgeResponseError);
  });

  it('should throw when only non-text blocks come back', async () => {
    nock(ANTHROPIC)
      .post('/v1/messages')
      .reply(200, { content: [{ type: 'tool_use' }], stop_reason: 'tool_use' });

    const judge = new AnthropicJudge(testCrawlerDeps().http, { provider: 'anthropic', apiKey: 'test-secret' });

    await expect(judge.invoke('p')).rejects.toThrow('Anthropic returned no text');
  });
});

describe('ResilientJudge', () => {
  function wrap(inner: ReturnType<typeof fakeJudge>, timeoutMs = 1000, maxRetries = 1) {
    return new ResilientJudge(inner, silentLogger(), disabledMetrics(), { timeoutMs, maxRetries });
  }

  it('should keep the inner judge name', () => {
    expect(wrap(fakeJudge()).name).toBe('fake');
  });

  it('should retry once after a failure', async () => {
    const inner = fakeJudge(new Error('flaky'), 'second time lucky');

    await expect(wrap(inner).invoke('p')).resolves.toBe('second time lucky');
    expect(inner.invoke).toHaveBeenCalledTimes(2);
  });

  it('should rethrow the last error when retries run out', async () => {
    const inner = fakeJudge(new Error('first'), new Error('second'));

    await expect(wrap(inner).invoke('p')).rejects.toThrow('second');
    expect(inner.invoke).toHaveBeenCalledTimes(2);
  });

  it('should not retry client errors', async () => {
    const inner = fakeJudge(new ApiClientError('Client error: 401', 401), 'never used');

    await expect(wrap(inner).invoke('p')).rejects.toBeInstanceOf(ApiClientError);
    expect(inner.invoke).toHaveBeenCalledTimes(1);
  });

  it('should time out a slow attempt', async () => {
    const inner = fakeJudge();
    inner.invoke.mockImplementation(() => new Promise<string>(() => undefined));

    await expect(wrap(inner, 20, 0).invoke('p')).rejects.toBeInstanceOf(JudgeTimeoutError);
  });

  it('should abort each attempt that times out', async () => {
    const inner = fakeJudge();
    const signals: AbortSignal[] = [];
    inner.invoke.mockImplementation((_prompt, options) => {
      if (options?.signal) signals.push(options.signal);
      return new Promise<string>(() => undefined);
    });

    await expect(wrap(inner, 20, 1).invoke('p')).rejects.toBeInstanceOf(JudgeTimeoutError);
    expect(signals).toHaveLength(2);
    expect(signals.map((signal) => signal.aborted)).toEqual([true, true]);
  });
});

describe('createJudge', () => {
  it('should return undefined without an api key', () => {
    const { http } = testCrawlerDeps();

    expect(createJudge(undefined, http, silentLogger(), disabledMetrics())).toBeUndefined();
    expect(
      createJudge({ provider: 'gemini', apiKey: '' }, http, silentLogger(), disabledMetrics())
    ).toBeUndefined();
  });

  it('should wrap the configured provider', () => {
    const { http } = testCrawlerDeps();

    const judge = createJudge(
      { provider: 'anthropic', apiKey: 'test-secret' },
      http,
      silentLogger(),
      disabledMetrics()
    );

    expect(judge).toBeInstanceOf(ResilientJudge);
    expect(judge?.name).toBe('anthropic');
  });
});
