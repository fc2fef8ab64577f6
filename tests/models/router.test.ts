/**
 * Language Backend Tests
 */

import { describe, it, expect, vi } from 'vitest';
import { ModelRouter, OpenAICompatibleClient } from '../../src/models/router.js';
import { LanguageBackendError } from '../../src/errors.js';
import { FakeBackend } from '../helpers/fakes.js';

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

describe('OpenAICompatibleClient', () => {
  it('posts a chat completion and reads the reply', async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () =>
      jsonResponse({ choices: [{ message: { content: 'hi there' } }], usage: { prompt_tokens: 3, completion_tokens: 2 } })
    );
    const client = new OpenAICompatibleClient('http://llm.test/v1/', 'test-secret', fetchImpl);

    const result = await client.complete({ model: 'llama3', system: 'be brief', prompt: 'hello', maxTokens: 50, temperature: 0.5 });

    expect(result.text).toBe('hi there');
    expect(result.usage).toEqual({ inputTokens: 3, outputTokens: 2 });

    const [url, init] = fetchImpl.mock.calls[0];
    expect(url).toBe('http://llm.test/v1/chat/completions');
    expect(init?.headers).toMatchObject({ Authorization: 'Bearer test-secret' });
    expect(JSON.parse(String(init?.body))).toEqual({
      model: 'llama3',
      messages: [
        { role: 'system', content: 'be brief' },
        { role: 'user', content: 'hello' },
      ],
      max_tokens: 50,
      temperature: 0.5,
    });
  });

  it('estimates tokens when the server reports no usage', async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () => jsonResponse({ choices: [{ message: { content: 'hello' } }] }));
    const client = new OpenAICompatibleClient('http://llm.test/v1', '', fetchImpl);

    const result = await client.complete({ model: 'llama3', prompt: 'abcdefgh' });

    expect(result.usage).toEqual({ inputTokens: 2, outputTokens: 2 });
  });

  it('raises LanguageBackendError on an error status', async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () => new Response('overloaded', { status: 500 }));
    const client = new OpenAICompatibleClient('http://llm.test/v1', '', fetchImpl);

    const error = await client.complete({ model: 'llama3', prompt: 'x' }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(LanguageBackendError);
    expect(error).toMatchObject({ status: 500, message: 'LLM API error (500): overloaded' });
  });

  it('raises LanguageBackendError on a malformed body', async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () => jsonResponse({ choices: [] }));
    const client = new OpenAICompatibleClient('http://llm.test/v1', '', fetchImpl);

    await expect(client.complete({ model: 'llama3', prompt: 'x' })).rejects.toThrow(/^Malformed completion from llama3/);
  });

  it('raises LanguageBackendError when a 200 body is not JSON', async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () => new Response('<html>gateway</html>', { status: 200 }));
    const client = new OpenAICompatibleClient('http://llm.test/v1', '', fetchImpl);

    const error = await client.complete({ model: 'llama3', prompt: 'x' }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(LanguageBackendError);
    expect(error).toMatchObject({ message: expect.stringMatching(/^Malformed completion from llama3: /) });
    expect(error).not.toBeInstanceOf(SyntaxError);
  });
});

describe('ModelRouter', () => {
  const defaults = { temperature: 0.7, maxTokens: 256 };

  it('sends claude models to Anthropic only when configured', () => {
    expect(new ModelRouter(new FakeBackend(), new FakeBackend(), defaults).route('claude-3-haiku')).toBe('anthropic');
    expect(new ModelRouter(new FakeBackend(), null, defaults).route('claude-3-haiku')).toBe('local');
    expect(new ModelRouter(new FakeBackend(), new FakeBackend(), defaults).route('llama3')).toBe('local');
  });

  it('fills in defaults and tracks usage', async () => {
    const local = new FakeBackend(() => 'ok');
    const router = new ModelRouter(local, null, defaults);

    await router.complete({ model: 'llama3', prompt: 'a', purpose: 'post' });
    await router.complete({ model: 'llama3', prompt: 'b', temperature: 0.1 });

    expect(local.requests.map((r) => [r.temperature, r.maxTokens])).toEqual([
      [0.7, 256],
      [0.1, 256],
    ]);
    const usage = router.getCumulativeUsage();
    expect(usage).toMatchObject({ totalInputTokens: 2, totalOutputTokens: 2, callCount: 2, failedCount: 0 });
    expect(usage.byModel.llama3).toEqual({ inputTokens: 2, outputTokens: 2, callCount: 2 });
    expect(router.getCallLog().map((c) => c.purpose)).toEqual(['post', undefined]);
  });

  it('counts failures and rethrows without retrying', async () => {
    const failing = {
      calls: 0,
      async complete(): Promise<never> {
        this.calls++;
        throw new LanguageBackendError('model not loaded');
      },
    };
    const router = new ModelRouter(failing, null, defaults);

    await expect(router.complete({ model: 'llama3', prompt: 'a' })).rejects.toThrow('model not loaded');
    expect(failing.calls).toBe(1);
    expect(router.getCumulativeUsage().failedCount).toBe(1);
    expect(router.getCallLog()[0]).toMatchObject({ success: false, error: 'model not loaded' });
  });

  it('renders a usage summary', async () => {
    const router = new ModelRouter(new FakeBackend(), null, defaults);
    await router.complete({ model: 'llama3', prompt: 'a' });

    expect(router.getUsageSummary().split('\n')).toEqual([
      '=== Language Backend Usage ===',
      'Total Calls: 1 (0 failed)',
      'Total Tokens: 1 in / 1 out',
      '',
      'By Model:',
      '  llama3: 1 calls, 1/1 tokens',
    ]);
  });
});
