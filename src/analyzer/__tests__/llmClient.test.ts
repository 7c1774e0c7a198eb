import { describe, expect, it, vi } from 'vitest';
import { GenerationError } from '../../errors.js';
import { AnthropicLlmClient } from '../llmClient.js';
import type { AnthropicLlmOptions } from '../llmClient.js';

type FetchFn = NonNullable<AnthropicLlmOptions['fetch']>;

const BASE_URL = 'http://localhost:11434';

const MESSAGE = {
  id: 'msg_test',
  type: 'message',
  role: 'assistant',
  model: 'mistral-small',
  content: [
    { type: 'text', text: 'Hello ' },
    { type: 'text', text: 'world\n' },
  ],
  stop_reason: 'end_turn',
  stop_sequence: null,
  usage: { input_tokens: 3, output_tokens: 2 },
};

function jsonResponse(status: number, body: unknown): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'content-type': 'application/json' } });
}

function createClient(fetch: FetchFn, timeoutMs = 5000): AnthropicLlmClient {
  return new AnthropicLlmClient({
    baseURL: BASE_URL,
    apiKey: 'test-secret',
    model: 'mistral-small',
    timeoutMs,
    maxTokens: 512,
    fetch,
  });
}

async function failure(promise: Promise<unknown>): Promise<unknown> {
  return promise.then(
    () => {
      throw new Error('expected a rejection');
    },
    (e: unknown) => e,
  );
}

describe('AnthropicLlmClient', () => {
  it('posts a Messages request and joins the text blocks of the reply', async () => {
    const fetch = vi.fn<FetchFn>(async () => jsonResponse(200, MESSAGE));

    const text = await createClient(fetch).complete('Say hello', { temperature: 0.2 });

    expect(text).toBe('Hello world');
    expect(fetch).toHaveBeenCalledTimes(1);
    const [input, init] = fetch.mock.calls[0];
    expect(String(input)).toBe(`${BASE_URL}/v1/messages`);
    expect(JSON.parse(String(init?.body))).toMatchObject({
      model: 'mistral-small',
      max_tokens: 512,
      temperature: 0.2,
      messages: [{ role: 'user', content: 'Say hello' }],
    });
  });

  it('reports an unreachable server as a GenerationError without retrying', async () => {
    const fetch = vi.fn<FetchFn>(async () => {
      throw new TypeError('fetch failed');
    });

    const error = await failure(createClient(fetch).complete('Say hello'));

    expect(error).toBeInstanceOf(GenerationError);
    expect(error).toMatchObject({ message: `LLM server unreachable at ${BASE_URL}`, status: 502 });
    expect(fetch).toHaveBeenCalledTimes(1);
  });

  it('reports an error status from the server', async () => {
    const fetch = vi.fn<FetchFn>(async () =>
      jsonResponse(500, { type: 'error', error: { type: 'api_error', message: 'model not loaded' } }),
    );

    const error = await failure(createClient(fetch).complete('Say hello'));

    expect(error).toBeInstanceOf(GenerationError);
    expect(error).toMatchObject({ message: expect.stringMatching(/^LLM server answered 500: /) });
    expect(fetch).toHaveBeenCalledTimes(1);
  });

  it('reports a request that outlives the client timeout', async () => {
    const fetch = vi.fn<FetchFn>(
      (_input, init) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener('abort', () =>
            reject(Object.assign(new Error('This operation was aborted'), { name: 'AbortError' })),
          );
        }),
    );

    const error = await failure(createClient(fetch, 50).complete('Say hello'));

    expect(error).toBeInstanceOf(GenerationError);
    expect(error).toMatchObject({ message: 'LLM request timed out after 50ms' });
    expect(fetch).toHaveBeenCalledTimes(1);
  });
});
