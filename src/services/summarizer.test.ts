import { describe, expect, it } from 'vitest';
import { buildSummaryMessages, LlmSummarizer, MAX_SUMMARY_INPUT_CHARS } from './summarizer.js';

const SETTINGS = { apiKey: 'test-secret', baseUrl: 'https://llm.example.com/v1/', model: 'test-model' };

interface Call {
  url: string;
  init: RequestInit | undefined;
}

function fakeFetch(respond: () => Response | Promise<Response>): { fetchFn: typeof fetch; calls: Call[] } {
  const calls: Call[] = [];
  const fetchFn: typeof fetch = async (input, init) => {
    calls.push({ url: String(input), init });
    return respond();
  };
  return { fetchFn, calls };
}

function completion(content: string): Response {
  return new Response(JSON.stringify({ choices: [{ message: { content } }] }), { status: 200 });
}

describe('buildSummaryMessages', () => {
  it('truncates long content', () => {
    const messages = buildSummaryMessages({ title: 'Long read', text: 'x'.repeat(MAX_SUMMARY_INPUT_CHARS + 2000) });

    expect(messages).toHaveLength(2);
    expect(messages[0]?.role).toBe('system');
    expect(messages[1]?.content).toBe(`Title: Long read\n\nContent:\n${'x'.repeat(MAX_SUMMARY_INPUT_CHARS)}`);
  });

  it('honours a smaller limit', () => {
    const [, user] = buildSummaryMessages({ title: 'T', text: 'abcdef', maxChars: 3 });
    expect(user?.content).toBe('Title: T\n\nContent:\nabc');
  });
});

describe('LlmSummarizer', () => {
  it('posts to the chat completions endpoint', async () => {
    const { fetchFn, calls } = fakeFetch(() => completion('  - one\n- two  '));
    const summarizer = new LlmSummarizer(SETTINGS, fetchFn);

    const result = await summarizer.summarize({ title: 'Hello', text: 'Body' });

    expect(result).toEqual({ ok: true, text: '- one\n- two', model: 'test-model' });
    expect(calls).toHaveLength(1);
    expect(calls[0]?.url).toBe('https://llm.example.com/v1/chat/completions');
    expect(new Headers(calls[0]?.init?.headers).get('Authorization')).toBe('Bearer test-secret');

    const body: unknown = JSON.parse(String(calls[0]?.init?.body));
    expect(body).toMatchObject({ model: 'test-model', temperature: 0.3 });
  });

  it('does not call out without an API key', async () => {
    const { fetchFn, calls } = fakeFetch(() => completion('- x'));
    const summarizer = new LlmSummarizer({ ...SETTINGS, apiKey: null }, fetchFn);

    expect(await summarizer.summarize({ title: 'T', text: 'B' })).toEqual({
      ok: false,
      kind: 'not-configured',
      message: 'LLM_API_KEY is not set',
    });
    expect(calls).toEqual([]);
  });

  it.each([
    [401, 'auth'],
    [403, 'auth'],
    [429, 'rate-limit'],
    [503, 'network'],
    [400, 'invalid-response'],
  ] as const)('maps HTTP %i to %s', async (status, kind) => {
    const { fetchFn } = fakeFetch(() => new Response('nope', { status }));
    const result = await new LlmSummarizer(SETTINGS, fetchFn).summarize({ title: 'T', text: 'B' });

    expect(result).toEqual({ ok: false, kind, message: `HTTP ${status}: nope` });
  });

  it('rejects an empty completion', async () => {
    const { fetchFn } = fakeFetch(() => completion('   '));
    const result = await new LlmSummarizer(SETTINGS, fetchFn).summarize({ title: 'T', text: 'B' });

    expect(result).toEqual({ ok: false, kind: 'invalid-response', message: 'Empty completion' });
  });

  it('reports malformed JSON as an invalid response', async () => {
    const { fetchFn } = fakeFetch(() => new Response('{not json', { status: 200 }));
    const result = await new LlmSummarizer(SETTINGS, fetchFn).summarize({ title: 'T', text: 'B' });

    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.kind).toBe('invalid-response');
  });

  it('reports transport failures as network errors', async () => {
    const { fetchFn } = fakeFetch(() => Promise.reject(new TypeError('fetch failed')));
    const result = await new LlmSummarizer(SETTINGS, fetchFn).summarize({ title: 'T', text: 'B' });

    expect(result).toEqual({ ok: false, kind: 'network', message: 'fetch failed' });
  });
});
