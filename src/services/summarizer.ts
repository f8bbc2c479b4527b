import { errorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

export const MAX_SUMMARY_INPUT_CHARS = 10000;
const REQUEST_TIMEOUT_MS = 120000;

export type SummarizerErrorKind = 'auth' | 'rate-limit' | 'network' | 'invalid-response' | 'not-configured';

export interface SummarizeRequest {
  title: string;
  text: string;
  maxChars?: number;
}

export type SummarizeResult =
  | { ok: true; text: string; model: string }
  | { ok: false; kind: SummarizerErrorKind; message: string };

export interface Summarizer {
  summarize(request: SummarizeRequest): Promise<SummarizeResult>;
}

export interface LlmSettings {
  apiKey: string | null;
  baseUrl: string;
  model: string;
}

interface ChatMessage {
  role: 'user' | 'assistant' | 'system';
  content: string;
}

interface ChatResponse {
  id?: string;
  choices?: { message?: { content?: string }; finish_reason?: string }[];
  usage?: { prompt_tokens: number; completion_tokens: number; total_tokens: number };
}

const SYSTEM_PROMPT = `You summarize news articles for a feed reader.
Reply with 3 to 6 short bullet points, one per line, each starting with "- ".
Cover the key facts, main arguments and conclusions. No preamble.`;

const log = logger.scope('llm');

export function buildSummaryMessages(request: SummarizeRequest): ChatMessage[] {
  const limit = request.maxChars ?? MAX_SUMMARY_INPUT_CHARS;
  const content = request.text.length > limit ? request.text.slice(0, limit) : request.text;
  return [
    { role: 'system', content: SYSTEM_PROMPT },
    { role: 'user', content: `Title: ${request.title}\n\nContent:\n${content}` },
  ];
}

function classifyStatus(status: number): SummarizerErrorKind {
  if (status === 401 || status === 403) return 'auth';
  if (status === 429) return 'rate-limit';
  return status >= 500 ? 'network' : 'invalid-response';
}

/** Summarizer backed by an OpenAI-compatible `/chat/completions` endpoint. */
export class LlmSummarizer implements Summarizer {
  constructor(
    private readonly settings: LlmSettings,
    private readonly fetchFn: typeof fetch = fetch
  ) {}

  async summarize(request: SummarizeRequest): Promise<SummarizeResult> {
    const { apiKey, baseUrl, model } = this.settings;
    if (!apiKey) {
      return { ok: false, kind: 'not-configured', message: 'LLM_API_KEY is not set' };
    }

    const url = `${baseUrl.replace(/\/+$/, '')}/chat/completions`;
    log.debug(`Calling ${url} with model ${model}`);

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), REQUEST_TIMEOUT_MS);

    try {
      const response = await this.fetchFn(url, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          'Authorization': `Bearer ${apiKey}`,
        },
        body: JSON.stringify({
          model,
          messages: buildSummaryMessages(request),
          temperature: 0.3,
        }),
        signal: controller.signal,
      });

      if (!response.ok) {
        const errorText = await response.text();
        return { ok: false, kind: classifyStatus(response.status), message: `HTTP ${response.status}: ${errorText}` };
      }

      const data = (await response.json()) as ChatResponse;
      log.debug(`Response received, tokens: ${data.usage?.total_tokens ?? 'unknown'}`);

      const text = data.choices?.[0]?.message?.content?.trim();
      if (!text) {
        return { ok: false, kind: 'invalid-response', message: 'Empty completion' };
      }
      return { ok: true, text, model };
    } catch (error) {
      if (error instanceof Error && error.name === 'AbortError') {
        return { ok: false, kind: 'network', message: `Request timeout after ${REQUEST_TIMEOUT_MS / 1000}s` };
      }
      if (error instanceof SyntaxError) {
        return { ok: false, kind: 'invalid-response', message: error.message };
      }
      return { ok: false, kind: 'network', message: errorMessage(error) };
    } finally {
      clearTimeout(timeout);
    }
  }
}
