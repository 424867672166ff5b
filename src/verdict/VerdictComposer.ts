/**
 * VerdictComposer
 *
 * Turns an assessment into a natural-language verdict through the Gemini
 * Generative Language API. The scoring pipeline never waits on this call
 * failing: every failure mode (no key, timeout, non-2xx, unreadable body,
 * network error) is answered with a fixed fallback text or a stream error
 * event, never a rejected promise.
 */

import { z } from 'zod';
import type { RawIntake } from '../contracts/AssessmentInputV1';
import type { PipelineOutputV1 } from '../contracts/AssessmentOutputV1';
import { createLogger, type Logger } from './logger';
import type { VerdictConfig } from './verdictConfig';
import { buildVerdictPrompt } from './verdictPrompts';

export const VERDICT_FALLBACKS = {
  missingKey: '⚠️ AI verdict unavailable. Please configure GEMINI_API_KEY.',
  timeout: '⚠️ AI service timed out. Please try again.',
  unparseable: 'Unable to generate verdict.',
  failed: '⚠️ An error occurred while generating the verdict.',
  httpError: (status: number) => `⚠️ AI service temporarily unavailable (Error ${status})`,
} as const;

export const STREAM_ERRORS = {
  timeout: 'Request timed out',
  unparseable: 'Failed to parse API response',
  failed: 'Generation failed',
  httpError: (status: number) => `API Error ${status}`,
} as const;

export type VerdictStreamEvent =
  | { type: 'text'; text: string }
  | { type: 'error'; error: string }
  | { type: 'done' };

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

export interface VerdictComposerDeps {
  fetch?: FetchLike;
  logger?: Logger;
}

// ─── Gemini payload shapes ────────────────────────────────────────────────────

const GeminiResponseSchema = z.object({
  candidates: z.array(z.object({
    content: z.object({
      parts: z.array(z.object({ text: z.string().optional() })).optional(),
    }).optional(),
  })).optional(),
});

const GeminiStreamBodySchema = z.union([z.array(GeminiResponseSchema), GeminiResponseSchema]);

type GeminiResponse = z.infer<typeof GeminiResponseSchema>;

function firstPartText(response: GeminiResponse): string | undefined {
  return response.candidates?.[0]?.content?.parts?.[0]?.text;
}

/** Split into word-sized fragments that re-join to the original text. */
export function toWordFragments(text: string): string[] {
  return text.split(' ').map((word, i) => (i === 0 ? word : ` ${word}`));
}

/** Server-Sent Events framing for a stream event. */
export function toSseFrame(event: VerdictStreamEvent): string {
  switch (event.type) {
    case 'text':
      return `data: ${JSON.stringify({ text: event.text })}\n\n`;
    case 'error':
      return `data: ${JSON.stringify({ error: event.error })}\n\n`;
    case 'done':
      return 'data: [DONE]\n\n';
  }
}

class HttpStatusError extends Error {
  constructor(readonly status: number, readonly body: string) {
    super(`Gemini API error: ${status}`);
    this.name = 'HttpStatusError';
  }
}

type Outcome<T> =
  | { ok: true; value: T }
  | { ok: false; reason: 'timeout' | 'http' | 'unparseable' | 'failed'; status?: number };

export class VerdictComposer {
  private readonly fetchImpl: FetchLike;
  private readonly logger: Logger;

  constructor(private readonly config: VerdictConfig, deps: VerdictComposerDeps = {}) {
    this.fetchImpl = deps.fetch ?? ((input, init) => fetch(input, init));
    this.logger = deps.logger ?? createLogger('Verdict');
  }

  get isConfigured(): boolean {
    return this.config.apiKey !== '';
  }

  /** Complete verdict text, or a fallback message. Never rejects. */
  async compose(output: PipelineOutputV1, intake: RawIntake): Promise<string> {
    if (!this.isConfigured) return VERDICT_FALLBACKS.missingKey;

    const outcome = await this.request('generateContent', output, intake, this.config.maxOutputTokens.complete);
    if (!outcome.ok) {
      switch (outcome.reason) {
        case 'timeout':
          return VERDICT_FALLBACKS.timeout;
        case 'http':
          return VERDICT_FALLBACKS.httpError(outcome.status ?? 0);
        case 'unparseable':
          return VERDICT_FALLBACKS.unparseable;
        case 'failed':
          return VERDICT_FALLBACKS.failed;
      }
    }

    const parsed = GeminiResponseSchema.safeParse(outcome.value);
    const text = parsed.success ? firstPartText(parsed.data)?.trim() : undefined;
    if (!text) {
      this.logger.warn('Response carried no candidate text');
      return VERDICT_FALLBACKS.unparseable;
    }
    return text;
  }

  /**
   * Incremental verdict: word-sized `text` events, then exactly one `done`.
   * Failures surface as a single `error` event before `done`.
   */
  async *stream(output: PipelineOutputV1, intake: RawIntake): AsyncGenerator<VerdictStreamEvent, void, undefined> {
    if (!this.isConfigured) {
      yield { type: 'text', text: VERDICT_FALLBACKS.missingKey };
      yield { type: 'done' };
      return;
    }

    const outcome = await this.request('streamGenerateContent', output, intake, this.config.maxOutputTokens.stream);
    if (!outcome.ok) {
      yield { type: 'error', error: streamErrorFor(outcome) };
      yield { type: 'done' };
      return;
    }

    const parsed = GeminiStreamBodySchema.safeParse(outcome.value);
    if (!parsed.success) {
      this.logger.warn('Stream body did not match the expected shape', { issues: parsed.error.issues.length });
      yield { type: 'error', error: STREAM_ERRORS.unparseable };
      yield { type: 'done' };
      return;
    }

    const chunks = Array.isArray(parsed.data) ? parsed.data : [parsed.data];
    for (const chunk of chunks) {
      const text = firstPartText(chunk);
      if (!text) continue;
      for (const fragment of toWordFragments(text)) {
        yield { type: 'text', text: fragment };
      }
    }
    yield { type: 'done' };
  }

  /** POST one request and return the decoded JSON body. The timeout covers the body read. */
  private async request(
    method: 'generateContent' | 'streamGenerateContent',
    output: PipelineOutputV1,
    intake: RawIntake,
    maxOutputTokens: number,
  ): Promise<Outcome<unknown>> {
    const { baseUrl, model, apiKey, timeoutMs, temperature, topP } = this.config;
    const url = `${baseUrl}/models/${model}:${method}`;
    const payload = {
      contents: [
        {
          role: 'user',
          parts: [{ text: buildVerdictPrompt(output, intake) }],
        },
      ],
      generationConfig: { temperature, maxOutputTokens, topP },
    };

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

    try {
      const response = await this.fetchImpl(url, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          'x-goog-api-key': apiKey,
        },
        body: JSON.stringify(payload),
        signal: controller.signal,
      });

      const body = await response.text();
      if (!response.ok) throw new HttpStatusError(response.status, body);

      try {
        return { ok: true, value: JSON.parse(body) };
      } catch (error) {
        this.logger.warn('Response body is not JSON', { method, error: String(error) });
        return { ok: false, reason: 'unparseable' };
      }
    } catch (error) {
      if (controller.signal.aborted) {
        this.logger.warn('Request timed out', { method, timeoutMs });
        return { ok: false, reason: 'timeout' };
      }
      if (error instanceof HttpStatusError) {
        this.logger.error(error.message, { method, body: error.body.slice(0, 500) });
        return { ok: false, reason: 'http', status: error.status };
      }
      this.logger.error('Request failed', { method, error: String(error) });
      return { ok: false, reason: 'failed' };
    } finally {
      clearTimeout(timeoutId);
    }
  }
}

function streamErrorFor(outcome: Extract<Outcome<unknown>, { ok: false }>): string {
  switch (outcome.reason) {
    case 'timeout':
      return STREAM_ERRORS.timeout;
    case 'http':
      return STREAM_ERRORS.httpError(outcome.status ?? 0);
    case 'unparseable':
      return STREAM_ERRORS.unparseable;
    case 'failed':
      return STREAM_ERRORS.failed;
  }
}
