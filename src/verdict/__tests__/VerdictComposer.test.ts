import { describe, it, expect, vi } from 'vitest';
import {
  STREAM_ERRORS,
  VERDICT_FALLBACKS,
  VerdictComposer,
  toSseFrame,
  toWordFragments,
  type FetchLike,
  type VerdictStreamEvent,
} from '../VerdictComposer';
import { DEFAULT_VERDICT_CONFIG, type VerdictConfig } from '../verdictConfig';
import { silentLogger } from '../logger';
import { runIntakeAssessment, toPipelineOutput } from '../../engine/Engine';

const intake = { businessInfo: 'Bakery', interestAreas: 'solar' };
const output = toPipelineOutput(runIntakeAssessment('other', intake));

const config: VerdictConfig = { ...DEFAULT_VERDICT_CONFIG, apiKey: 'test-secret' };

function geminiBody(text: string) {
  return { candidates: [{ content: { parts: [{ text }] } }] };
}

function respondWith(body: string, status = 200) {
  return vi.fn<FetchLike>(async () => new Response(body, { status }));
}

/** Never settles until the request is aborted. */
const hangingFetch: FetchLike = (_input, init) =>
  new Promise((_resolve, reject) => {
    init.signal?.addEventListener('abort', () => reject(new DOMException('The operation was aborted.', 'AbortError')));
  });

async function collect(events: AsyncIterable<VerdictStreamEvent>): Promise<VerdictStreamEvent[]> {
  const out: VerdictStreamEvent[] = [];
  for await (const event of events) out.push(event);
  return out;
}

describe('VerdictComposer.compose', () => {
  it('returns the trimmed first candidate text', async () => {
    const fetchMock = respondWith(JSON.stringify(geminiBody('  Strong start.  ')));
    const composer = new VerdictComposer(config, { fetch: fetchMock, logger: silentLogger });

    await expect(composer.compose(output, intake)).resolves.toBe('Strong start.');
  });

  it('posts the prompt to generateContent with the key in a header', async () => {
    const fetchMock = respondWith(JSON.stringify(geminiBody('ok')));
    const composer = new VerdictComposer(config, { fetch: fetchMock, logger: silentLogger });
    await composer.compose(output, intake);

    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(fetchMock).toHaveBeenCalledWith(
      'https://generativelanguage.googleapis.com/v1beta/models/gemini-2.5-flash:generateContent',
      expect.objectContaining({
        method: 'POST',
        headers: { 'Content-Type': 'application/json', 'x-goog-api-key': 'test-secret' },
      }),
    );
    const init = fetchMock.mock.lastCall?.[1];
    const payload: unknown = JSON.parse(String(init?.body));
    expect(payload).toMatchObject({
      contents: [{ role: 'user' }],
      generationConfig: { temperature: 0.7, maxOutputTokens: 1000, topP: 0.9 },
    });
  });

  it('missing key → fallback without calling the API', async () => {
    const fetchMock = respondWith('{}');
    const composer = new VerdictComposer({ ...config, apiKey: '' }, { fetch: fetchMock, logger: silentLogger });

    expect(composer.isConfigured).toBe(false);
    await expect(composer.compose(output, intake)).resolves.toBe(VERDICT_FALLBACKS.missingKey);
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('non-2xx → status fallback', async () => {
    const composer = new VerdictComposer(config, { fetch: respondWith('quota exceeded', 429), logger: silentLogger });
    await expect(composer.compose(output, intake)).resolves.toBe('⚠️ AI service temporarily unavailable (Error 429)');
  });

  it('timeout → timeout fallback', async () => {
    const composer = new VerdictComposer({ ...config, timeoutMs: 10 }, { fetch: hangingFetch, logger: silentLogger });
    await expect(composer.compose(output, intake)).resolves.toBe(VERDICT_FALLBACKS.timeout);
  });

  it('body that is not JSON → unparseable fallback', async () => {
    const composer = new VerdictComposer(config, { fetch: respondWith('<html>'), logger: silentLogger });
    await expect(composer.compose(output, intake)).resolves.toBe('Unable to generate verdict.');
  });

  it('JSON without candidate text → unparseable fallback', async () => {
    const composer = new VerdictComposer(config, { fetch: respondWith('{"candidates":[]}'), logger: silentLogger });
    await expect(composer.compose(output, intake)).resolves.toBe(VERDICT_FALLBACKS.unparseable);
  });

  it('network error → generic fallback', async () => {
    const failing = vi.fn<FetchLike>(async () => {
      throw new TypeError('fetch failed');
    });
    const composer = new VerdictComposer(config, { fetch: failing, logger: silentLogger });
    await expect(composer.compose(output, intake)).resolves.toBe(VERDICT_FALLBACKS.failed);
  });

  it('logs failures through the injected logger', async () => {
    const logger = { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
    const composer = new VerdictComposer(config, { fetch: respondWith('oops', 500), logger });
    await composer.compose(output, intake);
    expect(logger.error).toHaveBeenCalledTimes(1);
  });
});

describe('VerdictComposer.stream', () => {
  it('emits word fragments for every chunk, then done', async () => {
    const body = JSON.stringify([geminiBody('Good progress'), geminiBody(' so far.')]);
    const fetchMock = respondWith(body);
    const composer = new VerdictComposer(config, { fetch: fetchMock, logger: silentLogger });

    const events = await collect(composer.stream(output, intake));
    expect(events).toEqual([
      { type: 'text', text: 'Good' },
      { type: 'text', text: ' progress' },
      { type: 'text', text: '' },
      { type: 'text', text: ' so' },
      { type: 'text', text: ' far.' },
      { type: 'done' },
    ]);
    expect(fetchMock.mock.lastCall?.[0]).toBe(
      'https://generativelanguage.googleapis.com/v1beta/models/gemini-2.5-flash:streamGenerateContent',
    );
    const payload: unknown = JSON.parse(String(fetchMock.mock.lastCall?.[1].body));
    expect(payload).toMatchObject({ generationConfig: { maxOutputTokens: 500 } });
  });

  it('accepts a single response object', async () => {
    const composer = new VerdictComposer(config, { fetch: respondWith(JSON.stringify(geminiBody('Well done'))), logger: silentLogger });
    const events = await collect(composer.stream(output, intake));
    expect(events).toEqual([
      { type: 'text', text: 'Well' },
      { type: 'text', text: ' done' },
      { type: 'done' },
    ]);
  });

  it('missing key → fallback text, then done', async () => {
    const composer = new VerdictComposer({ ...config, apiKey: '' }, { fetch: respondWith('{}'), logger: silentLogger });
    const events = await collect(composer.stream(output, intake));
    expect(events).toEqual([{ type: 'text', text: VERDICT_FALLBACKS.missingKey }, { type: 'done' }]);
  });

  it('non-2xx → one error event, then done', async () => {
    const composer = new VerdictComposer(config, { fetch: respondWith('bad gateway', 502), logger: silentLogger });
    const events = await collect(composer.stream(output, intake));
    expect(events).toEqual([{ type: 'error', error: 'API Error 502' }, { type: 'done' }]);
  });

  it('timeout → one error event, then done', async () => {
    const composer = new VerdictComposer({ ...config, timeoutMs: 10 }, { fetch: hangingFetch, logger: silentLogger });
    const events = await collect(composer.stream(output, intake));
    expect(events).toEqual([{ type: 'error', error: STREAM_ERRORS.timeout }, { type: 'done' }]);
  });

  it('unexpected body → parse error event, then done', async () => {
    const composer = new VerdictComposer(config, { fetch: respondWith('"just a string"'), logger: silentLogger });
    const events = await collect(composer.stream(output, intake));
    expect(events).toEqual([{ type: 'error', error: 'Failed to parse API response' }, { type: 'done' }]);
  });

  it('network error → generation error event, then done', async () => {
    const failing = vi.fn<FetchLike>(async () => {
      throw new TypeError('fetch failed');
    });
    const composer = new VerdictComposer(config, { fetch: failing, logger: silentLogger });
    const events = await collect(composer.stream(output, intake));
    expect(events).toEqual([{ type: 'error', error: STREAM_ERRORS.failed }, { type: 'done' }]);
  });
});

describe('toWordFragments', () => {
  it('re-joins to the original text', () => {
    const text = 'Your business  shows promise.';
    expect(toWordFragments(text)).toEqual(['Your', ' business', ' ', ' shows', ' promise.']);
    expect(toWordFragments(text).join('')).toBe(text);
  });
});

describe('toSseFrame', () => {
  it('frames text, error and done events', () => {
    expect(toSseFrame({ type: 'text', text: 'Hi "there"' })).toBe('data: {"text":"Hi \\"there\\""}\n\n');
    expect(toSseFrame({ type: 'error', error: 'API Error 500' })).toBe('data: {"error":"API Error 500"}\n\n');
    expect(toSseFrame({ type: 'done' })).toBe('data: [DONE]\n\n');
  });
});
