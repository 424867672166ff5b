import { describe, it, expect } from 'vitest';
import { DEFAULT_VERDICT_CONFIG, loadVerdictConfig } from '../verdictConfig';

describe('loadVerdictConfig', () => {
  it('empty environment → defaults with no key', () => {
    expect(loadVerdictConfig({})).toEqual(DEFAULT_VERDICT_CONFIG);
  });

  it('reads key, model, timeout and base URL', () => {
    const config = loadVerdictConfig({
      GEMINI_API_KEY: ' test-secret ',
      GEMINI_MODEL: 'gemini-2.0-flash',
      GEMINI_TIMEOUT_MS: '15000',
      GEMINI_BASE_URL: 'http://localhost:8080/v1beta//',
    });
    expect(config.apiKey).toBe('test-secret');
    expect(config.model).toBe('gemini-2.0-flash');
    expect(config.timeoutMs).toBe(15000);
    expect(config.baseUrl).toBe('http://localhost:8080/v1beta');
  });

  it('invalid values fall back to defaults', () => {
    const config = loadVerdictConfig({
      GEMINI_MODEL: '   ',
      GEMINI_TIMEOUT_MS: 'soon',
      GEMINI_BASE_URL: 'not a url',
    });
    expect(config.model).toBe('gemini-2.5-flash');
    expect(config.timeoutMs).toBe(60_000);
    expect(config.baseUrl).toBe('https://generativelanguage.googleapis.com/v1beta');
  });

  it('keeps generation settings fixed', () => {
    const config = loadVerdictConfig({ GEMINI_API_KEY: 'test-secret' });
    expect(config.temperature).toBe(0.7);
    expect(config.topP).toBe(0.9);
    expect(config.maxOutputTokens).toEqual({ complete: 1000, stream: 500 });
  });
});
