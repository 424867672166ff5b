import { z } from 'zod';

export interface VerdictConfig {
  /** Empty string means "not configured": the composer answers with a fallback. */
  apiKey: string;
  model: string;
  /** Generative Language API root, without trailing slash. */
  baseUrl: string;
  timeoutMs: number;
  temperature: number;
  topP: number;
  maxOutputTokens: {
    complete: number;
    stream: number;
  };
}

export const DEFAULT_VERDICT_CONFIG: VerdictConfig = {
  apiKey: '',
  model: 'gemini-2.5-flash',
  baseUrl: 'https://generativelanguage.googleapis.com/v1beta',
  timeoutMs: 60_000,
  temperature: 0.7,
  topP: 0.9,
  maxOutputTokens: {
    complete: 1000,
    stream: 500,
  },
};

const VerdictEnvSchema = z.object({
  GEMINI_API_KEY: z.string().trim().catch(''),
  GEMINI_MODEL: z.string().trim().min(1).optional().catch(undefined),
  GEMINI_TIMEOUT_MS: z.coerce.number().int().positive().optional().catch(undefined),
  GEMINI_BASE_URL: z.string().trim().url().optional().catch(undefined),
});

export type VerdictEnv = Readonly<Record<string, string | undefined>>;

/**
 * Build a config from environment-style variables. Invalid or missing values
 * fall back to the defaults rather than failing.
 */
export function loadVerdictConfig(env: VerdictEnv): VerdictConfig {
  const parsed = VerdictEnvSchema.parse(env);
  return {
    ...DEFAULT_VERDICT_CONFIG,
    apiKey: parsed.GEMINI_API_KEY,
    model: parsed.GEMINI_MODEL ?? DEFAULT_VERDICT_CONFIG.model,
    timeoutMs: parsed.GEMINI_TIMEOUT_MS ?? DEFAULT_VERDICT_CONFIG.timeoutMs,
    baseUrl: (parsed.GEMINI_BASE_URL ?? DEFAULT_VERDICT_CONFIG.baseUrl).replace(/\/+$/, ''),
  };
}
