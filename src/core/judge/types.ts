// src/core/judge/types.ts

/**
 * Text-in/text-out language-model call used to score and summarize results.
 * Treated as unreliable: it may throw, be slow, or answer with malformed text.
 */
export interface JudgeOracle {
  readonly name: string;

  invoke(prompt: string, options?: JudgeCallOptions): Promise<string>;
}

export interface JudgeCallOptions {
  /** Aborted when the caller gives up on the attempt */
  signal?: AbortSignal;
}

export type JudgeProvider = 'gemini' | 'anthropic';

export interface JudgeConfig {
  provider: JudgeProvider;
  apiKey: string;
  model?: string;
  temperature?: number;
  maxOutputTokens?: number;
  timeoutMs?: number; // Per attempt
  maxRetries?: number; // Retries after the first attempt
}

export const DEFAULT_MODELS: Record<JudgeProvider, string> = {
  gemini: 'gemini-2.0-flash-lite',
  anthropic: 'claude-3-5-sonnet-20241022',
};
