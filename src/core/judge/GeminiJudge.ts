// src/core/judge/GeminiJudge.ts

import { z } from 'zod';
import type { HttpCore } from '../http/HttpCore';
import { DEFAULT_MODELS, type JudgeCallOptions, type JudgeConfig, type JudgeOracle } from './types';
import { JudgeResponseError } from '../../utils/errors';

const GenerateContentResponseSchema = z.object({
  candidates: z
    .array(
      z.object({
        content: z
          .object({
            parts: z.array(z.object({ text: z.string().optional() })).optional(),
          })
          .optional(),
        finishReason: z.string().optional(),
      })
    )
    .optional(),
});

/**
 * Judge backed by the Gemini `generateContent` REST endpoint
 */
export class GeminiJudge implements JudgeOracle {
  readonly name = 'gemini';
  private model: string;

  constructor(
    private http: HttpCore,
    private config: JudgeConfig
  ) {
    this.model = config.model ?? DEFAULT_MODELS.gemini;
  }

  async invoke(prompt: string, options: JudgeCallOptions = {}): Promise<string> {
    const response = await this.http.post<unknown>(
      `https://generativelanguage.googleapis.com/v1beta/models/${this.model}:generateContent`,
      {
        contents: [{ role: 'user', parts: [{ text: prompt }] }],
        generationConfig: {
          temperature: this.config.temperature ?? 0.1,
          maxOutputTokens: this.config.maxOutputTokens ?? 4096,
        },
      },
      {
        target: this.name,
        headers: {
          'Content-Type': 'application/json',
          'x-goog-api-key': this.config.apiKey,
        },
        // Retries belong to ResilientJudge
        maxRetries: 0,
        signal: options.signal,
      }
    );

    const parsed = GenerateContentResponseSchema.safeParse(response.data);
    const candidate = parsed.success ? parsed.data.candidates?.[0] : undefined;
    const text = (candidate?.content?.parts ?? []).map((p) => p.text ?? '').join('');

    if (!text) {
      throw new JudgeResponseError('Gemini returned no text', {
        model: this.model,
        finishReason: candidate?.finishReason,
      });
    }

    return text;
  }
}
