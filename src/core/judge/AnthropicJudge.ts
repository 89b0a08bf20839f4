// src/core/judge/AnthropicJudge.ts

import { z } from 'zod';
import type { HttpCore } from '../http/HttpCore';
import { DEFAULT_MODELS, type JudgeCallOptions, type JudgeConfig, type JudgeOracle } from './types';
import { JudgeResponseError } from '../../utils/errors';

const MessagesResponseSchema = z.object({
  content: z.array(z.object({ type: z.string(), text: z.string().optional() })),
  stop_reason: z.string().nullable().optional(),
});

/**
 * Judge backed by the Anthropic Messages API
 */
export class AnthropicJudge implements JudgeOracle {
  readonly name = 'anthropic';
  private model: string;

  constructor(
    private http: HttpCore,
    private config: JudgeConfig
  ) {
    this.model = config.model ?? DEFAULT_MODELS.anthropic;
  }

  async invoke(prompt: string, options: JudgeCallOptions = {}): Promise<string> {
    const response = await this.http.post<unknown>(
      'https://api.anthropic.com/v1/messages',
      {
        model: this.model,
        max_tokens: this.config.maxOutputTokens ?? 4096,
        temperature: this.config.temperature ?? 0.1,
        messages: [{ role: 'user', content: prompt }],
      },
      {
        target: this.name,
        headers: {
          'Content-Type': 'application/json',
          'x-api-key': this.config.apiKey,
          'anthropic-version': '2023-06-01',
        },
        // Retries belong to ResilientJudge
        maxRetries: 0,
        signal: options.signal,
      }
    );

    const parsed = MessagesResponseSchema.safeParse(response.data);
    if (!parsed.success) {
      throw new JudgeResponseError('Unexpected Messages API response shape', { model: this.model });
    }

    const text = parsed.data.content
      .filter((block) => block.type === 'text')
      .map((block) => block.text ?? '')
      .join('');

    if (!text) {
      throw new JudgeResponseError('Anthropic returned no text', {
        model: this.model,
        stopReason: parsed.data.stop_reason,
      });
    }

    return text;
  }
}
