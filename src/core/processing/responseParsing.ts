// src/core/processing/responseParsing.ts

import { z } from 'zod';

export interface JudgeScore {
  index: number;
  score: number; // Integer in [0, 10]
  reason: string;
}

export type ScoreParseResult =
  | { ok: true; scores: JudgeScore[] }
  | { ok: false; stage: 'json' | 'shape'; error: string };

// Judges occasionally quote numbers ("8"); anything else is malformed
const numeric = z.union([
  z.number().finite(),
  z
    .string()
    .regex(/^\s*-?\d+(\.\d+)?\s*$/)
    .transform(Number),
]);

const ScoreEntrySchema = z.object({
  index: numeric.pipe(z.number().int().nonnegative()),
  score: numeric,
  reason: z.unknown().transform((value) => (typeof value === 'string' ? value : '')),
});

const ScoreArraySchema = z.array(ScoreEntrySchema);

/**
 * Remove a markdown code fence around the payload.
 * A ```json fence wins over a bare ``` fence; text outside the first fenced
 * block is discarded.
 */
export function stripCodeFence(text: string): string {
  if (text.includes('```json')) {
    return text.split('```json')[1].split('```')[0].trim();
  }
  if (text.includes('```')) {
    return text.split('```')[1].split('```')[0].trim();
  }
  return text;
}

/** First `[` through last `]`, or undefined when the text holds no array literal. */
export function extractArrayLiteral(text: string): string | undefined {
  const match = text.match(/\[[\s\S]*\]/);
  return match ? match[0] : undefined;
}

/** Clamp into 0..10. Fractional scores stay as given so 4.5 never reaches the threshold. */
export function clampScore(score: number): number {
  return Math.min(10, Math.max(0, score));
}

function tryParseJson(text: string): { ok: true; value: unknown } | { ok: false; error: string } {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch (error: unknown) {
    return { ok: false, error: error instanceof Error ? error.message : String(error) };
  }
}

/**
 * Recover the `[{ index, score, reason }]` array from a raw judge answer.
 *
 * Trim, strip code fences, parse. When that fails (or the text does not
 * open with `[`), scan for the outermost array literal and parse that.
 * Scores are rounded and clamped to [0, 10].
 */
export function parseScoreResponse(raw: string): ScoreParseResult {
  const cleaned = stripCodeFence(raw.trim());

  let parsedJson = cleaned.startsWith('[')
    ? tryParseJson(cleaned)
    : { ok: false as const, error: 'Response does not start with an array' };

  if (!parsedJson.ok) {
    const literal = extractArrayLiteral(cleaned);
    if (literal !== undefined && literal !== cleaned) {
      parsedJson = tryParseJson(literal);
    } else if (!cleaned.startsWith('[')) {
      parsedJson = tryParseJson(cleaned);
    }
  }

  if (!parsedJson.ok) {
    return { ok: false, stage: 'json', error: parsedJson.error };
  }

  const parsed = ScoreArraySchema.safeParse(parsedJson.value);
  if (!parsed.success) {
    return {
      ok: false,
      stage: 'shape',
      error: parsed.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`).join('; '),
    };
  }

  return {
    ok: true,
    scores: parsed.data.map((entry) => ({
      index: entry.index,
      score: clampScore(entry.score),
      reason: entry.reason,
    })),
  };
}

/**
 * Unwrap a summary answer: drop a code fence that wraps the whole text,
 * keep everything else verbatim (trimmed).
 */
export function unwrapSummary(raw: string): string {
  const text = raw.trim();
  const fenced = text.match(/^```[\w-]*[ \t]*\n?([\s\S]*?)\n?[ \t]*```$/);
  return fenced ? fenced[1].trim() : text;
}
