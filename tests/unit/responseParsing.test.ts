// tests/unit/responseParsing.test.ts

import { describe, it, expect } from 'vitest';
import {
  parseScoreResponse,
  stripCodeFence,
  extractArrayLiteral,
  clampScore,
  unwrapSummary,
} from '../../src/core/processing/responseParsing';

describe('parseScoreResponse', () => {
  it('should parse a bare JSON array', () => {
    const result = parseScoreResponse('[{"index": 0, "score": 8, "reason": "good match"}]');

    expect(result).toEqual({
      ok: true,
      scores: [{ index: 0, score: 8, reason: 'good match' }],
    });
  });

  it('should strip a json code fence', () => {
    const result = parseScoreResponse('```json\n[{"index": 1, "score": 6}]\n```');

    expect(result).toEqual({ ok: true, scores: [{ index: 1, score: 6, reason: '' }] });
  });

  it('should strip a bare code fence', () => {
    const result = parseScoreResponse('```\n[{"index": 2, "score": 5, "reason": "ok"}]\n```');

    expect(result).toEqual({ ok: true, scores: [{ index: 2, score: 5, reason: 'ok' }] });
  });

  it('should find the array inside surrounding prose', () => {
    const result = parseScoreResponse(
      'Here are the scores:\n[{"index": 0, "score": 9, "reason": "x"}]\nHope this helps!'
    );

    expect(result).toEqual({ ok: true, scores: [{ index: 0, score: 9, reason: 'x' }] });
  });

  it('should recover an array followed by trailing text', () => {
    const result = parseScoreResponse('[{"index": 0, "score": 7}] (scores are approximate)');

    expect(result).toEqual({ ok: true, scores: [{ index: 0, score: 7, reason: '' }] });
  });

  it('should accept numbers sent as strings', () => {
    const result = parseScoreResponse('[{"index": "2", "score": "7.6", "reason": "quoted"}]');

    expect(result).toEqual({ ok: true, scores: [{ index: 2, score: 7.6, reason: 'quoted' }] });
  });

  it('should clamp scores into 0-10', () => {
    const result = parseScoreResponse('[{"index": 0, "score": 14}, {"index": 1, "score": -3}]');

    expect(result).toEqual({
      ok: true,
      scores: [
        { index: 0, score: 10, reason: '' },
        { index: 1, score: 0, reason: '' },
      ],
    });
  });

  it('should replace a non-string reason with an empty string', () => {
    const result = parseScoreResponse('[{"index": 0, "score": 6, "reason": null}]');

    expect(result).toEqual({ ok: true, scores: [{ index: 0, score: 6, reason: '' }] });
  });

  it('should accept an empty array', () => {
    expect(parseScoreResponse('[]')).toEqual({ ok: true, scores: [] });
  });

  it('should fail at the json stage for prose without an array', () => {
    const result = parseScoreResponse('I cannot score these results.');

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.stage).toBe('json');
    }
  });

  it('should fail at the json stage for a truncated array', () => {
    const result = parseScoreResponse('[{"index": 0, "score": 8');

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.stage).toBe('json');
    }
  });

  it('should fail at the shape stage for an object', () => {
    const result = parseScoreResponse('{"index": 0, "score": 8}');

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.stage).toBe('shape');
    }
  });

  it('should fail at the shape stage when a score is missing', () => {
    const result = parseScoreResponse('[{"index": 0}]');

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.stage).toBe('shape');
      expect(result.error).toContain('0.score');
    }
  });

  it('should reject negative and fractional indexes', () => {
    expect(parseScoreResponse('[{"index": -1, "score": 8}]').ok).toBe(false);
    expect(parseScoreResponse('[{"index": 1.5, "score": 8}]').ok).toBe(false);
  });
});

describe('stripCodeFence', () => {
  it('should keep only the first fenced block', () => {
    expect(stripCodeFence('before ```json\n[1]\n``` after')).toBe('[1]');
  });

  it('should prefer a json fence over an earlier bare fence', () => {
    expect(stripCodeFence('```\nnote\n```\n```json\n[2]\n```')).toBe('[2]');
  });

  it('should leave unfenced text alone', () => {
    expect(stripCodeFence('[3]')).toBe('[3]');
  });
});

describe('extractArrayLiteral', () => {
  it('should span from the first [ to the last ]', () => {
    expect(extractArrayLiteral('a [1] b [2] c')).toBe('[1] b [2]');
  });

  it('should return undefined without brackets', () => {
    expect(extractArrayLiteral('nothing here')).toBeUndefined();
  });
});

describe('clampScore', () => {
  it('should clamp without rounding', () => {
    expect(clampScore(4.5)).toBe(4.5);
    expect(clampScore(4.96)).toBe(4.96);
    expect(clampScore(11)).toBe(10);
    expect(clampScore(-0.4)).toBe(0);
  });
});

describe('unwrapSummary', () => {
  it('should unwrap a fenced summary', () => {
    expect(unwrapSummary('```\nGitHub had the best matches.\n```')).toBe('GitHub had the best matches.');
  });

  it('should unwrap a fence with a language tag', () => {
    expect(unwrapSummary('```markdown\nLine one.\nLine two.\n```')).toBe('Line one.\nLine two.');
  });

  it('should trim plain text', () => {
    expect(unwrapSummary('  Plain summary.  \n')).toBe('Plain summary.');
  });

  it('should keep text that only contains a fence marker', () => {
    expect(unwrapSummary('Use ``` for code')).toBe('Use ``` for code');
  });
});
