// src/core/processing/RelevanceFilter.ts

import type { JudgeOracle } from '../judge/types';
import type { RawResult } from '../normalizer/types';
import type { Logger } from '../../observability/Logger';
import type { MetricsCollector } from '../../observability/MetricsCollector';
import type { FilterRequest, FilteredResult, ScoredResult } from './types';
import { buildFilterPrompt, type FilterPromptItem } from './prompts';
import { parseScoreResponse, type JudgeScore } from './responseParsing';
import { withJudgeSpan } from '../../observability/tracing';
import { errorMessage } from '../../utils/errors';
import { truncate } from '../../utils/helpers';

export const MAX_JUDGED_RESULTS = 50;
export const MAX_TITLE_CHARS = 200;
export const MAX_CONTENT_CHARS = 1500;
export const RELEVANCE_THRESHOLD = 5;

export const PARSE_FAILURE_REASON = 'Filtering failed - JSON parse error';
export const CALL_FAILURE_REASON = 'Filtering failed - unexpected error';

/**
 * Scores one platform's results with the judge and keeps the relevant ones.
 *
 * - No judge, or nothing to filter: the input comes back as is.
 * - One judge call per batch; only the first {@link MAX_JUDGED_RESULTS}
 *   results are sent, the rest can never be retained.
 * - A failed call or an unreadable answer returns the whole batch with
 *   score 0 and the failure as reason.
 */
export class RelevanceFilter {
  constructor(
    private judge: JudgeOracle | undefined,
    private logger: Logger,
    private metrics: MetricsCollector
  ) {}

  async filter(request: FilterRequest): Promise<FilteredResult[]> {
    const { results, keywords, detail, platform } = request;

    if (!this.judge || results.length === 0) {
      return results;
    }
    const judge = this.judge;

    const batch = results.slice(0, MAX_JUDGED_RESULTS);
    const prompt = buildFilterPrompt(batch.map(toPromptItem), keywords, detail);

    this.logger.info('Filtering results', {
      platform,
      total: results.length,
      judged: batch.length,
    });

    let response: string;
    try {
      response = await withJudgeSpan(judge.name, 'filter', () => judge.invoke(prompt));
    } catch (error: unknown) {
      this.logger.error('Relevance judge call failed', { platform, error: errorMessage(error) });
      this.metrics.incrementCounter('judge_fallbacks_total', { stage: 'filter', reason: 'call' });
      return failOpen(results, CALL_FAILURE_REASON);
    }

    const parsed = parseScoreResponse(response);
    if (!parsed.ok) {
      this.logger.warn('Relevance judge answer unreadable', {
        platform,
        stage: parsed.stage,
        error: parsed.error,
        response: truncate(response, 500),
      });
      this.metrics.incrementCounter('judge_fallbacks_total', { stage: 'filter', reason: 'parse' });
      return failOpen(results, PARSE_FAILURE_REASON);
    }

    const retained = retain(batch, parsed.scores);

    this.metrics.recordGauge('results_filtered', retained.length, { platform });
    this.logger.info('Filtering completed', {
      platform,
      judged: batch.length,
      retained: retained.length,
    });

    return retained;
  }
}

function toPromptItem(result: RawResult, index: number): FilterPromptItem {
  return {
    index,
    title: truncate(result.title, MAX_TITLE_CHARS),
    url: result.url,
    content: truncate(result.content, MAX_CONTENT_CHARS),
  };
}

// First score per index wins; indexes outside the batch are ignored
function retain(batch: RawResult[], scores: JudgeScore[]): ScoredResult[] {
  const byIndex = new Map<number, JudgeScore>();
  for (const score of scores) {
    if (score.index < batch.length && !byIndex.has(score.index)) {
      byIndex.set(score.index, score);
    }
  }

  const retained: ScoredResult[] = [];
  batch.forEach((result, index) => {
    const score = byIndex.get(index);
    if (score && score.score >= RELEVANCE_THRESHOLD) {
      retained.push({ ...result, relevanceScore: score.score, relevanceReason: score.reason });
    }
  });
  return retained;
}

function failOpen(results: RawResult[], reason: string): ScoredResult[] {
  return results.map((result) => ({ ...result, relevanceScore: 0, relevanceReason: reason }));
}
