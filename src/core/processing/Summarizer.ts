// src/core/processing/Summarizer.ts

import type { JudgeOracle } from '../judge/types';
import type { Logger } from '../../observability/Logger';
import type { MetricsCollector } from '../../observability/MetricsCollector';
import {
  isScored,
  type FilteredByPlatform,
  type FilteredResult,
  type Report,
  type ResultPreview,
  type SummaryRequest,
} from './types';
import { buildSummaryPrompt } from './prompts';
import { unwrapSummary } from './responseParsing';
import { withJudgeSpan } from '../../observability/tracing';
import { errorMessage } from '../../utils/errors';
import { truncate } from '../../utils/helpers';

export const TOP_RESULTS_PER_PLATFORM = 5;
export const MAX_PREVIEW_TITLE_CHARS = 150;

export const NO_RESULTS_SUMMARY = 'No relevant results found matching your criteria.';

export function judgeUnavailableSummary(total: number, platforms: number): string {
  return `No summary generated (relevance judge not configured). Found ${total} results across ${platforms} platforms.`;
}

export function countSummary(total: number, platforms: number): string {
  return `Found ${total} relevant results across ${platforms} platforms.`;
}

/**
 * Writes the cross-platform narrative for a filtered result set.
 * Never rejects: judge problems produce a count-based summary instead.
 */
export class Summarizer {
  constructor(
    private judge: JudgeOracle | undefined,
    private logger: Logger,
    private metrics: MetricsCollector
  ) {}

  async summarize(request: SummaryRequest): Promise<Report> {
    const { filteredByPlatform, keywords, detail } = request;

    const totalResults = countResults(filteredByPlatform);
    const platformCount = Object.keys(filteredByPlatform).length;

    if (totalResults === 0) {
      return { summary: NO_RESULTS_SUMMARY, totalResults: 0, resultsByPlatform: filteredByPlatform };
    }

    if (!this.judge) {
      return {
        summary: judgeUnavailableSummary(totalResults, platformCount),
        totalResults,
        resultsByPlatform: filteredByPlatform,
      };
    }
    const judge = this.judge;

    const topResults = buildTopResults(filteredByPlatform);
    const prompt = buildSummaryPrompt({ keywords, detail, totalResults, platformCount, topResults });
    const fallback: Report = {
      summary: countSummary(totalResults, platformCount),
      totalResults,
      resultsByPlatform: filteredByPlatform,
    };

    try {
      const response = await withJudgeSpan(judge.name, 'summary', () => judge.invoke(prompt));
      const summary = unwrapSummary(response);

      if (!summary) {
        this.logger.warn('Judge returned an empty summary', { judge: judge.name });
        this.metrics.incrementCounter('judge_fallbacks_total', { stage: 'summary', reason: 'empty' });
        return fallback;
      }

      this.logger.info('Summary generated', { totalResults, platformCount });
      return { summary, totalResults, resultsByPlatform: filteredByPlatform, topResults };
    } catch (error: unknown) {
      this.logger.error('Summary generation failed', { judge: judge.name, error: errorMessage(error) });
      this.metrics.incrementCounter('judge_fallbacks_total', { stage: 'summary', reason: 'call' });
      return fallback;
    }
  }
}

export function countResults(filteredByPlatform: FilteredByPlatform): number {
  return Object.values(filteredByPlatform).reduce((sum, results) => sum + results.length, 0);
}

/**
 * Top results of every non-empty platform, best score first.
 * Array#sort is stable, so equal scores keep their crawl order.
 */
export function buildTopResults(
  filteredByPlatform: FilteredByPlatform
): Record<string, ResultPreview[]> {
  const topResults: Record<string, ResultPreview[]> = {};

  for (const [platform, results] of Object.entries(filteredByPlatform)) {
    if (results.length === 0) continue;

    topResults[platform] = [...results]
      .sort((a, b) => scoreOf(b) - scoreOf(a))
      .slice(0, TOP_RESULTS_PER_PLATFORM)
      .map(toPreview);
  }

  return topResults;
}

function scoreOf(result: FilteredResult): number {
  return isScored(result) ? result.relevanceScore : 0;
}

function toPreview(result: FilteredResult): ResultPreview {
  return {
    title: truncate(result.title, MAX_PREVIEW_TITLE_CHARS),
    score: scoreOf(result),
    reason: isScored(result) ? result.relevanceReason : '',
  };
}
