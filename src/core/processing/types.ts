// src/core/processing/types.ts

import type { RawResult } from '../normalizer/types';

export interface RelevanceAnnotation {
  relevanceScore: number; // Integer 0-10
  relevanceReason: string;
}

export type ScoredResult = RawResult & RelevanceAnnotation;

/** Filter output item: annotated when a judge scored it, raw in pass-through mode */
export type FilteredResult = RawResult | ScoredResult;

/** Platform name to its retained results, in crawl order */
export type FilteredByPlatform = Record<string, FilteredResult[]>;

export interface ResultPreview {
  title: string;
  score: number;
  reason: string;
}

export interface Report {
  summary: string;
  totalResults: number;
  resultsByPlatform: FilteredByPlatform;
  /** Present only when the judge wrote the summary */
  topResults?: Record<string, ResultPreview[]>;
}

export interface FilterRequest {
  results: RawResult[];
  keywords: string[];
  detail: string;
  platform: string;
}

export interface SummaryRequest {
  filteredByPlatform: FilteredByPlatform;
  keywords: string[];
  detail: string;
}

export function isScored(result: FilteredResult): result is ScoredResult {
  return 'relevanceScore' in result && typeof result.relevanceScore === 'number';
}
