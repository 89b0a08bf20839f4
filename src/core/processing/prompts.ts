/**
 * Judge prompts for relevance filtering and cross-platform summaries
 */

import type { ResultPreview } from './types';

export interface FilterPromptItem {
  index: number;
  title: string;
  url: string;
  content: string;
}

/**
 * Relevance Filter Prompt
 * Scores each result 0-10 against the keywords and the user's preference
 */
export function buildFilterPrompt(
  items: FilterPromptItem[],
  keywords: string[],
  detail: string
): string {
  return `You are filtering search results based on user preferences.

User's keywords: ${keywords.join(', ')}
User's detail/preferences: "${detail}"

Analyze these ${items.length} search results and score each from 0-10 based on relevance to the user's keywords and preferences.

Results:
${JSON.stringify(items, null, 2)}

IMPORTANT:
- Score 8-10: Highly relevant to keywords AND matches user preferences
- Score 5-7: Relevant to keywords but doesn't fully match preferences
- Score 0-4: Not relevant or doesn't match preferences
- If detail is empty, focus only on keyword relevance

Return ONLY a JSON array of objects with format:
[
  {"index": 0, "score": 8, "reason": "brief reason"},
  {"index": 1, "score": 3, "reason": "brief reason"},
  ...
]

Return ONLY valid JSON, no other text.`;
}

export interface SummaryPromptInput {
  keywords: string[];
  detail: string;
  totalResults: number;
  platformCount: number;
  topResults: Record<string, ResultPreview[]>;
}

/**
 * Summary Prompt
 * Short narrative over the best results of every platform
 */
export function buildSummaryPrompt(input: SummaryPromptInput): string {
  return `Generate a concise summary of search results.

User's keywords: ${input.keywords.join(', ')}
User's preferences: "${input.detail}"

Results found: ${input.totalResults} relevant items across ${input.platformCount} platforms

Top results by platform:
${JSON.stringify(input.topResults, null, 2)}

Generate a concise 2-3 sentence summary that:
1. Highlights the most relevant findings
2. Mentions which platforms had the best results
3. Notes any patterns or themes across results
4. Relates findings to user's preferences (if provided)

Return ONLY the summary text, no extra formatting.`;
}
