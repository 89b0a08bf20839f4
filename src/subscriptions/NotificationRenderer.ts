// src/subscriptions/NotificationRenderer.ts

import type { Notification } from './types';
import { isScored } from '../core/processing/types';
import { truncate } from '../utils/helpers';

export interface RenderedEmail {
  subject: string;
  html: string;
  text: string;
}

const CONTENT_PREVIEW_CHARS = 200;

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
};

export function escapeHtml(value: string): string {
  return value.replace(/[&<>"']/g, (char) => HTML_ESCAPES[char] ?? char);
}

// Only http(s) links are rendered as anchors
function safeHref(url: string): string {
  return /^https?:\/\//i.test(url) ? escapeHtml(url) : '#';
}

export function renderNotificationEmail(notification: Notification): RenderedEmail {
  const { keywords, platforms, newResultsCount, results } = notification;
  const subject = `${newResultsCount} new result${newResultsCount === 1 ? '' : 's'} for ${keywords.join(', ')}`;

  const items = results.map((result, i) => {
    const score = isScored(result) ? result.relevanceScore : undefined;
    const reason = isScored(result) ? result.relevanceReason : '';
    const preview = truncate(result.content, CONTENT_PREVIEW_CHARS);

    const html = [
      '<div class="result-item">',
      `  <h3>[${i + 1}] ${escapeHtml(result.title)}</h3>`,
      `  <p><a href="${safeHref(result.url)}">${escapeHtml(result.url)}</a></p>`,
      `  <p class="meta">${score !== undefined ? `Relevance: ${score}/10 · ` : ''}Platform: ${escapeHtml(result.platform)}</p>`,
      reason ? `  <p>${escapeHtml(reason)}</p>` : '',
      preview ? `  <p class="preview">${escapeHtml(preview)}</p>` : '',
      '</div>',
    ]
      .filter((line) => line.length > 0)
      .join('\n');

    const text = [
      `[${i + 1}] ${result.title}`,
      `    ${result.url}`,
      `    ${score !== undefined ? `Relevance: ${score}/10, ` : ''}Platform: ${result.platform}`,
      reason ? `    ${reason}` : '',
    ]
      .filter((line) => line.length > 0)
      .join('\n');

    return { html, text };
  });

  const overflow =
    newResultsCount > results.length
      ? `Showing the first ${results.length} of ${newResultsCount} new results.`
      : '';

  const html = [
    '<!DOCTYPE html>',
    '<html>',
    '<head><meta charset="UTF-8"></head>',
    '<body>',
    '<h1>New results found</h1>',
    `<p><strong>Keywords:</strong> ${escapeHtml(keywords.join(', '))}</p>`,
    `<p><strong>Platforms:</strong> ${escapeHtml(platforms.join(', '))}</p>`,
    `<p><strong>New results:</strong> ${newResultsCount}</p>`,
    `<p><strong>Checked at:</strong> ${escapeHtml(notification.createdAt)}</p>`,
    ...items.map((item) => item.html),
    overflow ? `<p>${overflow}</p>` : '',
    '</body>',
    '</html>',
  ]
    .filter((line) => line.length > 0)
    .join('\n');

  const text = [
    `New results found for: ${keywords.join(', ')}`,
    `Platforms: ${platforms.join(', ')}`,
    `New results: ${newResultsCount}`,
    '',
    ...items.map((item) => item.text),
    overflow,
  ]
    .join('\n')
    .trimEnd();

  return { subject, html, text };
}
