/**
 * Text rendering of the mood trend
 */

import type { IMoodPoint } from '../../domain/dialogue/mood.js';
import { moodIndicator } from '../../app/mood/mood-insights.js';

export const CHART_HALF_WIDTH = 20;

/**
 * One bar per point. Negative scores grow left of the axis, positive ones right.
 */
export function renderMoodBar(sentiment: number, halfWidth: number = CHART_HALF_WIDTH): string {
  const clamped = Math.max(-1, Math.min(1, sentiment));
  const length = Math.round(Math.abs(clamped) * halfWidth);

  const left = clamped < 0 ? ' '.repeat(halfWidth - length) + '█'.repeat(length) : ' '.repeat(halfWidth);
  const right = clamped > 0 ? '█'.repeat(length) + ' '.repeat(halfWidth - length) : ' '.repeat(halfWidth);
  return `${left}│${right}`;
}

export function formatMoodTimestamp(timestamp: string): string {
  // ISO timestamps: keep date and minutes
  return timestamp.length >= 16 ? timestamp.slice(0, 16).replace('T', ' ') : timestamp;
}

export function renderMoodChart(points: readonly IMoodPoint[], halfWidth: number = CHART_HALF_WIDTH): string[] {
  return points.map((point) => {
    const score = point.sentiment.toFixed(2).padStart(5);
    return `${formatMoodTimestamp(point.timestamp)}  ${renderMoodBar(point.sentiment, halfWidth)} ${score} ${moodIndicator(point.sentiment)}`;
  });
}
