/**
 * Mood Insights
 * Summaries over the persisted mood trend
 */

import type { IMoodPoint, IMoodSummary, MoodLabel } from '../../domain/dialogue/mood.js';

export function classifyMood(average: number): MoodLabel {
  if (average > 0.1) return 'positive';
  if (average > -0.1) return 'neutral';
  return 'challenging';
}

/**
 * Returns null when there is nothing to summarise.
 */
export function summarizeMood(points: readonly IMoodPoint[]): IMoodSummary | null {
  if (points.length === 0) {
    return null;
  }

  const total = points.reduce((sum, point) => sum + point.sentiment, 0);
  const average = total / points.length;
  return { count: points.length, average, label: classifyMood(average) };
}

export function moodIndicator(sentiment: number): string {
  if (sentiment > 0.2) return '😊';
  if (sentiment > -0.2) return '😐';
  return '😔';
}

export function describeMood(summary: IMoodSummary): string {
  const average = summary.average.toFixed(2);
  switch (summary.label) {
    case 'positive':
      return `💚 Your average mood has been positive (${average})`;
    case 'neutral':
      return `💛 Your mood has been neutral (${average})`;
    case 'challenging':
      return `💙 Your mood has been challenging (${average}). Remember, it's okay to seek support.`;
  }
}
