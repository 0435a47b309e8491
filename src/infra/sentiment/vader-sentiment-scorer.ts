/// <reference path="../../types/vader-sentiment.d.ts" />
/**
 * VADER Sentiment Scorer
 * Valence-aware compound polarity (negation, intensifiers, punctuation, caps)
 */

import * as vader from 'vader-sentiment';
import type { ISentimentScorer } from '../../app/dialogue/signal-extractor.js';

export class VaderSentimentScorer implements ISentimentScorer {
  score(text: string): number {
    if (text.trim().length === 0) {
      return 0;
    }

    const { compound } = vader.SentimentIntensityAnalyzer.polarity_scores(text);
    if (!Number.isFinite(compound)) {
      return 0;
    }
    return Math.max(-1, Math.min(1, compound));
  }
}
