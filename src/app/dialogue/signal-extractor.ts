/**
 * Signal Extractor
 * Derives sentiment, emotions, stressors and the crisis flag from one message
 */

import type { ILexicon } from '../../domain/dialogue/lexicon.js';
import type { ISignalSet } from '../../domain/dialogue/signals.js';
import { EMOTIONS, STRESSORS } from '../../domain/dialogue/categories.js';
import type { Emotion, Stressor } from '../../domain/dialogue/categories.js';

export interface ISentimentScorer {
  /** Compound polarity in [-1, 1] */
  score(text: string): number;
}

export interface ISignalExtractor {
  extract(text: string): ISignalSet;
}

/**
 * Keyword containment test against case-folded text.
 *
 * Negation is not special-cased: "not stressed" still contains "stressed".
 */
export function containsAny(normalizedText: string, keywords: readonly string[]): boolean {
  return keywords.some((keyword) => normalizedText.includes(keyword));
}

export function normalizeText(text: string): string {
  return text.toLowerCase();
}

export class SignalExtractor implements ISignalExtractor {
  constructor(
    private lexicon: ILexicon,
    private sentimentScorer: ISentimentScorer
  ) {}

  extract(text: string): ISignalSet {
    const normalized = normalizeText(text);
    const stressors = this.detectStressors(normalized);

    return Object.freeze({
      sentiment: this.sentimentScorer.score(text),
      emotions: Object.freeze(this.detectEmotions(normalized)),
      stressors: Object.freeze(stressors),
      primaryStressor: stressors[0] ?? null,
      crisis: this.detectCrisis(normalized),
    });
  }

  /**
   * Every matching emotion, in enumeration order. No early exit.
   */
  detectEmotions(normalizedText: string): Emotion[] {
    return EMOTIONS.filter((emotion) =>
      containsAny(normalizedText, this.lexicon.emotions[emotion].keywords)
    );
  }

  /**
   * Every matching stressor, in enumeration order; the first is the primary one.
   */
  detectStressors(normalizedText: string): Stressor[] {
    return STRESSORS.filter((stressor) =>
      containsAny(normalizedText, this.lexicon.stressors[stressor].keywords)
    );
  }

  detectCrisis(normalizedText: string): boolean {
    return containsAny(normalizedText, this.lexicon.crisis.keywords);
  }
}
