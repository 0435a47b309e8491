/**
 * Message and Signal Domain Types
 */

import type { Emotion, Stressor } from './categories.js';

export interface IMessage {
  readonly text: string;
  readonly timestamp: number;
  readonly sender: 'user';
}

export interface ISignalSet {
  /** Compound polarity in [-1, 1]; 0 means no affect-bearing tokens */
  readonly sentiment: number;
  /** Matched emotions, in enumeration order */
  readonly emotions: readonly Emotion[];
  /** Matched stressors, in enumeration order */
  readonly stressors: readonly Stressor[];
  readonly primaryStressor: Stressor | null;
  readonly crisis: boolean;
}
