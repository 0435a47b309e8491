/**
 * Conversation Context Domain Types
 */

import type { Emotion, Provenance, QuestionCategory, Stressor } from './categories.js';

/**
 * Session-scoped memory. Owned and mutated by exactly one session.
 * Sets only grow until the session is reset.
 */
export interface IConversationContext {
  turnCount: number;
  isFirstInteraction: boolean;
  topicsDiscussed: Set<Stressor>;
  emotionsMentioned: Set<Emotion>;
  questionsAsked: Set<QuestionCategory>;
  remediesSurfaced: Map<Stressor, Set<string>>;
  usedTemplates: Map<string, Set<number>>;
  lastTemplates: Map<string, number>;
  lastEmotion: Emotion | null;
  lastStressor: Stressor | null;
  lastProvenance: Provenance | null;
  lastQuestion: QuestionCategory | null;
}

/**
 * Plain, serialisable view of a context.
 * Stored on every turn and handed to the response selector.
 */
export interface IContextSummary {
  turnCount: number;
  isFirstInteraction: boolean;
  topicsDiscussed: Stressor[];
  emotionsMentioned: Emotion[];
  questionsAsked: QuestionCategory[];
  unaskedQuestions: QuestionCategory[];
  remediesSurfaced: Partial<Record<Stressor, string[]>>;
  usedTemplates: Record<string, number[]>;
  lastTemplates: Record<string, number>;
  lastEmotion: Emotion | null;
  lastStressor: Stressor | null;
  lastProvenance: Provenance | null;
  lastQuestion: QuestionCategory | null;
}
