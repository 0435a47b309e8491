/**
 * Dialogue Categories
 * Closed vocabularies for emotions, stressors, questions and provenance
 */

// Enumeration order doubles as tie-break order
export const EMOTIONS = ['stress', 'anxiety', 'sadness', 'anger', 'loneliness'] as const;
export type Emotion = (typeof EMOTIONS)[number];

export const STRESSORS = [
  'exam_anxiety',
  'work_stress',
  'relationship_stress',
  'family_stress',
  'general_anxiety',
  'depression_feelings',
] as const;
export type Stressor = (typeof STRESSORS)[number];

export const QUESTION_CATEGORIES = [
  'duration',
  'triggers',
  'coping_history',
  'specific_help',
  'small_step',
  'self_care',
] as const;
export type QuestionCategory = (typeof QUESTION_CATEGORIES)[number];

export const COPING_FAMILIES = ['breathing', 'grounding', 'movement', 'social', 'self_care'] as const;
export type CopingFamily = (typeof COPING_FAMILIES)[number];

export const SENTIMENT_BANDS = ['very_negative', 'negative', 'neutral', 'positive'] as const;
export type SentimentBand = (typeof SENTIMENT_BANDS)[number];

/** Bands whose general-support replies ask follow-up questions */
export const QUESTIONING_BANDS = ['very_negative', 'negative', 'neutral'] as const;
export type QuestioningBand = (typeof QUESTIONING_BANDS)[number];

export type Provenance =
  | 'crisis'
  | 'stressor_specific'
  | 'emotion_specific'
  | 'greeting'
  | 'general_support';
