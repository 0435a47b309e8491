/**
 * Lexicon Domain Types
 * Keyword tables and response templates, loaded from configuration
 */

import type {
  CopingFamily,
  Emotion,
  QuestionCategory,
  QuestioningBand,
  SentimentBand,
  Stressor,
} from './categories.js';

export interface IRemedy {
  topic: string;
  text: string;
}

export interface IStressorEntry {
  keywords: string[];
  intro: string;
  remedies: IRemedy[];
  followUp: string;
  exhaustedPrompt: string;
}

export interface IEmotionEntry {
  keywords: string[];
  empathy: string[];
  copingFamilies: CopingFamily[];
}

export interface ICrisisEntry {
  keywords: string[];
  response: string;
}

/**
 * Closing line once every follow-up question was asked.
 * Without `withOpener` the line replaces the whole reply.
 */
export interface IExhaustedPrompt {
  text: string;
  withOpener: boolean;
}

export interface IGeneralSupportEntry {
  openers: Record<SentimentBand, string[]>;
  acknowledgments: string[];
  positivePrompt: string;
  exhaustedPrompts: Record<QuestioningBand, IExhaustedPrompt>;
}

export interface ILexicon {
  version: string;
  emotions: Record<Emotion, IEmotionEntry>;
  stressors: Record<Stressor, IStressorEntry>;
  crisis: ICrisisEntry;
  greetings: string[];
  generalSupport: IGeneralSupportEntry;
  followUpQuestions: Record<QuestionCategory, string>;
  copingStrategies: Record<CopingFamily, string[]>;
  copingIntro: string;
  resources: string;
}
