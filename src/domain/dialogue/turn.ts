/**
 * Turn and Response Domain Types
 */

import type { Emotion, Provenance, QuestionCategory, Stressor } from './categories.js';
import type { IContextSummary } from './context.js';
import type { IMessage, ISignalSet } from './signals.js';

export interface ITemplateUse {
  /** Template group key, e.g. `emotion:anxiety` or `greeting` */
  group: string;
  index: number;
}

export interface IResponse {
  text: string;
  provenance: Provenance;
  emotion?: Emotion;
  stressor?: Stressor;
  remedyTopic?: string;
  remediesExhausted?: boolean;
  questionAsked?: QuestionCategory;
  templates: ITemplateUse[];
}

export interface ITurn {
  id: string;
  index: number;
  message: IMessage;
  signals: ISignalSet;
  context: IContextSummary;
  response: IResponse;
}
