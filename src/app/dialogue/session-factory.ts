/**
 * Wires the dialogue pipeline for one conversation
 */

import type { ILexicon } from '../../domain/dialogue/lexicon.js';
import { SignalExtractor } from './signal-extractor.js';
import type { ISentimentScorer } from './signal-extractor.js';
import { ContextTracker } from './context-tracker.js';
import { ResponseSelector } from './response-selector.js';
import { CopingAdvisor } from './coping-advisor.js';
import { mathRandomSource } from './template-picker.js';
import type { IRandomSource } from './template-picker.js';
import { ConversationSession } from './conversation-session.js';
import type { IMoodRepository, ISessionOptions } from './conversation-session.js';

export interface CreateSessionOptions extends ISessionOptions {
  sentimentScorer: ISentimentScorer;
  repository?: IMoodRepository | null;
  random?: IRandomSource;
}

export function createConversationSession(
  lexicon: ILexicon,
  options: CreateSessionOptions
): ConversationSession {
  const { sentimentScorer, repository = null, random = mathRandomSource, ...sessionOptions } = options;

  return new ConversationSession(
    new SignalExtractor(lexicon, sentimentScorer),
    new ContextTracker(),
    new ResponseSelector(lexicon, random),
    new CopingAdvisor(lexicon, random),
    repository,
    sessionOptions
  );
}
