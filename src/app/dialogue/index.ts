/**
 * Dialogue engine exports
 */

export { SignalExtractor, containsAny, normalizeText } from './signal-extractor.js';
export type { ISentimentScorer, ISignalExtractor } from './signal-extractor.js';

export { ContextTracker } from './context-tracker.js';
export type { IContextTracker } from './context-tracker.js';

export { ResponseSelector, classifySentimentBand } from './response-selector.js';
export type { IResponseSelector, SelectorState } from './response-selector.js';

export { CopingAdvisor } from './coping-advisor.js';
export type { ICopingSuggestion } from './coping-advisor.js';

export { mathRandomSource, drawIndex, drawFrom, pickUntried } from './template-picker.js';
export type { IRandomSource } from './template-picker.js';

export { ConversationSession, serializeTurnContext } from './conversation-session.js';
export type {
  IMoodRepository,
  IPersistenceWarning,
  ISessionOptions,
  IHandleMessageResult,
  IClearHistoryResult,
  ICopingStrategyResult,
} from './conversation-session.js';

export { createConversationSession } from './session-factory.js';
export type { CreateSessionOptions } from './session-factory.js';
