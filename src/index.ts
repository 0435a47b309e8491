/**
 * Haven public API
 */

export * from './domain/dialogue/index.js';
export {
  ErrorCodes,
  HavenError,
  LexiconConfigError,
  PersistenceError,
  isHavenError,
  describeError,
} from './domain/errors.js';
export type { ErrorCode } from './domain/errors.js';

export * from './app/dialogue/index.js';
export * from './app/mood/index.js';

export { loadLexicon, validateLexicon, readLexiconFile, resolveLexiconPath } from './infra/lexicon/index.js';
export type { LoadLexiconOptions } from './infra/lexicon/index.js';
export { VaderSentimentScorer } from './infra/sentiment/index.js';
export {
  SqliteMoodRepository,
  InMemoryMoodRepository,
  openMoodDatabase,
} from './infra/persistence/index.js';
export { loadRuntimeConfig, DEFAULT_RUNTIME_CONFIG } from './infra/config/runtime-config.js';
export type { HavenRuntimeConfig } from './infra/config/runtime-config.js';

export { debug, debugEmitter } from './debug/index.js';
export type { DebugEvent, DebugContext } from './debug/index.js';
