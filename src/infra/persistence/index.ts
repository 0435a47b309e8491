export {
  SqliteMoodRepository,
  DEFAULT_MOOD_HISTORY_LIMIT,
  DEFAULT_EXCHANGE_LIMIT,
} from './sqlite-mood-repository.js';
export { InMemoryMoodRepository } from './in-memory-mood-repository.js';
export { openMoodDatabase, resolveDatabasePath } from './database.js';
export type { MoodDatabase } from './database.js';
