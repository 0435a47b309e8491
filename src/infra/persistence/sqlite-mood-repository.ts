/**
 * SQLite Mood Repository
 * Durable storage for turns and the mood trend read back from them
 */

import type Database from 'better-sqlite3';

import type { IMoodRepository } from '../../app/dialogue/conversation-session.js';
import type { IExchange, IMoodPoint, IMoodRecord } from '../../domain/dialogue/mood.js';
import { PersistenceError, describeError } from '../../domain/errors.js';

// ============================================================================
// Database Row Types
// ============================================================================

interface MoodPointRow {
  timestamp: string;
  sentiment: number;
}

interface ExchangeRow {
  user_message: string;
  bot_response: string;
}

interface ColumnInfoRow {
  name: string;
}

export const DEFAULT_MOOD_HISTORY_LIMIT = 20;
export const DEFAULT_EXCHANGE_LIMIT = 5;

// ============================================================================
// SQLite Mood Repository
// ============================================================================

export class SqliteMoodRepository implements IMoodRepository {
  constructor(private db: Database.Database) {}

  /**
   * Create the table, or bring an older one up to date
   */
  initialize(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS mood_tracking (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        timestamp TEXT NOT NULL,
        user_message TEXT NOT NULL,
        bot_response TEXT NOT NULL,
        sentiment REAL NOT NULL,
        conversation_context TEXT
      );

      CREATE INDEX IF NOT EXISTS idx_mood_tracking_timestamp ON mood_tracking(timestamp);
    `);

    // tables written before context snapshots were stored
    const columns = this.db
      .prepare<[], ColumnInfoRow>('PRAGMA table_info(mood_tracking)')
      .all()
      .map((column) => column.name);
    if (!columns.includes('conversation_context')) {
      this.db.exec('ALTER TABLE mood_tracking ADD COLUMN conversation_context TEXT');
    }
  }

  saveTurn(record: IMoodRecord): number {
    try {
      const result = this.db
        .prepare(
          `INSERT INTO mood_tracking (timestamp, user_message, bot_response, sentiment, conversation_context)
           VALUES (?, ?, ?, ?, ?)`
        )
        .run(record.timestamp, record.userMessage, record.botResponse, record.sentiment, record.context);
      return Number(result.lastInsertRowid);
    } catch (error) {
      throw new PersistenceError(`Failed to save turn: ${describeError(error)}`, error);
    }
  }

  getMoodHistory(limit: number = DEFAULT_MOOD_HISTORY_LIMIT): IMoodPoint[] {
    const rows = this.db
      .prepare<[number], MoodPointRow>(
        `SELECT timestamp, sentiment FROM (
           SELECT id, timestamp, sentiment FROM mood_tracking
           ORDER BY timestamp DESC, id DESC LIMIT ?
         ) ORDER BY timestamp ASC, id ASC`
      )
      .all(limit);

    return rows.map((row) => ({ timestamp: row.timestamp, sentiment: row.sentiment }));
  }

  getRecentExchanges(limit: number = DEFAULT_EXCHANGE_LIMIT): IExchange[] {
    const rows = this.db
      .prepare<[number], ExchangeRow>(
        `SELECT user_message, bot_response FROM mood_tracking
         ORDER BY timestamp DESC, id DESC LIMIT ?`
      )
      .all(limit);

    return rows.map((row) => ({ userMessage: row.user_message, botResponse: row.bot_response }));
  }

  clear(): number {
    try {
      return this.db.prepare('DELETE FROM mood_tracking').run().changes;
    } catch (error) {
      throw new PersistenceError(`Failed to clear mood history: ${describeError(error)}`, error);
    }
  }
}
