/**
 * In-memory mood repository
 * Used for `--no-persist` sessions and tests
 */

import type { IMoodRepository } from '../../app/dialogue/conversation-session.js';
import type { IExchange, IMoodPoint, IMoodRecord } from '../../domain/dialogue/mood.js';
import { DEFAULT_EXCHANGE_LIMIT, DEFAULT_MOOD_HISTORY_LIMIT } from './sqlite-mood-repository.js';

interface StoredRecord extends IMoodRecord {
  id: number;
}

export class InMemoryMoodRepository implements IMoodRepository {
  private records: StoredRecord[] = [];
  private nextId = 1;

  saveTurn(record: IMoodRecord): number {
    const id = this.nextId++;
    this.records.push({ ...record, id });
    return id;
  }

  getMoodHistory(limit: number = DEFAULT_MOOD_HISTORY_LIMIT): IMoodPoint[] {
    return this.newestFirst()
      .slice(0, limit)
      .reverse()
      .map((record) => ({ timestamp: record.timestamp, sentiment: record.sentiment }));
  }

  getRecentExchanges(limit: number = DEFAULT_EXCHANGE_LIMIT): IExchange[] {
    return this.newestFirst()
      .slice(0, limit)
      .map((record) => ({ userMessage: record.userMessage, botResponse: record.botResponse }));
  }

  clear(): number {
    const removed = this.records.length;
    this.records = [];
    return removed;
  }

  /** Stored rows, oldest first */
  list(): readonly IMoodRecord[] {
    return this.records.map((record) => ({
      timestamp: record.timestamp,
      userMessage: record.userMessage,
      botResponse: record.botResponse,
      sentiment: record.sentiment,
      context: record.context,
    }));
  }

  private newestFirst(): StoredRecord[] {
    return [...this.records].sort(
      (a, b) => b.timestamp.localeCompare(a.timestamp) || b.id - a.id
    );
  }
}
