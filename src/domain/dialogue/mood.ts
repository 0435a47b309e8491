/**
 * Mood Tracking Domain Types
 */

/** One persisted turn, as handed to durable storage */
export interface IMoodRecord {
  /** ISO-8601, sortable */
  timestamp: string;
  userMessage: string;
  botResponse: string;
  sentiment: number;
  /** Serialised context snapshot */
  context: string;
}

export interface IMoodPoint {
  timestamp: string;
  sentiment: number;
}

export interface IExchange {
  userMessage: string;
  botResponse: string;
}

export type MoodLabel = 'positive' | 'neutral' | 'challenging';

export interface IMoodSummary {
  count: number;
  average: number;
  label: MoodLabel;
}
