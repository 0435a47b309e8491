/**
 * Conversation Session
 * Owns one conversation's context and history and runs each message through
 * extraction, context tracking and response selection
 */

import { randomUUID } from 'node:crypto';
import type { IConversationContext, IContextSummary } from '../../domain/dialogue/context.js';
import type { IMessage } from '../../domain/dialogue/signals.js';
import type { ITurn } from '../../domain/dialogue/turn.js';
import type { IExchange, IMoodPoint, IMoodRecord } from '../../domain/dialogue/mood.js';
import type { CopingFamily, Emotion, Provenance } from '../../domain/dialogue/categories.js';
import { describeError } from '../../domain/errors.js';
import type { ISignalExtractor } from './signal-extractor.js';
import type { IContextTracker } from './context-tracker.js';
import type { IResponseSelector } from './response-selector.js';
import type { CopingAdvisor } from './coping-advisor.js';
import { debug } from '../../debug/index.js';

export interface IMoodRepository {
  /** Append one turn; returns the auto-incremented row id */
  saveTurn(record: IMoodRecord): number;
  /** Most recent `limit` points, oldest first */
  getMoodHistory(limit?: number): IMoodPoint[];
  /** Most recent `limit` exchanges, newest first */
  getRecentExchanges(limit?: number): IExchange[];
  /** Delete every row; returns the number removed */
  clear(): number;
}

export interface IPersistenceWarning {
  turnIndex: number;
  attempts: number;
  message: string;
}

export interface ISessionOptions {
  id?: string;
  /** Total write attempts per turn before the turn is dropped from storage */
  persistAttempts?: number;
  now?: () => number;
  onWarning?: (warning: IPersistenceWarning) => void;
}

export interface IHandleMessageResult {
  response: string;
  turn: ITurn;
  provenance: Provenance;
  sentiment: number;
  /** True when a coping strategy is worth offering alongside the response */
  offerCoping: boolean;
  persisted: boolean;
  warning?: IPersistenceWarning;
}

export interface IClearHistoryResult {
  turnsDiscarded: number;
  persistedRowsCleared: number;
  warning?: string;
}

export interface ICopingStrategyResult {
  text: string;
  family: CopingFamily;
  emotion: Emotion | null;
}

const COPING_OFFER_EMOTIONS: readonly Emotion[] = ['stress', 'anxiety', 'sadness'];
const COPING_OFFER_SENTIMENT = -0.2;

export function serializeTurnContext(turn: ITurn): string {
  return JSON.stringify({
    provenance: turn.response.provenance,
    emotions: turn.signals.emotions,
    stressor: turn.signals.primaryStressor,
    crisis: turn.signals.crisis,
    sentiment: turn.signals.sentiment,
    context: turn.context,
  });
}

export class ConversationSession {
  readonly id: string;
  private context: IConversationContext;
  private turns: ITurn[] = [];
  private persistAttempts: number;
  private now: () => number;
  private onWarning?: (warning: IPersistenceWarning) => void;

  constructor(
    private extractor: ISignalExtractor,
    private tracker: IContextTracker,
    private selector: IResponseSelector,
    private copingAdvisor: CopingAdvisor,
    private repository: IMoodRepository | null = null,
    options: ISessionOptions = {}
  ) {
    this.id = options.id ?? randomUUID();
    this.context = tracker.create();
    this.persistAttempts = Math.max(1, options.persistAttempts ?? 2);
    this.now = options.now ?? Date.now;
    this.onWarning = options.onWarning;
  }

  /**
   * Process one user message. Never throws for bad input or storage trouble.
   */
  handleMessage(rawText: string): IHandleMessageResult {
    const message: IMessage = Object.freeze({
      text: rawText,
      timestamp: this.now(),
      sender: 'user',
    });

    const signals = this.extractor.extract(message.text);
    this.tracker.update(this.context, signals);
    const summary = this.tracker.renderSummary(this.context);
    const response = this.selector.select(signals, summary);
    this.tracker.recordSelection(this.context, response);

    const turn: ITurn = {
      id: randomUUID(),
      index: this.turns.length + 1,
      message,
      signals,
      context: summary,
      response,
    };
    this.turns.push(turn);

    debug.setContext({ sessionId: this.id });
    debug.turnProcessed({
      index: turn.index,
      provenance: response.provenance,
      sentiment: signals.sentiment,
      emotions: signals.emotions,
      stressor: signals.primaryStressor,
    });
    if (signals.crisis) {
      debug.crisisDetected(turn.index);
    }

    const { persisted, warning } = this.persist(turn);

    return {
      response: response.text,
      turn,
      provenance: response.provenance,
      sentiment: signals.sentiment,
      offerCoping:
        signals.sentiment < COPING_OFFER_SENTIMENT ||
        signals.emotions.some((emotion) => COPING_OFFER_EMOTIONS.includes(emotion)),
      persisted,
      warning,
    };
  }

  /**
   * Answer an explicit request for a coping strategy, tuned to the emotion of
   * the latest turn. Does not add a turn to the history.
   */
  suggestCopingStrategy(): ICopingStrategyResult {
    const emotion = this.turns.at(-1)?.signals.emotions[0] ?? null;
    const suggestion = this.copingAdvisor.suggest(emotion, this.tracker.renderSummary(this.context));
    this.tracker.recordTemplates(this.context, [suggestion.template]);

    return {
      text: `💡 **Coping Strategy:** ${suggestion.strategy}`,
      family: suggestion.family,
      emotion,
    };
  }

  /**
   * Discard the context and turn history; the next message is turn 1 again.
   */
  clearHistory(options: { clearPersisted?: boolean } = {}): IClearHistoryResult {
    const turnsDiscarded = this.turns.length;
    this.turns = [];
    this.context = this.tracker.create();

    let persistedRowsCleared = 0;
    let warning: string | undefined;
    if (options.clearPersisted && this.repository) {
      try {
        persistedRowsCleared = this.repository.clear();
      } catch (error) {
        warning = `Could not clear stored history: ${describeError(error)}`;
        console.warn(`[ConversationSession] ${warning}`);
      }
    }

    debug.sessionCleared(turnsDiscarded, persistedRowsCleared);
    return { turnsDiscarded, persistedRowsCleared, warning };
  }

  getHistory(): readonly ITurn[] {
    return [...this.turns];
  }

  getContextSummary(): IContextSummary {
    return this.tracker.renderSummary(this.context);
  }

  private persist(turn: ITurn): { persisted: boolean; warning?: IPersistenceWarning } {
    if (!this.repository) {
      return { persisted: false };
    }

    const record: IMoodRecord = {
      timestamp: new Date(turn.message.timestamp).toISOString(),
      userMessage: turn.message.text,
      botResponse: turn.response.text,
      sentiment: turn.signals.sentiment,
      context: serializeTurnContext(turn),
    };

    let lastError: unknown;
    for (let attempt = 1; attempt <= this.persistAttempts; attempt++) {
      try {
        this.repository.saveTurn(record);
        return { persisted: true };
      } catch (error) {
        lastError = error;
        debug.persistenceFailed(turn.index, attempt, error);
      }
    }

    const warning: IPersistenceWarning = {
      turnIndex: turn.index,
      attempts: this.persistAttempts,
      message: describeError(lastError),
    };
    console.warn(
      `[ConversationSession] Turn ${turn.index} was not stored after ${warning.attempts} attempt(s): ${warning.message}`
    );
    this.onWarning?.(warning);

    return { persisted: false, warning };
  }
}
