/**
 * Convenient debug API for instrumentation.
 * Provides typed methods for emitting common debug events.
 */

import { debugEmitter } from './emitter.js';
import type { DebugContext } from './types.js';

export const debug = {
  setContext(ctx: DebugContext): void {
    debugEmitter.setContext(ctx);
  },

  clearContext(): void {
    debugEmitter.clearContext();
  },

  // ========== Lexicon Events ==========

  lexiconLoaded(source: string, version: string): void {
    debugEmitter.emitDebug('lexicon.loaded', 'lexicon-loader', { source, version });
  },

  // ========== Turn Events ==========

  /**
   * Emit turn.processed event.
   */
  turnProcessed(turn: {
    index: number;
    provenance: string;
    sentiment: number;
    emotions: readonly string[];
    stressor: string | null;
  }): void {
    debugEmitter.emitDebug('turn.processed', 'conversation-session', { ...turn });
  },

  /**
   * Emit turn.crisis event. Raised alongside turn.processed, never instead of it.
   */
  crisisDetected(turnIndex: number): void {
    debugEmitter.emitDebug('turn.crisis', 'conversation-session', { turnIndex });
  },

  sessionCleared(turnsDiscarded: number, persistedRowsCleared: number): void {
    debugEmitter.emitDebug('session.cleared', 'conversation-session', {
      turnsDiscarded,
      persistedRowsCleared,
    });
  },

  // ========== Persistence Events ==========

  persistenceFailed(turnIndex: number, attempt: number, error: unknown): void {
    debugEmitter.emitDebug('persistence.failed', 'conversation-session', {
      turnIndex,
      attempt,
      error: serializeError(error),
    });
  },

  // ========== Generic Events ==========

  /**
   * Emit an event with no dedicated method, such as a chat command.
   */
  custom(type: string, source: string, data: Record<string, unknown>): void {
    debugEmitter.emitDebug(type, source, data);
  },
};

/**
 * Serialize an error object for safe JSON transmission.
 */
function serializeError(error: unknown): Record<string, unknown> {
  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      stack: error.stack,
    };
  }
  return { message: String(error) };
}
