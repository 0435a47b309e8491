/**
 * Debug event emitter singleton.
 * Carries instrumentation events from the dialogue engine to whichever front end listens.
 */

import { EventEmitter } from 'events';
import { randomUUID } from 'crypto';
import type { DebugEvent, DebugContext } from './types.js';

const DEBUG_CHANNEL = 'debug';

/**
 * DebugEmitter stays silent until enabled, and stamps every event with the
 * conversation session it belongs to.
 */
class DebugEmitter extends EventEmitter {
  private _enabled = false;
  private context: DebugContext = {};

  /**
   * Start emitting. Called once by the CLI when `HAVEN_DEBUG` or the runtime config asks for it.
   */
  enable(): void {
    this._enabled = true;
  }

  /**
   * Stop emitting. Listeners stay subscribed.
   */
  disable(): void {
    this._enabled = false;
  }

  /**
   * Merge fields into the context stamped on every event.
   * A session sets its id here when it starts.
   * @param ctx - Fields to merge over the current context
   */
  setContext(ctx: DebugContext): void {
    this.context = { ...this.context, ...ctx };
  }

  /**
   * Forget the session context, e.g. when a chat ends.
   */
  clearContext(): void {
    this.context = {};
  }

  /**
   * Emit a debug event to every `onDebug` handler.
   * @param type - Event type in format "domain.action"
   * @param source - Module that raised the event
   * @param data - Event-specific payload
   * @returns true if a handler received the event, false when disabled or nobody listens
   */
  emitDebug(type: string, source: string, data: Record<string, unknown>): boolean {
    if (!this._enabled) {
      return false;
    }

    const event: DebugEvent = {
      id: randomUUID(),
      timestamp: Date.now(),
      type,
      source,
      data,
      ...(this.context.sessionId ? { sessionId: this.context.sessionId } : {}),
    };

    return super.emit(DEBUG_CHANNEL, event);
  }

  /**
   * Subscribe to debug events.
   * @param handler - Called with each event while enabled
   */
  onDebug(handler: (event: DebugEvent) => void): void {
    this.on(DEBUG_CHANNEL, handler);
  }

  /**
   * Unsubscribe a handler added with `onDebug`.
   */
  offDebug(handler: (event: DebugEvent) => void): void {
    this.off(DEBUG_CHANNEL, handler);
  }
}

// Singleton instance
export const debugEmitter = new DebugEmitter();
