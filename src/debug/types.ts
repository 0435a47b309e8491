/**
 * Debug event types for the instrumentation system.
 */

/**
 * Base debug event structure.
 * All debug events emitted by the system follow this interface.
 */
export interface DebugEvent {
  /** Unique event identifier (UUID) */
  id: string;
  /** Event timestamp in milliseconds */
  timestamp: number;
  /** Event type in format "domain.action" (e.g., "turn.processed", "lexicon.loaded") */
  type: string;
  /** Source module identifier (e.g., "conversation-session", "lexicon-loader") */
  source: string;
  /** Event-specific data payload */
  data: Record<string, unknown>;
  /** Associated session ID (if applicable) */
  sessionId?: string;
}

/**
 * Context for associating events with a conversation session.
 */
export interface DebugContext {
  sessionId?: string;
}
