/**
 * Debug instrumentation API.
 *
 * Modules emit debug events through `debug`; front ends subscribe through
 * `debugEmitter.onDebug` once debug mode is enabled.
 *
 * @example
 * ```typescript
 * import { debug, debugEmitter } from './debug/index.js';
 *
 * debugEmitter.enable();
 * debug.setContext({ sessionId: 'session-123' });
 * debug.lexiconLoaded('default', '1.0.0');
 * debug.clearContext();
 * ```
 */

export { debugEmitter } from './emitter.js';
export { debug } from './debug.js';
export type { DebugEvent, DebugContext } from './types.js';
