/**
 * Dialogue Domain - Re-exports
 */

export * from './categories.js';
export * from './signals.js';
export * from './context.js';
export * from './turn.js';
export * from './lexicon.js';
export * from './mood.js';
