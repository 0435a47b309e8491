/**
 * Text rendering of recent exchanges
 */

import type { IExchange } from '../../domain/dialogue/mood.js';

export const HISTORY_PREVIEW_WIDTH = 72;

/** Collapse whitespace and cut to `width` characters */
export function previewText(text: string, width: number = HISTORY_PREVIEW_WIDTH): string {
  const flat = text.replace(/\s+/g, ' ').trim();
  return flat.length > width ? `${flat.slice(0, width - 1)}…` : flat;
}

/**
 * Exchanges arrive newest first; they are listed oldest first.
 */
export function renderHistory(exchanges: readonly IExchange[], width: number = HISTORY_PREVIEW_WIDTH): string[] {
  return [...exchanges].reverse().flatMap((exchange) => [
    `You:   ${previewText(exchange.userMessage, width)}`,
    `Haven: ${previewText(exchange.botResponse, width)}`,
  ]);
}
