/**
 * Template Picker
 * Uniform draws over template indices, preferring ones not yet used this session
 */

import type { IContextSummary } from '../../domain/dialogue/context.js';

export interface IRandomSource {
  /** A number in [0, 1) */
  next(): number;
}

export const mathRandomSource: IRandomSource = {
  next: () => Math.random(),
};

export function drawIndex(random: IRandomSource, size: number): number {
  const value = Math.floor(random.next() * size);
  return Math.min(Math.max(value, 0), size - 1);
}

export function drawFrom<T>(random: IRandomSource, items: readonly T[]): T {
  if (items.length === 0) {
    throw new RangeError('Cannot draw from an empty list');
  }
  return items[drawIndex(random, items.length)];
}

/**
 * Pick an index in [0, size) for a template group.
 *
 * Draws from the indices this session has not used yet. Once all have been
 * used, draws from every index except the one used last (when size > 1).
 */
export function pickUntried(
  random: IRandomSource,
  group: string,
  size: number,
  summary: Pick<IContextSummary, 'usedTemplates' | 'lastTemplates'>
): number {
  const all = Array.from({ length: size }, (_, i) => i);
  const used = new Set(summary.usedTemplates[group] ?? []);

  let candidates = all.filter((i) => !used.has(i));
  if (candidates.length === 0) {
    const last = summary.lastTemplates[group];
    candidates = size > 1 ? all.filter((i) => i !== last) : all;
  }

  return drawFrom(random, candidates);
}
