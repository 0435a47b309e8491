import { drawFrom, drawIndex, pickUntried } from '../../../src/app/dialogue/template-picker.js';
import { sequenceRandom } from '../../helpers/dialogue.js';

const noHistory = { usedTemplates: {}, lastTemplates: {} };

describe('template-picker', () => {
  describe('drawIndex', () => {
    it('maps the random value onto the range', () => {
      expect(drawIndex(sequenceRandom(0), 4)).toBe(0);
      expect(drawIndex(sequenceRandom(0.5), 4)).toBe(2);
      expect(drawIndex(sequenceRandom(0.99), 4)).toBe(3);
    });

    it('clamps out-of-range random values', () => {
      expect(drawIndex(sequenceRandom(1), 4)).toBe(3);
      expect(drawIndex(sequenceRandom(-0.5), 4)).toBe(0);
    });
  });

  describe('drawFrom', () => {
    it('draws an element', () => {
      expect(drawFrom(sequenceRandom(0.6), ['a', 'b', 'c'])).toBe('b');
    });

    it('throws on an empty list', () => {
      expect(() => drawFrom(sequenceRandom(0), [])).toThrow(RangeError);
    });
  });

  describe('pickUntried', () => {
    it('draws from every index when nothing was used', () => {
      expect(pickUntried(sequenceRandom(0.5), 'g', 3, noHistory)).toBe(1);
    });

    it('draws only from unused indices', () => {
      const summary = { usedTemplates: { g: [0, 2] }, lastTemplates: { g: 2 } };
      expect(pickUntried(sequenceRandom(0), 'g', 3, summary)).toBe(1);
      expect(pickUntried(sequenceRandom(0.99), 'g', 3, summary)).toBe(1);
    });

    it('falls back to every index except the last used one', () => {
      const summary = { usedTemplates: { g: [0, 1, 2] }, lastTemplates: { g: 1 } };
      expect(pickUntried(sequenceRandom(0), 'g', 3, summary)).toBe(0);
      expect(pickUntried(sequenceRandom(0.99), 'g', 3, summary)).toBe(2);
    });

    it('returns the only index of a single-template group', () => {
      const summary = { usedTemplates: { g: [0] }, lastTemplates: { g: 0 } };
      expect(pickUntried(sequenceRandom(0.7), 'g', 1, summary)).toBe(0);
    });

    it('keeps groups independent', () => {
      const summary = { usedTemplates: { other: [0] }, lastTemplates: { other: 0 } };
      expect(pickUntried(sequenceRandom(0), 'g', 2, summary)).toBe(0);
    });
  });
});
