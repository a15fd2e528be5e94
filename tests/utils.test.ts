import { describe, it, expect } from 'vitest';
import { cropText } from '../src/utils';
import { snapshotOf } from './utils/fakes';

describe('Utils', () => {
  describe('cropText', () => {
    it('should crop correct rect', () => {
      const snap = snapshotOf(['12345', '67890', 'abcde'].join('\n'));
      // x=1, y=1, w=3, h=2
      const result = cropText(snap, { x: 1, y: 1, width: 3, height: 2 });
      expect(result).toBe('789\nbcd');
    });

    it('should handle out of bounds gracefully', () => {
      const snap = snapshotOf('abc');
      expect(cropText(snap, { x: 0, y: 5, width: 1, height: 1 })).toBe('');
      expect(cropText(snap, { x: 2, y: 0, width: 10, height: 1 })).toBe('c');
      expect(cropText(snap, { x: -3, y: 0, width: 4, height: 1 })).toBe('a');
    });
  });
});
