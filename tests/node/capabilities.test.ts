/**
 * Tests for the driver capability check
 */

import { UnsupportedCapabilityError } from '../../src/errors';
import { requireExtended, supportsExtended, toExtendedClick } from '../../src/node/capabilities';
import { FakeNode, FULL_CAPABILITIES } from '../mocks/fake-driver';

describe('capability check', () => {
  describe('supportsExtended', () => {
    it('should read the static descriptor of the node', () => {
      const node = new FakeNode('a');
      node.caps = { click: true, rightClick: false, doubleClick: true, set: false };

      expect(supportsExtended('click', node)).toBe(true);
      expect(supportsExtended('rightClick', node)).toBe(false);
      expect(supportsExtended('doubleClick', node)).toBe(true);
      expect(supportsExtended('set', node)).toBe(false);
    });
  });

  describe('requireExtended', () => {
    it('should pass for a capable node', () => {
      const node = new FakeNode('a');
      node.caps = FULL_CAPABILITIES;

      expect(() => requireExtended('set', node)).not.toThrow();
    });

    it('should throw a capability error naming the operation', () => {
      const node = new FakeNode('a');

      expect(() => requireExtended('doubleClick', node)).toThrow(UnsupportedCapabilityError);
      expect(() => requireExtended('doubleClick', node)).toThrow(
        'The current driver does not support doubleClick options'
      );
    });
  });

  describe('toExtendedClick', () => {
    it('should return null when no extended arguments are given', () => {
      expect(toExtendedClick()).toBeNull();
      expect(toExtendedClick({})).toBeNull();
      expect(toExtendedClick({ modifiers: [] })).toBeNull();
    });

    it('should carry modifiers', () => {
      expect(toExtendedClick({ modifiers: ['control', 'shift'] })).toEqual({
        modifiers: ['control', 'shift'],
      });
    });

    it('should turn coordinates into an offset', () => {
      expect(toExtendedClick({ x: 10, y: 4 })).toEqual({ modifiers: [], offset: { x: 10, y: 4 } });
      expect(toExtendedClick({ modifiers: ['meta'], x: 0, y: 0 })).toEqual({
        modifiers: ['meta'],
        offset: { x: 0, y: 0 },
      });
    });

    it('should reject a single coordinate', () => {
      expect(() => toExtendedClick({ y: 3 })).toThrow(TypeError);
      expect(() => toExtendedClick({ x: 3 })).toThrow('A click offset requires both x and y');
    });
  });
});
