import { describe, expect, it } from 'vitest';
import { Tuple, compare, formatElement, formatValue, isValue } from '../src/value';

// ============================================================================
// Comparator
// ============================================================================

describe('compare', () => {
    it('orders numbers numerically and strings lexicographically', () => {
        expect(compare(1, 2)).toBeLessThan(0);
        expect(compare(10, 2)).toBeGreaterThan(0);
        expect(compare(2, 2)).toBe(0);
        expect(compare('a', 'b')).toBe(-1);
        expect(compare('b', 'a')).toBe(1);
    });

    it('orders booleans false before true', () => {
        expect(compare(false, true)).toBe(-1);
        expect(compare(true, false)).toBe(1);
        expect(compare(true, true)).toBe(0);
    });

    it('orders kinds: booleans < numbers < strings < arrays < tuples', () => {
        expect(compare(true, 0)).toBe(-1);
        expect(compare(5, 'a')).toBe(-1);
        expect(compare('a', [1])).toBe(-1);
        expect(compare([1], new Tuple(1))).toBe(-1);
        expect(compare(new Tuple(1), 99)).toBe(3);
    });

    it('treats equal composites as the same element', () => {
        expect(compare(new Tuple(1, 2), new Tuple(1, 2))).toBe(0);
        expect(compare([1, 'a'], [1, 'a'])).toBe(0);
        expect(compare([new Tuple(0, [1])], [new Tuple(0, [1])])).toBe(0);
    });

    it('distinguishes composites with different contents', () => {
        expect(compare(new Tuple(1, 2), new Tuple(2, 1))).not.toBe(0);
        expect(compare([1, 2], [1, 2, 3])).not.toBe(0);
    });

    it('orders composites by length, then element by element', () => {
        expect(compare([9], [1, 1])).toBe(-1);
        expect(compare([1, 5], [2, 0])).toBe(-1);
        expect(compare(new Tuple('b', 0), new Tuple('a', 9))).toBe(1);
        expect(compare([1, [2, 3]], [1, [2, 4]])).toBe(-1);
    });

    it('is antisymmetric for composites', () => {
        const a = new Tuple(3, 'x');
        const b = new Tuple(4, 'y');
        expect(Math.sign(compare(a, b))).toBe(-Math.sign(compare(b, a)));
    });
});

// ============================================================================
// Tuple
// ============================================================================

describe('Tuple', () => {
    it('copies and freezes its contents', () => {
        const source = [1, 2];
        const t = new Tuple(...source);
        source.push(3);
        expect(t.length).toBe(2);
        expect(Object.isFrozen(t.raw)).toBe(true);
        expect([...t]).toEqual([1, 2]);
    });

    it('compares by value', () => {
        expect(new Tuple(1, 'b').equals(new Tuple(1, 'b'))).toBe(true);
        expect(new Tuple(1, 'b').equals(new Tuple('b', 1))).toBe(false);
    });

    it('prints nested values', () => {
        expect(new Tuple(1, 'b').toString()).toBe('(1, "b")');
        expect(new Tuple(1, [2, 3]).toString()).toBe('(1, [2, 3])');
    });
});

// ============================================================================
// Validation & Formatting
// ============================================================================

describe('isValue', () => {
    it('accepts booleans, finite numbers, strings, tuples and arrays of values', () => {
        expect(isValue(false)).toBe(true);
        expect(isValue(0)).toBe(true);
        expect(isValue('')).toBe(true);
        expect(isValue(new Tuple(1, 'x'))).toBe(true);
        expect(isValue([[1], 'a'])).toBe(true);
    });

    it('rejects non-finite numbers and foreign types', () => {
        expect(isValue(NaN)).toBe(false);
        expect(isValue(Infinity)).toBe(false);
        expect(isValue(null)).toBe(false);
        expect(isValue({})).toBe(false);
        expect(isValue(undefined)).toBe(false);
        expect(isValue([1, NaN])).toBe(false);
    });
});

describe('formatValue', () => {
    it('quotes strings and brackets arrays', () => {
        expect(formatValue(4)).toBe('4');
        expect(formatValue('a')).toBe('"a"');
        expect(formatValue([1, 'b'])).toBe('[1, "b"]');
        expect(formatValue(new Tuple(0, 1))).toBe('(0, 1)');
        expect(formatValue([true, false])).toBe('[true, false]');
    });
});

describe('formatElement', () => {
    it('falls back to String() outside the value universe', () => {
        expect(formatElement('a')).toBe('"a"');
        expect(formatElement({ toString: () => 'node-7' })).toBe('node-7');
        expect(formatElement(null)).toBe('null');
    });
});
