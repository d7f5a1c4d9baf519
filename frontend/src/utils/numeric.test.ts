import { describe, it, expect } from 'vitest';
import { parseNumeric } from './numeric';

describe('parseNumeric', () => {
    it('should pass finite numbers through', () => {
        expect(parseNumeric(2.5)).toBe(2.5);
    });

    it('should parse numeric strings', () => {
        expect(parseNumeric(' -12 ')).toBe(-12);
    });

    it('should fall back on empty, non-numeric and non-finite input', () => {
        expect(parseNumeric('', 7)).toBe(7);
        expect(parseNumeric('abc', 7)).toBe(7);
        expect(parseNumeric(Infinity, 7)).toBe(7);
        expect(parseNumeric(undefined)).toBe(0);
    });
});
