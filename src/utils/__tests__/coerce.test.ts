import { describe, it, expect } from 'vitest';
import { toInt, toFloat, coordinateOr, textOr } from '../coerce.js';

describe('toInt', () => {
    it('should parse pg count strings', () => {
        expect(toInt('100000')).toBe(100000);
        expect(toInt(7)).toBe(7);
        expect(toInt(BigInt(3))).toBe(3);
    });

    it('should read missing and garbage values as 0', () => {
        expect(toInt(undefined)).toBe(0);
        expect(toInt(null)).toBe(0);
        expect(toInt('abc')).toBe(0);
        expect(toInt(Number.NaN)).toBe(0);
    });
});

describe('toFloat', () => {
    it('should parse numeric strings', () => {
        expect(toFloat('4130514.41')).toBe(4130514.41);
        expect(toFloat(1.5)).toBe(1.5);
    });

    it('should return null for missing values', () => {
        expect(toFloat(null)).toBeNull();
        expect(toFloat('n/a')).toBeNull();
    });
});

describe('coordinateOr', () => {
    it('should keep valid coordinates', () => {
        expect(coordinateOr('-122.3321', 139.7454)).toBe(-122.3321);
        expect(coordinateOr(2.2945, 139.7454)).toBe(2.2945);
    });

    it('should fall back on missing, invalid and zero values', () => {
        expect(coordinateOr(undefined, 139.7454)).toBe(139.7454);
        expect(coordinateOr('east', 139.7454)).toBe(139.7454);
        expect(coordinateOr(0, 35.6586)).toBe(35.6586);
        expect(coordinateOr('0', 35.6586)).toBe(35.6586);
    });
});

describe('textOr', () => {
    it('should trim and fall back on blanks', () => {
        expect(textOr('  Seattle ', 'x')).toBe('Seattle');
        expect(textOr('   ', 'Tokyo Tower')).toBe('Tokyo Tower');
        expect(textOr(42, 'Tokyo Tower')).toBe('Tokyo Tower');
    });
});
