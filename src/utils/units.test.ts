/**
 * Unit tests for unit parsing and rounding helpers
 */

import { describe, it, expect } from '@jest/globals';
import { parseMemoryGB, parseCpu, roundTo, roundCurrency, formatCurrency } from './units.js';

describe('Unit Utilities', () => {
  describe('parseMemoryGB', () => {
    it('should treat bare numbers as GB', () => {
      expect(parseMemoryGB(8)).toBe(8);
      expect(parseMemoryGB('8')).toBe(8);
      expect(parseMemoryGB(0.5)).toBe(0.5);
    });

    it('should parse GB suffixes', () => {
      expect(parseMemoryGB('8GB')).toBe(8);
      expect(parseMemoryGB('8G')).toBe(8);
      expect(parseMemoryGB('8Gi')).toBe(8);
      expect(parseMemoryGB('8 GiB')).toBe(8);
      expect(parseMemoryGB('1.5gb')).toBe(1.5);
    });

    it('should convert MB and TB', () => {
      expect(parseMemoryGB('4096MB')).toBe(4);
      expect(parseMemoryGB('512Mi')).toBe(0.5);
      expect(parseMemoryGB('1Tb')).toBe(1024);
    });

    it('should reject unparseable values', () => {
      expect(parseMemoryGB('lots')).toBeUndefined();
      expect(parseMemoryGB('8XB')).toBeUndefined();
      expect(parseMemoryGB(-2)).toBeUndefined();
      expect(parseMemoryGB(null)).toBeUndefined();
      expect(parseMemoryGB([8])).toBeUndefined();
    });
  });

  describe('parseCpu', () => {
    it('should parse numbers and numeric strings', () => {
      expect(parseCpu(4)).toBe(4);
      expect(parseCpu('2.5')).toBe(2.5);
      expect(parseCpu(' 8 ')).toBe(8);
    });

    it('should reject everything else', () => {
      expect(parseCpu('four')).toBeUndefined();
      expect(parseCpu('4cpu')).toBeUndefined();
      expect(parseCpu(Number.NaN)).toBeUndefined();
      expect(parseCpu(true)).toBeUndefined();
    });
  });

  describe('rounding', () => {
    it('should round to the requested precision', () => {
      expect(roundTo(0.23219999, 4)).toBe(0.2322);
      expect(roundTo(2.5, 0)).toBe(3);
    });

    it('should round money to cents', () => {
      expect(roundCurrency(520.92 * (1 - 0.7))).toBe(156.28);
      expect(roundCurrency(520.92 * 2)).toBe(1041.84);
    });
  });

  describe('formatCurrency', () => {
    it('should format dollars with two decimals', () => {
      expect(formatCurrency(520.92)).toBe('$520.92');
      expect(formatCurrency(156.3)).toBe('$156.30');
    });

    it('should suffix other currencies', () => {
      expect(formatCurrency(10, 'EUR')).toBe('10.00 EUR');
    });
  });
});
