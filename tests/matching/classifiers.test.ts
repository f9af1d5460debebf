/**
 * Tests for deal classifiers
 */

import { describe, it, expect } from 'vitest';
import {
  classifyDealType,
  extractAmount,
  extractEntities,
  ENTITIES_MAX_LENGTH,
} from '../../src/matching/classifiers';

describe('Deal Classifiers', () => {
  describe('classifyDealType', () => {
    it('should detect M&A', () => {
      expect(classifyDealType('Acme acquires Beta Farms')).toBe('M&A');
      expect(classifyDealType('Dispensary chain announces MERGER')).toBe('M&A');
    });

    it('should detect capital raises', () => {
      expect(classifyDealType('GreenCo raises $10M in private placement')).toBe('Capital Raise');
    });

    it('should detect debt', () => {
      expect(classifyDealType('Leaf Corp closes $25 million term loan')).toBe('Debt');
    });

    it('should classify typical headlines', () => {
      expect(classifyDealType('XYZ Corp to acquire ABC Inc for $50 million')).toBe('M&A');
      expect(classifyDealType('Company raises $10M in private placement')).toBe('Capital Raise');
      expect(classifyDealType('Company secures $5M term loan')).toBe('Debt');
    });

    it('should apply M&A before capital raise and debt', () => {
      expect(classifyDealType('Acquisition financed by a term loan')).toBe('M&A');
      expect(classifyDealType('Grower raised funds through convertible notes')).toBe('Capital Raise');
    });

    it('should fall back to Other', () => {
      expect(classifyDealType('Dispensary opens new location')).toBe('Other');
      expect(classifyDealType('')).toBe('Other');
    });

    it('should accept custom keyword groups', () => {
      const keywords = { mergersAndAcquisitions: ['buys'], capitalRaise: ['xyz'], debt: ['xyz'] };
      expect(classifyDealType('Acme buys Beta', keywords)).toBe('M&A');
    });
  });

  describe('extractAmount', () => {
    it('should scale millions and billions', () => {
      expect(extractAmount('Deal valued at $12.5 million')).toBe('$12.5M');
      expect(extractAmount('USD 3 billion deal')).toBe('$3B');
      expect(extractAmount('a 2.5bn merger')).toBe('$2.5B');
      expect(extractAmount('raised 40m from investors')).toBe('$40M');
    });

    it('should keep comma-grouped numbers whole', () => {
      expect(extractAmount('$1,500,000 in notes')).toBe('$1,500,000');
      expect(extractAmount('$1500 fee')).toBe('$1500');
    });

    it('should not read a following word as a scale', () => {
      expect(extractAmount('$5 more')).toBe('$5');
    });

    it('should not start a number inside a decimal', () => {
      expect(extractAmount('a $.5 million grant')).toBe('');
      expect(extractAmount('released v1.2 today')).toBe('');
      expect(extractAmount('a $.5 million grant, then $2 million more')).toBe('$2M');
    });

    it('should ignore digits inside words', () => {
      expect(extractAmount('Q3 results')).toBe('');
    });

    it('should return empty string without a number', () => {
      expect(extractAmount('no numbers here')).toBe('');
      expect(extractAmount('')).toBe('');
    });

    it('should take the first mention', () => {
      expect(extractAmount('$20 million now and $5 million later')).toBe('$20M');
    });
  });

  describe('extractEntities', () => {
    it('should split on a linking phrase', () => {
      expect(extractEntities('Acme Holdings acquires Beta Farms')).toBe('Acme Holdings | Beta Farms');
    });

    it('should split on "to acquire"', () => {
      expect(extractEntities('GreenLeaf Inc to acquire BudCo LLC')).toBe('GreenLeaf Inc | BudCo LLC');
    });

    it('should use the first phrase in list order', () => {
      expect(extractEntities('Acme raises funds to acquire Beta')).toBe('Acme raises funds | Beta');
    });

    it('should match case-insensitively and keep original casing', () => {
      expect(extractEntities('ACME ACQUIRES BETA')).toBe('ACME | BETA');
    });

    it('should return the cleaned title without a phrase', () => {
      expect(extractEntities('  Cannabis   market update ')).toBe('Cannabis market update');
    });

    it('should cap the length', () => {
      expect(extractEntities('A'.repeat(250))).toHaveLength(ENTITIES_MAX_LENGTH);
    });

    it('should accept custom split phrases', () => {
      expect(extractEntities('X buys Y', [' buys '])).toBe('X | Y');
    });
  });
});
