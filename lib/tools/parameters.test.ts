import { describe, expect, it } from 'vitest';
import { type ParameterSpec, coerceParameter, coerceParameters, normalizeToken, parseNumeric } from './parameters';

const LIMIT: ParameterSpec = { type: 'integer', description: 'rows', default: 5, min: 1, max: 50 };
const SORT_ORDER: ParameterSpec = {
  type: 'string',
  description: 'direction',
  allowed: ['ASC', 'DESC'],
  synonyms: { highest: 'DESC', cheapest: 'ASC' },
};

describe('tools/parameters', () => {
  describe('parseNumeric', () => {
    it('should read currency and magnitude suffixes', () => {
      expect(parseNumeric('$500k')).toBe(500000);
      expect(parseNumeric('2.5 million')).toBe(2500000);
      expect(parseNumeric('1,250')).toBe(1250);
      expect(parseNumeric(' 42 ')).toBe(42);
      expect(parseNumeric('-$300')).toBe(-300);
    });

    it('should read scientific notation', () => {
      expect(parseNumeric('1e5')).toBe(100000);
      expect(parseNumeric(' 2.5E3 ')).toBe(2500);
      expect(parseNumeric('-1e-2')).toBe(-0.01);
      expect(coerceParameter(LIMIT, '1e1')).toEqual({ ok: true, value: 10 });
    });

    it('should pass through values it cannot read', () => {
      expect(parseNumeric('cheap')).toBe('cheap');
      expect(parseNumeric(7)).toBe(7);
      expect(parseNumeric(null)).toBeNull();
    });
  });

  describe('normalizeToken', () => {
    it('should ignore case and separators', () => {
      expect(normalizeToken('Near Bay')).toBe('near_bay');
      expect(normalizeToken(' sort-order ')).toBe('sort_order');
    });
  });

  describe('coerceParameter', () => {
    it('should clamp integers into range', () => {
      expect(coerceParameter(LIMIT, '100')).toEqual({ ok: true, value: 50 });
      expect(coerceParameter(LIMIT, 0)).toEqual({ ok: true, value: 1 });
    });

    it('should reject non-integers and text for integer parameters', () => {
      expect(coerceParameter(LIMIT, 2.5).ok).toBe(false);
      expect(coerceParameter(LIMIT, 'a few').ok).toBe(false);
    });

    it('should match allowed values case-insensitively and through synonyms', () => {
      expect(coerceParameter(SORT_ORDER, 'desc')).toEqual({ ok: true, value: 'DESC' });
      expect(coerceParameter(SORT_ORDER, 'Highest')).toEqual({ ok: true, value: 'DESC' });
      expect(coerceParameter(SORT_ORDER, 'cheapest')).toEqual({ ok: true, value: 'ASC' });
    });

    it('should explain a value outside the allowed set', () => {
      expect(coerceParameter(SORT_ORDER, 'sideways')).toEqual({ ok: false, reason: 'expected one of ASC, DESC' });
    });

    it('should accept numbers for free-text string parameters', () => {
      expect(coerceParameter({ type: 'string', description: 'term' }, 5)).toEqual({ ok: true, value: '5' });
    });
  });

  describe('coerceParameters', () => {
    const specs: Record<string, ParameterSpec> = {
      group_by: {
        type: 'string',
        description: 'group',
        required: true,
        allowed: ['ocean_proximity', 'total_rooms'],
      },
      agg_type: {
        type: 'string',
        description: 'aggregate',
        default: 'AVG',
        allowed: ['AVG', 'SUM', 'COUNT', 'MIN', 'MAX'],
      },
      limit: LIMIT,
    };

    it('should normalize keys, apply aliases and drop failing values to defaults', () => {
      const result = coerceParameters(
        specs,
        { 'Group By': 'Ocean Proximity', agg_type: 'median', n: '7', extra: 1 },
        { n: 'limit' },
      );

      expect(result).toEqual({
        values: { group_by: 'ocean_proximity', agg_type: 'AVG', limit: 7 },
        dropped: ['agg_type'],
        missing: [],
      });
    });

    it('should report required parameters that are absent', () => {
      const result = coerceParameters(specs, { group_by: '  ' });

      expect(result).toEqual({
        values: { agg_type: 'AVG', limit: 5 },
        dropped: [],
        missing: ['group_by'],
      });
    });

    it('should report a required parameter whose value fails as both dropped and missing', () => {
      const result = coerceParameters(specs, { group_by: 'latitude' });

      expect(result.dropped).toEqual(['group_by']);
      expect(result.missing).toEqual(['group_by']);
    });
  });
});
