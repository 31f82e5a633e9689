import { describe, expect, it } from 'vitest';
import { parseCSV, parseCSVLine, parseValue } from './csv';

describe('csv', () => {
  describe('parseCSVLine', () => {
    it('should split on commas outside quotes', () => {
      expect(parseCSVLine('a,"b, c",d')).toEqual(['a', 'b, c', 'd']);
    });

    it('should unescape doubled quotes', () => {
      expect(parseCSVLine('"say ""hi""",x')).toEqual(['say "hi"', 'x']);
    });

    it('should keep empty trailing fields', () => {
      expect(parseCSVLine('a,,')).toEqual(['a', '', '']);
    });
  });

  describe('parseValue', () => {
    it('should type numbers, booleans and blanks', () => {
      expect(parseValue('-122.22')).toBe(-122.22);
      expect(parseValue(' 447000 ')).toBe(447000);
      expect(parseValue('TRUE')).toBe(true);
      expect(parseValue('')).toBeNull();
    });

    it('should read percentages and currency', () => {
      expect(parseValue('45%')).toBe(0.45);
      expect(parseValue('$1,250.50')).toBe(1250.5);
      expect(parseValue('$(122.80)')).toBe(-122.8);
    });

    it('should keep category labels as text', () => {
      expect(parseValue('<1H OCEAN')).toBe('<1H OCEAN');
      expect(parseValue('"NEAR BAY"')).toBe('NEAR BAY');
    });
  });

  describe('parseCSV', () => {
    it('should build typed records from a header row', () => {
      const records = parseCSV('name, value ,kind\r\nalpha,1.5,A\n\nbeta,,B\n');

      expect(records).toEqual([
        { name: 'alpha', value: 1.5, kind: 'A' },
        { name: 'beta', value: null, kind: 'B' },
      ]);
    });

    it('should return no records for empty input', () => {
      expect(parseCSV('')).toEqual([]);
    });
  });
});
