import { describe, expect, it } from 'vitest';
import { QUERY_DEFAULTS, housingContext } from '@/test/helpers';
import { sqlServerDialect, sqliteDialect } from '../adapters/database/base-database.adapter';
import { InvalidToolParametersError } from '../errors';
import { type SqlToolCall, buildStatement, clampLimit } from './query-builder';

const context = housingContext();

function build(call: SqlToolCall) {
  return buildStatement(call, context, sqliteDialect, QUERY_DEFAULTS);
}

describe('query/query-builder', () => {
  describe('search_rows', () => {
    it('should apply only the default limit when nothing else is given', () => {
      const built = build({ tool: 'search_rows', params: { filters: {}, limit: 5 } });

      expect(built.statement).toEqual({ text: 'SELECT * FROM "housing" LIMIT ?', params: [5] });
      expect(built.parameters).toEqual({ limit: 5 });
    });

    it('should sort by a whitelisted column', () => {
      const built = build({
        tool: 'search_rows',
        params: { filters: {}, sortBy: 'median_house_value', sortOrder: 'DESC', limit: 5 },
      });

      expect(built.statement).toEqual({
        text: 'SELECT * FROM "housing" ORDER BY "median_house_value" DESC LIMIT ?',
        params: [5],
      });
      expect(built.parameters).toEqual({ sort_by: 'median_house_value', sort_order: 'DESC', limit: 5 });
    });

    it('should fall back to the default sort column and ascending order', () => {
      const built = build({ tool: 'search_rows', params: { filters: {}, sortBy: 'population', limit: 5 } });

      expect(built.statement.text).toBe('SELECT * FROM "housing" ORDER BY "median_house_value" ASC LIMIT ?');
      expect(built.parameters).toEqual({ sort_by: 'median_house_value', sort_order: 'ASC', limit: 5 });
    });

    it('should bind filter values instead of splicing them into the text', () => {
      const hostile = "'; DROP TABLE x; --";
      const built = build({ tool: 'search_rows', params: { filters: { ocean_proximity: hostile }, limit: 5 } });

      expect(built.statement).toEqual({
        text: 'SELECT * FROM "housing" WHERE "ocean_proximity" = ? LIMIT ?',
        params: [hostile, 5],
      });
    });

    it('should bound the value column when no range column is named', () => {
      const built = build({
        tool: 'search_rows',
        params: { filters: { ocean_proximity: 'INLAND' }, minValue: 100000, maxValue: 200000, limit: 10 },
      });

      expect(built.statement).toEqual({
        text:
          'SELECT * FROM "housing" WHERE "ocean_proximity" = ? AND "median_house_value" >= ? ' +
          'AND "median_house_value" <= ? LIMIT ?',
        params: ['INLAND', 100000, 200000, 10],
      });
      expect(built.parameters).toEqual({
        ocean_proximity: 'INLAND',
        range_column: 'median_house_value',
        min_value: 100000,
        max_value: 200000,
        limit: 10,
      });
    });

    it('should clamp the limit', () => {
      expect(build({ tool: 'search_rows', params: { filters: {}, limit: 500 } }).statement.params).toEqual([50]);
      expect(build({ tool: 'search_rows', params: { filters: {}, limit: 0 } }).statement.params).toEqual([1]);
    });

    it('should reject a filter on a column outside the whitelist', () => {
      expect(() => build({ tool: 'search_rows', params: { filters: { longitude: '-122' }, limit: 5 } })).toThrow(
        InvalidToolParametersError,
      );
    });
  });

  describe('aggregate_stats', () => {
    it('should group, aggregate and order by the value', () => {
      const built = build({
        tool: 'aggregate_stats',
        params: { groupBy: 'ocean_proximity', targetCol: 'median_house_value', aggType: 'AVG' },
      });

      expect(built.statement).toEqual({
        text:
          'SELECT "ocean_proximity", AVG("median_house_value") AS "value" FROM "housing" ' +
          'GROUP BY "ocean_proximity" ORDER BY "value" DESC, "ocean_proximity" ASC LIMIT ?',
        params: [50],
      });
      expect(built.parameters).toEqual({
        group_by: 'ocean_proximity',
        target_col: 'median_house_value',
        agg_type: 'AVG',
      });
    });

    it('should name the offending parameter', () => {
      try {
        build({ tool: 'aggregate_stats', params: { groupBy: 'ocean_proximity', targetCol: 'ocean_proximity', aggType: 'SUM' } });
        expect.unreachable('buildStatement should have thrown');
      } catch (error) {
        expect(error).toBeInstanceOf(InvalidToolParametersError);
        expect(error).toMatchObject({ parameter: 'target_col' });
      }
    });
  });

  describe('whitelist', () => {
    it('should only ever quote whitelisted columns, the table and the value alias', () => {
      const allowed = new Set([...context.columns.map((column) => column.name), 'housing', 'value']);
      const calls: SqlToolCall[] = [];
      for (const groupBy of context.whitelist.groupable) {
        for (const targetCol of context.whitelist.aggregatable) {
          calls.push({ tool: 'aggregate_stats', params: { groupBy, targetCol, aggType: 'MAX' } });
        }
      }
      for (const sortBy of [...context.whitelist.sortable, 'latitude', 'not_a_column']) {
        calls.push({
          tool: 'search_rows',
          params: { filters: { ocean_proximity: 'ISLAND' }, sortBy, sortOrder: 'DESC', minValue: 1, limit: 3 },
        });
      }

      for (const call of calls) {
        const identifiers = [...build(call).statement.text.matchAll(/"([^"]+)"/g)].map((match) => match[1]);
        expect(identifiers.every((identifier) => allowed.has(identifier))).toBe(true);
      }
    });

    it('should reject hostile identifiers in every clause', () => {
      const hostile = 'x" ; DROP TABLE housing; --';

      expect(() => build({ tool: 'aggregate_stats', params: { groupBy: hostile, targetCol: 'population', aggType: 'AVG' } }))
        .toThrow(InvalidToolParametersError);
      expect(() => build({ tool: 'search_rows', params: { filters: {}, rangeColumn: hostile, minValue: 1, limit: 5 } }))
        .toThrow(InvalidToolParametersError);
      expect(build({ tool: 'search_rows', params: { filters: {}, sortBy: hostile, limit: 5 } }).statement.text).toBe(
        'SELECT * FROM "housing" ORDER BY "median_house_value" ASC LIMIT ?',
      );
    });
  });

  describe('SQL Server dialect', () => {
    it('should use bracket quoting, named placeholders and TOP', () => {
      const built = buildStatement(
        {
          tool: 'search_rows',
          params: { filters: { ocean_proximity: 'NEAR BAY' }, sortBy: 'median_house_value', sortOrder: 'DESC', limit: 5 },
        },
        housingContext({ tableName: 'dbo.housing' }),
        sqlServerDialect,
        QUERY_DEFAULTS,
      );

      expect(built.statement).toEqual({
        text: 'SELECT TOP (@p2) * FROM [dbo].[housing] WHERE [ocean_proximity] = @p1 ORDER BY [median_house_value] DESC',
        params: ['NEAR BAY', 5],
      });
    });

    it('should escape closing brackets in identifiers', () => {
      expect(sqlServerDialect.quoteIdentifier('odd]name')).toBe('[odd]]name]');
      expect(sqliteDialect.quoteIdentifier('odd"name')).toBe('"odd""name"');
    });
  });

  describe('clampLimit', () => {
    it('should default, truncate and clamp', () => {
      expect(clampLimit(undefined, QUERY_DEFAULTS)).toBe(5);
      expect(clampLimit(Number.NaN, QUERY_DEFAULTS)).toBe(5);
      expect(clampLimit(7.9, QUERY_DEFAULTS)).toBe(7);
      expect(clampLimit(-3, QUERY_DEFAULTS)).toBe(1);
    });
  });
});
