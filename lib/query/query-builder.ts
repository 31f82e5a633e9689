import type { SqlDialect, SqlParameter, SqlStatement } from '../adapters/data.adapter';
import { InvalidToolParametersError } from '../errors';
import type { AggregateStatsParams, SearchRowsParams, ToolCall } from '../tools/tool-call';
import type { CellValue, SchemaContext, WhitelistClause } from '../types';

export interface QueryLimits {
  defaultLimit: number;
  maxLimit: number;
  maxGroups: number;
}

/** Tool calls answered with SQL. */
export type SqlToolCall = Exclude<ToolCall, { tool: 'lookup_definition' }>;

export interface BuiltQuery {
  statement: SqlStatement;
  /** The parameters in effect after defaults and clamping. */
  parameters: Record<string, CellValue>;
}

/**
 * Accumulates bound values while SQL text is assembled around their placeholders.
 */
export class StatementBuilder {
  private readonly dialect: SqlDialect;
  private readonly params: SqlParameter[] = [];

  constructor(dialect: SqlDialect) {
    this.dialect = dialect;
  }

  bind(value: SqlParameter): string {
    this.params.push(value);
    return this.dialect.placeholder(this.params.length);
  }

  id(identifier: string): string {
    return this.dialect.quoteIdentifier(identifier);
  }

  table(tableName: string): string {
    return this.dialect.quoteTable(tableName);
  }

  /**
   * `SELECT <projection> <body>` capped at `limit` rows. Call after every
   * value in `body` is bound so positional placeholders stay in order.
   */
  select(projection: string, body: string, limit?: number): string {
    if (limit === undefined) {
      return `SELECT ${projection} ${body}`;
    }
    if (this.dialect.limitStyle === 'top') {
      return `SELECT TOP (${this.bind(limit)}) ${projection} ${body}`;
    }
    return `SELECT ${projection} ${body} LIMIT ${this.bind(limit)}`;
  }

  build(text: string): SqlStatement {
    return { text, params: [...this.params] };
  }
}

export function clampLimit(limit: number | undefined, limits: Pick<QueryLimits, 'defaultLimit' | 'maxLimit'>): number {
  if (limit === undefined || !Number.isFinite(limit)) {
    return limits.defaultLimit;
  }
  return Math.min(Math.max(Math.trunc(limit), 1), limits.maxLimit);
}

function requireWhitelisted(
  context: SchemaContext,
  clause: WhitelistClause,
  parameter: string,
  column: string,
): string {
  if (!context.whitelist[clause].includes(column)) {
    throw new InvalidToolParametersError(parameter, `Column "${column}" cannot be used for ${parameter}`);
  }
  return column;
}

function buildSearchRows(
  params: SearchRowsParams,
  context: SchemaContext,
  dialect: SqlDialect,
  limits: QueryLimits,
): BuiltQuery {
  const b = new StatementBuilder(dialect);
  const where: string[] = [];
  const parameters: Record<string, CellValue> = {};

  for (const [column, value] of Object.entries(params.filters)) {
    requireWhitelisted(context, 'filterable', column, column);
    where.push(`${b.id(column)} = ${b.bind(value)}`);
    parameters[column] = value;
  }

  if (params.minValue !== undefined || params.maxValue !== undefined) {
    const rangeColumn = params.rangeColumn ?? context.valueColumn;
    if (!rangeColumn) {
      throw new InvalidToolParametersError('range_column', 'No numeric column is available for a range filter');
    }
    requireWhitelisted(context, 'range', 'range_column', rangeColumn);
    parameters.range_column = rangeColumn;

    if (params.minValue !== undefined) {
      where.push(`${b.id(rangeColumn)} >= ${b.bind(params.minValue)}`);
      parameters.min_value = params.minValue;
    }
    if (params.maxValue !== undefined) {
      where.push(`${b.id(rangeColumn)} <= ${b.bind(params.maxValue)}`);
      parameters.max_value = params.maxValue;
    }
  }

  let orderBy = '';
  if (params.sortBy !== undefined || params.sortOrder !== undefined) {
    const sortable = context.whitelist.sortable;
    const sortColumn = params.sortBy !== undefined && sortable.includes(params.sortBy)
      ? params.sortBy
      : context.defaultSortColumn;

    if (sortColumn !== undefined && sortable.includes(sortColumn)) {
      const direction = params.sortOrder ?? 'ASC';
      orderBy = ` ORDER BY ${b.id(sortColumn)} ${direction}`;
      parameters.sort_by = sortColumn;
      parameters.sort_order = direction;
    }
  }

  const limit = clampLimit(params.limit, limits);
  parameters.limit = limit;

  const whereClause = where.length > 0 ? ` WHERE ${where.join(' AND ')}` : '';
  const text = b.select('*', `FROM ${b.table(context.tableName)}${whereClause}${orderBy}`, limit);

  return { statement: b.build(text), parameters };
}

function buildAggregateStats(
  params: AggregateStatsParams,
  context: SchemaContext,
  dialect: SqlDialect,
  limits: QueryLimits,
): BuiltQuery {
  const groupBy = requireWhitelisted(context, 'groupable', 'group_by', params.groupBy);
  const targetCol = requireWhitelisted(context, 'aggregatable', 'target_col', params.targetCol);

  const b = new StatementBuilder(dialect);
  const group = b.id(groupBy);
  const value = b.id('value');
  const text = b.select(
    `${group}, ${params.aggType}(${b.id(targetCol)}) AS ${value}`,
    `FROM ${b.table(context.tableName)} GROUP BY ${group} ORDER BY ${value} DESC, ${group} ASC`,
    limits.maxGroups,
  );

  return {
    statement: b.build(text),
    parameters: {
      group_by: groupBy,
      target_col: targetCol,
      agg_type: params.aggType,
    },
  };
}

/**
 * Turn a validated tool call into a parameterized statement.
 * Throws {@link InvalidToolParametersError} when a column is outside the whitelist.
 */
export function buildStatement(
  call: SqlToolCall,
  context: SchemaContext,
  dialect: SqlDialect,
  limits: QueryLimits,
): BuiltQuery {
  switch (call.tool) {
    case 'search_rows':
      return buildSearchRows(call.params, context, dialect, limits);
    case 'aggregate_stats':
      return buildAggregateStats(call.params, context, dialect, limits);
  }
}
