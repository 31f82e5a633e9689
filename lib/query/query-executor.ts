import type { DatasetStore } from '../adapters/data.adapter';
import { InvalidToolParametersError, errorMessage } from '../errors';
import type { Logger } from '../logger';
import { normalizeToken } from '../tools/parameters';
import type { LookupDefinitionParams, ToolCall, ToolName } from '../tools/tool-call';
import type { CellValue, DataRecord, SchemaContext } from '../types';
import { type BuiltQuery, type QueryLimits, buildStatement } from './query-builder';

export interface QuerySuccess {
  ok: true;
  tool: ToolName;
  rows: DataRecord[];
  count: number;
  parameters: Record<string, CellValue>;
}

export interface QueryFailure {
  ok: false;
  tool: ToolName;
  error: 'database_error' | 'invalid_parameters';
  detail: string;
}

export type QueryResult = QuerySuccess | QueryFailure;

/**
 * Runs validated tool calls against the store. Never throws: whitelist
 * violations and store failures come back as {@link QueryFailure}.
 */
export class QueryExecutor {
  private store: DatasetStore;
  private context: SchemaContext;
  private limits: QueryLimits;
  private logger?: Logger;

  constructor(store: DatasetStore, context: SchemaContext, limits: QueryLimits, logger?: Logger) {
    this.store = store;
    this.context = context;
    this.limits = limits;
    this.logger = logger;
  }

  async run(call: ToolCall, requestId?: string): Promise<QueryResult> {
    if (call.tool === 'lookup_definition') {
      return this.lookupDefinition(call.params);
    }

    let built: BuiltQuery;
    try {
      built = buildStatement(call, this.context, this.store.dialect, this.limits);
    } catch (error) {
      if (error instanceof InvalidToolParametersError) {
        await this.logger?.warn('Rejected tool parameters', { requestId, tool: call.tool, parameter: error.parameter });
        return { ok: false, tool: call.tool, error: 'invalid_parameters', detail: error.message };
      }
      throw error;
    }

    if (requestId) {
      await this.logger?.chatQuery(requestId, 'Executing query', {
        sql: built.statement.text,
        params: built.statement.params,
      });
    }

    try {
      const rows = await this.store.query(built.statement);
      return { ok: true, tool: call.tool, rows, count: rows.length, parameters: built.parameters };
    } catch (error) {
      await this.logger?.error('Query failed', { requestId, tool: call.tool, error: errorMessage(error) });
      return { ok: false, tool: call.tool, error: 'database_error', detail: errorMessage(error) };
    }
  }

  /** Data dictionary lookup; reads no rows. */
  private lookupDefinition(params: LookupDefinitionParams): QuerySuccess {
    const groupRows = Object.entries(this.context.groupings).map(([group, columns]): DataRecord => ({
      term: group,
      kind: 'group',
      columns: columns.join(', '),
    }));

    let rows: DataRecord[];
    if (params.term === undefined) {
      rows = groupRows;
    } else {
      const token = normalizeToken(params.term);
      const columnRows = this.context.columns
        .filter((column) => normalizeToken(column.name) === token)
        .map((column): DataRecord => ({
          term: column.name,
          kind: 'column',
          description: this.context.definitions[column.name] ?? `${column.type} column`,
        }));
      rows = [...columnRows, ...groupRows.filter((row) => normalizeToken(String(row.term)) === token)];
    }

    return {
      ok: true,
      tool: 'lookup_definition',
      rows,
      count: rows.length,
      parameters: { term: params.term ?? null },
    };
  }
}
