import { GROUPINGS_TABLE, type DatasetStore, type TableColumnInfo } from './adapters/data.adapter';
import type { DatasetProfile } from './config';
import { DataUnavailableError, errorMessage } from './errors';
import type { Logger } from './logger';
import { StatementBuilder } from './query/query-builder';
import type {
  CategoricalColumnStats,
  ColumnType,
  ColumnWhitelist,
  DataRecord,
  DatasetColumn,
  NumericColumnStats,
  SchemaContext,
  WhitelistClause,
} from './types';
import { isRecord } from './types';

export interface SchemaContextOptions {
  sampleRows: number;
  categoricalValueLimit: number;
}

const NUMERIC_SQL_TYPE = /INT|REAL|FLOA|DOUB|NUM|DEC|MONEY/i;
const MIN_CATEGORICAL_THRESHOLD = 20;

function toNumber(value: unknown): number | null {
  if (typeof value === 'number' && Number.isFinite(value)) {
    return value;
  }
  if (typeof value === 'string' && value.trim() !== '' && Number.isFinite(Number(value))) {
    return Number(value);
  }
  return null;
}

function parseGroupings(raw: unknown): Record<string, string[]> | undefined {
  if (typeof raw !== 'string') {
    return undefined;
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return undefined;
  }
  if (!isRecord(parsed)) {
    return undefined;
  }

  const groupings: Record<string, string[]> = {};
  for (const [group, columns] of Object.entries(parsed)) {
    if (Array.isArray(columns)) {
      groupings[group] = columns.filter((column): column is string => typeof column === 'string');
    }
  }
  return groupings;
}

/** Keep only real columns, preserving the configured order. */
function restrictTo(columns: readonly string[], names: ReadonlySet<string>): string[] {
  return columns.filter((column) => names.has(column));
}

export function buildWhitelist(
  columns: DatasetColumn[],
  configured: Partial<Record<WhitelistClause, string[]>>,
): ColumnWhitelist {
  const names = new Set(columns.map((column) => column.name));
  const numeric = columns.filter((column) => column.type === 'numeric').map((column) => column.name);
  const categorical = columns.filter((column) => column.type === 'categorical').map((column) => column.name);

  const defaults: ColumnWhitelist = {
    sortable: numeric,
    groupable: columns.map((column) => column.name),
    aggregatable: numeric,
    filterable: categorical,
    range: numeric,
  };

  const pick = (clause: WhitelistClause): string[] => {
    const narrowed = configured[clause];
    if (!narrowed) {
      return [...defaults[clause]];
    }
    const allowed = new Set(defaults[clause]);
    return restrictTo(narrowed, names).filter((column) => allowed.has(column));
  };

  return {
    sortable: pick('sortable'),
    groupable: pick('groupable'),
    aggregatable: pick('aggregatable'),
    filterable: pick('filterable'),
    range: pick('range'),
  };
}

/**
 * Read-only description of the dataset table, computed once per process.
 */
export class SchemaContextProvider {
  private store: DatasetStore;
  private profile: DatasetProfile;
  private options: SchemaContextOptions;
  private logger?: Logger;
  private cached?: Promise<SchemaContext>;

  constructor(store: DatasetStore, profile: DatasetProfile, options: SchemaContextOptions, logger?: Logger) {
    this.store = store;
    this.profile = profile;
    this.options = options;
    this.logger = logger;
  }

  /**
   * Throws {@link DataUnavailableError} when the store or table cannot be read.
   * A failed load is not cached, so the next call tries again.
   */
  describe(): Promise<SchemaContext> {
    if (!this.cached) {
      this.cached = this.load().catch((error: unknown) => {
        this.cached = undefined;
        if (error instanceof DataUnavailableError) {
          throw error;
        }
        throw new DataUnavailableError(`Dataset is unavailable: ${errorMessage(error)}`, { cause: error });
      });
    }
    return this.cached;
  }

  private async load(): Promise<SchemaContext> {
    const tableName = this.profile.table ?? (await this.store.defaultTable());
    if (!(await this.store.hasTable(tableName))) {
      throw new DataUnavailableError(`Table "${tableName}" was not found`);
    }

    const tableSchema = await this.store.getTableSchema(tableName);
    if (tableSchema.length === 0) {
      throw new DataUnavailableError(`Table "${tableName}" has no columns`);
    }

    const rowCount = await this.countRows(tableName);
    const sampleRows = await this.fetchSampleRows(tableName);

    const columns: DatasetColumn[] = [];
    for (const info of tableSchema) {
      columns.push(await this.describeColumn(tableName, info, rowCount, sampleRows));
    }
    const names = new Set(columns.map((column) => column.name));

    const whitelist = buildWhitelist(columns, this.profile.whitelist);
    const valueColumn = [this.profile.valueColumn, ...whitelist.aggregatable]
      .find((column): column is string => column !== undefined && whitelist.aggregatable.includes(column));
    const defaultSortColumn = [this.profile.defaultSortColumn, valueColumn, ...whitelist.sortable]
      .find((column): column is string => column !== undefined && whitelist.sortable.includes(column));

    const context: SchemaContext = {
      tableName,
      rowCount,
      columns,
      sampleRows,
      groupings: await this.loadGroupings(columns),
      definitions: Object.fromEntries(
        Object.entries(this.profile.columns).filter(([column]) => names.has(column)),
      ),
      whitelist,
      defaultSortColumn,
      valueColumn,
      monetaryColumns: restrictTo(this.profile.monetaryColumns, names),
    };

    await this.logger?.info('Schema context loaded', {
      table: tableName,
      rows: rowCount,
      columns: columns.map((column) => `${column.name}:${column.type}`),
    });

    return context;
  }

  private async countRows(tableName: string): Promise<number> {
    const b = new StatementBuilder(this.store.dialect);
    const [row] = await this.store.query(b.build(b.select('COUNT(*) AS row_count', `FROM ${b.table(tableName)}`)));
    return toNumber(row?.row_count) ?? 0;
  }

  private async fetchSampleRows(tableName: string): Promise<DataRecord[]> {
    const b = new StatementBuilder(this.store.dialect);
    return this.store.query(b.build(b.select('*', `FROM ${b.table(tableName)}`, this.options.sampleRows)));
  }

  private async describeColumn(
    tableName: string,
    info: TableColumnInfo,
    rowCount: number,
    sampleRows: DataRecord[],
  ): Promise<DatasetColumn> {
    const description = this.profile.columns[info.name];
    const samples = sampleRows.map((row) => row[info.name]).filter((value) => value !== null && value !== undefined);
    const declaredNumeric = NUMERIC_SQL_TYPE.test(info.type);
    const inferredNumeric = info.type.trim() === '' && samples.length > 0 && samples.every((value) => typeof value === 'number');

    if (declaredNumeric || inferredNumeric) {
      return { name: info.name, type: 'numeric', description, stats: await this.numericStats(tableName, info.name) };
    }

    const cardinality = await this.countDistinct(tableName, info.name);
    const threshold = Math.max(MIN_CATEGORICAL_THRESHOLD, Math.ceil(rowCount * 0.1));
    const type: ColumnType = cardinality < threshold ? 'categorical' : 'text';
    if (type === 'text') {
      return { name: info.name, type, description };
    }

    const stats: CategoricalColumnStats = {
      kind: 'categorical',
      cardinality,
      sampleValues: await this.distinctValues(tableName, info.name),
    };
    return { name: info.name, type, description, stats };
  }

  private async numericStats(tableName: string, column: string): Promise<NumericColumnStats> {
    const b = new StatementBuilder(this.store.dialect);
    const c = b.id(column);
    const [row] = await this.store.query(
      b.build(
        b.select(
          `MIN(${c}) AS min_value, MAX(${c}) AS max_value, AVG(${c}) AS mean_value`,
          `FROM ${b.table(tableName)}`,
        ),
      ),
    );
    return {
      kind: 'numeric',
      min: toNumber(row?.min_value),
      max: toNumber(row?.max_value),
      mean: toNumber(row?.mean_value),
    };
  }

  private async countDistinct(tableName: string, column: string): Promise<number> {
    const b = new StatementBuilder(this.store.dialect);
    const [row] = await this.store.query(
      b.build(b.select(`COUNT(DISTINCT ${b.id(column)}) AS cardinality`, `FROM ${b.table(tableName)}`)),
    );
    return toNumber(row?.cardinality) ?? 0;
  }

  private async distinctValues(tableName: string, column: string): Promise<string[]> {
    const b = new StatementBuilder(this.store.dialect);
    const c = b.id(column);
    const rows = await this.store.query(
      b.build(
        b.select(
          `DISTINCT ${c} AS distinct_value`,
          `FROM ${b.table(tableName)} WHERE ${c} IS NOT NULL ORDER BY ${c}`,
          this.options.categoricalValueLimit,
        ),
      ),
    );
    return rows.map((row) => String(row.distinct_value));
  }

  private async loadGroupings(columns: DatasetColumn[]): Promise<Record<string, string[]>> {
    const names = new Set(columns.map((column) => column.name));
    const restrict = (groupings: Record<string, string[]>) =>
      Object.fromEntries(
        Object.entries(groupings)
          .map(([group, members]): [string, string[]] => [group, restrictTo(members, names)])
          .filter(([, members]) => members.length > 0),
      );

    if (this.profile.groupings) {
      return restrict(this.profile.groupings);
    }

    if (await this.store.hasTable(GROUPINGS_TABLE)) {
      try {
        const b = new StatementBuilder(this.store.dialect);
        const text = b.select(
          `${b.id('value')} AS stored_value`,
          `FROM ${b.table(GROUPINGS_TABLE)} WHERE ${b.id('key')} = ${b.bind('main_grouping')}`,
        );
        const [row] = await this.store.query(b.build(text));
        const stored = parseGroupings(row?.stored_value);
        if (stored) {
          return restrict(stored);
        }
      } catch (error) {
        await this.logger?.warn('Could not read stored groupings', error);
      }
    }

    return { General: columns.map((column) => column.name) };
  }
}
