import {
  GROUPINGS_TABLE,
  type DatabaseConfig,
  type DatasetStore,
  type SqlDialect,
  type SqlStatement,
  type TableColumnInfo,
} from '../data.adapter';
import { DataUnavailableError } from '../../errors';
import type { CellValue, DataRecord } from '../../types';
import { isRecord } from '../../types';

export const sqliteDialect: SqlDialect = {
  name: 'sqlite',
  limitStyle: 'limit',
  quoteIdentifier: (identifier) => `"${identifier.replace(/"/g, '""')}"`,
  quoteTable: (tableName) => `"${tableName.replace(/"/g, '""')}"`,
  placeholder: () => '?',
};

export const sqlServerDialect: SqlDialect = {
  name: 'sqlserver',
  limitStyle: 'top',
  quoteIdentifier: (identifier) => `[${identifier.replace(/]/g, ']]')}]`,
  // schema.table
  quoteTable: (tableName) =>
    tableName
      .split('.')
      .map((part) => `[${part.replace(/]/g, ']]')}]`)
      .join('.'),
  placeholder: (position) => `@p${position}`,
};

function normalizeValue(value: unknown): CellValue {
  if (value === null || value === undefined) {
    return null;
  }
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }
  if (typeof value === 'bigint') {
    return Number(value);
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  return String(value);
}

/**
 * Convert a driver row into a plain record of JSON-safe cells.
 */
export function normalizeRow(row: unknown): DataRecord {
  const record: DataRecord = {};
  if (!isRecord(row)) {
    return record;
  }
  for (const [column, value] of Object.entries(row)) {
    record[column] = normalizeValue(value);
  }
  return record;
}

/**
 * Base class for database adapters
 * Provides common functionality for all database types
 */
export abstract class BaseDatabaseAdapter implements DatasetStore {
  protected config: DatabaseConfig;
  abstract readonly dialect: SqlDialect;

  constructor(config: DatabaseConfig) {
    this.config = config;
  }

  /**
   * Execute a parameterized statement
   * Implementation varies by database type
   */
  abstract query(statement: SqlStatement): Promise<DataRecord[]>;

  abstract getTables(): Promise<string[]>;

  /**
   * Get schema information for a table
   * Returns column names and types
   */
  abstract getTableSchema(tableName: string): Promise<TableColumnInfo[]>;

  abstract close(): Promise<void>;

  async defaultTable(): Promise<string> {
    // If tables configured in database config, use the first
    if (this.config.tables && this.config.tables.length > 0) {
      return this.config.tables[0];
    }

    const tables = (await this.getTables()).filter((table) => !this.matchesTable(table, GROUPINGS_TABLE));
    if (tables.length === 0) {
      throw new DataUnavailableError('No tables found in the database');
    }
    return tables[0];
  }

  async hasTable(tableName: string): Promise<boolean> {
    const tables = await this.getTables();
    return tables.some((table) => this.matchesTable(table, tableName));
  }

  // "dbo.housing" matches "housing"
  protected matchesTable(candidate: string, tableName: string): boolean {
    const a = candidate.toLowerCase();
    const b = tableName.toLowerCase();
    return a === b || a.endsWith(`.${b}`) || b.endsWith(`.${a}`);
  }
}
