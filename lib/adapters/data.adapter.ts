import type { DataRecord } from '../types';

export type { DataSourceConfig, DatabaseConfig, DatabaseConnectionConfig } from '../config';

export type DatabaseType = 'sqlite' | 'sqlserver';

/** Name of the optional table holding model-generated column groupings. */
export const GROUPINGS_TABLE = 'ai_groups';

export type SqlParameter = string | number;

/** SQL text plus its positional bound values. Values never appear in `text`. */
export interface SqlStatement {
  text: string;
  params: SqlParameter[];
}

/**
 * The parts of SQL syntax that differ between the supported engines.
 */
export interface SqlDialect {
  readonly name: DatabaseType;
  /** `LIMIT ?` after the statement, or `TOP (@pN)` after SELECT. */
  readonly limitStyle: 'limit' | 'top';
  quoteIdentifier(identifier: string): string;
  quoteTable(tableName: string): string;
  /** Placeholder for the bound value at 1-based `position`. */
  placeholder(position: number): string;
}

export interface TableColumnInfo {
  name: string;
  type: string;
  nullable: boolean;
}

// Dataset store interface
export interface DatasetStore {
  readonly dialect: SqlDialect;
  query(statement: SqlStatement): Promise<DataRecord[]>;
  getTables(): Promise<string[]>;
  getTableSchema(tableName: string): Promise<TableColumnInfo[]>;
  /** The table to answer questions from when the dataset names none. */
  defaultTable(): Promise<string>;
  hasTable(tableName: string): Promise<boolean>;
  close(): Promise<void>;
}
