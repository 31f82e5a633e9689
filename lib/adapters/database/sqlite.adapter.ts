import path from 'path';
import Database from 'better-sqlite3';
import { BaseDatabaseAdapter, normalizeRow, sqliteDialect } from './base-database.adapter';
import type { DatabaseConfig, SqlStatement, TableColumnInfo } from '../data.adapter';
import { ConfigError, DataUnavailableError, DatabaseError, errorMessage } from '../../errors';
import type { DataRecord } from '../../types';

/**
 * SQLite database adapter
 * Opens the dataset file read-only through better-sqlite3
 */
export class SQLiteAdapter extends BaseDatabaseAdapter {
  readonly dialect = sqliteDialect;
  private db?: Database.Database;
  private filePath: string;

  constructor(config: DatabaseConfig) {
    super(config);

    if (!config.connection.file) {
      throw new ConfigError('SQLite connection requires a "file" setting');
    }
    this.filePath = path.resolve(process.cwd(), config.connection.file);
  }

  private connect(): Database.Database {
    if (this.db) {
      return this.db;
    }

    try {
      this.db = new Database(this.filePath, { readonly: true, fileMustExist: true });
      return this.db;
    } catch (error) {
      throw new DataUnavailableError(`Failed to open SQLite database at ${this.filePath}: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }

  async query(statement: SqlStatement): Promise<DataRecord[]> {
    const db = this.connect();

    try {
      const rows: unknown[] = db.prepare(statement.text).all(...statement.params);
      return rows.map(normalizeRow);
    } catch (error) {
      throw new DatabaseError(`SQL query failed: ${errorMessage(error)}`, { cause: error });
    }
  }

  async getTables(): Promise<string[]> {
    const rows = await this.query({
      text: `SELECT name FROM sqlite_master WHERE type IN ('table', 'view') AND name NOT LIKE 'sqlite_%' ORDER BY name`,
      params: [],
    });
    return rows.map((row) => String(row.name));
  }

  async getTableSchema(tableName: string): Promise<TableColumnInfo[]> {
    const rows = await this.query({
      text: 'SELECT name, type, "notnull" AS not_null FROM pragma_table_info(?) ORDER BY cid',
      params: [tableName],
    });
    return rows.map((row) => ({
      name: String(row.name),
      type: typeof row.type === 'string' ? row.type : '',
      nullable: row.not_null === 0,
    }));
  }

  async close(): Promise<void> {
    if (this.db) {
      this.db.close();
      this.db = undefined;
    }
  }
}
