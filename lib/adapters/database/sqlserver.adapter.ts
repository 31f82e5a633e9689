import * as sql from 'mssql';
import { BaseDatabaseAdapter, normalizeRow, sqlServerDialect } from './base-database.adapter';
import type { DatabaseConfig, SqlStatement, TableColumnInfo } from '../data.adapter';
import { DataUnavailableError, DatabaseError, errorMessage } from '../../errors';
import type { DataRecord } from '../../types';

/**
 * SQL Server database adapter
 * Uses mssql library to connect to SQL Server databases
 */
export class SQLServerAdapter extends BaseDatabaseAdapter {
  readonly dialect = sqlServerDialect;
  private pool?: sql.ConnectionPool;
  private connecting?: Promise<sql.ConnectionPool>;
  private connectionConfig: sql.config;

  constructor(config: DatabaseConfig) {
    super(config);

    // Build SQL Server connection config
    this.connectionConfig = {
      server: config.connection.host || 'localhost',
      port: config.connection.port || 1433,
      database: config.connection.database || '',
      user: config.connection.username || '',
      password: config.connection.password || '',
      connectionTimeout: config.connection.connectionTimeout || 30000,
      options: {
        encrypt: config.connection.encrypt ?? true,
        trustServerCertificate: config.connection.trustServerCertificate ?? true, // For local dev/self-signed certs
        enableArithAbort: true,
      },
      pool: {
        min: config.connection.poolMin || 0,
        max: config.connection.poolMax || 10,
      },
    };
  }

  /**
   * Connect to SQL Server, sharing one pool across concurrent callers
   */
  private async connect(): Promise<sql.ConnectionPool> {
    if (this.pool && this.pool.connected) {
      return this.pool;
    }

    if (!this.connecting) {
      this.connecting = new sql.ConnectionPool(this.connectionConfig)
        .connect()
        .then((pool) => {
          this.pool = pool;
          return pool;
        })
        .finally(() => {
          this.connecting = undefined;
        });
    }

    try {
      return await this.connecting;
    } catch (error) {
      throw new DataUnavailableError(`Failed to connect to SQL Server: ${errorMessage(error)}`, { cause: error });
    }
  }

  async query(statement: SqlStatement): Promise<DataRecord[]> {
    const pool = await this.connect();

    try {
      const request = pool.request();
      statement.params.forEach((value, index) => {
        request.input(`p${index + 1}`, value);
      });
      const result = await request.query(statement.text);
      const rows: unknown[] = result.recordset ?? [];
      return rows.map(normalizeRow);
    } catch (error) {
      throw new DatabaseError(`SQL query failed: ${errorMessage(error)}`, { cause: error });
    }
  }

  async getTables(): Promise<string[]> {
    const rows = await this.query({
      text: `
        SELECT TABLE_SCHEMA + '.' + TABLE_NAME as TableName
        FROM INFORMATION_SCHEMA.TABLES
        WHERE TABLE_TYPE = 'BASE TABLE'
        ORDER BY TABLE_SCHEMA, TABLE_NAME
      `,
      params: [],
    });
    return rows.map((row) => String(row.TableName));
  }

  async getTableSchema(tableName: string): Promise<TableColumnInfo[]> {
    // Split schema.table if provided
    const parts = tableName.split('.');
    const schema = parts.length > 1 ? parts[0] : 'dbo';
    const table = parts.length > 1 ? parts[1] : parts[0];

    const rows = await this.query({
      text: `
        SELECT
          COLUMN_NAME as name,
          DATA_TYPE as type,
          CASE WHEN IS_NULLABLE = 'YES' THEN 1 ELSE 0 END as nullable
        FROM INFORMATION_SCHEMA.COLUMNS
        WHERE TABLE_SCHEMA = @p1
          AND TABLE_NAME = @p2
        ORDER BY ORDINAL_POSITION
      `,
      params: [schema, table],
    });

    return rows.map((row) => ({
      name: String(row.name),
      type: String(row.type),
      nullable: row.nullable === 1,
    }));
  }

  async close(): Promise<void> {
    if (this.pool) {
      await this.pool.close();
      this.pool = undefined;
    }
  }
}
