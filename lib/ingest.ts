import { promises as fs } from 'fs';
import path from 'path';
import Database from 'better-sqlite3';
import { GROUPINGS_TABLE } from './adapters/data.adapter';
import { sqliteDialect } from './adapters/database/base-database.adapter';
import { parseCSV } from './csv';
import type { CellValue, DataRecord } from './types';

type SqliteColumnType = 'INTEGER' | 'REAL' | 'TEXT';

function inferColumnType(values: CellValue[]): SqliteColumnType {
  const present = values.filter((value) => value !== null);
  if (present.length === 0) {
    return 'TEXT';
  }
  if (present.every((value) => typeof value === 'boolean' || (typeof value === 'number' && Number.isInteger(value)))) {
    return 'INTEGER';
  }
  if (present.every((value) => typeof value === 'number' || typeof value === 'boolean')) {
    return 'REAL';
  }
  return 'TEXT';
}

function toSqliteValue(value: CellValue, type: SqliteColumnType): string | number | null {
  if (value === null) return null;
  if (typeof value === 'boolean') return value ? 1 : 0;
  if (type === 'TEXT') return String(value);
  return value;
}

/**
 * (Re)create `table` from `records`, typing each column from its values.
 * Returns the number of inserted rows.
 */
export function importRecords(db: Database.Database, table: string, records: DataRecord[]): number {
  if (records.length === 0) {
    throw new Error(`No records to import into ${table}`);
  }

  const columns = Object.keys(records[0]);
  const types = columns.map((column) => inferColumnType(records.map((record) => record[column] ?? null)));
  const quotedTable = sqliteDialect.quoteTable(table);
  const columnDefs = columns.map((column, i) => `${sqliteDialect.quoteIdentifier(column)} ${types[i]}`);

  db.exec(`DROP TABLE IF EXISTS ${quotedTable}`);
  db.exec(`CREATE TABLE ${quotedTable} (${columnDefs.join(', ')})`);

  const insert = db.prepare(
    `INSERT INTO ${quotedTable} (${columns.map(sqliteDialect.quoteIdentifier).join(', ')}) ` +
      `VALUES (${columns.map(() => '?').join(', ')})`,
  );

  const insertAll = db.transaction((rows: DataRecord[]) => {
    for (const row of rows) {
      insert.run(...columns.map((column, i) => toSqliteValue(row[column] ?? null, types[i])));
    }
  });
  insertAll(records);

  return records.length;
}

/**
 * Store the model-facing column groupings in the `ai_groups` table.
 */
export function writeGroupings(db: Database.Database, groupings: Record<string, string[]>): void {
  const quotedTable = sqliteDialect.quoteTable(GROUPINGS_TABLE);
  db.exec(`CREATE TABLE IF NOT EXISTS ${quotedTable} (key TEXT PRIMARY KEY, value TEXT NOT NULL)`);
  db.prepare(`INSERT OR REPLACE INTO ${quotedTable} (key, value) VALUES (?, ?)`).run(
    'main_grouping',
    JSON.stringify(groupings),
  );
}

export interface CsvImportOptions {
  csvPath: string;
  dbPath: string;
  table: string;
  groupings?: Record<string, string[]>;
}

/**
 * Build (or rebuild) `table` in the SQLite file at `dbPath` from a CSV file.
 */
export async function importCsvFile(options: CsvImportOptions): Promise<number> {
  const content = await fs.readFile(options.csvPath, 'utf-8');
  const records = parseCSV(content);

  await fs.mkdir(path.dirname(options.dbPath), { recursive: true });
  const db = new Database(options.dbPath);
  try {
    const count = importRecords(db, options.table, records);
    if (options.groupings) {
      writeGroupings(db, options.groupings);
    }
    return count;
  } finally {
    db.close();
  }
}
