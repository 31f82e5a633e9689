// Shared TypeScript type definitions

export type CellValue = string | number | boolean | null;

export interface DataRecord {
  [column: string]: CellValue;
}

export type ConversationRole = 'user' | 'assistant';

export interface ConversationTurn {
  role: ConversationRole;
  content: string;
}

export interface ChatMessage {
  role: 'system' | ConversationRole;
  content: string;
}

export type ColumnType = 'numeric' | 'categorical' | 'text';

export interface NumericColumnStats {
  kind: 'numeric';
  min: number | null;
  max: number | null;
  mean: number | null;
}

export interface CategoricalColumnStats {
  kind: 'categorical';
  cardinality: number;
  sampleValues: string[];
}

export interface DatasetColumn {
  name: string;
  type: ColumnType;
  description?: string;
  stats?: NumericColumnStats | CategoricalColumnStats;
}

/**
 * Identifiers eligible for generated SQL, per clause.
 * Every entry is a real column name of the dataset table.
 */
export interface ColumnWhitelist {
  sortable: readonly string[];
  groupable: readonly string[];
  aggregatable: readonly string[];
  filterable: readonly string[];
  range: readonly string[];
}

export type WhitelistClause = keyof ColumnWhitelist;

export interface SchemaContext {
  tableName: string;
  rowCount: number;
  columns: DatasetColumn[];
  sampleRows: DataRecord[];
  groupings: Record<string, string[]>;
  definitions: Record<string, string>;
  whitelist: ColumnWhitelist;
  /** Sort column used when a sort is requested without a usable column. */
  defaultSortColumn?: string;
  /** The column a question is "about" by default (price, amount, ...). */
  valueColumn?: string;
  monetaryColumns: string[];
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
