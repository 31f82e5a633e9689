import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import type { AIAdapter, AIResponse, InvokeOptions } from '@/lib/adapters/ai.adapter';
import type { DatabaseConfig } from '@/lib/adapters/data.adapter';
import type { DatasetProfile, QueryConfig } from '@/lib/config';
import { importCsvFile } from '@/lib/ingest';
import { Logger } from '@/lib/logger';
import type { ChatMessage, DatasetColumn, SchemaContext } from '@/lib/types';

export const FIXTURE_CSV = path.join(path.dirname(fileURLToPath(import.meta.url)), 'fixtures', 'housing.csv');

export const QUERY_DEFAULTS: QueryConfig = {
  defaultLimit: 5,
  maxLimit: 50,
  maxGroups: 50,
  sampleRows: 3,
  categoricalValueLimit: 25,
};

export function silentLogger(): Logger {
  return new Logger({ logDir: null, console: false });
}

export interface FixtureDatabase {
  dir: string;
  dbPath: string;
  config: DatabaseConfig;
  cleanup(): void;
}

/**
 * A throwaway SQLite file holding the housing fixture in table `housing`.
 */
export async function createFixtureDatabase(
  options: { groupings?: Record<string, string[]> } = {},
): Promise<FixtureDatabase> {
  const dir = mkdtempSync(path.join(tmpdir(), 'dataset-chat-'));
  const dbPath = path.join(dir, 'housing.db');
  await importCsvFile({ csvPath: FIXTURE_CSV, dbPath, table: 'housing', groupings: options.groupings });

  return {
    dir,
    dbPath,
    config: { type: 'sqlite', connection: { file: dbPath } },
    cleanup: () => rmSync(dir, { recursive: true, force: true }),
  };
}

export function housingProfile(overrides: Partial<DatasetProfile> = {}): DatasetProfile {
  return {
    name: 'housing',
    project: { name: 'California Housing', description: '', domain: 'real estate' },
    aiContext: {
      systemRole: 'You are a helpful assistant that answers questions about California housing data.',
      domainContext: '',
    },
    table: 'housing',
    valueColumn: 'median_house_value',
    defaultSortColumn: 'median_house_value',
    monetaryColumns: ['median_house_value'],
    columns: {
      median_income: 'Median household income, in tens of thousands of US dollars',
      median_house_value: 'Median house value, in US dollars',
    },
    groupings: {
      Location: ['longitude', 'latitude', 'ocean_proximity'],
      Financials: ['median_income', 'median_house_value'],
    },
    whitelist: { sortable: ['median_house_value', 'median_income', 'housing_median_age'] },
    toolAliases: {
      search_rows: ['housing_query'],
      aggregate_stats: ['housing_stats'],
      lookup_definition: ['get_housing_context'],
    },
    parameterAliases: { min_price: 'min_value', max_price: 'max_value' },
    exampleQuestions: [],
    queryExamples: [],
    ...overrides,
  };
}

const NUMERIC_COLUMNS = [
  'longitude',
  'latitude',
  'housing_median_age',
  'total_rooms',
  'total_bedrooms',
  'population',
  'households',
  'median_income',
  'median_house_value',
];

export const OCEAN_PROXIMITY_VALUES = ['<1H OCEAN', 'INLAND', 'ISLAND', 'NEAR BAY', 'NEAR OCEAN'];

/**
 * The context {@link SchemaContextProvider} derives from the fixture, written
 * out for tests that need no database.
 */
export function housingContext(overrides: Partial<SchemaContext> = {}): SchemaContext {
  const columns: DatasetColumn[] = [
    ...NUMERIC_COLUMNS.map((name): DatasetColumn => ({ name, type: 'numeric' })),
    {
      name: 'ocean_proximity',
      type: 'categorical',
      stats: { kind: 'categorical', cardinality: 5, sampleValues: OCEAN_PROXIMITY_VALUES },
    },
  ];
  return {
    tableName: 'housing',
    rowCount: 12,
    columns,
    sampleRows: [{ median_house_value: 447000, ocean_proximity: 'NEAR BAY' }],
    groupings: {
      Location: ['longitude', 'latitude', 'ocean_proximity'],
      Financials: ['median_income', 'median_house_value'],
    },
    definitions: {
      median_income: 'Median household income, in tens of thousands of US dollars',
      median_house_value: 'Median house value, in US dollars',
    },
    whitelist: {
      sortable: ['median_house_value', 'median_income', 'housing_median_age'],
      groupable: [...NUMERIC_COLUMNS, 'ocean_proximity'],
      aggregatable: NUMERIC_COLUMNS,
      filterable: ['ocean_proximity'],
      range: NUMERIC_COLUMNS,
    },
    defaultSortColumn: 'median_house_value',
    valueColumn: 'median_house_value',
    monetaryColumns: ['median_house_value'],
    ...overrides,
  };
}

export type ScriptedReply = string | Error | ((messages: ChatMessage[]) => string);

export interface RecordedInvocation {
  messages: ChatMessage[];
  options?: InvokeOptions;
}

/**
 * Model stand-in that answers from a fixed script, one entry per call.
 */
export class ScriptedAIAdapter implements AIAdapter {
  readonly calls: RecordedInvocation[] = [];
  private replies: ScriptedReply[];

  constructor(replies: ScriptedReply[] = []) {
    this.replies = [...replies];
  }

  push(...replies: ScriptedReply[]): void {
    this.replies.push(...replies);
  }

  async invoke(messages: ChatMessage[], options?: InvokeOptions): Promise<AIResponse> {
    this.calls.push({ messages, options });
    const reply = this.replies.shift();
    if (reply === undefined) {
      throw new Error(`No scripted reply for call ${this.calls.length}`);
    }
    if (reply instanceof Error) {
      throw reply;
    }
    return { content: typeof reply === 'function' ? reply(messages) : reply };
  }
}
