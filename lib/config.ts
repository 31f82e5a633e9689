import { promises as fs } from 'fs';
import path from 'path';
import yaml from 'js-yaml';
import { z } from 'zod';
import { ConfigError } from './errors';
import type { ToolName } from './tools/tool-call';
import type { WhitelistClause } from './types';

const blankToUndefined = (value: unknown) => (value === '' || value === null ? undefined : value);

const optionalString = z.preprocess(blankToUndefined, z.string().optional());
const optionalNumber = z.preprocess(blankToUndefined, z.coerce.number().optional());
const numberWithDefault = (fallback: number) =>
  z.preprocess(blankToUndefined, z.coerce.number().int().positive().default(fallback));
const optionalBoolean = z.preprocess(
  (value) => (typeof value === 'string' ? (value === '' ? undefined : value === 'true') : value),
  z.boolean().optional(),
);

const connectionSchema = z.object({
  // SQL Server
  host: optionalString,
  port: optionalNumber,
  database: optionalString,
  username: optionalString,
  password: optionalString,
  encrypt: optionalBoolean,
  trustServerCertificate: optionalBoolean,

  // SQLite
  file: optionalString,

  // Optional connection pool settings
  poolMin: optionalNumber,
  poolMax: optionalNumber,
  connectionTimeout: optionalNumber,
});

const databaseSchema = z.object({
  type: z.enum(['sqlite', 'sqlserver']),
  connection: connectionSchema.default({}),
  tables: z.array(z.string()).optional(),
});

const appConfigSchema = z.object({
  app: z.object({
    name: z.string().default('Dataset Chat'),
  }).default({}),
  ai: z.object({
    provider: z.string().default('openai'),
    model: z.string().default('gpt-4o-mini'),
    apiKey: z.preprocess(blankToUndefined, z.string().default('')),
    baseURL: optionalString,
    timeoutMs: numberWithDefault(30_000),
    maxRetries: numberWithDefault(3),
    // 0 sends no earlier turns to the model
    historyWindow: z.preprocess(blankToUndefined, z.coerce.number().int().nonnegative().default(10)),
  }).default({}),
  dataSource: z.object({
    datasetsPath: z.string().default('data'),
    dataset: z.string().min(1),
    bootstrapCsv: optionalString,
    database: databaseSchema,
  }),
  query: z.object({
    defaultLimit: numberWithDefault(5),
    maxLimit: numberWithDefault(50),
    maxGroups: numberWithDefault(50),
    sampleRows: numberWithDefault(3),
    categoricalValueLimit: numberWithDefault(25),
  }).default({}),
  logging: z.object({
    dir: z.string().nullable().default('logs'),
  }).default({}),
});

export type AppConfig = z.infer<typeof appConfigSchema>;
export type AIConfig = AppConfig['ai'];
export type DataSourceConfig = AppConfig['dataSource'];
export type DatabaseConfig = DataSourceConfig['database'];
export type DatabaseConnectionConfig = DatabaseConfig['connection'];
export type QueryConfig = AppConfig['query'];

const metadataSchema = z.object({
  project: z.object({
    name: z.string(),
    description: z.string().default(''),
    domain: z.string().default('general data'),
  }),
  aiContext: z.object({
    systemRole: z.string(),
    domainContext: z.string().default(''),
  }).optional(),
});

const columnList = z.array(z.string()).optional();

const schemaFileSchema = z.object({
  table: optionalString,
  valueColumn: optionalString,
  defaultSortColumn: optionalString,
  monetaryColumns: z.array(z.string()).default([]),
  columns: z.record(z.string()).default({}),
  groupings: z.record(z.array(z.string())).optional(),
  whitelist: z.object({
    sortable: columnList,
    groupable: columnList,
    aggregatable: columnList,
    filterable: columnList,
    range: columnList,
  }).default({}),
  toolAliases: z.object({
    search_rows: columnList,
    aggregate_stats: columnList,
    lookup_definition: columnList,
  }).default({}),
  parameterAliases: z.record(z.string()).default({}),
});

const queriesSchema = z.object({
  exampleQuestions: z.array(z.string()).default([]),
  queryExamples: z.array(z.object({
    question: z.string(),
    tool: z.string(),
    parameters: z.record(z.unknown()).default({}),
  })).default([]),
});

export interface QueryExample {
  question: string;
  tool: string;
  parameters: Record<string, unknown>;
}

/** Everything known about one dataset before the store is consulted. */
export interface DatasetProfile {
  name: string;
  project: {
    name: string;
    description: string;
    domain: string;
  };
  aiContext: {
    systemRole: string;
    domainContext: string;
  };
  table?: string;
  valueColumn?: string;
  defaultSortColumn?: string;
  monetaryColumns: string[];
  columns: Record<string, string>;
  groupings?: Record<string, string[]>;
  whitelist: Partial<Record<WhitelistClause, string[]>>;
  toolAliases: Partial<Record<ToolName, string[]>>;
  parameterAliases: Record<string, string>;
  exampleQuestions: string[];
  queryExamples: QueryExample[];
}

let cachedConfig: AppConfig | null = null;
const cachedProfiles = new Map<string, DatasetProfile>();

function substituteEnv(content: string, env: NodeJS.ProcessEnv): string {
  return content.replace(/\$\{(\w+)\}/g, (_, varName: string) => env[varName] || '');
}

function describeIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
}

export function parseConfig(content: string, env: NodeJS.ProcessEnv = process.env): AppConfig {
  const raw: unknown = yaml.load(substituteEnv(content, env));
  const parsed = appConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(`Invalid configuration: ${describeIssues(parsed.error)}`);
  }
  return parsed.data;
}

export async function loadConfig(
  configPath: string = path.join(process.cwd(), 'config', 'app.yaml'),
): Promise<AppConfig> {
  if (cachedConfig) {
    return cachedConfig;
  }

  let fileContent: string;
  try {
    fileContent = await fs.readFile(configPath, 'utf-8');
  } catch (error) {
    throw new ConfigError(`Failed to read configuration at ${configPath}`, { cause: error });
  }

  cachedConfig = parseConfig(fileContent);
  return cachedConfig;
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

async function readYamlFile<S extends z.ZodTypeAny>(
  filePath: string,
  schema: S,
): Promise<z.output<S> | undefined> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    if (isMissingFile(error)) {
      return undefined;
    }
    throw new ConfigError(`Failed to read ${filePath}`, { cause: error });
  }

  const parsed = schema.safeParse(yaml.load(content) ?? {});
  if (!parsed.success) {
    throw new ConfigError(`Invalid ${path.basename(filePath)}: ${describeIssues(parsed.error)}`);
  }
  return parsed.data;
}

/**
 * Format a dataset folder name for display (snake_case / kebab-case -> Title Case)
 */
export function formatDisplayName(name: string): string {
  return name
    .split(/[-_\s]+/)
    .filter((word) => word.length > 0)
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase())
    .join(' ');
}

/**
 * Load `metadata.yaml`, `schema.yaml` and `queries.yaml` from `<datasetsPath>/<dataset>/`.
 * Each file is optional; missing pieces fall back to names derived from the folder.
 */
export async function loadDatasetProfile(datasetsPath: string, dataset: string): Promise<DatasetProfile> {
  if (!dataset) {
    throw new ConfigError('Dataset parameter is required');
  }

  const datasetDir = path.resolve(process.cwd(), datasetsPath, dataset);
  const cached = cachedProfiles.get(datasetDir);
  if (cached) {
    return cached;
  }

  const [metadata, schema, queries] = await Promise.all([
    readYamlFile(path.join(datasetDir, 'metadata.yaml'), metadataSchema),
    readYamlFile(path.join(datasetDir, 'schema.yaml'), schemaFileSchema),
    readYamlFile(path.join(datasetDir, 'queries.yaml'), queriesSchema),
  ]);

  const projectName = metadata?.project.name ?? formatDisplayName(dataset);
  const schemaConfig = schema ?? schemaFileSchema.parse({});
  const queryConfig = queries ?? queriesSchema.parse({});

  const profile: DatasetProfile = {
    name: dataset,
    project: metadata?.project ?? {
      name: projectName,
      description: '',
      domain: 'general data',
    },
    aiContext: metadata?.aiContext ?? {
      systemRole: `You are a helpful assistant that answers questions about ${projectName} data.`,
      domainContext: '',
    },
    table: schemaConfig.table,
    valueColumn: schemaConfig.valueColumn,
    defaultSortColumn: schemaConfig.defaultSortColumn,
    monetaryColumns: schemaConfig.monetaryColumns,
    columns: schemaConfig.columns,
    groupings: schemaConfig.groupings,
    whitelist: schemaConfig.whitelist,
    toolAliases: schemaConfig.toolAliases,
    parameterAliases: schemaConfig.parameterAliases,
    exampleQuestions: queryConfig.exampleQuestions,
    queryExamples: queryConfig.queryExamples,
  };

  cachedProfiles.set(datasetDir, profile);
  return profile;
}

export function clearConfigCache(): void {
  cachedConfig = null;
  cachedProfiles.clear();
}
