import type { AIAdapter } from './ai.adapter';
import { withInvokeTimeout } from './ai.adapter';
import { OpenAIAdapter } from './openai.adapter';
import type { DataSourceConfig, DatasetStore } from './data.adapter';
import { SQLiteAdapter } from './database/sqlite.adapter';
import { SQLServerAdapter } from './database/sqlserver.adapter';
import type { AIConfig } from '../config';
import { ConfigError } from '../errors';
import type { Logger } from '../logger';

/**
 * Creates the dataset store for the configured database type
 */
export function createDatasetStore(config: DataSourceConfig): DatasetStore {
  const database = config.database;

  switch (database.type) {
    case 'sqlite':
      return new SQLiteAdapter(database);
    case 'sqlserver':
      return new SQLServerAdapter(database);
  }
}

/**
 * Creates the model adapter for the configured provider, bounded by `timeoutMs`
 */
export function createAIAdapter(config: AIConfig, logger?: Logger): AIAdapter {
  switch (config.provider.toLowerCase()) {
    case 'openai':
      if (!config.apiKey) {
        throw new ConfigError('ai.apiKey is not set; export OPENAI_API_KEY');
      }
      return withInvokeTimeout(new OpenAIAdapter(config, logger), config.timeoutMs);
    default:
      throw new ConfigError(`Unknown AI provider: ${config.provider}`);
  }
}
