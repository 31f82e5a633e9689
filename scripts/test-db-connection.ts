/**
 * Database Connection Test Script
 *
 * Tests the database connection configuration
 * Usage: npm run test-db-connection
 */

import { loadConfig, loadDatasetProfile } from '../lib/config';
import { createDatasetStore } from '../lib/adapters/adapter-factory';
import { errorMessage } from '../lib/errors';

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  if (error instanceof Error && error.cause !== undefined) {
    return errorCode(error.cause);
  }
  return undefined;
}

async function testConnection() {
  console.log('🔍 Testing database connection...\n');

  try {
    // Load configuration
    console.log('📋 Loading configuration...');
    const config = await loadConfig();
    const { database } = config.dataSource;

    console.log('✅ Configuration loaded');
    console.log('   Database type:', database.type);
    if (database.type === 'sqlite') {
      console.log('   File:', database.connection.file);
    } else {
      console.log('   Host:', database.connection.host);
      console.log('   Database:', database.connection.database);
      console.log('   Username:', database.connection.username);
    }
    console.log('');

    const store = createDatasetStore(config.dataSource);

    try {
      // Test connection by listing tables
      console.log('📊 Fetching table list...');
      const tables = await store.getTables();

      console.log('✅ Connection successful!\n');
      console.log(`Found ${tables.length} tables:\n`);

      tables.forEach((table, index) => {
        console.log(`  ${index + 1}. ${table}`);
      });

      const profile = await loadDatasetProfile(config.dataSource.datasetsPath, config.dataSource.dataset);
      const table = profile.table ?? (await store.defaultTable());
      const columns = await store.getTableSchema(table);
      console.log(`\nDataset table "${table}" has ${columns.length} columns:`);
      columns.forEach((column) => {
        console.log(`  - ${column.name} (${column.type || 'untyped'})`);
      });
    } finally {
      await store.close();
    }

    console.log('\n✅ Database connection test completed successfully!');
    console.log('\nNext steps:');
    console.log('  1. Start the development server: npm run dev');
    console.log('  2. POST a question to /api/chat');
  } catch (error) {
    console.error('\n❌ Database connection test failed!\n');
    console.error('Error:', errorMessage(error));

    const code = errorCode(error);
    if (code === 'ELOGIN') {
      console.log('\n💡 Troubleshooting tips:');
      console.log('  - Check DB_USERNAME and DB_PASSWORD');
      console.log('  - Verify the user has access to the database');
      console.log('  - For Azure SQL, use full username: user@servername');
    } else if (code === 'ETIMEOUT' || code === 'ESOCKET') {
      console.log('\n💡 Troubleshooting tips:');
      console.log('  - Check your firewall settings');
      console.log('  - Verify the host and port are correct');
    } else if (code === 'SQLITE_CANTOPEN') {
      console.log('\n💡 Troubleshooting tips:');
      console.log('  - Build the dataset first: npm run setup-db -- path/to/data.csv');
    }

    process.exit(1);
  }
}

void testConnection();
