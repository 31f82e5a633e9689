/**
 * Dataset Setup Script
 *
 * Builds the SQLite dataset table from a CSV file
 * Usage: npm run setup-db -- [path/to/data.csv]
 */

import path from 'path';
import { loadConfig, loadDatasetProfile } from '../lib/config';
import { importCsvFile } from '../lib/ingest';
import { errorMessage } from '../lib/errors';

async function setupDatabase() {
  console.log('📦 Setting up dataset database...\n');

  try {
    const config = await loadConfig();
    const { database, dataset, datasetsPath, bootstrapCsv } = config.dataSource;

    if (database.type !== 'sqlite') {
      console.error('❌ Error: setup-db only builds SQLite datasets');
      console.log('   Current type:', database.type);
      process.exit(1);
    }

    const csvPath = process.argv[2] ?? bootstrapCsv;
    if (!csvPath || !database.connection.file) {
      console.error('❌ Error: no CSV file given and dataSource.bootstrapCsv is not set');
      console.log('   Usage: npm run setup-db -- path/to/data.csv');
      process.exit(1);
    }

    const profile = await loadDatasetProfile(datasetsPath, dataset);
    const table = profile.table ?? database.tables?.[0] ?? dataset;
    const dbPath = path.resolve(process.cwd(), database.connection.file);

    console.log('   Dataset:', profile.project.name);
    console.log('   CSV:', csvPath);
    console.log('   Database:', dbPath);
    console.log('   Table:', table);
    console.log('');

    const count = await importCsvFile({
      csvPath: path.resolve(process.cwd(), csvPath),
      dbPath,
      table,
      groupings: profile.groupings,
    });

    console.log(`✅ Imported ${count} rows into "${table}"`);
    if (profile.groupings) {
      console.log(`✅ Stored ${Object.keys(profile.groupings).length} column groups`);
    }
  } catch (error) {
    console.error('\n❌ Dataset setup failed!\n');
    console.error('Error:', errorMessage(error));
    process.exit(1);
  }
}

void setupDatabase();
