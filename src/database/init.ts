import { loadConfig } from '../config/env.js';
import { Database } from '../config/database.js';
import { loadServiceSeeds } from '../config/operatingHours.js';

async function initializeDatabase() {
  console.log('🚀 Initializing booking ledger...');

  const config = loadConfig();
  const db = new Database(config.database);

  try {
    await db.initialize(loadServiceSeeds(config.paths.services));
    console.log(`📊 Schema version: ${db.schemaVersion}`);

    if (config.database.autoBackup) {
      console.log('📦 Creating initial backup...');
      await db.performBackup();
    }
  } finally {
    db.close();
  }
}

initializeDatabase().catch(error => {
  console.error('❌ Database initialization failed:', error);
  process.exit(1);
});
