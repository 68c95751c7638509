import fs from 'fs-extra';
import readline from 'readline';
import { loadConfig } from '../config/env.js';
import { DatabaseConnection } from './connection.js';

async function confirmRestore(backupPath: string): Promise<boolean> {
  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout
  });

  return new Promise(resolve => {
    console.log('⚠️  WARNING: This will replace the current booking ledger!');
    console.log(`   Restoring from: ${backupPath}`);
    console.log('   A backup of the current ledger will be created first.\n');

    rl.question('Are you sure you want to continue? (yes/no): ', answer => {
      rl.close();
      resolve(['yes', 'y'].includes(answer.trim().toLowerCase()));
    });
  });
}

async function performRestore() {
  const backupPath = process.argv[2];

  if (!backupPath) {
    console.error('❌ Please provide backup file path');
    console.log('Usage: npm run db:restore -- /path/to/backup.db');
    process.exitCode = 1;
    return;
  }

  if (!fs.existsSync(backupPath)) {
    console.error(`❌ Backup file not found: ${backupPath}`);
    process.exitCode = 1;
    return;
  }

  if (!(await confirmRestore(backupPath))) {
    console.log('❌ Restore cancelled');
    return;
  }

  const connection = new DatabaseConnection(loadConfig().database);
  try {
    const safety = await connection.backup();
    console.log(`✅ Current ledger backed up as: ${safety.filename}`);

    await connection.restore(backupPath);

    const health = await connection.healthCheck();
    if (health.status === 'healthy') {
      console.log('🔍 Health check passed');
    } else {
      console.error('❌ Restore completed but health check failed');
      process.exitCode = 1;
    }
  } finally {
    connection.close();
  }
}

performRestore().catch(error => {
  console.error('❌ Restore failed:', error);
  process.exit(1);
});
