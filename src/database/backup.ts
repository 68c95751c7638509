import { loadConfig } from '../config/env.js';
import { DatabaseConnection } from './connection.js';

async function performBackup(connection: DatabaseConnection) {
  const backupInfo = await connection.backup();

  console.log('✅ Backup completed successfully:');
  console.log(`   File: ${backupInfo.filename}`);
  console.log(`   Size: ${(backupInfo.size / 1024 / 1024).toFixed(2)} MB`);
  console.log(`   Path: ${backupInfo.path}`);
  console.log(`   Checksum: ${backupInfo.checksum}`);

  await connection.cleanupOldBackups();
}

function listBackups(connection: DatabaseConnection) {
  const backups = connection.listBackups();
  console.log(`📁 Available backups (${backups.length}):\n`);

  backups.forEach((backup, index) => {
    console.log(`${index + 1}. ${backup.name}`);
    console.log(`   Size: ${(backup.size / 1024 / 1024).toFixed(2)} MB`);
    console.log(`   Created: ${backup.created.toLocaleString()}`);
    console.log(`   Path: ${backup.path}\n`);
  });
}

async function run() {
  const command = process.argv[2];
  if (command !== 'create' && command !== 'list') {
    console.log('Usage: npm run db:backup -- [create|list]');
    process.exitCode = 1;
    return;
  }

  const connection = new DatabaseConnection(loadConfig().database);
  try {
    if (command === 'create') {
      await performBackup(connection);
    } else {
      listBackups(connection);
    }
  } finally {
    connection.close();
  }
}

run().catch(error => {
  console.error('❌ Backup command failed:', error);
  process.exit(1);
});
