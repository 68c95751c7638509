import Database from 'better-sqlite3';
import fs from 'fs-extra';
import path from 'path';
import crypto from 'crypto';
import { BookingError } from '../types/errors.js';
import { SQLiteConfig, BackupInfo, HealthReport } from './types.js';

const MEMORY_PATH = ':memory:';
const BACKUP_PREFIX = 'salon_ledger_';

export class DatabaseConnection {
  private db: Database.Database;
  private config: SQLiteConfig;
  private isConnected: boolean = false;

  constructor(config: SQLiteConfig) {
    this.config = config;
    this.ensureDirectoryExists();
    this.db = this.open();
  }

  get isInMemory(): boolean {
    return this.config.dbPath === MEMORY_PATH;
  }

  private ensureDirectoryExists() {
    if (this.isInMemory) {
      return;
    }
    fs.ensureDirSync(path.dirname(this.config.dbPath));
    fs.ensureDirSync(this.config.backupPath);
  }

  private open(): Database.Database {
    try {
      const db = new Database(this.config.dbPath, {
        timeout: this.config.timeout,
        verbose: this.config.logQueries ? console.log : undefined
      });

      db.pragma('journal_mode = WAL');
      db.pragma('synchronous = NORMAL');
      db.pragma('foreign_keys = ON');
      db.pragma('temp_store = memory');

      this.isConnected = true;
      return db;
    } catch (error) {
      console.error('❌ Failed to open ledger database:', error);
      throw new BookingError('StorageUnavailable', `Cannot open database at ${this.config.dbPath}`, {
        cause: error
      });
    }
  }

  getDatabase(): Database.Database {
    if (!this.isConnected) {
      throw new BookingError('StorageUnavailable', 'Database not connected');
    }
    return this.db;
  }

  async healthCheck(): Promise<HealthReport> {
    try {
      const result = this.getDatabase().prepare<[], { ok: number }>('SELECT 1 AS ok').get();
      const details: Record<string, unknown> = {
        connected: this.isConnected,
        dbPath: this.config.dbPath,
        testQuery: result?.ok === 1
      };

      if (!this.isInMemory) {
        const stats = fs.statSync(this.config.dbPath);
        details.size = `${(stats.size / 1024 / 1024).toFixed(2)} MB`;
        details.lastModified = stats.mtime;
      }

      return { status: 'healthy', details };
    } catch (error) {
      return {
        status: 'unhealthy',
        details: { error: error instanceof Error ? error.message : String(error) }
      };
    }
  }

  async backup(): Promise<BackupInfo> {
    const timestamp = new Date().toISOString().replace(/[:.]/g, '-');
    const filename = `${BACKUP_PREFIX}${timestamp}.db`;
    const backupPath = path.join(this.config.backupPath, filename);

    try {
      await fs.ensureDir(this.config.backupPath);
      await this.getDatabase().backup(backupPath);
      const stats = fs.statSync(backupPath);
      const checksum = await this.calculateChecksum(backupPath);

      console.log(`📦 Backup created: ${filename} (${(stats.size / 1024 / 1024).toFixed(2)} MB)`);
      return { filename, path: backupPath, size: stats.size, timestamp: new Date(), checksum };
    } catch (error) {
      console.error('❌ Backup failed:', error);
      throw error;
    }
  }

  listBackups(): Array<{ name: string; path: string; size: number; created: Date }> {
    if (!fs.existsSync(this.config.backupPath)) {
      return [];
    }
    return fs.readdirSync(this.config.backupPath)
      .filter(file => file.startsWith(BACKUP_PREFIX) && file.endsWith('.db'))
      .map(file => {
        const fullPath = path.join(this.config.backupPath, file);
        const stats = fs.statSync(fullPath);
        return { name: file, path: fullPath, size: stats.size, created: stats.mtime };
      })
      .sort((a, b) => b.created.getTime() - a.created.getTime());
  }

  async restore(backupPath: string): Promise<void> {
    if (this.isInMemory) {
      throw new Error('Cannot restore into an in-memory database');
    }
    if (!fs.existsSync(backupPath)) {
      throw new Error(`Backup file not found: ${backupPath}`);
    }
    if (!this.verifyBackup(backupPath)) {
      throw new Error('Backup file is corrupted');
    }

    this.close();
    // Stale WAL files would be replayed over the restored copy
    fs.removeSync(`${this.config.dbPath}-wal`);
    fs.removeSync(`${this.config.dbPath}-shm`);
    fs.copyFileSync(backupPath, this.config.dbPath);
    this.db = this.open();

    console.log(`✅ Database restored from: ${backupPath}`);
  }

  async cleanupOldBackups(now: Date = new Date()): Promise<number> {
    const cutoff = new Date(now);
    cutoff.setDate(cutoff.getDate() - this.config.retentionDays);

    let deletedCount = 0;
    for (const backup of this.listBackups()) {
      if (backup.created < cutoff) {
        await fs.remove(backup.path);
        deletedCount++;
      }
    }

    if (deletedCount > 0) {
      console.log(`🗑️ Cleaned up ${deletedCount} old backup(s)`);
    }
    return deletedCount;
  }

  private async calculateChecksum(filePath: string): Promise<string> {
    return new Promise((resolve, reject) => {
      const hash = crypto.createHash('sha256');
      const stream = fs.createReadStream(filePath);

      stream.on('data', data => hash.update(data));
      stream.on('end', () => resolve(hash.digest('hex')));
      stream.on('error', reject);
    });
  }

  private verifyBackup(backupPath: string): boolean {
    try {
      const testDb = new Database(backupPath, { readonly: true, fileMustExist: true });
      try {
        testDb.prepare('SELECT COUNT(*) FROM sqlite_master').get();
      } finally {
        testDb.close();
      }
      return true;
    } catch (error) {
      console.warn(`⚠️ Backup verification failed for ${backupPath}:`, error);
      return false;
    }
  }

  close(): void {
    if (this.isConnected) {
      this.db.close();
      this.isConnected = false;
      console.log('🔌 Database connection closed');
    }
  }
}
