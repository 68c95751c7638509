import crypto from 'crypto';
import { Migration } from './types.js';
import { DatabaseConnection } from './connection.js';

const MIGRATIONS: Migration[] = [
  {
    version: 1,
    name: 'initial_schema',
    up: `
      CREATE TABLE IF NOT EXISTS clients (
        phone TEXT PRIMARY KEY,
        name TEXT,
        email TEXT,
        preferences TEXT NOT NULL DEFAULT '{}',
        createdAt INTEGER NOT NULL,
        updatedAt INTEGER NOT NULL
      );

      CREATE TABLE IF NOT EXISTS services (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        name TEXT NOT NULL UNIQUE,
        description TEXT NOT NULL DEFAULT '',
        durationMinutes INTEGER NOT NULL CHECK (durationMinutes > 0),
        priceCents INTEGER NOT NULL CHECK (priceCents >= 0),
        active INTEGER NOT NULL DEFAULT 1
      );

      CREATE TABLE IF NOT EXISTS appointments (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        clientPhone TEXT NOT NULL REFERENCES clients(phone),
        serviceId INTEGER NOT NULL REFERENCES services(id),
        startAt INTEGER NOT NULL,
        endAt INTEGER NOT NULL,
        status TEXT NOT NULL CHECK (status IN ('pending', 'confirmed', 'cancelled')),
        holdExpiresAt INTEGER,
        notes TEXT,
        createdAt INTEGER NOT NULL,
        updatedAt INTEGER NOT NULL,
        CHECK (endAt > startAt)
      );

      CREATE INDEX IF NOT EXISTS idx_appointments_interval ON appointments(startAt, endAt);
      CREATE INDEX IF NOT EXISTS idx_appointments_client ON appointments(clientPhone);
      CREATE INDEX IF NOT EXISTS idx_appointments_status ON appointments(status);
    `,
    down: `
      DROP TABLE IF EXISTS appointments;
      DROP TABLE IF EXISTS services;
      DROP TABLE IF EXISTS clients;
    `
  },
  {
    version: 2,
    name: 'sessions_table',
    up: `
      CREATE TABLE IF NOT EXISTS sessions (
        sessionKey TEXT PRIMARY KEY,
        clientPhone TEXT NOT NULL REFERENCES clients(phone),
        businessDay TEXT NOT NULL,
        summary TEXT NOT NULL DEFAULT '',
        createdAt INTEGER NOT NULL,
        lastSeenAt INTEGER NOT NULL,
        UNIQUE (clientPhone, businessDay)
      );

      CREATE INDEX IF NOT EXISTS idx_sessions_client ON sessions(clientPhone, businessDay);
    `,
    down: `
      DROP TABLE IF EXISTS sessions;
    `
  },
  {
    version: 3,
    name: 'appointment_history_table',
    up: `
      CREATE TABLE IF NOT EXISTS appointment_history (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        appointmentId INTEGER NOT NULL REFERENCES appointments(id),
        action TEXT NOT NULL CHECK (action IN ('created', 'held', 'confirmed', 'cancelled', 'expired')),
        fromStatus TEXT,
        toStatus TEXT NOT NULL,
        performedBy TEXT NOT NULL,
        at INTEGER NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_history_appointment ON appointment_history(appointmentId);
    `,
    down: `
      DROP TABLE IF EXISTS appointment_history;
    `
  }
];

export class MigrationManager {
  private dbConnection: DatabaseConnection;
  private migrations: Migration[];

  constructor(dbConnection: DatabaseConnection, migrations: Migration[] = MIGRATIONS) {
    this.dbConnection = dbConnection;
    this.migrations = migrations;
    this.initializeMigrationsTable();
  }

  private initializeMigrationsTable() {
    this.dbConnection.getDatabase().prepare(`
      CREATE TABLE IF NOT EXISTS migrations (
        version INTEGER PRIMARY KEY,
        name TEXT NOT NULL,
        executed_at DATETIME DEFAULT CURRENT_TIMESTAMP,
        checksum TEXT NOT NULL
      )
    `).run();
  }

  currentVersion(): number {
    const row = this.dbConnection.getDatabase()
      .prepare<[], { version: number | null }>('SELECT MAX(version) AS version FROM migrations')
      .get();
    return row?.version ?? 0;
  }

  async runMigrations(): Promise<number> {
    const db = this.dbConnection.getDatabase();
    const currentVersion = this.currentVersion();
    const pending = this.migrations.filter(m => m.version > currentVersion);

    if (pending.length === 0) {
      return 0;
    }

    console.log(`🔄 Running ${pending.length} migration(s) from version ${currentVersion}...`);

    for (const migration of pending) {
      try {
        const apply = db.transaction(() => {
          db.exec(migration.up);
          db.prepare(`
            INSERT INTO migrations (version, name, checksum)
            VALUES (?, ?, ?)
          `).run(migration.version, migration.name, this.calculateMigrationChecksum(migration));
        });
        apply.immediate();
        console.log(`✅ Migration ${migration.version} (${migration.name}) applied`);
      } catch (error) {
        console.error(`❌ Migration ${migration.version} failed:`, error);
        throw error;
      }
    }

    return pending.length;
  }

  async rollback(targetVersion: number): Promise<number> {
    const db = this.dbConnection.getDatabase();
    const currentVersion = this.currentVersion();

    if (targetVersion >= currentVersion) {
      throw new Error(`Target version ${targetVersion} must be lower than current version ${currentVersion}`);
    }

    const toRollback = [...this.migrations]
      .reverse()
      .filter(m => m.version > targetVersion && m.version <= currentVersion);

    for (const migration of toRollback) {
      const revert = db.transaction(() => {
        db.exec(migration.down);
        db.prepare('DELETE FROM migrations WHERE version = ?').run(migration.version);
      });
      revert.immediate();
      console.log(`↩️ Rolled back migration ${migration.version} (${migration.name})`);
    }

    return toRollback.length;
  }

  private calculateMigrationChecksum(migration: Migration): string {
    return crypto.createHash('sha256')
      .update(migration.up + migration.down)
      .digest('hex');
  }
}
