import { DatabaseConnection } from '../database/connection.js';
import { ClientRepository } from '../database/clientRepository.js';
import { ServiceRepository, ServiceSeed } from '../database/serviceRepository.js';
import { AppointmentRepository } from '../database/appointmentRepository.js';
import { SessionRepository } from '../database/sessionRepository.js';
import { MigrationManager } from '../database/migration.js';
import { BackupInfo, HealthReport, SQLiteConfig } from '../database/types.js';
import type { BookingStatistics } from '../types/index.js';

const DAY_MS = 24 * 60 * 60 * 1000;

/** The booking ledger: one connection and the repositories that share it. */
export class Database {
  readonly connection: DatabaseConnection;
  readonly clients: ClientRepository;
  readonly services: ServiceRepository;
  readonly appointments: AppointmentRepository;
  readonly sessions: SessionRepository;
  private migrationManager: MigrationManager;

  constructor(config: SQLiteConfig) {
    this.connection = new DatabaseConnection(config);
    this.migrationManager = new MigrationManager(this.connection);
    this.clients = new ClientRepository(this.connection);
    this.services = new ServiceRepository(this.connection);
    this.appointments = new AppointmentRepository(this.connection);
    this.sessions = new SessionRepository(this.connection);
  }

  async initialize(seeds: ServiceSeed[] = []): Promise<void> {
    await this.migrationManager.runMigrations();
    if (seeds.length > 0) {
      await this.services.seed(seeds);
    }

    const health = await this.connection.healthCheck();
    if (health.status === 'unhealthy') {
      throw new Error(`Database health check failed: ${JSON.stringify(health.details)}`);
    }
    console.log('✅ Booking ledger ready');
  }

  get schemaVersion(): number {
    return this.migrationManager.currentVersion();
  }

  async getStatistics(days: number = 30, now: Date = new Date()): Promise<BookingStatistics> {
    return this.appointments.statistics(new Date(now.getTime() - days * DAY_MS));
  }

  async performBackup(): Promise<BackupInfo> {
    return this.connection.backup();
  }

  async healthCheck(): Promise<HealthReport> {
    return this.connection.healthCheck();
  }

  close(): void {
    this.connection.close();
  }
}
