import cron from 'node-cron';
import type { ScheduledTask } from 'node-cron';
import { DatabaseConnection } from './connection.js';
import { ConflictGuard } from '../services/conflictGuard.js';

export interface SchedulerOptions {
  autoBackup: boolean;
  timezone: string;
}

export class DatabaseScheduler {
  private tasks: ScheduledTask[] = [];

  constructor(
    private readonly dbConnection: DatabaseConnection,
    private readonly guard: ConflictGuard,
    private readonly options: SchedulerOptions
  ) {}

  start(): void {
    if (this.tasks.length > 0) {
      return;
    }
    const schedule = (expression: string, job: () => Promise<void>) => {
      this.tasks.push(cron.schedule(expression, () => {
        job().catch(error => console.error(`❌ Scheduled job "${expression}" failed:`, error));
      }, { timezone: this.options.timezone }));
    };

    // Release expired holds every minute
    schedule('* * * * *', async () => {
      await this.sweepExpiredHolds();
    });

    // Daily backup at 2 AM
    if (this.options.autoBackup) {
      schedule('0 2 * * *', async () => {
        await this.runBackup();
      });
    }

    // Health check every 6 hours
    schedule('0 */6 * * *', async () => {
      await this.runHealthCheck();
    });

    console.log('⏰ Maintenance scheduler started');
  }

  stop(): void {
    for (const task of this.tasks) {
      task.stop();
    }
    this.tasks = [];
  }

  async sweepExpiredHolds(now: Date = new Date()): Promise<number> {
    const expired = await this.guard.expireHolds(now);
    return expired.length;
  }

  async runBackup(): Promise<void> {
    console.log('🔄 Starting scheduled backup...');
    await this.dbConnection.backup();
    await this.dbConnection.cleanupOldBackups();
    console.log('✅ Scheduled backup completed');
  }

  async runHealthCheck(): Promise<boolean> {
    const health = await this.dbConnection.healthCheck();
    if (health.status === 'unhealthy') {
      console.error('🚨 Database health check failed:', health.details);
      return false;
    }
    console.log('💚 Database health check passed');
    return true;
  }
}
