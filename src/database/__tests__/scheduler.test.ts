import path from 'path';
import fs from 'fs-extra';
import { afterEach, describe, expect, it } from 'vitest';
import { DatabaseScheduler } from '../scheduler.js';
import type { SQLiteConfig } from '../types.js';
import {
  BASIC_MANICURE,
  CLIENT,
  DEFAULT_NOW,
  MONDAY,
  type TestCore,
  at,
  createTestCore,
  tempDir,
  unwrap
} from '../../__tests__/fixtures.js';

const MINUTE_MS = 60 * 1000;

describe('DatabaseScheduler', () => {
  let core: TestCore;
  let maintenance: DatabaseScheduler;
  let dir: string | null = null;

  afterEach(async () => {
    maintenance.stop();
    core.db.close();
    if (dir) {
      await fs.remove(dir);
      dir = null;
    }
  });

  async function setup(database: Partial<SQLiteConfig> = {}) {
    core = await createTestCore({ database });
    maintenance = new DatabaseScheduler(core.db.connection, core.scheduler.guard, {
      autoBackup: false,
      timezone: 'UTC'
    });
  }

  it('cancels holds whose expiry has passed', async () => {
    await setup();
    unwrap(await core.scheduler.resolveSession(CLIENT));
    const held = unwrap(await core.scheduler.holdAppointment(CLIENT, BASIC_MANICURE, at(MONDAY, '09:00')));

    expect(await maintenance.sweepExpiredHolds(new Date(DEFAULT_NOW.getTime() + 5 * MINUTE_MS))).toBe(0);
    expect(await maintenance.sweepExpiredHolds(new Date(DEFAULT_NOW.getTime() + 10 * MINUTE_MS))).toBe(1);

    const history = await core.db.appointments.history(held.id);
    expect(history[history.length - 1]).toMatchObject({ action: 'expired', performedBy: 'scheduler' });
  });

  it('reports ledger health', async () => {
    await setup();

    expect(await maintenance.runHealthCheck()).toBe(true);
    core.db.close();
    expect(await maintenance.runHealthCheck()).toBe(false);
  });

  it('writes a backup of a file ledger', async () => {
    dir = await tempDir();
    await setup({ dbPath: path.join(dir, 'salon.db'), backupPath: path.join(dir, 'backups') });

    await maintenance.runBackup();

    expect(core.db.connection.listBackups()).toHaveLength(1);
  });

  it('starts once and stops cleanly', async () => {
    await setup();

    expect(() => {
      maintenance.start();
      maintenance.start();
      maintenance.stop();
      maintenance.stop();
    }).not.toThrow();
  });
});
