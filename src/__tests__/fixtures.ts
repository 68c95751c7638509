import os from 'os';
import path from 'path';
import fs from 'fs-extra';
import { expect } from 'vitest';
import { Database } from '../config/database.js';
import type { ServiceSeed } from '../database/serviceRepository.js';
import type { SQLiteConfig } from '../database/types.js';
import { SalonScheduler } from '../services/salonScheduler.js';
import type { SchedulerSettings } from '../services/salonScheduler.js';
import { ServiceCatalog } from '../services/serviceCatalog.js';
import type { BookingError, BookingErrorCode, Result } from '../types/errors.js';
import type { Appointment, OperatingHours } from '../types/index.js';

// 2030-01-07 is a Monday, 2030-01-13 a Sunday
export const MONDAY = '2030-01-07';
export const TUESDAY = '2030-01-08';
export const SUNDAY = '2030-01-13';

export const CLIENT = '+351912345678';
export const OTHER_CLIENT = '+351923456789';

export const TEST_HOURS: OperatingHours = {
  timezone: 'UTC',
  granularityMinutes: 15,
  days: {
    sunday: null,
    monday: { open: '09:00', close: '19:00' },
    tuesday: { open: '09:00', close: '19:00' },
    wednesday: { open: '09:00', close: '19:00' },
    thursday: { open: '09:00', close: '19:00' },
    friday: { open: '09:00', close: '19:00' },
    saturday: { open: '09:00', close: '19:00' }
  }
};

// Seeded in order, so ids are 1..4
export const TEST_SERVICES: ServiceSeed[] = [
  { name: 'Basic Manicure', description: 'Classic manicure', durationMinutes: 30, priceCents: 2300 },
  { name: 'Gel Manicure', description: 'Long-lasting gel polish', durationMinutes: 60, priceCents: 3200 },
  { name: 'Acrylic Full Set', description: 'Full set of acrylic nails', durationMinutes: 120, priceCents: 5500 },
  { name: 'Paraffin Treatment', description: 'No longer offered', durationMinutes: 45, priceCents: 1500, active: false }
];

export const BASIC_MANICURE = 1;
export const GEL_MANICURE = 2;
export const ACRYLIC_SET = 3;
export const RETIRED_SERVICE = 4;

export const DEFAULT_NOW = new Date('2030-01-01T08:00:00Z');

/** `HH:mm` on a YYYY-MM-DD day, as a UTC instant. */
export function at(date: string, hhmm: string): Date {
  return new Date(`${date}T${hhmm}:00Z`);
}

export function hhmm(instant: Date): string {
  return instant.toISOString().slice(11, 16);
}

export function memoryConfig(overrides: Partial<SQLiteConfig> = {}): SQLiteConfig {
  return {
    dbPath: ':memory:',
    backupPath: path.join(os.tmpdir(), 'salon-ledger-test-backups'),
    timeout: 1000,
    autoBackup: false,
    retentionDays: 30,
    logQueries: false,
    ...overrides
  };
}

export async function tempDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), 'salon-ledger-'));
}

export interface TestCore {
  db: Database;
  catalog: ServiceCatalog;
  scheduler: SalonScheduler;
}

export async function createTestCore(options: {
  database?: Partial<SQLiteConfig>;
  hours?: OperatingHours;
  settings?: Partial<SchedulerSettings>;
  clock?: () => Date;
} = {}): Promise<TestCore> {
  const hours = options.hours ?? TEST_HOURS;
  const db = new Database(memoryConfig(options.database));
  await db.initialize(TEST_SERVICES);
  const catalog = await ServiceCatalog.load(db.services, hours.granularityMinutes);

  const scheduler = new SalonScheduler({
    appointments: db.appointments,
    clients: db.clients,
    sessions: db.sessions,
    catalog,
    hours,
    settings: {
      salonName: 'Test Salon',
      currency: 'EUR',
      defaultCountryCode: '351',
      maxAvailableSlots: 10,
      holdTtlMinutes: 10,
      summaryMaxChars: 200,
      ...options.settings
    },
    clock: options.clock ?? (() => DEFAULT_NOW)
  });

  return { db, catalog, scheduler };
}

export function unwrap<T>(result: Result<T>): T {
  if (!result.ok) {
    throw new Error(`Expected success, got ${result.error.code}: ${result.error.message}`);
  }
  return result.value;
}

export function expectErrorCode<T>(result: Result<T>, code: BookingErrorCode): BookingError {
  if (result.ok) {
    throw new Error(`Expected ${code}, got success`);
  }
  expect(result.error.code).toBe(code);
  return result.error;
}

export function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('Expected function to throw');
}

export async function captureRejection(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  throw new Error('Expected promise to reject');
}

export function appointment(overrides: Partial<Appointment> & Pick<Appointment, 'start' | 'end'>): Appointment {
  return {
    id: 1,
    clientPhone: CLIENT,
    serviceId: BASIC_MANICURE,
    status: 'confirmed',
    holdExpiresAt: null,
    notes: null,
    createdAt: DEFAULT_NOW,
    updatedAt: DEFAULT_NOW,
    ...overrides
  };
}
