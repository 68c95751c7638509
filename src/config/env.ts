import { config as loadEnv } from 'dotenv';
import moment from 'moment-timezone';
import path from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { SQLiteConfig } from '../database/types.js';

const projectRoot = path.resolve(path.dirname(fileURLToPath(import.meta.url)), '../..');

const booleanFlag = z.enum(['true', 'false']).default('false').transform(value => value === 'true');

const timezone = z.string().refine(name => moment.tz.zone(name) !== null, {
  message: 'must be a known IANA timezone'
});

const envSchema = z.object({
  SALON_NAME: z.string().min(1).default('Elegant Nails Spa'),
  SALON_TIMEZONE: timezone.optional(),
  CURRENCY: z.string().regex(/^[A-Z]{3}$/, 'CURRENCY must be an ISO 4217 code').default('EUR'),
  DEFAULT_COUNTRY_CODE: z.string().regex(/^[1-9]\d{0,2}$/, 'DEFAULT_COUNTRY_CODE must be 1-3 digits').default('351'),

  OPERATING_HOURS_PATH: z.string().min(1).optional(),
  SERVICES_PATH: z.string().min(1).optional(),

  MAX_AVAILABLE_SLOTS: z.coerce.number().int().positive().default(10),
  HOLD_TTL_MINUTES: z.coerce.number().int().positive().default(10),
  SESSION_SUMMARY_MAX_CHARS: z.coerce.number().int().positive().default(4000),

  SQLITE_DB_PATH: z.string().min(1).default('./data/salon.db'),
  SQLITE_BACKUP_PATH: z.string().min(1).default('./data/backups/'),
  SQLITE_TIMEOUT: z.coerce.number().int().positive().default(5000),
  DB_AUTO_BACKUP: booleanFlag,
  DB_RETENTION_DAYS: z.coerce.number().int().positive().default(30),
  DB_LOG_QUERIES: booleanFlag,

  PORT: z.coerce.number().int().min(0).max(65535).default(3000)
});

export interface AppConfig {
  salon: {
    name: string;
    timezone: string | null;
    currency: string;
    defaultCountryCode: string;
  };
  paths: {
    operatingHours: string;
    services: string;
  };
  scheduling: {
    maxAvailableSlots: number;
    holdTtlMinutes: number;
    summaryMaxChars: number;
  };
  database: SQLiteConfig;
  port: number;
}

export function parseEnv(source: NodeJS.ProcessEnv): AppConfig {
  const parsed = envSchema.safeParse(source);

  if (!parsed.success) {
    const details = parsed.error.issues
      .map(issue => `${issue.path.join('.') || 'env'}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid environment configuration: ${details}`);
  }

  const env = parsed.data;
  return Object.freeze({
    salon: {
      name: env.SALON_NAME,
      timezone: env.SALON_TIMEZONE ?? null,
      currency: env.CURRENCY,
      defaultCountryCode: env.DEFAULT_COUNTRY_CODE
    },
    paths: {
      operatingHours: env.OPERATING_HOURS_PATH
        ? path.resolve(env.OPERATING_HOURS_PATH)
        : path.join(projectRoot, 'config', 'operating-hours.json'),
      services: env.SERVICES_PATH
        ? path.resolve(env.SERVICES_PATH)
        : path.join(projectRoot, 'config', 'services.json')
    },
    scheduling: {
      maxAvailableSlots: env.MAX_AVAILABLE_SLOTS,
      holdTtlMinutes: env.HOLD_TTL_MINUTES,
      summaryMaxChars: env.SESSION_SUMMARY_MAX_CHARS
    },
    database: {
      dbPath: env.SQLITE_DB_PATH,
      backupPath: env.SQLITE_BACKUP_PATH,
      timeout: env.SQLITE_TIMEOUT,
      autoBackup: env.DB_AUTO_BACKUP,
      retentionDays: env.DB_RETENTION_DAYS,
      logQueries: env.DB_LOG_QUERIES
    },
    port: env.PORT
  });
}

export function loadConfig(): AppConfig {
  loadEnv();
  return parseEnv(process.env);
}
