import path from 'path';
import { describe, expect, it } from 'vitest';
import { parseEnv } from '../env.js';

describe('parseEnv', () => {
  it('falls back to defaults for an empty environment', () => {
    const config = parseEnv({});

    expect(config.salon).toEqual({
      name: 'Elegant Nails Spa',
      timezone: null,
      currency: 'EUR',
      defaultCountryCode: '351'
    });
    expect(config.scheduling).toEqual({ maxAvailableSlots: 10, holdTtlMinutes: 10, summaryMaxChars: 4000 });
    expect(config.database).toEqual({
      dbPath: './data/salon.db',
      backupPath: './data/backups/',
      timeout: 5000,
      autoBackup: false,
      retentionDays: 30,
      logQueries: false
    });
    expect(config.port).toBe(3000);
    expect(config.paths.operatingHours.endsWith(path.join('config', 'operating-hours.json'))).toBe(true);
    expect(config.paths.services.endsWith(path.join('config', 'services.json'))).toBe(true);
  });

  it('reads overrides from the environment', () => {
    const config = parseEnv({
      SALON_NAME: 'Downtown Nails',
      SALON_TIMEZONE: 'America/New_York',
      CURRENCY: 'USD',
      DEFAULT_COUNTRY_CODE: '1',
      MAX_AVAILABLE_SLOTS: '5',
      HOLD_TTL_MINUTES: '15',
      SQLITE_DB_PATH: ':memory:',
      DB_AUTO_BACKUP: 'true',
      SERVICES_PATH: 'custom/services.json',
      PORT: '8080'
    });

    expect(config.salon).toEqual({
      name: 'Downtown Nails',
      timezone: 'America/New_York',
      currency: 'USD',
      defaultCountryCode: '1'
    });
    expect(config.scheduling.maxAvailableSlots).toBe(5);
    expect(config.scheduling.holdTtlMinutes).toBe(15);
    expect(config.database.dbPath).toBe(':memory:');
    expect(config.database.autoBackup).toBe(true);
    expect(config.paths.services).toBe(path.resolve('custom/services.json'));
    expect(config.port).toBe(8080);
  });

  it.each([
    [{ SALON_TIMEZONE: 'Mars/Olympus' }, 'SALON_TIMEZONE: must be a known IANA timezone'],
    [{ CURRENCY: 'euro' }, 'CURRENCY: CURRENCY must be an ISO 4217 code'],
    [{ MAX_AVAILABLE_SLOTS: '0' }, 'MAX_AVAILABLE_SLOTS'],
    [{ DB_AUTO_BACKUP: 'yes' }, 'DB_AUTO_BACKUP']
  ])('rejects %j', (env, message) => {
    expect(() => parseEnv(env)).toThrow(`Invalid environment configuration: ${message}`);
  });
});
