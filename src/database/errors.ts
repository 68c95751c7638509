import Database from 'better-sqlite3';
import { BookingError } from '../types/errors.js';

const BUSY_CODES = new Set(['SQLITE_BUSY', 'SQLITE_BUSY_SNAPSHOT', 'SQLITE_BUSY_TIMEOUT', 'SQLITE_LOCKED']);

export function toStorageError(operation: string, error: unknown): unknown {
  if (error instanceof BookingError) {
    return error;
  }
  if (error instanceof Database.SqliteError) {
    if (BUSY_CODES.has(error.code)) {
      console.warn(`⚠️ ${operation} timed out waiting for the ledger lock`);
      return new BookingError('StorageTimeout', `${operation} timed out: ${error.message}`, { cause: error });
    }
    console.error(`❌ ${operation} failed:`, error);
    return new BookingError('StorageUnavailable', `${operation} failed: ${error.message}`, { cause: error });
  }
  return error;
}

/**
 * Runs a ledger operation and translates SQLite failures into
 * `StorageTimeout` / `StorageUnavailable`. Anything else passes through.
 */
export function withStorage<T>(operation: string, fn: () => T): T {
  try {
    return fn();
  } catch (error) {
    throw toStorageError(operation, error);
  }
}
