import Database from 'better-sqlite3';
import { DatabaseConnection } from './connection.js';

/**
 * Lazily prepares a repository's statements against the live database handle
 * and prepares them again when the handle changes (e.g. after a restore).
 */
export class PreparedStatements<T> {
  private preparedFor: Database.Database | null = null;
  private statements: T | null = null;

  constructor(
    private readonly connection: DatabaseConnection,
    private readonly prepare: (db: Database.Database) => T
  ) {}

  get(): { db: Database.Database; statements: T } {
    const db = this.connection.getDatabase();
    if (this.statements === null || this.preparedFor !== db) {
      this.statements = this.prepare(db);
      this.preparedFor = db;
    }
    return { db, statements: this.statements };
  }
}
