import Database from 'better-sqlite3';
import { z } from 'zod';
import { DatabaseConnection } from './connection.js';
import { withStorage } from './errors.js';
import { PreparedStatements } from './statements.js';
import { ClientRow } from './types.js';
import type { Client, ClientPreferences, ClientProfileUpdate } from '../types/index.js';
import type { ClientStore } from '../types/ledger.js';

const preferencesSchema = z.record(z.unknown());

export function parsePreferences(raw: string): ClientPreferences {
  try {
    const parsed = preferencesSchema.safeParse(JSON.parse(raw));
    return parsed.success ? parsed.data : {};
  } catch {
    return {};
  }
}

export function toClient(row: ClientRow): Client {
  return {
    phone: row.phone,
    name: row.name,
    email: row.email,
    preferences: parsePreferences(row.preferences),
    createdAt: new Date(row.createdAt),
    updatedAt: new Date(row.updatedAt)
  };
}

function prepareStatements(db: Database.Database) {
  return {
    findByPhone: db.prepare<[string], ClientRow>('SELECT * FROM clients WHERE phone = ?'),
    updateProfile: db.prepare<[{ phone: string; name: string | null; email: string | null; preferences: string; now: number }], ClientRow>(`
      UPDATE clients
      SET name = @name, email = @email, preferences = @preferences, updatedAt = @now
      WHERE phone = @phone
      RETURNING *
    `)
  };
}

export class ClientRepository implements ClientStore {
  private statements: PreparedStatements<ReturnType<typeof prepareStatements>>;

  constructor(dbConnection: DatabaseConnection) {
    this.statements = new PreparedStatements(dbConnection, prepareStatements);
  }

  async findByPhone(phone: string): Promise<Client | null> {
    return withStorage('Client lookup', () => {
      const row = this.statements.get().statements.findByPhone.get(phone);
      return row ? toClient(row) : null;
    });
  }

  async updateProfile(phone: string, update: ClientProfileUpdate, now: Date): Promise<Client | null> {
    return withStorage('Client profile update', () => {
      const { db, statements } = this.statements.get();
      const apply = db.transaction(() => {
        const current = statements.findByPhone.get(phone);
        if (!current) {
          return null;
        }
        const preferences = update.preferences === undefined
          ? current.preferences
          : JSON.stringify({ ...parsePreferences(current.preferences), ...update.preferences });

        return statements.updateProfile.get({
          phone,
          name: update.name === undefined ? current.name : update.name,
          email: update.email === undefined ? current.email : update.email,
          preferences,
          now: now.getTime()
        }) ?? null;
      });

      const row = apply.immediate();
      return row ? toClient(row) : null;
    });
  }
}
