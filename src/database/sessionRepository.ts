import Database from 'better-sqlite3';
import { BookingError } from '../types/errors.js';
import { toClient } from './clientRepository.js';
import { DatabaseConnection } from './connection.js';
import { withStorage } from './errors.js';
import { PreparedStatements } from './statements.js';
import { ClientRow, SessionRow } from './types.js';
import type { SessionContext } from '../types/index.js';
import type { SessionResolveInput, SessionStore } from '../types/ledger.js';

function prepareStatements(db: Database.Database) {
  return {
    insertClient: db.prepare<[{ phone: string; name: string | null; now: number }]>(`
      INSERT INTO clients (phone, name, email, preferences, createdAt, updatedAt)
      VALUES (@phone, @name, NULL, '{}', @now, @now)
      ON CONFLICT(phone) DO NOTHING
    `),
    findClient: db.prepare<[string], ClientRow>('SELECT * FROM clients WHERE phone = ?'),
    upsertSession: db.prepare<[{ sessionKey: string; clientPhone: string; businessDay: string; now: number }], SessionRow>(`
      INSERT INTO sessions (sessionKey, clientPhone, businessDay, summary, createdAt, lastSeenAt)
      VALUES (@sessionKey, @clientPhone, @businessDay, '', @now, @now)
      ON CONFLICT(sessionKey) DO UPDATE SET lastSeenAt = MAX(sessions.lastSeenAt, excluded.lastSeenAt)
      RETURNING *
    `),
    findByKey: db.prepare<[string], SessionRow>('SELECT * FROM sessions WHERE sessionKey = ?'),
    updateSummary: db.prepare<[{ sessionKey: string; summary: string }], SessionRow>(`
      UPDATE sessions SET summary = @summary WHERE sessionKey = @sessionKey RETURNING *
    `),
    previousSummary: db.prepare<[{ clientPhone: string; beforeDay: string }], { summary: string }>(`
      SELECT summary FROM sessions
      WHERE clientPhone = @clientPhone AND businessDay < @beforeDay AND summary <> ''
      ORDER BY businessDay DESC
      LIMIT 1
    `),
    listByClient: db.prepare<[string], SessionRow>(
      'SELECT * FROM sessions WHERE clientPhone = ? ORDER BY businessDay DESC'
    )
  };
}

type Statements = ReturnType<typeof prepareStatements>;

export class SessionRepository implements SessionStore {
  private statements: PreparedStatements<Statements>;

  constructor(dbConnection: DatabaseConnection) {
    this.statements = new PreparedStatements(dbConnection, prepareStatements);
  }

  async resolve(input: SessionResolveInput): Promise<SessionContext> {
    return withStorage('Session resolve', () => {
      const { db, statements } = this.statements.get();
      const resolve = db.transaction(() => {
        statements.insertClient.run({
          phone: input.clientPhone,
          name: input.displayName,
          now: input.now.getTime()
        });
        const session = statements.upsertSession.get({
          sessionKey: input.sessionKey,
          clientPhone: input.clientPhone,
          businessDay: input.businessDay,
          now: input.now.getTime()
        });
        if (!session) {
          throw new Error(`Session upsert for ${input.sessionKey} returned no row`);
        }
        return this.withClient(statements, session);
      });

      return resolve.immediate();
    });
  }

  async updateSummary(sessionKey: string, update: (current: string) => string): Promise<SessionContext> {
    return withStorage('Session summary update', () => {
      const { db, statements } = this.statements.get();
      const apply = db.transaction(() => {
        const current = statements.findByKey.get(sessionKey);
        if (!current) {
          throw new BookingError('NotFound', `Session ${sessionKey} not found`);
        }
        const row = statements.updateSummary.get({ sessionKey, summary: update(current.summary) });
        if (!row) {
          throw new Error(`Session ${sessionKey} vanished during update`);
        }
        return this.withClient(statements, row);
      });

      return apply.immediate();
    });
  }

  async previousSummary(clientPhone: string, beforeDay: string): Promise<string | null> {
    return withStorage('Previous session lookup', () =>
      this.statements.get().statements.previousSummary.get({ clientPhone, beforeDay })?.summary ?? null
    );
  }

  async listByClient(clientPhone: string): Promise<SessionContext[]> {
    return withStorage('Session history', () => {
      const { statements } = this.statements.get();
      return statements.listByClient.all(clientPhone).map(row => this.withClient(statements, row));
    });
  }

  // The client is joined at read time; the session row never copies client data
  private withClient(statements: Statements, row: SessionRow): SessionContext {
    const client = statements.findClient.get(row.clientPhone);
    if (!client) {
      throw new Error(`Session ${row.sessionKey} references missing client ${row.clientPhone}`);
    }
    return {
      sessionKey: row.sessionKey,
      clientPhone: row.clientPhone,
      businessDay: row.businessDay,
      client: toClient(client),
      summary: row.summary,
      createdAt: new Date(row.createdAt),
      lastSeenAt: new Date(row.lastSeenAt)
    };
  }
}
