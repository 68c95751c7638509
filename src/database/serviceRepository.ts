import Database from 'better-sqlite3';
import { DatabaseConnection } from './connection.js';
import { withStorage } from './errors.js';
import { PreparedStatements } from './statements.js';
import { ServiceRow } from './types.js';
import type { Service } from '../types/index.js';
import type { ServiceStore } from '../types/ledger.js';

export interface ServiceSeed {
  name: string;
  description: string;
  durationMinutes: number;
  priceCents: number;
  active?: boolean;
}

function toService(row: ServiceRow): Service {
  return {
    id: row.id,
    name: row.name,
    description: row.description,
    durationMinutes: row.durationMinutes,
    priceCents: row.priceCents,
    active: row.active === 1
  };
}

function prepareStatements(db: Database.Database) {
  return {
    count: db.prepare<[], { total: number }>('SELECT COUNT(*) AS total FROM services'),
    listAll: db.prepare<[], ServiceRow>('SELECT * FROM services ORDER BY id'),
    insert: db.prepare<[{ name: string; description: string; durationMinutes: number; priceCents: number; active: number }]>(`
      INSERT INTO services (name, description, durationMinutes, priceCents, active)
      VALUES (@name, @description, @durationMinutes, @priceCents, @active)
    `)
  };
}

export class ServiceRepository implements ServiceStore {
  private statements: PreparedStatements<ReturnType<typeof prepareStatements>>;

  constructor(dbConnection: DatabaseConnection) {
    this.statements = new PreparedStatements(dbConnection, prepareStatements);
  }

  async listAll(): Promise<Service[]> {
    return withStorage('Service listing', () =>
      this.statements.get().statements.listAll.all().map(toService)
    );
  }

  /** Inserts the seed catalog only when the services table is empty. */
  async seed(services: ServiceSeed[]): Promise<number> {
    return withStorage('Service seeding', () => {
      const { db, statements } = this.statements.get();
      const seedAll = db.transaction((items: ServiceSeed[]) => {
        if ((statements.count.get()?.total ?? 0) > 0) {
          return 0;
        }
        for (const item of items) {
          statements.insert.run({
            name: item.name,
            description: item.description,
            durationMinutes: item.durationMinutes,
            priceCents: item.priceCents,
            active: item.active === false ? 0 : 1
          });
        }
        return items.length;
      });

      const inserted = seedAll.immediate(services);
      if (inserted > 0) {
        console.log(`💅 Seeded ${inserted} default service(s)`);
      }
      return inserted;
    });
  }
}
