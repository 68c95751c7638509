import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { Database } from '../config/database.js';
import { StatusServer } from '../server.js';
import { TEST_SERVICES, memoryConfig } from './fixtures.js';

describe('StatusServer', () => {
  let db: Database;
  let server: StatusServer;
  let baseUrl: string;

  beforeEach(async () => {
    db = new Database(memoryConfig());
    await db.initialize(TEST_SERVICES);
    server = new StatusServer(db, 'Test Salon');
    const listening = await server.start(0);
    const address = listening.address();
    if (!address || typeof address === 'string') {
      throw new Error('Status server is not listening on a TCP port');
    }
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterEach(async () => {
    await server.stop();
    db.close();
  });

  it('describes the running service', async () => {
    const response = await fetch(`${baseUrl}/`);
    const body = await response.json();

    expect(response.status).toBe(200);
    expect(body).toMatchObject({ name: 'Test Salon', status: 'running', uptimeSeconds: expect.any(Number) });
  });

  it('reports a healthy ledger with its schema version', async () => {
    const response = await fetch(`${baseUrl}/health`);

    expect(response.status).toBe(200);
    expect(await response.json()).toMatchObject({ status: 'healthy', schemaVersion: 3 });
  });

  it('answers 503 once the ledger is closed', async () => {
    db.close();

    const response = await fetch(`${baseUrl}/health`);

    expect(response.status).toBe(503);
    expect(await response.json()).toMatchObject({
      status: 'unhealthy',
      schemaVersion: null,
      details: { error: 'Database not connected' }
    });
  });
});
