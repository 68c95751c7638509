import express from 'express';
import type { Server } from 'http';
import { Database } from './config/database.js';

/** Operational status endpoints. Booking traffic never goes through here. */
export class StatusServer {
  private app: express.Application;
  private server: Server | null = null;
  private startedAt = new Date();

  constructor(
    private readonly db: Database,
    private readonly salonName: string
  ) {
    this.app = express();
    this.setupRoutes();
  }

  private setupRoutes() {
    this.app.get('/', (_req, res) => {
      res.json({
        name: this.salonName,
        status: 'running',
        startedAt: this.startedAt.toISOString(),
        uptimeSeconds: Math.floor((Date.now() - this.startedAt.getTime()) / 1000)
      });
    });

    this.app.get('/health', (_req, res, next) => {
      this.db.healthCheck()
        .then(health => {
          res.status(health.status === 'healthy' ? 200 : 503).json({
            ...health,
            schemaVersion: health.status === 'healthy' ? this.db.schemaVersion : null
          });
        })
        .catch(next);
    });
  }

  start(port: number = 3000): Promise<Server> {
    this.startedAt = new Date();
    return new Promise((resolve, reject) => {
      const server = this.app.listen(port, () => {
        console.log(`🌐 Status server running on port ${this.port(server)}`);
        resolve(server);
      });
      server.once('error', reject);
      this.server = server;
    });
  }

  async stop(): Promise<void> {
    const server = this.server;
    if (!server) {
      return;
    }
    this.server = null;
    await new Promise<void>((resolve, reject) => {
      server.close(error => (error ? reject(error) : resolve()));
    });
  }

  private port(server: Server): number | string {
    const address = server.address();
    return address && typeof address === 'object' ? address.port : String(address);
  }
}
