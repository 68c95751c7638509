import { loadConfig } from './config/env.js';
import { createSalonCore } from './bootstrap.js';
import { DatabaseScheduler } from './database/scheduler.js';
import { StatusServer } from './server.js';

async function main() {
  const config = loadConfig();
  const { db, hours, catalog, scheduler } = await createSalonCore(config);

  const maintenance = new DatabaseScheduler(db.connection, scheduler.guard, {
    autoBackup: config.database.autoBackup,
    timezone: hours.timezone
  });
  maintenance.start();

  const statusServer = new StatusServer(db, config.salon.name);
  await statusServer.start(config.port);

  console.log(`💅 ${config.salon.name} booking core started (${catalog.list().length} services, ${hours.timezone})`);

  const shutdown = (signal: string) => {
    console.log(`🛑 Received ${signal}, shutting down...`);
    maintenance.stop();
    statusServer.stop()
      .catch(error => console.error('❌ Failed to stop status server:', error))
      .finally(() => db.close());
  };

  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch(error => {
  console.error('❌ Failed to start booking core:', error);
  process.exit(1);
});
