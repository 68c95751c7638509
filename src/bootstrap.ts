import { AppConfig } from './config/env.js';
import { Database } from './config/database.js';
import { loadOperatingHours, loadServiceSeeds } from './config/operatingHours.js';
import { SalonScheduler } from './services/salonScheduler.js';
import { ServiceCatalog } from './services/serviceCatalog.js';
import type { OperatingHours } from './types/index.js';

export interface SalonCore {
  db: Database;
  hours: OperatingHours;
  catalog: ServiceCatalog;
  scheduler: SalonScheduler;
}

/** Opens and migrates the ledger, seeds the catalog and wires the scheduler. */
export async function createSalonCore(config: AppConfig, clock?: () => Date): Promise<SalonCore> {
  const hours = loadOperatingHours(config.paths.operatingHours, config.salon.timezone);
  const seeds = loadServiceSeeds(config.paths.services);

  const db = new Database(config.database);
  try {
    await db.initialize(seeds);
    const catalog = await ServiceCatalog.load(db.services, hours.granularityMinutes);

    const scheduler = new SalonScheduler({
      appointments: db.appointments,
      clients: db.clients,
      sessions: db.sessions,
      catalog,
      hours,
      settings: {
        salonName: config.salon.name,
        currency: config.salon.currency,
        defaultCountryCode: config.salon.defaultCountryCode,
        maxAvailableSlots: config.scheduling.maxAvailableSlots,
        holdTtlMinutes: config.scheduling.holdTtlMinutes,
        summaryMaxChars: config.scheduling.summaryMaxChars
      },
      clock
    });

    return { db, hours, catalog, scheduler };
  } catch (error) {
    db.close();
    throw error;
  }
}
