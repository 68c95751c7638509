import { BookingError } from '../types/errors.js';
import type { Service } from '../types/index.js';
import type { ServiceStore } from '../types/ledger.js';

/**
 * Immutable in-memory view of the seeded service catalog. Loaded once;
 * inactive services are neither listed nor bookable.
 */
export class ServiceCatalog {
  private readonly byId: ReadonlyMap<number, Readonly<Service>>;
  private readonly active: ReadonlyArray<Readonly<Service>>;

  constructor(services: Service[], granularityMinutes: number) {
    for (const service of services) {
      if (service.active && service.durationMinutes % granularityMinutes !== 0) {
        throw new Error(
          `Service "${service.name}" lasts ${service.durationMinutes} min, not a multiple of the ${granularityMinutes} min slot granularity`
        );
      }
    }
    const frozen = services.map(service => Object.freeze({ ...service }));
    this.byId = new Map(frozen.map(service => [service.id, service]));
    this.active = Object.freeze(frozen.filter(service => service.active));
  }

  static async load(store: ServiceStore, granularityMinutes: number): Promise<ServiceCatalog> {
    return new ServiceCatalog(await store.listAll(), granularityMinutes);
  }

  list(): Service[] {
    return [...this.active];
  }

  find(serviceId: number): Service | undefined {
    const service = this.byId.get(serviceId);
    return service?.active ? service : undefined;
  }

  require(serviceId: number): Service {
    const service = this.find(serviceId);
    if (!service) {
      throw new BookingError('UnknownService', `Service ${serviceId} does not exist or is not offered`);
    }
    return service;
  }
}
