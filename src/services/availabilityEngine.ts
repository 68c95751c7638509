import type { Appointment, OperatingHours, TimeSlot } from '../types/index.js';
import { ServiceCatalog } from './serviceCatalog.js';
import { generateSlotGrid, isContiguousRun, overlaps, slotsSpanned } from './slotGrid.js';

export const DEFAULT_MAX_RESULTS = 10;

/** Whether an appointment still holds its interval at `now`. */
export function isBlocking(appointment: Appointment, now: Date): boolean {
  if (appointment.status === 'confirmed') {
    return true;
  }
  if (appointment.status === 'pending') {
    return appointment.holdExpiresAt === null || appointment.holdExpiresAt.getTime() > now.getTime();
  }
  return false;
}

export class AvailabilityEngine {
  constructor(
    private readonly catalog: ServiceCatalog,
    private readonly hours: OperatingHours,
    private readonly defaultMaxResults: number = DEFAULT_MAX_RESULTS
  ) {}

  /**
   * Lazily yields every start on `date` where the whole service duration fits
   * a gap-free run of base slots and overlaps no blocking appointment.
   * Starts before `now`, when given, are skipped.
   */
  *availableSlots(
    date: string,
    serviceId: number,
    existingAppointments: Appointment[],
    now?: Date
  ): Generator<TimeSlot, void, undefined> {
    const service = this.catalog.require(serviceId);
    const grid = generateSlotGrid(date, this.hours);
    const span = slotsSpanned(service.durationMinutes, this.hours.granularityMinutes);
    const asOf = now ?? new Date(0);
    const blocking = existingAppointments.filter(appointment => isBlocking(appointment, asOf));

    for (let index = 0; index + span <= grid.length; index++) {
      if (now && grid[index].start.getTime() < now.getTime()) {
        continue;
      }
      if (!isContiguousRun(grid, index, span)) {
        continue;
      }
      const candidate: TimeSlot = {
        start: grid[index].start,
        end: new Date(grid[index].start.getTime() + service.durationMinutes * 60 * 1000)
      };
      if (blocking.some(appointment => overlaps(candidate, appointment))) {
        continue;
      }
      yield candidate;
    }
  }

  findAvailable(
    date: string,
    serviceId: number,
    existingAppointments: Appointment[],
    maxResults: number = this.defaultMaxResults,
    now?: Date
  ): TimeSlot[] {
    // UnknownService / InvalidSlot surface even for maxResults 0
    const slots = this.availableSlots(date, serviceId, existingAppointments, now);
    const first = slots.next();
    if (first.done || maxResults <= 0) {
      return [];
    }

    const results: TimeSlot[] = [first.value];
    for (const slot of slots) {
      if (results.length >= maxResults) {
        break;
      }
      results.push(slot);
    }
    return results;
  }
}
