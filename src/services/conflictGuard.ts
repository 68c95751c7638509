import { BookingError } from '../types/errors.js';
import type { Appointment, OperatingHours } from '../types/index.js';
import type { AppointmentDraft, AppointmentStore, ClientStore } from '../types/ledger.js';
import { normalizePhone } from '../utils/phone.js';
import { ServiceCatalog } from './serviceCatalog.js';
import { businessDay, generateSlotGrid, isContiguousRun, slotIndexAt, slotsSpanned } from './slotGrid.js';

const MINUTE_MS = 60 * 1000;

export interface ConflictGuardOptions {
  defaultCountryCode: string;
  holdTtlMinutes: number;
}

export interface CommitOptions {
  now?: Date;
  notes?: string | null;
}

/**
 * Sole writer of appointments. Every write re-validates the interval inside
 * the ledger's write transaction, whatever availability the caller saw.
 */
export class ConflictGuard {
  constructor(
    private readonly appointments: AppointmentStore,
    private readonly clients: ClientStore,
    private readonly catalog: ServiceCatalog,
    private readonly hours: OperatingHours,
    private readonly options: ConflictGuardOptions
  ) {}

  async commit(clientId: string, serviceId: number, requestedStart: Date, options: CommitOptions = {}): Promise<Appointment> {
    const now = options.now ?? new Date();
    const draft = await this.validate(clientId, serviceId, requestedStart, now, options.notes ?? null);
    const appointment = await this.insert({ ...draft, status: 'confirmed', holdExpiresAt: null }, now);

    console.log(`✅ Appointment ${appointment.id} confirmed for ${appointment.clientPhone} at ${appointment.start.toISOString()}`);
    return appointment;
  }

  async hold(clientId: string, serviceId: number, requestedStart: Date, options: CommitOptions = {}): Promise<Appointment> {
    const now = options.now ?? new Date();
    const draft = await this.validate(clientId, serviceId, requestedStart, now, options.notes ?? null);
    const holdExpiresAt = new Date(now.getTime() + this.options.holdTtlMinutes * MINUTE_MS);
    const appointment = await this.insert({ ...draft, status: 'pending', holdExpiresAt }, now);

    console.log(`⏳ Appointment ${appointment.id} held for ${appointment.clientPhone} until ${holdExpiresAt.toISOString()}`);
    return appointment;
  }

  async confirm(appointmentId: number, now: Date = new Date()): Promise<Appointment> {
    const appointment = await this.appointments.applyTransition(
      appointmentId,
      current => {
        if (current.status === 'cancelled') {
          throw new BookingError('AlreadyCancelled', `Appointment ${appointmentId} is already cancelled`);
        }
        if (current.status === 'confirmed') {
          return null;
        }
        if (current.holdExpiresAt !== null && current.holdExpiresAt.getTime() <= now.getTime()) {
          return { to: 'cancelled', action: 'expired' };
        }
        return { to: 'confirmed', action: 'confirmed' };
      },
      now,
      'client'
    );

    // Only an expired hold comes back cancelled; the expiry itself is committed
    if (appointment.status === 'cancelled') {
      console.warn(`⚠️ Hold ${appointmentId} expired before confirmation`);
      throw new BookingError('HoldExpired', `Hold on appointment ${appointmentId} expired`);
    }
    return appointment;
  }

  async cancel(appointmentId: number, now: Date = new Date(), performedBy: string = 'client'): Promise<Appointment> {
    const appointment = await this.appointments.applyTransition(
      appointmentId,
      current => {
        if (current.status === 'cancelled') {
          throw new BookingError('AlreadyCancelled', `Appointment ${appointmentId} is already cancelled`);
        }
        return { to: 'cancelled', action: 'cancelled' };
      },
      now,
      performedBy
    );

    console.log(`🗓️ Appointment ${appointmentId} cancelled by ${performedBy}`);
    return appointment;
  }

  async expireHolds(now: Date = new Date()): Promise<Appointment[]> {
    const expired = await this.appointments.expireHolds(now, 'scheduler');
    if (expired.length > 0) {
      console.warn(`⚠️ Released ${expired.length} expired hold(s)`);
    }
    return expired;
  }

  private async insert(draft: AppointmentDraft, now: Date): Promise<Appointment> {
    try {
      return await this.appointments.insertIfFree(draft, now, draft.clientPhone);
    } catch (error) {
      if (error instanceof BookingError && error.code === 'SlotConflict') {
        console.warn(`⚠️ Slot conflict for ${draft.clientPhone} at ${draft.start.toISOString()}`);
      }
      throw error;
    }
  }

  // An id that is not a phone number cannot name a registered client
  private clientPhone(clientId: string): string {
    try {
      return normalizePhone(clientId, this.options.defaultCountryCode);
    } catch (error) {
      if (error instanceof BookingError && error.code === 'InvalidPhone') {
        throw new BookingError('UnknownClient', `No client registered for "${clientId}"`, { cause: error });
      }
      throw error;
    }
  }

  private async validate(
    clientId: string,
    serviceId: number,
    requestedStart: Date,
    now: Date,
    notes: string | null
  ): Promise<Omit<AppointmentDraft, 'status' | 'holdExpiresAt'>> {
    const phone = this.clientPhone(clientId);
    const client = await this.clients.findByPhone(phone);
    if (!client) {
      throw new BookingError('UnknownClient', `No client registered for ${phone}`);
    }

    const service = this.catalog.require(serviceId);

    if (Number.isNaN(requestedStart.getTime())) {
      throw new BookingError('InvalidSlot', 'Requested start is not a valid time');
    }
    if (requestedStart.getTime() < now.getTime()) {
      throw new BookingError('InvalidSlot', `Requested start ${requestedStart.toISOString()} is in the past`);
    }

    const grid = generateSlotGrid(businessDay(requestedStart, this.hours.timezone), this.hours);
    const index = slotIndexAt(grid, requestedStart);
    if (index < 0) {
      throw new BookingError(
        'InvalidSlot',
        `Requested start ${requestedStart.toISOString()} is outside operating hours or not on a ${this.hours.granularityMinutes}-minute boundary`
      );
    }
    if (!isContiguousRun(grid, index, slotsSpanned(service.durationMinutes, this.hours.granularityMinutes))) {
      throw new BookingError('InvalidSlot', `${service.name} starting ${requestedStart.toISOString()} would run past closing time`);
    }

    return {
      clientPhone: phone,
      serviceId: service.id,
      start: requestedStart,
      end: new Date(requestedStart.getTime() + service.durationMinutes * MINUTE_MS),
      notes
    };
  }
}
