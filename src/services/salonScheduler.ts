import moment from 'moment-timezone';
import { BookingError, toResult } from '../types/errors.js';
import type { Result } from '../types/errors.js';
import type {
  Appointment,
  Client,
  ClientProfileUpdate,
  ConversationContext,
  OperatingHours,
  Service,
  SessionContext,
  TimeSlot
} from '../types/index.js';
import type { AppointmentStore, ClientStore, SessionStore } from '../types/ledger.js';
import { normalizePhone } from '../utils/phone.js';
import { AvailabilityEngine, isBlocking } from './availabilityEngine.js';
import { ConflictGuard } from './conflictGuard.js';
import { ServiceCatalog } from './serviceCatalog.js';
import { SessionContextManager } from './sessionContext.js';
import { DATE_FORMAT, isBusinessDate } from './slotGrid.js';

export interface SchedulerSettings {
  salonName: string;
  currency: string;
  defaultCountryCode: string;
  maxAvailableSlots: number;
  holdTtlMinutes: number;
  summaryMaxChars: number;
}

export interface SalonSchedulerDeps {
  appointments: AppointmentStore;
  clients: ClientStore;
  sessions: SessionStore;
  catalog: ServiceCatalog;
  hours: OperatingHours;
  settings: SchedulerSettings;
  clock?: () => Date;
}

/**
 * Entry point for the conversational layer. Availability is an advisory,
 * lock-free read; booking is the authoritative write through the
 * ConflictGuard. Failures come back as typed `Result` errors.
 */
export class SalonScheduler {
  readonly availability: AvailabilityEngine;
  readonly guard: ConflictGuard;
  readonly sessions: SessionContextManager;

  private readonly appointments: AppointmentStore;
  private readonly clients: ClientStore;
  private readonly catalog: ServiceCatalog;
  private readonly hours: OperatingHours;
  private readonly settings: SchedulerSettings;
  private readonly clock: () => Date;

  constructor(deps: SalonSchedulerDeps) {
    this.appointments = deps.appointments;
    this.clients = deps.clients;
    this.catalog = deps.catalog;
    this.hours = deps.hours;
    this.settings = deps.settings;
    this.clock = deps.clock ?? (() => new Date());

    this.availability = new AvailabilityEngine(deps.catalog, deps.hours, deps.settings.maxAvailableSlots);
    this.guard = new ConflictGuard(deps.appointments, deps.clients, deps.catalog, deps.hours, {
      defaultCountryCode: deps.settings.defaultCountryCode,
      holdTtlMinutes: deps.settings.holdTtlMinutes
    });
    this.sessions = new SessionContextManager(deps.sessions, deps.catalog, deps.hours, {
      salonName: deps.settings.salonName,
      currency: deps.settings.currency,
      defaultCountryCode: deps.settings.defaultCountryCode,
      summaryMaxChars: deps.settings.summaryMaxChars
    });
  }

  async resolveSession(clientId: string, now?: Date, displayName?: string): Promise<Result<SessionContext>> {
    return toResult(() => this.sessions.resolve(clientId, now ?? this.clock(), displayName ?? null));
  }

  async checkAvailability(date: string, serviceId: number, maxResults?: number): Promise<Result<TimeSlot[]>> {
    return toResult(async () => {
      if (!isBusinessDate(date)) {
        throw new BookingError('InvalidSlot', `Date must be in YYYY-MM-DD format: ${date}`);
      }
      this.catalog.require(serviceId);

      const now = this.clock();
      const dayStart = moment.tz(date, DATE_FORMAT, true, this.hours.timezone);
      const existing = await this.appointments.findBlockingBetween(
        dayStart.toDate(),
        dayStart.clone().add(1, 'day').toDate(),
        now
      );
      return this.availability.findAvailable(
        date,
        serviceId,
        existing,
        maxResults ?? this.settings.maxAvailableSlots,
        now
      );
    });
  }

  async bookAppointment(clientId: string, serviceId: number, start: Date, notes?: string): Promise<Result<Appointment>> {
    return toResult(() => this.guard.commit(clientId, serviceId, start, { now: this.clock(), notes }));
  }

  async holdAppointment(clientId: string, serviceId: number, start: Date, notes?: string): Promise<Result<Appointment>> {
    return toResult(() => this.guard.hold(clientId, serviceId, start, { now: this.clock(), notes }));
  }

  async confirmAppointment(appointmentId: number): Promise<Result<Appointment>> {
    return toResult(() => this.guard.confirm(appointmentId, this.clock()));
  }

  async cancelAppointment(appointmentId: number): Promise<Result<Appointment>> {
    return toResult(() => this.guard.cancel(appointmentId, this.clock()));
  }

  listServices(): Service[] {
    return this.catalog.list();
  }

  async appendSummary(context: SessionContext, note: string): Promise<Result<SessionContext>> {
    return toResult(() => this.sessions.appendSummary(context, note));
  }

  async conversationContext(clientId: string, displayName?: string): Promise<Result<ConversationContext>> {
    return toResult(async () => {
      const now = this.clock();
      const session = await this.sessions.resolve(clientId, now, displayName ?? null);
      return this.sessions.buildConversationContext(session, now);
    });
  }

  async sessionHistory(clientId: string): Promise<Result<SessionContext[]>> {
    return toResult(() => this.sessions.history(clientId));
  }

  async updateClientProfile(clientId: string, update: ClientProfileUpdate): Promise<Result<Client>> {
    return toResult(async () => {
      const phone = normalizePhone(clientId, this.settings.defaultCountryCode);
      const client = await this.clients.updateProfile(phone, update, this.clock());
      if (!client) {
        throw new BookingError('UnknownClient', `No client registered for ${phone}`);
      }
      return client;
    });
  }

  async upcomingAppointments(clientId: string): Promise<Result<Appointment[]>> {
    return toResult(async () => {
      const phone = normalizePhone(clientId, this.settings.defaultCountryCode);
      const now = this.clock();
      const appointments = await this.appointments.listByClient(phone, now);
      return appointments.filter(appointment => isBlocking(appointment, now));
    });
  }
}
