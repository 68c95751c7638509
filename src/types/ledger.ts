import type {
  Appointment,
  AppointmentAction,
  AppointmentHistoryEntry,
  AppointmentStatus,
  BookingStatistics,
  Client,
  ClientProfileUpdate,
  Service,
  SessionContext
} from './index.js';

export interface AppointmentDraft {
  clientPhone: string;
  serviceId: number;
  start: Date;
  end: Date;
  status: Exclude<AppointmentStatus, 'cancelled'>;
  holdExpiresAt: Date | null;
  notes: string | null;
}

export interface StatusTransition {
  to: AppointmentStatus;
  action: AppointmentAction;
}

export interface ClientStore {
  findByPhone(phone: string): Promise<Client | null>;
  updateProfile(phone: string, update: ClientProfileUpdate, now: Date): Promise<Client | null>;
}

export interface ServiceStore {
  listAll(): Promise<Service[]>;
}

export interface AppointmentStore {
  findById(id: number): Promise<Appointment | null>;
  /** Pending (unexpired) and confirmed appointments intersecting [from, to). */
  findBlockingBetween(from: Date, to: Date, now: Date): Promise<Appointment[]>;
  /**
   * Re-checks for a blocking overlap and inserts in one write transaction;
   * throws `SlotConflict` without mutating when the interval is taken.
   */
  insertIfFree(draft: AppointmentDraft, now: Date, performedBy: string): Promise<Appointment>;
  /**
   * Reads the appointment and applies the transition `decide` returns, in one
   * write transaction. `null` leaves it unchanged. Missing id → `NotFound`.
   */
  applyTransition(
    id: number,
    decide: (current: Appointment) => StatusTransition | null,
    now: Date,
    performedBy: string
  ): Promise<Appointment>;
  expireHolds(now: Date, performedBy: string): Promise<Appointment[]>;
  listByClient(phone: string, from?: Date): Promise<Appointment[]>;
  history(appointmentId: number): Promise<AppointmentHistoryEntry[]>;
  statistics(since: Date): Promise<BookingStatistics>;
}

export interface SessionResolveInput {
  sessionKey: string;
  clientPhone: string;
  businessDay: string;
  displayName: string | null;
  now: Date;
}

export interface SessionStore {
  /** Upserts the client and the session keyed on `sessionKey` in one transaction. */
  resolve(input: SessionResolveInput): Promise<SessionContext>;
  updateSummary(sessionKey: string, update: (current: string) => string): Promise<SessionContext>;
  previousSummary(clientPhone: string, beforeDay: string): Promise<string | null>;
  listByClient(clientPhone: string): Promise<SessionContext[]>;
}
