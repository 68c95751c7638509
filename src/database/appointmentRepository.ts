import Database from 'better-sqlite3';
import { BookingError } from '../types/errors.js';
import { DatabaseConnection } from './connection.js';
import { withStorage } from './errors.js';
import { PreparedStatements } from './statements.js';
import { AppointmentHistoryRow, AppointmentRow } from './types.js';
import type {
  Appointment,
  AppointmentAction,
  AppointmentHistoryEntry,
  AppointmentStatus,
  BookingStatistics
} from '../types/index.js';
import type { AppointmentDraft, AppointmentStore, StatusTransition } from '../types/ledger.js';

// A pending hold stops blocking once its expiry has passed, even before the sweep cancels it
const BLOCKING = `(status = 'confirmed' OR (status = 'pending' AND (holdExpiresAt IS NULL OR holdExpiresAt > @now)))`;

export function toAppointment(row: AppointmentRow): Appointment {
  return {
    id: row.id,
    clientPhone: row.clientPhone,
    serviceId: row.serviceId,
    start: new Date(row.startAt),
    end: new Date(row.endAt),
    status: row.status,
    holdExpiresAt: row.holdExpiresAt === null ? null : new Date(row.holdExpiresAt),
    notes: row.notes,
    createdAt: new Date(row.createdAt),
    updatedAt: new Date(row.updatedAt)
  };
}

function toHistoryEntry(row: AppointmentHistoryRow): AppointmentHistoryEntry {
  return { ...row, at: new Date(row.at) };
}

interface HistoryParams {
  appointmentId: number;
  action: AppointmentAction;
  fromStatus: AppointmentStatus | null;
  toStatus: AppointmentStatus;
  performedBy: string;
  at: number;
}

interface InsertParams {
  clientPhone: string;
  serviceId: number;
  startAt: number;
  endAt: number;
  status: AppointmentStatus;
  holdExpiresAt: number | null;
  notes: string | null;
  now: number;
}

function prepareStatements(db: Database.Database) {
  return {
    findById: db.prepare<[number], AppointmentRow>('SELECT * FROM appointments WHERE id = ?'),
    findOverlapping: db.prepare<[{ startAt: number; endAt: number; now: number }], AppointmentRow>(`
      SELECT * FROM appointments
      WHERE startAt < @endAt AND endAt > @startAt AND ${BLOCKING}
      ORDER BY startAt
    `),
    insert: db.prepare<[InsertParams], AppointmentRow>(`
      INSERT INTO appointments
      (clientPhone, serviceId, startAt, endAt, status, holdExpiresAt, notes, createdAt, updatedAt)
      VALUES (@clientPhone, @serviceId, @startAt, @endAt, @status, @holdExpiresAt, @notes, @now, @now)
      RETURNING *
    `),
    updateStatus: db.prepare<[{ id: number; status: AppointmentStatus; now: number }], AppointmentRow>(`
      UPDATE appointments
      SET status = @status,
          holdExpiresAt = CASE WHEN @status = 'pending' THEN holdExpiresAt ELSE NULL END,
          updatedAt = @now
      WHERE id = @id
      RETURNING *
    `),
    findExpiredHolds: db.prepare<[{ now: number }], AppointmentRow>(`
      SELECT * FROM appointments
      WHERE status = 'pending' AND holdExpiresAt IS NOT NULL AND holdExpiresAt <= @now
      ORDER BY startAt
    `),
    findExpiredOverlapping: db.prepare<[{ startAt: number; endAt: number; now: number }], AppointmentRow>(`
      SELECT * FROM appointments
      WHERE startAt < @endAt AND endAt > @startAt
        AND status = 'pending' AND holdExpiresAt IS NOT NULL AND holdExpiresAt <= @now
    `),
    listByClient: db.prepare<[{ phone: string; from: number }], AppointmentRow>(`
      SELECT * FROM appointments
      WHERE clientPhone = @phone AND endAt > @from
      ORDER BY startAt
    `),
    insertHistory: db.prepare<[HistoryParams]>(`
      INSERT INTO appointment_history (appointmentId, action, fromStatus, toStatus, performedBy, at)
      VALUES (@appointmentId, @action, @fromStatus, @toStatus, @performedBy, @at)
    `),
    history: db.prepare<[number], AppointmentHistoryRow>(
      'SELECT * FROM appointment_history WHERE appointmentId = ? ORDER BY id'
    ),
    statistics: db.prepare<[{ since: number }], {
      totalAppointments: number;
      confirmedAppointments: number;
      pendingAppointments: number;
      cancelledAppointments: number;
      uniqueClients: number;
    }>(`
      SELECT
        COUNT(*) AS totalAppointments,
        COUNT(CASE WHEN status = 'confirmed' THEN 1 END) AS confirmedAppointments,
        COUNT(CASE WHEN status = 'pending' THEN 1 END) AS pendingAppointments,
        COUNT(CASE WHEN status = 'cancelled' THEN 1 END) AS cancelledAppointments,
        COUNT(DISTINCT clientPhone) AS uniqueClients
      FROM appointments
      WHERE createdAt >= @since
    `)
  };
}

type Statements = ReturnType<typeof prepareStatements>;

export class AppointmentRepository implements AppointmentStore {
  private statements: PreparedStatements<Statements>;

  constructor(dbConnection: DatabaseConnection) {
    this.statements = new PreparedStatements(dbConnection, prepareStatements);
  }

  async findById(id: number): Promise<Appointment | null> {
    return withStorage('Appointment lookup', () => {
      const row = this.statements.get().statements.findById.get(id);
      return row ? toAppointment(row) : null;
    });
  }

  async findBlockingBetween(from: Date, to: Date, now: Date): Promise<Appointment[]> {
    return withStorage('Appointment range query', () =>
      this.statements.get().statements.findOverlapping
        .all({ startAt: from.getTime(), endAt: to.getTime(), now: now.getTime() })
        .map(toAppointment)
    );
  }

  async insertIfFree(draft: AppointmentDraft, now: Date, performedBy: string): Promise<Appointment> {
    return withStorage('Appointment commit', () => {
      const { db, statements } = this.statements.get();
      const commit = db.transaction(() => {
        const interval = { startAt: draft.start.getTime(), endAt: draft.end.getTime(), now: now.getTime() };

        // Stale holds on the interval are cancelled first: no two pending/confirmed rows may overlap
        for (const hold of statements.findExpiredOverlapping.all(interval)) {
          this.cancelExpiredHold(statements, hold, now, 'system');
        }

        const conflict = statements.findOverlapping.get(interval);
        if (conflict) {
          throw new BookingError(
            'SlotConflict',
            `Requested interval overlaps appointment ${conflict.id} (${new Date(conflict.startAt).toISOString()} - ${new Date(conflict.endAt).toISOString()})`
          );
        }

        const row = statements.insert.get({
          clientPhone: draft.clientPhone,
          serviceId: draft.serviceId,
          startAt: draft.start.getTime(),
          endAt: draft.end.getTime(),
          status: draft.status,
          holdExpiresAt: draft.holdExpiresAt === null ? null : draft.holdExpiresAt.getTime(),
          notes: draft.notes,
          now: now.getTime()
        });
        if (!row) {
          throw new Error('Appointment insert returned no row');
        }

        this.recordHistory(statements, {
          appointmentId: row.id,
          action: draft.status === 'pending' ? 'held' : 'created',
          fromStatus: null,
          toStatus: row.status,
          performedBy,
          at: now.getTime()
        });
        return row;
      });

      return toAppointment(commit.immediate());
    });
  }

  async applyTransition(
    id: number,
    decide: (current: Appointment) => StatusTransition | null,
    now: Date,
    performedBy: string
  ): Promise<Appointment> {
    return withStorage('Appointment status update', () => {
      const { db, statements } = this.statements.get();
      const transition = db.transaction(() => {
        const current = statements.findById.get(id);
        if (!current) {
          throw new BookingError('NotFound', `Appointment ${id} not found`);
        }

        const change = decide(toAppointment(current));
        if (change === null) {
          return current;
        }

        const row = statements.updateStatus.get({ id, status: change.to, now: now.getTime() });
        if (!row) {
          throw new Error(`Appointment ${id} vanished during update`);
        }
        this.recordHistory(statements, {
          appointmentId: id,
          action: change.action,
          fromStatus: current.status,
          toStatus: change.to,
          performedBy,
          at: now.getTime()
        });
        return row;
      });

      return toAppointment(transition.immediate());
    });
  }

  async expireHolds(now: Date, performedBy: string): Promise<Appointment[]> {
    return withStorage('Hold expiry sweep', () => {
      const { db, statements } = this.statements.get();
      const sweep = db.transaction(() => {
        const expired: AppointmentRow[] = [];
        for (const hold of statements.findExpiredHolds.all({ now: now.getTime() })) {
          const row = this.cancelExpiredHold(statements, hold, now, performedBy);
          if (row) {
            expired.push(row);
          }
        }
        return expired;
      });

      return sweep.immediate().map(toAppointment);
    });
  }

  async listByClient(phone: string, from: Date = new Date(0)): Promise<Appointment[]> {
    return withStorage('Client appointment listing', () =>
      this.statements.get().statements.listByClient
        .all({ phone, from: from.getTime() })
        .map(toAppointment)
    );
  }

  async history(appointmentId: number): Promise<AppointmentHistoryEntry[]> {
    return withStorage('Appointment history', () =>
      this.statements.get().statements.history.all(appointmentId).map(toHistoryEntry)
    );
  }

  async statistics(since: Date): Promise<BookingStatistics> {
    return withStorage('Booking statistics', () => {
      const row = this.statements.get().statements.statistics.get({ since: since.getTime() });
      const total = row?.totalAppointments ?? 0;
      const cancelled = row?.cancelledAppointments ?? 0;
      return {
        totalAppointments: total,
        confirmedAppointments: row?.confirmedAppointments ?? 0,
        pendingAppointments: row?.pendingAppointments ?? 0,
        cancelledAppointments: cancelled,
        uniqueClients: row?.uniqueClients ?? 0,
        cancellationRate: total === 0 ? 0 : cancelled / total
      };
    });
  }

  private cancelExpiredHold(
    statements: Statements,
    hold: AppointmentRow,
    now: Date,
    performedBy: string
  ): AppointmentRow | undefined {
    const row = statements.updateStatus.get({ id: hold.id, status: 'cancelled', now: now.getTime() });
    if (row) {
      this.recordHistory(statements, {
        appointmentId: hold.id,
        action: 'expired',
        fromStatus: 'pending',
        toStatus: 'cancelled',
        performedBy,
        at: now.getTime()
      });
    }
    return row;
  }

  private recordHistory(statements: Statements, params: HistoryParams): void {
    statements.insertHistory.run(params);
  }
}
