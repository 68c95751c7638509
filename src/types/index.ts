export type Weekday =
  | 'sunday'
  | 'monday'
  | 'tuesday'
  | 'wednesday'
  | 'thursday'
  | 'friday'
  | 'saturday';

// Indexed by moment's day(): 0 = Sunday
export const WEEKDAYS: readonly Weekday[] = [
  'sunday',
  'monday',
  'tuesday',
  'wednesday',
  'thursday',
  'friday',
  'saturday'
];

export interface DayHours {
  open: string; // HH:mm
  close: string; // HH:mm
}

export interface OperatingHours {
  timezone: string;
  granularityMinutes: number;
  days: Record<Weekday, DayHours | null>;
}

export interface TimeSlot {
  start: Date;
  end: Date;
}

export type ClientPreferences = Record<string, unknown>;

export interface Client {
  phone: string;
  name: string | null;
  email: string | null;
  preferences: ClientPreferences;
  createdAt: Date;
  updatedAt: Date;
}

export interface ClientProfileUpdate {
  name?: string | null;
  email?: string | null;
  preferences?: ClientPreferences;
}

export interface Service {
  id: number;
  name: string;
  description: string;
  durationMinutes: number;
  priceCents: number;
  active: boolean;
}

export type AppointmentStatus = 'pending' | 'confirmed' | 'cancelled';

export interface Appointment {
  id: number;
  clientPhone: string;
  serviceId: number;
  start: Date;
  end: Date;
  status: AppointmentStatus;
  holdExpiresAt: Date | null;
  notes: string | null;
  createdAt: Date;
  updatedAt: Date;
}

export type AppointmentAction = 'created' | 'held' | 'confirmed' | 'cancelled' | 'expired';

export interface AppointmentHistoryEntry {
  id: number;
  appointmentId: number;
  action: AppointmentAction;
  fromStatus: AppointmentStatus | null;
  toStatus: AppointmentStatus;
  performedBy: string;
  at: Date;
}

export interface SessionContext {
  sessionKey: string;
  clientPhone: string;
  businessDay: string; // YYYY-MM-DD, business-local
  client: Client;
  summary: string;
  createdAt: Date;
  lastSeenAt: Date;
}

export interface ConversationContext {
  session: SessionContext;
  hasName: boolean;
  previousSummary: string | null;
  services: Service[];
  salon: {
    name: string;
    timezone: string;
    currency: string;
    hours: OperatingHours['days'];
  };
  localTime: string; // YYYY-MM-DD HH:mm:ss in the salon timezone
}

export interface BookingStatistics {
  totalAppointments: number;
  confirmedAppointments: number;
  pendingAppointments: number;
  cancelledAppointments: number;
  uniqueClients: number;
  cancellationRate: number;
}
