import type { AppointmentAction, AppointmentStatus } from '../types/index.js';

export interface SQLiteConfig {
  dbPath: string;
  backupPath: string;
  timeout: number;
  autoBackup: boolean;
  retentionDays: number;
  logQueries: boolean;
}

export interface Migration {
  version: number;
  name: string;
  up: string;
  down: string;
}

export interface BackupInfo {
  filename: string;
  path: string;
  size: number;
  timestamp: Date;
  checksum: string;
}

export interface HealthReport {
  status: 'healthy' | 'unhealthy';
  details: Record<string, unknown>;
}

// Row shapes as stored; timestamps are epoch milliseconds

export interface ClientRow {
  phone: string;
  name: string | null;
  email: string | null;
  preferences: string;
  createdAt: number;
  updatedAt: number;
}

export interface ServiceRow {
  id: number;
  name: string;
  description: string;
  durationMinutes: number;
  priceCents: number;
  active: number;
}

export interface AppointmentRow {
  id: number;
  clientPhone: string;
  serviceId: number;
  startAt: number;
  endAt: number;
  status: AppointmentStatus;
  holdExpiresAt: number | null;
  notes: string | null;
  createdAt: number;
  updatedAt: number;
}

export interface AppointmentHistoryRow {
  id: number;
  appointmentId: number;
  action: AppointmentAction;
  fromStatus: AppointmentStatus | null;
  toStatus: AppointmentStatus;
  performedBy: string;
  at: number;
}

export interface SessionRow {
  sessionKey: string;
  clientPhone: string;
  businessDay: string;
  summary: string;
  createdAt: number;
  lastSeenAt: number;
}
