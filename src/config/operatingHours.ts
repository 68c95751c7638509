import fs from 'fs-extra';
import moment from 'moment-timezone';
import { z } from 'zod';
import type { OperatingHours } from '../types/index.js';
import type { ServiceSeed } from '../database/serviceRepository.js';

const MINUTES_PER_DAY = 24 * 60;
const clock = /^([01]\d|2[0-3]):[0-5]\d$/;

export function minutesOfDay(hhmm: string): number {
  const [hours, minutes] = hhmm.split(':').map(Number);
  return hours * 60 + minutes;
}

const dayHoursSchema = z
  .object({
    open: z.string().regex(clock, 'open must be HH:mm'),
    close: z.string().regex(clock, 'close must be HH:mm')
  })
  .refine(day => minutesOfDay(day.close) > minutesOfDay(day.open), {
    message: 'close must be after open'
  })
  .nullable()
  .default(null);

export const operatingHoursSchema = z.object({
  timezone: z.string().refine(name => moment.tz.zone(name) !== null, {
    message: 'must be a known IANA timezone'
  }),
  granularityMinutes: z
    .number()
    .int()
    .positive()
    .refine(minutes => MINUTES_PER_DAY % minutes === 0, { message: 'granularityMinutes must divide a day' })
    .default(15),
  days: z.object({
    sunday: dayHoursSchema,
    monday: dayHoursSchema,
    tuesday: dayHoursSchema,
    wednesday: dayHoursSchema,
    thursday: dayHoursSchema,
    friday: dayHoursSchema,
    saturday: dayHoursSchema
  })
});

export const serviceSeedSchema = z.array(
  z.object({
    name: z.string().min(1),
    description: z.string().default(''),
    durationMinutes: z.number().int().positive(),
    priceCents: z.number().int().nonnegative(),
    active: z.boolean().optional()
  })
);

function readJson(filePath: string, label: string): unknown {
  try {
    return fs.readJsonSync(filePath);
  } catch (error) {
    throw new Error(`Cannot read ${label} from ${filePath}: ${error instanceof Error ? error.message : String(error)}`);
  }
}

function describeIssues(error: z.ZodError): string {
  return error.issues.map(issue => `${issue.path.join('.') || 'root'}: ${issue.message}`).join('; ');
}

export function parseOperatingHours(raw: unknown, timezoneOverride: string | null = null): OperatingHours {
  const parsed = operatingHoursSchema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(`Invalid operating hours: ${describeIssues(parsed.error)}`);
  }
  return {
    ...parsed.data,
    timezone: timezoneOverride ?? parsed.data.timezone
  };
}

export function loadOperatingHours(filePath: string, timezoneOverride: string | null = null): OperatingHours {
  return parseOperatingHours(readJson(filePath, 'operating hours'), timezoneOverride);
}

export function loadServiceSeeds(filePath: string): ServiceSeed[] {
  const parsed = serviceSeedSchema.safeParse(readJson(filePath, 'service catalog'));
  if (!parsed.success) {
    throw new Error(`Invalid service catalog: ${describeIssues(parsed.error)}`);
  }
  return parsed.data;
}
