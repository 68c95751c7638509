import moment from 'moment-timezone';
import { BookingError } from '../types/errors.js';
import { OperatingHours, TimeSlot, Weekday, WEEKDAYS } from '../types/index.js';

export const DATE_FORMAT = 'YYYY-MM-DD';
const MINUTE_MS = 60 * 1000;

export function isBusinessDate(date: string): boolean {
  return /^\d{4}-\d{2}-\d{2}$/.test(date) && moment(date, DATE_FORMAT, true).isValid();
}

/** Calendar day of `instant` in the business timezone. */
export function businessDay(instant: Date, timezone: string): string {
  return moment(instant).tz(timezone).format(DATE_FORMAT);
}

export function weekdayOf(date: string, timezone: string): Weekday {
  return WEEKDAYS[moment.tz(date, DATE_FORMAT, true, timezone).day()];
}

function localInstant(date: string, hhmm: string, timezone: string): number {
  return moment.tz(`${date} ${hhmm}`, `${DATE_FORMAT} HH:mm`, true, timezone).valueOf();
}

/**
 * Base slots of `date` (business-local YYYY-MM-DD) within [open, close).
 * A trailing remainder shorter than the granularity is not offered.
 */
export function generateSlotGrid(date: string, hours: OperatingHours): TimeSlot[] {
  if (!isBusinessDate(date)) {
    throw new BookingError('InvalidSlot', `Date must be in YYYY-MM-DD format: ${date}`);
  }

  const dayHours = hours.days[weekdayOf(date, hours.timezone)];
  if (!dayHours) {
    return [];
  }

  const open = localInstant(date, dayHours.open, hours.timezone);
  const close = localInstant(date, dayHours.close, hours.timezone);
  const step = hours.granularityMinutes * MINUTE_MS;

  const slots: TimeSlot[] = [];
  for (let start = open; start + step <= close; start += step) {
    slots.push({ start: new Date(start), end: new Date(start + step) });
  }
  return slots;
}

export function slotsSpanned(durationMinutes: number, granularityMinutes: number): number {
  return Math.ceil(durationMinutes / granularityMinutes);
}

/** True when grid[index .. index + count) exists and has no gaps. */
export function isContiguousRun(grid: TimeSlot[], index: number, count: number): boolean {
  if (index < 0 || count < 1 || index + count > grid.length) {
    return false;
  }
  for (let k = index + 1; k < index + count; k++) {
    if (grid[k].start.getTime() !== grid[k - 1].end.getTime()) {
      return false;
    }
  }
  return true;
}

export function slotIndexAt(grid: TimeSlot[], start: Date): number {
  const at = start.getTime();
  return grid.findIndex(slot => slot.start.getTime() === at);
}

export function overlaps(a: { start: Date; end: Date }, b: { start: Date; end: Date }): boolean {
  return a.start.getTime() < b.end.getTime() && b.start.getTime() < a.end.getTime();
}
