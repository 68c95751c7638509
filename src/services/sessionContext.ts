import moment from 'moment-timezone';
import type { ConversationContext, OperatingHours, SessionContext } from '../types/index.js';
import type { SessionStore } from '../types/ledger.js';
import { normalizePhone } from '../utils/phone.js';
import { ServiceCatalog } from './serviceCatalog.js';
import { businessDay } from './slotGrid.js';

export interface SessionContextOptions {
  salonName: string;
  currency: string;
  defaultCountryCode: string;
  summaryMaxChars: number;
}

export function sessionKeyFor(clientPhone: string, day: string): string {
  return `${clientPhone}_${day.replace(/-/g, '')}`;
}

/**
 * Appends `note` as a new line. Past `maxChars` the oldest lines go first;
 * a single line longer than the cap keeps its tail.
 */
export function appendToSummary(current: string, note: string, maxChars: number): string {
  const line = note.trim();
  if (!line) {
    return current;
  }
  if (maxChars < 1) {
    return '';
  }

  let summary = current ? `${current}\n${line}` : line;
  while (summary.length > maxChars) {
    const newline = summary.indexOf('\n');
    summary = newline >= 0 ? summary.slice(newline + 1) : summary.slice(-maxChars);
  }
  return summary;
}

export class SessionContextManager {
  constructor(
    private readonly sessions: SessionStore,
    private readonly catalog: ServiceCatalog,
    private readonly hours: OperatingHours,
    private readonly options: SessionContextOptions
  ) {
    if (!Number.isInteger(options.summaryMaxChars) || options.summaryMaxChars < 1) {
      throw new Error(`Summary cap must be a positive integer, got ${options.summaryMaxChars}`);
    }
  }

  /**
   * The current context of the client for the business-local day of `now`.
   * First contact of the day creates it (and the client, if unseen).
   */
  async resolve(clientId: string, now: Date = new Date(), displayName: string | null = null): Promise<SessionContext> {
    const clientPhone = normalizePhone(clientId, this.options.defaultCountryCode);
    const day = businessDay(now, this.hours.timezone);

    const context = await this.sessions.resolve({
      sessionKey: sessionKeyFor(clientPhone, day),
      clientPhone,
      businessDay: day,
      displayName: displayName?.trim() || null,
      now
    });

    if (context.createdAt.getTime() === now.getTime()) {
      console.log(`💬 New session ${context.sessionKey}`);
    }
    return context;
  }

  async appendSummary(context: SessionContext, note: string): Promise<SessionContext> {
    return this.sessions.updateSummary(context.sessionKey, current =>
      appendToSummary(current, note, this.options.summaryMaxChars)
    );
  }

  async buildConversationContext(context: SessionContext, now: Date = new Date()): Promise<ConversationContext> {
    const previousSummary = await this.sessions.previousSummary(context.clientPhone, context.businessDay);

    return {
      session: context,
      hasName: Boolean(context.client.name),
      previousSummary,
      services: this.catalog.list(),
      salon: {
        name: this.options.salonName,
        timezone: this.hours.timezone,
        currency: this.options.currency,
        hours: this.hours.days
      },
      localTime: moment(now).tz(this.hours.timezone).format('YYYY-MM-DD HH:mm:ss')
    };
  }

  async history(clientId: string): Promise<SessionContext[]> {
    return this.sessions.listByClient(normalizePhone(clientId, this.options.defaultCountryCode));
  }
}
