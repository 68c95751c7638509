import { afterEach, describe, expect, it } from 'vitest';
import { SessionContextManager, appendToSummary, sessionKeyFor } from '../sessionContext.js';
import {
  CLIENT,
  MONDAY,
  OTHER_CLIENT,
  TEST_HOURS,
  TUESDAY,
  type TestCore,
  at,
  createTestCore,
  expectErrorCode,
  unwrap
} from '../../__tests__/fixtures.js';

describe('sessionKeyFor', () => {
  it('joins the phone and the compact business day', () => {
    expect(sessionKeyFor(CLIENT, MONDAY)).toBe('+351912345678_20300107');
  });
});

describe('appendToSummary', () => {
  it('adds each note on its own line', () => {
    expect(appendToSummary('', 'Asked about gel', 100)).toBe('Asked about gel');
    expect(appendToSummary('Asked about gel', '  Booked 10:00 ', 100)).toBe('Asked about gel\nBooked 10:00');
  });

  it('ignores blank notes', () => {
    expect(appendToSummary('Asked about gel', '   ', 100)).toBe('Asked about gel');
  });

  it('drops the oldest lines once over the cap', () => {
    expect(appendToSummary('first line\nsecond', 'third', 15)).toBe('second\nthird');
  });

  it('keeps the tail of a single line longer than the cap', () => {
    expect(appendToSummary('', 'abcdefghij', 4)).toBe('ghij');
  });

  it('keeps nothing under a cap below one character', () => {
    expect(appendToSummary('a', 'b', 0)).toBe('');
    expect(appendToSummary('a', 'b', -5)).toBe('');
  });
});

describe('SessionContextManager', () => {
  let core: TestCore;
  let now = at(MONDAY, '10:00');

  async function setup(options: Parameters<typeof createTestCore>[0] = {}) {
    core = await createTestCore({ clock: () => now, ...options });
    return core.scheduler;
  }

  afterEach(() => {
    core.db.close();
    now = at(MONDAY, '10:00');
  });

  it('reuses the same context for the rest of the business day', async () => {
    const scheduler = await setup();

    const first = unwrap(await scheduler.resolveSession(CLIENT));
    const second = unwrap(await scheduler.resolveSession(CLIENT, at(MONDAY, '15:00')));

    expect(first.sessionKey).toBe('+351912345678_20300107');
    expect(second.sessionKey).toBe(first.sessionKey);
    expect(second.createdAt).toEqual(at(MONDAY, '10:00'));
    expect(second.lastSeenAt).toEqual(at(MONDAY, '15:00'));
  });

  it('starts a fresh context on the next day', async () => {
    const scheduler = await setup();

    unwrap(await scheduler.resolveSession(CLIENT));
    const next = unwrap(await scheduler.resolveSession(CLIENT, at(TUESDAY, '09:00')));

    expect(next.sessionKey).toBe('+351912345678_20300108');
    expect(next.businessDay).toBe(TUESDAY);
    expect(next.summary).toBe('');
  });

  it('keys the day in the salon timezone', async () => {
    const scheduler = await setup({ hours: { ...TEST_HOURS, timezone: 'America/New_York' } });

    const context = unwrap(await scheduler.resolveSession(CLIENT, new Date('2030-01-15T03:30:00Z')));

    expect(context.businessDay).toBe('2030-01-14');
    expect(context.sessionKey).toBe('+351912345678_20300114');
  });

  it('registers an unseen client with the display name it was first seen with', async () => {
    const scheduler = await setup();

    const created = unwrap(await scheduler.resolveSession('+351 934 567 890', undefined, ' Ana '));
    expect(created.clientPhone).toBe('+351934567890');
    expect(created.client.name).toBe('Ana');

    const later = unwrap(await scheduler.resolveSession('+351934567890', undefined, 'Someone Else'));
    expect(later.client.name).toBe('Ana');
  });

  it('creates a single context for concurrent first contacts', async () => {
    const scheduler = await setup();

    const contexts = await Promise.all([1, 2, 3, 4, 5].map(() => scheduler.resolveSession(CLIENT)));

    expect(new Set(contexts.map(result => unwrap(result).sessionKey)).size).toBe(1);
    expect(unwrap(await scheduler.sessionHistory(CLIENT))).toHaveLength(1);
  });

  it('rejects unusable phone numbers', async () => {
    const scheduler = await setup();

    expectErrorCode(await scheduler.resolveSession('12'), 'InvalidPhone');
  });

  it('appends notes against the stored summary', async () => {
    const scheduler = await setup();
    const context = unwrap(await scheduler.resolveSession(CLIENT));

    unwrap(await scheduler.appendSummary(context, 'Asked about gel'));
    const updated = unwrap(await scheduler.appendSummary(context, 'Booked 10:00'));

    expect(updated.summary).toBe('Asked about gel\nBooked 10:00');
  });

  it('refuses a summary cap below one character', async () => {
    await setup();
    const options = { salonName: 'Test Salon', currency: 'EUR', defaultCountryCode: '351', summaryMaxChars: 0 };

    expect(() => new SessionContextManager(core.db.sessions, core.catalog, TEST_HOURS, options)).toThrow(
      'Summary cap must be a positive integer, got 0'
    );
  });

  it('caps the summary at the configured length', async () => {
    const scheduler = await setup({ settings: { summaryMaxChars: 20 } });
    const context = unwrap(await scheduler.resolveSession(CLIENT));

    unwrap(await scheduler.appendSummary(context, 'Asked about gel'));
    const updated = unwrap(await scheduler.appendSummary(context, 'Booked 10:00'));

    expect(updated.summary).toBe('Booked 10:00');
  });

  it('reports a summary update for a session that does not exist', async () => {
    const scheduler = await setup();
    const context = unwrap(await scheduler.resolveSession(CLIENT));

    expectErrorCode(await scheduler.appendSummary({ ...context, sessionKey: 'missing_20300107' }, 'note'), 'NotFound');
  });

  it('builds the conversation context with the previous non-empty summary', async () => {
    const scheduler = await setup();
    const monday = unwrap(await scheduler.resolveSession(CLIENT));
    unwrap(await scheduler.appendSummary(monday, 'Prefers mornings'));
    unwrap(await scheduler.resolveSession(CLIENT, at('2030-01-08', '09:00')));

    now = at('2030-01-09', '10:00');
    const context = unwrap(await scheduler.conversationContext(CLIENT));

    expect(context.session.businessDay).toBe('2030-01-09');
    expect(context.previousSummary).toBe('Prefers mornings');
    expect(context.hasName).toBe(false);
    expect(context.services).toHaveLength(3);
    expect(context.salon).toMatchObject({ name: 'Test Salon', timezone: 'UTC', currency: 'EUR' });
    expect(context.salon.hours.sunday).toBeNull();
    expect(context.localTime).toBe('2030-01-09 10:00:00');
  });

  it('has no previous summary on the first day', async () => {
    const scheduler = await setup();

    const context = unwrap(await scheduler.conversationContext(OTHER_CLIENT));

    expect(context.previousSummary).toBeNull();
  });

  it('reads the client profile at read time', async () => {
    const scheduler = await setup();
    unwrap(await scheduler.resolveSession(CLIENT));

    const client = unwrap(await scheduler.updateClientProfile(CLIENT, { name: 'Maria' }));
    expect(client.name).toBe('Maria');

    const context = unwrap(await scheduler.conversationContext(CLIENT));
    expect(context.hasName).toBe(true);
    expect(context.session.client.name).toBe('Maria');
  });

  it('lists past contexts newest first', async () => {
    const scheduler = await setup();
    unwrap(await scheduler.resolveSession(CLIENT));
    unwrap(await scheduler.resolveSession(CLIENT, at(TUESDAY, '09:00')));

    const history = unwrap(await scheduler.sessionHistory(CLIENT));

    expect(history.map(context => context.businessDay)).toEqual([TUESDAY, MONDAY]);
  });
});

describe('updateClientProfile', () => {
  let core: TestCore;

  afterEach(() => {
    core.db.close();
  });

  it('merges preferences and keeps fields that were not given', async () => {
    core = await createTestCore();
    const { scheduler } = core;
    unwrap(await scheduler.resolveSession(CLIENT, undefined, 'Ana'));

    unwrap(await scheduler.updateClientProfile(CLIENT, { email: 'ana@example.com', preferences: { color: 'red' } }));
    const client = unwrap(await scheduler.updateClientProfile(CLIENT, { preferences: { shape: 'almond' } }));

    expect(client).toMatchObject({
      phone: CLIENT,
      name: 'Ana',
      email: 'ana@example.com',
      preferences: { color: 'red', shape: 'almond' }
    });
  });

  it('refuses unknown clients', async () => {
    core = await createTestCore();

    expectErrorCode(await core.scheduler.updateClientProfile(OTHER_CLIENT, { name: 'Nobody' }), 'UnknownClient');
  });
});
