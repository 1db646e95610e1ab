import { InMemorySessionStore, RedisSessionStore } from '../services/session.store';
import { InMemorySettingsStore } from '../services/settings.store';
import { BotState, createSession, isSessionExpired, parseStoredSession, pruneContext } from '../types/session';
import { DEFAULT_SETTINGS, parseSetting } from '../types/settings';
import { NOW, StubSessionRedis, USER_ID } from './fakes';

const MINUTE = 60 * 1000;

describe('session records', () => {
  it('starts fresh sessions at the root menu', () => {
    expect(createSession(USER_ID, NOW)).toEqual({
      userId: USER_ID,
      state: BotState.ROOT_MENU,
      context: {},
      updatedAt: '2026-01-01T10:00:00.000Z',
    });
  });

  it('keeps only the fields legal for a state', () => {
    expect(
      pruneContext(BotState.BOOKING_ENTER_NAME, { route: 'multan', date: '2026-01-03', name: 'Ali', editing: 'fares' })
    ).toEqual({ route: 'multan', date: '2026-01-03' });
    expect(pruneContext(BotState.ROOT_MENU, { route: 'multan' })).toEqual({});
  });

  it('expires after the idle window', () => {
    const session = { ...createSession(USER_ID, NOW), updatedAt: new Date(NOW.getTime() - 31 * MINUTE).toISOString() };
    const recent = { ...createSession(USER_ID, NOW), updatedAt: new Date(NOW.getTime() - 29 * MINUTE).toISOString() };

    expect(isSessionExpired(session, NOW, 30 * MINUTE)).toBe(true);
    expect(isSessionExpired(recent, NOW, 30 * MINUTE)).toBe(false);
    expect(isSessionExpired({ ...recent, updatedAt: 'not a date' }, NOW, 30 * MINUTE)).toBe(true);
  });

  describe('parseStoredSession', () => {
    it('accepts a valid record and prunes stray fields', () => {
      const raw = JSON.stringify({
        userId: USER_ID,
        state: 'BOOKING_ENTER_REG',
        context: { route: 'multan', date: '2026-01-03', name: 'Ali Raza', editing: 'fares' },
        updatedAt: NOW.toISOString(),
      });

      expect(parseStoredSession(raw)).toEqual({
        ok: true,
        session: {
          userId: USER_ID,
          state: BotState.BOOKING_ENTER_REG,
          context: { route: 'multan', date: '2026-01-03', name: 'Ali Raza' },
          updatedAt: NOW.toISOString(),
        },
      });
    });

    it('reports unknown states as corruption', () => {
      const raw = JSON.stringify({ userId: USER_ID, state: 'PAYMENT_PENDING', context: {}, updatedAt: NOW.toISOString() });

      expect(parseStoredSession(raw)).toEqual({ ok: false, reason: 'unknown state "PAYMENT_PENDING"' });
    });

    it('reports unreadable records', () => {
      expect(parseStoredSession('{oops')).toEqual({ ok: false, reason: 'session record is not valid JSON' });
      expect(parseStoredSession('{"state":"ROOT_MENU"}').ok).toBe(false);
    });
  });
});

describe('InMemorySessionStore', () => {
  it('returns a fresh session for an unknown user', async () => {
    const store = new InMemorySessionStore();

    expect(await store.load(USER_ID, NOW)).toEqual(createSession(USER_ID, NOW));
  });

  it('round-trips a saved session', async () => {
    const store = new InMemorySessionStore();
    const session = {
      userId: USER_ID,
      state: BotState.BOOKING_SELECT_DATE,
      context: { route: 'multan' },
      updatedAt: NOW.toISOString(),
    };

    await store.save(session);

    expect(await store.load(USER_ID, NOW)).toEqual(session);
  });

  it('resets a corrupted record to the root menu', async () => {
    const store = new InMemorySessionStore();
    store.putRaw(USER_ID, JSON.stringify({ userId: USER_ID, state: 'BOGUS', context: {}, updatedAt: NOW.toISOString() }));

    expect(await store.load(USER_ID, NOW)).toEqual(createSession(USER_ID, NOW));
  });
});

describe('RedisSessionStore', () => {
  it('stores sessions under the user key', async () => {
    const redis = new StubSessionRedis();
    const store = new RedisSessionStore(redis, 86400);
    const session = { userId: USER_ID, state: BotState.FAQ_MENU, context: {}, updatedAt: NOW.toISOString() };

    await store.save(session);

    expect([...redis.records.keys()]).toEqual([`session:${USER_ID}`]);
    expect(await store.load(USER_ID, NOW)).toEqual(session);
  });

  it('passes Redis failures to the caller', async () => {
    const redis = new StubSessionRedis();
    const store = new RedisSessionStore(redis, 86400);
    redis.down = true;

    await expect(store.load(USER_ID, NOW)).rejects.toThrow('connect ECONNREFUSED 127.0.0.1:6379');
    await expect(store.save(createSession(USER_ID, NOW))).rejects.toThrow('connect ECONNREFUSED 127.0.0.1:6379');
    expect(redis.records.size).toBe(0);
  });
});

describe('parseSetting', () => {
  it('returns the value typed for its key', () => {
    expect(parseSetting('fares', { multan: 3500 })).toEqual({ multan: 3500 });
    expect(parseSetting('dates', { multan: ['2026-02-01'] })).toEqual({ multan: ['2026-02-01'] });
  });

  it('rejects values that do not fit the key', () => {
    expect(parseSetting('fares', { multan: -1 })).toBeNull();
    expect(parseSetting('dates', { multan: ['Feb 1'] })).toBeNull();
    expect(parseSetting('luggage', DEFAULT_SETTINGS.fares)).toBeNull();
  });
});

describe('InMemorySettingsStore', () => {
  it('seeds defaults on init', async () => {
    const store = new InMemorySettingsStore();
    await store.init();

    expect(await store.getAll()).toEqual(DEFAULT_SETTINGS);
    expect(await store.listFaq()).toEqual([]);
    expect(await store.listAudit()).toEqual([]);
  });

  it('seeds with no departures until an admin adds some', async () => {
    const store = new InMemorySettingsStore();
    await store.init();

    expect(await store.get('dates')).toEqual({});
  });

  it('lets seeded values replace the defaults', async () => {
    const store = new InMemorySettingsStore({ dates: { multan: ['2026-02-01'] } });
    await store.init();

    expect(await store.get('dates')).toEqual({ multan: ['2026-02-01'] });
    expect(await store.get('fares')).toEqual(DEFAULT_SETTINGS.fares);
    expect(await store.listAudit()).toEqual([]);
  });

  it('returns the audit entry it appended', async () => {
    const store = new InMemorySettingsStore();
    await store.init();

    const entry = await store.put('luggage', { ...DEFAULT_SETTINGS.luggage, maxBags: 3 }, 'test-admin');

    expect(entry.settingKey).toBe('luggage');
    expect(JSON.parse(entry.newValue)).toMatchObject({ maxBags: 3 });
    expect(await store.listAudit()).toEqual([entry]);
    expect((await store.get('luggage')).maxBags).toBe(3);
  });

  it('ignores out-of-range FAQ positions', async () => {
    const store = new InMemorySettingsStore();
    await store.init();

    expect(await store.removeFaq(-1, 'test-admin')).toBeNull();
    expect(await store.removeFaq(0, 'test-admin')).toBeNull();
    expect(await store.listAudit()).toEqual([]);
  });
});
