import { ConversationHandler } from '../handlers/conversation.handler';
import { InMemorySessionStore, RedisSessionStore, SessionStore } from '../services/session.store';
import { InProcessUserLock } from '../services/user.lock';
import { BotState, Session } from '../types/session';
import { NOW, RecordingTransport, StubSessionRedis, USER_ID, bodyOf, createHarness, textEvent } from './fakes';

const TRY_AGAIN = '⚠️ Something went wrong on our side. Please send your last message again in a moment.';

class BrokenSaveStore extends InMemorySessionStore {
  async save(_session: Session): Promise<void> {
    throw new Error('redis write refused');
  }
}

async function setup(sessions: SessionStore = new InMemorySessionStore()) {
  const harness = await createHarness();
  const transport = new RecordingTransport();
  const handler = new ConversationHandler({
    sessions,
    lock: new InProcessUserLock(),
    engine: harness.engine,
    transport,
    storageTimeoutMs: 1000,
    clock: () => NOW,
  });
  return { handler, transport, sessions };
}

describe('ConversationHandler', () => {
  it('saves the new state and delivers the replies', async () => {
    const { handler, transport, sessions } = await setup();

    await handler.handleEvent(textEvent('book'));

    expect((await sessions.load(USER_ID, NOW)).state).toBe(BotState.BOOKING_SELECT_ROUTE);
    expect(transport.delivered).toHaveLength(1);
    expect(transport.delivered[0]?.recipientId).toBe(USER_ID);
    expect(transport.delivered[0]?.kind).toBe('button_menu');
  });

  it('processes messages from one user in arrival order', async () => {
    const { handler, sessions } = await setup();

    await Promise.all([
      handler.handleEvent(textEvent('book')),
      handler.handleEvent(textEvent('multan')),
      handler.handleEvent(textEvent('2')),
    ]);

    const session = await sessions.load(USER_ID, NOW);
    expect(session.state).toBe(BotState.BOOKING_ENTER_NAME);
    expect(session.context).toEqual({ route: 'multan', date: '2026-01-04' });
  });

  it('stops delivering after the first failed send', async () => {
    const { handler, transport, sessions } = await setup();
    await sessions.save({ userId: USER_ID, state: BotState.FAQ_MENU, context: {}, updatedAt: NOW.toISOString() });
    transport.failOnAttempt = 1;

    // No match produces two messages: the apology and the category menu
    await handler.handleEvent(textEvent('what time is lunch'));

    expect(transport.attempts).toBe(1);
    expect(transport.delivered).toEqual([]);
  });

  it('keeps the booking step while Redis is down', async () => {
    const redis = new StubSessionRedis();
    const sessions = new RedisSessionStore(redis, 86400);
    const { handler, transport } = await setup(sessions);
    const context = { route: 'multan', date: '2026-01-03', name: 'Ali Raza' };
    await sessions.save({ userId: USER_ID, state: BotState.BOOKING_ENTER_REG, context, updatedAt: NOW.toISOString() });
    redis.down = true;

    await handler.handleEvent(textEvent('2021234'));

    expect(transport.delivered).toHaveLength(1);
    expect(bodyOf(transport.delivered[0])).toBe(TRY_AGAIN);

    redis.down = false;
    await handler.handleEvent(textEvent('2021234'));

    const session = await sessions.load(USER_ID, NOW);
    expect(session.state).toBe(BotState.BOOKING_ENTER_PHONE);
    expect(session.context).toEqual({ ...context, regNumber: '2021234' });
  });

  it('asks the user to retry when the session cannot be saved', async () => {
    const sessions = new BrokenSaveStore();
    const { handler, transport } = await setup(sessions);

    await handler.handleEvent(textEvent('book'));

    expect(transport.delivered).toHaveLength(1);
    expect(bodyOf(transport.delivered[0])).toBe(TRY_AGAIN);
    expect((await sessions.load(USER_ID, NOW)).state).toBe(BotState.ROOT_MENU);
  });
});
