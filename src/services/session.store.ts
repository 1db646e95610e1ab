import logger from '../config/logger';
import { Session, createSession, parseStoredSession } from '../types/session';

const SESSION_KEY_PREFIX = 'session:';

export interface SessionStore {
  /** Returns the stored session, or a fresh root-menu session when absent */
  load(userId: string, now: Date): Promise<Session>;
  /** Idempotent upsert keyed by userId */
  save(session: Session): Promise<void>;
}

/**
 * Decodes a stored record, resetting corrupted sessions to the root menu
 */
function decode(raw: string, userId: string, now: Date): Session {
  const result = parseStoredSession(raw);
  if (result.ok) {
    return result.session;
  }
  logger.error('Session state corrupted, resetting to ROOT_MENU:', { userId, reason: result.reason });
  return createSession(userId, now);
}

/**
 * Plain in-process session map for STORAGE_DRIVER=memory and tests.
 */
export class InMemorySessionStore implements SessionStore {
  private readonly sessions = new Map<string, string>();

  async load(userId: string, now: Date): Promise<Session> {
    const raw = this.sessions.get(userId);
    return raw === undefined ? createSession(userId, now) : decode(raw, userId, now);
  }

  async save(session: Session): Promise<void> {
    this.sessions.set(session.userId, JSON.stringify(session));
  }

  /** Writes a raw record, bypassing validation */
  putRaw(userId: string, raw: string): void {
    this.sessions.set(userId, raw);
  }

  get size(): number {
    return this.sessions.size;
  }
}

/**
 * The two Redis commands sessions need
 */
export interface SessionRedis {
  get(key: string): Promise<string | null>;
  setex(key: string, seconds: number, value: string): Promise<unknown>;
}

/**
 * RedisSessionStore keeps sessions under session:<userId> with a TTL.
 * Redis errors propagate so the caller can answer "try again" and leave
 * the stored session as it was.
 */
export class RedisSessionStore implements SessionStore {
  constructor(
    private readonly redis: SessionRedis,
    private readonly ttlSeconds: number
  ) {}

  async load(userId: string, now: Date): Promise<Session> {
    const raw = await this.redis.get(`${SESSION_KEY_PREFIX}${userId}`);
    return raw === null ? createSession(userId, now) : decode(raw, userId, now);
  }

  async save(session: Session): Promise<void> {
    await this.redis.setex(`${SESSION_KEY_PREFIX}${session.userId}`, this.ttlSeconds, JSON.stringify(session));
    logger.debug(`Session saved in Redis for ${session.userId}: state=${session.state}`);
  }
}
