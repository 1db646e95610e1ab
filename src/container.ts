import type { Pool } from 'pg';
import type Redis from 'ioredis';
import logger from './config/logger';
import { AppConfig } from './config/env';
import { createDatabase } from './config/database';
import { ConversationEngine } from './handlers/conversation.engine';
import { ConversationHandler } from './handlers/conversation.handler';
import { WhatsAppController } from './controllers/whatsapp.controller';
import { AdminService } from './services/admin.service';
import { BookingRepository, InMemoryBookingRepository, PgBookingRepository } from './services/booking.repository';
import { KnowledgeBase } from './services/knowledge.service';
import { SeatService } from './services/seat.service';
import { InMemorySessionStore, RedisSessionStore, SessionStore } from './services/session.store';
import { InMemorySettingsStore, RedisSettingsStore, SettingsStore } from './services/settings.store';
import { InProcessUserLock, RedisUserLock, UserLock } from './services/user.lock';
import { WhatsAppService } from './services/whatsapp.service';
import { normalizePhoneNumber } from './utils/phoneNormalizer';
import { errorMessage } from './utils/AppError';

export interface Container {
  knowledge: KnowledgeBase;
  bookings: BookingRepository;
  controller: WhatsAppController;
  redis: Redis | null;
  pool: Pool | null;
}

/**
 * Admin numbers in the same 92xxxxxxxxxx shape WhatsApp reports senders in
 */
export function buildAdminCheck(adminNumbers: readonly string[]): (userId: string) => boolean {
  const admins = new Set<string>();
  for (const phone of adminNumbers) {
    try {
      admins.add(normalizePhoneNumber(phone));
    } catch (error) {
      logger.warn(`Ignoring invalid admin phone number: ${errorMessage(error)}`);
    }
  }

  return (userId) => {
    try {
      return admins.has(normalizePhoneNumber(userId));
    } catch {
      return false;
    }
  };
}

/**
 * Wires config → storage → knowledge → engine → transport → controller
 */
export function createContainer(config: AppConfig, redis: Redis): Container {
  const useRedis = config.storageDriver === 'redis';

  const sessions: SessionStore = useRedis
    ? new RedisSessionStore(redis, config.session.ttlSeconds)
    : new InMemorySessionStore();
  const lock: UserLock = useRedis
    ? new RedisUserLock(redis, config.lock.ttlMs, config.lock.waitMs)
    : new InProcessUserLock();
  const settings: SettingsStore = useRedis ? new RedisSettingsStore(redis) : new InMemorySettingsStore();

  let pool: Pool | null = null;
  let bookings: BookingRepository;
  if (config.databaseUrl) {
    const database = createDatabase(config.databaseUrl);
    pool = database.pool;
    bookings = new PgBookingRepository(database.db);
  } else {
    logger.warn('DATABASE_URL not set, bookings are kept in process memory');
    bookings = new InMemoryBookingRepository();
  }

  const knowledge = new KnowledgeBase(settings, config.booking.origin);
  const seats = new SeatService(bookings, config.booking.totalSeats, config.storageTimeoutMs);
  const admin = new AdminService(settings, knowledge, seats, config.storageTimeoutMs);

  const engine = new ConversationEngine(
    {
      knowledge,
      bookings,
      seats,
      admin,
      isAdmin: buildAdminCheck(config.adminPhoneNumbers),
    },
    {
      idleMs: config.session.idleMs,
      storageTimeoutMs: config.storageTimeoutMs,
      origin: config.booking.origin,
      uploadBaseUrl: config.booking.uploadBaseUrl,
      paymentAccountDetails: config.booking.paymentAccountDetails,
    }
  );

  const transport = new WhatsAppService(config.whatsapp);
  const handler = new ConversationHandler({
    sessions,
    lock,
    engine,
    transport,
    storageTimeoutMs: config.storageTimeoutMs,
  });

  return {
    knowledge,
    bookings,
    controller: new WhatsAppController(handler, transport, config.whatsapp.verifyToken),
    redis: useRedis ? redis : null,
    pool,
  };
}
