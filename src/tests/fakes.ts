import { AdminService } from '../services/admin.service';
import { InMemoryBookingRepository } from '../services/booking.repository';
import { KnowledgeBase } from '../services/knowledge.service';
import { SeatService } from '../services/seat.service';
import { SessionRedis } from '../services/session.store';
import { InMemorySettingsStore } from '../services/settings.store';
import { ConversationEngine } from '../handlers/conversation.engine';
import { Booking, NewBooking } from '../types/booking';
import { InboundEvent, InboundKind, MessageTransport, OutboundInstruction } from '../types/conversation';

export const ADMIN_ID = '923001234567';
export const USER_ID = '923339876543';
export const NOW = new Date('2026-01-01T10:00:00.000Z');
export const ORIGIN = 'Campus';
export const TEST_DATES = {
  multan: ['2026-01-03', '2026-01-04'],
  bahawalpur: ['2026-01-03'],
};

/**
 * Booking repository whose reads or writes can be made to fail
 */
export class FlakyBookingRepository extends InMemoryBookingRepository {
  failReads = false;
  failWrites = false;

  async takenSeats(route: string, travelDate: string): Promise<number[]> {
    if (this.failReads) {
      throw new Error('connection reset');
    }
    return super.takenSeats(route, travelDate);
  }

  async create(input: NewBooking): Promise<Booking> {
    if (this.failWrites) {
      throw new Error('connection reset');
    }
    return super.create(input);
  }
}

/**
 * In-process stand-in for the session commands; `down` makes every call fail
 */
export class StubSessionRedis implements SessionRedis {
  readonly records = new Map<string, string>();
  down = false;

  async get(key: string): Promise<string | null> {
    if (this.down) {
      throw new Error('connect ECONNREFUSED 127.0.0.1:6379');
    }
    return this.records.get(key) ?? null;
  }

  async setex(key: string, _seconds: number, value: string): Promise<'OK'> {
    if (this.down) {
      throw new Error('connect ECONNREFUSED 127.0.0.1:6379');
    }
    this.records.set(key, value);
    return 'OK';
  }
}

export class RecordingTransport implements MessageTransport {
  readonly delivered: OutboundInstruction[] = [];
  readonly read: string[] = [];
  attempts = 0;
  failOnAttempt: number | null = null;

  async deliver(instruction: OutboundInstruction): Promise<void> {
    this.attempts += 1;
    if (this.failOnAttempt === this.attempts) {
      throw new Error('provider unavailable');
    }
    this.delivered.push(instruction);
  }

  async markAsRead(messageId: string): Promise<void> {
    this.read.push(messageId);
  }
}

export interface Harness {
  settings: InMemorySettingsStore;
  knowledge: KnowledgeBase;
  bookings: FlakyBookingRepository;
  seats: SeatService;
  admin: AdminService;
  engine: ConversationEngine;
}

export async function createHarness(): Promise<Harness> {
  const settings = new InMemorySettingsStore({ dates: TEST_DATES });
  const knowledge = new KnowledgeBase(settings, ORIGIN);
  await knowledge.init();

  const bookings = new FlakyBookingRepository();
  const seats = new SeatService(bookings, 45, 1000);
  const admin = new AdminService(settings, knowledge, seats, 1000);
  const engine = new ConversationEngine(
    { knowledge, bookings, seats, admin, isAdmin: (userId) => userId === ADMIN_ID },
    {
      idleMs: 30 * 60 * 1000,
      storageTimeoutMs: 1000,
      origin: ORIGIN,
      uploadBaseUrl: 'https://example.com/',
      paymentAccountDetails: 'Bank: Test Bank | Account: 0000',
    }
  );

  return { settings, knowledge, bookings, seats, admin, engine };
}

export function textEvent(payload: string, senderId = USER_ID): InboundEvent {
  return event('text', payload, senderId);
}

export function buttonEvent(payload: string, senderId = USER_ID): InboundEvent {
  return event('button_reply', payload, senderId);
}

function event(kind: InboundKind, payload: string, senderId: string): InboundEvent {
  return { senderId, kind, payload, messageId: `wamid.${payload}` };
}

/**
 * Body of a text or menu instruction, for assertions
 */
export function bodyOf(instruction: OutboundInstruction | undefined): string {
  if (instruction === undefined) {
    return '';
  }
  switch (instruction.kind) {
    case 'text':
    case 'button_menu':
      return instruction.content.body;
    case 'document_link':
      return instruction.content.caption;
  }
}

export function optionIds(instruction: OutboundInstruction | undefined): string[] {
  return instruction?.kind === 'button_menu' ? instruction.content.options.map((option) => option.id) : [];
}
