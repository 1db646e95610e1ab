import { z } from 'zod';

/**
 * BotState represents the current node of the user's conversation flow
 */
export enum BotState {
  ROOT_MENU = 'ROOT_MENU',
  BOOKING_SELECT_ROUTE = 'BOOKING_SELECT_ROUTE',
  BOOKING_SELECT_DATE = 'BOOKING_SELECT_DATE',
  BOOKING_ENTER_NAME = 'BOOKING_ENTER_NAME',
  BOOKING_ENTER_REG = 'BOOKING_ENTER_REG',
  BOOKING_ENTER_PHONE = 'BOOKING_ENTER_PHONE',
  BOOKING_SELECT_SEAT = 'BOOKING_SELECT_SEAT',
  BOOKING_CONFIRM = 'BOOKING_CONFIRM',
  STATUS_MENU = 'STATUS_MENU',
  STATUS_BUS = 'STATUS_BUS',
  STATUS_LOOKUP_PHONE = 'STATUS_LOOKUP_PHONE',
  FAQ_MENU = 'FAQ_MENU',
  FAQ_CATEGORY_RESULT = 'FAQ_CATEGORY_RESULT',
  FAQ_FREEFORM = 'FAQ_FREEFORM',
  ADMIN_MENU = 'ADMIN_MENU',
  ADMIN_EDIT = 'ADMIN_EDIT',
}

export const BOT_STATES: readonly BotState[] = Object.values(BotState);

export function isBotState(value: unknown): value is BotState {
  return typeof value === 'string' && BOT_STATES.some((state) => state === value);
}

/**
 * Settings keys an admin can be editing from the dashboard
 */
export type EditableSettingKey = 'fares' | 'dates' | 'return_service' | 'luggage' | 'locations' | 'faq';

/**
 * SessionContext stores the fields collected so far in the current flow
 */
export interface SessionContext {
  route?: string;
  date?: string;
  name?: string;
  regNumber?: string;
  phone?: string;
  seat?: number;
  editing?: EditableSettingKey;
}

export type ContextField = keyof SessionContext;

/**
 * Session represents the complete per-user record kept by the session store
 */
export interface Session {
  userId: string;
  state: BotState;
  context: SessionContext;
  updatedAt: string;
}

const BOOKING_FIELDS: readonly ContextField[] = ['route', 'date', 'name', 'regNumber', 'phone', 'seat'];

/**
 * Fields legal in each state. Anything else is dropped after a transition,
 * so nothing leaks from one flow into another.
 */
export const CONTEXT_FIELDS: Record<BotState, readonly ContextField[]> = {
  [BotState.ROOT_MENU]: [],
  [BotState.BOOKING_SELECT_ROUTE]: [],
  [BotState.BOOKING_SELECT_DATE]: ['route'],
  [BotState.BOOKING_ENTER_NAME]: ['route', 'date'],
  [BotState.BOOKING_ENTER_REG]: ['route', 'date', 'name'],
  [BotState.BOOKING_ENTER_PHONE]: ['route', 'date', 'name', 'regNumber'],
  [BotState.BOOKING_SELECT_SEAT]: ['route', 'date', 'name', 'regNumber', 'phone'],
  [BotState.BOOKING_CONFIRM]: BOOKING_FIELDS,
  [BotState.STATUS_MENU]: [],
  [BotState.STATUS_BUS]: [],
  [BotState.STATUS_LOOKUP_PHONE]: [],
  [BotState.FAQ_MENU]: [],
  [BotState.FAQ_CATEGORY_RESULT]: [],
  [BotState.FAQ_FREEFORM]: [],
  [BotState.ADMIN_MENU]: [],
  [BotState.ADMIN_EDIT]: ['editing'],
};

/**
 * Keeps only the fields legal for the state, in their collection order
 */
export function pruneContext(state: BotState, context: SessionContext): SessionContext {
  const pruned: SessionContext = {};
  for (const field of CONTEXT_FIELDS[state]) {
    const value = context[field];
    if (value !== undefined) {
      Object.assign(pruned, { [field]: value });
    }
  }
  return pruned;
}

/**
 * A fresh root-menu session
 */
export function createSession(userId: string, now: Date): Session {
  return {
    userId,
    state: BotState.ROOT_MENU,
    context: {},
    updatedAt: now.toISOString(),
  };
}

export function isSessionExpired(session: Session, now: Date, idleMs: number): boolean {
  const last = Date.parse(session.updatedAt);
  if (Number.isNaN(last)) {
    return true;
  }
  return now.getTime() - last > idleMs;
}

const storedContextSchema = z.object({
  route: z.string().optional(),
  date: z.string().optional(),
  name: z.string().optional(),
  regNumber: z.string().optional(),
  phone: z.string().optional(),
  seat: z.number().int().optional(),
  editing: z.enum(['fares', 'dates', 'return_service', 'luggage', 'locations', 'faq']).optional(),
});

const storedSessionSchema = z.object({
  userId: z.string(),
  state: z.string(),
  context: storedContextSchema.default({}),
  updatedAt: z.string(),
});

export type StoredSessionResult =
  | { ok: true; session: Session }
  | { ok: false; reason: string };

/**
 * Validates a stored session record. A state outside the closed set is
 * reported as corruption rather than coerced.
 */
export function parseStoredSession(raw: string): StoredSessionResult {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    return { ok: false, reason: 'session record is not valid JSON' };
  }

  const parsed = storedSessionSchema.safeParse(json);
  if (!parsed.success) {
    return { ok: false, reason: `session record has an invalid shape: ${parsed.error.issues[0]?.message}` };
  }

  const { state, userId, context, updatedAt } = parsed.data;
  if (!isBotState(state)) {
    return { ok: false, reason: `unknown state "${state}"` };
  }

  return {
    ok: true,
    session: { userId, state, context: pruneContext(state, context), updatedAt },
  };
}
