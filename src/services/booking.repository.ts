import crypto from 'crypto';
import { and, desc, eq, ne, sql } from 'drizzle-orm';
import logger from '../config/logger';
import { Database } from '../config/database';
import { bookings, BookingRow } from '../db/schema';
import { Booking, NewBooking } from '../types/booking';
import { AppError, SeatUnavailableError } from '../utils/AppError';

const MAX_ID_ATTEMPTS = 5;

/**
 * Storage collaborator for bookings
 */
export interface BookingRepository {
  /** @throws SeatUnavailableError when the seat was taken in the meantime */
  create(input: NewBooking): Promise<Booking>;
  /** Newest first */
  findByPhone(phone: string, limit: number): Promise<Booking[]>;
  /** Seats held by non-cancelled bookings for a departure, ascending */
  takenSeats(route: string, travelDate: string): Promise<number[]>;
  ping(): Promise<void>;
}

/**
 * Generates a booking id in format BK-XXXXXXXX (8 hex characters)
 */
export function generateBookingId(): string {
  return `BK-${crypto.randomBytes(4).toString('hex').toUpperCase()}`;
}

function isUniqueViolation(error: unknown): error is { code: string; constraint?: string } {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === '23505';
}

function toBooking(row: BookingRow): Booking {
  return {
    bookingId: row.bookingId,
    userId: row.userId,
    route: row.route,
    travelDate: row.travelDate,
    passengerName: row.passengerName,
    regNumber: row.regNumber,
    phone: row.phone,
    seat: row.seat,
    amount: row.amount,
    status: row.status,
    paymentStatus: row.paymentStatus,
    createdAt: row.createdAt,
  };
}

/**
 * Bookings in Postgres via drizzle. The partial unique index on
 * (route, travel_date, seat) is what finally rules out double-booking a seat.
 */
export class PgBookingRepository implements BookingRepository {
  constructor(private readonly db: Database) {}

  async create(input: NewBooking): Promise<Booking> {
    for (let attempt = 1; attempt <= MAX_ID_ATTEMPTS; attempt++) {
      const bookingId = generateBookingId();
      try {
        const [row] = await this.db
          .insert(bookings)
          .values({ ...input, bookingId })
          .returning();
        logger.info(`Booking created: ${bookingId} seat=${input.seat} ${input.route}/${input.travelDate}`);
        return toBooking(row);
      } catch (error) {
        if (!isUniqueViolation(error)) {
          throw error;
        }
        if (error.constraint === 'bookings_active_seat_idx') {
          throw new SeatUnavailableError(input.seat);
        }
        logger.warn(`Booking id collision detected: ${bookingId}, retrying...`);
      }
    }

    throw new AppError(`Failed to generate unique booking id after ${MAX_ID_ATTEMPTS} attempts`, 500);
  }

  async findByPhone(phone: string, limit: number): Promise<Booking[]> {
    const rows = await this.db
      .select()
      .from(bookings)
      .where(eq(bookings.phone, phone))
      .orderBy(desc(bookings.createdAt))
      .limit(limit);
    return rows.map(toBooking);
  }

  async takenSeats(route: string, travelDate: string): Promise<number[]> {
    const rows = await this.db
      .select({ seat: bookings.seat })
      .from(bookings)
      .where(and(eq(bookings.route, route), eq(bookings.travelDate, travelDate), ne(bookings.status, 'cancelled')))
      .orderBy(bookings.seat);
    return rows.map((row) => row.seat);
  }

  async ping(): Promise<void> {
    await this.db.execute(sql`SELECT 1`);
  }
}

/**
 * Bookings held in process memory. Used when no DATABASE_URL is configured
 * and by tests; enforces the same one-active-booking-per-seat rule.
 */
export class InMemoryBookingRepository implements BookingRepository {
  private readonly rows: Booking[] = [];

  async create(input: NewBooking): Promise<Booking> {
    const clash = this.rows.some(
      (row) =>
        row.route === input.route &&
        row.travelDate === input.travelDate &&
        row.seat === input.seat &&
        row.status !== 'cancelled'
    );
    if (clash) {
      throw new SeatUnavailableError(input.seat);
    }

    let bookingId = generateBookingId();
    while (this.rows.some((row) => row.bookingId === bookingId)) {
      bookingId = generateBookingId();
    }

    const booking: Booking = {
      ...input,
      bookingId,
      status: 'pending',
      paymentStatus: 'pending',
      createdAt: new Date(),
    };
    this.rows.push(booking);
    logger.info(`Booking created: ${bookingId} seat=${input.seat} ${input.route}/${input.travelDate}`);
    return { ...booking };
  }

  async findByPhone(phone: string, limit: number): Promise<Booking[]> {
    return this.rows
      .filter((row) => row.phone === phone)
      .reverse()
      .slice(0, limit)
      .map((row) => ({ ...row }));
  }

  async takenSeats(route: string, travelDate: string): Promise<number[]> {
    return this.rows
      .filter((row) => row.route === route && row.travelDate === travelDate && row.status !== 'cancelled')
      .map((row) => row.seat)
      .sort((a, b) => a - b);
  }

  async ping(): Promise<void> {
    return;
  }

  get size(): number {
    return this.rows.length;
  }
}
