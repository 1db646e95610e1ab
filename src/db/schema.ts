import { sql } from 'drizzle-orm';
import { index, integer, pgEnum, pgTable, serial, text, timestamp, uniqueIndex, varchar } from 'drizzle-orm/pg-core';

export const bookingStatusEnum = pgEnum('booking_status', ['pending', 'confirmed', 'cancelled']);
export const paymentStatusEnum = pgEnum('payment_status', ['pending', 'confirmed', 'rejected']);

export const bookings = pgTable(
  'bookings',
  {
    id: serial('id').primaryKey(),
    bookingId: varchar('booking_id', { length: 16 }).notNull(),
    userId: varchar('user_id', { length: 32 }).notNull(),
    route: varchar('route', { length: 64 }).notNull(),
    travelDate: varchar('travel_date', { length: 10 }).notNull(),
    passengerName: text('passenger_name').notNull(),
    regNumber: varchar('reg_number', { length: 16 }).notNull(),
    phone: varchar('phone', { length: 16 }).notNull(),
    seat: integer('seat').notNull(),
    amount: integer('amount').notNull(),
    status: bookingStatusEnum('status').notNull().default('pending'),
    paymentStatus: paymentStatusEnum('payment_status').notNull().default('pending'),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => ({
    bookingIdIdx: uniqueIndex('bookings_booking_id_idx').on(table.bookingId),
    activeSeatIdx: uniqueIndex('bookings_active_seat_idx')
      .on(table.route, table.travelDate, table.seat)
      .where(sql`${table.status} <> 'cancelled'`),
    phoneIdx: index('bookings_phone_idx').on(table.phone),
  })
);

export type BookingRow = typeof bookings.$inferSelect;
