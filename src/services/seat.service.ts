import { BusinessSettings } from '../types/settings';
import { todayIso } from '../utils/format';
import { withTimeout } from '../utils/withTimeout';
import { BookingRepository } from './booking.repository';
import { DepartureAvailability } from './knowledge/faq.answers';

/**
 * Seat availability derived from bookings. Every read is bounded by the
 * storage timeout.
 */
export class SeatService {
  constructor(
    private readonly bookings: BookingRepository,
    private readonly totalSeats: number,
    private readonly timeoutMs: number
  ) {}

  get capacity(): number {
    return this.totalSeats;
  }

  isSeatNumber(seat: number): boolean {
    return Number.isInteger(seat) && seat >= 1 && seat <= this.totalSeats;
  }

  async freeSeats(route: string, travelDate: string): Promise<number[]> {
    const taken = new Set(
      await withTimeout(this.bookings.takenSeats(route, travelDate), this.timeoutMs, 'Seat availability read')
    );
    const free: number[] = [];
    for (let seat = 1; seat <= this.totalSeats; seat++) {
      if (!taken.has(seat)) {
        free.push(seat);
      }
    }
    return free;
  }

  /**
   * Free seats for every upcoming departure, routes in fare order
   */
  async availability(settings: BusinessSettings, now: Date): Promise<DepartureAvailability[]> {
    const result: DepartureAvailability[] = [];
    for (const route of Object.keys(settings.fares)) {
      for (const date of upcomingDates(settings, route, now)) {
        result.push({
          route,
          date,
          freeSeats: await this.freeSeats(route, date),
          totalSeats: this.totalSeats,
        });
      }
    }
    return result;
  }
}

/**
 * Scheduled dates for a route from today on, ascending
 */
export function upcomingDates(settings: BusinessSettings, route: string, now: Date): string[] {
  const today = todayIso(now);
  return [...(settings.dates[route] ?? [])].filter((date) => date >= today).sort();
}
