import { BusinessSettings } from '../../types/settings';
import { formatAmount, formatTravelDate, routeLabel } from '../../utils/format';

export type FaqCategory =
  | 'dates'
  | 'fares'
  | 'return_service'
  | 'luggage'
  | 'locations'
  | 'seats'
  | 'general';

export const FAQ_CATEGORIES: ReadonlyArray<{ id: string; title: string; category: FaqCategory }> = [
  { id: 'faq_dates', title: '📅 Dates & Schedule', category: 'dates' },
  { id: 'faq_fares', title: '💰 Fares', category: 'fares' },
  { id: 'faq_return_service', title: '🔄 Return Service', category: 'return_service' },
  { id: 'faq_luggage', title: '🧳 Luggage Policy', category: 'luggage' },
  { id: 'faq_locations', title: '📍 Pickup/Drop Points', category: 'locations' },
  { id: 'faq_seats', title: '💺 Seats Availability', category: 'seats' },
  { id: 'faq_general', title: '❓ General', category: 'general' },
];

export function faqCategoryFromId(id: string): FaqCategory | null {
  return FAQ_CATEGORIES.find((entry) => entry.id === id)?.category ?? null;
}

/**
 * Free seats per upcoming departure, read from bookings by the caller
 */
export interface DepartureAvailability {
  route: string;
  date: string;
  freeSeats: number[];
  totalSeats: number;
}

export function faresAnswer(settings: BusinessSettings, origin: string): string {
  const lines = Object.entries(settings.fares).map(
    ([route, amount]) => `🏙️ *${origin} → ${routeLabel(route)}:* ${formatAmount(amount)}`
  );
  return `💰 *Ticket Fares*\n\n${lines.join('\n')}\n\n💳 Payment via bank transfer after booking.`;
}

export function routeFareAnswer(route: string, amount: number, origin: string): string {
  return `The fare from ${origin} to ${routeLabel(route)} is ${formatAmount(amount)} per seat.`;
}

export function datesAnswer(settings: BusinessSettings): string {
  const routes = Object.keys(settings.fares);
  const lines = routes.map((route) => {
    const dates = settings.dates[route] ?? [];
    const listed = dates.length > 0 ? dates.map(formatTravelDate).join(', ') : 'No dates scheduled';
    return `*${routeLabel(route)}:* ${listed}`;
  });
  return `📅 *Dates & Schedule*\n\n${lines.join('\n')}\n\n*Return Service:*\n${settings.return_service.description}`;
}

export function routeDatesAnswer(route: string, dates: readonly string[]): string {
  if (dates.length === 0) {
    return `No departures to ${routeLabel(route)} are scheduled yet.`;
  }
  return `Buses to ${routeLabel(route)} leave on ${dates.map(formatTravelDate).join(', ')}.`;
}

export function returnServiceAnswer(settings: BusinessSettings): string {
  const { date, description } = settings.return_service;
  return `🔄 *Return Service*\n\n*Return Date:* ${description} (${date})\n\nSame pricing applies for the return journey. Book it through the booking menu!`;
}

export function luggageAnswer(settings: BusinessSettings): string {
  const { maxBags, bagSize, handCarry, note } = settings.luggage;
  const carry = handCarry ? '\n• 1 hand carry bag' : '';
  return `🧳 *Luggage Policy*\n\n*Allowed:*\n• ${maxBags} ${bagSize}-sized bags maximum${carry}\n\n${note}`;
}

export function locationsAnswer(settings: BusinessSettings): string {
  const { status, note, points } = settings.locations;
  if (status.toUpperCase() === 'TBD' || points.length === 0) {
    return `📍 *Pickup & Drop Locations*\n\n⏳ *Status:* To Be Announced\n\n${note}`;
  }
  const lines = points.map(({ point, detail }) => `📌 *${point}:* ${detail}`);
  return `📍 *Pickup & Drop Locations*\n\n${lines.join('\n')}\n\n${note}`;
}

export function locationPointAnswer(point: string, detail: string): string {
  return `📌 *${point}:* ${detail}`;
}

export function bookingHowToAnswer(): string {
  return [
    '*How to Book?*',
    '1️⃣ Tap "Book a Seat" from the main menu',
    '2️⃣ Select route & date',
    '3️⃣ Enter your details',
    '4️⃣ Choose your seat',
    '5️⃣ Complete payment and upload the screenshot',
  ].join('\n');
}

export function generalAnswer(): string {
  return `❓ *General Information*\n\n${bookingHowToAnswer()}\n\n*How to Check a Booking?*\nStatus → Your Booking → enter your phone number\n\n*Need Help?*\nType your question and I'll find the answer!`;
}

export function seatsAnswer(availability: readonly DepartureAvailability[]): string {
  if (availability.length === 0) {
    return '💺 *Seats Availability*\n\nNo upcoming trips scheduled. Check back later!';
  }
  const lines = availability.map(({ route, date, freeSeats, totalSeats }) => {
    const ratio = totalSeats > 0 ? freeSeats.length / totalSeats : 0;
    const marker = ratio > 0.5 ? '🟢' : ratio > 0.2 ? '🟡' : '🔴';
    return `${marker} *${routeLabel(route)}* - ${formatTravelDate(date)}\n   ${freeSeats.length}/${totalSeats} seats available`;
  });
  return `💺 *Seats Availability*\n\n${lines.join('\n\n')}\n\n🟢 Good | 🟡 Filling up | 🔴 Almost full`;
}

/**
 * Canned answer for a category tap. Seats need live availability, which
 * the caller reads beforehand.
 */
export function categoryAnswer(
  category: FaqCategory,
  settings: BusinessSettings,
  origin: string,
  availability: readonly DepartureAvailability[] = []
): string {
  switch (category) {
    case 'dates':
      return datesAnswer(settings);
    case 'fares':
      return faresAnswer(settings, origin);
    case 'return_service':
      return returnServiceAnswer(settings);
    case 'luggage':
      return luggageAnswer(settings);
    case 'locations':
      return locationsAnswer(settings);
    case 'seats':
      return seatsAnswer(availability);
    case 'general':
      return generalAnswer();
  }
}
