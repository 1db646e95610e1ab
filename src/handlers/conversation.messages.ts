import { Booking } from '../types/booking';
import { MenuOption, OutboundMessage } from '../types/conversation';
import { FAQ_CATEGORIES } from '../services/knowledge/faq.answers';
import { formatAmount, formatSeatRanges, formatTravelDate, routeLabel } from '../utils/format';

const DIVIDER = '━━━━━━━━━━━━━━━━━━━━━';

export const BUTTON_IDS = {
  bookSeat: 'book_seat',
  status: 'status',
  faq: 'faq',
  mainMenu: 'main_menu',
  busStatus: 'bus_status',
  yourBooking: 'your_booking',
  confirmBooking: 'confirm_booking',
  cancelBooking: 'cancel_booking',
  adminMenu: 'admin_menu',
} as const;

export const ROUTE_PREFIX = 'route_';
export const DATE_PREFIX = 'date_';
export const SEAT_PREFIX = 'seat_';

const MAIN_MENU_OPTION: MenuOption = { id: BUTTON_IDS.mainMenu, title: '🔙 Main Menu' };

/** Date lists hold at most 10 rows; one is the way back */
export const MAX_DATE_ROWS = 9;

export function text(body: string): OutboundMessage {
  return { kind: 'text', content: { body } };
}

export function menu(body: string, options: MenuOption[], buttonText = 'Select Option'): OutboundMessage {
  return { kind: 'button_menu', content: { body, buttonText, options } };
}

export function rootMenu(): OutboundMessage {
  return menu('🚌 *Welcome aboard!*\n\nWhat would you like to do?', [
    { id: BUTTON_IDS.bookSeat, title: '🎫 Book a Seat' },
    { id: BUTTON_IDS.status, title: '📊 Status' },
    { id: BUTTON_IDS.faq, title: '❓ FAQ' },
  ]);
}

export function anythingElse(): OutboundMessage {
  return menu('Need anything else?', [MAIN_MENU_OPTION]);
}

export function tryAgain(): OutboundMessage {
  return text('⚠️ Something went wrong on our side. Please send your last message again in a moment.');
}

// ---- booking flow -------------------------------------------------------

export function routeMenu(routes: readonly string[], origin: string): OutboundMessage {
  const options = routes.map((route) => ({
    id: `${ROUTE_PREFIX}${route}`,
    title: `${origin} → ${routeLabel(route)}`,
  }));
  return menu(
    '🗺️ *Select Your Route*\n\nWhere would you like to travel?',
    [...options, MAIN_MENU_OPTION],
    'Select Route'
  );
}

export function noRoutes(): OutboundMessage {
  return text('😔 Sorry, no routes are open for booking right now. Please check back later.');
}

export function noDates(route: string): OutboundMessage {
  return text(
    `😔 Sorry, no available dates found for ${routeLabel(route)}.\n\nPlease check back later or try a different route.`
  );
}

export function dateMenu(route: string, dates: readonly string[], fare: number): OutboundMessage {
  const options = dates.slice(0, MAX_DATE_ROWS).map((date) => ({
    id: `${DATE_PREFIX}${date}`,
    title: formatTravelDate(date),
    description: `${date} | ${formatAmount(fare)}`,
  }));
  return menu(
    `📅 *Available Dates for ${routeLabel(route)}*\n\nSelect a date to continue:`,
    [...options, MAIN_MENU_OPTION],
    'Select Date'
  );
}

export function askName(route: string, date: string, fare: number, origin: string): OutboundMessage {
  return text(
    [
      '✅ *Great Choice!*',
      '',
      `🚌 *Route:* ${origin} → ${routeLabel(route)}`,
      `📅 *Date:* ${formatTravelDate(date)}`,
      `💰 *Price:* ${formatAmount(fare)} per seat`,
      '',
      DIVIDER,
      '',
      "Now, let's get your details for the booking.",
      '',
      '📝 *Please enter your full name:*',
    ].join('\n')
  );
}

export function askReg(name: string): OutboundMessage {
  return text(`👤 *Name:* ${name}\n\n📋 *Please enter your Registration Number:*\n\nFormat: 20XXXXX (e.g., 2021234)`);
}

export function askPhone(regNumber: string): OutboundMessage {
  return text(`🎓 *Reg Number:* ${regNumber}\n\n📱 *Please enter your phone number:*\n\nFormat: 03XXXXXXXXX (e.g., 03001234567)`);
}

export function invalidInput(reason: string): OutboundMessage {
  return text(`❌ ${reason}`);
}

export function seatPrompt(phone: string, freeSeats: readonly number[]): OutboundMessage {
  return text(
    `📱 *Phone:* ${phone}\n\n💺 *Available Seats:*\n${formatSeatRanges(freeSeats)}\n\nPlease type the seat number you want to book:`
  );
}

export function seatUnavailable(seat: number, freeSeats: readonly number[]): OutboundMessage {
  return text(
    `❌ Seat ${seat} is not available.\n\n💺 *Available Seats:*\n${formatSeatRanges(freeSeats)}\n\nPlease select from the available seats.`
  );
}

export function soldOut(route: string, date: string): OutboundMessage {
  return text(
    `😔 Sorry, all seats to ${routeLabel(route)} on ${formatTravelDate(date)} are booked.\n\nPlease select a different date.`
  );
}

export interface BookingSummary {
  route: string;
  date: string;
  name: string;
  regNumber: string;
  phone: string;
  seat: number;
  fare: number;
}

export function confirmMenu(summary: BookingSummary, origin: string): OutboundMessage {
  const body = [
    '📋 *Booking Summary*',
    DIVIDER,
    `🚌 *Route:* ${origin} → ${routeLabel(summary.route)}`,
    `📅 *Date:* ${formatTravelDate(summary.date)}`,
    '',
    '👤 *Passenger Details:*',
    `• Name: ${summary.name}`,
    `• Reg No: ${summary.regNumber}`,
    `• Phone: ${summary.phone}`,
    '',
    `💺 *Seat:* ${summary.seat}`,
    `💰 *Total Amount:* ${formatAmount(summary.fare)}`,
    DIVIDER,
    'Please confirm your booking to proceed to payment.',
  ].join('\n');

  return menu(body, [
    { id: BUTTON_IDS.confirmBooking, title: '✅ Confirm & Pay' },
    { id: BUTTON_IDS.cancelBooking, title: '❌ Cancel' },
  ]);
}

export function bookingCancelled(): OutboundMessage {
  return text('🚫 Booking cancelled. No seat was reserved.');
}

export function routeClosed(route: string): OutboundMessage {
  return text(`😔 Bookings to ${routeLabel(route)} are closed. Please start again from the menu.`);
}

export function seatJustTaken(seat: number, freeSeats: readonly number[]): OutboundMessage {
  return text(
    `⚠️ Seat ${seat} was just booked by someone else.\n\n💺 *Available Seats:*\n${formatSeatRanges(freeSeats)}\n\nPlease type another seat number:`
  );
}

export function bookingCreated(booking: Booking): OutboundMessage {
  return text(
    `🎉 *Booking Created Successfully!*\n\nYour booking ID: *${booking.bookingId}*\n\nPlease save this ID for your records.`
  );
}

export function paymentInfo(booking: Booking, accountDetails: string): OutboundMessage {
  return text(
    [
      '💳 *Payment Information*',
      '',
      `*Booking ID:* ${booking.bookingId}`,
      `*Amount Due:* ${formatAmount(booking.amount)}`,
      DIVIDER,
      accountDetails,
      DIVIDER,
      `⚠️ Use your Booking ID (${booking.bookingId}) as the payment reference, then upload the screenshot to confirm your seat.`,
    ].join('\n')
  );
}

export function uploadLink(uploadBaseUrl: string, bookingId: string): OutboundMessage {
  const base = uploadBaseUrl.replace(/\/+$/, '');
  return {
    kind: 'document_link',
    content: {
      url: `${base}/upload/${bookingId}`,
      caption: `📤 *Upload Payment Screenshot*\n\nYour Booking ID: *${bookingId}*\n\nAfter uploading, your booking will be verified within 24 hours.`,
    },
  };
}

// ---- status flow --------------------------------------------------------

export function statusMenu(): OutboundMessage {
  return menu('📊 *Status Menu*\n\nWhat would you like to check?', [
    { id: BUTTON_IDS.busStatus, title: '🚌 Bus Status' },
    { id: BUTTON_IDS.yourBooking, title: '🎫 Your Booking' },
    MAIN_MENU_OPTION,
  ]);
}

export function lookupPrompt(): OutboundMessage {
  return text('📱 Please enter your phone number to find your bookings:\n\nFormat: 03XXXXXXXXX');
}

const PAYMENT_EMOJI: Record<Booking['paymentStatus'], string> = {
  pending: '⏳',
  confirmed: '✅',
  rejected: '❌',
};

const BOOKING_EMOJI: Record<Booking['status'], string> = {
  pending: '⏳',
  confirmed: '✅',
  cancelled: '❌',
};

function titleCase(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1);
}

export function bookingsList(phone: string, bookings: readonly Booking[], origin: string): OutboundMessage {
  if (bookings.length === 0) {
    return text(`📭 No bookings found for ${phone}.\n\nMake sure you entered the correct phone number.`);
  }

  const blocks = bookings.map((booking) =>
    [
      DIVIDER,
      `*Booking ID:* ${booking.bookingId}`,
      `*Route:* ${origin} → ${routeLabel(booking.route)}`,
      `*Date:* ${formatTravelDate(booking.travelDate)}`,
      `*Seat:* ${booking.seat}`,
      `*Amount:* ${formatAmount(booking.amount)}`,
      `*Payment Status:* ${PAYMENT_EMOJI[booking.paymentStatus]} ${titleCase(booking.paymentStatus)}`,
      `*Booking Status:* ${BOOKING_EMOJI[booking.status]} ${titleCase(booking.status)}`,
    ].join('\n')
  );
  return text(`🎫 *Your Bookings (${phone})*\n\n${blocks.join('\n\n')}`);
}

// ---- FAQ flow -----------------------------------------------------------

export function faqMenu(): OutboundMessage {
  return menu(
    '❓ *FAQ - Frequently Asked Questions*\n\nSelect a category to learn more, or type your question directly!',
    FAQ_CATEGORIES.map(({ id, title }) => ({ id, title })),
    'Select Category'
  );
}

export function faqFollowUp(): OutboundMessage {
  return menu('What would you like to do next?', [
    { id: BUTTON_IDS.faq, title: '📋 More FAQ' },
    { id: BUTTON_IDS.bookSeat, title: '🎫 Book Now' },
    MAIN_MENU_OPTION,
  ]);
}

export function noAnswer(): OutboundMessage {
  return text("🤔 I couldn't find an answer to that. Try one of these categories:");
}

// ---- admin --------------------------------------------------------------

export const ADMIN_OPTIONS: readonly MenuOption[] = [
  { id: 'admin_fares', title: '💰 Edit Fares', description: 'Update ticket prices' },
  { id: 'admin_dates', title: '📅 Edit Dates', description: 'Modify travel dates' },
  { id: 'admin_return', title: '🔄 Edit Return', description: 'Update return service' },
  { id: 'admin_luggage', title: '🧳 Edit Luggage', description: 'Change luggage policy' },
  { id: 'admin_locations', title: '📍 Edit Locations', description: 'Set pickup/drop points' },
  { id: 'admin_faq', title: '📝 Edit FAQ', description: 'Add or remove FAQ entries' },
  { id: 'admin_seats', title: '💺 View Seats', description: 'Check seat availability' },
  { id: 'admin_rebuild_kb', title: '🔄 Rebuild KB', description: 'Refresh FAQ answers' },
  { id: 'admin_audit_log', title: '📋 Audit Log', description: 'View recent changes' },
];

export function adminMenu(): OutboundMessage {
  return menu(
    `🔐 *ADMIN DASHBOARD*\n${DIVIDER}\n\nWelcome, Administrator!\nSelect an option to manage the service:`,
    [...ADMIN_OPTIONS],
    'Select Option'
  );
}

export function adminFollowUp(): OutboundMessage {
  return menu('What would you like to do next?', [
    { id: BUTTON_IDS.adminMenu, title: '🔐 Admin Menu' },
    MAIN_MENU_OPTION,
  ]);
}
