import logger from '../config/logger';
import { AdminService } from '../services/admin.service';
import { BookingRepository } from '../services/booking.repository';
import { KnowledgeBase, KnowledgeSnapshot } from '../services/knowledge.service';
import { categoryAnswer, faqCategoryFromId } from '../services/knowledge/faq.answers';
import { match } from '../services/knowledge/kb.matcher';
import { SeatService, upcomingDates } from '../services/seat.service';
import { InboundEvent, InboundKind, OutboundInstruction, OutboundMessage } from '../types/conversation';
import { BotState, EditableSettingKey, Session, SessionContext, isSessionExpired, pruneContext } from '../types/session';
import { BusinessSettings } from '../types/settings';
import { SeatUnavailableError, TransientStorageError, ValidationError } from '../utils/AppError';
import { maskPhone, parseLocalPhoneNumber } from '../utils/phoneNormalizer';
import { withTimeout } from '../utils/withTimeout';
import { AdminCommand, interpret, interpretEdit, isRecognized } from './admin.commands';
import * as messages from './conversation.messages';

const GLOBAL_COMMANDS = new Set(['hi', 'hello', 'hey', 'start', 'menu', 'home', 'restart', 'cancel']);
const BOOK_WORDS = new Set(['book', 'book seat', 'book a seat', 'booking']);
const STATUS_WORDS = new Set(['status']);
const FAQ_WORDS = new Set(['faq', 'help']);

const NAME_PATTERN = /^[\p{L} .'-]+$/u;
const REG_NUMBER_PATTERN = /^20\d{5}$/;
const LOOKUP_LIMIT = 5;

/** States in which an admin's text is tried against the admin grammar */
const ADMIN_COMMAND_STATES: readonly BotState[] = [BotState.ROOT_MENU, BotState.ADMIN_MENU, BotState.ADMIN_EDIT];

const ADMIN_EDIT_KEYS: Readonly<Record<string, EditableSettingKey>> = {
  admin_fares: 'fares',
  admin_dates: 'dates',
  admin_return: 'return_service',
  admin_luggage: 'luggage',
  admin_locations: 'locations',
  admin_faq: 'faq',
};

export type InputCategory = 'global' | 'book' | 'status' | 'faq' | 'other';

export interface ClassifiedInput {
  category: InputCategory;
  kind: InboundKind;
  /** Payload as received (button id or typed text) */
  raw: string;
  /** Trimmed, lowercased, single-spaced */
  normalized: string;
}

/**
 * Sorts an inbound event into the navigation intents every state
 * understands; everything else is left to the state handler.
 */
export function classifyInput(event: InboundEvent): ClassifiedInput {
  const raw = event.payload;
  const normalized = raw.trim().toLowerCase().replace(/\s+/g, ' ');
  const base = { kind: event.kind, raw, normalized };

  if (event.kind === 'button_reply') {
    switch (raw) {
      case messages.BUTTON_IDS.mainMenu:
        return { ...base, category: 'global' };
      case messages.BUTTON_IDS.bookSeat:
        return { ...base, category: 'book' };
      case messages.BUTTON_IDS.status:
        return { ...base, category: 'status' };
      case messages.BUTTON_IDS.faq:
        return { ...base, category: 'faq' };
      default:
        return { ...base, category: 'other' };
    }
  }

  if (GLOBAL_COMMANDS.has(normalized)) return { ...base, category: 'global' };
  if (BOOK_WORDS.has(normalized)) return { ...base, category: 'book' };
  if (STATUS_WORDS.has(normalized)) return { ...base, category: 'status' };
  if (FAQ_WORDS.has(normalized)) return { ...base, category: 'faq' };
  return { ...base, category: 'other' };
}

interface Turn {
  userId: string;
  state: BotState;
  context: SessionContext;
  input: ClassifiedInput;
  now: Date;
  snapshot: KnowledgeSnapshot;
  isAdmin: boolean;
}

interface Transition {
  state: BotState;
  context: SessionContext;
  messages: OutboundMessage[];
}

type StateHandler = (turn: Turn) => Promise<Transition>;

function to(state: BotState, output: OutboundMessage[], context: SessionContext = {}): Transition {
  return { state, context, messages: output };
}

function home(...before: OutboundMessage[]): Transition {
  return to(BotState.ROOT_MENU, [...before, messages.rootMenu()]);
}

function fareFor(settings: BusinessSettings, route: string): number | null {
  return Object.hasOwn(settings.fares, route) ? settings.fares[route] : null;
}

function typedText(input: ClassifiedInput): string {
  if (input.kind !== 'text') {
    throw new ValidationError('Please type your answer.');
  }
  return input.raw.trim();
}

function parseName(input: ClassifiedInput): string {
  const name = typedText(input).replace(/\s+/g, ' ');
  if (name.length < 3 || !NAME_PATTERN.test(name)) {
    throw new ValidationError('Please enter a valid name (at least 3 characters, letters only).');
  }
  return name;
}

function parseRegNumber(input: ClassifiedInput): string {
  const regNumber = typedText(input);
  if (!REG_NUMBER_PATTERN.test(regNumber)) {
    throw new ValidationError('Invalid registration number format.\n\nPlease enter in format: 20XXXXX (e.g., 2021234)');
  }
  return regNumber;
}

function parsePhone(input: ClassifiedInput): string {
  const phone = parseLocalPhoneNumber(typedText(input));
  if (phone === null) {
    throw new ValidationError('Invalid phone number format.\n\nPlease enter in format: 03XXXXXXXXX (e.g., 03001234567)');
  }
  return phone;
}

export interface EngineDependencies {
  knowledge: KnowledgeBase;
  bookings: BookingRepository;
  seats: SeatService;
  admin: AdminService;
  isAdmin: (userId: string) => boolean;
}

export interface EngineOptions {
  idleMs: number;
  storageTimeoutMs: number;
  origin: string;
  uploadBaseUrl: string;
  paymentAccountDetails: string;
}

export interface EngineResult {
  session: Session;
  instructions: OutboundInstruction[];
  /** False when the stored session must be left as it was */
  changed: boolean;
}

/**
 * ConversationEngine advances one user's state machine by one inbound
 * event. It performs no network I/O itself: storage goes through the
 * injected collaborators and replies come back as instructions.
 */
export class ConversationEngine {
  private readonly handlers: Record<BotState, StateHandler> = {
    [BotState.ROOT_MENU]: (turn) => this.onRootMenu(turn),
    [BotState.BOOKING_SELECT_ROUTE]: (turn) => this.onSelectRoute(turn),
    [BotState.BOOKING_SELECT_DATE]: (turn) => this.onSelectDate(turn),
    [BotState.BOOKING_ENTER_NAME]: (turn) => this.onEnterName(turn),
    [BotState.BOOKING_ENTER_REG]: (turn) => this.onEnterReg(turn),
    [BotState.BOOKING_ENTER_PHONE]: (turn) => this.onEnterPhone(turn),
    [BotState.BOOKING_SELECT_SEAT]: (turn) => this.onSelectSeat(turn),
    [BotState.BOOKING_CONFIRM]: (turn) => this.onConfirm(turn),
    [BotState.STATUS_MENU]: (turn) => this.onStatusMenu(turn),
    // Reply-and-leave states; a session is only found in one if it was
    // stored by an older build
    [BotState.STATUS_BUS]: (turn) => this.onRootMenu(turn),
    [BotState.STATUS_LOOKUP_PHONE]: (turn) => this.onLookupPhone(turn),
    [BotState.FAQ_MENU]: (turn) => this.onFaqMenu(turn),
    [BotState.FAQ_CATEGORY_RESULT]: (turn) => this.onFaqMenu(turn),
    [BotState.FAQ_FREEFORM]: (turn) => this.onFaqMenu(turn),
    [BotState.ADMIN_MENU]: (turn) => this.onAdminMenu(turn),
    [BotState.ADMIN_EDIT]: (turn) => this.onAdminEdit(turn),
  };

  constructor(
    private readonly deps: EngineDependencies,
    private readonly options: EngineOptions
  ) {}

  async handle(session: Session, event: InboundEvent, now: Date): Promise<EngineResult> {
    const expired = isSessionExpired(session, now, this.options.idleMs);
    if (expired) {
      logger.debug(`Session idle, resetting to ROOT_MENU: ${maskPhone(session.userId)} (was ${session.state})`);
    }

    const turn: Turn = {
      userId: session.userId,
      state: expired ? BotState.ROOT_MENU : session.state,
      context: expired ? {} : session.context,
      input: classifyInput(event),
      now,
      snapshot: this.deps.knowledge.current(),
      isAdmin: this.deps.isAdmin(session.userId),
    };

    try {
      const transition = await this.dispatch(turn);
      return {
        session: {
          userId: session.userId,
          state: transition.state,
          context: pruneContext(transition.state, transition.context),
          updatedAt: now.toISOString(),
        },
        instructions: this.address(session.userId, transition.messages),
        changed: true,
      };
    } catch (error) {
      if (error instanceof TransientStorageError) {
        logger.warn('Storage unavailable, session left unchanged:', {
          user: maskPhone(session.userId),
          state: session.state,
          error: error.message,
        });
        return { session, instructions: this.address(session.userId, [messages.tryAgain()]), changed: false };
      }
      throw error;
    }
  }

  private address(recipientId: string, output: OutboundMessage[]): OutboundInstruction[] {
    return output.map((message) => ({ ...message, recipientId }));
  }

  private async dispatch(turn: Turn): Promise<Transition> {
    if (turn.input.category === 'global') {
      return home();
    }

    if (turn.isAdmin && ADMIN_COMMAND_STATES.includes(turn.state)) {
      const command = this.adminCommand(turn);
      if (command !== null) {
        return this.runAdmin(turn, command);
      }
    }

    return this.handlers[turn.state](turn);
  }

  private adminCommand(turn: Turn): AdminCommand | null {
    const { input, state, context } = turn;
    if (input.kind === 'button_reply') {
      return input.raw === messages.BUTTON_IDS.adminMenu ? { type: 'show_menu' } : null;
    }
    const editing = state === BotState.ADMIN_EDIT ? context.editing : undefined;
    const result = editing === undefined ? interpret(input.raw) : interpretEdit(editing, input.raw);
    return isRecognized(result) ? result : null;
  }

  private async runAdmin(turn: Turn, command: AdminCommand): Promise<Transition> {
    if (command.type === 'show_menu') {
      return to(BotState.ADMIN_MENU, [messages.adminMenu()]);
    }
    const reply = await this.deps.admin.execute(turn.userId, command, turn.now);
    return to(BotState.ADMIN_MENU, [messages.text(reply), messages.adminFollowUp()]);
  }

  // ---- root -------------------------------------------------------------

  private async onRootMenu(turn: Turn): Promise<Transition> {
    switch (turn.input.category) {
      case 'book':
        return this.startBooking(turn);
      case 'status':
        return to(BotState.STATUS_MENU, [messages.statusMenu()]);
      case 'faq':
        return to(BotState.FAQ_MENU, [messages.faqMenu()]);
      default:
        return home();
    }
  }

  // ---- booking ------------------------------------------------------------

  private startBooking(turn: Turn): Transition {
    const routes = Object.keys(turn.snapshot.settings.fares);
    if (routes.length === 0) {
      return home(messages.noRoutes());
    }
    return to(BotState.BOOKING_SELECT_ROUTE, [messages.routeMenu(routes, this.options.origin)]);
  }

  private async onSelectRoute(turn: Turn): Promise<Transition> {
    const routes = Object.keys(turn.snapshot.settings.fares);
    const { input } = turn;
    const candidate =
      input.kind === 'button_reply' && input.raw.startsWith(messages.ROUTE_PREFIX)
        ? input.raw.slice(messages.ROUTE_PREFIX.length)
        : input.normalized;
    const route = routes.find((known) => known === candidate);

    if (route === undefined) {
      if (routes.length === 0) {
        return home(messages.noRoutes());
      }
      return to(BotState.BOOKING_SELECT_ROUTE, [
        messages.invalidInput('Please choose one of the listed routes.'),
        messages.routeMenu(routes, this.options.origin),
      ]);
    }

    const dates = upcomingDates(turn.snapshot.settings, route, turn.now);
    const fare = fareFor(turn.snapshot.settings, route);
    if (dates.length === 0 || fare === null) {
      return home(messages.noDates(route));
    }
    return to(BotState.BOOKING_SELECT_DATE, [messages.dateMenu(route, dates, fare)], { route });
  }

  private async onSelectDate(turn: Turn): Promise<Transition> {
    const { route } = turn.context;
    if (route === undefined) {
      return this.startBooking(turn);
    }
    const fare = fareFor(turn.snapshot.settings, route);
    if (fare === null) {
      return home(messages.routeClosed(route));
    }
    const dates = upcomingDates(turn.snapshot.settings, route, turn.now);
    if (dates.length === 0) {
      return home(messages.noDates(route));
    }

    const { input } = turn;
    const candidate =
      input.kind === 'button_reply' && input.raw.startsWith(messages.DATE_PREFIX)
        ? input.raw.slice(messages.DATE_PREFIX.length)
        : input.normalized;
    const listed = dates.slice(0, messages.MAX_DATE_ROWS);
    const date = /^\d{1,2}$/.test(candidate)
      ? listed[Number.parseInt(candidate, 10) - 1]
      : dates.find((known) => known === candidate);

    if (date === undefined) {
      return to(
        BotState.BOOKING_SELECT_DATE,
        [messages.invalidInput('Please pick one of the listed dates.'), messages.dateMenu(route, dates, fare)],
        turn.context
      );
    }
    return to(
      BotState.BOOKING_ENTER_NAME,
      [messages.askName(route, date, fare, this.options.origin)],
      { ...turn.context, date }
    );
  }

  /**
   * Runs a field parser; a ValidationError re-prompts the same state with
   * the context untouched.
   */
  private async collect<T>(
    turn: Turn,
    parse: (input: ClassifiedInput) => T,
    advance: (value: T) => Promise<Transition> | Transition
  ): Promise<Transition> {
    let value: T;
    try {
      value = parse(turn.input);
    } catch (error) {
      if (error instanceof ValidationError) {
        return to(turn.state, [messages.invalidInput(error.message)], turn.context);
      }
      throw error;
    }
    return advance(value);
  }

  private onEnterName(turn: Turn): Promise<Transition> {
    return this.collect(turn, parseName, (name) =>
      to(BotState.BOOKING_ENTER_REG, [messages.askReg(name)], { ...turn.context, name })
    );
  }

  private onEnterReg(turn: Turn): Promise<Transition> {
    return this.collect(turn, parseRegNumber, (regNumber) =>
      to(BotState.BOOKING_ENTER_PHONE, [messages.askPhone(regNumber)], { ...turn.context, regNumber })
    );
  }

  private onEnterPhone(turn: Turn): Promise<Transition> {
    return this.collect(turn, parsePhone, async (phone) => {
      const { route, date } = turn.context;
      if (route === undefined || date === undefined) {
        return this.startBooking(turn);
      }
      const free = await this.deps.seats.freeSeats(route, date);
      if (free.length === 0) {
        return home(messages.soldOut(route, date));
      }
      return to(BotState.BOOKING_SELECT_SEAT, [messages.seatPrompt(phone, free)], { ...turn.context, phone });
    });
  }

  private parseSeat(input: ClassifiedInput): number {
    const candidate =
      input.kind === 'button_reply' && input.raw.startsWith(messages.SEAT_PREFIX)
        ? input.raw.slice(messages.SEAT_PREFIX.length)
        : input.normalized;
    const seat = /^\d{1,3}$/.test(candidate) ? Number.parseInt(candidate, 10) : Number.NaN;
    if (!this.deps.seats.isSeatNumber(seat)) {
      throw new ValidationError(`Please enter a valid seat number (1-${this.deps.seats.capacity}).`);
    }
    return seat;
  }

  private onSelectSeat(turn: Turn): Promise<Transition> {
    return this.collect(turn, (input) => this.parseSeat(input), async (seat) => {
      const { route, date } = turn.context;
      if (route === undefined || date === undefined) {
        return this.startBooking(turn);
      }

      const free = await this.deps.seats.freeSeats(route, date);
      if (free.length === 0) {
        return home(messages.soldOut(route, date));
      }
      if (!free.includes(seat)) {
        return to(BotState.BOOKING_SELECT_SEAT, [messages.seatUnavailable(seat, free)], turn.context);
      }

      const context = { ...turn.context, seat };
      const summary = this.summarize(context, turn.snapshot.settings);
      if (summary === null) {
        return home(messages.routeClosed(route));
      }
      return to(BotState.BOOKING_CONFIRM, [messages.confirmMenu(summary, this.options.origin)], context);
    });
  }

  private summarize(context: SessionContext, settings: BusinessSettings): messages.BookingSummary | null {
    const { route, date, name, regNumber, phone, seat } = context;
    if (
      route === undefined ||
      date === undefined ||
      name === undefined ||
      regNumber === undefined ||
      phone === undefined ||
      seat === undefined
    ) {
      return null;
    }
    const fare = fareFor(settings, route);
    return fare === null ? null : { route, date, name, regNumber, phone, seat, fare };
  }

  private async onConfirm(turn: Turn): Promise<Transition> {
    const summary = this.summarize(turn.context, turn.snapshot.settings);
    if (summary === null) {
      logger.warn('Confirmation reached with incomplete booking details', { user: maskPhone(turn.userId) });
      return home();
    }

    const { raw, normalized } = turn.input;
    if (raw === messages.BUTTON_IDS.confirmBooking || normalized === 'confirm' || normalized === 'yes') {
      return this.commitBooking(turn, summary);
    }
    if (raw === messages.BUTTON_IDS.cancelBooking || normalized === 'no') {
      return home(messages.bookingCancelled());
    }
    return to(BotState.BOOKING_CONFIRM, [messages.confirmMenu(summary, this.options.origin)], turn.context);
  }

  private async commitBooking(turn: Turn, summary: messages.BookingSummary): Promise<Transition> {
    try {
      const booking = await withTimeout(
        this.deps.bookings.create({
          userId: turn.userId,
          route: summary.route,
          travelDate: summary.date,
          passengerName: summary.name,
          regNumber: summary.regNumber,
          phone: summary.phone,
          seat: summary.seat,
          amount: summary.fare,
        }),
        this.options.storageTimeoutMs,
        'Booking insert'
      );

      return to(BotState.ROOT_MENU, [
        messages.bookingCreated(booking),
        messages.paymentInfo(booking, this.options.paymentAccountDetails),
        messages.uploadLink(this.options.uploadBaseUrl, booking.bookingId),
      ]);
    } catch (error) {
      if (!(error instanceof SeatUnavailableError)) {
        throw error;
      }
      logger.info(`Seat race lost: seat ${error.seat} on ${summary.route}/${summary.date}`);
      const free = await this.deps.seats.freeSeats(summary.route, summary.date);
      if (free.length === 0) {
        return home(messages.soldOut(summary.route, summary.date));
      }
      return to(BotState.BOOKING_SELECT_SEAT, [messages.seatJustTaken(error.seat, free)], {
        ...turn.context,
        seat: undefined,
      });
    }
  }

  // ---- status -------------------------------------------------------------

  private async onStatusMenu(turn: Turn): Promise<Transition> {
    const { raw, normalized } = turn.input;

    if (raw === messages.BUTTON_IDS.busStatus || normalized === 'bus status' || normalized === 'bus') {
      const availability = await this.deps.seats.availability(turn.snapshot.settings, turn.now);
      return to(BotState.ROOT_MENU, [
        messages.text(categoryAnswer('seats', turn.snapshot.settings, this.options.origin, availability)),
        messages.anythingElse(),
      ]);
    }
    if (raw === messages.BUTTON_IDS.yourBooking || normalized === 'my booking' || normalized === 'your booking') {
      return to(BotState.STATUS_LOOKUP_PHONE, [messages.lookupPrompt()]);
    }
    if (turn.input.category !== 'other') {
      return this.onRootMenu(turn);
    }
    return to(BotState.STATUS_MENU, [messages.statusMenu()]);
  }

  private onLookupPhone(turn: Turn): Promise<Transition> {
    return this.collect(turn, parsePhone, async (phone) => {
      const found = await withTimeout(
        this.deps.bookings.findByPhone(phone, LOOKUP_LIMIT),
        this.options.storageTimeoutMs,
        'Booking lookup'
      );
      return to(BotState.ROOT_MENU, [messages.bookingsList(phone, found, this.options.origin), messages.anythingElse()]);
    });
  }

  // ---- FAQ ----------------------------------------------------------------

  private async onFaqMenu(turn: Turn): Promise<Transition> {
    const { input, snapshot } = turn;

    if (input.category === 'faq') {
      return to(BotState.FAQ_MENU, [messages.faqMenu()]);
    }
    if (input.category !== 'other') {
      return this.onRootMenu(turn);
    }

    if (input.kind === 'button_reply') {
      const category = faqCategoryFromId(input.raw);
      if (category === null) {
        return to(BotState.FAQ_MENU, [messages.faqMenu()]);
      }
      const availability =
        category === 'seats' ? await this.deps.seats.availability(snapshot.settings, turn.now) : [];
      const answer = categoryAnswer(category, snapshot.settings, this.options.origin, availability);
      return to(BotState.FAQ_MENU, [messages.text(answer), messages.faqFollowUp()]);
    }

    const result = match(input.raw, snapshot.index);
    if (result.kind === 'no_match') {
      return to(BotState.FAQ_MENU, [messages.noAnswer(), messages.faqMenu()]);
    }
    return to(BotState.FAQ_MENU, [messages.text(result.entry.answer), messages.faqFollowUp()]);
  }

  // ---- admin --------------------------------------------------------------

  private async onAdminMenu(turn: Turn): Promise<Transition> {
    if (!turn.isAdmin) {
      return home();
    }
    const { raw, category } = turn.input;

    const editing = Object.hasOwn(ADMIN_EDIT_KEYS, raw) ? ADMIN_EDIT_KEYS[raw] : undefined;
    if (editing !== undefined) {
      return to(
        BotState.ADMIN_EDIT,
        [messages.text(this.deps.admin.describe(editing)), messages.adminFollowUp()],
        { editing }
      );
    }
    switch (raw) {
      case 'admin_seats':
        return this.runAdmin(turn, { type: 'show_seats' });
      case 'admin_rebuild_kb':
        return this.runAdmin(turn, { type: 'rebuild_kb' });
      case 'admin_audit_log':
        return this.runAdmin(turn, { type: 'show_audit' });
    }
    if (category !== 'other') {
      return this.onRootMenu(turn);
    }
    return to(BotState.ADMIN_MENU, [messages.adminMenu()]);
  }

  private async onAdminEdit(turn: Turn): Promise<Transition> {
    const { editing } = turn.context;
    if (!turn.isAdmin || editing === undefined || turn.input.kind === 'button_reply') {
      return this.onAdminMenu(turn);
    }
    return to(
      BotState.ADMIN_EDIT,
      [messages.invalidInput("Couldn't read that change."), messages.text(this.deps.admin.describe(editing))],
      { editing }
    );
  }
}
