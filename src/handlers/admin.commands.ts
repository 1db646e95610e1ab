import { isValidIsoDate } from '../utils/format';
import { EditableSettingKey } from '../types/session';

/**
 * Parsed admin text command. The interpreter is pure: it never touches
 * storage, the admin service executes the result.
 */
export type AdminCommand =
  | { type: 'show_menu' }
  | { type: 'set_fare'; route: string; amount: number }
  | { type: 'add_date'; route: string; date: string }
  | { type: 'remove_date'; route: string; date: string }
  | { type: 'clear_dates'; route: string }
  | { type: 'set_return'; date: string; description: string }
  | { type: 'set_luggage_bags'; maxBags: number }
  | { type: 'set_luggage_size'; bagSize: string }
  | { type: 'set_luggage_carry'; handCarry: boolean }
  | { type: 'set_luggage_note'; note: string }
  | { type: 'set_location_status'; status: string }
  | { type: 'set_location_note'; note: string }
  | { type: 'clear_locations' }
  | { type: 'remove_location'; point: string }
  | { type: 'upsert_location'; point: string; detail: string }
  | { type: 'add_faq'; question: string; answer: string }
  | { type: 'remove_faq'; position: number }
  | { type: 'list_faq' }
  | { type: 'rebuild_kb' }
  | { type: 'show_audit' }
  | { type: 'show_seats' };

export interface NotRecognized {
  type: 'not_recognized';
}

export const NOT_RECOGNIZED: NotRecognized = { type: 'not_recognized' };

interface Token {
  value: string;
  lower: string;
  /** Offset of the token in the trimmed input */
  start: number;
}

export function tokenizeCommand(text: string): Token[] {
  const tokens: Token[] = [];
  const pattern = /\S+/g;
  let found = pattern.exec(text);
  while (found !== null) {
    tokens.push({ value: found[0], lower: found[0].toLowerCase(), start: found.index });
    found = pattern.exec(text);
  }
  return tokens;
}

/**
 * Text from the given token to the end of the line, original spacing kept
 */
function restFrom(input: string, tokens: readonly Token[], position: number): string {
  const token = tokens[position];
  return token === undefined ? '' : input.slice(token.start).trim();
}

function parseAmount(raw: string): number | null {
  const cleaned = raw.replace(/,/g, '');
  if (!/^\d+$/.test(cleaned)) {
    return null;
  }
  const amount = Number.parseInt(cleaned, 10);
  return amount > 0 && Number.isSafeInteger(amount) ? amount : null;
}

function parseCount(raw: string): number | null {
  if (!/^\d{1,2}$/.test(raw)) {
    return null;
  }
  return Number.parseInt(raw, 10);
}

function parseYesNo(raw: string): boolean | null {
  if (['yes', 'y', 'true', 'on'].includes(raw)) return true;
  if (['no', 'n', 'false', 'off'].includes(raw)) return false;
  return null;
}

function interpretFare(tokens: readonly Token[]): AdminCommand | NotRecognized {
  if (tokens.length !== 3) {
    return NOT_RECOGNIZED;
  }
  const amount = parseAmount(tokens[2].value);
  return amount === null ? NOT_RECOGNIZED : { type: 'set_fare', route: tokens[1].lower, amount };
}

function interpretDate(tokens: readonly Token[]): AdminCommand | NotRecognized {
  const [, action, route, date] = tokens;
  if (action === undefined || route === undefined) {
    return NOT_RECOGNIZED;
  }

  if (action.lower === 'clear' && tokens.length === 3) {
    return { type: 'clear_dates', route: route.lower };
  }
  if (date === undefined || tokens.length !== 4 || !isValidIsoDate(date.value)) {
    return NOT_RECOGNIZED;
  }
  if (action.lower === 'add') {
    return { type: 'add_date', route: route.lower, date: date.value };
  }
  if (action.lower === 'remove') {
    return { type: 'remove_date', route: route.lower, date: date.value };
  }
  return NOT_RECOGNIZED;
}

function interpretReturn(input: string, tokens: readonly Token[]): AdminCommand | NotRecognized {
  const date = tokens[1];
  const description = restFrom(input, tokens, 2);
  if (date === undefined || !isValidIsoDate(date.value) || description.length === 0) {
    return NOT_RECOGNIZED;
  }
  return { type: 'set_return', date: date.value, description };
}

function interpretLuggage(input: string, tokens: readonly Token[], bareNote = true): AdminCommand | NotRecognized {
  const field = tokens[1];
  if (field === undefined) {
    return NOT_RECOGNIZED;
  }
  const value = tokens[2];

  switch (field.lower) {
    case 'bags': {
      const maxBags = value === undefined || tokens.length !== 3 ? null : parseCount(value.value);
      return maxBags === null ? NOT_RECOGNIZED : { type: 'set_luggage_bags', maxBags };
    }
    case 'size':
      return value === undefined || tokens.length !== 3
        ? NOT_RECOGNIZED
        : { type: 'set_luggage_size', bagSize: value.lower };
    case 'carry': {
      const handCarry = value === undefined || tokens.length !== 3 ? null : parseYesNo(value.lower);
      return handCarry === null ? NOT_RECOGNIZED : { type: 'set_luggage_carry', handCarry };
    }
    case 'note': {
      const note = restFrom(input, tokens, 2);
      return note.length === 0 ? NOT_RECOGNIZED : { type: 'set_luggage_note', note };
    }
    default:
      // Bare text after the verb replaces the note
      return bareNote ? { type: 'set_luggage_note', note: restFrom(input, tokens, 1) } : NOT_RECOGNIZED;
  }
}

function interpretLocation(input: string, tokens: readonly Token[]): AdminCommand | NotRecognized {
  const action = tokens[1];
  if (action === undefined) {
    return NOT_RECOGNIZED;
  }
  const rest = restFrom(input, tokens, 2);

  switch (action.lower) {
    case 'status':
      return rest.length === 0 ? NOT_RECOGNIZED : { type: 'set_location_status', status: rest };
    case 'note':
      return rest.length === 0 ? NOT_RECOGNIZED : { type: 'set_location_note', note: rest };
    case 'clear':
      return tokens.length === 2 ? { type: 'clear_locations' } : NOT_RECOGNIZED;
    case 'remove':
      return rest.length === 0 ? NOT_RECOGNIZED : { type: 'remove_location', point: rest };
  }

  // "location <point> | <detail>" allows multi-word points, otherwise the
  // first word is the point
  const body = restFrom(input, tokens, 1);
  const separator = body.indexOf('|');
  if (separator >= 0) {
    const point = body.slice(0, separator).trim();
    const detail = body.slice(separator + 1).trim();
    return point.length === 0 || detail.length === 0
      ? NOT_RECOGNIZED
      : { type: 'upsert_location', point, detail };
  }
  return rest.length === 0 ? NOT_RECOGNIZED : { type: 'upsert_location', point: action.value, detail: rest };
}

function interpretFaq(input: string, tokens: readonly Token[]): AdminCommand | NotRecognized {
  const action = tokens[1];
  if (action === undefined) {
    return NOT_RECOGNIZED;
  }

  switch (action.lower) {
    case 'list':
      return tokens.length === 2 ? { type: 'list_faq' } : NOT_RECOGNIZED;
    case 'remove': {
      const position = tokens.length === 3 ? parseCount(tokens[2].value) : null;
      return position === null || position < 1 ? NOT_RECOGNIZED : { type: 'remove_faq', position };
    }
    case 'add': {
      const body = restFrom(input, tokens, 2);
      const separator = body.indexOf('|');
      if (separator < 0) {
        return NOT_RECOGNIZED;
      }
      const question = body.slice(0, separator).trim();
      const answer = body.slice(separator + 1).trim();
      return question.length === 0 || answer.length === 0
        ? NOT_RECOGNIZED
        : { type: 'add_faq', question, answer };
    }
    default:
      return NOT_RECOGNIZED;
  }
}

/**
 * Interprets one line of admin text. Verbs are case-insensitive; free
 * text arguments keep their original casing.
 */
export function interpret(text: string): AdminCommand | NotRecognized {
  const input = text.trim();
  const tokens = tokenizeCommand(input);
  const verb = tokens[0];
  if (verb === undefined) {
    return NOT_RECOGNIZED;
  }

  switch (verb.lower) {
    case 'admin':
    case '/admin':
    case 'dashboard':
      return tokens.length === 1 ? { type: 'show_menu' } : NOT_RECOGNIZED;
    case 'fare':
      return interpretFare(tokens);
    case 'date':
      return interpretDate(tokens);
    case 'return':
      return interpretReturn(input, tokens);
    case 'luggage':
      return interpretLuggage(input, tokens);
    case 'location':
      return interpretLocation(input, tokens);
    case 'faq':
      return interpretFaq(input, tokens);
    case 'rebuild':
      return tokens.length === 2 && tokens[1].lower === 'kb' ? { type: 'rebuild_kb' } : NOT_RECOGNIZED;
    case 'audit':
      return tokens.length === 1 ? { type: 'show_audit' } : NOT_RECOGNIZED;
    case 'seats':
      return tokens.length === 1 ? { type: 'show_seats' } : NOT_RECOGNIZED;
    default:
      return NOT_RECOGNIZED;
  }
}

export function isRecognized(result: AdminCommand | NotRecognized): result is AdminCommand {
  return result.type !== 'not_recognized';
}

/**
 * Everything except opening the dashboard, which the engine renders itself
 */
export type AdminAction = Exclude<AdminCommand, { type: 'show_menu' }>;

const EDIT_VERBS: Record<EditableSettingKey, string> = {
  fares: 'fare',
  dates: 'date',
  return_service: 'return',
  luggage: 'luggage',
  locations: 'location',
  faq: 'faq',
};

/**
 * While an admin edits one setting the verb may be left out, so
 * "multan 3800" on the fares screen reads as "fare multan 3800".
 * A complete command still wins. The luggage note needs its `note` keyword.
 */
export function interpretEdit(editing: EditableSettingKey, text: string): AdminCommand | NotRecognized {
  const direct = interpret(text);
  if (isRecognized(direct)) {
    return direct;
  }
  const input = `${EDIT_VERBS[editing]} ${text.trim()}`;
  if (editing === 'luggage') {
    // Chat on the luggage screen must not replace the note; "note <text>" does
    return interpretLuggage(input, tokenizeCommand(input), false);
  }
  return interpret(input);
}
