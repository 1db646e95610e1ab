import { BusinessSettings, FaqRow } from '../../types/settings';
import { tokenize } from './tokenizer';
import { KnowledgeBaseIndex, KnowledgeCategory, KnowledgeEntry } from './kb.types';
import {
  bookingHowToAnswer,
  datesAnswer,
  faresAnswer,
  locationPointAnswer,
  locationsAnswer,
  luggageAnswer,
  returnServiceAnswer,
  routeDatesAnswer,
  routeFareAnswer,
} from './faq.answers';

const FARE_KEYWORDS = ['fare', 'fares', 'price', 'prices', 'cost', 'costs', 'ticket', 'tickets', 'pay', 'rupees'];
const DATE_KEYWORDS = ['date', 'dates', 'when', 'schedule', 'departure', 'departures', 'leave', 'leaving', 'day', 'days'];
const RETURN_KEYWORDS = ['return', 'returning', 'back', 'coming'];
const LUGGAGE_KEYWORDS = ['luggage', 'bag', 'bags', 'baggage', 'allowance', 'suitcase', 'carry', 'weight'];
const LOCATION_KEYWORDS = ['location', 'locations', 'pickup', 'drop', 'point', 'points', 'where', 'stop', 'stops'];
const BOOKING_KEYWORDS = ['book', 'booking', 'reserve', 'reservation', 'register'];

function entry(category: KnowledgeCategory, keywords: readonly string[], answer: string): KnowledgeEntry {
  return { keywords: new Set(keywords), answer, category };
}

/**
 * Flattens business settings and FAQ rows into keyword entries.
 * Pure and deterministic: the same input always yields the same entries in
 * the same order, and that order is the match tie-break.
 */
export function buildIndex(
  settings: BusinessSettings,
  faqRows: readonly FaqRow[],
  origin: string
): KnowledgeBaseIndex {
  const entries: KnowledgeEntry[] = [];
  const routes = Object.keys(settings.fares);

  entries.push(entry('fares', FARE_KEYWORDS, faresAnswer(settings, origin)));
  for (const route of routes) {
    entries.push(
      entry('fares', [...FARE_KEYWORDS, ...tokenize(route)], routeFareAnswer(route, settings.fares[route], origin))
    );
  }

  entries.push(entry('dates', DATE_KEYWORDS, datesAnswer(settings)));
  for (const route of routes) {
    entries.push(
      entry('dates', [...DATE_KEYWORDS, ...tokenize(route)], routeDatesAnswer(route, settings.dates[route] ?? []))
    );
  }

  entries.push(entry('return_service', RETURN_KEYWORDS, returnServiceAnswer(settings)));
  entries.push(entry('luggage', LUGGAGE_KEYWORDS, luggageAnswer(settings)));

  entries.push(entry('locations', LOCATION_KEYWORDS, locationsAnswer(settings)));
  for (const { point, detail } of settings.locations.points) {
    entries.push(entry('locations', [...LOCATION_KEYWORDS, ...tokenize(point)], locationPointAnswer(point, detail)));
  }

  entries.push(entry('booking', BOOKING_KEYWORDS, bookingHowToAnswer()));

  for (const row of faqRows) {
    const keywords = [...row.keywords.flatMap(tokenize), ...tokenize(row.question)];
    if (keywords.length > 0) {
      entries.push(entry('faq', keywords, row.answer));
    }
  }

  return { entries };
}

export const EMPTY_INDEX: KnowledgeBaseIndex = { entries: [] };
