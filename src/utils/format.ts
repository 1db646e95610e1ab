/**
 * Rs. amounts with thousands separators (3500 -> "Rs. 3,500")
 */
export function formatAmount(amount: number): string {
  return `Rs. ${amount.toLocaleString('en-US')}`;
}

/**
 * Route ids are stored lowercase; titles are shown capitalised
 */
export function routeLabel(route: string): string {
  return route
    .split(/[\s_-]+/)
    .filter((part) => part.length > 0)
    .map((part) => part.charAt(0).toUpperCase() + part.slice(1))
    .join(' ');
}

export function isValidIsoDate(value: string): boolean {
  if (!/^\d{4}-\d{2}-\d{2}$/.test(value)) {
    return false;
  }
  const parsed = new Date(`${value}T00:00:00Z`);
  return !Number.isNaN(parsed.getTime()) && parsed.toISOString().slice(0, 10) === value;
}

/**
 * "2026-01-03" -> "Sat, Jan 3"
 */
export function formatTravelDate(value: string): string {
  if (!isValidIsoDate(value)) {
    return value;
  }
  return new Date(`${value}T00:00:00Z`).toLocaleDateString('en-US', {
    weekday: 'short',
    month: 'short',
    day: 'numeric',
    timeZone: 'UTC',
  });
}

export function todayIso(now: Date): string {
  return now.toISOString().slice(0, 10);
}

/**
 * Collapses sorted seat numbers into ranges: [1,2,3,5,7,8] -> "1-3, 5, 7-8"
 */
export function formatSeatRanges(seats: readonly number[]): string {
  const parts: string[] = [];
  let start: number | null = null;
  let previous: number | null = null;

  for (const seat of seats) {
    if (start !== null && previous !== null && seat === previous + 1) {
      previous = seat;
      continue;
    }
    if (start !== null && previous !== null) {
      parts.push(start === previous ? `${start}` : `${start}-${previous}`);
    }
    start = seat;
    previous = seat;
  }
  if (start !== null && previous !== null) {
    parts.push(start === previous ? `${start}` : `${start}-${previous}`);
  }

  return parts.join(', ');
}

/**
 * WhatsApp list rows cap titles at 24 characters
 */
export function truncate(text: string, max: number): string {
  return text.length > max ? text.substring(0, max - 3) + '...' : text;
}
