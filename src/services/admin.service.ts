import logger from '../config/logger';
import { AdminAction } from '../handlers/admin.commands';
import { EditableSettingKey } from '../types/session';
import { AuditEntry, BusinessSettings, Locations, LuggagePolicy, SettingKey } from '../types/settings';
import { formatAmount, formatTravelDate, routeLabel, truncate } from '../utils/format';
import { maskPhone } from '../utils/phoneNormalizer';
import { withTimeout } from '../utils/withTimeout';
import { KnowledgeBase, KnowledgeSnapshot } from './knowledge.service';
import { SeatService } from './seat.service';
import { SettingsStore } from './settings.store';

const DIVIDER = '━━━━━━━━━━━━━━━━━━━━━';
const CHANGE_LOGGED = 'Change logged to audit trail.';
const AUDIT_VALUE_MAX = 80;
// The route menu is a single 10-row list that also carries "Main Menu"
export const MAX_ROUTES = 9;

/**
 * AdminService executes interpreted admin commands. Every settings write is
 * followed by an awaited KB rebuild, so once the reply goes out FAQ answers
 * already reflect the change.
 */
export class AdminService {
  constructor(
    private readonly store: SettingsStore,
    private readonly knowledge: KnowledgeBase,
    private readonly seats: SeatService,
    private readonly timeoutMs: number
  ) {}

  async execute(adminId: string, command: AdminAction, now: Date): Promise<string> {
    logger.info(`Admin command: ${command.type}`, { admin: maskPhone(adminId) });

    switch (command.type) {
      case 'set_fare':
        return this.setFare(adminId, command.route, command.amount);
      case 'add_date':
        return this.addDate(adminId, command.route, command.date);
      case 'remove_date':
        return this.removeDate(adminId, command.route, command.date);
      case 'clear_dates':
        return this.clearDates(adminId, command.route);
      case 'set_return':
        await this.write('return_service', { date: command.date, description: command.description }, adminId);
        return `✅ *Return Service Updated!*\n\nNew date: ${command.date}\nDescription: ${command.description}\n\n${CHANGE_LOGGED}`;
      case 'set_luggage_bags':
        return this.updateLuggage(adminId, (luggage) => ({ ...luggage, maxBags: command.maxBags }));
      case 'set_luggage_size':
        return this.updateLuggage(adminId, (luggage) => ({ ...luggage, bagSize: command.bagSize }));
      case 'set_luggage_carry':
        return this.updateLuggage(adminId, (luggage) => ({ ...luggage, handCarry: command.handCarry }));
      case 'set_luggage_note':
        return this.updateLuggage(adminId, (luggage) => ({ ...luggage, note: command.note }));
      case 'set_location_status':
        return this.updateLocations(adminId, (locations) => ({ ...locations, status: command.status }));
      case 'set_location_note':
        return this.updateLocations(adminId, (locations) => ({ ...locations, note: command.note }));
      case 'clear_locations':
        return this.updateLocations(adminId, (locations) => ({ ...locations, points: [] }));
      case 'remove_location':
        return this.removeLocation(adminId, command.point);
      case 'upsert_location':
        return this.upsertLocation(adminId, command.point, command.detail);
      case 'add_faq':
        return this.addFaq(adminId, command.question, command.answer);
      case 'remove_faq':
        return this.removeFaq(adminId, command.position);
      case 'list_faq':
        return this.listFaq();
      case 'rebuild_kb': {
        const snapshot = await this.rebuild();
        return `✅ *Knowledge Base Rebuilt!*\n\n${snapshot.index.entries.length} entries now use the latest settings.`;
      }
      case 'show_audit':
        return formatAuditLog(await this.bounded(this.store.listAudit(), 'Audit log read'));
      case 'show_seats':
        return this.seatOverview(now);
    }
  }

  /**
   * Current value of a setting plus how to change it, shown when the admin
   * opens it from the dashboard. Read from the live snapshot.
   */
  describe(key: EditableSettingKey): string {
    const { settings, faqRows } = this.knowledge.current();

    switch (key) {
      case 'fares': {
        const lines = Object.entries(settings.fares).map(([route, amount]) => `• ${routeLabel(route)}: ${formatAmount(amount)}`);
        return `💰 *Current Fares*\n\n${lines.join('\n') || '• none'}\n\nTo update, reply with route and amount:\n\`multan 3800\``;
      }
      case 'dates': {
        const lines = Object.keys(settings.fares).map((route) => {
          const dates = settings.dates[route] ?? [];
          return `• ${routeLabel(route)}: ${dates.length > 0 ? dates.join(', ') : 'none'}`;
        });
        return `📅 *Current Dates*\n\n${lines.join('\n')}\n\nTo update, reply:\n\`add multan 2026-01-05\`\n\`remove multan 2026-01-05\`\n\`clear multan\``;
      }
      case 'return_service':
        return `🔄 *Current Return Service*\n\nDate: ${settings.return_service.date}\nDescription: ${settings.return_service.description}\n\nTo update, reply:\n\`2026-01-18 Sunday 18th January\``;
      case 'luggage':
        return `🧳 *Current Luggage Policy*\n\n${luggageSummary(settings.luggage)}\n\nTo update, reply:\n\`bags 2\`\n\`size medium\`\n\`carry yes\`\n\`note Your new policy note\``;
      case 'locations':
        return `📍 *Current Pickup/Drop Locations*\n\n${locationsSummary(settings.locations)}\n\nTo update, reply:\n\`status confirmed\`\n\`note Timings will be shared\`\n\`Main Gate | 7am near the fountain\`\n\`remove Main Gate\`\n\`clear\``;
      case 'faq': {
        const lines = faqRows.map((row, position) => `${position + 1}. ${row.question}`);
        return `📝 *FAQ Entries*\n\n${lines.join('\n') || 'No custom FAQ entries yet.'}\n\nTo update, reply:\n\`add Question? | Answer\`\n\`remove 2\``;
      }
    }
  }

  async seatOverview(now: Date): Promise<string> {
    const { settings } = this.knowledge.current();
    const departures = await this.seats.availability(settings, now);
    if (departures.length === 0) {
      return '💺 *Seats Overview*\n\nNo upcoming trips found.';
    }

    let totalFree = 0;
    let totalBooked = 0;
    const blocks = departures.map(({ route, date, freeSeats, totalSeats }) => {
      const booked = totalSeats - freeSeats.length;
      totalFree += freeSeats.length;
      totalBooked += booked;
      const percent = totalSeats > 0 ? Math.round((booked / totalSeats) * 100) : 0;
      return `📅 *${formatTravelDate(date)}* - ${routeLabel(route)}\n   ✅ Available: ${freeSeats.length}/${totalSeats}\n   📊 Booked: ${booked} (${percent}%)`;
    });

    return `💺 *Seats Overview*\n${DIVIDER}\n\n${blocks.join('\n\n')}\n\n${DIVIDER}\n*TOTAL:* ${totalBooked} booked, ${totalFree} available`;
  }

  private bounded<T>(operation: Promise<T>, label: string): Promise<T> {
    return withTimeout(operation, this.timeoutMs, label);
  }

  private rebuild(): Promise<KnowledgeSnapshot> {
    return this.bounded(this.knowledge.rebuild(), 'Knowledge base rebuild');
  }

  private async write<K extends SettingKey>(key: K, value: BusinessSettings[K], adminId: string): Promise<void> {
    await this.bounded(this.store.put(key, value, adminId), `Settings write (${key})`);
    await this.rebuild();
  }

  private async setFare(adminId: string, route: string, amount: number): Promise<string> {
    const fares = await this.bounded(this.store.get('fares'), 'Settings read (fares)');
    const known = Object.hasOwn(fares, route);
    if (!known && Object.keys(fares).length >= MAX_ROUTES) {
      return `❌ ${routeLabel(route)} was not added: at most ${MAX_ROUTES} routes can be offered at once.`;
    }
    const from = known ? formatAmount(fares[route]) : 'new route';
    await this.write('fares', { ...fares, [route]: amount }, adminId);

    return `✅ *Fare Updated!*\n\n${routeLabel(route)}: ${from} → ${formatAmount(amount)}\n\n${CHANGE_LOGGED}`;
  }

  private async knownRoute(route: string): Promise<string | null> {
    const fares = await this.bounded(this.store.get('fares'), 'Settings read (fares)');
    if (Object.hasOwn(fares, route)) {
      return null;
    }
    const known = Object.keys(fares).join(', ') || 'none';
    return `❌ Unknown route "${route}". Known routes: ${known}\n\nAdd a fare first: \`fare ${route} 3500\``;
  }

  private async addDate(adminId: string, route: string, date: string): Promise<string> {
    const unknown = await this.knownRoute(route);
    if (unknown !== null) {
      return unknown;
    }

    const dates = await this.bounded(this.store.get('dates'), 'Settings read (dates)');
    const current = dates[route] ?? [];
    if (current.includes(date)) {
      return `ℹ️ ${date} is already scheduled for ${routeLabel(route)}.`;
    }
    const next = [...current, date].sort();
    await this.write('dates', { ...dates, [route]: next }, adminId);
    return datesUpdated(route, next);
  }

  private async removeDate(adminId: string, route: string, date: string): Promise<string> {
    const dates = await this.bounded(this.store.get('dates'), 'Settings read (dates)');
    const current = dates[route] ?? [];
    if (!current.includes(date)) {
      return `❌ ${date} is not scheduled for ${routeLabel(route)}.`;
    }
    const next = current.filter((value) => value !== date);
    await this.write('dates', { ...dates, [route]: next }, adminId);
    return datesUpdated(route, next);
  }

  private async clearDates(adminId: string, route: string): Promise<string> {
    const unknown = await this.knownRoute(route);
    if (unknown !== null) {
      return unknown;
    }
    const dates = await this.bounded(this.store.get('dates'), 'Settings read (dates)');
    await this.write('dates', { ...dates, [route]: [] }, adminId);
    return datesUpdated(route, []);
  }

  private async updateLuggage(adminId: string, change: (luggage: LuggagePolicy) => LuggagePolicy): Promise<string> {
    const luggage = change(await this.bounded(this.store.get('luggage'), 'Settings read (luggage)'));
    await this.write('luggage', luggage, adminId);
    return `✅ *Luggage Policy Updated!*\n\n${luggageSummary(luggage)}\n\n${CHANGE_LOGGED}`;
  }

  private async updateLocations(adminId: string, change: (locations: Locations) => Locations): Promise<string> {
    const locations = change(await this.bounded(this.store.get('locations'), 'Settings read (locations)'));
    await this.write('locations', locations, adminId);
    return `✅ *Locations Updated!*\n\n${locationsSummary(locations)}\n\n${CHANGE_LOGGED}`;
  }

  private async removeLocation(adminId: string, point: string): Promise<string> {
    const locations = await this.bounded(this.store.get('locations'), 'Settings read (locations)');
    const wanted = point.toLowerCase();
    if (!locations.points.some((entry) => entry.point.toLowerCase() === wanted)) {
      return `❌ No pickup point named "${point}".`;
    }
    return this.updateLocations(adminId, (current) => ({
      ...current,
      points: current.points.filter((entry) => entry.point.toLowerCase() !== wanted),
    }));
  }

  private upsertLocation(adminId: string, point: string, detail: string): Promise<string> {
    const wanted = point.toLowerCase();
    return this.updateLocations(adminId, (current) => {
      const exists = current.points.some((entry) => entry.point.toLowerCase() === wanted);
      const points = exists
        ? current.points.map((entry) => (entry.point.toLowerCase() === wanted ? { point: entry.point, detail } : entry))
        : [...current.points, { point, detail }];
      return { ...current, points };
    });
  }

  private async addFaq(adminId: string, question: string, answer: string): Promise<string> {
    await this.bounded(this.store.addFaq({ question, answer, keywords: [] }, adminId), 'FAQ write');
    const snapshot = await this.rebuild();
    return `✅ *FAQ Added!*\n\n#${snapshot.faqRows.length}: ${question}\n\n${CHANGE_LOGGED}`;
  }

  private async removeFaq(adminId: string, position: number): Promise<string> {
    const removed = await this.bounded(this.store.removeFaq(position - 1, adminId), 'FAQ write');
    if (removed === null) {
      return `❌ No FAQ entry #${position}. Send \`faq list\` to see the entries.`;
    }
    await this.rebuild();
    return `✅ *FAQ Removed!*\n\n#${position}: ${removed.question}\n\n${CHANGE_LOGGED}`;
  }

  private async listFaq(): Promise<string> {
    const rows = await this.bounded(this.store.listFaq(), 'FAQ read');
    if (rows.length === 0) {
      return '📝 *FAQ Entries*\n\nNo custom FAQ entries yet.';
    }
    const lines = rows.map((row, position) => `${position + 1}. *${row.question}*\n   ${row.answer}`);
    return `📝 *FAQ Entries*\n\n${lines.join('\n\n')}`;
  }
}

function datesUpdated(route: string, dates: readonly string[]): string {
  const listed = dates.length > 0 ? dates.join(', ') : 'none';
  return `✅ *Dates Updated!*\n\n${routeLabel(route)}: ${listed}\n\n${CHANGE_LOGGED}`;
}

function luggageSummary(luggage: LuggagePolicy): string {
  return [
    `• Max bags: ${luggage.maxBags}`,
    `• Bag size: ${luggage.bagSize}`,
    `• Hand carry: ${luggage.handCarry ? 'Yes' : 'No'}`,
    `• Note: ${luggage.note}`,
  ].join('\n');
}

function locationsSummary(locations: Locations): string {
  const points =
    locations.points.length > 0
      ? locations.points.map(({ point, detail }) => `  • ${point}: ${detail}`).join('\n')
      : '  None set';
  return `Status: ${locations.status}\nNote: ${locations.note}\n\nLocations:\n${points}`;
}

export function formatAuditLog(entries: readonly AuditEntry[]): string {
  if (entries.length === 0) {
    return '📋 *Audit Log*\n\nNo recent changes recorded.';
  }

  const blocks = entries.map((entry) =>
    [
      `🕐 ${entry.timestamp.slice(0, 16).replace('T', ' ')}`,
      `👤 Admin: ${maskPhone(entry.adminId)}`,
      `📝 ${entry.settingKey}: ${truncate(entry.oldValue, AUDIT_VALUE_MAX)} → ${truncate(entry.newValue, AUDIT_VALUE_MAX)}`,
    ].join('\n')
  );
  return `📋 *Recent Admin Actions*\n${DIVIDER}\n\n${blocks.join('\n\n')}`;
}
