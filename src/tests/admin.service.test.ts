import { MAX_ROUTES, formatAuditLog } from '../services/admin.service';
import { match } from '../services/knowledge/kb.matcher';
import { ADMIN_ID, createHarness, Harness, NOW } from './fakes';

describe('AdminService', () => {
  let harness: Harness;

  beforeEach(async () => {
    harness = await createHarness();
  });

  describe('fares', () => {
    it('updates a fare, logs it and rebuilds the knowledge base', async () => {
      const reply = await harness.admin.execute(ADMIN_ID, { type: 'set_fare', route: 'multan', amount: 3800 }, NOW);

      expect(reply).toBe('✅ *Fare Updated!*\n\nMultan: Rs. 3,500 → Rs. 3,800\n\nChange logged to audit trail.');
      expect(harness.knowledge.current().settings.fares).toEqual({ multan: 3800, bahawalpur: 4200 });

      const result = match('multan fare', harness.knowledge.current().index);
      expect(result.kind === 'answer' && result.entry.answer).toBe(
        'The fare from Campus to Multan is Rs. 3,800 per seat.'
      );

      const audit = await harness.settings.listAudit();
      expect(audit).toHaveLength(1);
      expect(audit[0]).toMatchObject({
        adminId: ADMIN_ID,
        settingKey: 'fares',
        oldValue: '{"multan":3500,"bahawalpur":4200}',
        newValue: '{"multan":3800,"bahawalpur":4200}',
      });
    });

    it('opens a new route with its first fare', async () => {
      const reply = await harness.admin.execute(ADMIN_ID, { type: 'set_fare', route: 'lahore', amount: 5000 }, NOW);

      expect(reply).toBe('✅ *Fare Updated!*\n\nLahore: new route → Rs. 5,000\n\nChange logged to audit trail.');
      expect(Object.keys(harness.knowledge.current().settings.fares)).toEqual(['multan', 'bahawalpur', 'lahore']);
    });

    it('stops opening routes once the route menu is full', async () => {
      for (const route of ['lahore', 'karachi', 'quetta', 'sukkur', 'sialkot', 'peshawar', 'hyderabad']) {
        await harness.admin.execute(ADMIN_ID, { type: 'set_fare', route, amount: 5000 }, NOW);
      }
      expect(Object.keys(harness.knowledge.current().settings.fares)).toHaveLength(MAX_ROUTES);

      const refused = await harness.admin.execute(ADMIN_ID, { type: 'set_fare', route: 'faisalabad', amount: 5000 }, NOW);

      expect(refused).toBe('❌ Faisalabad was not added: at most 9 routes can be offered at once.');
      expect(Object.keys(harness.knowledge.current().settings.fares)).toHaveLength(MAX_ROUTES);
      expect(await harness.settings.listAudit()).toHaveLength(7);

      const updated = await harness.admin.execute(ADMIN_ID, { type: 'set_fare', route: 'lahore', amount: 5500 }, NOW);
      expect(updated).toBe('✅ *Fare Updated!*\n\nLahore: Rs. 5,000 → Rs. 5,500\n\nChange logged to audit trail.');
    });
  });

  describe('dates', () => {
    it('adds a date in sorted order', async () => {
      const reply = await harness.admin.execute(
        ADMIN_ID,
        { type: 'add_date', route: 'multan', date: '2026-01-02' },
        NOW
      );

      expect(reply).toBe(
        '✅ *Dates Updated!*\n\nMultan: 2026-01-02, 2026-01-03, 2026-01-04\n\nChange logged to audit trail.'
      );
    });

    it('refuses dates for a route without a fare', async () => {
      const reply = await harness.admin.execute(
        ADMIN_ID,
        { type: 'add_date', route: 'quetta', date: '2026-01-10' },
        NOW
      );

      expect(reply).toBe(
        '❌ Unknown route "quetta". Known routes: multan, bahawalpur\n\nAdd a fare first: `fare quetta 3500`'
      );
      expect(await harness.settings.listAudit()).toEqual([]);
    });

    it('does not log a date that is already scheduled', async () => {
      const reply = await harness.admin.execute(
        ADMIN_ID,
        { type: 'add_date', route: 'multan', date: '2026-01-03' },
        NOW
      );

      expect(reply).toBe('ℹ️ 2026-01-03 is already scheduled for Multan.');
      expect(await harness.settings.listAudit()).toEqual([]);
    });

    it('removes and clears dates', async () => {
      await harness.admin.execute(ADMIN_ID, { type: 'remove_date', route: 'multan', date: '2026-01-03' }, NOW);
      expect(harness.knowledge.current().settings.dates.multan).toEqual(['2026-01-04']);

      const reply = await harness.admin.execute(ADMIN_ID, { type: 'clear_dates', route: 'multan' }, NOW);
      expect(reply).toBe('✅ *Dates Updated!*\n\nMultan: none\n\nChange logged to audit trail.');
    });
  });

  it('changes one luggage field at a time', async () => {
    const reply = await harness.admin.execute(ADMIN_ID, { type: 'set_luggage_carry', handCarry: false }, NOW);

    expect(reply).toBe(
      '✅ *Luggage Policy Updated!*\n\n' +
        '• Max bags: 2\n• Bag size: medium\n• Hand carry: No\n' +
        '• Note: No extra charges, but large amounts of luggage may need to share your seat space.\n\n' +
        'Change logged to audit trail.'
    );
    expect(harness.knowledge.current().settings.luggage.maxBags).toBe(2);
  });

  it('upserts pickup points case-insensitively', async () => {
    await harness.admin.execute(ADMIN_ID, { type: 'upsert_location', point: 'Main Gate', detail: '7am' }, NOW);
    await harness.admin.execute(ADMIN_ID, { type: 'upsert_location', point: 'main gate', detail: '8am' }, NOW);

    expect(harness.knowledge.current().settings.locations.points).toEqual([{ point: 'Main Gate', detail: '8am' }]);

    const missing = await harness.admin.execute(ADMIN_ID, { type: 'remove_location', point: 'Library' }, NOW);
    expect(missing).toBe('❌ No pickup point named "Library".');
  });

  describe('faq', () => {
    it('adds a row that the matcher can answer from', async () => {
      const reply = await harness.admin.execute(
        ADMIN_ID,
        { type: 'add_faq', question: 'When is checkout?', answer: 'At noon.' },
        NOW
      );

      expect(reply).toBe('✅ *FAQ Added!*\n\n#1: When is checkout?\n\nChange logged to audit trail.');
      const result = match('checkout time', harness.knowledge.current().index);
      expect(result.kind === 'answer' && result.entry.answer).toBe('At noon.');
    });

    it('reports a missing position', async () => {
      const reply = await harness.admin.execute(ADMIN_ID, { type: 'remove_faq', position: 1 }, NOW);

      expect(reply).toBe('❌ No FAQ entry #1. Send `faq list` to see the entries.');
    });

    it('removes by one-based position', async () => {
      await harness.admin.execute(ADMIN_ID, { type: 'add_faq', question: 'First?', answer: 'One.' }, NOW);
      await harness.admin.execute(ADMIN_ID, { type: 'add_faq', question: 'Second?', answer: 'Two.' }, NOW);

      const reply = await harness.admin.execute(ADMIN_ID, { type: 'remove_faq', position: 2 }, NOW);

      expect(reply).toBe('✅ *FAQ Removed!*\n\n#2: Second?\n\nChange logged to audit trail.');
      expect(harness.knowledge.current().faqRows.map((row) => row.question)).toEqual(['First?']);
    });

    it('lists the rows', async () => {
      expect(await harness.admin.execute(ADMIN_ID, { type: 'list_faq' }, NOW)).toBe(
        '📝 *FAQ Entries*\n\nNo custom FAQ entries yet.'
      );
    });
  });

  describe('audit ring', () => {
    it('keeps the ten newest entries, newest first', async () => {
      for (let i = 0; i < 12; i++) {
        await harness.admin.execute(ADMIN_ID, { type: 'set_fare', route: 'multan', amount: 1000 + i }, NOW);
      }

      const audit = await harness.settings.listAudit();

      expect(audit).toHaveLength(10);
      expect(audit[0]?.newValue).toBe('{"multan":1011,"bahawalpur":4200}');
      expect(audit[9]?.newValue).toBe('{"multan":1002,"bahawalpur":4200}');
    });

    it('renders an empty log', async () => {
      expect(await harness.admin.execute(ADMIN_ID, { type: 'show_audit' }, NOW)).toBe(
        '📋 *Audit Log*\n\nNo recent changes recorded.'
      );
    });

    it('masks the admin and shows old and new values', () => {
      const lines = formatAuditLog([
        {
          timestamp: '2026-01-02T09:15:30.000Z',
          adminId: ADMIN_ID,
          settingKey: 'fares',
          oldValue: '{"multan":3500}',
          newValue: '{"multan":3800}',
        },
      ]).split('\n');

      expect(lines[0]).toBe('📋 *Recent Admin Actions*');
      expect(lines.slice(3)).toEqual([
        '🕐 2026-01-02 09:15',
        '👤 Admin: ...4567',
        '📝 fares: {"multan":3500} → {"multan":3800}',
      ]);
    });
  });

  it('summarises seats for upcoming departures', async () => {
    await harness.bookings.create({
      userId: 'test-user',
      route: 'multan',
      travelDate: '2026-01-03',
      passengerName: 'Test Passenger',
      regNumber: '2021234',
      phone: '03001234567',
      seat: 5,
      amount: 3500,
    });

    const reply = await harness.admin.execute(ADMIN_ID, { type: 'show_seats' }, NOW);

    expect(reply).toContain('📅 *Sat, Jan 3* - Multan\n   ✅ Available: 44/45\n   📊 Booked: 1 (2%)');
    expect(reply.endsWith('*TOTAL:* 1 booked, 134 available')).toBe(true);
  });

  it('describes the current value of a setting', () => {
    expect(harness.admin.describe('fares')).toBe(
      '💰 *Current Fares*\n\n• Multan: Rs. 3,500\n• Bahawalpur: Rs. 4,200\n\n' +
        'To update, reply with route and amount:\n`multan 3800`'
    );
  });

  it('reports the rebuilt entry count', async () => {
    expect(await harness.admin.execute(ADMIN_ID, { type: 'rebuild_kb' }, NOW)).toBe(
      '✅ *Knowledge Base Rebuilt!*\n\n10 entries now use the latest settings.'
    );
  });
});
