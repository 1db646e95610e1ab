import { interpret, interpretEdit, NOT_RECOGNIZED } from '../handlers/admin.commands';

describe('interpret', () => {
  it.each([
    ['admin', { type: 'show_menu' }],
    ['/ADMIN', { type: 'show_menu' }],
    ['dashboard', { type: 'show_menu' }],
    ['rebuild KB', { type: 'rebuild_kb' }],
    ['audit', { type: 'show_audit' }],
    ['seats', { type: 'show_seats' }],
    ['faq list', { type: 'list_faq' }],
    ['location clear', { type: 'clear_locations' }],
  ])('reads %s', (text, expected) => {
    expect(interpret(text)).toEqual(expected);
  });

  describe('fares', () => {
    it('lowercases the route and accepts thousands separators', () => {
      expect(interpret('fare Multan 3,800')).toEqual({ type: 'set_fare', route: 'multan', amount: 3800 });
    });

    it.each(['fare multan 0', 'fare multan -5', 'fare multan abc', 'fare multan', 'fare dera ghazi 4000'])(
      'rejects %s',
      (text) => {
        expect(interpret(text)).toEqual(NOT_RECOGNIZED);
      }
    );
  });

  describe('dates', () => {
    it('reads add, remove and clear', () => {
      expect(interpret('date add multan 2026-01-10')).toEqual({
        type: 'add_date',
        route: 'multan',
        date: '2026-01-10',
      });
      expect(interpret('date remove Multan 2026-01-03')).toEqual({
        type: 'remove_date',
        route: 'multan',
        date: '2026-01-03',
      });
      expect(interpret('date clear multan')).toEqual({ type: 'clear_dates', route: 'multan' });
    });

    it('rejects impossible calendar dates', () => {
      expect(interpret('date add multan 2026-02-30')).toEqual(NOT_RECOGNIZED);
      expect(interpret('date add multan 10-01-2026')).toEqual(NOT_RECOGNIZED);
    });
  });

  it('keeps the casing of a return description', () => {
    expect(interpret('return 2026-01-18 Sunday 18th January')).toEqual({
      type: 'set_return',
      date: '2026-01-18',
      description: 'Sunday 18th January',
    });
  });

  describe('luggage', () => {
    it('reads bags, size and carry', () => {
      expect(interpret('luggage bags 3')).toEqual({ type: 'set_luggage_bags', maxBags: 3 });
      expect(interpret('luggage size Large')).toEqual({ type: 'set_luggage_size', bagSize: 'large' });
      expect(interpret('luggage carry no')).toEqual({ type: 'set_luggage_carry', handCarry: false });
      expect(interpret('luggage carry ON')).toEqual({ type: 'set_luggage_carry', handCarry: true });
    });

    it('treats other text as the note', () => {
      expect(interpret('luggage note Keep it light')).toEqual({ type: 'set_luggage_note', note: 'Keep it light' });
      expect(interpret('luggage Keep it light')).toEqual({ type: 'set_luggage_note', note: 'Keep it light' });
    });

    it('rejects malformed values', () => {
      expect(interpret('luggage bags 100')).toEqual(NOT_RECOGNIZED);
      expect(interpret('luggage carry maybe')).toEqual(NOT_RECOGNIZED);
      expect(interpret('luggage')).toEqual(NOT_RECOGNIZED);
    });
  });

  describe('locations', () => {
    it('reads a multi-word point before the pipe', () => {
      expect(interpret('location Main Gate | 7am near the fountain')).toEqual({
        type: 'upsert_location',
        point: 'Main Gate',
        detail: '7am near the fountain',
      });
    });

    it('takes the first word as the point without a pipe', () => {
      expect(interpret('location Library 8am sharp')).toEqual({
        type: 'upsert_location',
        point: 'Library',
        detail: '8am sharp',
      });
    });

    it('reads status, note and remove', () => {
      expect(interpret('location status Confirmed')).toEqual({ type: 'set_location_status', status: 'Confirmed' });
      expect(interpret('location note Be on time')).toEqual({ type: 'set_location_note', note: 'Be on time' });
      expect(interpret('location remove Main Gate')).toEqual({ type: 'remove_location', point: 'Main Gate' });
    });
  });

  describe('faq', () => {
    it('splits question and answer on the pipe', () => {
      expect(interpret('faq add Is there wifi? | Yes, on every bus.')).toEqual({
        type: 'add_faq',
        question: 'Is there wifi?',
        answer: 'Yes, on every bus.',
      });
    });

    it('reads one-based positions', () => {
      expect(interpret('faq remove 2')).toEqual({ type: 'remove_faq', position: 2 });
      expect(interpret('faq remove 0')).toEqual(NOT_RECOGNIZED);
    });

    it('needs both halves', () => {
      expect(interpret('faq add Is there wifi?')).toEqual(NOT_RECOGNIZED);
      expect(interpret('faq add | Yes')).toEqual(NOT_RECOGNIZED);
    });
  });

  it.each(['', '   ', 'hello', 'admin please', 'audit now', 'rebuild', 'book'])('does not read %p', (text) => {
    expect(interpret(text)).toEqual(NOT_RECOGNIZED);
  });
});

describe('interpretEdit', () => {
  it('supplies the verb of the setting being edited', () => {
    expect(interpretEdit('fares', 'multan 3800')).toEqual({ type: 'set_fare', route: 'multan', amount: 3800 });
    expect(interpretEdit('dates', 'add multan 2026-01-10')).toEqual({
      type: 'add_date',
      route: 'multan',
      date: '2026-01-10',
    });
    expect(interpretEdit('locations', 'clear')).toEqual({ type: 'clear_locations' });
    expect(interpretEdit('luggage', 'bags 1')).toEqual({ type: 'set_luggage_bags', maxBags: 1 });
  });

  it('lets a complete command win', () => {
    expect(interpretEdit('fares', 'audit')).toEqual({ type: 'show_audit' });
  });

  it('rejects text that fits neither form', () => {
    expect(interpretEdit('fares', 'make it cheaper')).toEqual(NOT_RECOGNIZED);
  });

  it('needs the note keyword to change the luggage note', () => {
    expect(interpretEdit('luggage', 'ok thanks')).toEqual(NOT_RECOGNIZED);
    expect(interpretEdit('luggage', 'note Keep it light')).toEqual({ type: 'set_luggage_note', note: 'Keep it light' });
  });
});
