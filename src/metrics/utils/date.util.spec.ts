import {
  formatDateYYYYMMDD,
  normalizeDate,
  resolveEffectiveInstant,
  subtractDays,
} from './date.util';

describe('date util', () => {
  describe('normalizeDate', () => {
    it.each([
      ['2026-02-11T09:07:10Z', '2026-02-11T09:07:10.000Z'],
      ['2026-02-11T10:07:10+01:00', '2026-02-11T09:07:10.000Z'],
      ['2026-02-11T04:07:10-0500', '2026-02-11T09:07:10.000Z'],
      ['2026-02-11T09:07:10', '2026-02-11T09:07:10.000Z'],
      ['2026-02-11 09:07:10.123456', '2026-02-11T09:07:10.123Z'],
      ['2026-02-11T09:07', '2026-02-11T09:07:00.000Z'],
      ['2026-02-11', '2026-02-11T00:00:00.000Z'],
      ['  2026-02-11T09:07:10Z  ', '2026-02-11T09:07:10.000Z'],
    ])('parses ISO-8601 %s', (raw, expected) => {
      expect(normalizeDate(raw)?.toISOString()).toBe(expected);
    });

    it.each([
      ['Wed, 11 Feb 2026 09:07:10 GMT', '2026-02-11T09:07:10.000Z'],
      ['Wed, 11 Feb 2026 09:07:10 +0000', '2026-02-11T09:07:10.000Z'],
      ['Wed, 11 Feb 2026 04:07:10 -0500', '2026-02-11T09:07:10.000Z'],
      ['Wed, 11 Feb 2026 01:07:10 PST', '2026-02-11T09:07:10.000Z'],
      ['wed, 11 FEB 2026 09:07:10 utc', '2026-02-11T09:07:10.000Z'],
      ['11 Feb 2026 09:07:10', '2026-02-11T09:07:10.000Z'],
      ['Wed, 1 Apr 2026 09:07 GMT', '2026-04-01T09:07:00.000Z'],
      ['Wed, 11 Feb 2026 9:07:10 GMT', '2026-02-11T09:07:10.000Z'],
    ])('parses RFC-822 %s', (raw, expected) => {
      expect(normalizeDate(raw)?.toISOString()).toBe(expected);
    });

    it.each([
      [null],
      [undefined],
      [''],
      ['   '],
      ['yesterday'],
      ['2026-02-30T00:00:00Z'],
      ['2026-02-11T25:00:00Z'],
      ['2026-02-11T09:07:10+25:00'],
      ['Wed, 11 Foo 2026 09:07:10 GMT'],
      ['Wed, 11 Feb 2026 09:07:10 XYZ'],
    ])('returns null for %p', (raw) => {
      expect(normalizeDate(raw)).toBeNull();
    });

    it('round-trips instants through ISO and RFC-822 renderings', () => {
      const instants = [
        new Date('2026-01-01T00:00:00.000Z'),
        new Date('2025-12-31T23:59:59.000Z'),
        new Date('2024-02-29T12:30:45.000Z'),
      ];

      for (const instant of instants) {
        expect(normalizeDate(instant.toISOString())?.getTime()).toBe(
          instant.getTime(),
        );
        expect(normalizeDate(instant.toUTCString())?.getTime()).toBe(
          instant.getTime(),
        );
      }
    });
  });

  describe('resolveEffectiveInstant', () => {
    it('prefers published_at when it parses', () => {
      const instant = resolveEffectiveInstant({
        published_at: 'Wed, 11 Feb 2026 09:07:10 GMT',
        parsed_at: '2026-02-12T00:00:00Z',
      });

      expect(instant?.toISOString()).toBe('2026-02-11T09:07:10.000Z');
    });

    it('falls back to parsed_at when published_at is invalid', () => {
      const instant = resolveEffectiveInstant({
        published_at: 'last week',
        parsed_at: '2026-02-12T00:00:00Z',
      });

      expect(instant?.toISOString()).toBe('2026-02-12T00:00:00.000Z');
    });

    it('returns null when neither date parses', () => {
      expect(
        resolveEffectiveInstant({ published_at: 'soon', parsed_at: '' }),
      ).toBeNull();
      expect(resolveEffectiveInstant({})).toBeNull();
    });
  });

  it('keys days by UTC calendar date', () => {
    const instant = normalizeDate('2026-02-12T01:00:00+02:00');

    expect(instant && formatDateYYYYMMDD(instant)).toBe('2026-02-11');
  });

  it('subtracts whole days', () => {
    const now = new Date('2026-03-01T00:00:00.000Z');

    expect(subtractDays(now, 7).toISOString()).toBe('2026-02-22T00:00:00.000Z');
  });
});
