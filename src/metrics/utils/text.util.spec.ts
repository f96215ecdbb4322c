import { normalizeTitleKey, tokenizeTitle } from './text.util';

describe('text util', () => {
  it('lower-cases and drops words shorter than three letters', () => {
    expect(tokenizeTitle('Cheap Flights To Rome')).toEqual([
      'cheap',
      'flights',
      'rome',
    ]);
  });

  it('drops English function words and travel boilerplate', () => {
    expect(tokenizeTitle('The Best Travel Guide to Lisbon')).toEqual([
      'lisbon',
    ]);
  });

  it('keeps accented letters and drops Spanish stop words', () => {
    expect(tokenizeTitle('Qué ver en Málaga: guía de viaje')).toEqual([
      'ver',
      'málaga',
    ]);
  });

  it('keeps inner apostrophes and normalizes typographic ones', () => {
    expect(tokenizeTitle("Rome's Hidden Cafés")).toEqual([
      "rome's",
      'hidden',
      'cafés',
    ]);
    expect(tokenizeTitle('Rome’s Hidden Cafés')).toEqual([
      "rome's",
      'hidden',
      'cafés',
    ]);
    expect(tokenizeTitle("'Til Dawn in Oslo")).toEqual(['til', 'dawn', 'oslo']);
  });

  it('preserves order and repeats', () => {
    expect(tokenizeTitle('Rome, rome and ROME')).toEqual([
      'rome',
      'rome',
      'rome',
    ]);
  });

  it('accepts a replacement stop-word set', () => {
    expect(tokenizeTitle('Cheap Travel To Rome', new Set(['cheap']))).toEqual([
      'travel',
      'rome',
    ]);
  });

  it('returns no tokens for empty titles', () => {
    expect(tokenizeTitle(null)).toEqual([]);
    expect(tokenizeTitle('')).toEqual([]);
    expect(tokenizeTitle('12 / 34')).toEqual([]);
  });

  it('builds duplicate-title keys from collapsed lower-cased text', () => {
    expect(normalizeTitleKey('  Cheap   Flights\tTo Rome ')).toBe(
      'cheap flights to rome',
    );
    expect(normalizeTitleKey(undefined)).toBe('');
  });
});
