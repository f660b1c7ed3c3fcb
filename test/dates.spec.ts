import { describe, it, expect } from 'vitest';
import {
  createDateNormalizer,
  looksLikeDate,
  normalizeDate,
  parseAbsoluteMonth,
  parseNumeric,
  parseRelative,
  ruEnLocale,
  ruLocale,
  sanitizeDateText,
  toArticleDate,
  type StrategyContext,
} from '../src/dates/index.js';
import { testClock } from './helpers.js';

describe('sanitizeDateText', () => {
  it('strips icons and collapses whitespace', () => {
    expect(sanitizeDateText('  📅 27  октября\n2025 ')).toBe('27 октября 2025');
    expect(sanitizeDateText('🕒 3 дня назад')).toBe('3 дня назад');
  });

  it('returns null for empty input', () => {
    expect(sanitizeDateText(null)).toBeNull();
    expect(sanitizeDateText(undefined)).toBeNull();
    expect(sanitizeDateText('')).toBeNull();
    expect(sanitizeDateText(' ⏰ ')).toBeNull();
  });
});

describe('looksLikeDate', () => {
  it.each([
    '27 октября 2025',
    '27 ОКТЯБРЯ 2025',
    '27.10.2025',
    '27/10/2025',
    '2025-10-27',
    '27 октября',
    '3 дня назад',
    '2 часа назад',
    '15 минут назад',
    '1 неделю назад',
  ])('accepts "%s"', (text) => {
    expect(looksLikeDate(text, ruLocale)).toBe(true);
  });

  it.each(['Подпишитесь на рассылку', 'Октябрь 2025', 'вчера', 'Банк России'])('rejects "%s"', (text) => {
    expect(looksLikeDate(text, ruLocale)).toBe(false);
  });

  it('accepts English relative units only with the mixed locale', () => {
    expect(looksLikeDate('3 days ago', ruLocale)).toBe(false);
    expect(looksLikeDate('3 days ago', ruEnLocale)).toBe(true);
  });
});

describe('date strategies', () => {
  const context: StrategyContext = { locale: ruLocale, clock: testClock() };

  describe('parseAbsoluteMonth', () => {
    it('parses day, genitive month and year', () => {
      expect(parseAbsoluteMonth('27 октября 2025', context)?.toISODate()).toBe('2025-10-27');
      expect(parseAbsoluteMonth('Опубликовано 5 Марта 2024 в 10:00', context)?.toISODate()).toBe('2024-03-05');
    });

    it('returns null for impossible dates and unknown months', () => {
      expect(parseAbsoluteMonth('31 февраля 2025', context)).toBeNull();
      expect(parseAbsoluteMonth('5 мартобря 2025', context)).toBeNull();
      expect(parseAbsoluteMonth('27 octobre 2025', context)).toBeNull();
    });

    it('returns dates in the clock zone', () => {
      expect(parseAbsoluteMonth('27 октября 2025', context)?.zoneName).toBe('Europe/Moscow');
    });
  });

  describe('parseRelative', () => {
    it('subtracts the amount from now', () => {
      expect(parseRelative('3 дня назад', context)?.toISODate()).toBe('2025-10-24');
      expect(parseRelative('1 неделю назад', context)?.toISODate()).toBe('2025-10-20');
      expect(parseRelative('2 часа назад', context)?.toISO()).toBe('2025-10-27T10:00:00.000+03:00');
      expect(parseRelative('30 минут назад', context)?.toISO()).toBe('2025-10-27T11:30:00.000+03:00');
    });

    it('prefers days over hours when both appear', () => {
      expect(parseRelative('1 день 5 часов назад', context)?.toISODate()).toBe('2025-10-26');
    });

    it('returns null without a number or a known unit', () => {
      expect(parseRelative('вчера', context)).toBeNull();
      expect(parseRelative('5 лет назад', context)).toBeNull();
    });

    it('reads English units with the mixed locale', () => {
      expect(parseRelative('3 days ago', context)).toBeNull();
      expect(parseRelative('3 days ago', { ...context, locale: ruEnLocale })?.toISODate()).toBe('2025-10-24');
    });
  });

  describe('parseNumeric', () => {
    it('parses DD.MM.YYYY and YYYY-MM-DD', () => {
      expect(parseNumeric('27.10.2025', context)?.toISODate()).toBe('2025-10-27');
      expect(parseNumeric('2025-10-27', context)?.toISODate()).toBe('2025-10-27');
    });

    it('returns null for invalid calendar dates', () => {
      expect(parseNumeric('31.02.2025', context)).toBeNull();
      expect(parseNumeric('2025-02-30', context)).toBeNull();
      expect(parseNumeric('32.01.2025', context)).toBeNull();
    });

    it('falls through to the next format when the first match is invalid', () => {
      expect(parseNumeric('31.02.2025 / 2025-03-01', context)?.toISODate()).toBe('2025-03-01');
    });

    it('does not parse slash dates', () => {
      expect(parseNumeric('27/10/2025', context)).toBeNull();
    });
  });
});

describe('createDateNormalizer', () => {
  const clock = testClock();

  it('normalizes each supported format', () => {
    const normalize = createDateNormalizer({ clock });
    expect(toArticleDate(normalize('27 октября 2025'))).toBe('2025-10-27');
    expect(toArticleDate(normalize('📅 27.10.2025'))).toBe('2025-10-27');
    expect(toArticleDate(normalize('3 дня назад'))).toBe('2025-10-24');
  });

  it('returns null for text that is not a date', () => {
    const normalize = createDateNormalizer({ clock });
    expect(normalize('Подпишитесь на рассылку')).toBeNull();
    expect(normalize('31 февраля 2025')).toBeNull();
    expect(normalize(null)).toBeNull();
    expect(normalize('')).toBeNull();
  });

  it('tries strategies in the configured order', () => {
    const text = '2 дня назад (03.10.2025)';
    expect(normalizeDate(text, { clock })?.toISODate()).toBe('2025-10-25');
    expect(normalizeDate(text, { clock, strategies: ['numeric', 'relative'] })?.toISODate()).toBe('2025-10-03');
  });

  it('only runs the strategies it was given', () => {
    expect(normalizeDate('3 дня назад', { clock, strategies: ['absolute-month'] })).toBeNull();
  });

  it('throws without strategies', () => {
    expect(() => createDateNormalizer({ clock, strategies: [] })).toThrow('at least one strategy');
  });

  it('returns the same result when called twice with the same text', () => {
    const normalize = createDateNormalizer({ clock });
    const texts = [
      '27 октября 2025',
      '27.10.2025',
      '2025-10-27',
      '3 дня назад',
      '2 часа назад',
      'Подпишитесь на рассылку',
      '31 февраля 2025',
    ];

    for (const text of texts) {
      const first = normalize(text)?.toISO() ?? null;
      const second = normalize(text)?.toISO() ?? null;
      expect(second).toEqual(first);
    }
    expect(normalize('3 дня назад')?.toISO()).toBe('2025-10-24T12:00:00.000+03:00');
  });

  it('matches unit stems inside ordinary words', () => {
    // "Сегодня" holds "дня" and "Понедельник" holds "недел"; the relative parser runs before numeric
    expect(normalizeDate('Сегодня, 27.10.2025', { clock })?.toISODate()).toBe('2025-09-30');
    expect(normalizeDate('Понедельник, 27.10.2025', { clock })?.toISODate()).toBe('2025-04-21');
    expect(normalizeDate('Понедельник, 27.10.2025', { clock, strategies: ['numeric'] })?.toISODate()).toBe(
      '2025-10-27'
    );
  });

  it('maps a missing date to a null article date', () => {
    expect(toArticleDate(null)).toBeNull();
  });
});
