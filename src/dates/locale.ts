/**
 * Month names and relative-unit stems.
 *
 * Stems are matched as substrings, so a stem inside an ordinary word
 * ("Сегодня" contains "дня") counts as a unit.
 */

import type { DateLocale, RelativeUnit } from './types.js';

/** Unit lookup order for relative dates: the first unit with a matching stem wins. */
export const RELATIVE_UNIT_PRECEDENCE: readonly RelativeUnit[] = ['days', 'hours', 'minutes', 'weeks'];

const RU_GENITIVE_MONTHS: Readonly<Record<string, number>> = {
  января: 1,
  февраля: 2,
  марта: 3,
  апреля: 4,
  мая: 5,
  июня: 6,
  июля: 7,
  августа: 8,
  сентября: 9,
  октября: 10,
  ноября: 11,
  декабря: 12,
};

export const ruLocale: DateLocale = {
  name: 'ru',
  months: RU_GENITIVE_MONTHS,
  units: {
    days: ['день', 'дня', 'дней'],
    hours: ['час'],
    minutes: ['минут'],
    weeks: ['недел'],
  },
};

/**
 * Extend a locale with extra relative-unit stems, keeping its month table
 */
export function withUnitStems(
  base: DateLocale,
  extra: Partial<Record<RelativeUnit, readonly string[]>>,
  name: string
): DateLocale {
  const units: Record<RelativeUnit, readonly string[]> = { ...base.units };
  for (const unit of RELATIVE_UNIT_PRECEDENCE) {
    const stems = extra[unit];
    if (stems) {
      units[unit] = [...base.units[unit], ...stems];
    }
  }
  return { name, months: base.months, units };
}

/** Russian months with Russian and English unit stems ("3 days ago"). */
export const ruEnLocale: DateLocale = withUnitStems(
  ruLocale,
  { days: ['day'], hours: ['hour'], minutes: ['minute'], weeks: ['week'] },
  'ru+en'
);
