/**
 * Clocks: the single source of "now" for a crawl session
 */

import { DateTime, Info } from 'luxon';
import type { Clock, ParsedDate } from './types.js';

export const DEFAULT_ZONE = 'Europe/Moscow';

function assertZone(zone: string): void {
  if (!Info.isValidIANAZone(zone)) {
    throw new Error(`Unknown time zone: ${zone}`);
  }
}

/**
 * Wall clock in the given IANA zone
 */
export function systemClock(zone: string = DEFAULT_ZONE): Clock {
  assertZone(zone);
  return {
    zone,
    now(): ParsedDate {
      const now = DateTime.now().setZone(zone);
      if (!now.isValid) {
        throw new Error(`Cannot read current time in zone ${zone}: ${now.invalidReason}`);
      }
      return now;
    },
  };
}

/**
 * Clock frozen at one instant, for tests and replays
 */
export function fixedClock(instant: string, zone: string = DEFAULT_ZONE): Clock {
  assertZone(zone);
  const frozen = DateTime.fromISO(instant, { zone });
  if (!frozen.isValid) {
    throw new Error(`Invalid instant for fixed clock: ${instant}`);
  }
  return {
    zone,
    now: () => frozen,
  };
}
