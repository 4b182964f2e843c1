/**
 * Sidereal calendar
 *
 * Converts between Local Sidereal Day indices and Unix time. LSD 0 starts at
 * the configured epoch; each day lasts one sidereal day.
 */

import { config } from '../config/index.js';
import type { UnixSeconds } from '../core/types.js';

export interface SiderealCalendar {
  epoch: UnixSeconds;
  dayLengthSeconds: number;
}

function currentCalendar(): SiderealCalendar {
  return {
    epoch: config.sidereal.epoch,
    dayLengthSeconds: config.sidereal.dayLengthSeconds,
  };
}

/**
 * Unix time at the start of `lsd`
 */
export function lsdToUnix(lsd: number, calendar: SiderealCalendar = currentCalendar()): UnixSeconds {
  return calendar.epoch + lsd * calendar.dayLengthSeconds;
}

/**
 * The LSD containing Unix time `t`
 */
export function unixToLsd(t: UnixSeconds, calendar: SiderealCalendar = currentCalendar()): number {
  return Math.floor((t - calendar.epoch) / calendar.dayLengthSeconds);
}

/**
 * Half-open time window [start, finish) covered by `lsd`
 */
export function lsdWindow(
  lsd: number,
  calendar: SiderealCalendar = currentCalendar()
): { start: UnixSeconds; finish: UnixSeconds } {
  return { start: lsdToUnix(lsd, calendar), finish: lsdToUnix(lsd + 1, calendar) };
}
