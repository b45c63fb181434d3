/**
 * Study Day
 *
 * A study day starts at the rollover hour (04:00 by default) rather than at
 * midnight, so a late-night session still counts toward the day it began.
 * The clock is explicit: callers pass `now` and the zone offset, nothing
 * here reads the system time.
 */

import { SECONDS_PER_DAY } from "./card-schema";

export interface StudyClock {
  /** Hour of day (0-23) at which the study day rolls over */
  rolloverHour: number;
  /** Offset of local time from UTC in minutes (UTC+2 → 120) */
  utcOffsetMinutes: number;
}

export const DEFAULT_STUDY_CLOCK: StudyClock = {
  rolloverHour: 4,
  utcOffsetMinutes: 0,
};

/**
 * Local offset of the host clock, in the sign convention StudyClock uses.
 */
export function hostUtcOffsetMinutes(date: Date = new Date()): number {
  // getTimezoneOffset is positive west of UTC; `|| 0` drops -0
  return -date.getTimezoneOffset() || 0;
}

/**
 * Seconds since the epoch, shifted so that 00:00 is the rollover instant.
 */
function shifted(now: number, clock: StudyClock): number {
  return now + clock.utcOffsetMinutes * 60 - clock.rolloverHour * 3600;
}

/**
 * Study date for a timestamp, as YYYY-MM-DD.
 */
export function getStudyDate(now: number, clock: StudyClock = DEFAULT_STUDY_CLOCK): string {
  return new Date(shifted(now, clock) * 1000).toISOString().slice(0, 10);
}

/**
 * Epoch seconds of the next rollover strictly after `now`.
 */
export function getNextRollover(now: number, clock: StudyClock = DEFAULT_STUDY_CLOCK): number {
  const local = shifted(now, clock);
  const dayStart = Math.floor(local / SECONDS_PER_DAY) * SECONDS_PER_DAY;
  return now + (dayStart + SECONDS_PER_DAY - local);
}
