/**
 * Schedule arithmetic for the trigger. All times of day are UTC.
 */

import { ValidationError } from '../../types/RefreshErrors';
import { ExpectedWindow } from '../../types/RefreshTypes';
import { minutesOfDay } from '../../utils/timing';

export interface TimeOfDay {
  hours: number;
  minutes: number;
  seconds: number;
}

export interface CutoffPolicy {
  /** HH:MM, start of the window where missing priority files are escalated. */
  cutoffStart: string;
  /** HH:MM, end of that window. */
  cutoffEnd: string;
  /** Minutes after cutoffStart past which the refresh starts without priority files. */
  graceMinutes: number;
}

const TIME_OF_DAY = /^(\d{1,2}):(\d{2})(?::(\d{2}))?$/;

export function parseTimeOfDay(value: string): TimeOfDay {
  const match = TIME_OF_DAY.exec(value.trim());
  if (!match) {
    throw new ValidationError(`Invalid time of day: ${value}`, 'INVALID_TIME_OF_DAY');
  }
  const hours = Number(match[1]);
  const minutes = Number(match[2]);
  const seconds = match[3] ? Number(match[3]) : 0;
  if (hours > 23 || minutes > 59 || seconds > 59) {
    throw new ValidationError(`Invalid time of day: ${value}`, 'INVALID_TIME_OF_DAY');
  }
  return { hours, minutes, seconds };
}

/**
 * Instant of `time` on `date` (YYYY-MM-DD), UTC.
 */
export function atTimeOfDay(date: string, time: string): Date {
  const { hours, minutes, seconds } = parseTimeOfDay(time);
  const [year, month, day] = date.split('-').map(Number);
  return new Date(Date.UTC(year ?? 0, (month ?? 1) - 1, day ?? 1, hours, minutes, seconds));
}

/**
 * Expected start on `date` and expected end `averageRuntimeMinutes` later.
 */
export function computeExpectedWindow(
  date: string,
  expectedStartTime: string,
  averageRuntimeMinutes: number
): ExpectedWindow {
  const expectedStart = atTimeOfDay(date, expectedStartTime);
  const expectedEnd = new Date(expectedStart.getTime() + averageRuntimeMinutes * 60_000);
  return { expectedStart, expectedEnd };
}

function toMinutes(time: string): number {
  const { hours, minutes } = parseTimeOfDay(time);
  return hours * 60 + minutes;
}

/** Past cutoffStart + grace: start without waiting for priority files. */
export function isPastGrace(now: Date, policy: CutoffPolicy): boolean {
  return minutesOfDay(now) >= toMinutes(policy.cutoffStart) + policy.graceMinutes;
}

/** Inside [cutoffStart, cutoffEnd]: outstanding priority files are escalated. */
export function isInCutoffWindow(now: Date, policy: CutoffPolicy): boolean {
  const current = minutesOfDay(now);
  return current >= toMinutes(policy.cutoffStart) && current <= toMinutes(policy.cutoffEnd);
}
