/**
 * Wall-clock access and the timestamp layout used in file names and bodies
 */

import { ClockError } from './errors.js';

/**
 * Returns the current time as epoch milliseconds, fractional part included
 */
export type Clock = () => number;

/**
 * Wall clock read on every call. Whole milliseconds come from `Date.now()`;
 * the high-resolution timer only fills in the sub-millisecond digits.
 */
export const systemClock: Clock = () => {
  const subMillis = Number(process.hrtime.bigint() % 1_000_000n) / 1_000_000;
  return Date.now() + subMillis;
};

function pad(value: number, width = 2): string {
  return String(value).padStart(width, '0');
}

/**
 * Format epoch milliseconds as local `YYYY-MM-DD_HH-MM-SS-ffffff`
 * (six fractional digits: microseconds).
 */
export function formatTimestamp(epochMs: number): string {
  if (!Number.isFinite(epochMs)) {
    throw new ClockError(`Clock returned a non-finite time: ${epochMs}`);
  }

  // Both the calendar fields and the fraction come from the same integer
  const totalMicros = Math.floor(epochMs * 1000);
  const date = new Date(Math.floor(totalMicros / 1000));
  if (Number.isNaN(date.getTime())) {
    throw new ClockError(`Clock returned a time outside the Date range: ${epochMs}`);
  }
  const micros = ((totalMicros % 1_000_000) + 1_000_000) % 1_000_000;

  const day = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}-${pad(date.getMinutes())}-${pad(date.getSeconds())}`;
  return `${day}_${time}-${pad(micros, 6)}`;
}
