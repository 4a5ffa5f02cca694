import dayjs from 'dayjs';
import relativeTime from 'dayjs/plugin/relativeTime';

dayjs.extend(relativeTime);

const SECOND = 1;
const MINUTE = 60 * SECOND;
const HOUR = 60 * MINUTE;
const DAY = 24 * HOUR;

const COMPACT_UNITS: Array<[number, string]> = [
  [DAY, 'd'],
  [HOUR, 'h'],
  [MINUTE, 'm'],
  [SECOND, 's'],
];

const assertSeconds = (seconds: number): void => {
  if (!Number.isFinite(seconds) || seconds < 0) {
    throw new Error(`Duration must be a non-negative finite number of seconds, got ${seconds}`);
  }
};

const pad2 = (value: number): string => value.toString().padStart(2, '0');

/**
 * Length of a new timer: positive values are minutes, anything else is read
 * as a literal number of seconds so very short runs are possible.
 */
export const secondsFromRequest = (requestedMinutes: number): number => {
  if (!Number.isInteger(requestedMinutes)) {
    throw new Error(`Requested duration must be an integer, got ${requestedMinutes}`);
  }
  return requestedMinutes > 0 ? requestedMinutes * MINUTE : Math.abs(requestedMinutes);
};

/** Relative form without a suffix, e.g. `25 minutes` or `a few seconds`. */
export const formatHumanDuration = (seconds: number): string => {
  assertSeconds(seconds);
  const anchor = dayjs(0);
  return anchor.add(seconds, 'second').from(anchor, true);
};

/** Exact multi-unit form, e.g. `24m 50s`. */
export const formatCompactDuration = (seconds: number): string => {
  assertSeconds(seconds);

  let rest = Math.floor(seconds);
  const parts: string[] = [];
  for (const [unitSeconds, suffix] of COMPACT_UNITS) {
    const amount = Math.floor(rest / unitSeconds);
    rest -= amount * unitSeconds;
    if (amount > 0) {
      parts.push(`${amount}${suffix}`);
    }
  }
  return parts.length > 0 ? parts.join(' ') : '0s';
};

/** Fixed-width `HH:MM:SS`; hours grow past two digits when needed. */
export const formatPreciseDuration = (seconds: number): string => {
  assertSeconds(seconds);
  const whole = Math.floor(seconds);
  const hours = Math.floor(whole / HOUR);
  const minutes = Math.floor((whole % HOUR) / MINUTE);
  return `${pad2(hours)}:${pad2(minutes)}:${pad2(whole % MINUTE)}`;
};

export const formatClockTime = (date: Date): string => dayjs(date).format('HH:mm:ss');

/** e.g. `Monday, 19-Oct-2026 at 09:00:00` in local time. */
export const formatLongDate = (date: Date): string => dayjs(date).format('dddd, D-MMM-YYYY [at] HH:mm:ss');
