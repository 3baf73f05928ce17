import moment from 'moment';
import { TimeRange } from './types';

export const DEFAULT_WINDOW_MINUTES = 5;

const RFC3339_PATTERN = /^(\d{4}-\d{2}-\d{2})[Tt ](\d{2}:\d{2}):(\d{2})(\.\d+)?([Zz]|[+-]\d{2}:\d{2})$/;
const OUTPUT_FORMAT = 'YYYY-MM-DDTHH:mm:ss[Z]';

/**
 * Parse an RFC3339 datetime (e.g. 2024-01-11T15:00:00Z) into a UTC moment.
 * Accepts a lowercase `t`/`z` or a space separator. moment has no leap seconds,
 * so second 60 is read as 59.
 */
export function parseTimestamp(value: string): moment.Moment {
  const match = RFC3339_PATTERN.exec(value.trim());
  if (!match) {
    throw new Error(`Invalid datetime: ${value}. Use RFC3339 format, e.g. 2024-01-11T15:00:00Z`);
  }

  const [, date, hoursMinutes, seconds, fraction = '', zone] = match;
  const normalized = `${date}T${hoursMinutes}:${seconds === '60' ? '59' : seconds}${fraction}${zone.toUpperCase()}`;
  const parsed = moment.utc(normalized, moment.ISO_8601, true);

  if (!parsed.isValid()) {
    throw new Error(`Invalid datetime: ${value}. Use RFC3339 format, e.g. 2024-01-11T15:00:00Z`);
  }

  return parsed;
}

/**
 * Render as RFC3339 UTC with seconds precision. Sub-second digits are dropped.
 */
export function formatTimestamp(time: moment.Moment): string {
  return time.clone().utc().format(OUTPUT_FORMAT);
}

/**
 * Fill in the default trailing window and normalize both ends.
 * Start after end is passed through; the API decides whether the range is valid.
 */
export function resolveTimeRange(
  input: { start?: moment.Moment; end?: moment.Moment },
  now: moment.Moment = moment.utc()
): TimeRange {
  const start = input.start ?? now.clone().subtract(DEFAULT_WINDOW_MINUTES, 'minutes');
  const end = input.end ?? now;

  return {
    startTime: formatTimestamp(start),
    endTime: formatTimestamp(end)
  };
}
