export const DEFAULT_TRANSFER_TIME_ZONE = 'UTC';

export interface ZonedTimestamp {
  date: string;
  time: string;
}

const coerceUtcMs = (input: number | string | Date): number | null => {
  if (typeof input === 'number') {
    return Number.isFinite(input) ? input : null;
  }
  if (input instanceof Date) {
    const timestamp = input.getTime();
    return Number.isNaN(timestamp) ? null : timestamp;
  }
  const timestamp = new Date(input).getTime();
  return Number.isNaN(timestamp) ? null : timestamp;
};

export const isValidTimeZone = (timeZone: string): boolean => {
  if (!timeZone.trim()) {
    return false;
  }
  try {
    new Intl.DateTimeFormat('en-US', { timeZone });
    return true;
  } catch (error) {
    if (error instanceof RangeError) {
      return false;
    }
    throw error;
  }
};

const formatterCache = new Map<string, Intl.DateTimeFormat>();

const getFormatter = (timeZone: string): Intl.DateTimeFormat => {
  const cached = formatterCache.get(timeZone);
  if (cached) {
    return cached;
  }
  const formatter = new Intl.DateTimeFormat('en-US', {
    timeZone,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
    hour: '2-digit',
    minute: '2-digit',
    second: '2-digit',
    hourCycle: 'h23',
  });
  formatterCache.set(timeZone, formatter);
  return formatter;
};

/**
 * Wall-clock date (YYYY-MM-DD) and time (HH:mm:ss) of an instant in the given
 * IANA zone. The host's own zone never leaks in.
 */
export const formatZonedTimestamp = (
  input: number | string | Date,
  timeZone: string = DEFAULT_TRANSFER_TIME_ZONE,
): ZonedTimestamp => {
  const utcMs = coerceUtcMs(input);
  if (utcMs === null) {
    throw new RangeError(`Invalid timestamp: ${String(input)}`);
  }

  const parts = getFormatter(timeZone)
    .formatToParts(utcMs)
    .reduce<Record<string, string>>((acc, part) => {
      if (part.type !== 'literal') acc[part.type] = part.value;
      return acc;
    }, {});

  return {
    date: `${parts.year}-${parts.month}-${parts.day}`,
    time: `${parts.hour}:${parts.minute}:${parts.second}`,
  };
};
