const MS_PER_HOUR = 60 * 60 * 1000;

export const parseIsoTimeToMs = (value: string | null | undefined): number | null => {
  if (typeof value !== 'string' || !value.trim()) {
    return null;
  }

  const trimmed = value.trim();
  const withTimezone = /([zZ]|[+\-]\d{2}:\d{2})$/.test(trimmed);
  const parsed = Date.parse(withTimezone ? trimmed : `${trimmed}Z`);
  return Number.isFinite(parsed) ? parsed : null;
};

export const normalizeUtcIsoTimestamp = (value: string | null | undefined): string | null => {
  if (typeof value !== 'string' || !value.trim()) {
    return null;
  }
  const parsedMs = parseIsoTimeToMs(value);
  if (parsedMs === null) {
    return value;
  }
  return new Date(parsedMs).toISOString();
};

export type TimeInput = string | number | Date;

export const toEpochMs = (value: TimeInput): number | null => {
  if (value instanceof Date) {
    const ms = value.getTime();
    return Number.isNaN(ms) ? null : ms;
  }
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  return parseIsoTimeToMs(value);
};

export const hoursBetweenMs = (fromMs: number, toMs: number): number => (toMs - fromMs) / MS_PER_HOUR;
