const ISO_DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;
const ISO_WALL_CLOCK_PATTERN = /^(\d{4}-\d{2}-\d{2})T(\d{2}):(\d{2})/;
const DAY_MS = 24 * 60 * 60 * 1000;

export const isIsoDate = (value: unknown): value is string => {
  if (typeof value !== 'string' || !ISO_DATE_PATTERN.test(value)) {
    return false;
  }
  const parsed = new Date(`${value}T00:00:00Z`);
  return !Number.isNaN(parsed.getTime()) && parsed.toISOString().slice(0, 10) === value;
};

export const parseIsoTimeToMs = (value: string | null | undefined): number | null => {
  if (typeof value !== 'string' || !value.trim()) {
    return null;
  }

  const trimmed = value.trim();
  const withTimezone = /([zZ]|[+\-]\d{2}:\d{2})$/.test(trimmed);
  const parsed = Date.parse(withTimezone ? trimmed : `${trimmed}Z`);
  return Number.isFinite(parsed) ? parsed : null;
};

export const formatUtcOffset = (offsetSeconds: number): string => {
  if (!Number.isFinite(offsetSeconds) || offsetSeconds === 0) {
    return 'Z';
  }
  const sign = offsetSeconds < 0 ? '-' : '+';
  const totalMinutes = Math.round(Math.abs(offsetSeconds) / 60);
  const hours = Math.floor(totalMinutes / 60);
  const minutes = totalMinutes % 60;
  return `${sign}${String(hours).padStart(2, '0')}:${String(minutes).padStart(2, '0')}`;
};

/**
 * Attaches the provider's UTC offset to a zone-less local timestamp so that it stays
 * comparable as an absolute instant while keeping its wall-clock reading.
 */
export const withExplicitOffset = (value: string | null | undefined, offsetSeconds: number): string | null => {
  if (typeof value !== 'string') {
    return null;
  }
  const trimmed = value.trim();
  if (!trimmed) {
    return null;
  }
  if (/([zZ]|[+\-]\d{2}:\d{2})$/.test(trimmed)) {
    return trimmed;
  }
  const isIsoWithoutZone = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}(?::\d{2})?$/.test(trimmed);
  if (!isIsoWithoutZone) {
    return null;
  }
  return `${trimmed}${formatUtcOffset(offsetSeconds)}`;
};

export interface WallClockParts {
  date: string;
  hour: number;
  minute: number;
}

// Reads the date and hour as written in the timestamp, ignoring any offset.
export const parseWallClock = (isoValue: string | null | undefined): WallClockParts | null => {
  if (typeof isoValue !== 'string') {
    return null;
  }
  const match = isoValue.trim().match(ISO_WALL_CLOCK_PATTERN);
  if (!match) {
    return null;
  }
  const hour = Number(match[2]);
  const minute = Number(match[3]);
  if (hour > 23 || minute > 59) {
    return null;
  }
  return { date: match[1], hour, minute };
};

export const formatClock = (isoValue: string | null | undefined): string | null => {
  const parts = parseWallClock(isoValue);
  if (!parts) {
    return null;
  }
  return `${String(parts.hour).padStart(2, '0')}:${String(parts.minute).padStart(2, '0')}`;
};

export const shiftIsoDate = (isoDate: string, deltaDays: number): string | null => {
  if (!isIsoDate(isoDate)) {
    return null;
  }
  const base = new Date(`${isoDate}T00:00:00Z`);
  base.setUTCDate(base.getUTCDate() + deltaDays);
  return base.toISOString().slice(0, 10);
};

export const daysBetweenIsoDates = (a: string | null | undefined, b: string | null | undefined): number | null => {
  if (!isIsoDate(a) || !isIsoDate(b)) {
    return null;
  }
  const aStamp = Date.parse(`${a}T00:00:00Z`);
  const bStamp = Date.parse(`${b}T00:00:00Z`);
  return Math.round((aStamp - bStamp) / DAY_MS);
};

export const parseHour = (value: string | number | null | undefined): number | null => {
  if (value === null || value === undefined) {
    return null;
  }
  if (typeof value === 'string' && !/^\d{1,2}$/.test(value.trim())) {
    return null;
  }
  const numeric = Number(value);
  return Number.isInteger(numeric) && numeric >= 0 && numeric <= 23 ? numeric : null;
};
