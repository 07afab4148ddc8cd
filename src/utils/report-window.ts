import { isIsoDate, shiftIsoDate } from './time.js';

export const REPORT_TYPES = ['morning', 'evening', 'update'] as const;
export type ReportType = (typeof REPORT_TYPES)[number];

export const DAY_START_HOUR = 5;
export const DAY_END_HOUR = 17;
export const NIGHT_START_HOUR = 22;
export const NIGHT_END_HOUR = 5;

/**
 * Half-open `[startHour, endHour)` window in wall-clock hours. An `endHour` below
 * `startHour` crosses midnight into the following day; `date` is always the start day.
 */
export interface TimeWindow {
  date: string;
  startHour: number;
  endHour: number;
}

export type WaypointScope = 'all' | 'last';

export interface ScopedWindow extends TimeWindow {
  waypointScope: WaypointScope;
}

export interface ReportWindows {
  reportType: ReportType;
  requestedType: string;
  primary: ScopedWindow;
  night: ScopedWindow | null;
  thunderstormOutlook: ScopedWindow;
  lowConfidence: boolean;
}

export class InvalidWindowError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidWindowError';
  }
}

export const isReportType = (value: unknown): value is ReportType =>
  REPORT_TYPES.some((type) => type === value);

const isWallClockHour = (value: number): boolean => Number.isInteger(value) && value >= 0 && value <= 23;

export const assertValidWindow = (window: TimeWindow): void => {
  if (!isIsoDate(window.date)) {
    throw new InvalidWindowError(`Window date must be YYYY-MM-DD, got "${window.date}".`);
  }
  if (!isWallClockHour(window.startHour) || !isWallClockHour(window.endHour)) {
    throw new InvalidWindowError(`Window hours must be integers 0-23, got ${window.startHour}-${window.endHour}.`);
  }
};

export const crossesMidnight = (window: TimeWindow): boolean => window.endHour < window.startHour;

export const isEmptyWindow = (window: TimeWindow): boolean => window.endHour === window.startHour;

export const describeWindow = (window: TimeWindow): string => {
  const pad = (hour: number) => `${String(hour).padStart(2, '0')}:00`;
  return `${window.date} ${pad(window.startHour)}-${pad(window.endHour)}${crossesMidnight(window) ? ' (+1d)' : ''}`;
};

const offsetDate = (referenceDate: string, deltaDays: number): string => {
  const shifted = shiftIsoDate(referenceDate, deltaDays);
  if (!shifted) {
    throw new InvalidWindowError(`Reference date must be YYYY-MM-DD, got "${referenceDate}".`);
  }
  return shifted;
};

const dayWindow = (date: string, startHour: number = DAY_START_HOUR): ScopedWindow => ({
  date,
  startHour,
  endHour: DAY_END_HOUR,
  waypointScope: 'all',
});

interface SelectReportWindowsOptions {
  reportType: string;
  referenceDate: string;
  /** Hour the update report is generated at; only the `update` type reads it. */
  currentHour?: number;
}

export const selectReportWindows = ({ reportType, referenceDate, currentHour }: SelectReportWindowsOptions): ReportWindows => {
  if (!isIsoDate(referenceDate)) {
    throw new InvalidWindowError(`Reference date must be YYYY-MM-DD, got "${referenceDate}".`);
  }
  if (currentHour !== undefined && !isWallClockHour(currentHour)) {
    throw new InvalidWindowError(`Current hour must be an integer 0-23, got ${currentHour}.`);
  }

  const known = isReportType(reportType);
  const resolvedType: ReportType = known ? reportType : 'morning';

  if (resolvedType === 'evening') {
    return {
      reportType: resolvedType,
      requestedType: reportType,
      primary: dayWindow(offsetDate(referenceDate, 1)),
      night: {
        date: referenceDate,
        startHour: NIGHT_START_HOUR,
        endHour: NIGHT_END_HOUR,
        waypointScope: 'last',
      },
      thunderstormOutlook: dayWindow(offsetDate(referenceDate, 2)),
      lowConfidence: false,
    };
  }

  if (resolvedType === 'update') {
    const startHour = Math.min(Math.max(currentHour ?? DAY_START_HOUR, DAY_START_HOUR), DAY_END_HOUR);
    return {
      reportType: resolvedType,
      requestedType: reportType,
      primary: dayWindow(referenceDate, startHour),
      night: null,
      thunderstormOutlook: dayWindow(offsetDate(referenceDate, 1)),
      lowConfidence: false,
    };
  }

  return {
    reportType: resolvedType,
    requestedType: reportType,
    primary: dayWindow(referenceDate),
    night: null,
    thunderstormOutlook: dayWindow(offsetDate(referenceDate, 1)),
    lowConfidence: !known,
  };
};

export const requiredStageDates = (windows: ReportWindows): string[] => {
  const dates = [windows.primary.date, windows.thunderstormOutlook.date];
  if (windows.night) {
    dates.push(windows.night.date);
  }
  return [...new Set(dates)].sort();
};
