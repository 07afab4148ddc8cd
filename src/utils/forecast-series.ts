import type { ForecastEntry, Waypoint } from './forecast.js';
import { assertValidWindow, crossesMidnight, isEmptyWindow, type TimeWindow } from './report-window.js';
import { parseIsoTimeToMs, parseWallClock, shiftIsoDate } from './time.js';
import { isThunderstormDescription, roundTo } from './weather.js';

const HOUR_MS = 60 * 60 * 1000;

export interface TimedEntry {
  entry: ForecastEntry;
  timeMs: number;
  date: string;
  hour: number;
  /** mm/h against the previous entry of the full series; 1 h is assumed for the first one. */
  rainRate: number | null;
}

export interface SeriesStatistics {
  minTemp: number | null;
  maxTemp: number | null;
  avgTemp: number | null;
  totalRain: number | null;
  maxRainRate: number | null;
  maxWindSpeed: number | null;
  maxWindGust: number | null;
  thunderstormOccurrences: number;
  sampleCount: number;
}

export interface ForecastSeries {
  readonly waypoint: Waypoint;
  readonly size: number;
  timedEntriesFor: (window: TimeWindow) => TimedEntry[];
  entriesFor: (window: TimeWindow) => ForecastEntry[];
  statisticsFor: (window: TimeWindow) => SeriesStatistics;
}

export const isInWindow = (date: string, hour: number, window: TimeWindow): boolean => {
  if (isEmptyWindow(window)) {
    return false;
  }
  if (!crossesMidnight(window)) {
    return date === window.date && hour >= window.startHour && hour < window.endHour;
  }
  if (date === window.date) {
    return hour >= window.startHour;
  }
  return date === shiftIsoDate(window.date, 1) && hour < window.endHour;
};

const toTimedEntries = (entries: readonly ForecastEntry[]): TimedEntry[] => {
  const timed: Omit<TimedEntry, 'rainRate'>[] = [];
  for (const entry of entries) {
    const timeMs = parseIsoTimeToMs(entry.time);
    const wallClock = parseWallClock(entry.time);
    if (timeMs === null || !wallClock) {
      continue;
    }
    timed.push({ entry, timeMs, date: wallClock.date, hour: wallClock.hour });
  }
  timed.sort((a, b) => a.timeMs - b.timeMs);

  return timed.map((item, index) => {
    const precipitation = item.entry.precipitationMm;
    if (precipitation === null) {
      return { ...item, rainRate: null };
    }
    const previous = index > 0 ? timed[index - 1] : null;
    const gapHours = previous ? (item.timeMs - previous.timeMs) / HOUR_MS : 1;
    return { ...item, rainRate: gapHours > 0 ? precipitation / gapHours : precipitation };
  });
};

const maxOf = (values: number[]): number | null => (values.length > 0 ? Math.max(...values) : null);
const minOf = (values: number[]): number | null => (values.length > 0 ? Math.min(...values) : null);
const numbersOf = (values: Array<number | null>): number[] =>
  values.filter((value): value is number => value !== null && Number.isFinite(value));

export const createForecastSeries = (waypoint: Waypoint, entries: readonly ForecastEntry[]): ForecastSeries => {
  const timed = toTimedEntries(entries);

  const timedEntriesFor = (window: TimeWindow): TimedEntry[] => {
    assertValidWindow(window);
    return timed.filter((item) => isInWindow(item.date, item.hour, window));
  };

  const statisticsFor = (window: TimeWindow): SeriesStatistics => {
    const slice = timedEntriesFor(window);
    const temps = numbersOf(slice.map((item) => item.entry.temperatureC));
    const rain = numbersOf(slice.map((item) => item.entry.precipitationMm));
    const rates = numbersOf(slice.map((item) => item.rainRate));

    return {
      minTemp: minOf(temps),
      maxTemp: maxOf(temps),
      avgTemp: temps.length > 0 ? roundTo(temps.reduce((sum, value) => sum + value, 0) / temps.length, 1) : null,
      totalRain: rain.length > 0 ? roundTo(rain.reduce((sum, value) => sum + value, 0), 2) : null,
      maxRainRate: maxOf(rates),
      maxWindSpeed: maxOf(numbersOf(slice.map((item) => item.entry.windSpeedKmh))),
      maxWindGust: maxOf(numbersOf(slice.map((item) => item.entry.windGustKmh))),
      thunderstormOccurrences: slice.filter((item) => isThunderstormDescription(item.entry.weather)).length,
      sampleCount: slice.length,
    };
  };

  return {
    waypoint,
    size: timed.length,
    timedEntriesFor,
    entriesFor: (window) => timedEntriesFor(window).map((item) => item.entry),
    statisticsFor,
  };
};
