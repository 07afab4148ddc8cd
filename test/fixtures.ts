import { createForecastEntry, type ForecastEntry, type StageForecast, type Waypoint } from '../src/utils/forecast.js';
import type { TimeWindow } from '../src/utils/report-window.js';
import type { MetricSample, MetricSeries } from '../src/utils/stage-aggregator.js';
import { parseIsoTimeToMs } from '../src/utils/time.js';

const pad = (value: number) => String(value).padStart(2, '0');

export const localTime = (date: string, hour: number): string => `${date}T${pad(hour)}:00+02:00`;

export const entryAt = (date: string, hour: number, fields: Partial<Omit<ForecastEntry, 'time'>> = {}): ForecastEntry =>
  createForecastEntry({ time: localTime(date, hour), ...fields });

export const waypointNamed = (label: string, lat: number = 42.3, lon: number = 9.1): Waypoint => ({ lat, lon, label });

export const stageForecast = (
  date: string,
  stageName: string,
  waypoints: Array<{ waypoint: Waypoint; entries: ForecastEntry[] }>,
  stageIndex: number = 0
): StageForecast => ({ stageName, stageIndex, date, waypoints });

export const DAY_WINDOW: TimeWindow = { date: '2025-07-28', startHour: 5, endHour: 17 };

const toMs = (time: string): number => {
  const parsed = parseIsoTimeToMs(time);
  if (parsed === null) {
    throw new Error(`Fixture time is not parseable: ${time}`);
  }
  return parsed;
};

/** Builds a metric series directly from `[hour, value, waypointIndex]` tuples on 2025-07-28. */
export const seriesOf = (points: Array<[number, number, number?]>, window: TimeWindow = DAY_WINDOW): MetricSeries => {
  const samples: MetricSample[] = points.map(([hour, value, waypointIndex = 0]) => {
    const time = localTime('2025-07-28', hour);
    return { time, timeMs: toMs(time), value, waypointIndex, waypointLabel: `WP${waypointIndex}` };
  });
  return {
    metric: 'temperature',
    window,
    samples,
    excluded: [],
    waypointCount: 1,
    contributingWaypoints: [...new Set(samples.map((sample) => sample.waypointIndex))],
  };
};
