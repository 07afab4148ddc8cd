import type { ForecastSeries, TimedEntry } from './forecast-series.js';
import type { TimeWindow } from './report-window.js';
import { isPlausible, isSeasonalTemperature, PLAUSIBLE_RANGES, type Metric, type PlausibilityRanges } from './thresholds.js';

export interface MetricSample {
  time: string;
  timeMs: number;
  value: number;
  waypointIndex: number;
  waypointLabel: string;
}

export interface MetricSeries {
  metric: Metric;
  window: TimeWindow;
  samples: MetricSample[];
  /** Samples outside the plausible range or out of season; never scanned. */
  excluded: MetricSample[];
  waypointCount: number;
  contributingWaypoints: number[];
}

export type StageSeries = Record<Metric, MetricSeries>;

/** A forecast series together with its position in the stage's route order. */
export interface IndexedSeries {
  waypointIndex: number;
  series: ForecastSeries;
}

interface AggregateStageOptions {
  plausibility?: PlausibilityRanges;
}

const METRIC_READERS: Record<Metric, (item: TimedEntry) => number | null> = {
  temperature: (item) => item.entry.temperatureC,
  // Hourly rate, so amounts from coarser provider steps stay comparable to the mm/h threshold.
  precipitation: (item) => item.rainRate,
  rainProbability: (item) => item.entry.rainProbability,
  windSpeed: (item) => item.entry.windSpeedKmh,
  windGust: (item) => item.entry.windGustKmh,
  thunderstormProbability: (item) => item.entry.thunderstormProbability,
  cape: (item) => item.entry.capeJkg,
};

export const compareSamples = (a: MetricSample, b: MetricSample): number =>
  a.timeMs - b.timeMs || a.waypointIndex - b.waypointIndex;

/**
 * Accepts either bare series (index = position in the array) or series already tagged
 * with their route index, which is how a single-waypoint scope keeps its position on the stage.
 */
export const indexSeries = (views: ReadonlyArray<ForecastSeries | IndexedSeries>): IndexedSeries[] =>
  views.map((view, position) => ('series' in view ? view : { waypointIndex: position, series: view }));

export const aggregateStage = (
  views: ReadonlyArray<ForecastSeries | IndexedSeries>,
  window: TimeWindow,
  { plausibility = PLAUSIBLE_RANGES }: AggregateStageOptions = {}
): StageSeries => {
  const indexed = indexSeries(views);
  const slices = indexed
    .map(({ waypointIndex, series }) => ({
      waypointIndex,
      label: series.waypoint.label,
      items: series.timedEntriesFor(window),
    }))
    .filter((slice) => slice.items.length > 0);

  const contributingWaypoints = slices.map((slice) => slice.waypointIndex).sort((a, b) => a - b);

  const buildSeries = (metric: Metric): MetricSeries => {
    const read = METRIC_READERS[metric];
    const range = plausibility[metric];
    const samples: MetricSample[] = [];
    const excluded: MetricSample[] = [];

    for (const slice of slices) {
      for (const item of slice.items) {
        const value = read(item);
        if (value === null) {
          continue;
        }
        const sample: MetricSample = {
          time: item.entry.time,
          timeMs: item.timeMs,
          value,
          waypointIndex: slice.waypointIndex,
          waypointLabel: slice.label,
        };
        const plausible =
          isPlausible(value, range) && (metric !== 'temperature' || isSeasonalTemperature(value, sample.time));
        (plausible ? samples : excluded).push(sample);
      }
    }

    samples.sort(compareSamples);
    excluded.sort(compareSamples);

    return {
      metric,
      window: { date: window.date, startHour: window.startHour, endHour: window.endHour },
      samples,
      excluded,
      waypointCount: indexed.length,
      contributingWaypoints,
    };
  };

  return {
    temperature: buildSeries('temperature'),
    precipitation: buildSeries('precipitation'),
    rainProbability: buildSeries('rainProbability'),
    windSpeed: buildSeries('windSpeed'),
    windGust: buildSeries('windGust'),
    thunderstormProbability: buildSeries('thunderstormProbability'),
    cape: buildSeries('cape'),
  };
};
