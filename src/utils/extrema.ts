import { compareSamples, type MetricSample, type MetricSeries } from './stage-aggregator.js';

/** Marker for "no sample contributed". Distinct from a measured 0. */
export const NO_DATA = null;

export type ScanDirection = 'above' | 'below';

export interface ExtremaResult {
  /** Highest value for `above`, lowest for `below`. */
  maxValue: number | null;
  maxTime: string | null;
  maxWaypointIndex: number | null;
  thresholdValue: number | null;
  thresholdTime: string | null;
  thresholdWaypointIndex: number | null;
  threshold: number;
  direction: ScanDirection;
  sampleCount: number;
}

export interface JointCrossing {
  time: string;
  timeMs: number;
  waypointIndex: number;
  waypointLabel: string;
  valueA: number;
  valueB: number;
}

const isBetter = (candidate: number, current: number, direction: ScanDirection): boolean =>
  direction === 'above' ? candidate > current : candidate < current;

const meetsThreshold = (value: number, threshold: number, direction: ScanDirection): boolean =>
  direction === 'above' ? value >= threshold : value <= threshold;

/** Groups samples by instant, in chronological order; each group keeps route order. */
export const groupByTimestamp = (samples: readonly MetricSample[]): MetricSample[][] => {
  const sorted = [...samples].sort(compareSamples);
  const groups: MetricSample[][] = [];
  for (const sample of sorted) {
    const last = groups[groups.length - 1];
    if (last && last[0].timeMs === sample.timeMs) {
      last.push(sample);
    } else {
      groups.push([sample]);
    }
  }
  return groups;
};

const localExtreme = (group: readonly MetricSample[], direction: ScanDirection): MetricSample => {
  let best = group[0];
  for (const sample of group.slice(1)) {
    if (isBetter(sample.value, best.value, direction)) {
      best = sample;
    }
  }
  return best;
};

export const findExtrema = (series: MetricSeries, threshold: number, direction: ScanDirection = 'above'): ExtremaResult => {
  const result: ExtremaResult = {
    maxValue: NO_DATA,
    maxTime: null,
    maxWaypointIndex: null,
    thresholdValue: null,
    thresholdTime: null,
    thresholdWaypointIndex: null,
    threshold,
    direction,
    sampleCount: series.samples.length,
  };

  let best: MetricSample | null = null;
  for (const group of groupByTimestamp(series.samples)) {
    const local = localExtreme(group, direction);

    if (best === null || isBetter(local.value, best.value, direction)) {
      best = local;
    }

    if (result.thresholdTime === null && meetsThreshold(local.value, threshold, direction)) {
      result.thresholdValue = local.value;
      result.thresholdTime = local.time;
      result.thresholdWaypointIndex = local.waypointIndex;
    }
  }

  if (best) {
    result.maxValue = best.value;
    result.maxTime = best.time;
    result.maxWaypointIndex = best.waypointIndex;
  }
  return result;
};

/**
 * First instant at which a single waypoint meets both thresholds (each `>=`). Used for
 * conjunctions such as "likely AND heavy" rain, where the two conditions must coincide.
 */
export const findJointCrossing = (
  seriesA: MetricSeries,
  thresholdA: number,
  seriesB: MetricSeries,
  thresholdB: number
): JointCrossing | null => {
  const byKey = new Map<string, MetricSample>();
  for (const sample of seriesB.samples) {
    byKey.set(`${sample.timeMs}|${sample.waypointIndex}`, sample);
  }

  for (const sample of [...seriesA.samples].sort(compareSamples)) {
    if (sample.value < thresholdA) {
      continue;
    }
    const partner = byKey.get(`${sample.timeMs}|${sample.waypointIndex}`);
    if (partner && partner.value >= thresholdB) {
      return {
        time: sample.time,
        timeMs: sample.timeMs,
        waypointIndex: sample.waypointIndex,
        waypointLabel: sample.waypointLabel,
        valueA: sample.value,
        valueB: partner.value,
      };
    }
  }
  return null;
};
