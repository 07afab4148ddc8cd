import type { ExtremaResult } from './extrema.js';
import type { AggregationReport } from './report-engine.js';
import { HAZARDS, type ExtremaKey, type Hazard } from './risk-classifier.js';
import { parseIsoTimeToMs } from './time.js';

const HOUR_MS = 60 * 60 * 1000;

export interface DeltaThresholds {
  temperature: number;
  rainAmount: number;
  rainProbability: number;
  windSpeed: number;
  thunderstorm: number;
}

export const DEFAULT_DELTA_THRESHOLDS: Readonly<DeltaThresholds> = Object.freeze({
  temperature: 3,
  rainAmount: 1,
  rainProbability: 10,
  windSpeed: 5,
  thunderstorm: 10,
});

/** Which delta applies to which extrema entry. Gusts share the wind delta. */
const COMPARED_ELEMENTS: ReadonlyArray<[ExtremaKey, keyof DeltaThresholds]> = [
  ['temperatureMax', 'temperature'],
  ['temperatureMin', 'temperature'],
  ['rainAmount', 'rainAmount'],
  ['rainProbability', 'rainProbability'],
  ['windSpeed', 'windSpeed'],
  ['windGust', 'windSpeed'],
  ['thunderstorm', 'thunderstorm'],
  ['thunderstormOutlook', 'thunderstorm'],
];

export type ChangeKind = 'value' | 'thresholdTime' | 'maxTime' | 'risk';

export interface ReportChange {
  element: ExtremaKey | Hazard;
  kind: ChangeKind;
  previous: number | string | boolean | null;
  current: number | string | boolean | null;
}

export interface ComparisonResult {
  significant: boolean;
  reason: 'first_report' | 'significant_changes' | 'no_significant_changes';
  changes: ReportChange[];
}

const shiftedByAnHour = (current: string | null, previous: string | null): boolean => {
  const currentMs = parseIsoTimeToMs(current);
  const previousMs = parseIsoTimeToMs(previous);
  if (currentMs === null || previousMs === null) {
    return false;
  }
  return Math.abs(currentMs - previousMs) >= HOUR_MS;
};

const compareElement = (
  element: ExtremaKey,
  current: ExtremaResult,
  previous: ExtremaResult,
  delta: number
): ReportChange[] => {
  if (delta <= 0) {
    return [];
  }
  const changes: ReportChange[] = [];
  if (current.maxValue !== null && previous.maxValue !== null && Math.abs(current.maxValue - previous.maxValue) >= delta) {
    changes.push({ element, kind: 'value', previous: previous.maxValue, current: current.maxValue });
  }
  if (shiftedByAnHour(current.thresholdTime, previous.thresholdTime)) {
    changes.push({ element, kind: 'thresholdTime', previous: previous.thresholdTime, current: current.thresholdTime });
  }
  if (shiftedByAnHour(current.maxTime, previous.maxTime)) {
    changes.push({ element, kind: 'maxTime', previous: previous.maxTime, current: current.maxTime });
  }
  return changes;
};

export const compareReports = (
  current: AggregationReport,
  previous: AggregationReport | null,
  deltas: DeltaThresholds = DEFAULT_DELTA_THRESHOLDS
): ComparisonResult => {
  if (!previous) {
    return { significant: true, reason: 'first_report', changes: [] };
  }

  const changes: ReportChange[] = COMPARED_ELEMENTS.flatMap(([element, deltaKey]) =>
    compareElement(element, current.extrema[element], previous.extrema[element], deltas[deltaKey])
  );

  for (const hazard of HAZARDS) {
    const now = current.risks[hazard].hasRisk;
    const before = previous.risks[hazard].hasRisk;
    if (now !== before) {
      changes.push({ element: hazard, kind: 'risk', previous: before, current: now });
    }
  }

  return {
    significant: changes.length > 0,
    reason: changes.length > 0 ? 'significant_changes' : 'no_significant_changes',
    changes,
  };
};
