import type { ForecastEntry } from '../src/utils/forecast.js';
import { compareReports } from '../src/utils/report-comparator.js';
import { runAggregation } from '../src/utils/report-engine.js';
import { DEFAULT_THRESHOLDS } from '../src/utils/thresholds.js';
import { entryAt, stageForecast, waypointNamed } from './fixtures.js';

const reportFor = (entries: ForecastEntry[]) =>
  runAggregation({
    stages: { '2025-07-28': stageForecast('2025-07-28', 'Day stage', [{ waypoint: waypointNamed('A'), entries }]) },
    reportType: 'morning',
    referenceDate: '2025-07-28',
    thresholds: { ...DEFAULT_THRESHOLDS },
  });

test('the first report is always significant', () => {
  expect(compareReports(reportFor([]), null)).toEqual({ significant: true, reason: 'first_report', changes: [] });
});

test('identical reports are not significant', () => {
  const entries = [entryAt('2025-07-28', 10, { temperatureC: 10 }), entryAt('2025-07-28', 14, { temperatureC: 30 })];
  expect(compareReports(reportFor(entries), reportFor(entries))).toEqual({
    significant: false,
    reason: 'no_significant_changes',
    changes: [],
  });
});

test('a value change at the delta and a new risk are both reported', () => {
  const previous = reportFor([entryAt('2025-07-28', 10, { temperatureC: 10 }), entryAt('2025-07-28', 14, { temperatureC: 30 })]);
  const current = reportFor([entryAt('2025-07-28', 10, { temperatureC: 10 }), entryAt('2025-07-28', 14, { temperatureC: 33 })]);
  expect(compareReports(current, previous)).toEqual({
    significant: true,
    reason: 'significant_changes',
    changes: [
      { element: 'temperatureMax', kind: 'value', previous: 30, current: 33 },
      { element: 'heat', kind: 'risk', previous: false, current: true },
    ],
  });
});

test('a peak moving by an hour is significant unless its delta is disabled', () => {
  const previous = reportFor([entryAt('2025-07-28', 12, { windGustKmh: 20 }), entryAt('2025-07-28', 13, { windGustKmh: 10 })]);
  const current = reportFor([entryAt('2025-07-28', 12, { windGustKmh: 10 }), entryAt('2025-07-28', 13, { windGustKmh: 20 })]);

  expect(compareReports(current, previous).changes).toEqual([
    { element: 'windGust', kind: 'maxTime', previous: '2025-07-28T12:00+02:00', current: '2025-07-28T13:00+02:00' },
  ]);
  expect(
    compareReports(current, previous, { temperature: 3, rainAmount: 1, rainProbability: 10, windSpeed: 0, thunderstorm: 10 }).significant
  ).toBe(false);
});
