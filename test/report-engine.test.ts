import { runAggregation } from '../src/utils/report-engine.js';
import { DEFAULT_THRESHOLDS, ThresholdConfigError } from '../src/utils/thresholds.js';
import type { ForecastEntry, StageForecast } from '../src/utils/forecast.js';
import { entryAt, stageForecast, waypointNamed } from './fixtures.js';

const singleWaypointDay = (date: string, entries: ForecastEntry[]): Record<string, StageForecast> => ({
  [date]: stageForecast(date, 'Day stage', [{ waypoint: waypointNamed('A'), entries }]),
});

const morning = (stages: Record<string, StageForecast>) =>
  runAggregation({ stages, reportType: 'morning', referenceDate: '2025-07-28', thresholds: { ...DEFAULT_THRESHOLDS } });

test('likely but light rain is not a rain risk', () => {
  const report = morning(singleWaypointDay('2025-07-28', [entryAt('2025-07-28', 10, { rainProbability: 60, precipitationMm: 1 })]));
  expect(report.rainCrossing).toBeNull();
  expect(report.extrema.rainProbability.thresholdTime).toBe('2025-07-28T10:00+02:00');
  expect(report.risks.rain).toMatchObject({
    status: 'ok',
    hasRisk: false,
    level: 0,
    description: 'Rain: no time with 50% probability and 2 mm/h together',
  });
});

test('likely and heavy rain at the same waypoint and hour is a rain risk', () => {
  const report = morning(singleWaypointDay('2025-07-28', [entryAt('2025-07-28', 10, { rainProbability: 60, precipitationMm: 2.5 })]));
  expect(report.risks.rain).toMatchObject({
    status: 'ok',
    hasRisk: true,
    level: 1,
    label: 'Moderate',
    description: 'Rain: 60% / 2.5 mm/h from 10:00 (A), max 2.5 mm/h',
  });
});

test('heat reports the peak, the first crossing, and a level band', () => {
  const report = morning(
    singleWaypointDay('2025-07-28', [
      entryAt('2025-07-28', 10, { temperatureC: 28 }),
      entryAt('2025-07-28', 13, { temperatureC: 33 }),
    ])
  );
  expect(report.risks.heat).toMatchObject({
    status: 'ok',
    hasRisk: true,
    level: 1,
    label: 'Moderate',
    description: 'Heat: max temperature 33 °C at 13:00 (A), threshold 32 °C from 13:00',
    reasons: ['Max temperature 33 °C at 13:00 (A).', 'Threshold 32 °C first reached at 13:00 (A).'],
    excludedSamples: 0,
  });
  expect(report.risks.cold).toMatchObject({
    hasRisk: false,
    level: 0,
    description: 'Cold: min temperature 28 °C at 10:00 (A), within threshold 0 °C',
  });
});

test('a metric with only implausible samples is unavailable, one with no samples has no data', () => {
  const report = morning(singleWaypointDay('2025-07-28', [entryAt('2025-07-28', 12, { temperatureC: 80 })]));
  expect(report.risks.heat).toMatchObject({
    status: 'unavailable',
    hasRisk: false,
    description: 'Heat: data unavailable (1 implausible sample excluded)',
    excludedSamples: 1,
  });
  expect(report.extrema.temperatureMax.maxValue).toBeNull();
  expect(report.risks.wind).toMatchObject({ status: 'no_data', description: 'Wind: no data' });
});

test('partial exclusions keep the risk and name the exclusion count', () => {
  const report = morning({
    '2025-07-28': stageForecast('2025-07-28', 'Day stage', [
      { waypoint: waypointNamed('A'), entries: [entryAt('2025-07-28', 13, { temperatureC: 33 })] },
      { waypoint: waypointNamed('B'), entries: [entryAt('2025-07-28', 13, { temperatureC: 70 })] },
    ]),
  });
  expect(report.risks.heat.status).toBe('ok');
  expect(report.risks.heat.excludedSamples).toBe(1);
  expect(report.risks.heat.description).toBe(
    'Heat: max temperature 33 °C at 13:00 (A), threshold 32 °C from 13:00 (1 implausible sample excluded)'
  );
});

test('a summer 0 °C reading is excluded and raises no cold risk', () => {
  const report = morning(
    singleWaypointDay('2025-07-28', [
      entryAt('2025-07-28', 10, { temperatureC: 24 }),
      entryAt('2025-07-28', 11, { temperatureC: 0 }),
    ])
  );
  expect(report.extrema.temperatureMin).toMatchObject({ maxValue: 24, thresholdTime: null });
  expect(report.risks.cold).toMatchObject({
    status: 'ok',
    hasRisk: false,
    level: 0,
    description: 'Cold: min temperature 24 °C at 10:00 (A), within threshold 0 °C (1 implausible sample excluded)',
    excludedSamples: 1,
  });
});

test('evening night metrics use only the last waypoint of today while the day uses all of tomorrow', () => {
  const stages: Record<string, StageForecast> = {
    '2025-07-28': stageForecast(
      '2025-07-28',
      'Today',
      [
        { waypoint: waypointNamed('T1'), entries: [entryAt('2025-07-28', 22, { temperatureC: -8 })] },
        { waypoint: waypointNamed('T2'), entries: [entryAt('2025-07-28', 23, { temperatureC: 5 })] },
        {
          waypoint: waypointNamed('T3'),
          entries: [entryAt('2025-07-28', 23, { temperatureC: 2 }), entryAt('2025-07-29', 2, { temperatureC: 1 })],
        },
      ],
      1
    ),
    '2025-07-29': stageForecast(
      '2025-07-29',
      'Tomorrow',
      [
        { waypoint: waypointNamed('M1'), entries: [entryAt('2025-07-29', 12, { temperatureC: 25 })] },
        { waypoint: waypointNamed('M2'), entries: [entryAt('2025-07-29', 14, { temperatureC: 27 })] },
      ],
      2
    ),
  };

  const report = runAggregation({ stages, reportType: 'evening', referenceDate: '2025-07-28', thresholds: { ...DEFAULT_THRESHOLDS } });

  expect(report.stages.night?.waypointLabels).toEqual(['T3']);
  expect(report.stages.night?.waypointIndexes).toEqual([2]);
  expect(report.stages.night?.window).toBe('2025-07-28 22:00-05:00 (+1d)');
  expect(report.stages.primary?.window).toBe('2025-07-29 05:00-17:00');
  expect(report.stages.primary?.waypointLabels).toEqual(['M1', 'M2']);
  expect(report.stages.night?.waypointLabels).not.toEqual(report.stages.primary?.waypointLabels);

  expect(report.extrema.temperatureMin).toMatchObject({
    direction: 'below',
    maxValue: 1,
    maxTime: '2025-07-29T02:00+02:00',
    maxWaypointIndex: 2,
  });
  expect(report.extrema.temperatureMax.maxValue).toBe(27);
  expect(report.extrema.temperatureMax.maxTime).toBe('2025-07-29T14:00+02:00');
  expect(report.risks.cold.description).toBe('Cold: min temperature 1 °C at 02:00 (T3), within threshold 0 °C');

  expect(report.stages.thunderstormOutlook).toBeNull();
  expect(report.risks.thunderstormOutlook.status).toBe('no_data');
});

test('the morning thunderstorm outlook reads the next day stage', () => {
  const report = morning({
    ...singleWaypointDay('2025-07-28', [entryAt('2025-07-28', 10, { thunderstormProbability: 0 })]),
    '2025-07-29': stageForecast('2025-07-29', 'Next', [
      { waypoint: waypointNamed('N1'), entries: [entryAt('2025-07-29', 14, { thunderstormProbability: 30 })] },
    ]),
  });
  expect(report.risks.thunderstorm).toMatchObject({ status: 'ok', hasRisk: false });
  expect(report.risks.thunderstormOutlook).toMatchObject({ status: 'ok', hasRisk: true, level: 1 });
  expect(report.extrema.thunderstormOutlook.thresholdTime).toBe('2025-07-29T14:00+02:00');
});

test('invalid thresholds fail before any aggregation', () => {
  expect(() =>
    runAggregation({
      stages: {},
      reportType: 'morning',
      referenceDate: 'not-a-date',
      thresholds: { ...DEFAULT_THRESHOLDS, windGust: -5 },
    })
  ).toThrow(ThresholdConfigError);
});

test('missing stages and unknown report types still produce a typed report', () => {
  const report = runAggregation({ stages: {}, reportType: 'weekly', referenceDate: '2025-07-28', thresholds: { ...DEFAULT_THRESHOLDS } });
  expect(report.reportType).toBe('morning');
  expect(report.lowConfidence).toBe(true);
  expect(report.stages.primary).toBeNull();
  expect(report.extrema.temperatureMax.maxValue).toBeNull();
  expect(Object.values(report.risks).every((risk) => risk.status === 'no_data')).toBe(true);
});

test('an update after 17:00 has no data for the day', () => {
  const report = runAggregation({
    stages: singleWaypointDay('2025-07-28', [entryAt('2025-07-28', 18, { temperatureC: 35 })]),
    reportType: 'update',
    referenceDate: '2025-07-28',
    currentHour: 18,
    thresholds: { ...DEFAULT_THRESHOLDS },
  });
  expect(report.extrema.temperatureMax.sampleCount).toBe(0);
  expect(report.risks.heat.status).toBe('no_data');
});

test('the same input produces a deep-equal report', () => {
  const stages = singleWaypointDay('2025-07-28', [
    entryAt('2025-07-28', 10, { temperatureC: 20, windGustKmh: 35, rainProbability: 70, precipitationMm: 3 }),
    entryAt('2025-07-28', 11, { temperatureC: 24, windGustKmh: 50, rainProbability: 40, precipitationMm: 0.2 }),
  ]);
  expect(morning(stages)).toEqual(morning(stages));
});
