import type { FireRiskLookup, ForecastEntry, ForecastProvider, Route } from '../src/utils/forecast.js';
import { StageNotFoundError, createReportService } from '../src/utils/report-service.js';
import { DEFAULT_THRESHOLDS } from '../src/utils/thresholds.js';
import { entryAt } from './fixtures.js';

const route: Route = {
  name: 'Test Loop',
  startDate: '2025-07-28',
  stages: [
    {
      name: 'Day one',
      waypoints: [
        { lat: 42.1, lon: 9.1, label: 'Start' },
        { lat: 42.2, lon: 9.2, label: 'Pass' },
      ],
    },
    {
      name: 'Day two',
      waypoints: [
        { lat: 42.2, lon: 9.2, label: 'Pass' },
        { lat: 42.3, lon: 9.3, label: 'Finish' },
      ],
    },
  ],
};

const forecastsByLat: Record<string, ForecastEntry[]> = {
  '42.1': [entryAt('2025-07-28', 10, { temperatureC: 18 })],
  '42.2': [entryAt('2025-07-28', 12, { temperatureC: 24 }), entryAt('2025-07-29', 13, { thunderstormProbability: 45 })],
  '42.3': [entryAt('2025-07-29', 11, { temperatureC: 21 })],
};

const createFakeProvider = (failingLat: number | null = null) => {
  const requested: string[] = [];
  const provider: ForecastProvider = {
    fetchForecast: async (lat, lon) => {
      requested.push(`${lat},${lon}`);
      if (lat === failingLat) {
        throw new Error('upstream timeout');
      }
      return forecastsByLat[String(lat)] ?? [];
    },
  };
  return { provider, requested };
};

const fireRisk: FireRiskLookup = {
  warningFor: (lat) => (lat < 42.25 ? 'Fire risk HIGH (Test Zone)' : ''),
};

test('morning report fetches each distinct waypoint once and aggregates the stage of the day', async () => {
  const { provider, requested } = createFakeProvider();
  const service = createReportService({ provider, fireRisk, route, thresholds: { ...DEFAULT_THRESHOLDS } });
  const logSpy = jest.spyOn(console, 'log').mockImplementation(() => undefined);

  const report = await service.buildReport({ reportType: 'morning', referenceDate: '2025-07-28' });

  expect([...requested].sort()).toEqual(['42.1,9.1', '42.2,9.2', '42.3,9.3']);
  expect(report.routeName).toBe('Test Loop');
  expect(report.stages.primary?.stageName).toBe('Day one');
  expect(report.extrema.temperatureMax).toMatchObject({ maxValue: 24, maxTime: '2025-07-28T12:00+02:00', maxWaypointIndex: 1 });
  expect(report.extrema.thunderstormOutlook.maxValue).toBe(45);
  expect(report.risks.thunderstormOutlook.level).toBe(2);
  expect(report.fireWarnings).toEqual([{ waypointLabel: 'Start', warning: 'Fire risk HIGH (Test Zone)' }]);
  expect(report.unavailableWaypoints).toEqual([]);
  expect(logSpy).toHaveBeenCalledWith('[Report] morning report for 2025-07-28: 2 stages, 0 waypoints unavailable.');
  logSpy.mockRestore();
});

test('a failing waypoint counts as no data and is listed as unavailable', async () => {
  const { provider } = createFakeProvider(42.2);
  const service = createReportService({ provider, fireRisk: null, route, thresholds: { ...DEFAULT_THRESHOLDS } });
  const warnSpy = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  const logSpy = jest.spyOn(console, 'log').mockImplementation(() => undefined);

  const report = await service.buildReport({ reportType: 'morning', referenceDate: '2025-07-28' });

  expect(report.extrema.temperatureMax).toMatchObject({ maxValue: 18, maxWaypointIndex: 0 });
  expect(report.stages.primary?.contributingWaypoints).toEqual([0]);
  expect(report.unavailableWaypoints).toEqual(['Pass']);
  expect(report.fireWarnings).toEqual([]);
  expect(warnSpy).toHaveBeenCalledWith('[Report] Forecast unavailable for Pass:', 'upstream timeout');
  warnSpy.mockRestore();
  logSpy.mockRestore();
});

test('dates the route does not cover are rejected', async () => {
  const { provider, requested } = createFakeProvider();
  const service = createReportService({ provider, fireRisk, route, thresholds: { ...DEFAULT_THRESHOLDS } });

  await expect(service.buildReport({ reportType: 'morning', referenceDate: '2025-07-27' })).rejects.toBeInstanceOf(StageNotFoundError);
  await expect(service.buildReport({ reportType: 'evening', referenceDate: '2025-07-29' })).rejects.toThrow(
    'No stage of the route is hiked on 2025-07-30.'
  );
  expect(requested).toEqual([]);
});
