import type { FireRiskLookup, ForecastEntry, ForecastProvider, Route, StageForecast, Waypoint } from './forecast.js';
import { runAggregation, type AggregationReport } from './report-engine.js';
import { requiredStageDates, selectReportWindows } from './report-window.js';
import { stageForDate } from './route-catalogue.js';
import type { ThresholdConfig } from './thresholds.js';

export class StageNotFoundError extends Error {
  readonly date: string;

  constructor(date: string) {
    super(`No stage of the route is hiked on ${date}.`);
    this.name = 'StageNotFoundError';
    this.date = date;
  }
}

export interface FireWarning {
  waypointLabel: string;
  warning: string;
}

export interface TrailReport extends AggregationReport {
  routeName: string;
  fireWarnings: FireWarning[];
  /** Labels of waypoints whose forecast could not be fetched. */
  unavailableWaypoints: string[];
}

export interface BuildReportOptions {
  reportType: string;
  referenceDate: string;
  currentHour?: number;
}

export interface ReportService {
  buildReport: (options: BuildReportOptions) => Promise<TrailReport>;
}

interface CreateReportServiceOptions {
  provider: ForecastProvider;
  fireRisk: FireRiskLookup | null;
  route: Route;
  thresholds: ThresholdConfig;
}

const waypointKey = (waypoint: Waypoint): string => `${waypoint.lat},${waypoint.lon}`;

const unique = (values: string[]): string[] => [...new Set(values)];

export const createReportService = ({ provider, fireRisk, route, thresholds }: CreateReportServiceOptions): ReportService => {
  const fetchAll = async (waypoints: Waypoint[]) => {
    const pending = new Map<string, Waypoint>();
    for (const waypoint of waypoints) {
      if (!pending.has(waypointKey(waypoint))) {
        pending.set(waypointKey(waypoint), waypoint);
      }
    }

    const entriesByKey = new Map<string, ForecastEntry[]>();
    const failed = new Set<string>();
    await Promise.all(
      [...pending.entries()].map(async ([key, waypoint]) => {
        try {
          entriesByKey.set(key, await provider.fetchForecast(waypoint.lat, waypoint.lon));
        } catch (error) {
          console.warn(`[Report] Forecast unavailable for ${waypoint.label}:`, error instanceof Error ? error.message : error);
          entriesByKey.set(key, []);
          failed.add(key);
        }
      })
    );
    return { entriesByKey, failed };
  };

  const buildReport = async ({ reportType, referenceDate, currentHour }: BuildReportOptions): Promise<TrailReport> => {
    const windows = selectReportWindows({ reportType, referenceDate, currentHour });
    if (!stageForDate(route, windows.primary.date)) {
      throw new StageNotFoundError(windows.primary.date);
    }

    const resolved = requiredStageDates(windows)
      .map((date) => stageForDate(route, date))
      .filter((stage): stage is NonNullable<typeof stage> => stage !== null);

    const { entriesByKey, failed } = await fetchAll(resolved.flatMap(({ stage }) => stage.waypoints));

    const stages: Record<string, StageForecast> = {};
    for (const { stage, stageIndex, date } of resolved) {
      stages[date] = {
        stageName: stage.name,
        stageIndex,
        date,
        waypoints: stage.waypoints.map((waypoint) => ({
          waypoint,
          entries: entriesByKey.get(waypointKey(waypoint)) ?? [],
        })),
      };
    }

    const report = runAggregation({ stages, reportType, referenceDate, currentHour, thresholds });

    const primaryStage = stages[windows.primary.date];
    const fireWarnings: FireWarning[] = [];
    if (fireRisk && primaryStage) {
      const seen = new Set<string>();
      for (const { waypoint } of primaryStage.waypoints) {
        const warning = fireRisk.warningFor(waypoint.lat, waypoint.lon, windows.primary.date);
        if (warning && !seen.has(warning)) {
          seen.add(warning);
          fireWarnings.push({ waypointLabel: waypoint.label, warning });
        }
      }
    }

    const unavailableWaypoints = unique(
      resolved
        .flatMap(({ stage }) => stage.waypoints)
        .filter((waypoint) => failed.has(waypointKey(waypoint)))
        .map((waypoint) => waypoint.label)
    );

    console.log(
      `[Report] ${report.reportType} report for ${referenceDate}: ${resolved.length} stages, ${unavailableWaypoints.length} waypoints unavailable.`
    );

    return {
      ...report,
      routeName: route.name,
      fireWarnings,
      unavailableWaypoints,
    };
  };

  return { buildReport };
};
