import { findExtrema, findJointCrossing, type ExtremaResult, type JointCrossing } from './extrema.js';
import type { StageForecast } from './forecast.js';
import { createForecastSeries } from './forecast-series.js';
import { classifyRisks, type ExtremaKey, type RiskReport } from './risk-classifier.js';
import { describeWindow, selectReportWindows, type ReportType, type ReportWindows, type ScopedWindow } from './report-window.js';
import { aggregateStage, type IndexedSeries, type MetricSeries, type StageSeries } from './stage-aggregator.js';
import { PLAUSIBLE_RANGES, validateThresholdConfig, type PlausibilityRanges, type ThresholdConfig } from './thresholds.js';

export interface WindowStage {
  stageName: string;
  stageIndex: number;
  date: string;
  /** Human-readable hours the stage is read over, e.g. `2025-07-28 22:00-05:00 (+1d)`. */
  window: string;
  /** Labels of the waypoints the window reads, in route order. */
  waypointLabels: string[];
  waypointIndexes: number[];
  contributingWaypoints: number[];
}

export interface AggregationReport {
  reportType: ReportType;
  requestedType: string;
  referenceDate: string;
  lowConfidence: boolean;
  windows: ReportWindows;
  stages: {
    primary: WindowStage | null;
    night: WindowStage | null;
    thunderstormOutlook: WindowStage | null;
  };
  extrema: Record<ExtremaKey, ExtremaResult>;
  rainCrossing: JointCrossing | null;
  risks: RiskReport;
}

export interface RunAggregationOptions {
  /** Already-fetched forecasts keyed by the calendar date the stage is hiked on. */
  stages: Record<string, StageForecast | undefined>;
  reportType: string;
  referenceDate: string;
  currentHour?: number;
  thresholds: ThresholdConfig;
  plausibility?: PlausibilityRanges;
}

interface WindowAggregation {
  stage: WindowStage | null;
  series: StageSeries;
}

const scopedViews = (stage: StageForecast, window: ScopedWindow): IndexedSeries[] => {
  const views = stage.waypoints.map((item, waypointIndex) => ({
    waypointIndex,
    series: createForecastSeries(item.waypoint, item.entries),
  }));
  return window.waypointScope === 'last' ? views.slice(-1) : views;
};

const aggregateWindow = (
  stages: RunAggregationOptions['stages'],
  window: ScopedWindow,
  plausibility: PlausibilityRanges
): WindowAggregation => {
  const stage = stages[window.date];
  if (!stage) {
    return { stage: null, series: aggregateStage([], window, { plausibility }) };
  }

  const views = scopedViews(stage, window);
  const series = aggregateStage(views, window, { plausibility });
  return {
    stage: {
      stageName: stage.stageName,
      stageIndex: stage.stageIndex,
      date: stage.date,
      window: describeWindow(window),
      waypointLabels: views.map((view) => view.series.waypoint.label),
      waypointIndexes: views.map((view) => view.waypointIndex),
      contributingWaypoints: series.temperature.contributingWaypoints,
    },
    series,
  };
};

export const runAggregation = ({
  stages,
  reportType,
  referenceDate,
  currentHour,
  thresholds,
  plausibility = PLAUSIBLE_RANGES,
}: RunAggregationOptions): AggregationReport => {
  validateThresholdConfig(thresholds);
  const windows = selectReportWindows({ reportType, referenceDate, currentHour });

  const primary = aggregateWindow(stages, windows.primary, plausibility);
  const night = windows.night ? aggregateWindow(stages, windows.night, plausibility) : null;
  const outlook = aggregateWindow(stages, windows.thunderstormOutlook, plausibility);

  // Evening reports read the overnight low at the last waypoint; the others use the day window.
  const coldSource = night ? night.series : primary.series;

  const series: Record<ExtremaKey, MetricSeries> = {
    temperatureMax: primary.series.temperature,
    temperatureMin: coldSource.temperature,
    rainProbability: primary.series.rainProbability,
    rainAmount: primary.series.precipitation,
    windSpeed: primary.series.windSpeed,
    windGust: primary.series.windGust,
    thunderstorm: primary.series.thunderstormProbability,
    thunderstormOutlook: outlook.series.thunderstormProbability,
    cape: primary.series.cape,
  };

  const extrema: Record<ExtremaKey, ExtremaResult> = {
    temperatureMax: findExtrema(series.temperatureMax, thresholds.temperatureMax, 'above'),
    temperatureMin: findExtrema(series.temperatureMin, thresholds.temperatureMin, 'below'),
    rainProbability: findExtrema(series.rainProbability, thresholds.rainProbability),
    rainAmount: findExtrema(series.rainAmount, thresholds.rainAmount),
    windSpeed: findExtrema(series.windSpeed, thresholds.windSpeed),
    windGust: findExtrema(series.windGust, thresholds.windGust),
    thunderstorm: findExtrema(series.thunderstorm, thresholds.thunderstormProbability),
    thunderstormOutlook: findExtrema(series.thunderstormOutlook, thresholds.thunderstormProbability),
    cape: findExtrema(series.cape, thresholds.cape),
  };

  const rainCrossing = findJointCrossing(
    series.rainProbability,
    thresholds.rainProbability,
    series.rainAmount,
    thresholds.rainAmount
  );

  return {
    reportType: windows.reportType,
    requestedType: windows.requestedType,
    referenceDate,
    lowConfidence: windows.lowConfidence,
    windows,
    stages: {
      primary: primary.stage,
      night: night ? night.stage : null,
      thunderstormOutlook: outlook.stage,
    },
    extrema,
    rainCrossing,
    risks: classifyRisks({ extrema, series, rainCrossing, thresholds }),
  };
};
