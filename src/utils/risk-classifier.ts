import type { ExtremaResult, JointCrossing } from './extrema.js';
import type { MetricSeries } from './stage-aggregator.js';
import type { ThresholdConfig } from './thresholds.js';
import { formatClock } from './time.js';
import { roundTo } from './weather.js';

export const HAZARDS = ['heat', 'cold', 'rain', 'thunderstorm', 'thunderstormOutlook', 'wind'] as const;
export type Hazard = (typeof HAZARDS)[number];

export type ExtremaKey =
  | 'temperatureMax'
  | 'temperatureMin'
  | 'rainProbability'
  | 'rainAmount'
  | 'windSpeed'
  | 'windGust'
  | 'thunderstorm'
  | 'thunderstormOutlook'
  | 'cape';

export type RiskStatus = 'ok' | 'no_data' | 'unavailable';

export interface RiskResult {
  category: Hazard;
  status: RiskStatus;
  hasRisk: boolean;
  level: number;
  label: string;
  description: string;
  reasons: string[];
  extrema: ExtremaResult | null;
  excludedSamples: number;
}

export type RiskReport = Record<Hazard, RiskResult>;

export interface ClassifyRisksOptions {
  extrema: Record<ExtremaKey, ExtremaResult>;
  series: Record<ExtremaKey, MetricSeries>;
  rainCrossing: JointCrossing | null;
  thresholds: ThresholdConfig;
}

export const RISK_LABELS = ['None', 'Moderate', 'High', 'Very high'];

const TITLES: Record<Hazard, string> = {
  heat: 'Heat',
  cold: 'Cold',
  rain: 'Rain',
  thunderstorm: 'Thunderstorm',
  thunderstormOutlook: 'Thunderstorm outlook',
  wind: 'Wind',
};

const freezeRisk = (risk: RiskResult): RiskResult => Object.freeze(risk);

const excludedSuffix = (count: number): string =>
  count > 0 ? ` (${count} implausible sample${count === 1 ? '' : 's'} excluded)` : '';

export const createUnavailableRiskResult = (
  category: Hazard,
  status: Exclude<RiskStatus, 'ok'> = 'unavailable',
  excludedSamples: number = 0,
  extrema: ExtremaResult | null = null
): RiskResult => {
  const description =
    status === 'no_data'
      ? `${TITLES[category]}: no data`
      : `${TITLES[category]}: data unavailable${excludedSuffix(excludedSamples)}`;
  return freezeRisk({
    category,
    status,
    hasRisk: false,
    level: 0,
    label: RISK_LABELS[0],
    description,
    reasons: [description],
    extrema,
    excludedSamples,
  });
};

const dataStatus = (series: readonly MetricSeries[]): RiskStatus => {
  if (series.some((item) => item.samples.length === 0 && item.excluded.length > 0)) {
    return 'unavailable';
  }
  if (series.some((item) => item.samples.length === 0)) {
    return 'no_data';
  }
  return 'ok';
};

const excludedCount = (series: readonly MetricSeries[]): number =>
  series.reduce((total, item) => total + item.excluded.length, 0);

/** Bands are [moderate, high, very high]; `above` compares with >=, `below` with <=. */
const bandLevel = (value: number, bands: readonly [number, number, number], direction: 'above' | 'below'): number => {
  const meets = (bound: number) => (direction === 'above' ? value >= bound : value <= bound);
  if (meets(bands[2])) return 3;
  if (meets(bands[1])) return 2;
  if (meets(bands[0])) return 1;
  return 0;
};

const at = (time: string | null, label: string | null): string => {
  const clock = formatClock(time) ?? 'unknown time';
  return label ? `${clock} (${label})` : clock;
};

const labelOf = (series: MetricSeries, waypointIndex: number | null): string | null => {
  if (waypointIndex === null) {
    return null;
  }
  const sample = series.samples.find((item) => item.waypointIndex === waypointIndex);
  return sample ? sample.waypointLabel : null;
};

interface SingleMetricRule {
  category: Hazard;
  key: ExtremaKey;
  noun: string;
  unit: string;
  bands: readonly [number, number, number];
}

const SINGLE_METRIC_RULES: Record<Exclude<Hazard, 'rain'>, SingleMetricRule> = {
  heat: {
    category: 'heat',
    key: 'temperatureMax',
    noun: 'max temperature',
    unit: ' °C',
    bands: [30, 35, 40],
  },
  cold: {
    category: 'cold',
    key: 'temperatureMin',
    noun: 'min temperature',
    unit: ' °C',
    bands: [5, 0, -5],
  },
  thunderstorm: {
    category: 'thunderstorm',
    key: 'thunderstorm',
    noun: 'thunderstorm probability',
    unit: '%',
    bands: [20, 40, 60],
  },
  thunderstormOutlook: {
    category: 'thunderstormOutlook',
    key: 'thunderstormOutlook',
    noun: 'thunderstorm probability',
    unit: '%',
    bands: [20, 40, 60],
  },
  wind: {
    category: 'wind',
    key: 'windGust',
    noun: 'max gust',
    unit: ' km/h',
    bands: [40, 60, 80],
  },
};

const classifySingleMetric = (rule: SingleMetricRule, { extrema, series }: ClassifyRisksOptions): RiskResult => {
  const result = extrema[rule.key];
  const metricSeries = series[rule.key];
  const excluded = excludedCount([metricSeries]);
  const status = dataStatus([metricSeries]);
  if (status !== 'ok' || result.maxValue === null) {
    return createUnavailableRiskResult(rule.category, status === 'ok' ? 'no_data' : status, excluded, result);
  }

  const value = roundTo(result.maxValue, 1);
  const hasRisk = result.thresholdTime !== null;
  const level = hasRisk ? Math.max(1, bandLevel(result.maxValue, rule.bands, result.direction)) : 0;
  const peak = `${rule.noun} ${value}${rule.unit} at ${at(result.maxTime, labelOf(metricSeries, result.maxWaypointIndex))}`;
  const reasons = [`${peak[0].toUpperCase()}${peak.slice(1)}.`];
  if (hasRisk) {
    reasons.push(
      `Threshold ${result.threshold}${rule.unit} first reached at ${at(
        result.thresholdTime,
        labelOf(metricSeries, result.thresholdWaypointIndex)
      )}.`
    );
  }

  const description = hasRisk
    ? `${TITLES[rule.category]}: ${peak}, threshold ${result.threshold}${rule.unit} from ${formatClock(result.thresholdTime)}${excludedSuffix(excluded)}`
    : `${TITLES[rule.category]}: ${peak}, within threshold ${result.threshold}${rule.unit}${excludedSuffix(excluded)}`;

  return freezeRisk({
    category: rule.category,
    status: 'ok',
    hasRisk,
    level,
    label: RISK_LABELS[level],
    description,
    reasons,
    extrema: result,
    excludedSamples: excluded,
  });
};

const RAIN_AMOUNT_BANDS: readonly [number, number, number] = [2, 5, 10];

const classifyRain = ({ extrema, series, rainCrossing, thresholds }: ClassifyRisksOptions): RiskResult => {
  const involved = [series.rainProbability, series.rainAmount];
  const excluded = excludedCount(involved);
  const status = dataStatus(involved);
  const amount = extrema.rainAmount;
  if (status !== 'ok' || amount.maxValue === null) {
    return createUnavailableRiskResult('rain', status === 'ok' ? 'no_data' : status, excluded, amount);
  }

  const probability = extrema.rainProbability;
  const peakAmount = roundTo(amount.maxValue, 1);
  const peakProbability = probability.maxValue === null ? null : roundTo(probability.maxValue, 1);
  const reasons = [
    `Max rain ${peakAmount} mm/h at ${at(amount.maxTime, labelOf(series.rainAmount, amount.maxWaypointIndex))}.`,
    `Max rain probability ${peakProbability ?? 'n/a'}% at ${at(
      probability.maxTime,
      labelOf(series.rainProbability, probability.maxWaypointIndex)
    )}.`,
  ];

  if (!rainCrossing) {
    return freezeRisk({
      category: 'rain',
      status: 'ok',
      hasRisk: false,
      level: 0,
      label: RISK_LABELS[0],
      description: `Rain: no time with ${thresholds.rainProbability}% probability and ${thresholds.rainAmount} mm/h together${excludedSuffix(excluded)}`,
      reasons,
      extrema: amount,
      excludedSamples: excluded,
    });
  }

  const level = Math.max(1, bandLevel(amount.maxValue, RAIN_AMOUNT_BANDS, 'above'));
  reasons.push(
    `${rainCrossing.valueA}% and ${roundTo(rainCrossing.valueB, 1)} mm/h together at ${at(rainCrossing.time, rainCrossing.waypointLabel)}.`
  );
  return freezeRisk({
    category: 'rain',
    status: 'ok',
    hasRisk: true,
    level,
    label: RISK_LABELS[level],
    description: `Rain: ${rainCrossing.valueA}% / ${roundTo(rainCrossing.valueB, 1)} mm/h from ${at(
      rainCrossing.time,
      rainCrossing.waypointLabel
    )}, max ${peakAmount} mm/h${excludedSuffix(excluded)}`,
    reasons,
    extrema: amount,
    excludedSamples: excluded,
  });
};

const guarded = (category: Hazard, build: () => RiskResult): RiskResult => {
  try {
    return build();
  } catch (error) {
    console.error(`[Risk] Failed to classify ${category}:`, error);
    return createUnavailableRiskResult(category, 'unavailable');
  }
};

export const classifyRisks = (options: ClassifyRisksOptions): RiskReport => ({
  heat: guarded('heat', () => classifySingleMetric(SINGLE_METRIC_RULES.heat, options)),
  cold: guarded('cold', () => classifySingleMetric(SINGLE_METRIC_RULES.cold, options)),
  rain: guarded('rain', () => classifyRain(options)),
  thunderstorm: guarded('thunderstorm', () => classifySingleMetric(SINGLE_METRIC_RULES.thunderstorm, options)),
  thunderstormOutlook: guarded('thunderstormOutlook', () =>
    classifySingleMetric(SINGLE_METRIC_RULES.thunderstormOutlook, options)
  ),
  wind: guarded('wind', () => classifySingleMetric(SINGLE_METRIC_RULES.wind, options)),
});
