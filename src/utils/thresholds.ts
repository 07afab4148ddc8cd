import { parseWallClock } from './time.js';

export interface ThresholdConfig {
  /** Percent, 0-100. */
  rainProbability: number;
  /** mm per hour. */
  rainAmount: number;
  /** km/h. */
  windSpeed: number;
  /** km/h. */
  windGust: number;
  /** Percent, 0-100. */
  thunderstormProbability: number;
  temperatureMax: number;
  temperatureMin: number;
  /** J/kg. */
  cape: number;
}

export const DEFAULT_THRESHOLDS: Readonly<ThresholdConfig> = Object.freeze({
  rainProbability: 50,
  rainAmount: 2,
  windSpeed: 40,
  windGust: 30,
  thunderstormProbability: 10,
  temperatureMax: 32,
  temperatureMin: 0,
  cape: 1000,
});

export const THRESHOLD_KEYS: ReadonlyArray<keyof ThresholdConfig> = [
  'rainProbability',
  'rainAmount',
  'windSpeed',
  'windGust',
  'thunderstormProbability',
  'temperatureMax',
  'temperatureMin',
  'cape',
];

export class ThresholdConfigError extends Error {
  readonly key: keyof ThresholdConfig;

  constructor(key: keyof ThresholdConfig, message: string) {
    super(message);
    this.name = 'ThresholdConfigError';
    this.key = key;
  }
}

type ThresholdRule = 'percent' | 'nonNegative' | 'finite';

const THRESHOLD_RULES: Record<keyof ThresholdConfig, ThresholdRule> = {
  rainProbability: 'percent',
  rainAmount: 'nonNegative',
  windSpeed: 'nonNegative',
  windGust: 'nonNegative',
  thunderstormProbability: 'percent',
  temperatureMax: 'finite',
  temperatureMin: 'finite',
  cape: 'nonNegative',
};

export const validateThresholdConfig = (config: ThresholdConfig): ThresholdConfig => {
  for (const key of THRESHOLD_KEYS) {
    const value: unknown = config[key];
    if (typeof value !== 'number' || !Number.isFinite(value)) {
      throw new ThresholdConfigError(key, `Threshold "${key}" must be a finite number.`);
    }
    const rule = THRESHOLD_RULES[key];
    if (rule === 'percent' && (value < 0 || value > 100)) {
      throw new ThresholdConfigError(key, `Threshold "${key}" must be between 0 and 100, got ${value}.`);
    }
    if (rule === 'nonNegative' && value < 0) {
      throw new ThresholdConfigError(key, `Threshold "${key}" must not be negative, got ${value}.`);
    }
  }
  return config;
};

export interface PlausibleRange {
  min: number;
  max: number;
}

export const METRICS = [
  'temperature',
  'precipitation',
  'rainProbability',
  'windSpeed',
  'windGust',
  'thunderstormProbability',
  'cape',
] as const;
export type Metric = (typeof METRICS)[number];

export type PlausibilityRanges = Record<Metric, PlausibleRange>;

export const PLAUSIBLE_RANGES: Readonly<PlausibilityRanges> = Object.freeze({
  temperature: { min: -40, max: 50 },
  precipitation: { min: 0, max: 100 },
  rainProbability: { min: 0, max: 100 },
  windSpeed: { min: 0, max: 200 },
  windGust: { min: 0, max: 250 },
  thunderstormProbability: { min: 0, max: 100 },
  cape: { min: 0, max: 10000 },
});

export const isPlausible = (value: number, range: PlausibleRange): boolean =>
  Number.isFinite(value) && value >= range.min && value <= range.max;

/** Months (1-12) in which an exact 0 °C reading is taken at face value. */
export const FREEZING_SEASON_MONTHS: readonly number[] = Object.freeze([12, 1, 2]);

/**
 * Providers emit an exact 0 °C as a placeholder for a missing model value. Outside the
 * freezing season such a reading is rejected; the month comes from the sample's own timestamp.
 */
export const isSeasonalTemperature = (value: number, time: string): boolean => {
  if (value !== 0) {
    return true;
  }
  const parts = parseWallClock(time);
  if (!parts) {
    return true;
  }
  return FREEZING_SEASON_MONTHS.includes(Number(parts.date.slice(5, 7)));
};
