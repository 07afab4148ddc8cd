import dotenv from 'dotenv';
import path from 'node:path';
import { DEFAULT_THRESHOLDS, type ThresholdConfig } from '../utils/thresholds.js';

dotenv.config();

const parsePositiveInt = (rawValue: string | undefined, fallback: number): number => {
  const parsed = Number(rawValue);
  return Number.isFinite(parsed) && parsed > 0 ? Math.round(parsed) : fallback;
};

const parseFiniteFloat = (rawValue: string | undefined, fallback: number): number => {
  if (rawValue === undefined || rawValue.trim() === '') {
    return fallback;
  }
  const parsed = Number(rawValue);
  return Number.isFinite(parsed) ? parsed : fallback;
};

const resolveDataFile = (rawValue: string | undefined, fallbackName: string): string =>
  rawValue && rawValue.trim() ? path.resolve(rawValue.trim()) : path.resolve(process.cwd(), 'data', fallbackName);

export const PORT = process.env.PORT || 3001;
export const IS_PRODUCTION = process.env.NODE_ENV === 'production';

export const REQUEST_TIMEOUT_MS = parsePositiveInt(process.env.REQUEST_TIMEOUT_MS, 12000);
export const RATE_LIMIT_WINDOW_MS = parsePositiveInt(process.env.RATE_LIMIT_WINDOW_MS, 15 * 60 * 1000);
export const RATE_LIMIT_MAX_REQUESTS = parsePositiveInt(process.env.RATE_LIMIT_MAX_REQUESTS, 300);
export const FORECAST_DAYS = Math.min(parsePositiveInt(process.env.FORECAST_DAYS, 4), 16);

export const CORS_ALLOWLIST = (process.env.CORS_ORIGIN || '')
  .split(',')
  .map((origin) => origin.trim())
  .filter(Boolean);

export const ROUTE_FILE = resolveDataFile(process.env.ROUTE_FILE, 'route.json');
export const FIRE_ZONES_FILE = resolveDataFile(process.env.FIRE_ZONES_FILE, 'fire-zones.json');
export const FIRE_LEVELS_FILE = resolveDataFile(process.env.FIRE_LEVELS_FILE, 'fire-levels.json');

export const readThresholdsFromEnv = (env: NodeJS.ProcessEnv = process.env): ThresholdConfig => ({
  rainProbability: parseFiniteFloat(env.THRESHOLD_RAIN_PROBABILITY, DEFAULT_THRESHOLDS.rainProbability),
  rainAmount: parseFiniteFloat(env.THRESHOLD_RAIN_AMOUNT, DEFAULT_THRESHOLDS.rainAmount),
  windSpeed: parseFiniteFloat(env.THRESHOLD_WIND_SPEED, DEFAULT_THRESHOLDS.windSpeed),
  windGust: parseFiniteFloat(env.THRESHOLD_WIND_GUST, DEFAULT_THRESHOLDS.windGust),
  thunderstormProbability: parseFiniteFloat(env.THRESHOLD_THUNDERSTORM_PROBABILITY, DEFAULT_THRESHOLDS.thunderstormProbability),
  temperatureMax: parseFiniteFloat(env.THRESHOLD_TEMPERATURE_MAX, DEFAULT_THRESHOLDS.temperatureMax),
  temperatureMin: parseFiniteFloat(env.THRESHOLD_TEMPERATURE_MIN, DEFAULT_THRESHOLDS.temperatureMin),
  cape: parseFiniteFloat(env.THRESHOLD_CAPE, DEFAULT_THRESHOLDS.cape),
});

export const THRESHOLDS = readThresholdsFromEnv();
