import type { ForecastEntry, ForecastProvider } from './forecast.js';
import { createForecastEntry } from './forecast.js';
import type { FetchWithTimeout } from './http-client.js';
import { withExplicitOffset } from './time.js';
import { openMeteoCodeToText, parseFiniteNumber, THUNDERSTORM_WEATHER_CODES } from './weather.js';

const OPEN_METEO_HOSTS = ['api.open-meteo.com', 'customer-api.open-meteo.com'];
const ATTEMPTS_PER_HOST = 3;

const OPEN_METEO_HOURLY_FIELDS = [
  'temperature_2m',
  'precipitation',
  'precipitation_probability',
  'weather_code',
  'wind_speed_10m',
  'wind_gusts_10m',
  'cape',
].join(',');

export const buildOpenMeteoForecastApiUrl = (host: string, lat: number, lon: number, forecastDays: number): string => {
  const params = new URLSearchParams({
    latitude: String(lat),
    longitude: String(lon),
    timezone: 'auto',
    forecast_days: String(forecastDays),
    temperature_unit: 'celsius',
    wind_speed_unit: 'kmh',
    precipitation_unit: 'mm',
    hourly: OPEN_METEO_HOURLY_FIELDS,
  });
  return `https://${host}/v1/forecast?${params.toString()}`;
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const columnOf = (hourly: Record<string, unknown>, field: string): unknown[] => {
  const column = hourly[field];
  return Array.isArray(column) ? column : [];
};

/**
 * Open-Meteo only reports a thunderstorm through its weather code, so the
 * precipitation probability of a thunderstorm hour stands in for the storm probability.
 */
export const deriveThunderstormProbability = (weatherCode: number | null, precipitationProbability: number | null): number | null => {
  if (weatherCode === null) {
    return null;
  }
  if (!THUNDERSTORM_WEATHER_CODES.has(weatherCode)) {
    return 0;
  }
  return precipitationProbability;
};

export const parseOpenMeteoHourlyPayload = (payload: unknown): ForecastEntry[] => {
  if (!isRecord(payload) || !isRecord(payload.hourly)) {
    throw new Error('Open-Meteo forecast response did not include hourly data.');
  }
  const hourly = payload.hourly;
  const times = columnOf(hourly, 'time');
  if (!times.length) {
    throw new Error('Open-Meteo forecast response did not include hourly time series.');
  }
  const offsetSeconds = parseFiniteNumber(payload.utc_offset_seconds) ?? 0;

  const temperature = columnOf(hourly, 'temperature_2m');
  const precipitation = columnOf(hourly, 'precipitation');
  const precipitationProbability = columnOf(hourly, 'precipitation_probability');
  const weatherCode = columnOf(hourly, 'weather_code');
  const windSpeed = columnOf(hourly, 'wind_speed_10m');
  const windGust = columnOf(hourly, 'wind_gusts_10m');
  const cape = columnOf(hourly, 'cape');

  const entries: ForecastEntry[] = [];
  times.forEach((timeValue, index) => {
    const time = withExplicitOffset(typeof timeValue === 'string' ? timeValue : null, offsetSeconds);
    if (!time) {
      return;
    }
    const code = parseFiniteNumber(weatherCode[index]);
    const rainProbability = parseFiniteNumber(precipitationProbability[index]);
    entries.push(
      createForecastEntry({
        time,
        temperatureC: parseFiniteNumber(temperature[index]),
        windSpeedKmh: parseFiniteNumber(windSpeed[index]),
        windGustKmh: parseFiniteNumber(windGust[index]),
        precipitationMm: parseFiniteNumber(precipitation[index]),
        rainProbability,
        thunderstormProbability: deriveThunderstormProbability(code, rainProbability),
        weather: code === null ? null : openMeteoCodeToText(code),
        capeJkg: parseFiniteNumber(cape[index]),
      })
    );
  });
  return entries;
};

interface CreateOpenMeteoForecastProviderOptions {
  fetchWithTimeout: FetchWithTimeout;
  fetchOptions?: RequestInit;
  forecastDays?: number;
  timeoutMs?: number;
}

export const createOpenMeteoForecastProvider = ({
  fetchWithTimeout,
  fetchOptions = {},
  forecastDays = 4,
  timeoutMs,
}: CreateOpenMeteoForecastProviderOptions): ForecastProvider => {
  const fetchPayload = async (lat: number, lon: number): Promise<unknown> => {
    let lastError: unknown = null;
    for (const host of OPEN_METEO_HOSTS) {
      const apiUrl = buildOpenMeteoForecastApiUrl(host, lat, lon, forecastDays);
      for (let attempt = 1; attempt <= ATTEMPTS_PER_HOST; attempt += 1) {
        try {
          const response = await fetchWithTimeout(apiUrl, fetchOptions, timeoutMs);
          if (!response.ok) {
            throw new Error(`Open-Meteo forecast failed with status ${response.status}`);
          }
          return await response.json();
        } catch (error) {
          lastError = error;
          console.warn(`[Forecast] ${host} attempt ${attempt}/${ATTEMPTS_PER_HOST} failed for ${lat},${lon}:`, error instanceof Error ? error.message : error);
        }
      }
    }
    throw lastError instanceof Error ? lastError : new Error('Open-Meteo forecast failed');
  };

  return {
    fetchForecast: async (lat, lon) => parseOpenMeteoHourlyPayload(await fetchPayload(lat, lon)),
  };
};
