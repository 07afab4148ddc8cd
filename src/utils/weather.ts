export const OPEN_METEO_CODE_LABELS: Record<number, string> = {
  0: 'Clear',
  1: 'Mainly Clear',
  2: 'Partly Cloudy',
  3: 'Overcast',
  45: 'Fog',
  48: 'Depositing Rime Fog',
  51: 'Light Drizzle',
  53: 'Moderate Drizzle',
  55: 'Dense Drizzle',
  56: 'Light Freezing Drizzle',
  57: 'Dense Freezing Drizzle',
  61: 'Slight Rain',
  63: 'Moderate Rain',
  65: 'Heavy Rain',
  66: 'Light Freezing Rain',
  67: 'Heavy Freezing Rain',
  71: 'Slight Snow Fall',
  73: 'Moderate Snow Fall',
  75: 'Heavy Snow Fall',
  77: 'Snow Grains',
  80: 'Slight Rain Showers',
  81: 'Moderate Rain Showers',
  82: 'Violent Rain Showers',
  85: 'Slight Snow Showers',
  86: 'Heavy Snow Showers',
  95: 'Thunderstorm',
  96: 'Thunderstorm with Slight Hail',
  99: 'Thunderstorm with Heavy Hail',
};

export const THUNDERSTORM_WEATHER_CODES = new Set([95, 96, 99]);

export const openMeteoCodeToText = (code: number): string => OPEN_METEO_CODE_LABELS[code] || 'Unknown';

// Provider descriptions may arrive in English or French.
const THUNDERSTORM_KEYWORDS = ['thunderstorm', 'thunder', 'orage', 'orageuse', 'orageuses'];

export const isThunderstormDescription = (description: string | null | undefined): boolean => {
  if (typeof description !== 'string' || !description.trim()) {
    return false;
  }
  const normalized = description.trim().toLowerCase();
  return THUNDERSTORM_KEYWORDS.some((keyword) => normalized.includes(keyword));
};

export const parseFiniteNumber = (value: unknown): number | null => {
  if (value === null || value === undefined || value === '') {
    return null;
  }
  const numeric = typeof value === 'number' ? value : typeof value === 'string' ? Number(value) : Number.NaN;
  return Number.isFinite(numeric) ? numeric : null;
};

export const roundTo = (value: number, digits: number = 1): number => {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
};
