import fs from 'node:fs';
import { multiPolygon, point, polygon } from '@turf/helpers';
import { booleanPointInPolygon } from '@turf/boolean-point-in-polygon';
import type { FireRiskLookup } from './forecast.js';
import { isIsoDate } from './time.js';

export class FireRiskDataError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'FireRiskDataError';
  }
}

export interface FireZone {
  id: string;
  name: string;
  contains: (lat: number, lon: number) => boolean;
}

/** Zone id to level, per calendar date. */
export type FireLevelTable = Record<string, Record<string, number>>;

export const FIRE_LEVEL_HIGH = 2;
export const FIRE_LEVEL_MAX = 4;

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const isPosition = (value: unknown): value is number[] =>
  Array.isArray(value) && value.length >= 2 && value.every((item) => typeof item === 'number' && Number.isFinite(item));

const isRing = (value: unknown): value is number[][] => Array.isArray(value) && value.every(isPosition);

const isPolygonCoordinates = (value: unknown): value is number[][][] =>
  Array.isArray(value) && value.length > 0 && value.every(isRing);

const isMultiPolygonCoordinates = (value: unknown): value is number[][][][] =>
  Array.isArray(value) && value.length > 0 && value.every(isPolygonCoordinates);

const buildZone = (raw: unknown, index: number): FireZone => {
  if (!isRecord(raw) || !isRecord(raw.properties) || !isRecord(raw.geometry)) {
    throw new FireRiskDataError(`features[${index}] must be a GeoJSON feature with properties and geometry.`);
  }
  const { properties, geometry } = raw;
  const id = typeof properties.id === 'string' || typeof properties.id === 'number' ? String(properties.id) : null;
  if (!id) {
    throw new FireRiskDataError(`features[${index}].properties.id is required.`);
  }
  const name = typeof properties.name === 'string' && properties.name.trim() ? properties.name.trim() : id;
  const coordinates = geometry.coordinates;

  try {
    if (geometry.type === 'Polygon' && isPolygonCoordinates(coordinates)) {
      const feature = polygon(coordinates);
      return { id, name, contains: (lat, lon) => booleanPointInPolygon(point([lon, lat]), feature) };
    }
    if (geometry.type === 'MultiPolygon' && isMultiPolygonCoordinates(coordinates)) {
      const feature = multiPolygon(coordinates);
      return { id, name, contains: (lat, lon) => booleanPointInPolygon(point([lon, lat]), feature) };
    }
  } catch (error) {
    throw new FireRiskDataError(`features[${index}] (${id}) has invalid geometry: ${error instanceof Error ? error.message : String(error)}`);
  }
  throw new FireRiskDataError(`features[${index}] (${id}) must be a Polygon or MultiPolygon.`);
};

export const parseFireZones = (raw: unknown): FireZone[] => {
  if (!isRecord(raw) || raw.type !== 'FeatureCollection' || !Array.isArray(raw.features)) {
    throw new FireRiskDataError('Fire zones must be a GeoJSON FeatureCollection.');
  }
  return raw.features.map((feature: unknown, index: number) => buildZone(feature, index));
};

export const parseFireLevels = (raw: unknown): FireLevelTable => {
  const levels = isRecord(raw) ? raw.levels : null;
  if (!isRecord(levels)) {
    throw new FireRiskDataError('Fire levels must be an object with a "levels" map.');
  }
  const table: FireLevelTable = {};
  for (const [date, zones] of Object.entries(levels)) {
    if (!isIsoDate(date) || !isRecord(zones)) {
      throw new FireRiskDataError(`Fire levels for "${date}" must be keyed by YYYY-MM-DD and map zone ids to levels.`);
    }
    table[date] = {};
    for (const [zoneId, level] of Object.entries(zones)) {
      if (typeof level !== 'number' || !Number.isInteger(level) || level < 0) {
        throw new FireRiskDataError(`Fire level for zone "${zoneId}" on ${date} must be a non-negative integer.`);
      }
      table[date][zoneId] = level;
    }
  }
  return table;
};

export const describeFireLevel = (level: number, zoneName: string): string => {
  if (level >= FIRE_LEVEL_MAX) {
    return `Fire risk MAX (${zoneName})`;
  }
  if (level >= FIRE_LEVEL_HIGH) {
    return `Fire risk HIGH (${zoneName})`;
  }
  return '';
};

interface CreateFireRiskLookupOptions {
  zones: FireZone[];
  levelsByDate: FireLevelTable;
}

export const createFireRiskLookup = ({ zones, levelsByDate }: CreateFireRiskLookupOptions): FireRiskLookup => ({
  warningFor: (lat, lon, date) => {
    if (!Number.isFinite(lat) || !Number.isFinite(lon)) {
      return '';
    }
    const zone = zones.find((candidate) => candidate.contains(lat, lon));
    if (!zone) {
      return '';
    }
    const level = levelsByDate[date]?.[zone.id] ?? 0;
    return describeFireLevel(level, zone.name);
  },
});

const readJsonFile = (filePath: string): unknown => {
  try {
    return JSON.parse(fs.readFileSync(filePath, 'utf8'));
  } catch (error) {
    throw new FireRiskDataError(`Unable to load ${filePath}: ${error instanceof Error ? error.message : String(error)}`);
  }
};

export const loadFireRiskLookup = (zonesFile: string, levelsFile: string): FireRiskLookup => {
  const zones = parseFireZones(readJsonFile(zonesFile));
  const levelsByDate = parseFireLevels(readJsonFile(levelsFile));
  console.log(`[FireRisk] Loaded ${zones.length} zones and levels for ${Object.keys(levelsByDate).length} dates.`);
  return createFireRiskLookup({ zones, levelsByDate });
};
