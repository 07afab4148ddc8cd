import fs from 'node:fs';
import type { Route, Stage, Waypoint } from './forecast.js';
import { daysBetweenIsoDates, isIsoDate, shiftIsoDate } from './time.js';

export class RouteFileError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RouteFileError';
  }
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const parseCoordinate = (value: unknown, limit: number, path: string): number => {
  if (typeof value !== 'number' || !Number.isFinite(value) || Math.abs(value) > limit) {
    throw new RouteFileError(`${path} must be a number between -${limit} and ${limit}.`);
  }
  return value;
};

const parseWaypoint = (raw: unknown, path: string): Waypoint => {
  if (!isRecord(raw)) {
    throw new RouteFileError(`${path} must be an object.`);
  }
  const label = typeof raw.label === 'string' && raw.label.trim() ? raw.label.trim() : null;
  if (!label) {
    throw new RouteFileError(`${path}.label must be a non-empty string.`);
  }
  return {
    lat: parseCoordinate(raw.lat, 90, `${path}.lat`),
    lon: parseCoordinate(raw.lon, 180, `${path}.lon`),
    label,
  };
};

const parseStage = (raw: unknown, path: string): Stage => {
  if (!isRecord(raw)) {
    throw new RouteFileError(`${path} must be an object.`);
  }
  if (typeof raw.name !== 'string' || !raw.name.trim()) {
    throw new RouteFileError(`${path}.name must be a non-empty string.`);
  }
  if (!Array.isArray(raw.waypoints) || raw.waypoints.length === 0) {
    throw new RouteFileError(`${path}.waypoints must be a non-empty array.`);
  }
  return {
    name: raw.name.trim(),
    waypoints: raw.waypoints.map((waypoint: unknown, index: number) => parseWaypoint(waypoint, `${path}.waypoints[${index}]`)),
  };
};

export const parseRoute = (raw: unknown): Route => {
  if (!isRecord(raw)) {
    throw new RouteFileError('Route must be a JSON object.');
  }
  if (typeof raw.name !== 'string' || !raw.name.trim()) {
    throw new RouteFileError('Route name must be a non-empty string.');
  }
  if (!isIsoDate(raw.startDate)) {
    throw new RouteFileError('Route startDate must be YYYY-MM-DD.');
  }
  if (!Array.isArray(raw.stages) || raw.stages.length === 0) {
    throw new RouteFileError('Route stages must be a non-empty array.');
  }
  return {
    name: raw.name.trim(),
    startDate: raw.startDate,
    stages: raw.stages.map((stage: unknown, index: number) => parseStage(stage, `stages[${index}]`)),
  };
};

export const loadRoute = (filePath: string): Route => {
  let contents: string;
  try {
    contents = fs.readFileSync(filePath, 'utf8');
  } catch (error) {
    throw new RouteFileError(`Unable to read route file ${filePath}: ${error instanceof Error ? error.message : String(error)}`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(contents);
  } catch (error) {
    throw new RouteFileError(`Route file ${filePath} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
  }
  return parseRoute(raw);
};

export interface ResolvedStage {
  stage: Stage;
  stageIndex: number;
  date: string;
}

/** Stage `i` is hiked on `startDate + i` days; dates outside the route resolve to null. */
export const stageForDate = (route: Route, date: string): ResolvedStage | null => {
  const offset = daysBetweenIsoDates(date, route.startDate);
  if (offset === null || offset < 0 || offset >= route.stages.length) {
    return null;
  }
  return { stage: route.stages[offset], stageIndex: offset, date };
};

export const routeEndDate = (route: Route): string | null => shiftIsoDate(route.startDate, route.stages.length - 1);
