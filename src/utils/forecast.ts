/**
 * One provider sample for one waypoint at one instant. Every measured field is
 * nullable: `null` means the provider did not report it, which is not the same as 0.
 */
export interface ForecastEntry {
  /** Provider-local wall clock with its UTC offset, e.g. `2025-07-28T10:00+02:00`. */
  readonly time: string;
  readonly temperatureC: number | null;
  readonly windSpeedKmh: number | null;
  readonly windGustKmh: number | null;
  /** Amount fallen during the interval ending at `time`. */
  readonly precipitationMm: number | null;
  readonly rainProbability: number | null;
  readonly thunderstormProbability: number | null;
  readonly weather: string | null;
  readonly capeJkg: number | null;
}

export interface Waypoint {
  lat: number;
  lon: number;
  label: string;
}

export interface Stage {
  name: string;
  waypoints: Waypoint[];
}

export interface Route {
  name: string;
  startDate: string;
  stages: Stage[];
}

export interface WaypointForecast {
  waypoint: Waypoint;
  entries: ForecastEntry[];
}

export interface StageForecast {
  stageName: string;
  stageIndex: number;
  date: string;
  waypoints: WaypointForecast[];
}

export interface ForecastProvider {
  fetchForecast: (lat: number, lon: number) => Promise<ForecastEntry[]>;
}

export interface FireRiskLookup {
  warningFor: (lat: number, lon: number, date: string) => string;
}

export const createForecastEntry = (fields: Partial<ForecastEntry> & { time: string }): ForecastEntry =>
  Object.freeze({
    temperatureC: null,
    windSpeedKmh: null,
    windGustKmh: null,
    precipitationMm: null,
    rainProbability: null,
    thunderstormProbability: null,
    weather: null,
    capeJkg: null,
    ...fields,
  });
