import { parseIsoTimeToMs } from './time.js';

export class ContractViolationError extends Error {
  readonly statusCode = 400;
  readonly details: string;

  constructor(message: string, details: string) {
    super(message);
    this.name = 'ContractViolationError';
    this.details = details;
  }
}

export class UpstreamError extends Error {
  readonly statusCode = 502;

  constructor(message: string) {
    super(message);
    this.name = 'UpstreamError';
  }
}

export const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

// Infinity is an extreme value, not a missing one; only NaN and non-numbers are rejected.
const isNumeric = (value: unknown): value is number => typeof value === 'number' && !Number.isNaN(value);

const requireNumber = (record: Record<string, unknown>, field: string, label: string): number => {
  const value = record[field];
  if (!isNumeric(value)) {
    throw new ContractViolationError(`Malformed ${label}`, `Field "${field}" must be a number, got ${value === undefined ? 'nothing' : JSON.stringify(value)}.`);
  }
  return value;
};

const requireTimestamp = (record: Record<string, unknown>, field: string, label: string): string => {
  const value = record[field];
  if (typeof value !== 'string' || parseIsoTimeToMs(value) === null) {
    throw new ContractViolationError(`Malformed ${label}`, `Field "${field}" must be an ISO-8601 timestamp.`);
  }
  return value;
};

export interface WeatherSample {
  readonly timestamp: string;
  readonly windSpeedMs: number;
  readonly windGustMs: number;
  readonly windDirectionDeg: number;
  readonly temperatureC: number;
  readonly humidityPct: number;
}

export interface GridPoint {
  readonly lat: number;
  readonly lon: number;
  readonly temperatureC: number;
  readonly pressureHpa: number;
  readonly pressureTrendHpa: number;
  readonly windSpeedMs: number;
  readonly windDirectionDeg: number;
  readonly weatherCode: number;
}

const WEATHER_SAMPLE_NUMERIC_FIELDS = ['windSpeedMs', 'windGustMs', 'windDirectionDeg', 'temperatureC', 'humidityPct'] as const;
const GRID_POINT_NUMERIC_FIELDS = [
  'lat',
  'lon',
  'temperatureC',
  'pressureHpa',
  'pressureTrendHpa',
  'windSpeedMs',
  'windDirectionDeg',
  'weatherCode',
] as const;

/**
 * Checks that a value carries every field a weather sample needs and returns it typed.
 * Extra fields are kept, so richer current-conditions records pass through untouched.
 */
export const assertWeatherSample = (value: unknown, label: string = 'weather sample'): WeatherSample => {
  if (!isRecord(value)) {
    throw new ContractViolationError(`Malformed ${label}`, 'Expected an object.');
  }
  const timestamp = requireTimestamp(value, 'timestamp', label);
  const [windSpeedMs, windGustMs, windDirectionDeg, temperatureC, humidityPct] = WEATHER_SAMPLE_NUMERIC_FIELDS.map((field) =>
    requireNumber(value, field, label),
  );
  return { ...value, timestamp, windSpeedMs, windGustMs, windDirectionDeg, temperatureC, humidityPct };
};

export const assertGridPoint = (value: unknown, label: string = 'grid point'): GridPoint => {
  if (!isRecord(value)) {
    throw new ContractViolationError(`Malformed ${label}`, 'Expected an object.');
  }
  const [lat, lon, temperatureC, pressureHpa, pressureTrendHpa, windSpeedMs, windDirectionDeg, weatherCode] =
    GRID_POINT_NUMERIC_FIELDS.map((field) => requireNumber(value, field, label));
  return { lat, lon, temperatureC, pressureHpa, pressureTrendHpa, windSpeedMs, windDirectionDeg, weatherCode };
};

export const assertWeatherSamples = (value: unknown, label: string = 'forecast'): WeatherSample[] => {
  if (!Array.isArray(value)) {
    throw new ContractViolationError(`Malformed ${label}`, 'Expected an array of weather samples.');
  }
  return value.map((entry, index) => assertWeatherSample(entry, `${label}[${index}]`));
};

export const assertGridPoints = (value: unknown, label: string = 'grid'): GridPoint[] => {
  if (!Array.isArray(value)) {
    throw new ContractViolationError(`Malformed ${label}`, 'Expected an array of grid points.');
  }
  return value.map((entry, index) => assertGridPoint(entry, `${label}[${index}]`));
};
