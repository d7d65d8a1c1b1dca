import dotenv from 'dotenv';
import type { RegionBounds } from '../utils/open-meteo.js';
import { resolveImpactThresholds, resolveSynopticThresholds } from '../utils/thresholds.js';

dotenv.config();

const parsePositiveInt = (rawValue: string | undefined, fallback: number): number => {
  const parsed = Number(rawValue);
  return Number.isFinite(parsed) && parsed > 0 ? Math.round(parsed) : fallback;
};

const parseCoordinate = (rawValue: string | undefined, fallback: number): number => {
  if (typeof rawValue !== 'string' || !rawValue.trim()) {
    return fallback;
  }
  const parsed = Number(rawValue);
  return Number.isFinite(parsed) ? parsed : fallback;
};

export const PORT = process.env.PORT || 3001;
export const IS_PRODUCTION = process.env.NODE_ENV === 'production';
export const DEBUG_ANALYSIS = process.env.DEBUG_ANALYSIS === 'true';

export const REQUEST_TIMEOUT_MS = parsePositiveInt(process.env.REQUEST_TIMEOUT_MS, 15000);
export const RATE_LIMIT_WINDOW_MS = parsePositiveInt(process.env.RATE_LIMIT_WINDOW_MS, 15 * 60 * 1000);
export const RATE_LIMIT_MAX_REQUESTS = parsePositiveInt(process.env.RATE_LIMIT_MAX_REQUESTS, 300);
export const UPSTREAM_RATE_LIMIT_MAX_REQUESTS = parsePositiveInt(process.env.UPSTREAM_RATE_LIMIT_MAX_REQUESTS, 30);
export const JSON_BODY_LIMIT = process.env.JSON_BODY_LIMIT || '1mb';

export const CORS_ALLOWLIST = (process.env.CORS_ORIGIN || '')
  .split(',')
  .map((origin) => origin.trim())
  .filter(Boolean);

export const FORECAST_HOURS = parsePositiveInt(process.env.FORECAST_HOURS, 12);
export const GRID_SIZE = parsePositiveInt(process.env.GRID_SIZE, 6);
export const WIND_FARMS_FILE = process.env.WIND_FARMS_FILE || undefined;

// Defaults cover the British Isles.
export const REGION_BOUNDS: RegionBounds = {
  north: parseCoordinate(process.env.REGION_NORTH, 59.0),
  south: parseCoordinate(process.env.REGION_SOUTH, 49.5),
  west: parseCoordinate(process.env.REGION_WEST, -8.0),
  east: parseCoordinate(process.env.REGION_EAST, 2.0),
};

export const IMPACT_THRESHOLDS = resolveImpactThresholds(process.env);
export const SYNOPTIC_THRESHOLDS = resolveSynopticThresholds(process.env);
