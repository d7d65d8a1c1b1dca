import type { Express } from 'express';
import { createApp, registerErrorHandler } from './src/server/create-app.js';
import { startServer } from './src/server/start-server.js';
import {
  PORT,
  IS_PRODUCTION,
  DEBUG_ANALYSIS,
  REQUEST_TIMEOUT_MS,
  RATE_LIMIT_WINDOW_MS,
  RATE_LIMIT_MAX_REQUESTS,
  UPSTREAM_RATE_LIMIT_MAX_REQUESTS,
  JSON_BODY_LIMIT,
  CORS_ALLOWLIST,
  FORECAST_HOURS,
  GRID_SIZE,
  REGION_BOUNDS,
  WIND_FARMS_FILE,
  IMPACT_THRESHOLDS,
  SYNOPTIC_THRESHOLDS,
} from './src/server/runtime.js';
import { DEFAULT_FETCH_HEADERS, createFetchWithTimeout, type FetchWithTimeout } from './src/utils/http-client.js';
import { loadWindFarmSites, type WindFarmSite } from './src/utils/wind-farms.js';
import { registerHealthRoutes } from './src/routes/health.js';
import { registerWindImpactRoutes } from './src/routes/wind-impact.js';
import { registerSynopticRoutes } from './src/routes/synoptic.js';

export interface BuildAppOptions {
  fetchWithTimeout?: FetchWithTimeout;
  sites?: WindFarmSite[];
}

export const buildApp = ({
  fetchWithTimeout = createFetchWithTimeout(REQUEST_TIMEOUT_MS),
  sites = loadWindFarmSites(WIND_FARMS_FILE),
}: BuildAppOptions = {}): Express => {
  const app = createApp({
    isProduction: IS_PRODUCTION,
    corsAllowlist: CORS_ALLOWLIST,
    rateLimitWindowMs: RATE_LIMIT_WINDOW_MS,
    rateLimitMaxRequests: RATE_LIMIT_MAX_REQUESTS,
    upstreamRateLimitMaxRequests: UPSTREAM_RATE_LIMIT_MAX_REQUESTS,
    jsonBodyLimit: JSON_BODY_LIMIT,
  });

  registerHealthRoutes({ app, siteCount: sites.length, regionBounds: REGION_BOUNDS });
  registerWindImpactRoutes({
    app,
    sites,
    fetchWithTimeout,
    defaultFetchHeaders: DEFAULT_FETCH_HEADERS,
    forecastHours: FORECAST_HOURS,
    thresholds: IMPACT_THRESHOLDS,
    debug: DEBUG_ANALYSIS,
  });
  registerSynopticRoutes({
    app,
    fetchWithTimeout,
    defaultFetchHeaders: DEFAULT_FETCH_HEADERS,
    regionBounds: REGION_BOUNDS,
    gridSize: GRID_SIZE,
    thresholds: SYNOPTIC_THRESHOLDS,
    debug: DEBUG_ANALYSIS,
  });
  registerErrorHandler(app);

  return app;
};

export const app = buildApp();

if (process.env.NODE_ENV !== 'test') {
  startServer({ app, port: PORT });
}

export { classifyConditions, extractImpactEvents, aggregateOverallStatus, analyzeSite } from './src/utils/wind-impact.js';
export { detectPressureSystems, detectFronts, estimateFrontMotion, analyzeSynoptic } from './src/utils/synoptic.js';
