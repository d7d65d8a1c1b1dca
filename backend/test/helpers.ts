import type { GridPoint, WeatherSample } from '../src/utils/contracts.js';
import type { FetchWithTimeout } from '../src/utils/http-client.js';

export const hourAt = (hour: number): string => new Date(Date.UTC(2026, 0, 10, hour)).toISOString();

export const makeSample = (overrides: Partial<WeatherSample> = {}): WeatherSample => ({
  timestamp: hourAt(0),
  windSpeedMs: 14,
  windGustMs: 16,
  windDirectionDeg: 240,
  temperatureC: 8,
  humidityPct: 70,
  ...overrides,
});

// Rated band, mild and dry: classifies with no issues.
export const calmHour = (hour: number): WeatherSample => makeSample({ timestamp: hourAt(hour) });

export const stormHour = (hour: number): WeatherSample =>
  makeSample({ timestamp: hourAt(hour), windSpeedMs: 30, windGustMs: 30 });

export const icingHour = (hour: number): WeatherSample =>
  makeSample({ timestamp: hourAt(hour), temperatureC: -2, humidityPct: 90 });

export const makeGridPoint = (lat: number, lon: number, overrides: Partial<GridPoint> = {}): GridPoint => ({
  lat,
  lon,
  temperatureC: 10,
  pressureHpa: 1012,
  pressureTrendHpa: 0,
  windSpeedMs: 10,
  windDirectionDeg: 270,
  weatherCode: 3,
  ...overrides,
});

/** 3×3 lattice over lat 50–52, lon 0–2 at 1012 hPa, with the centre pressure set. */
export const latticeWithCentre = (centrePressureHpa: number): GridPoint[] =>
  [50, 51, 52].flatMap((lat) =>
    [0, 1, 2].map((lon) => makeGridPoint(lat, lon, lat === 51 && lon === 1 ? { pressureHpa: centrePressureHpa } : {})),
  );

export interface StubReply {
  status?: number;
  body?: unknown;
}

export const stubFetch = (handler: (url: URL) => StubReply) => {
  const calls: URL[] = [];
  const fetchWithTimeout: FetchWithTimeout = async (url) => {
    const parsed = new URL(url);
    calls.push(parsed);
    const { status = 200, body = {} } = handler(parsed);
    return {
      ok: status >= 200 && status < 300,
      status,
      json: async () => body,
    };
  };
  return { fetchWithTimeout, calls };
};
