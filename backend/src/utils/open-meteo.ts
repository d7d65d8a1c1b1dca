import { isRecord, UpstreamError, type GridPoint, type WeatherSample } from './contracts.js';
import { DEFAULT_FETCH_HEADERS, type FetchOptions, type FetchWithTimeout } from './http-client.js';
import { normalizeUtcIsoTimestamp } from './time.js';
import { describeWeatherCode } from './weather.js';
import type { WindFarmSite } from './wind-farms.js';

const FORECAST_API_URL = 'https://api.open-meteo.com/v1/forecast';
const MARINE_API_URL = 'https://marine-api.open-meteo.com/v1/marine';

const CURRENT_FIELDS = [
  'temperature_2m',
  'relative_humidity_2m',
  'apparent_temperature',
  'precipitation',
  'weather_code',
  'cloud_cover',
  'pressure_msl',
  'wind_speed_10m',
  'wind_direction_10m',
  'wind_gusts_10m',
].join(',');

const HOURLY_FIELDS = [
  'temperature_2m',
  'relative_humidity_2m',
  'precipitation',
  'weather_code',
  'pressure_msl',
  'cloud_cover',
  'wind_speed_10m',
  'wind_direction_10m',
  'wind_gusts_10m',
].join(',');

const MARINE_FIELDS = ['wave_height', 'wave_direction', 'wave_period', 'wind_wave_height', 'swell_wave_height'].join(',');

const GRID_CURRENT_FIELDS = ['temperature_2m', 'pressure_msl', 'wind_speed_10m', 'wind_direction_10m', 'weather_code'].join(',');
const GRID_HOURLY_FIELDS = ['temperature_2m', 'pressure_msl', 'wind_speed_10m', 'wind_direction_10m'].join(',');
const GRID_FORECAST_HOURS = 6;
// Trend is read this many hours ahead of the current pressure.
const PRESSURE_TREND_LOOKAHEAD_HOURS = 3;

export interface OpenMeteoDeps {
  fetchWithTimeout: FetchWithTimeout;
  fetchOptions?: FetchOptions;
}

export interface DetailedWeatherSample extends WeatherSample {
  feelsLikeC: number | null;
  pressureHpa: number | null;
  cloudCoverPct: number | null;
  precipitationMm: number | null;
  weatherCode: number | null;
  description: string | null;
}

export interface MarineSample {
  timestamp: string;
  waveHeightM: number | null;
  waveDirectionDeg: number | null;
  wavePeriodS: number | null;
  windWaveHeightM: number | null;
  swellWaveHeightM: number | null;
}

export interface SiteWeather {
  site: WindFarmSite;
  current: DetailedWeatherSample | null;
  forecast: DetailedWeatherSample[];
  marineForecast: MarineSample[];
}

export interface RegionBounds {
  north: number;
  south: number;
  west: number;
  east: number;
}

const buildApiUrl = (baseUrl: string, params: Record<string, string>): string => `${baseUrl}?${new URLSearchParams(params).toString()}`;

const fetchPayload = async (url: string, deps: OpenMeteoDeps): Promise<Record<string, unknown>> => {
  const response = await deps.fetchWithTimeout(url, deps.fetchOptions ?? { headers: DEFAULT_FETCH_HEADERS });
  if (!response.ok) {
    throw new UpstreamError(`Open-Meteo request failed with status ${response.status}`);
  }
  const payload = await response.json();
  if (!isRecord(payload)) {
    throw new UpstreamError('Open-Meteo returned an unexpected payload');
  }
  return payload;
};

const requireBlock = (payload: Record<string, unknown>, key: string): Record<string, unknown> => {
  const block = payload[key];
  if (!isRecord(block)) {
    throw new UpstreamError(`Open-Meteo payload is missing "${key}"`);
  }
  return block;
};

const finiteOrNull = (value: unknown): number | null => (typeof value === 'number' && Number.isFinite(value) ? value : null);

const seriesOf = (block: Record<string, unknown>, key: string): unknown[] => {
  const series = block[key];
  return Array.isArray(series) ? series : [];
};

interface RawConditions {
  time: unknown;
  windSpeed: unknown;
  windGust: unknown;
  windDirection: unknown;
  temperature: unknown;
  humidity: unknown;
  feelsLike: unknown;
  pressure: unknown;
  cloudCover: unknown;
  precipitation: unknown;
  weatherCode: unknown;
}

// Samples lacking any field the classifier needs are unusable, so they map to null.
const toDetailedSample = (raw: RawConditions): DetailedWeatherSample | null => {
  const timestamp = typeof raw.time === 'string' ? normalizeUtcIsoTimestamp(raw.time) : null;
  const windSpeedMs = finiteOrNull(raw.windSpeed);
  const windGustMs = finiteOrNull(raw.windGust);
  const windDirectionDeg = finiteOrNull(raw.windDirection);
  const temperatureC = finiteOrNull(raw.temperature);
  const humidityPct = finiteOrNull(raw.humidity);
  if (
    timestamp === null ||
    windSpeedMs === null ||
    windGustMs === null ||
    windDirectionDeg === null ||
    temperatureC === null ||
    humidityPct === null
  ) {
    return null;
  }
  const weatherCode = finiteOrNull(raw.weatherCode);
  return {
    timestamp,
    windSpeedMs,
    windGustMs,
    windDirectionDeg,
    temperatureC,
    humidityPct,
    feelsLikeC: finiteOrNull(raw.feelsLike),
    pressureHpa: finiteOrNull(raw.pressure),
    cloudCoverPct: finiteOrNull(raw.cloudCover),
    precipitationMm: finiteOrNull(raw.precipitation),
    weatherCode,
    description: weatherCode === null ? null : describeWeatherCode(weatherCode),
  };
};

export const fetchCurrentWeather = async (lat: number, lon: number, deps: OpenMeteoDeps): Promise<DetailedWeatherSample> => {
  const payload = await fetchPayload(
    buildApiUrl(FORECAST_API_URL, {
      latitude: String(lat),
      longitude: String(lon),
      current: CURRENT_FIELDS,
      wind_speed_unit: 'ms',
      timezone: 'UTC',
    }),
    deps,
  );
  const current = requireBlock(payload, 'current');
  const sample = toDetailedSample({
    time: current.time,
    windSpeed: current.wind_speed_10m,
    windGust: current.wind_gusts_10m,
    windDirection: current.wind_direction_10m,
    temperature: current.temperature_2m,
    humidity: current.relative_humidity_2m,
    feelsLike: current.apparent_temperature,
    pressure: current.pressure_msl,
    cloudCover: current.cloud_cover,
    precipitation: current.precipitation,
    weatherCode: current.weather_code,
  });
  if (!sample) {
    throw new UpstreamError('Open-Meteo current conditions are incomplete');
  }
  return sample;
};

export const fetchHourlyForecast = async (lat: number, lon: number, hours: number, deps: OpenMeteoDeps): Promise<DetailedWeatherSample[]> => {
  const payload = await fetchPayload(
    buildApiUrl(FORECAST_API_URL, {
      latitude: String(lat),
      longitude: String(lon),
      hourly: HOURLY_FIELDS,
      wind_speed_unit: 'ms',
      timezone: 'UTC',
      forecast_hours: String(hours),
    }),
    deps,
  );
  const hourly = requireBlock(payload, 'hourly');
  const times = seriesOf(hourly, 'time');
  const series = (key: string) => seriesOf(hourly, key);

  const samples: DetailedWeatherSample[] = [];
  const limit = Math.min(hours, times.length);
  for (let i = 0; i < limit; i += 1) {
    const sample = toDetailedSample({
      time: times[i],
      windSpeed: series('wind_speed_10m')[i],
      windGust: series('wind_gusts_10m')[i],
      windDirection: series('wind_direction_10m')[i],
      temperature: series('temperature_2m')[i],
      humidity: series('relative_humidity_2m')[i],
      feelsLike: null,
      pressure: series('pressure_msl')[i],
      cloudCover: series('cloud_cover')[i],
      precipitation: series('precipitation')[i],
      weatherCode: series('weather_code')[i],
    });
    if (sample) {
      samples.push(sample);
    } else {
      console.warn(`[Weather] Dropping incomplete forecast hour ${String(times[i])} at (${lat}, ${lon})`);
    }
  }
  return samples;
};

export const fetchMarineForecast = async (lat: number, lon: number, hours: number, deps: OpenMeteoDeps): Promise<MarineSample[]> => {
  const payload = await fetchPayload(
    buildApiUrl(MARINE_API_URL, {
      latitude: String(lat),
      longitude: String(lon),
      hourly: MARINE_FIELDS,
      timezone: 'UTC',
      forecast_hours: String(hours),
    }),
    deps,
  );
  const hourly = requireBlock(payload, 'hourly');
  const times = seriesOf(hourly, 'time');
  const limit = Math.min(hours, times.length);

  const samples: MarineSample[] = [];
  for (let i = 0; i < limit; i += 1) {
    const time = times[i];
    const timestamp = typeof time === 'string' ? normalizeUtcIsoTimestamp(time) : null;
    if (timestamp === null) {
      continue;
    }
    samples.push({
      timestamp,
      waveHeightM: finiteOrNull(seriesOf(hourly, 'wave_height')[i]),
      waveDirectionDeg: finiteOrNull(seriesOf(hourly, 'wave_direction')[i]),
      wavePeriodS: finiteOrNull(seriesOf(hourly, 'wave_period')[i]),
      windWaveHeightM: finiteOrNull(seriesOf(hourly, 'wind_wave_height')[i]),
      swellWaveHeightM: finiteOrNull(seriesOf(hourly, 'swell_wave_height')[i]),
    });
  }
  return samples;
};

export interface FetchSiteWeatherOptions {
  includeForecast?: boolean;
  includeMarine?: boolean;
  forecastHours?: number;
}

const errorMessage = (reason: unknown): string => (reason instanceof Error ? reason.message : String(reason));

/**
 * Fetches everything known about one site. Each part degrades on its own: a
 * failed request is logged and leaves `current` null or the series empty.
 */
export const fetchSiteWeather = async (
  site: WindFarmSite,
  { includeForecast = true, includeMarine = false, forecastHours = 12 }: FetchSiteWeatherOptions,
  deps: OpenMeteoDeps,
): Promise<SiteWeather> => {
  const [currentResult, forecastResult, marineResult] = await Promise.allSettled([
    fetchCurrentWeather(site.lat, site.lon, deps),
    includeForecast ? fetchHourlyForecast(site.lat, site.lon, forecastHours, deps) : Promise.resolve([]),
    includeMarine ? fetchMarineForecast(site.lat, site.lon, forecastHours, deps) : Promise.resolve([]),
  ]);

  if (currentResult.status === 'rejected') {
    console.warn(`[Weather] Current conditions unavailable for ${site.name}:`, errorMessage(currentResult.reason));
  }
  if (forecastResult.status === 'rejected') {
    console.warn(`[Weather] Forecast unavailable for ${site.name}:`, errorMessage(forecastResult.reason));
  }
  if (marineResult.status === 'rejected') {
    console.warn(`[Weather] Marine forecast unavailable for ${site.name}:`, errorMessage(marineResult.reason));
  }

  return {
    site,
    current: currentResult.status === 'fulfilled' ? currentResult.value : null,
    forecast: forecastResult.status === 'fulfilled' ? forecastResult.value : [],
    marineForecast: marineResult.status === 'fulfilled' ? marineResult.value : [],
  };
};

export const fetchAllSiteWeather = (
  sites: readonly WindFarmSite[],
  options: FetchSiteWeatherOptions,
  deps: OpenMeteoDeps,
): Promise<SiteWeather[]> => Promise.all(sites.map((site) => fetchSiteWeather(site, options, deps)));

const linspace = (start: number, end: number, count: number): number[] => {
  if (count <= 1) {
    return [start];
  }
  return Array.from({ length: count }, (_, index) => start + ((end - start) * index) / (count - 1));
};

export const buildGridCoordinates = (bounds: RegionBounds, gridSize: number): { lat: number; lon: number }[] => {
  const lats = linspace(bounds.south, bounds.north, gridSize);
  const lons = linspace(bounds.west, bounds.east, gridSize);
  return lats.flatMap((lat) => lons.map((lon) => ({ lat, lon })));
};

export const fetchGridPoint = async (lat: number, lon: number, deps: OpenMeteoDeps): Promise<GridPoint> => {
  const payload = await fetchPayload(
    buildApiUrl(FORECAST_API_URL, {
      latitude: String(lat),
      longitude: String(lon),
      current: GRID_CURRENT_FIELDS,
      hourly: GRID_HOURLY_FIELDS,
      forecast_hours: String(GRID_FORECAST_HOURS),
      wind_speed_unit: 'ms',
      timezone: 'UTC',
    }),
    deps,
  );
  const current = requireBlock(payload, 'current');
  const hourly = requireBlock(payload, 'hourly');

  const temperatureC = finiteOrNull(current.temperature_2m);
  const pressureHpa = finiteOrNull(current.pressure_msl);
  const windSpeedMs = finiteOrNull(current.wind_speed_10m);
  const windDirectionDeg = finiteOrNull(current.wind_direction_10m);
  const weatherCode = finiteOrNull(current.weather_code);
  if (temperatureC === null || pressureHpa === null || windSpeedMs === null || windDirectionDeg === null || weatherCode === null) {
    throw new UpstreamError('Open-Meteo grid conditions are incomplete');
  }

  const hourlyPressure = seriesOf(hourly, 'pressure_msl');
  const futurePressure =
    hourlyPressure.length > PRESSURE_TREND_LOOKAHEAD_HOURS ? finiteOrNull(hourlyPressure[PRESSURE_TREND_LOOKAHEAD_HOURS]) : null;

  return {
    lat,
    lon,
    temperatureC,
    pressureHpa,
    pressureTrendHpa: futurePressure === null ? 0 : futurePressure - pressureHpa,
    windSpeedMs,
    windDirectionDeg,
    weatherCode,
  };
};

/**
 * Samples the region on a `gridSize` × `gridSize` lattice, corners included.
 * Points whose request fails are logged and left out.
 */
export const fetchGridWeather = async (bounds: RegionBounds, gridSize: number, deps: OpenMeteoDeps): Promise<GridPoint[]> => {
  const coordinates = buildGridCoordinates(bounds, gridSize);
  const results = await Promise.allSettled(coordinates.map(({ lat, lon }) => fetchGridPoint(lat, lon, deps)));

  const grid: GridPoint[] = [];
  results.forEach((result, index) => {
    if (result.status === 'fulfilled') {
      grid.push(result.value);
      return;
    }
    const { lat, lon } = coordinates[index];
    console.warn(`[Synoptic] Error fetching grid point (${lat.toFixed(1)}, ${lon.toFixed(1)}):`, errorMessage(result.reason));
  });
  return grid;
};
