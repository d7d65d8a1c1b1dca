import { UpstreamError } from '../src/utils/contracts.js';
import {
  buildGridCoordinates,
  fetchCurrentWeather,
  fetchGridPoint,
  fetchGridWeather,
  fetchHourlyForecast,
  fetchMarineForecast,
  fetchSiteWeather,
} from '../src/utils/open-meteo.js';
import { stubFetch } from './helpers.js';

const currentBlock = {
  time: '2026-01-10T06:00',
  temperature_2m: -1.2,
  relative_humidity_2m: 88,
  apparent_temperature: -5,
  precipitation: 0.1,
  weather_code: 71,
  cloud_cover: 90,
  pressure_msl: 1002.4,
  wind_speed_10m: 11.3,
  wind_direction_10m: 250,
  wind_gusts_10m: 17.8,
};

const hourlyBlock = {
  time: ['2026-01-10T06:00', '2026-01-10T07:00', '2026-01-10T08:00', '2026-01-10T09:00'],
  temperature_2m: [4, 4.5, 5, 5.5],
  relative_humidity_2m: [70, 72, 74, 76],
  precipitation: [0, 0, 0.2, 0],
  weather_code: [3, 3, 61, 3],
  pressure_msl: [1010, 1009, 1008, 1007],
  cloud_cover: [80, 85, 100, 90],
  wind_speed_10m: [9, null, 13, 14],
  wind_direction_10m: [240, 245, 250, 255],
  wind_gusts_10m: [12, 14, 18, 19],
};

beforeEach(() => {
  vi.spyOn(console, 'warn').mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe('fetchCurrentWeather', () => {
  test('maps the current block and requests metric wind in UTC', async () => {
    const { fetchWithTimeout, calls } = stubFetch(() => ({ body: { current: currentBlock } }));

    const sample = await fetchCurrentWeather(53.885, 1.79, { fetchWithTimeout });

    expect(sample).toEqual({
      timestamp: '2026-01-10T06:00:00.000Z',
      windSpeedMs: 11.3,
      windGustMs: 17.8,
      windDirectionDeg: 250,
      temperatureC: -1.2,
      humidityPct: 88,
      feelsLikeC: -5,
      pressureHpa: 1002.4,
      cloudCoverPct: 90,
      precipitationMm: 0.1,
      weatherCode: 71,
      description: 'Slight snow',
    });
    expect(calls).toHaveLength(1);
    expect(calls[0].origin).toBe('https://api.open-meteo.com');
    expect(calls[0].searchParams.get('latitude')).toBe('53.885');
    expect(calls[0].searchParams.get('wind_speed_unit')).toBe('ms');
    expect(calls[0].searchParams.get('timezone')).toBe('UTC');
  });

  test('fails with an upstream error on a non-OK status', async () => {
    const { fetchWithTimeout } = stubFetch(() => ({ status: 503 }));
    const request = fetchCurrentWeather(53, 1, { fetchWithTimeout });
    await expect(request).rejects.toBeInstanceOf(UpstreamError);
    await expect(request).rejects.toMatchObject({ statusCode: 502, message: 'Open-Meteo request failed with status 503' });
  });

  test('fails when the classifier fields are missing', async () => {
    const { fetchWithTimeout } = stubFetch(() => ({ body: { current: { ...currentBlock, wind_gusts_10m: null } } }));
    await expect(fetchCurrentWeather(53, 1, { fetchWithTimeout })).rejects.toThrow('Open-Meteo current conditions are incomplete');
  });
});

describe('fetchHourlyForecast', () => {
  test('limits to the requested hours and drops incomplete ones', async () => {
    const { fetchWithTimeout, calls } = stubFetch(() => ({ body: { hourly: hourlyBlock } }));

    const forecast = await fetchHourlyForecast(53, 1, 3, { fetchWithTimeout });

    expect(forecast.map((sample) => sample.timestamp)).toEqual(['2026-01-10T06:00:00.000Z', '2026-01-10T08:00:00.000Z']);
    expect(forecast[1]).toMatchObject({ windSpeedMs: 13, windGustMs: 18, weatherCode: 61, description: 'Slight rain', feelsLikeC: null });
    expect(calls[0].searchParams.get('forecast_hours')).toBe('3');
    expect(console.warn).toHaveBeenCalledTimes(1);
  });
});

describe('fetchMarineForecast', () => {
  test('maps wave series and keeps gaps as null', async () => {
    const { fetchWithTimeout, calls } = stubFetch(() => ({
      body: {
        hourly: {
          time: ['2026-01-10T06:00', '2026-01-10T07:00'],
          wave_height: [2.1, 2.4],
          wave_direction: [260, null],
          wave_period: [7.5, 8],
          wind_wave_height: [1.2, 1.4],
          swell_wave_height: [1.5, 1.6],
        },
      },
    }));

    const marine = await fetchMarineForecast(53, 1, 12, { fetchWithTimeout });

    expect(calls[0].origin).toBe('https://marine-api.open-meteo.com');
    expect(marine).toEqual([
      {
        timestamp: '2026-01-10T06:00:00.000Z',
        waveHeightM: 2.1,
        waveDirectionDeg: 260,
        wavePeriodS: 7.5,
        windWaveHeightM: 1.2,
        swellWaveHeightM: 1.5,
      },
      {
        timestamp: '2026-01-10T07:00:00.000Z',
        waveHeightM: 2.4,
        waveDirectionDeg: null,
        wavePeriodS: 8,
        windWaveHeightM: 1.4,
        swellWaveHeightM: 1.6,
      },
    ]);
  });
});

describe('fetchSiteWeather', () => {
  const site = { name: 'Test Array', lat: 54, lon: 1, capacityMw: 500 };

  test('degrades each part on its own', async () => {
    const { fetchWithTimeout } = stubFetch((url) => {
      if (url.origin === 'https://marine-api.open-meteo.com') {
        return { status: 500 };
      }
      return url.searchParams.has('current') ? { body: { current: currentBlock } } : { status: 429 };
    });

    const weather = await fetchSiteWeather(site, { includeMarine: true }, { fetchWithTimeout });

    expect(weather.site).toBe(site);
    expect(weather.current?.windSpeedMs).toBe(11.3);
    expect(weather.forecast).toEqual([]);
    expect(weather.marineForecast).toEqual([]);
    expect(console.warn).toHaveBeenCalledWith('[Weather] Forecast unavailable for Test Array:', 'Open-Meteo request failed with status 429');
    expect(console.warn).toHaveBeenCalledWith(
      '[Weather] Marine forecast unavailable for Test Array:',
      'Open-Meteo request failed with status 500',
    );
  });

  test('skips forecast and marine requests when not asked for', async () => {
    const { fetchWithTimeout, calls } = stubFetch(() => ({ body: { current: currentBlock } }));
    await fetchSiteWeather(site, { includeForecast: false }, { fetchWithTimeout });
    expect(calls).toHaveLength(1);
  });
});

describe('grid sampling', () => {
  const bounds = { north: 52, south: 50, west: 0, east: 2 };

  test('lays out a lattice with both corners included', () => {
    const coordinates = buildGridCoordinates(bounds, 3);
    expect(coordinates).toHaveLength(9);
    expect(coordinates[0]).toEqual({ lat: 50, lon: 0 });
    expect(coordinates[4]).toEqual({ lat: 51, lon: 1 });
    expect(coordinates[8]).toEqual({ lat: 52, lon: 2 });
  });

  test('collapses to the south-west corner for a single point', () => {
    expect(buildGridCoordinates(bounds, 1)).toEqual([{ lat: 50, lon: 0 }]);
  });

  test('computes the three-hour pressure trend', async () => {
    const { fetchWithTimeout } = stubFetch(() => ({
      body: {
        current: { temperature_2m: 9, pressure_msl: 1010, wind_speed_10m: 12, wind_direction_10m: 200, weather_code: 61 },
        hourly: { pressure_msl: [1010, 1009, 1008, 1006.5, 1005] },
      },
    }));

    const point = await fetchGridPoint(51, 1, { fetchWithTimeout });

    expect(point).toEqual({
      lat: 51,
      lon: 1,
      temperatureC: 9,
      pressureHpa: 1010,
      pressureTrendHpa: -3.5,
      windSpeedMs: 12,
      windDirectionDeg: 200,
      weatherCode: 61,
    });
  });

  test('uses a flat trend when the hourly series is short', async () => {
    const { fetchWithTimeout } = stubFetch(() => ({
      body: {
        current: { temperature_2m: 9, pressure_msl: 1010, wind_speed_10m: 12, wind_direction_10m: 200, weather_code: 61 },
        hourly: { pressure_msl: [1010, 1009, 1008] },
      },
    }));
    expect((await fetchGridPoint(51, 1, { fetchWithTimeout })).pressureTrendHpa).toBe(0);
  });

  test('leaves out points whose request fails', async () => {
    const { fetchWithTimeout } = stubFetch((url) => {
      if (url.searchParams.get('latitude') === '51') {
        return { status: 500 };
      }
      return {
        body: {
          current: { temperature_2m: 9, pressure_msl: 1012, wind_speed_10m: 8, wind_direction_10m: 180, weather_code: 3 },
          hourly: { pressure_msl: [1012, 1012, 1012, 1012] },
        },
      };
    });

    const grid = await fetchGridWeather(bounds, 3, { fetchWithTimeout });

    expect(grid.map(({ lat, lon }) => [lat, lon])).toEqual([
      [50, 0],
      [50, 1],
      [50, 2],
      [52, 0],
      [52, 1],
      [52, 2],
    ]);
    expect(console.warn).toHaveBeenCalledTimes(3);
    expect(console.warn).toHaveBeenCalledWith('[Synoptic] Error fetching grid point (51.0, 0.0):', 'Open-Meteo request failed with status 500');
  });
});
