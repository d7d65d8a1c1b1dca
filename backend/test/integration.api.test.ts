import request from 'supertest';
import { app, buildApp } from '../index.js';
import { calmHour, hourAt, latticeWithCentre, stormHour, stubFetch } from './helpers.js';

const testSites = [
  { name: 'Test Array', lat: 54, lon: 1, capacityMw: 500 },
  { name: 'Dark Array', lat: 55, lon: 2, capacityMw: 300 },
];

const upstreamBody = {
  current: {
    time: '2026-01-10T06:00',
    temperature_2m: 6,
    relative_humidity_2m: 70,
    pressure_msl: 1012,
    wind_speed_10m: 28,
    wind_direction_10m: 250,
    wind_gusts_10m: 33,
    weather_code: 3,
  },
  hourly: {
    time: ['2026-01-10T07:00', '2026-01-10T08:00', '2026-01-10T09:00'],
    temperature_2m: [8, 8, 8],
    relative_humidity_2m: [70, 70, 70],
    pressure_msl: [1012, 1012, 1012],
    wind_speed_10m: [14, 14, 14],
    wind_direction_10m: [250, 250, 250],
    wind_gusts_10m: [16, 16, 16],
  },
};

// Every request for the second site fails.
const liveApp = () =>
  buildApp({
    sites: testSites,
    fetchWithTimeout: stubFetch((url) => (url.searchParams.get('latitude') === '55' ? { status: 500 } : { body: upstreamBody }))
      .fetchWithTimeout,
  });

beforeEach(() => {
  vi.spyOn(console, 'warn').mockImplementation(() => {});
  vi.spyOn(console, 'error').mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

test('GET /healthz returns healthy payload', async () => {
  const res = await request(app).get('/healthz');
  expect(res.status).toBe(200);
  expect(res.body.ok).toBe(true);
  expect(res.body.service).toBe('offshore-wind-conditions');
  expect(res.body.sites).toBe(8);
});

test('GET /api/wind-farms lists the bundled registry', async () => {
  const res = await request(app).get('/api/wind-farms');
  expect(res.status).toBe(200);
  expect(res.body).toHaveLength(8);
  expect(res.body[0].name).toBe('Hornsea One');
});

describe('POST /api/wind-impact', () => {
  test('escalates on a forecast storm', async () => {
    const res = await request(app)
      .post('/api/wind-impact')
      .send({ current: calmHour(0), forecast: [calmHour(0), stormHour(1), calmHour(2)], now: hourAt(0) });

    expect(res.status).toBe(200);
    expect(res.body.current.status).toBe('normal');
    expect(res.body.upcomingEvents).toHaveLength(1);
    expect(res.body.priorityColor).toBe('red');
    expect(res.body.priorityIssue.description).toBe('High winds: 30.0 m/s (gusts 30.0 m/s) - Emergency shutdown (ETA: 1.0h)');
  });

  test('rejects a sample with a missing field', async () => {
    const res = await request(app)
      .post('/api/wind-impact')
      .send({
        current: { timestamp: hourAt(0), windSpeedMs: 14, windGustMs: 16, windDirectionDeg: 240, temperatureC: 8 },
        forecast: [],
      });

    expect(res.status).toBe(400);
    expect(res.body).toEqual({ error: 'Malformed current', details: 'Field "humidityPct" must be a number, got nothing.' });
  });

  test('names the offending forecast hour', async () => {
    const res = await request(app)
      .post('/api/wind-impact')
      .send({ current: calmHour(0), forecast: [calmHour(0), { ...calmHour(1), timestamp: 'soon' }] });

    expect(res.status).toBe(400);
    expect(res.body.error).toBe('Malformed forecast[1]');
  });

  test('rejects an unusable reference time', async () => {
    const res = await request(app)
      .post('/api/wind-impact')
      .send({ current: calmHour(0), forecast: [], now: { at: 'noon' } });

    expect(res.status).toBe(400);
    expect(res.body.error).toBe('Malformed reference time');
  });

  test('answers malformed JSON with a 400', async () => {
    const res = await request(app).post('/api/wind-impact').set('Content-Type', 'application/json').send('{"current":');
    expect(res.status).toBe(400);
    expect(res.body).toEqual({ error: 'Malformed request body' });
  });
});

describe('POST /api/synoptic', () => {
  test('analyzes a posted grid', async () => {
    const res = await request(app).post('/api/synoptic').send({ grid: latticeWithCentre(1020) });

    expect(res.status).toBe(200);
    expect(res.body).toEqual({
      pointCount: 9,
      systems: [{ type: 'high', lat: 51, lon: 1, pressureHpa: 1020, symbol: 'H' }],
      fronts: [],
      motion: { velocityMs: 5, directionDeg: 270, pressureTrendHpa: 0 },
    });
  });

  test('renders GeoJSON on request', async () => {
    const res = await request(app).post('/api/synoptic?format=geojson').send({ grid: latticeWithCentre(1020) });

    expect(res.status).toBe(200);
    expect(res.body.type).toBe('FeatureCollection');
    expect(res.body.features).toHaveLength(6);
    expect(res.body.features[0].properties.label).toBe('HIGH: 1020.0 hPa');
  });

  test('rejects unsupported formats and missing grids', async () => {
    const badFormat = await request(app).post('/api/synoptic?format=xml').send({ grid: latticeWithCentre(1020) });
    expect(badFormat.status).toBe(400);
    expect(badFormat.body.error).toBe('Unsupported format');

    const noGrid = await request(app).post('/api/synoptic').send({ points: [] });
    expect(noGrid.status).toBe(400);
    expect(noGrid.body.error).toBe('Malformed grid');
  });
});

describe('GET /api/wind-farms/impact', () => {
  test('reports sites with usable weather and skips the rest', async () => {
    const res = await request(liveApp()).get('/api/wind-farms/impact');

    expect(res.status).toBe(200);
    expect(Object.keys(res.body.sites)).toEqual(['Test Array']);
    const { overall, marineForecast } = res.body.sites['Test Array'];
    expect(overall.current.status).toBe('shutdown');
    expect(overall.upcomingEvents).toEqual([]);
    expect(overall.priorityColor).toBe('red');
    expect(marineForecast).toEqual([]);
  });

  test('renders a text summary', async () => {
    const res = await request(liveApp()).get('/api/wind-farms/impact?format=text');

    expect(res.status).toBe(200);
    expect(res.text).toBe(
      'Test Array (500 MW)\n   Status: SHUTDOWN\n   Capacity: 0%\n   Priority: High winds: 28.0 m/s (gusts 33.0 m/s) - Emergency shutdown',
    );
  });

  test('renders a GeoJSON status layer', async () => {
    const res = await request(liveApp()).get('/api/wind-farms/impact?format=geojson');

    expect(res.status).toBe(200);
    expect(res.body.features).toHaveLength(1);
    expect(res.body.features[0].geometry.coordinates).toEqual([1, 54]);
    expect(res.body.features[0].properties.color).toBe('#e74c3c');
  });
});

describe('GET /api/synoptic', () => {
  test('samples the configured region', async () => {
    const res = await request(liveApp()).get('/api/synoptic?grid_size=3');

    expect(res.status).toBe(200);
    expect(res.body).toEqual({
      pointCount: 9,
      systems: [],
      fronts: [],
      motion: { velocityMs: 14, directionDeg: 250, pressureTrendHpa: 0 },
    });
  });

  test('rejects an out-of-range grid size', async () => {
    const res = await request(liveApp()).get('/api/synoptic?grid_size=50');
    expect(res.status).toBe(400);
    expect(res.body.error).toBe('Invalid grid size');
  });

  test('fails with 502 when no grid point can be fetched', async () => {
    const offline = buildApp({ sites: testSites, fetchWithTimeout: stubFetch(() => ({ status: 503 })).fetchWithTimeout });
    const res = await request(offline).get('/api/synoptic?grid_size=2');

    expect(res.status).toBe(502);
    expect(res.body).toEqual({ error: 'No grid points could be retrieved' });
  });
});
