import type { Express, Request, Response } from 'express';
import { assertGridPoints, ContractViolationError, isRecord, UpstreamError, type GridPoint } from '../utils/contracts.js';
import type { FetchWithTimeout } from '../utils/http-client.js';
import { buildSynopticLayer } from '../utils/map-layers.js';
import { fetchGridWeather, type RegionBounds } from '../utils/open-meteo.js';
import { analyzeSynoptic } from '../utils/synoptic.js';
import type { SynopticThresholds } from '../utils/thresholds.js';
import { windDegreesToCardinal } from '../utils/wind.js';
import { parseFormat, respondWithError } from './respond.js';

const MAX_GRID_SIZE = 10;

interface RegisterSynopticRoutesOptions {
  app: Express;
  fetchWithTimeout: FetchWithTimeout;
  defaultFetchHeaders: Record<string, string>;
  regionBounds: RegionBounds;
  gridSize: number;
  thresholds: SynopticThresholds;
  debug?: boolean;
}

const SYNOPTIC_FORMATS = ['json', 'geojson'] as const;
type SynopticFormat = (typeof SYNOPTIC_FORMATS)[number];

const parseSynopticFormat = (value: unknown): SynopticFormat => parseFormat(value, SYNOPTIC_FORMATS, 'json');

const parseGridSize = (value: unknown, fallback: number): number => {
  if (value === undefined) {
    return fallback;
  }
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 2 || parsed > MAX_GRID_SIZE) {
    throw new ContractViolationError('Invalid grid size', `grid_size must be an integer between 2 and ${MAX_GRID_SIZE}.`);
  }
  return parsed;
};

export const registerSynopticRoutes = ({
  app,
  fetchWithTimeout,
  defaultFetchHeaders,
  regionBounds,
  gridSize,
  thresholds,
  debug = false,
}: RegisterSynopticRoutesOptions) => {
  const respondWithAnalysis = (res: Response, grid: GridPoint[], format: SynopticFormat) => {
    const analysis = analyzeSynoptic(grid, thresholds);

    if (debug) {
      const { motion } = analysis;
      console.log(
        `[Synoptic] ${grid.length} points: ${analysis.systems.length} pressure systems, ${analysis.fronts.length} fronts, ` +
          `front motion ${motion.velocityMs.toFixed(1)} m/s at ${motion.directionDeg.toFixed(0)}° (${windDegreesToCardinal(motion.directionDeg) ?? 'n/a'}), ` +
          `trend ${motion.pressureTrendHpa >= 0 ? '+' : ''}${motion.pressureTrendHpa.toFixed(1)} hPa/3h`,
      );
    }

    if (format === 'geojson') {
      return res.json(buildSynopticLayer({ grid, ...analysis }));
    }
    return res.json({ pointCount: grid.length, ...analysis });
  };

  app.post('/api/synoptic', (req: Request, res: Response) => {
    try {
      const body: unknown = req.body;
      if (!isRecord(body)) {
        throw new ContractViolationError('Malformed request', 'Expected a JSON object with a "grid" array.');
      }
      const format = parseSynopticFormat(req.query.format);
      return respondWithAnalysis(res, assertGridPoints(body.grid), format);
    } catch (error) {
      return respondWithError(res, error, 'Synoptic');
    }
  });

  app.get('/api/synoptic', async (req: Request, res: Response) => {
    try {
      const format = parseSynopticFormat(req.query.format);
      const size = parseGridSize(req.query.grid_size, gridSize);
      const grid = await fetchGridWeather(regionBounds, size, {
        fetchWithTimeout,
        fetchOptions: { headers: defaultFetchHeaders },
      });
      if (grid.length === 0) {
        throw new UpstreamError('No grid points could be retrieved');
      }
      return respondWithAnalysis(res, grid, format);
    } catch (error) {
      return respondWithError(res, error, 'Synoptic');
    }
  });
};
