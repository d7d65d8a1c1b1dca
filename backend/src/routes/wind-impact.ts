import type { Express, Request, Response } from 'express';
import { assertWeatherSample, assertWeatherSamples, ContractViolationError, isRecord } from '../utils/contracts.js';
import type { FetchWithTimeout } from '../utils/http-client.js';
import { buildSiteStatusLayer } from '../utils/map-layers.js';
import { fetchAllSiteWeather, type MarineSample } from '../utils/open-meteo.js';
import type { ImpactThresholds } from '../utils/thresholds.js';
import type { TimeInput } from '../utils/time.js';
import { analyzeSite, formatImpactSummary, type OverallStatus } from '../utils/wind-impact.js';
import type { WindFarmSite } from '../utils/wind-farms.js';
import { parseBooleanFlag, parseFormat, respondWithError } from './respond.js';

interface RegisterWindImpactRoutesOptions {
  app: Express;
  sites: WindFarmSite[];
  fetchWithTimeout: FetchWithTimeout;
  defaultFetchHeaders: Record<string, string>;
  forecastHours: number;
  thresholds: ImpactThresholds;
  debug?: boolean;
}

interface SiteImpact {
  site: WindFarmSite;
  overall: OverallStatus;
  marineForecast: MarineSample[];
}

const parseReferenceTime = (value: unknown): TimeInput | undefined => {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value === 'string' || typeof value === 'number') {
    return value;
  }
  throw new ContractViolationError('Malformed reference time', 'Field "now" must be an ISO-8601 timestamp or epoch milliseconds.');
};

export const registerWindImpactRoutes = ({
  app,
  sites,
  fetchWithTimeout,
  defaultFetchHeaders,
  forecastHours,
  thresholds,
  debug = false,
}: RegisterWindImpactRoutesOptions) => {
  app.post('/api/wind-impact', (req: Request, res: Response) => {
    try {
      const body: unknown = req.body;
      if (!isRecord(body)) {
        throw new ContractViolationError('Malformed request', 'Expected a JSON object with "current" and "forecast".');
      }
      const current = assertWeatherSample(body.current, 'current');
      const forecast = assertWeatherSamples(body.forecast, 'forecast');
      const overall = analyzeSite(current, forecast, { now: parseReferenceTime(body.now), thresholds });
      return res.json(overall);
    } catch (error) {
      return respondWithError(res, error, 'WindImpact');
    }
  });

  app.get('/api/wind-farms', (_req: Request, res: Response) => {
    res.json(sites);
  });

  app.get('/api/wind-farms/impact', async (req: Request, res: Response) => {
    try {
      const format = parseFormat(req.query.format, ['json', 'text', 'geojson'] as const, 'json');
      const includeMarine = parseBooleanFlag(req.query.marine);

      const weather = await fetchAllSiteWeather(
        sites,
        { includeForecast: true, includeMarine, forecastHours },
        { fetchWithTimeout, fetchOptions: { headers: defaultFetchHeaders } },
      );

      const now = Date.now();
      const impacts: SiteImpact[] = weather.flatMap(({ site, current, forecast, marineForecast }) => {
        if (!current || forecast.length === 0) {
          return [];
        }
        return [{ site, overall: analyzeSite(current, forecast, { now, thresholds }), marineForecast }];
      });

      if (debug) {
        console.log(`[WindImpact] Analyzed ${impacts.length} of ${sites.length} sites`);
      }

      if (format === 'text') {
        return res.type('text/plain').send(impacts.map(({ site, overall }) => formatImpactSummary(site, overall)).join('\n\n'));
      }
      if (format === 'geojson') {
        return res.json(buildSiteStatusLayer(impacts));
      }
      return res.json({
        generatedTime: new Date(now).toISOString(),
        sites: Object.fromEntries(impacts.map((impact) => [impact.site.name, impact])),
      });
    } catch (error) {
      return respondWithError(res, error, 'WindImpact');
    }
  });
};
