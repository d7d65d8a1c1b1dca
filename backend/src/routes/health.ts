import type { Express, Request, Response } from 'express';
import pkg from '../../../package.json' with { type: 'json' };
import type { RegionBounds } from '../utils/open-meteo.js';

const { name, version } = pkg;

interface RegisterHealthRoutesOptions {
  app: Express;
  siteCount: number;
  regionBounds: RegionBounds;
}

export const registerHealthRoutes = ({ app, siteCount, regionBounds }: RegisterHealthRoutesOptions) => {
  const respond = (_req: Request, res: Response) => {
    const mem = process.memoryUsage();
    res.json({
      ok: true,
      service: name,
      version,
      env: process.env.NODE_ENV || 'development',
      uptime: Math.floor(process.uptime()),
      sites: siteCount,
      region: regionBounds,
      upstream: 'open-meteo',
      memory: {
        heapUsedMb: Math.round(mem.heapUsed / 1024 / 1024),
        rssMb: Math.round(mem.rss / 1024 / 1024),
      },
      timestamp: new Date().toISOString(),
    });
  };

  app.get('/healthz', respond);
  app.get('/api/health', respond);
};
