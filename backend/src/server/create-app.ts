import express, { type Express, type NextFunction, type Request, type Response } from 'express';
import cors from 'cors';
import compression from 'compression';
import helmet from 'helmet';
import rateLimit from 'express-rate-limit';
import crypto from 'node:crypto';

interface CreateAppOptions {
  isProduction: boolean;
  corsAllowlist: string[];
  rateLimitWindowMs: number;
  rateLimitMaxRequests: number;
  /** Budget for routes that fan out to Open-Meteo; counted on top of the general limit. */
  upstreamRateLimitMaxRequests: number;
  jsonBodyLimit: string;
}

// Routes that issue one upstream request per site or grid point.
const UPSTREAM_ROUTES = ['/api/wind-farms/impact', '/api/synoptic'];

const originAllowed = (origin: string | undefined, corsAllowlist: string[], isProduction: boolean): boolean => {
  if (!origin) {
    return true;
  }
  if (corsAllowlist.length === 0) {
    return !isProduction;
  }
  return corsAllowlist.includes(origin);
};

export const createApp = ({
  isProduction,
  corsAllowlist,
  rateLimitWindowMs,
  rateLimitMaxRequests,
  upstreamRateLimitMaxRequests,
  jsonBodyLimit,
}: CreateAppOptions): Express => {
  const app = express();

  app.disable('x-powered-by');
  app.set('trust proxy', 1);
  app.use(
    cors({
      methods: ['GET', 'POST'],
      origin(origin, callback) {
        callback(null, originAllowed(origin, corsAllowlist, isProduction));
      },
    }),
  );
  app.use(compression());
  app.use(helmet());
  app.use(express.json({ limit: jsonBodyLimit }));

  app.use((req: Request, res: Response, next: NextFunction) => {
    const requestId = crypto.randomUUID();
    const startedAt = Date.now();
    res.locals.requestId = requestId;
    res.setHeader('X-Request-Id', requestId);
    res.on('finish', () => {
      if (!isProduction || res.statusCode >= 500) {
        console.log(`[API] ${requestId} ${req.method} ${req.originalUrl} -> ${res.statusCode} (${Date.now() - startedAt}ms)`);
      }
    });
    next();
  });

  const limiterMessage = { error: 'Too many requests. Please retry later.' };
  app.use(
    '/api',
    rateLimit({
      windowMs: rateLimitWindowMs,
      max: rateLimitMaxRequests,
      standardHeaders: true,
      legacyHeaders: false,
      skip: (req) => req.method === 'OPTIONS',
      message: limiterMessage,
    }),
  );
  app.get(
    UPSTREAM_ROUTES,
    rateLimit({
      windowMs: rateLimitWindowMs,
      max: upstreamRateLimitMaxRequests,
      standardHeaders: true,
      legacyHeaders: false,
      message: limiterMessage,
    }),
  );

  return app;
};

// Registered after the routes: turns body-parser failures into JSON 400s.
export const registerErrorHandler = (app: Express) => {
  app.use((error: unknown, _req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      next(error);
      return;
    }
    const status = typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number' ? error.status : 500;
    if (status >= 500) {
      console.error('[API] Unhandled error:', error);
    }
    res.status(status).json({ error: status >= 500 ? 'Internal server error' : 'Malformed request body' });
  });
};
