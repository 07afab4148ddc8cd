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
}

const READ_METHODS = ['GET', 'HEAD', 'OPTIONS'];

// The API only serves reports; anything that would carry a body is refused before routing.
const rejectWrites = (req: Request, res: Response, next: NextFunction) => {
  if (READ_METHODS.includes(req.method)) {
    next();
    return;
  }
  res.setHeader('Allow', 'GET, HEAD');
  res.status(405).json({ error: `${req.method} is not supported; reports are read-only.` });
};

const logRequests = (isProduction: boolean) => (req: Request, res: Response, next: NextFunction) => {
  const requestId = crypto.randomUUID();
  const startedAt = Date.now();
  res.locals.requestId = requestId;
  res.setHeader('X-Request-Id', requestId);
  res.on('finish', () => {
    if (!isProduction || res.statusCode >= 500) {
      console.log(`[Http] ${requestId} ${req.method} ${req.originalUrl} -> ${res.statusCode} (${Date.now() - startedAt}ms)`);
    }
  });
  next();
};

export const createApp = ({ isProduction, corsAllowlist, rateLimitWindowMs, rateLimitMaxRequests }: CreateAppOptions): Express => {
  const app = express();

  app.disable('x-powered-by');
  app.set('trust proxy', 1);
  app.use(
    cors({
      methods: READ_METHODS,
      origin(origin, callback) {
        if (!origin) {
          callback(null, true);
          return;
        }
        callback(null, corsAllowlist.length === 0 ? !isProduction : corsAllowlist.includes(origin));
      },
    })
  );
  app.use(compression());
  app.use(helmet());
  app.use(logRequests(isProduction));

  // Reports are computed per request and never cached.
  app.use('/api', rejectWrites, (_req: Request, res: Response, next: NextFunction) => {
    res.setHeader('Cache-Control', 'no-store');
    next();
  });
  app.use(
    '/api/report',
    rateLimit({
      windowMs: rateLimitWindowMs,
      limit: rateLimitMaxRequests,
      standardHeaders: true,
      legacyHeaders: false,
      message: { error: 'Too many report requests. Please retry later.' },
    })
  );

  return app;
};
