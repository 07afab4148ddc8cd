import type { NextFunction, Request, Response } from 'express';

export interface HttpError extends Error {
  statusCode?: number;
}

export const notFoundHandler = (req: Request, res: Response): void => {
  res.status(404).json({ error: `No route for ${req.method} ${req.path}` });
};

export const globalErrorHandler = (err: HttpError, _req: Request, res: Response, next: NextFunction): void => {
  if (res.headersSent) {
    next(err);
    return;
  }
  const status = err.statusCode ?? 500;
  if (status >= 500) {
    console.error(`[Server] ${res.locals.requestId ?? '-'} unhandled error:`, err);
  }
  res.status(status).json({ error: status >= 500 ? 'Internal server error' : err.message });
};
