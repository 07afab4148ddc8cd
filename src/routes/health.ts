import type { Express, Request, Response } from 'express';
import pkg from '../../package.json';
import type { Route } from '../utils/forecast.js';
import { routeEndDate } from '../utils/route-catalogue.js';

interface RegisterHealthRoutesOptions {
  app: Express;
  route: Route;
  fireRiskLoaded: boolean;
}

export const registerHealthRoutes = ({ app, route, fireRiskLoaded }: RegisterHealthRoutesOptions) => {
  const respond = (_req: Request, res: Response) => {
    res.json({
      ok: true,
      service: pkg.name,
      version: pkg.version,
      route: {
        name: route.name,
        startDate: route.startDate,
        endDate: routeEndDate(route),
        stages: route.stages.length,
      },
      fireRisk: fireRiskLoaded ? 'loaded' : 'unavailable',
      timestamp: new Date().toISOString(),
    });
  };

  app.get('/healthz', respond);
  app.get('/api/health', respond);
};
