import type { Express, Request, Response } from 'express';
import type { Route } from '../utils/forecast.js';
import { InvalidWindowError } from '../utils/report-window.js';
import { StageNotFoundError, type ReportService } from '../utils/report-service.js';
import { routeEndDate } from '../utils/route-catalogue.js';
import { isIsoDate, parseHour } from '../utils/time.js';

interface RegisterReportRoutesOptions {
  app: Express;
  reportService: ReportService;
  route: Route;
}

export const registerReportRoutes = ({ app, reportService, route }: RegisterReportRoutesOptions) => {
  app.get('/api/report', async (req: Request, res: Response) => {
    const { type, date, hour } = req.query;

    const requestedDate = typeof date === 'string' ? date.trim() : '';
    if (!requestedDate) {
      return res.status(400).json({ error: 'A report date is required (YYYY-MM-DD).' });
    }
    if (!isIsoDate(requestedDate)) {
      return res.status(400).json({ error: 'Invalid date format. Use YYYY-MM-DD.' });
    }

    let currentHour: number | undefined;
    if (hour !== undefined) {
      const parsedHour = typeof hour === 'string' ? parseHour(hour) : null;
      if (parsedHour === null) {
        return res.status(400).json({ error: 'hour must be an integer between 0 and 23.' });
      }
      currentHour = parsedHour;
    }

    const reportType = typeof type === 'string' && type.trim() ? type.trim().toLowerCase() : 'morning';
    if (reportType === 'update' && currentHour === undefined) {
      return res.status(400).json({ error: 'Update reports need the hour they are generated at (hour=0-23).' });
    }

    try {
      const report = await reportService.buildReport({ reportType, referenceDate: requestedDate, currentHour });
      return res.status(200).json({
        ...report,
        generatedAt: new Date().toISOString(),
      });
    } catch (error) {
      if (error instanceof StageNotFoundError) {
        return res.status(404).json({ error: error.message });
      }
      if (error instanceof InvalidWindowError) {
        return res.status(400).json({ error: error.message });
      }
      console.error('[Report] Failed to build report:', error);
      return res.status(500).json({
        error: 'Unable to build trail weather report.',
        details: error instanceof Error ? error.message : String(error),
      });
    }
  });

  app.get('/api/route', (_req: Request, res: Response) => {
    res.json({
      name: route.name,
      startDate: route.startDate,
      endDate: routeEndDate(route),
      stages: route.stages.map((stage, index) => ({ index, ...stage })),
    });
  });
};
