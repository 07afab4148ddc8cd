import { createApp } from './src/server/create-app.js';
import { globalErrorHandler, notFoundHandler } from './src/server/error-handler.js';
import { startServer } from './src/server/start-server.js';
import {
  PORT,
  IS_PRODUCTION,
  REQUEST_TIMEOUT_MS,
  RATE_LIMIT_WINDOW_MS,
  RATE_LIMIT_MAX_REQUESTS,
  CORS_ALLOWLIST,
  ROUTE_FILE,
  FIRE_ZONES_FILE,
  FIRE_LEVELS_FILE,
  FORECAST_DAYS,
  THRESHOLDS,
} from './src/server/runtime.js';
import { registerHealthRoutes } from './src/routes/health.js';
import { registerReportRoutes } from './src/routes/report.js';
import type { FireRiskLookup } from './src/utils/forecast.js';
import { loadFireRiskLookup } from './src/utils/fire-risk.js';
import { DEFAULT_FETCH_HEADERS, createFetchWithTimeout } from './src/utils/http-client.js';
import { createReportService } from './src/utils/report-service.js';
import { loadRoute } from './src/utils/route-catalogue.js';
import { validateThresholdConfig } from './src/utils/thresholds.js';
import { createOpenMeteoForecastProvider } from './src/utils/weather-service.js';

const route = loadRoute(ROUTE_FILE);
const thresholds = validateThresholdConfig(THRESHOLDS);

const loadOptionalFireRisk = (): FireRiskLookup | null => {
  try {
    return loadFireRiskLookup(FIRE_ZONES_FILE, FIRE_LEVELS_FILE);
  } catch (error) {
    console.warn('[FireRisk] Fire-risk data unavailable, reports will carry no fire warnings:', error instanceof Error ? error.message : error);
    return null;
  }
};

const provider = createOpenMeteoForecastProvider({
  fetchWithTimeout: createFetchWithTimeout(REQUEST_TIMEOUT_MS),
  fetchOptions: { headers: DEFAULT_FETCH_HEADERS },
  forecastDays: FORECAST_DAYS,
});

const fireRisk = loadOptionalFireRisk();

const reportService = createReportService({
  provider,
  fireRisk,
  route,
  thresholds,
});

export const app = createApp({
  isProduction: IS_PRODUCTION,
  corsAllowlist: CORS_ALLOWLIST,
  rateLimitWindowMs: RATE_LIMIT_WINDOW_MS,
  rateLimitMaxRequests: RATE_LIMIT_MAX_REQUESTS,
});

registerHealthRoutes({ app, route, fireRiskLoaded: fireRisk !== null });
registerReportRoutes({ app, reportService, route });
app.use(notFoundHandler);
app.use(globalErrorHandler);

if (process.env.NODE_ENV !== 'test') {
  console.log(`[Report] Route "${route.name}" loaded with ${route.stages.length} stages from ${ROUTE_FILE}.`);
  startServer({ app, port: PORT });
}
