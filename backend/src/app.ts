import * as path from 'path';
import * as fs from 'fs';
import express from 'express';
import cors from 'cors';
import morgan from 'morgan';
import type { AppConfig } from './config';
import { errorHandler } from './middleware/error-handler';
import { dashboardRouter } from './routes/dashboard.routes';
import { Geocoder } from './services/geocoder';
import { RouteFetcher } from './services/routeFetcher';
import { getSchools } from './services/schoolData';

const FRONTEND_DIST = path.join(__dirname, '..', '..', 'frontend', 'dist');

export function createApp(config: AppConfig): express.Express {
  const app = express();
  app.use(cors());
  app.use(morgan('short'));

  const geocoder = new Geocoder(config.geocoder);
  const routeFetcher = new RouteFetcher({
    baseUrl: config.routing.baseUrl,
    timeoutMs: config.routing.timeoutMs,
    retries: config.routing.retries,
    cacheSize: config.routing.cacheSize,
    cacheTtlMs: config.routing.cacheTtlMs,
  });

  app.use(
    '/api',
    dashboardRouter({
      config,
      // re-read the CSV on every request while developing
      loadSchools: () => getSchools(config.schoolsCsvPath, { reload: !config.production }),
      geocoder,
      routeFetcher,
    }),
  );

  // In production, serve the built frontend
  if (fs.existsSync(FRONTEND_DIST)) {
    app.use(express.static(FRONTEND_DIST));
  }

  // Catch-all: serve frontend index.html for client-side routing
  app.get('*', (req, res, next) => {
    if (req.path.startsWith('/api/')) {
      next();
      return;
    }
    const index = path.join(FRONTEND_DIST, 'index.html');
    if (fs.existsSync(index)) {
      res.sendFile(index);
    } else {
      res.status(404).send('Frontend not built. Run: npm run build');
    }
  });

  app.use(errorHandler);
  return app;
}
