import { Router } from 'express';
import type { AppConfig } from '../config';
import { buildDashboard } from '../services/dashboard';
import { exportFileName, tableToCsv } from '../services/exportCsv';
import type { Geocoder } from '../services/geocoder';
import type { RouteFetcher } from '../services/routeFetcher';
import type { SchoolDataset } from '../services/schoolData';
import type { DashboardConfig, DashboardModel } from '../types';
import { parseDashboardQuery } from './dashboard.schema';

export interface DashboardRouteDeps {
  config: AppConfig;
  loadSchools: () => SchoolDataset;
  geocoder: Pick<Geocoder, 'geocode'>;
  routeFetcher: Pick<RouteFetcher, 'fetchRoute'>;
}

export function dashboardRouter(deps: DashboardRouteDeps): Router {
  const router = Router();

  const run = async (dashboard: DashboardConfig): Promise<DashboardModel> => {
    const data = deps.loadSchools();
    const model = await buildDashboard(dashboard, {
      schools: data.records,
      geocoder: deps.geocoder,
      routeFetcher: deps.routeFetcher,
      routing: { apiKey: deps.config.routing.apiKey, concurrency: deps.config.routing.concurrency },
    });
    if (data.skippedRows.length) {
      model.warnings.push(`${data.skippedRows.length} school row(s) without coordinates were skipped.`);
    }
    return model;
  };

  router.get('/dashboard', async (req, res, next) => {
    try {
      const dashboard = parseDashboardQuery(req.query, deps.config.routing.profile);
      res.json(await run(dashboard));
    } catch (e) {
      next(e);
    }
  });

  router.get('/dashboard/export.csv', async (req, res, next) => {
    try {
      const dashboard = parseDashboardQuery(req.query, deps.config.routing.profile);
      const model = await run(dashboard);
      res.attachment(exportFileName(model.bands));
      res.type('text/csv');
      res.send(tableToCsv(model.table));
    } catch (e) {
      next(e);
    }
  });

  router.get('/health', (_req, res, next) => {
    try {
      res.json({ status: 'ok', schools: deps.loadSchools().records.length });
    } catch (e) {
      next(e);
    }
  });

  return router;
}
