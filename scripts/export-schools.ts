#!/usr/bin/env node
/**
 * Runs the dashboard pipeline without the UI and writes the filtered table as CSV.
 *
 * Usage: npx tsx scripts/export-schools.ts --address "Brugherio" [--bands "0-10 km,10-20 km"]
 *          [--general] [--montessori] [--support] [--routes 0] [--profile cycling-regular] [--out file.csv]
 *        npx tsx scripts/export-schools.ts --lat 45.55 --lon 9.30 ...
 */

import * as fs from 'fs';
import * as path from 'path';
import { loadConfig } from '../backend/src/config';
import { parseDashboardQuery } from '../backend/src/routes/dashboard.schema';
import { buildDashboard } from '../backend/src/services/dashboard';
import { exportFileName, tableToCsv } from '../backend/src/services/exportCsv';
import { Geocoder } from '../backend/src/services/geocoder';
import { RouteFetcher } from '../backend/src/services/routeFetcher';
import { loadSchoolsCsv } from '../backend/src/services/schoolData';
import { parseFlags } from './lib/args';

const PROJECT_ROOT = process.cwd();
const OUT_DIR = path.join(PROJECT_ROOT, 'data', 'exports');

async function main(): Promise<void> {
  const config = loadConfig();
  const { out, ...query } = parseFlags(process.argv.slice(2));
  const dashboard = parseDashboardQuery(query, config.routing.profile);

  console.log(`Loading ${path.relative(PROJECT_ROOT, config.schoolsCsvPath)}...`);
  const { records } = loadSchoolsCsv(config.schoolsCsvPath);
  console.log(`  ${records.length} schools`);

  const model = await buildDashboard(dashboard, {
    schools: records,
    geocoder: new Geocoder(config.geocoder),
    routeFetcher: new RouteFetcher({
      baseUrl: config.routing.baseUrl,
      timeoutMs: config.routing.timeoutMs,
      retries: config.routing.retries,
      cacheSize: config.routing.cacheSize,
      cacheTtlMs: config.routing.cacheTtlMs,
    }),
    routing: { apiKey: config.routing.apiKey, concurrency: config.routing.concurrency },
  });

  console.log(`  Origin: ${model.origin.label} (${model.origin.lat}, ${model.origin.lon})`);
  for (const s of model.statistics) {
    console.log(`  ${s.band}: ${s.count} schools (min ${s.minKm} km, max ${s.maxKm} km, mean ${s.meanKm} km)`);
  }
  for (const w of model.warnings) console.warn(`  ${w}`);

  const outPath = out ? path.resolve(PROJECT_ROOT, out) : path.join(OUT_DIR, exportFileName(model.bands));
  fs.mkdirSync(path.dirname(outPath), { recursive: true });
  fs.writeFileSync(outPath, tableToCsv(model.table));
  console.log(`  Wrote ${model.table.length} rows to ${outPath}`);
}

main().catch((e) => {
  console.error(e instanceof Error ? e.message : e);
  process.exit(1);
});
