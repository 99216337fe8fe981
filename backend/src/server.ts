/**
 * School distance map - backend API
 * Serves the dashboard render model and the filtered CSV export.
 */

import { createApp } from './app';
import { loadConfig } from './config';
import { getSchools } from './services/schoolData';

const config = loadConfig();
const app = createApp(config);

app.listen(config.port, () => {
  try {
    const { records } = getSchools(config.schoolsCsvPath);
    console.log(`Schools preloaded (${records.length}).`);
  } catch (e) {
    console.warn(`Schools not loaded: ${e instanceof Error ? e.message : String(e)}`);
  }
  if (!config.routing.apiKey) console.warn('ORS_API_KEY not set; routes will be skipped.');
  console.log(`Server listening on port ${config.port}`);
});
