import * as path from 'path';
import { z } from 'zod';

const ROUTE_PROFILES = [
  'cycling-regular',
  'cycling-road',
  'cycling-electric',
  'cycling-mountain',
  'foot-walking',
  'driving-car',
] as const;

export const routeProfileSchema = z.enum(ROUTE_PROFILES);

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3001),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  SCHOOLS_CSV: z.string().min(1).default('data/mappa_scuole.csv'),
  ORS_API_KEY: z.string().default(''),
  ORS_BASE_URL: z.string().url().default('https://api.openrouteservice.org'),
  ROUTE_PROFILE: routeProfileSchema.default('cycling-regular'),
  ROUTE_CONCURRENCY: z.coerce.number().int().min(1).max(16).default(2),
  ROUTE_RETRIES: z.coerce.number().int().min(0).max(5).default(1),
  ROUTE_TIMEOUT_MS: z.coerce.number().int().positive().default(15000),
  GEOCODER_URL: z.string().url().default('https://nominatim.openstreetmap.org/search'),
  GEOCODER_USER_AGENT: z.string().min(1).default('school-distance-map'),
  GEOCODER_TIMEOUT_MS: z.coerce.number().int().positive().default(10000),
  CACHE_MAX_ENTRIES: z.coerce.number().int().positive().default(5000),
  CACHE_TTL_MS: z.coerce.number().int().min(0).default(6 * 60 * 60 * 1000),
});

export interface AppConfig {
  port: number;
  production: boolean;
  schoolsCsvPath: string;
  routing: {
    apiKey: string;
    baseUrl: string;
    profile: z.infer<typeof routeProfileSchema>;
    concurrency: number;
    retries: number;
    timeoutMs: number;
    cacheSize: number;
    cacheTtlMs: number;
  };
  geocoder: {
    url: string;
    userAgent: string;
    timeoutMs: number;
    cacheSize: number;
    cacheTtlMs: number;
  };
}

/** Reads the environment once at startup; invalid values throw with the zod issues. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env, cwd = process.cwd()): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new Error(`Invalid configuration: ${issues}`);
  }
  const e = parsed.data;
  return {
    port: e.PORT,
    production: e.NODE_ENV === 'production',
    schoolsCsvPath: path.resolve(cwd, e.SCHOOLS_CSV),
    routing: {
      apiKey: e.ORS_API_KEY.trim(),
      baseUrl: e.ORS_BASE_URL.replace(/\/+$/, ''),
      profile: e.ROUTE_PROFILE,
      concurrency: e.ROUTE_CONCURRENCY,
      retries: e.ROUTE_RETRIES,
      timeoutMs: e.ROUTE_TIMEOUT_MS,
      cacheSize: e.CACHE_MAX_ENTRIES,
      cacheTtlMs: e.CACHE_TTL_MS,
    },
    geocoder: {
      url: e.GEOCODER_URL,
      userAgent: e.GEOCODER_USER_AGENT,
      timeoutMs: e.GEOCODER_TIMEOUT_MS,
      cacheSize: e.CACHE_MAX_ENTRIES,
      cacheTtlMs: e.CACHE_TTL_MS,
    },
  };
}
