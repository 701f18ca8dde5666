import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

const DEFAULT_CORS_ORIGINS = [
  'http://localhost:5173',
  'http://localhost:3000',
  'http://127.0.0.1:5173',
  'http://127.0.0.1:3000'
].join(',');

const booleanFlag = (defaultValue: boolean) =>
  z
    .enum(['true', 'false', '1', '0'])
    .optional()
    .transform((v) => (v === undefined ? defaultValue : v === 'true' || v === '1'));

const EnvSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  HOST: z.string().min(1).default('0.0.0.0'),
  PORT: z.coerce.number().int().min(1).max(65535).default(8000),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  // Optional at boot: a missing key surfaces as a ConfigurationError on search
  GOOGLE_MAPS_API_KEY: z
    .string()
    .optional()
    .transform((v) => (v && v.trim() ? v.trim() : undefined)),
  GOOGLE_MAPS_API_BASE_URL: z.string().url().default('https://maps.googleapis.com/maps/api/place'),
  GOOGLE_PLACES_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  PLACES_NATIVE_OPEN_NOW: booleanFlag(false),
  ENABLE_DEBUG_ROUTES: booleanFlag(true),
  CORS_ORIGINS: z
    .string()
    .default(DEFAULT_CORS_ORIGINS)
    .transform((s) => s.split(',').map((o) => o.trim()).filter((o) => o.length > 0))
});

export type Env = z.infer<typeof EnvSchema>;

export interface AppConfig {
  env: Env['NODE_ENV'];
  host: string;
  port: number;
  logLevel: Env['LOG_LEVEL'];
  googleMapsApiKey: string | undefined;
  googleMapsApiBaseUrl: string;
  placesTimeoutMs: number;
  nativeOpenNow: boolean;
  enableDebugRoutes: boolean;
  corsOrigins: string[];
}

export class InvalidEnvironmentError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid environment configuration: ${issues.join('; ')}`);
    this.name = 'InvalidEnvironmentError';
  }
}

/**
 * Parse configuration from an env map (process.env by default).
 * Throws InvalidEnvironmentError listing every offending variable.
 */
export function getConfig(source: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse({
    NODE_ENV: source.NODE_ENV,
    HOST: source.HOST,
    PORT: source.PORT,
    LOG_LEVEL: source.LOG_LEVEL,
    GOOGLE_MAPS_API_KEY: source.GOOGLE_MAPS_API_KEY,
    GOOGLE_MAPS_API_BASE_URL: source.GOOGLE_MAPS_API_BASE_URL,
    GOOGLE_PLACES_TIMEOUT_MS: source.GOOGLE_PLACES_TIMEOUT_MS,
    PLACES_NATIVE_OPEN_NOW: source.PLACES_NATIVE_OPEN_NOW,
    ENABLE_DEBUG_ROUTES: source.ENABLE_DEBUG_ROUTES,
    CORS_ORIGINS: source.CORS_ORIGINS
  });

  if (!parsed.success) {
    const issues = Object.entries(parsed.error.flatten().fieldErrors).map(
      ([key, messages]) => `${key}: ${(messages ?? []).join(', ')}`
    );
    throw new InvalidEnvironmentError(issues);
  }

  const env = parsed.data;
  return {
    env: env.NODE_ENV,
    host: env.HOST,
    port: env.PORT,
    logLevel: env.LOG_LEVEL,
    googleMapsApiKey: env.GOOGLE_MAPS_API_KEY,
    googleMapsApiBaseUrl: env.GOOGLE_MAPS_API_BASE_URL.replace(/\/+$/, ''),
    placesTimeoutMs: env.GOOGLE_PLACES_TIMEOUT_MS,
    nativeOpenNow: env.PLACES_NATIVE_OPEN_NOW,
    enableDebugRoutes: env.ENABLE_DEBUG_ROUTES,
    corsOrigins: env.CORS_ORIGINS
  };
}

export function isGoogleMapsConfigured(config: AppConfig): boolean {
  return Boolean(config.googleMapsApiKey);
}
