import { AnalyzerThresholds } from './types/Route';
import { DEFAULT_THRESHOLDS } from './services/RouteAnalyzer';
import { logger } from './utils/logger';

export interface AppConfig {
  port: number;
  corsOrigin: string;
  version: string;
  analyzer: AnalyzerThresholds;
}

type Env = Record<string, string | undefined>;

function readNumber(env: Env, key: string, fallback: number, { positive = false } = {}): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isFinite(value) || value < 0 || (positive && value === 0)) {
    logger.warn({ key, value: raw, fallback }, 'Ignoring invalid numeric setting');
    return fallback;
  }
  return value;
}

/**
 * Build configuration from environment variables.
 * Call dotenv before this to pick up a .env file.
 */
export function loadConfig(env: Env = process.env): AppConfig {
  return {
    port: readNumber(env, 'PORT', 3000),
    corsOrigin: env.CORS_ORIGIN || '*',
    version: env.API_VERSION || '1.0.0',
    analyzer: {
      maxPlausibleSpeedMps: readNumber(
        env,
        'MAX_PLAUSIBLE_SPEED_MPS',
        DEFAULT_THRESHOLDS.maxPlausibleSpeedMps,
        { positive: true }
      ),
      minMovementMeters: readNumber(env, 'MIN_MOVEMENT_METERS', DEFAULT_THRESHOLDS.minMovementMeters),
      stationaryThresholdSeconds: readNumber(
        env,
        'STATIONARY_THRESHOLD_SECONDS',
        DEFAULT_THRESHOLDS.stationaryThresholdSeconds
      ),
    },
  };
}
