import { ConfigError } from '../errors/CustomError';
import * as dotenv from 'dotenv';
import path from 'path';

const envPath = path.join(process.cwd(), '.env');

dotenv.config({ path: envPath });

export const getEnvVariable = (key: string, defaultValue?: string): string => {
  const value = process.env[key];
  if (!value) {
    if (defaultValue !== undefined) {
      return defaultValue;
    }
    throw new ConfigError(`Missing environment variable: ${key}`);
  }
  return value;
};

export const getNumericEnv = (
  key: string,
  defaultValue: number,
  min: number = 0,
): number => {
  const raw = getEnvVariable(key, String(defaultValue));
  const value = Number(raw);
  if (!Number.isFinite(value) || value < min) {
    throw new ConfigError(
      `Environment variable ${key} must be a number >= ${min} (got "${raw}")`,
    );
  }
  return value;
};

/* -------------------------------------------------------------------------------------------------
 * External tools
 * ------------------------------------------------------------------------------------------------- */

export const ZPOOL_BIN = getEnvVariable('ZPOOL_BIN', 'zpool');

export const ARCSTAT_BIN = getEnvVariable('ARCSTAT_BIN', 'arcstat');

/* -------------------------------------------------------------------------------------------------
 * Collector
 * ------------------------------------------------------------------------------------------------- */

export const TELEMETRY_INTERVAL_SEC = getNumericEnv('TELEMETRY_INTERVAL_SEC', 1, 1);

export const TELEMETRY_WARMUP_SAMPLES = getNumericEnv('TELEMETRY_WARMUP_SAMPLES', 3);

export const TELEMETRY_COOLDOWN_SAMPLES = getNumericEnv('TELEMETRY_COOLDOWN_SAMPLES', 3);

export const TELEMETRY_MAX_RESTARTS = getNumericEnv('TELEMETRY_MAX_RESTARTS', 2);

// SIGTERM -> SIGKILL grace period when stopping the source
export const TELEMETRY_KILL_GRACE_MS = getNumericEnv('TELEMETRY_KILL_GRACE_MS', 2000);

export const TELEMETRY_OUTPUT_DIR = getEnvVariable('TELEMETRY_OUTPUT_DIR', './telemetry');

/* -------------------------------------------------------------------------------------------------
 * Analytics
 * ------------------------------------------------------------------------------------------------- */

export const PHASE_IDLE_EPSILON_MBPS = getNumericEnv('PHASE_IDLE_EPSILON_MBPS', 1);

export const ARC_IDLE_EPSILON_READS = getNumericEnv('ARC_IDLE_EPSILON_READS', 100);

export const ANOMALY_Z_THRESHOLD = getNumericEnv('ANOMALY_Z_THRESHOLD', 3);

export const SCALING_DIMINISHING_PCT = getNumericEnv('SCALING_DIMINISHING_PCT', 5);

export const SCALING_PRIOR_GAIN_PCT = getNumericEnv('SCALING_PRIOR_GAIN_PCT', 20);
