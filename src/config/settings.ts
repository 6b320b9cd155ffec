/**
 * Runtime settings loaded from environment variables with defaults
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Settings {
  port: number;
  dataDir: string;
  logLevel: LogLevel;
  serviceName: string;
  workerPoolSize: number;
  stepDelayMs: number;
  resultDelayMs: number;
  resultTimeoutMs: number;
  shutdownGraceMs: number;
}

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function readInt(name: string, raw: string | undefined, fallback: number, min: number): number {
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }

  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new Error(`Invalid ${name}: ${raw}. Must be an integer >= ${min}.`);
  }
  return value;
}

/**
 * Build settings from an environment map
 */
export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  const logLevel = (env.LOG_LEVEL || 'info').toLowerCase();
  if (!isLogLevel(logLevel)) {
    throw new Error(`Invalid LOG_LEVEL: ${env.LOG_LEVEL}. Must be one of: ${LOG_LEVELS.join(', ')}`);
  }

  const port = readInt('PORT', env.PORT, 3000, 1);
  if (port > 65535) {
    throw new Error(`Invalid PORT: ${env.PORT}. Must be between 1 and 65535.`);
  }

  return {
    port,
    dataDir: env.DATA_DIR || 'data',
    logLevel,
    serviceName: env.SERVICE_NAME || 'storefront-orders',
    workerPoolSize: readInt('WORKER_POOL_SIZE', env.WORKER_POOL_SIZE, 2, 1),
    stepDelayMs: readInt('STEP_DELAY_MS', env.STEP_DELAY_MS, 500, 1),
    resultDelayMs: readInt('RESULT_DELAY_MS', env.RESULT_DELAY_MS, 3000, 1),
    resultTimeoutMs: readInt('RESULT_TIMEOUT_MS', env.RESULT_TIMEOUT_MS, 10_000, 1),
    shutdownGraceMs: readInt('SHUTDOWN_GRACE_MS', env.SHUTDOWN_GRACE_MS, 5000, 0),
  };
}

export const settings: Settings = loadSettings();
