/**
 * Log levels in order of verbosity (most verbose first)
 */
export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';

/**
 * Log level priority (lower number = more verbose)
 */
export const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  trace: 10,
  debug: 20,
  info: 30,
  warn: 40,
  error: 50,
  fatal: 60,
};

/**
 * Per-service log level configuration
 *
 * Service names follow the pattern: category:subcategory
 * e.g., 'converter:heartbeat', 'rates:api'
 */
export interface LogConfig {
  /** Default log level for all services */
  defaultLevel: LogLevel;
  /** Per-service level overrides */
  services: Record<string, LogLevel>;
  /** Enable file logging */
  enableFileLogging: boolean;
  /** Enable performance logging */
  enablePerfLogging: boolean;
  /** Log directory path */
  logDir: string;
  /** Days to keep daily log files before pruning */
  retentionDays: number;
  /** Maximum stack frames kept when logging an error */
  exceptionFramesLimit: number;
}

/**
 * Default log configuration
 *
 * Heartbeats fire every second, so they stay quiet unless asked for.
 * To debug, set LOG_LEVEL=debug or LOG_LEVEL_CONVERTER_HEARTBEAT=debug env var
 */
export const DEFAULT_LOG_CONFIG: LogConfig = {
  defaultLevel: 'info',
  services: {
    // Stream supervision
    converter: 'info',
    'converter:supervisor': 'info',
    'converter:stream': 'info',
    'converter:heartbeat': 'warn',

    // Request processing
    'converter:processor': 'info',
    'converter:retry': 'info',

    // Rate source and cache
    rates: 'info',
    'rates:api': 'info',
    cache: 'info',
    'cache:redis': 'info',
    'cache:rates': 'info',
  },
  enableFileLogging: true,
  enablePerfLogging: true,
  logDir: 'logs',
  retentionDays: 7,
  exceptionFramesLimit: 10,
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.hasOwn(LOG_LEVEL_PRIORITY, value);
}

/**
 * Get the effective log level for a service
 *
 * Checks in order:
 * 1. Environment variable: LOG_LEVEL_{SERVICE} (e.g., LOG_LEVEL_CONVERTER_HEARTBEAT=trace)
 * 2. Global LOG_LEVEL environment variable
 * 3. Per-service config
 * 4. Parent service config (e.g., 'converter' for 'converter:processor')
 * 5. Default level
 */
export function getLogLevel(
  serviceName: string,
  config: LogConfig = DEFAULT_LOG_CONFIG
): LogLevel {
  const envKey = `LOG_LEVEL_${serviceName.replace(/:/g, '_').toUpperCase()}`;
  const envLevel = process.env[envKey]?.toLowerCase();
  if (isLogLevel(envLevel)) {
    return envLevel;
  }

  const globalEnvLevel = process.env.LOG_LEVEL?.toLowerCase();
  if (isLogLevel(globalEnvLevel)) {
    return globalEnvLevel;
  }

  const exact = config.services[serviceName];
  if (exact) {
    return exact;
  }

  const parentService = serviceName.split(':')[0];
  const parent = config.services[parentService];
  if (parentService !== serviceName && parent) {
    return parent;
  }

  return config.defaultLevel;
}

/**
 * Check if a log level should be logged given the minimum level
 */
export function shouldLog(level: LogLevel, minLevel: LogLevel): boolean {
  return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[minLevel];
}

/**
 * Get the service name from a logger name (first segment before ':')
 */
export function getServiceFromName(name: string): string {
  return name.split(':')[0];
}

function positiveIntFromEnv(key: string, fallback: number): number {
  const parsed = parseInt(process.env[key] ?? '', 10);
  return Number.isInteger(parsed) && parsed > 0 ? parsed : fallback;
}

/**
 * Build runtime config by merging defaults with environment
 *
 * File output is on everywhere except under test, unless LOG_FILE_ENABLED=false.
 */
export function buildRuntimeConfig(): LogConfig {
  const isTest = process.env.NODE_ENV === 'test';

  return {
    ...DEFAULT_LOG_CONFIG,
    enableFileLogging: process.env.LOG_FILE_ENABLED !== 'false' && !isTest,
    enablePerfLogging: process.env.LOG_PERF_ENABLED !== 'false' && !isTest,
    logDir: process.env.LOG_DIR || DEFAULT_LOG_CONFIG.logDir,
    retentionDays: positiveIntFromEnv('LOG_EXPIRATION_DAYS', DEFAULT_LOG_CONFIG.retentionDays),
    exceptionFramesLimit: positiveIntFromEnv(
      'LOG_EXCEPTION_FRAMES_LIMIT',
      DEFAULT_LOG_CONFIG.exceptionFramesLimit
    ),
  };
}
