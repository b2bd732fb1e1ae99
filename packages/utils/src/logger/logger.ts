import pino from 'pino';
import { FileTransport } from './file-transport';
import { PerformanceTracker, createNoOpPerformanceTracker } from './performance';
import { serializeError } from './serialize-error';
import {
  type LogLevel,
  type LogConfig,
  getLogLevel,
  getServiceFromName,
  buildRuntimeConfig,
  shouldLog,
  LOG_LEVEL_PRIORITY,
} from './log-config';

/**
 * Logger options for creating a new logger
 */
export interface LoggerOptions {
  /** Logger name (e.g., 'converter:heartbeat') */
  name: string;
  /** Service for file grouping (auto-detected from name if not provided) */
  service?: string;
  /** Minimum log level (auto-detected from config if not provided) */
  level?: LogLevel;
  /** Enable file logging (default: from config) */
  enableFileLogging?: boolean;
  /** Enable performance logging (default: from config) */
  enablePerfLogging?: boolean;
  /** Custom log config (default: runtime config) */
  config?: LogConfig;
}

type LogMethod = (obj: Record<string, unknown> | string, msg?: string) => void;

/**
 * Extended logger interface with file transport and perf tracking
 */
export interface Logger {
  trace: LogMethod;
  debug: LogMethod;
  info: LogMethod;
  warn: LogMethod;
  error: LogMethod;
  fatal: LogMethod;
  /**
   * Log an error at error level with its stack trimmed to the configured frame limit
   */
  exception: (error: unknown, msg?: string, context?: Record<string, unknown>) => void;
  child: (bindings: Record<string, unknown>) => Logger;
  perf: PerformanceTracker;
  flush: () => Promise<void>;
}

// Singleton file transports per service
const fileTransports: Map<string, FileTransport> = new Map();

// Singleton runtime config
let runtimeConfig: LogConfig | null = null;

/**
 * Get or create file transport for a service
 */
function getFileTransport(service: string, config: LogConfig): FileTransport {
  const existing = fileTransports.get(service);
  if (existing) {
    return existing;
  }

  const transport = new FileTransport({
    logDir: config.logDir,
    service,
    retentionDays: config.retentionDays,
    separateErrorLog: true,
  });
  fileTransports.set(service, transport);
  return transport;
}

/**
 * Get runtime config (cached)
 */
function getRuntimeConfig(): LogConfig {
  if (!runtimeConfig) {
    runtimeConfig = buildRuntimeConfig();
  }
  return runtimeConfig;
}

/**
 * Create a structured logger instance
 *
 * Features:
 * - Console output with pino-pretty in development
 * - File output with rotation and retention (JSON format)
 * - Separate error logs
 * - Performance tracking
 * - Child loggers with context propagation
 *
 * @param options - Logger configuration options (or just a name string)
 * @returns Configured Logger instance
 */
export function createLogger(options: LoggerOptions | string): Logger {
  const opts: LoggerOptions = typeof options === 'string' ? { name: options } : options;

  const config = opts.config || getRuntimeConfig();
  const service = opts.service || getServiceFromName(opts.name);
  const level = opts.level || getLogLevel(opts.name, config);
  const enableFileLogging = opts.enableFileLogging ?? config.enableFileLogging;
  const enablePerfLogging = opts.enablePerfLogging ?? config.enablePerfLogging;

  const isDevelopment = process.env.NODE_ENV === 'development';

  // Create pino logger for console output
  const pinoLogger = pino({
    name: opts.name,
    level,
    ...(isDevelopment && {
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss',
          ignore: 'pid,hostname',
        },
      },
    }),
    formatters: {
      level: (label) => ({ level: label.toUpperCase() }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  });

  const fileTransport = enableFileLogging ? getFileTransport(service, config) : null;

  const perfTracker = enablePerfLogging
    ? new PerformanceTracker(fileTransport)
    : createNoOpPerformanceTracker();

  const flush = async () => {
    if (fileTransport) await fileTransport.flush();
  };

  /**
   * Build a Logger over a pino instance, mirroring entries to the file transport
   */
  function build(target: pino.Logger, name: string, bindings: Record<string, unknown>): Logger {
    function createLogMethod(logLevel: LogLevel): LogMethod {
      const pinoMethod: pino.LogFn = target[logLevel].bind(target);

      return (obj: Record<string, unknown> | string, msg?: string) => {
        const logObj: Record<string, unknown> =
          typeof obj === 'string' ? { msg: obj } : { ...obj, msg };

        if (typeof obj === 'string') {
          pinoMethod(obj);
        } else {
          pinoMethod(obj, msg);
        }

        if (fileTransport && shouldLog(logLevel, level)) {
          fileTransport.write({
            timestamp: new Date().toISOString(),
            level: logLevel.toUpperCase(),
            name,
            service,
            ...bindings,
            ...logObj,
          });
        }
      };
    }

    const error = createLogMethod('error');

    return {
      trace: createLogMethod('trace'),
      debug: createLogMethod('debug'),
      info: createLogMethod('info'),
      warn: createLogMethod('warn'),
      error,
      fatal: createLogMethod('fatal'),
      exception: (err, msg, context) =>
        error({ ...context, err: serializeError(err, config.exceptionFramesLimit) }, msg),
      child: (childBindings: Record<string, unknown>) => {
        const merged = { ...bindings, ...childBindings };
        const childName = typeof childBindings.name === 'string' ? `${name}:${childBindings.name}` : name;
        return build(target.child(childBindings), childName, merged);
      },
      perf: perfTracker,
      flush,
    };
  }

  return build(pinoLogger, opts.name, {});
}

/**
 * Global logger instance for general use
 */
export const logger = createLogger('converter');

/**
 * Flush all file transports (for graceful shutdown)
 */
export async function flushAllLogs(): Promise<void> {
  const flushPromises: Promise<void>[] = [];
  for (const transport of fileTransports.values()) {
    flushPromises.push(transport.flush());
  }
  await Promise.all(flushPromises);
}

/**
 * Close all file transports (for shutdown)
 */
export function closeAllLogs(): void {
  for (const transport of fileTransports.values()) {
    transport.closeStreams();
  }
  fileTransports.clear();
}

// Re-export types for convenience
export type { LogLevel, LogConfig };
export { LOG_LEVEL_PRIORITY };
