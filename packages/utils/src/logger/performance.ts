import type { FileTransport } from './file-transport';

/**
 * Performance entry written to .perf.log
 */
export interface PerfEntry {
  timestamp: string;
  operation: string;
  duration: number;
  success: boolean;
  context?: Record<string, unknown>;
  error?: string;
}

/**
 * Performance tracker for timing operations
 *
 * Usage:
 * ```typescript
 * const perf = new PerformanceTracker(fileTransport);
 *
 * const table = await perf.track('fetchDailyRates', async () => {
 *   return await client.getDailyRates(date);
 * }, { date });
 * ```
 */
export class PerformanceTracker {
  constructor(private fileTransport: FileTransport | null) {}

  /**
   * Track an operation and return its result
   */
  async track<T>(
    operation: string,
    fn: () => T | Promise<T>,
    context?: Record<string, unknown>
  ): Promise<T> {
    // Timed locally so concurrent calls for the same operation don't collide
    const startTime = performance.now();
    try {
      const result = await fn();
      this.record(operation, startTime, context);
      return result;
    } catch (error) {
      this.record(operation, startTime, context, toError(error));
      throw error;
    }
  }

  private record(
    operation: string,
    startTime: number,
    context?: Record<string, unknown>,
    error?: Error
  ): void {
    const perfEntry: PerfEntry = {
      timestamp: new Date().toISOString(),
      operation,
      duration: Math.round(performance.now() - startTime),
      success: !error,
      context,
      ...(error && { error: error.message }),
    };

    this.write(perfEntry);
  }

  /**
   * Write a performance entry to the log
   */
  private write(entry: PerfEntry): void {
    if (this.fileTransport) {
      this.fileTransport.writePerf({ ...entry });
    }
  }
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Create a no-op performance tracker for when perf logging is disabled
 */
export function createNoOpPerformanceTracker(): PerformanceTracker {
  return new PerformanceTracker(null);
}
