import * as fs from 'fs';
import * as path from 'path';

/**
 * Configuration for file transport
 */
export interface FileTransportConfig {
  /** Base directory for logs (default: 'logs') */
  logDir: string;
  /** Service name for file grouping (e.g., 'converter', 'rates') */
  service: string;
  /** Max file size in bytes before rotation (default: 50MB) */
  maxSize: number;
  /** Number of rotated files to keep per day (default: 10) */
  maxFiles: number;
  /** Days to keep daily files before they are deleted (default: 7) */
  retentionDays: number;
  /** Write errors to separate .error.log file */
  separateErrorLog: boolean;
}

/**
 * Default file transport configuration
 */
export const DEFAULT_FILE_CONFIG: FileTransportConfig = {
  logDir: 'logs',
  service: 'converter',
  maxSize: 50 * 1024 * 1024, // 50MB
  maxFiles: 10,
  retentionDays: 7,
  separateErrorLog: true,
};

type LogFileType = 'main' | 'error' | 'perf';

const LOG_FILE_TYPES: readonly LogFileType[] = ['main', 'error', 'perf'];

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Get the current date string for log file naming
 */
function getDateString(now: Date = new Date()): string {
  return now.toISOString().split('T')[0]; // YYYY-MM-DD
}

/**
 * File transport for writing logs to disk with rotation
 *
 * Features:
 * - Daily log files: {service}-{YYYY-MM-DD}.log
 * - Automatic rotation at maxSize
 * - Daily files older than retentionDays are pruned
 * - Separate error logs for quick error scanning
 * - JSON format for machine parsing
 */
export class FileTransport {
  private config: FileTransportConfig;
  private currentDate: string;
  private streams: Record<LogFileType, fs.WriteStream | null> = {
    main: null,
    error: null,
    perf: null,
  };
  private sizes: Record<LogFileType, number> = { main: 0, error: 0, perf: 0 };

  constructor(config: Partial<FileTransportConfig> = {}) {
    this.config = { ...DEFAULT_FILE_CONFIG, ...config };
    this.currentDate = getDateString();
    this.ensureLogDirectory();
    this.pruneExpiredFiles();
  }

  /**
   * Ensure the log directory exists
   */
  private ensureLogDirectory(): void {
    if (!fs.existsSync(this.config.logDir)) {
      fs.mkdirSync(this.config.logDir, { recursive: true });
    }
  }

  /**
   * Get the log file path for a given type
   */
  private getLogFilePath(type: LogFileType, date: string): string {
    const suffix = type === 'main' ? '.log' : `.${type}.log`;
    return path.join(this.config.logDir, `${this.config.service}-${date}${suffix}`);
  }

  /**
   * Delete this service's daily files (and their rotations) past the retention window
   */
  pruneExpiredFiles(now: Date = new Date()): string[] {
    const cutoff = getDateString(new Date(now.getTime() - this.config.retentionDays * DAY_MS));
    const pattern = new RegExp(`^${escapeRegExp(this.config.service)}-(\\d{4}-\\d{2}-\\d{2})\\.`);
    const removed: string[] = [];

    for (const file of fs.readdirSync(this.config.logDir)) {
      const match = pattern.exec(file);
      if (match && match[1] < cutoff) {
        fs.unlinkSync(path.join(this.config.logDir, file));
        removed.push(file);
      }
    }

    return removed;
  }

  /**
   * Check if date has changed and rotate if needed
   */
  private checkDateRotation(): void {
    const today = getDateString();
    if (today !== this.currentDate) {
      this.closeStreams();
      this.currentDate = today;
      this.sizes = { main: 0, error: 0, perf: 0 };
      this.pruneExpiredFiles();
    }
  }

  /**
   * Rotate a log file if it exceeds maxSize
   */
  private rotateIfNeeded(type: LogFileType): void {
    if (this.sizes[type] < this.config.maxSize) {
      return;
    }

    const filePath = this.getLogFilePath(type, this.currentDate);
    if (!fs.existsSync(filePath)) {
      return;
    }

    this.streams[type]?.end();
    this.streams[type] = null;

    this.rotateFiles(type);
    this.sizes[type] = 0;
  }

  /**
   * Rotate files by renaming with numeric suffix
   */
  private rotateFiles(type: LogFileType): void {
    const basePath = this.getLogFilePath(type, this.currentDate);

    // Delete oldest file if it exists
    const oldestPath = `${basePath}.${this.config.maxFiles}`;
    if (fs.existsSync(oldestPath)) {
      fs.unlinkSync(oldestPath);
    }

    // Shift existing rotated files
    for (let i = this.config.maxFiles - 1; i >= 1; i--) {
      const oldPath = `${basePath}.${i}`;
      if (fs.existsSync(oldPath)) {
        fs.renameSync(oldPath, `${basePath}.${i + 1}`);
      }
    }

    if (fs.existsSync(basePath)) {
      fs.renameSync(basePath, `${basePath}.1`);
    }
  }

  /**
   * Get or create the write stream for a log type
   */
  private getStream(type: LogFileType): fs.WriteStream {
    this.checkDateRotation();
    this.rotateIfNeeded(type);

    const existing = this.streams[type];
    if (existing) {
      return existing;
    }

    const filePath = this.getLogFilePath(type, this.currentDate);
    if (fs.existsSync(filePath)) {
      this.sizes[type] = fs.statSync(filePath).size;
    }
    const stream = fs.createWriteStream(filePath, { flags: 'a' });
    this.streams[type] = stream;
    return stream;
  }

  private append(type: LogFileType, entry: Record<string, unknown>): void {
    const line = JSON.stringify(entry) + '\n';
    this.getStream(type).write(line);
    this.sizes[type] += Buffer.byteLength(line, 'utf8');
  }

  /**
   * Write a log entry to the main log file
   */
  write(entry: Record<string, unknown>): void {
    this.append('main', entry);

    // Also write errors to separate error log if enabled
    const level = entry.level;
    if (this.config.separateErrorLog && (level === 'ERROR' || level === 'FATAL')) {
      this.writeError(entry);
    }
  }

  /**
   * Write a log entry to the error log file
   */
  writeError(entry: Record<string, unknown>): void {
    this.append('error', entry);
  }

  /**
   * Write a performance entry to the perf log file
   */
  writePerf(entry: Record<string, unknown>): void {
    this.append('perf', entry);
  }

  /**
   * Close all open streams
   */
  closeStreams(): void {
    for (const type of LOG_FILE_TYPES) {
      this.streams[type]?.end();
      this.streams[type] = null;
    }
  }

  /**
   * Flush all streams (for graceful shutdown)
   */
  async flush(): Promise<void> {
    const pending = Object.values(this.streams).filter(
      (stream): stream is fs.WriteStream => stream !== null && stream.writableLength > 0
    );

    await Promise.all(
      pending.map((stream) => new Promise<void>((resolve) => stream.once('drain', () => resolve())))
    );
  }
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}
