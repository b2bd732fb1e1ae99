import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { FileTransport } from './file-transport';

describe('FileTransport', () => {
  let logDir: string;

  beforeEach(() => {
    logDir = fs.mkdtempSync(path.join(os.tmpdir(), 'converter-logs-'));
  });

  afterEach(() => {
    fs.rmSync(logDir, { recursive: true, force: true });
  });

  function touch(name: string): void {
    fs.writeFileSync(path.join(logDir, name), '');
  }

  it('should prune daily files older than the retention window', () => {
    const transport = new FileTransport({ logDir, service: 'converter', retentionDays: 7 });
    touch('converter-2026-01-01.log');
    touch('converter-2026-01-01.error.log');
    touch('converter-2026-01-02.log.1');
    touch('converter-2026-01-03.log');
    touch('converter-2026-01-09.perf.log');
    touch('rates-2026-01-01.log');

    const removed = transport.pruneExpiredFiles(new Date('2026-01-10T12:00:00Z'));

    expect(removed.sort()).toEqual([
      'converter-2026-01-01.error.log',
      'converter-2026-01-01.log',
      'converter-2026-01-02.log.1',
    ]);
    expect(fs.readdirSync(logDir).sort()).toEqual([
      'converter-2026-01-03.log',
      'converter-2026-01-09.perf.log',
      'rates-2026-01-01.log',
    ]);
  });

  it('should create the log directory when missing', () => {
    const nested = path.join(logDir, 'nested', 'dir');

    new FileTransport({ logDir: nested, service: 'converter' });

    expect(fs.existsSync(nested)).toBe(true);
  });
});
