import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from '@jest/globals';

import { createWatchdogLog, formatLogTimestamp } from '../../src/watchdog/watchdog-log.js';

describe('watchdog log', () => {
  let dir: string;
  let logFile: string;
  const now = () => new Date(2026, 0, 2, 3, 4, 5);

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'dev-services-wdlog-'));
    logFile = path.join(dir, 'logs', 'daemon_watchdog.log');
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('formats local timestamps', () => {
    expect(formatLogTimestamp(now())).toBe('2026-01-02 03:04:05');
  });

  it('appends timestamped lines and creates the directory', () => {
    const log = createWatchdogLog(logFile, { now });
    log.append('Watchdog started (PID 1, interval 60s)');
    log.append('Daemon restarted successfully');
    expect(fs.readFileSync(logFile, 'utf8')).toBe(
      '[2026-01-02 03:04:05] Watchdog started (PID 1, interval 60s)\n' +
        '[2026-01-02 03:04:05] Daemon restarted successfully\n'
    );
  });

  it('rotates once the file exceeds the size limit', () => {
    const log = createWatchdogLog(logFile, { now, maxBytes: 10 });
    fs.mkdirSync(path.dirname(logFile), { recursive: true });
    fs.writeFileSync(logFile, '0123456789');
    expect(log.rotateIfNeeded()).toBe(false);

    fs.appendFileSync(logFile, 'x');
    expect(log.rotateIfNeeded()).toBe(true);
    expect(fs.readFileSync(`${logFile}.1`, 'utf8')).toBe('0123456789x');
    expect(fs.readFileSync(logFile, 'utf8')).toBe('[2026-01-02 03:04:05] Log rotated\n');
  });

  it('does not rotate a missing file', () => {
    expect(createWatchdogLog(logFile).rotateIfNeeded()).toBe(false);
  });
});
