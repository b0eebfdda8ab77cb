import fs from 'node:fs';
import path from 'node:path';

import { WATCHDOG_LOG } from '../constants/index.js';

export type WatchdogLog = {
  append: (message: string) => void;
  rotateIfNeeded: () => boolean;
};

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

// Local time, like `date '+%Y-%m-%d %H:%M:%S'`
export function formatLogTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

export function createWatchdogLog(
  filePath: string,
  options: { now?: () => Date; maxBytes?: number } = {}
): WatchdogLog {
  const now = options.now ?? (() => new Date());
  const maxBytes = options.maxBytes ?? WATCHDOG_LOG.MAX_BYTES;

  const append = (message: string): void => {
    try {
      fs.mkdirSync(path.dirname(filePath), { recursive: true });
      fs.appendFileSync(filePath, `[${formatLogTimestamp(now())}] ${message}\n`, 'utf8');
    } catch {
      // ignore watchdog logging failures
    }
  };

  // Single generation: the previous .1 is overwritten
  const rotateIfNeeded = (): boolean => {
    let size = 0;
    try {
      size = fs.statSync(filePath).size;
    } catch {
      return false;
    }
    if (size <= maxBytes) {
      return false;
    }
    try {
      fs.renameSync(filePath, `${filePath}${WATCHDOG_LOG.ROTATED_SUFFIX}`);
    } catch {
      return false;
    }
    append('Log rotated');
    return true;
  };

  return { append, rotateIfNeeded };
}
