import fs from 'node:fs';

import type { EnvLike } from '../config/dev-services-config.js';
import { runSucceeded, type CommandRunner } from '../utils/command-runner.js';
import {
  checkPid,
  clearStalePidFile,
  removePidFile,
  writePidFile,
  type ProcessKillLike
} from '../utils/pid-registry.js';
import { sleepUnlessAborted } from './interruptible-sleep.js';
import { createWatchdogLog } from './watchdog-log.js';

export type WatchdogOptions = {
  pidFile: string;
  logFile: string;
  intervalSec: number;
  gastownEnabled: boolean;
  gastownHome: string;
  townJson: string;
  runner: CommandRunner;
  env: EnvLike;
  signal: AbortSignal;
  pid?: number;
  processKill?: ProcessKillLike;
  sleep?: (ms: number, signal: AbortSignal) => Promise<boolean>;
  now?: () => Date;
};

export type WatchdogExit = 'already-running' | 'stopped';

export type WatchdogCycle = 'skipped' | 'healthy' | 'restarted' | 'restart-failed';

function checkAndRestart(options: WatchdogOptions, log: (message: string) => void): WatchdogCycle {
  if (!options.gastownEnabled || !options.runner.has('gt')) {
    return 'skipped';
  }
  if (!fs.existsSync(options.townJson)) {
    return 'skipped';
  }

  const cwd = options.gastownHome;
  if (runSucceeded(options.runner.run('gt', ['daemon', 'status'], { cwd, env: options.env }))) {
    return 'healthy';
  }

  log('Daemon not running - attempting restart');
  const restart = options.runner.run('gt', ['daemon', 'start'], { cwd, env: options.env, output: 'ignore' });
  if (runSucceeded(restart)) {
    log('Daemon restarted successfully');
    return 'restarted';
  }
  log(`Daemon restart failed (exit ${restart.exitCode})`);
  return 'restart-failed';
}

/**
 * Health loop for `gt daemon`. Refuses to run beside a live instance,
 * owns its pid file for its whole lifetime and returns once `signal` aborts.
 */
export async function runWatchdog(options: WatchdogOptions): Promise<WatchdogExit> {
  const processKill = options.processKill;
  if (checkPid(options.pidFile, { processKill }) !== null) {
    return 'already-running';
  }
  clearStalePidFile(options.pidFile, { processKill });

  const pid = options.pid ?? process.pid;
  const sleep = options.sleep ?? sleepUnlessAborted;
  const log = createWatchdogLog(options.logFile, { now: options.now });

  writePidFile(options.pidFile, pid);
  log.append(`Watchdog started (PID ${pid}, interval ${options.intervalSec}s)`);

  try {
    while (await sleep(options.intervalSec * 1000, options.signal)) {
      if (checkAndRestart(options, log.append) === 'skipped') {
        continue;
      }
      log.rotateIfNeeded();
    }
  } finally {
    removePidFile(options.pidFile);
    log.append(`Watchdog stopped (PID ${pid})`);
  }
  return 'stopped';
}
