import fs from 'node:fs';
import path from 'node:path';

import { PID_KILL } from '../constants/index.js';

export type ProcessKillLike = (pid: number, signal?: string | number) => true;

export type PidFsLike = Pick<typeof fs, 'existsSync' | 'readFileSync' | 'writeFileSync' | 'unlinkSync' | 'mkdirSync'>;

export type PidRegistryOptions = {
  processKill?: ProcessKillLike;
  fsImpl?: PidFsLike;
};

export type KillByPidFileOptions = PidRegistryOptions & {
  sleep?: (ms: number) => Promise<void>;
  pollAttempts?: number;
  pollIntervalMs?: number;
};

const defaultProcessKill: ProcessKillLike = (pid, signal) => process.kill(pid, signal);

const defaultSleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

export function readPidFile(filePath: string, fsImpl: PidFsLike = fs): number | null {
  try {
    if (!fsImpl.existsSync(filePath)) {
      return null;
    }
    const raw = String(fsImpl.readFileSync(filePath, 'utf8') || '').trim();
    if (!/^\d+$/.test(raw)) {
      return null;
    }
    const parsed = Number(raw);
    return Number.isSafeInteger(parsed) && parsed > 0 ? parsed : null;
  } catch {
    return null;
  }
}

export function isPidAlive(pid: number, processKill: ProcessKillLike = defaultProcessKill): boolean {
  if (!Number.isFinite(pid) || pid <= 0) {
    return false;
  }
  try {
    processKill(pid, 0);
    return true;
  } catch {
    return false;
  }
}

/**
 * Returns the pid named by `filePath` when that process is alive.
 * Missing, empty, unparsable and stale files all read as absent.
 */
export function checkPid(filePath: string, options: PidRegistryOptions = {}): number | null {
  const pid = readPidFile(filePath, options.fsImpl ?? fs);
  if (pid === null) {
    return null;
  }
  return isPidAlive(pid, options.processKill ?? defaultProcessKill) ? pid : null;
}

export function removePidFile(filePath: string, fsImpl: PidFsLike = fs): void {
  try {
    fsImpl.unlinkSync(filePath);
  } catch {
    // already gone
  }
}

export function writePidFile(filePath: string, pid: number, fsImpl: PidFsLike = fs): void {
  fsImpl.mkdirSync(path.dirname(filePath), { recursive: true });
  fsImpl.writeFileSync(filePath, `${pid}\n`, 'utf8');
}

/**
 * Deletes a pid file whose process is gone. Files naming a live process,
 * and files without a readable pid, stay where they are.
 */
export function clearStalePidFile(filePath: string, options: PidRegistryOptions = {}): boolean {
  const fsImpl = options.fsImpl ?? fs;
  const pid = readPidFile(filePath, fsImpl);
  if (pid === null) {
    return false;
  }
  if (isPidAlive(pid, options.processKill ?? defaultProcessKill)) {
    return false;
  }
  removePidFile(filePath, fsImpl);
  return true;
}

export type KillOutcome = 'not-running' | 'terminated' | 'killed';

/**
 * SIGTERM, wait up to pollAttempts * pollIntervalMs, then SIGKILL.
 * The pid file is removed on every path and nothing is thrown.
 */
export async function killByPidFile(filePath: string, options: KillByPidFileOptions = {}): Promise<KillOutcome> {
  const fsImpl = options.fsImpl ?? fs;
  const processKill = options.processKill ?? defaultProcessKill;
  const sleep = options.sleep ?? defaultSleep;
  const attempts = options.pollAttempts ?? PID_KILL.POLL_ATTEMPTS;
  const intervalMs = options.pollIntervalMs ?? PID_KILL.POLL_INTERVAL_MS;

  let outcome: KillOutcome = 'not-running';
  try {
    const pid = checkPid(filePath, { fsImpl, processKill });
    if (pid !== null) {
      try {
        processKill(pid, 'SIGTERM');
      } catch {
        // exited between the liveness check and the signal
      }
      outcome = 'terminated';
      for (let i = 0; i < attempts && isPidAlive(pid, processKill); i += 1) {
        await sleep(intervalMs);
      }
      if (isPidAlive(pid, processKill)) {
        try {
          processKill(pid, 'SIGKILL');
          outcome = 'killed';
        } catch {
          // exited before SIGKILL landed
        }
      }
    }
  } finally {
    removePidFile(filePath, fsImpl);
  }
  return outcome;
}
