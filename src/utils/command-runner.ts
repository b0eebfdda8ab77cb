import fs from 'node:fs';
import path from 'node:path';
import {
  spawnSync as nodeSpawnSync,
  type SpawnSyncOptionsWithStringEncoding,
  type SpawnSyncReturns
} from 'node:child_process';

import type { EnvLike } from '../config/dev-services-config.js';

export type SpawnSyncLike = (
  command: string,
  args: string[],
  options: SpawnSyncOptionsWithStringEncoding
) => SpawnSyncReturns<string>;

export type RunOptions = {
  cwd?: string;
  env?: EnvLike;
  input?: string;
  timeoutMs?: number;
  // 'ignore' for launchers that leave a daemon behind: a forked child
  // holding our stdout/stderr pipes would keep spawnSync waiting until timeout
  output?: 'capture' | 'ignore';
};

export type RunResult = {
  exitCode: number;
  stdout: string;
  stderr: string;
  error?: string;
};

export interface CommandRunner {
  has(command: string): boolean;
  run(command: string, args: string[], options?: RunOptions): RunResult;
}

export function runSucceeded(result: RunResult): boolean {
  return result.exitCode === 0 && !result.error;
}

export function findExecutable(
  command: string,
  pathValue: string | undefined,
  fsImpl: Pick<typeof fs, 'accessSync' | 'statSync'> = fs
): string | null {
  if (!command) {
    return null;
  }
  const candidates = command.includes('/')
    ? [command]
    : String(pathValue || '')
        .split(path.delimiter)
        .filter(Boolean)
        .map((dir) => path.join(dir, command));
  for (const candidate of candidates) {
    try {
      if (!fsImpl.statSync(candidate).isFile()) {
        continue;
      }
      fsImpl.accessSync(candidate, fs.constants.X_OK);
      return candidate;
    } catch {
      continue;
    }
  }
  return null;
}

export function createNodeCommandRunner(options: {
  env: EnvLike;
  defaultTimeoutMs: number;
  spawnSyncImpl?: SpawnSyncLike;
}): CommandRunner {
  const spawnSyncImpl: SpawnSyncLike = options.spawnSyncImpl ?? nodeSpawnSync;

  return {
    has(command: string): boolean {
      return findExecutable(command, options.env.PATH) !== null;
    },
    run(command: string, args: string[], runOptions: RunOptions = {}): RunResult {
      try {
        const result = spawnSyncImpl(command, args, {
          cwd: runOptions.cwd,
          env: runOptions.env ?? options.env,
          input: runOptions.input,
          encoding: 'utf8',
          timeout: runOptions.timeoutMs ?? options.defaultTimeoutMs,
          stdio: runOptions.output === 'ignore' ? 'ignore' : ['pipe', 'pipe', 'pipe']
        });
        const stdout = result.stdout ?? '';
        const stderr = result.stderr ?? '';
        if (result.error) {
          return { exitCode: typeof result.status === 'number' ? result.status : 1, stdout, stderr, error: result.error.message };
        }
        if (typeof result.status !== 'number') {
          return { exitCode: 1, stdout, stderr, error: `terminated by ${result.signal ?? 'unknown signal'}` };
        }
        return { exitCode: result.status, stdout, stderr };
      } catch (error) {
        return { exitCode: 1, stdout: '', stderr: '', error: error instanceof Error ? error.message : String(error) };
      }
    }
  };
}
