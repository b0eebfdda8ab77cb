import fs from 'node:fs';
import path from 'node:path';

import type { EnvLike } from '../config/dev-services-config.js';
import type { CliLogger } from '../cli/logger.js';
import type { CommandRunner } from '../utils/command-runner.js';
import { runSucceeded } from '../utils/command-runner.js';

export type CredentialLogLevel = 'INFO' | 'WARN';

export type CredentialContext = {
  authDir: string;
  sharedAuthDir: string;
  homeDir: string;
  env: EnvLike;
  runner: CommandRunner;
  logger: CliLogger;
  debug: (level: CredentialLogLevel, message: string) => void;
  isTTY: boolean;
};

export type CredentialResult = {
  ok: boolean;
  exports: Record<string, string>;
};

export function createCredentialDebugLog(
  enabled: boolean,
  writeErr: (line: string) => void
): CredentialContext['debug'] {
  return (level, message) => {
    if (enabled || level === 'WARN') {
      writeErr(`[credential_cache] ${level}: ${message}`);
    }
  };
}

export function resolveWorkspaceRoot(runner: CommandRunner, projectDir: string, env: EnvLike): string {
  const result = runner.run('git', ['rev-parse', '--show-toplevel'], { cwd: projectDir, env });
  const top = result.stdout.trim();
  return runSucceeded(result) && top ? top : projectDir;
}

export function resolveAuthDir(workspaceRoot: string): string {
  return path.join(workspaceRoot, 'temp', 'auth');
}

export function ensurePrivateDir(dir: string): void {
  fs.mkdirSync(dir, { recursive: true });
  fs.chmodSync(dir, 0o700);
}

export function copySecretFile(from: string, to: string): void {
  fs.mkdirSync(path.dirname(to), { recursive: true });
  fs.copyFileSync(from, to);
  fs.chmodSync(to, 0o600);
}

export function writeSecretFile(target: string, content: string): void {
  fs.mkdirSync(path.dirname(target), { recursive: true });
  fs.writeFileSync(target, content, { encoding: 'utf8', mode: 0o600 });
  fs.chmodSync(target, 0o600);
}

// Copies `from` only when it exists and `to` does not
export function copyIfMissing(from: string, to: string): boolean {
  if (!fileExists(from) || fileExists(to)) {
    return false;
  }
  fs.mkdirSync(path.dirname(to), { recursive: true });
  fs.copyFileSync(from, to);
  return true;
}

export function touch(target: string): void {
  fs.mkdirSync(path.dirname(target), { recursive: true });
  const now = new Date();
  try {
    fs.utimesSync(target, now, now);
  } catch {
    fs.writeFileSync(target, '');
  }
}

export function fileExists(target: string): boolean {
  try {
    return fs.statSync(target).isFile();
  } catch {
    return false;
  }
}

export function dirExists(target: string): boolean {
  try {
    return fs.statSync(target).isDirectory();
  } catch {
    return false;
  }
}

// Cached secrets are single-line files written with a trailing newline
export function readSecretFile(target: string): string {
  return fs.readFileSync(target, 'utf8').replace(/\n+$/, '');
}
