import path from 'node:path';
import { homedir } from 'node:os';

import { DEFAULTS, ENV_KEYS } from '../constants/index.js';

export type EnvLike = Record<string, string | undefined>;

export type DevServicesConfig = {
  homeDir: string;
  projectDir: string;
  gastownEnabled: boolean;
  gastownHome: string;
  credentialServices: string[];
  watchdogIntervalSec: number;
  sharedAuthDir: string;
  notifierScript: string;
  credentialDebug: boolean;
  commandTimeoutMs: number;
  lifecycleLogPath: string;
  env: EnvLike;
};

export type LoadConfigOptions = {
  homeDir?: string;
  cwd?: string;
};

export function parseBool(value: string | undefined, defaultValue: boolean): boolean {
  if (typeof value !== 'string') {
    return defaultValue;
  }
  const normalized = value.trim().toLowerCase();
  if (!normalized) {
    return defaultValue;
  }
  if (normalized === '1' || normalized === 'true' || normalized === 'yes' || normalized === 'on') {
    return true;
  }
  if (normalized === '0' || normalized === 'false' || normalized === 'no' || normalized === 'off') {
    return false;
  }
  return defaultValue;
}

function parsePositiveInt(value: string | undefined, defaultValue: number): number {
  if (typeof value !== 'string' || !value.trim()) {
    return defaultValue;
  }
  const parsed = Number(value.trim());
  return Number.isInteger(parsed) && parsed > 0 ? parsed : defaultValue;
}

function parseServiceList(value: string | undefined): string[] {
  if (typeof value !== 'string') {
    return [...DEFAULTS.CREDENTIAL_SERVICES];
  }
  return value.split(/\s+/).filter(Boolean);
}

function pickPath(value: string | undefined, fallback: string): string {
  return typeof value === 'string' && value.trim() ? value.trim() : fallback;
}

export function loadDevServicesConfig(env: EnvLike, options: LoadConfigOptions = {}): DevServicesConfig {
  const homeDir = options.homeDir ?? homedir();
  const gastownHome = pickPath(env[ENV_KEYS.GASTOWN_HOME], path.join(homeDir, DEFAULTS.GASTOWN_DIRNAME));

  return {
    homeDir,
    projectDir: options.cwd ?? process.cwd(),
    gastownEnabled: parseBool(env[ENV_KEYS.GASTOWN_ENABLED], true),
    gastownHome,
    credentialServices: parseServiceList(env[ENV_KEYS.CREDENTIAL_SERVICES]),
    watchdogIntervalSec: parsePositiveInt(env[ENV_KEYS.WATCHDOG_INTERVAL], DEFAULTS.WATCHDOG_INTERVAL_SEC),
    sharedAuthDir: pickPath(env[ENV_KEYS.SHARED_AUTH_DIR], DEFAULTS.SHARED_AUTH_DIR),
    notifierScript: pickPath(env[ENV_KEYS.NOTIFIER_SCRIPT], DEFAULTS.NOTIFIER_SCRIPT),
    credentialDebug: parseBool(env[ENV_KEYS.CREDENTIAL_DEBUG], false),
    commandTimeoutMs: parsePositiveInt(env[ENV_KEYS.COMMAND_TIMEOUT], DEFAULTS.COMMAND_TIMEOUT_MS),
    lifecycleLogPath: pickPath(env[ENV_KEYS.LIFECYCLE_LOG], path.join(homeDir, '.local', 'state', 'dev-services', 'lifecycle.jsonl')),
    env: { ...env }
  };
}

export function validateDevServicesConfig(config: DevServicesConfig): string[] {
  const errors: string[] = [];

  const absolute: Array<[string, string]> = [
    ['homeDir', config.homeDir],
    ['projectDir', config.projectDir],
    ['gastownHome', config.gastownHome],
    ['sharedAuthDir', config.sharedAuthDir]
  ];
  for (const [key, value] of absolute) {
    if (!path.isAbsolute(value)) {
      errors.push(`${key} must be an absolute path (got "${value}")`);
    }
  }

  if (!Number.isFinite(config.watchdogIntervalSec) || config.watchdogIntervalSec <= 0) {
    errors.push('watchdogIntervalSec must be > 0');
  }
  if (!Number.isFinite(config.commandTimeoutMs) || config.commandTimeoutMs <= 0) {
    errors.push('commandTimeoutMs must be > 0');
  }

  return errors;
}
