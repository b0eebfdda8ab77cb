import { spawn } from 'node:child_process';
import path from 'node:path';

import { loadDevServicesConfig, parseBool, type DevServicesConfig, type EnvLike } from '../config/dev-services-config.js';
import { resolveDevServicesPaths } from '../config/dev-services-paths.js';
import { ENV_KEYS } from '../constants/index.js';
import { mergeGastownHooks } from '../gastown/claude-hooks.js';
import { createServiceTable } from '../services/registry.js';
import type { ServiceContext, SpawnDetachedLike } from '../services/types.js';
import { ServiceDispatcher } from '../supervisor/dispatcher.js';
import { createNodeCommandRunner, type CommandRunner } from '../utils/command-runner.js';
import { createLifecycleLogger, type LifecycleLogger } from '../utils/process-lifecycle-logger.js';
import type { ProcessKillLike } from '../utils/pid-registry.js';
import { runWatchdog } from '../watchdog/watchdog-loop.js';
import { createCliLogger } from './logger.js';
import type { RunCliContext } from './main.js';
import type { CliRuntime } from './runtime.js';

export type BootstrapOptions = {
  env: EnvLike;
  runtime: CliRuntime;
  selfCommand: string[];
  homeDir?: string;
  cwd?: string;
  runner?: CommandRunner;
  processKill?: ProcessKillLike;
  spawnDetached?: SpawnDetachedLike;
  sleep?: (ms: number) => Promise<void>;
  onTerminate?: (handler: () => void) => () => void;
  now?: () => Date;
};

const defaultSleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

const defaultProcessKill: ProcessKillLike = (pid, signal) => process.kill(pid, signal);

function onProcessTerminate(handler: () => void): () => void {
  process.on('SIGTERM', handler);
  process.on('SIGINT', handler);
  return () => {
    process.off('SIGTERM', handler);
    process.off('SIGINT', handler);
  };
}

export function createNodeSpawnDetached(lifecycle: LifecycleLogger): SpawnDetachedLike {
  return (command, args, env) => {
    try {
      const child = spawn(command, args, { detached: true, stdio: 'ignore', env });
      child.on('error', (error) => {
        lifecycle.log({ event: 'spawn_error', source: 'bootstrap', details: { command, args, error } });
      });
      child.unref();
      return child.pid;
    } catch (error) {
      lifecycle.log({ event: 'spawn_error', source: 'bootstrap', details: { command, args, error } });
      return undefined;
    }
  };
}

export function claudeSettingsPath(config: Pick<DevServicesConfig, 'homeDir'>): string {
  return path.join(config.homeDir, '.claude', 'settings.json');
}

/**
 * Wires configuration, the command runner and the service table into the
 * dependency bag runCli expects. Nothing here touches the filesystem until a
 * command actually runs.
 */
export function createDevServicesDeps(options: BootstrapOptions): RunCliContext['deps'] & { config: DevServicesConfig } {
  const config = loadDevServicesConfig(options.env, { homeDir: options.homeDir, cwd: options.cwd });
  const paths = resolveDevServicesPaths(config);
  const runtime = options.runtime;
  const logger = createCliLogger((line) => runtime.writeOut(`${line}\n`));
  const lifecycle = createLifecycleLogger({
    logPath: config.lifecycleLogPath,
    console: parseBool(options.env[ENV_KEYS.LIFECYCLE_CONSOLE], false),
    writeConsole: (line) => runtime.writeErr(`${line}\n`),
    now: options.now
  });
  const runner = options.runner ?? createNodeCommandRunner({ env: config.env, defaultTimeoutMs: config.commandTimeoutMs });
  const processKill = options.processKill ?? defaultProcessKill;
  const spawnDetached = options.spawnDetached ?? createNodeSpawnDetached(lifecycle);
  const sleep = options.sleep ?? defaultSleep;
  const now = options.now ?? (() => new Date());
  const services = createServiceTable({ writeErr: (line) => runtime.writeErr(`${line}\n`) });

  const createContext = (): ServiceContext => ({
    config,
    paths,
    runner,
    logger,
    env: { ...config.env },
    processKill,
    sleep,
    spawnDetached,
    selfCommand: options.selfCommand,
    isTTY: runtime.isTTY,
    now
  });

  const settingsPath = claudeSettingsPath(config);

  return {
    config,
    createSupervisor: () => new ServiceDispatcher({ services, createContext, lifecycle }),
    logger,
    writeOut: runtime.writeOut,
    watchdog: {
      runWatchdog: (signal) =>
        runWatchdog({
          pidFile: paths.watchdogPid,
          logFile: paths.watchdogLog,
          intervalSec: config.watchdogIntervalSec,
          gastownEnabled: config.gastownEnabled,
          gastownHome: config.gastownHome,
          townJson: paths.townJson,
          runner,
          env: config.env,
          signal,
          processKill,
          now
        }),
      onTerminate: options.onTerminate ?? onProcessTerminate
    },
    hooks: {
      settingsPath,
      mergeHooks: () => (config.gastownEnabled ? mergeGastownHooks(settingsPath, config.gastownHome) : null)
    }
  };
}
