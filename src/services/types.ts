import type { DevServicesConfig, EnvLike } from '../config/dev-services-config.js';
import type { DevServicesPaths } from '../config/dev-services-paths.js';
import type { SERVICE_ORDER } from '../constants/index.js';
import type { CliLogger } from '../cli/logger.js';
import type { CommandRunner } from '../utils/command-runner.js';
import type { ProcessKillLike } from '../utils/pid-registry.js';

export type ServiceName = (typeof SERVICE_ORDER)[number];

export type ServiceState =
  | { kind: 'running'; pid?: number }
  | { kind: 'stopped' }
  | { kind: 'disabled' }
  | { kind: 'not-configured' }
  | { kind: 'not-initialized' }
  | { kind: 'configured' };

export type SpawnDetachedLike = (command: string, args: string[], env: EnvLike) => number | undefined;

export type ServiceContext = {
  config: DevServicesConfig;
  paths: DevServicesPaths;
  runner: CommandRunner;
  logger: CliLogger;
  // Environment for child commands; the credentials service extends it.
  env: EnvLike;
  processKill: ProcessKillLike;
  sleep: (ms: number) => Promise<void>;
  spawnDetached: SpawnDetachedLike;
  // argv prefix that re-enters this CLI, e.g. [process.execPath, '/usr/lib/dev-services/cli.js']
  selfCommand: string[];
  isTTY: boolean;
  now: () => Date;
};

export type ServiceDefinition = {
  name: ServiceName;
  start: (ctx: ServiceContext) => Promise<void>;
  stop: (ctx: ServiceContext) => Promise<void>;
  status: (ctx: ServiceContext) => Promise<ServiceState>;
};

export type ServiceTable = Record<ServiceName, ServiceDefinition>;

export function isFailureState(state: ServiceState): boolean {
  return state.kind === 'stopped';
}

export function describeState(state: ServiceState): string {
  if (state.kind === 'running') {
    return typeof state.pid === 'number' ? `running (pid ${state.pid})` : 'running';
  }
  return state.kind;
}
