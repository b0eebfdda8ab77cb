import type { Command } from 'commander';

import type { CliLogger } from '../logger.js';
import { createHooksCommand, type HooksCommandContext } from '../commands/hooks.js';
import {
  createRestartCommand,
  createStartCommand,
  createStopCommand,
  type SupervisorLike
} from '../commands/lifecycle.js';
import { createStatusCommand } from '../commands/status.js';
import { createWatchdogCommand, type WatchdogCommandContext } from '../commands/watchdog.js';

export type DevServicesCommandDeps = {
  createSupervisor: () => SupervisorLike;
  logger: CliLogger;
  writeOut: (text: string) => void;
  setExitCode: (code: number) => void;
  watchdog: WatchdogCommandContext;
  hooks: Omit<HooksCommandContext, 'logger'>;
};

export function registerDevServicesCommands(program: Command, deps: DevServicesCommandDeps): void {
  const lifecycle = { createSupervisor: deps.createSupervisor, logger: deps.logger };
  createStartCommand(program, lifecycle);
  createStopCommand(program, lifecycle);
  createRestartCommand(program, lifecycle);
  createStatusCommand(program, {
    createSupervisor: deps.createSupervisor,
    writeOut: deps.writeOut,
    setExitCode: deps.setExitCode
  });
  createHooksCommand(program, { ...deps.hooks, logger: deps.logger });
  createWatchdogCommand(program, deps.watchdog);
}
