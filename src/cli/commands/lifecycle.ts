import type { Command } from 'commander';

import type { ServiceDispatcher } from '../../supervisor/dispatcher.js';
import type { CliLogger } from '../logger.js';

export type SupervisorLike = Pick<ServiceDispatcher, 'start' | 'stop' | 'restart' | 'status'>;

export type LifecycleCommandContext = {
  createSupervisor: () => SupervisorLike;
  logger: Pick<CliLogger, 'success'>;
};

// Skipped or failing services never change the exit code of these commands
export function createStartCommand(program: Command, ctx: LifecycleCommandContext): void {
  program
    .command('start')
    .description('Start all services (idempotent, safe to call repeatedly)')
    .action(async () => {
      await ctx.createSupervisor().start();
      ctx.logger.success('dev-services started');
    });
}

export function createStopCommand(program: Command, ctx: LifecycleCommandContext): void {
  program
    .command('stop')
    .description('Gracefully stop all services')
    .action(async () => {
      await ctx.createSupervisor().stop();
      ctx.logger.success('dev-services stopped');
    });
}

export function createRestartCommand(program: Command, ctx: LifecycleCommandContext): void {
  program
    .command('restart')
    .description('Stop then start all services')
    .action(async () => {
      await ctx.createSupervisor().restart();
      ctx.logger.success('dev-services restarted');
    });
}
