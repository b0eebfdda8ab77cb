import type { Command } from 'commander';

import type { WatchdogExit } from '../../watchdog/watchdog-loop.js';

export type WatchdogCommandContext = {
  runWatchdog: (signal: AbortSignal) => Promise<WatchdogExit>;
  // Subscribes to SIGTERM/SIGINT; returns the unsubscribe function
  onTerminate: (handler: () => void) => () => void;
};

export function createWatchdogCommand(program: Command, ctx: WatchdogCommandContext): void {
  program
    .command('watchdog', { hidden: true })
    .description('internal: run the daemon health watchdog in the foreground')
    .action(async () => {
      const controller = new AbortController();
      const unsubscribe = ctx.onTerminate(() => controller.abort());
      try {
        await ctx.runWatchdog(controller.signal);
      } finally {
        unsubscribe();
      }
    });
}
