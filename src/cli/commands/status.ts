import type { Command } from 'commander';

import { formatStatusReport } from '../../supervisor/dispatcher.js';
import type { SupervisorLike } from './lifecycle.js';

export type StatusCommandContext = {
  createSupervisor: () => Pick<SupervisorLike, 'status'>;
  writeOut: (text: string) => void;
  setExitCode: (code: number) => void;
};

export function createStatusCommand(program: Command, ctx: StatusCommandContext): void {
  program
    .command('status')
    .description('Show running state of each service')
    .option('-j, --json', 'Output in JSON format')
    .action(async (options: { json?: boolean }) => {
      const report = await ctx.createSupervisor().status();
      if (options.json) {
        ctx.writeOut(`${JSON.stringify(report, null, 2)}\n`);
      } else {
        ctx.writeOut(formatStatusReport(report));
      }
      if (!report.ok) {
        ctx.setExitCode(1);
      }
    });
}
