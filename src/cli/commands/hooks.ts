import type { Command } from 'commander';

import type { MergeHooksResult } from '../../gastown/claude-hooks.js';
import type { CliLogger } from '../logger.js';

export type HooksCommandContext = {
  // null when gastown is disabled
  mergeHooks: () => MergeHooksResult | null;
  settingsPath: string;
  logger: Pick<CliLogger, 'info' | 'success'>;
};

export function createHooksCommand(program: Command, ctx: HooksCommandContext): void {
  program
    .command('hooks')
    .description('Merge gastown hooks into Claude Code settings.json')
    .action(() => {
      const result = ctx.mergeHooks();
      if (!result) {
        ctx.logger.info('gastown disabled; hooks left unchanged');
        return;
      }
      if (result.changed) {
        ctx.logger.success(`Added ${result.added} gastown hook(s) to ${ctx.settingsPath}`);
      } else {
        ctx.logger.info(`gastown hooks already present in ${ctx.settingsPath}`);
      }
    });
}
