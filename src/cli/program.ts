import { Command } from 'commander';

import type { CliRuntime } from './runtime.js';

export type CliProgramContext = {
  cliVersion: string;
  runtime: CliRuntime;
};

export function createCliProgram(ctx: CliProgramContext): Command {
  const program = new Command();

  program.configureOutput({
    writeOut: (str) => ctx.runtime.writeOut(str),
    writeErr: (str) => ctx.runtime.writeErr(str)
  });

  program
    .name('dev-services')
    .description('Manage the dev-infra services of an AI coding devcontainer')
    .usage('{start|stop|restart|status}')
    .version(ctx.cliVersion)
    .showHelpAfterError(true);

  return program;
}
