import { CommanderError } from 'commander';

import { getErrorMessage } from '../services/errors.js';
import type { CliRuntime } from './runtime.js';
import { createCliProgram } from './program.js';
import { registerDevServicesCommands, type DevServicesCommandDeps } from './register/dev-services-commands.js';

export type RunCliContext = {
  cliVersion: string;
  runtime: CliRuntime;
  deps: Omit<DevServicesCommandDeps, 'setExitCode'>;
};

export async function runCli(argv: string[], ctx: RunCliContext): Promise<number> {
  const program = createCliProgram(ctx);
  let requestedExitCode = 0;

  // before registration: subcommands copy this setting when created
  program.exitOverride((err) => {
    throw err;
  });

  registerDevServicesCommands(program, {
    ...ctx.deps,
    setExitCode: (code) => {
      requestedExitCode = Math.max(requestedExitCode, code);
    }
  });

  try {
    await program.parseAsync(argv, { from: 'node' });
    return requestedExitCode;
  } catch (err) {
    if (err instanceof CommanderError) {
      return err.exitCode;
    }
    ctx.runtime.writeErr(`dev-services: ${getErrorMessage(err)}\n`);
    return 1;
  }
}
