import fs from 'node:fs';

import { checkPid } from '../utils/pid-registry.js';
import { runSucceeded, type RunOptions } from '../utils/command-runner.js';
import { gastownInitSkipReason, gastownSkipReason, isDirectory, townBeadsEnv } from './prerequisites.js';
import type { ServiceContext, ServiceDefinition, ServiceState } from './types.js';

function beadsReady(ctx: ServiceContext): boolean {
  return isDirectory(ctx.paths.townBeadsDir) && ctx.runner.has('bd');
}

function runBd(ctx: ServiceContext, args: string[], output: RunOptions['output'] = 'capture') {
  return ctx.runner.run('bd', args, { cwd: ctx.config.gastownHome, env: townBeadsEnv(ctx), output });
}

async function start(ctx: ServiceContext): Promise<void> {
  if (gastownInitSkipReason(ctx) || !beadsReady(ctx)) {
    return;
  }
  if (runSucceeded(runBd(ctx, ['daemon', 'status']))) {
    return;
  }

  fs.rmSync(ctx.paths.beadsDaemonLock, { force: true });
  // Older town databases lack the repo fingerprint the daemon checks for
  runBd(ctx, ['migrate', '--update-repo-id']);
  const started = runBd(ctx, ['daemon', 'start'], 'ignore');
  if (!runSucceeded(started)) {
    ctx.logger.warning(`beads daemon did not start (exit ${started.exitCode})`);
  }
}

async function stop(ctx: ServiceContext): Promise<void> {
  if (gastownSkipReason(ctx) || !beadsReady(ctx)) {
    return;
  }
  runBd(ctx, ['daemon', 'stop']);
}

async function status(ctx: ServiceContext): Promise<ServiceState> {
  if (gastownSkipReason(ctx)) {
    return { kind: 'disabled' };
  }
  if (!beadsReady(ctx)) {
    return { kind: 'not-configured' };
  }
  const pid = checkPid(ctx.paths.beadsDaemonPid, { processKill: ctx.processKill });
  return pid !== null ? { kind: 'running', pid } : { kind: 'stopped' };
}

export const beadsDaemonService: ServiceDefinition = {
  name: 'beads-daemon',
  start,
  stop,
  status
};
