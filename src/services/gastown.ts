import fs from 'node:fs';

import { writeDeaconHeartbeat } from '../gastown/heartbeat.js';
import { runSucceeded } from '../utils/command-runner.js';
import { clearStalePidFile } from '../utils/pid-registry.js';
import { gastownInitSkipReason, gastownSkipReason, isDirectory, townBeadsEnv } from './prerequisites.js';
import type { ServiceContext, ServiceDefinition, ServiceState } from './types.js';

function prepareTown(ctx: ServiceContext): void {
  const { paths } = ctx;

  if (isDirectory(paths.deaconDir)) {
    writeDeaconHeartbeat(paths.heartbeatFile, ctx.now());
  }

  // bd refuses daemon mode outside a git repo, which the gt convoy watcher needs
  if (isDirectory(paths.townBeadsDir) && !isDirectory(paths.townGitDir)) {
    ctx.runner.run('git', ['-C', ctx.config.gastownHome, 'init', '-b', 'main'], { env: ctx.env });
  }

  // The town volume outlives container processes
  for (const pidFile of [paths.gastownDaemonPid, paths.gastownDoltPid]) {
    if (clearStalePidFile(pidFile, { processKill: ctx.processKill })) {
      ctx.logger.debug(`removed stale pid file ${pidFile}`);
    }
  }
  fs.rmSync(paths.gastownDaemonLock, { force: true });
}

async function start(ctx: ServiceContext): Promise<void> {
  if (gastownInitSkipReason(ctx)) {
    return;
  }
  prepareTown(ctx);

  const cwd = ctx.config.gastownHome;
  ctx.runner.run('gt', ['up', '-q'], { cwd, env: townBeadsEnv(ctx), output: 'ignore' });
  const second = ctx.runner.run('gt', ['up', '-q'], { cwd, env: ctx.env, output: 'ignore' });
  if (!runSucceeded(second)) {
    ctx.logger.warning(`gt up exited with ${second.exitCode}`);
  }
}

async function stop(ctx: ServiceContext): Promise<void> {
  if (gastownInitSkipReason(ctx)) {
    return;
  }
  ctx.runner.run('gt', ['down', '-q'], { cwd: ctx.config.gastownHome, env: ctx.env });
}

async function status(ctx: ServiceContext): Promise<ServiceState> {
  if (gastownSkipReason(ctx)) {
    return { kind: 'disabled' };
  }
  if (gastownInitSkipReason(ctx)) {
    return { kind: 'not-initialized' };
  }
  const daemonStatus = ctx.runner.run('gt', ['daemon', 'status'], { cwd: ctx.config.gastownHome, env: ctx.env });
  return runSucceeded(daemonStatus) ? { kind: 'running' } : { kind: 'stopped' };
}

export const gastownService: ServiceDefinition = {
  name: 'gastown',
  start,
  stop,
  status
};
