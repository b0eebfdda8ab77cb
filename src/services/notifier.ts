import { checkPid, clearStalePidFile, killByPidFile } from '../utils/pid-registry.js';
import { runSucceeded } from '../utils/command-runner.js';
import { isDirectory, isFile } from './prerequisites.js';
import type { ServiceContext, ServiceDefinition, ServiceState } from './types.js';

// Any one of: project slack config, webhook secret file, webhook env var
export function isNotifierConfigured(ctx: ServiceContext): boolean {
  const webhook = ctx.env.SLACK_WEBHOOK_URL;
  return (
    isFile(ctx.paths.notifierSlackConfig) ||
    isFile(ctx.paths.notifierWebhookSecret) ||
    (typeof webhook === 'string' && webhook.length > 0)
  );
}

async function start(ctx: ServiceContext): Promise<void> {
  if (!ctx.runner.has('python3')) {
    return;
  }
  if (!isFile(ctx.config.notifierScript) || !isDirectory(ctx.paths.projectBeadsDir)) {
    return;
  }
  if (checkPid(ctx.paths.notifierPid, { processKill: ctx.processKill }) !== null) {
    return;
  }
  clearStalePidFile(ctx.paths.notifierPid, { processKill: ctx.processKill });
  if (!isNotifierConfigured(ctx)) {
    return;
  }

  // --daemon forks and writes .beads/slack_notifier.pid itself
  const result = ctx.runner.run('python3', [ctx.config.notifierScript, '--daemon'], {
    cwd: ctx.config.projectDir,
    env: ctx.env,
    output: 'ignore'
  });
  if (!runSucceeded(result)) {
    ctx.logger.warning(`beads notifier exited with ${result.exitCode}`);
  }
}

async function stop(ctx: ServiceContext): Promise<void> {
  await killByPidFile(ctx.paths.notifierPid, { processKill: ctx.processKill, sleep: ctx.sleep });
}

async function status(ctx: ServiceContext): Promise<ServiceState> {
  const pid = checkPid(ctx.paths.notifierPid, { processKill: ctx.processKill });
  if (pid !== null) {
    return { kind: 'running', pid };
  }
  return isNotifierConfigured(ctx) ? { kind: 'stopped' } : { kind: 'not-configured' };
}

export const notifierService: ServiceDefinition = {
  name: 'notifier',
  start,
  stop,
  status
};
