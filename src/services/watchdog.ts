import { checkPid, killByPidFile } from '../utils/pid-registry.js';
import { gastownInitSkipReason, gastownSkipReason } from './prerequisites.js';
import type { ServiceContext, ServiceDefinition, ServiceState } from './types.js';

async function start(ctx: ServiceContext): Promise<void> {
  if (gastownInitSkipReason(ctx)) {
    return;
  }
  if (checkPid(ctx.paths.watchdogPid, { processKill: ctx.processKill }) !== null) {
    return;
  }
  const [command, ...prefix] = ctx.selfCommand;
  if (!command) {
    ctx.logger.warning('watchdog: cannot resolve the dev-services entry point');
    return;
  }
  // The child re-checks its pid file, so a racing second start exits at once.
  const pid = ctx.spawnDetached(command, [...prefix, 'watchdog'], ctx.env);
  if (typeof pid !== 'number') {
    ctx.logger.warning('watchdog: failed to spawn background process');
  }
}

async function stop(ctx: ServiceContext): Promise<void> {
  await killByPidFile(ctx.paths.watchdogPid, { processKill: ctx.processKill, sleep: ctx.sleep });
}

async function status(ctx: ServiceContext): Promise<ServiceState> {
  if (gastownSkipReason(ctx)) {
    return { kind: 'disabled' };
  }
  const pid = checkPid(ctx.paths.watchdogPid, { processKill: ctx.processKill });
  if (pid !== null) {
    return { kind: 'running', pid };
  }
  // no town yet: reported as not-initialized, which status does not count as a failure
  if (gastownInitSkipReason(ctx)) {
    return { kind: 'not-initialized' };
  }
  return { kind: 'stopped' };
}

export const watchdogService: ServiceDefinition = {
  name: 'watchdog',
  start,
  stop,
  status
};
