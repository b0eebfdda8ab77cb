import path from 'node:path';

import { WATCHDOG_LOG } from '../constants/index.js';
import type { DevServicesConfig } from './dev-services-config.js';

export type DevServicesPaths = {
  townJson: string;
  townBeadsDir: string;
  beadsDaemonPid: string;
  beadsDaemonLock: string;
  townGitDir: string;
  gastownDaemonPid: string;
  gastownDoltPid: string;
  gastownDaemonLock: string;
  deaconDir: string;
  heartbeatFile: string;
  watchdogPid: string;
  watchdogLog: string;
  projectBeadsDir: string;
  notifierPid: string;
  notifierSlackConfig: string;
  notifierWebhookSecret: string;
};

export function resolveDevServicesPaths(
  config: Pick<DevServicesConfig, 'gastownHome' | 'projectDir'>
): DevServicesPaths {
  const home = config.gastownHome;
  const project = config.projectDir;
  return {
    townJson: path.join(home, 'mayor', 'town.json'),
    townBeadsDir: path.join(home, '.beads'),
    beadsDaemonPid: path.join(home, '.beads', 'daemon.pid'),
    beadsDaemonLock: path.join(home, '.beads', 'daemon.lock'),
    townGitDir: path.join(home, '.git'),
    gastownDaemonPid: path.join(home, 'daemon', 'daemon.pid'),
    gastownDoltPid: path.join(home, 'daemon', 'dolt.pid'),
    gastownDaemonLock: path.join(home, 'daemon', 'daemon.lock'),
    deaconDir: path.join(home, 'deacon'),
    heartbeatFile: path.join(home, 'deacon', 'heartbeat.json'),
    watchdogPid: path.join(home, '.daemon_watchdog.pid'),
    watchdogLog: path.join(home, 'logs', WATCHDOG_LOG.FILENAME),
    projectBeadsDir: path.join(project, '.beads'),
    notifierPid: path.join(project, '.beads', 'slack_notifier.pid'),
    notifierSlackConfig: path.join(project, '.beads', 'slack_config.yaml'),
    notifierWebhookSecret: path.join(project, '.secrets', 'slack_webhook')
  };
}
