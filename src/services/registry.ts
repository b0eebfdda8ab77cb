import { SERVICE_ORDER } from '../constants/index.js';
import { beadsDaemonService } from './beads-daemon.js';
import { createCredentialsService } from './credentials.js';
import { gastownService } from './gastown.js';
import { notifierService } from './notifier.js';
import { watchdogService } from './watchdog.js';
import type { ServiceName, ServiceTable } from './types.js';

export function createServiceTable(deps: { writeErr: (line: string) => void }): ServiceTable {
  return {
    credentials: createCredentialsService(deps.writeErr),
    'beads-daemon': beadsDaemonService,
    gastown: gastownService,
    watchdog: watchdogService,
    notifier: notifierService
  };
}

export function startOrder(): ServiceName[] {
  return [...SERVICE_ORDER];
}

export function stopOrder(): ServiceName[] {
  return [...SERVICE_ORDER].reverse();
}
