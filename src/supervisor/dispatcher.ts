import { STATUS_NAME_WIDTH } from '../constants/index.js';
import { ServiceOperationError, type ServiceOperation } from '../services/errors.js';
import { startOrder, stopOrder } from '../services/registry.js';
import {
  describeState,
  isFailureState,
  type ServiceContext,
  type ServiceName,
  type ServiceState,
  type ServiceTable
} from '../services/types.js';
import type { LifecycleLogger } from '../utils/process-lifecycle-logger.js';

export type StatusEntry = {
  name: ServiceName;
  state: ServiceState;
};

export type StatusReport = {
  entries: StatusEntry[];
  ok: boolean;
};

export type DispatcherDeps = {
  services: ServiceTable;
  // Called once per command so env changes made during one run stay in it
  createContext: () => ServiceContext;
  lifecycle: LifecycleLogger;
};

export class ServiceDispatcher {
  private readonly deps: DispatcherDeps;

  constructor(deps: DispatcherDeps) {
    this.deps = deps;
  }

  async start(): Promise<void> {
    const ctx = this.deps.createContext();
    for (const name of startOrder()) {
      await this.invoke(name, 'start', ctx);
    }
  }

  async stop(): Promise<void> {
    const ctx = this.deps.createContext();
    for (const name of stopOrder()) {
      await this.invoke(name, 'stop', ctx);
    }
  }

  // Always a full cold cycle: every stop completes before the first start
  async restart(): Promise<void> {
    await this.stop();
    await this.start();
  }

  async status(): Promise<StatusReport> {
    const ctx = this.deps.createContext();
    const entries: StatusEntry[] = [];
    for (const name of startOrder()) {
      let state: ServiceState;
      try {
        state = await this.deps.services[name].status(ctx);
      } catch (error) {
        const wrapped = new ServiceOperationError(name, 'status', error);
        ctx.logger.warning(wrapped.message);
        this.record(name, 'status', 'failed', wrapped);
        // a status check that throws cannot vouch for the service
        state = { kind: 'stopped' };
      }
      entries.push({ name, state });
    }
    return { entries, ok: !entries.some((entry) => isFailureState(entry.state)) };
  }

  private async invoke(name: ServiceName, operation: Exclude<ServiceOperation, 'status'>, ctx: ServiceContext): Promise<void> {
    const service = this.deps.services[name];
    try {
      await service[operation](ctx);
      this.record(name, operation, 'ok');
    } catch (error) {
      const wrapped = new ServiceOperationError(name, operation, error);
      ctx.logger.warning(wrapped.message);
      this.record(name, operation, 'failed', wrapped);
    }
  }

  private record(service: ServiceName, operation: ServiceOperation, result: 'ok' | 'failed', error?: Error): void {
    this.deps.lifecycle.log({
      event: `service_${operation}`,
      source: 'dispatcher',
      details: { service, operation, result, ...(error ? { error } : {}) }
    });
  }
}

export function formatStatusReport(report: StatusReport): string {
  const lines = ['dev-services status:'];
  for (const entry of report.entries) {
    lines.push(`  ${entry.name.padEnd(STATUS_NAME_WIDTH)} ${describeState(entry.state)}`);
  }
  return `${lines.join('\n')}\n`;
}
