import { describe, expect, it } from '@jest/globals';

import { runCli, type RunCliContext } from '../../src/cli/main.js';
import type { StatusReport } from '../../src/supervisor/dispatcher.js';
import type { WatchdogExit } from '../../src/watchdog/watchdog-loop.js';
import { createRecordingLogger, type RecordingLogger } from '../helpers/service-context.js';

type Harness = {
  ctx: RunCliContext;
  out: string[];
  err: string[];
  calls: string[];
  logger: RecordingLogger;
  terminate: () => void;
  unsubscribed: () => boolean;
};

const healthyReport: StatusReport = {
  ok: true,
  entries: [
    { name: 'credentials', state: { kind: 'configured' } },
    { name: 'beads-daemon', state: { kind: 'disabled' } },
    { name: 'gastown', state: { kind: 'disabled' } },
    { name: 'watchdog', state: { kind: 'disabled' } },
    { name: 'notifier', state: { kind: 'not-configured' } }
  ]
};

function createHarness(report: StatusReport = healthyReport): Harness {
  const out: string[] = [];
  const err: string[] = [];
  const calls: string[] = [];
  let terminateHandler: (() => void) | null = null;
  let unsubscribed = false;
  const logger = createRecordingLogger();

  const ctx: RunCliContext = {
    cliVersion: '9.8.7',
    runtime: {
      writeOut: (text) => out.push(text),
      writeErr: (text) => err.push(text),
      isTTY: false
    },
    deps: {
      createSupervisor: () => ({
        start: async () => {
          calls.push('start');
        },
        stop: async () => {
          calls.push('stop');
        },
        restart: async () => {
          calls.push('restart');
        },
        status: async () => {
          calls.push('status');
          return report;
        }
      }),
      logger,
      writeOut: (text) => out.push(text),
      watchdog: {
        runWatchdog: (signal) =>
          new Promise<WatchdogExit>((resolve) => {
            calls.push('watchdog');
            signal.addEventListener('abort', () => resolve('stopped'));
          }),
        onTerminate: (handler) => {
          terminateHandler = handler;
          return () => {
            unsubscribed = true;
          };
        }
      },
      hooks: {
        settingsPath: '/home/dev/.claude/settings.json',
        mergeHooks: () => ({ changed: true, added: 9 })
      }
    }
  };

  return {
    ctx,
    out,
    err,
    calls,
    logger,
    terminate: () => terminateHandler?.(),
    unsubscribed: () => unsubscribed
  };
}

describe('dev-services cli', () => {
  it.each(['start', 'stop', 'restart'])('%s dispatches and exits 0', async (command) => {
    const harness = createHarness();
    await expect(runCli(['node', 'dev-services', command], harness.ctx)).resolves.toBe(0);
    expect(harness.calls).toEqual([command]);
  });

  it('prints status and exits 0 when nothing is stopped', async () => {
    const harness = createHarness();
    await expect(runCli(['node', 'dev-services', 'status'], harness.ctx)).resolves.toBe(0);
    expect(harness.out.join('')).toBe(
      [
        'dev-services status:',
        '  credentials      configured',
        '  beads-daemon     disabled',
        '  gastown          disabled',
        '  watchdog         disabled',
        '  notifier         not-configured',
        ''
      ].join('\n')
    );
  });

  it('exits 1 from status when a service is stopped', async () => {
    const harness = createHarness({
      ok: false,
      entries: [{ name: 'watchdog', state: { kind: 'stopped' } }]
    });
    await expect(runCli(['node', 'dev-services', 'status'], harness.ctx)).resolves.toBe(1);
  });

  it('prints status as json', async () => {
    const harness = createHarness();
    await runCli(['node', 'dev-services', 'status', '--json'], harness.ctx);
    expect(JSON.parse(harness.out.join(''))).toEqual(healthyReport);
  });

  it('prints help on stderr and exits 1 without a subcommand', async () => {
    const harness = createHarness();
    await expect(runCli(['node', 'dev-services'], harness.ctx)).resolves.toBe(1);
    expect(harness.err.join('')).toContain('Usage: dev-services {start|stop|restart|status}');
    expect(harness.calls).toEqual([]);
  });

  it('rejects an unknown subcommand with exit 1', async () => {
    const harness = createHarness();
    await expect(runCli(['node', 'dev-services', 'bogus'], harness.ctx)).resolves.toBe(1);
    expect(harness.err.join('')).toContain("unknown command 'bogus'");
    expect(harness.calls).toEqual([]);
  });

  it('shows help on stdout with --help and hides the watchdog command', async () => {
    const harness = createHarness();
    await expect(runCli(['node', 'dev-services', '--help'], harness.ctx)).resolves.toBe(0);
    const help = harness.out.join('');
    expect(help).toContain('status');
    expect(help).toContain('restart');
    expect(help).not.toContain('watchdog');
  });

  it('prints the version', async () => {
    const harness = createHarness();
    await expect(runCli(['node', 'dev-services', '--version'], harness.ctx)).resolves.toBe(0);
    expect(harness.out.join('')).toBe('9.8.7\n');
  });

  it('reports action errors on stderr with exit 1', async () => {
    const harness = createHarness();
    harness.ctx.deps.createSupervisor = () => {
      throw new Error('cannot create state directory');
    };
    await expect(runCli(['node', 'dev-services', 'start'], harness.ctx)).resolves.toBe(1);
    expect(harness.err.join('')).toBe('dev-services: cannot create state directory\n');
  });

  it('runs the watchdog until a termination signal arrives', async () => {
    const harness = createHarness();
    const running = runCli(['node', 'dev-services', 'watchdog'], harness.ctx);
    await new Promise((resolve) => setImmediate(resolve));
    expect(harness.calls).toEqual(['watchdog']);

    harness.terminate();

    await expect(running).resolves.toBe(0);
    expect(harness.unsubscribed()).toBe(true);
  });

  it('merges hooks through the hooks command', async () => {
    const harness = createHarness();
    await expect(runCli(['node', 'dev-services', 'hooks'], harness.ctx)).resolves.toBe(0);
    expect(harness.logger.lines).toEqual(['success: Added 9 gastown hook(s) to /home/dev/.claude/settings.json']);
  });

  it('leaves hooks alone when gastown is disabled', async () => {
    const harness = createHarness();
    harness.ctx.deps.hooks.mergeHooks = () => null;
    await runCli(['node', 'dev-services', 'hooks'], harness.ctx);
    expect(harness.logger.lines).toEqual(['info: gastown disabled; hooks left unchanged']);
  });
});
