import fs from 'node:fs';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from '@jest/globals';

import type { EnvLike } from '../../src/config/dev-services-config.js';
import { watchdogService } from '../../src/services/watchdog.js';
import { FakeRunner } from '../helpers/fake-runner.js';
import {
  createFakeProcessKill,
  createRecordingLogger,
  createServiceContext,
  createTestWorkspace,
  initializeTown,
  type TestWorkspace
} from '../helpers/service-context.js';

describe('watchdog service', () => {
  let ws: TestWorkspace;
  let pidFile: string;

  beforeEach(() => {
    ws = createTestWorkspace();
    pidFile = path.join(ws.gastownHome, '.daemon_watchdog.pid');
  });

  afterEach(() => {
    ws.cleanup();
  });

  it('spawns the CLI itself with the watchdog subcommand', async () => {
    initializeTown(ws.gastownHome);
    const spawned: Array<{ command: string; args: string[]; env: EnvLike }> = [];
    const ctx = createServiceContext(ws, {
      runner: new FakeRunner(['gt']),
      selfCommand: ['/usr/bin/node', '--enable-source-maps', '/opt/dev-services/dist/cli.js'],
      spawnDetached: (command, args, env) => {
        spawned.push({ command, args, env });
        return 777;
      }
    });

    await watchdogService.start(ctx);

    expect(spawned).toHaveLength(1);
    expect(spawned[0]?.command).toBe('/usr/bin/node');
    expect(spawned[0]?.args).toEqual(['--enable-source-maps', '/opt/dev-services/dist/cli.js', 'watchdog']);
    expect(spawned[0]?.env).toBe(ctx.env);
  });

  it('does not spawn a second watchdog beside a live one', async () => {
    initializeTown(ws.gastownHome);
    fs.writeFileSync(pidFile, '4000\n');
    let spawns = 0;
    const ctx = createServiceContext(ws, {
      runner: new FakeRunner(['gt']),
      processKill: createFakeProcessKill([4000]).processKill,
      spawnDetached: () => {
        spawns += 1;
        return 1;
      }
    });

    await watchdogService.start(ctx);

    expect(spawns).toBe(0);
  });

  it('does not spawn before the town is initialized', async () => {
    let spawns = 0;
    const ctx = createServiceContext(ws, {
      runner: new FakeRunner(['gt']),
      spawnDetached: () => {
        spawns += 1;
        return 1;
      }
    });

    await watchdogService.start(ctx);

    expect(spawns).toBe(0);
  });

  it('warns when the spawn yields no pid', async () => {
    initializeTown(ws.gastownHome);
    const logger = createRecordingLogger();
    const ctx = createServiceContext(ws, { runner: new FakeRunner(['gt']), logger, spawnDetached: () => undefined });

    await watchdogService.start(ctx);

    expect(logger.lines).toEqual(['warning: watchdog: failed to spawn background process']);
  });

  it('stops the recorded process and removes its pid file', async () => {
    fs.mkdirSync(ws.gastownHome, { recursive: true });
    fs.writeFileSync(pidFile, '4000\n');
    const fake = createFakeProcessKill([4000]);

    await watchdogService.stop(createServiceContext(ws, { processKill: fake.processKill }));

    expect(fake.live.has(4000)).toBe(false);
    expect(fs.existsSync(pidFile)).toBe(false);
  });

  it('stop succeeds when no pid file exists', async () => {
    await expect(watchdogService.stop(createServiceContext(ws))).resolves.toBeUndefined();
  });

  it('reports running, stopped, not-initialized and disabled', async () => {
    const runner = new FakeRunner(['gt']);
    await expect(watchdogService.status(createServiceContext(ws, { runner }))).resolves.toEqual({
      kind: 'not-initialized'
    });

    initializeTown(ws.gastownHome);
    await expect(watchdogService.status(createServiceContext(ws, { runner }))).resolves.toEqual({ kind: 'stopped' });

    fs.writeFileSync(pidFile, '4000\n');
    await expect(
      watchdogService.status(
        createServiceContext(ws, { runner, processKill: createFakeProcessKill([4000]).processKill })
      )
    ).resolves.toEqual({ kind: 'running', pid: 4000 });

    await expect(
      watchdogService.status(createServiceContext(ws, { runner, env: { GASTOWN_ENABLED: 'no' } }))
    ).resolves.toEqual({ kind: 'disabled' });
  });
});
