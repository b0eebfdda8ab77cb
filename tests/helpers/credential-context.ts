import path from 'node:path';

import type { CredentialContext, CredentialLogLevel } from '../../src/credentials/credential-context.js';
import type { EnvLike } from '../../src/config/dev-services-config.js';
import { FakeRunner } from './fake-runner.js';
import { createRecordingLogger, type RecordingLogger, type TestWorkspace } from './service-context.js';

export type TestCredentialContext = CredentialContext & {
  runner: FakeRunner;
  logger: RecordingLogger;
  debugLines: string[];
};

export function createCredentialTestContext(
  ws: TestWorkspace,
  options: { tools?: string[]; env?: EnvLike; isTTY?: boolean } = {}
): TestCredentialContext {
  const debugLines: string[] = [];
  return {
    authDir: path.join(ws.project, 'temp', 'auth'),
    sharedAuthDir: path.join(ws.root, 'shared-auth'),
    homeDir: ws.home,
    env: { ...options.env },
    runner: new FakeRunner(options.tools ?? []),
    logger: createRecordingLogger(),
    debug: (level: CredentialLogLevel, message: string) => {
      debugLines.push(`${level}: ${message}`);
    },
    isTTY: options.isTTY ?? false,
    debugLines
  };
}
