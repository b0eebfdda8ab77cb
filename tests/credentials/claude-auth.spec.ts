import fs from 'node:fs';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from '@jest/globals';

import { resolveClaudeCredentialPaths, setupClaudeAuth, syncClaudeSharedAuth } from '../../src/credentials/claude-auth.js';
import { createCredentialTestContext } from '../helpers/credential-context.js';
import { createTestWorkspace, type TestWorkspace } from '../helpers/service-context.js';

describe('claude credential sync', () => {
  let ws: TestWorkspace;

  beforeEach(() => {
    ws = createTestWorkspace('dev-services-claude-');
  });

  afterEach(() => {
    ws.cleanup();
  });

  it('imports credentials from the shared volume', () => {
    const ctx = createCredentialTestContext(ws);
    const paths = resolveClaudeCredentialPaths(ctx);
    fs.mkdirSync(paths.sharedDir, { recursive: true });
    fs.writeFileSync(paths.shared, '{"token":"placeholder"}');

    syncClaudeSharedAuth(ctx);

    expect(fs.readFileSync(paths.local, 'utf8')).toBe('{"token":"placeholder"}');
    expect(fs.statSync(paths.local).mode & 0o777).toBe(0o600);
  });

  it('exports local credentials to an empty shared volume', () => {
    const ctx = createCredentialTestContext(ws);
    const paths = resolveClaudeCredentialPaths(ctx);
    fs.mkdirSync(paths.sharedDir, { recursive: true });
    fs.mkdirSync(path.dirname(paths.local), { recursive: true });
    fs.writeFileSync(paths.local, '{"token":"local"}');

    syncClaudeSharedAuth(ctx);

    expect(fs.readFileSync(paths.shared, 'utf8')).toBe('{"token":"local"}');
  });

  it('does nothing without a shared volume', () => {
    const ctx = createCredentialTestContext(ws);
    const paths = resolveClaudeCredentialPaths(ctx);
    fs.mkdirSync(path.dirname(paths.local), { recursive: true });
    fs.writeFileSync(paths.local, '{}');

    syncClaudeSharedAuth(ctx);

    expect(fs.existsSync(paths.sharedDir)).toBe(false);
  });

  it('reports each authentication source', () => {
    const withKey = createCredentialTestContext(ws, { env: { ANTHROPIC_API_KEY: 'test-key' } });
    expect(setupClaudeAuth(withKey)).toEqual({ ok: true, exports: {} });
    expect(withKey.logger.lines).toEqual(['success: Claude Code: ANTHROPIC_API_KEY detected']);

    const noCli = createCredentialTestContext(ws);
    setupClaudeAuth(noCli);
    expect(noCli.logger.lines).toEqual(['warning: Claude CLI not installed, skipping Claude auth']);

    const needsLogin = createCredentialTestContext(ws, { tools: ['claude'] });
    setupClaudeAuth(needsLogin);
    expect(needsLogin.logger.lines).toEqual(['warning: Claude Code not authenticated. Please run:', 'info:   claude login']);

    const paths = resolveClaudeCredentialPaths(needsLogin);
    fs.mkdirSync(path.dirname(paths.local), { recursive: true });
    fs.writeFileSync(paths.local, '{}');
    const loggedIn = createCredentialTestContext(ws);
    setupClaudeAuth(loggedIn);
    expect(loggedIn.logger.lines).toEqual(['success: Claude Code authenticated']);
  });
});
