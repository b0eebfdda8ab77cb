import path from 'node:path';

import {
  copySecretFile,
  dirExists,
  fileExists,
  type CredentialContext,
  type CredentialResult
} from './credential-context.js';

export function resolveClaudeCredentialPaths(ctx: Pick<CredentialContext, 'homeDir' | 'sharedAuthDir'>) {
  const sharedDir = path.join(ctx.sharedAuthDir, 'claude');
  return {
    local: path.join(ctx.homeDir, '.claude', '.credentials.json'),
    sharedDir,
    shared: path.join(sharedDir, '.credentials.json')
  };
}

/**
 * Syncs only .credentials.json with the shared volume; per-project
 * history under ~/.claude never leaves the container.
 */
export function syncClaudeSharedAuth(ctx: CredentialContext): void {
  const paths = resolveClaudeCredentialPaths(ctx);
  if (!dirExists(paths.sharedDir)) {
    return;
  }
  if (fileExists(paths.shared) && !fileExists(paths.local)) {
    ctx.debug('INFO', 'Importing Claude credentials from shared volume → local');
    copySecretFile(paths.shared, paths.local);
  }
  if (fileExists(paths.local) && !fileExists(paths.shared)) {
    ctx.debug('INFO', 'Exporting Claude credentials → shared volume');
    copySecretFile(paths.local, paths.shared);
  }
}

export function setupClaudeAuth(ctx: CredentialContext): CredentialResult {
  syncClaudeSharedAuth(ctx);
  const paths = resolveClaudeCredentialPaths(ctx);

  if (fileExists(paths.local)) {
    ctx.logger.success('Claude Code authenticated');
    return { ok: true, exports: {} };
  }

  const apiKey = ctx.env.ANTHROPIC_API_KEY;
  if (typeof apiKey === 'string' && apiKey) {
    ctx.logger.success('Claude Code: ANTHROPIC_API_KEY detected');
    return { ok: true, exports: {} };
  }

  if (!ctx.runner.has('claude')) {
    ctx.logger.warning('Claude CLI not installed, skipping Claude auth');
    return { ok: true, exports: {} };
  }

  ctx.logger.warning('Claude Code not authenticated. Please run:');
  ctx.logger.info('  claude login');
  return { ok: true, exports: {} };
}
