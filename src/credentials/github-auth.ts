import path from 'node:path';

import { runSucceeded } from '../utils/command-runner.js';
import {
  copyIfMissing,
  copySecretFile,
  dirExists,
  ensurePrivateDir,
  fileExists,
  touch,
  type CredentialContext,
  type CredentialResult
} from './credential-context.js';

export type GithubAuthPaths = {
  configDir: string;
  hostsFile: string;
  sentinelFile: string;
  sharedDir: string;
  sharedHostsFile: string;
};

export function resolveGithubAuthPaths(ctx: Pick<CredentialContext, 'authDir' | 'sharedAuthDir'>): GithubAuthPaths {
  const configDir = path.join(ctx.authDir, 'gh-config');
  const sharedDir = path.join(ctx.sharedAuthDir, 'gh');
  return {
    configDir,
    hostsFile: path.join(configDir, 'hosts.yml'),
    sentinelFile: path.join(ctx.authDir, '.gh-auth-checked'),
    sharedDir,
    sharedHostsFile: path.join(sharedDir, 'hosts.yml')
  };
}

export function importGithubFromShared(paths: GithubAuthPaths): void {
  ensurePrivateDir(paths.configDir);
  copySecretFile(paths.sharedHostsFile, paths.hostsFile);
  copyIfMissing(path.join(paths.sharedDir, 'config.yml'), path.join(paths.configDir, 'config.yml'));
}

function exportGithubToShared(ctx: CredentialContext, paths: GithubAuthPaths): void {
  if (!dirExists(paths.sharedDir) || fileExists(paths.sharedHostsFile) || !fileExists(paths.hostsFile)) {
    return;
  }
  ctx.debug('INFO', 'Exporting gh credentials → shared volume');
  copySecretFile(paths.hostsFile, paths.sharedHostsFile);
  const localConfig = path.join(paths.configDir, 'config.yml');
  if (fileExists(localConfig)) {
    copySecretFile(localConfig, path.join(paths.sharedDir, 'config.yml'));
  }
}

/**
 * GitHub CLI credentials cached under <auth>/gh-config.
 * cached hosts.yml → GITHUB_TOKEN → `gh auth status` → login instructions.
 */
export function setupGithubAuth(ctx: CredentialContext): CredentialResult {
  const paths = resolveGithubAuthPaths(ctx);
  const exports = { GH_CONFIG_DIR: paths.configDir };
  const ghEnv = { ...ctx.env, ...exports };

  // Already checked in an earlier session: only repair a vanished local copy
  if (fileExists(paths.sentinelFile)) {
    if (!fileExists(paths.hostsFile) && fileExists(paths.sharedHostsFile)) {
      ctx.debug('INFO', 'Re-importing gh credentials from shared volume (local was empty)');
      importGithubFromShared(paths);
      ctx.logger.success('GitHub CLI authenticated (re-imported from shared)');
    }
    return { ok: true, exports };
  }

  if (!ctx.runner.has('gh')) {
    ctx.logger.warning('GitHub CLI (gh) not installed, skipping GitHub auth');
    return { ok: false, exports };
  }

  ensurePrivateDir(paths.configDir);

  if (fileExists(paths.sharedHostsFile) && !fileExists(paths.hostsFile)) {
    ctx.debug('INFO', `Importing gh credentials from shared volume → ${paths.configDir}`);
    importGithubFromShared(paths);
  }

  const defaultConfigDir = path.join(ctx.homeDir, '.config', 'gh');
  if (!fileExists(paths.hostsFile) && fileExists(path.join(defaultConfigDir, 'hosts.yml'))) {
    ctx.debug('INFO', `Migrating gh credentials from default location → ${paths.configDir}`);
    copySecretFile(path.join(defaultConfigDir, 'hosts.yml'), paths.hostsFile);
    copyIfMissing(path.join(defaultConfigDir, 'config.yml'), path.join(paths.configDir, 'config.yml'));
  }

  if (fileExists(paths.hostsFile)) {
    ctx.logger.success('GitHub CLI authenticated (cached)');
    exportGithubToShared(ctx, paths);
    touch(paths.sentinelFile);
    return { ok: true, exports };
  }

  const token = ctx.env.GITHUB_TOKEN;
  if (typeof token === 'string' && token) {
    ctx.logger.info('Converting GITHUB_TOKEN to cached OAuth credentials...');
    const login = ctx.runner.run('gh', ['auth', 'login', '--with-token'], { env: ghEnv, input: `${token}\n` });
    if (!runSucceeded(login)) {
      ctx.logger.warning('Failed to authenticate with GITHUB_TOKEN');
      return { ok: false, exports };
    }
    ctx.logger.success('GitHub CLI authenticated automatically via GITHUB_TOKEN');
    ctx.debug('INFO', 'Converted GITHUB_TOKEN to cached credentials');
    exportGithubToShared(ctx, paths);
    touch(paths.sentinelFile);
    return { ok: true, exports };
  }

  // credential helpers, forwarded codespace tokens, keyrings
  if (runSucceeded(ctx.runner.run('gh', ['auth', 'status'], { env: ghEnv }))) {
    ctx.logger.success('GitHub CLI authenticated');
    ctx.debug('INFO', 'gh authenticated via external mechanism (credential helper, keyring, etc.)');
    touch(paths.sentinelFile);
    return { ok: true, exports };
  }

  if (ctx.isTTY) {
    ctx.logger.warning('GitHub CLI not authenticated. Please run:');
    ctx.logger.info('  gh auth login');
    ctx.logger.info('Your credentials will be cached across container rebuilds.');
  }
  ctx.debug('WARN', 'No gh credentials found after full auth check');

  // written even when unauthenticated so the warning is not repeated every start
  touch(paths.sentinelFile);
  return { ok: true, exports };
}
