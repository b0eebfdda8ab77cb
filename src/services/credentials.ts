import {
  createCredentialDebugLog,
  dirExists,
  resolveAuthDir,
  resolveWorkspaceRoot,
  type CredentialContext
} from '../credentials/credential-context.js';
import { setupCredentialCache } from '../credentials/credential-cache.js';
import { verifyCredentialPropagation } from '../credentials/propagation.js';
import type { ServiceContext, ServiceDefinition, ServiceState } from './types.js';

export function buildCredentialContext(ctx: ServiceContext, writeErr: (line: string) => void): CredentialContext {
  const workspaceRoot = resolveWorkspaceRoot(ctx.runner, ctx.config.projectDir, ctx.env);
  return {
    authDir: resolveAuthDir(workspaceRoot),
    sharedAuthDir: ctx.config.sharedAuthDir,
    homeDir: ctx.config.homeDir,
    env: ctx.env,
    runner: ctx.runner,
    logger: ctx.logger,
    debug: createCredentialDebugLog(ctx.config.credentialDebug, writeErr),
    isTTY: ctx.isTTY
  };
}

export function createCredentialsService(writeErr: (line: string) => void): ServiceDefinition {
  async function start(ctx: ServiceContext): Promise<void> {
    const credentialCtx = buildCredentialContext(ctx, writeErr);
    const report = setupCredentialCache(ctx.config.credentialServices, credentialCtx);
    // later services in this run see GH_CONFIG_DIR, CLOUDFLARE_API_TOKEN, ...
    Object.assign(ctx.env, report.exports);
    verifyCredentialPropagation({ ...credentialCtx, env: ctx.env });
  }

  async function stop(): Promise<void> {
    // one-shot setup; nothing to tear down
  }

  async function status(ctx: ServiceContext): Promise<ServiceState> {
    const credentialCtx = buildCredentialContext(ctx, writeErr);
    return dirExists(credentialCtx.authDir) ? { kind: 'configured' } : { kind: 'not-configured' };
  }

  return { name: 'credentials', start, stop, status };
}
