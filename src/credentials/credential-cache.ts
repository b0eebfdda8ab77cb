import fs from 'node:fs';

import { getErrorMessage } from '../services/errors.js';
import { setupClaudeAuth } from './claude-auth.js';
import { setupCloudflareAuth } from './cloudflare-auth.js';
import { setupGithubAuth } from './github-auth.js';
import type { CredentialContext, CredentialResult } from './credential-context.js';

export type CredentialServiceName = 'github' | 'cloudflare' | 'claude';

const PROVIDERS: Record<CredentialServiceName, (ctx: CredentialContext) => CredentialResult> = {
  github: setupGithubAuth,
  cloudflare: setupCloudflareAuth,
  claude: setupClaudeAuth
};

export function isCredentialServiceName(value: string): value is CredentialServiceName {
  return value === 'github' || value === 'cloudflare' || value === 'claude';
}

export type CredentialCacheReport = {
  configured: CredentialServiceName[];
  failed: string[];
  exports: Record<string, string>;
};

/**
 * Runs each requested provider in order. Unknown names and failing
 * providers are reported, never thrown: startup must not block on auth.
 */
export function setupCredentialCache(services: string[], ctx: CredentialContext): CredentialCacheReport {
  const report: CredentialCacheReport = { configured: [], failed: [], exports: {} };

  fs.mkdirSync(ctx.authDir, { recursive: true });

  for (const service of services) {
    if (!isCredentialServiceName(service)) {
      ctx.logger.warning(`Unknown service: ${service} (skipping)`);
      report.failed.push(service);
      continue;
    }
    try {
      const result = PROVIDERS[service]({ ...ctx, env: { ...ctx.env, ...report.exports } });
      Object.assign(report.exports, result.exports);
      if (result.ok) {
        report.configured.push(service);
      } else {
        report.failed.push(service);
      }
    } catch (error) {
      ctx.debug('WARN', `${service}: ${getErrorMessage(error)}`);
      report.failed.push(service);
    }
  }

  if (report.failed.length > 0) {
    ctx.logger.warning(`Some credentials not configured: ${report.failed.join(' ')}`);
    ctx.logger.info('  Container will start, but some features may require authentication');
  }

  return report;
}
