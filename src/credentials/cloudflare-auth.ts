import fs from 'node:fs';
import path from 'node:path';

import {
  ensurePrivateDir,
  fileExists,
  readSecretFile,
  writeSecretFile,
  type CredentialContext,
  type CredentialResult
} from './credential-context.js';

export function setupCloudflareAuth(ctx: CredentialContext): CredentialResult {
  const tokenFile = path.join(ctx.authDir, 'cloudflare_api_token');
  const accountFile = path.join(ctx.authDir, 'cloudflare_account_id');
  const wranglerDir = path.join(ctx.authDir, 'wrangler');
  const exports: Record<string, string> = {};

  ensurePrivateDir(wranglerDir);

  if (fileExists(tokenFile)) {
    ctx.logger.success('Cloudflare API token found in cache');
    exports.CLOUDFLARE_API_TOKEN = readSecretFile(tokenFile);
    if (fileExists(accountFile)) {
      exports.CLOUDFLARE_ACCOUNT_ID = readSecretFile(accountFile);
    }
    return { ok: true, exports };
  }

  const cachedWrangler = path.join(wranglerDir, 'default.toml');
  if (fileExists(cachedWrangler)) {
    ctx.logger.success('Wrangler config found in cache');
    const target = path.join(ctx.homeDir, '.wrangler', 'config', 'default.toml');
    fs.mkdirSync(path.dirname(target), { recursive: true });
    fs.rmSync(target, { force: true });
    fs.symlinkSync(cachedWrangler, target);
    return { ok: true, exports };
  }

  const token = ctx.env.CLOUDFLARE_API_TOKEN;
  if (typeof token === 'string' && token) {
    writeSecretFile(tokenFile, `${token}\n`);
    ctx.logger.success('Cloudflare API token cached from environment');
    const accountId = ctx.env.CLOUDFLARE_ACCOUNT_ID;
    if (typeof accountId === 'string' && accountId) {
      writeSecretFile(accountFile, `${accountId}\n`);
      exports.CLOUDFLARE_ACCOUNT_ID = accountId;
    }
    return { ok: true, exports };
  }

  ctx.logger.warning('Cloudflare credentials not found. Options:');
  ctx.logger.info('  1. Set CLOUDFLARE_API_TOKEN environment variable');
  ctx.logger.info('  2. Run: wrangler login');
  return { ok: true, exports };
}
