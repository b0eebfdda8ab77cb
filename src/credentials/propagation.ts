import { resolveClaudeCredentialPaths } from './claude-auth.js';
import { copySecretFile, fileExists, type CredentialContext } from './credential-context.js';
import { importGithubFromShared, resolveGithubAuthPaths } from './github-auth.js';

/**
 * Re-imports credentials from the shared volume where the local copy is
 * missing, e.g. a session that started before the volume was populated.
 * Returns how many were repaired.
 */
export function verifyCredentialPropagation(ctx: CredentialContext): number {
  let repaired = 0;

  const gh = resolveGithubAuthPaths(ctx);
  if (!fileExists(gh.hostsFile) && fileExists(gh.sharedHostsFile)) {
    ctx.debug('INFO', 'verify: Re-importing gh credentials from shared volume');
    importGithubFromShared(gh);
    repaired += 1;
  }

  const claude = resolveClaudeCredentialPaths(ctx);
  if (!fileExists(claude.local) && fileExists(claude.shared)) {
    ctx.debug('INFO', 'verify: Re-importing Claude credentials from shared volume');
    copySecretFile(claude.shared, claude.local);
    repaired += 1;
  }

  if (repaired > 0) {
    ctx.debug('INFO', `verify: Repaired ${repaired} credential(s)`);
  }
  return repaired;
}
