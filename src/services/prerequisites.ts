import fs from 'node:fs';

import type { SkipReason } from './errors.js';
import type { ServiceContext } from './types.js';

export function gastownSkipReason(ctx: ServiceContext): SkipReason | null {
  if (!ctx.config.gastownEnabled) {
    return { code: 'disabled' };
  }
  if (!ctx.runner.has('gt')) {
    // a missing gt reads as "disabled" in status, same as the flag
    return { code: 'tool-missing', tool: 'gt' };
  }
  return null;
}

export function gastownInitSkipReason(ctx: ServiceContext): SkipReason | null {
  return gastownSkipReason(ctx) ?? (fs.existsSync(ctx.paths.townJson) ? null : { code: 'not-initialized', path: ctx.paths.townJson });
}

export function isDirectory(target: string): boolean {
  try {
    return fs.statSync(target).isDirectory();
  } catch {
    return false;
  }
}

export function isFile(target: string): boolean {
  try {
    return fs.statSync(target).isFile();
  } catch {
    return false;
  }
}

// Child commands that must find the town-level .beads/ rather than a rig's
export function townBeadsEnv(ctx: ServiceContext): ServiceContext['env'] {
  return { ...ctx.env, BEADS_DIR: '' };
}
