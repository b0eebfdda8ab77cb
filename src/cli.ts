#!/usr/bin/env node

/**
 * dev-services CLI entry point
 * Starts, stops and reports the dev-infra services of an AI coding devcontainer.
 */

import fs from 'node:fs';
import path from 'node:path';

import { validateDevServicesConfig } from './config/dev-services-config.js';
import { createDevServicesDeps } from './cli/bootstrap.js';
import { runCli } from './cli/main.js';
import { createNodeRuntime } from './cli/runtime.js';

// Resolve version from package.json at runtime to avoid hardcoding mismatches
const pkgVersion: string = (() => {
  try {
    const parsed: unknown = JSON.parse(fs.readFileSync(path.resolve(__dirname, '..', 'package.json'), 'utf8'));
    if (parsed && typeof parsed === 'object' && 'version' in parsed && typeof parsed.version === 'string') {
      return parsed.version;
    }
  } catch {
    // fall through to the placeholder version
  }
  return '0.0.0';
})();

async function main(): Promise<number> {
  const runtime = createNodeRuntime();
  const entry = process.argv[1];
  const deps = createDevServicesDeps({
    env: process.env,
    runtime,
    selfCommand: entry ? [process.execPath, ...process.execArgv, entry] : []
  });

  const problems = validateDevServicesConfig(deps.config);
  if (problems.length) {
    for (const problem of problems) {
      runtime.writeErr(`dev-services: invalid configuration: ${problem}\n`);
    }
    return 1;
  }

  return runCli(process.argv, { cliVersion: pkgVersion, runtime, deps });
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    process.stderr.write(`dev-services: ${error instanceof Error ? error.message : String(error)}\n`);
    process.exitCode = 1;
  }
);
