import fs from 'node:fs';
import path from 'node:path';

type HookCommand = { type: 'command'; command: string };

export type HookEntry = {
  hooks: HookCommand[];
  matcher?: string;
};

type JsonObject = Record<string, unknown>;

const SENTINEL_COMMAND = 'gt costs record';

function isObject(value: unknown): value is JsonObject {
  return Boolean(value) && typeof value === 'object' && !Array.isArray(value);
}

function hookEntry(command: string, matcher?: string): HookEntry {
  return {
    hooks: [{ type: 'command', command }],
    ...(matcher ? { matcher } : {})
  };
}

export function buildGastownHooks(gastownHome: string): Record<string, HookEntry[]> {
  // gt commands resolve the town from cwd, so every hook cds there first
  const gt = (cmd: string) => `cd ${gastownHome} && ${cmd} 2>/dev/null || true`;
  const guard = (name: string) => gt(`gt tap guard ${name}`);
  return {
    SessionStart: [hookEntry(gt('gt prime --hook'))],
    PreCompact: [hookEntry(gt('gt prime --hook'))],
    UserPromptSubmit: [hookEntry(gt('gt mail check --inject'))],
    PreToolUse: [
      hookEntry(guard('pr-workflow'), 'Bash(gh pr create*)'),
      hookEntry(guard('pr-workflow'), 'Bash(git checkout -b*)'),
      hookEntry(guard('pr-workflow'), 'Bash(git switch -c*)'),
      hookEntry(guard('mayor-edit'), 'Edit'),
      hookEntry(guard('mayor-edit'), 'Write')
    ],
    Stop: [hookEntry(gt(SENTINEL_COMMAND))]
  };
}

type CommandRef = { matcher: string; command: string };

// Both the nested {hooks:[{command}]} shape and the legacy flat {command}
function collectCommands(entries: unknown[]): CommandRef[] {
  const out: CommandRef[] = [];
  for (const entry of entries) {
    if (!isObject(entry)) {
      continue;
    }
    const matcher = typeof entry.matcher === 'string' ? entry.matcher : '';
    if (typeof entry.command === 'string') {
      out.push({ matcher, command: entry.command });
    }
    if (Array.isArray(entry.hooks)) {
      for (const hook of entry.hooks) {
        if (isObject(hook) && typeof hook.command === 'string') {
          out.push({ matcher, command: hook.command });
        }
      }
    }
  }
  return out;
}

// The same guard command is installed under several matchers
function commandKey(ref: CommandRef): string {
  return `${ref.matcher}\n${ref.command}`;
}

function readSettings(settingsPath: string): JsonObject {
  if (!fs.existsSync(settingsPath)) {
    return {};
  }
  const parsed: unknown = JSON.parse(fs.readFileSync(settingsPath, 'utf8'));
  if (!isObject(parsed)) {
    throw new Error(`${settingsPath} does not contain a JSON object`);
  }
  return parsed;
}

export function hasGastownHooks(settingsPath: string): boolean {
  try {
    const hooks = readSettings(settingsPath).hooks;
    if (!isObject(hooks) || !Array.isArray(hooks.Stop)) {
      return false;
    }
    return collectCommands(hooks.Stop).some((ref) => ref.command.includes(SENTINEL_COMMAND));
  } catch {
    return false;
  }
}

export type MergeHooksResult = {
  changed: boolean;
  added: number;
};

/**
 * Adds the gastown hooks to Claude Code's settings.json without duplicating
 * commands already present. Other keys and events are left untouched.
 */
export function mergeGastownHooks(settingsPath: string, gastownHome: string): MergeHooksResult {
  const settings = readSettings(settingsPath);
  const hooks: JsonObject = isObject(settings.hooks) ? settings.hooks : {};
  let added = 0;

  for (const [event, wanted] of Object.entries(buildGastownHooks(gastownHome))) {
    const current = hooks[event];
    const entries: unknown[] = Array.isArray(current) ? current : [];
    const existing = new Set(collectCommands(entries).map(commandKey));
    for (const entry of wanted) {
      const command = entry.hooks[0]?.command;
      if (!command) {
        continue;
      }
      const key = commandKey({ matcher: entry.matcher ?? '', command });
      if (existing.has(key)) {
        continue;
      }
      entries.push(entry);
      existing.add(key);
      added += 1;
    }
    hooks[event] = entries;
  }

  if (added === 0) {
    return { changed: false, added };
  }

  settings.hooks = hooks;
  fs.mkdirSync(path.dirname(settingsPath), { recursive: true });
  fs.writeFileSync(settingsPath, `${JSON.stringify(settings, null, 2)}\n`, 'utf8');
  return { changed: true, added };
}
