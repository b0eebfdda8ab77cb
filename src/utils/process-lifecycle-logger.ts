import fs from 'node:fs';
import path from 'node:path';

type JsonScalar = string | number | boolean | null;
type JsonLike = JsonScalar | JsonLike[] | { [key: string]: JsonLike };

export interface ProcessLifecycleEvent {
  event: string;
  source: string;
  details?: Record<string, unknown>;
}

export interface ProcessLifecycleRecord {
  ts: string;
  pid: number;
  ppid: number;
  event: string;
  source: string;
  details?: JsonLike;
}

export type LifecycleLogger = {
  log: (event: ProcessLifecycleEvent) => void;
};

export type LifecycleLoggerOptions = {
  logPath: string;
  console?: boolean;
  writeConsole?: (line: string) => void;
  now?: () => Date;
};

function serializeUnknown(value: unknown): JsonLike {
  if (value === null || value === undefined) {
    return null;
  }
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }
  if (Array.isArray(value)) {
    return value.map((item) => serializeUnknown(item));
  }
  if (value instanceof Error) {
    const out: Record<string, JsonLike> = {
      name: value.name,
      message: value.message
    };
    if (value.stack) {
      out.stack = value.stack;
    }
    return out;
  }
  if (typeof value === 'object') {
    const out: Record<string, JsonLike> = {};
    for (const [key, item] of Object.entries(value)) {
      if (item !== undefined) {
        out[key] = serializeUnknown(item);
      }
    }
    return out;
  }
  return String(value);
}

export function buildLifecycleRecord(event: ProcessLifecycleEvent, now: Date = new Date()): ProcessLifecycleRecord {
  return {
    ts: now.toISOString(),
    pid: process.pid,
    ppid: process.ppid,
    event: event.event,
    source: event.source,
    ...(event.details ? { details: serializeUnknown(event.details) } : {})
  };
}

export function formatConsoleLine(record: ProcessLifecycleRecord): string {
  const details = record.details && typeof record.details === 'object' && !Array.isArray(record.details)
    ? record.details
    : null;
  const parts: string[] = [];
  if (details) {
    for (const key of ['service', 'operation', 'result', 'reason']) {
      const value = details[key];
      if (value !== undefined && value !== null && value !== '') {
        parts.push(`${key}=${String(value)}`);
      }
    }
  }
  const suffix = parts.length ? ` ${parts.join(' ')}` : '';
  return `[dev-services.lifecycle][${record.ts}] ${record.event} source=${record.source}${suffix}`;
}

function appendRecordSync(logPath: string, record: ProcessLifecycleRecord): void {
  try {
    fs.mkdirSync(path.dirname(logPath), { recursive: true });
    fs.appendFileSync(logPath, `${JSON.stringify(record)}\n`, 'utf8');
  } catch {
    // Never throw from lifecycle logging.
  }
}

export function createLifecycleLogger(options: LifecycleLoggerOptions): LifecycleLogger {
  const writeConsole = options.writeConsole ?? ((line: string) => console.error(line));
  return {
    log(event: ProcessLifecycleEvent): void {
      const record = buildLifecycleRecord(event, options.now ? options.now() : new Date());
      if (options.console) {
        writeConsole(formatConsoleLine(record));
      }
      appendRecordSync(options.logPath, record);
    }
  };
}
