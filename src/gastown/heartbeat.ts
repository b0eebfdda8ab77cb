import fs from 'node:fs';
import path from 'node:path';

export type DeaconHeartbeat = {
  timestamp: string;
  status: string;
  patrol_active: boolean;
};

// Second precision, trailing Z: 2026-10-18T09:04:05Z
export function formatHeartbeatTimestamp(now: Date): string {
  return now.toISOString().replace(/\.\d{3}Z$/, 'Z');
}

/**
 * Seeds deacon/heartbeat.json before `gt up`. A missing or stale heartbeat
 * is read by the daemon as maximum idle time, which restart-loops the deacon
 * before it finishes booting. The deacon overwrites this once it is up.
 */
export function writeDeaconHeartbeat(filePath: string, now: Date): DeaconHeartbeat {
  const heartbeat: DeaconHeartbeat = {
    timestamp: formatHeartbeatTimestamp(now),
    status: 'booting',
    patrol_active: false
  };
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, `${JSON.stringify(heartbeat)}\n`, 'utf8');
  return heartbeat;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === 'object' && !Array.isArray(value);
}

export function readHeartbeat(filePath: string): DeaconHeartbeat | null {
  try {
    const record: unknown = JSON.parse(fs.readFileSync(filePath, 'utf8'));
    if (!isRecord(record)) {
      return null;
    }
    if (
      typeof record.timestamp !== 'string' ||
      typeof record.status !== 'string' ||
      typeof record.patrol_active !== 'boolean'
    ) {
      return null;
    }
    return { timestamp: record.timestamp, status: record.status, patrol_active: record.patrol_active };
  } catch {
    return null;
  }
}
