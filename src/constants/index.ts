/**
 * dev-services shared constants
 * Hard-coded names, defaults and thresholds live here.
 */

// Start order; stop walks it backwards
export const SERVICE_ORDER = ['credentials', 'beads-daemon', 'gastown', 'watchdog', 'notifier'] as const;

export const DEFAULTS = {
  GASTOWN_DIRNAME: 'gt',
  CREDENTIAL_SERVICES: ['github', 'cloudflare', 'claude'],
  WATCHDOG_INTERVAL_SEC: 60,
  SHARED_AUTH_DIR: '/home/vscode/.shared-auth',
  NOTIFIER_SCRIPT: '/opt/ai-coding-utils/slack/beads_watcher_template.py',
  COMMAND_TIMEOUT_MS: 60_000
} as const;

// Environment variables read by loadDevServicesConfig
export const ENV_KEYS = {
  GASTOWN_ENABLED: 'GASTOWN_ENABLED',
  GASTOWN_HOME: 'GASTOWN_HOME',
  CREDENTIAL_SERVICES: 'CREDENTIAL_CACHE_SERVICES',
  WATCHDOG_INTERVAL: 'DAEMON_WATCHDOG_INTERVAL',
  SHARED_AUTH_DIR: 'SHARED_AUTH_DIR',
  NOTIFIER_SCRIPT: 'BEADS_NOTIFIER_SCRIPT',
  CREDENTIAL_DEBUG: 'CREDENTIAL_CACHE_DEBUG',
  COMMAND_TIMEOUT: 'DEV_SERVICES_COMMAND_TIMEOUT_MS',
  LIFECYCLE_LOG: 'DEV_SERVICES_LIFECYCLE_LOG',
  LIFECYCLE_CONSOLE: 'DEV_SERVICES_LIFECYCLE_CONSOLE'
} as const;

export const PID_KILL = {
  POLL_ATTEMPTS: 10,
  POLL_INTERVAL_MS: 100
} as const;

export const WATCHDOG_LOG = {
  FILENAME: 'daemon_watchdog.log',
  MAX_BYTES: 102_400,
  ROTATED_SUFFIX: '.1'
} as const;

export const STATUS_NAME_WIDTH = 16;
