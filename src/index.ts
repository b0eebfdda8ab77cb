/**
 * dev-services library entry point
 */

export { loadDevServicesConfig, parseBool, validateDevServicesConfig } from './config/dev-services-config.js';
export type { DevServicesConfig, EnvLike, LoadConfigOptions } from './config/dev-services-config.js';
export { resolveDevServicesPaths } from './config/dev-services-paths.js';
export type { DevServicesPaths } from './config/dev-services-paths.js';
export { SERVICE_ORDER } from './constants/index.js';
export { createServiceTable, startOrder, stopOrder } from './services/registry.js';
export { describeState, isFailureState } from './services/types.js';
export type { ServiceContext, ServiceDefinition, ServiceName, ServiceState, ServiceTable } from './services/types.js';
export { ServiceOperationError } from './services/errors.js';
export { ServiceDispatcher, formatStatusReport } from './supervisor/dispatcher.js';
export type { StatusEntry, StatusReport } from './supervisor/dispatcher.js';
export { setupCredentialCache } from './credentials/credential-cache.js';
export { writeDeaconHeartbeat } from './gastown/heartbeat.js';
export { mergeGastownHooks } from './gastown/claude-hooks.js';
export { runWatchdog } from './watchdog/watchdog-loop.js';
export type { WatchdogExit, WatchdogOptions } from './watchdog/watchdog-loop.js';
export { runCli } from './cli/main.js';
export { createDevServicesDeps } from './cli/bootstrap.js';
