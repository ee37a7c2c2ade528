/**
 * @provision/core - State-reconciliation engine and built-in macOS resources
 */

// Error types
export {
  ProvisionError,
  ConfigError,
  CycleError,
  UnknownDependencyError,
  ProbeError,
  ApplyError,
  CommandError,
  errorMessage,
} from './errors/ProvisionError.js';
export type { ErrorContext, ProvisionErrorJSON } from './errors/ProvisionError.js';

// Logging
export { ConsoleLogger, FileLogger, MultiLogger, createLogger, closeLogger, isLogLevel } from './logging/Logger.js';
export type { Logger, LogLevel } from './logging/Logger.js';

// Version
export { PROVISION_VERSION, getSchemaVersion } from './version.js';

// Config
export {
  loadConfig,
  parseConfig,
  buildResources,
  validateVersion,
  validateSettings,
  validateResources,
  DEFAULT_CONFIG,
  CONFIG_FILE_NAME,
} from './config/index.js';
export type { ProvisionConfig, ProvisionSettings, LoadedConfig, LoadConfigOptions } from './config/index.js';

// Engine
export { Reconciler } from './Reconciler.js';
export type { ReconcilerOptions, ProgressCallback, ProgressInfo } from './Reconciler.js';
export { RunReport, outcomeStatus } from './RunReport.js';
export type { OutcomeCounts } from './RunReport.js';
export { ResourceRegistry } from './core/ResourceRegistry.js';
export { orderResources, collectPrerequisites } from './core/orderResources.js';
export { toposort } from './core/toposort.js';
export type { ToposortItem } from './core/toposort.js';
export { statesMatch, planTarget, describeState, isListState } from './core/stateDiff.js';
export { waitUntilReady, DEFAULT_READINESS } from './core/readiness.js';

// Command boundary and privilege
export { SpawnCommandRunner, runChecked } from './core/CommandRunner.js';
export { detectPrivilegeContext, asRealUser, expandHome, parseDsclHome, parsePasswdHome } from './core/privilege.js';
export type { PrivilegeSource } from './core/privilege.js';

// Plugins
export { ResourcePlugin } from './plugins/ResourcePlugin.js';
export type { ResourcePluginMetadata, PluginEnvironment } from './plugins/ResourcePlugin.js';
export * from './plugins/index.js';
