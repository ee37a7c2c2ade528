/**
 * Built-in macOS resource plugins
 */
export { BUILTIN_RESOURCES } from './builtinResources.js';
export type { ResourceFactory } from './builtinResources.js';
export { resolveBinary, findBrew, goBinDir, HOMEBREW_BIN_DIRS } from './shared.js';

export { HomebrewInstallation } from './packages/HomebrewInstallation.js';
export type { PackageState } from './packages/HomebrewInstallation.js';
export { BrewFormula } from './packages/BrewFormula.js';
export { BrewBundle } from './packages/BrewBundle.js';
export type { BundleState } from './packages/BrewBundle.js';
export { GoBinary } from './packages/GoBinary.js';

export { TailscaleDaemon } from './tailscale/TailscaleDaemon.js';
export { TailscaleConnection } from './tailscale/TailscaleConnection.js';
export type { ConnectionState } from './tailscale/TailscaleConnection.js';

export { FileVault, parseFileVaultStatus } from './security/FileVault.js';
export type { ToggleState } from './security/FileVault.js';
export { RemoteLogin, parseRemoteLogin } from './security/RemoteLogin.js';

export { FirewallFlag } from './firewall/FirewallFlag.js';
export type { FirewallFlagKind } from './firewall/FirewallFlag.js';
export { FirewallExceptions } from './firewall/FirewallExceptions.js';
export { parseToggle, parseAppList, SOCKETFILTERFW } from './firewall/socketfilterfw.js';
export type { FirewallApp } from './firewall/socketfilterfw.js';

export { LaunchdService, isJobListed } from './services/LaunchdService.js';
export type { ServiceState } from './services/LaunchdService.js';
export { PowerSetting, parsePmsetValue } from './power/PowerSetting.js';
export { DnsServers, parseDnsServers, MAGIC_DNS } from './network/DnsServers.js';
