/**
 * Built-in resource plugin factories, keyed by the `type` used in config files.
 */

import type { ResourceEntry, StateValue } from '@provision/types';
import type { PluginEnvironment, ResourcePlugin } from './ResourcePlugin.js';
import { HomebrewInstallation } from './packages/HomebrewInstallation.js';
import { BrewFormula } from './packages/BrewFormula.js';
import { BrewBundle } from './packages/BrewBundle.js';
import { GoBinary } from './packages/GoBinary.js';
import { TailscaleDaemon } from './tailscale/TailscaleDaemon.js';
import { TailscaleConnection } from './tailscale/TailscaleConnection.js';
import { FileVault } from './security/FileVault.js';
import { RemoteLogin } from './security/RemoteLogin.js';
import { FirewallFlag } from './firewall/FirewallFlag.js';
import { FirewallExceptions } from './firewall/FirewallExceptions.js';
import { LaunchdService } from './services/LaunchdService.js';
import { PowerSetting } from './power/PowerSetting.js';
import { DnsServers } from './network/DnsServers.js';

export type ResourceFactory = (entry: ResourceEntry, env: PluginEnvironment) => ResourcePlugin<StateValue>;

export const BUILTIN_RESOURCES: Record<string, ResourceFactory> = {
  homebrew: (entry, env) => new HomebrewInstallation(entry, env),
  'brew-formula': (entry, env) => new BrewFormula(entry, env),
  'brew-bundle': (entry, env) => new BrewBundle(entry, env),
  'go-binary': (entry, env) => new GoBinary(entry, env),
  'tailscale-daemon': (entry, env) => new TailscaleDaemon(entry, env),
  'tailscale-connection': (entry, env) => new TailscaleConnection(entry, env),
  filevault: (entry, env) => new FileVault(entry, env),
  'remote-login': (entry, env) => new RemoteLogin(entry, env),
  'firewall-state': (entry, env) => new FirewallFlag(entry, env, 'firewall-state'),
  'firewall-allow-signed': (entry, env) => new FirewallFlag(entry, env, 'firewall-allow-signed'),
  'firewall-stealth': (entry, env) => new FirewallFlag(entry, env, 'firewall-stealth'),
  'firewall-exceptions': (entry, env) => new FirewallExceptions(entry, env),
  'launchd-service': (entry, env) => new LaunchdService(entry, env),
  'power-setting': (entry, env) => new PowerSetting(entry, env),
  'dns-servers': (entry, env) => new DnsServers(entry, env),
};
