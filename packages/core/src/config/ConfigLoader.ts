import { readFileSync, existsSync, statSync } from 'fs';
import { dirname, resolve } from 'path';
import { parse as parseYAML } from 'yaml';
import type { Logger, Privilege, ReadinessPolicy, ResourceEntry } from '@provision/types';
import { ConfigError } from '../errors/ProvisionError.js';
import { DEFAULT_READINESS } from '../core/readiness.js';
import { PROVISION_VERSION, getSchemaVersion } from '../version.js';

/**
 * provision configuration schema.
 *
 * Location: provision.yaml in the working directory, or --config <path>.
 *
 * Example:
 *
 * ```yaml
 * version: "0.1.0"
 * settings:
 *   stopOnFailure: false
 *   readiness:
 *     attempts: 10
 *     intervalMs: 1000
 * resources:
 *   - type: homebrew
 *   - id: go
 *     type: brew-formula
 *     dependsOn: [homebrew]
 *     options:
 *       formula: go
 * ```
 *
 * Without a config file the built-in headless-Mac profile (DEFAULT_CONFIG) is used.
 */
export interface ProvisionConfig {
  /**
   * Config schema version (major.minor.patch, no pre-release tag).
   * If omitted, no version check is performed.
   */
  version?: string;

  settings: ProvisionSettings;

  /** Resource declarations, in the order they should be considered */
  resources: ResourceEntry[];
}

export interface ProvisionSettings {
  /** Stop scheduling further resources after the first failure */
  stopOnFailure: boolean;
  /** Polling budget for appliers that wait for a service to come up */
  readiness: ReadinessPolicy;
}

/**
 * A loaded configuration plus where it came from.
 */
export interface LoadedConfig {
  config: ProvisionConfig;
  /** Absolute path of the file read, or null for DEFAULT_CONFIG */
  source: string | null;
  /** Base for relative paths inside resource options */
  configDir: string;
}

export interface LoadConfigOptions {
  /** Explicit config path; must exist */
  configPath?: string;
  /** Where to look for provision.yaml (defaults to process.cwd()) */
  cwd?: string;
}

export const CONFIG_FILE_NAME = 'provision.yaml';

const PRIVILEGES: readonly Privilege[] = ['user', 'root'];

/**
 * Default resource set: a headless Mac reachable over Tailscale.
 *
 * Homebrew and Go come first because tailscale and tailscaled are built
 * from source; the firewall exceptions need the built daemon in place.
 */
export const DEFAULT_CONFIG: ProvisionConfig = {
  version: getSchemaVersion(PROVISION_VERSION),
  settings: {
    stopOnFailure: false,
    readiness: DEFAULT_READINESS,
  },
  resources: [
    { id: 'homebrew', type: 'homebrew' },
    { id: 'go', type: 'brew-formula', dependsOn: ['homebrew'], options: { formula: 'go' } },
    {
      id: 'tailscale-binaries',
      type: 'go-binary',
      dependsOn: ['go'],
      options: {
        packages: ['tailscale.com/cmd/tailscale', 'tailscale.com/cmd/tailscaled'],
        version: 'main',
      },
    },
    { id: 'tailscale-daemon', type: 'tailscale-daemon', dependsOn: ['tailscale-binaries'] },
    { id: 'filevault', type: 'filevault', desired: 'off' },
    { id: 'remote-login', type: 'remote-login', desired: 'off' },
    { id: 'firewall-enabled', type: 'firewall-state' },
    { id: 'firewall-allow-signed', type: 'firewall-allow-signed', dependsOn: ['firewall-enabled'] },
    { id: 'firewall-stealth', type: 'firewall-stealth', dependsOn: ['firewall-enabled'] },
    {
      id: 'firewall-exceptions',
      type: 'firewall-exceptions',
      dependsOn: ['firewall-enabled', 'tailscale-binaries'],
      // Assumes tailscaled was built by tailscale-binaries into go's default
      // bin dir (goBinDir). A tailscaled found elsewhere on PATH, or a custom
      // GOBIN/GOPATH, needs this path overridden in provision.yaml.
      desired: [
        '~/go/bin/tailscaled',
        '/System/Library/CoreServices/RemoteManagement/ARDAgent.app',
        '/System/Library/CoreServices/UniversalControl.app',
        '/usr/libexec/sharingd',
        '/usr/libexec/rapportd',
      ],
    },
    { id: 'screen-sharing', type: 'launchd-service' },
    { id: 'power-sleep', type: 'power-setting', options: { key: 'sleep' } },
    { id: 'power-disksleep', type: 'power-setting', options: { key: 'disksleep' } },
    { id: 'power-powernap', type: 'power-setting', options: { key: 'powernap' } },
    { id: 'tailscale-connection', type: 'tailscale-connection', dependsOn: ['tailscale-daemon'] },
  ],
};

/**
 * Load the provision config.
 *
 * Priority:
 * 1. options.configPath (missing file is an error)
 * 2. provision.yaml in options.cwd
 * 3. DEFAULT_CONFIG
 *
 * Unlike a missing file, an unreadable or invalid one never falls back to
 * defaults: applying a different resource set than the one written down
 * would change the machine in ways nobody asked for.
 *
 * @throws ConfigError on unreadable YAML or failed validation
 */
export function loadConfig(options: LoadConfigOptions = {}, logger?: Logger): LoadedConfig {
  const cwd = resolve(options.cwd ?? process.cwd());

  let path: string;
  if (options.configPath !== undefined) {
    path = resolve(cwd, options.configPath);
    if (!existsSync(path)) {
      throw new ConfigError(
        `Config error: config file "${path}" does not exist`,
        'ERR_CONFIG_INVALID',
        { filePath: path },
        `Create it, or omit --config to use ${CONFIG_FILE_NAME} or the built-in defaults`
      );
    }
  } else {
    path = resolve(cwd, CONFIG_FILE_NAME);
    if (!existsSync(path)) {
      logger?.debug('No config file found, using built-in defaults', { looked: path });
      return { config: DEFAULT_CONFIG, source: null, configDir: cwd };
    }
  }

  if (statSync(path).isDirectory()) {
    throw new ConfigError(`Config error: "${path}" is a directory`, 'ERR_CONFIG_INVALID', { filePath: path });
  }

  let parsed: unknown;
  try {
    parsed = parseYAML(readFileSync(path, 'utf-8'));
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Config error: failed to parse ${path}: ${message}`, 'ERR_CONFIG_INVALID', { filePath: path });
  }

  logger?.debug('Loaded config', { path });
  return { config: parseConfig(parsed, path), source: path, configDir: dirname(path) };
}

/**
 * Validate a parsed YAML document and merge it onto the defaults.
 * THROWS on error.
 */
export function parseConfig(raw: unknown, filePath?: string): ProvisionConfig {
  // An empty file parses to null
  if (raw === null || raw === undefined) {
    return DEFAULT_CONFIG;
  }
  if (!isRecord(raw)) {
    throw configError(`config must be a mapping, got ${describeType(raw)}`, filePath);
  }

  validateVersion(raw.version);
  const settings = validateSettings(raw.settings, filePath);
  const resources = raw.resources === undefined || raw.resources === null
    ? DEFAULT_CONFIG.resources
    : validateResources(raw.resources, filePath);

  return {
    version: typeof raw.version === 'string' ? raw.version : DEFAULT_CONFIG.version,
    settings,
    resources,
  };
}

/**
 * Validate config version against the current schema version.
 *
 * Compares major.minor.patch (pre-release tags are stripped).
 * If config has no version field, validation passes silently.
 *
 * @param currentVersion - Override for testing (defaults to PROVISION_VERSION)
 */
export function validateVersion(configVersion: unknown, currentVersion?: string): void {
  if (configVersion === undefined || configVersion === null) {
    return;
  }

  if (typeof configVersion !== 'string') {
    throw new ConfigError(`Config error: version must be a string, got ${typeof configVersion}`, 'ERR_CONFIG_VERSION');
  }

  if (!configVersion.trim()) {
    throw new ConfigError('Config error: version cannot be empty', 'ERR_CONFIG_VERSION');
  }

  const current = currentVersion ?? PROVISION_VERSION;
  const configSchema = getSchemaVersion(configVersion);
  const currentSchema = getSchemaVersion(current);

  if (configSchema !== currentSchema) {
    throw new ConfigError(
      `Config error: config version "${configVersion}" is not compatible with provision ${current}. Expected "${currentSchema}".`,
      'ERR_CONFIG_VERSION',
      { configVersion, currentVersion: current },
      `Set version: "${currentSchema}" after checking the resource entries still apply`
    );
  }
}

/**
 * Validate the settings block; missing keys take the defaults.
 */
export function validateSettings(settings: unknown, filePath?: string): ProvisionSettings {
  const defaults = DEFAULT_CONFIG.settings;
  if (settings === undefined || settings === null) {
    return defaults;
  }
  if (!isRecord(settings)) {
    throw configError(`settings must be a mapping, got ${describeType(settings)}`, filePath);
  }

  const { stopOnFailure, readiness } = settings;
  if (stopOnFailure !== undefined && typeof stopOnFailure !== 'boolean') {
    throw configError(`settings.stopOnFailure must be a boolean, got ${describeType(stopOnFailure)}`, filePath);
  }

  let policy = defaults.readiness;
  if (readiness !== undefined && readiness !== null) {
    if (!isRecord(readiness)) {
      throw configError(`settings.readiness must be a mapping, got ${describeType(readiness)}`, filePath);
    }
    policy = {
      attempts: positiveInteger(readiness.attempts, 'settings.readiness.attempts', defaults.readiness.attempts, filePath),
      intervalMs: positiveInteger(readiness.intervalMs, 'settings.readiness.intervalMs', defaults.readiness.intervalMs, filePath),
    };
  }

  return {
    stopOnFailure: typeof stopOnFailure === 'boolean' ? stopOnFailure : defaults.stopOnFailure,
    readiness: policy,
  };
}

/**
 * Validate resource entries structurally. Plugin-specific options and
 * desired values are checked later by the plugin factories.
 */
export function validateResources(resources: unknown, filePath?: string): ResourceEntry[] {
  if (!Array.isArray(resources)) {
    throw configError(`resources must be an array, got ${describeType(resources)}`, filePath);
  }

  return resources.map((raw: unknown, i): ResourceEntry => {
    const at = `resources[${i}]`;
    if (!isRecord(raw)) {
      throw configError(`${at} must be a mapping`, filePath);
    }

    const { id, type, desired, dependsOn, privilege, options } = raw;

    if (typeof type !== 'string' || !type.trim()) {
      throw configError(`${at}.type must be a non-empty string`, filePath);
    }
    if (id !== undefined && (typeof id !== 'string' || !id.trim())) {
      throw configError(`${at}.id must be a non-empty string`, filePath);
    }

    const entry: ResourceEntry = { type };
    if (typeof id === 'string') entry.id = id;
    if (desired !== undefined && desired !== null) entry.desired = desired;

    if (dependsOn !== undefined && dependsOn !== null) {
      if (!Array.isArray(dependsOn) || !dependsOn.every((dep): dep is string => typeof dep === 'string' && dep.trim() !== '')) {
        throw configError(`${at}.dependsOn must be a list of resource ids`, filePath);
      }
      entry.dependsOn = dependsOn;
    }

    if (privilege !== undefined && privilege !== null) {
      const match = PRIVILEGES.find(p => p === privilege);
      if (match === undefined) {
        throw configError(`${at}.privilege must be "user" or "root", got ${JSON.stringify(privilege)}`, filePath);
      }
      entry.privilege = match;
    }

    if (options !== undefined && options !== null) {
      if (!isRecord(options)) {
        throw configError(`${at}.options must be a mapping`, filePath);
      }
      entry.options = options;
    }

    return entry;
  });
}

function positiveInteger(value: unknown, name: string, fallback: number, filePath?: string): number {
  if (value === undefined || value === null) return fallback;
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 1) {
    throw configError(`${name} must be a positive integer, got ${JSON.stringify(value)}`, filePath);
  }
  return value;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function describeType(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  return typeof value;
}

function configError(message: string, filePath?: string): ConfigError {
  return new ConfigError(`Config error: ${message}`, 'ERR_CONFIG_INVALID', filePath ? { filePath } : {});
}
