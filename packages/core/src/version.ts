/**
 * Version constants.
 *
 * Kept in code rather than read from package.json so the value is the same
 * when running from sources and from a compiled dist/ tree.
 */

/** Full provision version string (e.g., "0.1.0" or "0.2.0-beta") */
export const PROVISION_VERSION = '0.1.0';

/**
 * Extract major.minor.patch from a version string, stripping pre-release tags.
 *
 * "0.2.5-beta" → "0.2.5"
 * "1.0.0-alpha.1" → "1.0.0"
 */
export function getSchemaVersion(version: string): string {
  return version.split('-')[0];
}
