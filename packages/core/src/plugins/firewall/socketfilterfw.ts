/**
 * Helpers for /usr/libexec/ApplicationFirewall/socketfilterfw output.
 */

import { UNKNOWN } from '@provision/types';
import type { ObservedState } from '@provision/types';
import type { ToggleState } from '../security/FileVault.js';

export const SOCKETFILTERFW = '/usr/libexec/ApplicationFirewall/socketfilterfw';

/**
 * Parse a --get* query. Output wording varies across macOS releases
 * ("Firewall is enabled. (State = 1)", "Stealth mode enabled",
 * "Firewall stealth mode is on"), so only the first line's keyword counts.
 */
export function parseToggle(stdout: string): ObservedState<ToggleState> {
  const line = stdout.split('\n').map(l => l.trim()).find(l => l.length > 0) ?? '';
  if (/\b(disabled|off)\b/i.test(line)) return 'off';
  if (/\b(enabled|on)\b/i.test(line) || /\bblock(ing)? all\b/i.test(line)) return 'on';
  return UNKNOWN;
}

export interface FirewallApp {
  path: string;
  allowed: boolean;
}

/**
 * Parse --listapps:
 *
 *   1 :  /usr/libexec/sharingd
 *        ( Allow incoming connections )
 */
export function parseAppList(stdout: string): FirewallApp[] {
  const apps: FirewallApp[] = [];
  for (const line of stdout.split('\n')) {
    const entry = /^\s*\d+\s*:\s*(.+?)\s*$/.exec(line);
    if (entry) {
      apps.push({ path: entry[1], allowed: false });
      continue;
    }
    const last = apps[apps.length - 1];
    if (last && /Allow incoming connections/i.test(line)) {
      last.allowed = true;
    }
  }
  return apps;
}
