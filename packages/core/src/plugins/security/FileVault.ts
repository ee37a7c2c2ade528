import { UNKNOWN } from '@provision/types';
import type { ApplyContext, ObservedState, ResourceContext } from '@provision/types';
import { ResourcePlugin, type ResourcePluginMetadata } from '../ResourcePlugin.js';
import { ApplyError } from '../../errors/ProvisionError.js';
import { runChecked } from '../../core/CommandRunner.js';

export type ToggleState = 'on' | 'off';

/**
 * Parse `fdesetup status`.
 *
 * A volume that is still decrypting already counts as off: disabling has
 * taken effect and the machine will boot without a login.
 */
export function parseFileVaultStatus(stdout: string): ObservedState<ToggleState> {
  if (/Decryption in progress/i.test(stdout)) return 'off';
  if (/FileVault is On\b/.test(stdout)) return 'on';
  if (/FileVault is Off\b/.test(stdout)) return 'off';
  return UNKNOWN;
}

/**
 * FileVault disk encryption. A headless machine needs it off so it can
 * boot unattended after a power loss.
 */
export class FileVault extends ResourcePlugin<ToggleState> {
  get metadata(): ResourcePluginMetadata<ToggleState> {
    return {
      type: 'filevault',
      defaultId: 'filevault',
      privilege: 'root',
      comparison: 'exact',
      defaultDesired: 'off',
    };
  }

  protected parseDesired(value: unknown): ToggleState {
    return this.parseEnum(value, ['on', 'off'] as const);
  }

  async probe(context: ResourceContext): Promise<ObservedState<ToggleState>> {
    const result = await runChecked(context.runner, ['fdesetup', 'status']);
    return parseFileVaultStatus(result.stdout);
  }

  async apply(target: ToggleState, context: ApplyContext<ToggleState>): Promise<void> {
    if (target === 'on') {
      throw new ApplyError(
        'Enabling FileVault requires an interactive login and is not automated',
        { resourceId: this.id },
        'Run: sudo fdesetup enable'
      );
    }
    await runChecked(context.runner, ['fdesetup', 'disable']);
  }
}
