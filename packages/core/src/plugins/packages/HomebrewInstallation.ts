import type { ApplyContext, ObservedState, ResourceContext } from '@provision/types';
import { ResourcePlugin, type ResourcePluginMetadata } from '../ResourcePlugin.js';
import { ApplyError } from '../../errors/ProvisionError.js';
import { runChecked } from '../../core/CommandRunner.js';
import { asRealUser } from '../../core/privilege.js';
import { findBrew } from '../shared.js';

export type PackageState = 'installed' | 'absent';

const DEFAULT_INSTALLER_URL = 'https://raw.githubusercontent.com/Homebrew/install/HEAD/install.sh';

/**
 * Homebrew itself. The installer needs admin rights (it creates the prefix)
 * but must not run as root, so it runs as the real user under sudo.
 */
export class HomebrewInstallation extends ResourcePlugin<PackageState> {
  get metadata(): ResourcePluginMetadata<PackageState> {
    return {
      type: 'homebrew',
      defaultId: 'homebrew',
      privilege: 'root',
      comparison: 'exact',
      defaultDesired: 'installed',
    };
  }

  protected parseDesired(value: unknown): PackageState {
    return this.parseEnum(value, ['installed'] as const);
  }

  async probe(context: ResourceContext): Promise<ObservedState<PackageState>> {
    return (await findBrew(context)) ? 'installed' : 'absent';
  }

  async apply(target: PackageState, context: ApplyContext<PackageState>): Promise<void> {
    if (target !== 'installed') {
      throw new ApplyError('Removing Homebrew is not supported', { resourceId: this.id });
    }
    const url = this.stringOption('installerUrl', DEFAULT_INSTALLER_URL);
    // sudo resets the environment, so NONINTERACTIVE goes inside the shell command
    const script = `NONINTERACTIVE=1 /bin/bash -c "$(curl -fsSL ${url})"`;
    await runChecked(context.runner, asRealUser(context.privilege, ['/bin/bash', '-c', script]));
  }
}
