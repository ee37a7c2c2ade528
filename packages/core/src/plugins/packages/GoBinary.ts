import type { ApplyContext, ObservedState, ResourceContext } from '@provision/types';
import { ResourcePlugin, type ResourcePluginMetadata } from '../ResourcePlugin.js';
import { ApplyError } from '../../errors/ProvisionError.js';
import { runChecked } from '../../core/CommandRunner.js';
import { asRealUser } from '../../core/privilege.js';
import { goBinDir, HOMEBREW_BIN_DIRS, resolveBinary } from '../shared.js';
import type { PackageState } from './HomebrewInstallation.js';

/**
 * Binaries built from source with `go install`.
 *
 * Installed means every name in `binaries` is found on PATH or in ~/go/bin.
 */
export class GoBinary extends ResourcePlugin<PackageState> {
  private readonly packages = this.stringListOption('packages');
  private readonly binaries = this.stringListOption('binaries', this.packages.map(pkg => pkg.split('/').pop() ?? pkg));
  private readonly version = this.stringOption('version', 'latest');

  get metadata(): ResourcePluginMetadata<PackageState> {
    return {
      type: 'go-binary',
      defaultId: `go:${this.binaries.join('+')}`,
      privilege: 'user',
      comparison: 'exact',
      defaultDesired: 'installed',
    };
  }

  protected parseDesired(value: unknown): PackageState {
    return this.parseEnum(value, ['installed'] as const);
  }

  async probe(context: ResourceContext): Promise<ObservedState<PackageState>> {
    for (const binary of this.binaries) {
      if (!(await resolveBinary(context, binary, [goBinDir(context.privilege)]))) {
        return 'absent';
      }
    }
    return 'installed';
  }

  async apply(_target: PackageState, context: ApplyContext<PackageState>): Promise<void> {
    const go = await resolveBinary(context, 'go', HOMEBREW_BIN_DIRS);
    if (!go) {
      throw new ApplyError('Go toolchain not found; install it before building from source', { resourceId: this.id });
    }
    for (const pkg of this.packages) {
      await runChecked(context.runner, asRealUser(context.privilege, [go, 'install', `${pkg}@${this.version}`]));
    }
  }
}
