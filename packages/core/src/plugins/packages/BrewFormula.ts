import type { ApplyContext, ObservedState, ResourceContext } from '@provision/types';
import { ResourcePlugin, type ResourcePluginMetadata } from '../ResourcePlugin.js';
import { ApplyError } from '../../errors/ProvisionError.js';
import { runChecked } from '../../core/CommandRunner.js';
import { asRealUser } from '../../core/privilege.js';
import { findBrew } from '../shared.js';
import type { PackageState } from './HomebrewInstallation.js';

/**
 * A single Homebrew formula, e.g. `go`.
 */
export class BrewFormula extends ResourcePlugin<PackageState> {
  private readonly formula = this.stringOption('formula');

  get metadata(): ResourcePluginMetadata<PackageState> {
    return {
      type: 'brew-formula',
      defaultId: `brew:${this.formula}`,
      privilege: 'user',
      comparison: 'exact',
      defaultDesired: 'installed',
    };
  }

  protected parseDesired(value: unknown): PackageState {
    return this.parseEnum(value, ['installed', 'absent'] as const);
  }

  async probe(context: ResourceContext): Promise<ObservedState<PackageState>> {
    const brew = await findBrew(context);
    // No Homebrew means no formula
    if (!brew) return 'absent';

    const result = await context.runner.invoke(asRealUser(context.privilege, [brew, 'list', '--formula', this.formula]));
    return result.exitCode === 0 ? 'installed' : 'absent';
  }

  async apply(target: PackageState, context: ApplyContext<PackageState>): Promise<void> {
    const brew = await findBrew(context);
    if (!brew) {
      throw new ApplyError(`Homebrew is not installed; cannot manage formula "${this.formula}"`, { resourceId: this.id });
    }
    const verb = target === 'installed' ? 'install' : 'uninstall';
    await runChecked(context.runner, asRealUser(context.privilege, [brew, verb, this.formula]));
  }
}
