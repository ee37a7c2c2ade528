import { isAbsolute, join } from 'path';
import type { ApplyContext, ObservedState, ResourceContext } from '@provision/types';
import { ResourcePlugin, type ResourcePluginMetadata } from '../ResourcePlugin.js';
import { ApplyError } from '../../errors/ProvisionError.js';
import { runChecked } from '../../core/CommandRunner.js';
import { asRealUser } from '../../core/privilege.js';
import { findBrew } from '../shared.js';

export type BundleState = 'satisfied' | 'unsatisfied';

/**
 * Everything listed in a Brewfile. `file` is relative to the config file.
 */
export class BrewBundle extends ResourcePlugin<BundleState> {
  private readonly file = this.resolveFile(this.pathOption('file', 'Brewfile'));

  get metadata(): ResourcePluginMetadata<BundleState> {
    return {
      type: 'brew-bundle',
      defaultId: 'brewfile',
      privilege: 'user',
      comparison: 'exact',
      defaultDesired: 'satisfied',
    };
  }

  protected parseDesired(value: unknown): BundleState {
    return this.parseEnum(value, ['satisfied'] as const);
  }

  async probe(context: ResourceContext): Promise<ObservedState<BundleState>> {
    const brew = await findBrew(context);
    if (!brew) return 'unsatisfied';

    const result = await context.runner.invoke(
      asRealUser(context.privilege, [brew, 'bundle', 'check', '--no-upgrade', `--file=${this.file}`])
    );
    return result.exitCode === 0 ? 'satisfied' : 'unsatisfied';
  }

  async apply(_target: BundleState, context: ApplyContext<BundleState>): Promise<void> {
    const brew = await findBrew(context);
    if (!brew) {
      throw new ApplyError('Homebrew is not installed; cannot install Brewfile packages', { resourceId: this.id });
    }
    await runChecked(context.runner, asRealUser(context.privilege, [brew, 'bundle', 'install', `--file=${this.file}`]));
  }

  private resolveFile(path: string): string {
    return isAbsolute(path) ? path : join(this.env.configDir, path);
  }
}
