import type { ApplyContext, ObservedState, ResourceContext } from '@provision/types';
import { ResourcePlugin, type ResourcePluginMetadata } from '../ResourcePlugin.js';
import { runChecked } from '../../core/CommandRunner.js';
import { parseAppList, SOCKETFILTERFW, type FirewallApp } from './socketfilterfw.js';

/**
 * Applications allowed to accept incoming connections.
 *
 * Add-only: the observed state is the list of allowed apps and the engine
 * hands apply() a superset of it. Apps not named in the configuration are
 * never removed or blocked.
 */
export class FirewallExceptions extends ResourcePlugin<readonly string[]> {
  private readonly tool = this.pathOption('socketfilterfw', SOCKETFILTERFW);

  get metadata(): ResourcePluginMetadata<readonly string[]> {
    return {
      type: 'firewall-exceptions',
      defaultId: 'firewall-exceptions',
      privilege: 'root',
      comparison: 'contains',
      defaultDesired: [],
    };
  }

  protected parseDesired(value: unknown): readonly string[] {
    return this.parseStringList(value);
  }

  async probe(context: ResourceContext): Promise<ObservedState<readonly string[]>> {
    const apps = await this.listApps(context);
    return apps.filter(app => app.allowed).map(app => app.path);
  }

  async apply(target: readonly string[], context: ApplyContext<readonly string[]>): Promise<void> {
    const listed = new Set((await this.listApps(context)).map(app => app.path));

    for (const path of target) {
      if (context.observed.includes(path)) continue;
      if (!listed.has(path)) {
        await runChecked(context.runner, [this.tool, '--add', path]);
      }
      await runChecked(context.runner, [this.tool, '--unblockapp', path]);
    }
  }

  private async listApps(context: ResourceContext): Promise<FirewallApp[]> {
    const result = await runChecked(context.runner, [this.tool, '--listapps']);
    return parseAppList(result.stdout);
  }
}
