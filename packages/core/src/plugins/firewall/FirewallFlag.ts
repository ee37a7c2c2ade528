import type { ApplyContext, ObservedState, ResourceContext, ResourceEntry } from '@provision/types';
import { ResourcePlugin, type PluginEnvironment, type ResourcePluginMetadata } from '../ResourcePlugin.js';
import { runChecked } from '../../core/CommandRunner.js';
import type { ToggleState } from '../security/FileVault.js';
import { parseToggle, SOCKETFILTERFW } from './socketfilterfw.js';

export type FirewallFlagKind = 'firewall-state' | 'firewall-allow-signed' | 'firewall-stealth';

const FLAGS: Record<FirewallFlagKind, { defaultId: string; get: string; set: string }> = {
  'firewall-state': { defaultId: 'firewall-enabled', get: '--getglobalstate', set: '--setglobalstate' },
  'firewall-allow-signed': { defaultId: 'firewall-allow-signed', get: '--getallowsigned', set: '--setallowsigned' },
  'firewall-stealth': { defaultId: 'firewall-stealth', get: '--getstealthmode', set: '--setstealthmode' },
};

/**
 * One on/off switch of the application firewall.
 */
export class FirewallFlag extends ResourcePlugin<ToggleState> {
  private readonly tool = this.pathOption('socketfilterfw', SOCKETFILTERFW);

  constructor(entry: ResourceEntry, env: PluginEnvironment, private readonly kind: FirewallFlagKind) {
    super(entry, env);
  }

  get metadata(): ResourcePluginMetadata<ToggleState> {
    return {
      type: this.kind,
      defaultId: FLAGS[this.kind].defaultId,
      privilege: 'root',
      comparison: 'exact',
      defaultDesired: 'on',
    };
  }

  protected parseDesired(value: unknown): ToggleState {
    return this.parseEnum(value, ['on', 'off'] as const);
  }

  async probe(context: ResourceContext): Promise<ObservedState<ToggleState>> {
    const result = await runChecked(context.runner, [this.tool, FLAGS[this.kind].get]);
    return parseToggle(result.stdout);
  }

  async apply(target: ToggleState, context: ApplyContext<ToggleState>): Promise<void> {
    await runChecked(context.runner, [this.tool, FLAGS[this.kind].set, target]);
  }
}
