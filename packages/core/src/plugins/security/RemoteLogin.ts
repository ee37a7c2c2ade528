import { UNKNOWN } from '@provision/types';
import type { ApplyContext, ObservedState, ResourceContext } from '@provision/types';
import { ResourcePlugin, type ResourcePluginMetadata } from '../ResourcePlugin.js';
import { runChecked } from '../../core/CommandRunner.js';
import type { ToggleState } from './FileVault.js';

/** Parse `systemsetup -getremotelogin` ("Remote Login: On") */
export function parseRemoteLogin(stdout: string): ObservedState<ToggleState> {
  const match = /Remote Login:\s*(On|Off)\b/i.exec(stdout);
  if (!match) return UNKNOWN;
  return match[1].toLowerCase() === 'on' ? 'on' : 'off';
}

/**
 * The built-in macOS SSH server. Remote access goes through Tailscale,
 * so the default is off.
 */
export class RemoteLogin extends ResourcePlugin<ToggleState> {
  get metadata(): ResourcePluginMetadata<ToggleState> {
    return {
      type: 'remote-login',
      defaultId: 'remote-login',
      privilege: 'root',
      comparison: 'exact',
      defaultDesired: 'off',
    };
  }

  protected parseDesired(value: unknown): ToggleState {
    return this.parseEnum(value, ['on', 'off'] as const);
  }

  async probe(context: ResourceContext): Promise<ObservedState<ToggleState>> {
    const result = await runChecked(context.runner, ['systemsetup', '-getremotelogin']);
    return parseRemoteLogin(result.stdout);
  }

  async apply(target: ToggleState, context: ApplyContext<ToggleState>): Promise<void> {
    // -f skips the "really turn off?" prompt
    await runChecked(context.runner, ['systemsetup', '-f', '-setremotelogin', target]);
  }
}
