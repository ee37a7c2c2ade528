import type { ApplyContext, ObservedState, ResourceContext } from '@provision/types';
import { ResourcePlugin, type ResourcePluginMetadata } from '../ResourcePlugin.js';
import { ApplyError } from '../../errors/ProvisionError.js';
import { runChecked } from '../../core/CommandRunner.js';
import { goBinDir, HOMEBREW_BIN_DIRS, resolveBinary } from '../shared.js';

export type ConnectionState = 'active' | 'inactive';

/**
 * Whether this node is logged in to the tailnet.
 *
 * Logging in is interactive unless an auth key file is configured
 * (`options.authKeyFile`); without one, apply fails with the command to run.
 */
export class TailscaleConnection extends ResourcePlugin<ConnectionState> {
  get metadata(): ResourcePluginMetadata<ConnectionState> {
    return {
      type: 'tailscale-connection',
      defaultId: 'tailscale-connection',
      privilege: 'root',
      comparison: 'exact',
      defaultDesired: 'active',
    };
  }

  protected parseDesired(value: unknown): ConnectionState {
    return this.parseEnum(value, ['active', 'inactive'] as const);
  }

  async probe(context: ResourceContext): Promise<ObservedState<ConnectionState>> {
    const tailscale = await this.findTailscale(context);
    if (!tailscale) return 'inactive';

    // Exits non-zero when logged out, stopped, or the daemon is unreachable
    const result = await context.runner.invoke([tailscale, 'status']);
    return result.exitCode === 0 ? 'active' : 'inactive';
  }

  async apply(target: ConnectionState, context: ApplyContext<ConnectionState>): Promise<void> {
    const tailscale = await this.findTailscale(context);
    if (!tailscale) {
      throw new ApplyError('tailscale binary not found on PATH or in ~/go/bin', { resourceId: this.id });
    }

    if (target === 'inactive') {
      await runChecked(context.runner, [tailscale, 'down']);
      return;
    }

    const authKeyFile = this.entry.options?.authKeyFile === undefined ? undefined : this.pathOption('authKeyFile');
    if (!authKeyFile) {
      throw new ApplyError(
        'Tailscale is not connected and no auth key is configured',
        { resourceId: this.id },
        'Run: sudo tailscale up (and follow the login link)'
      );
    }
    await runChecked(context.runner, [tailscale, 'up', `--auth-key=file:${authKeyFile}`]);
  }

  private findTailscale(context: ResourceContext): Promise<string | null> {
    return resolveBinary(context, 'tailscale', [goBinDir(context.privilege), ...HOMEBREW_BIN_DIRS]);
  }
}
