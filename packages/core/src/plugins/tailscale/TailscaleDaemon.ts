import type { ApplyContext, ObservedState, ResourceContext } from '@provision/types';
import { ResourcePlugin, type ResourcePluginMetadata } from '../ResourcePlugin.js';
import { ApplyError } from '../../errors/ProvisionError.js';
import { runChecked } from '../../core/CommandRunner.js';
import { waitUntilReady } from '../../core/readiness.js';
import { goBinDir, HOMEBREW_BIN_DIRS, resolveBinary } from '../shared.js';
import type { PackageState } from '../packages/HomebrewInstallation.js';

/**
 * tailscaled registered as a launchd system daemon, so the node comes up
 * on boot without anyone logging in.
 *
 * After registering, apply waits (bounded by the readiness policy) until
 * launchd reports the job running; verification alone would race the start.
 */
export class TailscaleDaemon extends ResourcePlugin<PackageState> {
  private readonly plistPath = this.pathOption('plist', '/Library/LaunchDaemons/com.tailscale.tailscaled.plist');
  private readonly label = this.stringOption('label', 'com.tailscale.tailscaled');

  get metadata(): ResourcePluginMetadata<PackageState> {
    return {
      type: 'tailscale-daemon',
      defaultId: 'tailscale-daemon',
      privilege: 'root',
      comparison: 'exact',
      defaultDesired: 'installed',
    };
  }

  protected parseDesired(value: unknown): PackageState {
    return this.parseEnum(value, ['installed', 'absent'] as const);
  }

  async probe(context: ResourceContext): Promise<ObservedState<PackageState>> {
    const result = await context.runner.invoke(['test', '-f', this.plistPath]);
    return result.exitCode === 0 ? 'installed' : 'absent';
  }

  async apply(target: PackageState, context: ApplyContext<PackageState>): Promise<void> {
    const tailscaled = await resolveBinary(context, 'tailscaled', [goBinDir(context.privilege), ...HOMEBREW_BIN_DIRS]);
    if (!tailscaled) {
      throw new ApplyError('tailscaled binary not found on PATH or in ~/go/bin', { resourceId: this.id });
    }

    if (target === 'absent') {
      await runChecked(context.runner, [tailscaled, 'uninstall-system-daemon']);
      return;
    }

    await runChecked(context.runner, [tailscaled, 'install-system-daemon']);

    const ready = await waitUntilReady(
      this.label,
      async () => {
        const status = await context.runner.invoke(['launchctl', 'print', `system/${this.label}`]);
        return status.exitCode === 0 && /\bstate = running\b/.test(status.stdout);
      },
      context.readiness,
      context.logger
    );
    if (!ready) {
      throw new ApplyError(
        `${this.label} did not reach the running state after ${context.readiness.attempts} attempts`,
        { resourceId: this.id }
      );
    }
  }
}
