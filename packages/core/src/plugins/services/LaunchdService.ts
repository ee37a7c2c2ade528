import type { ApplyContext, ObservedState, ResourceContext } from '@provision/types';
import { ResourcePlugin, type ResourcePluginMetadata } from '../ResourcePlugin.js';
import { runChecked } from '../../core/CommandRunner.js';

export type ServiceState = 'loaded' | 'unloaded';

/**
 * Whether `launchctl list` output (PID, Status, Label columns) has a job
 * with exactly this label.
 */
export function isJobListed(stdout: string, label: string): boolean {
  return stdout
    .split('\n')
    .some(line => line.trim().split(/\s+/)[2] === label);
}

/**
 * A launchd job loaded from a plist. Defaults to Screen Sharing, the
 * VNC entry point for a headless machine.
 */
export class LaunchdService extends ResourcePlugin<ServiceState> {
  private readonly label = this.stringOption('label', 'com.apple.screensharing');
  private readonly plist = this.pathOption('plist', `/System/Library/LaunchDaemons/${this.label}.plist`);

  get metadata(): ResourcePluginMetadata<ServiceState> {
    return {
      type: 'launchd-service',
      defaultId: this.label === 'com.apple.screensharing' ? 'screen-sharing' : `launchd:${this.label}`,
      privilege: 'root',
      comparison: 'exact',
      defaultDesired: 'loaded',
    };
  }

  protected parseDesired(value: unknown): ServiceState {
    return this.parseEnum(value, ['loaded', 'unloaded'] as const);
  }

  async probe(context: ResourceContext): Promise<ObservedState<ServiceState>> {
    const result = await runChecked(context.runner, ['launchctl', 'list']);
    return isJobListed(result.stdout, this.label) ? 'loaded' : 'unloaded';
  }

  async apply(target: ServiceState, context: ApplyContext<ServiceState>): Promise<void> {
    const verb = target === 'loaded' ? 'load' : 'unload';
    // -w also flips the Disabled override so the state survives reboots
    await runChecked(context.runner, ['launchctl', verb, '-w', this.plist]);
  }
}
