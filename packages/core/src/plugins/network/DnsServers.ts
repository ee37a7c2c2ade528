import { UNKNOWN } from '@provision/types';
import type { ApplyContext, ObservedState, ResourceContext } from '@provision/types';
import { ResourcePlugin, type ResourcePluginMetadata } from '../ResourcePlugin.js';
import { runChecked } from '../../core/CommandRunner.js';

/** Tailscale's MagicDNS resolver */
export const MAGIC_DNS = '100.100.100.100';

/**
 * Parse `networksetup -getdnsservers <service>`. One server per line, or
 * "There aren't any DNS Servers set on Wi-Fi." when DHCP supplies them.
 * Lines starting with "**" are errors such as an unknown service name.
 */
export function parseDnsServers(stdout: string): ObservedState<readonly string[]> {
  const lines = stdout.split('\n').map(l => l.trim()).filter(l => l.length > 0);
  if (lines.some(l => l.startsWith('**'))) return UNKNOWN;
  if (lines.some(l => /aren't any DNS Servers/i.test(l))) return [];
  return lines;
}

/**
 * Resolver order for one network service. Desired servers must lead the
 * list; servers already configured after them are kept.
 */
export class DnsServers extends ResourcePlugin<readonly string[]> {
  private readonly networkService = this.stringOption('interface', 'Wi-Fi');

  get metadata(): ResourcePluginMetadata<readonly string[]> {
    return {
      type: 'dns-servers',
      defaultId: `dns-magicdns:${this.networkService}`,
      privilege: 'root',
      comparison: 'prefix',
      defaultDesired: [MAGIC_DNS],
    };
  }

  protected parseDesired(value: unknown): readonly string[] {
    const servers = this.parseStringList(value);
    if (servers.length === 0) {
      throw this.invalid('desired must name at least one DNS server');
    }
    return servers;
  }

  async probe(context: ResourceContext): Promise<ObservedState<readonly string[]>> {
    const result = await runChecked(context.runner, ['networksetup', '-getdnsservers', this.networkService]);
    return parseDnsServers(result.stdout);
  }

  async apply(target: readonly string[], context: ApplyContext<readonly string[]>): Promise<void> {
    await runChecked(context.runner, ['networksetup', '-setdnsservers', this.networkService, ...target]);
  }
}
