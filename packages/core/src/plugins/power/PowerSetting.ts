import { UNKNOWN } from '@provision/types';
import type { ApplyContext, ObservedState, ResourceContext } from '@provision/types';
import { ResourcePlugin, type ResourcePluginMetadata } from '../ResourcePlugin.js';
import { runChecked } from '../../core/CommandRunner.js';

/**
 * Read one numeric setting from `pmset -g`:
 *
 *   System-wide power settings:
 *   Currently in use:
 *    sleep                0 (sleep prevented by sharingd)
 *    disksleep            10
 */
export function parsePmsetValue(stdout: string, key: string): ObservedState<number> {
  const escaped = key.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
  const pattern = new RegExp(`^\\s*${escaped}\\s+(-?\\d+)\\b`);
  for (const line of stdout.split('\n')) {
    const match = pattern.exec(line);
    if (match) return Number(match[1]);
  }
  return UNKNOWN;
}

/**
 * A pmset setting applied to every power source (`pmset -a`).
 */
export class PowerSetting extends ResourcePlugin<number> {
  private readonly key = this.stringOption('key');

  get metadata(): ResourcePluginMetadata<number> {
    return {
      type: 'power-setting',
      defaultId: `power-${this.key}`,
      privilege: 'root',
      comparison: 'exact',
      defaultDesired: 0,
    };
  }

  protected parseDesired(value: unknown): number {
    if (typeof value !== 'number' || !Number.isInteger(value) || value < 0) {
      throw this.invalid(`desired must be a non-negative integer, got ${JSON.stringify(value)}`);
    }
    return value;
  }

  async probe(context: ResourceContext): Promise<ObservedState<number>> {
    const result = await runChecked(context.runner, ['pmset', '-g']);
    return parsePmsetValue(result.stdout, this.key);
  }

  async apply(target: number, context: ApplyContext<number>): Promise<void> {
    await runChecked(context.runner, ['pmset', '-a', this.key, String(target)]);
  }
}
