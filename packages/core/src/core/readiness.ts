import { setTimeout as sleep } from 'timers/promises';
import type { Logger, ReadinessPolicy } from '@provision/types';
import { errorMessage } from '../errors/ProvisionError.js';

export const DEFAULT_READINESS: ReadinessPolicy = {
  attempts: 10,
  intervalMs: 1000,
};

/**
 * Poll `check` until it reports ready, at most `policy.attempts` times with a
 * fixed `policy.intervalMs` pause between attempts. A check that throws counts
 * as "not ready yet".
 *
 * @returns true if the check succeeded within the attempt budget
 */
export async function waitUntilReady(
  label: string,
  check: () => Promise<boolean>,
  policy: ReadinessPolicy,
  logger?: Logger
): Promise<boolean> {
  const attempts = Math.max(1, Math.floor(policy.attempts));

  for (let attempt = 1; attempt <= attempts; attempt++) {
    let ready = false;
    try {
      ready = await check();
    } catch (error) {
      logger?.debug(`${label}: readiness check failed`, { attempt, error: errorMessage(error) });
    }

    if (ready) {
      logger?.debug(`${label}: ready`, { attempt });
      return true;
    }

    if (attempt < attempts) {
      logger?.debug(`${label}: not ready, waiting`, { attempt, intervalMs: policy.intervalMs });
      await sleep(policy.intervalMs);
    }
  }

  logger?.warn(`${label}: not ready after ${attempts} attempts`);
  return false;
}
