import { setTimeout as delay } from 'timers/promises';
import type { Logger } from 'pino';
import { classifyFetchError } from '../errors.js';
import type { Probe, UpstreamHealth } from './types.js';

export const DEFAULT_MAX_ATTEMPTS = 10;
export const DEFAULT_RETRY_DELAY_MS = 2000;

export type Sleep = (ms: number) => Promise<void>;

export interface EnsureReachableOptions {
  probe: Probe;
  maxAttempts?: number;
  /** Fixed pause between attempts; there is no pause after the last one */
  delayMs?: number;
  sleep?: Sleep;
  logger?: Pick<Logger, 'info' | 'warn'>;
}

const realSleep: Sleep = async (ms) => {
  await delay(ms);
};

/**
 * Probe the upstream until it answers or the attempt budget runs out.
 * Exhaustion is not an error: the last failed result is returned and the
 * caller decides whether to carry on.
 */
export async function ensureReachable(options: EnsureReachableOptions): Promise<UpstreamHealth> {
  const {
    probe,
    delayMs = DEFAULT_RETRY_DELAY_MS,
    sleep = realSleep,
    logger,
  } = options;
  const maxAttempts = Math.max(1, Math.floor(options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS));

  let health: UpstreamHealth = { reachable: false, checkedAt: new Date(), detail: 'not_checked' };

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      health = await probe();
    } catch (err) {
      // Probes are not supposed to throw; fold it into a failed result anyway
      health = { reachable: false, checkedAt: new Date(), detail: classifyFetchError(err) };
    }

    if (health.reachable) {
      logger?.info({ attempt, maxAttempts }, 'Upstream is reachable');
      return health;
    }

    if (attempt < maxAttempts) {
      logger?.warn(
        { attempt, maxAttempts, detail: health.detail, retryInMs: delayMs },
        'Upstream not available, retrying'
      );
      await sleep(delayMs);
    }
  }

  logger?.warn(
    { attempts: maxAttempts, detail: health.detail },
    'Upstream still unreachable after all attempts, continuing startup'
  );
  return health;
}
