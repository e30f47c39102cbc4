/**
 * HTTP health endpoint probing
 */

import { createChildLogger } from '@rewind/shared';
import { delay } from '../concurrency.js';

const logger = createChildLogger({ component: 'HttpHealth' });

/**
 * One GET against the endpoint; healthy on any 2xx
 */
export async function checkHttpHealth(url: string, requestTimeoutMs: number): Promise<boolean> {
  try {
    const response = await fetch(url, {
      method: 'GET',
      signal: AbortSignal.timeout(requestTimeoutMs),
    });
    return response.ok;
  } catch (error) {
    logger.debug({ url, error: error instanceof Error ? error.message : String(error) }, 'Health probe failed');
    return false;
  }
}

export interface PollOptions {
  timeoutMs: number;
  initialBackoffMs: number;
  maxBackoffMs: number;
  requestTimeoutMs: number;
}

/**
 * Probe with exponential backoff until healthy or the window closes
 */
export async function waitForHttpHealth(url: string, options: PollOptions): Promise<boolean> {
  const deadline = Date.now() + options.timeoutMs;
  let backoff = options.initialBackoffMs;

  for (;;) {
    const remaining = deadline - Date.now();
    if (await checkHttpHealth(url, Math.max(1, Math.min(options.requestTimeoutMs, remaining)))) {
      return true;
    }
    if (Date.now() + backoff >= deadline) {
      return false;
    }
    await delay(backoff);
    backoff = Math.min(backoff * 2, options.maxBackoffMs);
  }
}
