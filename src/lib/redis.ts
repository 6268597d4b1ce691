/**
 * Upstash Redis + Ratelimit
 * Backs the download rate limiter when Upstash is configured
 */

import { Ratelimit } from '@upstash/ratelimit';
import { Redis } from '@upstash/redis';

export interface UpstashConfig {
  url: string;
  token: string;
}

/**
 * Sliding-window limiter shared by every instance of the service
 */
export function createUpstashRatelimit(
  config: UpstashConfig,
  limit: number,
  windowSeconds: number
): Ratelimit {
  const redis = new Redis({ url: config.url, token: config.token });

  return new Ratelimit({
    redis,
    limiter: Ratelimit.slidingWindow(limit, `${windowSeconds} s`),
    prefix: 'share-download',
  });
}
