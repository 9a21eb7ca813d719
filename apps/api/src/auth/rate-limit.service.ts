import { Injectable } from "@nestjs/common";
import type { RateLimitOptions } from "./auth.decorators";
import { RedisService } from "../redis/redis.service";

export interface RateLimitDecision {
  allowed: boolean;
  count: number;
  retryAt: number;
}

/**
 * Fixed-window counter in Redis: the first hit in a window sets the expiry,
 * later hits only increment.
 */
@Injectable()
export class RateLimitService {
  constructor(private readonly redisService: RedisService) {}

  async consume(key: string, options: RateLimitOptions, now = Date.now()): Promise<RateLimitDecision> {
    const redisKey = `ratelimit:${key}`;
    const client = this.redisService.getClient();
    const ttlMs = options.windowMs;

    const results = await client.multi().incr(redisKey).pexpire(redisKey, ttlMs, "NX").pttl(redisKey).exec();

    const [, countResult] = results?.[0] ?? [];
    const [, ttlResult] = results?.[2] ?? [];

    const count = Number(countResult ?? 0);
    let ttl = Number(ttlResult ?? ttlMs);
    if (!Number.isFinite(ttl) || ttl <= 0) {
      await client.pexpire(redisKey, ttlMs);
      ttl = ttlMs;
    }

    return { allowed: count <= options.max, count, retryAt: now + ttl };
  }
}
