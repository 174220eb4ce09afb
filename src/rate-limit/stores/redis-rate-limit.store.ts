import { Injectable } from '@nestjs/common';
import { CacheService } from '../../cache/cache.service';
import { CounterHit, RateLimitStore } from './rate-limit.store';

// KEYS[1] counter key; ARGV[1] limit; ARGV[2] ttl in milliseconds.
// Returns { count, incremented (0|1) }.
export const INCREMENT_BELOW_SCRIPT = `
local current = tonumber(redis.call('GET', KEYS[1]) or '0')
if current >= tonumber(ARGV[1]) then
  return { current, 0 }
end
current = redis.call('INCR', KEYS[1])
if current == 1 then
  redis.call('PEXPIRE', KEYS[1], ARGV[2])
end
return { current, 1 }
`;

@Injectable()
export class RedisRateLimitStore extends RateLimitStore {
  constructor(private readonly cacheService: CacheService) {
    super();
  }

  async incrementBelow(
    key: string,
    limit: number,
    ttlMs: number,
  ): Promise<CounterHit> {
    const reply = await this.cacheService.evalScript(
      INCREMENT_BELOW_SCRIPT,
      [key],
      [String(limit), String(ttlMs)],
    );

    if (
      !Array.isArray(reply) ||
      reply.length !== 2 ||
      typeof reply[0] !== 'number' ||
      typeof reply[1] !== 'number'
    ) {
      throw new Error(`Unexpected rate limit script reply for key ${key}`);
    }
    return { count: reply[0], incremented: reply[1] === 1 };
  }
}
