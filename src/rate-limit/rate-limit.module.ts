import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { APP_GUARD } from '@nestjs/core';
import { CacheModule } from '../cache/cache.module';
import { CacheService } from '../cache/cache.service';
import { AllConfigType } from '../config/config.type';
import { RateLimitStoreKind } from './config/rate-limit-config.type';
import { RateLimitGuard } from './rate-limit.guard';
import { RATE_LIMIT_OPTIONS, RateLimitOptions } from './rate-limit.types';
import { RateLimiterService } from './rate-limiter.service';
import { MemoryRateLimitStore } from './stores/memory-rate-limit.store';
import { RateLimitStore } from './stores/rate-limit.store';
import { RedisRateLimitStore } from './stores/redis-rate-limit.store';

@Module({
  imports: [CacheModule],
  providers: [
    {
      provide: RATE_LIMIT_OPTIONS,
      inject: [ConfigService],
      useFactory: (
        configService: ConfigService<AllConfigType>,
      ): RateLimitOptions => {
        const config = configService.getOrThrow('rateLimit', { infer: true });
        return {
          limit: config.limit,
          windowMs: config.windowSeconds * 1000,
          failureMode: config.failureMode,
        };
      },
    },
    {
      provide: RateLimitStore,
      inject: [ConfigService, CacheService],
      useFactory: (
        configService: ConfigService<AllConfigType>,
        cacheService: CacheService,
      ): RateLimitStore =>
        configService.getOrThrow('rateLimit.store', { infer: true }) ===
        RateLimitStoreKind.Memory
          ? new MemoryRateLimitStore()
          : new RedisRateLimitStore(cacheService),
    },
    RateLimiterService,
    {
      provide: APP_GUARD,
      useClass: RateLimitGuard,
    },
  ],
  exports: [RateLimiterService],
})
export class RateLimitModule {}
