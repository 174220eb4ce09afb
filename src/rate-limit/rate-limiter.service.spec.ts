import { Test, TestingModule } from '@nestjs/testing';
import { getToken } from '@willsoto/nestjs-prometheus';
import { RateLimitFailureMode } from './config/rate-limit-config.type';
import { RateLimiterService } from './rate-limiter.service';
import { RATE_LIMIT_OPTIONS, RateLimitOptions } from './rate-limit.types';
import { MemoryRateLimitStore } from './stores/memory-rate-limit.store';
import { RateLimitStore } from './stores/rate-limit.store';

const HOUR = 60 * 60 * 1000;

describe('RateLimiterService', () => {
  let service: RateLimiterService;
  let store: RateLimitStore;
  const decisions = { inc: jest.fn() };

  const createService = async (
    overrides: Partial<RateLimitOptions> = {},
    storeOverride?: RateLimitStore,
  ) => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        RateLimiterService,
        {
          provide: RATE_LIMIT_OPTIONS,
          useValue: {
            limit: 3,
            windowMs: HOUR,
            failureMode: RateLimitFailureMode.Open,
            ...overrides,
          },
        },
        {
          provide: RateLimitStore,
          useValue: storeOverride ?? new MemoryRateLimitStore(),
        },
        {
          provide: getToken('rate_limit_decisions_total'),
          useValue: decisions,
        },
      ],
    }).compile();

    service = module.get<RateLimiterService>(RateLimiterService);
    store = module.get<RateLimitStore>(RateLimitStore);
  };

  beforeEach(async () => {
    jest.clearAllMocks();
    await createService();
  });

  it('should key counters by client and window start', () => {
    const now = new Date('2026-03-01T10:15:30.000Z');
    expect(service.keyFor('203.0.113.7', now)).toBe(
      `ratelimit:203.0.113.7:${Date.parse('2026-03-01T10:00:00.000Z')}`,
    );
  });

  it('should admit requests up to the threshold with decreasing remaining counts', async () => {
    const now = new Date('2026-03-01T10:15:00.000Z');

    expect(await service.admit('client-a', now)).toEqual({
      allowed: true,
      remaining: 2,
    });
    expect(await service.admit('client-a', now)).toEqual({
      allowed: true,
      remaining: 1,
    });
    expect(await service.admit('client-a', now)).toEqual({
      allowed: true,
      remaining: 0,
    });
  });

  it('should block the request after the threshold until the next window boundary', async () => {
    const now = new Date('2026-03-01T10:15:00.000Z');
    for (let i = 0; i < 3; i++) {
      await service.admit('client-a', now);
    }

    const decision = await service.admit('client-a', now);

    expect(decision).toEqual({ allowed: false, retryAfterMs: 45 * 60 * 1000 });
  });

  it('should report a retry-after no longer than the time left in the window', async () => {
    const windowEnd = Date.parse('2026-03-01T11:00:00.000Z');
    const now = new Date('2026-03-01T10:59:59.250Z');
    for (let i = 0; i < 3; i++) {
      await service.admit('client-a', now);
    }

    const decision = await service.admit('client-a', now);

    expect(decision.allowed).toBe(false);
    if (!decision.allowed) {
      expect(decision.retryAfterMs).toBe(750);
      expect(decision.retryAfterMs).toBeLessThanOrEqual(
        windowEnd - now.getTime(),
      );
    }
  });

  it('should not increment the counter for blocked requests', async () => {
    const now = new Date('2026-03-01T10:15:00.000Z');
    const spy = jest.spyOn(store, 'incrementBelow');
    for (let i = 0; i < 6; i++) {
      await service.admit('client-a', now);
    }

    await expect(spy.mock.results[5].value).resolves.toEqual({
      count: 3,
      incremented: false,
    });
  });

  it('should start a fresh count in the next window', async () => {
    const now = new Date('2026-03-01T10:15:00.000Z');
    for (let i = 0; i < 4; i++) {
      await service.admit('client-a', now);
    }

    const decision = await service.admit(
      'client-a',
      new Date('2026-03-01T11:00:00.000Z'),
    );

    expect(decision).toEqual({ allowed: true, remaining: 2 });
  });

  it('should count each client separately', async () => {
    const now = new Date('2026-03-01T10:15:00.000Z');
    for (let i = 0; i < 4; i++) {
      await service.admit('client-a', now);
    }

    expect(await service.admit('client-b', now)).toEqual({
      allowed: true,
      remaining: 2,
    });
  });

  it('should never admit more than the threshold under concurrent requests', async () => {
    const now = new Date('2026-03-01T10:15:00.000Z');

    const decisionsMade = await Promise.all(
      Array.from({ length: 10 }, () => service.admit('client-a', now)),
    );

    expect(decisionsMade.filter((d) => d.allowed)).toHaveLength(3);
    expect(decisionsMade.filter((d) => !d.allowed)).toHaveLength(7);
  });

  describe('when the store is unavailable', () => {
    const failingStore: RateLimitStore = {
      incrementBelow: jest.fn().mockRejectedValue(new Error('ECONNREFUSED')),
    };

    it('should allow the request when failing open', async () => {
      await createService({ failureMode: RateLimitFailureMode.Open }, failingStore);

      const decision = await service.admit(
        'client-a',
        new Date('2026-03-01T10:15:00.000Z'),
      );

      expect(decision).toEqual({ allowed: true, remaining: 3 });
      expect(decisions.inc).toHaveBeenCalledWith({ outcome: 'store_error' });
    });

    it('should block the request until the window boundary when failing closed', async () => {
      await createService(
        { failureMode: RateLimitFailureMode.Closed },
        failingStore,
      );

      const decision = await service.admit(
        'client-a',
        new Date('2026-03-01T10:15:00.000Z'),
      );

      expect(decision).toEqual({ allowed: false, retryAfterMs: 45 * 60 * 1000 });
    });
  });
});
