import {
  Injectable,
  OnModuleInit,
  OnModuleDestroy,
  Logger,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { createClient } from 'redis';
import { trace, SpanStatusCode } from '@opentelemetry/api';
import { AllConfigType } from '../config/config.type';

export type CacheClient = ReturnType<typeof createClient>;

export class CacheUnavailableError extends Error {
  constructor(reason: string) {
    super(`Cache unavailable: ${reason}`);
    this.name = 'CacheUnavailableError';
  }
}

@Injectable()
export class CacheService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(CacheService.name);
  private readonly tracer = trace.getTracer('cache-service');
  private redis: CacheClient | null = null;

  private readonly MAX_RETRIES = 5;
  private readonly RETRY_DELAY = 5000;
  private readonly OPERATION_TIMEOUT = 1000;

  constructor(private readonly configService: ConfigService<AllConfigType>) {}

  getRedis(): CacheClient | null {
    if (!this.redis?.isOpen) {
      return null;
    }
    return this.redis;
  }

  private createRedisClient(): CacheClient {
    const { host, port, password, tls } = this.configService.getOrThrow(
      'cache',
      { infer: true },
    );

    return createClient({
      socket: tls
        ? { host, port, tls: true, connectTimeout: 10000 }
        : { host, port, connectTimeout: 10000 },
      password,
    });
  }

  private async connectWithRetry(attempt = 1): Promise<void> {
    try {
      this.logger.log(
        `Attempting to connect to Redis (attempt ${attempt}/${this.MAX_RETRIES})`,
      );
      const client = this.createRedisClient();
      client.on('error', (error: unknown) => {
        this.logger.error(
          `Redis client error: ${error instanceof Error ? error.message : String(error)}`,
        );
      });
      await client.connect();
      this.redis = client;
      this.logger.log('Redis client connected successfully');
    } catch (error) {
      this.logger.error(
        `Failed to connect to Redis (attempt ${attempt})`,
        error instanceof Error ? error.stack : String(error),
      );

      if (attempt < this.MAX_RETRIES) {
        await new Promise((resolve) => setTimeout(resolve, this.RETRY_DELAY));
        return this.connectWithRetry(attempt + 1);
      }

      throw new Error(
        `Failed to connect to Redis after ${this.MAX_RETRIES} attempts`,
      );
    }
  }

  async onModuleInit() {
    if (!this.configService.getOrThrow('cache.enabled', { infer: true })) {
      this.logger.log('Redis disabled, skipping connection');
      return;
    }
    await this.connectWithRetry();
  }

  async onModuleDestroy() {
    if (this.redis?.isOpen) {
      await this.redis.quit();
      this.logger.log('Redis client disconnected');
    }
  }

  /**
   * Runs a Lua script atomically on the server. Rejects with
   * CacheUnavailableError when disconnected or slower than the operation
   * timeout.
   */
  async evalScript(
    script: string,
    keys: string[],
    args: string[],
  ): Promise<unknown> {
    return this.tracer.startActiveSpan('redis.eval', async (span) => {
      span.setAttribute('db.system', 'redis');
      span.setAttribute('db.operation', 'EVAL');
      let timer: NodeJS.Timeout | undefined;

      try {
        const client = this.getRedis();
        if (!client) {
          throw new CacheUnavailableError('client is not connected');
        }
        const timeout = new Promise<never>((_, reject) => {
          timer = setTimeout(
            () => reject(new CacheUnavailableError('operation timed out')),
            this.OPERATION_TIMEOUT,
          );
        });
        const reply: unknown = await Promise.race([
          client.eval(script, { keys, arguments: args }),
          timeout,
        ]);
        return reply;
      } catch (error) {
        span.setStatus({
          code: SpanStatusCode.ERROR,
          message: error instanceof Error ? error.message : String(error),
        });
        throw error;
      } finally {
        clearTimeout(timer);
        span.end();
      }
    });
  }
}
