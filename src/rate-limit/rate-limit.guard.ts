import { CanActivate, ExecutionContext, Injectable } from '@nestjs/common';
import { Reflector } from '@nestjs/core';
import { ThrottlerException } from '@nestjs/throttler';
import { Request, Response } from 'express';
import { SKIP_RATE_LIMIT_KEY } from '../core/constants/constant';
import { RateLimiterService } from './rate-limiter.service';

/**
 * First link of the request chain: counts the request against the client's
 * IP and either lets it continue or ends it with a 429.
 */
@Injectable()
export class RateLimitGuard implements CanActivate {
  constructor(
    private readonly reflector: Reflector,
    private readonly rateLimiter: RateLimiterService,
  ) {}

  async canActivate(context: ExecutionContext): Promise<boolean> {
    if (context.getType() !== 'http') {
      return true;
    }
    const skip = this.reflector.getAllAndOverride<boolean>(SKIP_RATE_LIMIT_KEY, [
      context.getHandler(),
      context.getClass(),
    ]);
    if (skip) {
      return true;
    }

    const request = context.switchToHttp().getRequest<Request>();
    const response = context.switchToHttp().getResponse<Response>();
    const clientId = request.ip ?? request.socket.remoteAddress ?? 'unknown';

    const decision = await this.rateLimiter.admit(clientId);
    response.setHeader('X-RateLimit-Limit', this.rateLimiter.limit);

    if (decision.allowed) {
      response.setHeader('X-RateLimit-Remaining', decision.remaining);
      return true;
    }

    const retryAfterSeconds = Math.ceil(decision.retryAfterMs / 1000);
    response.setHeader('X-RateLimit-Remaining', 0);
    response.setHeader('Retry-After', retryAfterSeconds);
    throw new ThrottlerException(
      `Too many requests. Try again in ${retryAfterSeconds} seconds.`,
    );
  }
}
