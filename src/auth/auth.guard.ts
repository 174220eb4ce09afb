import {
  ExecutionContext,
  Injectable,
  UnauthorizedException,
} from '@nestjs/common';
import { Reflector } from '@nestjs/core';
import { AuthGuard as PassportAuthGuard } from '@nestjs/passport';
import { Request } from 'express';
import { lastValueFrom } from 'rxjs';
import { IS_PUBLIC_KEY } from '../core/constants/constant';

/**
 * Requires a valid access token unless the handler is `@Public()`. A token
 * sent to a public handler is still checked, so those handlers can tell a
 * signed-in caller apart.
 */
@Injectable()
export class JWTAuthGuard extends PassportAuthGuard('jwt') {
  constructor(private readonly reflector: Reflector) {
    super();
  }

  async canActivate(context: ExecutionContext): Promise<boolean> {
    const request = context.switchToHttp().getRequest<Request>();

    if (request.headers.authorization) {
      const result = await super.canActivate(context);
      return typeof result === 'boolean' ? result : lastValueFrom(result);
    }

    const isPublic = this.reflector.getAllAndOverride<boolean>(IS_PUBLIC_KEY, [
      context.getHandler(),
      context.getClass(),
    ]);
    if (isPublic) {
      return true;
    }

    throw new UnauthorizedException('Authentication required');
  }
}
