import {
  Injectable,
  NestInterceptor,
  ExecutionContext,
  CallHandler,
} from '@nestjs/common';
import { Request } from 'express';
import { randomUUID } from 'crypto';
import { Observable, from, lastValueFrom } from 'rxjs';
import { LoggingContextStorage } from './logging.context';
import { JwtPayloadType } from '../auth/strategies/types/jwt-payload.type';

@Injectable()
export class LoggingInterceptor implements NestInterceptor {
  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    if (context.getType() !== 'http') {
      return next.handle();
    }
    const request = context
      .switchToHttp()
      .getRequest<Request & { user?: JwtPayloadType }>();
    const requestId = request.header('x-request-id') ?? randomUUID();

    return from(
      LoggingContextStorage.run(
        {
          requestId,
          userId: request.user?.id,
          path: request.path,
          method: request.method,
        },
        () => lastValueFrom(next.handle(), { defaultValue: undefined }),
      ),
    );
  }
}
