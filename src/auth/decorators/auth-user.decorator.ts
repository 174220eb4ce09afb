import { createParamDecorator, ExecutionContext } from '@nestjs/common';

/** The payload the passport strategy attached to the request, if any. */
export const AuthUser = createParamDecorator(
  (_data: unknown, context: ExecutionContext): unknown =>
    context.switchToHttp().getRequest<{ user?: unknown }>().user,
);
