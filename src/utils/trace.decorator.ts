import { SpanStatusCode, trace } from '@opentelemetry/api';

const TRACER_NAME = 'events-scheduler-api';

/**
 * Runs an async method inside an active span named `Class.method`, or
 * `Class.<name>` when a name is given. Without an OpenTelemetry SDK
 * registered the spans are no-ops.
 */
export function Trace(name?: string) {
  return function <This, Args extends unknown[], Result>(
    target: object,
    propertyKey: string,
    descriptor: TypedPropertyDescriptor<
      (this: This, ...args: Args) => Promise<Result>
    >,
  ): TypedPropertyDescriptor<(this: This, ...args: Args) => Promise<Result>> {
    const originalMethod = descriptor.value;
    if (!originalMethod) {
      return descriptor;
    }
    const spanName = `${target.constructor.name}.${name ?? propertyKey}`;

    descriptor.value = function (this: This, ...args: Args): Promise<Result> {
      return trace
        .getTracer(TRACER_NAME)
        .startActiveSpan(spanName, async (span) => {
          try {
            return await originalMethod.apply(this, args);
          } catch (error) {
            if (error instanceof Error) {
              span.recordException(error);
            }
            span.setStatus({ code: SpanStatusCode.ERROR });
            throw error;
          } finally {
            span.end();
          }
        });
    };
    return descriptor;
  };
}
