import {
  Injectable,
  NestInterceptor,
  ExecutionContext,
  CallHandler,
  HttpException,
  Logger,
} from '@nestjs/common';
import { Request, Response } from 'express';
import { Observable, throwError } from 'rxjs';
import { catchError, tap } from 'rxjs/operators';
import { InjectMetric } from '@willsoto/nestjs-prometheus';
import { Counter, Histogram } from 'prom-client';
import { getApiArea } from '../metrics/metrics.util';

@Injectable()
export class RequestCounterInterceptor implements NestInterceptor {
  private readonly logger = new Logger(RequestCounterInterceptor.name);

  constructor(
    @InjectMetric('http_requests_total')
    private counter: Counter<string>,
    @InjectMetric('http_request_duration_seconds')
    private requestDuration: Histogram<string>,
    @InjectMetric('http_request_errors_total')
    private errorCounter: Counter<string>,
  ) {}

  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    if (context.getType() !== 'http') {
      return next.handle();
    }
    const request = context.switchToHttp().getRequest<Request>();
    const response = context.switchToHttp().getResponse<Response>();
    const { method, originalUrl } = request;
    const path = originalUrl.split('?')[0];
    const labels = { method, area: getApiArea(originalUrl) };

    this.counter.inc(labels);
    const start = Date.now();

    return next.handle().pipe(
      tap(() => {
        const durationMs = Date.now() - start;
        this.requestDuration.observe(labels, durationMs / 1000);
        this.logger.log(
          `${method} ${path} ${response.statusCode} ${durationMs}ms`,
        );
      }),
      catchError((error: unknown) => {
        const durationMs = Date.now() - start;
        this.requestDuration.observe(labels, durationMs / 1000);

        const status = error instanceof HttpException ? error.getStatus() : 500;
        this.errorCounter.inc({
          ...labels,
          status: (Math.floor(status / 100) * 100).toString(),
        });
        this.logger.warn(`${method} ${path} ${status} ${durationMs}ms`);

        return throwError(() => error);
      }),
    );
  }
}
