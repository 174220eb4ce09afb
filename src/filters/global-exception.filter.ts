import {
  ExceptionFilter,
  Catch,
  ArgumentsHost,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import { Request, Response } from 'express';
import { trace, SpanStatusCode } from '@opentelemetry/api';
import { InjectMetric } from '@willsoto/nestjs-prometheus';
import { Counter } from 'prom-client';
import { getApiArea } from '../metrics/metrics.util';

export interface ErrorResponseBody {
  statusCode: number;
  message: string;
  path: string;
  timestamp: string;
  errors?: unknown;
}

function messageOf(exception: unknown, status: number): string {
  if (status === HttpStatus.INTERNAL_SERVER_ERROR) {
    return 'Internal server error';
  }
  if (exception instanceof HttpException) {
    const body = exception.getResponse();
    if (typeof body === 'object' && body !== null && 'message' in body) {
      const { message } = body;
      if (Array.isArray(message)) {
        return message.join(', ');
      }
      if (typeof message === 'string') {
        return message;
      }
    }
  }
  return exception instanceof Error ? exception.message : 'Unknown error';
}

function fieldErrorsOf(exception: unknown): unknown {
  if (!(exception instanceof HttpException)) {
    return undefined;
  }
  const body = exception.getResponse();
  if (typeof body === 'object' && body !== null && 'errors' in body) {
    return body.errors;
  }
  return undefined;
}

@Catch()
export class GlobalExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(GlobalExceptionFilter.name);
  private readonly tracer = trace.getTracer('exception-filter');

  constructor(
    @InjectMetric('unhandled_exceptions_total')
    private exceptionCounter: Counter<string>,
  ) {}

  catch(exception: unknown, host: ArgumentsHost) {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<Request>();

    const { method, originalUrl } = request;
    const path = originalUrl.split('?')[0];

    const status =
      exception instanceof HttpException
        ? exception.getStatus()
        : HttpStatus.INTERNAL_SERVER_ERROR;

    this.exceptionCounter.inc({
      method,
      area: getApiArea(originalUrl),
      status: (Math.floor(status / 100) * 100).toString(),
    });

    this.tracer.startActiveSpan('handle_exception', (span) => {
      try {
        span.setAttribute('http.method', method);
        span.setAttribute('http.url', originalUrl);
        span.setAttribute('http.status_code', status);

        if (status >= HttpStatus.INTERNAL_SERVER_ERROR) {
          span.setStatus({ code: SpanStatusCode.ERROR });
          if (exception instanceof Error) {
            span.recordException(exception);
          }
          this.logger.error(
            `Request ${method} ${path} failed with status ${status}: ${
              exception instanceof Error ? exception.message : String(exception)
            }`,
            exception instanceof Error ? exception.stack : undefined,
          );
        } else {
          this.logger.debug(
            `Request ${method} ${path} rejected with status ${status}`,
          );
        }

        const errorResponse: ErrorResponseBody = {
          statusCode: status,
          message: messageOf(exception, status),
          path,
          timestamp: new Date().toISOString(),
        };

        const errors = fieldErrorsOf(exception);
        if (errors !== undefined) {
          errorResponse.errors = errors;
        }

        response.status(status).json(errorResponse);
      } finally {
        span.end();
      }
    });
  }
}
