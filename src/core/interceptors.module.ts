import { Module } from '@nestjs/common';
import { APP_INTERCEPTOR, APP_FILTER } from '@nestjs/core';
import { RequestCounterInterceptor } from '../interceptors/request-counter.interceptor';
import { GlobalExceptionFilter } from '../filters/global-exception.filter';
import { LoggingInterceptor } from '../logger/logging.interceptor';

/**
 * Application-wide interceptors and the exception filter, registered
 * through Nest tokens so they receive injected metrics.
 */
@Module({
  providers: [
    RequestCounterInterceptor,
    LoggingInterceptor,
    GlobalExceptionFilter,
    {
      provide: APP_INTERCEPTOR,
      useExisting: LoggingInterceptor,
    },
    {
      provide: APP_INTERCEPTOR,
      useExisting: RequestCounterInterceptor,
    },
    {
      provide: APP_FILTER,
      useExisting: GlobalExceptionFilter,
    },
  ],
})
export class InterceptorsModule {}
