import { Global, Module } from '@nestjs/common';
import {
  PrometheusModule,
  makeCounterProvider,
  makeHistogramProvider,
} from '@willsoto/nestjs-prometheus';

const httpMetricsProviders = [
  makeCounterProvider({
    name: 'http_requests_total',
    help: 'Total number of HTTP requests',
    labelNames: ['method', 'area'],
  }),
  makeHistogramProvider({
    name: 'http_request_duration_seconds',
    help: 'Duration of HTTP requests in seconds',
    labelNames: ['method', 'area'],
    buckets: [0.01, 0.05, 0.1, 0.5, 1, 2.5, 5, 10],
  }),
  makeCounterProvider({
    name: 'http_request_errors_total',
    help: 'Total number of HTTP request errors',
    labelNames: ['method', 'status', 'area'],
  }),
  makeCounterProvider({
    name: 'unhandled_exceptions_total',
    help: 'Total number of exceptions reaching the global filter',
    labelNames: ['method', 'status', 'area'],
  }),
];

const domainMetricsProviders = [
  makeCounterProvider({
    name: 'rate_limit_decisions_total',
    help: 'Rate limiter decisions by outcome',
    labelNames: ['outcome'], // allowed, blocked, store_error
  }),
  makeCounterProvider({
    name: 'tasks_processed_total',
    help: 'Background task executions by kind and outcome',
    labelNames: ['kind', 'outcome'], // succeeded, retried, failed
  }),
];

@Global()
@Module({
  imports: [
    PrometheusModule.register({
      defaultMetrics: {
        enabled: true,
      },
    }),
  ],
  providers: [...httpMetricsProviders, ...domainMetricsProviders],
  exports: [...httpMetricsProviders, ...domainMetricsProviders],
})
export class MetricsModule {}
