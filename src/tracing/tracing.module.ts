import {
  Global,
  Logger,
  Module,
  OnApplicationShutdown,
  OnModuleInit,
} from '@nestjs/common';
import { NodeSDK } from '@opentelemetry/sdk-node';
import { OTLPTraceExporter } from '@opentelemetry/exporter-trace-otlp-http';
import { Resource } from '@opentelemetry/resources';
import {
  ATTR_SERVICE_NAME,
  ATTR_SERVICE_VERSION,
} from '@opentelemetry/semantic-conventions';
import { ExpressInstrumentation } from '@opentelemetry/instrumentation-express';
import { HttpInstrumentation } from '@opentelemetry/instrumentation-http';
import { NestInstrumentation } from '@opentelemetry/instrumentation-nestjs-core';
import { PgInstrumentation } from '@opentelemetry/instrumentation-pg';
import { RedisInstrumentation } from '@opentelemetry/instrumentation-redis-4';

/**
 * Starts the OpenTelemetry SDK when ENABLE_TRACING is "true". Otherwise the
 * spans opened through `@opentelemetry/api` stay no-ops.
 */
@Global()
@Module({})
export class TracingModule implements OnModuleInit, OnApplicationShutdown {
  private readonly sdk: NodeSDK | null = null;
  private readonly logger = new Logger(TracingModule.name);

  constructor() {
    if (process.env.ENABLE_TRACING !== 'true') {
      this.logger.log('Tracing disabled');
      return;
    }

    this.logger.log('Initializing tracing');
    this.sdk = new NodeSDK({
      resource: new Resource({
        [ATTR_SERVICE_NAME]:
          process.env.OTEL_SERVICE_NAME || 'events-scheduler-api',
        [ATTR_SERVICE_VERSION]: process.env.npm_package_version || '0.1.0',
      }),
      traceExporter: new OTLPTraceExporter({
        url: `${process.env.OTEL_EXPORTER_OTLP_ENDPOINT}/v1/traces`,
      }),
      instrumentations: [
        new HttpInstrumentation(),
        new ExpressInstrumentation(),
        new NestInstrumentation(),
        new PgInstrumentation(),
        new RedisInstrumentation(),
      ],
    });
  }

  onModuleInit() {
    if (!this.sdk) return;

    this.logger.debug(
      `Starting tracing to endpoint: ${process.env.OTEL_EXPORTER_OTLP_ENDPOINT}`,
    );
    this.sdk.start();
  }

  async onApplicationShutdown() {
    if (!this.sdk) return;

    this.logger.debug('Shutting down tracing');
    await this.sdk.shutdown();
  }
}
