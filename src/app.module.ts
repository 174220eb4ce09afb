import { Module } from '@nestjs/common';
import { AuthModule } from './auth/auth.module';
import { AppConfigModule } from './config/config.module';
import { InterceptorsModule } from './core/interceptors.module';
import { DatabaseModule } from './database/database.module';
import { EventParticipantModule } from './event-participant/event-participant.module';
import { EventModule } from './event/event.module';
import { HealthModule } from './health/health.module';
import { LoggerModule } from './logger/logger.module';
import { MetricsModule } from './metrics/metrics.module';
import { RateLimitModule } from './rate-limit/rate-limit.module';
import { SessionModule } from './session/session.module';
import { TaskModule } from './task/task.module';
import { TracingModule } from './tracing/tracing.module';
import { UserModule } from './user/user.module';

@Module({
  imports: [
    AppConfigModule,
    DatabaseModule,
    TracingModule,
    MetricsModule,
    LoggerModule,
    // Registers the first APP_GUARD, so rate limiting runs before any
    // controller-level guard.
    RateLimitModule,
    InterceptorsModule,
    UserModule,
    SessionModule,
    AuthModule,
    TaskModule,
    EventModule,
    EventParticipantModule,
    HealthModule,
  ],
})
export class AppModule {}
