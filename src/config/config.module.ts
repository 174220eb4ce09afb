import { ConfigModule } from '@nestjs/config';
import authConfig from '../auth/config/auth.config';
import cacheConfig from '../cache/config/cache.config';
import databaseConfig from '../database/config/database.config';
import eventConfig from '../event/config/event.config';
import mailConfig from '../mail/config/mail.config';
import rateLimitConfig from '../rate-limit/config/rate-limit.config';
import taskConfig from '../task/config/task.config';
import appConfig from './app.config';

/** Shared by the web application and the worker. */
export const AppConfigModule = ConfigModule.forRoot({
  isGlobal: true,
  load: [
    appConfig,
    authConfig,
    databaseConfig,
    mailConfig,
    cacheConfig,
    rateLimitConfig,
    eventConfig,
    taskConfig,
  ],
  envFilePath: ['.env'],
});
