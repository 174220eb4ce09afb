import { AppConfig } from './app-config.type';
import { AuthConfig } from '../auth/config/auth-config.type';
import { DatabaseConfig } from '../database/config/database-config.type';
import { MailConfig } from '../mail/config/mail-config.type';
import { CacheConfig } from '../cache/config/cache-config.type';
import { RateLimitConfig } from '../rate-limit/config/rate-limit-config.type';
import { EventConfig } from '../event/config/event-config.type';
import { TaskConfig } from '../task/config/task-config.type';

export type AllConfigType = {
  app: AppConfig;
  auth: AuthConfig;
  database: DatabaseConfig;
  mail: MailConfig;
  cache: CacheConfig;
  rateLimit: RateLimitConfig;
  event: EventConfig;
  task: TaskConfig;
};
