import { Global, Module } from '@nestjs/common';
import { AuditLoggerService } from './audit-logger.provider';

@Global()
@Module({
  providers: [AuditLoggerService],
  exports: [AuditLoggerService],
})
export class LoggerModule {}
