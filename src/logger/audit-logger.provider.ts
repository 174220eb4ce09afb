import { Injectable } from '@nestjs/common';
import { stringify } from 'safe-stable-stringify';

export type AuditMetadata = Record<string, string | number | boolean | null>;

/**
 * Security-relevant account actions, written as standalone JSON lines so they
 * can be shipped apart from the application log.
 */
@Injectable()
export class AuditLoggerService {
  log(action: string, metadata: AuditMetadata = {}): void {
    console.log(this.format('info', action, metadata));
  }

  warn(action: string, metadata: AuditMetadata = {}): void {
    console.warn(this.format('warn', action, metadata));
  }

  private format(
    level: 'info' | 'warn',
    action: string,
    metadata: AuditMetadata,
  ): string {
    return stringify({
      type: 'audit',
      level,
      action,
      metadata,
      timestamp: new Date().toISOString(),
    });
  }
}
