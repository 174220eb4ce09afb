import { ConsoleLogger, LogLevel } from '@nestjs/common';
import { stringify } from 'safe-stable-stringify';
import { LoggingContextStorage } from './logging.context';

/**
 * One JSON document per line, merged with the request or task context of
 * the current async scope.
 */
export class JsonLogger extends ConsoleLogger {
  protected formatMessage(
    logLevel: LogLevel,
    message: unknown,
    pidMessage: string,
    formattedLogLevel: string,
    contextMessage: string,
    timestampDiff: string,
  ): string {
    const pid = pidMessage.replace(/[[\]]/g, '').trim();
    const context = contextMessage.replace(/\u001b\[\d+[\d;]*m/g, '').trim();

    const logEntry = {
      timestamp: new Date().toISOString(),
      level: logLevel,
      message,
      context: context.replace(/[[\]]/g, '') || undefined,
      pid: pid || undefined,
      ms: timestampDiff
        ? parseFloat(timestampDiff.replace('ms', ''))
        : undefined,
      ...LoggingContextStorage.get(),
    };

    return stringify(logEntry) + '\n';
  }

  protected colorize(message: string): string {
    return message;
  }
}
