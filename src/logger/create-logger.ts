import { ConsoleLogger, LogLevel } from '@nestjs/common';
import { JsonLogger } from './json.logger';

/** JSON lines in production, Nest's coloured console everywhere else. */
export function createLogger(
  nodeEnv: string | undefined = process.env.NODE_ENV,
): ConsoleLogger {
  const production = nodeEnv === 'production';
  const logger = production ? new JsonLogger() : new ConsoleLogger();
  const levels: LogLevel[] = production
    ? ['error', 'warn', 'log']
    : ['error', 'warn', 'log', 'debug', 'verbose'];
  logger.setLogLevels(levels);
  return logger;
}
