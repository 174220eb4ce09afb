import { AsyncLocalStorage } from 'async_hooks';

export interface LoggingContext {
  requestId?: string;
  userId?: number;
  method?: string;
  path?: string;
  taskId?: number;
  taskKind?: string;
}

export class LoggingContextStorage {
  private static storage = new AsyncLocalStorage<LoggingContext>();

  static get(): LoggingContext {
    return this.storage.getStore() ?? {};
  }

  static run<T>(context: LoggingContext, next: () => Promise<T>): Promise<T> {
    return this.storage.run(context, next);
  }
}
