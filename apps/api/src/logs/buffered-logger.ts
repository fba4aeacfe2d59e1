import { ConsoleLogger } from '@nestjs/common';
import { ServerLogBuffer, serverLogs } from './server-logs.store';

/** Console output plus a copy of every line in the in-memory log buffer. */
export class BufferedLogger extends ConsoleLogger {
  constructor(private readonly buffer: ServerLogBuffer = serverLogs) {
    super();
  }

  override log(message: unknown, context?: string) {
    super.log(message, context);
    this.buffer.add({ level: 'info', message, context });
  }

  override warn(message: unknown, context?: string) {
    super.warn(message, context);
    this.buffer.add({ level: 'warn', message, context });
  }

  override error(message: unknown, stack?: string, context?: string) {
    super.error(message, stack, context);
    this.buffer.add({ level: 'error', message, stack, context });
  }

  override debug(message: unknown, context?: string) {
    super.debug(message, context);
    this.buffer.add({ level: 'debug', message, context });
  }

  override verbose(message: unknown, context?: string) {
    super.verbose(message, context);
    this.buffer.add({ level: 'debug', message, context });
  }
}
