import pino from 'pino';
import { Logger } from '@shared/ports/Logger';

export interface LoggerOptions {
  level: string;
  pretty: boolean;
}

export function createPinoInstance(options: LoggerOptions): pino.Logger {
  return pino({
    name: 'crash-engine',
    level: options.level,
    transport: options.pretty
      ? { target: 'pino-pretty', options: { colorize: true, singleLine: true } }
      : undefined,
  });
}

export class PinoLogger implements Logger {
  constructor(private readonly pino: pino.Logger) {}

  info(message: string, context?: Record<string, unknown>): void {
    this.pino.info(context ?? {}, message);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.pino.warn(context ?? {}, message);
  }

  error(message: string, context?: Record<string, unknown>): void {
    this.pino.error(context ?? {}, message);
  }
}
