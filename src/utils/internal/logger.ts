/**
 * @fileoverview Application logger built on pino. Records are written to
 * stderr so stdout stays reserved for the MCP stdio transport.
 * @module src/utils/internal/logger
 */
import {
  destination,
  pino,
  type LevelWithSilent,
  type Logger as PinoLogger,
} from 'pino';

import type { RequestContext } from './requestContext.js';

/**
 * Severity names used across the application (RFC 5424 subset).
 */
export type McpLogLevel =
  | 'debug'
  | 'info'
  | 'notice'
  | 'warning'
  | 'error'
  | 'crit';

const PINO_LEVELS: Record<McpLogLevel, LevelWithSilent> = {
  debug: 'debug',
  info: 'info',
  notice: 'info',
  warning: 'warn',
  error: 'error',
  crit: 'fatal',
};

type LogContext = Partial<RequestContext> & Record<string, unknown>;

export class Logger {
  private static instance: Logger | undefined;
  private pinoLogger: PinoLogger;

  private constructor() {
    this.pinoLogger = pino(
      { name: 'pdb-mirror', level: 'info' },
      destination(2),
    );
  }

  public static getInstance(): Logger {
    Logger.instance ??= new Logger();
    return Logger.instance;
  }

  public setLevel(level: McpLogLevel): void {
    this.pinoLogger.level = PINO_LEVELS[level];
  }

  public debug(msg: string, context?: LogContext): void {
    this.pinoLogger.debug(context ?? {}, msg);
  }

  public info(msg: string, context?: LogContext): void {
    this.pinoLogger.info(context ?? {}, msg);
  }

  public notice(msg: string, context?: LogContext): void {
    this.pinoLogger.info({ ...context, severity: 'notice' }, msg);
  }

  public warning(msg: string, context?: LogContext): void {
    this.pinoLogger.warn(context ?? {}, msg);
  }

  /**
   * Logs an error. An Error instance is serialized under `err` by pino.
   */
  public error(
    msg: string,
    errorOrContext?: Error | LogContext,
    context?: LogContext,
  ): void {
    if (errorOrContext instanceof Error) {
      this.pinoLogger.error({ ...context, err: errorOrContext }, msg);
      return;
    }
    this.pinoLogger.error(errorOrContext ?? {}, msg);
  }

  public crit(
    msg: string,
    errorOrContext?: Error | LogContext,
    context?: LogContext,
  ): void {
    if (errorOrContext instanceof Error) {
      this.pinoLogger.fatal({ ...context, err: errorOrContext }, msg);
      return;
    }
    this.pinoLogger.fatal(errorOrContext ?? {}, msg);
  }
}

export const logger = Logger.getInstance();
