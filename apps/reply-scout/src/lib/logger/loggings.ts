import {
  createLogger,
  format,
  transports,
  Logger as WinstonLogger,
  LoggerOptions,
} from "winston";

const { combine, printf, timestamp, colorize, json } = format;

export interface LogContext {
  id?: string;
  kind?: string;
  subreddit?: string;
  strategy?: string;
  stage?: string;
  attempt?: number;
  count?: number;
  durationMs?: number;
  error?: unknown;
  [key: string]: unknown;
}

function devFormat() {
  return printf((info) => {
    const { timestamp, level, message, ...meta } = info;
    return `${timestamp} [${level}] ${message} ${Object.keys(meta).length ? JSON.stringify(meta) : ""}`;
  });
}

function prodFormat() {
  return json();
}

export function prodLoggerOptions(logDir?: string): LoggerOptions {
  const files =
    logDir === undefined
      ? []
      : [
          new transports.File({
            level: "info",
            filename: `${logDir}/reply-scout-info.log`,
          }),
          new transports.File({
            level: "error",
            filename: `${logDir}/reply-scout-error.log`,
          }),
        ];

  return {
    level: "info",
    format: combine(timestamp(), prodFormat()),
    transports: [new transports.Console(), ...files],
  };
}

export function prodLogger(logDir?: string): WinstonLogger {
  return createLogger(prodLoggerOptions(logDir));
}

export function buildDevLogger(silent = false): WinstonLogger {
  return createLogger({
    level: "debug",
    silent,
    format: combine(colorize(), timestamp(), devFormat()),
    transports: [new transports.Console()],
  });
}

// Context-aware wrapper
export class AppLogger {
  private logger: WinstonLogger;
  private serviceName: string;

  constructor(logger: WinstonLogger, serviceName: string) {
    this.logger = logger;
    this.serviceName = serviceName;
  }

  /**
   * Returns a logger that shares the transports but tags entries with a component name.
   */
  child(component: string): AppLogger {
    return new AppLogger(this.logger, `${this.serviceName}:${component}`);
  }

  debug(message: string, context?: LogContext): void {
    this.logger.debug({
      service: this.serviceName,
      message,
      ...this.prepareContext(context),
    });
  }

  info(message: string, context?: LogContext): void {
    this.logger.info({
      service: this.serviceName,
      message,
      ...this.prepareContext(context),
    });
  }

  warn(message: string, context?: LogContext): void {
    this.logger.warn({
      service: this.serviceName,
      message,
      error: this.describeError(context?.error),
      ...this.prepareContext(context),
    });
  }

  error(message: string, context?: LogContext): void {
    const errorInfo =
      context?.error instanceof Error
        ? context.error.stack
        : this.describeError(context?.error);

    this.logger.error({
      service: this.serviceName,
      message,
      error: errorInfo,
      ...this.prepareContext(context),
    });
  }

  private describeError(error: unknown): string | undefined {
    if (error === undefined) return undefined;
    if (error instanceof Error) return `${error.name}: ${error.message}`;
    return String(error);
  }

  private prepareContext(context?: LogContext): Record<string, unknown> {
    if (!context) return {};
    const { error, ...rest } = context; // prevent duplicate error field
    return rest;
  }
}
