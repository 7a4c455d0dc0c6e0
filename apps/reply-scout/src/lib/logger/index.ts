import {
  AppLogger,
  buildDevLogger,
  prodLogger,
  prodLoggerOptions,
} from "./loggings";

const environment = process.env.NODE_ENV ?? "development";

const baseLogger =
  environment === "production"
    ? prodLogger()
    : buildDevLogger(environment === "test");

export const logger = new AppLogger(baseLogger, "reply-scout");

/** Adds the file transports once the log directory is known. */
export function configureLogging(options: { dir: string }): void {
  if (environment !== "production") return;
  baseLogger.configure(prodLoggerOptions(options.dir));
}

export type { AppLogger, LogContext } from "./loggings";
