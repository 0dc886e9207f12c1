/**
 * Logging.
 *
 * Logs go to stderr so stdout only ever carries the preview URL.
 * Daemon mode adds a log file and silences the console.
 */

import fs from "node:fs";
import path from "node:path";
import process from "node:process";
import winston from "winston";
import { getLogPath } from "./paths.js";

const LEVELS = ["error", "warn", "info", "debug"];

export const logger = winston.createLogger({
  level: process.env.LUM_LOG_LEVEL ?? "info",
  format: winston.format.combine(winston.format.timestamp(), winston.format.json()),
  transports: [
    new winston.transports.Console({
      stderrLevels: LEVELS,
      format: winston.format.combine(
        winston.format.colorize(),
        winston.format.printf(({ level, message }) => `${level}: ${String(message)}`),
      ),
    }),
  ],
});

/**
 * Send logs to the runtime log file (daemon mode) and stop writing to the console.
 * Returns the log file path.
 */
export function setupLogFile(logPath: string = getLogPath()): string {
  fs.mkdirSync(path.dirname(logPath), { recursive: true, mode: 0o700 });
  // create eagerly so `lum --daemon` can hand the file to the child's stdio
  fs.closeSync(fs.openSync(logPath, "a"));

  const alreadyLogging = logger.transports.some(
    (transport) =>
      transport instanceof winston.transports.File &&
      path.join(transport.dirname, transport.filename) === path.resolve(logPath),
  );
  if (!alreadyLogging) {
    logger.add(new winston.transports.File({ filename: logPath }));
  }
  disableConsoleLogging();
  return logPath;
}

export function disableConsoleLogging(): void {
  logger.transports.forEach((transport) => {
    if (transport instanceof winston.transports.Console) {
      transport.silent = true;
    }
  });
}

export function enableDebug(): void {
  logger.level = "debug";
}
