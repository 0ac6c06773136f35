import winston from "winston";
import { type LogLevel, logLevels, resolveConfig } from "./config";

const { printf } = winston.format;

const lineFormat = printf(({ level, message, ...metadata }) => {
  let msg = `[${level}] ${message}`;

  if (Object.keys(metadata).length > 0) {
    msg += ` ${JSON.stringify(metadata)}`;
  }

  return msg;
});

// Everything goes to stderr so stdout only carries results
export const logger = winston.createLogger({
  level: resolveConfig().logLevel,
  format: lineFormat,
  transports: [
    new winston.transports.Console({ stderrLevels: [...logLevels] }),
  ],
});

export function setLogLevel(level: LogLevel): void {
  logger.level = level;
}
