import winston from "winston";
import { DEFAULT_LOG_LEVEL, LOG_LEVEL_ENV } from "./constants";
import { InvalidInputError } from "./errors";

/**
 * Library-wide logger. Quiet by default: trades are logged at debug level,
 * so consumers opt in through BONDING_CURVE_LOG_LEVEL or setLogLevel().
 */
export const logger = winston.createLogger({
  level: process.env[LOG_LEVEL_ENV] || DEFAULT_LOG_LEVEL,
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.json()
  ),
  transports: [
    new winston.transports.Console({
      format: winston.format.simple(),
    }),
  ],
});

export function setLogLevel(level: string): void {
  if (!Object.prototype.hasOwnProperty.call(winston.config.npm.levels, level)) {
    throw new InvalidInputError(`setLogLevel: unknown level "${level}"`);
  }
  logger.level = level;
}
