import {
  createLogger,
  format,
  type Logger,
  type LoggerOptions as WinstonLoggerOptions,
  transports,
} from "winston"

export type LogLevel = "error" | "warn" | "info" | "debug"

const LOG_LEVELS: readonly LogLevel[] = ["error", "warn", "info", "debug"]

/**
 * Environment variable read when no level is configured explicitly.
 */
export const LOG_LEVEL_ENV = "JSON_TREE_ADAPTERS_LOG_LEVEL"

export const defaultLogLevel: LogLevel = "warn"

export interface LoggingOptions {
  /**
   * Minimum level written.
   * Default: the JSON_TREE_ADAPTERS_LOG_LEVEL environment variable, else "warn".
   */
  level?: LogLevel

  /**
   * Winston transports to write to.
   * Default: a console transport writing every level to stderr.
   */
  transports?: WinstonLoggerOptions["transports"]
}

function isLogLevel(value: string | undefined): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value)
}

function levelFromEnv(): LogLevel | undefined {
  const value = process.env[LOG_LEVEL_ENV]?.toLowerCase()
  return isLogLevel(value) ? value : undefined
}

function buildLogger(options: LoggingOptions): Logger {
  const {
    level = levelFromEnv() ?? defaultLogLevel,
    transports: targets = [new transports.Console({ stderrLevels: [...LOG_LEVELS] })],
  } = options

  return createLogger({
    level,
    defaultMeta: { module: "json-tree-adapters" },
    format: format.combine(format.timestamp(), format.json()),
    transports: targets,
    exitOnError: false,
  })
}

let activeLogger: Logger | undefined

/**
 * Returns the package logger, creating it from the environment on first use.
 */
export function getLogger(): Logger {
  if (!activeLogger) {
    activeLogger = buildLogger({})
  }
  return activeLogger
}

/**
 * Replaces the package logger.
 */
export function configureLogging(options: LoggingOptions = {}): Logger {
  activeLogger = buildLogger(options)
  return activeLogger
}
