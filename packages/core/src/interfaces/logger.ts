import type { Logger as PinoLogger } from "pino";
import pino from "pino";

export type LogMetadata = {
  file?: string;
  artifact?: string;
  [key: string]: unknown;
};

export type Logger = {
  debug(message: string, metadata?: LogMetadata): void;
  info(message: string, metadata?: LogMetadata): void;
  warn(message: string, metadata?: LogMetadata): void;
  error(message: string | Error, metadata?: LogMetadata): void;
};

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

/**
 * Logger configuration options.
 */
export type LoggerConfig = {
  /** Minimum log level to output */
  level?: LogLevel;
  /** Whether to format logs for human reading */
  prettyPrint?: boolean;
  /** Additional context to include in all log messages */
  baseContext?: Record<string, unknown>;
};

const LOG_LEVELS: readonly LogLevel[] = [
  "debug",
  "info",
  "warn",
  "error",
  "silent",
];

const levelFromEnv = (): LogLevel | undefined =>
  LOG_LEVELS.find((level) => level === process.env.FOLIO_LOG_LEVEL);

/**
 * Pino-based structured logger implementation.
 */
export class StructuredLogger implements Logger {
  private readonly logger: PinoLogger;

  constructor(config: LoggerConfig = {}) {
    const {
      level = levelFromEnv() ?? "info",
      prettyPrint = process.env.NODE_ENV !== "production",
      baseContext = {},
    } = config;

    this.logger = pino({
      level,
      base: {
        name: "folio",
        ...baseContext,
      },
      transport: prettyPrint
        ? {
            target: "pino-pretty",
            options: {
              colorize: true,
              translateTime: "SYS:standard",
              ignore: "pid,hostname,name",
            },
          }
        : undefined,
    });
  }

  debug(message: string, metadata?: LogMetadata): void {
    this.logger.debug(metadata ?? {}, message);
  }

  info(message: string, metadata?: LogMetadata): void {
    this.logger.info(metadata ?? {}, message);
  }

  warn(message: string, metadata?: LogMetadata): void {
    this.logger.warn(metadata ?? {}, message);
  }

  error(message: string | Error, metadata?: LogMetadata): void {
    if (message instanceof Error) {
      this.logger.error({ err: message, ...metadata }, message.message);
    } else {
      this.logger.error(metadata ?? {}, message);
    }
  }
}

/**
 * Discards everything. Projects log through this unless a logger is injected.
 */
export class NullLogger implements Logger {
  debug(): void {}
  info(): void {}
  warn(): void {}
  error(): void {}
}

export function createDefaultLogger(config?: LoggerConfig): Logger {
  return new StructuredLogger(config);
}
