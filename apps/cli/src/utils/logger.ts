import {
  createDefaultLogger,
  type Logger,
  type LogMetadata,
} from "@folio/core";

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVELS: LogLevel[] = ["debug", "info", "warn", "error"];

function stripAnsi(input: string): string {
  const ansiPattern = "\\u001B\\[[0-9;]*[A-Za-z]";
  const re = new RegExp(ansiPattern, "g");
  return input.replace(re, "");
}

export function currentLevel(): LogLevel {
  return LEVELS.find((level) => level === process.env.FOLIO_LOG_LEVEL) ?? "info";
}

export function isJsonMode(): boolean {
  return process.env.FOLIO_LOG_FORMAT === "json";
}

function shouldLog(level: LogLevel): boolean {
  return LEVELS.indexOf(level) >= LEVELS.indexOf(currentLevel());
}

function write(stream: NodeJS.WritableStream, message: string): void {
  stream.write(message.endsWith("\n") ? message : `${message}\n`);
}

function formatMetadata(metadata?: LogMetadata): string {
  if (!metadata) {
    return "";
  }
  const pairs = Object.entries(metadata)
    .filter(([, value]) => value !== undefined && value !== null)
    .map(([key, value]) => `${key}=${JSON.stringify(value)}`);
  return pairs.length > 0 ? ` [${pairs.join(" ")}]` : "";
}

function emit(
  level: LogLevel,
  message: string | Error,
  metadata?: LogMetadata
): void {
  if (!shouldLog(level)) {
    return;
  }
  const stream = level === "warn" || level === "error" ? process.stderr : process.stdout;
  const text = message instanceof Error ? message.message : message;

  if (isJsonMode()) {
    write(
      stream,
      JSON.stringify({
        level,
        ts: new Date().toISOString(),
        message: stripAnsi(text),
        ...metadata,
        ...(message instanceof Error ? { stack: message.stack } : {}),
      })
    );
    return;
  }

  write(stream, `${text}${formatMetadata(metadata)}`);
}

/**
 * Console logger that honours `FOLIO_LOG_LEVEL` and `FOLIO_LOG_FORMAT`, so
 * the CLI suits both humans and automation.
 */
export const logger: Logger = {
  debug(message, metadata) {
    emit("debug", message, metadata);
  },
  info(message, metadata) {
    emit("info", message, metadata);
  },
  warn(message, metadata) {
    emit("warn", message, metadata);
  },
  error(message, metadata) {
    emit("error", message, metadata);
  },
};

/**
 * Logger handed to the project: pino JSON lines in JSON mode, the console
 * logger otherwise.
 */
export function createProjectLogger(): Logger {
  if (isJsonMode()) {
    return createDefaultLogger({ level: currentLevel(), prettyPrint: false });
  }
  return logger;
}
