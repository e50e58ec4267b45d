import { type Command, Option } from "commander";

const FORMAT_CHOICES = ["text", "json"] as const;
const LEVEL_CHOICES = ["debug", "info", "warn", "error"] as const;

export type LoggingOptions = {
  format?: (typeof FORMAT_CHOICES)[number];
  logLevel?: (typeof LEVEL_CHOICES)[number];
  quiet?: boolean;
};

export const addLoggingOptions = <T extends Command>(command: T): T => {
  command.addOption(
    new Option("--format <mode>", "Output format: text|json").choices([
      ...FORMAT_CHOICES,
    ])
  );
  command.addOption(
    new Option("--log-level <level>", "Log level: debug|info|warn|error").choices(
      [...LEVEL_CHOICES]
    )
  );
  command.option("-q, --quiet", "Quiet mode: only errors are printed");
  return command;
};

/**
 * Copies logging flags into the environment, where the loggers read them.
 * `--quiet` wins over `--log-level`.
 */
export const applyLoggingOptions = (options: LoggingOptions): void => {
  if (options.format) {
    process.env.FOLIO_LOG_FORMAT = options.format;
  }
  if (options.logLevel) {
    process.env.FOLIO_LOG_LEVEL = options.logLevel;
  }
  if (options.quiet) {
    process.env.FOLIO_LOG_LEVEL = "error";
  }
};
