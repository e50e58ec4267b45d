import { ConfigurationError, type Project } from "@folio/core";
import chalk from "chalk";
import { Command, InvalidArgumentError } from "commander";
import { logger } from "../utils/logger";
import { applyLoggingOptions, type LoggingOptions } from "../utils/options";
import { createProject, type ProjectFlags, reportBuild } from "../utils/project";
import { addProjectOptions } from "./build";

const DEFAULT_INTERVAL_SECONDS = 2;
const POLL_MS = 250;

type WatchOptions = ProjectFlags &
  LoggingOptions & {
    interval: number;
  };

const parseInterval = (value: string): number => {
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new InvalidArgumentError("Interval must be a positive number of seconds.");
  }
  return parsed;
};

/**
 * Creates the `folio watch` command: rescans the source tree at most once per
 * interval and rebuilds, until interrupted.
 */
export function watchCommand(): Command {
  return addProjectOptions(
    new Command("watch")
      .description("Rebuild the site periodically until interrupted")
      .option(
        "--interval <seconds>",
        "Minimum seconds between rescans",
        parseInterval,
        DEFAULT_INTERVAL_SECONDS
      )
  ).action(async (source: string, options: WatchOptions) => {
    await runWatch(source, options);
  });
}

/**
 * Builds (which syncs) at most once per interval. A control file fault counts
 * as a run, so it is reported once per interval rather than on every poll.
 */
function rebuild(project: Project): void {
  try {
    reportBuild(project, project.build());
  } catch (error) {
    if (!(error instanceof ConfigurationError)) {
      throw error;
    }
    logger.error(chalk.red(error.message));
  }
}

async function runWatch(source: string, options: WatchOptions): Promise<void> {
  applyLoggingOptions(options);
  const project = createProject(source, options);
  const intervalMs = options.interval * 1000;
  logger.info(chalk.cyan(`Watching ${project.sourceRoot} (Ctrl+C to stop)`));

  await new Promise<void>((resolve, reject) => {
    let nextRunAt = Date.now();

    const stop = () => {
      clearInterval(timer);
      process.removeListener("SIGINT", onInterrupt);
    };
    const onInterrupt = () => {
      stop();
      resolve();
    };
    const tick = () => {
      const now = Date.now();
      if (now < nextRunAt) {
        return;
      }
      nextRunAt = now + intervalMs;
      try {
        rebuild(project);
      } catch (error) {
        stop();
        reject(error);
      }
    };

    const timer = setInterval(tick, POLL_MS);
    process.once("SIGINT", onInterrupt);
    tick();
  });
}
