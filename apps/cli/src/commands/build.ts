import { ConfigurationError } from "@folio/core";
import chalk from "chalk";
import { Command } from "commander";
import { logger } from "../utils/logger";
import {
  addLoggingOptions,
  applyLoggingOptions,
  type LoggingOptions,
} from "../utils/options";
import { createProject, type ProjectFlags, reportBuild } from "../utils/project";
import { createSpinner } from "../utils/spinner";

type BuildOptions = ProjectFlags & LoggingOptions;

/**
 * Adds the options shared by `build` and `watch`.
 */
export const addProjectOptions = <T extends Command>(command: T): T => {
  command
    .argument("[source]", "Source directory", ".")
    .option("-o, --output <dir>", "Output directory (default: <source>/_out)")
    .option("-i, --ignore <pattern...>", "Additional ignore patterns")
    .option(
      "--assume-content-negotiation",
      "Link to pages without their .html extension"
    )
    .option(
      "--assume-directory-index",
      "Link to directories instead of their index.html"
    );
  return addLoggingOptions(command);
};

/**
 * Creates the `folio build` command. Builds every artifact once and exits
 * non-zero when any of them failed.
 */
export function buildCommand(): Command {
  return addProjectOptions(
    new Command("build").description("Build the site once")
  ).action((source: string, options: BuildOptions) => {
    runBuild(source, options);
  });
}

function runBuild(source: string, options: BuildOptions): void {
  applyLoggingOptions(options);
  const spinner = createSpinner("Building...");

  try {
    const project = createProject(source, options);
    const summary = project.build();
    spinner.stop();
    reportBuild(project, summary);
    if (project.hasErrors()) {
      process.exitCode = 1;
    }
  } catch (error) {
    spinner.stop();
    if (error instanceof ConfigurationError) {
      logger.error(chalk.red(error.message));
      process.exitCode = 1;
      return;
    }
    throw error;
  }
}
