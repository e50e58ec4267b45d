import path from "node:path";

import { type BuildSummary, Project } from "@folio/core";
import chalk from "chalk";
import { createProjectLogger, logger } from "./logger";

export type ProjectFlags = {
  output?: string;
  ignore?: string[];
  assumeContentNegotiation?: boolean;
  assumeDirectoryIndex?: boolean;
};

/**
 * Constructs a project from CLI flags. Note that this wipes the output
 * directory.
 */
export function createProject(source: string, flags: ProjectFlags): Project {
  const cwd = process.cwd();
  const sourceRoot = path.resolve(cwd, source);
  const outputRoot = flags.output ? path.resolve(cwd, flags.output) : undefined;

  const attributes: Record<string, unknown> = {};
  if (flags.ignore && flags.ignore.length > 0) {
    attributes.ignore = flags.ignore;
  }
  if (flags.assumeContentNegotiation) {
    attributes.assumeContentNegotiation = true;
  }
  if (flags.assumeDirectoryIndex) {
    attributes.assumeDirectoryIndex = true;
  }

  return new Project(sourceRoot, outputRoot, attributes, {
    logger: createProjectLogger(),
  });
}

/**
 * Prints one line per failed artifact plus a summary line.
 */
export function reportBuild(project: Project, summary: BuildSummary): void {
  for (const artifact of project.artifacts()) {
    if (artifact.error) {
      logger.error(chalk.red(`✗ ${artifact.path}: ${artifact.error.message}`));
    }
  }

  const outputLabel = path.relative(process.cwd(), project.outputRoot) || ".";
  if (summary.failed > 0) {
    logger.warn(
      chalk.yellow(
        `Built ${summary.built} artifact(s) into ${outputLabel}, ${summary.failed} failed`
      )
    );
  } else {
    logger.info(
      chalk.green(`Built ${summary.built} artifact(s) into ${outputLabel}`)
    );
  }
}
