import fs from "node:fs";
import path from "node:path";

import type { EntryContract, ProjectAttributes } from "@folio/types";
import { Artifact } from "./artifact";
import type { HelperRegistry } from "./helper-registry";
import type { Logger } from "./interfaces";

export const TEMPLATE_EXTENSIONS: readonly string[] = [".hbs", ".handlebars"];

/**
 * What entries and artifacts need from the project that owns them.
 */
export type ProjectContext = {
  readonly sourceRoot: string;
  readonly outputRoot: string;
  readonly helpers: HelperRegistry;
  readonly logger: Logger;
  readonly attributes: ProjectAttributes;
  isIgnored(relativePath: string): boolean;
  isControlFile(relativePath: string): boolean;
};

const templateExtensionOf = (relativePath: string): string | undefined =>
  TEMPLATE_EXTENSIONS.find(
    (extension) =>
      relativePath.endsWith(extension) &&
      path.posix.basename(relativePath).length > extension.length
  );

/**
 * Output path for a source path: template extensions are stripped
 * (`about.html.hbs` → `about.html`), anything else maps to itself.
 */
export function artifactPathFor(relativePath: string): string {
  const extension = templateExtensionOf(relativePath);
  return extension ? relativePath.slice(0, -extension.length) : relativePath;
}

/**
 * A source file tracked by a project.
 */
export class Entry implements EntryContract<Artifact> {
  readonly path: string;
  readonly artifact: Artifact | undefined;

  constructor(
    private readonly project: ProjectContext,
    relativePath: string
  ) {
    this.path = relativePath;
    this.artifact = project.isControlFile(relativePath)
      ? undefined
      : new Artifact(project, this, artifactPathFor(relativePath));
  }

  get absolutePath(): string {
    return path.join(this.project.sourceRoot, ...this.path.split("/"));
  }

  get isTemplate(): boolean {
    return templateExtensionOf(this.path) !== undefined;
  }

  sync(): boolean {
    if (!this.project.isControlFile(this.path) && this.project.isIgnored(this.path)) {
      return false;
    }
    return fs.statSync(this.absolutePath, { throwIfNoEntry: false })?.isFile() ?? false;
  }

  read(): Buffer {
    return fs.readFileSync(this.absolutePath);
  }
}
