import fs from "node:fs";
import path from "node:path";

import type { ArtifactContract } from "@folio/types";
import type { Entry, ProjectContext } from "./entry";
import { toError } from "./errors";
import { renderTemplate } from "./render/handlebars-renderer";

/**
 * A generated file. Templates are rendered, everything else is copied.
 */
export class Artifact implements ArtifactContract {
  private lastError: Error | null = null;

  constructor(
    private readonly project: ProjectContext,
    readonly entry: Entry,
    readonly path: string
  ) {}

  get error(): Error | null {
    return this.lastError;
  }

  get absolutePath(): string {
    return path.join(this.project.outputRoot, ...this.path.split("/"));
  }

  /**
   * Writes the artifact. Failures are kept on `error` instead of thrown.
   */
  build(): void {
    this.lastError = null;
    try {
      const contents = this.render();
      fs.mkdirSync(path.dirname(this.absolutePath), { recursive: true });
      fs.writeFileSync(this.absolutePath, contents);
      this.project.logger.debug(`Built ${this.path}`, {
        file: this.entry.path,
        artifact: this.path,
      });
    } catch (error) {
      this.lastError = toError(error);
      this.project.logger.error(this.lastError, {
        file: this.entry.path,
        artifact: this.path,
      });
    }
  }

  private render(): string | Buffer {
    const source = this.entry.read();
    if (!this.entry.isTemplate) {
      return source;
    }
    return renderTemplate(source.toString("utf8"), {
      sourcePath: this.entry.path,
      artifactPath: this.path,
      helpers: this.project.helpers,
      attributes: this.project.attributes,
    });
  }
}
