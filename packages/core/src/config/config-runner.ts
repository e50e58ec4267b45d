import fs from "node:fs";
import path from "node:path";
import vm from "node:vm";
import { parse as parseToml } from "@iarna/toml";
import {
  CONTROL_DIRECTORY,
  type ControlFile,
  controlFileSchema,
  formatSchemaIssues,
} from "@folio/types";
import type { HelperDelegate } from "handlebars";
import { load as yamlLoad } from "js-yaml";
import JSON5 from "json5";
import { ConfigurationError } from "../errors";
import type { Logger } from "../interfaces";

export type ControlFileFormat = "script" | "yaml" | "json" | "jsonc" | "toml";

/**
 * Mutations a control file may apply to its project. This is the whole
 * surface a script sees, bound to the global `project`.
 */
export type ConfigApi = {
  ignore(pattern: string): void;
  helper(name: string, helper: HelperDelegate): void;
  set(name: string, value: unknown): void;
};

export type ControlFileLocation = {
  /** POSIX path relative to the source root. */
  path: string;
  absolutePath: string;
  format: ControlFileFormat;
};

type Candidate = {
  filename: string;
  format: ControlFileFormat;
};

export const CONTROL_FILE_CANDIDATES: readonly Candidate[] = [
  { filename: "config.js", format: "script" },
  { filename: "config.yaml", format: "yaml" },
  { filename: "config.yml", format: "yaml" },
  { filename: "config.json", format: "json" },
  { filename: "config.jsonc", format: "jsonc" },
  { filename: "config.toml", format: "toml" },
];

const DEFAULT_SCRIPT_TIMEOUT_MS = 1000;

export type ConfigRunnerOptions = {
  /** Upper bound on synchronous script execution. */
  scriptTimeoutMs?: number;
};

function describeError(error: unknown): string {
  // Errors thrown inside the vm context come from another realm and fail
  // `instanceof Error`.
  if (
    typeof error === "object" &&
    error !== null &&
    "message" in error &&
    typeof error.message === "string"
  ) {
    return error.message;
  }
  return String(error);
}

function parseDeclarative(contents: string, format: ControlFileFormat): unknown {
  switch (format) {
    case "yaml":
      return yamlLoad(contents) ?? {};
    case "json":
      return JSON.parse(contents);
    case "jsonc":
      return JSON5.parse(contents);
    case "toml":
      return parseToml(contents);
    case "script":
      throw new Error("Scripts are executed, not parsed");
    default: {
      const exhaustive: never = format;
      throw new Error(`Unsupported control file format: ${exhaustive}`);
    }
  }
}

/**
 * Locates the control file under `_folio/` and applies it. Runs on every sync;
 * whatever the file changed before a fault stays changed.
 */
export class ConfigRunner {
  private readonly scriptTimeoutMs: number;

  constructor(
    private readonly sourceRoot: string,
    private readonly logger: Logger,
    options: ConfigRunnerOptions = {}
  ) {
    this.scriptTimeoutMs = options.scriptTimeoutMs ?? DEFAULT_SCRIPT_TIMEOUT_MS;
  }

  locate(): ControlFileLocation | undefined {
    for (const candidate of CONTROL_FILE_CANDIDATES) {
      const absolutePath = path.join(
        this.sourceRoot,
        CONTROL_DIRECTORY,
        candidate.filename
      );
      if (fs.statSync(absolutePath, { throwIfNoEntry: false })?.isFile()) {
        return {
          path: `${CONTROL_DIRECTORY}/${candidate.filename}`,
          absolutePath,
          format: candidate.format,
        };
      }
    }
    return;
  }

  /**
   * Applies the control file, if there is one, and returns where it was found.
   * @throws ConfigurationError on any fault while reading or applying it.
   */
  run(api: ConfigApi): ControlFileLocation | undefined {
    const location = this.locate();
    if (!location) {
      return;
    }

    this.logger.debug("Applying control file", { file: location.path });

    try {
      const contents = fs.readFileSync(location.absolutePath, "utf8");
      if (location.format === "script") {
        this.runScript(contents, location, api);
      } else {
        this.applyDeclarative(
          this.validate(parseDeclarative(contents, location.format), location),
          api
        );
      }
    } catch (error) {
      if (error instanceof ConfigurationError && error.file) {
        throw error;
      }
      throw new ConfigurationError(
        `Failed to apply ${location.path}: ${describeError(error)}`,
        { cause: error, file: location.path }
      );
    }

    return location;
  }

  private runScript(
    source: string,
    location: ControlFileLocation,
    api: ConfigApi
  ): void {
    const project: ConfigApi = Object.freeze({
      ignore: (pattern: string) => api.ignore(pattern),
      helper: (name: string, helper: HelperDelegate) => api.helper(name, helper),
      set: (name: string, value: unknown) => api.set(name, value),
    });
    const script = new vm.Script(source, { filename: location.absolutePath });
    script.runInNewContext({ project }, { timeout: this.scriptTimeoutMs });
  }

  private validate(raw: unknown, location: ControlFileLocation): ControlFile {
    const result = controlFileSchema.safeParse(raw);
    if (!result.success) {
      throw new ConfigurationError(
        `Invalid control file (${location.path}):\n  • ${formatSchemaIssues(result.error.issues)}`,
        { cause: result.error, file: location.path }
      );
    }
    return result.data;
  }

  private applyDeclarative(config: ControlFile, api: ConfigApi): void {
    for (const pattern of config.ignore ?? []) {
      api.ignore(pattern);
    }
    if (config.assumeContentNegotiation !== undefined) {
      api.set("assumeContentNegotiation", config.assumeContentNegotiation);
    }
    if (config.assumeDirectoryIndex !== undefined) {
      api.set("assumeDirectoryIndex", config.assumeDirectoryIndex);
    }
    for (const [name, value] of Object.entries(config.helpers ?? {})) {
      api.helper(name, () => value);
    }
  }
}
