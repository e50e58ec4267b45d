import fs from "node:fs";
import path from "node:path";

import {
  type BuildSummary,
  DEFAULT_IGNORE_PATTERNS,
  DEFAULT_OUTPUT_DIRECTORY,
  formatSchemaIssues,
  isProjectAttributeName,
  type ProjectAttributes,
  projectAttributeSchemas,
  projectOptionsSchema,
} from "@folio/types";
import type { Artifact } from "./artifact";
import {
  type ConfigApi,
  ConfigRunner,
  type ConfigRunnerOptions,
  type ControlFileLocation,
} from "./config/config-runner";
import { Entry, type ProjectContext } from "./entry";
import { ConfigurationError } from "./errors";
import { HelperRegistry } from "./helper-registry";
import { IgnoreRules } from "./ignore";
import { type Logger, NullLogger } from "./interfaces";
import { isPathInside, scanFiles, toPosixPath } from "./scanner";

export type ProjectDependencies = {
  logger?: Logger;
  /**
   * Extension point run on every sync, right after the control file, with the
   * same mutation API the control file gets.
   */
  configure?: (api: ConfigApi) => void;
  /** Clock in seconds, used by `syncEvery`. */
  now?: () => number;
  configRunner?: ConfigRunnerOptions;
};

const wallClockSeconds = (): number => Math.floor(Date.now() / 1000);

/**
 * Keeps a map of source entries and generated artifacts in step with the
 * filesystem and builds the artifacts on demand.
 *
 * Everything here is synchronous and not reentrant: a Project belongs to one
 * caller at a time, and callers sharing one must serialize `sync`, `build`,
 * `ignore`, `setAttribute` and helper registration themselves.
 */
export class Project implements ProjectContext {
  readonly sourceRoot: string;
  readonly outputRoot: string;
  readonly helpers = new HelperRegistry();
  readonly logger: Logger;

  private readonly ignoreRules = new IgnoreRules(DEFAULT_IGNORE_PATTERNS);
  private readonly currentAttributes: ProjectAttributes = {
    assumeContentNegotiation: false,
    assumeDirectoryIndex: false,
  };
  private readonly entryMap = new Map<string, Entry>();
  private readonly artifactMap = new Map<string, Artifact>();
  private readonly configRunner: ConfigRunner;
  private readonly configure?: (api: ConfigApi) => void;
  private readonly now: () => number;
  private controlFile: ControlFileLocation | undefined;
  private nextSyncAt: number | undefined;

  /**
   * Wipes `outputRoot` (default `<sourceRoot>/_out`) before returning.
   * @throws ConfigurationError for an unknown or mistyped attribute, or when
   * the output root is, or contains, the source root.
   */
  constructor(
    sourceRoot: string,
    outputRoot?: string,
    attributes: Record<string, unknown> = {},
    dependencies: ProjectDependencies = {}
  ) {
    this.sourceRoot = path.resolve(sourceRoot);
    this.outputRoot = path.resolve(
      outputRoot ?? path.join(this.sourceRoot, DEFAULT_OUTPUT_DIRECTORY)
    );
    if (isPathInside(this.sourceRoot, this.outputRoot)) {
      throw new ConfigurationError(
        `Output directory ${this.outputRoot} would contain the source directory and be wiped with it`
      );
    }
    this.logger = dependencies.logger ?? new NullLogger();
    this.configure = dependencies.configure;
    this.now = dependencies.now ?? wallClockSeconds;
    this.configRunner = new ConfigRunner(
      this.sourceRoot,
      this.logger,
      dependencies.configRunner
    );

    this.applyOptions(attributes);

    fs.rmSync(this.outputRoot, { recursive: true, force: true });
  }

  get attributes(): ProjectAttributes {
    return { ...this.currentAttributes };
  }

  get assumeContentNegotiation(): boolean {
    return this.currentAttributes.assumeContentNegotiation;
  }

  get assumeDirectoryIndex(): boolean {
    return this.currentAttributes.assumeDirectoryIndex;
  }

  get ignorePatterns(): ReadonlySet<string> {
    return this.ignoreRules.patterns;
  }

  /** Adds an ignore glob; adding one twice is a no-op. */
  ignore(pattern: string): void {
    if (pattern.length === 0) {
      throw new ConfigurationError("Ignore pattern must not be empty");
    }
    this.ignoreRules.add(pattern);
  }

  /**
   * Assigns a project attribute by name.
   * @throws ConfigurationError for an unknown name or a value of the wrong type.
   */
  setAttribute(name: string, value: unknown): void {
    if (!isProjectAttributeName(name)) {
      throw new ConfigurationError(`Unknown project attribute: ${name}`);
    }
    const result = projectAttributeSchemas[name].safeParse(value);
    if (!result.success) {
      throw new ConfigurationError(
        `Invalid value for project attribute ${name}: ${formatSchemaIssues(result.error.issues)}`,
        { cause: result.error }
      );
    }
    this.currentAttributes[name] = result.data;
  }

  isIgnored(relativePath: string): boolean {
    return this.ignoreRules.matches(relativePath);
  }

  isControlFile(relativePath: string): boolean {
    return this.controlFile?.path === relativePath;
  }

  entries(): Entry[] {
    return Array.from(this.entryMap.values());
  }

  artifacts(): Artifact[] {
    return Array.from(this.artifactMap.values());
  }

  /** Entries for the control file currently in effect. */
  configEntries(): Entry[] {
    const entry = this.controlFile ? this.entry(this.controlFile.path) : undefined;
    return entry ? [entry] : [];
  }

  entry(relativePath: string): Entry | undefined {
    return this.entryMap.get(normaliseKey(relativePath));
  }

  artifact(relativePath: string): Artifact | undefined {
    return this.artifactMap.get(normaliseKey(relativePath));
  }

  /**
   * Brings the maps in line with the filesystem: applies the control file,
   * drops entries that no longer qualify, then adds new ones.
   *
   * A control file fault aborts the sync with a ConfigurationError. Anything
   * it changed before failing stays changed; there is no rollback.
   *
   * Returns the paths discovered by this sync.
   */
  sync(): string[] {
    this.loadConfig();
    this.validateKnownEntries();
    return this.findNewEntries();
  }

  /**
   * Syncs, then builds every artifact in turn and stamps the output root's
   * mtime. Artifact failures are recorded on the artifact, not thrown.
   */
  build(): BuildSummary {
    this.sync();
    fs.mkdirSync(this.outputRoot, { recursive: true });

    let failed = 0;
    const artifacts = this.artifacts();
    for (const artifact of artifacts) {
      artifact.build();
      if (artifact.error) {
        failed += 1;
      }
    }

    const stamp = new Date();
    fs.utimesSync(this.outputRoot, stamp, stamp);

    this.logger.info("Build finished", {
      built: artifacts.length - failed,
      failed,
    });
    return { built: artifacts.length - failed, failed };
  }

  /**
   * Runs `sync` at most once per `periodSeconds`. The first call always syncs.
   * Returns whether a sync happened.
   */
  syncEvery(periodSeconds: number): boolean {
    const now = this.now();
    if (this.nextSyncAt !== undefined && now < this.nextSyncAt) {
      return false;
    }
    this.sync();
    this.nextSyncAt = now + periodSeconds;
    return true;
  }

  /** True when the last build left an error on any current artifact. */
  hasErrors(): boolean {
    for (const artifact of this.artifactMap.values()) {
      if (artifact.error) {
        return true;
      }
    }
    return false;
  }

  /** Modification time of the output root, `undefined` before the first build. */
  lastBuiltAt(): Date | undefined {
    return fs.statSync(this.outputRoot, { throwIfNoEntry: false })?.mtime;
  }

  private applyOptions(attributes: Record<string, unknown>): void {
    const result = projectOptionsSchema.safeParse(attributes);
    if (!result.success) {
      throw new ConfigurationError(
        `Invalid project options:\n  • ${formatSchemaIssues(result.error.issues)}`,
        { cause: result.error }
      );
    }

    const { ignore, ...named } = result.data;
    for (const pattern of typeof ignore === "string" ? [ignore] : (ignore ?? [])) {
      this.ignore(pattern);
    }
    for (const [name, value] of Object.entries(named)) {
      if (value !== undefined) {
        this.setAttribute(name, value);
      }
    }
  }

  private configApi(): ConfigApi {
    return {
      ignore: (pattern) => this.ignore(pattern),
      helper: (name, helper) => this.helpers.register(name, helper),
      set: (name, value) => this.setAttribute(name, value),
    };
  }

  private loadConfig(): void {
    const api = this.configApi();
    this.controlFile = this.configRunner.run(api);
    this.configure?.(api);
  }

  private validateKnownEntries(): void {
    const freed: string[] = [];
    for (const entry of this.entries()) {
      if (entry.sync()) {
        continue;
      }
      this.entryMap.delete(entry.path);
      const artifact = entry.artifact;
      if (artifact && this.artifactMap.get(artifact.path) === artifact) {
        this.artifactMap.delete(artifact.path);
        freed.push(artifact.path);
      }
      this.logger.debug("Dropped entry", { file: entry.path });
    }
    if (freed.length > 0) {
      this.reassignArtifacts(freed);
    }
  }

  /** Hands each freed artifact path to the first remaining entry producing it. */
  private reassignArtifacts(freed: readonly string[]): void {
    const candidates = this.entries().sort((a, b) =>
      a.path < b.path ? -1 : a.path > b.path ? 1 : 0
    );
    for (const artifactPath of freed) {
      const heir = candidates.find((entry) => entry.artifact?.path === artifactPath);
      if (heir?.artifact) {
        this.artifactMap.set(artifactPath, heir.artifact);
        this.logger.debug("Reassigned artifact", {
          file: heir.path,
          artifact: artifactPath,
        });
      }
    }
  }

  private findNewEntries(): string[] {
    const discovered: string[] = [];
    const files = scanFiles(this.sourceRoot, {
      exclude: this.outputRoot,
      prune: (directory) => this.isPrunable(directory),
    });
    for (const relativePath of files) {
      if (this.entryMap.has(relativePath)) {
        continue;
      }
      const entry = new Entry(this, relativePath);
      if (!entry.sync()) {
        continue;
      }
      this.loadEntry(entry);
      discovered.push(relativePath);
    }
    if (discovered.length > 0) {
      this.logger.debug(`Discovered ${discovered.length} entries`, {
        paths: discovered,
      });
    }
    return discovered;
  }

  /** Ignored directories are skipped whole, except the one holding the control file. */
  private isPrunable(directory: string): boolean {
    if (this.controlFile?.path.startsWith(`${directory}/`)) {
      return false;
    }
    return this.ignoreRules.prunes(directory);
  }

  private loadEntry(entry: Entry): void {
    this.entryMap.set(entry.path, entry);
    const artifact = entry.artifact;
    if (!artifact) {
      return;
    }
    const owner = this.artifactMap.get(artifact.path);
    if (owner) {
      this.logger.warn("Artifact path already produced by another entry", {
        file: entry.path,
        artifact: artifact.path,
        owner: owner.entry.path,
      });
      return;
    }
    this.artifactMap.set(artifact.path, artifact);
  }
}

const normaliseKey = (relativePath: string): string =>
  path.posix.normalize(toPosixPath(relativePath)).replace(/^\.\//, "");
