/**
 * Shared contracts for the Folio toolchain.
 *
 * The orchestrator in `@folio/core` and the CLI both depend on these shapes,
 * so they live apart from any implementation.
 */

import { z } from "zod";

export type FolioVersionTag =
  | `${number}.${number}.${number}`
  | `${number}.${number}.${number}-${string}`;

export const FOLIO_VERSION_TAG: FolioVersionTag = "0.1.0";

/** Directory under the source root that holds the control file. */
export const CONTROL_DIRECTORY = "_folio";

/** Default output directory, relative to the source root. */
export const DEFAULT_OUTPUT_DIRECTORY = "_out";

export const DEFAULT_IGNORE_PATTERNS: readonly string[] = Object.freeze([
  "_*",
  ".git",
  ".gitignore",
  ".svn",
  ".sass-cache",
  "*~",
  "*.sw[op]",
]);

/**
 * A generated output file.
 */
export type ArtifactContract = {
  /** Path relative to the output root, POSIX separators. */
  readonly path: string;
  /** Failure captured by the most recent build, `null` when it succeeded. */
  readonly error: Error | null;
  build(): void;
};

/**
 * A tracked source file.
 */
export type EntryContract<TArtifact extends ArtifactContract = ArtifactContract> = {
  /** Path relative to the source root, POSIX separators. */
  readonly path: string;
  readonly artifact: TArtifact | undefined;
  /**
   * Re-checks the entry against the filesystem and the current ignore rules.
   * Returns `false` when the entry no longer qualifies.
   */
  sync(): boolean;
};

export type BuildSummary = {
  readonly built: number;
  readonly failed: number;
};

const patternSchema = z.string().min(1);

/** Attributes that may be assigned by name, at construction or from config. */
export const projectAttributeSchemas = {
  assumeContentNegotiation: z.boolean(),
  assumeDirectoryIndex: z.boolean(),
} as const;

export type ProjectAttributeName = keyof typeof projectAttributeSchemas;

export type ProjectAttributes = {
  [K in ProjectAttributeName]: z.infer<(typeof projectAttributeSchemas)[K]>;
};

export const PROJECT_ATTRIBUTE_NAMES = [
  "assumeContentNegotiation",
  "assumeDirectoryIndex",
] as const satisfies readonly ProjectAttributeName[];

export const isProjectAttributeName = (
  name: string
): name is ProjectAttributeName => Object.hasOwn(projectAttributeSchemas, name);

/**
 * Options accepted by the Project constructor. Unknown keys are rejected.
 */
export const projectOptionsSchema = z
  .object({
    ignore: z.union([patternSchema, z.array(patternSchema)]).optional(),
    assumeContentNegotiation:
      projectAttributeSchemas.assumeContentNegotiation.optional(),
    assumeDirectoryIndex: projectAttributeSchemas.assumeDirectoryIndex.optional(),
  })
  .strict();

export type ProjectOptions = z.infer<typeof projectOptionsSchema>;

/**
 * Declarative control file (`_folio/config.{yaml,yml,json,jsonc,toml}`).
 * Declarative helpers map a helper name to the constant string it returns.
 */
export const controlFileSchema = z
  .object({
    ignore: z.array(patternSchema).optional(),
    assumeContentNegotiation:
      projectAttributeSchemas.assumeContentNegotiation.optional(),
    assumeDirectoryIndex: projectAttributeSchemas.assumeDirectoryIndex.optional(),
    helpers: z.record(z.string()).optional(),
  })
  .strict();

export type ControlFile = z.infer<typeof controlFileSchema>;

/**
 * Formats zod issues as a bullet list, one line per issue.
 */
export const formatSchemaIssues = (issues: readonly z.ZodIssue[]): string =>
  issues
    .map((issue) => {
      const pathLabel = issue.path
        .map((segment, index) =>
          typeof segment === "number"
            ? `[${segment}]`
            : index === 0
              ? segment
              : `.${segment}`
        )
        .join("");
      return `${pathLabel || "config"} ${issue.message}`;
    })
    .join("\n  • ");
