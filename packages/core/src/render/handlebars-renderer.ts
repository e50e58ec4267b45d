import type { ProjectAttributes } from "@folio/types";
import Handlebars from "handlebars";
import type { HelperRegistry } from "../helper-registry";
import { parseFrontmatter } from "./frontmatter";
import { relativeHref } from "./links";

/**
 * Runtime context passed to templates while rendering.
 */
export type RenderContext = {
  /** Frontmatter of the source template. */
  page: Record<string, unknown>;
  /** Artifact path relative to the output root. */
  path: string;
  project: ProjectAttributes;
};

export type RenderOptions = {
  /** Source path, used in error messages. */
  sourcePath: string;
  artifactPath: string;
  helpers: HelperRegistry;
  attributes: ProjectAttributes;
  strict?: boolean;
  noEscape?: boolean;
};

/**
 * Renders a Handlebars template with the project's helpers. A fresh runtime is
 * created per render so helpers registered since the last sync are picked up
 * and nothing leaks between artifacts.
 */
export function renderTemplate(content: string, options: RenderOptions): string {
  try {
    const { frontmatter, body } = parseFrontmatter(content);
    const runtime = createRuntime(options);
    const template = runtime.compile(body, {
      noEscape: options.noEscape ?? false,
      strict: options.strict ?? false,
    });
    const context: RenderContext = {
      page: frontmatter,
      path: options.artifactPath,
      project: { ...options.attributes },
    };
    return template(context);
  } catch (error) {
    const originalError = error instanceof Error ? error : new Error(String(error));
    throw new Error(
      `Render failed for ${options.sourcePath}: ${originalError.message}`,
      { cause: originalError }
    );
  }
}

function createRuntime(options: RenderOptions): typeof Handlebars {
  const runtime = Handlebars.create();
  registerCoreHelpers(runtime, options);

  for (const [name, helper] of options.helpers.entries()) {
    runtime.registerHelper(name, helper);
  }

  return runtime;
}

function registerCoreHelpers(
  runtime: typeof Handlebars,
  options: RenderOptions
): void {
  runtime.registerHelper("href", (target: unknown) => {
    if (typeof target !== "string" || target.length === 0) {
      throw new Error("href expects a non-empty path");
    }
    return relativeHref(options.artifactPath, target, options.attributes);
  });
}
