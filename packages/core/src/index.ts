export type { BuildSummary } from "@folio/types";
export { Artifact } from "./artifact";
export {
  type ConfigApi,
  CONTROL_FILE_CANDIDATES,
  ConfigRunner,
  type ConfigRunnerOptions,
  type ControlFileFormat,
  type ControlFileLocation,
} from "./config/config-runner";
export {
  artifactPathFor,
  Entry,
  type ProjectContext,
  TEMPLATE_EXTENSIONS,
} from "./entry";
export { ConfigurationError } from "./errors";
export { HelperRegistry } from "./helper-registry";
export { IgnoreRules } from "./ignore";
export * from "./interfaces";
export { Project, type ProjectDependencies } from "./project";
export { parseFrontmatter } from "./render/frontmatter";
export {
  type RenderContext,
  type RenderOptions,
  renderTemplate,
} from "./render/handlebars-renderer";
export { relativeHref } from "./render/links";
export { isPathInside, scanFiles } from "./scanner";
