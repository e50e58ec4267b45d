import path from "node:path";

import type { ProjectAttributes } from "@folio/types";

const INDEX_PAGE = "index.html";
const HTML_EXTENSION = ".html";

/**
 * Builds the link from one artifact to another, both given relative to the
 * output root.
 *
 * - `assumeDirectoryIndex` drops a trailing `index.html`
 *   (`docs/index.html` → `docs/`, the page's own directory → `./`).
 * - `assumeContentNegotiation` drops a trailing `.html` (`about.html` → `about`).
 */
export function relativeHref(
  fromPath: string,
  targetPath: string,
  attributes: ProjectAttributes
): string {
  const fromDir = path.posix.dirname(fromPath);
  let href = path.posix.relative(fromDir, targetPath);

  if (attributes.assumeDirectoryIndex && path.posix.basename(href) === INDEX_PAGE) {
    href = href.slice(0, -INDEX_PAGE.length);
    return href.length > 0 ? href : "./";
  }

  if (attributes.assumeContentNegotiation && href.endsWith(HTML_EXTENSION)) {
    href = href.slice(0, -HTML_EXTENSION.length);
  }

  return href;
}
