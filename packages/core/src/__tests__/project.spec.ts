import {
  existsSync,
  mkdirSync,
  mkdtempSync,
  readFileSync,
  rmSync,
  writeFileSync,
} from "node:fs";
import { tmpdir } from "node:os";
import path from "node:path";
import { DEFAULT_IGNORE_PATTERNS } from "@folio/types";
import { afterEach, describe, expect, it, vi } from "vitest";
import type { ConfigApi } from "../config/config-runner";
import { ConfigurationError } from "../errors";
import { Project } from "../project";

const createdDirs: string[] = [];

function createSourceTree(files: Record<string, string> = {}): string {
  const root = mkdtempSync(path.join(tmpdir(), "folio-project-"));
  createdDirs.push(root);
  writeFiles(root, files);
  return root;
}

function writeFiles(root: string, files: Record<string, string>): void {
  for (const [file, contents] of Object.entries(files)) {
    const target = path.join(root, file);
    mkdirSync(path.dirname(target), { recursive: true });
    writeFileSync(target, contents, "utf8");
  }
}

const entryPaths = (project: Project): string[] =>
  project.entries().map((entry) => entry.path).sort();

const artifactPaths = (project: Project): string[] =>
  project.artifacts().map((artifact) => artifact.path).sort();

afterEach(() => {
  while (createdDirs.length > 0) {
    const dir = createdDirs.pop();
    if (dir) {
      rmSync(dir, { recursive: true, force: true });
    }
  }
});

describe("Project construction", () => {
  it("defaults the output root to _out under the source root", () => {
    const root = createSourceTree();

    const project = new Project(root);

    expect(project.outputRoot).toBe(path.join(project.sourceRoot, "_out"));
    expect(project.ignorePatterns).toEqual(new Set(DEFAULT_IGNORE_PATTERNS));
    expect(project.attributes).toEqual({
      assumeContentNegotiation: false,
      assumeDirectoryIndex: false,
    });
  });

  it("wipes a pre-populated output root before anything else", () => {
    const root = createSourceTree({
      "index.html": "<p>home</p>",
      "_out/stale.html": "<p>old</p>",
      "_out/nested/stale.css": "body {}",
    });

    const project = new Project(root);

    expect(existsSync(project.outputRoot)).toBe(false);
    expect(project.entries()).toEqual([]);
  });

  it("refuses an output root that is or contains the source root", () => {
    const root = createSourceTree({ "index.html": "<p>home</p>" });

    expect(() => new Project(root, root)).toThrow(ConfigurationError);
    expect(() => new Project(root, path.dirname(root))).toThrow(
      /would contain the source directory/
    );
    expect(readFileSync(path.join(root, "index.html"), "utf8")).toBe("<p>home</p>");
  });

  it("applies recognised options", () => {
    const root = createSourceTree();

    const project = new Project(root, undefined, {
      ignore: ["drafts", "*.bak"],
      assumeContentNegotiation: true,
    });

    expect(project.ignorePatterns.has("drafts")).toBe(true);
    expect(project.ignorePatterns.has("*.bak")).toBe(true);
    expect(project.assumeContentNegotiation).toBe(true);
    expect(project.assumeDirectoryIndex).toBe(false);
  });

  it("rejects unknown or mistyped options", () => {
    const root = createSourceTree();

    expect(() => new Project(root, undefined, { colour: "blue" })).toThrow(
      ConfigurationError
    );
    expect(
      () => new Project(root, undefined, { assumeDirectoryIndex: "yes" })
    ).toThrow(ConfigurationError);
  });
});

describe("Project.sync", () => {
  it("tracks qualifying files and skips default-ignored ones", () => {
    const root = createSourceTree({
      "index.html": "<p>home</p>",
      "_partial.html": "<p>partial</p>",
      "about.html": "<p>about</p>",
    });
    const project = new Project(root);

    project.sync();

    expect(entryPaths(project)).toEqual(["about.html", "index.html"]);
    expect(artifactPaths(project)).toEqual(["about.html", "index.html"]);
    expect(project.entry("_partial.html")).toBeUndefined();
  });

  it("is idempotent and keeps entry identity", () => {
    const root = createSourceTree({
      "index.html": "<p>home</p>",
      "about.html": "<p>about</p>",
    });
    const project = new Project(root);
    project.sync();
    const entry = project.entry("index.html");
    const artifact = project.artifact("index.html");

    const discovered = project.sync();

    expect(discovered).toEqual([]);
    expect(entryPaths(project)).toEqual(["about.html", "index.html"]);
    expect(project.entry("index.html")).toBe(entry);
    expect(project.artifact("index.html")).toBe(artifact);
  });

  it("drops an entry and its artifact when the file is deleted", () => {
    const root = createSourceTree({
      "index.html": "<p>home</p>",
      "about.html": "<p>about</p>",
    });
    const project = new Project(root);
    project.sync();

    rmSync(path.join(root, "about.html"));
    project.sync();

    expect(project.entry("about.html")).toBeUndefined();
    expect(project.artifact("about.html")).toBeUndefined();
    expect(entryPaths(project)).toEqual(["index.html"]);
  });

  it("adds exactly one entry for a new file", () => {
    const root = createSourceTree({ "index.html": "<p>home</p>" });
    const project = new Project(root);
    project.sync();

    writeFiles(root, { "contact.html.hbs": "<p>contact</p>" });
    const discovered = project.sync();

    expect(discovered).toEqual(["contact.html.hbs"]);
    expect(entryPaths(project)).toEqual(["contact.html.hbs", "index.html"]);
    expect(project.artifact("contact.html")?.entry).toBe(
      project.entry("contact.html.hbs")
    );
  });

  it("prunes previously discovered files matching a new ignore pattern", () => {
    const root = createSourceTree({
      "index.html": "<p>home</p>",
      "about.html": "<p>about</p>",
    });
    const project = new Project(root);
    project.sync();

    project.ignore("about.*");
    project.sync();

    expect(project.entry("about.html")).toBeUndefined();
    expect(project.artifact("about.html")).toBeUndefined();
  });

  it("never discovers files inside a nested output root", () => {
    const root = createSourceTree({ "index.html": "<p>home</p>" });
    const project = new Project(root, path.join(root, "public"));
    writeFiles(root, { "public/leftover.html": "<p>leftover</p>" });

    project.sync();
    project.build();
    project.sync();

    expect(entryPaths(project)).toEqual(["index.html"]);
    expect(project.entry("public/leftover.html")).toBeUndefined();
    expect(project.entry("public/index.html")).toBeUndefined();
  });

  it("skips files inside ignored directories", () => {
    const root = createSourceTree({
      "index.html": "<p>home</p>",
      ".git/HEAD": "ref: refs/heads/main",
      "_layouts/base.hbs": "{{{body}}}",
    });
    const project = new Project(root);

    project.sync();

    expect(entryPaths(project)).toEqual(["index.html"]);
  });

  it("normalises lookup paths and returns undefined when absent", () => {
    const root = createSourceTree({ "docs/guide.html": "<p>guide</p>" });
    const project = new Project(root);
    project.sync();

    expect(project.entry("./docs/guide.html")?.path).toBe("docs/guide.html");
    expect(project.entry("docs/missing.html")).toBeUndefined();
    expect(project.artifact("missing.html")).toBeUndefined();
  });

  it("keeps the first entry when two produce the same artifact path", () => {
    const root = createSourceTree({
      "page.html": "<p>static</p>",
      "page.html.hbs": "<p>template</p>",
    });
    const project = new Project(root);

    project.sync();

    expect(entryPaths(project)).toEqual(["page.html", "page.html.hbs"]);
    expect(artifactPaths(project)).toEqual(["page.html"]);
    expect(project.artifact("page.html")?.entry.path).toBe("page.html");
  });

  it("hands a freed artifact path to the remaining entry that produces it", () => {
    const root = createSourceTree({
      "page.html": "<p>static</p>",
      "page.html.hbs": "<p>template</p>",
    });
    const project = new Project(root);
    project.sync();

    rmSync(path.join(root, "page.html"));
    project.build();

    expect(entryPaths(project)).toEqual(["page.html.hbs"]);
    expect(artifactPaths(project)).toEqual(["page.html"]);
    expect(project.artifact("page.html")?.entry.path).toBe("page.html.hbs");
    expect(readFileSync(path.join(project.outputRoot, "page.html"), "utf8")).toBe(
      "<p>template</p>"
    );
  });
});

describe("Project control file", () => {
  it("applies a declarative control file and tracks it without an artifact", () => {
    const root = createSourceTree({
      "_folio/config.yaml":
        "ignore:\n  - drafts/**\nassumeDirectoryIndex: true\nhelpers:\n  site: Folio\n",
      "index.html.hbs": "{{site}}",
      "drafts/post.html": "<p>draft</p>",
    });
    const project = new Project(root);

    project.build();

    expect(entryPaths(project)).toEqual(["_folio/config.yaml", "index.html.hbs"]);
    expect(artifactPaths(project)).toEqual(["index.html"]);
    expect(project.entry("_folio/config.yaml")?.artifact).toBeUndefined();
    expect(project.configEntries().map((entry) => entry.path)).toEqual([
      "_folio/config.yaml",
    ]);
    expect(project.assumeDirectoryIndex).toBe(true);
    expect(readFileSync(path.join(project.outputRoot, "index.html"), "utf8")).toBe(
      "Folio"
    );
  });

  it("reruns a script every sync without duplicating state", () => {
    const root = createSourceTree({
      "_folio/config.js":
        'project.ignore("*.bak");\nproject.helper("greet", () => "hi");',
      "index.html": "<p>home</p>",
    });
    const project = new Project(root);
    const registry = project.helpers;

    project.sync();
    project.sync();

    expect(project.helpers).toBe(registry);
    expect(registry.names()).toEqual(["greet"]);
    expect(project.ignorePatterns.size).toBe(DEFAULT_IGNORE_PATTERNS.length + 1);

    writeFiles(root, {
      "_folio/config.js": 'project.helper("greet", () => "hello");',
    });
    project.sync();

    expect(registry.get("greet")?.()).toBe("hello");
  });

  it("aborts the sync on a script fault but keeps earlier mutations", () => {
    const root = createSourceTree({
      "index.html": "<p>home</p>",
      "about.html": "<p>about</p>",
    });
    const project = new Project(root);
    project.sync();

    writeFiles(root, {
      "_folio/config.js": 'project.ignore("about.html");\nthrow new Error("boom");',
    });

    expect(() => project.sync()).toThrow(ConfigurationError);
    expect(project.ignorePatterns.has("about.html")).toBe(true);
    expect(project.entry("about.html")).toBeDefined();
  });

  it("rejects unknown attributes set from a script", () => {
    const root = createSourceTree({
      "_folio/config.js": 'project.set("colour", "blue");',
    });
    const project = new Project(root);

    expect(() => project.sync()).toThrow(
      "Failed to apply _folio/config.js: Unknown project attribute: colour"
    );
  });

  it("runs the configure callback on every sync", () => {
    const root = createSourceTree({
      "index.html": "<p>home</p>",
      "about.html": "<p>about</p>",
    });
    const configure = vi.fn((api: ConfigApi) => {
      api.ignore("about.html");
    });
    const project = new Project(root, undefined, {}, { configure });

    project.sync();
    project.sync();

    expect(configure).toHaveBeenCalledTimes(2);
    expect(entryPaths(project)).toEqual(["index.html"]);
  });
});

describe("Project.build", () => {
  it("renders templates, copies other files and stamps the output root", () => {
    const root = createSourceTree({
      "index.html.hbs": "---\ntitle: Home\n---\n<h1>{{page.title}}</h1>",
      "css/site.css": "body { margin: 0; }",
    });
    const project = new Project(root);

    expect(project.lastBuiltAt()).toBeUndefined();

    const summary = project.build();

    expect(summary).toEqual({ built: 2, failed: 0 });
    expect(readFileSync(path.join(project.outputRoot, "index.html"), "utf8")).toBe(
      "<h1>Home</h1>"
    );
    expect(
      readFileSync(path.join(project.outputRoot, "css", "site.css"), "utf8")
    ).toBe("body { margin: 0; }");
    expect(project.hasErrors()).toBe(false);
    expect(project.lastBuiltAt()).toBeInstanceOf(Date);
  });

  it("records a failing artifact without stopping the others", () => {
    const root = createSourceTree({
      "good.html": "<p>good</p>",
      "bad.html.hbs": "{{explode}}",
    });
    const project = new Project(root);
    project.helpers.register("explode", () => {
      throw new Error("kaboom");
    });

    project.sync();
    expect(project.hasErrors()).toBe(false);

    const summary = project.build();

    expect(summary).toEqual({ built: 1, failed: 1 });
    expect(project.hasErrors()).toBe(true);
    expect(existsSync(path.join(project.outputRoot, "good.html"))).toBe(true);
    expect(existsSync(path.join(project.outputRoot, "bad.html"))).toBe(false);
    expect(project.artifact("bad.html")?.error?.message).toBe(
      "Render failed for bad.html.hbs: kaboom"
    );
    expect(project.artifact("good.html")?.error).toBeNull();
  });

  it("clears an artifact's error once it builds again", () => {
    const root = createSourceTree({ "page.html.hbs": "{{#if}}" });
    const project = new Project(root);

    project.build();
    expect(project.hasErrors()).toBe(true);

    writeFiles(root, { "page.html.hbs": "<p>fixed</p>" });
    project.build();

    expect(project.hasErrors()).toBe(false);
    expect(readFileSync(path.join(project.outputRoot, "page.html"), "utf8")).toBe(
      "<p>fixed</p>"
    );
  });
});

describe("Project.syncEvery", () => {
  it("syncs at most once per period", () => {
    const root = createSourceTree({ "index.html": "<p>home</p>" });
    let now = 1_000;
    const project = new Project(root, undefined, {}, { now: () => now });
    const sync = vi.spyOn(project, "sync");

    expect(project.syncEvery(60)).toBe(true);
    now = 1_030;
    expect(project.syncEvery(60)).toBe(false);
    expect(sync).toHaveBeenCalledTimes(1);

    now = 1_060;
    expect(project.syncEvery(60)).toBe(true);
    expect(sync).toHaveBeenCalledTimes(2);
  });
});
