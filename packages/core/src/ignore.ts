import picomatch from "picomatch";

type Matcher = (candidate: string) => boolean;

/**
 * Set of ignore globs. A relative path is ignored when the whole path, or any
 * one of its segments, matches a pattern, so `.git` prunes everything below a
 * `.git` directory and `_*` catches `_layouts/page.hbs`.
 */
export class IgnoreRules {
  private readonly matchers = new Map<string, Matcher>();

  constructor(patterns: Iterable<string> = []) {
    for (const pattern of patterns) {
      this.add(pattern);
    }
  }

  /** Returns `false` when the pattern was already present. */
  add(pattern: string): boolean {
    if (this.matchers.has(pattern)) {
      return false;
    }
    this.matchers.set(pattern, picomatch(pattern, { dot: true }));
    return true;
  }

  get patterns(): ReadonlySet<string> {
    return new Set(this.matchers.keys());
  }

  matches(relativePath: string): boolean {
    if (this.matchers.size === 0) {
      return false;
    }
    const segments = relativePath.split("/").filter(Boolean);
    const candidates = [relativePath, ...segments];
    for (const matcher of this.matchers.values()) {
      if (candidates.some((candidate) => matcher(candidate))) {
        return true;
      }
    }
    return false;
  }

  /**
   * True when every path below `relativeDirectory` is ignored, which holds
   * once one of its segments matches a pattern.
   */
  prunes(relativeDirectory: string): boolean {
    const segments = relativeDirectory.split("/").filter(Boolean);
    for (const matcher of this.matchers.values()) {
      if (segments.some((segment) => matcher(segment))) {
        return true;
      }
    }
    return false;
  }
}
