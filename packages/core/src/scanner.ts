import path from "node:path";
import { globSync } from "glob";

/**
 * True when `candidate` is `directory` itself or lies somewhere below it.
 */
export function isPathInside(candidate: string, directory: string): boolean {
  const relative = path.relative(path.resolve(directory), path.resolve(candidate));
  return (
    relative === "" ||
    (!relative.startsWith(`..${path.sep}`) &&
      relative !== ".." &&
      !path.isAbsolute(relative))
  );
}

export const toPosixPath = (value: string): string =>
  value.split(path.sep).join("/");

export type ScanOptions = {
  /** Directory whose contents are never reported. */
  exclude?: string;
  /** Directories (relative POSIX paths) whose contents are skipped unread. */
  prune?: (relativeDirectory: string) => boolean;
};

/**
 * Lists every file below `root` as a sorted POSIX path relative to `root`.
 * Nothing under `options.exclude` is reported, even when it is nested
 * inside `root`, and directories rejected by `options.prune` are not read.
 */
export function scanFiles(root: string, options: ScanOptions = {}): string[] {
  const resolvedRoot = path.resolve(root);
  const exclude = options.exclude ? path.resolve(options.exclude) : undefined;
  const prune = options.prune;

  const isExcluded = (fullPath: string): boolean =>
    exclude !== undefined && isPathInside(fullPath, exclude);

  const matches = globSync("**/*", {
    cwd: resolvedRoot,
    nodir: true,
    dot: true,
    posix: true,
    ignore: {
      ignored: (candidate) => isExcluded(candidate.fullpath()),
      childrenIgnored: (candidate) =>
        isExcluded(candidate.fullpath()) ||
        (prune !== undefined &&
          candidate.relativePosix() !== "" &&
          prune(candidate.relativePosix())),
    },
  });

  return matches.map(toPosixPath).sort();
}
