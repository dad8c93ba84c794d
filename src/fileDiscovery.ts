import { execFileSync } from "node:child_process";
import fs from "node:fs";
import path from "node:path";
import micromatch from "micromatch";

export type DiscoveryOptions = {
  root: string;
  patterns?: string[];
  ignore?: string[];
};

const MM_OPTS = { dot: true } as const;

const SKIP_DIRS = new Set([
  ".git",
  ".vs",
  ".idea",
  ".sharpmap",
  "node_modules",
  "bin",
  "obj",
]);

export function discoverFiles(opts: DiscoveryOptions): string[] {
  const { root, patterns = [], ignore = [] } = opts;

  let files = discoverAllFiles(root).map(normalizeRelativePath);

  if (patterns.length > 0) {
    files = files.filter((f) =>
      patterns.some((p) => micromatch.isMatch(f, p, MM_OPTS)),
    );
  }

  if (ignore.length > 0) {
    files = files.filter(
      (f) => !ignore.some((p) => micromatch.isMatch(f, p, MM_OPTS)),
    );
  }

  return [...new Set(files)].sort();
}

export function normalizeRelativePath(filePath: string): string {
  return filePath.split(path.sep).join("/").replace(/^\.\//, "");
}

function discoverAllFiles(root: string): string[] {
  if (!fs.existsSync(root)) return [];

  try {
    execFileSync("git", ["-C", root, "rev-parse", "--is-inside-work-tree"], {
      stdio: "ignore",
    });
    // Paths are relative to `root` even when it is a subdirectory of the work tree.
    const out = execFileSync(
      "git",
      ["-C", root, "ls-files", "-z", "-co", "--exclude-standard", "--", "."],
      { encoding: "buffer", stdio: ["ignore", "pipe", "ignore"] },
    );
    return out
      .toString("utf-8")
      .split("\0")
      .filter(Boolean)
      .filter((f) => fs.existsSync(path.join(root, f)));
  } catch {
    return walkDirectory(root, root);
  }
}

function walkDirectory(dir: string, root: string): string[] {
  const results: string[] = [];

  for (const ent of fs.readdirSync(dir, { withFileTypes: true })) {
    if (SKIP_DIRS.has(ent.name)) continue;

    const full = path.join(dir, ent.name);
    if (ent.isDirectory()) {
      results.push(...walkDirectory(full, root));
    } else if (ent.isFile()) {
      results.push(path.relative(root, full));
    }
  }

  return results;
}
