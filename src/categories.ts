import micromatch from "micromatch";
import type { CategoryRule } from "./types.js";

export const ROOT_MODULE = "(root)";
export const DEFAULT_CATEGORY = "Other";

const MM_OPTS = { dot: true, nocase: true } as const;
const GLOB_CHARS = /[*?[\]{}()!]/;

export type FileClassification = {
  modulePath: string;
  module: string;
  category: string;
};

function directorySegments(relPath: string): string[] {
  const parts = relPath.split("/").filter(Boolean);
  parts.pop();
  return parts;
}

export function modulePathFor(relPath: string): string {
  return directorySegments(relPath).join(".");
}

export function moduleFor(relPath: string): string {
  return directorySegments(relPath)[0] ?? ROOT_MODULE;
}

function matchesPattern(pattern: string, relPath: string, module: string): boolean {
  if (GLOB_CHARS.test(pattern)) {
    return micromatch.isMatch(relPath, pattern, MM_OPTS);
  }
  const needle = pattern.toLowerCase();
  if (needle.includes("/")) {
    return relPath.toLowerCase().startsWith(needle);
  }
  return module !== ROOT_MODULE && module.toLowerCase().startsWith(needle);
}

export function categorize(
  relPath: string,
  module: string,
  rules: CategoryRule[],
): string {
  for (const rule of rules) {
    if (rule.patterns.some((p) => matchesPattern(p, relPath, module))) {
      return rule.label;
    }
  }
  return DEFAULT_CATEGORY;
}

export function classifyFile(
  relPath: string,
  rules: CategoryRule[],
): FileClassification {
  const module = moduleFor(relPath);
  return {
    modulePath: modulePathFor(relPath),
    module,
    category: categorize(relPath, module, rules),
  };
}
