import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { describe, it, expect } from "vitest";
import * as YAML from "yaml";
import {
  defaultConfig,
  findConfigFile,
  loadConfig,
  loadConfigFile,
  serializeConfig,
  validateConfig,
} from "../src/config.js";
import { ConfigError } from "../src/errors.js";

function tempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), "sharpmap-config-"));
}

function issuesOf(fn: () => unknown): string[] {
  try {
    fn();
  } catch (err) {
    if (err instanceof ConfigError) return err.issues;
    throw err;
  }
  return [];
}

describe("validateConfig", () => {
  it("fills every default", () => {
    expect(defaultConfig()).toEqual({
      projectName: "Project",
      sourceRoot: ".",
      includePatterns: ["**/*.cs"],
      excludePatterns: ["**/bin/**", "**/obj/**"],
      tokenBudgets: { l1: 1000, l2: 2000, l3: 3000 },
      importanceBoostRules: [],
      priorityModules: [],
      categoryRules: [],
      dampingFactor: 0.85,
      maxIterations: 100,
      tolerance: 1e-6,
      entryPointLimit: 20,
      maxMembersPerSymbol: 12,
      maxEdgesPerGroup: 8,
      outputDir: ".sharpmap/output",
    });
  });

  it("merges partial budgets with defaults", () => {
    const config = validateConfig({ project_name: "Demo", token_budgets: { l2: 500 } });
    expect(config.projectName).toBe("Demo");
    expect(config.tokenBudgets).toEqual({ l1: 1000, l2: 500, l3: 3000 });
  });

  it("accepts both category rule forms", () => {
    const config = validateConfig({
      category_rules: [{ "Gameplay/": "Gameplay" }, { label: "Tests", patterns: ["**/*Tests.cs"] }],
    });
    expect(config.categoryRules).toEqual([
      { label: "Gameplay", patterns: ["Gameplay/"] },
      { label: "Tests", patterns: ["**/*Tests.cs"] },
    ]);
  });

  it("rejects a damping factor outside [0, 1)", () => {
    expect(() => validateConfig({ damping_factor: 1 })).toThrow(ConfigError);
    expect(issuesOf(() => validateConfig({ damping_factor: -0.1 }))[0]).toMatch(/^damping_factor: /);
    expect(validateConfig({ damping_factor: 0 }).dampingFactor).toBe(0);
  });

  it("rejects negative budgets", () => {
    const issues = issuesOf(() => validateConfig({ token_budgets: { l1: -5 } }));
    expect(issues).toHaveLength(1);
    expect(issues[0]).toMatch(/^token_budgets\.l1: /);
  });

  it("rejects non-positive boosts", () => {
    const issues = issuesOf(() =>
      validateConfig({ importance_boost_rules: [{ match: "suffix", pattern: "Manager", boost: 0 }] }),
    );
    expect(issues[0]).toMatch(/^importance_boost_rules\.0\.boost: /);
  });

  it("rejects an infinite boost", () => {
    const issues = issuesOf(() =>
      validateConfig({ importance_boost_rules: [{ match: "prefix", pattern: "S", boost: Infinity }] }),
    );
    expect(issues).toHaveLength(1);
    expect(issues[0]).toMatch(/^importance_boost_rules\.0\.boost: /);
  });

  it("writes settings that read back unchanged", () => {
    const config = validateConfig({
      project_name: "Demo",
      importance_boost_rules: [{ match: "prefix", pattern: "S", boost: 2 }],
      priority_modules: ["Core"],
      category_rules: [{ label: "Core", patterns: ["Core"] }],
    });
    expect(validateConfig(YAML.parse(serializeConfig(config)))).toEqual(config);
  });

  it("reads priority modules and rejects empty names", () => {
    expect(validateConfig({ priority_modules: ["Combat", "UI"] }).priorityModules).toEqual(["Combat", "UI"]);
    expect(issuesOf(() => validateConfig({ priority_modules: [""] }))[0]).toMatch(/^priority_modules\.0: /);
  });
});

describe("config files", () => {
  it("finds and loads YAML under .sharpmap", () => {
    const dir = tempDir();
    fs.mkdirSync(path.join(dir, ".sharpmap"));
    fs.writeFileSync(
      path.join(dir, ".sharpmap", "config.yaml"),
      "project_name: Arena\ntoken_budgets:\n  l1: 400\n",
    );

    const loaded = loadConfig(dir);
    expect(loaded.path).toBe(path.join(dir, ".sharpmap", "config.yaml"));
    expect(loaded.config.projectName).toBe("Arena");
    expect(loaded.config.tokenBudgets.l1).toBe(400);

    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("falls back to defaults without a file", () => {
    const dir = tempDir();
    expect(findConfigFile(dir)).toBeNull();
    expect(loadConfig(dir)).toEqual({ config: defaultConfig(), path: null });
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("reports malformed JSON as a config error", () => {
    const dir = tempDir();
    const file = path.join(dir, "broken.json");
    fs.writeFileSync(file, "{ not json");

    expect(() => loadConfigFile(file)).toThrow(ConfigError);
    fs.rmSync(dir, { recursive: true, force: true });
  });
});
