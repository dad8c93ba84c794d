import fs from "node:fs";
import path from "node:path";
import * as YAML from "yaml";
import { z } from "zod";
import { ConfigError, errorMessage } from "./errors.js";
import type { CategoryRule, RepoMapConfig } from "./types.js";

export const CONFIG_DIR = ".sharpmap";
export const CONFIG_FILE_NAMES = ["config.yaml", "config.yml", "config.json"];

const budgetSchema = z.number().int().nonnegative();

const boostRuleSchema = z.object({
  match: z.enum(["prefix", "suffix", "contains"]),
  pattern: z.string().min(1),
  boost: z.number().positive().finite(),
});

const labelledRuleSchema = z.object({
  label: z.string().min(1),
  patterns: z.array(z.string().min(1)).min(1),
});

const categoryRuleSchema = z.union([
  labelledRuleSchema,
  // shorthand: { "Gameplay/": "Gameplay" }
  z.record(z.string().min(1), z.string().min(1)),
]);

export const configSchema = z.object({
  project_name: z.string().min(1).default("Project"),
  source_root: z.string().default("."),
  include_patterns: z.array(z.string()).default(["**/*.cs"]),
  exclude_patterns: z.array(z.string()).default(["**/bin/**", "**/obj/**"]),
  token_budgets: z
    .object({
      l1: budgetSchema.default(1000),
      l2: budgetSchema.default(2000),
      l3: budgetSchema.default(3000),
    })
    .default({}),
  importance_boost_rules: z.array(boostRuleSchema).default([]),
  priority_modules: z.array(z.string().min(1)).default([]),
  category_rules: z.array(categoryRuleSchema).default([]),
  damping_factor: z.number().min(0).lt(1).default(0.85),
  max_iterations: z.number().int().positive().default(100),
  tolerance: z.number().positive().default(1e-6),
  entry_point_limit: z.number().int().nonnegative().default(20),
  max_members_per_symbol: z.number().int().nonnegative().default(12),
  max_edges_per_group: z.number().int().positive().default(8),
  output_dir: z.string().min(1).default(`${CONFIG_DIR}/output`),
});

export type RawConfig = z.input<typeof configSchema>;
type ParsedConfig = z.output<typeof configSchema>;

type CategoryRuleEntry = ParsedConfig["category_rules"][number];

function isLabelledRule(entry: CategoryRuleEntry): entry is z.output<typeof labelledRuleSchema> {
  return Array.isArray(entry.patterns);
}

function toCategoryRules(entries: ParsedConfig["category_rules"]): CategoryRule[] {
  const rules: CategoryRule[] = [];
  for (const entry of entries) {
    if (isLabelledRule(entry)) {
      rules.push({ label: entry.label, patterns: [...entry.patterns] });
      continue;
    }
    for (const [pattern, label] of Object.entries(entry)) {
      rules.push({ label, patterns: [pattern] });
    }
  }
  return rules;
}

function fromParsed(parsed: ParsedConfig): RepoMapConfig {
  return {
    projectName: parsed.project_name,
    sourceRoot: parsed.source_root,
    includePatterns: parsed.include_patterns,
    excludePatterns: parsed.exclude_patterns,
    tokenBudgets: { ...parsed.token_budgets },
    importanceBoostRules: parsed.importance_boost_rules.map((rule) => ({ ...rule })),
    priorityModules: [...parsed.priority_modules],
    categoryRules: toCategoryRules(parsed.category_rules),
    dampingFactor: parsed.damping_factor,
    maxIterations: parsed.max_iterations,
    tolerance: parsed.tolerance,
    entryPointLimit: parsed.entry_point_limit,
    maxMembersPerSymbol: parsed.max_members_per_symbol,
    maxEdgesPerGroup: parsed.max_edges_per_group,
    outputDir: parsed.output_dir,
  };
}

export function toRawConfig(config: RepoMapConfig): RawConfig {
  return {
    project_name: config.projectName,
    source_root: config.sourceRoot,
    include_patterns: config.includePatterns,
    exclude_patterns: config.excludePatterns,
    token_budgets: { ...config.tokenBudgets },
    importance_boost_rules: config.importanceBoostRules,
    priority_modules: config.priorityModules,
    category_rules: config.categoryRules,
    damping_factor: config.dampingFactor,
    max_iterations: config.maxIterations,
    tolerance: config.tolerance,
    entry_point_limit: config.entryPointLimit,
    max_members_per_symbol: config.maxMembersPerSymbol,
    max_edges_per_group: config.maxEdgesPerGroup,
    output_dir: config.outputDir,
  };
}

/** Parses snake_case settings, filling defaults. Throws ConfigError on any issue. */
export function validateConfig(raw: unknown): RepoMapConfig {
  const result = configSchema.safeParse(raw ?? {});
  if (!result.success) {
    throw new ConfigError(
      result.error.errors.map((e) => `${e.path.join(".") || "(root)"}: ${e.message}`),
    );
  }
  return fromParsed(result.data);
}

export function assertValidConfig(config: RepoMapConfig): RepoMapConfig {
  return validateConfig(toRawConfig(config));
}

export function defaultConfig(): RepoMapConfig {
  return validateConfig({});
}

export function loadConfigFile(filePath: string): RepoMapConfig {
  let content: string;
  try {
    content = fs.readFileSync(filePath, "utf8");
  } catch (err) {
    throw new ConfigError([`${filePath}: ${errorMessage(err)}`]);
  }

  let raw: unknown;
  try {
    const ext = path.extname(filePath).toLowerCase();
    raw = ext === ".yaml" || ext === ".yml" ? YAML.parse(content) : JSON.parse(content);
  } catch (err) {
    throw new ConfigError([`${filePath}: ${errorMessage(err)}`]);
  }
  return validateConfig(raw);
}

export function findConfigFile(root: string): string | null {
  for (const name of CONFIG_FILE_NAMES) {
    const candidate = path.join(root, CONFIG_DIR, name);
    if (fs.existsSync(candidate)) return candidate;
  }
  return null;
}

export type LoadedConfig = {
  config: RepoMapConfig;
  path: string | null;
};

export function loadConfig(root: string, explicitPath?: string): LoadedConfig {
  const configPath = explicitPath ? path.resolve(root, explicitPath) : findConfigFile(root);
  if (!configPath) return { config: defaultConfig(), path: null };
  return { config: loadConfigFile(configPath), path: configPath };
}

export function serializeConfig(config: RepoMapConfig): string {
  return YAML.stringify(toRawConfig(config));
}
