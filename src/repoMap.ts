import fs from "node:fs";
import path from "node:path";
import type {
  CountTokens,
  FileSymbols,
  FileWarning,
  LayerDocuments,
  RankResult,
  ReferenceGraph,
  RepoMapConfig,
  RepoMapMeta,
  SourceFile,
} from "./types.js";
import { assertValidConfig } from "./config.js";
import { errorMessage } from "./errors.js";
import { classifyFile } from "./categories.js";
import { discoverFiles } from "./fileDiscovery.js";
import { canExtractSymbols, detectLanguage } from "./languages.js";
import { parseSource } from "./parser.js";
import { extractFileSymbols, mergeFileSymbols } from "./symbols.js";
import type { SymbolTable } from "./symbolTable.js";
import { resolveReferences } from "./refs/resolver.js";
import { rankSymbols } from "./ranker.js";
import { computeStats } from "./stats.js";
import { renderLayers } from "./render.js";
import { estimateTokens } from "./tokens.js";

export type RepoMapOptions = {
  countTokens?: CountTokens;
  onWarning?: (warning: FileWarning) => void;
  onProgress?: (message: string) => void;
  now?: () => Date;
};

export type RepoMapResult = LayerDocuments & {
  meta: RepoMapMeta;
  ranking: RankResult;
  table: SymbolTable;
  graph: ReferenceGraph;
  warnings: FileWarning[];
};

export type LoadOptions = {
  baseDir?: string;
  onWarning?: (warning: FileWarning) => void;
};

export type LoadedSources = {
  files: SourceFile[];
  warnings: FileWarning[];
};

function printWarning(warning: FileWarning): void {
  console.warn(`warning: ${warning.path}: ${warning.message}`);
}

// Strict UTF-8 (a leading BOM is dropped), then GBK; latin1 always decodes.
const FALLBACK_ENCODINGS = ["gbk"];

type Decoded = {
  text: string;
  encoding: string;
};

function strictDecoder(label: string): TextDecoder | undefined {
  try {
    return new TextDecoder(label, { fatal: true });
  } catch (err) {
    // Node builds without full ICU only know the Unicode encodings.
    if (err instanceof RangeError) return undefined;
    throw err;
  }
}

function tryDecode(bytes: Uint8Array, label: string): string | undefined {
  const decoder = strictDecoder(label);
  if (!decoder) return undefined;
  try {
    return decoder.decode(bytes);
  } catch (err) {
    if (err instanceof TypeError) return undefined;
    throw err;
  }
}

export function decodeSource(bytes: Buffer): Decoded {
  const utf8 = tryDecode(bytes, "utf-8");
  if (utf8 !== undefined) return { text: utf8, encoding: "utf-8" };
  for (const label of FALLBACK_ENCODINGS) {
    const text = tryDecode(bytes, label);
    if (text !== undefined) return { text, encoding: label };
  }
  return { text: bytes.toString("latin1"), encoding: "latin1" };
}

function comparePaths(a: SourceFile, b: SourceFile): number {
  return a.path < b.path ? -1 : a.path > b.path ? 1 : 0;
}

export function loadSourceFiles(config: RepoMapConfig, options: LoadOptions = {}): LoadedSources {
  const root = path.resolve(options.baseDir ?? process.cwd(), config.sourceRoot);
  const warn = options.onWarning ?? printWarning;
  const files: SourceFile[] = [];
  const warnings: FileWarning[] = [];

  const relPaths = discoverFiles({
    root,
    patterns: config.includePatterns,
    ignore: config.excludePatterns,
  });

  for (const relPath of relPaths) {
    let bytes: Buffer;
    try {
      bytes = fs.readFileSync(path.join(root, relPath));
    } catch (err) {
      const warning = { path: relPath, message: `unreadable: ${errorMessage(err)}` };
      warnings.push(warning);
      warn(warning);
      continue;
    }

    const { text, encoding } = decodeSource(bytes);
    if (encoding !== "utf-8") {
      const warning = { path: relPath, message: `not valid UTF-8, decoded as ${encoding}` };
      warnings.push(warning);
      warn(warning);
    }
    files.push({ path: relPath, text });
  }

  return { files, warnings };
}

export function generateRepoMap(
  files: readonly SourceFile[],
  config: RepoMapConfig,
  options: RepoMapOptions = {},
): RepoMapResult {
  const cfg = assertValidConfig(config);
  const warnings: FileWarning[] = [];
  const progress = options.onProgress ?? (() => {});
  const warn = (warning: FileWarning): void => {
    warnings.push(warning);
    (options.onWarning ?? printWarning)(warning);
  };

  const ordered = [...files].sort(comparePaths);
  const extracted: FileSymbols[] = [];
  let skippedFiles = 0;
  let previousPath: string | null = null;

  for (const file of ordered) {
    if (file.path === previousPath) {
      warn({ path: file.path, message: "duplicate path, keeping the first copy" });
      skippedFiles++;
      continue;
    }
    previousPath = file.path;

    if (!canExtractSymbols(detectLanguage(file.path))) {
      skippedFiles++;
      continue;
    }

    try {
      const parsed = parseSource(file.path, file.text);
      if (parsed.errorCount > 0) {
        warn({
          path: file.path,
          message: `${parsed.errorCount} malformed region(s) skipped`,
        });
      }
      extracted.push(extractFileSymbols(parsed, classifyFile(file.path, cfg.categoryRules)));
    } catch (err) {
      warn({ path: file.path, message: `parse failed: ${errorMessage(err)}` });
      skippedFiles++;
    }
  }
  progress(`parsed ${extracted.length} files (${skippedFiles} skipped)`);

  const { table, references } = mergeFileSymbols(extracted);
  progress(`extracted ${table.size} symbols`);

  const graph = resolveReferences(table, references);
  progress(`resolved ${graph.edges.length} edges (${graph.unresolved} unresolved references)`);

  const ranking = rankSymbols(table, graph, {
    dampingFactor: cfg.dampingFactor,
    maxIterations: cfg.maxIterations,
    tolerance: cfg.tolerance,
    boostRules: cfg.importanceBoostRules,
  });
  progress(
    ranking.converged
      ? `ranking converged after ${ranking.iterations} iterations`
      : `ranking stopped at ${ranking.iterations} iterations without converging`,
  );

  const stats = computeStats(table);
  const { documents, tokens } = renderLayers(
    { table, graph, ranking: ranking.ranked, stats },
    {
      projectName: cfg.projectName,
      budgets: cfg.tokenBudgets,
      entryPointLimit: cfg.entryPointLimit,
      maxMembersPerSymbol: cfg.maxMembersPerSymbol,
      maxEdgesPerGroup: cfg.maxEdgesPerGroup,
      priorityModules: cfg.priorityModules,
      countTokens: options.countTokens ?? estimateTokens,
    },
  );

  const meta: RepoMapMeta = {
    projectName: cfg.projectName,
    symbolCount: stats.symbolCount,
    moduleCount: stats.moduleCount,
    fileCount: extracted.length,
    skippedFiles,
    edgeCount: graph.edges.length,
    unresolvedReferences: graph.unresolved,
    converged: ranking.converged,
    iterationsUsed: ranking.iterations,
    generatedAt: (options.now ?? (() => new Date()))().toISOString(),
    tokens,
    bySymbolKind: stats.bySymbolKind,
    topModules: stats.topModules,
  };

  return { ...documents, meta, ranking, table, graph, warnings };
}
