export { generateRepoMap, loadSourceFiles, decodeSource } from "./repoMap.js";
export type { RepoMapOptions, RepoMapResult, LoadOptions, LoadedSources } from "./repoMap.js";
export { parseSource } from "./parser.js";
export { extractFileSymbols, mergeFileSymbols } from "./symbols.js";
export type { MergedSymbols } from "./symbols.js";
export { SymbolTable, symbolId, isTypeKind } from "./symbolTable.js";
export { resolveReferences, resolveReference } from "./refs/resolver.js";
export { rankSymbols, computePageRank, computeBoost } from "./ranker.js";
export type { RankOptions } from "./ranker.js";
export {
  renderLayers,
  renderSkeleton,
  renderSignatures,
  renderRelations,
  formatMemberSignature,
  formatTypeSignature,
} from "./render.js";
export type { RenderOptions, RenderInput, RenderedLayers } from "./render.js";
export { BudgetedDocument, estimateTokens } from "./tokens.js";
export { computeStats } from "./stats.js";
export type { ProjectStats, CategorySummary } from "./stats.js";
export { classifyFile, categorize } from "./categories.js";
export { discoverFiles } from "./fileDiscovery.js";
export { detectLanguage } from "./languages.js";
export {
  validateConfig,
  defaultConfig,
  loadConfig,
  loadConfigFile,
  findConfigFile,
  serializeConfig,
} from "./config.js";
export { ConfigError } from "./errors.js";
export { writeRepoMap, readMeta, toMetaRecord, OUTPUT_FILES } from "./output.js";
export type { MetaRecord } from "./output.js";

export type {
  BoostRule,
  CategoryRule,
  CodeSymbol,
  CountTokens,
  EdgeKind,
  FileWarning,
  LayerDocuments,
  MemberSignature,
  ModuleSummary,
  RankResult,
  RankedSymbol,
  ReferenceEdge,
  ReferenceGraph,
  RepoMapConfig,
  RepoMapMeta,
  SourceFile,
  SymbolKind,
  TokenBudgets,
} from "./types.js";
