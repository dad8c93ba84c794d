import type { ModuleSummary } from "./types.js";
import { isTypeKind, type SymbolTable } from "./symbolTable.js";

export const TOP_MODULE_LIMIT = 10;

export type ModuleCount = {
  name: string;
  count: number;
};

export type CategorySummary = {
  label: string;
  count: number;
  modules: ModuleCount[];
};

export type ProjectStats = {
  symbolCount: number;
  moduleCount: number;
  bySymbolKind: Record<string, number>;
  categories: CategorySummary[];
  /** Modules with the most type declarations. */
  topModules: ModuleSummary[];
};

function byCountThenName(a: [string, number], b: [string, number]): number {
  return b[1] - a[1] || (a[0] < b[0] ? -1 : a[0] > b[0] ? 1 : 0);
}

export function computeStats(table: SymbolTable): ProjectStats {
  const bySymbolKind: Record<string, number> = Object.create(null);
  const categories = new Map<string, Map<string, number>>();
  const modules = new Set<string>();
  const typesPerModule = new Map<string, number>();

  for (const sym of table.all()) {
    bySymbolKind[sym.kind] = (bySymbolKind[sym.kind] ?? 0) + 1;
    modules.add(sym.module);
    if (isTypeKind(sym.kind)) {
      typesPerModule.set(sym.module, (typesPerModule.get(sym.module) ?? 0) + 1);
    }

    let perModule = categories.get(sym.category);
    if (!perModule) {
      perModule = new Map();
      categories.set(sym.category, perModule);
    }
    perModule.set(sym.module, (perModule.get(sym.module) ?? 0) + 1);
  }

  const summaries: CategorySummary[] = [...categories.entries()]
    .map(([label, perModule]): [string, ModuleCount[]] => [
      label,
      [...perModule.entries()].sort(byCountThenName).map(([name, count]) => ({ name, count })),
    ])
    .map(([label, moduleCounts]) => ({
      label,
      count: moduleCounts.reduce((sum, m) => sum + m.count, 0),
      modules: moduleCounts,
    }))
    .sort((a, b) => byCountThenName([a.label, a.count], [b.label, b.count]));

  return {
    symbolCount: table.size,
    moduleCount: modules.size,
    bySymbolKind,
    categories: summaries,
    topModules: [...typesPerModule.entries()]
      .sort(byCountThenName)
      .slice(0, TOP_MODULE_LIMIT)
      .map(([name, types]) => ({ name, types })),
  };
}
