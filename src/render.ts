import type {
  CodeSymbol,
  CountTokens,
  EdgeKind,
  LayerDocuments,
  MemberSignature,
  RankedSymbol,
  ReferenceGraph,
  TokenBudgets,
} from "./types.js";
import type { SymbolTable } from "./symbolTable.js";
import { isTypeKind } from "./symbolTable.js";
import { computeStats, type ProjectStats } from "./stats.js";
import { BudgetedDocument, estimateTokens } from "./tokens.js";
import { ROOT_MODULE } from "./categories.js";

export type RenderOptions = {
  projectName: string;
  budgets: TokenBudgets;
  entryPointLimit: number;
  maxMembersPerSymbol: number;
  maxEdgesPerGroup: number;
  /** Modules flagged `[Active]` in the skeleton. */
  priorityModules?: readonly string[];
  countTokens?: CountTokens;
};

export type RenderInput = {
  table: SymbolTable;
  graph: ReferenceGraph;
  ranking: readonly RankedSymbol[];
  stats?: ProjectStats;
};

export type RenderedLayers = {
  documents: LayerDocuments;
  tokens: TokenBudgets;
};

const MAX_MODULES_PER_CATEGORY = 10;
const HIGHLY_REFERENCED = 3;
const KEY_METHOD_LIMIT = 3;

const OUTGOING_LABELS: Record<EdgeKind, string> = {
  calls: "calls",
  uses: "uses",
  inherits: "inherits",
  implements: "implements",
};

const INCOMING_LABELS: Record<EdgeKind, string> = {
  calls: "called by",
  uses: "used by",
  inherits: "inherited by",
  implements: "implemented by",
};

const GROUP_ORDER: EdgeKind[] = ["calls", "uses", "inherits", "implements"];

function joinParts(...parts: string[]): string {
  return parts.filter(Boolean).join(" ");
}

function block(lines: string[]): string {
  return `\n${lines.join("\n")}\n`;
}

function formatScore(score: number): string {
  return score.toFixed(4);
}

export function formatMemberSignature(member: MemberSignature): string {
  const mods = member.modifiers.join(" ");
  const params = `(${member.parameters.join(", ")})`;
  switch (member.kind) {
    case "method":
      return joinParts(mods, member.returnType, `${member.name}${params}`);
    case "constructor":
      return joinParts(mods, `${member.name}${params}`);
    case "property": {
      const accessors = member.accessors?.length
        ? `{ ${member.accessors.map((a) => `${a};`).join(" ")} }`
        : "";
      return joinParts(mods, member.returnType, member.name, accessors);
    }
    case "field":
      return joinParts(mods, member.returnType, member.name);
    case "enum_member":
      return member.name;
  }
}

export function formatTypeSignature(sym: CodeSymbol): string {
  const head = joinParts(sym.modifiers.join(" "), sym.kind, `${sym.name}${sym.typeParameters}`);
  return sym.bases.length > 0 ? `${head} : ${sym.bases.join(", ")}` : head;
}

function incomingReferenceCounts(table: SymbolTable, graph: ReferenceGraph): number[] {
  const counts = new Array<number>(table.size).fill(0);
  for (const edge of graph.edges) {
    counts[edge.to] += edge.multiplicity;
  }
  return counts;
}

// References to a type's members count towards the type.
function typeReferenceCount(table: SymbolTable, counts: number[], sym: CodeSymbol): number {
  let total = counts[sym.index];
  for (const member of table.membersOf(sym.id)) {
    if (!isTypeKind(table.get(member).kind)) total += counts[member];
  }
  return total;
}

function keyMethods(sym: CodeSymbol): string {
  const names = [
    ...new Set(sym.members.filter((m) => m.kind === "method").map((m) => m.name)),
  ];
  return names.length > 0 ? names.slice(0, KEY_METHOD_LIMIT).join(", ") : "-";
}

export function renderSkeleton(input: RenderInput, options: RenderOptions): BudgetedDocument {
  const { table, graph, ranking } = input;
  const stats = input.stats ?? computeStats(table);
  const header = [
    `# ${options.projectName}: Skeleton (L1)`,
    "",
    `${stats.symbolCount} symbols across ${stats.moduleCount} modules`,
  ];
  const doc = new BudgetedDocument(
    `${header.join("\n")}\n`,
    options.budgets.l1,
    options.countTokens ?? estimateTokens,
  );

  const priority = new Set(options.priorityModules ?? []);
  for (const category of stats.categories) {
    const lines = [`## ${category.label} (${category.count} symbols)`];
    for (const mod of category.modules.slice(0, MAX_MODULES_PER_CATEGORY)) {
      lines.push(`- ${mod.name}: ${mod.count}${priority.has(mod.name) ? " [Active]" : ""}`);
    }
    const hidden = category.modules.length - MAX_MODULES_PER_CATEGORY;
    if (hidden > 0) lines.push(`- +${hidden} more modules`);
    if (!doc.tryAppend(block(lines))) return doc;
  }

  const counts = incomingReferenceCounts(table, graph);
  const entries = ranking
    .filter((entry) => isTypeKind(table.get(entry.index).kind))
    .slice(0, options.entryPointLimit);

  entries.forEach((entry, position) => {
    if (doc.isClosed) return;
    const sym = table.get(entry.index);
    const refs = typeReferenceCount(table, counts, sym);
    const why = refs >= HIGHLY_REFERENCED ? `highly referenced (${refs} refs)` : "central";
    const row = `| ${position + 1} | ${table.displayName(sym.index)} | ${sym.kind} | ${sym.category} | ${keyMethods(sym)} | ${why} |`;
    if (position === 0) {
      doc.tryAppend(
        block([
          "## Core Entry Points",
          "",
          "| # | Symbol | Kind | Category | Key Methods | Why |",
          "|---|---|---|---|---|---|",
          row,
        ]),
      );
    } else {
      doc.tryAppend(`${row}\n`);
    }
  });

  return doc;
}

export function renderSignatures(input: RenderInput, options: RenderOptions): BudgetedDocument {
  const { table, ranking } = input;
  const doc = new BudgetedDocument(
    `# ${options.projectName}: Signatures (L2)\n`,
    options.budgets.l2,
    options.countTokens ?? estimateTokens,
  );

  for (const entry of ranking) {
    const sym = table.get(entry.index);
    if (!isTypeKind(sym.kind)) continue;

    const lines = [
      `### ${table.displayName(sym.index)} (${formatScore(entry.score)})`,
      `\`${formatTypeSignature(sym)}\``,
      `${sym.file}:${sym.line} · ${sym.modulePath || ROOT_MODULE}`,
    ];
    for (const member of sym.members.slice(0, options.maxMembersPerSymbol)) {
      lines.push(`- \`${formatMemberSignature(member)}\``);
    }
    const hidden = sym.members.length - options.maxMembersPerSymbol;
    if (hidden > 0) lines.push(`- +${hidden} more`);

    if (!doc.tryAppend(block(lines))) break;
  }

  return doc;
}

type GroupItem = {
  name: string;
  multiplicity: number;
};

type EdgeGroups = {
  outgoing: Map<EdgeKind, GroupItem[]>;
  incoming: Map<EdgeKind, GroupItem[]>;
};

function collectEdgeGroups(table: SymbolTable, graph: ReferenceGraph): EdgeGroups[] {
  const groups: EdgeGroups[] = Array.from({ length: table.size }, () => ({
    outgoing: new Map(),
    incoming: new Map(),
  }));
  const push = (map: Map<EdgeKind, GroupItem[]>, kind: EdgeKind, item: GroupItem): void => {
    const list = map.get(kind);
    if (list) list.push(item);
    else map.set(kind, [item]);
  };
  for (const edge of graph.edges) {
    push(groups[edge.from].outgoing, edge.kind, {
      name: table.displayName(edge.to),
      multiplicity: edge.multiplicity,
    });
    push(groups[edge.to].incoming, edge.kind, {
      name: table.displayName(edge.from),
      multiplicity: edge.multiplicity,
    });
  }
  return groups;
}

function formatGroup(label: string, items: GroupItem[], limit: number): string {
  const sorted = [...items].sort(
    (a, b) =>
      b.multiplicity - a.multiplicity || (a.name < b.name ? -1 : a.name > b.name ? 1 : 0),
  );
  const shown = sorted
    .slice(0, limit)
    .map((item) => (item.multiplicity > 1 ? `${item.name} ×${item.multiplicity}` : item.name));
  const hidden = sorted.length - limit;
  if (hidden > 0) shown.push(`+${hidden} more`);
  return `${label} (${items.length}): ${shown.join(", ")}`;
}

export function renderRelations(input: RenderInput, options: RenderOptions): BudgetedDocument {
  const { table, graph, ranking } = input;
  const doc = new BudgetedDocument(
    `# ${options.projectName}: Relations (L3)\n`,
    options.budgets.l3,
    options.countTokens ?? estimateTokens,
  );
  const groups = collectEdgeGroups(table, graph);

  for (const entry of ranking) {
    const { outgoing, incoming } = groups[entry.index];
    const rows: string[] = [];
    for (const kind of GROUP_ORDER) {
      const items = outgoing.get(kind);
      if (items) rows.push(formatGroup(OUTGOING_LABELS[kind], items, options.maxEdgesPerGroup));
    }
    for (const kind of GROUP_ORDER) {
      const items = incoming.get(kind);
      if (items) rows.push(formatGroup(INCOMING_LABELS[kind], items, options.maxEdgesPerGroup));
    }
    if (rows.length === 0) continue;

    const lines = [`### ${table.displayName(entry.index)} (${formatScore(entry.score)})`];
    rows.forEach((row, i) => {
      lines.push(`${i === rows.length - 1 ? "└─" : "├─"} ${row}`);
    });

    if (!doc.tryAppend(block(lines))) break;
  }

  return doc;
}

export function renderLayers(input: RenderInput, options: RenderOptions): RenderedLayers {
  const withStats: RenderInput = { ...input, stats: input.stats ?? computeStats(input.table) };
  const skeleton = renderSkeleton(withStats, options);
  const signatures = renderSignatures(withStats, options);
  const relations = renderRelations(withStats, options);
  return {
    documents: {
      skeleton: skeleton.toString(),
      signatures: signatures.toString(),
      relations: relations.toString(),
    },
    tokens: {
      l1: skeleton.tokens,
      l2: signatures.tokens,
      l3: relations.tokens,
    },
  };
}
