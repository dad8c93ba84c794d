import type {
  CodeSymbol,
  EdgeKind,
  RawReference,
  RawReferenceKind,
  ReferenceEdge,
  ReferenceGraph,
  SymbolKind,
} from "../types.js";
import { SymbolTable, TYPE_KINDS } from "../symbolTable.js";

const TARGET_KINDS: Record<RawReferenceKind, ReadonlySet<SymbolKind>> = {
  base: TYPE_KINDS,
  type: TYPE_KINDS,
  name: TYPE_KINDS,
  call: new Set<SymbolKind>(["method"]),
  member: new Set<SymbolKind>(["property", "field", "method"]),
};

export const EDGE_KIND_ORDER: EdgeKind[] = ["calls", "uses", "inherits", "implements"];

const SELF_QUALIFIERS = new Set(["this", "base"]);
const GENERIC_SUFFIX = /<[\s\S]*$/;
const DOTTED_NAME = /^@?[A-Za-z_]\w*(\.@?[A-Za-z_]\w*)*$/;

type Lookup = {
  scope: string | null;
  modulePath: string;
};

function firstOfKind(
  table: SymbolTable,
  candidates: readonly number[],
  kinds: ReadonlySet<SymbolKind>,
): number | undefined {
  return candidates.find((index) => kinds.has(table.get(index).kind));
}

function memberOf(
  table: SymbolTable,
  owner: CodeSymbol,
  name: string,
  kinds: ReadonlySet<SymbolKind>,
): number | undefined {
  return table
    .membersOf(owner.id)
    .find((index) => {
      const sym = table.get(index);
      return sym.name === name && kinds.has(sym.kind);
    });
}

function enclosingTypes(table: SymbolTable, scope: string | null): CodeSymbol[] {
  const chain: CodeSymbol[] = [];
  let current = scope ? table.findById(scope) : undefined;
  while (current) {
    chain.push(current);
    current = current.owner ? table.findById(current.owner) : undefined;
  }
  return chain;
}

// Pass 1: exact qualified names inside the referencing module, innermost
// enclosing type first.
function resolveInModule(
  table: SymbolTable,
  name: string,
  kinds: ReadonlySet<SymbolKind>,
  lookup: Lookup,
): number | undefined {
  for (const type of enclosingTypes(table, lookup.scope)) {
    const found = firstOfKind(
      table,
      table.withQualifiedName(`${type.qualifiedName}.${name}`),
      kinds,
    );
    if (found !== undefined) return found;
  }
  const moduleName = lookup.modulePath ? `${lookup.modulePath}.${name}` : name;
  return firstOfKind(table, table.withQualifiedName(moduleName), kinds);
}

// Pass 2: any symbol with the simple name; same module wins, then the
// first declared.
function resolveGlobally(
  table: SymbolTable,
  name: string,
  kinds: ReadonlySet<SymbolKind>,
  modulePath: string,
): number | undefined {
  const candidates = table.withName(name).filter((index) => kinds.has(table.get(index).kind));
  if (candidates.length === 0) return undefined;
  const local = candidates.find((index) => table.get(index).modulePath === modulePath);
  return local ?? candidates[0];
}

function resolveName(
  table: SymbolTable,
  name: string,
  kinds: ReadonlySet<SymbolKind>,
  lookup: Lookup,
): number | undefined {
  return (
    resolveInModule(table, name, kinds, lookup) ??
    resolveGlobally(table, name, kinds, lookup.modulePath)
  );
}

function resolveTypeExpression(
  table: SymbolTable,
  text: string,
  lookup: Lookup,
): number | undefined {
  if (SELF_QUALIFIERS.has(text)) {
    return lookup.scope ? table.indexOf(lookup.scope) : undefined;
  }
  if (!DOTTED_NAME.test(text)) return undefined;

  const parts = text.replace(/@/g, "").split(".");
  const last = parts.pop() ?? text;
  if (parts.length > 0) {
    const outer = resolveTypeExpression(table, parts.join("."), lookup);
    if (outer !== undefined) {
      const nested = memberOf(table, table.get(outer), last, TYPE_KINDS);
      if (nested !== undefined) return nested;
    }
  }
  return resolveName(table, last, TYPE_KINDS, lookup);
}

function baseTypesOf(table: SymbolTable, type: CodeSymbol): CodeSymbol[] {
  const lookup: Lookup = { scope: type.owner, modulePath: type.modulePath };
  const resolved: CodeSymbol[] = [];
  for (const base of type.bases) {
    const index = resolveTypeExpression(table, base.replace(GENERIC_SUFFIX, "").trim(), lookup);
    if (index !== undefined && index !== type.index) resolved.push(table.get(index));
  }
  return resolved;
}

// Breadth-first over the type and its resolved bases; the nearest declaration wins.
function memberOfHierarchy(
  table: SymbolTable,
  start: readonly CodeSymbol[],
  name: string,
  kinds: ReadonlySet<SymbolKind>,
): number | undefined {
  const seen = new Set<number>();
  const queue = [...start];
  for (let type = queue.shift(); type; type = queue.shift()) {
    if (seen.has(type.index)) continue;
    seen.add(type.index);
    const member = memberOf(table, type, name, kinds);
    if (member !== undefined) return member;
    queue.push(...baseTypesOf(table, type));
  }
  return undefined;
}

export function resolveReference(
  table: SymbolTable,
  ref: RawReference,
): number | undefined {
  const kinds = TARGET_KINDS[ref.kind];
  const lookup: Lookup = { scope: ref.scope, modulePath: ref.modulePath };
  const qualifier = ref.qualifier;

  if (qualifier === "base") {
    const scope = ref.scope ? table.findById(ref.scope) : undefined;
    return scope ? memberOfHierarchy(table, baseTypesOf(table, scope), ref.name, kinds) : undefined;
  }

  if (qualifier && !SELF_QUALIFIERS.has(qualifier)) {
    const owner = resolveTypeExpression(table, qualifier, lookup);
    if (owner !== undefined) {
      return memberOfHierarchy(table, [table.get(owner)], ref.name, kinds);
    }
    return resolveGlobally(table, ref.name, kinds, ref.modulePath);
  }

  return resolveName(table, ref.name, kinds, lookup);
}

export function edgeKindFor(
  ref: RawReference,
  source: CodeSymbol,
  target: CodeSymbol,
): EdgeKind {
  switch (ref.kind) {
    case "base":
      return target.kind === "interface" &&
        (source.kind === "class" || source.kind === "struct")
        ? "implements"
        : "inherits";
    case "type":
    case "name":
      return "uses";
    case "call":
    case "member":
      return "calls";
  }
}

export function compareEdges(a: ReferenceEdge, b: ReferenceEdge): number {
  return (
    a.from - b.from ||
    a.to - b.to ||
    EDGE_KIND_ORDER.indexOf(a.kind) - EDGE_KIND_ORDER.indexOf(b.kind)
  );
}

export function resolveReferences(
  table: SymbolTable,
  references: readonly RawReference[],
): ReferenceGraph {
  const edges = new Map<string, ReferenceEdge>();
  let unresolved = 0;

  for (const ref of references) {
    const from = table.indexOf(ref.from);
    const to = from === undefined ? undefined : resolveReference(table, ref);
    if (from === undefined || to === undefined) {
      unresolved++;
      continue;
    }
    if (from === to) continue;

    const kind = edgeKindFor(ref, table.get(from), table.get(to));
    const key = `${from}:${to}:${kind}`;
    const existing = edges.get(key);
    if (existing) {
      existing.multiplicity++;
    } else {
      edges.set(key, { from, to, kind, multiplicity: 1 });
    }
  }

  return { edges: [...edges.values()].sort(compareEdges), unresolved };
}
