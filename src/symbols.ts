import type {
  CodeSymbol,
  ContainmentEdge,
  DeclarationNode,
  DeclarationNodeKind,
  FileSymbols,
  MemberKind,
  MemberSignature,
  ParameterInfo,
  ParsedFile,
  RawReference,
  RawReferenceKind,
  ReferenceNodeKind,
  SourceNode,
  SymbolDeclaration,
  SymbolKind,
} from "./types.js";
import type { FileClassification } from "./categories.js";
import { SymbolTable, symbolId } from "./symbolTable.js";

const SYMBOL_KINDS: Partial<Record<DeclarationNodeKind, SymbolKind>> = {
  class: "class",
  record: "class",
  interface: "interface",
  struct: "struct",
  record_struct: "struct",
  enum: "enum",
  method: "method",
  property: "property",
  field: "field",
};

const MEMBER_KINDS: Partial<Record<DeclarationNodeKind, MemberKind>> = {
  method: "method",
  constructor: "constructor",
  property: "property",
  field: "field",
  enum_member: "enum_member",
};

const REFERENCE_KINDS: Record<ReferenceNodeKind, RawReferenceKind> = {
  base_type: "base",
  type_ref: "type",
  invocation: "call",
  member_access: "member",
  name_ref: "name",
};

const VISIBLE_MODIFIERS = new Set(["public", "protected", "internal"]);

type TypeScope = {
  decl: SymbolDeclaration;
};

type WalkState = {
  namespace: string;
  types: TypeScope[];
  source: string | null;
};

export type MergedSymbols = {
  table: SymbolTable;
  references: RawReference[];
  containment: ContainmentEdge[];
};

export function formatParameter(param: ParameterInfo): string {
  const head = param.modifier ? `${param.modifier} ` : "";
  const sep = param.type && param.name ? " " : "";
  return `${head}${param.type}${sep}${param.name}`;
}

function qualify(...parts: string[]): string {
  return parts.filter(Boolean).join(".");
}

function isRenderable(node: DeclarationNode, owner: SymbolDeclaration): boolean {
  if (node.kind === "enum_member") return true;
  if (owner.kind === "interface") return !node.modifiers.includes("private");
  return node.modifiers.some((m) => VISIBLE_MODIFIERS.has(m));
}

function toMemberSignature(node: DeclarationNode, kind: MemberKind): MemberSignature {
  const signature: MemberSignature = {
    name: node.kind === "method" && node.typeParameters
      ? `${node.name}${node.typeParameters}`
      : node.name,
    kind,
    parameters: (node.parameters ?? []).map(formatParameter),
    returnType: node.valueType ?? "",
    modifiers: [...node.modifiers],
  };
  if (node.accessors) signature.accessors = [...node.accessors];
  return signature;
}

export function extractFileSymbols(
  parsed: ParsedFile,
  classification: FileClassification,
): FileSymbols {
  const { modulePath, module, category } = classification;
  const declarations: SymbolDeclaration[] = [];
  const references: RawReference[] = [];
  const containment: ContainmentEdge[] = [];

  const declare = (
    node: DeclarationNode,
    kind: SymbolKind,
    state: WalkState,
  ): SymbolDeclaration => {
    const owner = state.types.at(-1)?.decl ?? null;
    const qualifiedName = qualify(
      modulePath,
      ...state.types.map((t) => t.decl.name),
      node.name,
    );
    const decl: SymbolDeclaration = {
      id: symbolId(qualifiedName, kind),
      name: node.name,
      qualifiedName,
      kind,
      file: parsed.path,
      line: node.span.startLine,
      owner: owner?.id ?? null,
      namespace: state.namespace,
      modulePath,
      module,
      category,
      modifiers: [...node.modifiers],
      typeParameters: node.typeParameters ?? "",
      bases: [...(node.bases ?? [])],
      valueType: node.valueType ?? "",
      parameters: (node.parameters ?? []).map(formatParameter),
      members: [],
    };
    declarations.push(decl);
    if (owner) containment.push({ owner: owner.id, member: decl.id });
    return decl;
  };

  const visitAll = (nodes: SourceNode[], state: WalkState): void => {
    for (const node of nodes) {
      visit(node, state);
    }
  };

  const visit = (node: SourceNode, state: WalkState): void => {
    switch (node.kind) {
      case "error":
        return;
      case "base_type":
      case "type_ref":
      case "invocation":
      case "member_access":
      case "name_ref": {
        if (!state.source) return;
        const ref: RawReference = {
          from: state.source,
          scope: state.types.at(-1)?.decl.id ?? null,
          kind: REFERENCE_KINDS[node.kind],
          name: node.name,
          modulePath,
          file: parsed.path,
          line: node.span.startLine,
        };
        if (node.qualifier) ref.qualifier = node.qualifier;
        references.push(ref);
        return;
      }
      case "namespace":
        visitAll(node.children, {
          ...state,
          namespace: qualify(state.namespace, node.name),
        });
        return;
      case "class":
      case "record":
      case "interface":
      case "struct":
      case "record_struct":
      case "enum": {
        const kind = SYMBOL_KINDS[node.kind] ?? "class";
        const decl = declare(node, kind, state);
        visitAll(node.children, {
          namespace: state.namespace,
          types: [...state.types, { decl }],
          source: decl.id,
        });
        return;
      }
      case "method":
      case "property":
      case "field":
      case "constructor":
      case "enum_member": {
        const owner = state.types.at(-1)?.decl;
        if (!owner) {
          visitAll(node.children, state);
          return;
        }
        const memberKind = MEMBER_KINDS[node.kind];
        if (memberKind && isRenderable(node, owner)) {
          owner.members.push(toMemberSignature(node, memberKind));
        }
        const symbolKind = SYMBOL_KINDS[node.kind];
        const source = symbolKind ? declare(node, symbolKind, state).id : owner.id;
        visitAll(node.children, { ...state, source });
        return;
      }
    }
  };

  visitAll(parsed.nodes, { namespace: "", types: [], source: null });

  return {
    path: parsed.path,
    modulePath,
    module,
    category,
    declarations,
    references,
    containment,
  };
}

function memberKey(member: MemberSignature): string {
  return [
    member.kind,
    member.name,
    member.parameters.join(","),
    member.returnType,
  ].join("|");
}

function unionInto<T>(target: T[], source: T[], keyOf: (item: T) => string): void {
  const seen = new Set(target.map(keyOf));
  for (const item of source) {
    const key = keyOf(item);
    if (seen.has(key)) continue;
    seen.add(key);
    target.push(item);
  }
}

const identity = (value: string): string => value;

export function mergeFileSymbols(files: FileSymbols[]): MergedSymbols {
  const ordered = [...files].sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));
  const symbols: CodeSymbol[] = [];
  const byId = new Map<string, CodeSymbol>();
  const references: RawReference[] = [];
  const containment: ContainmentEdge[] = [];
  const containmentKeys = new Set<string>();

  for (const file of ordered) {
    for (const decl of file.declarations) {
      const existing = byId.get(decl.id);
      if (existing) {
        unionInto(existing.members, decl.members, memberKey);
        unionInto(existing.bases, decl.bases, identity);
        unionInto(existing.modifiers, decl.modifiers, identity);
        continue;
      }
      const sym: CodeSymbol = {
        ...decl,
        index: symbols.length,
        modifiers: [...decl.modifiers],
        bases: [...decl.bases],
        parameters: [...decl.parameters],
        members: [...decl.members],
      };
      symbols.push(sym);
      byId.set(sym.id, sym);
    }

    for (const edge of file.containment) {
      const key = `${edge.owner}>${edge.member}`;
      if (containmentKeys.has(key)) continue;
      containmentKeys.add(key);
      containment.push(edge);
    }

    references.push(...file.references);
  }

  return { table: new SymbolTable(symbols), references, containment };
}
