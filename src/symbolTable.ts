import type { CodeSymbol, SymbolKind, TypeSymbolKind } from "./types.js";

export const TYPE_KINDS: ReadonlySet<SymbolKind> = new Set<TypeSymbolKind>([
  "class",
  "interface",
  "struct",
  "enum",
]);

export function isTypeKind(kind: SymbolKind): kind is TypeSymbolKind {
  return TYPE_KINDS.has(kind);
}

export function symbolId(qualifiedName: string, kind: SymbolKind): string {
  return `${qualifiedName}#${kind}`;
}

function pushIndex(map: Map<string, number[]>, key: string, index: number): void {
  const list = map.get(key);
  if (list) list.push(index);
  else map.set(key, [index]);
}

// Append-only arena: a symbol's index is its position, and every index list
// below is in declaration order.
export class SymbolTable {
  private readonly symbols: readonly CodeSymbol[];
  private readonly byId = new Map<string, number>();
  private readonly byName = new Map<string, number[]>();
  private readonly byQualifiedName = new Map<string, number[]>();
  private readonly byOwner = new Map<string, number[]>();

  constructor(symbols: CodeSymbol[]) {
    this.symbols = symbols;
    symbols.forEach((sym, index) => {
      if (sym.index !== index) {
        throw new Error(`Symbol ${sym.id} stored at ${index} but indexed as ${sym.index}`);
      }
      if (this.byId.has(sym.id)) {
        throw new Error(`Duplicate symbol id: ${sym.id}`);
      }
      this.byId.set(sym.id, index);
      pushIndex(this.byName, sym.name, index);
      pushIndex(this.byQualifiedName, sym.qualifiedName, index);
      if (sym.owner) pushIndex(this.byOwner, sym.owner, index);
    });
  }

  get size(): number {
    return this.symbols.length;
  }

  all(): readonly CodeSymbol[] {
    return this.symbols;
  }

  get(index: number): CodeSymbol {
    const sym = this.symbols[index];
    if (!sym) throw new Error(`No symbol at index ${index}`);
    return sym;
  }

  indexOf(id: string): number | undefined {
    return this.byId.get(id);
  }

  findById(id: string): CodeSymbol | undefined {
    const index = this.byId.get(id);
    return index === undefined ? undefined : this.symbols[index];
  }

  withName(name: string): readonly number[] {
    return this.byName.get(name) ?? [];
  }

  withQualifiedName(qualifiedName: string): readonly number[] {
    return this.byQualifiedName.get(qualifiedName) ?? [];
  }

  membersOf(ownerId: string): readonly number[] {
    return this.byOwner.get(ownerId) ?? [];
  }

  displayName(index: number): string {
    const sym = this.get(index);
    if (!sym.owner) return sym.name;
    const owner = this.findById(sym.owner);
    return owner ? `${this.displayName(owner.index)}.${sym.name}` : sym.name;
  }
}
