import type { CodeSymbol, FileSymbols, SourceFile, SymbolKind } from "../src/types.js";
import { SymbolTable, symbolId } from "../src/symbolTable.js";
import { classifyFile } from "../src/categories.js";
import { parseSource } from "../src/parser.js";
import { extractFileSymbols, mergeFileSymbols, type MergedSymbols } from "../src/symbols.js";

export const TIMEOUT = 20000;

export type SymbolFixture = Partial<Omit<CodeSymbol, "index" | "id" | "qualifiedName">> & {
  name: string;
};

export function makeTable(fixtures: SymbolFixture[]): SymbolTable {
  const symbols: CodeSymbol[] = [];
  for (const fixture of fixtures) {
    const kind: SymbolKind = fixture.kind ?? "class";
    const modulePath = fixture.modulePath ?? "";
    const owner = fixture.owner ? symbols.find((s) => s.id === fixture.owner) : undefined;
    const prefix = owner ? owner.qualifiedName : modulePath;
    const qualifiedName = prefix ? `${prefix}.${fixture.name}` : fixture.name;
    symbols.push({
      index: symbols.length,
      id: symbolId(qualifiedName, kind),
      name: fixture.name,
      qualifiedName,
      kind,
      file: fixture.file ?? `${fixture.name}.cs`,
      line: fixture.line ?? 1,
      owner: fixture.owner ?? null,
      namespace: fixture.namespace ?? "",
      modulePath,
      module: fixture.module ?? "(root)",
      category: fixture.category ?? "Other",
      modifiers: fixture.modifiers ?? [],
      typeParameters: fixture.typeParameters ?? "",
      bases: fixture.bases ?? [],
      valueType: fixture.valueType ?? "",
      parameters: fixture.parameters ?? [],
      members: fixture.members ?? [],
    });
  }
  return new SymbolTable(symbols);
}

export function extractSources(files: SourceFile[]): FileSymbols[] {
  return files.map((file) =>
    extractFileSymbols(parseSource(file.path, file.text), classifyFile(file.path, [])),
  );
}

export function buildSymbols(files: SourceFile[]): MergedSymbols {
  return mergeFileSymbols(extractSources(files));
}
