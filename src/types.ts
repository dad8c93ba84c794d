export type Language = "csharp" | "other";

export type SymbolKind =
  | "class"
  | "interface"
  | "struct"
  | "enum"
  | "method"
  | "property"
  | "field";

export type TypeSymbolKind = Extract<
  SymbolKind,
  "class" | "interface" | "struct" | "enum"
>;

export type MemberKind =
  | "method"
  | "constructor"
  | "property"
  | "field"
  | "enum_member";

export type EdgeKind = "uses" | "calls" | "inherits" | "implements";

export type SourceFile = {
  path: string;
  text: string;
};

export type SourceSpan = {
  startLine: number;
  startColumn: number;
  endLine: number;
  endColumn: number;
};

export type ParameterInfo = {
  name: string;
  type: string;
  modifier?: string;
};

export type DeclarationNodeKind =
  | "namespace"
  | "class"
  | "interface"
  | "struct"
  | "record"
  | "record_struct"
  | "enum"
  | "method"
  | "constructor"
  | "property"
  | "field"
  | "enum_member";

export type ReferenceNodeKind =
  | "base_type"
  | "type_ref"
  | "invocation"
  | "member_access"
  | "name_ref";

export type DeclarationNode = {
  kind: DeclarationNodeKind;
  name: string;
  span: SourceSpan;
  modifiers: string[];
  typeParameters?: string;
  bases?: string[];
  valueType?: string;
  parameters?: ParameterInfo[];
  accessors?: string[];
  children: SourceNode[];
};

export type ReferenceNode = {
  kind: ReferenceNodeKind;
  name: string;
  qualifier?: string;
  span: SourceSpan;
};

export type ErrorNode = {
  kind: "error";
  span: SourceSpan;
};

export type SourceNode = DeclarationNode | ReferenceNode | ErrorNode;

export type ParsedFile = {
  path: string;
  nodes: SourceNode[];
  errorCount: number;
};

export type MemberSignature = {
  name: string;
  kind: MemberKind;
  parameters: string[];
  returnType: string;
  modifiers: string[];
  accessors?: string[];
};

export type CodeSymbol = {
  index: number;
  id: string;
  name: string;
  qualifiedName: string;
  kind: SymbolKind;
  file: string;
  line: number;
  owner: string | null;
  namespace: string;
  modulePath: string;
  module: string;
  category: string;
  modifiers: string[];
  typeParameters: string;
  bases: string[];
  valueType: string;
  parameters: string[];
  members: MemberSignature[];
};

export type SymbolDeclaration = Omit<CodeSymbol, "index">;

export type RawReferenceKind = "base" | "type" | "call" | "member" | "name";

export type RawReference = {
  from: string;
  scope: string | null;
  kind: RawReferenceKind;
  name: string;
  qualifier?: string;
  modulePath: string;
  file: string;
  line: number;
};

export type ContainmentEdge = {
  owner: string;
  member: string;
};

export type FileSymbols = {
  path: string;
  modulePath: string;
  module: string;
  category: string;
  declarations: SymbolDeclaration[];
  references: RawReference[];
  containment: ContainmentEdge[];
};

export type ReferenceEdge = {
  from: number;
  to: number;
  kind: EdgeKind;
  multiplicity: number;
};

export type ReferenceGraph = {
  edges: ReferenceEdge[];
  unresolved: number;
};

export type RankedSymbol = {
  index: number;
  id: string;
  score: number;
  rank: number;
};

export type RankResult = {
  ranked: RankedSymbol[];
  converged: boolean;
  iterations: number;
};

export type BoostMatch = "prefix" | "suffix" | "contains";

export type BoostRule = {
  match: BoostMatch;
  pattern: string;
  boost: number;
};

export type CategoryRule = {
  label: string;
  patterns: string[];
};

export type TokenBudgets = {
  l1: number;
  l2: number;
  l3: number;
};

export type RepoMapConfig = {
  projectName: string;
  sourceRoot: string;
  includePatterns: string[];
  excludePatterns: string[];
  tokenBudgets: TokenBudgets;
  importanceBoostRules: BoostRule[];
  priorityModules: string[];
  categoryRules: CategoryRule[];
  dampingFactor: number;
  maxIterations: number;
  tolerance: number;
  entryPointLimit: number;
  maxMembersPerSymbol: number;
  maxEdgesPerGroup: number;
  outputDir: string;
};

export type CountTokens = (text: string) => number;

export type LayerDocuments = {
  skeleton: string;
  signatures: string;
  relations: string;
};

export type ModuleSummary = {
  name: string;
  types: number;
};

export type RepoMapMeta = {
  projectName: string;
  symbolCount: number;
  moduleCount: number;
  fileCount: number;
  skippedFiles: number;
  edgeCount: number;
  unresolvedReferences: number;
  converged: boolean;
  iterationsUsed: number;
  generatedAt: string;
  tokens: TokenBudgets;
  bySymbolKind: Record<string, number>;
  topModules: ModuleSummary[];
};

export type FileWarning = {
  path: string;
  message: string;
};
