import Parser from "tree-sitter";
import CSharp from "tree-sitter-c-sharp";
import type {
  DeclarationNode,
  DeclarationNodeKind,
  ParameterInfo,
  ParsedFile,
  ReferenceNodeKind,
  SourceNode,
  SourceSpan,
} from "./types.js";

type TSNode = Parser.SyntaxNode;

type ParseContext = {
  source: string;
  errors: number;
};

const parser = new Parser();
parser.setLanguage(CSharp);

const TYPE_DECLARATIONS: Record<string, DeclarationNodeKind> = {
  class_declaration: "class",
  interface_declaration: "interface",
  struct_declaration: "struct",
  record_declaration: "record",
  record_struct_declaration: "record_struct",
  enum_declaration: "enum",
};

const TYPE_NODE_TYPES = new Set([
  "identifier",
  "generic_name",
  "qualified_name",
  "alias_qualified_name",
  "predefined_type",
  "implicit_type",
  "nullable_type",
  "array_type",
  "pointer_type",
  "ref_type",
  "scoped_type",
  "tuple_type",
  "tuple_element",
  "function_pointer_type",
  "function_pointer_parameter",
]);

const SKIPPED_NODE_TYPES = new Set([
  "comment",
  "attribute_list",
  "global_attribute",
  "global_attribute_list",
  "using_directive",
  "extern_alias_directive",
]);

const ACCESSOR_KEYWORDS = new Set(["get", "set", "init", "add", "remove"]);
const PARAMETER_KEYWORDS = new Set(["ref", "out", "in", "params", "this", "scoped"]);

function normalizeWhitespace(value: string): string {
  return value.replace(/\s+/g, " ").trim();
}

function getNodeText(node: TSNode, source: string): string {
  return source.slice(node.startIndex, node.endIndex);
}

function textOf(node: TSNode, ctx: ParseContext): string {
  return normalizeWhitespace(getNodeText(node, ctx.source));
}

function sameNode(a: TSNode, b: TSNode | null): boolean {
  return (
    b !== null &&
    a.type === b.type &&
    a.startIndex === b.startIndex &&
    a.endIndex === b.endIndex
  );
}

function spanOf(node: TSNode): SourceSpan {
  return {
    startLine: node.startPosition.row + 1,
    startColumn: node.startPosition.column + 1,
    endLine: node.endPosition.row + 1,
    endColumn: node.endPosition.column + 1,
  };
}

function bufferSizeFor(content: string): number {
  return Math.max(32 * 1024, content.length * 2 + 1);
}

function findChildOfType(node: TSNode, types: string[]): TSNode | null {
  return node.namedChildren.find((child) => types.includes(child.type)) ?? null;
}

function nameNodeOf(node: TSNode): TSNode | null {
  return node.childForFieldName("name") ?? findChildOfType(node, ["identifier"]);
}

function modifiersOf(node: TSNode, ctx: ParseContext): string[] {
  return node.namedChildren
    .filter((child) => child.type === "modifier")
    .map((child) => textOf(child, ctx));
}

function typeParametersOf(node: TSNode, ctx: ParseContext): string | undefined {
  const list = findChildOfType(node, ["type_parameter_list"]);
  return list ? textOf(list, ctx) : undefined;
}

function genericIdentifier(node: TSNode, ctx: ParseContext): string {
  const ident = findChildOfType(node, ["identifier"]);
  if (ident) return textOf(ident, ctx);
  const text = textOf(node, ctx);
  const angle = text.indexOf("<");
  return angle === -1 ? text : text.slice(0, angle).trim();
}

function pushReference(
  out: SourceNode[],
  kind: ReferenceNodeKind,
  name: string,
  node: TSNode,
  qualifier?: string,
): void {
  if (!name) return;
  out.push(
    qualifier
      ? { kind, name, qualifier, span: spanOf(node) }
      : { kind, name, span: spanOf(node) },
  );
}

function collectTypeArguments(
  node: TSNode,
  out: SourceNode[],
  ctx: ParseContext,
): void {
  const args = findChildOfType(node, ["type_argument_list"]);
  if (!args) return;
  for (const arg of args.namedChildren) {
    collectType(arg, out, ctx, "type_ref");
  }
}

function collectType(
  node: TSNode,
  out: SourceNode[],
  ctx: ParseContext,
  kind: ReferenceNodeKind,
): void {
  switch (node.type) {
    case "identifier":
      pushReference(out, kind, textOf(node, ctx), node);
      return;
    case "generic_name":
      pushReference(out, kind, genericIdentifier(node, ctx), node);
      collectTypeArguments(node, out, ctx);
      return;
    case "qualified_name": {
      const qualifier = node.childForFieldName("qualifier");
      const name = node.childForFieldName("name") ?? node.namedChildren.at(-1) ?? null;
      if (!name) return;
      const qualifierText = qualifier ? textOf(qualifier, ctx) : undefined;
      if (name.type === "generic_name") {
        pushReference(out, kind, genericIdentifier(name, ctx), node, qualifierText);
        collectTypeArguments(name, out, ctx);
      } else {
        pushReference(out, kind, textOf(name, ctx), node, qualifierText);
      }
      return;
    }
    case "alias_qualified_name": {
      const name = node.childForFieldName("name");
      if (name) collectType(name, out, ctx, kind);
      return;
    }
    case "predefined_type":
    case "implicit_type":
      return;
    case "tuple_element": {
      const type = node.childForFieldName("type") ?? node.namedChildren[0] ?? null;
      if (type) collectType(type, out, ctx, kind);
      return;
    }
    default:
      for (const child of node.namedChildren) {
        if (TYPE_NODE_TYPES.has(child.type)) {
          collectType(child, out, ctx, kind);
        }
      }
  }
}

function collectBases(
  list: TSNode,
  out: SourceNode[],
  ctx: ParseContext,
): string[] {
  const bases: string[] = [];
  for (const entry of list.namedChildren) {
    if (TYPE_NODE_TYPES.has(entry.type)) {
      bases.push(textOf(entry, ctx));
      collectType(entry, out, ctx, "base_type");
      continue;
    }
    // Primary-constructor bases carry their own argument list.
    const type =
      entry.childForFieldName("type") ??
      entry.namedChildren.find((child) => TYPE_NODE_TYPES.has(child.type)) ??
      null;
    if (type) {
      bases.push(textOf(type, ctx));
      collectType(type, out, ctx, "base_type");
    }
    for (const child of entry.namedChildren) {
      if (!sameNode(child, type)) walk(child, out, ctx);
    }
  }
  return bases;
}

function collectParameters(
  list: TSNode | null,
  out: SourceNode[],
  ctx: ParseContext,
): ParameterInfo[] {
  if (!list) return [];
  const params: ParameterInfo[] = [];
  for (const param of list.namedChildren) {
    if (param.type !== "parameter" && param.type !== "parameter_array") continue;

    const type =
      param.childForFieldName("type") ??
      param.namedChildren.find(
        (child) => child.type !== "identifier" && TYPE_NODE_TYPES.has(child.type),
      ) ??
      null;
    const name =
      param.childForFieldName("name") ??
      [...param.namedChildren].reverse().find((child) => child.type === "identifier") ??
      null;
    const modifier = param.children.find(
      (child) =>
        child.type === "parameter_modifier" ||
        child.type === "modifier" ||
        PARAMETER_KEYWORDS.has(child.type),
    );

    const info: ParameterInfo = {
      name: name ? textOf(name, ctx) : "",
      type: type ? textOf(type, ctx) : "",
    };
    if (modifier) info.modifier = textOf(modifier, ctx);
    else if (param.type === "parameter_array") info.modifier = "params";
    params.push(info);

    if (type) collectType(type, out, ctx, "type_ref");
    for (const child of param.namedChildren) {
      if (child.type === "equals_value_clause") walk(child, out, ctx);
    }
  }
  return params;
}

function walkRemaining(
  node: TSNode,
  handled: Array<TSNode | null>,
  out: SourceNode[],
  ctx: ParseContext,
): void {
  for (const child of node.namedChildren) {
    if (child.type === "modifier" || child.type === "attribute_list") continue;
    if (handled.some((h) => sameNode(child, h))) continue;
    walk(child, out, ctx);
  }
}

function convertTypeDeclaration(
  node: TSNode,
  kind: DeclarationNodeKind,
  ctx: ParseContext,
): DeclarationNode | null {
  const nameNode = nameNodeOf(node);
  if (!nameNode) return null;

  const children: SourceNode[] = [];
  const baseList = findChildOfType(node, ["base_list", "record_base"]);
  const bases = baseList ? collectBases(baseList, children, ctx) : [];
  const body =
    node.childForFieldName("body") ??
    findChildOfType(node, ["declaration_list", "enum_member_declaration_list"]);
  const params = findChildOfType(node, ["parameter_list"]);
  const parameters = collectParameters(params, children, ctx);

  if (body) {
    if (body.type === "enum_member_declaration_list") {
      for (const member of body.namedChildren) {
        if (member.type !== "enum_member_declaration") {
          walk(member, children, ctx);
          continue;
        }
        const memberName = nameNodeOf(member);
        if (!memberName) continue;
        const valueRefs: SourceNode[] = [];
        walkRemaining(member, [memberName], valueRefs, ctx);
        children.push({
          kind: "enum_member",
          name: textOf(memberName, ctx),
          span: spanOf(member),
          modifiers: [],
          children: valueRefs,
        });
      }
    } else {
      convertChildren(body.namedChildren, children, ctx);
    }
  }

  const isRecordStruct =
    kind === "record" && node.children.some((child) => child.type === "struct");

  const decl: DeclarationNode = {
    kind: isRecordStruct ? "record_struct" : kind,
    name: textOf(nameNode, ctx),
    span: spanOf(node),
    modifiers: modifiersOf(node, ctx),
    bases,
    children,
  };
  const typeParameters = typeParametersOf(node, ctx);
  if (typeParameters) decl.typeParameters = typeParameters;
  if (parameters.length > 0) decl.parameters = parameters;
  return decl;
}

function methodReturnType(node: TSNode, nameNode: TSNode): TSNode | null {
  const field = node.childForFieldName("returns") ?? node.childForFieldName("type");
  if (field) return field;
  for (const child of node.namedChildren) {
    if (sameNode(child, nameNode)) break;
    if (TYPE_NODE_TYPES.has(child.type)) return child;
  }
  return null;
}

function convertMethod(node: TSNode, ctx: ParseContext): DeclarationNode | null {
  const nameNode = nameNodeOf(node);
  if (!nameNode) return null;

  const children: SourceNode[] = [];
  const returns = methodReturnType(node, nameNode);
  if (returns) collectType(returns, children, ctx, "type_ref");
  const paramList =
    node.childForFieldName("parameters") ?? findChildOfType(node, ["parameter_list"]);
  const parameters = collectParameters(paramList, children, ctx);
  const typeParams = findChildOfType(node, ["type_parameter_list"]);
  walkRemaining(node, [nameNode, returns, paramList, typeParams], children, ctx);

  const decl: DeclarationNode = {
    kind: "method",
    name: textOf(nameNode, ctx),
    span: spanOf(node),
    modifiers: modifiersOf(node, ctx),
    valueType: returns ? textOf(returns, ctx) : "void",
    parameters,
    children,
  };
  const typeParameters = typeParams ? textOf(typeParams, ctx) : undefined;
  if (typeParameters) decl.typeParameters = typeParameters;
  return decl;
}

function convertConstructor(node: TSNode, ctx: ParseContext): DeclarationNode | null {
  const nameNode = nameNodeOf(node);
  if (!nameNode) return null;

  const children: SourceNode[] = [];
  const paramList =
    node.childForFieldName("parameters") ?? findChildOfType(node, ["parameter_list"]);
  const parameters = collectParameters(paramList, children, ctx);
  walkRemaining(node, [nameNode, paramList], children, ctx);

  return {
    kind: "constructor",
    name: textOf(nameNode, ctx),
    span: spanOf(node),
    modifiers: modifiersOf(node, ctx),
    parameters,
    children,
  };
}

function accessorsOf(node: TSNode, ctx: ParseContext): string[] {
  const list = findChildOfType(node, ["accessor_list"]);
  if (!list) {
    return findChildOfType(node, ["arrow_expression_clause"]) ? ["get"] : [];
  }
  const accessors: string[] = [];
  for (const accessor of list.namedChildren) {
    if (accessor.type !== "accessor_declaration") continue;
    const keyword = accessor.children.find((child) => ACCESSOR_KEYWORDS.has(child.type));
    if (!keyword) continue;
    const mods = modifiersOf(accessor, ctx);
    accessors.push([...mods, keyword.type].join(" "));
  }
  return accessors;
}

function convertProperty(node: TSNode, ctx: ParseContext): DeclarationNode | null {
  const nameNode = nameNodeOf(node);
  if (!nameNode) return null;

  const children: SourceNode[] = [];
  const type = node.childForFieldName("type");
  if (type) collectType(type, children, ctx, "type_ref");
  walkRemaining(node, [nameNode, type], children, ctx);

  return {
    kind: "property",
    name: textOf(nameNode, ctx),
    span: spanOf(node),
    modifiers: modifiersOf(node, ctx),
    valueType: type ? textOf(type, ctx) : "",
    accessors: accessorsOf(node, ctx),
    children,
  };
}

function convertFields(node: TSNode, ctx: ParseContext): DeclarationNode[] {
  const declaration = findChildOfType(node, ["variable_declaration"]);
  if (!declaration) return [];

  const modifiers = modifiersOf(node, ctx);
  if (node.type === "event_field_declaration") modifiers.push("event");

  const type = declaration.childForFieldName("type");
  const valueType = type ? textOf(type, ctx) : "";
  const fields: DeclarationNode[] = [];

  for (const declarator of declaration.namedChildren) {
    if (declarator.type !== "variable_declarator") continue;
    const nameNode = nameNodeOf(declarator);
    if (!nameNode) continue;

    const children: SourceNode[] = [];
    if (type) collectType(type, children, ctx, "type_ref");
    walkRemaining(declarator, [nameNode], children, ctx);

    fields.push({
      kind: "field",
      name: textOf(nameNode, ctx),
      span: spanOf(declarator),
      modifiers: [...modifiers],
      valueType,
      children,
    });
  }

  return fields;
}

function convertNamespace(node: TSNode, ctx: ParseContext): DeclarationNode {
  const nameNode = node.childForFieldName("name");
  return {
    kind: "namespace",
    name: nameNode ? textOf(nameNode, ctx) : "",
    span: spanOf(node),
    modifiers: [],
    children: [],
  };
}

function memberName(node: TSNode | null, out: SourceNode[], ctx: ParseContext): string {
  if (!node) return "";
  if (node.type === "generic_name") {
    collectTypeArguments(node, out, ctx);
    return genericIdentifier(node, ctx);
  }
  return textOf(node, ctx);
}

function walkReceiver(node: TSNode, out: SourceNode[], ctx: ParseContext): void {
  if (node.type === "identifier") {
    pushReference(out, "name_ref", textOf(node, ctx), node);
    return;
  }
  walk(node, out, ctx);
}

function convertInvocation(node: TSNode, out: SourceNode[], ctx: ParseContext): void {
  const fn = node.childForFieldName("function");
  if (fn) {
    switch (fn.type) {
      case "identifier":
      case "generic_name":
        pushReference(out, "invocation", memberName(fn, out, ctx), fn);
        break;
      case "member_access_expression": {
        const receiver = fn.childForFieldName("expression");
        const name = memberName(fn.childForFieldName("name"), out, ctx);
        pushReference(
          out,
          "invocation",
          name,
          fn,
          receiver ? textOf(receiver, ctx) : undefined,
        );
        if (receiver) walkReceiver(receiver, out, ctx);
        break;
      }
      case "member_binding_expression":
        pushReference(
          out,
          "invocation",
          memberName(fn.childForFieldName("name"), out, ctx),
          fn,
        );
        break;
      default:
        walk(fn, out, ctx);
    }
  }
  for (const child of node.namedChildren) {
    if (!sameNode(child, fn)) walk(child, out, ctx);
  }
}

function convertMemberAccess(node: TSNode, out: SourceNode[], ctx: ParseContext): void {
  const receiver = node.childForFieldName("expression");
  const name = memberName(node.childForFieldName("name"), out, ctx);
  pushReference(
    out,
    "member_access",
    name,
    node,
    receiver ? textOf(receiver, ctx) : undefined,
  );
  if (receiver) walkReceiver(receiver, out, ctx);
}

function walkGeneric(node: TSNode, out: SourceNode[], ctx: ParseContext): void {
  const type = node.childForFieldName("type");
  if (type) collectType(type, out, ctx, "type_ref");

  let right: TSNode | null = null;
  if (node.type === "as_expression" || node.type === "is_expression") {
    right = node.childForFieldName("right");
    if (right && TYPE_NODE_TYPES.has(right.type)) {
      collectType(right, out, ctx, "type_ref");
    } else {
      right = null;
    }
  }

  for (const child of node.namedChildren) {
    if (sameNode(child, type) || sameNode(child, right)) continue;
    walk(child, out, ctx);
  }
}

function walk(node: TSNode, out: SourceNode[], ctx: ParseContext): void {
  if (SKIPPED_NODE_TYPES.has(node.type)) return;

  const typeKind = TYPE_DECLARATIONS[node.type];
  if (typeKind) {
    const decl = convertTypeDeclaration(node, typeKind, ctx);
    if (decl) out.push(decl);
    return;
  }

  switch (node.type) {
    case "ERROR":
      ctx.errors++;
      out.push({ kind: "error", span: spanOf(node) });
      return;
    case "namespace_declaration": {
      const ns = convertNamespace(node, ctx);
      const body =
        node.childForFieldName("body") ?? findChildOfType(node, ["declaration_list"]);
      if (body) convertChildren(body.namedChildren, ns.children, ctx);
      out.push(ns);
      return;
    }
    case "method_declaration": {
      const decl = convertMethod(node, ctx);
      if (decl) out.push(decl);
      return;
    }
    case "constructor_declaration": {
      const decl = convertConstructor(node, ctx);
      if (decl) out.push(decl);
      return;
    }
    case "property_declaration": {
      const decl = convertProperty(node, ctx);
      if (decl) out.push(decl);
      return;
    }
    case "field_declaration":
    case "event_field_declaration":
      out.push(...convertFields(node, ctx));
      return;
    case "invocation_expression":
      convertInvocation(node, out, ctx);
      return;
    case "member_access_expression":
      convertMemberAccess(node, out, ctx);
      return;
    case "member_binding_expression":
      pushReference(
        out,
        "member_access",
        memberName(node.childForFieldName("name"), out, ctx),
        node,
      );
      return;
    case "generic_name":
      collectType(node, out, ctx, "type_ref");
      return;
    case "identifier":
    case "qualified_name":
      return;
    default:
      walkGeneric(node, out, ctx);
  }
}

function convertChildren(nodes: TSNode[], out: SourceNode[], ctx: ParseContext): void {
  for (let i = 0; i < nodes.length; i++) {
    const node = nodes[i];
    if (node.type === "file_scoped_namespace_declaration") {
      // Everything after a file-scoped namespace belongs to it.
      const ns = convertNamespace(node, ctx);
      const nameNode = node.childForFieldName("name");
      convertChildren(
        node.namedChildren.filter((child) => !sameNode(child, nameNode)),
        ns.children,
        ctx,
      );
      convertChildren(nodes.slice(i + 1), ns.children, ctx);
      out.push(ns);
      return;
    }
    walk(node, out, ctx);
  }
}

export function parseSource(filePath: string, content: string): ParsedFile {
  const text = content.charCodeAt(0) === 0xfeff ? content.slice(1) : content;
  const tree = parser.parse(text, undefined, { bufferSize: bufferSizeFor(text) });
  const ctx: ParseContext = { source: text, errors: 0 };
  const nodes: SourceNode[] = [];
  convertChildren(tree.rootNode.namedChildren, nodes, ctx);
  return { path: filePath, nodes, errorCount: ctx.errors };
}
