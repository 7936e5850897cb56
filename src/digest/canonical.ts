import ts from "typescript";

const INDENT = "  ";

/** Children whose relative order carries no meaning, sorted before emission. */
function isUnorderedList(parent: ts.Node): boolean {
  return (
    ts.isInterfaceDeclaration(parent) ||
    ts.isTypeLiteralNode(parent) ||
    ts.isUnionTypeNode(parent) ||
    ts.isIntersectionTypeNode(parent) ||
    ts.isNamedImports(parent) ||
    ts.isNamedExports(parent)
  );
}

/** Methods and accessors can be declared in any order; fields and constructors cannot. */
function isReorderableClassMember(node: ts.Node): boolean {
  return ts.isMethodDeclaration(node) || ts.isGetAccessorDeclaration(node) || ts.isSetAccessorDeclaration(node);
}

function leafValue(node: ts.Node): string | null {
  if (ts.isIdentifier(node) || ts.isPrivateIdentifier(node)) return node.text;
  if (
    ts.isStringLiteral(node) ||
    ts.isNoSubstitutionTemplateLiteral(node) ||
    ts.isTemplateHead(node) ||
    ts.isTemplateMiddle(node) ||
    ts.isTemplateTail(node)
  ) {
    return JSON.stringify(node.text);
  }
  if (ts.isNumericLiteral(node) || ts.isBigIntLiteral(node) || ts.isRegularExpressionLiteral(node)) {
    return node.text;
  }
  if (ts.isJsxText(node)) return JSON.stringify(node.text.replace(/\s+/g, " ").trim());
  return null;
}

function childrenOf(node: ts.Node): ts.Node[] {
  const out: ts.Node[] = [];
  ts.forEachChild(
    node,
    (child) => {
      out.push(child);
    },
    (list) => {
      for (const child of list) out.push(child);
    },
  );
  return out.filter((c) => !(ts.isJsxText(c) && c.containsOnlyTriviaWhiteSpaces));
}

function render(node: ts.Node, depth: number): string {
  const value = leafValue(node);
  const head = `${INDENT.repeat(depth)}${ts.SyntaxKind[node.kind]}${value === null ? "" : ` ${value}`}`;

  let rendered = childrenOf(node).map((c) => ({ node: c, text: render(c, depth + 1) }));

  if (isUnorderedList(node)) {
    rendered = sortByText(rendered);
  } else if (ts.isClassLike(node)) {
    const fixed = rendered.filter((r) => !isReorderableClassMember(r.node));
    const loose = sortByText(rendered.filter((r) => isReorderableClassMember(r.node)));
    rendered = [...fixed, ...loose];
  }

  return [head, ...rendered.map((r) => r.text)].join("\n");
}

function sortByText<T extends { text: string }>(items: T[]): T[] {
  return [...items].sort((a, b) => (a.text < b.text ? -1 : a.text > b.text ? 1 : 0));
}

/**
 * Canonical text of a declaration: one line per syntax node, fixed two-space
 * indentation, leaf values only. Comments and whitespace are trivia in the
 * tree and never appear.
 */
export function canonicalize(node: ts.Node): string {
  return render(node, 0);
}
