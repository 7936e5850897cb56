import path from "node:path";
import ts from "typescript";
import type { AnnotationCodec } from "../annotation/codec.js";
import { lineExtent, lineStart } from "../annotation/edits.js";
import { digestNode } from "../digest/digest.js";
import { AnnotationCorruption, ParseError, errorMessage } from "../errors.js";
import { metadataFromPayload } from "../metadata/model.js";
import type { AnnotationBlock, Artifact, ArtifactKind, ArtifactRecord, ScanIssue } from "../types/artifact.js";

export type SourceScan = {
  records: ArtifactRecord[];
  errors: ScanIssue[];
};

type Found = {
  node: ts.Node;
  kind: ArtifactKind;
  qualifiedName: string;
};

export function scriptKindFor(file: string): ts.ScriptKind {
  switch (path.extname(file).toLowerCase()) {
    case ".tsx":
      return ts.ScriptKind.TSX;
    case ".jsx":
      return ts.ScriptKind.JSX;
    case ".js":
    case ".mjs":
    case ".cjs":
      return ts.ScriptKind.JS;
    default:
      return ts.ScriptKind.TS;
  }
}

/** Project-relative identity path, always with forward slashes. */
export function toPosixRelative(root: string, absolute: string): string {
  return path.relative(root, absolute).split(path.sep).join("/");
}

function firstSyntaxError(file: string, text: string): ParseError | null {
  const out = ts.transpileModule(text, { fileName: file, reportDiagnostics: true });
  const diag = out.diagnostics?.find((d) => d.category === ts.DiagnosticCategory.Error);
  if (!diag) return null;
  const message = ts.flattenDiagnosticMessageText(diag.messageText, "\n");
  if (diag.file && diag.start !== undefined) {
    const { line } = diag.file.getLineAndCharacterOfPosition(diag.start);
    return new ParseError(file, message, line + 1);
  }
  return new ParseError(file, message);
}

function memberName(name: ts.PropertyName, sf: ts.SourceFile): string {
  if (ts.isIdentifier(name) || ts.isPrivateIdentifier(name) || ts.isStringLiteral(name) || ts.isNumericLiteral(name)) {
    return name.text;
  }
  return name.getText(sf);
}

function qualify(scope: readonly string[], name: string): string {
  return [...scope, name].join(".");
}

/** Declarations tracked as artifacts, with their dotted names. Bodyless overloads are skipped. */
function collectDeclarations(sf: ts.SourceFile): Found[] {
  const found: Found[] = [];

  const visitClassMembers = (cls: ts.ClassLikeDeclaration, scope: string[]): void => {
    for (const member of cls.members) {
      let name: string | null = null;
      if (ts.isConstructorDeclaration(member) && member.body) name = "constructor";
      else if (ts.isMethodDeclaration(member) && member.body) name = memberName(member.name, sf);
      else if (ts.isGetAccessorDeclaration(member) && member.body) name = `${memberName(member.name, sf)}:get`;
      else if (ts.isSetAccessorDeclaration(member) && member.body) name = `${memberName(member.name, sf)}:set`;

      if (name === null) {
        visit(member, scope);
        continue;
      }
      found.push({ node: member, kind: "method", qualifiedName: qualify(scope, name) });
      ts.forEachChild(member, (child) => visit(child, [...scope, name]));
    }
  };

  const visit = (node: ts.Node, scope: string[]): void => {
    if (ts.isFunctionDeclaration(node)) {
      const name = node.name?.text ?? "default";
      if (node.body) found.push({ node, kind: "function", qualifiedName: qualify(scope, name) });
      ts.forEachChild(node, (child) => visit(child, [...scope, name]));
      return;
    }

    if (ts.isClassDeclaration(node)) {
      const name = node.name?.text ?? "default";
      found.push({ node, kind: "class", qualifiedName: qualify(scope, name) });
      visitClassMembers(node, [...scope, name]);
      return;
    }

    if (ts.isVariableStatement(node) && node.declarationList.declarations.length === 1) {
      const decl = node.declarationList.declarations[0];
      const init = decl.initializer;
      if (ts.isIdentifier(decl.name) && init && (ts.isArrowFunction(init) || ts.isFunctionExpression(init))) {
        const name = decl.name.text;
        found.push({ node, kind: "arrow_function", qualifiedName: qualify(scope, name) });
        ts.forEachChild(init, (child) => visit(child, [...scope, name]));
        return;
      }
    }

    if (ts.isModuleDeclaration(node) && node.body) {
      const name = node.name.text;
      ts.forEachChild(node.body, (child) => visit(child, [...scope, name]));
      return;
    }

    ts.forEachChild(node, (child) => visit(child, scope));
  };

  ts.forEachChild(sf, (child) => visit(child, []));
  return found;
}

/** Last provenance block among the comments directly above the declaration. */
function findAnnotation(text: string, node: ts.Node, codec: AnnotationCodec): AnnotationBlock | null {
  const ranges = ts.getLeadingCommentRanges(text, node.pos) ?? [];
  for (let i = ranges.length - 1; i >= 0; i--) {
    const range = ranges[i];
    if (range.kind !== ts.SyntaxKind.MultiLineCommentTrivia) continue;
    const comment = text.slice(range.pos, range.end);
    if (!codec.isAnnotation(comment)) continue;
    return { ...replaceableExtent(text, range.pos, range.end), text: comment };
  }
  return null;
}

/** Whole lines when the comment sits alone on them, else the comment itself. */
function replaceableExtent(text: string, start: number, end: number): { start: number; end: number; wholeLine: boolean } {
  const lines = lineExtent(text, start, end);
  const before = text.slice(lines.start, start);
  const after = text.slice(end, lines.end);
  if (before.trim() === "" && after.trim() === "") return { ...lines, wholeLine: true };
  return { start, end, wholeLine: false };
}

function toArtifact(file: string, sf: ts.SourceFile, text: string, found: Found, id: string, codec: AnnotationCodec): Artifact {
  const start = found.node.getStart(sf);
  const end = found.node.getEnd();
  const from = lineStart(text, start);
  const lead = text.slice(from, start);
  const sharesLine = lead.trim() !== "";
  return {
    id,
    file,
    qualifiedName: found.qualifiedName,
    kind: found.kind,
    span: {
      start,
      end,
      line: sf.getLineAndCharacterOfPosition(start).line + 1,
      endLine: sf.getLineAndCharacterOfPosition(end).line + 1,
    },
    insertAt: sharesLine ? start : from,
    sharesLine,
    indent: sharesLine ? "" : lead,
    annotation: findAnnotation(text, found.node, codec),
    digest: digestNode(found.node),
  };
}

/**
 * Parse one file's text and describe its artifacts. A syntax error skips the
 * whole file; a corrupt annotation skips only its artifact.
 */
export function scanSource(file: string, text: string, codec: AnnotationCodec): SourceScan {
  const parseError = firstSyntaxError(file, text);
  if (parseError) return { records: [], errors: [{ file, artifactId: null, error: parseError }] };

  const sf = ts.createSourceFile(file, text, ts.ScriptTarget.Latest, true, scriptKindFor(file));
  const records: ArtifactRecord[] = [];
  const errors: ScanIssue[] = [];
  const occurrences = new Map<string, number>();

  for (const found of collectDeclarations(sf)) {
    // Repeats of a name are numbered in source order, so edits above them keep the identity.
    const nth = (occurrences.get(found.qualifiedName) ?? 0) + 1;
    occurrences.set(found.qualifiedName, nth);
    const id = nth === 1 ? `${file}::${found.qualifiedName}` : `${file}::${found.qualifiedName}#${nth}`;

    const artifact = toArtifact(file, sf, text, found, id, codec);
    if (!artifact.annotation) {
      records.push({ artifact, metadata: null });
      continue;
    }

    try {
      const payload = codec.decode(artifact.annotation.text) ?? {};
      records.push({ artifact, metadata: metadataFromPayload(id, payload) });
    } catch (e) {
      const error = e instanceof AnnotationCorruption ? new AnnotationCorruption(id, e.reason) : new AnnotationCorruption(id, errorMessage(e));
      errors.push({ file, artifactId: id, error });
    }
  }

  return { records, errors };
}
