import type ts from "typescript";
import { canonicalize } from "./canonical.js";
import { sha256Hex } from "./checksum.js";

/** Content digest of a declaration, insensitive to formatting and comments. */
export function digestNode(node: ts.Node): string {
  return sha256Hex(canonicalize(node));
}
