/** Replace `[start, end)` of the original text with `text`. Insertion when start === end. */
export type TextEdit = {
  start: number;
  end: number;
  text: string;
};

/**
 * Apply edits against the original offsets. Edits are applied from the end of
 * the text backwards so earlier offsets stay valid; overlapping edits are rejected.
 */
export function applyEdits(source: string, edits: readonly TextEdit[]): string {
  const ordered = [...edits].sort((a, b) => b.start - a.start || b.end - a.end);
  let out = source;
  let floor = source.length;
  for (const edit of ordered) {
    if (edit.start > edit.end || edit.end > floor) {
      throw new RangeError(`Overlapping or out-of-range edit at ${edit.start}-${edit.end}`);
    }
    out = out.slice(0, edit.start) + edit.text + out.slice(edit.end);
    floor = edit.start;
  }
  return out;
}

/** Offset of the first character of the line holding `offset`. */
export function lineStart(text: string, offset: number): number {
  return offset === 0 ? 0 : text.lastIndexOf("\n", offset - 1) + 1;
}

/**
 * Extent of whole lines covering `[start, end)`, including the trailing newline.
 * Used to replace a block comment that sits on lines of its own.
 */
export function lineExtent(text: string, start: number, end: number): { start: number; end: number } {
  const from = lineStart(text, start);
  const nl = text.indexOf("\n", end);
  return { start: from, end: nl === -1 ? text.length : nl + 1 };
}
