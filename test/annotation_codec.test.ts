import { describe, expect, it } from "vitest";
import { YamlBlockCodec } from "../src/annotation/codec.js";
import { applyEdits, lineExtent } from "../src/annotation/edits.js";
import { AnnotationCorruption } from "../src/errors.js";

const codec = new YamlBlockCodec();

describe("yaml block codec", () => {
  it("encodes one key per line between the markers", () => {
    expect(codec.encode({ ai_composed: "gpt-5", done: false }, "")).toBe(
      "/* @provenance\nai_composed: gpt-5\ndone: false\n*/\n",
    );
  });

  it("indents every line to the declaration", () => {
    expect(codec.encode({ done: true }, "  ")).toBe("  /* @provenance\n  done: true\n  */\n");
  });

  it("decodes what it encodes, nested values included", () => {
    const payload = {
      ai_composed: "gpt-5",
      history: ["2026-01-01T00:00:00.000Z annotated last_commit=unknown"],
      reviewers: [{ kind: "human", id: "dana", scrutiny: "high", timestamp: "t1", notes: null }],
      ticket: { id: "PRJ-1" },
    };
    const block = codec.encode(payload, "    ").trimEnd().trimStart();
    expect(codec.decode(block)).toEqual(payload);
  });

  it("keeps strings that look like other YAML types as strings", () => {
    const payload = { human_certified: "true", notes: "123", ai_composed: "null" };
    const block = codec.encode(payload, "").trimEnd();
    expect(codec.decode(block)).toEqual(payload);
  });

  it("returns null for comments that are not annotations", () => {
    expect(codec.decode("/* plain comment */")).toBeNull();
    expect(codec.decode("/** @provenance */")).toBeNull();
    expect(codec.isAnnotation("/* @provenance\ndone: true\n*/")).toBe(true);
    expect(codec.isAnnotation("/** docs */")).toBe(false);
  });

  it("decodes an empty block to an empty payload", () => {
    expect(codec.decode("/* @provenance\n*/")).toEqual({});
  });

  it("reports a body that is not a mapping", () => {
    expect(() => codec.decode("/* @provenance\n- a\n- b\n*/")).toThrow(AnnotationCorruption);
  });

  it("reports invalid YAML", () => {
    expect(() => codec.decode("/* @provenance\nkey: [unclosed\n*/")).toThrow(AnnotationCorruption);
  });

  it("escapes comment terminators inside values", () => {
    const payload = { notes: "checked the src/*/ glob", "odd*/key": ["a */ b", "plain"] };
    const block = codec.encode(payload, "  ");
    expect(block).toBe(
      '  /* @provenance\n  notes: "checked the src/*\\/ glob"\n  "odd*\\/key":\n    - "a *\\/ b"\n    - plain\n  */\n',
    );
    expect(codec.decode(block.trim())).toEqual(payload);
  });
});

describe("text edits", () => {
  it("applies edits against original offsets", () => {
    expect(
      applyEdits("abcdef", [
        { start: 0, end: 0, text: "X" },
        { start: 3, end: 4, text: "Y" },
      ]),
    ).toBe("XabcYef");
  });

  it("rejects overlapping edits", () => {
    expect(() =>
      applyEdits("abcdef", [
        { start: 1, end: 4, text: "" },
        { start: 2, end: 5, text: "" },
      ]),
    ).toThrow(RangeError);
  });

  it("extends a range to whole lines", () => {
    const text = "a\n  /* x */\nb";
    expect(lineExtent(text, 4, 11)).toEqual({ start: 2, end: 12 });
  });
});
