import fs from "node:fs";
import path from "node:path";
import { beforeAll, describe, expect, it } from "vitest";
import { createSchemaRegistry, SchemaRegistry } from "../src/schema/registry.js";
import { makeTmpDir } from "./fixtures.js";

describe("schema registry", () => {
  let registry: SchemaRegistry;

  beforeAll(() => {
    registry = createSchemaRegistry();
  });

  it("discovers the bundled schemas", () => {
    expect(registry.names()).toEqual(["annotation", "config", "policy", "registry"]);
  });

  it("reads versions from the $id", () => {
    expect(registry.versions()).toEqual({
      annotation: "1.0.0",
      config: "1.0.0",
      policy: "1.0.0",
      registry: "1.0.0",
    });
  });

  it("throws for an unknown schema", () => {
    expect(() => registry.validate("manifest", {})).toThrow("Schema not found: manifest");
  });

  it("throws for a missing directory", () => {
    expect(() => SchemaRegistry.fromDirectory("/nonexistent/schemas")).toThrow("Schema directory not found");
  });

  it("gives each registry its own validator instance", () => {
    const other = createSchemaRegistry();
    expect(other.validate("registry", { version: 1, artifacts: {} }).valid).toBe(true);
    expect(registry.validate("registry", { version: 1, artifacts: {} }).valid).toBe(true);
  });

  describe("annotation schema", () => {
    it("accepts known keys and keeps unknown ones valid", () => {
      const { valid } = registry.validate("annotation", {
        ai_composed: "gpt-5",
        human_certified: "pending",
        scrutiny: "auto",
        history: ["2026-01-01T00:00:00.000Z annotated"],
        reviewers: [{ kind: "human", id: "dana", scrutiny: "high", timestamp: "2026-01-01T00:00:00.000Z" }],
        ticket: "OPS-1",
      });
      expect(valid).toBe(true);
    });

    it("rejects a reviewer without a timestamp", () => {
      const { valid, errors } = registry.validate(
        "annotation",
        { reviewers: [{ kind: "human", id: "dana", scrutiny: "high" }] },
        "annotation",
      );
      expect(valid).toBe(false);
      expect(errors).toContain("must have required property 'timestamp'");
    });

    it("rejects a non-boolean done", () => {
      expect(registry.validate("annotation", { done: "yes" }).valid).toBe(false);
    });
  });

  describe("registry schema", () => {
    it("rejects a short digest", () => {
      const { valid } = registry.validate("registry", {
        version: 1,
        artifacts: { "a.ts::a": { digest: "abc", finalized_at: "2026-01-01T00:00:00.000Z", metadata: {} } },
      });
      expect(valid).toBe(false);
    });

    it("rejects an unknown archive reason", () => {
      const { valid } = registry.validate("registry", {
        version: 1,
        artifacts: {},
        archive: [{ id: "a.ts::a", archived_at: "x", reason: "manual", old_digest: "a", new_digest: "b" }],
      });
      expect(valid).toBe(false);
    });
  });

  describe("policy schema", () => {
    it("accepts a full policy", () => {
      const { valid } = registry.validate("policy", {
        enforcement: { ai_composed_requires_high_scrutiny: true, min_coverage: 0.9, orphaned_entries: "error" },
        reviewers: ["dana"],
        integrations: { agents: { enabled: true, allowed_ids: ["bot-x"], reviewers: [{ id: "bot-x", max_scrutiny: "medium" }] } },
      });
      expect(valid).toBe(true);
    });

    it("rejects unknown enforcement keys", () => {
      expect(registry.validate("policy", { enforcement: { strictness: 11 } }).valid).toBe(false);
    });
  });

  it("loads schemas from another directory", () => {
    const dir = makeTmpDir("schemas");
    try {
      fs.writeFileSync(
        path.join(dir, "note.schema.json"),
        JSON.stringify({ $id: "urn:test:note@2.1.0", type: "object", required: ["text"] }),
      );
      const custom = createSchemaRegistry(dir);
      expect(custom.versions()).toEqual({ note: "2.1.0" });
      expect(custom.validate("note", { text: "hi" }).valid).toBe(true);
      expect(custom.validate("note", {}).valid).toBe(false);
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });
});
