import { describe, it, expect, beforeEach } from "vitest";
import { ToolRegistry } from "../src/registry/ToolRegistry.js";
import { ALL_SCHOLAR_TOOLS } from "../src/scholar/ScholarToolsModule.js";
import { searchPapersSpec } from "../src/scholar/works/searchPapers.js";
import { fetchFulltextSpec } from "../src/scholar/fulltext/fetchFulltext.js";

describe("ToolRegistry", () => {
  let registry: ToolRegistry;

  beforeEach(() => {
    registry = new ToolRegistry();
  });

  describe("register / get", () => {
    it("should register and retrieve a tool", () => {
      registry.register(searchPapersSpec);
      expect(registry.get("scholar/search_papers")).toEqual(searchPapersSpec);
      expect(registry.has("scholar/search_papers")).toBe(true);
    });

    it("should replace on re-register without moving the tool", () => {
      registry.register(searchPapersSpec);
      registry.register(fetchFulltextSpec);
      registry.register({ ...searchPapersSpec, version: "2.0.0" });

      expect(registry.get("scholar/search_papers")?.version).toBe("2.0.0");
      expect(registry.size).toBe(2);
      expect(registry.list()).toEqual(["scholar/search_papers", "scholar/fetch_fulltext"]);
    });

    it("should return undefined for unknown tools", () => {
      expect(registry.get("scholar/nonexistent")).toBeUndefined();
      expect(registry.has("scholar/nonexistent")).toBe(false);
    });
  });

  describe("snapshot / list", () => {
    it("should keep registration order", () => {
      registry.register(fetchFulltextSpec);
      registry.register(searchPapersSpec);
      expect(registry.list()).toEqual(["scholar/fetch_fulltext", "scholar/search_papers"]);
      expect(registry.snapshot()).toEqual([fetchFulltextSpec, searchPapersSpec]);
    });

    it("should hold every scholar tool", () => {
      for (const { spec } of ALL_SCHOLAR_TOOLS) registry.register(spec);
      expect(registry.size).toBe(8);
    });
  });

  describe("validation", () => {
    it("should reject spec without name", () => {
      expect(() => registry.register({ ...searchPapersSpec, name: "" })).toThrow(
        "ToolSpec.name is required",
      );
    });

    it("should reject spec without version", () => {
      expect(() => registry.register({ ...searchPapersSpec, version: "" })).toThrow(
        "ToolSpec.version is required",
      );
    });

    it("should reject names outside the namespace/tool_name form", () => {
      expect(() => registry.register({ ...searchPapersSpec, name: "Search Papers" })).toThrow(
        'ToolSpec.name must look like "namespace/tool_name": Search Papers',
      );
    });
  });
});
