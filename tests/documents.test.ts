import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import {
  DemographicsDocumentSchema,
  PhotoPromptsDocumentSchema,
  ScriptCategoriesDocumentSchema,
  SubstitutionsDocumentSchema,
  loadDocument,
} from "../src/config/documents.js";
import { ReportError } from "../src/errors.js";

describe("loadDocument", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "collection-report-docs-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  function write(name: string, content: string): string {
    const path = join(dir, name);
    writeFileSync(path, content, "utf8");
    return path;
  }

  it("reads JSON documents", () => {
    const path = write(
      "demographics.json",
      JSON.stringify({ pattern: "\\d+", attributes: { Age: 3, Gender: "4" } }),
    );
    expect(loadDocument(path, DemographicsDocumentSchema)).toEqual({
      pattern: "\\d+",
      attributes: { Age: 3, Gender: 4 },
    });
  });

  it("reads script category rules in document order", () => {
    const path = write(
      "categories.yaml",
      ["- title: Tier", "  rules:", "    1-5: low", "    3: special", '    "6": high', ""].join("\n"),
    );
    expect(loadDocument(path, ScriptCategoriesDocumentSchema, { mapAsMap: true })).toEqual([
      {
        title: "Tier",
        rules: [
          ["1-5", "low"],
          ["3", "special"],
          ["6", "high"],
        ],
      },
    ]);
  });

  it("keeps rule order in JSON category documents", () => {
    const path = write("categories.json", '[{"title": "Tier", "rules": {"1-5": "low", "3": "special"}}]');
    expect(loadDocument(path, ScriptCategoriesDocumentSchema, { mapAsMap: true })[0]?.rules).toEqual([
      ["1-5", "low"],
      ["3", "special"],
    ]);
  });

  it("accepts substitution tables with scalar replacements", () => {
    const path = write("subs.json", JSON.stringify({ Gender: { M: "Male", F: "Female", X: null } }));
    expect(loadDocument(path, SubstitutionsDocumentSchema)).toEqual({
      Gender: { M: "Male", F: "Female", X: null },
    });
  });

  it("rejects an invalid regular expression", () => {
    const path = write("bad.json", JSON.stringify({ pattern: "(", attributes: {} }));
    expect(() => loadDocument(path, DemographicsDocumentSchema)).toThrow(ReportError);
  });

  it("rejects photo prompt names that cannot form a column name", () => {
    const path = write("photos.json", JSON.stringify({ "1image1": "ev station" }));
    try {
      loadDocument(path, PhotoPromptsDocumentSchema);
      expect.unreachable("should have thrown");
    } catch (e: unknown) {
      expect(e).toBeInstanceOf(ReportError);
      if (e instanceof ReportError) {
        expect(e.code).toBe("CONFIG_INVALID");
        expect(e.details["path"]).toBe(path);
      }
    }
  });

  it("reports a missing file as CONFIG_INVALID", () => {
    try {
      loadDocument(join(dir, "absent.json"), SubstitutionsDocumentSchema);
      expect.unreachable("should have thrown");
    } catch (e: unknown) {
      expect(e instanceof ReportError && e.code).toBe("CONFIG_INVALID");
    }
  });
});
