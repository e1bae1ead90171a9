import { describe, it, expect } from "vitest";
import { toAuthor, toInstitution, toList, toWork } from "../../src/scholar/records.js";
import { sanitizeSearchText } from "../../src/scholar/sanitize.js";
import { buildPageResult } from "../../src/scholar/pagination.js";
import { sampleAuthor, sampleWork } from "../fixtures/index.js";

describe("toInstitution", () => {
  it("reads an author affiliation", () => {
    expect(
      toInstitution({ institution: { id: "https://openalex.org/I1", display_name: " Lab " } }),
    ).toEqual({ name: "Lab", id: "https://openalex.org/I1" });
  });

  it("reads an authorship affiliation, taking the first institution id", () => {
    expect(
      toInstitution({
        raw_affiliation_string: "Some Dept",
        institution_ids: ["https://openalex.org/I2", "https://openalex.org/I3"],
      }),
    ).toEqual({ name: "Some Dept", id: "https://openalex.org/I2" });
  });

  it("reads an institution entity", () => {
    expect(toInstitution({ id: "https://openalex.org/I4", display_name: "Inst" })).toEqual({
      name: "Inst",
      id: "https://openalex.org/I4",
    });
  });

  it("omits a missing id", () => {
    expect(toInstitution({ raw_affiliation_string: "No Ids", institution_ids: [] })).toEqual({
      name: "No Ids",
    });
    expect(toInstitution({ institution: null })).toEqual({ name: "" });
  });
});

describe("toAuthor", () => {
  it("reads an author entity with affiliations", () => {
    expect(toAuthor(sampleAuthor)).toEqual({
      name: "Ada Example",
      id: "https://openalex.org/A1",
      institutions: [{ name: "Example University", id: "https://openalex.org/I9" }],
    });
  });

  it("prefers the nested author of an authorship", () => {
    expect(
      toAuthor({
        id: "outer",
        display_name: "Outer",
        author: { id: "https://openalex.org/A7", display_name: "Inner" },
      }),
    ).toEqual({ name: "Inner", id: "https://openalex.org/A7", institutions: [] });
  });
});

describe("toWork", () => {
  it("normalizes a work record", () => {
    expect(toWork(sampleWork)).toEqual({
      title: "Sparse Graph Sampling",
      ids: {
        openalex: "https://openalex.org/W100",
        doi: "https://doi.org/10.1234/sgs.1",
      },
      cited_by_count: 42,
      authors: [
        {
          name: "Ada Example",
          id: "https://openalex.org/A1",
          institutions: [
            { name: "Dept. of Testing, Example University", id: "https://openalex.org/I9" },
          ],
        },
        { name: "Unaffiliated Writer", institutions: [] },
      ],
      publication_date: "2021-06-01",
      preferred_fulltext_url: "https://repo.example.org/sgs",
    });
  });

  it("walks the full-text URL preference order", () => {
    const primaryPdf = toWork({
      best_oa_location: null,
      primary_location: { pdf_url: "https://p.example.org/a.pdf", landing_page_url: "https://p.example.org/a" },
    });
    expect(primaryPdf.preferred_fulltext_url).toBe("https://p.example.org/a.pdf");

    const landing = toWork({ primary_location: { landing_page_url: "https://p.example.org/a" } });
    expect(landing.preferred_fulltext_url).toBe("https://p.example.org/a");

    const bestPdf = toWork({
      best_oa_location: { pdf_url: "https://oa.example.org/a.pdf", landing_page_url: "https://oa.example.org/a" },
      primary_location: { pdf_url: "https://p.example.org/a.pdf" },
    });
    expect(bestPdf.preferred_fulltext_url).toBe("https://oa.example.org/a.pdf");
  });

  it("falls back to display_name and drops absent fields", () => {
    expect(toWork({ display_name: "Only Name", cited_by_count: 1.5 })).toEqual({
      title: "Only Name",
      ids: {},
      authors: [],
    });
  });
});

describe("toList", () => {
  it("skips entries that are not objects", () => {
    expect(toList([{ id: "a", display_name: "A" }, "junk", null, 3], toInstitution)).toEqual([
      { name: "A", id: "a" },
    ]);
    expect(toList("not a list", toInstitution)).toEqual([]);
  });
});

describe("sanitizeSearchText", () => {
  it("turns commas into spaces and collapses whitespace", () => {
    expect(sanitizeSearchText("  graph,  neural\tnetworks,,models ")).toBe(
      "graph neural networks models",
    );
  });

  it("passes empty and absent values through", () => {
    expect(sanitizeSearchText("")).toBe("");
    expect(sanitizeSearchText(undefined)).toBeUndefined();
  });
});

describe("buildPageResult", () => {
  it("sets has_next only when more results remain", () => {
    expect(buildPageResult(["a"], 37, 10, 1)).toEqual({
      data: ["a"],
      total_count: 37,
      per_page: 10,
      page: 1,
      has_next: true,
    });
    expect(buildPageResult(["a"], 37, 10, 4)).toEqual({
      data: ["a"],
      total_count: 37,
      per_page: 10,
      page: 4,
    });
    expect(buildPageResult(["a"], 30, 10, 3)).not.toHaveProperty("has_next");
  });

  it("omits total_count when unknown", () => {
    expect(buildPageResult([], undefined, 10, 1)).toEqual({ data: [], per_page: 10, page: 1 });
  });
});
