import { describe, it, expect, vi } from "vitest";
import { isTaggedError } from "../../src/core/Retry.js";
import type { LookupFn } from "../../src/security/urlGuard.js";
import { DEFAULT_SCHOLAR_TOOLS_CONFIG } from "../../src/scholar/types.js";
import { searchPapersHandler } from "../../src/scholar/works/searchPapers.js";
import { papersByAuthorHandler } from "../../src/scholar/works/papersByAuthor.js";
import { worksCitingPaperHandler } from "../../src/scholar/works/worksCitingPaper.js";
import { referencedWorksHandler } from "../../src/scholar/works/referencedWorks.js";
import { relatedWorksHandler } from "../../src/scholar/works/relatedWorks.js";
import { searchAuthorsHandler } from "../../src/scholar/authors/searchAuthors.js";
import { searchInstitutionsHandler } from "../../src/scholar/institutions/searchInstitutions.js";
import {
  fetchFulltextHandler,
  normalizeFulltextUrl,
} from "../../src/scholar/fulltext/fetchFulltext.js";
import {
  fakeResponse,
  jsonResponse,
  page,
  queuedFetch,
  sampleAuthor,
  sampleInstitution,
  sampleWork,
  scholarContext,
} from "../fixtures/index.js";

const expectedWork = {
  title: "Sparse Graph Sampling",
  ids: { openalex: "https://openalex.org/W100", doi: "https://doi.org/10.1234/sgs.1" },
  cited_by_count: 42,
  authors: [
    {
      name: "Ada Example",
      id: "https://openalex.org/A1",
      institutions: [{ name: "Dept. of Testing, Example University", id: "https://openalex.org/I9" }],
    },
    { name: "Unaffiliated Writer", institutions: [] },
  ],
  publication_date: "2021-06-01",
  preferred_fulltext_url: "https://repo.example.org/sgs",
};

function queryOf(url: string | undefined): URL {
  if (url === undefined) throw new Error("no request was made");
  return new URL(url);
}

async function failureOf(promise: Promise<unknown>): Promise<{ kind: string; message: string }> {
  try {
    await promise;
  } catch (err) {
    if (isTaggedError(err)) return { kind: err.kind, message: err.message };
    throw err;
  }
  throw new Error("expected a rejection");
}

describe("scholar/search_papers", () => {
  it("builds the combined filter and returns a page of works", async () => {
    const { fetch, calls } = queuedFetch(jsonResponse(page([sampleWork], 37)));

    const output = await searchPapersHandler(
      {
        query: "graph,  networks",
        search_by: "title",
        sort_by: "cited_by_count",
        institution_name: "Example, University",
        author_id: "https://openalex.org/A1",
        page: 1,
      },
      scholarContext(fetch),
    );

    const url = queryOf(calls[0]?.url);
    expect(url.origin + url.pathname).toBe("https://api.openalex.org/works");
    expect(url.searchParams.get("filter")).toBe(
      'title.search:"graph networks",raw_affiliation_strings.search:"Example University",authorships.author.id:https://openalex.org/A1',
    );
    expect(url.searchParams.get("sort")).toBe("cited_by_count:desc");
    expect(url.searchParams.get("page")).toBe("1");
    expect(url.searchParams.get("per_page")).toBe("10");
    expect(url.searchParams.get("mailto")).toBe(DEFAULT_SCHOLAR_TOOLS_CONFIG.openalex.mailto);
    expect(calls[0]?.init.headers).toEqual({
      "User-Agent": "scholar-tools/0.1",
      Accept: "application/json",
    });

    expect(output.result).toEqual({
      data: [expectedWork],
      total_count: 37,
      per_page: 10,
      page: 1,
      has_next: true,
    });
    expect(output.evidence).toHaveLength(1);
    expect(output.evidence[0]).toMatchObject({
      type: "url",
      ref: "https://api.openalex.org/works",
      summary: "GET /works page 1: 1 of 37 results",
    });
  });

  it("falls back to the default field and relevance sort", async () => {
    const { fetch, calls } = queuedFetch(jsonResponse(page([sampleWork], 1)));
    const output = await searchPapersHandler({ query: "sampling" }, scholarContext(fetch));

    const url = queryOf(calls[0]?.url);
    expect(url.searchParams.get("filter")).toBe('default.search:"sampling"');
    expect(url.searchParams.get("sort")).toBe("relevance_score:desc");
    expect(output.result).toEqual({ data: [expectedWork], total_count: 1, per_page: 10, page: 1 });
  });

  it("reports NOT_FOUND for an empty page", async () => {
    const { fetch } = queuedFetch(jsonResponse(page([], 0)));
    expect(await failureOf(searchPapersHandler({ query: "nothing" }, scholarContext(fetch)))).toEqual({
      kind: "NOT_FOUND",
      message: "No works found with the query.",
    });
  });

  it("rejects an unknown search field", async () => {
    const { fetch } = queuedFetch(jsonResponse(page([])));
    const failure = await failureOf(
      searchPapersHandler({ query: "x", search_by: "abstract" }, scholarContext(fetch)),
    );
    expect(failure.kind).toBe("INPUT_SCHEMA_INVALID");
    expect(fetch).not.toHaveBeenCalled();
  });
});

describe("scholar/papers_by_author", () => {
  it("filters works by author id", async () => {
    const { fetch, calls } = queuedFetch(jsonResponse(page([sampleWork], 25)));
    const output = await papersByAuthorHandler(
      { author_id: "https://openalex.org/A1", sort_by: "publication_date", page: 3 },
      scholarContext(fetch),
    );

    const url = queryOf(calls[0]?.url);
    expect(url.searchParams.get("filter")).toBe("authorships.author.id:https://openalex.org/A1");
    expect(url.searchParams.get("sort")).toBe("publication_date:desc");
    expect(url.searchParams.get("page")).toBe("3");
    expect(output.result).toEqual({ data: [expectedWork], total_count: 25, per_page: 10, page: 3 });
  });

  it("names the author when nothing is found", async () => {
    const { fetch } = queuedFetch(jsonResponse(page([])));
    expect(
      await failureOf(papersByAuthorHandler({ author_id: "A404" }, scholarContext(fetch))),
    ).toEqual({ kind: "NOT_FOUND", message: "No works found for author_id=A404." });
  });
});

describe("scholar/works_citing_paper", () => {
  it("filters by cites and sorts by citations", async () => {
    const { fetch, calls } = queuedFetch(jsonResponse(page([sampleWork], 5)));
    await worksCitingPaperHandler({ paper_id: "W1" }, scholarContext(fetch));

    const url = queryOf(calls[0]?.url);
    expect(url.searchParams.get("filter")).toBe("cites:W1");
    expect(url.searchParams.get("sort")).toBe("cited_by_count:desc");
  });

  it("treats a 404 as no citing works", async () => {
    const { fetch } = queuedFetch(fakeResponse(404));
    expect(await failureOf(worksCitingPaperHandler({ paper_id: "W1" }, scholarContext(fetch)))).toEqual({
      kind: "NOT_FOUND",
      message: "No cites found for paper_id=W1.",
    });
    expect(fetch).toHaveBeenCalledTimes(1);
  });
});

describe("scholar/search_authors", () => {
  it("searches by name within an institution", async () => {
    const { fetch, calls } = queuedFetch(jsonResponse(page([sampleAuthor], 1)));
    const output = await searchAuthorsHandler(
      { query: "Ada, Example", institution_id: "https://openalex.org/I9" },
      scholarContext(fetch),
    );

    const url = queryOf(calls[0]?.url);
    expect(url.pathname).toBe("/authors");
    expect(url.searchParams.get("filter")).toBe(
      'default.search:"Ada Example",affiliations.institution.id:"https://openalex.org/I9"',
    );
    expect(output.result).toEqual({
      data: [
        {
          name: "Ada Example",
          id: "https://openalex.org/A1",
          institutions: [{ name: "Example University", id: "https://openalex.org/I9" }],
        },
      ],
      total_count: 1,
      per_page: 10,
      page: 1,
    });
  });
});

describe("scholar/search_institutions", () => {
  it("returns institutions by name", async () => {
    const { fetch, calls } = queuedFetch(jsonResponse(page([sampleInstitution], 11)));
    const output = await searchInstitutionsHandler({ query: "Example" }, scholarContext(fetch));

    expect(queryOf(calls[0]?.url).pathname).toBe("/institutions");
    expect(output.result).toEqual({
      data: [{ name: "Example University", id: "https://openalex.org/I9" }],
      total_count: 11,
      per_page: 10,
      page: 1,
      has_next: true,
    });
  });

  it("reports an empty result set", async () => {
    const { fetch } = queuedFetch(jsonResponse(page([], 0)));
    expect(await failureOf(searchInstitutionsHandler({ query: "Nowhere" }, scholarContext(fetch)))).toEqual({
      kind: "NOT_FOUND",
      message: "No institutions found with the query.",
    });
  });
});

describe("work id lists", () => {
  it("lists referenced works", async () => {
    const { fetch, calls } = queuedFetch(
      jsonResponse({ id: "W1", referenced_works: ["https://openalex.org/W2", "https://openalex.org/W3"] }),
    );
    const output = await referencedWorksHandler({ paper_id: "W1" }, scholarContext(fetch));

    expect(queryOf(calls[0]?.url).pathname).toBe("/works/W1");
    expect(output.result).toEqual({
      data: ["https://openalex.org/W2", "https://openalex.org/W3"],
      count: 2,
    });
    expect(output.evidence[0]).toMatchObject({ summary: "GET /works/W1: 2 referenced_works" });
  });

  it("lists related works", async () => {
    const { fetch } = queuedFetch(jsonResponse({ related_works: ["https://openalex.org/W9"] }));
    const output = await relatedWorksHandler({ paper_id: "W1" }, scholarContext(fetch));
    expect(output.result).toEqual({ data: ["https://openalex.org/W9"], count: 1 });
  });

  it("reports an empty list as NOT_FOUND", async () => {
    const { fetch } = queuedFetch(jsonResponse({ related_works: [] }));
    expect(await failureOf(relatedWorksHandler({ paper_id: "W1" }, scholarContext(fetch)))).toEqual({
      kind: "NOT_FOUND",
      message: "No related_works works found for paper_id=W1.",
    });
  });

  it("reports a missing paper as NOT_FOUND", async () => {
    const { fetch } = queuedFetch(fakeResponse(404));
    expect(await failureOf(referencedWorksHandler({ paper_id: "W0" }, scholarContext(fetch)))).toEqual({
      kind: "NOT_FOUND",
      message: "No referenced works found for paper_id=W0.",
    });
  });
});

describe("scholar/fetch_fulltext", () => {
  it("strips a proxy prefix the caller already applied", () => {
    expect(normalizeFulltextUrl("https://r.jina.ai/https://arxiv.org/pdf/1", "https://r.jina.ai")).toBe(
      "https://arxiv.org/pdf/1",
    );
    expect(normalizeFulltextUrl("https://arxiv.org/pdf/1", "https://r.jina.ai/")).toBe(
      "https://arxiv.org/pdf/1",
    );
  });

  it("fetches the page through the proxy", async () => {
    const { fetch, calls } = queuedFetch(fakeResponse(200, "# Sparse Graph Sampling\n\nAbstract..."));
    const output = await fetchFulltextHandler(
      { preferred_fulltext_url: "https://r.jina.ai/https://arxiv.org/pdf/1" },
      scholarContext(fetch),
    );

    expect(calls[0]?.url).toBe("https://r.jina.ai/https://arxiv.org/pdf/1");
    expect(calls[0]?.init.headers).toEqual({ "User-Agent": "scholar-tools/0.1" });
    expect(output.result).toBe("# Sparse Graph Sampling\n\nAbstract...");
    expect(output.evidence[0]).toMatchObject({
      type: "url",
      ref: "https://arxiv.org/pdf/1",
      summary: "Fetched full text via https://r.jina.ai (36 chars)",
    });
  });

  it("refuses a disallowed URL without fetching", async () => {
    const { fetch } = queuedFetch(fakeResponse(200, "secret"));
    expect(
      await failureOf(
        fetchFulltextHandler({ preferred_fulltext_url: "http://localhost/admin" }, scholarContext(fetch)),
      ),
    ).toEqual({
      kind: "HTTP_DISALLOWED_HOST",
      message: "Invalid or Disallowed URL: http://localhost/admin",
    });
    expect(fetch).not.toHaveBeenCalled();
  });

  it("refuses a host that resolves to a private address", async () => {
    const { fetch } = queuedFetch(fakeResponse(200, "secret"));
    const lookup: LookupFn = async () => [{ address: "10.0.0.8", family: 4 }];

    const failure = await failureOf(
      fetchFulltextHandler(
        { preferred_fulltext_url: "https://internal.example.org/doc" },
        scholarContext(fetch, { lookup }),
      ),
    );

    expect(failure.kind).toBe("HTTP_DISALLOWED_HOST");
    expect(fetch).not.toHaveBeenCalled();
  });

  it("skips the DNS check when resolveHosts is off", async () => {
    const { fetch } = queuedFetch(fakeResponse(200, "text"));
    const lookup = vi.fn<LookupFn>(async () => [{ address: "10.0.0.8", family: 4 }]);
    const config = {
      ...DEFAULT_SCHOLAR_TOOLS_CONFIG,
      fulltext: { ...DEFAULT_SCHOLAR_TOOLS_CONFIG.fulltext, resolveHosts: false },
    };

    const output = await fetchFulltextHandler(
      { preferred_fulltext_url: "https://papers.example.org/doc" },
      scholarContext(fetch, { lookup, config }),
    );

    expect(output.result).toBe("text");
    expect(lookup).not.toHaveBeenCalled();
  });

  it("reports an empty body as EMPTY_CONTENT", async () => {
    const { fetch } = queuedFetch(fakeResponse(200, ""));
    expect(
      await failureOf(
        fetchFulltextHandler({ preferred_fulltext_url: "https://arxiv.org/pdf/1" }, scholarContext(fetch)),
      ),
    ).toEqual({ kind: "EMPTY_CONTENT", message: "Response is empty content. Try again later." });
  });

  it("serializes a JSON body back to text", async () => {
    const { fetch } = queuedFetch(jsonResponse({ title: "T" }));
    const output = await fetchFulltextHandler(
      { preferred_fulltext_url: "https://arxiv.org/pdf/1" },
      scholarContext(fetch),
    );
    expect(output.result).toBe('{"title":"T"}');
  });

  it("does not treat a proxy 404 as empty", async () => {
    const { fetch } = queuedFetch(fakeResponse(404));
    expect(
      await failureOf(
        fetchFulltextHandler({ preferred_fulltext_url: "https://arxiv.org/pdf/1" }, scholarContext(fetch)),
      ),
    ).toEqual({ kind: "HTTP_STATUS", message: "Request failed with status: 404" });
  });
});
