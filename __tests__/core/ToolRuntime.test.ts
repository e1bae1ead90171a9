import { describe, it, expect, beforeEach } from "vitest";
import { ToolRuntime } from "../../src/core/ToolRuntime.js";
import { BudgetManager } from "../../src/core/Budget.js";
import { ToolRegistry } from "../../src/registry/ToolRegistry.js";
import { registerScholarTools } from "../../src/scholar/ScholarToolsModule.js";
import { searchPapersSpec } from "../../src/scholar/works/searchPapers.js";
import type { ToolAdapter } from "../../src/types/ToolSpec.js";
import type { ToolIntent } from "../../src/types/ToolIntent.js";
import {
  execCtx,
  fakeClientFactory,
  jsonResponse,
  page,
  publicLookup,
  queuedFetch,
  sampleWork,
  silentLogger,
} from "../fixtures/index.js";

function intent(tool: string, args: unknown): ToolIntent {
  return { tool, args, purpose: "test" };
}

function scholarRuntime(fetch: ReturnType<typeof queuedFetch>["fetch"], includeRaw = false) {
  const registry = new ToolRegistry();
  const adapter = registerScholarTools(
    registry,
    {},
    { logger: silentLogger(), createClient: fakeClientFactory(fetch).factory, lookup: publicLookup },
  );
  const runtime = new ToolRuntime({ registry, config: { includeRaw, debug: { enabled: false } } });
  runtime.registerAdapter(adapter);
  return runtime;
}

/** Runtime with one tool served by a stub adapter. */
function stubRuntime(invoke: ToolAdapter["invoke"], budget?: BudgetManager) {
  const registry = new ToolRegistry();
  registry.register(searchPapersSpec);
  const runtime = new ToolRuntime({ registry, budget, config: { debug: { enabled: false } } });
  runtime.registerAdapter({ kind: "scholar", invoke });
  return runtime;
}

const emptyPage = { data: [], per_page: 10, page: 1 };

describe("ToolRuntime", () => {
  describe("with the scholar adapter", () => {
    let fetchQueue: ReturnType<typeof queuedFetch>;

    beforeEach(() => {
      fetchQueue = queuedFetch(jsonResponse(page([sampleWork], 37)));
    });

    it("runs a tool and collects evidence", async () => {
      const runtime = scholarRuntime(fetchQueue.fetch);

      const result = await runtime.invoke(
        intent("scholar/search_papers", { query: "graphs", page: "1" }),
        execCtx,
      );

      expect(result.ok).toBe(true);
      expect(result.result).toMatchObject({ total_count: 37, per_page: 10, page: 1, has_next: true });
      expect(result.evidence.slice(0, 3).map((e) => [e.type, e.ref])).toEqual([
        ["url", "https://api.openalex.org/works"],
        ["tool", "scholar/search_papers@1.0.0"],
        ["url", "https://repo.example.org/sgs"],
      ]);
      expect(result.raw).toBeUndefined();
    });

    it("includes the adapter output when includeRaw is set", async () => {
      const runtime = scholarRuntime(fetchQueue.fetch, true);
      const result = await runtime.invoke(intent("scholar/search_papers", { query: "graphs" }), execCtx);
      expect(result.raw).toHaveProperty("evidence");
    });

    it("records TOOL_CALLED then TOOL_RESULT", async () => {
      const runtime = scholarRuntime(fetchQueue.fetch);
      await runtime.invoke(intent("scholar/search_papers", { query: "graphs" }), execCtx);

      const events = runtime.getEventLog().getAll().map((entry) => entry.event);
      expect(events.map((e) => e.type)).toEqual(["TOOL_CALLED", "TOOL_RESULT"]);
      expect(events[1]).toMatchObject({ ok: true, requestId: "req-1", toolName: "scholar/search_papers" });
      expect(
        runtime.getMetrics().getCounter("tool_invocations_total", {
          toolName: "scholar/search_papers",
          ok: "true",
        }),
      ).toBe(1);
    });

    it("reports an unknown tool", async () => {
      const runtime = scholarRuntime(fetchQueue.fetch);
      const result = await runtime.invoke(intent("scholar/missing", {}), execCtx);
      expect(result.ok).toBe(false);
      expect(result.error?.kind).toBe("TOOL_NOT_FOUND");
      expect(result.error?.message).toBe("Tool not found: scholar/missing");
    });

    it("rejects invalid input before calling the API", async () => {
      const runtime = scholarRuntime(fetchQueue.fetch);
      const result = await runtime.invoke(intent("scholar/search_papers", { query: "" }), execCtx);

      expect(result.error?.kind).toBe("INPUT_SCHEMA_INVALID");
      expect(result.error?.message).toBe(
        "Input validation failed for scholar/search_papers: /query must NOT have fewer than 1 characters",
      );
      expect(fetchQueue.fetch).not.toHaveBeenCalled();
    });

    it("denies a tool whose capabilities are not granted", async () => {
      const runtime = scholarRuntime(fetchQueue.fetch);
      const result = await runtime.invoke(
        intent("scholar/fetch_fulltext", { preferred_fulltext_url: "https://arxiv.org/pdf/1" }),
        { ...execCtx, permissions: ["network"] },
      );

      expect(result.error).toMatchObject({ kind: "POLICY_DENIED", message: "Missing capabilities: read:web" });
      expect(runtime.getEventLog().query({ type: "POLICY_DENIED" })).toHaveLength(1);
      expect(
        runtime.getMetrics().getCounter("policy_denied_total", { toolName: "scholar/fetch_fulltext" }),
      ).toBe(1);
      expect(fetchQueue.fetch).not.toHaveBeenCalled();
    });

    it("passes the handler's error kind through", async () => {
      const { fetch } = queuedFetch(jsonResponse(page([], 0)));
      const runtime = scholarRuntime(fetch);

      const result = await runtime.invoke(intent("scholar/search_papers", { query: "nothing" }), execCtx);

      expect(result.error).toMatchObject({ kind: "NOT_FOUND", message: "No works found with the query." });
      expect(
        runtime.getMetrics().getCounter("tool_errors_total", {
          toolName: "scholar/search_papers",
          kind: "NOT_FOUND",
        }),
      ).toBe(1);
    });
  });

  describe("with a stub adapter", () => {
    it("times out a call that never settles", async () => {
      const runtime = stubRuntime(() => new Promise(() => {}));
      const result = await runtime.invoke(intent("scholar/search_papers", { query: "graphs" }), {
        ...execCtx,
        budget: { timeoutMs: 10 },
      });
      expect(result.error).toMatchObject({
        kind: "TIMEOUT",
        message: "Tool scholar/search_papers timed out after 10ms",
      });
    });

    it("aborts the execution signal when the call times out", async () => {
      const signals: AbortSignal[] = [];
      const runtime = stubRuntime((_spec, _args, ctx) => {
        if (ctx.signal) signals.push(ctx.signal);
        return new Promise(() => {});
      });
      await runtime.invoke(intent("scholar/search_papers", { query: "graphs" }), {
        ...execCtx,
        budget: { timeoutMs: 10 },
      });

      expect(signals).toHaveLength(1);
      expect(signals[0]?.aborted).toBe(true);
      expect(signals[0]?.reason).toMatchObject({
        kind: "TIMEOUT",
        message: "Tool scholar/search_papers timed out after 10ms",
      });
    });

    it("rejects output that breaks the output schema", async () => {
      const runtime = stubRuntime(async () => ({ result: 42 }));
      const result = await runtime.invoke(intent("scholar/search_papers", { query: "graphs" }), execCtx);
      expect(result.error?.kind).toBe("OUTPUT_SCHEMA_INVALID");
    });

    it("maps an untagged adapter error to UPSTREAM_ERROR", async () => {
      const runtime = stubRuntime(async () => {
        throw new Error("adapter exploded");
      });
      const result = await runtime.invoke(intent("scholar/search_papers", { query: "graphs" }), execCtx);
      expect(result.error).toEqual({ kind: "UPSTREAM_ERROR", message: "adapter exploded", details: undefined });
    });

    it("enforces the rate limit per tool", async () => {
      const budget = new BudgetManager({ rateLimit: { maxCalls: 1, windowMs: 60_000 } });
      const runtime = stubRuntime(async () => ({ result: emptyPage }), budget);

      const first = await runtime.invoke(intent("scholar/search_papers", { query: "a" }), execCtx);
      const second = await runtime.invoke(intent("scholar/search_papers", { query: "b" }), execCtx);

      expect(first.ok).toBe(true);
      expect(second.error).toMatchObject({
        kind: "BUDGET_EXCEEDED",
        message: "Rate limit exceeded for tool: scholar/search_papers",
      });
    });

    it("passes validated args to the adapter", async () => {
      const seen: unknown[] = [];
      const runtime = stubRuntime(async (_spec, args) => {
        seen.push(args);
        return { result: emptyPage };
      });
      await runtime.invoke(intent("scholar/search_papers", { query: "graphs", page: "2", junk: 1 }), execCtx);
      expect(seen).toEqual([
        { query: "graphs", search_by: "default", sort_by: "relevance_score", page: 2 },
      ]);
    });
  });
});
