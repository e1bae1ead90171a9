import { vi } from "vitest";
import {
  RequestClient,
  type ClientFactory,
  type FetchInit,
  type FetchLike,
  type FetchResponse,
} from "../../src/http/RequestClient.js";
import { createLogger, type Logger } from "../../src/observability/Logger.js";
import type { ExecContext } from "../../src/types/ToolIntent.js";
import { DEFAULT_SCHOLAR_TOOLS_CONFIG, type ScholarToolContext } from "../../src/scholar/types.js";
import type { LookupFn } from "../../src/security/urlGuard.js";

/**
 * A response the fake transport hands back.
 */
export function fakeResponse(
  status: number,
  body = "",
  headers: Record<string, string> = {},
): FetchResponse {
  const lower = new Map(Object.entries(headers).map(([k, v]) => [k.toLowerCase(), v]));
  return {
    status,
    headers: { get: (name) => lower.get(name.toLowerCase()) ?? null },
    text: async () => body,
  };
}

export function jsonResponse(body: unknown, status = 200): FetchResponse {
  return fakeResponse(status, JSON.stringify(body), { "content-type": "application/json" });
}

export interface FetchCall {
  url: string;
  init: FetchInit;
}

/**
 * Fake transport serving queued responses in order. An Error in the queue is thrown
 * instead; once the queue runs dry the last entry repeats.
 */
export function queuedFetch(...queue: Array<FetchResponse | Error>) {
  const calls: FetchCall[] = [];
  const fetch = vi.fn<FetchLike>(async (url, init) => {
    calls.push({ url, init });
    const next = queue.length > 1 ? queue.shift() : queue[0];
    if (next === undefined) throw new Error("no response queued");
    if (next instanceof Error) throw next;
    return next;
  });
  return { fetch, calls };
}

export function silentLogger(): Logger {
  return createLogger({ enabled: false });
}

/**
 * Lines written by a logger, for assertions on log output.
 */
export function capturingLogger(level: "info" | "debug" = "info"): { logger: Logger; lines: string[] } {
  const lines: string[] = [];
  const logger = createLogger({
    enabled: true,
    level,
    prefix: "test",
    write: (line) => lines.push(line),
  });
  return { logger, lines };
}

export function noopConnection() {
  const close = vi.fn(async () => {});
  return { handle: { close }, close };
}

/**
 * Client factory wired to a fake transport: no sleeping, no jitter, no pool.
 */
export function fakeClientFactory(fetch: FetchLike): {
  factory: ClientFactory;
  clients: RequestClient[];
  sleeps: number[];
} {
  const clients: RequestClient[] = [];
  const sleeps: number[] = [];
  const factory: ClientFactory = (options) => {
    const client = new RequestClient({
      ...options,
      fetch,
      sleep: async (ms) => {
        sleeps.push(ms);
      },
      random: () => 0,
      createConnection: () => ({ close: async () => {} }),
    });
    clients.push(client);
    return client;
  };
  return { factory, clients, sleeps };
}

/** Resolves every host to one public address. */
export const publicLookup: LookupFn = async () => [{ address: "8.8.8.8", family: 4 }];

export const execCtx: ExecContext = {
  requestId: "req-1",
  taskId: "task-1",
  permissions: ["network", "read:web"],
};

export function scholarContext(
  fetch: FetchLike,
  overrides: Partial<ScholarToolContext> = {},
): ScholarToolContext {
  const { factory } = fakeClientFactory(fetch);
  return {
    execCtx,
    config: DEFAULT_SCHOLAR_TOOLS_CONFIG,
    createClient: factory,
    logger: silentLogger(),
    lookup: publicLookup,
    ...overrides,
  };
}

// --- OpenAlex payloads (made-up records) ---

export const sampleWork = {
  id: "https://openalex.org/W100",
  title: "  Sparse Graph Sampling  ",
  display_name: "Sparse Graph Sampling",
  ids: {
    openalex: "https://openalex.org/W100",
    doi: " https://doi.org/10.1234/sgs.1 ",
    mag: 123456,
  },
  cited_by_count: 42,
  publication_date: "2021-06-01",
  authorships: [
    {
      author: { id: "https://openalex.org/A1", display_name: "Ada Example" },
      affiliations: [
        {
          raw_affiliation_string: "Dept. of Testing, Example University",
          institution_ids: ["https://openalex.org/I9"],
        },
      ],
    },
    {
      author: { display_name: "Unaffiliated Writer" },
    },
  ],
  best_oa_location: { pdf_url: null, landing_page_url: "https://repo.example.org/sgs" },
  primary_location: { pdf_url: "https://publisher.example.com/sgs.pdf" },
};

export const sampleAuthor = {
  id: "https://openalex.org/A1",
  display_name: "Ada Example",
  affiliations: [
    { institution: { id: "https://openalex.org/I9", display_name: "Example University" } },
  ],
};

export const sampleInstitution = {
  id: "https://openalex.org/I9",
  display_name: "Example University",
};

export function page(results: unknown[], count?: number) {
  return { meta: count === undefined ? {} : { count }, results };
}
