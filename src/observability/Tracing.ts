import { v4 as uuidv4 } from "uuid";

export type SpanAttributes = Record<string, string | number | boolean>;

export interface SpanEvent {
  name: string;
  timestamp: number;
  attributes?: SpanAttributes;
}

/** One tool invocation, from resolve to result. Times are epoch ms. */
export interface Span {
  spanId: string;
  traceId: string;
  parentSpanId?: string;
  name: string;
  startTime: number;
  endTime?: number;
  durationMs?: number;
  status: "ok" | "error" | "in_progress";
  attributes: SpanAttributes;
  events: SpanEvent[];
}

/**
 * In-memory spans. The server is long-lived, so only the newest
 * `maxSpans` are kept; updates to an evicted span are ignored.
 */
export class Tracing {
  private readonly spans = new Map<string, Span>();
  private readonly maxSpans: number;

  constructor(options: { maxSpans?: number } = {}) {
    this.maxSpans = options.maxSpans ?? 1_000;
  }

  startSpan(options: {
    name: string;
    traceId?: string;
    parentSpanId?: string;
    attributes?: SpanAttributes;
  }): Span {
    const span: Span = {
      spanId: uuidv4(),
      traceId: options.traceId ?? uuidv4(),
      parentSpanId: options.parentSpanId,
      name: options.name,
      startTime: Date.now(),
      status: "in_progress",
      attributes: { ...options.attributes },
      events: [],
    };
    this.spans.set(span.spanId, span);

    // Map keys iterate oldest first
    for (const spanId of this.spans.keys()) {
      if (this.spans.size <= this.maxSpans) break;
      this.spans.delete(spanId);
    }
    return span;
  }

  endSpan(spanId: string, status: "ok" | "error" = "ok"): Span | undefined {
    const span = this.spans.get(spanId);
    if (!span) return undefined;
    span.endTime = Date.now();
    span.durationMs = span.endTime - span.startTime;
    span.status = status;
    return span;
  }

  addEvent(spanId: string, name: string, attributes?: SpanAttributes): void {
    this.spans.get(spanId)?.events.push({ name, timestamp: Date.now(), attributes });
  }

  setAttributes(spanId: string, attributes: SpanAttributes): void {
    const span = this.spans.get(spanId);
    if (span) Object.assign(span.attributes, attributes);
  }

  getSpan(spanId: string): Span | undefined {
    return this.spans.get(spanId);
  }

  get size(): number {
    return this.spans.size;
  }
}
