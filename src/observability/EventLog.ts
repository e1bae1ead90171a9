import { EventEmitter } from "eventemitter3";
import type { AnyToolEvent, ToolEventType } from "../types/Events.js";

export interface LogEntry {
  /** 1-based, increasing; survives trimming */
  seq: number;
  event: AnyToolEvent;
}

export type EventListener = (entry: LogEntry) => void;

export interface EventQuery {
  type?: ToolEventType;
  toolName?: string;
  requestId?: string;
  /** Only entries after this sequence number */
  since?: number;
  /** Keep the newest N matches */
  limit?: number;
}

/**
 * In-memory record of tool calls, results, policy denials and HTTP retries.
 * Holds at most `maxEntries`, dropping the oldest first.
 */
export class EventLog {
  private readonly entries: LogEntry[] = [];
  private readonly emitter = new EventEmitter<{ entry: EventListener }>();
  private readonly maxEntries: number;
  private lastSeq = 0;

  constructor(options: { maxEntries?: number } = {}) {
    this.maxEntries = options.maxEntries ?? 10_000;
  }

  append(event: AnyToolEvent): LogEntry {
    this.lastSeq += 1;
    const entry: LogEntry = { seq: this.lastSeq, event };
    this.entries.push(entry);

    const overflow = this.entries.length - this.maxEntries;
    if (overflow > 0) this.entries.splice(0, overflow);

    this.emitter.emit("entry", entry);
    return entry;
  }

  /**
   * Subscribe to every appended entry. Returns the unsubscribe function.
   */
  on(listener: EventListener): () => void {
    this.emitter.on("entry", listener);
    return () => {
      this.emitter.off("entry", listener);
    };
  }

  query(filter: EventQuery = {}): LogEntry[] {
    const { type, toolName, requestId, since, limit } = filter;
    const matches = this.entries.filter(
      ({ seq, event }) =>
        (since === undefined || seq > since) &&
        (type === undefined || event.type === type) &&
        (toolName === undefined || event.toolName === toolName) &&
        (requestId === undefined || event.requestId === requestId),
    );
    return limit ? matches.slice(-limit) : matches;
  }

  getAll(): readonly LogEntry[] {
    return this.entries;
  }

  get size(): number {
    return this.entries.length;
  }
}
