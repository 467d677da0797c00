// In-memory report state, one report per session.
// A report only lives as long as the process; nothing is persisted.

import { randomUUID } from "crypto";
import { Report } from "../types/index.js";
import { emptyReport } from "../services/reportBuilder.js";

export interface ReportStoreOptions {
  maxSessions?: number;
  sessionTtlMs?: number;
  now?: () => number;
}

interface SessionEntry {
  report: Report;
  lastSeen: number;
}

export class ReportStore {
  // Insertion order doubles as least-recently-used order
  private sessions: Map<string, SessionEntry> = new Map();
  private readonly maxSessions: number;
  private readonly sessionTtlMs: number;
  private readonly now: () => number;

  constructor(options: ReportStoreOptions = {}) {
    this.maxSessions = options.maxSessions ?? 1000;
    this.sessionTtlMs = options.sessionTtlMs ?? 60 * 60 * 1000;
    this.now = options.now ?? Date.now;
  }

  get size(): number {
    return this.sessions.size;
  }

  createSession(): string {
    const sessionId = `session_${randomUUID()}`;
    this.store(sessionId, emptyReport());
    return sessionId;
  }

  has(sessionId: string): boolean {
    return this.get(sessionId) !== undefined;
  }

  get(sessionId: string): Report | undefined {
    const entry = this.sessions.get(sessionId);
    if (!entry) return undefined;

    if (this.isExpired(entry)) {
      this.sessions.delete(sessionId);
      return undefined;
    }

    this.touch(sessionId, entry);
    return entry.report;
  }

  // Each processing run overwrites the previous report in full
  replace(sessionId: string, report: Report): Report {
    this.store(sessionId, report);
    return report;
  }

  reset(sessionId: string): Report {
    const report = emptyReport();
    this.store(sessionId, report);
    return report;
  }

  private isExpired(entry: SessionEntry): boolean {
    return this.now() - entry.lastSeen > this.sessionTtlMs;
  }

  private touch(sessionId: string, entry: SessionEntry): void {
    entry.lastSeen = this.now();
    this.sessions.delete(sessionId);
    this.sessions.set(sessionId, entry);
  }

  private store(sessionId: string, report: Report): void {
    this.sessions.delete(sessionId);
    this.sessions.set(sessionId, { report, lastSeen: this.now() });
    this.evict();
  }

  private evict(): void {
    for (const [sessionId, entry] of this.sessions) {
      if (this.isExpired(entry)) {
        this.sessions.delete(sessionId);
      }
    }

    while (this.sessions.size > this.maxSessions) {
      const oldest = this.sessions.keys().next();
      if (oldest.done) break;
      console.log(`Evicting session: ${oldest.value}`);
      this.sessions.delete(oldest.value);
    }
  }
}
