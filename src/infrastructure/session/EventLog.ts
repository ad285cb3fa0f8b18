// Infrastructure: In-memory event log
// Implements IEventLog from domain

import type { IEventLog, LogEntry, LogEntryKind } from '@/domain/game/session.js';

function copyEntry(entry: LogEntry): LogEntry {
  return {
    ...entry,
    ...(entry.payload ? { payload: structuredClone(entry.payload) } : {}),
  };
}

export class EventLog implements IEventLog {
  private items: LogEntry[] = [];
  private nextSequence = 1;

  constructor(private clock: () => number = Date.now) {}

  get size(): number {
    return this.items.length;
  }

  append(kind: LogEntryKind, message: string, payload?: Record<string, unknown>): LogEntry {
    const entry: LogEntry = {
      sequence: this.nextSequence++,
      timestamp: new Date(this.clock()).toISOString(),
      kind,
      message,
      ...(payload ? { payload: structuredClone(payload) } : {}),
    };
    this.items.push(entry);
    return copyEntry(entry);
  }

  entries(): LogEntry[] {
    return this.items.map(copyEntry);
  }

  recent(count: number): LogEntry[] {
    if (count <= 0) return [];
    return this.items.slice(-count).map(copyEntry);
  }
}
