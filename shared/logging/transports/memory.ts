/**
 * Memory Transport
 *
 * Keeps the most recent entries in a fixed-size ring buffer so they can be
 * served over HTTP or inspected in tests.
 */

import type { LogTransport, LogEntry, LogLevel } from "../types.js";

// ============================================
// RING BUFFER
// ============================================

class RingBuffer<T> {
  private buffer: (T | undefined)[];
  private head = 0;
  private count = 0;

  constructor(private readonly capacity: number) {
    this.buffer = new Array<T | undefined>(capacity);
  }

  push(item: T): void {
    this.buffer[this.head] = item;
    this.head = (this.head + 1) % this.capacity;
    if (this.count < this.capacity) this.count++;
  }

  /** Oldest first */
  toArray(): T[] {
    const ordered = this.count < this.capacity
      ? this.buffer.slice(0, this.count)
      : [...this.buffer.slice(this.head), ...this.buffer.slice(0, this.head)];
    return ordered.filter((item): item is T => item !== undefined);
  }

  clear(): void {
    this.buffer = new Array<T | undefined>(this.capacity);
    this.head = 0;
    this.count = 0;
  }
}

// ============================================
// MEMORY TRANSPORT
// ============================================

export interface MemoryTransportOptions {
  minLevel?: LogLevel;
  /** Entries kept before the oldest is overwritten (default: 1000) */
  capacity?: number;
}

export class MemoryTransport implements LogTransport {
  readonly name = "memory";
  minLevel: LogLevel;
  private readonly entries: RingBuffer<LogEntry>;

  constructor(options: MemoryTransportOptions = {}) {
    const capacity = options.capacity ?? 1000;
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new Error(`MemoryTransport capacity must be a positive integer, got ${capacity}`);
    }
    this.minLevel = options.minLevel ?? "trace";
    this.entries = new RingBuffer(capacity);
  }

  log(entry: LogEntry): void {
    this.entries.push(entry);
  }

  /** Most recent entries, oldest first. */
  getEntries(limit?: number): LogEntry[] {
    const all = this.entries.toArray();
    return limit === undefined ? all : all.slice(-limit);
  }

  clear(): void {
    this.entries.clear();
  }
}
