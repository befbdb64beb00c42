/**
 * @tollgate/event-store — File-based JSONL EventStore implementation.
 *
 * Stores events as one JSON object per line in a `.jsonl` file.
 *
 * Crash safety:
 * - Each append flushes to disk via fsync before returning
 * - Partial writes (torn lines) are detected and skipped on load
 * - The file is the source of truth; in-memory state is derived
 *
 * File format:
 * Each line is a StoredEvent:
 * {"event":{...},"streamId":"...","version":1,"globalPosition":1,"appendedAt":"...","hash":"...","previousHash":"..."}
 */

import {
  appendFileSync,
  closeSync,
  existsSync,
  fsyncSync,
  mkdirSync,
  openSync,
  readFileSync,
} from "node:fs";
import { dirname } from "node:path";
import { isDomainEvent } from "@tollgate/types";
import { IndexedEventStore } from "./indexed-store.js";
import type { StoredEvent } from "./types.js";

export interface JsonlEventStoreOptions {
  /** Path to the JSONL file */
  readonly filePath: string;
}

export class JsonlEventStore extends IndexedEventStore {
  private readonly _filePath: string;
  private _skippedLines = 0;

  /** Set when the file ends in a torn line, so the next write starts fresh. */
  private _needsNewline = false;

  /**
   * Open (or prepare) the file at `filePath` and load its events.
   * The parent directory is created if it doesn't exist.
   */
  constructor(options: JsonlEventStoreOptions) {
    super();
    this._filePath = options.filePath;
    mkdirSync(dirname(this._filePath), { recursive: true });
    this._loadFromFile();
  }

  get filePath(): string {
    return this._filePath;
  }

  /**
   * Lines that could not be parsed as events during load.
   */
  get skippedLines(): number {
    return this._skippedLines;
  }

  protected persist(events: readonly StoredEvent[]): void {
    let data = this._needsNewline ? "\n" : "";
    for (const event of events) {
      data += JSON.stringify(event) + "\n";
    }

    const fd = openSync(this._filePath, "a");
    try {
      appendFileSync(fd, data, "utf-8");
      fsyncSync(fd);
    } catch (err) {
      // Part of the data may have reached the file as a torn line.
      this._needsNewline = true;
      throw err;
    } finally {
      closeSync(fd);
    }
    this._needsNewline = false;
  }

  /**
   * Rebuild the index from the file. Corrupt or partial lines are
   * counted and skipped; the chain check reports any gap they leave.
   */
  private _loadFromFile(): void {
    if (!existsSync(this._filePath)) {
      return;
    }

    const content = readFileSync(this._filePath, "utf-8");
    this._needsNewline = content.length > 0 && !content.endsWith("\n");

    for (const line of content.split("\n")) {
      const trimmed = line.trim();
      if (trimmed.length === 0) {
        continue;
      }

      let record: unknown;
      try {
        record = JSON.parse(trimmed);
      } catch {
        this._skippedLines++;
        continue;
      }

      if (!isStoredEvent(record)) {
        this._skippedLines++;
        continue;
      }
      this.index(record);
    }
  }
}

/**
 * Check the shape of a line read back from disk.
 */
export function isStoredEvent(value: unknown): value is StoredEvent {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    isDomainEvent(v.event) &&
    typeof v.streamId === "string" &&
    typeof v.version === "number" &&
    typeof v.globalPosition === "number" &&
    typeof v.appendedAt === "string" &&
    typeof v.hash === "string" &&
    typeof v.previousHash === "string"
  );
}
