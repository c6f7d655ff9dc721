/**
 * @keepsake/event-store — File-based JSONL EventStore implementation.
 *
 * Stores events as one JSON object per line in a `.jsonl` file.
 *
 * Crash safety:
 * - Each append flushes to disk via fsync before the batch is visible
 * - Partial writes (torn lines) are detected and skipped on load
 * - The file is the source of truth; in-memory state is derived
 *
 * File format:
 * Each line is a JSON object with the StoredEvent shape:
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
import { isDomainEvent, isRecord } from "@keepsake/types";
import type { StoredEvent } from "./types.js";
import {
  InMemoryEventStore,
  type InMemoryEventStoreOptions,
} from "./in-memory-store.js";

export interface JsonlEventStoreOptions extends InMemoryEventStoreOptions {
  /** Path to the JSONL file (created with its directory if missing) */
  readonly filePath: string;
}

/**
 * Narrow one parsed JSONL line to a StoredEvent.
 */
export function isStoredEvent(value: unknown): value is StoredEvent {
  if (!isRecord(value)) return false;
  return (
    isDomainEvent(value.event) &&
    typeof value.streamId === "string" &&
    typeof value.version === "number" &&
    typeof value.globalPosition === "number" &&
    typeof value.appendedAt === "string" &&
    typeof value.hash === "string" &&
    typeof value.previousHash === "string"
  );
}

/**
 * File-based JSONL event store.
 *
 * The in-memory index is rebuilt from the file on construction;
 * `verifyIntegrity()` then reports any tampering with the file.
 */
export class JsonlEventStore extends InMemoryEventStore {
  private readonly _filePath: string;
  private _skippedLines = 0;

  constructor(options: JsonlEventStoreOptions) {
    super(options);
    this._filePath = options.filePath;
    mkdirSync(dirname(this._filePath), { recursive: true });
    this._loadFromFile();
  }

  get filePath(): string {
    return this._filePath;
  }

  /** Non-blank lines ignored on load. */
  get skippedLines(): number {
    return this._skippedLines;
  }

  protected override persist(batch: readonly StoredEvent[]): void {
    const data = batch.map((e) => JSON.stringify(e) + "\n").join("");
    const fd = openSync(this._filePath, "a");
    try {
      appendFileSync(fd, data, "utf-8");
      fsyncSync(fd);
    } finally {
      closeSync(fd);
    }
  }

  /**
   * Load events from the JSONL file into memory.
   *
   * Tolerates partial/corrupt lines (which can happen on unclean shutdown)
   * and lines that break stream or global ordering.
   */
  private _loadFromFile(): void {
    if (!existsSync(this._filePath)) {
      return;
    }

    const lines = readFileSync(this._filePath, "utf-8").split("\n");

    for (const line of lines) {
      const trimmed = line.trim();
      if (trimmed.length === 0) {
        continue;
      }

      const record = parseLine(trimmed);
      if (
        record === undefined ||
        record.globalPosition !== this.globalPosition() + 1 ||
        record.version !== this.streamVersion(record.streamId) + 1
      ) {
        this._skippedLines++;
        continue;
      }

      this.restore([record]);
    }
  }
}

function parseLine(line: string): StoredEvent | undefined {
  let parsed: unknown;
  try {
    parsed = JSON.parse(line);
  } catch {
    return undefined;
  }
  return isStoredEvent(parsed) ? parsed : undefined;
}
