/**
 * @sharepool/event-store: File-based JSONL EventStore implementation.
 *
 * Stores events as one JSON object per line in a `.jsonl` file and keeps
 * the in-memory index of its parent class.
 *
 * Crash safety:
 * - Each append is written in one call and fsynced before it becomes visible
 * - Partial or malformed lines (torn writes) are skipped on load
 * - The file is the source of truth; in-memory state is derived
 *
 * File format: each line is a StoredEvent, hash and previousHash included.
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
import { z } from "zod";
import type { StoredEvent } from "./types.js";
import { InMemoryEventStore } from "./in-memory-store.js";
import type { EventCatalog } from "./catalog.js";

export interface JsonlEventStoreOptions {
  /** Path to the JSONL file */
  readonly filePath: string;
  readonly catalog?: EventCatalog | undefined;
}

const StoredEventRecord = z.object({
  event: z.object({
    type: z.string().min(1),
    metadata: z.object({
      eventId: z.string(),
      timestamp: z.string(),
      actor: z.string(),
      correlationId: z.string(),
      causationId: z.string().optional(),
      source: z.enum(["registry", "distribution", "reimbursement", "pool", "access"]),
    }),
    payload: z.record(z.unknown()),
  }),
  streamId: z.string().min(1),
  version: z.number().int().positive(),
  globalPosition: z.number().int().positive(),
  appendedAt: z.string(),
  hash: z.string(),
  previousHash: z.string(),
});

export class JsonlEventStore extends InMemoryEventStore {
  private readonly _filePath: string;

  /** Lines in the file that could not be read back */
  private _skippedLines = 0;

  /**
   * Loads the file if it exists; it is created on first append. The
   * parent directory is created if missing.
   */
  constructor(options: JsonlEventStoreOptions) {
    super({ catalog: options.catalog });
    this._filePath = options.filePath;

    mkdirSync(dirname(this._filePath), { recursive: true });
    this._loadFromFile();
  }

  get filePath(): string {
    return this._filePath;
  }

  get skippedLines(): number {
    return this._skippedLines;
  }

  protected override persist(events: readonly StoredEvent[]): void {
    const lines = events.map((e) => JSON.stringify(e) + "\n").join("");
    const fd = openSync(this._filePath, "a");
    try {
      appendFileSync(fd, lines, "utf-8");
      fsyncSync(fd);
    } finally {
      closeSync(fd);
    }
  }

  private _loadFromFile(): void {
    if (!existsSync(this._filePath)) {
      return;
    }

    const content = readFileSync(this._filePath, "utf-8");
    for (const line of content.split("\n")) {
      const trimmed = line.trim();
      if (trimmed.length === 0) {
        continue;
      }

      const parsed = StoredEventRecord.safeParse(parseJson(trimmed));
      // Only records that continue the positions already loaded are kept.
      if (!parsed.success || parsed.data.globalPosition !== this.globalPosition() + 1) {
        this._skippedLines += 1;
        continue;
      }
      if (parsed.data.version !== this.streamVersion(parsed.data.streamId) + 1) {
        this._skippedLines += 1;
        continue;
      }
      this.restore(parsed.data);
    }
  }
}

function parseJson(line: string): unknown {
  try {
    return JSON.parse(line);
  } catch {
    // torn write; the caller counts it as skipped
    return undefined;
  }
}
