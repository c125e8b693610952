/**
 * SplitterRegistry: maps splitter ids to SplitterService instances.
 *
 * Every splitter writes to the same notification log under its own
 * stream. With a state file configured, the registry restores its
 * splitters at construction and rewrites the file on save().
 */

import { randomUUID } from "node:crypto";
import type { Identity } from "@sharepool/types";
import type { EventStore } from "@sharepool/event-store";
import type { PublishFailure } from "@sharepool/splitter";
import { ApiError } from "../types/error.js";
import { SplitterService } from "./splitter-service.js";
import type { SplitterView } from "./splitter-service.js";
import { readStateFile, writeStateFile } from "./state-file.js";

export interface SplitterRegistryConfig {
  readonly defaultCurrency: string;
  readonly defaultDecimals: number;
  readonly eventStore: EventStore;
  /** JSON file holding splitter and journal snapshots */
  readonly stateFile?: string | undefined;
  readonly newId?: () => string;
  /** Receives notification batches the log refused, from every splitter */
  readonly onPublishError?: ((failure: PublishFailure) => void) | undefined;
}

export interface CreateSplitterRequest {
  readonly id?: string | undefined;
  readonly currency?: string | undefined;
  readonly decimals?: number | undefined;
}

export class SplitterRegistry {
  readonly eventStore: EventStore;
  private readonly _splitters = new Map<string, SplitterService>();
  private readonly _config: SplitterRegistryConfig;
  private readonly _newId: () => string;

  constructor(config: SplitterRegistryConfig) {
    this._config = config;
    this.eventStore = config.eventStore;
    this._newId = config.newId ?? randomUUID;

    if (config.stateFile !== undefined) {
      for (const state of readStateFile(config.stateFile)) {
        const service = SplitterService.restore(state, this.eventStore, config.onPublishError);
        this._splitters.set(service.id, service);
      }
    }
  }

  /**
   * Create a splitter owned by `owner`.
   *
   * @throws ApiError CONFLICT when the id is taken, here or in the log
   */
  create(owner: Identity, request: CreateSplitterRequest = {}): SplitterService {
    const id = request.id ?? this._newId();
    if (this._splitters.has(id) || this.eventStore.streamExists(`splitter:${id}`)) {
      throw new ApiError("CONFLICT", 409, `Splitter '${id}' already exists`);
    }

    const service = SplitterService.create({
      id,
      owner,
      currency: request.currency ?? this._config.defaultCurrency,
      decimals: request.decimals ?? this._config.defaultDecimals,
      eventStore: this.eventStore,
      onPublishError: this._config.onPublishError,
    });
    this._splitters.set(id, service);
    return service;
  }

  /**
   * @throws ApiError NOT_FOUND for an unknown id
   */
  get(id: string): SplitterService {
    const service = this._splitters.get(id);
    if (service === undefined) {
      throw new ApiError("NOT_FOUND", 404, `Splitter '${id}' not found`);
    }
    return service;
  }

  has(id: string): boolean {
    return this._splitters.has(id);
  }

  ids(): readonly string[] {
    return [...this._splitters.keys()];
  }

  list(): readonly SplitterView[] {
    return [...this._splitters.values()].map((s) => s.view());
  }

  all(): readonly SplitterService[] {
    return [...this._splitters.values()];
  }

  get persistent(): boolean {
    return this._config.stateFile !== undefined;
  }

  /**
   * Rewrite the state file. No-op without one.
   */
  save(): void {
    if (this._config.stateFile === undefined) {
      return;
    }
    writeStateFile(
      this._config.stateFile,
      this.all().map((s) => s.state()),
    );
  }
}
