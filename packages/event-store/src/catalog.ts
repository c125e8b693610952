/**
 * @sharepool/event-store: Event catalog.
 *
 * Maps each event type to the subsystem that emits it and a zod schema
 * for its payload. A store given a catalog refuses events whose type is
 * unknown or whose payload does not parse.
 */

import type { z } from "zod";
import type { EventSource } from "@sharepool/types";

// =============================================================================
// Event Schema Definition
// =============================================================================

export interface EventSchema {
  /** Event type string (e.g. "registry.payee.added") */
  readonly type: string;

  readonly description: string;

  readonly source: EventSource;

  readonly payload: z.ZodTypeAny;
}

export type CatalogValidation =
  | { readonly valid: true }
  | { readonly valid: false; readonly issues: readonly string[] };

// =============================================================================
// Event Catalog
// =============================================================================

export class EventCatalog {
  private readonly _entries = new Map<string, EventSchema>();

  /**
   * @throws If the type is already registered
   */
  register(schema: EventSchema): void {
    if (this._entries.has(schema.type)) {
      throw new Error(`Event type "${schema.type}" is already registered`);
    }
    this._entries.set(schema.type, schema);
  }

  has(type: string): boolean {
    return this._entries.has(type);
  }

  get(type: string): EventSchema | undefined {
    return this._entries.get(type);
  }

  listTypes(): readonly string[] {
    return [...this._entries.keys()].sort();
  }

  get size(): number {
    return this._entries.size;
  }

  /**
   * Check a payload against the schema registered for `type`.
   */
  validate(type: string, payload: unknown): CatalogValidation {
    const schema = this._entries.get(type);
    if (schema === undefined) {
      return { valid: false, issues: [`Unknown event type "${type}"`] };
    }

    const parsed = schema.payload.safeParse(payload);
    if (parsed.success) {
      return { valid: true };
    }
    return {
      valid: false,
      issues: parsed.error.issues.map((issue) => {
        const path = issue.path.join(".");
        return path.length > 0 ? `${path}: ${issue.message}` : issue.message;
      }),
    };
  }
}
