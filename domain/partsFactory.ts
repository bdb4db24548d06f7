/**
 * Parts factory — builds a parts collection from a configuration table.
 * Entity and collection types are injected, not inherited.
 */

import type { ConfigTable, PartRole } from "./core.js";
import { MalformedRowError } from "./errors.js";
import { createPart, type Part, type PartFields } from "./part.js";
import { Parts } from "./parts.js";

export type PartFactory<P extends PartRole> = (fields: PartFields) => P;
export type CollectionFactory<P extends PartRole, C> = (parts: P[]) => C;

/**
 * Build one entity per row and hand them, in row order, to createCollection.
 * Throws MalformedRowError for a row with fewer than two entries.
 */
export function buildWith<P extends PartRole, C>(
  config: ConfigTable,
  createEntity: PartFactory<P>,
  createCollection: CollectionFactory<P, C>
): C {
  const parts = config.map((row, index) => {
    if (row.length < 2) throw new MalformedRowError(index);
    const [name, description, needsSpare] = row;
    return createEntity({ name, description, needsSpare });
  });
  return createCollection(parts);
}

/** Build Parts from config. */
export function build(config: ConfigTable): Parts<Part>;
/** Build into a substitute collection type. */
export function build<C>(config: ConfigTable, createCollection: CollectionFactory<Part, C>): C;
export function build(
  config: ConfigTable,
  createCollection?: CollectionFactory<Part, unknown>
): unknown {
  if (createCollection === undefined) return buildWith(config, createPart, Parts.from);
  return buildWith(config, createPart, createCollection);
}
